import { describe, it, expect } from 'vitest';
import { PayloadTooLarge } from '@meshbridge/core';
import { chunkPacket, FragmentChunker, Reassembler, MAX_FRAGMENTS } from './chunker.js';

function packet(length: number): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = i & 0xff;
  return out;
}

describe('chunkPacket', () => {
  it('wraps a small packet in a single fragment marked last', () => {
    const fragments = chunkPacket(Uint8Array.of(9, 8, 7), 5, 10);
    expect(fragments).toHaveLength(1);
    expect([...fragments[0]!]).toEqual([5, 0xff, 9, 8, 7]);
  });

  it('numbers fragments 1..n with the last negated', () => {
    const fragments = chunkPacket(packet(20), 3, 10);
    // 8 data bytes per fragment -> 8, 8, 4
    expect(fragments.map((f) => f.length)).toEqual([10, 10, 6]);
    expect(fragments.map((f) => [f[0], f[1]])).toEqual([[3, 1], [3, 2], [3, 0xfd]]);
  });

  it('refuses packets needing more than 127 fragments', () => {
    expect(() => chunkPacket(packet(MAX_FRAGMENTS * 8 + 1), 0, 10)).toThrow(PayloadTooLarge);
    expect(chunkPacket(packet(MAX_FRAGMENTS * 8), 0, 10)).toHaveLength(MAX_FRAGMENTS);
  });

  it('rejects an MTU with no room for data', () => {
    expect(() => chunkPacket(packet(4), 0, 2)).toThrow(RangeError);
  });
});

describe('FragmentChunker', () => {
  it('increments the packet index and wraps at 256', () => {
    const chunker = new FragmentChunker(10);
    const indices: number[] = [];
    for (let i = 0; i < 258; i++) {
      indices.push(chunker.chunk(Uint8Array.of(1))[0]![0]!);
    }
    expect(indices.slice(0, 3)).toEqual([0, 1, 2]);
    expect(indices.slice(254)).toEqual([254, 255, 0, 1]);
  });
});

describe('Reassembler', () => {
  it('reassembles fragments arriving in order', () => {
    const original = packet(500);
    const reassembler = new Reassembler();
    const results = chunkPacket(original, 1, 100).map((f) => reassembler.accept(f, 7));

    expect(results.slice(0, -1).every((r) => r === null)).toBe(true);
    expect(results.at(-1)).toEqual(original);
    expect(reassembler.pendingCount).toBe(0);
  });

  it('reassembles fragments arriving in any order', () => {
    const original = packet(300);
    const fragments = chunkPacket(original, 9, 100); // 98 bytes each -> 4 fragments
    const orders = [[3, 2, 1, 0], [0, 3, 1, 2], [2, 0, 3, 1]];

    for (const order of orders) {
      const reassembler = new Reassembler();
      let result: Uint8Array | null = null;
      for (const i of order) {
        result = reassembler.accept(fragments[i]!, 1);
      }
      expect(result).toEqual(original);
    }
  });

  it('keeps packets from different sources apart', () => {
    const a = packet(150);
    const b = packet(150).map((v) => v ^ 0xff);
    const fa = chunkPacket(a, 4, 100);
    const fb = chunkPacket(b, 4, 100);
    const reassembler = new Reassembler();

    expect(reassembler.accept(fa[0]!, 1)).toBeNull();
    expect(reassembler.accept(fb[0]!, 2)).toBeNull();
    expect(reassembler.accept(fb[1]!, 2)).toEqual(b);
    expect(reassembler.accept(fa[1]!, 1)).toEqual(a);
  });

  it('ignores fragments without data', () => {
    const reassembler = new Reassembler();
    expect(reassembler.accept(Uint8Array.of(1, 0xff), 1)).toBeNull();
    expect(reassembler.accept(Uint8Array.of(1), 1)).toBeNull();
    expect(reassembler.pendingCount).toBe(0);
  });

  it('evicts incomplete packets after the timeout', () => {
    let now = 0;
    const reassembler = new Reassembler({ reassemblyTimeoutMs: 1000, now: () => now });
    const fragments = chunkPacket(packet(150), 2, 100);

    reassembler.accept(fragments[0]!, 1);
    expect(reassembler.pendingCount).toBe(1);

    now = 1000;
    expect(reassembler.accept(fragments[1]!, 1)).toBeNull();
    // The stale head was evicted; only the tail remains.
    expect(reassembler.pendingCount).toBe(1);
  });
});
