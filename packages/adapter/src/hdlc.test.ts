import { describe, it, expect } from 'vitest';
import { HdlcDecoder, hdlcEscape, hdlcFrame } from './hdlc.js';

describe('hdlcEscape', () => {
  it('escapes flag and escape bytes', () => {
    expect([...hdlcEscape(Uint8Array.of(1, 0x7e, 2, 0x7d))]).toEqual([1, 0x7d, 0x5e, 2, 0x7d, 0x5d]);
  });

  it('leaves clean data alone', () => {
    expect([...hdlcEscape(Uint8Array.of(1, 2, 3))]).toEqual([1, 2, 3]);
  });
});

describe('hdlcFrame', () => {
  it('wraps escaped data in flags', () => {
    expect([...hdlcFrame(Uint8Array.of(0x7e))]).toEqual([0x7e, 0x7d, 0x5e, 0x7e]);
    expect([...hdlcFrame(Uint8Array.of(0x41, 0x42))]).toEqual([0x7e, 0x41, 0x42, 0x7e]);
  });
});

describe('HdlcDecoder', () => {
  const a = Uint8Array.of(1, 0x7e, 2);
  const b = Uint8Array.of(0x7d, 9);

  it('decodes back-to-back frames from one chunk', () => {
    const decoder = new HdlcDecoder();
    const packets = decoder.feed(new Uint8Array([...hdlcFrame(a), ...hdlcFrame(b)]));
    expect(packets.map((p) => [...p])).toEqual([[1, 0x7e, 2], [0x7d, 9]]);
  });

  it('decodes frames that share a flag', () => {
    const decoder = new HdlcDecoder();
    const packets = decoder.feed(Uint8Array.of(0x7e, 1, 0x7e, 2, 0x7e));
    expect(packets.map((p) => [...p])).toEqual([[1], [2]]);
  });

  it('decodes one byte at a time', () => {
    const decoder = new HdlcDecoder();
    const out: number[][] = [];
    for (const byte of hdlcFrame(a)) {
      out.push(...decoder.feed(Uint8Array.of(byte)).map((p) => [...p]));
    }
    expect(out).toEqual([[1, 0x7e, 2]]);
  });

  it('keeps an escape split across chunks', () => {
    const decoder = new HdlcDecoder();
    expect(decoder.feed(Uint8Array.of(0x7e, 0x7d))).toEqual([]);
    expect(decoder.feed(Uint8Array.of(0x5e, 0x7e)).map((p) => [...p])).toEqual([[0x7e]]);
  });

  it('discards bytes before the first flag and skips empty frames', () => {
    const decoder = new HdlcDecoder();
    const packets = decoder.feed(Uint8Array.of(5, 6, 0x7e, 0x7e, 0x7e, 7, 0x7e));
    expect(packets.map((p) => [...p])).toEqual([[7]]);
  });

  it('abandons a frame that grows past the limit', () => {
    const decoder = new HdlcDecoder(4);
    const packets = decoder.feed(new Uint8Array([...hdlcFrame(Uint8Array.of(1, 2, 3, 4, 5)), ...hdlcFrame(Uint8Array.of(9))]));
    expect(packets.map((p) => [...p])).toEqual([[9]]);
    expect(decoder.oversized).toBe(1);
  });
});
