import { describe, it, expect } from 'vitest';
import { MalformedFrame, PayloadTooLarge } from '@meshbridge/core';
import { encodeFrame, decodeFrames, FrameDecoder, MAX_FRAME_PAYLOAD } from './frame-codec.js';

function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

function filled(length: number): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = (i * 31 + 7) & 0xff;
  return out;
}

describe('encodeFrame', () => {
  it('prefixes a big-endian u16 length', () => {
    expect([...encodeFrame(bytes('HELLO'))]).toEqual([0x00, 0x05, 0x48, 0x45, 0x4c, 0x4c, 0x4f]);
  });

  it('writes the prefix little-endian when asked', () => {
    const frame = encodeFrame(filled(0x0102), { byteOrder: 'le' });
    expect(frame[0]).toBe(0x02);
    expect(frame[1]).toBe(0x01);
    expect(frame).toHaveLength(0x0102 + 2);
  });

  it('encodes an empty payload as a bare prefix', () => {
    expect([...encodeFrame(new Uint8Array(0))]).toEqual([0, 0]);
  });

  it('accepts a 65535-byte payload', () => {
    const frame = encodeFrame(filled(MAX_FRAME_PAYLOAD));
    expect(frame[0]).toBe(0xff);
    expect(frame[1]).toBe(0xff);
    expect(frame).toHaveLength(65537);
  });

  it('rejects a 65536-byte payload with PayloadTooLarge', () => {
    expect(() => encodeFrame(new Uint8Array(65536))).toThrow(PayloadTooLarge);
  });
});

describe('FrameDecoder', () => {
  it('round-trips payloads of boundary sizes', () => {
    for (const size of [0, 1, 2, 180, 233, 4096, MAX_FRAME_PAYLOAD]) {
      const payload = filled(size);
      expect(decodeFrames(encodeFrame(payload))).toEqual([payload]);
    }
  });

  it('yields the same payload whatever the split point', () => {
    const payload = bytes('fragmented payload');
    const frame = encodeFrame(payload);

    for (let split = 0; split <= frame.length; split++) {
      const decoder = new FrameDecoder();
      const out = [
        ...decoder.feed(frame.subarray(0, split)),
        ...decoder.feed(frame.subarray(split)),
      ];
      expect(out).toEqual([payload]);
      expect(decoder.pending).toBe(0);
    }
  });

  it('handles a frame arriving one byte at a time', () => {
    const payload = bytes('drip');
    const frame = encodeFrame(payload);
    const decoder = new FrameDecoder();
    const out: Uint8Array[] = [];
    for (const byte of frame) {
      out.push(...decoder.feed(Uint8Array.of(byte)));
    }
    expect(out).toEqual([payload]);
  });

  it('yields several frames from one chunk in order', () => {
    const stream = Buffer.concat([encodeFrame(bytes('one')), encodeFrame(bytes('two')), encodeFrame(bytes('three'))]);
    const decoder = new FrameDecoder();
    const out = [...decoder.feed(stream)].map((p) => new TextDecoder().decode(p));
    expect(out).toEqual(['one', 'two', 'three']);
  });

  it('never yields a partial payload', () => {
    const decoder = new FrameDecoder();
    const frame = encodeFrame(bytes('HELLO'));
    expect([...decoder.feed(frame.subarray(0, 6))]).toEqual([]);
    expect(decoder.pending).toBe(6);
  });

  it('keeps unread frames buffered when the consumer stops early', () => {
    const decoder = new FrameDecoder();
    const stream = Buffer.concat([encodeFrame(bytes('first')), encodeFrame(bytes('second'))]);

    const iterator = decoder.feed(stream);
    const first = iterator.next();
    expect(first.done).toBe(false);
    expect(new TextDecoder().decode(first.value ?? new Uint8Array(0))).toBe('first');

    const rest = [...decoder.feed(new Uint8Array(0))];
    expect(rest.map((p) => new TextDecoder().decode(p))).toEqual(['second']);
  });

  it('keeps bytes from a feed that was never iterated', () => {
    const decoder = new FrameDecoder();
    decoder.feed(encodeFrame(bytes('kept')));
    expect(decoder.pending).toBe(6);
    expect([...decoder.feed(new Uint8Array(0))]).toEqual([bytes('kept')]);
  });

  it('reads little-endian prefixes when configured', () => {
    const payload = filled(300);
    const frame = encodeFrame(payload, { byteOrder: 'le' });
    expect([...new FrameDecoder({ byteOrder: 'le' }).feed(frame)]).toEqual([payload]);
  });

  it('throws MalformedFrame above maxPayloadBytes and drops the buffer', () => {
    const decoder = new FrameDecoder({ maxPayloadBytes: 4 });
    expect(() => [...decoder.feed(encodeFrame(bytes('HELLO')))]).toThrow(MalformedFrame);
    expect(decoder.pending).toBe(0);
  });

  it('reset() discards buffered bytes', () => {
    const decoder = new FrameDecoder();
    decoder.feed(Uint8Array.of(0x00, 0x09, 0x01));
    decoder.reset();
    expect(decoder.pending).toBe(0);
  });
});

describe('decodeFrames', () => {
  it('rejects trailing partial data', () => {
    const frame = encodeFrame(bytes('HELLO'));
    expect(() => decodeFrames(frame.subarray(0, 4))).toThrow(MalformedFrame);
  });
});
