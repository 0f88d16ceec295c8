/**
 * Meshtastic stream API framing, used over TCP (port 4403):
 *
 *   0x94 0xC3 [len u16 BE] [protobuf, len <= 512]
 *
 * Anything between frames (debug log text, line noise) is skipped by
 * scanning for the next start marker.
 */

import { MalformedFrame } from '@meshbridge/core';

export const START1 = 0x94;
export const START2 = 0xc3;
export const STREAM_HEADER_BYTES = 4;
export const MAX_STREAM_PAYLOAD = 512;

/** Sent on open so a sleeping serial console switches into protobuf mode. */
export const WAKE_SEQUENCE: Uint8Array = new Uint8Array(32).fill(START2);

export function encodeStreamFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_STREAM_PAYLOAD) {
    throw new MalformedFrame(`Stream payload of ${payload.length} bytes exceeds ${MAX_STREAM_PAYLOAD}`, {
      length: payload.length,
    });
  }
  const frame = new Uint8Array(STREAM_HEADER_BYTES + payload.length);
  frame[0] = START1;
  frame[1] = START2;
  frame[2] = (payload.length >> 8) & 0xff;
  frame[3] = payload.length & 0xff;
  frame.set(payload, STREAM_HEADER_BYTES);
  return frame;
}

export class StreamFrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  /** Bytes skipped while hunting for a start marker. */
  skipped = 0;

  feed(chunk: Uint8Array): Uint8Array[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    const frames: Uint8Array[] = [];

    for (;;) {
      const start = this.findStart();
      if (start < 0) {
        // Keep a trailing START1 in case its partner is in the next chunk.
        const keep = this.buffer.length > 0 && this.buffer[this.buffer.length - 1] === START1 ? 1 : 0;
        this.skipped += this.buffer.length - keep;
        this.buffer = this.buffer.subarray(this.buffer.length - keep);
        return frames;
      }
      if (start > 0) {
        this.skipped += start;
        this.buffer = this.buffer.subarray(start);
      }
      if (this.buffer.length < STREAM_HEADER_BYTES) return frames;

      const length = this.buffer.readUInt16BE(2);
      if (length > MAX_STREAM_PAYLOAD) {
        // Not a real header; step past the marker and keep scanning.
        this.skipped += 1;
        this.buffer = this.buffer.subarray(1);
        continue;
      }

      const end = STREAM_HEADER_BYTES + length;
      if (this.buffer.length < end) return frames;

      frames.push(new Uint8Array(this.buffer.subarray(STREAM_HEADER_BYTES, end)));
      this.buffer = this.buffer.subarray(end);
    }
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.skipped = 0;
  }

  private findStart(): number {
    for (let i = 0; i + 1 < this.buffer.length; i++) {
      if (this.buffer[i] === START1 && this.buffer[i + 1] === START2) return i;
    }
    return -1;
  }
}
