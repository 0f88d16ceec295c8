/**
 * FrameCodec: the local socket's wire format.
 *
 * Each frame is a 2-byte unsigned length followed by that many payload
 * bytes. There is no other framing. The codec does not know about MTUs:
 * callers chunk before framing.
 *
 * FrameDecoder is the incremental half. It buffers socket reads of any
 * size and yields complete payloads only.
 */

import { MalformedFrame, PayloadTooLarge, type ByteOrder } from '@meshbridge/core';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const LENGTH_PREFIX_BYTES = 2;
export const MAX_FRAME_PAYLOAD = 0xffff;

/** Where the bridge listens and the adapter connects unless configured otherwise. */
export const DEFAULT_BRIDGE_HOST = '127.0.0.1';
export const DEFAULT_BRIDGE_PORT = 45832;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FrameCodecOptions {
  /** Length prefix byte order. Default: 'be'. */
  byteOrder?: ByteOrder;
  /**
   * Largest length the decoder accepts. Declared lengths above it are
   * treated as malformed. Default: 65535, which never triggers.
   */
  maxPayloadBytes?: number;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function encodeFrame(payload: Uint8Array, options: FrameCodecOptions = {}): Uint8Array {
  if (payload.length > MAX_FRAME_PAYLOAD) {
    throw new PayloadTooLarge(payload.length, MAX_FRAME_PAYLOAD);
  }

  const frame = new Uint8Array(LENGTH_PREFIX_BYTES + payload.length);
  const view = new DataView(frame.buffer);
  view.setUint16(0, payload.length, options.byteOrder === 'le');
  frame.set(payload, LENGTH_PREFIX_BYTES);
  return frame;
}

// ---------------------------------------------------------------------------
// FrameDecoder
// ---------------------------------------------------------------------------

export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly littleEndian: boolean;
  private readonly maxPayloadBytes: number;

  constructor(options: FrameCodecOptions = {}) {
    this.littleEndian = options.byteOrder === 'le';
    this.maxPayloadBytes = Math.min(options.maxPayloadBytes ?? MAX_FRAME_PAYLOAD, MAX_FRAME_PAYLOAD);
  }

  /**
   * Append a chunk and return the payloads it completes.
   *
   * The sequence is lazy: a consumer that stops early leaves the rest
   * buffered, and the next feed() picks up where it stopped. Throws
   * MalformedFrame when a declared length exceeds maxPayloadBytes.
   */
  feed(chunk: Uint8Array): Generator<Uint8Array, void, undefined> {
    // Appended eagerly: the bytes are kept even if nobody iterates.
    if (chunk.length > 0) {
      this.buffer = this.buffer.length === 0
        ? Buffer.from(chunk)
        : Buffer.concat([this.buffer, chunk]);
    }
    return this.drain();
  }

  private *drain(): Generator<Uint8Array, void, undefined> {
    while (this.buffer.length >= LENGTH_PREFIX_BYTES) {
      const length = this.littleEndian
        ? this.buffer.readUInt16LE(0)
        : this.buffer.readUInt16BE(0);

      if (length > this.maxPayloadBytes) {
        this.reset();
        throw new MalformedFrame(`Declared frame length ${length} exceeds ${this.maxPayloadBytes}`, {
          length,
          maxPayloadBytes: this.maxPayloadBytes,
        });
      }

      const end = LENGTH_PREFIX_BYTES + length;
      if (this.buffer.length < end) return;

      // Copy out so the caller owns the bytes after the buffer moves on.
      const payload = new Uint8Array(this.buffer.subarray(LENGTH_PREFIX_BYTES, end));
      this.buffer = this.buffer.subarray(end);
      yield payload;
    }
  }

  /** Bytes held back waiting for the rest of a frame. */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}

/** Decode a complete byte string into its payloads. Trailing partial data is an error. */
export function decodeFrames(bytes: Uint8Array, options: FrameCodecOptions = {}): Uint8Array[] {
  const decoder = new FrameDecoder(options);
  const payloads = [...decoder.feed(bytes)];
  if (decoder.pending > 0) {
    throw new MalformedFrame(`Truncated frame: ${decoder.pending} trailing bytes`, { pending: decoder.pending });
  }
  return payloads;
}
