/**
 * HDLC-style framing as spoken by a Reticulum TCPClientInterface.
 *
 *   0x7E <escaped packet> 0x7E
 *
 * Inside a frame 0x7D and 0x7E are sent as 0x7D followed by the byte XOR 0x20.
 */

export const HDLC_FLAG = 0x7e;
export const HDLC_ESC = 0x7d;
export const HDLC_ESC_MASK = 0x20;
export const DEFAULT_MAX_HDLC_FRAME = 0xffff;

export function hdlcEscape(data: Uint8Array): Uint8Array {
  let extra = 0;
  for (const byte of data) {
    if (byte === HDLC_FLAG || byte === HDLC_ESC) extra++;
  }
  if (extra === 0) return data;

  const out = new Uint8Array(data.length + extra);
  let i = 0;
  for (const byte of data) {
    if (byte === HDLC_FLAG || byte === HDLC_ESC) {
      out[i++] = HDLC_ESC;
      out[i++] = byte ^ HDLC_ESC_MASK;
    } else {
      out[i++] = byte;
    }
  }
  return out;
}

export function hdlcFrame(data: Uint8Array): Uint8Array {
  const escaped = hdlcEscape(data);
  const out = new Uint8Array(escaped.length + 2);
  out[0] = HDLC_FLAG;
  out.set(escaped, 1);
  out[out.length - 1] = HDLC_FLAG;
  return out;
}

/**
 * Incremental de-framer. Bytes before the first flag are discarded, empty
 * frames are skipped, and a frame growing past maxFrameBytes is abandoned
 * up to the next flag.
 */
export class HdlcDecoder {
  private frame: number[] = [];
  private inFrame = false;
  private escaping = false;
  private overflowed = false;
  private readonly maxFrameBytes: number;
  /** Frames abandoned for exceeding maxFrameBytes. */
  oversized = 0;

  constructor(maxFrameBytes = DEFAULT_MAX_HDLC_FRAME) {
    this.maxFrameBytes = maxFrameBytes;
  }

  feed(chunk: Uint8Array): Uint8Array[] {
    const packets: Uint8Array[] = [];

    for (const byte of chunk) {
      if (byte === HDLC_FLAG) {
        if (this.inFrame && this.frame.length > 0 && !this.overflowed) {
          packets.push(Uint8Array.from(this.frame));
        }
        this.inFrame = true;
        this.frame = [];
        this.escaping = false;
        this.overflowed = false;
        continue;
      }
      if (!this.inFrame || this.overflowed) continue;

      if (byte === HDLC_ESC) {
        this.escaping = true;
        continue;
      }
      this.frame.push(this.escaping ? byte ^ HDLC_ESC_MASK : byte);
      this.escaping = false;

      if (this.frame.length > this.maxFrameBytes) {
        this.overflowed = true;
        this.oversized++;
        this.frame = [];
      }
    }

    return packets;
  }

  reset(): void {
    this.frame = [];
    this.inFrame = false;
    this.escaping = false;
    this.overflowed = false;
  }
}
