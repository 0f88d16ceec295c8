/**
 * Fragment chunking for packets larger than the radio MTU.
 *
 * Fragment layout: [index u8][position i8][data...]. `index` identifies
 * the packet (wrapping mod 256); positions run 1..n and the last fragment
 * carries -n, so a receiver knows the count once the tail arrives.
 */

import { PayloadTooLarge, type NodeNum } from '@meshbridge/core';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const FRAGMENT_HEADER_BYTES = 2;
export const MAX_FRAGMENTS = 127;
export const DEFAULT_REASSEMBLY_TIMEOUT_MS = 60_000;

// ---------------------------------------------------------------------------
// Chunking
// ---------------------------------------------------------------------------

/** Split `packet` into fragments of at most `mtu` bytes each, headers included. */
export function chunkPacket(packet: Uint8Array, index: number, mtu: number): Uint8Array[] {
  const dataPerFragment = mtu - FRAGMENT_HEADER_BYTES;
  if (dataPerFragment < 1) {
    throw new RangeError(`MTU ${mtu} leaves no room for fragment data`);
  }

  const count = Math.max(1, Math.ceil(packet.length / dataPerFragment));
  if (count > MAX_FRAGMENTS) {
    throw new PayloadTooLarge(packet.length, MAX_FRAGMENTS * dataPerFragment);
  }

  const fragments: Uint8Array[] = [];
  for (let i = 0; i < count; i++) {
    const data = packet.subarray(i * dataPerFragment, (i + 1) * dataPerFragment);
    const position = i === count - 1 ? -count : i + 1;
    const fragment = new Uint8Array(FRAGMENT_HEADER_BYTES + data.length);
    const view = new DataView(fragment.buffer);
    view.setUint8(0, index & 0xff);
    view.setInt8(1, position);
    fragment.set(data, FRAGMENT_HEADER_BYTES);
    fragments.push(fragment);
  }
  return fragments;
}

/** Hands out packet indices, wrapping after 255. */
export class FragmentChunker {
  private nextIndex = 0;

  constructor(private readonly mtu: number) {}

  chunk(packet: Uint8Array): Uint8Array[] {
    const fragments = chunkPacket(packet, this.nextIndex, this.mtu);
    this.nextIndex = (this.nextIndex + 1) & 0xff;
    return fragments;
  }
}

// ---------------------------------------------------------------------------
// Reassembly
// ---------------------------------------------------------------------------

interface PartialPacket {
  fragments: Map<number, Uint8Array>;
  /** Known once the negative-position fragment arrives. */
  total: number | null;
  firstSeen: number;
}

export interface ReassemblerOptions {
  reassemblyTimeoutMs?: number;
  /** Clock, for tests. Default: Date.now. */
  now?: () => number;
}

/**
 * Collects fragments per (source, index) and returns the joined packet
 * once every position is present. Arrival order does not matter.
 */
export class Reassembler {
  private readonly partials = new Map<string, PartialPacket>();
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: ReassemblerOptions = {}) {
    this.timeoutMs = options.reassemblyTimeoutMs ?? DEFAULT_REASSEMBLY_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /** Returns the whole packet when `fragment` completes one, otherwise null. */
  accept(fragment: Uint8Array, source: NodeNum): Uint8Array | null {
    this.evictExpired();

    // Header plus at least one data byte.
    if (fragment.length <= FRAGMENT_HEADER_BYTES) return null;

    const view = new DataView(fragment.buffer, fragment.byteOffset, fragment.byteLength);
    const index = view.getUint8(0);
    const position = view.getInt8(1);
    if (position === 0) return null;

    const key = `${source}:${index}`;
    let partial = this.partials.get(key);
    if (!partial) {
      partial = { fragments: new Map(), total: null, firstSeen: this.now() };
      this.partials.set(key, partial);
    }

    const slot = Math.abs(position);
    partial.fragments.set(slot, fragment.subarray(FRAGMENT_HEADER_BYTES));
    if (position < 0) partial.total = slot;

    if (partial.total === null || partial.fragments.size < partial.total) return null;

    const parts: Uint8Array[] = [];
    let length = 0;
    for (let slotIndex = 1; slotIndex <= partial.total; slotIndex++) {
      const part = partial.fragments.get(slotIndex);
      if (!part) return null;
      parts.push(part);
      length += part.length;
    }

    this.partials.delete(key);
    const joined = new Uint8Array(length);
    let offset = 0;
    for (const part of parts) {
      joined.set(part, offset);
      offset += part.length;
    }
    return joined;
  }

  /** Incomplete packets currently held. */
  get pendingCount(): number {
    return this.partials.size;
  }

  clear(): void {
    this.partials.clear();
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.timeoutMs;
    for (const [key, partial] of this.partials) {
      if (partial.firstSeen <= cutoff) this.partials.delete(key);
    }
  }
}
