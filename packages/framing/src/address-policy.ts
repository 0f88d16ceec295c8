/**
 * AddressPolicy: runtime toggle between broadcast and unicast-to-gateway.
 *
 * Callers read current() once per frame, at submit time, and carry the
 * result with the frame. A toggle therefore never rewrites frames that
 * are already queued.
 */

import { ConfigError, parseNodeId, type AddressConfig, type RadioAddress } from '@meshbridge/core';

export type AddressListener = (address: RadioAddress, previous: RadioAddress) => void;

const BROADCAST: RadioAddress = Object.freeze({ kind: 'broadcast' });

export class AddressPolicy {
  private address: RadioAddress;
  private readonly listeners = new Set<AddressListener>();

  constructor(initial: RadioAddress = BROADCAST) {
    this.address = initial;
  }

  static fromConfig(config: AddressConfig): AddressPolicy {
    if (config.mode === 'broadcast') return new AddressPolicy();
    return new AddressPolicy(unicast(config.destination));
  }

  current(): RadioAddress {
    return this.address;
  }

  set(address: RadioAddress): void {
    const previous = this.address;
    this.address = address.kind === 'broadcast' ? BROADCAST : { kind: 'unicast', destination: address.destination };
    if (sameAddress(previous, this.address)) return;
    for (const listener of this.listeners) {
      listener(this.address, previous);
    }
  }

  setBroadcast(): void {
    this.set(BROADCAST);
  }

  /** Accepts a node number, `!a1b2c3d4`, `0x…` or a decimal string. Throws ConfigError. */
  setUnicast(destination: string | number): void {
    this.set(unicast(destination));
  }

  onChange(listener: AddressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function unicast(destination: string | number): RadioAddress {
  const num = parseNodeId(destination);
  if (num === null) {
    throw new ConfigError(`Invalid destination node id: ${String(destination)}`, { destination });
  }
  return { kind: 'unicast', destination: num };
}

export function sameAddress(a: RadioAddress, b: RadioAddress): boolean {
  if (a.kind === 'broadcast' || b.kind === 'broadcast') return a.kind === b.kind;
  return a.destination === b.destination;
}
