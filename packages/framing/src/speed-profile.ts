/**
 * SpeedProfile: per-packet transmit delay by LoRa modem preset.
 *
 * Codes are Meshtastic modem preset numbers. The delay is advisory
 * pacing between consecutive transmissions; the radio does not enforce it.
 */

import { UnknownSpeedProfile } from '@meshbridge/core';

export interface SpeedProfileEntry {
  code: number;
  /** Modem preset name as the firmware spells it. */
  preset: string;
  delaySeconds: number;
  /** floor(DEFAULT_MTU / delaySeconds). */
  bytesPerSecond: number;
}

/** Default path MTU of the local socket, in bytes. */
export const DEFAULT_MTU = 180;

/** Largest Data payload the Meshtastic firmware will carry. */
export const RADIO_PAYLOAD_MTU = 233;

export const DEFAULT_SPEED_CODE = 8;

/** The most conservative profile, used when a code is unknown at runtime. */
export const SLOWEST_SPEED_CODE = 1;

const DELAYS: ReadonlyMap<number, { preset: string; delaySeconds: number }> = new Map([
  [8, { preset: 'SHORT_TURBO', delaySeconds: 0.4 }],
  [6, { preset: 'SHORT_FAST', delaySeconds: 1 }],
  [5, { preset: 'SHORT_SLOW', delaySeconds: 3 }],
  [7, { preset: 'LONG_MODERATE', delaySeconds: 12 }],
  [4, { preset: 'MEDIUM_FAST', delaySeconds: 4 }],
  [3, { preset: 'MEDIUM_SLOW', delaySeconds: 6 }],
  [1, { preset: 'LONG_SLOW', delaySeconds: 15 }],
  [0, { preset: 'LONG_FAST', delaySeconds: 8 }],
]);

export function isKnownSpeedCode(code: number): boolean {
  return DELAYS.has(code);
}

/** Delay in seconds for a speed code. Throws UnknownSpeedProfile. */
export function delayFor(code: number): number {
  const entry = DELAYS.get(code);
  if (!entry) {
    throw new UnknownSpeedProfile(code, [...DELAYS.keys()].sort((a, b) => a - b));
  }
  return entry.delaySeconds;
}

/** Like delayFor(), but an unknown code gets the slowest delay instead of an error. */
export function delayForOrSlowest(code: number): number {
  return DELAYS.get(code)?.delaySeconds ?? delayFor(SLOWEST_SPEED_CODE);
}

/** Minimum spacing between consecutive transmissions, in milliseconds. */
export function minSpacingMs(code: number): number {
  return Math.round(delayForOrSlowest(code) * 1000);
}

export function listSpeedProfiles(mtu = DEFAULT_MTU): SpeedProfileEntry[] {
  return [...DELAYS.entries()]
    .map(([code, { preset, delaySeconds }]) => ({
      code,
      preset,
      delaySeconds,
      bytesPerSecond: Math.floor(mtu / delaySeconds),
    }))
    .sort((a, b) => a.delaySeconds - b.delaySeconds);
}

/**
 * Payload ceiling for a speed code. Slower presets are paced harder but
 * carry the same payload, so every known code gets `hwMtu` back.
 */
export function effectiveMtu(code: number, hwMtu = RADIO_PAYLOAD_MTU): number {
  delayFor(code);
  return hwMtu;
}
