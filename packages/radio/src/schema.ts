/**
 * Meshtastic protobuf schema, loaded at run time from proto/meshtastic.proto.
 */

import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const PORTNUM_RETICULUM_TUNNEL = 76;
export const PORTNUM_PRIVATE_APP = 256;

/** Largest Data.payload the firmware accepts. */
export const MAX_DATA_PAYLOAD = 233;

export const CHANNEL_ROLE_DISABLED = 0;

const PROTO_PATH = fileURLToPath(new URL('../proto/meshtastic.proto', import.meta.url));

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export interface MeshtasticTypes {
  toRadio: protobuf.Type;
  fromRadio: protobuf.Type;
}

let cached: MeshtasticTypes | null = null;

export function getMeshtasticTypes(): MeshtasticTypes {
  if (!cached) {
    const root = protobuf.loadSync(PROTO_PATH);
    cached = {
      toRadio: root.lookupType('meshtastic.ToRadio'),
      fromRadio: root.lookupType('meshtastic.FromRadio'),
    };
  }
  return cached;
}
