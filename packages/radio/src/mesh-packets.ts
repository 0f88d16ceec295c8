/**
 * Encoding of ToRadio requests and decoding of FromRadio messages into
 * a small tagged union the link can switch on.
 */

import type { NodeNum } from '@meshbridge/core';
import { getMeshtasticTypes } from './schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MeshPacketOut {
  to: NodeNum;
  channel: number;
  portnum: number;
  payload: Uint8Array;
  hopLimit: number;
  id?: number;
}

export interface ReceivedPacket {
  from: NodeNum;
  to: NodeNum;
  channel: number;
  id: number;
  portnum: number;
  payload: Uint8Array;
}

export type DeviceMessage =
  | { kind: 'packet'; packet: ReceivedPacket }
  | { kind: 'encrypted-packet'; from: NodeNum }
  | { kind: 'my-info'; nodeNum: NodeNum }
  | { kind: 'channel'; index: number; name: string; role: number }
  | { kind: 'lora-config'; usePreset: boolean; modemPreset: number; hopLimit: number }
  | { kind: 'config-complete'; nonce: number }
  | { kind: 'rebooted' }
  | { kind: 'queue-status'; free: number; maxlen: number }
  | { kind: 'other' };

const TO_OBJECT_OPTIONS = { longs: Number, enums: Number, defaults: true, oneofs: true };

// ---------------------------------------------------------------------------
// ToRadio
// ---------------------------------------------------------------------------

export function encodePacket(packet: MeshPacketOut): Uint8Array {
  const { toRadio } = getMeshtasticTypes();
  const message = toRadio.fromObject({
    packet: {
      to: packet.to >>> 0,
      channel: packet.channel,
      id: packet.id ?? 0,
      hopLimit: packet.hopLimit,
      wantAck: false,
      decoded: { portnum: packet.portnum, payload: packet.payload },
    },
  });
  return toRadio.encode(message).finish();
}

export function encodeWantConfig(nonce: number): Uint8Array {
  const { toRadio } = getMeshtasticTypes();
  return toRadio.encode(toRadio.fromObject({ wantConfigId: nonce >>> 0 })).finish();
}

export function encodeHeartbeat(): Uint8Array {
  const { toRadio } = getMeshtasticTypes();
  return toRadio.encode(toRadio.fromObject({ heartbeat: {} })).finish();
}

export function encodeDisconnect(): Uint8Array {
  const { toRadio } = getMeshtasticTypes();
  return toRadio.encode(toRadio.fromObject({ disconnect: true })).finish();
}

// ---------------------------------------------------------------------------
// FromRadio
// ---------------------------------------------------------------------------

/** Throws when the bytes are not a FromRadio message. */
export function decodeFromRadio(bytes: Uint8Array): DeviceMessage {
  const { fromRadio } = getMeshtasticTypes();
  const decoded: Record<string, unknown> = fromRadio.toObject(fromRadio.decode(bytes), TO_OBJECT_OPTIONS);

  switch (decoded['payloadVariant']) {
    case 'packet':
      return decodeMeshPacket(record(decoded['packet']));
    case 'myInfo':
      return { kind: 'my-info', nodeNum: num(record(decoded['myInfo'])['myNodeNum']) };
    case 'channel': {
      const channel = record(decoded['channel']);
      const settings = record(channel['settings']);
      return {
        kind: 'channel',
        index: num(channel['index']),
        name: str(settings['name']),
        role: num(channel['role']),
      };
    }
    case 'config': {
      const config = record(decoded['config']);
      if (config['payloadVariant'] !== 'lora') return { kind: 'other' };
      const lora = record(config['lora']);
      return {
        kind: 'lora-config',
        usePreset: lora['usePreset'] === true,
        modemPreset: num(lora['modemPreset']),
        hopLimit: num(lora['hopLimit']),
      };
    }
    case 'configCompleteId':
      return { kind: 'config-complete', nonce: num(decoded['configCompleteId']) };
    case 'rebooted':
      return decoded['rebooted'] === true ? { kind: 'rebooted' } : { kind: 'other' };
    case 'queueStatus': {
      const status = record(decoded['queueStatus']);
      return { kind: 'queue-status', free: num(status['free']), maxlen: num(status['maxlen']) };
    }
    default:
      return { kind: 'other' };
  }
}

function decodeMeshPacket(packet: Record<string, unknown>): DeviceMessage {
  if (packet['payloadVariant'] !== 'decoded') {
    return { kind: 'encrypted-packet', from: num(packet['from']) };
  }
  const data = record(packet['decoded']);
  const payload = data['payload'];
  return {
    kind: 'packet',
    packet: {
      from: num(packet['from']),
      to: num(packet['to']),
      channel: num(packet['channel']),
      id: num(packet['id']),
      portnum: num(data['portnum']),
      payload: payload instanceof Uint8Array ? new Uint8Array(payload) : new Uint8Array(0),
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function record(value: unknown): Record<string, unknown> {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function num(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}
