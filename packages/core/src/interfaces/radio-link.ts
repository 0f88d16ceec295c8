/**
 * IRadioLink: radio channel contract
 *
 * Every way of reaching the mesh (Meshtastic TCP stream API, Meshtastic
 * HTTP API, a running bridge's local socket) implements this interface.
 * Links are owned by a ReconnectSupervisor; nothing else calls connect()
 * or disconnect().
 */

import type {
  ChannelBinding,
  ConnectionState,
  InboundFrame,
  LinkInfo,
  RadioAddress,
} from '../types/index.js';

export interface IRadioLink {
  readonly id: string;
  readonly name: string;

  /** Open the transport and bind to the channel. Throws BindUnavailable. */
  connect(binding: ChannelBinding, signal?: AbortSignal): Promise<LinkInfo>;
  /** Transmit one frame. Throws NotBound when not bound. */
  send(frame: Uint8Array, address: RadioAddress): Promise<void>;
  /** Release the transport. Idempotent. */
  disconnect(): Promise<void>;
  isBound(): boolean;

  onReceive(handler: (frame: InboundFrame) => void): () => void;
  /** Any inbound traffic at all, used for staleness detection. */
  onActivity(handler: () => void): () => void;
  /** The transport failed after binding. The error is a LinkLost. */
  onLost(handler: (err: Error) => void): () => void;

  /** Optional liveness probe. */
  probe?(): Promise<void>;
}

/**
 * The capability a BridgeSession or MeshInterface holds on the radio:
 * submit work and hear inbound frames. State is read-only from here.
 */
export interface IRadioPort {
  submit(payload: Uint8Array, address: RadioAddress): void;
  onReceive(handler: (frame: InboundFrame) => void): () => void;
  getState(): ConnectionState;
}
