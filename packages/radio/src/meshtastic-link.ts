/**
 * MeshtasticLink: IRadioLink over a Meshtastic node's client API.
 *
 * Binding runs the PhoneAPI config handshake: send want_config_id with a
 * random nonce, collect my_info / channel / lora config until the node
 * answers config_complete_id with the same nonce. The ChannelBinding is
 * resolved against the channels the node reported:
 *
 *   private-app        -> PRIVATE_APP port on the primary channel (index 0)
 *   named-stream(name) -> RETICULUM_TUNNEL_APP port on the channel called name
 *
 * Inbound packets on any other port or channel are ignored.
 */

import {
  BROADCAST_NUM,
  BindUnavailable,
  LinkLost,
  NotBound,
  PayloadTooLarge,
  type ChannelBinding,
  type IObserver,
  type IRadioLink,
  type InboundFrame,
  type LinkInfo,
  type RadioAddress,
} from '@meshbridge/core';
import type { DeviceTransport, TransportClose } from './transport.js';
import {
  decodeFromRadio,
  encodeDisconnect,
  encodeHeartbeat,
  encodePacket,
  encodeWantConfig,
  type DeviceMessage,
} from './mesh-packets.js';
import {
  CHANNEL_ROLE_DISABLED,
  MAX_DATA_PAYLOAD,
  PORTNUM_PRIVATE_APP,
  PORTNUM_RETICULUM_TUNNEL,
} from './schema.js';
import { HandlerSet } from './handlers.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MeshtasticLinkOpts {
  /** Hop limit stamped on outgoing packets. Default: 1. */
  hopLimit?: number;
  /** Give up on the config handshake after this long. Default: 30000. */
  handshakeTimeoutMs?: number;
  observer?: IObserver;
}

export interface ChannelEntry {
  index: number;
  name: string;
  role: number;
}

interface Handshake {
  nonce: number;
  channels: ChannelEntry[];
  localNode?: number;
  modemPreset?: number;
  resolve: () => void;
  reject: (err: Error) => void;
}

export interface Route {
  portnum: number;
  channelIndex: number;
}

const DEFAULT_HOP_LIMIT = 1;
const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// MeshtasticLink
// ---------------------------------------------------------------------------

export class MeshtasticLink implements IRadioLink {
  readonly id: string;
  readonly name: string;

  private readonly hopLimit: number;
  private readonly handshakeTimeoutMs: number;
  private readonly observer?: IObserver;

  private route: Route | null = null;
  private open = false;
  private handshake: Handshake | null = null;

  private readonly receiveHandlers = new HandlerSet<InboundFrame>();
  private readonly activityHandlers = new HandlerSet<void>();
  private readonly lostHandlers = new HandlerSet<Error>();

  constructor(private readonly transport: DeviceTransport, opts: MeshtasticLinkOpts = {}) {
    this.id = `meshtastic-${transport.kind}`;
    this.name = `Meshtastic (${transport.target})`;
    this.hopLimit = opts.hopLimit ?? DEFAULT_HOP_LIMIT;
    this.handshakeTimeoutMs = opts.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.observer = opts.observer;

    transport.onMessage((bytes) => this.handleMessage(bytes));
    transport.onClose((event) => this.handleTransportClose(event));
  }

  // ---------------------------------------------------------------------------
  // IRadioLink
  // ---------------------------------------------------------------------------

  async connect(binding: ChannelBinding, signal?: AbortSignal): Promise<LinkInfo> {
    if (this.open) await this.disconnect();

    try {
      await this.transport.open(signal);
    } catch (err) {
      throw new BindUnavailable(
        `Cannot reach ${this.transport.target}: ${errorMessage(err)}`,
        this.id,
        { target: this.transport.target },
      );
    }
    this.open = true;

    let handshake: Handshake;
    try {
      handshake = await this.runHandshake(signal);
    } catch (err) {
      await this.closeTransport();
      throw err;
    }

    const route = resolveRoute(binding, handshake.channels);
    if (!route) {
      await this.closeTransport();
      const name = binding.kind === 'named-stream' ? binding.name : 'primary';
      throw new BindUnavailable(`Device has no channel named "${name}"`, this.id, {
        channels: handshake.channels.map((c) => c.name),
      });
    }

    this.route = route;
    return {
      localNode: handshake.localNode,
      portnum: route.portnum,
      channelIndex: route.channelIndex,
      modemPreset: handshake.modemPreset,
    };
  }

  async send(frame: Uint8Array, address: RadioAddress): Promise<void> {
    const route = this.route;
    if (!route) throw new NotBound(this.id);
    if (frame.length > MAX_DATA_PAYLOAD) {
      throw new PayloadTooLarge(frame.length, MAX_DATA_PAYLOAD);
    }

    const bytes = encodePacket({
      to: address.kind === 'broadcast' ? BROADCAST_NUM : address.destination,
      channel: route.channelIndex,
      portnum: route.portnum,
      payload: frame,
      hopLimit: this.hopLimit,
    });

    try {
      await this.transport.write(bytes);
    } catch (err) {
      this.markLost(new LinkLost(`Write to ${this.transport.target} failed: ${errorMessage(err)}`, this.id));
      throw new NotBound(this.id, { cause: errorMessage(err) });
    }
  }

  async probe(): Promise<void> {
    if (!this.route) throw new NotBound(this.id);
    await this.transport.write(encodeHeartbeat());
  }

  async disconnect(): Promise<void> {
    if (!this.open) return;
    if (this.route) {
      try {
        await this.transport.write(encodeDisconnect());
      } catch (err) {
        this.observer?.onError(toError(err), { link: this.id, phase: 'disconnect' });
      }
    }
    this.route = null;
    await this.closeTransport();
  }

  isBound(): boolean {
    return this.route !== null;
  }

  onReceive(handler: (frame: InboundFrame) => void): () => void {
    return this.receiveHandlers.add(handler);
  }

  onActivity(handler: () => void): () => void {
    return this.activityHandlers.add(handler);
  }

  onLost(handler: (err: Error) => void): () => void {
    return this.lostHandlers.add(handler);
  }

  // ---------------------------------------------------------------------------
  // Handshake
  // ---------------------------------------------------------------------------

  private runHandshake(signal?: AbortSignal): Promise<Handshake> {
    const nonce = randomNonce();

    return new Promise<Handshake>((resolve, reject) => {
      const finish = (err?: Error) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const current = this.handshake;
        this.handshake = null;
        if (err || !current) {
          reject(err ?? new BindUnavailable('Handshake abandoned', this.id));
        } else {
          resolve(current);
        }
      };

      const onAbort = () => finish(new BindUnavailable('Connect aborted', this.id));
      const timer = setTimeout(
        () => finish(new BindUnavailable(
          `No config from ${this.transport.target} within ${this.handshakeTimeoutMs}ms`,
          this.id,
        )),
        this.handshakeTimeoutMs,
      );

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.handshake = {
        nonce,
        channels: [],
        resolve: () => finish(),
        reject: (err) => finish(err),
      };

      this.transport.write(encodeWantConfig(nonce)).catch((err: unknown) => {
        finish(new BindUnavailable(`Config request failed: ${errorMessage(err)}`, this.id));
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private handleMessage(bytes: Uint8Array): void {
    let message: DeviceMessage;
    try {
      message = decodeFromRadio(bytes);
    } catch (err) {
      this.observer?.onError(toError(err), { link: this.id, phase: 'decode', bytes: bytes.length });
      return;
    }

    this.activityHandlers.emit();

    const handshake = this.handshake;
    if (handshake) {
      collect(handshake, message);
      return;
    }

    switch (message.kind) {
      case 'packet': {
        const route = this.route;
        const { packet } = message;
        if (!route || packet.portnum !== route.portnum || packet.channel !== route.channelIndex) return;
        this.receiveHandlers.emit({ payload: packet.payload, source: packet.from });
        return;
      }
      case 'rebooted':
        if (this.route) {
          this.markLost(new LinkLost(`${this.transport.target} rebooted`, this.id));
          this.closeTransport().catch((err: unknown) => {
            this.observer?.onError(toError(err), { link: this.id, phase: 'close' });
          });
        }
        return;
      default:
        return;
    }
  }

  private handleTransportClose(event: TransportClose): void {
    this.open = false;
    if (this.handshake) {
      this.handshake.reject(new BindUnavailable(`Transport closed during handshake: ${event.error.message}`, this.id));
      return;
    }
    if (!this.route) return;
    this.markLost(new LinkLost(event.error.message, this.id, { target: this.transport.target }, !event.permanent));
  }

  private markLost(err: LinkLost): void {
    if (!this.route) return;
    this.route = null;
    this.lostHandlers.emit(err);
  }

  private async closeTransport(): Promise<void> {
    this.open = false;
    this.route = null;
    await this.transport.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function collect(handshake: Handshake, message: DeviceMessage): void {
  switch (message.kind) {
    case 'my-info':
      handshake.localNode = message.nodeNum;
      return;
    case 'channel':
      handshake.channels.push({ index: message.index, name: message.name, role: message.role });
      return;
    case 'lora-config':
      if (message.usePreset) handshake.modemPreset = message.modemPreset;
      return;
    case 'config-complete':
      if (message.nonce === handshake.nonce) handshake.resolve();
      return;
    default:
      return;
  }
}

export function resolveRoute(binding: ChannelBinding, channels: ChannelEntry[]): Route | null {
  if (binding.kind === 'private-app') {
    return { portnum: PORTNUM_PRIVATE_APP, channelIndex: 0 };
  }
  const match = channels.find((c) => c.role !== CHANNEL_ROLE_DISABLED && c.name === binding.name);
  return match ? { portnum: PORTNUM_RETICULUM_TUNNEL, channelIndex: match.index } : null;
}

function randomNonce(): number {
  // Non-zero: the firmware treats want_config_id 0 as unset.
  return (crypto.getRandomValues(new Uint32Array(1))[0] ?? 0) || 1;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
