/**
 * BridgeSocketLink: IRadioLink over a running bridge's local socket.
 *
 * This is the adapter's way of reaching the radio when a bridge process
 * owns the device. Frames travel with the FrameCodec length prefix. When
 * a secret is configured the bridge opens with a nonce frame and this
 * link answers it before anything else is sent.
 *
 * The address argument of send() is ignored: the bridge applies its own
 * AddressPolicy. The bridge does not report senders, so inbound frames
 * carry source 0.
 */

import { connect as netConnect, type Socket } from 'node:net';
import {
  BindUnavailable,
  LinkLost,
  NotBound,
  UNKNOWN_NODE,
  type ByteOrder,
  type ChannelBinding,
  type IObserver,
  type IRadioLink,
  type InboundFrame,
  type LinkInfo,
  type RadioAddress,
} from '@meshbridge/core';
import {
  DEFAULT_BRIDGE_HOST,
  DEFAULT_BRIDGE_PORT,
  FrameDecoder,
  encodeFrame,
  signChallenge,
} from '@meshbridge/framing';
import { HandlerSet } from './handlers.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BridgeSocketLinkOpts {
  host?: string;
  port?: number;
  /** Shared secret for the bridge challenge. Omit when the bridge has auth disabled. */
  secret?: string;
  byteOrder?: ByteOrder;
  /** Wait this long for the connection and, with a secret, the nonce. Default: 10000. */
  connectTimeoutMs?: number;
  observer?: IObserver;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// BridgeSocketLink
// ---------------------------------------------------------------------------

export class BridgeSocketLink implements IRadioLink {
  readonly id = 'bridge-socket';
  readonly name: string;

  private readonly host: string;
  private readonly port: number;
  private readonly secret?: string;
  private readonly byteOrder: ByteOrder;
  private readonly connectTimeoutMs: number;
  private readonly observer?: IObserver;

  private socket: Socket | null = null;
  private decoder: FrameDecoder;
  private bound = false;
  /** Set while waiting for the bridge's nonce frame. */
  private challengeWaiter: ((nonce: Uint8Array) => void) | null = null;

  private readonly receiveHandlers = new HandlerSet<InboundFrame>();
  private readonly activityHandlers = new HandlerSet<void>();
  private readonly lostHandlers = new HandlerSet<Error>();

  constructor(opts: BridgeSocketLinkOpts = {}) {
    this.host = opts.host ?? DEFAULT_BRIDGE_HOST;
    this.port = opts.port ?? DEFAULT_BRIDGE_PORT;
    this.secret = opts.secret;
    this.byteOrder = opts.byteOrder ?? 'be';
    this.connectTimeoutMs = opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.observer = opts.observer;
    this.decoder = new FrameDecoder({ byteOrder: this.byteOrder });
    this.name = `Bridge (${this.host}:${this.port})`;
  }

  // ---------------------------------------------------------------------------
  // IRadioLink
  // ---------------------------------------------------------------------------

  async connect(_binding: ChannelBinding, signal?: AbortSignal): Promise<LinkInfo> {
    await this.disconnect();
    this.decoder = new FrameDecoder({ byteOrder: this.byteOrder });

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const socket = netConnect({ host: this.host, port: this.port });
      this.socket = socket;

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.challengeWaiter = null;
        if (err) {
          socket.destroy();
          this.socket = null;
          reject(err);
        } else {
          this.bound = true;
          resolve();
        }
      };

      const onAbort = () => finish(new BindUnavailable('Connect aborted', this.id));
      const timer = setTimeout(
        () => finish(new BindUnavailable(`Bridge at ${this.host}:${this.port} did not answer in time`, this.id)),
        this.connectTimeoutMs,
      );
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      socket.on('connect', () => {
        const secret = this.secret;
        if (secret === undefined) {
          finish();
          return;
        }
        this.challengeWaiter = (nonce) => {
          socket.write(encodeFrame(signChallenge(secret, nonce), { byteOrder: this.byteOrder }));
          finish();
        };
      });
      socket.on('data', (data: Buffer) => this.handleData(data));
      socket.on('error', (err: Error) => {
        if (!settled) {
          finish(new BindUnavailable(`Cannot reach bridge at ${this.host}:${this.port}: ${err.message}`, this.id));
        } else {
          this.observer?.onError(err, { link: this.id });
        }
      });
      socket.on('close', () => {
        if (!settled) {
          finish(new BindUnavailable(`Bridge at ${this.host}:${this.port} closed the connection`, this.id));
          return;
        }
        this.handleClose(socket);
      });
    });

    return {};
  }

  async send(frame: Uint8Array, _address: RadioAddress): Promise<void> {
    const socket = this.socket;
    if (!this.bound || !socket || socket.destroyed) throw new NotBound(this.id);

    const bytes = encodeFrame(frame, { byteOrder: this.byteOrder });
    await new Promise<void>((resolve, reject) => {
      socket.write(bytes, (err) => (err ? reject(new NotBound(this.id, { cause: err.message })) : resolve()));
    });
  }

  async disconnect(): Promise<void> {
    this.bound = false;
    this.challengeWaiter = null;
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      socket.destroy();
    }
    this.decoder.reset();
  }

  isBound(): boolean {
    return this.bound;
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
  // Internal
  // ---------------------------------------------------------------------------

  private handleData(data: Buffer): void {
    let payloads: Uint8Array[];
    try {
      payloads = [...this.decoder.feed(data)];
    } catch (err) {
      this.observer?.onError(err instanceof Error ? err : new Error(String(err)), { link: this.id, phase: 'decode' });
      this.socket?.destroy();
      return;
    }

    for (const payload of payloads) {
      this.activityHandlers.emit();
      const waiter = this.challengeWaiter;
      if (waiter) {
        this.challengeWaiter = null;
        waiter(payload);
        continue;
      }
      if (this.bound) {
        this.receiveHandlers.emit({ payload, source: UNKNOWN_NODE });
      }
    }
  }

  private handleClose(socket: Socket): void {
    // A close from a socket we already replaced or released is not news.
    if (this.socket !== socket) return;
    this.socket = null;
    const wasBound = this.bound;
    this.bound = false;
    if (wasBound) {
      this.lostHandlers.emit(new LinkLost(`Bridge at ${this.host}:${this.port} closed the connection`, this.id));
    }
  }
}
