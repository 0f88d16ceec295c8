/**
 * BridgeServer: the local framed socket in front of the radio.
 *
 * Listens on a loopback address (a public address needs allowPublicBind)
 * and serves exactly one BridgeSession at a time. A second connection
 * while a session is active is destroyed on accept, leaving the first
 * untouched. Client churn never touches the radio side: the supervisor
 * keeps its link and queue whether or not a client is attached.
 */

import { createServer, type Server, type Socket } from 'node:net';
import {
  ConfigError,
  isLoopbackHost,
  type AuthConfig,
  type IObserver,
  type IRadioPort,
  type InboundFrame,
} from '@meshbridge/core';
import {
  DEFAULT_BRIDGE_HOST,
  DEFAULT_BRIDGE_PORT,
  type AddressPolicy,
  type FrameCodecOptions,
} from '@meshbridge/framing';
import { BridgeSession } from './bridge-session.js';

export interface BridgeServerOpts {
  radio: IRadioPort;
  addressPolicy: AddressPolicy;
  /** Default: 127.0.0.1. */
  host?: string;
  /** Default: 45832. Use 0 for an ephemeral port. */
  port?: number;
  /** Required to listen on anything but loopback. */
  allowPublicBind?: boolean;
  codec?: FrameCodecOptions;
  auth?: AuthConfig;
  authTimeoutMs?: number;
  /** Largest payload a client may send to the radio. */
  mtu?: number;
  /** Unsent bytes allowed to pile up for the client before it is closed. */
  maxBufferedBytes?: number;
  observer?: IObserver;
}

export interface BridgeClientInfo {
  remote: string;
  state: string;
  connectedAt: string;
  framesIn: number;
  framesOut: number;
}

export class BridgeServer {
  private server: Server | null = null;
  private session: BridgeSession | null = null;
  private unsubscribeRadio: (() => void) | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly opts: BridgeServerOpts;

  constructor(opts: BridgeServerOpts) {
    this.opts = opts;
    this.host = opts.host ?? DEFAULT_BRIDGE_HOST;
    this.port = opts.port ?? DEFAULT_BRIDGE_PORT;

    if (!isLoopbackHost(this.host) && !opts.allowPublicBind) {
      throw new ConfigError(
        `Refusing to listen on non-loopback address ${this.host} without allowPublicBind`,
        { host: this.host },
      );
    }
  }

  /** Start listening. Resolves once the port is bound. */
  async start(): Promise<void> {
    if (this.server) return;

    this.unsubscribeRadio = this.opts.radio.onReceive((frame) => this.handleRadioFrame(frame));

    const server = createServer((socket) => this.handleConnection(socket));
    this.server = server;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.port, this.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (err) {
      this.server = null;
      this.unsubscribeRadio?.();
      this.unsubscribeRadio = null;
      throw err;
    }

    server.on('error', (err: Error) => {
      this.opts.observer?.onError(err, { phase: 'listen', host: this.host, port: this.port });
    });
    this.opts.observer?.onLog('info', `Bridge listening on ${this.host}:${this.getAddress()?.port ?? this.port}`);
  }

  /** Close the client, then stop accepting connections. */
  async stop(): Promise<void> {
    this.unsubscribeRadio?.();
    this.unsubscribeRadio = null;
    this.session?.close('bridge stopped');
    this.session = null;

    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Get the bound address (useful in tests with port 0). */
  getAddress(): { host: string; port: number } | null {
    if (!this.server) return null;
    const addr = this.server.address();
    if (typeof addr === 'string' || addr === null) return null;
    return { host: addr.address, port: addr.port };
  }

  /** The attached client, if any. */
  getClient(): BridgeClientInfo | null {
    const session = this.session;
    if (!session) return null;
    return {
      remote: session.remote,
      state: session.getState(),
      connectedAt: session.connectedAt.toISOString(),
      ...session.stats(),
    };
  }

  // ---------------------------------------------------------------------------
  // Connections
  // ---------------------------------------------------------------------------

  private handleConnection(socket: Socket): void {
    if (this.session) {
      const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
      this.opts.observer?.onClient({
        type: 'rejected',
        remote,
        reason: 'another client is attached',
        timestamp: new Date(),
      });
      socket.destroy();
      return;
    }

    this.session = new BridgeSession({
      socket,
      radio: this.opts.radio,
      addressPolicy: this.opts.addressPolicy,
      codec: this.opts.codec,
      auth: this.opts.auth,
      authTimeoutMs: this.opts.authTimeoutMs,
      mtu: this.opts.mtu,
      maxBufferedBytes: this.opts.maxBufferedBytes,
      observer: this.opts.observer,
      onClosed: (session) => {
        if (this.session === session) this.session = null;
      },
    });
  }

  private handleRadioFrame(frame: InboundFrame): void {
    if (this.session?.deliver(frame.payload)) return;
    this.opts.observer?.onFrame({
      direction: 'dropped',
      bytes: frame.payload.length,
      source: frame.source,
      reason: 'no client attached',
      timestamp: new Date(),
    });
  }
}
