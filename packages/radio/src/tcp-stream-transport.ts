/**
 * TcpStreamTransport: Meshtastic stream API over TCP.
 *
 * The firmware (and meshtasticd) listen on port 4403 and speak the same
 * 0x94C3 framing as the serial console. Zero external dependencies.
 */

import { connect as netConnect, type Socket } from 'node:net';
import type { DeviceTransport, TransportClose } from './transport.js';
import { StreamFrameDecoder, WAKE_SEQUENCE, encodeStreamFrame } from './stream-codec.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TcpStreamTransportOpts {
  host: string;
  /** Default: 4403. */
  port?: number;
  /** Connect timeout in ms. Default: 10000. */
  connectTimeoutMs?: number;
}

export const DEFAULT_STREAM_PORT = 4403;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// TcpStreamTransport
// ---------------------------------------------------------------------------

export class TcpStreamTransport implements DeviceTransport {
  readonly kind = 'tcp';
  readonly target: string;

  private readonly host: string;
  private readonly port: number;
  private readonly connectTimeoutMs: number;
  private socket: Socket | null = null;
  private readonly decoder = new StreamFrameDecoder();
  private messageHandler: ((fromRadio: Uint8Array) => void) | null = null;
  private closeHandler: ((event: TransportClose) => void) | null = null;
  private closing = false;

  constructor(opts: TcpStreamTransportOpts) {
    this.host = opts.host;
    this.port = opts.port ?? DEFAULT_STREAM_PORT;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.target = `tcp://${this.host}:${this.port}`;
  }

  onMessage(handler: (fromRadio: Uint8Array) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: (event: TransportClose) => void): void {
    this.closeHandler = handler;
  }

  async open(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new Error('Connect aborted');

    this.closing = false;
    this.decoder.reset();

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const socket = netConnect({ host: this.host, port: this.port });
      this.socket = socket;

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (err) {
          socket.destroy();
          this.socket = null;
          reject(err);
        } else {
          resolve();
        }
      };

      const onAbort = () => finish(new Error('Connect aborted'));
      const timer = setTimeout(
        () => finish(new Error(`Connect to ${this.target} timed out after ${this.connectTimeoutMs}ms`)),
        this.connectTimeoutMs,
      );
      signal?.addEventListener('abort', onAbort, { once: true });

      socket.on('connect', () => {
        socket.write(WAKE_SEQUENCE);
        finish();
      });
      socket.on('data', (data: Buffer) => this.handleData(data));
      socket.on('error', (err: Error) => {
        if (!settled) {
          finish(new Error(`Connect to ${this.target} failed: ${err.message}`));
        } else {
          this.handleClose(err);
        }
      });
      socket.on('close', () => {
        if (settled) this.handleClose(new Error(`Connection to ${this.target} closed`));
      });
    });
  }

  async write(toRadio: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      throw new Error(`Not connected to ${this.target}`);
    }
    const frame = encodeStreamFrame(toRadio);
    await new Promise<void>((resolve, reject) => {
      socket.write(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this.decoder.reset();
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private handleData(data: Buffer): void {
    for (const frame of this.decoder.feed(data)) {
      this.messageHandler?.(frame);
    }
  }

  private handleClose(error: Error): void {
    if (this.closing || !this.socket) return;
    this.socket.destroy();
    this.socket = null;
    this.closeHandler?.({ error, permanent: false });
  }
}
