/**
 * HdlcInterfaceServer: lets an unmodified Reticulum instance attach to a
 * MeshInterface through a TCPClientInterface pointed at this port.
 *
 * One client at a time; further connections are destroyed on accept.
 * Packets arriving from the mesh while nobody is attached are dropped. A
 * client that stops reading is closed once maxBufferedBytes wait for it.
 */

import { createServer, type Server, type Socket } from 'node:net';
import { ConfigError, isLoopbackHost, type IObserver } from '@meshbridge/core';
import { HdlcDecoder, hdlcFrame } from './hdlc.js';
import type { PacketPort } from './mesh-interface.js';

export interface HdlcInterfaceServerOpts {
  meshInterface: PacketPort;
  /** Default: 127.0.0.1. */
  host?: string;
  /** Default: 4242. Use 0 for an ephemeral port. */
  port?: number;
  allowPublicBind?: boolean;
  /** Default: 1 MiB. */
  maxBufferedBytes?: number;
  observer?: IObserver;
}

export const DEFAULT_INTERFACE_PORT = 4242;
export const DEFAULT_INTERFACE_BUFFER_BYTES = 1024 * 1024;

export class HdlcInterfaceServer {
  private server: Server | null = null;
  private client: Socket | null = null;
  private readonly closeReasons = new WeakMap<Socket, string>();
  private unsubscribe: (() => void) | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly maxBufferedBytes: number;
  private readonly meshInterface: PacketPort;
  private readonly observer?: IObserver;

  constructor(opts: HdlcInterfaceServerOpts) {
    this.meshInterface = opts.meshInterface;
    this.host = opts.host ?? '127.0.0.1';
    this.port = opts.port ?? DEFAULT_INTERFACE_PORT;
    this.maxBufferedBytes = opts.maxBufferedBytes ?? DEFAULT_INTERFACE_BUFFER_BYTES;
    this.observer = opts.observer;

    if (!isLoopbackHost(this.host) && !opts.allowPublicBind) {
      throw new ConfigError(
        `Refusing to listen on non-loopback address ${this.host} without allowPublicBind`,
        { host: this.host },
      );
    }
  }

  async start(): Promise<void> {
    if (this.server) return;

    this.unsubscribe = this.meshInterface.onReceive((packet) => this.handleMeshPacket(packet));
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
      this.unsubscribe();
      this.unsubscribe = null;
      throw err;
    }

    server.on('error', (err: Error) => {
      this.observer?.onError(err, { phase: 'listen', host: this.host, port: this.port });
    });
    this.observer?.onLog('info', `Interface listening on ${this.host}:${this.getAddress()?.port ?? this.port}`);
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.client?.destroy();
    this.client = null;

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

  getAddress(): { host: string; port: number } | null {
    if (!this.server) return null;
    const addr = this.server.address();
    if (typeof addr === 'string' || addr === null) return null;
    return { host: addr.address, port: addr.port };
  }

  get hasClient(): boolean {
    return this.client !== null;
  }

  // ---------------------------------------------------------------------------
  // Connections
  // ---------------------------------------------------------------------------

  private handleConnection(socket: Socket): void {
    const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    if (this.client) {
      this.observer?.onClient({ type: 'rejected', remote, reason: 'another client is attached', timestamp: new Date() });
      socket.destroy();
      return;
    }

    this.client = socket;
    const decoder = new HdlcDecoder();
    this.observer?.onClient({ type: 'connected', remote, timestamp: new Date() });

    socket.setNoDelay(true);
    socket.on('data', (chunk: Buffer) => {
      for (const packet of decoder.feed(chunk)) {
        this.meshInterface.send(packet);
      }
    });
    socket.on('error', (err: Error) => {
      this.observer?.onError(err, { phase: 'client', remote });
    });
    socket.on('close', () => {
      const reason = this.closeReasons.get(socket);
      this.closeReasons.delete(socket);
      if (this.client === socket) this.client = null;
      decoder.reset();
      this.observer?.onClient({
        type: 'disconnected',
        remote,
        ...(reason === undefined ? {} : { reason }),
        timestamp: new Date(),
      });
    });
  }

  private handleMeshPacket(packet: Uint8Array): void {
    const client = this.client;
    if (!client || client.destroyed) {
      this.dropPacket(packet, 'no interface client attached');
      return;
    }

    const frame = hdlcFrame(packet);
    if (client.writableLength + frame.length > this.maxBufferedBytes) {
      this.observer?.onLog('warn', 'Interface client is not reading; closing it', {
        buffered: client.writableLength,
      });
      this.closeReasons.set(client, 'client not reading');
      this.client = null;
      client.destroy();
      this.dropPacket(packet, 'interface client not reading');
      return;
    }
    client.write(frame);
  }

  private dropPacket(packet: Uint8Array, reason: string): void {
    this.observer?.onFrame({
      direction: 'dropped',
      bytes: packet.length,
      reason,
      timestamp: new Date(),
    });
  }
}
