/**
 * HdlcInterfaceServer tests over real loopback TCP, with an in-process
 * packet port standing in for the MeshInterface.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { connect as netConnect, type Socket } from 'node:net';
import { ConfigError, type IObserver } from '@meshbridge/core';
import { hdlcFrame } from './hdlc.js';
import { HdlcInterfaceServer } from './hdlc-interface-server.js';
import type { PacketPort } from './mesh-interface.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class FakeMesh implements PacketPort {
  sent: number[][] = [];
  private handlers = new Set<(packet: Uint8Array) => void>();

  send(packet: Uint8Array): boolean {
    this.sent.push([...packet]);
    return true;
  }

  onReceive(handler: (packet: Uint8Array) => void): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  emit(packet: Uint8Array): void {
    for (const h of this.handlers) h(packet);
  }

  get listenerCount(): number {
    return this.handlers.size;
  }
}

function createObserver() {
  return {
    onLinkState: vi.fn(),
    onFrame: vi.fn(),
    onClient: vi.fn(),
    onSecurityEvent: vi.fn(),
    onError: vi.fn(),
    onLog: vi.fn(),
  } satisfies IObserver;
}

interface TestClient {
  socket: Socket;
  received: () => number[];
  closed: Promise<void>;
}

async function connectClient(port: number): Promise<TestClient> {
  const socket = netConnect(port, '127.0.0.1');
  const chunks: Buffer[] = [];
  socket.on('data', (chunk: Buffer) => chunks.push(chunk));
  socket.on('error', () => {});
  const closed = new Promise<void>((resolve) => socket.on('close', () => resolve()));
  await new Promise<void>((resolve, reject) => {
    socket.once('connect', () => resolve());
    socket.once('error', reject);
  });
  return { socket, received: () => [...Buffer.concat(chunks)], closed };
}

/** A client that connects and never reads, so writes to it pile up. */
async function connectSilent(port: number): Promise<TestClient> {
  const socket = netConnect(port, '127.0.0.1');
  socket.on('error', () => {});
  const closed = new Promise<void>((resolve) => socket.on('close', () => resolve()));
  await new Promise<void>((resolve, reject) => {
    socket.once('connect', () => resolve());
    socket.once('error', reject);
  });
  socket.pause();
  return { socket, received: () => [], closed };
}

const WAIT = { timeout: 2000, interval: 5 };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('HdlcInterfaceServer', () => {
  let server: HdlcInterfaceServer | null = null;
  const clients: TestClient[] = [];
  let mesh: FakeMesh;
  let observer: ReturnType<typeof createObserver>;

  async function startServer(maxBufferedBytes?: number): Promise<number> {
    mesh = new FakeMesh();
    observer = createObserver();
    server = new HdlcInterfaceServer({ meshInterface: mesh, port: 0, maxBufferedBytes, observer });
    await server.start();
    return server.getAddress()?.port ?? 0;
  }

  async function attach(port: number): Promise<TestClient> {
    const client = await connectClient(port);
    clients.push(client);
    return client;
  }

  afterEach(async () => {
    for (const c of clients) c.socket.destroy();
    clients.length = 0;
    await server?.stop();
    server = null;
  });

  it('hands de-framed packets to the mesh interface', async () => {
    const port = await startServer();
    const client = await attach(port);

    client.socket.write(Buffer.from([...hdlcFrame(Uint8Array.of(1, 0x7e, 2)), ...hdlcFrame(Uint8Array.of(3))]));

    await vi.waitFor(() => expect(mesh.sent).toHaveLength(2), WAIT);
    expect(mesh.sent).toEqual([[1, 0x7e, 2], [3]]);
  });

  it('frames packets from the mesh for the attached client', async () => {
    const port = await startServer();
    const client = await attach(port);
    await vi.waitFor(() => expect(server?.hasClient).toBe(true), WAIT);

    mesh.emit(Uint8Array.of(0x7d, 5));

    await vi.waitFor(() => expect(client.received()).toEqual([0x7e, 0x7d, 0x5d, 5, 0x7e]), WAIT);
  });

  it('drops mesh packets while no client is attached', async () => {
    await startServer();

    mesh.emit(Uint8Array.of(1, 2, 3));

    expect(observer.onFrame).toHaveBeenCalledWith(expect.objectContaining({
      direction: 'dropped',
      bytes: 3,
      reason: 'no interface client attached',
    }));
  });

  it('refuses a second client while one is attached', async () => {
    const port = await startServer();
    const first = await attach(port);
    await vi.waitFor(() => expect(server?.hasClient).toBe(true), WAIT);

    const second = await attach(port);
    await second.closed;

    expect(observer.onClient).toHaveBeenCalledWith(expect.objectContaining({
      type: 'rejected',
      reason: 'another client is attached',
    }));

    first.socket.write(Buffer.from(hdlcFrame(Uint8Array.of(9))));
    await vi.waitFor(() => expect(mesh.sent).toEqual([[9]]), WAIT);
  });

  it('accepts a new client after the first disconnects', async () => {
    const port = await startServer();
    const first = await attach(port);
    await vi.waitFor(() => expect(server?.hasClient).toBe(true), WAIT);

    first.socket.destroy();
    await vi.waitFor(() => expect(server?.hasClient).toBe(false), WAIT);

    const second = await attach(port);
    await vi.waitFor(() => expect(server?.hasClient).toBe(true), WAIT);
    mesh.emit(Uint8Array.of(4));
    await vi.waitFor(() => expect(second.received()).toEqual([0x7e, 4, 0x7e]), WAIT);
  });

  it('closes a client that stops reading and drops the packet that overflowed', async () => {
    const port = await startServer(64 * 1024);
    const client = await connectSilent(port);
    clients.push(client);
    await vi.waitFor(() => expect(server?.hasClient).toBe(true), WAIT);

    const packet = new Uint8Array(60_000).fill(1);
    for (let i = 0; i < 1000 && server?.hasClient; i++) mesh.emit(packet);

    expect(server?.hasClient).toBe(false);
    expect(observer.onLog).toHaveBeenCalledWith('warn', 'Interface client is not reading; closing it', expect.anything());
    expect(observer.onFrame).toHaveBeenCalledWith(expect.objectContaining({
      direction: 'dropped',
      bytes: 60_000,
      reason: 'interface client not reading',
    }));
    await client.closed;
    await vi.waitFor(() => expect(observer.onClient).toHaveBeenCalledWith(expect.objectContaining({
      type: 'disconnected',
      reason: 'client not reading',
    })), WAIT);
  });

  it('unsubscribes from the mesh on stop', async () => {
    await startServer();
    expect(mesh.listenerCount).toBe(1);

    await server?.stop();
    server = null;

    expect(mesh.listenerCount).toBe(0);
  });

  it('refuses a non-loopback bind address unless allowed', () => {
    const meshInterface = new FakeMesh();
    expect(() => new HdlcInterfaceServer({ meshInterface, host: '0.0.0.0' })).toThrow(ConfigError);
    expect(() => new HdlcInterfaceServer({ meshInterface, host: '0.0.0.0', allowPublicBind: true })).not.toThrow();
  });
});
