/**
 * TcpStreamTransport tests against an in-process TCP server on an
 * ephemeral loopback port.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createServer, type Server, type Socket } from 'node:net';
import type { AddressInfo } from 'node:net';
import { TcpStreamTransport } from './tcp-stream-transport.js';
import { encodeStreamFrame } from './stream-codec.js';

interface FakeNode {
  server: Server;
  port: number;
  received: Buffer[];
  connection: () => Promise<Socket>;
}

async function startFakeNode(): Promise<FakeNode> {
  const received: Buffer[] = [];
  let resolveSocket: (socket: Socket) => void = () => {};
  const socketReady = new Promise<Socket>((resolve) => {
    resolveSocket = resolve;
  });

  const server = createServer((socket) => {
    socket.on('data', (chunk: Buffer) => received.push(chunk));
    resolveSocket(socket);
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const { port } = server.address() as AddressInfo;
  return { server, port, received, connection: () => socketReady };
}

function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  return vi.waitFor(() => {
    if (!predicate()) throw new Error('not yet');
  }, { timeout: timeoutMs, interval: 5 });
}

describe('TcpStreamTransport', () => {
  let node: FakeNode | null = null;
  let transport: TcpStreamTransport | null = null;

  afterEach(async () => {
    await transport?.close();
    transport = null;
    if (node) {
      const server = node.server;
      await new Promise<void>((resolve) => server.close(() => resolve()));
      node = null;
    }
  });

  it('sends the wake sequence on open', async () => {
    node = await startFakeNode();
    transport = new TcpStreamTransport({ host: '127.0.0.1', port: node.port });
    await transport.open();

    const fake = node;
    await waitFor(() => Buffer.concat(fake.received).length >= 32);
    expect([...Buffer.concat(fake.received).subarray(0, 32)].every((b) => b === 0xc3)).toBe(true);
  });

  it('frames writes with the stream header', async () => {
    node = await startFakeNode();
    transport = new TcpStreamTransport({ host: '127.0.0.1', port: node.port });
    await transport.open();
    await transport.write(Uint8Array.of(0x18, 0x01));

    const fake = node;
    await waitFor(() => Buffer.concat(fake.received).length >= 38);
    expect([...Buffer.concat(fake.received).subarray(32)]).toEqual([0x94, 0xc3, 0x00, 0x02, 0x18, 0x01]);
  });

  it('delivers frames and skips console noise', async () => {
    node = await startFakeNode();
    transport = new TcpStreamTransport({ host: '127.0.0.1', port: node.port });
    const messages: number[][] = [];
    transport.onMessage((bytes) => messages.push([...bytes]));
    await transport.open();

    const socket = await node.connection();
    socket.write(Buffer.concat([Buffer.from('DEBUG | radio ready\n'), encodeStreamFrame(Uint8Array.of(1, 2, 3))]));

    await waitFor(() => messages.length === 1);
    expect(messages).toEqual([[1, 2, 3]]);
  });

  it('reports a remote close as a transient failure', async () => {
    node = await startFakeNode();
    transport = new TcpStreamTransport({ host: '127.0.0.1', port: node.port });
    const onClose = vi.fn();
    transport.onClose(onClose);
    await transport.open();

    (await node.connection()).destroy();

    await waitFor(() => onClose.mock.calls.length === 1);
    expect(onClose.mock.calls[0]?.[0].permanent).toBe(false);
  });

  it('does not report its own close()', async () => {
    node = await startFakeNode();
    transport = new TcpStreamTransport({ host: '127.0.0.1', port: node.port });
    const onClose = vi.fn();
    transport.onClose(onClose);
    await transport.open();
    await transport.close();

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(onClose).not.toHaveBeenCalled();
  });

  it('rejects open when nothing listens', async () => {
    const probe = await startFakeNode();
    const port = probe.port;
    await new Promise<void>((resolve) => probe.server.close(() => resolve()));

    transport = new TcpStreamTransport({ host: '127.0.0.1', port });
    await expect(transport.open()).rejects.toThrow(`Connect to tcp://127.0.0.1:${port} failed`);
  });

  it('rejects write when not connected', async () => {
    transport = new TcpStreamTransport({ host: '127.0.0.1', port: 1 });
    await expect(transport.write(Uint8Array.of(1))).rejects.toThrow('Not connected to tcp://127.0.0.1:1');
  });
});
