/**
 * BridgeServer / BridgeSession tests.
 *
 * Real TCP on an ephemeral loopback port; the radio side is an in-process
 * fake port that records submissions and can inject inbound frames.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { connect as netConnect, type Socket } from 'node:net';
import {
  ConfigError,
  MalformedFrame,
  type ConnectionState,
  type IObserver,
  type IRadioPort,
  type InboundFrame,
  type RadioAddress,
} from '@meshbridge/core';
import { AddressPolicy, encodeFrame, signChallenge } from '@meshbridge/framing';
import { BridgeServer, type BridgeServerOpts } from './bridge-server.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class FakeRadio implements IRadioPort {
  submitted: Array<{ text: string; address: RadioAddress }> = [];
  private handlers = new Set<(frame: InboundFrame) => void>();

  submit(payload: Uint8Array, address: RadioAddress): void {
    this.submitted.push({ text: Buffer.from(payload).toString(), address });
  }

  onReceive(handler: (frame: InboundFrame) => void): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  getState(): ConnectionState {
    return 'bound';
  }

  emit(text: string, source: number): void {
    for (const h of this.handlers) h({ payload: Buffer.from(text), source });
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
  received: () => Buffer;
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
  return { socket, received: () => Buffer.concat(chunks), closed };
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
  return { socket, received: () => Buffer.alloc(0), closed };
}

const frame = (text: string) => encodeFrame(Buffer.from(text));
const WAIT = { timeout: 2000, interval: 5 };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('BridgeServer', () => {
  let server: BridgeServer | null = null;
  const clients: TestClient[] = [];
  let radio: FakeRadio;
  let policy: AddressPolicy;
  let observer: ReturnType<typeof createObserver>;

  async function startServer(opts: Partial<BridgeServerOpts> = {}): Promise<number> {
    radio = new FakeRadio();
    policy = new AddressPolicy();
    observer = createObserver();
    server = new BridgeServer({ radio, addressPolicy: policy, port: 0, observer, ...opts });
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

  describe('end-to-end', () => {
    it('submits HELLO to the radio and frames WORLD back to the client', async () => {
      const port = await startServer();
      const client = await attach(port);

      client.socket.write(Buffer.from([0x00, 0x05, 0x48, 0x45, 0x4c, 0x4c, 0x4f]));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(1), WAIT);
      expect(radio.submitted[0]).toEqual({ text: 'HELLO', address: { kind: 'broadcast' } });

      radio.emit('WORLD', 7);

      await vi.waitFor(() => expect(client.received().length).toBe(7), WAIT);
      expect([...client.received()]).toEqual([0x00, 0x05, 0x57, 0x4f, 0x52, 0x4c, 0x44]);
    });

    it('decodes frames split across writes and batched in one write', async () => {
      const port = await startServer();
      const client = await attach(port);

      const bytes = Buffer.concat([frame('one'), frame('two'), frame('three')]);
      client.socket.write(bytes.subarray(0, 4));
      await new Promise((resolve) => setTimeout(resolve, 10));
      client.socket.write(bytes.subarray(4));

      await vi.waitFor(() => expect(radio.submitted).toHaveLength(3), WAIT);
      expect(radio.submitted.map((s) => s.text)).toEqual(['one', 'two', 'three']);
    });

    it('applies the address current at submit time', async () => {
      const port = await startServer();
      const client = await attach(port);

      client.socket.write(frame('before'));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(1), WAIT);
      policy.setUnicast(42);
      client.socket.write(frame('after'));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(2), WAIT);

      expect(radio.submitted).toEqual([
        { text: 'before', address: { kind: 'broadcast' } },
        { text: 'after', address: { kind: 'unicast', destination: 42 } },
      ]);
    });

    it('drops radio frames while no client is attached', async () => {
      await startServer();

      radio.emit('lost', 9);

      expect(observer.onFrame).toHaveBeenCalledWith(expect.objectContaining({
        direction: 'dropped',
        bytes: 4,
        source: 9,
        reason: 'no client attached',
      }));
    });
  });

  describe('single client', () => {
    it('refuses a second client without disturbing the first', async () => {
      const port = await startServer();
      const first = await attach(port);
      first.socket.write(frame('first'));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(1), WAIT);

      const second = await attach(port);
      await second.closed;

      first.socket.write(frame('still here'));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(2), WAIT);
      radio.emit('reply', 1);
      await vi.waitFor(() => expect(first.received().subarray(2).toString()).toBe('reply'), WAIT);

      expect(observer.onClient).toHaveBeenCalledWith(expect.objectContaining({
        type: 'rejected',
        reason: 'another client is attached',
      }));
      expect(server?.getClient()?.framesIn).toBe(2);
    });

    it('accepts a new client once the previous one leaves', async () => {
      const port = await startServer();
      const first = await attach(port);
      first.socket.write(frame('a'));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(1), WAIT);

      first.socket.end();
      await first.closed;
      await vi.waitFor(() => expect(server?.getClient()).toBeNull(), WAIT);

      const next = await attach(port);
      next.socket.write(frame('b'));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(2), WAIT);
    });

    it('closes only the offending client on a malformed frame', async () => {
      const port = await startServer({ codec: { maxPayloadBytes: 100 } });
      const bad = await attach(port);

      bad.socket.write(Buffer.from([0x01, 0x00, 0xff]));
      await bad.closed;

      expect(observer.onError).toHaveBeenCalledWith(
        expect.any(MalformedFrame),
        expect.objectContaining({ phase: 'decode' }),
      );
      await vi.waitFor(() => expect(server?.getClient()).toBeNull(), WAIT);

      const good = await attach(port);
      good.socket.write(frame('ok'));
      await vi.waitFor(() => expect(radio.submitted.map((s) => s.text)).toEqual(['ok']), WAIT);
    });

    it('closes the client when stopped', async () => {
      const port = await startServer();
      const client = await attach(port);
      client.socket.write(frame('x'));
      await vi.waitFor(() => expect(radio.submitted).toHaveLength(1), WAIT);

      await server?.stop();
      await client.closed;

      expect(server?.getAddress()).toBeNull();
    });
  });

  describe('limits', () => {
    it('drops a frame longer than the radio MTU and keeps the client', async () => {
      const port = await startServer({ mtu: 4 });
      const client = await attach(port);

      client.socket.write(Buffer.concat([frame('toolong'), frame('ok')]));

      await vi.waitFor(() => expect(radio.submitted.map((s) => s.text)).toEqual(['ok']), WAIT);
      expect(observer.onFrame).toHaveBeenCalledWith(expect.objectContaining({
        direction: 'dropped',
        bytes: 7,
        reason: 'payload exceeds MTU (7 > 4)',
      }));
      expect(server?.getClient()?.framesIn).toBe(1);
    });

    it('closes a client that stops reading', async () => {
      const port = await startServer({ maxBufferedBytes: 64 * 1024 });
      const client = await connectSilent(port);
      clients.push(client);
      await vi.waitFor(() => expect(server?.getClient()).not.toBeNull(), WAIT);

      const payload = 'x'.repeat(60_000);
      for (let i = 0; i < 1000 && server?.getClient(); i++) radio.emit(payload, 1);

      expect(server?.getClient()).toBeNull();
      expect(observer.onLog).toHaveBeenCalledWith('warn', 'Bridge client is not reading; closing it', expect.anything());
      expect(observer.onClient).toHaveBeenCalledWith(expect.objectContaining({
        type: 'disconnected',
        reason: 'client not reading',
      }));
      expect(observer.onFrame).toHaveBeenCalledWith(expect.objectContaining({
        direction: 'dropped',
        bytes: 60_000,
        reason: 'no client attached',
      }));
      await client.closed;
    });
  });

  describe('challenge auth', () => {
    const auth = { mode: 'token', secret: 'test-secret' } as const;

    async function readNonce(client: TestClient): Promise<Buffer> {
      await vi.waitFor(() => expect(client.received().length).toBeGreaterThanOrEqual(34), WAIT);
      expect([...client.received().subarray(0, 2)]).toEqual([0x00, 0x20]);
      return client.received().subarray(2, 34);
    }

    it('accepts the HMAC of the nonce and then carries traffic', async () => {
      const port = await startServer({ auth });
      const client = await attach(port);
      const nonce = await readNonce(client);

      client.socket.write(Buffer.concat([encodeFrame(signChallenge('test-secret', nonce)), frame('HELLO')]));

      await vi.waitFor(() => expect(radio.submitted.map((s) => s.text)).toEqual(['HELLO']), WAIT);
      radio.emit('WORLD', 7);
      await vi.waitFor(() => expect(client.received().subarray(34).toString()).toBe('\x00\x05WORLD'), WAIT);
      expect(observer.onClient).toHaveBeenCalledWith(expect.objectContaining({ type: 'authenticated' }));
    });

    it('closes the socket on a wrong response', async () => {
      const port = await startServer({ auth });
      const client = await attach(port);
      const nonce = await readNonce(client);

      client.socket.write(Buffer.concat([encodeFrame(signChallenge('wrong-secret', nonce)), frame('HELLO')]));
      await client.closed;

      expect(radio.submitted).toEqual([]);
      expect(observer.onSecurityEvent).toHaveBeenCalledWith(expect.objectContaining({ type: 'auth_failed' }));
    });

    it('closes the socket when no response arrives in time', async () => {
      const port = await startServer({ auth, authTimeoutMs: 50 });
      const client = await attach(port);

      await client.closed;

      expect(observer.onSecurityEvent).toHaveBeenCalledWith(expect.objectContaining({ type: 'auth_timeout' }));
      expect(observer.onClient).toHaveBeenCalledWith(expect.objectContaining({
        type: 'rejected',
        reason: 'authentication timed out',
      }));
    });

    it('does not deliver radio frames before authentication', async () => {
      const port = await startServer({ auth });
      const client = await attach(port);
      await readNonce(client);

      radio.emit('early', 3);

      expect(observer.onFrame).toHaveBeenCalledWith(expect.objectContaining({ direction: 'dropped', source: 3 }));
      expect(client.received().length).toBe(34);
    });
  });

  describe('bind address', () => {
    it('refuses a public address without allowPublicBind', () => {
      expect(() => new BridgeServer({
        radio: new FakeRadio(),
        addressPolicy: new AddressPolicy(),
        host: '0.0.0.0',
      })).toThrow(ConfigError);
    });

    it('accepts a public address with allowPublicBind', () => {
      expect(() => new BridgeServer({
        radio: new FakeRadio(),
        addressPolicy: new AddressPolicy(),
        host: '0.0.0.0',
        allowPublicBind: true,
      })).not.toThrow();
    });
  });
});
