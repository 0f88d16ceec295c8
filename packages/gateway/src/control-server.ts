/**
 * ControlServer: loopback HTTP control plane with a WebSocket state feed.
 *
 * Routes:
 *   GET    /health      - liveness probe (no auth required)
 *   GET    /status      - link state, address, binding, client, queue and counters
 *   PUT    /address     - {"mode":"broadcast"} or {"mode":"unicast","destination":"!0000002a"}
 *   POST   /reconnect   - drop the radio link and connect again now
 *   WS     /ws          - pushes {type:'status'} on connect, then 'state' and 'address' events
 *
 * When a token is configured, every route except /health requires
 * `Authorization: Bearer <token>` and the WebSocket requires `?token=`.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { createHash, timingSafeEqual } from 'node:crypto';
import { WebSocket, WebSocketServer } from 'ws';
import {
  formatNodeId,
  type ChannelBinding,
  type IObserver,
  type LinkStateEvent,
  type RadioAddress,
} from '@meshbridge/core';
import type { AddressPolicy } from '@meshbridge/framing';
import type { SupervisorStats } from '@meshbridge/supervisor';
import type { BridgeClientInfo } from './bridge-server.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the control plane needs from the radio side. ReconnectSupervisor satisfies it. */
export interface ControlTarget {
  readonly linkId: string;
  getStats(): SupervisorStats;
  forceReconnect(reason?: string): void;
  onStateChange(listener: (event: LinkStateEvent) => void): () => void;
}

export interface ControlServerOptions {
  /** Default: 45833. Use 0 for an ephemeral port. */
  port?: number;
  host?: string;
  target: ControlTarget;
  addressPolicy: AddressPolicy;
  binding: ChannelBinding;
  /** Reports the attached socket client. Omitted in adapter mode. */
  client?: () => BridgeClientInfo | null;
  /** When set, bearer token auth is enforced on protected routes. */
  token?: string;
  observer?: IObserver;
}

export type AddressView =
  | { mode: 'broadcast' }
  | { mode: 'unicast'; destination: string };

export const DEFAULT_CONTROL_PORT = 45833;

// ---------------------------------------------------------------------------
// ControlServer
// ---------------------------------------------------------------------------

export class ControlServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly port: number;
  private readonly host: string;
  private readonly opts: ControlServerOptions;
  private readonly tokenHash: Buffer | null;
  private readonly unsubscribe: Array<() => void> = [];

  constructor(options: ControlServerOptions) {
    this.opts = options;
    this.port = options.port ?? DEFAULT_CONTROL_PORT;
    this.host = options.host ?? '127.0.0.1';
    this.tokenHash = options.token ? hashToken(options.token) : null;
  }

  /** Start listening on the configured port. */
  async start(): Promise<void> {
    if (this.server) return;

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.opts.observer?.onError(err instanceof Error ? err : new Error(String(err)), {
          phase: 'control',
          url: req.url,
        });
        this.sendJson(res, 500, { error: err instanceof Error ? err.message : 'Internal server error' });
      });
    });
    this.wss = new WebSocketServer({ noServer: true });
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.unsubscribe.push(
      this.opts.target.onStateChange((event) => {
        this.broadcast({
          type: 'state',
          from: event.from,
          to: event.to,
          reason: event.reason,
          retryInMs: event.retryInMs,
          timestamp: event.timestamp.toISOString(),
        });
      }),
      this.opts.addressPolicy.onChange((address, previous) => {
        this.broadcast({ type: 'address', address: describeAddress(address), previous: describeAddress(previous) });
      }),
    );
  }

  /** Close WebSocket clients, then the HTTP server. */
  async stop(): Promise<void> {
    for (const off of this.unsubscribe) off();
    this.unsubscribe.length = 0;

    if (this.wss) {
      for (const client of this.wss.clients) client.terminate();
      this.wss.close();
      this.wss = null;
    }

    const server = this.server;
    if (!server) return;
    this.server = null;
    server.closeAllConnections();
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

  /** The body of GET /status. */
  status(): Record<string, unknown> {
    const stats = this.opts.target.getStats();
    return {
      link: this.opts.target.linkId,
      state: stats.state,
      address: describeAddress(this.opts.addressPolicy.current()),
      binding: this.opts.binding,
      client: this.opts.client?.() ?? null,
      queueDepth: stats.queueDepth,
      counters: {
        sent: stats.sent,
        received: stats.received,
        dropped: stats.dropped,
        binds: stats.binds,
      },
      failedAttempts: stats.failedAttempts,
      linkInfo: stats.linkInfo,
    };
  }

  // ---------------------------------------------------------------------------
  // WebSocket upgrade handling
  // ---------------------------------------------------------------------------

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const wss = this.wss;
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    if (!wss || url.pathname !== '/ws') {
      socket.destroy();
      return;
    }

    if (this.tokenHash && !this.tokenValid(url.searchParams.get('token'))) {
      this.reportUnauthorized('GET', '/ws');
      socket.end('HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n');
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      ws.send(JSON.stringify({ type: 'status', ...this.status() }));
      wss.emit('connection', ws, req);
    });
  }

  private broadcast(message: Record<string, unknown>): void {
    if (!this.wss) return;
    const data = JSON.stringify(message);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(data);
    }
  }

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    // ----- Public routes (no auth) -----

    if (method === 'GET' && path === '/health') {
      this.sendJson(res, 200, {
        status: 'ok',
        timestamp: new Date().toISOString(),
        state: this.opts.target.getStats().state,
      });
      return;
    }

    // ----- Protected routes -----

    if (this.tokenHash && !this.checkAuth(req)) {
      this.reportUnauthorized(method, path);
      this.sendJson(res, 401, { error: 'Unauthorized. Provide a valid bearer token.' });
      return;
    }

    if (method === 'GET' && path === '/status') {
      this.sendJson(res, 200, this.status());
      return;
    }

    if (method === 'PUT' && path === '/address') {
      const body = await this.readBody(req);
      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch {
        this.sendJson(res, 400, { error: 'Invalid JSON body.' });
        return;
      }

      const error = this.applyAddress(payload);
      if (error) {
        this.sendJson(res, 400, { error });
        return;
      }
      this.sendJson(res, 200, { address: describeAddress(this.opts.addressPolicy.current()) });
      return;
    }

    if (method === 'POST' && path === '/reconnect') {
      this.opts.target.forceReconnect('reconnect requested via control plane');
      this.sendJson(res, 202, { reconnecting: true, state: this.opts.target.getStats().state });
      return;
    }

    this.sendJson(res, 404, { error: 'Not found' });
  }

  /** Returns an error message, or null when the policy was updated. */
  private applyAddress(payload: unknown): string | null {
    if (typeof payload !== 'object' || payload === null) {
      return 'Body must be a JSON object.';
    }
    const mode = 'mode' in payload ? payload.mode : undefined;
    if (mode === 'broadcast') {
      this.opts.addressPolicy.setBroadcast();
      return null;
    }
    if (mode === 'unicast') {
      const destination = 'destination' in payload ? payload.destination : undefined;
      if (typeof destination !== 'string' && typeof destination !== 'number') {
        return 'Missing "destination" for unicast.';
      }
      try {
        this.opts.addressPolicy.setUnicast(destination);
      } catch (err) {
        return err instanceof Error ? err.message : String(err);
      }
      return null;
    }
    return 'Field "mode" must be "broadcast" or "unicast".';
  }

  // ---------------------------------------------------------------------------
  // Auth
  // ---------------------------------------------------------------------------

  private checkAuth(req: IncomingMessage): boolean {
    const authHeader = req.headers['authorization'];
    if (!authHeader || !authHeader.startsWith('Bearer ')) return false;
    return this.tokenValid(authHeader.slice(7));
  }

  private tokenValid(token: string | null): boolean {
    if (!this.tokenHash) return true;
    if (!token) return false;
    return timingSafeEqual(this.tokenHash, hashToken(token));
  }

  private reportUnauthorized(method: string, path: string): void {
    this.opts.observer?.onSecurityEvent({
      type: 'control_unauthorized',
      details: { method, path },
      timestamp: new Date(),
    });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    const body = JSON.stringify(data);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }
}

export function describeAddress(address: RadioAddress): AddressView {
  if (address.kind === 'broadcast') return { mode: 'broadcast' };
  return { mode: 'unicast', destination: formatNodeId(address.destination) };
}

function hashToken(token: string): Buffer {
  return createHash('sha256').update(token).digest();
}
