/**
 * Client for a running process's control plane, used by the `status`,
 * `address` and `reconnect` commands.
 */

import { MeshBridgeError, formatNodeId, type MeshBridgeConfig } from '@meshbridge/core';
import { kvRow, stateBadge, DIM, RESET } from './ui.js';

export interface ControlEndpoint {
  baseUrl: string;
  token?: string;
  /** Default: 5000. */
  timeoutMs?: number;
}

export type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function endpointFromConfig(config: MeshBridgeConfig): ControlEndpoint {
  return {
    baseUrl: `http://127.0.0.1:${config.control.port}`,
    token: config.bridge.auth.mode === 'token' ? config.bridge.auth.secret : undefined,
  };
}

async function request(endpoint: ControlEndpoint, method: string, path: string, body?: JsonObject): Promise<JsonObject> {
  const headers: Record<string, string> = {};
  if (endpoint.token) headers['Authorization'] = `Bearer ${endpoint.token}`;
  if (body) headers['Content-Type'] = 'application/json';

  let res: Response;
  try {
    res = await fetch(`${endpoint.baseUrl}${path}`, {
      method,
      headers,
      body: body ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(endpoint.timeoutMs ?? 5000),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MeshBridgeError(
      `Control plane at ${endpoint.baseUrl} is not reachable: ${message}`,
      'CONTROL_UNREACHABLE',
      { baseUrl: endpoint.baseUrl },
    );
  }

  const text = await res.text();
  let parsed: unknown = null;
  if (text.length > 0) {
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = { error: text };
    }
  }
  const data = isObject(parsed) ? parsed : {};

  if (!res.ok) {
    const reason = typeof data['error'] === 'string' ? data['error'] : res.statusText;
    throw new MeshBridgeError(`${method} ${path} failed (${res.status}): ${reason}`, 'CONTROL_REQUEST_FAILED', {
      status: res.status,
    });
  }
  return data;
}

export function getStatus(endpoint: ControlEndpoint): Promise<JsonObject> {
  return request(endpoint, 'GET', '/status');
}

/** `target` is 'broadcast' or a node id. */
export function setAddress(endpoint: ControlEndpoint, target: string): Promise<JsonObject> {
  const body = target === 'broadcast' ? { mode: 'broadcast' } : { mode: 'unicast', destination: target };
  return request(endpoint, 'PUT', '/address', body);
}

export function requestReconnect(endpoint: ControlEndpoint): Promise<JsonObject> {
  return request(endpoint, 'POST', '/reconnect');
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function describeAddressView(value: unknown): string {
  if (!isObject(value)) return 'unknown';
  if (value['mode'] === 'unicast' && typeof value['destination'] === 'string') {
    return `unicast ${value['destination']}`;
  }
  return value['mode'] === 'broadcast' ? 'broadcast' : 'unknown';
}

function describeBinding(value: unknown): string {
  if (!isObject(value)) return 'unknown';
  if (value['kind'] === 'named-stream' && typeof value['name'] === 'string') return `named stream "${value['name']}"`;
  return value['kind'] === 'private-app' ? 'private app port' : 'unknown';
}

function describeState(value: unknown): string {
  switch (value) {
    case 'disconnected':
    case 'connecting':
    case 'bound':
    case 'degraded':
      return stateBadge(value);
    default:
      return String(value);
  }
}

function num(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

/** Key-value lines for a GET /status body. */
export function renderStatus(status: JsonObject): string[] {
  const counters = isObject(status['counters']) ? status['counters'] : {};
  const client = status['client'];
  const lines = [
    kvRow('Link', `${String(status['link'])} ${describeState(status['state'])}`),
    kvRow('Binding', describeBinding(status['binding'])),
    kvRow('Address', describeAddressView(status['address'])),
    kvRow('Queue', `${num(status['queueDepth'])} waiting`),
    kvRow(
      'Frames',
      `${num(counters['sent'])} sent, ${num(counters['received'])} received, ${num(counters['dropped'])} dropped`,
    ),
    kvRow('Binds', `${num(counters['binds'])} (${num(status['failedAttempts'])} failed since last)`),
  ];

  if (isObject(client)) {
    lines.push(kvRow('Client', `${String(client['remote'])} ${String(client['state'])} since ${String(client['connectedAt'])}`));
  } else if ('client' in status) {
    lines.push(kvRow('Client', `${DIM}none attached${RESET}`));
  }

  const info = status['linkInfo'];
  if (isObject(info) && typeof info['localNode'] === 'number') {
    lines.push(kvRow('Local node', formatNodeId(info['localNode'])));
  }
  return lines;
}
