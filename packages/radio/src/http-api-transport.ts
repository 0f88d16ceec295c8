/**
 * HttpApiTransport: Meshtastic HTTP API.
 *
 * FromRadio messages are pulled one at a time with
 * `GET /api/v1/fromradio?all=false` (an empty body means "nothing
 * queued"); ToRadio messages are pushed with `PUT /api/v1/toradio`.
 * Uses the global fetch.
 */

import { abortableSleep } from '@meshbridge/core';
import type { DeviceTransport, TransportClose } from './transport.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HttpApiTransportOpts {
  /** host or host:port of the node's web server. */
  host: string;
  tls?: boolean;
  /** Wait between polls when the device has nothing queued. Default: 1000. */
  pollIntervalMs?: number;
  /** Per-request timeout. Default: 5000. */
  requestTimeoutMs?: number;
  /** Consecutive poll failures before the link is considered lost. Default: 3. */
  maxPollFailures?: number;
}

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const DEFAULT_MAX_POLL_FAILURES = 3;
/** Upper bound on messages drained per poll before yielding. */
const MAX_BATCH = 50;

// ---------------------------------------------------------------------------
// HttpApiTransport
// ---------------------------------------------------------------------------

export class HttpApiTransport implements DeviceTransport {
  readonly kind = 'http';
  readonly target: string;

  private readonly pollIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly maxPollFailures: number;
  private messageHandler: ((fromRadio: Uint8Array) => void) | null = null;
  private closeHandler: ((event: TransportClose) => void) | null = null;
  private pollAbort: AbortController | null = null;
  private pollLoop: Promise<void> | null = null;

  constructor(opts: HttpApiTransportOpts) {
    this.target = `${opts.tls ? 'https' : 'http'}://${opts.host.replace(/\/$/, '')}`;
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxPollFailures = opts.maxPollFailures ?? DEFAULT_MAX_POLL_FAILURES;
  }

  onMessage(handler: (fromRadio: Uint8Array) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: (event: TransportClose) => void): void {
    this.closeHandler = handler;
  }

  async open(signal?: AbortSignal): Promise<void> {
    // Reachability check; also surfaces bad credentials before binding.
    const response = await fetch(`${this.target}/api/v1/fromradio`, {
      method: 'GET',
      headers: { Accept: 'application/x-protobuf' },
      signal: this.requestSignal(signal),
    });
    if (!response.ok) {
      throw new Error(`${this.target} answered HTTP ${response.status}`);
    }
    // Drain the body so the socket is released; the first message is not
    // ours until want_config_id has been sent.
    await response.arrayBuffer();

    const controller = new AbortController();
    this.pollAbort = controller;
    this.pollLoop = this.poll(controller.signal).catch((err: unknown) => {
      this.fail(err instanceof Error ? err : new Error(String(err)), false);
    });
  }

  async write(toRadio: Uint8Array): Promise<void> {
    const response = await fetch(`${this.target}/api/v1/toradio`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/x-protobuf' },
      body: toRadio,
      signal: this.requestSignal(),
    });
    if (!response.ok) {
      throw new Error(`PUT toradio answered HTTP ${response.status}`);
    }
    await response.arrayBuffer();
  }

  async close(): Promise<void> {
    const loop = this.pollLoop;
    this.pollAbort?.abort();
    this.pollAbort = null;
    this.pollLoop = null;
    if (loop) await loop;
  }

  // ---------------------------------------------------------------------------
  // Polling
  // ---------------------------------------------------------------------------

  private async poll(signal: AbortSignal): Promise<void> {
    let failures = 0;

    while (!signal.aborted) {
      let drained = 0;
      try {
        while (!signal.aborted && drained < MAX_BATCH) {
          const response = await fetch(`${this.target}/api/v1/fromradio?all=false`, {
            method: 'GET',
            headers: { Accept: 'application/x-protobuf' },
            signal: this.requestSignal(signal),
          });
          if (response.status === 401 || response.status === 403) {
            this.fail(new Error(`${this.target} refused access (HTTP ${response.status})`), true);
            return;
          }
          if (!response.ok) throw new Error(`HTTP ${response.status}`);

          const body = new Uint8Array(await response.arrayBuffer());
          failures = 0;
          if (body.length === 0) break;

          drained++;
          this.messageHandler?.(body);
        }
      } catch (err) {
        if (signal.aborted) return;
        failures++;
        if (failures >= this.maxPollFailures) {
          const reason = err instanceof Error ? err.message : String(err);
          this.fail(new Error(`Polling ${this.target} failed ${failures} times: ${reason}`), false);
          return;
        }
      }

      if (drained < MAX_BATCH) {
        await abortableSleep(this.pollIntervalMs, signal);
      }
    }
  }

  private fail(error: Error, permanent: boolean): void {
    if (!this.pollAbort) return;
    this.pollAbort.abort();
    this.pollAbort = null;
    this.pollLoop = null;
    this.closeHandler?.({ error, permanent });
  }

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}
