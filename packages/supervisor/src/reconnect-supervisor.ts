/**
 * ReconnectSupervisor: owns one IRadioLink and its ConnectionState.
 *
 *   disconnected -> connecting     start, or backoff elapsed
 *   connecting   -> bound          link.connect() resolved
 *   connecting   -> disconnected   link.connect() failed; retry after backoff
 *   bound        -> degraded       no inbound activity within staleAfterMs
 *   degraded     -> connecting     forced disconnect/reconnect cycle
 *   bound        -> disconnected   link lost (retry if recoverable) or stop()
 *
 * Backoff is min(minBackoffMs * 2^n, maxBackoffMs). It resets only once a
 * bind has held for minBackoffMs; a peer that accepts and drops at once
 * keeps backing off.
 * Frames submitted while not bound wait in a bounded oldest-drop queue
 * and go out in submission order, paced by spacingMs, once bound.
 *
 * Nothing outside this class calls link.connect() or link.disconnect().
 */

import {
  LinkLost,
  PayloadTooLarge,
  abortableSleep,
  backoffDelay,
  type ChannelBinding,
  type ConnectionState,
  type IObserver,
  type IRadioLink,
  type IRadioPort,
  type InboundFrame,
  type LinkInfo,
  type LinkStateEvent,
  type RadioAddress,
} from '@meshbridge/core';
import { SendQueue } from './send-queue.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReconnectSupervisorOpts {
  link: IRadioLink;
  binding: ChannelBinding;
  /** First retry delay. Default: 1000. */
  minBackoffMs?: number;
  /** Retry delay cap. Default: 60000. */
  maxBackoffMs?: number;
  /** Bound with no inbound activity this long becomes degraded. 0 disables. Default: 15 min. */
  staleAfterMs?: number;
  /** Interval between liveness probes while bound. 0 disables. Default: 5 min. */
  probeIntervalMs?: number;
  /** Outbound queue size. Default: 64. */
  queueCapacity?: number;
  /** Minimum gap between consecutive transmissions. Default: 0. */
  spacingMs?: number;
  observer?: IObserver;
}

export interface SupervisorStats {
  state: ConnectionState;
  queueDepth: number;
  sent: number;
  received: number;
  dropped: number;
  /** Successful binds, the first included. */
  binds: number;
  /** Failed connects and early losses since the last bind that held. */
  failedAttempts: number;
  linkInfo: LinkInfo | null;
}

interface QueuedFrame {
  payload: Uint8Array;
  address: RadioAddress;
}

export const DEFAULT_MIN_BACKOFF_MS = 1000;
export const DEFAULT_MAX_BACKOFF_MS = 60_000;
export const DEFAULT_STALE_AFTER_MS = 15 * 60 * 1000;
export const DEFAULT_PROBE_INTERVAL_MS = 5 * 60 * 1000;
export const DEFAULT_QUEUE_CAPACITY = 64;

// ---------------------------------------------------------------------------
// ReconnectSupervisor
// ---------------------------------------------------------------------------

export class ReconnectSupervisor implements IRadioPort {
  private readonly link: IRadioLink;
  private readonly binding: ChannelBinding;
  private readonly minBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly staleAfterMs: number;
  private readonly probeIntervalMs: number;
  readonly spacingMs: number;
  private readonly observer?: IObserver;
  private readonly queue: SendQueue<QueuedFrame>;

  private state: ConnectionState = 'disconnected';
  private started = false;
  private stopped = false;
  private failedAttempts = 0;
  private linkInfo: LinkInfo | null = null;
  private lastSentAt: number | null = null;
  private counters = { sent: 0, received: 0, dropped: 0, binds: 0 };

  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private settleTimer: ReturnType<typeof setTimeout> | null = null;
  private staleTimer: ReturnType<typeof setTimeout> | null = null;
  private probeTimer: ReturnType<typeof setInterval> | null = null;
  private connectAbort: AbortController | null = null;
  private connectTask: Promise<void> | null = null;
  private drainTask: Promise<void> | null = null;
  private readonly lifetime = new AbortController();

  private readonly receiveHandlers = new Set<(frame: InboundFrame) => void>();
  private readonly stateListeners = new Set<(event: LinkStateEvent) => void>();
  private readonly unsubscribe: Array<() => void> = [];

  constructor(opts: ReconnectSupervisorOpts) {
    this.link = opts.link;
    this.binding = opts.binding;
    this.minBackoffMs = opts.minBackoffMs ?? DEFAULT_MIN_BACKOFF_MS;
    this.maxBackoffMs = opts.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.staleAfterMs = opts.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.probeIntervalMs = opts.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS;
    this.spacingMs = opts.spacingMs ?? 0;
    this.observer = opts.observer;
    this.queue = new SendQueue(opts.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);

    this.unsubscribe.push(
      this.link.onReceive((frame) => this.handleReceive(frame)),
      this.link.onActivity(() => this.touch()),
      this.link.onLost((err) => this.handleLost(err)),
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Begin connecting. Calling start() twice has no effect. */
  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;
    this.beginConnect();
  }

  /**
   * Cancel timers and any in-flight connect, release the link and drop
   * queued frames. The supervisor never connects again afterwards.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.lifetime.abort();
    this.clearRetry();
    this.clearSettle();
    this.stopWatchdog();
    this.connectAbort?.abort();

    const pending = this.queue.clear();
    if (pending.length > 0) {
      this.counters.dropped += pending.length;
      this.observer?.onFrame({
        direction: 'dropped',
        bytes: pending.reduce((n, f) => n + f.payload.length, 0),
        reason: `supervisor stopped with ${pending.length} queued`,
        timestamp: new Date(),
      });
    }

    await this.connectTask;
    await this.drainTask;
    await this.disconnectLink('stop');
    this.setState('disconnected', 'stopped');

    for (const off of this.unsubscribe) off();
    this.unsubscribe.length = 0;
  }

  /** Drop the current link (if any) and connect again now, skipping backoff. */
  forceReconnect(reason = 'reconnect requested'): void {
    if (!this.started || this.stopped) return;
    switch (this.state) {
      case 'connecting':
      case 'degraded':
        return;
      case 'disconnected':
        this.clearRetry();
        this.beginConnect();
        return;
      case 'bound':
        this.degrade(reason);
        return;
    }
  }

  // ---------------------------------------------------------------------------
  // IRadioPort
  // ---------------------------------------------------------------------------

  submit(payload: Uint8Array, address: RadioAddress): void {
    if (this.stopped) {
      this.drop(payload, address, 'supervisor stopped');
      return;
    }

    const evicted = this.queue.push({ payload, address });
    if (evicted) this.drop(evicted.payload, evicted.address, 'queue full');

    if (this.state === 'bound') this.kickDrain();
  }

  onReceive(handler: (frame: InboundFrame) => void): () => void {
    this.receiveHandlers.add(handler);
    return () => {
      this.receiveHandlers.delete(handler);
    };
  }

  getState(): ConnectionState {
    return this.state;
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  onStateChange(listener: (event: LinkStateEvent) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  getStats(): SupervisorStats {
    return {
      state: this.state,
      queueDepth: this.queue.size,
      ...this.counters,
      failedAttempts: this.failedAttempts,
      linkInfo: this.linkInfo,
    };
  }

  get linkId(): string {
    return this.link.id;
  }

  // ---------------------------------------------------------------------------
  // Connecting
  // ---------------------------------------------------------------------------

  private beginConnect(): void {
    if (this.stopped) return;
    this.connectTask = this.connectOnce();
  }

  private async connectOnce(): Promise<void> {
    this.setState('connecting');
    const controller = new AbortController();
    this.connectAbort = controller;

    let info: LinkInfo;
    try {
      info = await this.link.connect(this.binding, controller.signal);
    } catch (err) {
      if (this.stopped) return;
      this.observer?.onError(toError(err), { link: this.link.id, phase: 'connect', attempt: this.failedAttempts });
      this.scheduleRetry(errorMessage(err));
      return;
    } finally {
      if (this.connectAbort === controller) this.connectAbort = null;
    }

    if (this.stopped) {
      // stop() ran while connect was in flight; it will release the link.
      return;
    }

    this.linkInfo = info;
    this.counters.binds++;
    this.setState('bound');
    this.startSettle();
    this.startWatchdog();
    this.kickDrain();
  }

  /** Forget past failures once the bind has held for minBackoffMs. */
  private startSettle(): void {
    this.clearSettle();
    this.settleTimer = setTimeout(() => {
      this.settleTimer = null;
      if (this.state === 'bound') this.failedAttempts = 0;
    }, this.minBackoffMs);
    this.settleTimer.unref?.();
  }

  private clearSettle(): void {
    if (this.settleTimer) {
      clearTimeout(this.settleTimer);
      this.settleTimer = null;
    }
  }

  private scheduleRetry(reason: string): void {
    const delay = backoffDelay(this.failedAttempts, this.minBackoffMs, this.maxBackoffMs);
    this.failedAttempts++;
    this.setState('disconnected', reason, delay);

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.beginConnect();
    }, delay);
    this.retryTimer.unref?.();
  }

  private clearRetry(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Liveness
  // ---------------------------------------------------------------------------

  private startWatchdog(): void {
    this.stopWatchdog();
    this.touch();
    if (this.probeIntervalMs > 0 && this.link.probe) {
      this.probeTimer = setInterval(() => this.probe(), this.probeIntervalMs);
      this.probeTimer.unref?.();
    }
  }

  private stopWatchdog(): void {
    if (this.staleTimer) {
      clearTimeout(this.staleTimer);
      this.staleTimer = null;
    }
    if (this.probeTimer) {
      clearInterval(this.probeTimer);
      this.probeTimer = null;
    }
  }

  /** Inbound activity: restart the staleness window. */
  private touch(): void {
    if (this.state !== 'bound' || this.staleAfterMs <= 0) return;
    if (this.staleTimer) clearTimeout(this.staleTimer);
    this.staleTimer = setTimeout(() => {
      this.staleTimer = null;
      this.degrade(`no inbound activity for ${this.staleAfterMs}ms`);
    }, this.staleAfterMs);
    this.staleTimer.unref?.();
  }

  private probe(): void {
    if (this.state !== 'bound' || !this.link.probe) return;
    this.link.probe().catch((err: unknown) => {
      this.observer?.onError(toError(err), { link: this.link.id, phase: 'probe' });
    });
  }

  /** bound -> degraded -> (disconnect) -> connecting. */
  private degrade(reason: string): void {
    if (this.stopped) return;
    this.stopWatchdog();
    this.clearSettle();
    this.setState('degraded', reason);
    this.connectTask = this.disconnectLink('degraded').then(() => {
      if (this.stopped || this.state !== 'degraded') return;
      return this.connectOnce();
    });
  }

  private handleLost(err: Error): void {
    if (this.stopped || (this.state !== 'bound' && this.state !== 'degraded')) return;
    this.stopWatchdog();
    this.clearSettle();
    this.linkInfo = null;

    const recoverable = err instanceof LinkLost ? err.recoverable : true;
    if (!recoverable) {
      this.observer?.onError(err, { link: this.link.id, phase: 'lost', recoverable: false });
      this.setState('disconnected', err.message);
      return;
    }
    this.scheduleRetry(err.message);
  }

  private async disconnectLink(phase: string): Promise<void> {
    this.linkInfo = null;
    try {
      await this.link.disconnect();
    } catch (err) {
      this.observer?.onError(toError(err), { link: this.link.id, phase });
    }
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  private kickDrain(): void {
    if (this.drainTask) return;
    this.drainTask = this.drain()
      .catch((err: unknown) => {
        this.observer?.onError(toError(err), { link: this.link.id, phase: 'drain' });
      })
      .finally(() => {
        this.drainTask = null;
        if (!this.stopped && this.state === 'bound' && this.queue.size > 0) this.kickDrain();
      });
  }

  private async drain(): Promise<void> {
    while (!this.stopped && this.state === 'bound' && this.queue.size > 0) {
      const wait = this.lastSentAt === null ? 0 : this.lastSentAt + this.spacingMs - Date.now();
      if (wait > 0) {
        await abortableSleep(wait, this.lifetime.signal);
        if (this.stopped || this.state !== 'bound') return;
      }

      const frame = this.queue.shift();
      if (!frame) return;

      try {
        await this.link.send(frame.payload, frame.address);
      } catch (err) {
        if (err instanceof PayloadTooLarge) {
          this.drop(frame.payload, frame.address, err.message);
          continue;
        }
        const dropped = this.queue.requeue(frame);
        if (dropped) this.drop(dropped.payload, dropped.address, 'queue full');
        // A link that lost its transport has already reported it; anything
        // else means the link is unusable without telling us.
        if (this.state === 'bound') {
          this.observer?.onError(toError(err), { link: this.link.id, phase: 'send' });
          this.degrade(`send failed: ${errorMessage(err)}`);
        }
        return;
      }

      this.lastSentAt = Date.now();
      this.counters.sent++;
      this.observer?.onFrame({
        direction: 'outbound',
        bytes: frame.payload.length,
        address: frame.address,
        timestamp: new Date(),
      });
    }
  }

  private drop(payload: Uint8Array, address: RadioAddress, reason: string): void {
    this.counters.dropped++;
    this.observer?.onFrame({
      direction: 'dropped',
      bytes: payload.length,
      address,
      reason,
      timestamp: new Date(),
    });
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private handleReceive(frame: InboundFrame): void {
    if (this.stopped) return;
    this.counters.received++;
    this.observer?.onFrame({
      direction: 'inbound',
      bytes: frame.payload.length,
      source: frame.source,
      timestamp: new Date(),
    });
    for (const handler of [...this.receiveHandlers]) {
      handler(frame);
    }
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private setState(to: ConnectionState, reason?: string, retryInMs?: number): void {
    const from = this.state;
    if (from === to && retryInMs === undefined) return;
    this.state = to;

    const event: LinkStateEvent = { linkId: this.link.id, from, to, timestamp: new Date() };
    if (reason !== undefined) event.reason = reason;
    if (retryInMs !== undefined) event.retryInMs = retryInMs;

    this.observer?.onLinkState(event);
    for (const listener of [...this.stateListeners]) {
      listener(event);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
