/**
 * FileObserver: structured JSONL file logging with rotation.
 *
 * Each event is serialised as a single JSON line (JSONL) and appended to the
 * configured log file. When the file exceeds `maxBytes` it is rotated: the
 * current file is renamed with a `.1` suffix (overwriting any previous
 * rotation) and a fresh file is opened.
 *
 * Default path : ~/.meshbridge/logs/meshbridge.jsonl
 * Default limit: 10 MB
 */

import { writeFileSync, appendFileSync, renameSync, statSync, mkdirSync, existsSync, chmodSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';

import type {
  ClientEvent,
  FrameEvent,
  IObserver,
  LinkStateEvent,
  LogLevel,
  RadioAddress,
  SecurityEvent,
} from '@meshbridge/core';
import { levelEnabled } from './levels.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const DEFAULT_LOG_FILE = '~/.meshbridge/logs/meshbridge.jsonl';

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2));
  }
  return resolve(p);
}

function serializeError(err: Error): Record<string, unknown> {
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };
}

function serializeAddress(address: RadioAddress | undefined): string | number | undefined {
  if (!address) return undefined;
  return address.kind === 'broadcast' ? 'broadcast' : address.destination;
}

// ---------------------------------------------------------------------------
// FileObserver
// ---------------------------------------------------------------------------

export interface FileObserverOptions {
  /** Absolute or ~-relative path to the JSONL log file. */
  filePath?: string;
  /** Max file size in bytes before rotation (default 10 MB). */
  maxBytes?: number;
  /** onLog messages below this level are skipped. Events are always written. */
  level?: LogLevel;
  /** Buffered lines are appended this long after the first one. Default: 100. */
  flushDelayMs?: number;
}

export class FileObserver implements IObserver {
  readonly filePath: string;
  private readonly maxBytes: number;
  private readonly level: LogLevel;
  private readonly flushDelayMs: number;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushing = false;
  /** Appends that failed; the first one is reported on stderr. */
  writeFailures = 0;

  constructor(opts: FileObserverOptions = {}) {
    this.filePath = expandHome(opts.filePath ?? DEFAULT_LOG_FILE);
    this.maxBytes = opts.maxBytes ?? 10 * 1024 * 1024;
    this.level = opts.level ?? 'info';
    this.flushDelayMs = opts.flushDelayMs ?? 100;
    this.ensureDir();
  }

  // ---- internal -----------------------------------------------------------

  private ensureDir(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  private write(type: string, data: Record<string, unknown>): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      type,
      ...data,
    });
    this.buffer.push(line);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flushSync();
    }, this.flushDelayMs);
    this.flushTimer.unref?.();
  }

  private flushSync(): void {
    if (this.buffer.length === 0 || this.flushing) return;
    this.flushing = true;

    const payload = this.buffer.join('\n') + '\n';
    this.buffer = [];

    try {
      this.rotateIfNeeded();
      appendFileSync(this.filePath, payload, { encoding: 'utf-8', mode: 0o600 });
      chmodSync(this.filePath, 0o600);
    } catch (err) {
      // No other sink left to report to.
      this.writeFailures++;
      if (this.writeFailures === 1) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`meshbridge: cannot write ${this.filePath}: ${message}\n`);
      }
    } finally {
      this.flushing = false;
    }
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    if (statSync(this.filePath).size < this.maxBytes) return;
    renameSync(this.filePath, this.filePath + '.1');
    writeFileSync(this.filePath, '', { encoding: 'utf-8', mode: 0o600 });
  }

  // ---- IObserver ----------------------------------------------------------

  onLinkState(event: LinkStateEvent): void {
    this.write('link_state', {
      linkId: event.linkId,
      from: event.from,
      to: event.to,
      reason: event.reason,
      retryInMs: event.retryInMs,
    });
  }

  onFrame(event: FrameEvent): void {
    this.write('frame', {
      direction: event.direction,
      bytes: event.bytes,
      address: serializeAddress(event.address),
      source: event.source,
      reason: event.reason,
    });
  }

  onClient(event: ClientEvent): void {
    this.write('client', {
      clientType: event.type,
      remote: event.remote,
      reason: event.reason,
    });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', {
      error: serializeError(error),
      context,
    });
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.write('security_event', {
      securityType: event.type,
      details: event.details,
    });
  }

  onLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!levelEnabled(level, this.level)) return;
    this.write('log', { level, message, context });
  }

  async flush(): Promise<void> {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.flushSync();
  }
}
