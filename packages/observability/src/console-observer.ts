/**
 * ConsoleObserver: one levelled line per event.
 *
 *   12:04:33.120 INFO  link tcp: connecting -> bound
 *   12:04:35.871 WARN  frame dropped 96 B (queue full)
 *
 * Warnings and errors go to stderr, everything else to stdout. Colour is
 * on when stdout is a TTY unless overridden.
 */

import {
  formatNodeId,
  type ClientEvent,
  type FrameEvent,
  type IObserver,
  type LinkStateEvent,
  type LogLevel,
  type RadioAddress,
  type SecurityEvent,
} from '@meshbridge/core';
import { levelEnabled } from './levels.js';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[2m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

export type ConsoleSink = (line: string, level: LogLevel) => void;

export interface ConsoleObserverOptions {
  /** Lines below this level are skipped. Default: info. */
  level?: LogLevel;
  color?: boolean;
  /** Where lines go. Default: console.log, console.error for warn and error. */
  sink?: ConsoleSink;
}

function defaultSink(line: string, level: LogLevel): void {
  if (level === 'warn' || level === 'error') console.error(line);
  else console.log(line);
}

function describeAddress(address: RadioAddress): string {
  return address.kind === 'broadcast' ? 'broadcast' : formatNodeId(address.destination);
}

function describeContext(context: Record<string, unknown> | undefined): string {
  if (!context) return '';
  const parts = Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export class ConsoleObserver implements IObserver {
  private readonly level: LogLevel;
  private readonly color: boolean;
  private readonly sink: ConsoleSink;

  constructor(opts: ConsoleObserverOptions = {}) {
    this.level = opts.level ?? 'info';
    this.color = opts.color ?? process.stdout.isTTY === true;
    this.sink = opts.sink ?? defaultSink;
  }

  onLinkState(event: LinkStateEvent): void {
    const level: LogLevel = event.to === 'degraded' || (event.to === 'disconnected' && event.reason) ? 'warn' : 'info';
    let line = `link ${event.linkId}: ${event.from} -> ${event.to}`;
    if (event.reason) line += ` (${event.reason})`;
    if (event.retryInMs !== undefined) line += `, retry in ${event.retryInMs}ms`;
    this.emit(level, line);
  }

  onFrame(event: FrameEvent): void {
    let line = `frame ${event.direction} ${event.bytes} B`;
    if (event.address) line += ` to ${describeAddress(event.address)}`;
    if (event.source !== undefined) line += ` from ${formatNodeId(event.source)}`;
    if (event.reason) line += ` (${event.reason})`;
    this.emit(event.direction === 'dropped' ? 'warn' : 'debug', line);
  }

  onClient(event: ClientEvent): void {
    let line = `client ${event.remote} ${event.type}`;
    if (event.reason) line += ` (${event.reason})`;
    this.emit(event.type === 'rejected' ? 'warn' : 'info', line);
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.emit('warn', `security ${event.type}${describeContext(event.details)}`);
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.emit('error', `${error.name}: ${error.message}${describeContext(context)}`);
  }

  onLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.emit(level, `${message}${describeContext(context)}`);
  }

  private emit(level: LogLevel, message: string): void {
    if (!levelEnabled(level, this.level)) return;
    const time = new Date().toISOString().slice(11, 23);
    const tag = level.toUpperCase().padEnd(5);
    const line = this.color
      ? `${DIM}${time}${RESET} ${LEVEL_COLORS[level]}${tag}${RESET} ${message}`
      : `${time} ${tag} ${message}`;
    this.sink(line, level);
  }
}
