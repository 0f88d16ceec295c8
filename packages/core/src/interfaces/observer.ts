/**
 * IObserver: observability contract
 *
 * Components emit typed events into an observer; implementations decide
 * whether they become console lines, JSONL records or nothing at all.
 * Observer methods must never throw into the caller.
 */

import type {
  ClientEvent,
  FrameEvent,
  LinkStateEvent,
  LogLevel,
  SecurityEvent,
} from '../types/index.js';

export interface IObserver {
  onLinkState(event: LinkStateEvent): void;
  onFrame(event: FrameEvent): void;
  onClient(event: ClientEvent): void;
  onSecurityEvent(event: SecurityEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  /** Free-form operational message (startup banners, config notes). */
  onLog(level: LogLevel, message: string, context?: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
