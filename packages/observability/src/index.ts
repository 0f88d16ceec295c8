/**
 * @meshbridge/observability: IObserver implementations and a factory that
 * builds one from configuration.
 */

import { ConfigError, type IObserver, type LogLevel } from '@meshbridge/core';
import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

export { ConsoleObserver } from './console-observer.js';
export type { ConsoleObserverOptions, ConsoleSink } from './console-observer.js';
export { FileObserver, DEFAULT_LOG_FILE, expandHome } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';
export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';
export { LOG_LEVELS, isLogLevel, levelEnabled } from './levels.js';

export interface ObservabilityConfig {
  /** Any of 'console', 'file', 'noop'. */
  observers: string[];
  logLevel: LogLevel;
  /** JSONL path for the file observer. */
  logPath?: string;
}

export const OBSERVER_KINDS = ['console', 'file', 'noop'] as const;

/**
 * Build the observer named by `config.observers`. Several names give a
 * MultiObserver; none gives a NoopObserver.
 */
export function createObserver(config: ObservabilityConfig): IObserver {
  const observers: IObserver[] = [];

  for (const kind of new Set(config.observers)) {
    switch (kind) {
      case 'console':
        observers.push(new ConsoleObserver({ level: config.logLevel }));
        break;
      case 'file':
        observers.push(new FileObserver({ filePath: config.logPath, level: config.logLevel }));
        break;
      case 'noop':
        break;
      default:
        throw new ConfigError(`Unknown observer "${kind}"`, { observer: kind });
    }
  }

  if (observers.length === 0) return new NoopObserver();
  if (observers.length === 1 && observers[0]) return observers[0];
  return new MultiObserver(observers);
}
