/**
 * Keeps a serving command alive until SIGINT or SIGTERM, then stops it.
 */

import type { IObserver } from '@meshbridge/core';
import { DIM, RED, RESET } from '../ui.js';

export function runUntilSignal(label: string, stop: () => Promise<void>, observer: IObserver): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let stopping = false;

    const onSignal = () => {
      if (stopping) return;
      stopping = true;
      process.off('unhandledRejection', onRejection);
      console.log(`\n  ${DIM}Shutting down ${label}...${RESET}`);
      stop().then(() => {
        console.log(`  ${DIM}Goodbye!${RESET}\n`);
        resolve();
      }, reject);
    };

    // A stray rejection is reported instead of killing the bridge.
    const onRejection = (reason: unknown) => {
      const msg = reason instanceof Error ? reason.message : String(reason);
      console.error(`  ${RED}✗ Unhandled rejection:${RESET} ${msg}`);
      observer.onError(reason instanceof Error ? reason : new Error(msg), { source: label });
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    process.on('unhandledRejection', onRejection);
  });
}
