/**
 * MultiObserver: fans every event out to a list of observers.
 *
 * A throwing observer does not stop the others; its failure is passed to
 * the remaining observers' onError.
 */

import type {
  ClientEvent,
  FrameEvent,
  IObserver,
  LinkStateEvent,
  LogLevel,
  SecurityEvent,
} from '@meshbridge/core';

export class MultiObserver implements IObserver {
  constructor(private readonly observers: readonly IObserver[]) {}

  onLinkState(event: LinkStateEvent): void {
    this.each('onLinkState', (o) => o.onLinkState(event));
  }

  onFrame(event: FrameEvent): void {
    this.each('onFrame', (o) => o.onFrame(event));
  }

  onClient(event: ClientEvent): void {
    this.each('onClient', (o) => o.onClient(event));
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.each('onSecurityEvent', (o) => o.onSecurityEvent(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    for (const o of this.observers) {
      try {
        o.onError(error, context);
      } catch (err) {
        this.reportFailure(o, 'onError', err);
      }
    }
  }

  onLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.each('onLog', (o) => o.onLog(level, message, context));
  }

  async flush(): Promise<void> {
    await Promise.all(this.observers.map((o) => o.flush?.()));
  }

  private each(method: string, call: (o: IObserver) => void): void {
    for (const o of this.observers) {
      try {
        call(o);
      } catch (err) {
        this.reportFailure(o, method, err);
      }
    }
  }

  private reportFailure(failed: IObserver, method: string, err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    for (const o of this.observers) {
      if (o === failed) continue;
      try {
        o.onError(error, { phase: 'observer', method });
      } catch (second) {
        const message = second instanceof Error ? second.message : String(second);
        process.stderr.write(`meshbridge: observer failed while reporting ${method}: ${message}\n`);
      }
    }
  }
}
