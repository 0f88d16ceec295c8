import type { IObserver } from '@meshbridge/core';

/** Discards everything. Used in tests and when no observers are configured. */
export class NoopObserver implements IObserver {
  onLinkState(): void {}
  onFrame(): void {}
  onClient(): void {}
  onSecurityEvent(): void {}
  onError(): void {}
  onLog(): void {}
  async flush(): Promise<void> {}
}
