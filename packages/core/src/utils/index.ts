/**
 * Pure utility functions shared across meshbridge packages.
 */

/** Sleep for a given number of milliseconds */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep that resolves early if an AbortSignal fires.
 *
 * Useful in retry loops where backoff delays should not prevent timely
 * abort handling. Cleans up the timer and abort listener on resolution.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return sleep(ms);
  if (signal.aborted) return Promise.resolve();

  return new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timer);
      resolve();
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Capped exponential backoff: `min(baseMs * 2^attempt, maxMs)`.
 *
 * `jitterRatio` adds up to that fraction of the delay on top. Pass 0 where
 * consecutive delays must never decrease.
 */
export function backoffDelay(attempt: number, baseMs = 1000, maxMs = 60_000, jitterRatio = 0): number {
  const delay = Math.min(baseMs * 2 ** attempt, maxMs);
  if (jitterRatio <= 0) return delay;
  return delay + delay * jitterRatio * Math.random();
}

/** Format a node number the way Meshtastic prints it: `!` + 8 hex digits. */
export function formatNodeId(num: number): string {
  return `!${(num >>> 0).toString(16).padStart(8, '0')}`;
}

/**
 * Parse `!a1b2c3d4`, `0xa1b2c3d4` or a decimal string/number into a node number.
 * Returns null when the input is not a valid unsigned 32-bit id.
 */
export function parseNodeId(input: string | number): number | null {
  if (typeof input === 'number') {
    return Number.isInteger(input) && input >= 0 && input <= 0xffffffff ? input : null;
  }
  const text = input.trim();
  let value: number;
  if (/^!([0-9a-fA-F]{1,8})$/.test(text)) {
    value = parseInt(text.slice(1), 16);
  } else if (/^0x[0-9a-fA-F]{1,8}$/.test(text)) {
    value = parseInt(text.slice(2), 16);
  } else if (/^\d+$/.test(text)) {
    value = Number(text);
  } else {
    return null;
  }
  return value <= 0xffffffff ? value : null;
}

/** True for `localhost`, `::1` and any 127.0.0.0/8 address. */
export function isLoopbackHost(host: string): boolean {
  return host === 'localhost' || host === '::1' || /^127\.\d{1,3}\.\d{1,3}\.\d{1,3}$/.test(host);
}
