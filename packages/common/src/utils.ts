export function now(): number {
  return Date.now();
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so callers
 * check `signal.aborted` afterwards when they care which one happened.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const timer = setTimeout(done, ms);

    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }

    signal?.addEventListener('abort', done, { once: true });
  });
}

const DELAY_PATTERN = /^(\d+(?:\.\d+)?)(us|ms|s)$/;

export function parseDelayMs(delay: string): number {
  const match = DELAY_PATTERN.exec(delay.trim());
  if (!match) {
    throw new Error(`Invalid delay "${delay}": expected a value such as 2ms, 500us or 1s`);
  }

  const value = parseFloat(match[1]);
  switch (match[2]) {
    case 'us':
      return value / 1000;
    case 's':
      return value * 1000;
    default:
      return value;
  }
}

export function bytesToMbps(bytes: number, seconds: number): number {
  if (seconds <= 0) {
    return 0;
  }
  return (bytes * 8) / 1e6 / seconds;
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
