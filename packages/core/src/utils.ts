import { type RandomSource } from './types.js';

/**
 * Sleep for a specified duration with optional cancellation support.
 *
 * @param ms - Duration in milliseconds
 * @param signal - Optional AbortSignal for cancellation
 * @returns Promise that resolves after the delay or rejects if cancelled
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(abortReason(signal));
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Turn the reason an AbortSignal carries into an Error.
 *
 * @param signal - The aborted signal
 * @returns The reason itself when it is an Error, otherwise an AbortError
 */
export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) {
    return reason;
  }
  if (typeof reason === 'string') {
    return new DOMException(reason, 'AbortError');
  }
  return new DOMException('Aborted', 'AbortError');
}

/**
 * Throw if the given signal is aborted.
 *
 * @param signal - AbortSignal to check
 * @throws The signal's reason, or a DOMException (AbortError)
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Check if an error is an abort error (from AbortController).
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof DOMException && error.name === 'AbortError';
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error('Unknown error');
  }
}

/**
 * Jitter mode for delay randomization.
 *
 * - `full`: Random delay from 0 to base delay
 * - `equal`: Random delay from 50% to 100% of base delay
 */
export type JitterMode = 'full' | 'equal';

/**
 * Calculate a jittered delay.
 *
 * The random source is a parameter so callers that need reproducible
 * schedules can pass a seeded or constant one.
 *
 * @example
 * ```typescript
 * addJitter(1000, 'equal', () => 0.5); // 750
 * addJitter(1000, 'full', () => 0.5); // 500
 * ```
 */
export function addJitter(
  delay: number,
  mode: JitterMode = 'equal',
  random: RandomSource = Math.random
): number {
  switch (mode) {
    case 'full':
      return Math.floor(random() * delay);

    case 'equal':
      return Math.floor(delay * 0.5 + random() * delay * 0.5);

    default: {
      const _exhaustive: never = mode;
      return _exhaustive;
    }
  }
}

/**
 * Clamp a number between min and max values.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
