import { performance } from 'perf_hooks';
import { setTimeout as delay } from 'timers/promises';

export type Settled<T> = { timedOut: false; value: T } | { timedOut: true };

export const sleep = (ms: number): Promise<void> => delay(Math.max(0, ms)).then(() => undefined);

/** Epoch seconds with sub-millisecond resolution. */
export const wallClockSeconds = (): number => (performance.timeOrigin + performance.now()) / 1000;

export const monotonicMs = (): number => performance.now();

/**
 * Waits for `promise` at most `ms` milliseconds. The promise keeps running after a timeout;
 * only the wait is abandoned.
 */
export function settleWithin<T>(promise: Promise<T>, ms: number): Promise<Settled<T>> {
  return new Promise<Settled<T>>((resolve, reject) => {
    const timer = setTimeout(() => resolve({ timedOut: true }), Math.max(0, ms));
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve({ timedOut: false, value });
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
