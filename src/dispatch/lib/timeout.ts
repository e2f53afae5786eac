/**
 * Deadline helpers for scatter-gather.
 */

import type { TimeUnit } from '../types.js';

const UNIT_TO_MS: Record<TimeUnit, number> = {
  milliseconds: 1,
  seconds: 1_000,
  minutes: 60_000,
};

export function toMillis(timeout: number, unit: TimeUnit): number {
  return timeout * UNIT_TO_MS[unit];
}

/** Milliseconds left until `deadline` (epoch ms); zero or negative once passed. */
export function remainingOfDeadline(deadline: number): number {
  return deadline - Date.now();
}

/**
 * Settles with `promise`, or rejects with `onTimeout()` once `ms` elapse.
 * The timer is cleared as soon as either side settles.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}
