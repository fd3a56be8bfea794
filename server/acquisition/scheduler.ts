/**
 * Scheduler - explicit handle for time and voluntary suspension
 *
 * Every loop and pacer receives one at construction.
 *
 * Both implementations behave the same; they differ only in how `yield()`
 * re-enters the event loop:
 * - 'immediate': setImmediate, runs after pending I/O callbacks (default)
 * - 'timeout':   setTimeout(0), goes through the timers phase
 */

import { ConfigurationError, abortReason } from '../errors.js';

export type SchedulerKind = 'immediate' | 'timeout';

export const SCHEDULER_KINDS: readonly SchedulerKind[] = ['immediate', 'timeout'];

export interface Scheduler {
  readonly kind: SchedulerKind;
  /** Monotonic milliseconds */
  now(): number;
  /** Resolve after `ms`; reject with the abort reason if `signal` fires first */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  /** Give every other ready task (timers, I/O) a chance to run */
  yield(): Promise<void>;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function createScheduler(kind: SchedulerKind = 'immediate'): Scheduler {
  if (!SCHEDULER_KINDS.includes(kind)) {
    throw new ConfigurationError(`Unknown scheduler "${String(kind)}"`);
  }

  const yieldOnce = kind === 'immediate'
    ? () => new Promise<void>(r => setImmediate(r))
    : () => new Promise<void>(r => setTimeout(r, 0));

  return {
    kind,
    now: () => performance.now(),
    sleep,
    yield: yieldOnce,
  };
}

export function isSchedulerKind(value: string): value is SchedulerKind {
  return SCHEDULER_KINDS.some(k => k === value);
}
