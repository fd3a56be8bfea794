import type { Scheduler } from '../scheduler.js';
import { abortReason } from '../../errors.js';

/**
 * Scheduler with a hand-driven clock.
 * sleep() records the request and jumps the clock forward instead of waiting;
 * yield() only defers to the microtask queue.
 */
export interface FakeScheduler extends Scheduler {
  clock: number;
  sleeps: number[];
  yields: number;
}

export function createFakeScheduler(start = 0): FakeScheduler {
  const fake: FakeScheduler = {
    kind: 'immediate',
    clock: start,
    sleeps: [],
    yields: 0,

    now: () => fake.clock,

    sleep(ms: number, signal?: AbortSignal): Promise<void> {
      if (signal?.aborted) return Promise.reject(abortReason(signal));
      fake.sleeps.push(ms);
      fake.clock += ms;
      return Promise.resolve();
    },

    yield(): Promise<void> {
      fake.yields++;
      return Promise.resolve();
    },
  };
  return fake;
}

/** Let pending promise chains run to their next macrotask boundary */
export async function flushMicrotasks(rounds = 50): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
