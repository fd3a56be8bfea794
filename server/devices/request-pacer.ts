/**
 * Request Pacer
 * Keeps waveform fetches from outrunning the scope's own acquisition
 *
 *   minInterval = pacingFactor × timePerDivision × divisionCount
 *
 * The pacer waits; it never retries. The factor defaults to 4 sweeps of the screen.
 *
 * Time per division and division count are read from the device once and cached;
 * invalidate() after changing the timebase makes the next acquire() re-read them.
 * The wait happens outside the transport lock, so other queries keep flowing.
 */

import type { Result } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import type { PacingParameters } from './types.js';
import { ConfigurationError, type ConnectionError } from '../errors.js';
import type { Scheduler } from '../acquisition/scheduler.js';

export const DEFAULT_PACING_FACTOR = 4;

export interface RequestPacerConfig {
  scheduler: Scheduler;
  pacingFactor?: number;
}

export interface PacingState {
  /** Scheduler time of the last dispatched request, null before the first */
  lastRequestAt: number | null;
  /** Milliseconds, null until the device parameters have been read */
  minIntervalMs: number | null;
  timePerDivision: number | null;
  divisionCount: number | null;
  stale: boolean;
}

export interface RequestPacer {
  readonly pacingFactor: number;
  /** Wait until the next request may go out, then mark it dispatched */
  acquire(signal?: AbortSignal): Promise<Result<void, ConnectionError>>;
  /** Re-read the device parameters now */
  refresh(): Promise<Result<number, ConnectionError>>;
  /** Device parameters changed; re-read them before the next request */
  invalidate(): void;
  getState(): PacingState;
}

export function computeMinInterval(
  timePerDivision: number,
  divisionCount: number,
  pacingFactor: number = DEFAULT_PACING_FACTOR
): number {
  return pacingFactor * timePerDivision * divisionCount * 1000;
}

export function createRequestPacer(
  parameters: PacingParameters,
  config: RequestPacerConfig
): RequestPacer {
  const { scheduler, pacingFactor = DEFAULT_PACING_FACTOR } = config;

  if (!(pacingFactor > 0) || !Number.isFinite(pacingFactor)) {
    throw new ConfigurationError(`Pacing factor must be a positive number, got ${pacingFactor}`);
  }

  const state: PacingState = {
    lastRequestAt: null,
    minIntervalMs: null,
    timePerDivision: null,
    divisionCount: null,
    stale: true,
  };

  async function refresh(): Promise<Result<number, ConnectionError>> {
    const tdiv = await parameters.readTimePerDivision();
    if (!tdiv.ok) return tdiv;
    const divisions = await parameters.readDivisionCount();
    if (!divisions.ok) return divisions;

    state.timePerDivision = tdiv.value;
    state.divisionCount = divisions.value;
    state.minIntervalMs = computeMinInterval(tdiv.value, divisions.value, pacingFactor);
    state.stale = false;
    return Ok(state.minIntervalMs);
  }

  return {
    pacingFactor,

    async acquire(signal?: AbortSignal): Promise<Result<void, ConnectionError>> {
      let minInterval = state.minIntervalMs;
      if (state.stale || minInterval === null) {
        const refreshed = await refresh();
        if (!refreshed.ok) return refreshed;
        minInterval = refreshed.value;
      }

      if (state.lastRequestAt !== null) {
        const passed = scheduler.now() - state.lastRequestAt;
        if (passed < minInterval) {
          // Rejects with the abort reason if the loop stops meanwhile
          await scheduler.sleep(minInterval - passed, signal);
        }
      }

      state.lastRequestAt = scheduler.now();
      return Ok();
    },

    refresh,

    invalidate(): void {
      state.stale = true;
    },

    getState(): PacingState {
      return { ...state };
    },
  };
}
