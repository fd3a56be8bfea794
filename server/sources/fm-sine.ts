/**
 * FM Sine Source
 * Demo data source: a frequency-modulated sine computed on the spot
 *
 * fetch() runs to completion without ever suspending, so the source declares
 * `yields: false` and the acquisition loop yields to the event loop after
 * each frame on its behalf.
 */

import type { DataSource, SineFrame } from '../devices/types.js';
import type { Result } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import { ConfigurationError } from '../errors.js';
import type { Scheduler } from '../acquisition/scheduler.js';

export interface FmSineConfig {
  scheduler: Scheduler;
  /** Samples per frame (default: 1000) */
  points?: number;
  /** Carrier frequency in Hz (default: 1) */
  carrierHz?: number;
  /** Modulation frequency in Hz (default: 3) */
  modulationHz?: number;
  /** Frequency deviation in Hz (default: carrierHz / 4) */
  deviationHz?: number;
}

export function createFmSineSource(config: FmSineConfig): DataSource<SineFrame> {
  const { scheduler, points = 1000, carrierHz = 1, modulationHz = 3 } = config;
  const deviationHz = config.deviationHz ?? carrierHz / 4;

  if (!Number.isInteger(points) || points < 2) {
    throw new ConfigurationError(`FM sine needs at least 2 points, got ${points}`);
  }

  // t spans [-2, 2]; x is the same axis in radians
  const t = Array.from({ length: points }, (_, i) => -2 + (4 * i) / (points - 1));
  const x = t.map(v => v * 2 * Math.PI);
  const startedAt = scheduler.now();

  return {
    name: 'fm-sine',
    yields: false,

    fetch(): Result<SineFrame, Error> {
      const elapsed = (scheduler.now() - startedAt) / 1000;
      const baseband = Math.sin(2 * Math.PI * elapsed * modulationHz);
      const frequency = carrierHz + deviationHz * baseband;
      const y = t.map(v => Math.sin(2 * Math.PI * frequency * v));
      // Each frame owns its arrays once handed out
      return Ok({ x: [...x], y });
    },
  };
}
