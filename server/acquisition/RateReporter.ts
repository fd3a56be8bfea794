/**
 * RateReporter - periodic packets/second report, off the data path
 *
 * The loop calls record() per enqueued packet (a counter bump, never blocks).
 * A wall-clock interval turns the count into a rate and hands it to the sink.
 * Whatever the sink does, including throwing, stays out of the acquisition path.
 */

import type { RateReport } from '../../shared/types.js';
import { ConfigurationError } from '../errors.js';
import type { Scheduler } from './scheduler.js';

export type RateSink = (report: RateReport) => void | Promise<void>;

export interface RateReporterConfig {
  loopId: string;
  scheduler: Scheduler;
  intervalMs?: number;
  sink?: RateSink;
}

export interface RateReporter {
  record(count?: number): void;
  start(): void;
  stop(): void;
  getTotal(): number;
  getLastReport(): RateReport | null;
}

export const DEFAULT_RATE_INTERVAL_MS = 1000;

export const logRate: RateSink = (report) => {
  console.log(`[RateReporter] ${report.loopId}: ${report.rate.toFixed(1)} packets/s`);
};

export function createRateReporter(config: RateReporterConfig): RateReporter {
  const { loopId, scheduler, intervalMs = DEFAULT_RATE_INTERVAL_MS, sink = logRate } = config;

  if (!(intervalMs > 0)) {
    throw new ConfigurationError(`Rate report interval must be positive, got ${intervalMs}`);
  }

  let timer: ReturnType<typeof setInterval> | null = null;
  let sinceLast = 0;
  let total = 0;
  let lastTick = 0;
  let lastReport: RateReport | null = null;

  function reportFailure(err: unknown): void {
    console.error(`[RateReporter] ${loopId}: sink failed:`, err);
  }

  function tick(): void {
    const now = scheduler.now();
    const elapsedMs = now - lastTick;
    const packets = sinceLast;
    lastTick = now;
    sinceLast = 0;

    const report: RateReport = {
      loopId,
      packets,
      elapsedMs,
      rate: elapsedMs > 0 ? (packets * 1000) / elapsedMs : 0,
    };
    lastReport = report;

    try {
      Promise.resolve(sink(report)).catch(reportFailure);
    } catch (err) {
      reportFailure(err);
    }
  }

  return {
    record(count = 1): void {
      sinceLast += count;
      total += count;
    },

    start(): void {
      if (timer) return;
      lastTick = scheduler.now();
      sinceLast = 0;
      timer = setInterval(tick, intervalMs);
    },

    stop(): void {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    getTotal(): number {
      return total;
    },

    getLastReport(): RateReport | null {
      return lastReport;
    },
  };
}
