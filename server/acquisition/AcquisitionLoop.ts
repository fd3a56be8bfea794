/**
 * AcquisitionLoop - drives a DataSource into a PacketQueue
 *
 * idle -> running -> stopped (terminal)
 *
 * Each iteration fetches one payload per channel (or one payload for a
 * single-channel source), wraps it in a Packet and enqueues it. A bounded queue
 * is the only backpressure: enqueue suspends until the consumer frees a slot.
 *
 * When the source declares `yields: false` the loop yields to the event loop
 * after every fetch, otherwise an unbounded queue would never suspend and every
 * other task in the process would starve.
 *
 * Any source failure stops the loop; there is no retry. stop() is observed at
 * the top of each iteration, inside the source's pacing wait, and at a blocked
 * enqueue. A payload fetched after stop() was requested is discarded.
 */

import type { ChannelTag, LoopState, Packet, RateReport, Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import type { DataSource } from '../devices/types.js';
import {
  AcquisitionError,
  ConfigurationError,
  ConnectionError,
  AbortError,
  toError,
  type LoopError,
} from '../errors.js';
import { createPacketQueue, type PacketQueue } from './PacketQueue.js';
import { createRateReporter, DEFAULT_RATE_INTERVAL_MS, type RateReporter, type RateSink } from './RateReporter.js';
import { createScheduler, type Scheduler } from './scheduler.js';

export interface AcquisitionLoopConfig {
  id?: string;
  /** Queue bound; 0 = unbounded (default: 1) */
  capacity?: number;
  /** Stamp each packet with scheduler.now() */
  addTimestamp?: boolean;
  /** Overrides the source's own `yields` flag */
  yields?: boolean;
  /** false, true (every 1000ms) or an interval in ms */
  reportRate?: boolean | number;
  onRate?: RateSink;
  scheduler?: Scheduler;
}

export interface AcquisitionLoopStats {
  iterations: number;
  packets: number;
}

export interface AcquisitionLoop<T> {
  readonly id: string;
  readonly queue: PacketQueue<Packet<T>>;
  getState(): LoopState;
  getStats(): AcquisitionLoopStats;
  getLastRate(): RateReport | null;
  getLastError(): LoopError | null;
  /** Run until stopped; resolves with the error that stopped it, if any */
  start(): Promise<Result<void, LoopError>>;
  /** Request a stop and wait for shutdown (session closed) */
  stop(): Promise<void>;
}

let loopCounter = 0;

function classify(err: Error, sourceName: string): LoopError {
  if (err instanceof ConnectionError || err instanceof AcquisitionError) return err;
  return new AcquisitionError(`${sourceName}: ${err.message}`, { cause: err });
}

function resolveRateInterval(reportRate: boolean | number): number | null {
  if (reportRate === false) return null;
  if (reportRate === true) return DEFAULT_RATE_INTERVAL_MS;
  if (!(reportRate > 0)) {
    throw new ConfigurationError(`reportRate interval must be positive, got ${reportRate}`);
  }
  return reportRate;
}

export function createAcquisitionLoop<T>(
  source: DataSource<T>,
  config: AcquisitionLoopConfig = {}
): AcquisitionLoop<T> {
  const id = config.id ?? `${source.name}-${++loopCounter}`;
  const capacity = config.capacity ?? 1;
  const addTimestamp = config.addTimestamp ?? false;
  const yields = config.yields ?? source.yields ?? true;
  const scheduler = config.scheduler ?? createScheduler();
  const channels: readonly (ChannelTag | undefined)[] =
    source.channels && source.channels.length > 0 ? source.channels : [undefined];

  // Eager validation: nothing below may fail once the loop runs
  const queue = createPacketQueue<Packet<T>>(capacity);
  const rateInterval = resolveRateInterval(config.reportRate ?? false);
  const reporter: RateReporter | null = rateInterval === null
    ? null
    : createRateReporter({ loopId: id, scheduler, intervalMs: rateInterval, sink: config.onRate });

  let state: LoopState = 'idle';
  let lastError: LoopError | null = null;
  let iterations = 0;
  let packets = 0;
  const controller = new AbortController();
  let finished: Promise<Result<void, LoopError>> | null = null;

  function makePacket(payload: T, channel: ChannelTag | undefined): Packet<T> {
    const packet: { payload: T; timestamp?: number; channel?: ChannelTag } = { payload };
    if (addTimestamp) packet.timestamp = scheduler.now();
    if (channel !== undefined) packet.channel = channel;
    return Object.freeze(packet);
  }

  async function fetchOne(channel: ChannelTag | undefined): Promise<Result<T, Error>> {
    try {
      return await source.fetch(channel, controller.signal);
    } catch (e) {
      return Err(toError(e));
    }
  }

  // Returns false once a stop has been observed
  async function iterate(): Promise<Result<boolean, LoopError>> {
    for (const channel of channels) {
      if (controller.signal.aborted) return Ok(false);

      const result = await fetchOne(channel);

      // Stop requested while fetching: drop whatever came back
      if (controller.signal.aborted) return Ok(false);
      if (!result.ok) return Err(classify(result.error, source.name));

      try {
        await queue.enqueue(makePacket(result.value, channel), controller.signal);
      } catch {
        // enqueue only rejects on abort
        return Ok(false);
      }
      packets++;
      reporter?.record();

      if (!yields) {
        await scheduler.yield();
      }
    }
    iterations++;
    return Ok(true);
  }

  async function shutdown(): Promise<void> {
    reporter?.stop();
    if (!source.close) return;
    const closed = await source.close();
    if (!closed.ok) {
      console.error(`[AcquisitionLoop] ${id}: close failed:`, closed.error.message);
    }
  }

  async function run(): Promise<Result<void, LoopError>> {
    if (source.open) {
      const opened = await source.open();
      if (!opened.ok) {
        lastError = classify(opened.error, source.name);
        state = 'stopped';
        console.error(`[AcquisitionLoop] ${id}: failed to open: ${lastError.message}`);
        return Err(lastError);
      }
    }

    console.log(`[AcquisitionLoop] ${id}: running (capacity=${capacity}, yields=${yields})`);
    reporter?.start();

    let outcome: Result<void, LoopError> = Ok();
    while (!controller.signal.aborted) {
      const step = await iterate();
      if (!step.ok) {
        lastError = step.error;
        outcome = Err(step.error);
        controller.abort(new AbortError('Loop failed'));
        console.error(`[AcquisitionLoop] ${id}: stopped on error: ${step.error.message}`);
        break;
      }
      if (!step.value) break;
    }

    await shutdown();
    state = 'stopped';
    console.log(`[AcquisitionLoop] ${id}: stopped after ${packets} packet(s)`);
    return outcome;
  }

  return {
    id,
    queue,

    getState(): LoopState {
      return state;
    },

    getStats(): AcquisitionLoopStats {
      return { iterations, packets };
    },

    getLastRate(): RateReport | null {
      return reporter?.getLastReport() ?? null;
    },

    getLastError(): LoopError | null {
      return lastError;
    },

    start(): Promise<Result<void, LoopError>> {
      if (state !== 'idle') {
        return Promise.resolve(Err(new AcquisitionError(`Loop ${id} already ${state}`)));
      }
      state = 'running';
      finished = run();
      return finished;
    },

    async stop(): Promise<void> {
      if (!controller.signal.aborted) {
        controller.abort(new AbortError('Loop stopped'));
      }
      if (state === 'idle') {
        state = 'stopped';
        return;
      }
      if (finished) await finished;
    },
  };
}
