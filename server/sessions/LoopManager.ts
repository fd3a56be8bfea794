/**
 * LoopManager - Creates and runs AcquisitionLoop instances
 *
 * - One consumer pump per loop, fanning packets out to subscribed clients
 * - Rate reports and state changes are broadcast to every subscriber of a loop
 * - Loops that fail stay listed (stopped, with their last error)
 * - Timebase changes go through the loop's control and re-arm its pacer
 */

import type { ChannelTag, LoopSummary, Packet, RateReport, Result, ServerMessage } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import type { DataSource } from '../devices/types.js';
import { createAcquisitionLoop, type AcquisitionLoop, type AcquisitionLoopConfig } from '../acquisition/AcquisitionLoop.js';
import { runConsumer } from '../acquisition/consumer.js';

type SubscriberCallback = (message: ServerMessage) => void;

/** Instrument-side controls a loop may expose */
export interface TimebaseControl {
  setTimebase(secondsPerDivision: number): Promise<Result<void, Error>>;
}

export interface AddLoopOptions extends Omit<AcquisitionLoopConfig, 'id'> {
  id: string;
  timebase?: TimebaseControl;
}

export interface LoopManager {
  addLoop<T>(source: DataSource<T>, options: AddLoopOptions): AcquisitionLoop<T>;
  hasLoop(loopId: string): boolean;
  getLoopCount(): number;
  getLoopSummaries(): LoopSummary[];

  /** Start every idle loop and its consumer pump */
  startAll(): void;
  /** Stop every loop and wait for sessions to close */
  stopAll(): Promise<void>;

  subscribe(loopId: string, clientId: string, callback: SubscriberCallback): boolean;
  unsubscribe(loopId: string, clientId: string): void;
  unsubscribeAll(clientId: string): void;
  isSubscribed(loopId: string, clientId: string): boolean;

  setTimebase(loopId: string, secondsPerDivision: number): Promise<Result<void, Error>>;
}

interface ManagedLoop {
  loop: AcquisitionLoop<unknown>;
  source: string;
  channels: ChannelTag[];
  timebase?: TimebaseControl;
  subscribers: Map<string, SubscriberCallback>;
  pump: AbortController;
  running: Promise<void> | null;
}

export function createLoopManager(): LoopManager {
  const loops = new Map<string, ManagedLoop>();

  function broadcast(managed: ManagedLoop, message: ServerMessage): void {
    for (const callback of managed.subscribers.values()) {
      try {
        callback(message);
      } catch (err) {
        console.error(`[LoopManager] Subscriber callback failed for ${managed.loop.id}:`, err);
      }
    }
  }

  function addLoop<T>(source: DataSource<T>, options: AddLoopOptions): AcquisitionLoop<T> {
    const { timebase, onRate, ...loopConfig } = options;
    if (loops.has(options.id)) {
      throw new Error(`Loop already exists: ${options.id}`);
    }

    let managed: ManagedLoop | null = null;
    const loop = createAcquisitionLoop(source, {
      ...loopConfig,
      onRate: async (report: RateReport) => {
        if (managed) broadcast(managed, { type: 'rate', report });
        if (onRate) await onRate(report);
      },
    });

    managed = {
      loop,
      source: source.name,
      channels: source.channels ? [...source.channels] : [],
      timebase,
      subscribers: new Map(),
      pump: new AbortController(),
      running: null,
    };
    loops.set(loop.id, managed);
    console.log(`[LoopManager] Created loop: ${loop.id} (${source.name})`);
    return loop;
  }

  async function runManaged(managed: ManagedLoop): Promise<void> {
    const { loop } = managed;
    broadcast(managed, { type: 'loopState', loopId: loop.id, state: 'running' });

    const pumped = runConsumer(
      loop.queue,
      (packet: Packet<unknown>) => broadcast(managed, { type: 'packet', loopId: loop.id, packet }),
      managed.pump.signal
    );

    const outcome = await loop.start();

    managed.pump.abort();
    const delivered = await pumped;
    if (!delivered.ok) {
      console.error(`[LoopManager] Consumer for ${loop.id} failed:`, delivered.error.message);
    }
    // Packets still buffered when the loop ended
    for (const packet of loop.queue.drain()) {
      broadcast(managed, { type: 'packet', loopId: loop.id, packet });
    }

    if (outcome.ok) {
      broadcast(managed, { type: 'loopState', loopId: loop.id, state: 'stopped' });
    } else {
      broadcast(managed, { type: 'loopState', loopId: loop.id, state: 'stopped', error: outcome.error.message });
    }
  }

  function startAll(): void {
    for (const managed of loops.values()) {
      if (managed.running || managed.loop.getState() !== 'idle') continue;
      managed.running = runManaged(managed).catch((err: unknown) => {
        console.error(`[LoopManager] Loop ${managed.loop.id} crashed:`, err);
      });
    }
  }

  async function stopAll(): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const managed of loops.values()) {
      pending.push(managed.loop.stop());
      if (managed.running) pending.push(managed.running);
    }
    await Promise.all(pending);
  }

  function getLoopSummaries(): LoopSummary[] {
    const summaries: LoopSummary[] = [];
    for (const managed of loops.values()) {
      const { loop } = managed;
      summaries.push({
        id: loop.id,
        source: managed.source,
        state: loop.getState(),
        channels: managed.channels,
        packets: loop.getStats().packets,
        queued: loop.queue.size(),
        capacity: loop.queue.capacity,
        lastRate: loop.getLastRate(),
        lastError: loop.getLastError()?.message ?? null,
      });
    }
    return summaries;
  }

  function subscribe(loopId: string, clientId: string, callback: SubscriberCallback): boolean {
    const managed = loops.get(loopId);
    if (!managed) return false;
    managed.subscribers.set(clientId, callback);
    return true;
  }

  function unsubscribe(loopId: string, clientId: string): void {
    loops.get(loopId)?.subscribers.delete(clientId);
  }

  function unsubscribeAll(clientId: string): void {
    for (const managed of loops.values()) {
      managed.subscribers.delete(clientId);
    }
  }

  function isSubscribed(loopId: string, clientId: string): boolean {
    return loops.get(loopId)?.subscribers.has(clientId) ?? false;
  }

  async function setTimebase(loopId: string, secondsPerDivision: number): Promise<Result<void, Error>> {
    const managed = loops.get(loopId);
    if (!managed) {
      return Err(new Error(`Loop not found: ${loopId}`));
    }
    if (!managed.timebase) {
      return Err(new Error(`Loop ${loopId} has no timebase control`));
    }

    const result = await managed.timebase.setTimebase(secondsPerDivision);
    if (!result.ok) return result;

    broadcast(managed, { type: 'timebaseChanged', loopId, secondsPerDivision });
    return Ok();
  }

  return {
    addLoop,
    hasLoop: (loopId: string) => loops.has(loopId),
    getLoopCount: () => loops.size,
    getLoopSummaries,
    startAll,
    stopAll,
    subscribe,
    unsubscribe,
    unsubscribeAll,
    isSubscribed,
    setTimebase,
  };
}
