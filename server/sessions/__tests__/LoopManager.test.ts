import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Duplex } from 'stream';
import { createLoopManager, type LoopManager } from '../LoopManager.js';
import { registerLoops } from '../registerLoops.js';
import { loadConfig, type ServerConfig } from '../../config.js';
import type { DataSource } from '../../devices/types.js';
import type { Result, ServerMessage } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConfigurationError } from '../../errors.js';
import { createSdsSimulator } from '../../devices/simulation/sds-simulator.js';
import { createFakeScheduler, type FakeScheduler } from '../../acquisition/__tests__/fake-scheduler.js';
import { FakeInstrumentSocket } from '../../devices/__tests__/fake-instrument.js';

// Yields 0, 1, 2 then fails
function createCountdownSource(): DataSource<number> {
  let calls = 0;
  return {
    name: 'counter',
    fetch(): Result<number, Error> {
      calls++;
      return calls <= 3 ? Ok(calls - 1) : Err(new Error('sensor fault'));
    },
  };
}

function configFrom(env: NodeJS.ProcessEnv): ServerConfig {
  const loaded = loadConfig(env);
  if (!loaded.ok) throw loaded.error;
  return loaded.value;
}

describe('LoopManager', () => {
  let scheduler: FakeScheduler;
  let manager: LoopManager;

  // Wait for a loop to end on its own, then for its final broadcast
  async function untilStopped(loopId: string): Promise<void> {
    await vi.waitFor(() => {
      expect(manager.getLoopSummaries().find(s => s.id === loopId)?.state).toBe('stopped');
    });
    await manager.stopAll();
  }

  beforeEach(() => {
    scheduler = createFakeScheduler();
    manager = createLoopManager();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await manager.stopAll();
    vi.restoreAllMocks();
  });

  it('summarizes idle loops', () => {
    manager.addLoop(createCountdownSource(), { id: 'a', scheduler });

    expect(manager.hasLoop('a')).toBe(true);
    expect(manager.getLoopCount()).toBe(1);
    expect(manager.getLoopSummaries()).toEqual([{
      id: 'a',
      source: 'counter',
      state: 'idle',
      channels: [],
      packets: 0,
      queued: 0,
      capacity: 1,
      lastRate: null,
      lastError: null,
    }]);
  });

  it('refuses duplicate loop ids', () => {
    manager.addLoop(createCountdownSource(), { id: 'a', scheduler });
    expect(() => manager.addLoop(createCountdownSource(), { id: 'a', scheduler })).toThrow('Loop already exists: a');
  });

  it('only subscribes to known loops', () => {
    manager.addLoop(createCountdownSource(), { id: 'a', scheduler });

    expect(manager.subscribe('missing', 'client-1', vi.fn())).toBe(false);
    expect(manager.subscribe('a', 'client-1', vi.fn())).toBe(true);
    expect(manager.isSubscribed('a', 'client-1')).toBe(true);

    manager.unsubscribe('a', 'client-1');
    expect(manager.isSubscribed('a', 'client-1')).toBe(false);
  });

  it('streams packets and the final state to subscribers', async () => {
    manager.addLoop(createCountdownSource(), { id: 'a', capacity: 0, scheduler });
    const received: ServerMessage[] = [];
    manager.subscribe('a', 'client-1', message => received.push(message));

    manager.startAll();
    await untilStopped('a');

    expect(received).toEqual([
      { type: 'loopState', loopId: 'a', state: 'running' },
      { type: 'packet', loopId: 'a', packet: { payload: 0 } },
      { type: 'packet', loopId: 'a', packet: { payload: 1 } },
      { type: 'packet', loopId: 'a', packet: { payload: 2 } },
      { type: 'loopState', loopId: 'a', state: 'stopped', error: 'counter: sensor fault' },
    ]);
    expect(manager.getLoopSummaries()[0]).toMatchObject({
      state: 'stopped',
      packets: 3,
      queued: 0,
      lastError: 'counter: sensor fault',
    });
  });

  it('stops delivering to clients that left', async () => {
    manager.addLoop(createCountdownSource(), { id: 'a', capacity: 0, scheduler });
    const stayed = vi.fn();
    const left = vi.fn();
    manager.subscribe('a', 'client-1', stayed);
    manager.subscribe('a', 'client-2', left);
    manager.unsubscribeAll('client-2');

    manager.startAll();
    await untilStopped('a');

    expect(stayed).toHaveBeenCalledTimes(5);
    expect(left).not.toHaveBeenCalled();
  });

  it('keeps delivering when one subscriber throws', async () => {
    manager.addLoop(createCountdownSource(), { id: 'a', capacity: 0, scheduler });
    const healthy = vi.fn();
    manager.subscribe('a', 'client-1', () => {
      throw new Error('socket gone');
    });
    manager.subscribe('a', 'client-2', healthy);

    manager.startAll();
    await untilStopped('a');

    expect(healthy).toHaveBeenCalledTimes(5);
  });

  describe('setTimebase', () => {
    it('reports unknown loops and loops without a timebase', async () => {
      manager.addLoop(createCountdownSource(), { id: 'a', scheduler });

      const missing = await manager.setTimebase('b', 1e-3);
      expect(missing.ok).toBe(false);
      if (!missing.ok) expect(missing.error.message).toBe('Loop not found: b');

      const unsupported = await manager.setTimebase('a', 1e-3);
      expect(unsupported.ok).toBe(false);
      if (!unsupported.ok) expect(unsupported.error.message).toBe('Loop a has no timebase control');
    });

    it('broadcasts a successful change', async () => {
      const setTimebase = vi.fn(async (): Promise<Result<void, Error>> => Ok());
      manager.addLoop(createCountdownSource(), { id: 'a', scheduler, timebase: { setTimebase } });
      const received: ServerMessage[] = [];
      manager.subscribe('a', 'client-1', message => received.push(message));

      expect(await manager.setTimebase('a', 2e-3)).toEqual({ ok: true, value: undefined });
      expect(setTimebase).toHaveBeenCalledWith(2e-3);
      expect(received).toEqual([{ type: 'timebaseChanged', loopId: 'a', secondsPerDivision: 2e-3 }]);
    });

    it('passes failures back without broadcasting', async () => {
      const failure = new ConfigurationError('Unsupported timebase 0.003 s/div (1-2-5 series, 200ps to 100s)');
      const setTimebase = vi.fn(async (): Promise<Result<void, Error>> => Err(failure));
      manager.addLoop(createCountdownSource(), { id: 'a', scheduler, timebase: { setTimebase } });
      const received = vi.fn();
      manager.subscribe('a', 'client-1', received);

      expect(await manager.setTimebase('a', 3e-3)).toEqual({ ok: false, error: failure });
      expect(received).not.toHaveBeenCalled();
    });
  });

  describe('registerLoops', () => {
    it('adds the FM sine demo loop', () => {
      const ids = registerLoops(manager, configFrom({ SOURCE: 'fm-sine', MAX_QUEUE_SIZE: '0' }), { scheduler });

      expect(ids).toEqual(['fm-sine']);
      expect(manager.getLoopSummaries()[0]).toMatchObject({ id: 'fm-sine', source: 'fm-sine', capacity: 0 });
    });

    it('adds a simulated scope loop', () => {
      const ids = registerLoops(manager, configFrom({ SIMULATE: 'true', SCOPE_CHANNELS: '1,2' }), {
        scheduler,
        env: {},
      });

      expect(ids).toEqual(['sds-sim']);
      expect(manager.getLoopSummaries()[0]).toMatchObject({ id: 'sds-sim', source: 'sds-sim', channels: [1, 2] });
    });

    it('streams from networked scopes and retunes their timebase', async () => {
      const simulator = createSdsSimulator({ points: 28 });
      const connect = vi.fn(async (): Promise<Duplex> => new FakeInstrumentSocket(cmd => simulator.handleCommand(cmd)));
      const config = configFrom({ SCOPES: '10.0.0.5', SCOPE_CHANNELS: '2' });

      const ids = registerLoops(manager, config, { scheduler, connect });
      expect(ids).toEqual(['sds-10.0.0.5:5025']);

      const packets = vi.fn();
      manager.subscribe('sds-10.0.0.5:5025', 'client-1', message => {
        if (message.type === 'packet') packets(message.packet.channel);
      });
      manager.startAll();
      await vi.waitFor(() => expect(packets.mock.calls.length).toBeGreaterThanOrEqual(2));
      expect(packets).toHaveBeenCalledWith(2);

      expect(await manager.setTimebase('sds-10.0.0.5:5025', 5e-3)).toEqual({ ok: true, value: undefined });
      expect(simulator.getTimePerDivision()).toBeCloseTo(5e-3, 12);

      await manager.stopAll();
      expect(manager.getLoopSummaries()[0]).toMatchObject({ state: 'stopped', lastError: null });
    });
  });
});
