import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Duplex } from 'stream';
import { createSiglentSds, createSdsSource, formatTimebase, SDS_DIVISIONS } from '../drivers/siglent-sds.js';
import { createRequestPacer } from '../request-pacer.js';
import { createSimulatedScope } from '../simulation/index.js';
import { createSdsSimulator } from '../simulation/sds-simulator.js';
import { createTcpTransport } from '../transports/tcp.js';
import type { Scheduler } from '../../acquisition/scheduler.js';
import { createAcquisitionLoop } from '../../acquisition/AcquisitionLoop.js';
import { ConfigurationError, ConnectionError } from '../../errors.js';
import { Err } from '../../../shared/types.js';
import { createMockTransport, type MockTransport } from './mock-transport.js';
import { FakeInstrumentSocket } from './fake-instrument.js';
import { createFakeScheduler, type FakeScheduler } from '../../acquisition/__tests__/fake-scheduler.js';

const IDN = 'Siglent Technologies,SDS1202X-E,SDSTEST000001,8.2.6.1.37R2';

// DAT2 block: C1:WF DAT2,#14 + codes 25, -25, 0, 50
function waveformBlock(channel: number): Buffer {
  return Buffer.concat([
    Buffer.from(`C${channel}:WF DAT2,#14`, 'ascii'),
    Buffer.from([25, 256 - 25, 0, 50]),
    Buffer.from('\n\n', 'ascii'),
  ]);
}

function createScopeTransport(): MockTransport {
  return createMockTransport({
    responses: {
      '*IDN?': IDN,
      'TDIV?': 'TDIV 1.00E-03S',
      'C1:VDIV?': 'C1:VDIV 2.00E-01V',
      'C1:OFST?': 'C1:OFST 1.00E-01V',
      'C2:VDIV?': 'C2:VDIV 1.00E+00V',
      'C2:OFST?': 'C2:OFST 0.00E+00V',
    },
    binaryResponses: {
      'C1:WF? DAT2': waveformBlock(1),
      'C2:WF? DAT2': waveformBlock(2),
    },
  });
}

describe('formatTimebase', () => {
  it('formats the 1-2-5 series with instrument units', () => {
    expect(formatTimebase(1e-3)).toEqual({ ok: true, value: '1MS' });
    expect(formatTimebase(0.5)).toEqual({ ok: true, value: '500MS' });
    expect(formatTimebase(5e-6)).toEqual({ ok: true, value: '5US' });
    expect(formatTimebase(20e-9)).toEqual({ ok: true, value: '20NS' });
    expect(formatTimebase(200e-12)).toEqual({ ok: true, value: '200PS' });
    expect(formatTimebase(100)).toEqual({ ok: true, value: '100S' });
  });

  it('rejects values off the series or out of range', () => {
    for (const value of [3e-3, 1000, 100e-12, 0, -1e-3, NaN]) {
      const result = formatTimebase(value);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConfigurationError);
      }
    }
  });
});

describe('Siglent SDS driver', () => {
  let transport: MockTransport;

  beforeEach(async () => {
    transport = createScopeTransport();
    await transport.open();
  });

  it('identifies the instrument', async () => {
    const scope = createSiglentSds(transport);
    expect(await scope.identify()).toEqual({ ok: true, value: IDN });
  });

  it('reads the timebase and the fixed division count', async () => {
    const scope = createSiglentSds(transport);
    expect(await scope.readTimePerDivision()).toEqual({ ok: true, value: 1e-3 });
    expect(await scope.readDivisionCount()).toEqual({ ok: true, value: SDS_DIVISIONS });
    expect(await createSiglentSds(transport, { divisions: 10 }).readDivisionCount()).toEqual({ ok: true, value: 10 });
  });

  it('reports an unparseable answer as a connection error', async () => {
    transport.responses['TDIV?'] = 'TDIV ?';
    const result = await createSiglentSds(transport).readTimePerDivision();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConnectionError);
      expect(result.error.message).toBe('Unexpected response to TDIV?: non-numeric response: "TDIV ?"');
    }
  });

  it('sets the timebase with a unit label', async () => {
    const scope = createSiglentSds(transport);
    expect(await scope.setTimebase(5e-3)).toEqual({ ok: true, value: undefined });
    expect(transport.sentCommands).toEqual(['TDIV 5MS']);
  });

  it('sends nothing for an unsupported timebase', async () => {
    const result = await createSiglentSds(transport).setTimebase(3e-3);
    expect(result.ok).toBe(false);
    expect(transport.sentCommands).toEqual([]);
  });

  describe('getWaveform', () => {
    it('scales codes to volts and spans the full screen', async () => {
      const result = await createSiglentSds(transport).getWaveform(1);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const { channel, volts, timeSpan, xIncrement } = result.value;
      expect(channel).toBe(1);
      // volts = code × 0.2 / 25 − 0.1
      expect(volts).toHaveLength(4);
      expect(volts[0]).toBeCloseTo(0.1, 12);
      expect(volts[1]).toBeCloseTo(-0.3, 12);
      expect(volts[2]).toBeCloseTo(-0.1, 12);
      expect(volts[3]).toBeCloseTo(0.3, 12);
      expect(timeSpan).toBeCloseTo(0.014, 12);
      expect(xIncrement).toBeCloseTo(0.0035, 12);
      expect(transport.sentCommands).toEqual(['C1:WF? DAT2', 'C1:VDIV?', 'C1:OFST?', 'TDIV?']);
    });

    it('skips the timebase query when it is already known', async () => {
      const result = await createSiglentSds(transport).getWaveform(2, 2e-3);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.timeSpan).toBeCloseTo(0.028, 12);
        expect(result.value.volts[0]).toBeCloseTo(1, 12);
      }
      expect(transport.sentCommands).toEqual(['C2:WF? DAT2', 'C2:VDIV?', 'C2:OFST?']);
    });

    it('reports a truncated block', async () => {
      transport.binaryResponses['C1:WF? DAT2'] = Buffer.from('C1:WF DAT2,#210abc', 'ascii');
      const result = await createSiglentSds(transport).getWaveform(1);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Bad waveform block from C1: buffer too short: expected 10 bytes, got 3');
      }
    });

    it('passes transport failures through', async () => {
      const failure = new ConnectionError('Connection to 10.0.0.5:5025 closed');
      transport.failWith(failure);

      expect(await createSiglentSds(transport).getWaveform(1)).toEqual({ ok: false, error: failure });
    });
  });
});

describe('SDS source', () => {
  let scheduler: FakeScheduler;

  beforeEach(() => {
    scheduler = createFakeScheduler();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('validates its channels', () => {
    const scope = createSiglentSds(createScopeTransport());
    const pacer = createRequestPacer(scope, { scheduler });

    expect(() => createSdsSource({ scope, pacer, channels: [] })).toThrow('At least one channel is required');
    expect(() => createSdsSource({ scope, pacer, channels: [1, 5] })).toThrow('Invalid channel 5 (expected 1-4)');
  });

  it('paces every fetch and reuses the pacer timebase', async () => {
    const transport = createScopeTransport();
    const scope = createSiglentSds(transport);
    const pacer = createRequestPacer(scope, { scheduler });
    const source = createSdsSource({ scope, pacer, channels: [2] });
    const signal = new AbortController().signal;

    expect(source.yields).toBe(true);
    expect(await source.open?.()).toEqual({ ok: true, value: undefined });

    const first = await source.fetch(2, signal);
    expect(first.ok).toBe(true);
    expect(transport.sentCommands).toEqual(['*IDN?', 'TDIV?', 'C2:WF? DAT2', 'C2:VDIV?', 'C2:OFST?']);

    transport.reset();
    const second = await source.fetch(undefined, signal);
    expect(second.ok && second.value.channel).toBe(2);
    expect(transport.sentCommands).toEqual(['C2:WF? DAT2', 'C2:VDIV?', 'C2:OFST?']);
    expect(scheduler.sleeps).toHaveLength(1);
    expect(scheduler.sleeps[0]).toBeCloseTo(56, 9);

    await source.close?.();
    expect(transport.isOpen()).toBe(false);
  });

  it('streams alternating channels from the simulated scope', async () => {
    const { scope, simulator } = createSimulatedScope({ points: 140, latencyMs: 0, latencyJitterMs: 0 });
    const pacer = createRequestPacer(scope, { scheduler });
    const source = createSdsSource({ scope, pacer, channels: [1, 2], name: 'sds-sim' });
    const loop = createAcquisitionLoop(source, { capacity: 2, scheduler });
    const running = loop.start();

    const channels: (number | undefined)[] = [];
    for (let i = 0; i < 4; i++) {
      const packet = await loop.queue.dequeue();
      channels.push(packet.channel);
      expect(packet.payload.volts).toHaveLength(140);
      expect(Math.max(...packet.payload.volts.map(Math.abs))).toBeLessThanOrEqual(1.01);
    }
    expect(channels).toEqual([1, 2, 1, 2]);

    await loop.stop();
    expect((await running).ok).toBe(true);
    expect(simulator.getWaveformCount()).toBeGreaterThanOrEqual(4);
    expect(scope.transport.isOpen()).toBe(false);
  });

  it('closes the session when the scope does not identify', async () => {
    const transport = createScopeTransport();
    vi.spyOn(transport, 'query').mockResolvedValueOnce(Err(new ConnectionError('no answer to *IDN?')));
    const scope = createSiglentSds(transport);
    const source = createSdsSource({ scope, pacer: createRequestPacer(scope, { scheduler }), channels: [1] });

    const opened = await source.open?.();
    expect(opened?.ok).toBe(false);
    if (opened && !opened.ok) {
      expect(opened.error.message).toBe('no answer to *IDN?');
    }
    expect(transport.isOpen()).toBe(false);
  });

  it('answers other queries in order while a fetch waits for its pacing slot', async () => {
    const simulator = createSdsSimulator({ points: 14 });
    let socket: FakeInstrumentSocket | null = null;
    const connect = vi.fn(async (): Promise<Duplex> => {
      socket = new FakeInstrumentSocket(cmd => {
        if (cmd === 'A') return 'alpha';
        if (cmd === 'B') return 'beta';
        return simulator.handleCommand(cmd);
      });
      return socket;
    });
    const transport = createTcpTransport({ host: '10.0.0.5', connect });

    // Clock that only moves when the pending pacing wait is released
    let clock = 0;
    const sleeps: number[] = [];
    let release = (): void => {};
    const gated: Scheduler = {
      kind: 'immediate',
      now: () => clock,
      sleep: (ms: number) => new Promise<void>(resolve => {
        sleeps.push(ms);
        release = () => {
          clock += ms;
          resolve();
        };
      }),
      yield: () => Promise.resolve(),
    };

    const scope = createSiglentSds(transport);
    const source = createSdsSource({ scope, pacer: createRequestPacer(scope, { scheduler: gated }), channels: [1] });
    const signal = new AbortController().signal;

    expect(await source.open?.()).toEqual({ ok: true, value: undefined });
    expect((await source.fetch(1, signal)).ok).toBe(true);
    const wire = (): string[] => socket?.received ?? [];
    expect(wire()).toEqual(['*IDN?', 'TDIV?', 'C1:WF? DAT2', 'C1:VDIV?', 'C1:OFST?']);

    const paced = source.fetch(1, signal);
    await vi.waitFor(() => expect(sleeps).toHaveLength(1));
    expect(sleeps[0]).toBeCloseTo(56, 9);

    const [a, b] = await Promise.all([transport.query('A'), transport.query('B')]);
    expect(a).toEqual({ ok: true, value: 'alpha' });
    expect(b).toEqual({ ok: true, value: 'beta' });
    expect(wire().slice(5)).toEqual(['A', 'B']);

    release();
    const frame = await paced;
    expect(frame.ok && frame.value.channel).toBe(1);
    expect(wire().slice(5)).toEqual(['A', 'B', 'C1:WF? DAT2', 'C1:VDIV?', 'C1:OFST?']);

    await source.close?.();
  });
});
