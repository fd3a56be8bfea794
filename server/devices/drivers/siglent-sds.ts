/**
 * Siglent SDS1000X-E / SDS2000X Series Oscilloscope Driver
 *
 * Only what live acquisition needs: timebase and division count (for pacing),
 * timebase changes, and the raw waveform fetch with its vertical scaling.
 */

import type { ChannelTag, DataSource, PacingParameters, ScopeWaveform, Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConfigurationError, ConnectionError } from '../../errors.js';
import { ScpiParser } from '../scpi-parser.js';
import type { RequestPacer } from '../request-pacer.js';

/** Horizontal divisions on the SDS1202X-E screen; the instrument has no query for it */
export const SDS_DIVISIONS = 14;

/** Vertical codes per division in DAT2 waveform data */
const CODES_PER_DIVISION = 25;

const MAX_CHANNEL = 4;

// Timebase units, largest first
const TIMEBASE_UNITS: ReadonlyArray<[suffix: string, seconds: number]> = [
  ['S', 1],
  ['MS', 1e-3],
  ['US', 1e-6],
  ['NS', 1e-9],
  ['PS', 1e-12],
];

const TIMEBASE_MANTISSAS = new Set([1, 2, 5, 10, 20, 50, 100, 200, 500]);
const MIN_TIMEBASE = 200e-12;
const MAX_TIMEBASE = 100;

export interface SiglentSdsOptions {
  divisions?: number;
}

export interface SiglentSds extends PacingParameters {
  readonly transport: Transport;
  readonly divisions: number;
  identify(): Promise<Result<string, ConnectionError>>;
  setTimebase(secondsPerDivision: number): Promise<Result<void, ConnectionError | ConfigurationError>>;
  readVoltsPerDivision(channel: ChannelTag): Promise<Result<number, ConnectionError>>;
  readOffset(channel: ChannelTag): Promise<Result<number, ConnectionError>>;
  /** `timePerDivision` skips the TDIV? round-trip when the caller already knows it */
  getWaveform(channel: ChannelTag, timePerDivision?: number): Promise<Result<ScopeWaveform, ConnectionError>>;
}

/**
 * Format seconds/div as an SDS timebase label (0.001 -> "1MS").
 * Only the 1-2-5 series from 200PS to 100S is accepted.
 */
export function formatTimebase(secondsPerDivision: number): Result<string, ConfigurationError> {
  const invalid = () => Err(new ConfigurationError(
    `Unsupported timebase ${secondsPerDivision} s/div (1-2-5 series, 200ps to 100s)`
  ));

  if (!Number.isFinite(secondsPerDivision) ||
      secondsPerDivision < MIN_TIMEBASE * 0.999 ||
      secondsPerDivision > MAX_TIMEBASE * 1.001) {
    return invalid();
  }

  for (const [suffix, scale] of TIMEBASE_UNITS) {
    const ratio = secondsPerDivision / scale;
    if (ratio < 0.999) continue;
    const mantissa = Math.round(ratio);
    if (Math.abs(ratio - mantissa) > mantissa * 1e-6 || !TIMEBASE_MANTISSAS.has(mantissa)) {
      return invalid();
    }
    return Ok(`${mantissa}${suffix}`);
  }

  return invalid();
}

export function createSiglentSds(transport: Transport, options: SiglentSdsOptions = {}): SiglentSds {
  const divisions = options.divisions ?? SDS_DIVISIONS;

  async function queryNumber(cmd: string): Promise<Result<number, ConnectionError>> {
    const response = await transport.query(cmd);
    if (!response.ok) return response;
    const parsed = ScpiParser.parseNumber(response.value);
    if (!parsed.ok) {
      return Err(new ConnectionError(`Unexpected response to ${cmd}: ${parsed.error}`));
    }
    return parsed;
  }

  const scope: SiglentSds = {
    transport,
    divisions,

    async identify(): Promise<Result<string, ConnectionError>> {
      return transport.query('*IDN?');
    },

    async readTimePerDivision(): Promise<Result<number, ConnectionError>> {
      return queryNumber('TDIV?');
    },

    async readDivisionCount(): Promise<Result<number, ConnectionError>> {
      return Ok(divisions);
    },

    async setTimebase(secondsPerDivision: number): Promise<Result<void, ConnectionError | ConfigurationError>> {
      const label = formatTimebase(secondsPerDivision);
      if (!label.ok) return label;
      return transport.write(`TDIV ${label.value}`);
    },

    async readVoltsPerDivision(channel: ChannelTag): Promise<Result<number, ConnectionError>> {
      return queryNumber(`C${channel}:VDIV?`);
    },

    async readOffset(channel: ChannelTag): Promise<Result<number, ConnectionError>> {
      return queryNumber(`C${channel}:OFST?`);
    },

    async getWaveform(channel: ChannelTag, timePerDivision?: number): Promise<Result<ScopeWaveform, ConnectionError>> {
      const raw = await transport.queryBinary(`C${channel}:WF? DAT2`);
      if (!raw.ok) return raw;

      const block = ScpiParser.parseDefiniteLengthBlock(raw.value);
      if (!block.ok) {
        return Err(new ConnectionError(`Bad waveform block from C${channel}: ${block.error}`));
      }

      const vdiv = await scope.readVoltsPerDivision(channel);
      if (!vdiv.ok) return vdiv;

      const offset = await scope.readOffset(channel);
      if (!offset.ok) return offset;

      let tdiv = timePerDivision;
      if (tdiv === undefined) {
        const queried = await scope.readTimePerDivision();
        if (!queried.ok) return queried;
        tdiv = queried.value;
      }

      // DAT2 samples are signed bytes: volts = code × vdiv / 25 − offset
      const codes = new Int8Array(block.value.buffer, block.value.byteOffset, block.value.length);
      const volts = Array.from(codes, code => (code * vdiv.value) / CODES_PER_DIVISION - offset.value);

      const timeSpan = tdiv * divisions;
      return Ok({
        channel,
        volts,
        xIncrement: volts.length > 0 ? timeSpan / volts.length : 0,
        timeSpan,
      });
    },
  };

  return scope;
}

export interface SdsSourceConfig {
  scope: SiglentSds;
  pacer: RequestPacer;
  channels: readonly ChannelTag[];
  name?: string;
}

/**
 * Live waveform source cycling over `channels`, one paced fetch per channel.
 * Owns the scope session: opened when the loop starts, closed when it stops.
 */
export function createSdsSource(config: SdsSourceConfig): DataSource<ScopeWaveform> {
  const { scope, pacer, channels, name = 'sds' } = config;

  if (channels.length === 0) {
    throw new ConfigurationError('At least one channel is required');
  }
  for (const channel of channels) {
    if (!Number.isInteger(channel) || channel < 1 || channel > MAX_CHANNEL) {
      throw new ConfigurationError(`Invalid channel ${channel} (expected 1-${MAX_CHANNEL})`);
    }
  }

  return {
    name,
    yields: true,
    channels: [...channels],

    async open(): Promise<Result<void, Error>> {
      const opened = await scope.transport.open();
      if (!opened.ok) return opened;

      const idn = await scope.identify();
      if (!idn.ok) {
        const closed = await scope.transport.close();
        if (!closed.ok) {
          console.error(`[SdsSource] ${name}: close failed:`, closed.error.message);
        }
        return idn;
      }
      console.log(`[SdsSource] ${name}: connected to ${idn.value}`);
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      return scope.transport.close();
    },

    async fetch(channel: ChannelTag | undefined, signal: AbortSignal): Promise<Result<ScopeWaveform, Error>> {
      const target = channel ?? channels[0];

      const paced = await pacer.acquire(signal);
      if (!paced.ok) return paced;

      const tdiv = pacer.getState().timePerDivision;
      return scope.getWaveform(target, tdiv ?? undefined);
    },
  };
}
