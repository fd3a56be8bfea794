/**
 * Server configuration (defaults, overridable by ENV)
 *
 *   PORT             HTTP/WebSocket port (3001)
 *   SOURCE           'sds' | 'fm-sine' (sds)
 *   SIMULATE         use a simulated scope instead of SCOPES (false)
 *   SCOPES           comma-separated host[:port] list, one loop each
 *   SCOPE_CHANNELS   channels to cycle over (1)
 *   SCOPE_DIVISIONS  horizontal divisions (14)
 *   MAX_QUEUE_SIZE   queue bound per loop, 0 = unbounded (1)
 *   YIELDS           override the source's yields flag
 *   ADD_TIMESTAMP    stamp packets (false)
 *   REPORT_RATE      false | true | interval in ms (false)
 *   PACING_FACTOR    request pacing safety factor (4)
 *   SCHEDULER        'immediate' | 'timeout' (immediate)
 *   SCPI_TIMEOUT_MS  response timeout, 0 = none (0)
 */

import type { ChannelTag, Result } from '../shared/types.js';
import { Ok, Err } from '../shared/types.js';
import { ConfigurationError } from './errors.js';
import { isSchedulerKind, type SchedulerKind } from './acquisition/scheduler.js';
import { DEFAULT_PACING_FACTOR } from './devices/request-pacer.js';
import { DEFAULT_SCPI_PORT } from './devices/transports/tcp.js';
import { SDS_DIVISIONS } from './devices/drivers/siglent-sds.js';

export type SourceKind = 'sds' | 'fm-sine';

export interface ScopeAddress {
  host: string;
  port: number;
}

export interface ServerConfig {
  port: number;
  source: SourceKind;
  simulate: boolean;
  scopes: ScopeAddress[];
  channels: ChannelTag[];
  divisions: number;
  maxQueueSize: number;
  yields: boolean | undefined;
  addTimestamp: boolean;
  reportRate: boolean | number;
  pacingFactor: number;
  scheduler: SchedulerKind;
  scpiTimeoutMs: number;
}

function parseBool(name: string, value: string | undefined, defaultVal: boolean): Result<boolean, ConfigurationError> {
  if (value === undefined || value === '') return Ok(defaultVal);
  const lower = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lower)) return Ok(true);
  if (['0', 'false', 'no', 'off'].includes(lower)) return Ok(false);
  return Err(new ConfigurationError(`${name} must be a boolean, got "${value}"`));
}

function parseNumber(
  name: string,
  value: string | undefined,
  defaultVal: number,
  check: (n: number) => boolean,
  expected: string
): Result<number, ConfigurationError> {
  if (value === undefined || value === '') return Ok(defaultVal);
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !check(parsed)) {
    return Err(new ConfigurationError(`${name} must be ${expected}, got "${value}"`));
  }
  return Ok(parsed);
}

const isNonNegativeInt = (n: number) => Number.isInteger(n) && n >= 0;
const isPositiveInt = (n: number) => Number.isInteger(n) && n > 0;

export function parseScopeAddress(entry: string): Result<ScopeAddress, ConfigurationError> {
  const trimmed = entry.trim();
  const match = trimmed.match(/^([^:\s]+)(?::(\d+))?$/);
  if (!match) {
    return Err(new ConfigurationError(`Invalid scope address "${entry}" (expected host[:port])`));
  }
  const [, host, portStr] = match;
  const port = portStr ? parseInt(portStr, 10) : DEFAULT_SCPI_PORT;
  if (port < 1 || port > 65535) {
    return Err(new ConfigurationError(`Invalid port in scope address "${entry}"`));
  }
  return Ok({ host, port });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<ServerConfig, ConfigurationError> {
  const port = parseNumber('PORT', env.PORT, 3001, isPositiveInt, 'a port number');
  if (!port.ok) return port;

  const sourceName = (env.SOURCE || 'sds').trim();
  if (sourceName !== 'sds' && sourceName !== 'fm-sine') {
    return Err(new ConfigurationError(`SOURCE must be "sds" or "fm-sine", got "${sourceName}"`));
  }
  const source: SourceKind = sourceName;

  const simulate = parseBool('SIMULATE', env.SIMULATE, false);
  if (!simulate.ok) return simulate;

  const scopes: ScopeAddress[] = [];
  for (const entry of (env.SCOPES ?? '').split(',').filter(s => s.trim() !== '')) {
    const address = parseScopeAddress(entry);
    if (!address.ok) return address;
    scopes.push(address.value);
  }
  if (source === 'sds' && !simulate.value && scopes.length === 0) {
    return Err(new ConfigurationError('SCOPES is required unless SIMULATE=true or SOURCE=fm-sine'));
  }

  const channels: ChannelTag[] = [];
  for (const entry of (env.SCOPE_CHANNELS || '1').split(',')) {
    const channel = Number(entry.trim());
    if (!Number.isInteger(channel) || channel < 1 || channel > 4) {
      return Err(new ConfigurationError(`SCOPE_CHANNELS entries must be 1-4, got "${entry}"`));
    }
    channels.push(channel);
  }

  const divisions = parseNumber('SCOPE_DIVISIONS', env.SCOPE_DIVISIONS, SDS_DIVISIONS, isPositiveInt, 'a positive integer');
  if (!divisions.ok) return divisions;

  const maxQueueSize = parseNumber('MAX_QUEUE_SIZE', env.MAX_QUEUE_SIZE, 1, isNonNegativeInt, 'a non-negative integer');
  if (!maxQueueSize.ok) return maxQueueSize;

  let yields: boolean | undefined;
  if (env.YIELDS !== undefined && env.YIELDS !== '') {
    const parsed = parseBool('YIELDS', env.YIELDS, true);
    if (!parsed.ok) return parsed;
    yields = parsed.value;
  }

  const addTimestamp = parseBool('ADD_TIMESTAMP', env.ADD_TIMESTAMP, false);
  if (!addTimestamp.ok) return addTimestamp;

  let reportRate: boolean | number = false;
  if (env.REPORT_RATE !== undefined && env.REPORT_RATE !== '') {
    const asBool = parseBool('REPORT_RATE', env.REPORT_RATE, false);
    if (asBool.ok) {
      reportRate = asBool.value;
    } else {
      const interval = parseNumber('REPORT_RATE', env.REPORT_RATE, 0, n => n > 0, 'a boolean or a positive interval in ms');
      if (!interval.ok) return interval;
      reportRate = interval.value;
    }
  }

  const pacingFactor = parseNumber('PACING_FACTOR', env.PACING_FACTOR, DEFAULT_PACING_FACTOR, n => n > 0, 'a positive number');
  if (!pacingFactor.ok) return pacingFactor;

  const schedulerName = (env.SCHEDULER || 'immediate').trim();
  if (!isSchedulerKind(schedulerName)) {
    return Err(new ConfigurationError(`SCHEDULER must be "immediate" or "timeout", got "${schedulerName}"`));
  }

  const scpiTimeoutMs = parseNumber('SCPI_TIMEOUT_MS', env.SCPI_TIMEOUT_MS, 0, isNonNegativeInt, 'a non-negative integer');
  if (!scpiTimeoutMs.ok) return scpiTimeoutMs;

  return Ok({
    port: port.value,
    source,
    simulate: simulate.value,
    scopes,
    channels,
    divisions: divisions.value,
    maxQueueSize: maxQueueSize.value,
    yields,
    addTimestamp: addTimestamp.value,
    reportRate,
    pacingFactor: pacingFactor.value,
    scheduler: schedulerName,
    scpiTimeoutMs: scpiTimeoutMs.value,
  });
}
