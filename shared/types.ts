// Shared types for the acquisition server and its WebSocket clients

// ============ Result Type ============
// Device I/O returns Result<T, E> instead of throwing.
// Try/catch only at boundaries (socket callbacks, user-supplied data sources).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Async wrapper for code that may throw
export const tryResultAsync = async <T>(fn: () => Promise<T>): Promise<Result<T, Error>> => {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
};

// ============ Acquisition Types ============

/** Instrument channel tag (1-based for oscilloscopes) */
export type ChannelTag = number;

/**
 * One unit of acquired data. Frozen once it enters a queue; the consumer
 * owns it after dequeue.
 */
export interface Packet<T> {
  readonly payload: T;
  /** Monotonic milliseconds from the producing loop's scheduler */
  readonly timestamp?: number;
  readonly channel?: ChannelTag;
}

export type LoopState = 'idle' | 'running' | 'stopped';

export interface RateReport {
  loopId: string;
  packets: number;
  elapsedMs: number;
  /** packets per second */
  rate: number;
}

// ============ Payloads ============

export interface ScopeWaveform {
  channel: ChannelTag;
  /** Volts per sample */
  volts: number[];
  /** Seconds between samples */
  xIncrement: number;
  /** Seconds covered by the whole record (time/div × divisions) */
  timeSpan: number;
}

export interface SineFrame {
  x: number[];
  y: number[];
}

// ============ WebSocket Protocol ============

export interface LoopSummary {
  id: string;
  source: string;
  state: LoopState;
  channels: ChannelTag[];
  packets: number;
  queued: number;
  capacity: number;
  lastRate: RateReport | null;
  lastError: string | null;
}

export type ClientMessage =
  | { type: 'getLoops' }
  | { type: 'subscribe'; loopId: string }
  | { type: 'unsubscribe'; loopId: string }
  | { type: 'setTimebase'; loopId: string; secondsPerDivision: number };

export type ServerMessage =
  | { type: 'loops'; loops: LoopSummary[] }
  | { type: 'subscribed'; loopId: string }
  | { type: 'unsubscribed'; loopId: string }
  | { type: 'packet'; loopId: string; packet: Packet<unknown> }
  | { type: 'rate'; report: RateReport }
  | { type: 'loopState'; loopId: string; state: LoopState; error?: string }
  | { type: 'timebaseChanged'; loopId: string; secondsPerDivision: number }
  | { type: 'error'; loopId?: string; code: string; message: string };
