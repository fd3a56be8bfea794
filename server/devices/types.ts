// Re-export shared types
export * from '../../shared/types.js';

import type { Result, ChannelTag } from '../../shared/types.js';
import type { ConnectionError } from '../errors.js';

// Server-only types

/**
 * Line-oriented SCPI session to one instrument.
 *
 * Every call goes through one lock: a single request is outstanding at a time and
 * responses are matched to requests by program order only.
 */
export interface Transport {
  open(): Promise<Result<void, ConnectionError>>;
  close(): Promise<Result<void, ConnectionError>>;
  query(cmd: string): Promise<Result<string, ConnectionError>>;
  /** Query whose response ends in an IEEE 488.2 definite-length block (#NLLL...data) */
  queryBinary(cmd: string): Promise<Result<Buffer, ConnectionError>>;
  write(cmd: string): Promise<Result<void, ConnectionError>>;
  isOpen(): boolean;
}

/**
 * Transport that can also run a self-contained exchange on a connection of its
 * own, without an open session (setup scripts, one-off settings).
 */
export interface ProtocolClient extends Transport {
  readonly address: string;
  writeOnce(cmd: string): Promise<Result<void, ConnectionError>>;
  queryOnce(cmd: string): Promise<Result<string, ConnectionError>>;
}

/** The two live device values request pacing depends on */
export interface PacingParameters {
  /** Seconds per horizontal division */
  readTimePerDivision(): Promise<Result<number, ConnectionError>>;
  readDivisionCount(): Promise<Result<number, ConnectionError>>;
}

/**
 * Data source contract for an acquisition loop.
 *
 * `fetch` is invoked once per iteration, or once per channel per iteration when
 * `channels` is set. It may suspend (cooperative) or run to completion without
 * suspending; `yields` says which.
 *
 * A source with `yields: true` that never actually gives up the event loop,
 * feeding an unbounded queue, starves every other task in the process. Keeping
 * that promise is the source author's obligation.
 */
export interface DataSource<T> {
  readonly name: string;
  /** false when fetch never suspends; the loop then yields on its behalf */
  readonly yields?: boolean;
  readonly channels?: readonly ChannelTag[];
  fetch(channel: ChannelTag | undefined, signal: AbortSignal): Result<T, Error> | Promise<Result<T, Error>>;
  /** Open the session, if the source has one */
  open?(): Promise<Result<void, Error>>;
  /** Close the session; called once when the loop stops */
  close?(): Promise<Result<void, Error>>;
}
