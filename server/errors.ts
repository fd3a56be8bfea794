/**
 * Error taxonomy for the acquisition pipeline
 *
 * - AcquisitionError: a data source failed; its loop stops
 * - ConnectionError: socket connect/send/receive failed
 * - ConfigurationError: bad construction parameters, raised before any run
 * - AbortError: reason for a cancelled wait (not a failure)
 */

export class AcquisitionError extends Error {
  override name = 'AcquisitionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConnectionError extends Error {
  override name = 'ConnectionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigurationError extends Error {
  override name = 'ConfigurationError';
}

export class AbortError extends Error {
  override name = 'AbortError';

  constructor(message = 'Operation aborted') {
    super(message);
  }
}

/** Errors that stop an acquisition loop */
export type LoopError = AcquisitionError | ConnectionError;

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/** The reason an aborted signal carries, normalized to an Error */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new AbortError();
}

export function isAbortError(e: unknown): boolean {
  return e instanceof AbortError || (e instanceof Error && e.name === 'AbortError');
}
