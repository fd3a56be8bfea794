/**
 * Command lock - serializes exchanges on one session so a response can only
 * belong to the request that was sent last.
 */

export type WithLock = <T>(fn: () => Promise<T>) => Promise<T>;

export function createCommandLock(): WithLock {
  let tail: Promise<void> = Promise.resolve();

  return function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = tail.then(fn);
    // Next holder waits for this one whether it succeeded or not
    tail = run.then(() => undefined, () => undefined);
    return run;
  };
}
