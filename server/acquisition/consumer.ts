/**
 * Consumer pump - drains a PacketQueue into a callback in FIFO order
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { isAbortError, toError } from '../errors.js';
import type { PacketQueue } from './PacketQueue.js';

export type Consumer<T> = (item: T) => void | Promise<void>;

/**
 * Deliver items until `signal` aborts. Resolves with the number delivered, or
 * with the consumer's error if it throws (the pump stops there).
 */
export async function runConsumer<T>(
  queue: PacketQueue<T>,
  consumer: Consumer<T>,
  signal: AbortSignal
): Promise<Result<number, Error>> {
  let delivered = 0;

  while (!signal.aborted) {
    let item: T;
    try {
      item = await queue.dequeue(signal);
    } catch (e) {
      if (isAbortError(e) || signal.aborted) break;
      return Err(toError(e));
    }

    try {
      await consumer(item);
    } catch (e) {
      return Err(toError(e));
    }
    delivered++;
  }

  return Ok(delivered);
}
