/**
 * PacketQueue - FIFO buffer between a producer and a consumer
 *
 * - capacity 0: unbounded, enqueue never suspends
 * - capacity > 0: enqueue suspends while full (backpressure), so size never exceeds capacity
 * - dequeue suspends while empty
 *
 * Freed slots are handed straight to the longest-waiting producer and new items
 * straight to the longest-waiting consumer, so no caller can jump the line.
 */

import { ConfigurationError, abortReason } from '../errors.js';

export interface PacketQueue<T> {
  readonly capacity: number;
  size(): number;
  enqueue(item: T, signal?: AbortSignal): Promise<void>;
  dequeue(signal?: AbortSignal): Promise<T>;
  /** Remove and return everything currently buffered */
  drain(): T[];
}

interface Waiter<V> {
  resolve(value: V): void;
  reject(reason: Error): void;
  detach(): void;
}

interface PendingPut<T> extends Waiter<void> {
  item: T;
}

export function createPacketQueue<T>(capacity: number): PacketQueue<T> {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new ConfigurationError(`Queue capacity must be a non-negative integer, got ${capacity}`);
  }

  const items: T[] = [];
  const putters: PendingPut<T>[] = [];
  const takers: Waiter<T>[] = [];

  function isFull(): boolean {
    return capacity > 0 && items.length >= capacity;
  }

  // Remove a parked waiter and reject it when its signal aborts; returns the detach hook
  function cancelOnAbort<W extends Waiter<never>>(list: W[], waiter: W, signal?: AbortSignal): () => void {
    if (!signal) return () => {};
    const onAbort = () => {
      const index = list.indexOf(waiter);
      if (index !== -1) list.splice(index, 1);
      waiter.reject(abortReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  }

  return {
    capacity,

    size(): number {
      return items.length;
    },

    enqueue(item: T, signal?: AbortSignal): Promise<void> {
      if (signal?.aborted) {
        return Promise.reject(abortReason(signal));
      }

      // A waiting consumer implies an empty buffer
      const taker = takers.shift();
      if (taker) {
        taker.detach();
        taker.resolve(item);
        return Promise.resolve();
      }

      if (!isFull()) {
        items.push(item);
        return Promise.resolve();
      }

      return new Promise<void>((resolve, reject) => {
        const putter: PendingPut<T> = { item, resolve, reject, detach: () => {} };
        putter.detach = cancelOnAbort(putters, putter, signal);
        putters.push(putter);
      });
    },

    dequeue(signal?: AbortSignal): Promise<T> {
      if (signal?.aborted) {
        return Promise.reject(abortReason(signal));
      }

      if (items.length > 0) {
        const [item] = items.splice(0, 1);
        const putter = putters.shift();
        if (putter) {
          putter.detach();
          items.push(putter.item);
          putter.resolve();
        }
        return Promise.resolve(item);
      }

      return new Promise<T>((resolve, reject) => {
        const taker: Waiter<T> = { resolve, reject, detach: () => {} };
        taker.detach = cancelOnAbort(takers, taker, signal);
        takers.push(taker);
      });
    },

    drain(): T[] {
      const drained = items.splice(0, items.length);
      // Let blocked producers refill the freed slots, oldest first
      while (putters.length > 0 && !isFull()) {
        const putter = putters.shift();
        if (!putter) break;
        putter.detach();
        items.push(putter.item);
        putter.resolve();
      }
      return drained;
    },
  };
}
