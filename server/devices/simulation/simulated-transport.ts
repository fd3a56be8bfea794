/**
 * Simulated Transport
 * Implements ProtocolClient for simulated instruments
 *
 * Routes SCPI commands to a simulator and returns responses.
 * Adds configurable latency to mimic real device timing.
 */

import type { ProtocolClient } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConnectionError } from '../../errors.js';
import { createCommandLock } from '../transports/lock.js';

export interface SimulatedTransportConfig {
  /** Base latency in ms (default: 5) */
  latencyMs?: number;
  /** Random jitter range in ms (default: 2) */
  jitterMs?: number;
  /** Shown as the transport address */
  name?: string;
}

export type CommandHandler = (cmd: string) => string | Buffer | null;

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): ProtocolClient {
  const { latencyMs = 5, jitterMs = 2, name = 'simulated' } = config;

  let opened = false;

  // Serialize exchanges like the real transports
  const withLock = createCommandLock();

  async function delay(): Promise<void> {
    const jitter = Math.random() * jitterMs;
    const totalDelay = latencyMs + jitter;
    await new Promise(r => setTimeout(r, totalDelay));
  }

  function respond(cmd: string): Buffer | null {
    const response = handler(cmd);
    if (response === null) return null;
    return typeof response === 'string' ? Buffer.from(response, 'ascii') : response;
  }

  function notOpened(): Result<never, ConnectionError> {
    return Err(new ConnectionError(`Transport to ${name} not opened`));
  }

  async function exchange(cmd: string): Promise<string> {
    await delay();
    return respond(cmd)?.toString('ascii').trim() ?? '';
  }

  return {
    address: name,

    async open(): Promise<Result<void, ConnectionError>> {
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, ConnectionError>> {
      await withLock(async () => {
        opened = false;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, ConnectionError>> {
      return withLock(async () => {
        if (!opened) return notOpened();
        return Ok(await exchange(cmd));
      });
    },

    async queryBinary(cmd: string): Promise<Result<Buffer, ConnectionError>> {
      return withLock(async () => {
        if (!opened) return notOpened();
        await delay();
        return Ok(respond(cmd) ?? Buffer.alloc(0));
      });
    },

    async write(cmd: string): Promise<Result<void, ConnectionError>> {
      return withLock(async () => {
        if (!opened) return notOpened();
        await delay();
        handler(cmd);
        return Ok();
      });
    },

    async writeOnce(cmd: string): Promise<Result<void, ConnectionError>> {
      return withLock(async () => {
        await delay();
        handler(cmd);
        return Ok();
      });
    },

    async queryOnce(cmd: string): Promise<Result<string, ConnectionError>> {
      return withLock(async () => Ok(await exchange(cmd)));
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
