/**
 * TCP Transport
 * Line-oriented SCPI over a raw socket (LAN instruments, usually port 5025)
 *
 * - Commands go out as ASCII terminated by '\n'; commands get no response
 * - Queries get exactly one '\n'-terminated response line
 * - Binary queries end in an IEEE 488.2 definite length block; trailing
 *   newlines after the block are skipped before the next response
 * - One lock for every exchange, including the self-contained *Once variants
 */

import { createConnection } from 'net';
import type { Duplex } from 'stream';
import type { ProtocolClient } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, tryResultAsync } from '../../../shared/types.js';
import { ConnectionError, toError } from '../../errors.js';
import { ScpiParser } from '../scpi-parser.js';
import { createCommandLock } from './lock.js';

export const DEFAULT_SCPI_PORT = 5025;

export type SocketFactory = (host: string, port: number) => Promise<Duplex>;

export interface TcpConfig {
  host: string;
  port?: number;
  /** Response timeout in ms; 0 waits forever (default: 0) */
  timeoutMs?: number;
  /** Socket factory (default: net.createConnection) */
  connect?: SocketFactory;
}

type ResponseKind = 'line' | 'block';

interface PendingRead {
  kind: ResponseKind;
  resolve(value: Buffer): void;
  reject(reason: ConnectionError): void;
}

interface ResponseReader {
  read(kind: ResponseKind): Promise<Buffer>;
  fail(error: ConnectionError): void;
}

const LF = 0x0a;
const CR = 0x0d;

export const connectSocket: SocketFactory = (host, port) =>
  new Promise<Duplex>((resolve, reject) => {
    const socket = createConnection({ host, port });
    const onError = (err: Error) => {
      socket.destroy();
      reject(err);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.removeListener('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });

// Buffers incoming bytes and hands out one complete response per read()
function createResponseReader(socket: Duplex): ResponseReader {
  let buffered: Buffer = Buffer.alloc(0);
  let pending: PendingRead | null = null;
  let failure: ConnectionError | null = null;
  // Set after a block response until its trailing terminators are consumed
  let afterBlock = false;

  function settle(): void {
    if (!pending) return;

    if (afterBlock) {
      let skip = 0;
      while (skip < buffered.length && (buffered[skip] === LF || buffered[skip] === CR)) skip++;
      if (skip > 0) buffered = buffered.subarray(skip);
      if (buffered.length === 0) return;
      afterBlock = false;
    }

    const current = pending;
    if (current.kind === 'line') {
      const end = buffered.indexOf(LF);
      if (end === -1) return;
      const line = Buffer.from(buffered.subarray(0, end));
      buffered = buffered.subarray(end + 1);
      pending = null;
      current.resolve(line);
      return;
    }

    const located = ScpiParser.locateDefiniteLengthBlock(buffered);
    if (!located.ok) {
      if (located.error === 'incomplete') return;
      buffered = Buffer.alloc(0);
      pending = null;
      current.reject(new ConnectionError(`Malformed block response: ${located.error}`));
      return;
    }
    if (buffered.length < located.value.end) return;

    const response = Buffer.from(buffered.subarray(0, located.value.end));
    buffered = buffered.subarray(located.value.end);
    afterBlock = true;
    pending = null;
    current.resolve(response);
  }

  socket.on('data', (chunk: Buffer | string) => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'ascii') : chunk;
    buffered = buffered.length === 0 ? bytes : Buffer.concat([buffered, bytes]);
    settle();
  });

  return {
    read(kind: ResponseKind): Promise<Buffer> {
      if (failure) return Promise.reject(failure);
      return new Promise<Buffer>((resolve, reject) => {
        pending = { kind, resolve, reject };
        settle();
      });
    },

    fail(error: ConnectionError): void {
      failure = failure ?? error;
      if (pending) {
        const current = pending;
        pending = null;
        current.reject(failure);
      }
    },
  };
}

export function createTcpTransport(config: TcpConfig): ProtocolClient {
  const { host, port = DEFAULT_SCPI_PORT, timeoutMs = 0, connect = connectSocket } = config;
  const address = `${host}:${port}`;

  let socket: Duplex | null = null;
  let reader: ResponseReader | null = null;
  let opened = false;
  let disconnectError: ConnectionError | null = null;

  const withLock = createCommandLock();

  async function dial(): Promise<Result<Duplex, ConnectionError>> {
    const dialed = await tryResultAsync(() => connect(host, port));
    if (dialed.ok) return dialed;
    return Err(new ConnectionError(`Failed to connect to ${address}: ${dialed.error.message}`, { cause: dialed.error }));
  }

  function writeLine(target: Duplex, cmd: string): Promise<Result<void, ConnectionError>> {
    return new Promise(resolve => {
      target.write(cmd + '\n', 'ascii', (err) => {
        if (err) {
          resolve(Err(new ConnectionError(`Write to ${address} failed: ${err.message}`, { cause: err })));
        } else {
          resolve(Ok());
        }
      });
    });
  }

  async function readResponse(
    source: ResponseReader,
    kind: ResponseKind,
    cmd: string,
    onTimeout: () => void
  ): Promise<Result<Buffer, ConnectionError>> {
    let timeoutId: ReturnType<typeof setTimeout> | null = null;
    try {
      const reading = source.read(kind);
      if (timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          // A late answer would pair with the next request, so the session is done
          source.fail(new ConnectionError(`Timeout waiting for response to: ${cmd}`));
          onTimeout();
        }, timeoutMs);
      }
      return Ok(await reading);
    } catch (e) {
      return Err(e instanceof ConnectionError ? e : new ConnectionError(toError(e).message, { cause: e }));
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }

  function markDisconnected(error: ConnectionError): void {
    disconnectError = disconnectError ?? error;
    opened = false;
    reader?.fail(disconnectError);
  }

  function attach(target: Duplex): void {
    target.on('close', () => {
      markDisconnected(new ConnectionError(`Connection to ${address} closed`));
    });
    target.on('error', (err: Error) => {
      markDisconnected(new ConnectionError(`Connection to ${address} failed: ${err.message}`, { cause: err }));
    });
  }

  function release(target: Duplex): void {
    target.removeAllListeners();
    target.destroy();
  }

  // Exchange on the open session
  async function exchange(cmd: string, kind: ResponseKind | null): Promise<Result<Buffer | null, ConnectionError>> {
    return withLock(async () => {
      if (!opened || !socket || !reader) {
        return Err(disconnectError ?? new ConnectionError(`Transport to ${address} not opened`));
      }
      const current = socket;

      const written = await writeLine(current, cmd);
      if (!written.ok) {
        markDisconnected(written.error);
        return written;
      }
      if (kind === null) return Ok(null);

      return readResponse(reader, kind, cmd, () => {
        markDisconnected(new ConnectionError(`Timeout waiting for response to: ${cmd}`));
        release(current);
      });
    });
  }

  // Self-contained exchange on a connection of its own
  async function exchangeOnce(cmd: string, kind: ResponseKind | null): Promise<Result<Buffer | null, ConnectionError>> {
    return withLock(async () => {
      const dialed = await dial();
      if (!dialed.ok) return dialed;
      const transient = dialed.value;
      const transientReader = createResponseReader(transient);
      transient.on('close', () => {
        transientReader.fail(new ConnectionError(`Connection to ${address} closed`));
      });
      transient.on('error', (err: Error) => {
        transientReader.fail(new ConnectionError(`Connection to ${address} failed: ${err.message}`, { cause: err }));
      });

      try {
        const written = await writeLine(transient, cmd);
        if (!written.ok) return written;
        if (kind === null) return Ok(null);
        return await readResponse(transientReader, kind, cmd, () => {});
      } finally {
        release(transient);
      }
    });
  }

  function asText(result: Result<Buffer | null, ConnectionError>): Result<string, ConnectionError> {
    if (!result.ok) return result;
    return Ok(result.value ? result.value.toString('ascii').trim() : '');
  }

  function asVoid(result: Result<Buffer | null, ConnectionError>): Result<void, ConnectionError> {
    return result.ok ? Ok() : result;
  }

  return {
    address,

    async open(): Promise<Result<void, ConnectionError>> {
      if (opened) return Ok();

      return withLock(async () => {
        const dialed = await dial();
        if (!dialed.ok) return dialed;

        socket = dialed.value;
        reader = createResponseReader(socket);
        attach(socket);
        opened = true;
        disconnectError = null;
        return Ok();
      });
    },

    async close(): Promise<Result<void, ConnectionError>> {
      if (!socket) return Ok();

      // Acquire lock to wait for any in-flight exchange
      await withLock(async () => {
        if (socket) release(socket);
        socket = null;
        reader = null;
        opened = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, ConnectionError>> {
      return asText(await exchange(cmd, 'line'));
    },

    async queryBinary(cmd: string): Promise<Result<Buffer, ConnectionError>> {
      const result = await exchange(cmd, 'block');
      if (!result.ok) return result;
      return Ok(result.value ?? Buffer.alloc(0));
    },

    async write(cmd: string): Promise<Result<void, ConnectionError>> {
      return asVoid(await exchange(cmd, null));
    },

    async writeOnce(cmd: string): Promise<Result<void, ConnectionError>> {
      return asVoid(await exchangeOnce(cmd, null));
    },

    async queryOnce(cmd: string): Promise<Result<string, ConnectionError>> {
      return asText(await exchangeOnce(cmd, 'line'));
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
