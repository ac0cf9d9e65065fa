/**
 * InstrumentSession - Open handle to one instrument
 *
 * - Wraps a Transport with per-call timeouts
 * - Queries run one at a time (promise-chain lock)
 * - The timeout clock starts when the call is made, including time spent
 *   waiting behind earlier queries
 * - close() fails every pending call immediately with reason 'closed'
 */

import type { QueryFailure, QueryFailureReason, Transport } from '../devices/types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err, toError } from '../../shared/types.js';

export interface InstrumentSession {
  readonly deviceName: string;
  readonly address: string;
  query(command: string, timeoutMs: number): Promise<Result<string, QueryFailure>>;
  write(command: string, timeoutMs: number): Promise<Result<void, QueryFailure>>;
  isOpen(): boolean;
  close(): Promise<void>;
}

function failure(reason: QueryFailureReason, message: string): QueryFailure {
  return { reason, message };
}

/** Error code reported for a failed query; a closed session counts as I/O. */
export function queryFailureCode(reason: QueryFailureReason): 'QueryTimeout' | 'QueryIOFailure' {
  return reason === 'timeout' ? 'QueryTimeout' : 'QueryIOFailure';
}

/**
 * Create a session over an already opened transport.
 */
export function createInstrumentSession(
  deviceName: string,
  address: string,
  transport: Transport
): InstrumentSession {
  let closed = false;

  // Cancel callbacks of calls that have not settled yet
  const pending = new Set<() => void>();

  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function run<T>(
    command: string,
    timeoutMs: number,
    op: () => Promise<Result<T, Error>>
  ): Promise<Result<T, QueryFailure>> {
    if (closed) {
      return Promise.resolve(Err(failure('closed', `Session for ${deviceName} is closed`)));
    }

    return new Promise<Result<T, QueryFailure>>(resolve => {
      let settled = false;
      let release: () => void = () => {};
      const done = new Promise<void>(r => {
        release = r;
      });

      const finish = (result: Result<T, QueryFailure>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        pending.delete(cancel);
        release();
        resolve(result);
      };

      const cancel = () => {
        finish(Err(failure('closed', `Session for ${deviceName} closed during "${command}"`)));
      };
      pending.add(cancel);

      const timer = setTimeout(() => {
        finish(Err(failure('timeout', `No reply to "${command}" within ${timeoutMs} ms`)));
      }, timeoutMs);

      // The lock is held until this call settles, even if the transport is still busy
      void withLock(async () => {
        if (settled) return;
        void Promise.resolve().then(op).then(
          result => finish(result.ok ? Ok(result.value) : Err(failure('io', result.error.message))),
          err => finish(Err(failure('io', toError(err).message)))
        );
        await done;
      });
    });
  }

  return {
    deviceName,
    address,

    query(command: string, timeoutMs: number): Promise<Result<string, QueryFailure>> {
      return run(command, timeoutMs, () => transport.query(command));
    },

    write(command: string, timeoutMs: number): Promise<Result<void, QueryFailure>> {
      return run(command, timeoutMs, () => transport.write(command));
    },

    isOpen(): boolean {
      return !closed && transport.isOpen();
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;

      for (const cancel of [...pending]) {
        cancel();
      }

      const result = await transport.close();
      if (!result.ok) {
        console.error(`[Session] Error closing ${deviceName} at ${address}:`, result.error.message);
      }
    },
  };
}
