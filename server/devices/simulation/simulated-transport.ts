/**
 * Simulated Transport
 * Implements Transport for in-process simulated instruments
 *
 * Routes SCPI commands to a simulator and returns responses.
 * Adds configurable latency to mimic real device timing.
 *
 * Address form: SIM::<name>::INSTR
 */

import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';

export interface SimulatedTransportConfig {
  /** Base latency in ms (default: 20) */
  latencyMs?: number;
  /** Random jitter range in ms (default: 10) */
  jitterMs?: number;
}

export type CommandHandler = (cmd: string) => string | null;

export function formatSimulatedAddress(name: string): string {
  return `SIM::${name}::INSTR`;
}

export function parseSimulatedAddress(address: string): string | null {
  const match = address.trim().match(/^SIM::([^:]+)::INSTR$/i);
  return match ? match[1] : null;
}

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): Transport {
  const { latencyMs = 20, jitterMs = 10 } = config;

  let opened = false;

  // Mutex to prevent concurrent commands (like real transports)
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  async function delay(): Promise<void> {
    const totalDelay = latencyMs + Math.random() * jitterMs;
    if (totalDelay <= 0) return;
    await new Promise(r => setTimeout(r, totalDelay));
  }

  return {
    async open(): Promise<Result<void, Error>> {
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      opened = false;
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        if (!opened) return Err(new Error('Transport not opened'));
        await delay();
        return Ok(handler(cmd) ?? '');
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        if (!opened) return Err(new Error('Transport not opened'));
        await delay();
        handler(cmd);
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
