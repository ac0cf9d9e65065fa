/**
 * Serial Transport
 * Line-oriented SCPI over a serial port (RS-232 / USB-serial adapters).
 *
 * Address form: ASRL<path>::INSTR, e.g. ASRL/dev/ttyUSB0::INSTR or ASRLCOM3::INSTR
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, toError } from '../../../shared/types.js';

export interface SerialConfig {
  path: string;
  baudRate: number;
  commandDelay?: number;  // ms delay after each command (default: 50)
  timeout?: number;       // read timeout in ms (default: 5000)
}

export function formatSerialAddress(path: string): string {
  return `ASRL${path}::INSTR`;
}

export function parseSerialAddress(address: string): string | null {
  const match = address.trim().match(/^ASRL(.+)::INSTR$/i);
  return match ? match[1] : null;
}

export function createSerialTransport(config: SerialConfig): Transport {
  const { path, baudRate, commandDelay = 50, timeout = 5000 } = config;

  let port: SerialPort | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: Error | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function writeLine(target: SerialPort, cmd: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      target.write(cmd + '\n', (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // Send a command and wait for one reply line
  function exchange(target: SerialPort, source: ReadlineParser, cmd: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const finish = () => {
        settled = true;
        clearTimeout(timeoutId);
        source.removeListener('data', onData);
      };

      const onData = (data: string) => {
        if (settled) return;
        finish();
        resolve(data.trim());
      };

      const timeoutId = setTimeout(() => {
        if (settled) return;
        finish();
        reject(new Error(`Timeout waiting for response to: ${cmd}`));
      }, timeout);

      source.once('data', onData);

      target.write(cmd + '\n', (err) => {
        if (err && !settled) {
          finish();
          reject(err);
        }
      });
    });
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const newPort = new SerialPort({ path, baudRate, autoOpen: false });

      newPort.on('close', () => {
        disconnected = true;
        disconnectError = new Error('SERIAL_PORT_DISCONNECTED: Port closed');
        opened = false;
      });

      newPort.on('error', (err) => {
        disconnected = true;
        disconnectError = new Error(`SERIAL_PORT_ERROR: ${err.message}`);
      });

      parser = newPort.pipe(new ReadlineParser({ delimiter: '\n' }));
      port = newPort;

      try {
        await new Promise<void>((resolve, reject) => {
          newPort.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        newPort.removeAllListeners();
        port = null;
        parser = null;
        return Err(toError(e));
      }

      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      if (!port) return Ok();

      await withLock(async () => {
        const current = port;
        parser?.removeAllListeners();
        current?.removeAllListeners();

        if (opened && !disconnected && current) {
          await new Promise<void>((resolve) => {
            current.close(() => resolve());
          });
        }

        port = null;
        parser = null;
        opened = false;
        disconnected = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        if (disconnected) {
          return Err(disconnectError ?? new Error('SERIAL_PORT_DISCONNECTED'));
        }
        if (!port || !parser) {
          return Err(new Error('Port not opened'));
        }

        let reply: string;
        try {
          reply = await exchange(port, parser, cmd);
        } catch (e) {
          return Err(toError(e));
        }

        // Let the instrument settle before the next command
        await delay(commandDelay);
        return Ok(reply);
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        if (disconnected) {
          return Err(disconnectError ?? new Error('SERIAL_PORT_DISCONNECTED'));
        }
        if (!port) {
          return Err(new Error('Port not opened'));
        }

        try {
          await writeLine(port, cmd);
        } catch (e) {
          return Err(toError(e));
        }

        await delay(commandDelay);
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

export async function listSerialAddresses(): Promise<string[]> {
  const ports = await SerialPort.list();
  return ports.map(p => formatSerialAddress(p.path));
}
