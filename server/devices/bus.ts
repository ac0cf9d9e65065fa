/**
 * Instrument Bus
 * Lists reachable instrument addresses and creates transports for them
 *
 * Address schemes:
 * - USB0::0x<vid>::0x<pid>[::<serial>]::INSTR  (USB-TMC)
 * - ASRL<path>::INSTR                          (serial)
 * - SIM::<name>::INSTR                         (in-process simulated DMM)
 */

import type { InstrumentBus, SerialOptions, Transport } from './types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err, toError } from '../../shared/types.js';
import { createUSBTMCTransport, listUsbtmcAddresses, parseUsbAddress } from './transports/usbtmc.js';
import { createSerialTransport, listSerialAddresses, parseSerialAddress } from './transports/serial.js';
import { parseSimulatedAddress } from './simulation/simulated-transport.js';
import type { Simulation } from './simulation/index.js';

export interface InstrumentBusConfig {
  serial?: SerialOptions;
  usbtmc?: { timeout?: number };
  /** Simulated instruments; omit to disable the SIM:: scheme */
  simulation?: Simulation;
  /** Include real hardware in listAddresses (default: true) */
  scanHardware?: boolean;
}

export function createInstrumentBus(config: InstrumentBusConfig = {}): InstrumentBus {
  const { serial = {}, usbtmc = {}, simulation, scanHardware = true } = config;

  async function listHardware(): Promise<string[]> {
    const addresses: string[] = [];

    try {
      addresses.push(...listUsbtmcAddresses());
    } catch (err) {
      console.warn('[Bus] USB enumeration failed:', toError(err).message);
    }

    try {
      addresses.push(...await listSerialAddresses());
    } catch (err) {
      console.warn('[Bus] Serial enumeration failed:', toError(err).message);
    }

    return addresses;
  }

  return {
    async listAddresses(): Promise<string[]> {
      const hardware = scanHardware ? await listHardware() : [];
      return [...(simulation?.listAddresses() ?? []), ...hardware];
    },

    createTransport(address: string): Result<Transport, Error> {
      const simName = parseSimulatedAddress(address);
      if (simName !== null) {
        const transport = simulation?.createTransport(simName);
        return transport
          ? Ok(transport)
          : Err(new Error(`No simulated instrument named "${simName}"`));
      }

      const usbAddress = parseUsbAddress(address);
      if (usbAddress) {
        return Ok(createUSBTMCTransport(usbAddress, { timeout: usbtmc.timeout }));
      }

      const serialPath = parseSerialAddress(address);
      if (serialPath !== null) {
        return Ok(createSerialTransport({
          path: serialPath,
          baudRate: serial.baudRate ?? 9600,
          commandDelay: serial.commandDelay,
          timeout: serial.timeout,
        }));
      }

      return Err(new Error(`Unrecognized instrument address: ${address}`));
    },
  };
}
