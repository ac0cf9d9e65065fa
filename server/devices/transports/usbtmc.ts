/**
 * USB-TMC (Test & Measurement Class) Transport
 * Text query/response over USB bulk endpoints.
 *
 * Address form: USB0::0x<vid>::0x<pid>[::<serial>]::INSTR
 */

import { getDeviceList } from 'usb';
import type { Device, InEndpoint, Interface, OutEndpoint } from 'usb';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, toError } from '../../../shared/types.js';

// USB-TMC Message IDs
export const DEV_DEP_MSG_OUT = 1;
export const REQUEST_DEV_DEP_MSG_IN = 2;

const USBTMC_INTERFACE_CLASS = 0xfe;
const USBTMC_INTERFACE_SUBCLASS = 0x03;
const BULK_TRANSFER = 2;
const MAX_READ_LENGTH = 1024;

// Fatal USB errors that indicate device disconnection
const FATAL_USB_ERRORS = [
  'LIBUSB_ERROR_NO_DEVICE',
  'LIBUSB_ERROR_IO',
  'LIBUSB_ERROR_PIPE',
  'LIBUSB_TRANSFER_NO_DEVICE',
];

export interface USBTMCConfig {
  timeout?: number;  // Read timeout in ms (default: 5000)
}

export interface UsbAddress {
  vendorId: number;
  productId: number;
  serial?: string;
}

// Exported for testing
export function buildDevDepMsgOut(message: string, bTag: number): Buffer {
  const msgBytes = Buffer.from(message, 'ascii');

  // Header: 12 bytes + message + padding to 4-byte boundary
  const paddedLen = Math.ceil((12 + msgBytes.length) / 4) * 4;
  const buf = Buffer.alloc(paddedLen);

  buf[0] = DEV_DEP_MSG_OUT;
  buf[1] = bTag;
  buf[2] = ~bTag & 0xFF;
  buf.writeUInt32LE(msgBytes.length, 4);
  buf[8] = 0x01;                  // EOM
  msgBytes.copy(buf, 12);

  return buf;
}

// Exported for testing
export function buildRequestDevDepMsgIn(maxLength: number, bTag: number): Buffer {
  const buf = Buffer.alloc(12);

  buf[0] = REQUEST_DEV_DEP_MSG_IN;
  buf[1] = bTag;
  buf[2] = ~bTag & 0xFF;
  buf.writeUInt32LE(maxLength, 4);

  return buf;
}

// Exported for testing
export function parseDevDepMsgIn(response: Buffer): Result<string, Error> {
  if (response.length < 12) {
    return Err(new Error(`USBTMC response too short: ${response.length} bytes (need at least 12)`));
  }
  const transferSize = response.readUInt32LE(4);
  const data = response.subarray(12, 12 + transferSize);
  return Ok(data.toString('ascii').trim());
}

// Tag generator - cycles 1-255
export function createTagGenerator(): () => number {
  let bTag = 0;
  return () => {
    bTag = (bTag % 255) + 1;
    return bTag;
  };
}

const hex4 = (n: number) => `0x${n.toString(16).toUpperCase().padStart(4, '0')}`;

export function formatUsbAddress(address: UsbAddress): string {
  const serial = address.serial ? `::${address.serial}` : '';
  return `USB0::${hex4(address.vendorId)}::${hex4(address.productId)}${serial}::INSTR`;
}

export function parseUsbAddress(address: string): UsbAddress | null {
  const match = address.trim().match(/^USB\d*::(0x[0-9a-f]+|\d+)::(0x[0-9a-f]+|\d+)(?:::([^:]+))?::INSTR$/i);
  if (!match) return null;
  const [, vid, pid, serial] = match;
  return {
    vendorId: Number(vid),
    productId: Number(pid),
    ...(serial ? { serial } : {}),
  };
}

function isUsbtmcDevice(device: Device): boolean {
  const interfaces = device.configDescriptor?.interfaces ?? [];
  return interfaces.some(alternates =>
    alternates.some(alt =>
      alt.bInterfaceClass === USBTMC_INTERFACE_CLASS &&
      alt.bInterfaceSubClass === USBTMC_INTERFACE_SUBCLASS
    )
  );
}

/** Addresses of attached USB-TMC instruments (no serial: listing doesn't open devices). */
export function listUsbtmcAddresses(): string[] {
  return getDeviceList()
    .filter(isUsbtmcDevice)
    .map(d => formatUsbAddress({
      vendorId: d.deviceDescriptor.idVendor,
      productId: d.deviceDescriptor.idProduct,
    }));
}

function readSerialNumber(device: Device): Promise<string | undefined> {
  return new Promise(resolve => {
    const index = device.deviceDescriptor.iSerialNumber;
    if (!index) {
      resolve(undefined);
      return;
    }
    device.getStringDescriptor(index, (err, value) => {
      resolve(err ? undefined : value);
    });
  });
}

export function createUSBTMCTransport(address: UsbAddress, config: USBTMCConfig = {}): Transport {
  const { timeout = 5000 } = config;
  const nextTag = createTagGenerator();
  let device: Device | null = null;
  let bulkOutEndpoint: OutEndpoint | null = null;
  let bulkInEndpoint: InEndpoint | null = null;
  let iface: Interface | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: Error | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function isFatalError(err: Error): boolean {
    return FATAL_USB_ERRORS.some(code => err.message.includes(code));
  }

  function markDisconnected(err: Error): void {
    disconnected = true;
    disconnectError = err;
    opened = false;
  }

  function transferOut(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!bulkOutEndpoint) {
        reject(new Error('Device not opened'));
        return;
      }
      bulkOutEndpoint.transfer(data, (err) => {
        if (err) {
          if (isFatalError(err)) markDisconnected(err);
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  function transferIn(length: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      if (!bulkInEndpoint) {
        reject(new Error('Device not opened'));
        return;
      }

      let settled = false;
      const timeoutId = setTimeout(() => {
        if (!settled) {
          settled = true;
          reject(new Error(`Timeout waiting for USB response after ${timeout}ms`));
        }
      }, timeout);

      bulkInEndpoint.transfer(length, (err, data) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);

        if (err) {
          if (isFatalError(err)) markDisconnected(err);
          reject(err);
        } else {
          resolve(data ?? Buffer.alloc(0));
        }
      });
    });
  }

  async function findDevice(): Promise<Device | null> {
    const candidates = getDeviceList().filter(d =>
      d.deviceDescriptor.idVendor === address.vendorId &&
      d.deviceDescriptor.idProduct === address.productId
    );
    if (!address.serial) return candidates[0] ?? null;

    for (const candidate of candidates) {
      candidate.open();
      const serial = await readSerialNumber(candidate);
      if (serial === address.serial) return candidate;
      candidate.close();
    }
    return null;
  }

  function releaseDevice(): void {
    try {
      iface?.release(true);
      device?.close();
    } catch (err) {
      console.warn(`[USBTMC] Error while releasing ${formatUsbAddress(address)}:`, err);
    }
    bulkInEndpoint = null;
    bulkOutEndpoint = null;
    iface = null;
    device = null;
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      try {
        device = await findDevice();
        if (!device) {
          return Err(new Error(`No USB-TMC device at ${formatUsbAddress(address)}`));
        }
        // findDevice leaves serial-matched devices open
        if (!address.serial) device.open();

        const claimed = device.interfaces?.[0];
        if (!claimed) {
          releaseDevice();
          return Err(new Error('No interfaces found on device'));
        }
        iface = claimed;

        if (iface.isKernelDriverActive()) {
          iface.detachKernelDriver();
        }
        iface.claim();

        for (const endpoint of iface.endpoints) {
          if (endpoint.transferType !== BULK_TRANSFER) continue;
          if (endpoint.direction === 'in') {
            bulkInEndpoint = endpoint as InEndpoint;
          } else {
            bulkOutEndpoint = endpoint as OutEndpoint;
          }
        }

        if (!bulkInEndpoint || !bulkOutEndpoint) {
          releaseDevice();
          return Err(new Error('Could not find bulk endpoints'));
        }

        opened = true;
        disconnected = false;
        disconnectError = null;
        return Ok();
      } catch (err) {
        releaseDevice();
        return Err(toError(err));
      }
    },

    async close(): Promise<Result<void, Error>> {
      if (!opened && !disconnected) return Ok();

      // Wait for any in-flight transfer
      await withLock(async () => {
        releaseDevice();
        opened = false;
        disconnected = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        if (disconnected) {
          return Err(disconnectError ?? new Error('USB device disconnected'));
        }

        try {
          await transferOut(buildDevDepMsgOut(cmd + '\n', nextTag()));
          await transferOut(buildRequestDevDepMsgIn(MAX_READ_LENGTH, nextTag()));
          const response = await transferIn(MAX_READ_LENGTH);
          return parseDevDepMsgIn(response);
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        if (disconnected) {
          return Err(disconnectError ?? new Error('USB device disconnected'));
        }

        try {
          await transferOut(buildDevDepMsgOut(cmd + '\n', nextTag()));
          return Ok();
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}
