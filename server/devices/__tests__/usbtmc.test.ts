import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';

interface MockOutEndpoint {
  direction: 'out';
  transferType: number;
  transfer: (data: Buffer, cb: (err?: Error) => void) => void;
}

interface MockInEndpoint {
  direction: 'in';
  transferType: number;
  transfer: (length: number, cb: (err: Error | undefined, data?: Buffer) => void) => void;
}

interface MockInterface {
  endpoints: Array<MockOutEndpoint | MockInEndpoint>;
  isKernelDriverActive: () => boolean;
  detachKernelDriver: Mock;
  claim: Mock;
  release: Mock;
}

interface MockDevice {
  deviceDescriptor: { idVendor: number; idProduct: number; iSerialNumber: number };
  configDescriptor: { interfaces: Array<Array<{ bInterfaceClass: number; bInterfaceSubClass: number }>> };
  interfaces: MockInterface[];
  open: Mock;
  close: Mock;
  getStringDescriptor: (index: number, cb: (err: Error | undefined, value?: string) => void) => void;
}

const usbState = vi.hoisted(() => {
  const devices: MockDevice[] = [];
  return { devices };
});

vi.mock('usb', () => ({
  getDeviceList: () => usbState.devices,
}));

import {
  buildDevDepMsgOut,
  buildRequestDevDepMsgIn,
  createTagGenerator,
  createUSBTMCTransport,
  formatUsbAddress,
  listUsbtmcAddresses,
  parseDevDepMsgIn,
  parseUsbAddress,
  DEV_DEP_MSG_OUT,
  REQUEST_DEV_DEP_MSG_IN,
} from '../transports/usbtmc.js';

interface MockDeviceOptions {
  vendorId?: number;
  productId?: number;
  serial?: string;
  interfaceClass?: number;
  reply?: string;
  outError?: Error;
}

function createMockDevice(options: MockDeviceOptions = {}): { device: MockDevice; sent: Buffer[] } {
  const sent: Buffer[] = [];
  const reply = options.reply ?? '';

  const outEndpoint: MockOutEndpoint = {
    direction: 'out',
    transferType: 2,
    transfer: (data, cb) => {
      sent.push(data);
      cb(options.outError);
    },
  };
  const inEndpoint: MockInEndpoint = {
    direction: 'in',
    transferType: 2,
    // DEV_DEP_MSG_IN shares the DEV_DEP_MSG_OUT header layout
    transfer: (_length, cb) => cb(undefined, buildDevDepMsgOut(reply, 1)),
  };

  const iface: MockInterface = {
    endpoints: [outEndpoint, inEndpoint],
    isKernelDriverActive: () => false,
    detachKernelDriver: vi.fn(),
    claim: vi.fn(),
    release: vi.fn(),
  };

  const device: MockDevice = {
    deviceDescriptor: {
      idVendor: options.vendorId ?? 0x2a8d,
      idProduct: options.productId ?? 0x1301,
      iSerialNumber: options.serial ? 3 : 0,
    },
    configDescriptor: {
      interfaces: [[{ bInterfaceClass: options.interfaceClass ?? 0xfe, bInterfaceSubClass: 0x03 }]],
    },
    interfaces: [iface],
    open: vi.fn(),
    close: vi.fn(),
    getStringDescriptor: (_index, cb) => cb(undefined, options.serial),
  };

  return { device, sent };
}

describe('USBTMC protocol helpers', () => {
  describe('buildDevDepMsgOut()', () => {
    it('should build a padded DEV_DEP_MSG_OUT packet', () => {
      const buf = buildDevDepMsgOut('*IDN?\n', 1);

      expect(buf.length).toBe(20);
      expect(buf[0]).toBe(DEV_DEP_MSG_OUT);
      expect(buf[1]).toBe(1);
      expect(buf[2]).toBe(0xfe);
      expect(buf.readUInt32LE(4)).toBe(6);
      expect(buf[8]).toBe(0x01);
      expect(buf.subarray(12, 18).toString('ascii')).toBe('*IDN?\n');
      expect([...buf.subarray(18)]).toEqual([0, 0]);
    });

    it('should not pad messages already on a 4-byte boundary', () => {
      expect(buildDevDepMsgOut('READ?\n\n\n', 7).length).toBe(20);
    });
  });

  describe('buildRequestDevDepMsgIn()', () => {
    it('should build a 12-byte request', () => {
      const buf = buildRequestDevDepMsgIn(1024, 5);

      expect(buf.length).toBe(12);
      expect(buf[0]).toBe(REQUEST_DEV_DEP_MSG_IN);
      expect(buf[1]).toBe(5);
      expect(buf[2]).toBe(0xfa);
      expect(buf.readUInt32LE(4)).toBe(1024);
    });
  });

  describe('parseDevDepMsgIn()', () => {
    it('should extract and trim the payload', () => {
      const result = parseDevDepMsgIn(buildDevDepMsgOut('+5.00000E+00\n', 1));
      expect(result).toEqual({ ok: true, value: '+5.00000E+00' });
    });

    it('should reject short responses', () => {
      const result = parseDevDepMsgIn(Buffer.alloc(4));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('USBTMC response too short: 4 bytes (need at least 12)');
      }
    });
  });

  describe('createTagGenerator()', () => {
    it('should cycle through 1-255', () => {
      const nextTag = createTagGenerator();
      expect(nextTag()).toBe(1);
      expect(nextTag()).toBe(2);
      for (let i = 3; i < 255; i++) nextTag();
      expect(nextTag()).toBe(255);
      expect(nextTag()).toBe(1);
    });
  });
});

describe('USB addresses', () => {
  it('should format addresses with upper-case hex ids', () => {
    expect(formatUsbAddress({ vendorId: 0x2a8d, productId: 0x1301 })).toBe('USB0::0x2A8D::0x1301::INSTR');
    expect(formatUsbAddress({ vendorId: 0x1ab1, productId: 0x0c94, serial: 'DM3R123' }))
      .toBe('USB0::0x1AB1::0x0C94::DM3R123::INSTR');
  });

  it('should parse hex and decimal ids', () => {
    expect(parseUsbAddress('USB0::0x2A8D::0x1301::INSTR')).toEqual({ vendorId: 0x2a8d, productId: 0x1301 });
    expect(parseUsbAddress('USB::1234::5678::INSTR')).toEqual({ vendorId: 1234, productId: 5678 });
  });

  it('should parse the serial number', () => {
    expect(parseUsbAddress('usb0::0x2a8d::0x1301::MY123::instr')).toEqual({
      vendorId: 0x2a8d,
      productId: 0x1301,
      serial: 'MY123',
    });
  });

  it('should reject other address schemes', () => {
    expect(parseUsbAddress('ASRL/dev/ttyUSB0::INSTR')).toBeNull();
    expect(parseUsbAddress('SIM::DMM1::INSTR')).toBeNull();
  });
});

describe('listUsbtmcAddresses()', () => {
  beforeEach(() => {
    usbState.devices.length = 0;
  });

  it('should list only USB-TMC class devices', () => {
    usbState.devices.push(createMockDevice().device);
    usbState.devices.push(createMockDevice({ vendorId: 0x046d, productId: 0xc077, interfaceClass: 0x03 }).device);

    expect(listUsbtmcAddresses()).toEqual(['USB0::0x2A8D::0x1301::INSTR']);
  });
});

describe('USBTMC Transport', () => {
  beforeEach(() => {
    usbState.devices.length = 0;
  });

  it('should fail to open when no device matches', async () => {
    const transport = createUSBTMCTransport({ vendorId: 0x2a8d, productId: 0x1301 });

    const result = await transport.open();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('No USB-TMC device at USB0::0x2A8D::0x1301::INSTR');
    }
    expect(transport.isOpen()).toBe(false);
  });

  it('should open and claim the first interface', async () => {
    const { device } = createMockDevice();
    usbState.devices.push(device);
    const transport = createUSBTMCTransport({ vendorId: 0x2a8d, productId: 0x1301 });

    const result = await transport.open();

    expect(result.ok).toBe(true);
    expect(device.open).toHaveBeenCalledTimes(1);
    expect(device.interfaces[0].claim).toHaveBeenCalledTimes(1);
    expect(transport.isOpen()).toBe(true);
  });

  it('should send a query and read the reply', async () => {
    const { device, sent } = createMockDevice({ reply: '+5.00000E+00\n' });
    usbState.devices.push(device);
    const transport = createUSBTMCTransport({ vendorId: 0x2a8d, productId: 0x1301 });
    await transport.open();

    const result = await transport.query('MEAS:VOLT:DC?');

    expect(result).toEqual({ ok: true, value: '+5.00000E+00' });
    expect(sent).toEqual([
      buildDevDepMsgOut('MEAS:VOLT:DC?\n', 1),
      buildRequestDevDepMsgIn(1024, 2),
    ]);
  });

  it('should pick the device whose serial matches', async () => {
    const first = createMockDevice({ serial: 'AAA' });
    const second = createMockDevice({ serial: 'BBB' });
    usbState.devices.push(first.device, second.device);
    const transport = createUSBTMCTransport({ vendorId: 0x2a8d, productId: 0x1301, serial: 'BBB' });

    const result = await transport.open();

    expect(result.ok).toBe(true);
    expect(first.device.close).toHaveBeenCalledTimes(1);
    expect(first.device.interfaces[0].claim).not.toHaveBeenCalled();
    expect(second.device.interfaces[0].claim).toHaveBeenCalledTimes(1);
  });

  it('should mark the transport disconnected on a fatal USB error', async () => {
    const { device } = createMockDevice({ outError: new Error('LIBUSB_ERROR_NO_DEVICE') });
    usbState.devices.push(device);
    const transport = createUSBTMCTransport({ vendorId: 0x2a8d, productId: 0x1301 });
    await transport.open();

    const first = await transport.write('*RST');
    const second = await transport.query('*IDN?');

    expect(first.ok).toBe(false);
    expect(transport.isOpen()).toBe(false);
    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error.message).toBe('LIBUSB_ERROR_NO_DEVICE');
    }
  });

  it('should release the interface and close the device on close()', async () => {
    const { device } = createMockDevice();
    usbState.devices.push(device);
    const transport = createUSBTMCTransport({ vendorId: 0x2a8d, productId: 0x1301 });
    await transport.open();

    await transport.close();

    expect(device.interfaces[0].release).toHaveBeenCalledWith(true);
    expect(device.close).toHaveBeenCalledTimes(1);
    expect(transport.isOpen()).toBe(false);
  });
});
