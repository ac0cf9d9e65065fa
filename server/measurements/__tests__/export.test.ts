import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  decodeJsonExport,
  defaultExportFileName,
  encodeMeasurements,
  exportMeasurements,
  getFileExtension,
  parseExportFormat,
  writeExportFile,
} from '../export.js';
import { createMeasurementStore } from '../MeasurementStore.js';
import type { Measurement } from '../../../shared/types.js';

const A: Measurement = {
  timestamp: Date.UTC(2024, 0, 15, 10, 30, 45) + 123.456,
  deviceName: 'DMM1',
  function: 'DC Voltage',
  value: 5.00012,
  unit: 'V',
  status: 'OK',
  userLabel: 'Bench',
};

const B: Measurement = {
  timestamp: Date.UTC(2024, 0, 15, 10, 30, 46) + 500,
  deviceName: 'DMM2',
  function: 'Resistance (2-wire)',
  value: 1000.5,
  unit: 'Ω',
  status: 'OK',
  userLabel: 'Load, "A"',
};

const C: Measurement = {
  timestamp: Date.UTC(2024, 0, 15, 10, 30, 47),
  deviceName: 'DMM1',
  function: 'DC Voltage',
  value: 0,
  unit: '',
  status: 'ERROR',
  userLabel: '',
};

function encodeText(list: Measurement[], format: string, exportedAt?: number): string {
  const result = encodeMeasurements(list, format, { exportedAt });
  if (!result.ok) throw new Error(result.error.message);
  return result.value.toString('utf8');
}

describe('parseExportFormat()', () => {
  it('should accept any case', () => {
    expect(parseExportFormat('csv')).toEqual({ ok: true, value: 'CSV' });
    expect(parseExportFormat(' Json ')).toEqual({ ok: true, value: 'JSON' });
    expect(parseExportFormat('TXT')).toEqual({ ok: true, value: 'TXT' });
  });

  it('should reject unknown formats', () => {
    expect(parseExportFormat('XML')).toEqual({
      ok: false,
      error: { kind: 'UnsupportedFormat', message: 'Unsupported export format "XML" (expected one of: CSV, JSON, TXT)' },
    });
  });

  it('should map formats to file extensions', () => {
    expect(getFileExtension('CSV')).toBe('csv');
    expect(getFileExtension('JSON')).toBe('json');
    expect(getFileExtension('TXT')).toBe('txt');
  });
});

describe('encodeMeasurements()', () => {
  it('should check the format before the data', () => {
    const result = encodeMeasurements([], 'XML');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('UnsupportedFormat');
  });

  it('should refuse to export nothing', () => {
    expect(encodeMeasurements([], 'CSV')).toEqual({
      ok: false,
      error: { kind: 'NoData', message: 'No measurements to export' },
    });
  });

  describe('CSV', () => {
    it('should write a header and one quoted row per record', () => {
      expect(encodeText([A, B, C], 'CSV')).toBe(
        'Timestamp,Device,Function,Value,Unit,Status,User Label\n' +
        '2024-01-15 10:30:45.123456,DMM1,DC Voltage,5.00012,V,OK,Bench\n' +
        '2024-01-15 10:30:46.500000,DMM2,Resistance (2-wire),1000.5,Ω,OK,"Load, ""A"""\n' +
        '2024-01-15 10:30:47.000000,DMM1,DC Voltage,0,,ERROR,\n'
      );
    });
  });

  describe('JSON', () => {
    it('should write snake_case records with ISO timestamps', () => {
      const text = encodeText([A], 'JSON');
      const parsed: unknown = JSON.parse(text);

      expect(parsed).toEqual([{
        timestamp: '2024-01-15T10:30:45.123456Z',
        device_name: 'DMM1',
        function: 'DC Voltage',
        value: 5.00012,
        unit: 'V',
        status: 'OK',
        user_label: 'Bench',
      }]);
      expect(text.startsWith('[\n  {\n    "timestamp": ')).toBe(true);
      expect(text.endsWith(']')).toBe(true);
    });

    it('should decode back to the same measurements', () => {
      const encoded = encodeMeasurements([A, B, C], 'JSON');
      expect(encoded.ok).toBe(true);
      if (!encoded.ok) return;

      expect(decodeJsonExport(encoded.value)).toEqual({ ok: true, value: [A, B, C] });
    });

    it('should reject malformed exports', () => {
      expect(decodeJsonExport('not json').ok).toBe(false);

      const notArray = decodeJsonExport('{}');
      expect(notArray.ok).toBe(false);
      if (!notArray.ok) expect(notArray.error.message).toBe('JSON export must be an array');

      const missing = decodeJsonExport('[{"timestamp":"2024-01-15T10:30:45Z"}]');
      expect(missing.ok).toBe(false);
      if (!missing.ok) expect(missing.error.message).toBe('Record 0 has missing or mistyped fields');

      const badTime = decodeJsonExport(JSON.stringify([{
        timestamp: 'yesterday',
        device_name: 'DMM1',
        function: 'DC Voltage',
        value: 1,
        unit: 'V',
        status: 'OK',
        user_label: '',
      }]));
      expect(badTime.ok).toBe(false);
      if (!badTime.ok) expect(badTime.error.message).toBe('Record 0 has an invalid timestamp: yesterday');
    });
  });

  describe('TXT', () => {
    it('should write a banner and an aligned table', () => {
      const text = encodeText([A, C], 'TXT', Date.UTC(2024, 0, 16, 8, 0, 0));

      expect(text.split('\n')).toEqual([
        'Bench Logger - Measurement Data Export',
        '='.repeat(50),
        'Export Date: 2024-01-16 08:00:00',
        'Total Records: 2',
        '',
        'Timestamp           | Device | Function   | Value    | Unit | Status | User Label',
        '-'.repeat(81),
        '2024-01-15 10:30:45 | DMM1   | DC Voltage | 5.000120 | V    | OK     | Bench',
        '2024-01-15 10:30:47 | DMM1   | DC Voltage | 0.000000 |      | ERROR  |',
        '',
      ]);
    });
  });
});

describe('exportMeasurements()', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should export one device from the store without changing it', () => {
    const store = createMeasurementStore();
    [A, B, C].forEach(m => store.record(m));

    const text = exportMeasurements(store, 'csv', 'DMM2');

    expect(text.ok).toBe(true);
    if (text.ok) {
      expect(text.value.toString('utf8').split('\n')).toHaveLength(3);
    }
    expect(store.count()).toBe(3);
  });

  it('should report NoData for a device with no records', () => {
    const store = createMeasurementStore();
    store.record(A);

    const result = exportMeasurements(store, 'JSON', 'DMM9');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('NoData');
  });
});

describe('writeExportFile()', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = path.join(os.tmpdir(), `benchlog-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    fs.mkdirSync(testDir, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should create the directory and write the payload', async () => {
    const target = path.join(testDir, 'exports', 'out.csv');

    const result = await writeExportFile(target, Buffer.from('a,b\n'));

    expect(result.ok).toBe(true);
    expect(fs.readFileSync(target, 'utf8')).toBe('a,b\n');
    expect(fs.readdirSync(path.join(testDir, 'exports'))).toEqual(['out.csv']);
  });

  it('should replace an existing file', async () => {
    const target = path.join(testDir, 'out.json');
    fs.writeFileSync(target, 'old');

    await writeExportFile(target, Buffer.from('[]'));

    expect(fs.readFileSync(target, 'utf8')).toBe('[]');
  });

  it('should return IOFailure and leave nothing behind when the path is unusable', async () => {
    fs.writeFileSync(path.join(testDir, 'blocker'), '');
    const target = path.join(testDir, 'blocker', 'out.csv');

    const result = await writeExportFile(target, Buffer.from('x'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('IOFailure');
      expect(result.error.message.startsWith(`Failed to write ${target}: `)).toBe(true);
    }
    expect(fs.readdirSync(testDir)).toEqual(['blocker']);
  });
});

describe('defaultExportFileName()', () => {
  const at = Date.UTC(2024, 0, 2, 3, 4, 5);

  it('should stamp the file name with the export time', () => {
    expect(defaultExportFileName('CSV', at)).toBe('measurements_20240102_030405.csv');
  });

  it('should include a sanitized device name', () => {
    expect(defaultExportFileName('JSON', at, 'DMM 1/x')).toBe('measurements_DMM_1_x_20240102_030405.json');
  });
});
