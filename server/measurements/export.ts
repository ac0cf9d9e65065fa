/**
 * Export Encoder
 * Renders measurements as CSV, JSON or TXT and writes export files
 *
 * - Encoding works on a snapshot and never changes the store
 * - An empty selection is NoData; nothing is written
 * - Files are written to a temp name and renamed, so a failed export
 *   leaves no partial file behind
 */

import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import type { ExportError, ExportFormat, Measurement, MeasurementStatus, Result } from '../../shared/types.js';
import { EXPORT_FORMATS, Ok, Err, benchError, toError } from '../../shared/types.js';
import type { MeasurementStore } from './MeasurementStore.js';
import {
  formatCsvTimestamp,
  formatDisplayDate,
  formatIsoTimestamp,
  monotonicNow,
  parseIsoTimestamp,
} from './timestamps.js';

export const CSV_HEADER = ['Timestamp', 'Device', 'Function', 'Value', 'Unit', 'Status', 'User Label'] as const;

export const TXT_TITLE = 'Bench Logger - Measurement Data Export';

const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  CSV: 'csv',
  JSON: 'json',
  TXT: 'txt',
};

/** One record of a JSON export */
export interface JsonExportRecord {
  timestamp: string;
  device_name: string;
  function: string;
  value: number;
  unit: string;
  status: MeasurementStatus;
  user_label: string;
}

export interface EncodeOptions {
  /** Export time shown in the TXT banner (default: now) */
  exportedAt?: number;
}

export function parseExportFormat(text: string): Result<ExportFormat, ExportError> {
  const upper = text.trim().toUpperCase();
  const format = EXPORT_FORMATS.find(f => f === upper);
  if (!format) {
    return Err(benchError(
      'UnsupportedFormat',
      `Unsupported export format "${text}" (expected one of: ${EXPORT_FORMATS.join(', ')})`,
    ));
  }
  return Ok(format);
}

export function getFileExtension(format: ExportFormat): string {
  return FILE_EXTENSIONS[format];
}

// ============ CSV ============

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function encodeCsv(measurements: readonly Measurement[]): string {
  const lines = [CSV_HEADER.map(csvField).join(',')];
  for (const m of measurements) {
    lines.push([
      formatCsvTimestamp(m.timestamp),
      m.deviceName,
      m.function,
      String(m.value),
      m.unit,
      m.status,
      m.userLabel,
    ].map(csvField).join(','));
  }
  return lines.join('\n') + '\n';
}

// ============ JSON ============

function toJsonRecord(m: Measurement): JsonExportRecord {
  return {
    timestamp: formatIsoTimestamp(m.timestamp),
    device_name: m.deviceName,
    function: m.function,
    value: m.value,
    unit: m.unit,
    status: m.status,
    user_label: m.userLabel,
  };
}

function encodeJson(measurements: readonly Measurement[]): string {
  return JSON.stringify(measurements.map(toJsonRecord), null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a JSON export back into measurements.
 * Fails on the first record that is missing a field or has the wrong type.
 */
export function decodeJsonExport(payload: Buffer | string): Result<Measurement[], Error> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString());
  } catch (e) {
    return Err(toError(e));
  }

  if (!Array.isArray(parsed)) {
    return Err(new Error('JSON export must be an array'));
  }

  const measurements: Measurement[] = [];
  for (const [index, item] of parsed.entries()) {
    if (!isRecord(item)) {
      return Err(new Error(`Record ${index} is not an object`));
    }

    const { timestamp, device_name, function: fn, value, unit, status, user_label } = item;
    if (
      typeof timestamp !== 'string' ||
      typeof device_name !== 'string' ||
      typeof fn !== 'string' ||
      typeof value !== 'number' ||
      typeof unit !== 'string' ||
      (status !== 'OK' && status !== 'ERROR') ||
      typeof user_label !== 'string'
    ) {
      return Err(new Error(`Record ${index} has missing or mistyped fields`));
    }

    const parsedTimestamp = parseIsoTimestamp(timestamp);
    if (parsedTimestamp === null) {
      return Err(new Error(`Record ${index} has an invalid timestamp: ${timestamp}`));
    }

    measurements.push({
      timestamp: parsedTimestamp,
      deviceName: device_name,
      function: fn,
      value,
      unit,
      status,
      userLabel: user_label,
    });
  }

  return Ok(measurements);
}

// ============ TXT ============

function encodeTxt(measurements: readonly Measurement[], exportedAt: number): string {
  const header = ['Timestamp', 'Device', 'Function', 'Value', 'Unit', 'Status', 'User Label'];
  const rows = measurements.map(m => [
    formatDisplayDate(m.timestamp),
    m.deviceName,
    m.function,
    m.value.toFixed(6),
    m.unit,
    m.status,
    m.userLabel,
  ]);

  const widths = header.map((title, col) =>
    Math.max(title.length, ...rows.map(row => row[col].length))
  );
  const formatRow = (cells: string[]) =>
    cells.map((cell, col) => cell.padEnd(widths[col])).join(' | ').trimEnd();

  const tableWidth = widths.reduce((sum, w) => sum + w, 0) + 3 * (widths.length - 1);

  const lines = [
    TXT_TITLE,
    '='.repeat(50),
    `Export Date: ${formatDisplayDate(exportedAt)}`,
    `Total Records: ${measurements.length}`,
    '',
    formatRow(header),
    '-'.repeat(tableWidth),
    ...rows.map(formatRow),
  ];
  return lines.join('\n') + '\n';
}

// ============ Entry points ============

/**
 * Encode measurements in the given format.
 */
export function encodeMeasurements(
  measurements: readonly Measurement[],
  format: string,
  options: EncodeOptions = {}
): Result<Buffer, ExportError> {
  const resolved = parseExportFormat(format);
  if (!resolved.ok) return resolved;

  if (measurements.length === 0) {
    return Err(benchError('NoData', 'No measurements to export'));
  }

  switch (resolved.value) {
    case 'CSV':
      return Ok(Buffer.from(encodeCsv(measurements), 'utf8'));
    case 'JSON':
      return Ok(Buffer.from(encodeJson(measurements), 'utf8'));
    case 'TXT':
      return Ok(Buffer.from(encodeTxt(measurements, options.exportedAt ?? monotonicNow()), 'utf8'));
  }
}

/**
 * Encode the store's log, optionally for one device.
 */
export function exportMeasurements(
  store: Pick<MeasurementStore, 'query'>,
  format: string,
  deviceFilter?: string,
  options: EncodeOptions = {}
): Result<Buffer, ExportError> {
  return encodeMeasurements(store.query(deviceFilter), format, options);
}

/**
 * Write an export payload; all or nothing.
 */
export async function writeExportFile(path: string, payload: Buffer): Promise<Result<void, ExportError>> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);

  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(tempPath, payload);
    await fs.rename(tempPath, path);
  } catch (e) {
    const message = toError(e).message;
    try {
      await fs.rm(tempPath, { force: true });
    } catch (cleanupErr) {
      console.error(`[Export] Failed to remove temp file ${tempPath}:`, cleanupErr);
    }
    console.error(`[Export] Failed to write ${path}: ${message}`);
    return Err(benchError('IOFailure', `Failed to write ${path}: ${message}`));
  }

  console.log(`[Export] Wrote ${payload.length} bytes to ${path}`);
  return Ok();
}

/**
 * Default file name for an export, e.g. measurements_20240102_030405.csv
 */
export function defaultExportFileName(format: ExportFormat, at: number, deviceFilter?: string): string {
  const stamp = formatDisplayDate(at).replace(/-/g, '').replace(' ', '_').replace(/:/g, '');
  const prefix = deviceFilter ? `measurements_${deviceFilter.replace(/[^A-Za-z0-9_-]/g, '_')}` : 'measurements';
  return `${prefix}_${stamp}.${FILE_EXTENSIONS[format]}`;
}
