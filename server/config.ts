/**
 * Configuration (defaults, overridable by ENV)
 *
 *   BENCHLOG_POLL_INTERVAL_MS - Polling interval (default: 1000)
 *   BENCHLOG_QUERY_TIMEOUT_S  - Per-query timeout in seconds (default: 5)
 *   BENCHLOG_MAX_POINTS       - Recent-history points per device (default: 1000)
 *   BENCHLOG_TIME_WINDOW_S    - Display window in seconds, "none" for no window (default: 600)
 *   BENCHLOG_EXPORT_FORMAT    - CSV, JSON or TXT (default: CSV)
 *   PORT                      - HTTP port (default: 3001)
 *   BENCHLOG_DATA_DIR         - Database directory (default: platform data dir)
 *   BENCHLOG_EXPORT_DIR       - Export directory (default: <data dir>/exports)
 *   BENCHLOG_SERIAL_BAUD      - Serial baud rate (default: 9600)
 *   BENCHLOG_SIMULATE         - Comma-separated names of simulated multimeters
 */

import path from 'path';
import type { ExportFormat } from '../shared/types.js';
import { EXPORT_FORMATS } from '../shared/types.js';
import { getDefaultDataDirectory } from './db/database.js';

export interface AppConfig {
  pollIntervalMs: number;
  queryTimeoutMs: number;
  maxPoints: number;
  /** null means no display window */
  timeWindowMs: number | null;
  exportFormat: ExportFormat;
  port: number;
  dataDir: string;
  exportDir: string;
  serialBaudRate: number;
  simulatedDevices: string[];
}

export const DEFAULTS = {
  pollIntervalMs: 1000,
  queryTimeoutS: 5,
  maxPoints: 1000,
  timeWindowS: 600,
  exportFormat: 'CSV',
  port: 3001,
  serialBaudRate: 9600,
} as const;

function parsePositive(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultVal: number,
  integer: boolean
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return defaultVal;

  const parsed = integer ? Number(raw.trim()) : parseFloat(raw);
  if (!Number.isFinite(parsed) || parsed <= 0 || (integer && !Number.isInteger(parsed))) {
    console.warn(`[Config] Ignoring invalid ${name}="${raw}", using ${defaultVal}`);
    return defaultVal;
  }
  return parsed;
}

function parseTimeWindow(env: NodeJS.ProcessEnv): number | null {
  const raw = env.BENCHLOG_TIME_WINDOW_S;
  if (raw !== undefined && raw.trim().toLowerCase() === 'none') return null;
  return parsePositive(env, 'BENCHLOG_TIME_WINDOW_S', DEFAULTS.timeWindowS, false) * 1000;
}

function parseExportFormatEnv(env: NodeJS.ProcessEnv): ExportFormat {
  const raw = env.BENCHLOG_EXPORT_FORMAT;
  if (raw === undefined || raw.trim() === '') return DEFAULTS.exportFormat;

  const format = EXPORT_FORMATS.find(f => f === raw.trim().toUpperCase());
  if (!format) {
    console.warn(`[Config] Ignoring invalid BENCHLOG_EXPORT_FORMAT="${raw}", using ${DEFAULTS.exportFormat}`);
    return DEFAULTS.exportFormat;
  }
  return format;
}

function parseNameList(raw: string | undefined): string[] {
  if (!raw) return [];
  const names = raw.split(',').map(s => s.trim()).filter(s => s !== '');
  return [...new Set(names)];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const dataDir = env.BENCHLOG_DATA_DIR || getDefaultDataDirectory(env);

  return Object.freeze({
    pollIntervalMs: parsePositive(env, 'BENCHLOG_POLL_INTERVAL_MS', DEFAULTS.pollIntervalMs, true),
    queryTimeoutMs: parsePositive(env, 'BENCHLOG_QUERY_TIMEOUT_S', DEFAULTS.queryTimeoutS, false) * 1000,
    maxPoints: parsePositive(env, 'BENCHLOG_MAX_POINTS', DEFAULTS.maxPoints, true),
    timeWindowMs: parseTimeWindow(env),
    exportFormat: parseExportFormatEnv(env),
    port: parsePositive(env, 'PORT', DEFAULTS.port, true),
    dataDir,
    exportDir: env.BENCHLOG_EXPORT_DIR || path.join(dataDir, 'exports'),
    serialBaudRate: parsePositive(env, 'BENCHLOG_SERIAL_BAUD', DEFAULTS.serialBaudRate, true),
    simulatedDevices: parseNameList(env.BENCHLOG_SIMULATE),
  });
}
