/**
 * Measurement API Routes
 * Log queries, recent series, statistics and export
 */

import path from 'path';
import { Router } from 'express';
import type { ExportFormat } from '../../shared/types.js';
import type { MeasurementStore } from '../measurements/MeasurementStore.js';
import {
  defaultExportFileName,
  exportMeasurements,
  getFileExtension,
  parseExportFormat,
  writeExportFile,
} from '../measurements/export.js';
import { monotonicNow } from '../measurements/timestamps.js';
import { queryString, sendBenchError, sendError } from './errors.js';

export interface MeasurementRoutesConfig {
  exportDir: string;
  defaultExportFormat: ExportFormat;
}

const CONTENT_TYPES: Record<ExportFormat, string> = {
  CSV: 'text/csv; charset=utf-8',
  JSON: 'application/json; charset=utf-8',
  TXT: 'text/plain; charset=utf-8',
};

type WindowParam = { ok: true; windowMs: number | null | undefined } | { ok: false };

// ?window=<seconds> | none; absent means the configured display window
function parseWindow(raw: string | undefined): WindowParam {
  if (raw === undefined) return { ok: true, windowMs: undefined };
  if (raw.toLowerCase() === 'none') return { ok: true, windowMs: null };
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) return { ok: false };
  return { ok: true, windowMs: seconds * 1000 };
}

export function createMeasurementRoutes(store: MeasurementStore, config: MeasurementRoutesConfig): Router {
  const router = Router();

  // GET /api/measurements?device=&limit= - Log entries in arrival order
  router.get('/', (req, res) => {
    const device = queryString(req.query.device);
    const limitParam = queryString(req.query.limit);
    const limit = limitParam === undefined ? undefined : Number(limitParam);
    if (limit !== undefined && !Number.isInteger(limit)) {
      sendError(res, 400, 'ConfigError', '"limit" must be an integer');
      return;
    }
    res.json({ measurements: store.query(device, limit), total: store.count() });
  });

  // GET /api/measurements/latest - Latest record per device
  router.get('/latest', (_req, res) => {
    res.json({ latest: Object.fromEntries(store.latestPerDevice()) });
  });

  // GET /api/measurements/series/:name?window= - Recent-history points and their statistics
  router.get('/series/:name', (req, res) => {
    const window = parseWindow(queryString(req.query.window));
    if (!window.ok) {
      sendError(res, 400, 'ConfigError', '"window" must be a number of seconds or "none"');
      return;
    }

    const name = req.params.name;
    const points = window.windowMs === undefined
      ? store.displaySeries(name)
      : store.recentSeries(name, window.windowMs);
    const stats = window.windowMs === undefined
      ? store.recentStats(name, store.timeWindowMs)
      : store.recentStats(name, window.windowMs);

    res.json({ deviceName: name, points, stats });
  });

  // GET /api/measurements/stats?device= - Summary over the log
  router.get('/stats', (req, res) => {
    res.json(store.stats(queryString(req.query.device)));
  });

  // GET /api/measurements/export?format=&device= - Download an export
  router.get('/export', (req, res) => {
    const format = parseExportFormat(queryString(req.query.format) ?? config.defaultExportFormat);
    if (!format.ok) {
      sendBenchError(res, format.error);
      return;
    }

    const device = queryString(req.query.device);
    const payload = exportMeasurements(store, format.value, device);
    if (!payload.ok) {
      sendBenchError(res, payload.error);
      return;
    }

    const fileName = defaultExportFileName(format.value, monotonicNow(), device);
    res.setHeader('Content-Type', CONTENT_TYPES[format.value]);
    res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
    res.send(payload.value);
  });

  // POST /api/measurements/export - Write an export file { format?, device?, fileName? }
  router.post('/export', async (req, res) => {
    const body: unknown = req.body;
    const fields: object = typeof body === 'object' && body !== null ? body : {};
    const requestedFormat = 'format' in fields ? fields.format : undefined;
    const requestedDevice = 'device' in fields ? fields.device : undefined;
    const requestedName = 'fileName' in fields ? fields.fileName : undefined;

    if (
      (requestedFormat !== undefined && typeof requestedFormat !== 'string') ||
      (requestedDevice !== undefined && typeof requestedDevice !== 'string') ||
      (requestedName !== undefined && typeof requestedName !== 'string')
    ) {
      sendError(res, 400, 'ConfigError', '"format", "device" and "fileName" must be strings');
      return;
    }

    const format = parseExportFormat(requestedFormat ?? config.defaultExportFormat);
    if (!format.ok) {
      sendBenchError(res, format.error);
      return;
    }

    const payload = exportMeasurements(store, format.value, requestedDevice);
    if (!payload.ok) {
      sendBenchError(res, payload.error);
      return;
    }

    // Only a bare file name is accepted; exports always land in the export directory
    const fileName = requestedName
      ? `${path.basename(requestedName, `.${getFileExtension(format.value)}`)}.${getFileExtension(format.value)}`
      : defaultExportFileName(format.value, monotonicNow(), requestedDevice);
    const filePath = path.join(config.exportDir, fileName);

    const written = await writeExportFile(filePath, payload.value);
    if (!written.ok) {
      sendBenchError(res, written.error);
      return;
    }
    res.status(201).json({ path: filePath, bytes: payload.value.length, format: format.value });
  });

  // DELETE /api/measurements?device= - Clear the log (and caches)
  router.delete('/', (req, res) => {
    store.clear(queryString(req.query.device));
    res.status(204).end();
  });

  return router;
}
