/**
 * Acquisition API Routes
 */

import { Router } from 'express';
import type { AcquisitionScheduler } from '../acquisition/AcquisitionScheduler.js';
import { sendBenchError, sendError } from './errors.js';

export function createAcquisitionRoutes(scheduler: AcquisitionScheduler): Router {
  const router = Router();

  // GET /api/acquisition - Running state and interval
  router.get('/', (_req, res) => {
    res.json(scheduler.getState());
  });

  // POST /api/acquisition/start - { intervalMs? }
  router.post('/start', (req, res) => {
    const body: unknown = req.body;
    let intervalMs: number | undefined;
    if (typeof body === 'object' && body !== null && 'intervalMs' in body) {
      const requested = body.intervalMs;
      if (typeof requested !== 'number') {
        sendError(res, 400, 'ConfigError', '"intervalMs" must be a number');
        return;
      }
      intervalMs = requested;
    }

    const result = scheduler.start(intervalMs);
    if (!result.ok) {
      sendBenchError(res, result.error);
      return;
    }
    res.json(result.value);
  });

  // POST /api/acquisition/stop
  router.post('/stop', (_req, res) => {
    scheduler.stop();
    res.json(scheduler.getState());
  });

  return router;
}
