/**
 * Device API Routes
 * Configure, connect and talk to instruments
 */

import { Router } from 'express';
import type { InstrumentRegistry } from '../devices/registry.js';
import type { DeviceConfigInput, Result } from '../devices/types.js';
import { Ok, Err, toError } from '../../shared/types.js';
import { FUNCTION_TABLE, getFunctionList } from '../devices/commands.js';
import { sendBenchError, sendError } from './errors.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, key: string): Result<string | undefined, string> {
  const value = body[key];
  if (value === undefined || value === null) return Ok(undefined);
  return typeof value === 'string' ? Ok(value) : Err(`"${key}" must be a string`);
}

/**
 * Validate a PUT /api/devices/:name body.
 */
export function parseDeviceConfigBody(name: string, body: unknown): Result<DeviceConfigInput, string> {
  if (!isObject(body)) return Err('Request body must be a JSON object');

  const fn = body.function;
  if (typeof fn !== 'string') return Err('"function" is required');

  const address = optionalString(body, 'address');
  if (!address.ok) return address;
  const range = optionalString(body, 'range');
  if (!range.ok) return range;
  const userLabel = optionalString(body, 'userLabel');
  if (!userLabel.ok) return userLabel;

  const { sampleCount, enabled } = body;
  if (sampleCount !== undefined && typeof sampleCount !== 'number') {
    return Err('"sampleCount" must be a number');
  }
  if (enabled !== undefined && typeof enabled !== 'boolean') {
    return Err('"enabled" must be a boolean');
  }

  return Ok({
    name,
    function: fn,
    address: address.value,
    range: range.value,
    userLabel: userLabel.value,
    sampleCount,
    enabled,
  });
}

export function createDeviceRoutes(registry: InstrumentRegistry): Router {
  const router = Router();

  // GET /api/devices - Configured and connected devices
  router.get('/', (_req, res) => {
    res.json({ devices: registry.getSummaries() });
  });

  // GET /api/devices/addresses - Addresses reachable on the bus
  router.get('/addresses', async (_req, res) => {
    try {
      res.json({ addresses: await registry.listAddresses() });
    } catch (err) {
      sendError(res, 500, 'SCAN_FAILED', toError(err).message);
    }
  });

  // GET /api/devices/functions - Measurement functions with units and ranges
  router.get('/functions', (_req, res) => {
    res.json({
      functions: getFunctionList().map(fn => ({
        name: fn,
        description: FUNCTION_TABLE[fn].description,
        unit: FUNCTION_TABLE[fn].unit,
        ranges: FUNCTION_TABLE[fn].ranges,
      })),
    });
  });

  // PUT /api/devices/:name - Add or replace a device configuration
  router.put('/:name', (req, res) => {
    const input = parseDeviceConfigBody(req.params.name, req.body);
    if (!input.ok) {
      sendError(res, 400, 'ConfigError', input.error);
      return;
    }

    const result = registry.addOrUpdate(input.value);
    if (!result.ok) {
      sendBenchError(res, result.error);
      return;
    }
    res.json(result.value);
  });

  // DELETE /api/devices/:name - Remove configuration and close the session
  router.delete('/:name', async (req, res) => {
    const outcome = await registry.remove(req.params.name);
    if (outcome === 'notFound') {
      sendError(res, 404, 'NOT_FOUND', 'Device not found');
      return;
    }
    res.status(204).end();
  });

  // POST /api/devices/:name/connect - Open a session { address? }
  router.post('/:name/connect', async (req, res) => {
    const body: unknown = req.body;
    const address = isObject(body) ? optionalString(body, 'address') : Ok(undefined);
    if (!address.ok) {
      sendError(res, 400, 'ConfigError', address.error);
      return;
    }

    const result = await registry.connect(req.params.name, address.value);
    if (!result.ok) {
      sendBenchError(res, result.error);
      return;
    }
    res.json(result.value);
  });

  // POST /api/devices/:name/disconnect - Close the session
  router.post('/:name/disconnect', async (req, res) => {
    const outcome = await registry.disconnect(req.params.name);
    if (outcome === 'notFound') {
      sendError(res, 404, 'NOT_FOUND', 'Device not connected');
      return;
    }
    res.json({ success: true });
  });

  // GET /api/devices/:name/status - Configuration and connection state
  router.get('/:name/status', (req, res) => {
    const status = registry.getDeviceStatus(req.params.name);
    if (!status) {
      sendError(res, 404, 'NOT_FOUND', 'Device not found');
      return;
    }
    res.json(status);
  });

  // POST /api/devices/:name/command - Send a custom SCPI command { command }
  router.post('/:name/command', async (req, res) => {
    const body: unknown = req.body;
    const command = isObject(body) ? body.command : undefined;
    if (typeof command !== 'string') {
      sendError(res, 400, 'ConfigError', '"command" is required');
      return;
    }

    const result = await registry.sendCommand(req.params.name, command);
    if (!result.ok) {
      sendBenchError(res, result.error);
      return;
    }
    res.json({ command, reply: result.value });
  });

  return router;
}
