/**
 * benchlog server
 * Polls bench instruments and serves measurements over REST and WebSocket
 */

import { createServer } from 'http';
import express from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import type { AcquisitionEvent } from '../shared/types.js';
import { loadConfig } from './config.js';
import { createEventChannel } from './events/EventChannel.js';
import { createInstrumentBus } from './devices/bus.js';
import { createSimulation } from './devices/simulation/index.js';
import { formatSimulatedAddress } from './devices/simulation/simulated-transport.js';
import { auditCommandTable } from './devices/commands.js';
import { createInstrumentRegistry } from './devices/registry.js';
import { createAcquisitionScheduler } from './acquisition/AcquisitionScheduler.js';
import { attachMeasurementStore, createMeasurementStore } from './measurements/MeasurementStore.js';
import { createDatabase, createDeviceConfigStore } from './db/index.js';
import { createDeviceRoutes } from './api/devices.js';
import { createAcquisitionRoutes } from './api/acquisition.js';
import { createMeasurementRoutes } from './api/measurements.js';
import { createWebSocketHandler } from './websocket/WebSocketHandler.js';

const config = loadConfig();

const commandIssues = auditCommandTable();
if (commandIssues.length > 0) {
  console.warn(
    `[Commands] MEAS:->CONF: substitution misfires for ${commandIssues.length} function(s); using table configure commands`
  );
  for (const issue of commandIssues) {
    console.warn(`[Commands]   ${issue.function}: "${issue.substituted}" vs "${issue.expected}"`);
  }
}

const channel = createEventChannel<AcquisitionEvent>('Events');

const simulation = config.simulatedDevices.length > 0
  ? createSimulation(config.simulatedDevices)
  : undefined;

const bus = createInstrumentBus({
  serial: { baudRate: config.serialBaudRate },
  usbtmc: { timeout: config.queryTimeoutMs },
  simulation,
});

const registry = createInstrumentRegistry(bus, channel, {
  identifyTimeoutMs: config.queryTimeoutMs,
  commandTimeoutMs: config.queryTimeoutMs,
});

const store = createMeasurementStore({
  maxPoints: config.maxPoints,
  timeWindowMs: config.timeWindowMs,
});
attachMeasurementStore(channel, store);

const scheduler = createAcquisitionScheduler(registry, channel, {
  intervalMs: config.pollIntervalMs,
  queryTimeoutMs: config.queryTimeoutMs,
});

// Device configurations survive restarts; measurements do not
const db = createDatabase(config.dataDir);
const configStore = createDeviceConfigStore(db);

function loadSavedConfigs(): void {
  const saved = configStore.list();
  if (!saved.ok) {
    console.error('[Database] Failed to load device configs:', saved.error.message);
    return;
  }
  for (const input of saved.value) {
    const result = registry.addOrUpdate(input);
    if (!result.ok) {
      console.warn(`[Database] Skipping saved device "${input.name}": ${result.error.message}`);
    }
  }
  console.log(`[Database] Loaded ${saved.value.length} device config(s)`);
}

// Simulated instruments get a config of their own unless one was saved
function addSimulatedDevices(): void {
  for (const name of config.simulatedDevices) {
    if (registry.getConfig(name)) continue;
    registry.addOrUpdate({
      name,
      address: formatSimulatedAddress(name),
      function: 'DC Voltage',
      userLabel: 'Simulated',
    });
  }
}

loadSavedConfigs();
addSimulatedDevices();

channel.subscribe('config-persistence', event => {
  if (event.type === 'deviceConfigured') {
    const saved = configStore.save(event.config);
    if (!saved.ok) console.error(`[Database] Failed to save ${event.config.name}:`, saved.error.message);
  } else if (event.type === 'deviceRemoved') {
    const deleted = configStore.delete(event.deviceName);
    if (!deleted.ok) console.error(`[Database] Failed to delete ${event.deviceName}:`, deleted.error.message);
  }
});

// Create Express app
const app = express();
app.use(cors());
app.use(express.json());

app.use('/api/devices', createDeviceRoutes(registry));
app.use('/api/acquisition', createAcquisitionRoutes(scheduler));
app.use('/api/measurements', createMeasurementRoutes(store, {
  exportDir: config.exportDir,
  defaultExportFormat: config.exportFormat,
}));

// Health check
app.get('/api/health', (_req, res) => {
  res.json({
    status: 'ok',
    devices: registry.listConfigs().length,
    connected: registry.listConnected().size,
    acquisition: scheduler.getState(),
    measurements: store.count(),
    wsClients: wsHandler.getClientCount(),
  });
});

// Create HTTP server (needed for WebSocket)
const server = createServer(app);

const wss = new WebSocketServer({ server, path: '/ws' });
const wsHandler = createWebSocketHandler(wss, { registry, scheduler, store, channel });

// Connect every enabled device with an address
async function connectConfigured(): Promise<void> {
  const targets = registry.listConfigs().filter(c => c.enabled && c.address !== '');
  const results = await Promise.all(targets.map(c => registry.connect(c.name)));
  results.forEach((result, i) => {
    if (!result.ok) {
      console.warn(`[Registry] Could not connect ${targets[i].name}: ${result.error.message}`);
    }
  });
}

async function start(): Promise<void> {
  console.log('benchlog server starting...');
  console.log(`  Poll interval: ${config.pollIntervalMs}ms`);
  console.log(`  Query timeout: ${config.queryTimeoutMs / 1000}s`);
  console.log(`  History: ${config.maxPoints} points, window ${config.timeWindowMs === null ? 'none' : `${config.timeWindowMs / 1000}s`}`);
  console.log(`  Data directory: ${config.dataDir}`);
  console.log('');

  await connectConfigured();
  console.log(`Connected ${registry.listConnected().size} device(s)`);

  server.listen(config.port, () => {
    console.log('');
    console.log(`Server running on http://localhost:${config.port}`);
    console.log('WebSocket endpoint: ws://localhost:' + config.port + '/ws');
  });
}

let shuttingDown = false;

async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log('Shutting down...');
  scheduler.stop();
  wsHandler.close();
  await registry.closeAll();
  db.close();
  server.close(() => {
    console.log('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('SIGINT', () => {
  void shutdown();
});

start().catch(err => {
  console.error('Startup failed:', err);
  process.exit(1);
});
