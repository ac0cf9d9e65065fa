/**
 * WebSocketHandler - Handles websocket connections and message routing
 *
 * - Sends a snapshot (devices, acquisition state, latest readings) on connect
 * - Forwards every acquisition event to all clients
 * - Answers snapshot/series requests and start/stop commands
 */

import type { RawData, WebSocket, WebSocketServer } from 'ws';
import type {
  AcquisitionEvent,
  ClientMessage,
  ServerMessage,
} from '../../shared/types.js';
import type { EventChannel } from '../events/EventChannel.js';
import type { InstrumentRegistry } from '../devices/registry.js';
import type { AcquisitionScheduler } from '../acquisition/AcquisitionScheduler.js';
import type { MeasurementStore } from '../measurements/MeasurementStore.js';

export interface WebSocketHandlerDeps {
  registry: Pick<InstrumentRegistry, 'getSummaries'>;
  scheduler: Pick<AcquisitionScheduler, 'getState' | 'start' | 'stop'>;
  store: Pick<MeasurementStore, 'latestPerDevice' | 'recentSeries' | 'displaySeries'>;
  channel: EventChannel<AcquisitionEvent>;
}

export interface WebSocketHandler {
  getClientCount(): number;
  broadcast(message: ServerMessage): void;
  close(): void;
}

const OPEN = 1;

let clientIdCounter = 0;

function generateClientId(): string {
  return `client-${++clientIdCounter}-${Date.now()}`;
}

// ws delivers Buffer, ArrayBuffer or Buffer[]
function rawToString(data: RawData): string | null {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (Array.isArray(data) && data.every(part => Buffer.isBuffer(part))) {
    return Buffer.concat(data).toString('utf8');
  }
  return null;
}

/**
 * Validate a decoded client message.
 */
export function parseClientMessage(value: unknown): ClientMessage | null {
  if (typeof value !== 'object' || value === null || !('type' in value)) return null;

  switch (value.type) {
    case 'getSnapshot':
      return { type: 'getSnapshot' };

    case 'stopAcquisition':
      return { type: 'stopAcquisition' };

    case 'startAcquisition': {
      const intervalMs = 'intervalMs' in value ? value.intervalMs : undefined;
      if (intervalMs === undefined) return { type: 'startAcquisition' };
      return typeof intervalMs === 'number' ? { type: 'startAcquisition', intervalMs } : null;
    }

    case 'getSeries': {
      const deviceName = 'deviceName' in value ? value.deviceName : undefined;
      if (typeof deviceName !== 'string') return null;
      const windowMs = 'windowMs' in value ? value.windowMs : undefined;
      if (windowMs === undefined) return { type: 'getSeries', deviceName };
      if (windowMs === null || typeof windowMs === 'number') {
        return { type: 'getSeries', deviceName, windowMs };
      }
      return null;
    }

    default:
      return null;
  }
}

export function createWebSocketHandler(
  wss: WebSocketServer,
  deps: WebSocketHandlerDeps
): WebSocketHandler {
  const { registry, scheduler, store, channel } = deps;
  const clients = new Map<WebSocket, string>();

  // Send a message to a specific client
  function send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  function snapshot(): ServerMessage {
    return {
      type: 'snapshot',
      devices: registry.getSummaries(),
      acquisition: scheduler.getState(),
      latest: Object.fromEntries(store.latestPerDevice()),
    };
  }

  function handleMessage(ws: WebSocket, raw: RawData): void {
    const text = rawToString(raw);
    let decoded: unknown;
    try {
      decoded = JSON.parse(text ?? '');
    } catch {
      send(ws, { type: 'error', code: 'INVALID_MESSAGE', message: 'Failed to parse JSON message' });
      return;
    }

    const message = parseClientMessage(decoded);
    if (!message) {
      send(ws, { type: 'error', code: 'UNKNOWN_MESSAGE_TYPE', message: `Unsupported message: ${text}` });
      return;
    }

    switch (message.type) {
      case 'getSnapshot':
        send(ws, snapshot());
        break;

      case 'getSeries': {
        const points = message.windowMs === undefined
          ? store.displaySeries(message.deviceName)
          : store.recentSeries(message.deviceName, message.windowMs);
        send(ws, { type: 'series', deviceName: message.deviceName, points });
        break;
      }

      case 'startAcquisition': {
        const result = scheduler.start(message.intervalMs);
        if (!result.ok) {
          send(ws, { type: 'error', code: result.error.kind, message: result.error.message });
          return;
        }
        send(ws, snapshot());
        break;
      }

      case 'stopAcquisition':
        scheduler.stop();
        send(ws, snapshot());
        break;
    }
  }

  function broadcast(message: ServerMessage): void {
    const data = JSON.stringify(message);
    for (const ws of clients.keys()) {
      if (ws.readyState === OPEN) {
        ws.send(data);
      }
    }
  }

  const unsubscribe = channel.subscribe('websocket', event => {
    broadcast({ type: 'event', event });
  });

  // Set up connection handler
  wss.on('connection', (ws: WebSocket) => {
    const clientId = generateClientId();
    clients.set(ws, clientId);
    send(ws, snapshot());

    ws.on('message', (data: RawData) => {
      handleMessage(ws, data);
    });

    ws.on('close', () => {
      clients.delete(ws);
    });

    ws.on('error', (err: Error) => {
      console.error(`[WebSocket] Error on ${clientId}:`, err);
      clients.delete(ws);
    });
  });

  return {
    getClientCount(): number {
      return clients.size;
    },

    broadcast,

    close(): void {
      unsubscribe();
      clients.clear();
    },
  };
}
