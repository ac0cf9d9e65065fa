/**
 * AcquisitionScheduler - Polls every enabled, connected instrument on a fixed cadence
 *
 * - Idle -> start() -> Running -> stop() -> Idle
 * - Each tick reads poll targets fresh from the registry
 * - One task per device per tick, all concurrent; a device whose previous
 *   task is still running is skipped
 * - Failures stay with their device and become events
 * - stop() bumps the run generation; results of older generations are dropped
 */

import type {
  AcquisitionEvent,
  AcquisitionState,
  ConfigError,
  DeviceConfig,
  DeviceErrorCode,
  Measurement,
  Result,
  StartError,
} from '../../shared/types.js';
import { Ok, Err, benchError } from '../../shared/types.js';
import { getUnitForFunction } from '../devices/commands.js';
import { ScpiParser, mean } from '../devices/scpi-parser.js';
import type { EventChannel } from '../events/EventChannel.js';
import type { InstrumentRegistry, PollTarget } from '../devices/registry.js';
import type { InstrumentSession } from '../sessions/InstrumentSession.js';
import { queryFailureCode } from '../sessions/InstrumentSession.js';
import { monotonicNow } from '../measurements/timestamps.js';

export interface AcquisitionSchedulerConfig {
  intervalMs?: number;
  queryTimeoutMs?: number;
  /** Clock for measurement timestamps */
  now?: () => number;
}

export interface AcquisitionScheduler {
  start(intervalMs?: number): Result<AcquisitionState, StartError | ConfigError>;
  stop(): void;
  isRunning(): boolean;
  getState(): AcquisitionState;
  /** Run one polling pass now */
  tick(): Promise<void>;
}

const DEFAULT_CONFIG: Required<AcquisitionSchedulerConfig> = {
  intervalMs: 1000,
  queryTimeoutMs: 5000,
  now: monotonicNow,
};

type Reading =
  | { kind: 'value'; value: number; timestamp: number }
  | { kind: 'parseError'; rawReply: string; message: string; timestamp: number }
  | { kind: 'failure'; code: DeviceErrorCode; message: string };

export function createAcquisitionScheduler(
  registry: Pick<InstrumentRegistry, 'getPollTargets'>,
  channel: EventChannel<AcquisitionEvent>,
  config: AcquisitionSchedulerConfig = {}
): AcquisitionScheduler {
  const cfg: Required<AcquisitionSchedulerConfig> = { ...DEFAULT_CONFIG, ...config };

  let intervalMs = cfg.intervalMs;
  let timer: ReturnType<typeof setInterval> | null = null;
  let generation = 0;
  const inFlight = new Set<string>();

  // Query the resolved command sampleCount times and average every reading
  async function read(deviceConfig: DeviceConfig, session: InstrumentSession): Promise<Reading> {
    if (deviceConfig.resolvedCommand === '') {
      return {
        kind: 'failure',
        code: 'ConfigError',
        message: `No command for function "${deviceConfig.function}"`,
      };
    }

    const samples: number[] = [];
    for (let i = 0; i < deviceConfig.sampleCount; i++) {
      const reply = await session.query(deviceConfig.resolvedCommand, cfg.queryTimeoutMs);
      if (!reply.ok) {
        return { kind: 'failure', code: queryFailureCode(reply.error.reason), message: reply.error.message };
      }

      const parsed = ScpiParser.parseReadings(reply.value);
      if (!parsed.ok) {
        return { kind: 'parseError', rawReply: reply.value, message: parsed.error, timestamp: cfg.now() };
      }
      samples.push(...parsed.value);
    }

    return { kind: 'value', value: mean(samples), timestamp: cfg.now() };
  }

  function emitMeasurement(deviceConfig: DeviceConfig, timestamp: number, ok: boolean, value: number): void {
    const measurement: Measurement = {
      timestamp,
      deviceName: deviceConfig.name,
      function: deviceConfig.function,
      value: ok ? value : 0,
      unit: ok ? getUnitForFunction(deviceConfig.function) ?? '' : '',
      status: ok ? 'OK' : 'ERROR',
      userLabel: deviceConfig.userLabel,
    };
    channel.publish({ type: 'measurementRecorded', measurement: Object.freeze(measurement) });
  }

  async function pollDevice({ config: deviceConfig, session }: PollTarget, runGeneration: number): Promise<void> {
    inFlight.add(deviceConfig.name);
    try {
      const reading = await read(deviceConfig, session);
      if (runGeneration !== generation) return;

      switch (reading.kind) {
        case 'value':
          emitMeasurement(deviceConfig, reading.timestamp, true, reading.value);
          break;
        case 'parseError':
          emitMeasurement(deviceConfig, reading.timestamp, false, 0);
          console.warn(`[Scheduler] ${deviceConfig.name}: ${reading.message}`);
          channel.publish({
            type: 'deviceError',
            deviceName: deviceConfig.name,
            code: 'ParseError',
            message: reading.message,
            rawReply: reading.rawReply,
            timestamp: reading.timestamp,
          });
          break;
        case 'failure':
          console.warn(`[Scheduler] ${deviceConfig.name}: ${reading.message}`);
          channel.publish({
            type: 'deviceError',
            deviceName: deviceConfig.name,
            code: reading.code,
            message: reading.message,
            timestamp: cfg.now(),
          });
          break;
      }
    } finally {
      inFlight.delete(deviceConfig.name);
    }
  }

  async function tick(): Promise<void> {
    const runGeneration = generation;
    const targets = registry.getPollTargets().filter(t => !inFlight.has(t.config.name));
    const results = await Promise.allSettled(targets.map(t => pollDevice(t, runGeneration)));

    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') {
        console.error(`[Scheduler] Poll of ${targets[i].config.name} failed:`, result.reason);
      }
    }
  }

  function schedule(): void {
    if (timer) clearInterval(timer);
    timer = setInterval(() => {
      void tick();
    }, intervalMs);
  }

  return {
    start(requestedMs?: number): Result<AcquisitionState, StartError | ConfigError> {
      const nextInterval = requestedMs ?? intervalMs;
      if (!Number.isFinite(nextInterval) || nextInterval <= 0) {
        return Err(benchError('ConfigError', `Polling interval must be a positive number of ms (got ${nextInterval})`));
      }

      if (timer) {
        // Already running: only the cadence changes
        if (nextInterval !== intervalMs) {
          intervalMs = nextInterval;
          schedule();
          console.log(`[Scheduler] Interval changed to ${intervalMs} ms`);
        }
        return Ok({ running: true, intervalMs });
      }

      if (registry.getPollTargets().length === 0) {
        return Err(benchError('NoDevicesConfigured', 'No enabled and connected devices to poll'));
      }

      intervalMs = nextInterval;
      schedule();
      channel.publish({ type: 'acquisitionStarted', intervalMs });
      console.log(`[Scheduler] Started (every ${intervalMs} ms)`);
      return Ok({ running: true, intervalMs });
    },

    stop(): void {
      if (!timer) return;
      clearInterval(timer);
      timer = null;
      generation++;
      channel.publish({ type: 'acquisitionStopped' });
      console.log('[Scheduler] Stopped');
    },

    isRunning(): boolean {
      return timer !== null;
    },

    getState(): AcquisitionState {
      return { running: timer !== null, intervalMs };
    },

    tick,
  };
}
