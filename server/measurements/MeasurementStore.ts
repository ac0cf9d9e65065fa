/**
 * MeasurementStore - Every measurement of the run plus a bounded recent history
 *
 * - The log is append-only and only shrinks through clear()
 * - OK readings also go to the per-device recent-history cache
 * - Reads return copies; clear() builds the new log before swapping it in
 * - Nothing is persisted: the store lives for one process run
 */

import type {
  AcquisitionEvent,
  Measurement,
  SeriesPoint,
  SeriesStatistics,
  StatisticsSummary,
} from '../../shared/types.js';
import type { EventChannel } from '../events/EventChannel.js';
import { createRecentHistoryCache } from './RecentHistoryCache.js';
import { computeSeriesStatistics, computeStatistics } from './statistics.js';
import { monotonicNow } from './timestamps.js';

export interface MeasurementStoreConfig {
  /** Recent-history capacity per device (default: 1000) */
  maxPoints?: number;
  /** Display window in ms, null for no window (default: 600000) */
  timeWindowMs?: number | null;
  /** Clock used for window filtering */
  now?: () => number;
}

export interface MeasurementStore {
  readonly maxPoints: number;
  readonly timeWindowMs: number | null;
  record(measurement: Measurement): void;
  /** Log entries in arrival order, optionally for one device, optionally the latest `limit` */
  query(deviceName?: string, limit?: number): Measurement[];
  latestPerDevice(): Map<string, Measurement>;
  /** Cached points; null or undefined window returns the whole cache */
  recentSeries(deviceName: string, windowMs?: number | null): SeriesPoint[];
  /** Cached points within the configured display window */
  displaySeries(deviceName: string): SeriesPoint[];
  allSeries(windowMs?: number | null): Record<string, SeriesPoint[]>;
  clear(deviceName?: string): void;
  snapshot(): readonly Measurement[];
  count(): number;
  deviceNames(): string[];
  stats(deviceFilter?: string): StatisticsSummary;
  recentStats(deviceName: string, windowMs?: number | null): SeriesStatistics;
}

const DEFAULT_CONFIG: Required<MeasurementStoreConfig> = {
  maxPoints: 1000,
  timeWindowMs: 600_000,
  now: monotonicNow,
};

export function createMeasurementStore(config: MeasurementStoreConfig = {}): MeasurementStore {
  const cfg: Required<MeasurementStoreConfig> = { ...DEFAULT_CONFIG, ...config };

  let log: Measurement[] = [];
  const latest = new Map<string, Measurement>();
  const cache = createRecentHistoryCache(cfg.maxPoints);

  function filtered(deviceName?: string): Measurement[] {
    return deviceName === undefined ? [...log] : log.filter(m => m.deviceName === deviceName);
  }

  const store: MeasurementStore = {
    maxPoints: cfg.maxPoints,
    timeWindowMs: cfg.timeWindowMs,

    record(measurement: Measurement): void {
      const entry = Object.isFrozen(measurement) ? measurement : Object.freeze({ ...measurement });
      log.push(entry);
      latest.set(entry.deviceName, entry);
      if (entry.status === 'OK') {
        cache.append(entry.deviceName, { timestamp: entry.timestamp, value: entry.value });
      }
    },

    query(deviceName?: string, limit?: number): Measurement[] {
      const entries = filtered(deviceName);
      if (limit === undefined) return entries;
      if (limit <= 0) return [];
      return entries.slice(-limit);
    },

    latestPerDevice(): Map<string, Measurement> {
      return new Map(latest);
    },

    recentSeries(deviceName: string, windowMs?: number | null): SeriesPoint[] {
      return cache.series(deviceName, windowMs, cfg.now());
    },

    displaySeries(deviceName: string): SeriesPoint[] {
      return cache.series(deviceName, cfg.timeWindowMs, cfg.now());
    },

    allSeries(windowMs?: number | null): Record<string, SeriesPoint[]> {
      const now = cfg.now();
      return Object.fromEntries(
        cache.deviceNames().map((name): [string, SeriesPoint[]] => [name, cache.series(name, windowMs, now)])
      );
    },

    clear(deviceName?: string): void {
      if (deviceName === undefined) {
        log = [];
        latest.clear();
        cache.clear();
        console.log('[Store] Cleared all measurements');
        return;
      }

      const remaining = log.filter(m => m.deviceName !== deviceName);
      log = remaining;
      latest.delete(deviceName);
      cache.clear(deviceName);
      console.log(`[Store] Cleared measurements for ${deviceName}`);
    },

    snapshot(): readonly Measurement[] {
      return [...log];
    },

    count(): number {
      return log.length;
    },

    deviceNames(): string[] {
      return [...latest.keys()];
    },

    stats(deviceFilter?: string): StatisticsSummary {
      return computeStatistics(filtered(deviceFilter));
    },

    recentStats(deviceName: string, windowMs?: number | null): SeriesStatistics {
      return computeSeriesStatistics(cache.series(deviceName, windowMs, cfg.now()));
    },
  };

  return store;
}

/**
 * Record every measurementRecorded event in the store.
 * Returns the unsubscribe function.
 */
export function attachMeasurementStore(
  channel: EventChannel<AcquisitionEvent>,
  store: MeasurementStore
): () => void {
  return channel.subscribe('measurement-store', event => {
    if (event.type === 'measurementRecorded') {
      store.record(event.measurement);
    }
  });
}
