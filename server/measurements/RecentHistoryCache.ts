/**
 * RecentHistoryCache - Fixed-capacity per-device history of OK readings
 *
 * Oldest points are evicted first. Reads return copies in chronological
 * (arrival) order and never change the cache.
 */

import type { SeriesPoint } from '../../shared/types.js';

export interface RecentHistoryCache {
  readonly capacity: number;
  append(deviceName: string, point: SeriesPoint): void;
  /** Points with timestamp >= now - windowMs; the whole cache when windowMs is null/undefined */
  series(deviceName: string, windowMs: number | null | undefined, now: number): SeriesPoint[];
  size(deviceName: string): number;
  deviceNames(): string[];
  clear(deviceName?: string): void;
}

export function createRecentHistoryCache(capacity: number): RecentHistoryCache {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Cache capacity must be an integer >= 1 (got ${capacity})`);
  }

  const buffers = new Map<string, SeriesPoint[]>();

  return {
    capacity,

    append(deviceName: string, point: SeriesPoint): void {
      let buffer = buffers.get(deviceName);
      if (!buffer) {
        buffer = [];
        buffers.set(deviceName, buffer);
      }
      buffer.push({ timestamp: point.timestamp, value: point.value });
      if (buffer.length > capacity) {
        buffer.splice(0, buffer.length - capacity);
      }
    },

    series(deviceName: string, windowMs: number | null | undefined, now: number): SeriesPoint[] {
      const buffer = buffers.get(deviceName) ?? [];
      if (windowMs === null || windowMs === undefined) {
        return buffer.map(p => ({ ...p }));
      }
      const cutoff = now - windowMs;
      return buffer.filter(p => p.timestamp >= cutoff).map(p => ({ ...p }));
    },

    size(deviceName: string): number {
      return buffers.get(deviceName)?.length ?? 0;
    },

    deviceNames(): string[] {
      return [...buffers.keys()];
    },

    clear(deviceName?: string): void {
      if (deviceName === undefined) {
        buffers.clear();
      } else {
        buffers.delete(deviceName);
      }
    },
  };
}
