/**
 * Statistics over measurement records and cached series.
 * Empty input gives a zero-value result, never an error.
 */

import type {
  DeviceStatistics,
  Measurement,
  SeriesPoint,
  SeriesStatistics,
  StatisticsSummary,
} from '../../shared/types.js';

/**
 * Summarize a list of measurements.
 *
 * `count`, `devices`, `functions` and `timeRange` cover every record.
 * `perDevice` only covers OK records; a device with none is left out.
 */
export function computeStatistics(measurements: readonly Measurement[]): StatisticsSummary {
  const devices = new Set<string>();
  const functions = new Set<string>();
  const perDevice = new Map<string, DeviceStatistics>();
  const sums = new Map<string, number>();
  let start = Infinity;
  let end = -Infinity;

  for (const m of measurements) {
    devices.add(m.deviceName);
    functions.add(m.function);
    start = Math.min(start, m.timestamp);
    end = Math.max(end, m.timestamp);

    if (m.status !== 'OK') continue;

    const current = perDevice.get(m.deviceName);
    if (current) {
      current.count++;
      current.min = Math.min(current.min, m.value);
      current.max = Math.max(current.max, m.value);
      current.lastValue = m.value;
    } else {
      perDevice.set(m.deviceName, { count: 1, min: m.value, max: m.value, mean: 0, lastValue: m.value });
    }
    sums.set(m.deviceName, (sums.get(m.deviceName) ?? 0) + m.value);
  }

  for (const [name, entry] of perDevice) {
    entry.mean = (sums.get(name) ?? 0) / entry.count;
  }

  return {
    count: measurements.length,
    devices: [...devices],
    functions: [...functions],
    timeRange: measurements.length > 0 ? { start, end, durationMs: end - start } : null,
    // Own keys, including "__proto__"
    perDevice: Object.fromEntries(perDevice),
  };
}

/** Population statistics of a series; nulls when empty. */
export function computeSeriesStatistics(points: readonly SeriesPoint[]): SeriesStatistics {
  if (points.length === 0) {
    return { count: 0, min: null, max: null, mean: null, std: null };
  }

  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const p of points) {
    min = Math.min(min, p.value);
    max = Math.max(max, p.value);
    sum += p.value;
  }
  const mean = sum / points.length;

  let squares = 0;
  for (const p of points) {
    squares += (p.value - mean) ** 2;
  }

  return { count: points.length, min, max, mean, std: Math.sqrt(squares / points.length) };
}
