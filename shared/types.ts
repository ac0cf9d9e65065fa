// Shared types for the server and API/WebSocket clients

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transports, sqlite, fs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok(value?: unknown): Result<unknown, never> {
  return { ok: true, value };
}

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Helper to wrap a throwing function into Result
export const tryResult = <T>(fn: () => T): Result<T, Error> => {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(toError(e));
  }
};

// Async version
export const tryResultAsync = async <T>(fn: () => Promise<T>): Promise<Result<T, Error>> => {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(toError(e));
  }
};

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export const Result = {
  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? Ok(fn(result.value)) : result;
  },

  unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
    return result.ok ? result.value : defaultValue;
  },

  mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
    return result.ok ? result : Err(fn(result.error));
  },
};

// ============ Errors ============

export type ErrorKind =
  | 'ConfigError'
  | 'ConnectionError'
  | 'QueryTimeout'
  | 'QueryIOFailure'
  | 'ParseError'
  | 'NoData'
  | 'UnsupportedFormat'
  | 'IOFailure'
  | 'NoDevicesConfigured'
  | 'UnknownFunction'
  | 'UnsupportedRange';

/** Error value carried in Result. `kind` is stable, `message` is for humans. */
export interface BenchError<K extends ErrorKind = ErrorKind> {
  kind: K;
  message: string;
}

export function benchError<K extends ErrorKind>(kind: K, message: string): BenchError<K> {
  return { kind, message };
}

export type ConfigError = BenchError<'ConfigError'>;
export type ConnectionError = BenchError<'ConnectionError'>;
export type CommandError = BenchError<'UnknownFunction' | 'UnsupportedRange'>;
export type ExportError = BenchError<'NoData' | 'UnsupportedFormat' | 'IOFailure'>;
export type StartError = BenchError<'NoDevicesConfigured'>;

// ============ Measurement functions ============

export const MEASUREMENT_FUNCTIONS = [
  'DC Voltage',
  'AC Voltage',
  'DC Current',
  'AC Current',
  'Resistance (2-wire)',
  'Resistance (4-wire)',
  'Frequency',
  'Temperature',
] as const;

export type MeasurementFunction = (typeof MEASUREMENT_FUNCTIONS)[number];

export function isMeasurementFunction(value: string): value is MeasurementFunction {
  return MEASUREMENT_FUNCTIONS.some(fn => fn === value);
}

export const AUTO_RANGE = 'AUTO';

// ============ Device configuration ============

export interface DeviceConfig {
  /** Unique key */
  name: string;
  /** Transport locator, e.g. USB0::0x2A8D::0x1301::INSTR */
  address: string;
  /** Free text; validated against the function table when the command is resolved */
  function: string;
  range: string;
  /** Samples averaged per reading (>= 1) */
  sampleCount: number;
  userLabel: string;
  /** Derived from function + range; empty when the function is unknown */
  resolvedCommand: string;
  enabled: boolean;
}

/** What callers provide; resolvedCommand is always derived. */
export interface DeviceConfigInput {
  name: string;
  address?: string;
  function: string;
  range?: string;
  sampleCount?: number;
  userLabel?: string;
  enabled?: boolean;
}

// ============ Measurements ============

export type MeasurementStatus = 'OK' | 'ERROR';

export interface Measurement {
  /** Epoch milliseconds, microsecond resolution */
  readonly timestamp: number;
  readonly deviceName: string;
  readonly function: string;
  readonly value: number;
  readonly unit: string;
  readonly status: MeasurementStatus;
  readonly userLabel: string;
}

export interface SeriesPoint {
  timestamp: number;
  value: number;
}

export interface DeviceStatistics {
  count: number;
  min: number;
  max: number;
  mean: number;
  lastValue: number;
}

export interface TimeRange {
  start: number;
  end: number;
  durationMs: number;
}

export interface StatisticsSummary {
  count: number;
  devices: string[];
  functions: string[];
  timeRange: TimeRange | null;
  perDevice: Record<string, DeviceStatistics>;
}

export interface SeriesStatistics {
  count: number;
  min: number | null;
  max: number | null;
  mean: number | null;
  std: number | null;
}

export type ExportFormat = 'CSV' | 'JSON' | 'TXT';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['CSV', 'JSON', 'TXT'];

// ============ Events ============

export type DeviceErrorCode = 'ConfigError' | 'QueryTimeout' | 'QueryIOFailure' | 'ParseError';

export type AcquisitionEvent =
  | { type: 'measurementRecorded'; measurement: Measurement }
  | {
      type: 'deviceError';
      deviceName: string;
      code: DeviceErrorCode;
      message: string;
      rawReply?: string;
      timestamp: number;
    }
  | { type: 'deviceConnected'; deviceName: string; address: string; identity: string }
  | { type: 'deviceDisconnected'; deviceName: string }
  | { type: 'deviceConfigured'; config: DeviceConfig }
  | { type: 'deviceRemoved'; deviceName: string }
  | { type: 'acquisitionStarted'; intervalMs: number }
  | { type: 'acquisitionStopped' };

// ============ API / WebSocket types ============

export interface DeviceSummary {
  config: DeviceConfig | null;
  name: string;
  connected: boolean;
  address: string | null;
  identity: string | null;
}

export interface AcquisitionState {
  running: boolean;
  intervalMs: number;
}

export interface ApiError {
  error: string;
  message: string;
}

// Client -> Server messages
export type ClientMessage =
  | { type: 'getSnapshot' }
  | { type: 'getSeries'; deviceName: string; windowMs?: number | null }
  | { type: 'startAcquisition'; intervalMs?: number }
  | { type: 'stopAcquisition' };

// Server -> Client messages
export type ServerMessage =
  | {
      type: 'snapshot';
      devices: DeviceSummary[];
      acquisition: AcquisitionState;
      latest: Record<string, Measurement>;
    }
  | { type: 'series'; deviceName: string; points: SeriesPoint[] }
  | { type: 'event'; event: AcquisitionEvent }
  | { type: 'error'; code: string; message: string };
