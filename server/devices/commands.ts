/**
 * Measurement function table and command resolution
 *
 * The table is the single source of truth for every function's query
 * command, configure command, unit and valid ranges. Resolution is pure:
 * no session, no state.
 */

import type { CommandError, MeasurementFunction, Result } from './types.js';
import { AUTO_RANGE, Err, MEASUREMENT_FUNCTIONS, Ok, benchError, isMeasurementFunction } from './types.js';

export interface FunctionInfo {
  /** Query returning one reading with the instrument's current range */
  query: string;
  /** Configure command taking the range as its parameter */
  configure: string;
  description: string;
  unit: string;
  ranges: readonly string[];
}

const RESISTANCE_RANGES = ['AUTO', '100', '1K', '10K', '100K', '1M', '10M', '100M'] as const;
const CURRENT_RANGES = ['AUTO', '0.001', '0.01', '0.1', '1', '3'] as const;

export const FUNCTION_TABLE: Readonly<Record<MeasurementFunction, FunctionInfo>> = {
  'DC Voltage': {
    query: 'MEAS:VOLT:DC?',
    configure: 'CONF:VOLT:DC',
    description: 'Measure DC voltage',
    unit: 'V',
    ranges: ['AUTO', '0.1', '1', '10', '100', '1000'],
  },
  'AC Voltage': {
    query: 'MEAS:VOLT:AC?',
    configure: 'CONF:VOLT:AC',
    description: 'Measure AC voltage',
    unit: 'V',
    ranges: ['AUTO', '0.1', '1', '10', '100', '750'],
  },
  'DC Current': {
    query: 'MEAS:CURR:DC?',
    configure: 'CONF:CURR:DC',
    description: 'Measure DC current',
    unit: 'A',
    ranges: CURRENT_RANGES,
  },
  'AC Current': {
    query: 'MEAS:CURR:AC?',
    configure: 'CONF:CURR:AC',
    description: 'Measure AC current',
    unit: 'A',
    ranges: CURRENT_RANGES,
  },
  'Resistance (2-wire)': {
    query: 'MEAS:RES?',
    configure: 'CONF:RES',
    description: 'Measure resistance (2-wire)',
    unit: 'Ω',
    ranges: RESISTANCE_RANGES,
  },
  'Resistance (4-wire)': {
    query: 'MEAS:FRES?',
    configure: 'CONF:FRES',
    description: 'Measure resistance (4-wire)',
    unit: 'Ω',
    ranges: RESISTANCE_RANGES,
  },
  'Frequency': {
    query: 'MEAS:FREQ?',
    configure: 'CONF:FREQ',
    description: 'Measure frequency',
    unit: 'Hz',
    ranges: ['AUTO', '1', '10', '100', '1K', '10K', '100K', '1M'],
  },
  'Temperature': {
    query: 'MEAS:TEMP?',
    configure: 'CONF:TEMP',
    description: 'Measure temperature',
    unit: '°C',
    ranges: ['AUTO', 'RTD', 'THERMISTOR', 'THERMOCOUPLE'],
  },
};

/** IEEE 488.2 common commands */
export const COMMON_COMMANDS = {
  reset: '*RST',
  clearStatus: '*CLS',
  selfTest: '*TST?',
  identify: '*IDN?',
  operationComplete: '*OPC?',
  wait: '*WAI',
} as const;

// Appended to a configure command so the resolved command still returns a reading
const READ_SUFFIX = ';:READ?';

const ENGINEERING_SUFFIXES: Record<string, string> = {
  K: 'E3',
  M: 'E6',
  G: 'E9',
};

export function getFunctionList(): MeasurementFunction[] {
  return [...MEASUREMENT_FUNCTIONS];
}

export function getFunctionInfo(fn: string): FunctionInfo | undefined {
  return isMeasurementFunction(fn) ? FUNCTION_TABLE[fn] : undefined;
}

export function getUnitForFunction(fn: string): string | undefined {
  return getFunctionInfo(fn)?.unit;
}

export function getRangesForFunction(fn: string): readonly string[] {
  return getFunctionInfo(fn)?.ranges ?? [];
}

/**
 * Convert a table range token to a SCPI numeric.
 * "1K" -> "1E3", "10M" -> "1E7"; tokens without a suffix pass through.
 * A bare M suffix is milli in SCPI, so suffixed tokens are never sent as-is.
 */
export function normalizeRangeToken(token: string): string {
  const match = token.match(/^(\d+(?:\.\d+)?)([KMG])$/i);
  if (!match) return token;

  const [, mantissa, suffix] = match;
  const exponent = ENGINEERING_SUFFIXES[suffix.toUpperCase()];
  const digits = mantissa.replace(/^0+(?=\d)/, '');
  // 10K -> 1E4, 100M -> 1E8; keep non power-of-ten mantissas as written
  const powerOfTen = digits.match(/^1(0*)$/);
  if (powerOfTen) {
    return `1E${Number(exponent.slice(1)) + powerOfTen[1].length}`;
  }
  return `${digits}${exponent}`;
}

/**
 * Resolve the command sent for one reading.
 *
 * AUTO (or no range) returns the function's query unchanged. Any other range
 * returns the configure form parameterized with the range, chained with READ?.
 */
export function resolveCommand(fn: string, range?: string): Result<string, CommandError> {
  const info = getFunctionInfo(fn);
  if (!info) {
    return Err(benchError('UnknownFunction', `Unknown measurement function: "${fn}"`));
  }

  const selected = range?.trim() ?? '';
  if (selected === '' || selected.toUpperCase() === AUTO_RANGE) {
    return Ok(info.query);
  }

  const match = info.ranges.find(r => r.toUpperCase() === selected.toUpperCase());
  if (!match) {
    return Err(benchError(
      'UnsupportedRange',
      `Range "${selected}" is not valid for ${fn} (expected one of: ${info.ranges.join(', ')})`,
    ));
  }

  return Ok(`${info.configure} ${normalizeRangeToken(match)}${READ_SUFFIX}`);
}

export interface CommandTableIssue {
  function: MeasurementFunction;
  substituted: string;
  expected: string;
}

/**
 * List functions where swapping the query's MEAS: prefix for CONF: does not
 * give the table's configure command (the '?' stays, so "CONF:VOLT:DC? 10"
 * would be sent). resolveCommand never substitutes; this only reports which
 * entries would misfire under that rule.
 */
export function auditCommandTable(
  table: Readonly<Record<MeasurementFunction, FunctionInfo>> = FUNCTION_TABLE,
): CommandTableIssue[] {
  const issues: CommandTableIssue[] = [];
  for (const fn of MEASUREMENT_FUNCTIONS) {
    const info = table[fn];
    const substituted = info.query.replace(/^MEAS:/, 'CONF:');
    if (substituted !== info.configure) {
      issues.push({ function: fn, substituted, expected: info.configure });
    }
  }
  return issues;
}
