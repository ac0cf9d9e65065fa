/**
 * SCPI Response Parser
 *
 * Turns instrument text replies into numbers. Works over any transport
 * (USB-TMC, serial, simulated).
 */

import { Result, Ok, Err } from '../../shared/types.js';

/** Some instruments return "****" when there is no valid reading. */
const INVALID_MARKER = '****';

// A complete SCPI <NR1>/<NR2>/<NR3> number, nothing trailing
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface InstrumentIdentity {
  manufacturer: string;
  model: string;
  serial: string;
  firmware: string;
}

export const ScpiParser = {
  /**
   * Parse a single numeric reading.
   *
   * Unlike parseFloat, trailing garbage ("1.2V", "12abc") is rejected.
   *
   * @returns Result with the number, or a string describing why it isn't one
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    if (trimmed.includes(INVALID_MARKER)) {
      return Err('invalid measurement (****)');
    }

    if (!NUMERIC_PATTERN.test(trimmed)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    const value = Number(trimmed);

    // 9.9E37 overload readings are finite and kept; 1E400 is not
    if (!Number.isFinite(value)) {
      return Err(`out of range: "${trimmed}"`);
    }

    return Ok(value);
  },

  /**
   * Parse a reading that may hold several comma-separated samples
   * (instruments with a sample count > 1 answer READ? that way).
   * Returns every sample; any bad sample fails the whole reply.
   */
  parseReadings(response: string): Result<number[], string> {
    const parts = this.parseCsv(response);
    const values: number[] = [];
    for (const part of parts) {
      const parsed = this.parseNumber(part);
      if (!parsed.ok) return parsed;
      values.push(parsed.value);
    }
    return Ok(values);
  },

  /**
   * Parse an *IDN? reply: "<manufacturer>,<model>,<serial>,<firmware>".
   * Missing fields come back as empty strings.
   */
  parseIdentity(response: string): InstrumentIdentity {
    const [manufacturer = '', model = '', serial = '', firmware = ''] = this.parseCsv(response);
    return { manufacturer, model, serial, firmware };
  },

  /**
   * Parse a comma-separated SCPI response into trimmed parts.
   */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },
};

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}
