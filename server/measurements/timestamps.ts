/**
 * Timestamps are epoch milliseconds with microsecond resolution.
 * Every rendering is UTC.
 */

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * Wall-clock time from the monotonic clock, rounded to the microsecond.
 * Successive readings never go backwards, even if the system clock is adjusted.
 */
export function monotonicNow(): number {
  return Math.round((performance.timeOrigin + performance.now()) * 1000) / 1000;
}

interface TimestampParts {
  date: string;
  time: string;
  micros: string;
}

function split(timestamp: number): TimestampParts {
  const totalMicros = Math.round(timestamp * 1000);
  const seconds = Math.floor(totalMicros / 1_000_000);
  const micros = totalMicros - seconds * 1_000_000;
  const d = new Date(seconds * 1000);
  return {
    date: `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`,
    time: `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`,
    micros: pad(micros, 6),
  };
}

/** "YYYY-MM-DD HH:MM:SS.ffffff" */
export function formatCsvTimestamp(timestamp: number): string {
  const { date, time, micros } = split(timestamp);
  return `${date} ${time}.${micros}`;
}

/** "YYYY-MM-DDTHH:MM:SS.ffffffZ" */
export function formatIsoTimestamp(timestamp: number): string {
  const { date, time, micros } = split(timestamp);
  return `${date}T${time}.${micros}Z`;
}

/** "YYYY-MM-DD HH:MM:SS" */
export function formatDisplayDate(timestamp: number): string {
  const { date, time } = split(timestamp);
  return `${date} ${time}`;
}

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * Parse an ISO-8601 timestamp keeping microseconds (Date.parse drops them).
 * No offset means UTC.
 */
export function parseIsoTimestamp(text: string): number | null {
  const match = text.trim().match(ISO_PATTERN);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds, fraction = '', offset = 'Z'] = match;
  const wholeMs = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds),
  );
  if (Number.isNaN(wholeMs)) return null;

  let offsetMinutes = 0;
  if (offset !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    offsetMinutes = sign * (Number(offset.slice(1, 3)) * 60 + Number(offset.slice(4, 6)));
  }

  const micros = Number(fraction.padEnd(6, '0'));
  return wholeMs - offsetMinutes * 60_000 + micros / 1000;
}
