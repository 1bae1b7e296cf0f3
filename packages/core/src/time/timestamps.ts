/**
 * Timestamp Resolution
 *
 * Turns the date values callers pass around (epoch seconds, Date objects,
 * ISO-8601 and a fixed list of day-first/month-first patterns) into Unix
 * epoch seconds. Values without an explicit offset are read as UTC.
 */

import { ConfigError, FormatError } from '../errors/index.js';
import { RESOLUTION_SECONDS, SECONDS_PER_DAY } from './resolution.js';

export type DateInput = number | string | Date;

// =============================================================================
// Patterns
// =============================================================================

type DateField = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second';

interface DatePattern {
  format: string;
  regex: RegExp;
  fields: DateField[];
}

const TOKENS: Record<string, { field: DateField; source: string }> = {
  YYYY: { field: 'year', source: '(\\d{4})' },
  MM: { field: 'month', source: '(\\d{1,2})' },
  DD: { field: 'day', source: '(\\d{1,2})' },
  HH: { field: 'hour', source: '(\\d{1,2})' },
  mm: { field: 'minute', source: '(\\d{1,2})' },
  ss: { field: 'second', source: '(\\d{1,2})' },
};

function compilePattern(format: string): DatePattern {
  const fields: DateField[] = [];
  const source = format.replace(/YYYY|MM|DD|HH|mm|ss|[.*+?^${}()|[\]\\/]/g, (token) => {
    const known = TOKENS[token];
    if (known) {
      fields.push(known.field);
      return known.source;
    }
    return `\\${token}`;
  });
  return { format, regex: new RegExp(`^${source}$`), fields };
}

/**
 * Tried in order after ISO-8601; the first pattern yielding a real calendar
 * date wins, so `01/02/2024` reads as 1 February.
 */
const DATE_PATTERNS: DatePattern[] = [
  'YYYY/MM/DD', 'DD/MM/YYYY', 'MM/DD/YYYY',
  'YYYY-MM-DD', 'DD-MM-YYYY', 'MM-DD-YYYY',
  'YYYY.MM.DD', 'DD.MM.YYYY', 'MM.DD.YYYY',
  'YYYY-MM-DD HH:mm:ss', 'DD-MM-YYYY HH:mm:ss', 'MM-DD-YYYY HH:mm:ss',
  'YYYY/MM/DD HH:mm:ss', 'DD/MM/YYYY HH:mm:ss', 'MM/DD/YYYY HH:mm:ss',
].map(compilePattern);

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve a flexible date value to Unix epoch seconds
 *
 * @throws {FormatError} If no supported representation matches
 */
export function resolveTimestamp(value: DateInput): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new FormatError(`Invalid timestamp: ${value}`, { value });
    }
    return Math.trunc(value);
  }

  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new FormatError('Invalid Date object', { value: String(value) });
    }
    return Math.floor(ms / 1000);
  }

  if (/^\d+$/.test(value)) {
    return parseInt(value, 10);
  }

  const iso = parseIso(value);
  if (iso !== null) {
    return iso;
  }

  for (const pattern of DATE_PATTERNS) {
    const parsed = parseWithPattern(value, pattern);
    if (parsed !== null) {
      return parsed;
    }
  }

  throw new FormatError(
    `Could not parse date value: ${value}. Provide a Unix timestamp or a recognized date format.`,
    { value }
  );
}

/**
 * Resolve an optional date value, passing `undefined` through
 */
export function resolveOptionalTimestamp(value: DateInput | undefined): number | undefined {
  return value === undefined ? undefined : resolveTimestamp(value);
}

/**
 * Current time in epoch seconds
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * The `since` that makes a range ending at `now` hold `limit` points.
 * Unknown resolutions are counted as daily.
 *
 * @throws {ConfigError} If `limit` is not a positive integer
 */
export function calculateSinceForLimit(
  resolution: string,
  limit: number,
  now: number = nowSeconds()
): number {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigError('Limit must be a positive integer', { limit });
  }
  const secondsPerPoint = RESOLUTION_SECONDS[resolution] ?? SECONDS_PER_DAY;
  return now - limit * secondsPerPoint;
}

// =============================================================================
// Internals
// =============================================================================

function parseIso(value: string): number | null {
  const match = ISO_8601.exec(value);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, , offset] = match;
  const seconds = toEpochSeconds({
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour ?? 0),
    minute: Number(minute ?? 0),
    second: Number(second ?? 0),
  });
  if (seconds === null) {
    return null;
  }
  return seconds - offsetSeconds(offset);
}

function offsetSeconds(offset: string | undefined): number {
  if (offset === undefined || offset.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  return sign * (hours * 3600 + minutes * 60);
}

function parseWithPattern(value: string, pattern: DatePattern): number | null {
  const match = pattern.regex.exec(value);
  if (!match) {
    return null;
  }

  const parts: Record<DateField, number> = {
    year: 0,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
  };
  pattern.fields.forEach((field, i) => {
    parts[field] = Number(match[i + 1]);
  });
  return toEpochSeconds(parts);
}

/**
 * Epoch seconds for UTC calendar fields, or null when the fields do not name
 * a real instant (month 13, 31 February, hour 24)
 */
function toEpochSeconds(parts: Record<DateField, number>): number | null {
  const { year, month, day, hour, minute, second } = parts;
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return Math.floor(date.getTime() / 1000);
}
