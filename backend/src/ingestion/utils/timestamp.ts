/**
 * Timestamp coercion for meter exports.
 *
 * Accepted layouts (seconds and fractions optional unless noted):
 * - "2024-01-15 14:30:00", "2024-01-15T14:30:00.250", with optional "Z" / "+01:00"
 * - "2024-01-15" (midnight)
 * - "2024/01/15 14:30"
 * - "15.01.2024 14:30:00", "15/01/2024 14:30", "15-01-2024 14:30"
 * - "20240115T143000" (compact, seconds required)
 *
 * Slash dates with the day first ("15/01/2024") are only read that way when
 * the first field cannot be a month; otherwise "01/02/2024" is January 2nd.
 *
 * Readings keep their wall-clock value. An explicit offset is kept alongside
 * ("Z" as "+00:00") but never shifts the date or hour.
 */

interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  /** null when the reading carries no offset */
  offsetMinutes: number | null;
}

const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const YEAR_FIRST_SLASH =
  /^(\d{4})\/(\d{2})\/(\d{2})(?:\s+(\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const DAY_FIRST =
  /^(\d{2})([./-])(\d{2})\2(\d{4})(?:\s+(\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;

function toInt(value: string | undefined): number {
  return value ? Number.parseInt(value, 10) : 0;
}

function parseOffset(raw: string): number | null {
  if (raw.toUpperCase() === 'Z') return 0;

  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(raw);
  if (!match) return null;

  const hours = toInt(match[2]);
  const minutes = toInt(match[3]);
  if (hours > 14 || minutes > 59) return null;

  const sign = match[1] === '-' ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

function matchParts(value: string): DateTimeParts | null {
  const iso = ISO_LIKE.exec(value);
  if (iso) {
    let offsetMinutes: number | null = null;
    if (iso[8] !== undefined) {
      offsetMinutes = parseOffset(iso[8]);
      if (offsetMinutes === null) return null;
    }
    return {
      year: toInt(iso[1]),
      month: toInt(iso[2]),
      day: toInt(iso[3]),
      hour: toInt(iso[4]),
      minute: toInt(iso[5]),
      second: toInt(iso[6]),
      millisecond: iso[7] ? toInt(iso[7].padEnd(3, '0').slice(0, 3)) : 0,
      offsetMinutes,
    };
  }

  const slash = YEAR_FIRST_SLASH.exec(value);
  if (slash) {
    return {
      year: toInt(slash[1]),
      month: toInt(slash[2]),
      day: toInt(slash[3]),
      hour: toInt(slash[4]),
      minute: toInt(slash[5]),
      second: toInt(slash[6]),
      millisecond: 0,
      offsetMinutes: null,
    };
  }

  const dayFirst = DAY_FIRST.exec(value);
  if (dayFirst) {
    const first = toInt(dayFirst[1]);
    const second = toInt(dayFirst[3]);
    const monthFirst = dayFirst[2] === '/' && first <= 12;
    return {
      year: toInt(dayFirst[4]),
      month: monthFirst ? first : second,
      day: monthFirst ? second : first,
      hour: toInt(dayFirst[5]),
      minute: toInt(dayFirst[6]),
      second: toInt(dayFirst[7]),
      millisecond: 0,
      offsetMinutes: null,
    };
  }

  const compact = COMPACT.exec(value);
  if (compact) {
    return {
      year: toInt(compact[1]),
      month: toInt(compact[2]),
      day: toInt(compact[3]),
      hour: toInt(compact[4]),
      minute: toInt(compact[5]),
      second: toInt(compact[6]),
      millisecond: 0,
      offsetMinutes: null,
    };
  }

  return null;
}

function partsToDate(parts: DateTimeParts): Date | null {
  if (
    parts.month < 1 ||
    parts.month > 12 ||
    parts.day < 1 ||
    parts.hour > 23 ||
    parts.minute > 59 ||
    parts.second > 59
  ) {
    return null;
  }

  // setUTCFullYear keeps years below 100 literal (Date.UTC maps them to 19xx)
  const date = new Date(0);
  date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  date.setUTCHours(parts.hour, parts.minute, parts.second, parts.millisecond);

  // Rolled over, e.g. February 30th
  if (date.getUTCMonth() !== parts.month - 1 || date.getUTCDate() !== parts.day) {
    return null;
  }

  return Number.isNaN(date.getTime()) ? null : date;
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const total = Math.abs(offsetMinutes);
  const hours = String(Math.floor(total / 60)).padStart(2, '0');
  const minutes = String(total % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}

/**
 * Parse a raw timestamp into its normalized form
 * "YYYY-MM-DDTHH:mm:ss.SSS", followed by "+HH:mm" when the source carried an
 * offset.
 *
 * @returns normalized string, or null when the text is not a complete, valid date-time
 */
export function coerceTimestamp(raw: string | undefined): string | null {
  const trimmed = raw?.trim() ?? '';
  if (trimmed === '') return null;

  const parts = matchParts(trimmed);
  if (!parts) return null;

  const date = partsToDate(parts);
  if (!date) return null;

  const local = date.toISOString().slice(0, 23);
  return parts.offsetMinutes === null
    ? local
    : `${local}${formatOffset(parts.offsetMinutes)}`;
}

/**
 * Derive the aggregation keys of a reading from its wall-clock value. Both
 * keys come from the same reading, so they are either both known or both null.
 */
export function deriveCalendarKeys(timestamp: string | null): {
  date: string | null;
  hour: number | null;
} {
  if (timestamp === null) {
    return { date: null, hour: null };
  }
  return {
    date: timestamp.slice(0, 10),
    hour: Number.parseInt(timestamp.slice(11, 13), 10),
  };
}

/**
 * Parse a free-standing calendar date column ("2024-01-15", "15.01.2024", or
 * any accepted date-time) to "YYYY-MM-DD".
 */
export function coerceCalendarDate(raw: string | undefined): string | null {
  return deriveCalendarKeys(coerceTimestamp(raw)).date;
}

/**
 * Render a normalized timestamp as "YYYY-MM-DD HH:mm:ss", appending ".SSS"
 * only for non-zero milliseconds, then the offset if there is one.
 */
export function formatTimestamp(timestamp: string): string {
  const base = `${timestamp.slice(0, 10)} ${timestamp.slice(11, 19)}`;
  const millis = timestamp.slice(20, 23);
  const offset = timestamp.slice(23);
  return `${millis === '000' ? base : `${base}.${millis}`}${offset}`;
}
