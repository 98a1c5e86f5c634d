/**
 * Timestamp helpers shared by the matrix loader, the normalizer and the
 * alert log.
 *
 * All timestamps are handled in UTC. Labels that carry no zone designator are
 * read as UTC, and the record wire format ("YYYY-MM-DD HH:MM:SS") is always
 * rendered in UTC with second precision.
 */

const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

/**
 * Matrix row label: date, optional time with optional fraction, optional zone.
 * Examples: "2024-01-01", "2024-01-01 10:15", "2024-01-01T10:15:30.250Z",
 * "2024-01-01 10:15:30+07:00"
 */
const LABEL_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

/** Record/log time: exactly "YYYY-MM-DD HH:MM:SS" */
const RECORD_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parse a matrix row label into an absolute instant.
 *
 * @returns Parsed Date, or null when the label is not a valid date-time
 */
export function parseTimestamp(value: string): Date | null {
  const match = LABEL_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const millis = fraction ? Number.parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10) : 0;

  const date = buildUtcDate(
    Number.parseInt(year, 10),
    Number.parseInt(month, 10),
    Number.parseInt(day, 10),
    hour ? Number.parseInt(hour, 10) : 0,
    minute ? Number.parseInt(minute, 10) : 0,
    second ? Number.parseInt(second, 10) : 0,
    millis,
  );
  if (!date) {
    return null;
  }

  const offsetMinutes = zone ? parseZoneOffset(zone) : 0;
  if (offsetMinutes === null) {
    return null;
  }

  return new Date(date.getTime() - offsetMinutes * MS_PER_MINUTE);
}

/**
 * Parse a "YYYY-MM-DD HH:MM:SS" record time (UTC).
 */
export function parseRecordTime(value: string): Date | null {
  const match = RECORD_TIME_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second] = match.map((part) =>
    Number.parseInt(part, 10),
  );
  return buildUtcDate(year, month, day, hour, minute, second, 0);
}

/**
 * Render a Date as "YYYY-MM-DD HH:MM:SS" in UTC.
 * Sub-second components are truncated.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number, width = 2): string =>
    String(value).padStart(width, '0');

  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * Start of the one-minute bucket containing the given instant,
 * aligned to absolute clock boundaries.
 */
export function floorToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MS_PER_MINUTE) * MS_PER_MINUTE);
}

/**
 * Whole days elapsed between two instants, floor-truncated.
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Build a UTC Date, rejecting out-of-range components (e.g. 2024-02-30)
 */
function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millis: number,
): Date | null {
  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }

  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);

  // Overflowing days roll into the next month
  if (Number.isNaN(date.getTime()) || date.getUTCDate() !== day) {
    return null;
  }

  return date;
}

/**
 * Convert a zone designator ("Z", "+07", "+0700", "-05:30") to minutes east of UTC
 */
function parseZoneOffset(zone: string): number | null {
  if (zone === 'Z') {
    return 0;
  }

  const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(zone);
  if (!match) {
    return null;
  }

  const hours = Number.parseInt(match[2], 10);
  const minutes = match[3] ? Number.parseInt(match[3], 10) : 0;
  if (hours > 23 || minutes > 59) {
    return null;
  }

  const sign = match[1] === '-' ? -1 : 1;
  return sign * (hours * 60 + minutes);
}
