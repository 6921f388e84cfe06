/**
 * Date and Time Utilities
 *
 * Pure functions for date and time calculations.
 * Local calendar dates are derived through Intl so that no host clock is needed.
 */

/**
 * Milliseconds in one day
 */
export const MILLISECONDS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Milliseconds in one hour
 */
export const MILLISECONDS_PER_HOUR = 60 * 60 * 1000;

/**
 * Milliseconds in one minute
 */
export const MILLISECONDS_PER_MINUTE = 60 * 1000;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Check whether a time zone identifier is understood by the runtime
 * @param timezone - IANA time zone name (e.g. "Europe/Berlin")
 * @returns True if Intl accepts the zone
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    getFormatter(timezone);
    return true;
  } catch {
    return false;
  }
}

function getParts(timestamp: number, timezone: string): Record<string, string> {
  const parts: Record<string, string> = {};
  for (const part of getFormatter(timezone).formatToParts(new Date(timestamp))) {
    parts[part.type] = part.value;
  }
  return parts;
}

/**
 * Get the local hour (0-23) of a timestamp
 * @param timestamp - Unix timestamp in milliseconds
 * @param timezone - IANA time zone name
 * @returns Hour of the day
 */
export function getLocalHour(timestamp: number, timezone: string): number {
  return Number(getParts(timestamp, timezone).hour);
}

/**
 * Get the local calendar date of a timestamp
 * @param timestamp - Unix timestamp in milliseconds
 * @param timezone - IANA time zone name
 * @returns Date key in the form YYYY-MM-DD
 */
export function getLocalDateKey(timestamp: number, timezone: string): string {
  const parts = getParts(timestamp, timezone);
  return `${parts.year}-${parts.month}-${parts.day}`;
}

/**
 * Format the local wall-clock time of a timestamp for log output
 * @param timestamp - Unix timestamp in milliseconds
 * @param timezone - IANA time zone name
 * @returns Time in the form HH:MM
 */
export function formatTimeOfDay(timestamp: number, timezone: string): string {
  const parts = getParts(timestamp, timezone);
  return `${parts.hour}:${parts.minute}`;
}

/**
 * Format a half-open time range for log output
 * @param start - Range start in milliseconds
 * @param end - Range end (exclusive) in milliseconds
 * @param timezone - IANA time zone name
 * @returns Range such as "03:00-10:00"
 */
export function formatTimeRange(start: number, end: number, timezone: string): string {
  return `${formatTimeOfDay(start, timezone)}-${formatTimeOfDay(end, timezone)}`;
}
