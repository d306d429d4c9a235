import { isValid, parse } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { ValidationError } from '../services/base/ServiceError';

const LOCAL_TIME_PATTERNS = ["yyyy-MM-dd'T'HH:mm:ss", "yyyy-MM-dd'T'HH:mm"] as const;
const LOCAL_TIME_SHAPE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2})?$/;

/**
 * True when `timezone` is an IANA identifier the runtime's ICU data knows.
 */
export function isValidTimezone(timezone: string): boolean {
  if (!timezone) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function assertTimezone(timezone: string): string {
  if (!isValidTimezone(timezone)) {
    throw new ValidationError(`Unknown timezone '${timezone}'`, { timezone });
  }
  return timezone;
}

/**
 * Validates a wall-clock time such as `2024-01-01T09:00` or
 * `2024-01-01 09:00:30` and returns it with a `T` separator.
 */
export function normalizeLocalTime(input: string): string {
  const trimmed = input.trim();
  if (!LOCAL_TIME_SHAPE.test(trimmed)) {
    throw new ValidationError(`Invalid local time '${input}', expected YYYY-MM-DDTHH:mm`, { input });
  }
  const normalized = trimmed.replace(' ', 'T');
  const pattern = normalized.length > 16 ? LOCAL_TIME_PATTERNS[0] : LOCAL_TIME_PATTERNS[1];
  // parse() rejects impossible dates such as 2024-02-30
  if (!isValid(parse(normalized, pattern, new Date(0)))) {
    throw new ValidationError(`Invalid local time '${input}'`, { input });
  }
  return normalized;
}

/**
 * Interprets a wall-clock time in `timezone` and returns the UTC instant.
 */
export function localTimeToUtc(localTime: string, timezone: string): Date {
  const normalized = normalizeLocalTime(localTime);
  assertTimezone(timezone);
  const instant = fromZonedTime(normalized, timezone);
  if (!isValid(instant)) {
    throw new ValidationError(`Cannot place '${localTime}' in timezone '${timezone}'`, { localTime, timezone });
  }
  return instant;
}

/**
 * Renders a UTC instant as wall-clock time in `timezone`, for display.
 */
export function formatInZone(isoUtc: string, timezone: string): string {
  return formatInTimeZone(new Date(isoUtc), timezone, 'yyyy-MM-dd HH:mm zzz');
}
