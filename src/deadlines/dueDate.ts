import { DateTime, Info } from 'luxon';
import { ParseError } from '../errors.js';
import { logger } from '../logger.js';

const FULL_DATE = /^\d{4}-\d{2}-\d{2}/;

/**
 * Convert a Canvas `due_at` string into an absolute instant.
 *
 * A trailing `Z` is rewritten to `+00:00` before parsing; timestamps without
 * an offset are read as UTC. Absent values must be handled by the caller.
 */
export function parseDueDate(value: string): Date {
  const normalized = value.trim().replace(/Z$/, '+00:00');
  // luxon fills a missing date from the system clock; require a calendar date
  if (!FULL_DATE.test(normalized)) {
    throw new ParseError(value, 'expected a yyyy-MM-dd date');
  }
  const parsed = DateTime.fromISO(normalized, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ParseError(value, parsed.invalidExplanation);
  }
  return parsed.toJSDate();
}

/** Returns `name` when it is a known IANA zone, otherwise UTC. */
export function resolveTimezone(name: string): string {
  if (Info.isValidIANAZone(name)) {
    return name;
  }
  logger.warn(`Unknown timezone "${name}", falling back to UTC`);
  return 'UTC';
}
