/**
 * Date Utility Module
 *
 * Resolves "today" for schedule lookups.
 */

import { SCHEDULE_TIME } from '../core/constants.js';

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Gets the calendar date in YYYY-MM-DD format at a fixed UTC offset
 *
 * NBA schedules are keyed by Eastern dates. The offset is a constant
 * (UTC-5 by default) and does not follow daylight-saving time, so between
 * 04:00 and 05:00 UTC during EDT this still reports the previous day.
 * The host timezone is ignored.
 *
 * @param now - Instant to resolve (defaults to the system clock)
 * @param offsetHours - Hours added to UTC
 * @returns Date string in YYYY-MM-DD format
 *
 * @example
 * todayAtFixedOffset(new Date('2025-01-15T03:00:00Z')) // '2025-01-14'
 */
export function todayAtFixedOffset(
  now: Date = new Date(),
  offsetHours: number = SCHEDULE_TIME.UTC_OFFSET_HOURS
): string {
  const shifted = new Date(now.getTime() + offsetHours * MS_PER_HOUR);
  return shifted.toISOString().slice(0, 10);
}
