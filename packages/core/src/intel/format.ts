/**
 * Date and interval formatting for intel payloads. All output is UTC.
 */

import type { IntelData } from '../types/json.js';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

const INTERVAL_UNITS: ReadonlyArray<{ seconds: number; singular: string; plural: string }> = [
  { seconds: 31_536_000, singular: 'year', plural: 'years' },
  { seconds: 2_592_000, singular: 'month', plural: 'months' },
  { seconds: 604_800, singular: 'week', plural: 'weeks' },
  { seconds: 86_400, singular: 'day', plural: 'days' },
  { seconds: 3_600, singular: 'hour', plural: 'hours' },
  { seconds: 60, singular: 'min', plural: 'min' },
  { seconds: 1, singular: 'sec', plural: 'sec' },
];

export const SECONDS_PER_DAY = 86_400;

const pad = (value: number): string => String(value).padStart(2, '0');

/** Null outside the Date range (about ±8.64e12 seconds). */
function toDate(timestamp: number): Date | null {
  const date = new Date(timestamp * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * `2024-03-12T14:05:09+00:00`, or null when the timestamp has no calendar date.
 */
export function toIso8601(timestamp: number): string | null {
  const date = toDate(timestamp);
  return date ? date.toISOString().replace(/\.\d{3}Z$/, '+00:00') : null;
}

/**
 * Medium date format: `Tue, 03/12/2024 - 14:05`
 */
export function formatMediumDate(timestamp: number): string | null {
  const date = toDate(timestamp);
  if (!date) return null;
  const day = WEEKDAYS[date.getUTCDay()];
  return (
    `${day}, ${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}/${date.getUTCFullYear()}` +
    ` - ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}

/**
 * Human interval with at most `granularity` adjacent units: `1 year 2 months`.
 * A unit that does not fit still uses up granularity once output has started,
 * so 1 day and 5 seconds reads `1 day`.
 */
export function formatInterval(seconds: number, granularity = 2): string {
  let remaining = Math.floor(seconds);
  let left = granularity;
  const parts: string[] = [];

  for (const unit of INTERVAL_UNITS) {
    if (remaining >= unit.seconds) {
      const count = Math.floor(remaining / unit.seconds);
      parts.push(`${count} ${count === 1 ? unit.singular : unit.plural}`);
      remaining %= unit.seconds;
      left--;
    } else if (parts.length > 0) {
      left--;
    }
    if (left === 0) break;
  }

  return parts.length > 0 ? parts.join(' ') : '0 sec';
}

/**
 * `{ timestamp, iso8601, human }` block used across plugin payloads.
 */
export function describeTimestamp(timestamp: number): IntelData {
  return {
    timestamp,
    iso8601: toIso8601(timestamp),
    human: formatMediumDate(timestamp),
  };
}

/**
 * `{ seconds, days, human }` block for elapsed time.
 */
export function describeDuration(seconds: number): IntelData & { days: number } {
  return {
    seconds,
    days: Math.floor(seconds / SECONDS_PER_DAY),
    human: formatInterval(seconds, 2),
  };
}
