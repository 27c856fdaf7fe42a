/**
 * Apache/Nginx access-log timestamps.
 *
 * Accepts `10/Apr/2021:12:01:55 +0000` and, failing that, the same layout
 * without an offset (read as UTC). Anything else yields null.
 */

import type { LogTimestamp } from '../types/log-event.js';

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

const CLOCK = String.raw`(\d{1,2})/([A-Za-z]{3})/(\d{4}):(\d{1,2}):(\d{1,2}):(\d{1,2})`;
const WITH_OFFSET = new RegExp(`^${CLOCK}\\s+(Z|[+-]\\d{2}:?\\d{2})$`, 'i');
const WITHOUT_OFFSET = new RegExp(`^${CLOCK}$`);

const MINUTE_MS = 60_000;

/**
 * Parse a bracketed log timestamp (without the brackets).
 */
export function parseLogTimestamp(value: string): LogTimestamp | null {
  const withOffset = WITH_OFFSET.exec(value);
  if (withOffset) {
    const offsetMinutes = parseOffset(withOffset[7]);
    const epochMs = offsetMinutes === null ? null : wallClockToEpoch(withOffset);
    if (epochMs !== null && offsetMinutes !== null) {
      return { epochMs: epochMs - offsetMinutes * MINUTE_MS, offsetMinutes, hasOffset: true };
    }
  }

  const plain = WITHOUT_OFFSET.exec(value);
  if (plain) {
    const epochMs = wallClockToEpoch(plain);
    if (epochMs !== null) {
      return { epochMs, offsetMinutes: 0, hasOffset: false };
    }
  }

  return null;
}

/**
 * ISO-8601 rendering in the log's own offset, e.g. `2021-04-10T12:01:55+02:00`.
 * Timestamps read without an offset carry no suffix.
 */
export function formatLogTimestamp(ts: LogTimestamp): string {
  const wall = wallClockIso(ts).slice(0, 19);
  if (!ts.hasOffset) return wall;

  const sign = ts.offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(ts.offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `${wall}${sign}${hours}:${minutes}`;
}

/**
 * Per-minute bucket key (`YYYY-MM-DD HH:MM`) on the log's wall clock.
 */
export function minuteBucket(ts: LogTimestamp): string {
  return wallClockIso(ts).slice(0, 16).replace('T', ' ');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function wallClockIso(ts: LogTimestamp): string {
  return new Date(ts.epochMs + ts.offsetMinutes * MINUTE_MS).toISOString();
}

function wallClockToEpoch(match: RegExpExecArray): number | null {
  const day = Number(match[1]);
  const month = MONTHS[match[2].toLowerCase()];
  const year = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);

  if (month === undefined || year < 1 || hour > 23 || minute > 59 || second > 59) return null;

  // years below 100 stay as written
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, second, 0);
  // Rejects days that roll over into the next month (31/Apr, 30/Feb).
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month) return null;

  return date.getTime();
}

function parseOffset(raw: string): number | null {
  if (raw.toUpperCase() === 'Z') return 0;

  const digits = raw.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;

  const total = hours * 60 + minutes;
  return raw.startsWith('-') ? -total : total;
}
