/**
 * Time Window Matcher
 * Finds the active time-of-day window covering a timestamp
 */

import moment from 'moment-timezone';
import { InvalidTimeWindowError } from './errors';
import { Result, Ok, Err, TimeWindow } from './types';

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

/**
 * Seconds since midnight for "HH:mm" or "HH:mm:ss", or null when malformed.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY.exec(value);
  if (!match) {
    return null;
  }
  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds ?? 0);
}

/**
 * Seconds since midnight of `timestamp` as seen in `timezone`, with the
 * milliseconds kept as a fraction.
 */
export function secondsOfDay(timestamp: Date, timezone: string): number {
  const local = moment.tz(timestamp, timezone);
  return local.hours() * 3600 + local.minutes() * 60 + local.seconds() + local.milliseconds() / 1000;
}

export const isKnownTimezone = (timezone: string): boolean => moment.tz.zone(timezone) !== null;

/**
 * Seconds-of-day bounds of a window. Windows must not wrap midnight: start has
 * to be strictly before end.
 */
export function readBounds(
  window: Pick<TimeWindow, 'name' | 'start' | 'end'>
): Result<{ start: number; end: number }, string> {
  const start = parseTimeOfDay(window.start);
  if (start === null) {
    return Err(`Time window "${window.name}" start "${window.start}" is not HH:mm or HH:mm:ss`);
  }
  const end = parseTimeOfDay(window.end);
  if (end === null) {
    return Err(`Time window "${window.name}" end "${window.end}" is not HH:mm or HH:mm:ss`);
  }
  if (start >= end) {
    return Err(`Time window "${window.name}" must start before it ends`);
  }
  return Ok({ start, end });
}

interface RankedWindow {
  window: TimeWindow;
  index: number;
  start: number;
  end: number;
}

/**
 * Active windows ordered by start time, then by their position in the list.
 * Throws InvalidTimeWindowError for an active window whose bounds cannot be
 * read; inactive windows are never parsed.
 */
function rankActive(windows: readonly TimeWindow[]): RankedWindow[] {
  const ranked: RankedWindow[] = [];
  windows.forEach((window, index) => {
    if (!window.isActive) {
      return;
    }
    const bounds = readBounds(window);
    if (!bounds.ok) {
      throw new InvalidTimeWindowError(bounds.error, window.id);
    }
    ranked.push({ window, index, ...bounds.value });
  });
  return ranked.sort((a, b) => a.start - b.start || a.index - b.index);
}

/**
 * First active window whose [start, end] (both inclusive) covers the time of
 * day of `timestamp`, or null. Bounds are whole seconds, so `08:30` ends at
 * 08:30:00.000 exactly.
 */
export function activeWindow(windows: readonly TimeWindow[], timestamp: Date, timezone: string): TimeWindow | null {
  const now = secondsOfDay(timestamp, timezone);
  const match = rankActive(windows).find((ranked) => now >= ranked.start && now <= ranked.end);
  return match ? match.window : null;
}
