/**
 * Time alignment: the aligned "day" and per-cadence cycle windows.
 *
 * All arithmetic is done on epoch milliseconds. A local day runs from
 * `dayStartHour` to `dayStartHour` the next day, in the user's UTC offset.
 */

import type { CycleCadence, Settings } from './state.js';

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Clock: Source of "now". Injected so tests can pin or advance time.
 */
export interface Clock {
  nowMs(): number;
}

export const systemClock: Clock = {
  nowMs() {
    return Date.now();
  },
};

/**
 * TimeWindow: Half-open [startMs, endMs).
 */
export interface TimeWindow {
  startMs: number;
  endMs: number;
}

function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}

function mod(a: number, b: number): number {
  return ((a % b) + b) % b;
}

/**
 * Index of the aligned day containing `ms` (day 0 starts at the epoch).
 */
export function alignedDayIndex(ms: number, settings: Settings): number {
  const local = ms + settings.utcOffsetMinutes * MINUTE_MS;
  return floorDiv(local - settings.dayStartHour * HOUR_MS, DAY_MS);
}

function dayIndexToMs(dayIndex: number, settings: Settings): number {
  return (
    dayIndex * DAY_MS +
    settings.dayStartHour * HOUR_MS -
    settings.utcOffsetMinutes * MINUTE_MS
  );
}

/**
 * Start of the aligned day containing `ms`.
 *
 * A time before `dayStartHour` belongs to the previous day.
 */
export function alignToDayStart(ms: number, settings: Settings): number {
  return dayIndexToMs(alignedDayIndex(ms, settings), settings);
}

export function dayWindow(ms: number, settings: Settings): TimeWindow {
  const startMs = alignToDayStart(ms, settings);
  return { startMs, endMs: startMs + DAY_MS };
}

/**
 * Cycle window containing `ms` for the given cadence.
 *
 * - daily: the aligned day
 * - weekly: Monday-aligned week
 * - monthly: calendar month of the aligned day
 * - custom: consecutive blocks of `intervalDays` counted from epoch day 0
 */
export function cycleWindow(
  cadence: CycleCadence,
  ms: number,
  settings: Settings
): TimeWindow {
  const dayIndex = alignedDayIndex(ms, settings);

  switch (cadence.kind) {
    case 'daily':
      return {
        startMs: dayIndexToMs(dayIndex, settings),
        endMs: dayIndexToMs(dayIndex + 1, settings),
      };

    case 'weekly': {
      // Epoch day 0 was a Thursday; Monday = 0
      const weekday = mod(dayIndex + 3, 7);
      const start = dayIndex - weekday;
      return {
        startMs: dayIndexToMs(start, settings),
        endMs: dayIndexToMs(start + 7, settings),
      };
    }

    case 'monthly': {
      const date = new Date(dayIndex * DAY_MS);
      const year = date.getUTCFullYear();
      const month = date.getUTCMonth();
      const start = Date.UTC(year, month, 1) / DAY_MS;
      const end = Date.UTC(year, month + 1, 1) / DAY_MS;
      return {
        startMs: dayIndexToMs(start, settings),
        endMs: dayIndexToMs(end, settings),
      };
    }

    case 'custom': {
      const start = dayIndex - mod(dayIndex, cadence.intervalDays);
      return {
        startMs: dayIndexToMs(start, settings),
        endMs: dayIndexToMs(start + cadence.intervalDays, settings),
      };
    }
  }
}

/**
 * Nominal length of one cadence period, for comparisons only.
 */
export function cadencePeriodMs(cadence: CycleCadence): number {
  switch (cadence.kind) {
    case 'daily':
      return DAY_MS;
    case 'weekly':
      return 7 * DAY_MS;
    case 'monthly':
      return 30 * DAY_MS;
    case 'custom':
      return cadence.intervalDays * DAY_MS;
  }
}
