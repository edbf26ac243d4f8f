import { isValid, parse, format, getISODay } from 'date-fns';
import { TimeWindow } from '../types/time-window.type';

export const MINUTES_PER_DAY = 24 * 60;

const CLOCK_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Converts an HH:mm clock time into minutes since midnight.
 * Returns null for anything that is not a real 24h clock time.
 */
export function parseClockTime(value: string): number | null {
  const match = CLOCK_TIME_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

export function isClockTime(value: string): boolean {
  return parseClockTime(value) !== null;
}

export function formatClockTime(minutes: number): string {
  const wrapped = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(wrapped / 60);
  const mins = wrapped % 60;
  return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}`;
}

/**
 * Parses a YYYY-MM-DD calendar date. Impossible dates such as 2025-02-30 are
 * rejected.
 */
export function parseCalendarDate(value: string): Date | null {
  if (!CALENDAR_DATE_PATTERN.test(value)) {
    return null;
  }
  const date = parse(value, 'yyyy-MM-dd', new Date(0));
  if (!isValid(date) || format(date, 'yyyy-MM-dd') !== value) {
    return null;
  }
  return date;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

/**
 * Builds the window [start, start + duration) for a booking request.
 * Callers validate the inputs first; an invalid clock time throws.
 */
export function createTimeWindow(
  date: string,
  startTime: string,
  durationMinutes: number,
): TimeWindow {
  const startMinutes = parseClockTime(startTime);
  if (startMinutes === null) {
    throw new Error(`Invalid clock time: ${startTime}`);
  }
  return {
    date,
    startMinutes,
    endMinutes: startMinutes + durationMinutes,
  };
}

/**
 * Half-open overlap: a window ending exactly when another starts does not
 * overlap it.
 */
export function windowsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return (
    a.date === b.date &&
    a.startMinutes < b.endMinutes &&
    b.startMinutes < a.endMinutes
  );
}

/**
 * Weekday index used by the weekly schedule: 0 = Monday .. 6 = Sunday.
 */
export function weekdayIndex(date: string): number {
  const parsed = parseCalendarDate(date);
  if (!parsed) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  return getISODay(parsed) - 1;
}
