import {
  createTimeWindow,
  formatClockTime,
  isCalendarDate,
  parseCalendarDate,
  parseClockTime,
  weekdayIndex,
  windowsOverlap,
} from './time-window.util';
import { TimeWindow } from '../types/time-window.type';

describe('time-window util', () => {
  describe('parseClockTime', () => {
    it('should convert HH:mm to minutes since midnight', () => {
      expect(parseClockTime('00:00')).toBe(0);
      expect(parseClockTime('18:30')).toBe(1110);
      expect(parseClockTime('23:59')).toBe(1439);
    });

    it('should reject anything that is not a 24h clock time', () => {
      expect(parseClockTime('24:00')).toBeNull();
      expect(parseClockTime('7:30')).toBeNull();
      expect(parseClockTime('18:60')).toBeNull();
      expect(parseClockTime('18:30:00')).toBeNull();
      expect(parseClockTime('')).toBeNull();
    });
  });

  describe('formatClockTime', () => {
    it('should pad hours and minutes', () => {
      expect(formatClockTime(545)).toBe('09:05');
    });

    it('should wrap minutes past midnight onto the clock', () => {
      expect(formatClockTime(1440 + 30)).toBe('00:30');
    });
  });

  describe('parseCalendarDate', () => {
    it('should accept real dates', () => {
      expect(isCalendarDate('2025-03-14')).toBe(true);
      expect(isCalendarDate('2024-02-29')).toBe(true);
    });

    it('should reject impossible or malformed dates', () => {
      expect(parseCalendarDate('2025-02-30')).toBeNull();
      expect(parseCalendarDate('2025-13-01')).toBeNull();
      expect(parseCalendarDate('2025-3-14')).toBeNull();
      expect(parseCalendarDate('14/03/2025')).toBeNull();
    });
  });

  describe('createTimeWindow', () => {
    it('should span start to start + duration', () => {
      expect(createTimeWindow('2025-03-14', '18:00', 90)).toEqual({
        date: '2025-03-14',
        startMinutes: 1080,
        endMinutes: 1170,
      });
    });

    it('should let a window run past midnight without wrapping', () => {
      expect(createTimeWindow('2025-03-14', '23:00', 120).endMinutes).toBe(
        1560,
      );
    });

    it('should throw on an invalid start time', () => {
      expect(() => createTimeWindow('2025-03-14', '25:00', 90)).toThrow(
        'Invalid clock time: 25:00',
      );
    });
  });

  describe('windowsOverlap', () => {
    const at = (start: string, duration: number, date = '2025-03-14') =>
      createTimeWindow(date, start, duration);

    it('should detect a partial overlap', () => {
      expect(windowsOverlap(at('18:00', 90), at('19:00', 60))).toBe(true);
    });

    it('should detect containment in both directions', () => {
      expect(windowsOverlap(at('18:00', 180), at('19:00', 30))).toBe(true);
      expect(windowsOverlap(at('19:00', 30), at('18:00', 180))).toBe(true);
    });

    it('should treat back-to-back windows as free', () => {
      expect(windowsOverlap(at('18:00', 90), at('19:30', 90))).toBe(false);
      expect(windowsOverlap(at('19:30', 90), at('18:00', 90))).toBe(false);
    });

    it('should never overlap windows on different dates', () => {
      expect(
        windowsOverlap(at('18:00', 90), at('18:00', 90, '2025-03-15')),
      ).toBe(false);
    });

    it('should agree with the three-clause overlap test', () => {
      // Older form: start inside, end inside, or fully enclosing.
      const threeClause = (a: TimeWindow, b: TimeWindow) =>
        a.date === b.date &&
        ((b.startMinutes <= a.startMinutes && a.startMinutes < b.endMinutes) ||
          (b.startMinutes < a.endMinutes && a.endMinutes <= b.endMinutes) ||
          (a.startMinutes <= b.startMinutes && a.endMinutes >= b.endMinutes));

      const starts = [600, 630, 660, 690, 720];
      const durations = [15, 30, 60, 90];
      for (const startA of starts) {
        for (const durationA of durations) {
          for (const startB of starts) {
            for (const durationB of durations) {
              const a = {
                date: '2025-03-14',
                startMinutes: startA,
                endMinutes: startA + durationA,
              };
              const b = {
                date: '2025-03-14',
                startMinutes: startB,
                endMinutes: startB + durationB,
              };
              expect(windowsOverlap(a, b)).toBe(threeClause(a, b));
            }
          }
        }
      }
    });
  });

  describe('weekdayIndex', () => {
    it('should number Monday as 0 and Sunday as 6', () => {
      expect(weekdayIndex('2025-03-10')).toBe(0); // Monday
      expect(weekdayIndex('2025-03-14')).toBe(4); // Friday
      expect(weekdayIndex('2025-03-16')).toBe(6); // Sunday
    });

    it('should throw on an invalid date', () => {
      expect(() => weekdayIndex('2025-02-30')).toThrow(
        'Invalid calendar date: 2025-02-30',
      );
    });
  });
});
