import { OperatingHoursResolverService } from './operating-hours-resolver.service';
import { OperatingHours } from '../entities/operating-hours.entity';
import { SpecialHours } from '../entities/special-hours.entity';
import { EffectiveHours } from '../types/effective-hours.type';
import { createTimeWindow } from '../utils/time-window.util';

function weeklyHours(
  openTime: string,
  closeTime: string,
  lastReservationTime: string,
): OperatingHours {
  const hours = new OperatingHours();
  hours.id = 'weekly-4';
  hours.dayOfWeek = 4;
  hours.openTime = openTime;
  hours.closeTime = closeTime;
  hours.lastReservationTime = lastReservationTime;
  return hours;
}

function specialHours(overrides: Partial<SpecialHours>): SpecialHours {
  const special = new SpecialHours();
  special.id = 'special-1';
  special.date = '2025-03-14';
  special.name = 'Spring gala';
  special.description = null;
  special.isClosed = false;
  special.openTime = null;
  special.closeTime = null;
  special.lastReservationTime = null;
  return Object.assign(special, overrides);
}

describe('OperatingHoursResolverService', () => {
  const service = new OperatingHoursResolverService();
  const friday = weeklyHours('11:00', '22:00', '20:30');

  describe('resolve', () => {
    it('should use the weekly row when no special hours exist', () => {
      expect(service.resolve(null, friday)).toEqual({
        isOpen: true,
        source: 'weekly',
        openTime: '11:00',
        closeTime: '22:00',
        lastReservationTime: '20:30',
      });
    });

    it('should report closed when the weekday has no row', () => {
      expect(service.resolve(null, null)).toEqual({
        isOpen: false,
        source: 'none',
      });
    });

    it('should let closed special hours override an open weekday', () => {
      const closed = specialHours({ isClosed: true });

      expect(service.resolve(closed, friday)).toEqual({
        isOpen: false,
        source: 'special',
      });
    });

    it('should replace the weekly hours with special ones', () => {
      const late = specialHours({
        openTime: '17:00',
        closeTime: '23:59',
        lastReservationTime: '22:00',
      });

      expect(service.resolve(late, friday)).toEqual({
        isOpen: true,
        source: 'special',
        openTime: '17:00',
        closeTime: '23:59',
        lastReservationTime: '22:00',
      });
    });

    it('should treat special hours without times as closed', () => {
      const incomplete = specialHours({ openTime: '17:00' });

      expect(service.resolve(incomplete, friday).isOpen).toBe(false);
    });
  });

  describe('isWithinHours', () => {
    const hours: EffectiveHours = service.resolve(null, friday);
    const window = (start: string, duration: number) =>
      createTimeWindow('2025-03-14', start, duration);

    it('should accept a window between opening and closing', () => {
      expect(service.isWithinHours(hours, window('18:00', 90))).toBe(true);
    });

    it('should accept a start exactly at opening', () => {
      expect(service.isWithinHours(hours, window('11:00', 60))).toBe(true);
    });

    it('should reject a start before opening', () => {
      expect(service.isWithinHours(hours, window('10:45', 60))).toBe(false);
    });

    it('should accept a start exactly at the last reservation time', () => {
      expect(service.isWithinHours(hours, window('20:30', 90))).toBe(true);
    });

    it('should reject a start after the last reservation time', () => {
      expect(service.isWithinHours(hours, window('20:45', 60))).toBe(false);
    });

    it('should reject a window that ends after closing', () => {
      expect(service.isWithinHours(hours, window('20:30', 120))).toBe(false);
    });

    it('should reject a window that runs past midnight', () => {
      const lateNight = service.resolve(
        specialHours({
          openTime: '18:00',
          closeTime: '23:59',
          lastReservationTime: '23:30',
        }),
        null,
      );

      expect(service.isWithinHours(lateNight, window('23:30', 60))).toBe(
        false,
      );
    });

    it('should reject every window on a closed day', () => {
      const closed = service.resolve(specialHours({ isClosed: true }), friday);

      expect(service.isWithinHours(closed, window('18:00', 90))).toBe(false);
    });
  });
});
