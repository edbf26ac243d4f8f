import { Injectable } from '@nestjs/common';
import { OperatingHours } from '../entities/operating-hours.entity';
import { SpecialHours } from '../entities/special-hours.entity';
import { EffectiveHours } from '../types/effective-hours.type';
import { TimeWindow } from '../types/time-window.type';
import { parseClockTime } from '../utils/time-window.util';

@Injectable()
export class OperatingHoursResolverService {
  /**
   * Picks the schedule that governs a date.
   *
   * A special-hours row is authoritative for its date, whatever the weekday
   * says; it can close a normally open day or replace its hours entirely.
   * Without one, the weekly row for the weekday applies, and a weekday with
   * no row is closed.
   */
  resolve(
    special: SpecialHours | null,
    weekly: OperatingHours | null,
  ): EffectiveHours {
    if (special) {
      if (
        special.isClosed ||
        special.openTime === null ||
        special.closeTime === null ||
        special.lastReservationTime === null
      ) {
        return { isOpen: false, source: 'special' };
      }
      return {
        isOpen: true,
        source: 'special',
        openTime: special.openTime,
        closeTime: special.closeTime,
        lastReservationTime: special.lastReservationTime,
      };
    }

    if (!weekly) {
      return { isOpen: false, source: 'none' };
    }

    return {
      isOpen: true,
      source: 'weekly',
      openTime: weekly.openTime,
      closeTime: weekly.closeTime,
      lastReservationTime: weekly.lastReservationTime,
    };
  }

  /**
   * A window is bookable when it starts no earlier than opening, no later than
   * the last reservation time, and ends by closing time.
   */
  isWithinHours(hours: EffectiveHours, window: TimeWindow): boolean {
    if (!hours.isOpen) {
      return false;
    }

    const open = parseClockTime(hours.openTime);
    const close = parseClockTime(hours.closeTime);
    const lastReservation = parseClockTime(hours.lastReservationTime);
    if (open === null || close === null || lastReservation === null) {
      return false;
    }

    return (
      window.startMinutes >= open &&
      window.startMinutes <= lastReservation &&
      window.endMinutes <= close
    );
  }
}
