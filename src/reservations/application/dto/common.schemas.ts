import { z } from 'zod';
import { ReservationStatus } from '../../domain/types/reservation-status.enum';
import {
  isCalendarDate,
  isClockTime,
} from '../../domain/utils/time-window.util';

export const IdSchema = z.string().uuid();

export const CalendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a YYYY-MM-DD date' });

export const ClockTimeSchema = z
  .string()
  .refine(isClockTime, { message: 'Expected an HH:mm time' });

export const ReservationStatusSchema = z.nativeEnum(ReservationStatus);

export const PartySizeSchema = z.number().int().positive();

// A booking never spans more than a day.
export const DurationSchema = z.number().int().positive().max(24 * 60);
