import { z } from 'zod';
import { CalendarDateSchema, ClockTimeSchema } from './common.schemas';
import { HoursSource } from '../../domain/types/effective-hours.type';

export const SetOperatingHoursSchema = z.object({
  dayOfWeek: z.number().int().min(0).max(6), // 0 = Monday .. 6 = Sunday
  openTime: ClockTimeSchema,
  closeTime: ClockTimeSchema,
  lastReservationTime: ClockTimeSchema,
});

export type SetOperatingHoursRequest = z.infer<typeof SetOperatingHoursSchema>;

export const SetSpecialHoursSchema = z.object({
  date: CalendarDateSchema,
  name: z.string().trim().min(1).max(100),
  description: z.string().nullish(),
  isClosed: z.boolean().default(false),
  openTime: ClockTimeSchema.nullish(),
  closeTime: ClockTimeSchema.nullish(),
  lastReservationTime: ClockTimeSchema.nullish(),
});

export type SetSpecialHoursRequest = z.infer<typeof SetSpecialHoursSchema>;

export const ListSpecialHoursQuerySchema = z.object({
  dateFrom: CalendarDateSchema.optional(),
  dateTo: CalendarDateSchema.optional(),
});

export type ListSpecialHoursQuery = z.infer<typeof ListSpecialHoursQuerySchema>;

export interface OperatingHoursResponse {
  id: string;
  dayOfWeek: number;
  openTime: string;
  closeTime: string;
  lastReservationTime: string;
}

export interface SpecialHoursResponse {
  id: string;
  date: string;
  name: string;
  description: string | null;
  isClosed: boolean;
  openTime: string | null;
  closeTime: string | null;
  lastReservationTime: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface EffectiveHoursResponse {
  date: string;
  isOpen: boolean;
  source: HoursSource;
  openTime: string | null;
  closeTime: string | null;
  lastReservationTime: string | null;
}
