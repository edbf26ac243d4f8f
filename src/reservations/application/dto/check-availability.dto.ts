import { z } from 'zod';
import {
  CalendarDateSchema,
  ClockTimeSchema,
  DurationSchema,
  PartySizeSchema,
} from './common.schemas';

export const CheckAvailabilitySchema = z.object({
  partySize: PartySizeSchema,
  reservationDate: CalendarDateSchema,
  startTime: ClockTimeSchema,
  durationMinutes: DurationSchema.optional(),
});

export type CheckAvailabilityRequest = z.infer<typeof CheckAvailabilitySchema>;

export interface AvailableTable {
  id: string;
  tableNumber: string;
  minCapacity: number;
  maxCapacity: number;
  isShared: boolean;
  location: string | null;
  canBeShared: boolean;
  remainingCapacity: number;
}

export interface CheckAvailabilityResponse {
  availableTables: AvailableTable[];
  isValidTime: boolean;
}
