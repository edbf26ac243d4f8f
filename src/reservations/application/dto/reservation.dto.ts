import { z } from 'zod';
import {
  CalendarDateSchema,
  ClockTimeSchema,
  DurationSchema,
  IdSchema,
  PartySizeSchema,
  ReservationStatusSchema,
} from './common.schemas';

export const CustomerInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  email: z.string().trim().email().max(100).nullish(),
  phone: z.string().trim().min(1).max(20).nullish(),
  notes: z.string().nullish(),
});

export const CreateReservationSchema = z.object({
  customer: CustomerInputSchema,
  partySize: PartySizeSchema,
  reservationDate: CalendarDateSchema,
  startTime: ClockTimeSchema,
  durationMinutes: DurationSchema.optional(),
  notes: z.string().optional(),
  status: ReservationStatusSchema.optional(),
  tableIds: z.array(IdSchema).min(1),
});

export type CreateReservationRequest = z.infer<typeof CreateReservationSchema>;

export const UpdateReservationSchema = z.object({
  partySize: PartySizeSchema.optional(),
  reservationDate: CalendarDateSchema.optional(),
  startTime: ClockTimeSchema.optional(),
  durationMinutes: DurationSchema.optional(),
  notes: z.string().optional(),
  status: ReservationStatusSchema.optional(),
  tableIds: z.array(IdSchema).min(1).optional(),
});

export type UpdateReservationRequest = z.infer<typeof UpdateReservationSchema>;

export const UpdateStatusSchema = z.object({
  status: ReservationStatusSchema,
});

export type UpdateStatusRequest = z.infer<typeof UpdateStatusSchema>;

export const ListReservationsQuerySchema = z.object({
  date: CalendarDateSchema.optional(),
  dateFrom: CalendarDateSchema.optional(),
  dateTo: CalendarDateSchema.optional(),
  tableId: IdSchema.optional(),
  customerId: IdSchema.optional(),
  // Comma-separated list, e.g. status=pending,confirmed
  status: z
    .string()
    .transform((value) => value.split(',').map((status) => status.trim()))
    .pipe(z.array(ReservationStatusSchema).min(1))
    .optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListReservationsQuery = z.infer<typeof ListReservationsQuerySchema>;

export interface ReservedTable {
  id: string;
  tableNumber: string;
  minCapacity: number;
  maxCapacity: number;
  isShared: boolean;
  location: string | null;
}

export interface ReservationResponse {
  id: string;
  partySize: number;
  reservationDate: string; // YYYY-MM-DD
  startTime: string; // HH:mm
  endTime: string; // HH:mm
  durationMinutes: number;
  notes: string;
  status: string;
  customerId: string;
  customerName: string;
  customerEmail: string | null;
  customerPhone: string | null;
  tables: ReservedTable[];
  createdAt: string; // ISO 8601
  updatedAt: string; // ISO 8601
}
