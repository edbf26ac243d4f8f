import { formatInTimeZone } from 'date-fns-tz';
import { Reservation } from '../../domain/entities/reservation.entity';
import {
  createTimeWindow,
  formatClockTime,
} from '../../domain/utils/time-window.util';
import { ReservationResponse, ReservedTable } from '../dto/reservation.dto';

/**
 * Expects the reservation to be loaded with its customer and its assignments'
 * tables. Timestamps are rendered in the restaurant's timezone.
 */
export function toReservationResponse(
  reservation: Reservation,
  timezone: string,
): ReservationResponse {
  const formatDateInTimezone = (date: Date) =>
    formatInTimeZone(date, timezone, "yyyy-MM-dd'T'HH:mm:ssXXX");

  const window = createTimeWindow(
    reservation.reservationDate,
    reservation.startTime,
    reservation.durationMinutes,
  );

  const tables: ReservedTable[] = [];
  for (const assignment of reservation.assignments ?? []) {
    if (!assignment.table) {
      continue;
    }
    tables.push({
      id: assignment.table.id,
      tableNumber: assignment.table.tableNumber,
      minCapacity: assignment.table.minCapacity,
      maxCapacity: assignment.table.maxCapacity,
      isShared: assignment.table.isShared,
      location: assignment.table.location,
    });
  }
  tables.sort((a, b) => a.tableNumber.localeCompare(b.tableNumber));

  return {
    id: reservation.id,
    partySize: reservation.partySize,
    reservationDate: reservation.reservationDate,
    startTime: reservation.startTime,
    endTime: formatClockTime(window.endMinutes),
    durationMinutes: reservation.durationMinutes,
    notes: reservation.notes,
    status: reservation.status,
    customerId: reservation.customerId,
    customerName: reservation.customer?.name ?? '',
    customerEmail: reservation.customer?.email ?? null,
    customerPhone: reservation.customer?.phone ?? null,
    tables,
    createdAt: formatDateInTimezone(reservation.createdAt),
    updatedAt: formatDateInTimezone(reservation.updatedAt),
  };
}
