import { Injectable } from '@nestjs/common';
import { RestaurantTable } from '../entities/restaurant-table.entity';
import { Reservation } from '../entities/reservation.entity';
import { isActiveStatus } from '../types/reservation-status.enum';
import { TableAvailability } from '../types/table-availability.type';
import { TimeWindow } from '../types/time-window.type';
import { createTimeWindow, windowsOverlap } from '../utils/time-window.util';

export interface AvailabilityRequest {
  partySize: number;
  window: TimeWindow;
  // Occupancy of this reservation is ignored (a reservation never blocks itself).
  ignoreReservationId?: string;
}

@Injectable()
export class AvailabilityCalculatorService {
  /**
   * Computes which tables can seat the party during the window.
   *
   * Rules:
   * 1. A table is a candidate only if minCapacity <= partySize <= maxCapacity
   * 2. An exclusive table is dropped as soon as one active reservation on it
   *    overlaps the window
   * 3. A shared table stays while the party fits into what overlapping active
   *    reservations leave of its maxCapacity
   *
   * Results are ordered closest fit first (|minCapacity - partySize|), then by
   * table number.
   *
   * @param reservations - reservations for the window's date, with assignments
   */
  calculate(
    tables: RestaurantTable[],
    reservations: Reservation[],
    request: AvailabilityRequest,
  ): TableAvailability[] {
    const occupancy = this.occupancyByTable(reservations, request);
    const { partySize } = request;

    const available: TableAvailability[] = [];
    for (const table of tables) {
      if (table.minCapacity > partySize || table.maxCapacity < partySize) {
        continue;
      }

      const seatedParties = occupancy.get(table.id) ?? [];

      if (!table.isShared) {
        if (seatedParties.length === 0) {
          available.push({
            table,
            remainingCapacity: table.maxCapacity,
            canBeShared: false,
          });
        }
        continue;
      }

      const seated = seatedParties.reduce((sum, size) => sum + size, 0);
      const remainingCapacity = table.maxCapacity - seated;
      if (remainingCapacity >= partySize) {
        available.push({ table, remainingCapacity, canBeShared: true });
      }
    }

    return available.sort((a, b) => {
      const fitDiff =
        Math.abs(a.table.minCapacity - partySize) -
        Math.abs(b.table.minCapacity - partySize);
      if (fitDiff !== 0) {
        return fitDiff;
      }
      return compareTableNumbers(a.table.tableNumber, b.table.tableNumber);
    });
  }

  private occupancyByTable(
    reservations: Reservation[],
    request: AvailabilityRequest,
  ): Map<string, number[]> {
    const occupancy = new Map<string, number[]>();

    for (const reservation of reservations) {
      if (
        reservation.id === request.ignoreReservationId ||
        !isActiveStatus(reservation.status)
      ) {
        continue;
      }

      const reserved = createTimeWindow(
        reservation.reservationDate,
        reservation.startTime,
        reservation.durationMinutes,
      );
      if (!windowsOverlap(reserved, request.window)) {
        continue;
      }

      for (const assignment of reservation.assignments ?? []) {
        const parties = occupancy.get(assignment.tableId) ?? [];
        parties.push(reservation.partySize);
        occupancy.set(assignment.tableId, parties);
      }
    }

    return occupancy;
  }
}

function compareTableNumbers(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
