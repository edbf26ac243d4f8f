import { AvailabilityCalculatorService } from './availability-calculator.service';
import { RestaurantTable } from '../entities/restaurant-table.entity';
import { Reservation } from '../entities/reservation.entity';
import { TableAssignment } from '../entities/table-assignment.entity';
import { ReservationStatus } from '../types/reservation-status.enum';
import { createTimeWindow } from '../utils/time-window.util';

const DATE = '2025-03-14';

function table(
  id: string,
  minCapacity: number,
  maxCapacity: number,
  isShared = false,
): RestaurantTable {
  const entity = new RestaurantTable();
  entity.id = id;
  entity.tableNumber = id.toUpperCase();
  entity.minCapacity = minCapacity;
  entity.maxCapacity = maxCapacity;
  entity.isShared = isShared;
  entity.location = null;
  return entity;
}

function reservation(
  id: string,
  tableIds: string[],
  partySize: number,
  startTime: string,
  options: { durationMinutes?: number; status?: ReservationStatus } = {},
): Reservation {
  const entity = new Reservation();
  entity.id = id;
  entity.customerId = 'customer-1';
  entity.partySize = partySize;
  entity.reservationDate = DATE;
  entity.startTime = startTime;
  entity.durationMinutes = options.durationMinutes ?? 90;
  entity.notes = '';
  entity.status = options.status ?? ReservationStatus.CONFIRMED;
  entity.assignments = tableIds.map((tableId) => {
    const assignment = new TableAssignment();
    assignment.id = `${id}-${tableId}`;
    assignment.reservationId = id;
    assignment.tableId = tableId;
    return assignment;
  });
  return entity;
}

describe('AvailabilityCalculatorService', () => {
  const service = new AvailabilityCalculatorService();
  const window = createTimeWindow(DATE, '18:00', 90);

  it('should only offer tables whose capacity range fits the party', () => {
    const result = service.calculate(
      [table('t1', 1, 2), table('t2', 2, 4), table('t3', 5, 8)],
      [],
      { partySize: 3, window },
    );

    expect(result.map((entry) => entry.table.id)).toEqual(['t2']);
  });

  it('should drop an exclusive table with an overlapping reservation', () => {
    const result = service.calculate(
      [table('t1', 2, 4)],
      [reservation('r1', ['t1'], 3, '18:30')],
      { partySize: 2, window },
    );

    expect(result).toEqual([]);
  });

  it('should keep an exclusive table booked back to back', () => {
    const result = service.calculate(
      [table('t1', 2, 4)],
      [reservation('r1', ['t1'], 3, '16:30')],
      { partySize: 2, window },
    );

    expect(result).toEqual([
      { table: expect.objectContaining({ id: 't1' }), remainingCapacity: 4, canBeShared: false },
    ]);
  });

  it('should ignore cancelled and no-show reservations', () => {
    const result = service.calculate(
      [table('t1', 2, 4)],
      [
        reservation('r1', ['t1'], 3, '18:00', {
          status: ReservationStatus.CANCELLED,
        }),
        reservation('r2', ['t1'], 3, '18:00', {
          status: ReservationStatus.NO_SHOW,
        }),
      ],
      { partySize: 2, window },
    );

    expect(result).toHaveLength(1);
  });

  it('should count pending and seated reservations as occupying', () => {
    for (const status of [ReservationStatus.PENDING, ReservationStatus.SEATED]) {
      const result = service.calculate(
        [table('t1', 2, 4)],
        [reservation('r1', ['t1'], 3, '18:00', { status })],
        { partySize: 2, window },
      );

      expect(result).toEqual([]);
    }
  });

  it('should subtract overlapping parties from a shared table', () => {
    const result = service.calculate(
      [table('bar', 2, 8, true)],
      [reservation('r1', ['bar'], 3, '18:00')],
      { partySize: 4, window },
    );

    expect(result).toEqual([
      { table: expect.objectContaining({ id: 'bar' }), remainingCapacity: 5, canBeShared: true },
    ]);
  });

  it('should keep a shared table whose remaining capacity exactly fits', () => {
    const result = service.calculate(
      [table('bar', 2, 8, true)],
      [reservation('r1', ['bar'], 3, '18:00')],
      { partySize: 5, window },
    );

    expect(result.map((entry) => entry.remainingCapacity)).toEqual([5]);
  });

  it('should drop a shared table once the party no longer fits', () => {
    const result = service.calculate(
      [table('bar', 2, 8, true)],
      [reservation('r1', ['bar'], 3, '18:00')],
      { partySize: 6, window },
    );

    expect(result).toEqual([]);
  });

  it('should sum every overlapping party on a shared table', () => {
    const result = service.calculate(
      [table('bar', 1, 10, true)],
      [
        reservation('r1', ['bar'], 2, '17:00'),
        reservation('r2', ['bar'], 3, '19:00'),
        reservation('r3', ['bar'], 4, '20:00'),
      ],
      { partySize: 2, window },
    );

    // r3 starts at 20:00, exactly when the window ends.
    expect(result.map((entry) => entry.remainingCapacity)).toEqual([5]);
  });

  it('should ignore the occupancy of the reservation being changed', () => {
    const result = service.calculate(
      [table('t1', 2, 4)],
      [reservation('r1', ['t1'], 3, '18:00')],
      { partySize: 3, window, ignoreReservationId: 'r1' },
    );

    expect(result.map((entry) => entry.table.id)).toEqual(['t1']);
  });

  it('should order by closest minimum capacity, then table number', () => {
    const result = service.calculate(
      [
        table('t4', 1, 6),
        table('t3', 3, 6),
        table('t2', 2, 6),
        table('t1', 2, 6),
      ],
      [],
      { partySize: 3, window },
    );

    expect(result.map((entry) => entry.table.id)).toEqual([
      't3',
      't1',
      't2',
      't4',
    ]);
  });
});
