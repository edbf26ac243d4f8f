import { Reservation } from '../../domain/entities/reservation.entity';
import { ReservationStatus } from '../../domain/types/reservation-status.enum';

export interface ReservationCriteria {
  date?: string;
  dateFrom?: string;
  dateTo?: string;
  tableId?: string;
  customerId?: string;
  statuses?: ReservationStatus[];
  limit: number;
  offset: number;
}

export type ReservationChanges = Partial<
  Pick<
    Reservation,
    | 'partySize'
    | 'reservationDate'
    | 'startTime'
    | 'durationMinutes'
    | 'notes'
    | 'status'
  >
>;

export interface ReservationRepository {
  /** Loads the reservation with its customer and assigned tables. */
  findById(id: string): Promise<Reservation | null>;
  find(criteria: ReservationCriteria): Promise<Reservation[]>;
  /** Active reservations on a date, with their table assignments. */
  findActiveOnDate(date: string): Promise<Reservation[]>;
  /** Active reservations holding the table, without relations. */
  findActiveForTable(tableId: string): Promise<Reservation[]>;
  create(reservation: Reservation): Promise<Reservation>;
  update(id: string, changes: ReservationChanges): Promise<void>;
  assignTables(reservationId: string, tableIds: string[]): Promise<void>;
  replaceAssignments(reservationId: string, tableIds: string[]): Promise<void>;
  delete(id: string): Promise<boolean>;
}
