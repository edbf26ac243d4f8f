import { TableRepository } from './table.repository.interface';
import { CustomerRepository } from './customer.repository.interface';
import { ReservationRepository } from './reservation.repository.interface';
import { OperatingHoursRepository } from './operating-hours.repository.interface';
import { SpecialHoursRepository } from './special-hours.repository.interface';

/**
 * Repositories bound to one open transaction.
 */
export interface TransactionScope {
  tables: TableRepository;
  customers: CustomerRepository;
  reservations: ReservationRepository;
  operatingHours: OperatingHoursRepository;
  specialHours: SpecialHoursRepository;
}

export interface UnitOfWork {
  /**
   * Runs `work` in a single atomic transaction. Everything written through the
   * scope commits together or not at all.
   *
   * @param operation - name used for logging and metrics
   */
  run<T>(
    operation: string,
    work: (scope: TransactionScope) => Promise<T>,
  ): Promise<T>;
}
