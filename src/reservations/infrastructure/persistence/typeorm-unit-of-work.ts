import {
  HttpException,
  Injectable,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager } from 'typeorm';
import { AllConfigType } from '../../../config/config.type';
import { RestaurantTable } from '../../domain/entities/restaurant-table.entity';
import { Chair } from '../../domain/entities/chair.entity';
import { Customer } from '../../domain/entities/customer.entity';
import { Reservation } from '../../domain/entities/reservation.entity';
import { TableAssignment } from '../../domain/entities/table-assignment.entity';
import { OperatingHours } from '../../domain/entities/operating-hours.entity';
import { SpecialHours } from '../../domain/entities/special-hours.entity';
import {
  TransactionScope,
  UnitOfWork,
} from '../../ports/repositories/unit-of-work.interface';
import {
  LockManagerService,
  LockHandle,
  LockTimeoutError,
} from '../locking/lock-manager.service';
import { LoggerService } from '../logging/logger.service';
import { MetricsService } from '../metrics/metrics.service';
import { TableRepository } from './repositories/table.repository';
import { CustomerRepository } from './repositories/customer.repository';
import { ReservationRepository } from './repositories/reservation.repository';
import { OperatingHoursRepository } from './repositories/operating-hours.repository';
import { SpecialHoursRepository } from './repositories/special-hours.repository';

// SQLite has a single writer and TypeORM shares one connection for it, so
// every unit of work queues on the same key.
export const STORE_LOCK_KEY = 'reservation-store';

/**
 * Serializes units of work through the lock manager and runs each one in a
 * SERIALIZABLE transaction. The check-then-insert sequence of a booking
 * therefore cannot interleave with another booking.
 */
@Injectable()
export class TypeOrmUnitOfWork implements UnitOfWork {
  constructor(
    private readonly dataSource: DataSource,
    private readonly lockManagerService: LockManagerService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly logger: LoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  async run<T>(
    operation: string,
    work: (scope: TransactionScope) => Promise<T>,
  ): Promise<T> {
    const lock = await this.acquireStoreLock(operation);
    const startTime = Date.now();

    try {
      if (!this.dataSource.isInitialized) {
        this.logger.warn('Data source not initialized, reconnecting', {
          op: operation,
        });
        await this.dataSource.initialize();
      }

      const result = await this.dataSource.transaction(
        'SERIALIZABLE',
        (manager) => work(this.createScope(manager)),
      );
      this.metricsService.recordCommitTime(Date.now() - startTime);
      return result;
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      this.logger.error('Unit of work aborted', error, {
        op: operation,
        durationMs: Date.now() - startTime,
      });
      throw new ServiceUnavailableException({
        error: 'storage_unavailable',
        detail: 'The reservation store could not complete the operation',
        retryable: true,
      });
    } finally {
      lock.release();
    }
  }

  private async acquireStoreLock(operation: string): Promise<LockHandle> {
    const timeoutMs = this.configService.getOrThrow(
      'booking.lockTimeoutMs',
      { infer: true },
    );

    try {
      const lock = await this.lockManagerService.acquire(
        STORE_LOCK_KEY,
        timeoutMs,
      );
      this.metricsService.recordLockWaitTime(lock.waitTimeMs);
      this.logger.debug('Acquired reservation store lock', {
        op: operation,
        waitTimeMs: lock.waitTimeMs,
      });
      return lock;
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        this.metricsService.recordLockTimeout();
        this.metricsService.recordConflict('lock_timeout');
        this.logger.warn('Timed out waiting for the reservation store', {
          op: operation,
          timeoutMs,
        });
        throw new ServiceUnavailableException({
          error: 'storage_unavailable',
          detail: 'The reservation store is busy. Please try again.',
          retryable: true,
        });
      }
      throw error;
    }
  }

  private createScope(manager: EntityManager): TransactionScope {
    return {
      tables: new TableRepository(
        manager.getRepository(RestaurantTable),
        manager.getRepository(Chair),
      ),
      customers: new CustomerRepository(manager.getRepository(Customer)),
      reservations: new ReservationRepository(
        manager.getRepository(Reservation),
        manager.getRepository(TableAssignment),
      ),
      operatingHours: new OperatingHoursRepository(
        manager.getRepository(OperatingHours),
      ),
      specialHours: new SpecialHoursRepository(
        manager.getRepository(SpecialHours),
      ),
    };
  }
}
