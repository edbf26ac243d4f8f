import { Test, TestingModule } from '@nestjs/testing';
import {
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { AllConfigType } from '../../../config/config.type';
import { STORE_LOCK_KEY, TypeOrmUnitOfWork } from './typeorm-unit-of-work';
import { LockManagerService } from '../locking/lock-manager.service';
import { LoggerService } from '../logging/logger.service';
import { MetricsService } from '../metrics/metrics.service';
import { captureHttpError } from '../../../../test/support/http-error';

describe('TypeOrmUnitOfWork', () => {
  let unitOfWork: TypeOrmUnitOfWork;
  let lockManager: LockManagerService;
  let metrics: MetricsService;

  const manager = { getRepository: jest.fn(() => ({})) };
  const dataSource = {
    isInitialized: true,
    initialize: jest.fn(),
    transaction: jest.fn(
      (_isolation: string, work: (entityManager: unknown) => Promise<unknown>) =>
        work(manager),
    ),
  };
  const logger = {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    dataSource.isInitialized = true;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TypeOrmUnitOfWork,
        LockManagerService,
        MetricsService,
        { provide: DataSource, useValue: dataSource },
        { provide: LoggerService, useValue: logger },
        {
          provide: ConfigService,
          useValue: new ConfigService<AllConfigType>({
            booking: {
              defaultDurationMinutes: 90,
              placeholderPartyLimit: 6,
              lockTimeoutMs: 20,
              timezone: 'UTC',
            },
          }),
        },
      ],
    }).compile();

    unitOfWork = module.get<TypeOrmUnitOfWork>(TypeOrmUnitOfWork);
    lockManager = module.get<LockManagerService>(LockManagerService);
    metrics = module.get<MetricsService>(MetricsService);
  });

  afterEach(() => {
    lockManager.clear();
  });

  it('should run the work in a serializable transaction and release the lock', async () => {
    const result = await unitOfWork.run('create_reservation', async (scope) => {
      expect(lockManager.isLocked(STORE_LOCK_KEY)).toBe(true);
      expect(scope.reservations).toBeDefined();
      return 'done';
    });

    expect(result).toBe('done');
    expect(dataSource.transaction).toHaveBeenCalledWith(
      'SERIALIZABLE',
      expect.any(Function),
    );
    expect(lockManager.isLocked(STORE_LOCK_KEY)).toBe(false);
    expect(metrics.getMetrics().commitTime.samples).toBe(1);
  });

  it('should log how long it waited for the lock', async () => {
    await unitOfWork.run('update_table', async () => undefined);

    expect(logger.debug).toHaveBeenCalledWith(
      'Acquired reservation store lock',
      { op: 'update_table', waitTimeMs: expect.any(Number) },
    );
    expect(metrics.getMetrics().locks.waitTimes.samples).toBe(1);
  });

  it('should pass HTTP errors through unchanged', async () => {
    const notFound = new NotFoundException({
      error: 'not_found',
      detail: 'Reservation not found',
    });

    const error = await captureHttpError(
      unitOfWork.run('update_reservation', async () => {
        throw notFound;
      }),
    );

    expect(error).toBe(notFound);
    expect(lockManager.isLocked(STORE_LOCK_KEY)).toBe(false);
  });

  it('should turn storage failures into a retryable 503', async () => {
    const error = await captureHttpError(
      unitOfWork.run('create_reservation', async () => {
        throw new Error('SQLITE_IOERR');
      }),
    );

    expect(error).toBeInstanceOf(ServiceUnavailableException);
    expect(error.getResponse()).toEqual({
      error: 'storage_unavailable',
      detail: 'The reservation store could not complete the operation',
      retryable: true,
    });
    expect(logger.error).toHaveBeenCalled();
  });

  it('should give up after the lock timeout without touching the store', async () => {
    const holder = await lockManager.acquire(STORE_LOCK_KEY);

    const error = await captureHttpError(
      unitOfWork.run('create_reservation', async () => 'never'),
    );
    holder.release();

    expect(error).toBeInstanceOf(ServiceUnavailableException);
    expect(error.getResponse()).toEqual({
      error: 'storage_unavailable',
      detail: 'The reservation store is busy. Please try again.',
      retryable: true,
    });
    expect(dataSource.transaction).not.toHaveBeenCalled();
    expect(metrics.getMetrics().locks.timeouts).toBe(1);
    expect(metrics.getMetrics().reservations.conflicts.lock_timeout).toBe(1);
  });

  it('should reconnect a data source that is not initialized', async () => {
    dataSource.isInitialized = false;

    await unitOfWork.run('set_weekly_hours', async () => undefined);

    expect(dataSource.initialize).toHaveBeenCalledTimes(1);
  });
});
