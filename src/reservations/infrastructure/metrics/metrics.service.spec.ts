import { Test, TestingModule } from '@nestjs/testing';
import { MetricsService } from './metrics.service';

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MetricsService],
    }).compile();

    service = module.get<MetricsService>(MetricsService);
  });

  it('should start with empty counters', () => {
    expect(service.getMetrics()).toEqual({
      reservations: {
        created: 0,
        updated: 0,
        deleted: 0,
        conflicts: { table_unavailable: 0, lock_timeout: 0 },
      },
      commitTime: { p95: null, samples: 0 },
      locks: { waitTimes: { p95: null, samples: 0 }, timeouts: 0 },
    });
  });

  it('should count reservation lifecycle events', () => {
    service.recordReservationCreated();
    service.recordReservationCreated();
    service.recordReservationUpdated();
    service.recordReservationDeleted();

    const { reservations } = service.getMetrics();
    expect(reservations.created).toBe(2);
    expect(reservations.updated).toBe(1);
    expect(reservations.deleted).toBe(1);
  });

  it('should count conflicts by kind', () => {
    service.recordConflict('table_unavailable');
    service.recordConflict('table_unavailable');
    service.recordConflict('lock_timeout');
    service.recordLockTimeout();

    const metrics = service.getMetrics();
    expect(metrics.reservations.conflicts).toEqual({
      table_unavailable: 2,
      lock_timeout: 1,
    });
    expect(metrics.locks.timeouts).toBe(1);
  });

  describe('p95', () => {
    it('should stay null below 20 samples', () => {
      for (let i = 1; i <= 19; i++) {
        service.recordCommitTime(i);
      }

      expect(service.getMetrics().commitTime).toEqual({
        p95: null,
        samples: 19,
      });
    });

    it('should pick the 95th percentile once enough samples exist', () => {
      // 1..20 -> index ceil(20 * 0.95) - 1 = 18 -> value 19
      for (let i = 20; i >= 1; i--) {
        service.recordLockWaitTime(i);
      }

      expect(service.getMetrics().locks.waitTimes).toEqual({
        p95: 19,
        samples: 20,
      });
    });

    it('should keep only the most recent 1000 samples', () => {
      for (let i = 0; i < 1005; i++) {
        service.recordCommitTime(i);
      }

      expect(service.getMetrics().commitTime.samples).toBe(1000);
    });
  });

  it('should reset everything', () => {
    service.recordReservationCreated();
    service.recordConflict('lock_timeout');
    service.recordCommitTime(5);

    service.reset();

    const metrics = service.getMetrics();
    expect(metrics.reservations.created).toBe(0);
    expect(metrics.reservations.conflicts.lock_timeout).toBe(0);
    expect(metrics.commitTime.samples).toBe(0);
  });
});
