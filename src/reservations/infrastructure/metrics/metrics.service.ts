import { Injectable } from '@nestjs/common';

export type ConflictKind = 'table_unavailable' | 'lock_timeout';

export interface MetricsSnapshot {
  reservations: {
    created: number;
    updated: number;
    deleted: number;
    conflicts: Record<ConflictKind, number>;
  };
  commitTime: {
    p95: number | null;
    samples: number;
  };
  locks: {
    waitTimes: {
      p95: number | null;
      samples: number;
    };
    timeouts: number;
  };
}

@Injectable()
export class MetricsService {
  private reservationsCreated = 0;
  private reservationsUpdated = 0;
  private reservationsDeleted = 0;
  private conflicts: Record<ConflictKind, number> = {
    table_unavailable: 0,
    lock_timeout: 0,
  };
  private lockTimeouts = 0;

  // Arrays to store timing measurements
  private commitTimes: number[] = [];
  private lockWaitTimes: number[] = [];

  // Maximum samples to keep in memory (circular buffer approach)
  private readonly MAX_SAMPLES = 1000;

  /**
   * Resets all in-memory counters and samples.
   * Intended for test isolation (e2e/units) since this service is stateful.
   */
  reset(): void {
    this.reservationsCreated = 0;
    this.reservationsUpdated = 0;
    this.reservationsDeleted = 0;
    this.conflicts = { table_unavailable: 0, lock_timeout: 0 };
    this.lockTimeouts = 0;
    this.commitTimes = [];
    this.lockWaitTimes = [];
  }

  recordReservationCreated(): void {
    this.reservationsCreated++;
  }

  recordReservationUpdated(): void {
    this.reservationsUpdated++;
  }

  recordReservationDeleted(): void {
    this.reservationsDeleted++;
  }

  recordConflict(kind: ConflictKind): void {
    this.conflicts[kind]++;
  }

  recordCommitTime(ms: number): void {
    this.addSample(this.commitTimes, ms);
  }

  recordLockWaitTime(ms: number): void {
    this.addSample(this.lockWaitTimes, ms);
  }

  recordLockTimeout(): void {
    this.lockTimeouts++;
  }

  getMetrics(): MetricsSnapshot {
    return {
      reservations: {
        created: this.reservationsCreated,
        updated: this.reservationsUpdated,
        deleted: this.reservationsDeleted,
        conflicts: { ...this.conflicts },
      },
      commitTime: {
        p95: this.calculateP95(this.commitTimes),
        samples: this.commitTimes.length,
      },
      locks: {
        waitTimes: {
          p95: this.calculateP95(this.lockWaitTimes),
          samples: this.lockWaitTimes.length,
        },
        timeouts: this.lockTimeouts,
      },
    };
  }

  private addSample(array: number[], value: number): void {
    array.push(value);
    // Keep only the last MAX_SAMPLES to prevent unbounded memory growth
    if (array.length > this.MAX_SAMPLES) {
      array.shift();
    }
  }

  private calculateP95(values: number[]): number | null {
    if (values.length < 20) {
      // Insufficient data for reliable P95
      return null;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[index];
  }
}
