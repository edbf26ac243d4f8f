import { Injectable } from '@nestjs/common';

interface Lock {
  promise: Promise<void>;
  resolve: () => void;
}

export interface LockHandle {
  release: () => void;
  waitTimeMs: number;
}

export class LockTimeoutError extends Error {
  constructor(
    readonly key: string,
    readonly timeoutMs: number,
  ) {
    super(`Lock timeout after ${timeoutMs}ms waiting for ${key}`);
    this.name = 'LockTimeoutError';
  }
}

@Injectable()
export class LockManagerService {
  private locks = new Map<string, Lock>();

  /**
   * Acquire a lock for the given key, waiting at most `timeoutMs` overall.
   * Resolves with a release function and how long the caller waited.
   */
  async acquire(key: string, timeoutMs: number = 5000): Promise<LockHandle> {
    const startedAt = Date.now();

    // Wait for existing lock if any
    let existing = this.locks.get(key);
    while (existing) {
      const remainingMs = timeoutMs - (Date.now() - startedAt);
      const released =
        remainingMs > 0 && (await this.waitFor(existing.promise, remainingMs));
      if (!released) {
        throw new LockTimeoutError(key, timeoutMs);
      }
      existing = this.locks.get(key);
    }

    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((res) => {
      resolve = res;
    });
    const lock: Lock = { promise, resolve };
    this.locks.set(key, lock);

    return {
      waitTimeMs: Date.now() - startedAt,
      release: () => {
        // Only the current holder may release; a stale handle is a no-op.
        if (this.locks.get(key) === lock) {
          this.locks.delete(key);
          lock.resolve();
        }
      },
    };
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  /**
   * Clear all locks (useful for testing)
   */
  clear(): void {
    // Resolve all pending locks after clearing so waiters can take over
    const pending = [...this.locks.values()];
    this.locks.clear();
    for (const lock of pending) {
      lock.resolve();
    }
  }

  private async waitFor(
    promise: Promise<void>,
    timeoutMs: number,
  ): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((res) => {
      timer = setTimeout(() => res(false), timeoutMs);
    });

    try {
      return await Promise.race([promise.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
