import { Injectable } from '@nestjs/common';

/**
 * Single exclusive lock over all ledger state.
 * Waiters are served strictly in arrival order; release hands the lock
 * straight to the next waiter so nothing can slip in between.
 */
@Injectable()
export class LedgerLockService {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.locked = false;
  }

  /**
   * Runs a critical section under the lock. An async section holds the
   * lock until it settles; the ledger only passes synchronous ones.
   * The lock is released on every exit path, including throws.
   */
  async runExclusive<T>(criticalSection: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await criticalSection();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  pendingWaiters(): number {
    return this.waiters.length;
  }
}
