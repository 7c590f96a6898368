/**
 * Store Lock - Exclusive-lease FIFO queue serialising brand store writes.
 *
 * Every read-modify-write sequence on the brand store (upsert, logo update,
 * delete) holds a lease for its whole duration, so two requests touching the
 * in-memory map and the backing file can never interleave.
 */

import { randomUUID } from 'node:crypto';

export interface StoreLease {
  id: string;
  acquiredAt: number;
}

export class StoreLock {
  private currentLease: StoreLease | null = null;
  private queue: Array<(lease: StoreLease) => void> = [];

  /**
   * Acquire an exclusive lease on the store.
   * If the store is currently leased, waits in FIFO order until released.
   */
  async acquire(): Promise<StoreLease> {
    if (this.currentLease === null) {
      return this.grantLease();
    }

    return new Promise<StoreLease>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release a lease, handing the store to the next waiter.
   */
  release(lease: StoreLease): void {
    if (this.currentLease === null) {
      console.warn(`[StoreLock] Attempted to release lease ${lease.id}, but no lease is active`);
      return;
    }

    if (this.currentLease.id !== lease.id) {
      console.warn(`[StoreLock] Attempted to release lease ${lease.id}, but current lease is ${this.currentLease.id}`);
      return;
    }

    this.currentLease = null;
    this.processNextInQueue();
  }

  /**
   * Run `fn` while holding a lease. The lease is released even when `fn` throws.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const lease = await this.acquire();
    try {
      return await fn();
    } finally {
      this.release(lease);
    }
  }

  isAvailable(): boolean {
    return this.currentLease === null;
  }

  queueLength(): number {
    return this.queue.length;
  }

  private grantLease(): StoreLease {
    const lease: StoreLease = {
      id: randomUUID(),
      acquiredAt: Date.now(),
    };
    this.currentLease = lease;
    return lease;
  }

  private processNextInQueue(): void {
    const next = this.queue.shift();
    if (next === undefined) {
      return;
    }
    next(this.grantLease());
  }
}
