/**
 * @txrelay/pipeline — Per-address serialization lock.
 *
 * Allocation for one (chainId, address) runs one at a time. The lock is
 * held for quote + record only, never across a broadcast.
 */

import type { ChainId, HexString } from "@txrelay/types";

/**
 * FIFO mutex. `acquire` resolves with the release function.
 */
export class Mutex {
  private locked = false;
  private readonly queue: (() => void)[] = [];

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = (): void => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release(): void {
    const next = this.queue.shift();
    this.locked = false;
    if (next) next();
  }

  isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.queue.length;
  }
}

/**
 * One mutex per key. Idle mutexes are dropped.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, Mutex>();

  async acquire(key: string): Promise<() => void> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    const owned = mutex;
    const release = await owned.acquire();

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      if (!owned.isLocked() && owned.waiting === 0 && this.mutexes.get(key) === owned) {
        this.mutexes.delete(key);
      }
    };
  }

  /** Run `fn` while holding `key`. */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked() ?? false;
  }

  get size(): number {
    return this.mutexes.size;
  }
}

export function addressLockKey(chainId: ChainId, address: HexString): string {
  return `${chainId}:${address.toLowerCase()}`;
}
