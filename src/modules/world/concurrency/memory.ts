/**
 * In-process lock manager.
 *
 * One FIFO queue of waiters per key. Releasing hands the lock straight to the
 * next waiter, so a key is never observed free while someone is queued on it.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { WorldError } from "../errors";
import { busyError, type LockLease, type LockManager } from "./types";

interface Waiter {
  grant(): void;
}

interface KeyState {
  waiters: Waiter[];
}

export class MemoryLockManager implements LockManager {
  private readonly held = new Map<string, KeyState>();

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  async acquire(key: string, waitMs: number): Promise<Result<LockLease, WorldError>> {
    const state = this.held.get(key);
    if (!state) {
      this.held.set(key, { waiters: [] });
      return OkResult(this.lease(key));
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(timer);
          resolve(OkResult(this.lease(key)));
        },
      };
      const timer = setTimeout(() => {
        const index = state.waiters.indexOf(waiter);
        if (index >= 0) state.waiters.splice(index, 1);
        resolve(ErrResult(busyError(key, waitMs)));
      }, waitMs);
      state.waiters.push(waiter);
    });
  }

  private lease(key: string): LockLease {
    let released = false;
    return {
      key,
      renew: async () => OkResult(!released),
      release: async () => {
        if (released) return;
        released = true;
        this.handOff(key);
      },
    };
  }

  private handOff(key: string): void {
    const state = this.held.get(key);
    if (!state) return;
    const next = state.waiters.shift();
    if (next) {
      next.grant();
      return;
    }
    this.held.delete(key);
  }
}
