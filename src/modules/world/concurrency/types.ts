import type { Result } from "@/utils/result";
import { WorldError } from "../errors";

/** A held lock; releasing twice is a no-op. */
export interface LockLease {
  readonly key: string;
  /**
   * Extends the lease if this holder still owns it. `false` means the lease
   * was released or expired and another holder may have taken the key.
   */
  renew(): Promise<Result<boolean, WorldError>>;
  release(): Promise<void>;
}

/**
 * Keyed exclusive locks. `acquire` waits at most `waitMs` and then fails with
 * `BUSY`; it never retries on the caller's behalf after that.
 */
export interface LockManager {
  acquire(key: string, waitMs: number): Promise<Result<LockLease, WorldError>>;
}

export const lockKeys = {
  citizen: (id: string) => `citizen:${id}`,
  business: (id: string) => `business:${id}`,
  property: (id: string) => `property:${id}`,
  fine: (id: string) => `fine:${id}`,
};

export const busyError = (key: string, waitMs: number): WorldError =>
  new WorldError("BUSY", `'${key}' is busy (waited ${waitMs}ms); try again.`, { key });

export const leaseLostError = (key: string): WorldError =>
  new WorldError("BUSY", `Lock '${key}' expired before the commit; try again.`, { key });
