import { ErrResult, type Result } from "@/utils/result";
import type { WorldError } from "../errors";
import type { LockLease, LockManager } from "./types";

/** Ascending, deduplicated order in which `withLocks` takes `keys`. */
export const lockOrder = (keys: readonly string[]): string[] => [...new Set(keys)].sort();

/**
 * Runs `fn` while holding every key; `fn` receives the leases in the order
 * they were taken.
 *
 * Keys are deduplicated and taken in ascending order, then released in reverse,
 * so two operations over overlapping keys can never wait on each other in a
 * cycle. If any key times out, the keys already taken are released and the
 * `BUSY` error is returned without running `fn`.
 */
export async function withLocks<T>(
  manager: LockManager,
  keys: readonly string[],
  waitMs: number,
  fn: (leases: readonly LockLease[]) => Promise<Result<T, WorldError>>,
): Promise<Result<T, WorldError>> {
  const ordered = lockOrder(keys);
  const leases: LockLease[] = [];

  try {
    for (const key of ordered) {
      const res = await manager.acquire(key, waitMs);
      if (res.isErr()) return ErrResult(res.error);
      leases.push(res.unwrap());
    }
    return await fn([...leases]);
  } finally {
    for (const lease of leases.reverse()) {
      await lease.release();
    }
  }
}
