/**
 * Lock manager backed by lease documents in `world_locks`.
 *
 * A lease is taken with a conditional upsert: it matches only an expired lease
 * for the key, so a live one makes the insert collide on `_id` (E11000) and the
 * caller polls again until its wait runs out. Leases expire on their own after
 * `leaseMs`, which frees keys held by a process that died mid-operation.
 * `renew` only matches this holder's unexpired lease, so a holder that
 * overran its lease learns so before it commits.
 */
import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import { MongoServerError, type Collection } from "mongodb";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { getLogger } from "@/utils/logger";
import { getDb } from "@/db/mongo";
import type { LocksConfig } from "@/configuration";
import { storageFailure, type WorldError } from "../errors";
import { busyError, type LockLease, type LockManager } from "./types";

const log = getLogger("locks");

export const LOCKS_COLLECTION = "world_locks";

export interface LockDocument {
  _id: string;
  holder: string;
  expiresAt: Date;
}

const DUPLICATE_KEY = 11000;

export class MongoLockManager implements LockManager {
  constructor(private readonly config: Pick<LocksConfig, "leaseMs" | "retryMs">) {}

  private async collection(): Promise<Collection<LockDocument>> {
    return (await getDb()).collection<LockDocument>(LOCKS_COLLECTION);
  }

  async acquire(key: string, waitMs: number): Promise<Result<LockLease, WorldError>> {
    const holder = randomUUID();
    const deadline = Date.now() + waitMs;

    for (;;) {
      const attempt = await this.tryAcquire(key, holder);
      if (attempt.isErr()) return ErrResult(attempt.error);
      if (attempt.unwrap()) return OkResult(this.lease(key, holder));
      if (Date.now() >= deadline) return ErrResult(busyError(key, waitMs));
      await sleep(this.config.retryMs);
    }
  }

  private async tryAcquire(key: string, holder: string): Promise<Result<boolean, WorldError>> {
    const now = new Date();
    try {
      const col = await this.collection();
      await col.updateOne(
        { _id: key, expiresAt: { $lte: now } },
        { $set: { holder, expiresAt: new Date(now.getTime() + this.config.leaseMs) } },
        { upsert: true },
      );
      return OkResult(true);
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        return OkResult(false);
      }
      return ErrResult(storageFailure(error));
    }
  }

  private lease(key: string, holder: string): LockLease {
    let released = false;
    return {
      key,
      renew: async () => {
        if (released) return OkResult(false);
        const now = new Date();
        try {
          const col = await this.collection();
          const res = await col.updateOne(
            { _id: key, holder, expiresAt: { $gt: now } },
            { $set: { expiresAt: new Date(now.getTime() + this.config.leaseMs) } },
          );
          return OkResult(res.matchedCount === 1);
        } catch (error) {
          return ErrResult(storageFailure(error));
        }
      },
      release: async () => {
        if (released) return;
        released = true;
        try {
          const col = await this.collection();
          await col.deleteOne({ _id: key, holder });
        } catch (error) {
          // The lease still expires after leaseMs.
          log.warn(`[MongoLockManager] release of '${key}' failed`, error);
        }
      },
    };
  }
}
