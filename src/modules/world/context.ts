/**
 * World Context.
 *
 * Purpose: the collaborators every service receives (store, locks, clock,
 * config, logger) plus the read and mutate helpers that turn storage errors
 * into `STORAGE_FAILURE` and enforce the lock-then-commit discipline.
 *
 * Invariants:
 * - `mutate` stages every write of an operation in one `WriteBatch` and commits
 *   it only when the work returned `Ok`; an `Err` leaves storage untouched.
 * - Locks are held until the commit resolves, and every lease is renewed
 *   right before it; a lost lease fails the operation with `BUSY` unwritten.
 */
import type { Logger } from "seyfert/lib/common";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { WorldConfig } from "@/configuration";
import type { CitizenRecord, CollectionName, WorldDocuments } from "@/db/schemas";
import type { Clock } from "./clock";
import { storageFailure, WorldError } from "./errors";
import { leaseLostError, withLocks, type LockLease, type LockManager } from "./concurrency";
import { WriteBatch, type CountQuery, type FindQuery, type WorldStore } from "./storage";

export interface WorldContext {
  readonly store: WorldStore;
  readonly locks: LockManager;
  readonly clock: Clock;
  readonly config: WorldConfig;
  readonly log: Logger;
}

export async function mutate<T>(
  ctx: WorldContext,
  keys: readonly string[],
  work: (batch: WriteBatch) => Promise<Result<T, WorldError>>,
): Promise<Result<T, WorldError>> {
  return withLocks(ctx.locks, keys, ctx.config.locks.waitMs, async (leases) => {
    const batch = new WriteBatch();
    const res = await work(batch);
    if (res.isErr()) return res;

    if (!batch.isEmpty) {
      const kept = await renewAll(leases);
      if (kept.isErr()) return ErrResult(kept.error);
      const committed = await ctx.store.commit(batch);
      if (committed.isErr()) return ErrResult(storageFailure(committed.error));
    }
    return res;
  });
}

async function renewAll(leases: readonly LockLease[]): Promise<Result<void, WorldError>> {
  for (const lease of leases) {
    const res = await lease.renew();
    if (res.isErr()) return ErrResult(res.error);
    if (!res.unwrap()) return ErrResult(leaseLostError(lease.key));
  }
  return OkResult(undefined);
}

/** Reads one document, preferring what `batch` already staged for it. */
export async function load<K extends CollectionName>(
  ctx: WorldContext,
  collection: K,
  id: string,
  batch?: WriteBatch,
): Promise<Result<WorldDocuments[K] | null, WorldError>> {
  const staged = batch?.peek(collection, id);
  if (staged) return OkResult(staged);

  const res = await ctx.store.get(collection, id);
  if (res.isErr()) return ErrResult(storageFailure(res.error));
  return OkResult(res.unwrap());
}

export async function query<K extends CollectionName>(
  ctx: WorldContext,
  collection: K,
  filter: FindQuery<WorldDocuments[K]> = {},
): Promise<Result<WorldDocuments[K][], WorldError>> {
  const res = await ctx.store.find(collection, filter);
  if (res.isErr()) return ErrResult(storageFailure(res.error));
  return OkResult(res.unwrap());
}

export async function countOf<K extends CollectionName>(
  ctx: WorldContext,
  collection: K,
  filter: CountQuery<WorldDocuments[K]> = {},
): Promise<Result<number, WorldError>> {
  const res = await ctx.store.count(collection, filter);
  if (res.isErr()) return ErrResult(storageFailure(res.error));
  return OkResult(res.unwrap());
}

export async function requireCitizen(
  ctx: WorldContext,
  citizenId: string,
  batch?: WriteBatch,
): Promise<Result<CitizenRecord, WorldError>> {
  const res = await load(ctx, "citizens", citizenId, batch);
  if (res.isErr()) return ErrResult(res.error);
  const citizen = res.unwrap();
  if (!citizen) {
    return ErrResult(
      new WorldError("UNKNOWN_CITIZEN", `No citizen is registered as '${citizenId}'.`),
    );
  }
  return OkResult(citizen);
}

/** Like `requireCitizen`, but archived citizens fail with `CITIZEN_ARCHIVED`. */
export async function requireActiveCitizen(
  ctx: WorldContext,
  citizenId: string,
  batch?: WriteBatch,
): Promise<Result<CitizenRecord, WorldError>> {
  const res = await requireCitizen(ctx, citizenId, batch);
  if (res.isErr()) return res;
  const citizen = res.unwrap();
  if (citizen.status === "archived") {
    return ErrResult(
      new WorldError("CITIZEN_ARCHIVED", `Citizen '${citizenId}' has been archived.`),
    );
  }
  return OkResult(citizen);
}
