/**
 * Ledger Service.
 *
 * Purpose: the only code that changes a citizen's balance.
 * Fit: public `credit`/`debit`/`transfer` for the facade; `stageCredit` and
 * `stageDebit` for other modules that move money as part of a larger mutation
 * (earn, purchase, rent, fines, revenue withdrawal).
 *
 * Invariants:
 * - Balances never go below zero and never exceed `Number.MAX_SAFE_INTEGER`.
 * - Staging helpers assume the caller already holds `citizen:<id>`.
 * - Archived citizens neither send nor receive money.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { LedgerEntry } from "@/db/schemas";
import type { CitizenId } from "@/db/types";
import type { WriteBatch } from "../storage";
import { lockKeys } from "../concurrency";
import { load, mutate, requireActiveCitizen, requireCitizen, type WorldContext } from "../context";
import { WorldError } from "../errors";
import type { Actor } from "../policy";
import { validateAmount } from "../validation";
import { stageAudit } from "../audit/service";
import type { LedgerMovement, TransferReceipt } from "./types";

const isPositiveInteger = (amount: number): boolean => Number.isSafeInteger(amount) && amount > 0;

async function loadEntry(
  ctx: WorldContext,
  citizenId: CitizenId,
  batch: WriteBatch,
): Promise<Result<LedgerEntry, WorldError>> {
  const res = await load(ctx, "ledger", citizenId, batch);
  if (res.isErr()) return ErrResult(res.error);
  // Registration writes the entry; a missing one reads as an empty account.
  return OkResult(res.unwrap() ?? { _id: citizenId, balance: 0, updatedAt: ctx.clock.now() });
}

/** Stages `+amount` on an active citizen's entry. */
export async function stageCredit(
  ctx: WorldContext,
  batch: WriteBatch,
  citizenId: CitizenId,
  amount: number,
): Promise<Result<LedgerMovement, WorldError>> {
  if (!isPositiveInteger(amount)) {
    return ErrResult(new WorldError("INVALID_AMOUNT", "Amount must be a positive whole number."));
  }
  const citizen = await requireActiveCitizen(ctx, citizenId, batch);
  if (citizen.isErr()) return ErrResult(citizen.error);

  const entryRes = await loadEntry(ctx, citizenId, batch);
  if (entryRes.isErr()) return ErrResult(entryRes.error);
  const entry = entryRes.unwrap();

  const after = entry.balance + amount;
  if (!Number.isSafeInteger(after)) {
    return ErrResult(
      new WorldError("INVALID_AMOUNT", "That credit would overflow the account.", {
        balance: entry.balance,
      }),
    );
  }

  batch.put("ledger", { ...entry, balance: after, updatedAt: ctx.clock.now() });
  return OkResult({ citizenId, delta: amount, balanceBefore: entry.balance, balanceAfter: after });
}

/** Stages `-amount`; nothing is staged when the balance is short. */
export async function stageDebit(
  ctx: WorldContext,
  batch: WriteBatch,
  citizenId: CitizenId,
  amount: number,
): Promise<Result<LedgerMovement, WorldError>> {
  if (!isPositiveInteger(amount)) {
    return ErrResult(new WorldError("INVALID_AMOUNT", "Amount must be a positive whole number."));
  }
  const citizen = await requireActiveCitizen(ctx, citizenId, batch);
  if (citizen.isErr()) return ErrResult(citizen.error);

  const entryRes = await loadEntry(ctx, citizenId, batch);
  if (entryRes.isErr()) return ErrResult(entryRes.error);
  const entry = entryRes.unwrap();

  if (entry.balance < amount) {
    return ErrResult(
      new WorldError(
        "INSUFFICIENT_FUNDS",
        `Balance ${entry.balance} does not cover ${amount}.`,
        { balance: entry.balance, required: amount },
      ),
    );
  }

  const after = entry.balance - amount;
  batch.put("ledger", { ...entry, balance: after, updatedAt: ctx.clock.now() });
  return OkResult({ citizenId, delta: -amount, balanceBefore: entry.balance, balanceAfter: after });
}

export interface LedgerService {
  balance(citizenId: CitizenId): Promise<Result<number, WorldError>>;
  /** Administrative credit. */
  credit(actor: Actor, citizenId: CitizenId, amount: number): Promise<Result<LedgerMovement, WorldError>>;
  /** Administrative debit; no partial debits. */
  debit(actor: Actor, citizenId: CitizenId, amount: number): Promise<Result<LedgerMovement, WorldError>>;
  /** Debit `fromId` and credit `toId` in one commit. */
  transfer(
    actor: Actor,
    fromId: CitizenId,
    toId: CitizenId,
    amount: number,
  ): Promise<Result<TransferReceipt, WorldError>>;
}

export class LedgerServiceImpl implements LedgerService {
  constructor(private readonly ctx: WorldContext) {}

  async balance(citizenId: CitizenId): Promise<Result<number, WorldError>> {
    const citizen = await requireCitizen(this.ctx, citizenId);
    if (citizen.isErr()) return ErrResult(citizen.error);
    const entry = await load(this.ctx, "ledger", citizenId);
    if (entry.isErr()) return ErrResult(entry.error);
    return OkResult(entry.unwrap()?.balance ?? 0);
  }

  async credit(
    actor: Actor,
    citizenId: CitizenId,
    amount: number,
  ): Promise<Result<LedgerMovement, WorldError>> {
    const valid = validateAmount(amount);
    if (valid.isErr()) return ErrResult(valid.error);

    return mutate(this.ctx, [lockKeys.citizen(citizenId)], async (batch) => {
      const moved = await stageCredit(this.ctx, batch, citizenId, amount);
      if (moved.isErr()) return moved;
      stageAudit(this.ctx, batch, {
        operation: "ledger.credit",
        actorId: actor.id,
        targetId: citizenId,
        amount,
      });
      return moved;
    });
  }

  async debit(
    actor: Actor,
    citizenId: CitizenId,
    amount: number,
  ): Promise<Result<LedgerMovement, WorldError>> {
    const valid = validateAmount(amount);
    if (valid.isErr()) return ErrResult(valid.error);

    return mutate(this.ctx, [lockKeys.citizen(citizenId)], async (batch) => {
      const moved = await stageDebit(this.ctx, batch, citizenId, amount);
      if (moved.isErr()) return moved;
      stageAudit(this.ctx, batch, {
        operation: "ledger.debit",
        actorId: actor.id,
        targetId: citizenId,
        amount,
      });
      return moved;
    });
  }

  async transfer(
    actor: Actor,
    fromId: CitizenId,
    toId: CitizenId,
    amount: number,
  ): Promise<Result<TransferReceipt, WorldError>> {
    if (fromId === toId) {
      return ErrResult(new WorldError("SAME_ACCOUNT", "Cannot transfer money to the same citizen."));
    }
    const valid = validateAmount(amount);
    if (valid.isErr()) return ErrResult(valid.error);

    return mutate(
      this.ctx,
      [lockKeys.citizen(fromId), lockKeys.citizen(toId)],
      async (batch): Promise<Result<TransferReceipt, WorldError>> => {
        const recipient = await requireActiveCitizen(this.ctx, toId, batch);
        if (recipient.isErr()) return ErrResult(recipient.error);

        const debited = await stageDebit(this.ctx, batch, fromId, amount);
        if (debited.isErr()) return ErrResult(debited.error);
        const credited = await stageCredit(this.ctx, batch, toId, amount);
        if (credited.isErr()) return ErrResult(credited.error);

        stageAudit(this.ctx, batch, {
          operation: "ledger.transfer",
          actorId: actor.id,
          targetId: fromId,
          amount,
          metadata: { toId },
        });

        return OkResult({
          fromId,
          toId,
          amount,
          fromBalance: debited.unwrap().balanceAfter,
          toBalance: credited.unwrap().balanceAfter,
        });
      },
    );
  }
}
