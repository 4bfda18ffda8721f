/**
 * Law Enforcement Service.
 *
 * Purpose: wanted records and fines.
 *
 * State machines:
 * - Wanted: none -> active -> cleared (terminal). A new record can be issued
 *   only while none is active; the citizen's `wanted` flag mirrors it in the
 *   same commit.
 * - Fine: issued -> paid | waived (terminal). Paying debits the ledger in the
 *   same commit as the status change.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { CitizenRecord, FineRecord, WantedRecord } from "@/db/schemas";
import type { CitizenId, FineId } from "@/db/types";
import { lockKeys } from "../concurrency";
import {
  load,
  mutate,
  query,
  requireActiveCitizen,
  requireCitizen,
  type WorldContext,
} from "../context";
import { WorldError } from "../errors";
import { generateId } from "../ids";
import type { Actor } from "../policy";
import { validateAmount, validateReason } from "../validation";
import { stageAudit } from "../audit/service";
import { stageDebit } from "../ledger/service";

export const DEFAULT_LAW_LIST_LIMIT = 50;
export const MAX_LAW_LIST_LIMIT = 100;

export interface WantedListFilter {
  /** Only records that are still active. */
  readonly activeOnly?: boolean;
  readonly limit?: number;
}

export interface FineListFilter {
  /** Only fines still in `issued`. */
  readonly unpaidOnly?: boolean;
  readonly limit?: number;
}

const boundedLimit = (limit: number = DEFAULT_LAW_LIST_LIMIT): number =>
  Math.min(Math.max(1, Math.trunc(limit)), MAX_LAW_LIST_LIMIT);

export interface LawService {
  issueWanted(actor: Actor, citizenId: CitizenId, reason: string): Promise<Result<WantedRecord, WorldError>>;
  clearWanted(actor: Actor, citizenId: CitizenId): Promise<Result<WantedRecord, WorldError>>;
  issueFine(actor: Actor, citizenId: CitizenId, amount: number, reason: string): Promise<Result<FineRecord, WorldError>>;
  payFine(actor: Actor, fineId: FineId, citizenId: CitizenId): Promise<Result<FineRecord, WorldError>>;
  waiveFine(actor: Actor, fineId: FineId): Promise<Result<FineRecord, WorldError>>;
  /** Newest first. */
  listFines(citizenId: CitizenId, unpaidOnly?: boolean): Promise<Result<FineRecord[], WorldError>>;
  /** Newest first. */
  wantedHistory(citizenId: CitizenId): Promise<Result<WantedRecord[], WorldError>>;
  activeWanted(citizenId: CitizenId): Promise<Result<WantedRecord | null, WorldError>>;
  /** Wanted records across every citizen, newest first. */
  listWanted(filter?: WantedListFilter): Promise<Result<WantedRecord[], WorldError>>;
  /** Fines across every citizen, newest first. */
  listAllFines(filter?: FineListFilter): Promise<Result<FineRecord[], WorldError>>;
}

export class LawServiceImpl implements LawService {
  constructor(private readonly ctx: WorldContext) {}

  async activeWanted(citizenId: CitizenId): Promise<Result<WantedRecord | null, WorldError>> {
    const res = await query(this.ctx, "wanted", { where: { citizenId, status: "active" }, limit: 1 });
    if (res.isErr()) return ErrResult(res.error);
    return OkResult(res.unwrap()[0] ?? null);
  }

  async issueWanted(
    actor: Actor,
    citizenId: CitizenId,
    reason: string,
  ): Promise<Result<WantedRecord, WorldError>> {
    const checked = validateReason(reason);
    if (checked.isErr()) return ErrResult(checked.error);

    return mutate(
      this.ctx,
      [lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<WantedRecord, WorldError>> => {
        const citizen = await requireActiveCitizen(this.ctx, citizenId);
        if (citizen.isErr()) return ErrResult(citizen.error);

        const active = await this.activeWanted(citizenId);
        if (active.isErr()) return ErrResult(active.error);
        if (active.unwrap()) {
          return ErrResult(
            new WorldError("ALREADY_WANTED", `'${citizen.unwrap().displayName}' is already wanted.`),
          );
        }

        const now = this.ctx.clock.now();
        const record: WantedRecord = {
          _id: generateId("wnt", now),
          citizenId,
          reason: checked.unwrap(),
          issuedBy: actor.id,
          issuedAt: now,
          status: "active",
          clearedBy: null,
          clearedAt: null,
        };
        batch.put("wanted", record);
        batch.put("citizens", { ...citizen.unwrap(), wanted: true, updatedAt: now });
        stageAudit(this.ctx, batch, {
          operation: "law.issueWanted",
          actorId: actor.id,
          targetId: citizenId,
          metadata: { wantedId: record._id, reason: record.reason },
        });
        return OkResult(record);
      },
    );
  }

  async clearWanted(actor: Actor, citizenId: CitizenId): Promise<Result<WantedRecord, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<WantedRecord, WorldError>> => {
        const citizen = await requireCitizen(this.ctx, citizenId);
        if (citizen.isErr()) return ErrResult(citizen.error);

        const active = await this.activeWanted(citizenId);
        if (active.isErr()) return ErrResult(active.error);
        const record = active.unwrap();
        if (!record) {
          return ErrResult(
            new WorldError("NOT_WANTED", `'${citizen.unwrap().displayName}' is not wanted.`),
          );
        }

        const now = this.ctx.clock.now();
        const cleared: WantedRecord = { ...record, status: "cleared", clearedBy: actor.id, clearedAt: now };
        const updated: CitizenRecord = { ...citizen.unwrap(), wanted: false, updatedAt: now };
        batch.put("wanted", cleared);
        batch.put("citizens", updated);
        stageAudit(this.ctx, batch, {
          operation: "law.clearWanted",
          actorId: actor.id,
          targetId: citizenId,
          metadata: { wantedId: record._id },
        });
        return OkResult(cleared);
      },
    );
  }

  async issueFine(
    actor: Actor,
    citizenId: CitizenId,
    amount: number,
    reason: string,
  ): Promise<Result<FineRecord, WorldError>> {
    const valid = validateAmount(amount);
    if (valid.isErr()) return ErrResult(valid.error);
    const checked = validateReason(reason);
    if (checked.isErr()) return ErrResult(checked.error);

    const now = this.ctx.clock.now();
    const fineId = generateId("fine", now);

    return mutate(
      this.ctx,
      [lockKeys.citizen(citizenId), lockKeys.fine(fineId)],
      async (batch): Promise<Result<FineRecord, WorldError>> => {
        const citizen = await requireActiveCitizen(this.ctx, citizenId);
        if (citizen.isErr()) return ErrResult(citizen.error);

        const fine: FineRecord = {
          _id: fineId,
          citizenId,
          amount,
          reason: checked.unwrap(),
          issuedBy: actor.id,
          issuedAt: now,
          status: "issued",
          resolvedBy: null,
          resolvedAt: null,
        };
        batch.put("fines", fine);
        stageAudit(this.ctx, batch, {
          operation: "law.issueFine",
          actorId: actor.id,
          targetId: citizenId,
          amount,
          metadata: { fineId },
        });
        return OkResult(fine);
      },
    );
  }

  private async requireFine(fineId: FineId): Promise<Result<FineRecord, WorldError>> {
    const res = await load(this.ctx, "fines", fineId);
    if (res.isErr()) return ErrResult(res.error);
    const fine = res.unwrap();
    if (!fine) return ErrResult(new WorldError("UNKNOWN_FINE", `No fine with id '${fineId}'.`));
    return OkResult(fine);
  }

  async payFine(
    actor: Actor,
    fineId: FineId,
    citizenId: CitizenId,
  ): Promise<Result<FineRecord, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.fine(fineId), lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<FineRecord, WorldError>> => {
        const current = await this.requireFine(fineId);
        if (current.isErr()) return current;
        const fine = current.unwrap();

        if (fine.status !== "issued") {
          return ErrResult(new WorldError("ALREADY_PAID", `Fine '${fineId}' is already ${fine.status}.`));
        }
        if (fine.citizenId !== citizenId) {
          return ErrResult(new WorldError("NOT_YOUR_FINE", `Fine '${fineId}' was not issued to you.`));
        }

        const paid = await stageDebit(this.ctx, batch, citizenId, fine.amount);
        if (paid.isErr()) return ErrResult(paid.error);

        const next: FineRecord = {
          ...fine,
          status: "paid",
          resolvedBy: actor.id,
          resolvedAt: this.ctx.clock.now(),
        };
        batch.put("fines", next);
        stageAudit(this.ctx, batch, {
          operation: "law.payFine",
          actorId: actor.id,
          targetId: citizenId,
          amount: fine.amount,
          metadata: { fineId },
        });
        return OkResult(next);
      },
    );
  }

  async waiveFine(actor: Actor, fineId: FineId): Promise<Result<FineRecord, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.fine(fineId)],
      async (batch): Promise<Result<FineRecord, WorldError>> => {
        const current = await this.requireFine(fineId);
        if (current.isErr()) return current;
        const fine = current.unwrap();
        if (fine.status !== "issued") {
          return ErrResult(new WorldError("ALREADY_PAID", `Fine '${fineId}' is already ${fine.status}.`));
        }

        const next: FineRecord = {
          ...fine,
          status: "waived",
          resolvedBy: actor.id,
          resolvedAt: this.ctx.clock.now(),
        };
        batch.put("fines", next);
        stageAudit(this.ctx, batch, {
          operation: "law.waiveFine",
          actorId: actor.id,
          targetId: fine.citizenId,
          amount: fine.amount,
          metadata: { fineId },
        });
        return OkResult(next);
      },
    );
  }

  async listFines(citizenId: CitizenId, unpaidOnly = false): Promise<Result<FineRecord[], WorldError>> {
    const citizen = await requireCitizen(this.ctx, citizenId);
    if (citizen.isErr()) return ErrResult(citizen.error);
    return query(this.ctx, "fines", {
      where: unpaidOnly ? { citizenId, status: "issued" } : { citizenId },
      sort: { field: "issuedAt", direction: "desc" },
    });
  }

  async wantedHistory(citizenId: CitizenId): Promise<Result<WantedRecord[], WorldError>> {
    const citizen = await requireCitizen(this.ctx, citizenId);
    if (citizen.isErr()) return ErrResult(citizen.error);
    return query(this.ctx, "wanted", {
      where: { citizenId },
      sort: { field: "issuedAt", direction: "desc" },
    });
  }

  async listWanted(filter: WantedListFilter = {}): Promise<Result<WantedRecord[], WorldError>> {
    return query(this.ctx, "wanted", {
      where: filter.activeOnly ? { status: "active" } : {},
      sort: { field: "issuedAt", direction: "desc" },
      limit: boundedLimit(filter.limit),
    });
  }

  async listAllFines(filter: FineListFilter = {}): Promise<Result<FineRecord[], WorldError>> {
    return query(this.ctx, "fines", {
      where: filter.unpaidOnly ? { status: "issued" } : {},
      sort: { field: "issuedAt", direction: "desc" },
      limit: boundedLimit(filter.limit),
    });
  }
}
