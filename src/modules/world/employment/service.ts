/**
 * Employment Service.
 *
 * Purpose: job assignment and the `earn` action.
 * Invariants:
 * - Switching jobs has no cooldown.
 * - `earn` pays the current job's payout at most once per that job's cooldown;
 *   the credit and the new `lastEarnAt` commit together, so a failed commit
 *   neither pays nor starts a cooldown.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { CitizenRecord, EmploymentRecord } from "@/db/schemas";
import type { CitizenId } from "@/db/types";
import { lockKeys } from "../concurrency";
import { load, mutate, requireActiveCitizen, type WorldContext } from "../context";
import { WorldError } from "../errors";
import type { Actor } from "../policy";
import { stageAudit } from "../audit/service";
import { stageCredit } from "../ledger/service";
import { isJobKind, JOB_DEFINITIONS, listJobDefinitions, type JobDefinition } from "./definitions";
import type { EarnReceipt } from "./types";

const MINUTE_MS = 60_000;

export interface EmploymentService {
  listJobs(): JobDefinition[];
  assignJob(actor: Actor, citizenId: CitizenId, jobKind: string): Promise<Result<CitizenRecord, WorldError>>;
  earn(actor: Actor, citizenId: CitizenId): Promise<Result<EarnReceipt, WorldError>>;
  /** Earn state for a citizen; `null` before their first earn. */
  record(citizenId: CitizenId): Promise<Result<EmploymentRecord | null, WorldError>>;
}

export class EmploymentServiceImpl implements EmploymentService {
  constructor(private readonly ctx: WorldContext) {}

  listJobs(): JobDefinition[] {
    return listJobDefinitions();
  }

  async record(citizenId: CitizenId): Promise<Result<EmploymentRecord | null, WorldError>> {
    return load(this.ctx, "employment", citizenId);
  }

  async assignJob(
    actor: Actor,
    citizenId: CitizenId,
    jobKind: string,
  ): Promise<Result<CitizenRecord, WorldError>> {
    const kind = jobKind.trim().toLowerCase();
    if (!isJobKind(kind)) {
      return ErrResult(new WorldError("UNKNOWN_JOB_KIND", `There is no job called '${jobKind}'.`));
    }

    return mutate(
      this.ctx,
      [lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<CitizenRecord, WorldError>> => {
        const current = await requireActiveCitizen(this.ctx, citizenId);
        if (current.isErr()) return current;

        const next: CitizenRecord = {
          ...current.unwrap(),
          job: kind,
          updatedAt: this.ctx.clock.now(),
        };
        batch.put("citizens", next);
        stageAudit(this.ctx, batch, {
          operation: "employment.assignJob",
          actorId: actor.id,
          targetId: citizenId,
          metadata: { job: kind },
        });
        return OkResult(next);
      },
    );
  }

  async earn(actor: Actor, citizenId: CitizenId): Promise<Result<EarnReceipt, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<EarnReceipt, WorldError>> => {
        const citizenRes = await requireActiveCitizen(this.ctx, citizenId);
        if (citizenRes.isErr()) return ErrResult(citizenRes.error);
        const citizen = citizenRes.unwrap();

        if (!isJobKind(citizen.job)) {
          return ErrResult(
            new WorldError("UNKNOWN_JOB_KIND", `Job '${citizen.job}' is no longer offered.`),
          );
        }
        const job = JOB_DEFINITIONS[citizen.job];
        const cooldownMs = job.cooldownMinutes * MINUTE_MS;
        const now = this.ctx.clock.now();

        const recordRes = await load(this.ctx, "employment", citizenId);
        if (recordRes.isErr()) return ErrResult(recordRes.error);
        const record: EmploymentRecord = recordRes.unwrap() ?? {
          _id: citizenId,
          lastEarnAt: null,
          lastJob: null,
          earnCount: 0,
          lifetimeEarnings: 0,
        };

        if (record.lastEarnAt) {
          const cooldownEndsAt = new Date(record.lastEarnAt.getTime() + cooldownMs);
          if (now.getTime() < cooldownEndsAt.getTime()) {
            return ErrResult(
              new WorldError("ON_COOLDOWN", `You can work again at ${cooldownEndsAt.toISOString()}.`, {
                cooldownEndsAt,
              }),
            );
          }
        }

        const credited = await stageCredit(this.ctx, batch, citizenId, job.payout);
        if (credited.isErr()) return ErrResult(credited.error);

        batch.put("employment", {
          _id: citizenId,
          lastEarnAt: now,
          lastJob: citizen.job,
          earnCount: record.earnCount + 1,
          lifetimeEarnings: record.lifetimeEarnings + job.payout,
        });
        stageAudit(this.ctx, batch, {
          operation: "employment.earn",
          actorId: actor.id,
          targetId: citizenId,
          amount: job.payout,
          metadata: { job: citizen.job },
        });

        return OkResult({
          citizenId,
          job: citizen.job,
          payout: job.payout,
          balance: credited.unwrap().balanceAfter,
          nextEarnAt: new Date(now.getTime() + cooldownMs),
        });
      },
    );
  }
}
