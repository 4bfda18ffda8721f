/**
 * Citizen Registry.
 *
 * Purpose: the join point of the world; every other record references a
 * citizen by id, and the id is the external (Discord) account id.
 *
 * Invariants:
 * - One citizen per external id; registration creates the citizen and a zero
 *   ledger entry in the same commit.
 * - Citizens are never deleted. `archive` marks them archived and releases
 *   their businesses (unowned, revenue kept) and properties (vacant) atomically.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { CitizenRecord } from "@/db/schemas";
import type { CitizenId } from "@/db/types";
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
import type { Actor } from "../policy";
import { validateAge, validateDisplayName } from "../validation";
import { stageAudit } from "../audit/service";
import { DEFAULT_JOB } from "../employment/definitions";
import type { ArchiveReceipt, RegisterCitizenInput } from "./types";

const MAX_ARCHIVE_ATTEMPTS = 3;

type Holdings = { businessIds: string[]; propertyIds: string[] };

type ArchiveOutcome =
  | { kind: "archived"; receipt: ArchiveReceipt }
  | { kind: "retry"; holdings: Holdings };

export interface CitizenService {
  register(actor: Actor, input: RegisterCitizenInput): Promise<Result<CitizenRecord, WorldError>>;
  lookup(citizenId: CitizenId): Promise<Result<CitizenRecord, WorldError>>;
  rename(actor: Actor, citizenId: CitizenId, displayName: string): Promise<Result<CitizenRecord, WorldError>>;
  setAge(actor: Actor, citizenId: CitizenId, age: number): Promise<Result<CitizenRecord, WorldError>>;
  archive(actor: Actor, citizenId: CitizenId): Promise<Result<ArchiveReceipt, WorldError>>;
}

export class CitizenServiceImpl implements CitizenService {
  constructor(private readonly ctx: WorldContext) {}

  async register(
    actor: Actor,
    input: RegisterCitizenInput,
  ): Promise<Result<CitizenRecord, WorldError>> {
    const name = validateDisplayName(input.displayName, this.ctx.config.citizens);
    if (name.isErr()) return ErrResult(name.error);
    const age = validateAge(input.age, this.ctx.config.citizens);
    if (age.isErr()) return ErrResult(age.error);

    return mutate(
      this.ctx,
      [lockKeys.citizen(input.citizenId)],
      async (batch): Promise<Result<CitizenRecord, WorldError>> => {
        const existing = await load(this.ctx, "citizens", input.citizenId);
        if (existing.isErr()) return ErrResult(existing.error);
        if (existing.unwrap()) {
          return ErrResult(
            new WorldError("ALREADY_REGISTERED", `'${input.citizenId}' is already registered.`),
          );
        }

        const now = this.ctx.clock.now();
        const citizen: CitizenRecord = {
          _id: input.citizenId,
          displayName: name.unwrap(),
          age: age.unwrap(),
          job: DEFAULT_JOB,
          wanted: false,
          status: "active",
          createdAt: now,
          updatedAt: now,
          archivedAt: null,
        };
        batch.put("citizens", citizen);
        batch.put("ledger", { _id: citizen._id, balance: 0, updatedAt: now });
        stageAudit(this.ctx, batch, {
          operation: "citizens.register",
          actorId: actor.id,
          targetId: citizen._id,
        });
        return OkResult(citizen);
      },
    );
  }

  async lookup(citizenId: CitizenId): Promise<Result<CitizenRecord, WorldError>> {
    return requireCitizen(this.ctx, citizenId);
  }

  async rename(
    actor: Actor,
    citizenId: CitizenId,
    displayName: string,
  ): Promise<Result<CitizenRecord, WorldError>> {
    const name = validateDisplayName(displayName, this.ctx.config.citizens);
    if (name.isErr()) return ErrResult(name.error);

    return this.update(actor, citizenId, "citizens.rename", (citizen) => ({
      ...citizen,
      displayName: name.unwrap(),
    }));
  }

  async setAge(
    actor: Actor,
    citizenId: CitizenId,
    age: number,
  ): Promise<Result<CitizenRecord, WorldError>> {
    const valid = validateAge(age, this.ctx.config.citizens);
    if (valid.isErr()) return ErrResult(valid.error);

    return this.update(actor, citizenId, "citizens.setAge", (citizen) => ({
      ...citizen,
      age: valid.unwrap(),
    }));
  }

  private async update(
    actor: Actor,
    citizenId: CitizenId,
    operation: string,
    change: (citizen: CitizenRecord) => CitizenRecord,
  ): Promise<Result<CitizenRecord, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<CitizenRecord, WorldError>> => {
        const current = await requireActiveCitizen(this.ctx, citizenId);
        if (current.isErr()) return current;

        const next = { ...change(current.unwrap()), updatedAt: this.ctx.clock.now() };
        batch.put("citizens", next);
        stageAudit(this.ctx, batch, { operation, actorId: actor.id, targetId: citizenId });
        return OkResult(next);
      },
    );
  }

  async archive(actor: Actor, citizenId: CitizenId): Promise<Result<ArchiveReceipt, WorldError>> {
    let holdings = await this.holdingsOf(citizenId);
    if (holdings.isErr()) return ErrResult(holdings.error);

    for (let attempt = 1; attempt <= MAX_ARCHIVE_ATTEMPTS; attempt += 1) {
      const res = await this.archiveHolding(actor, citizenId, holdings.unwrap());
      if (res.isErr()) return ErrResult(res.error);
      const outcome = res.unwrap();
      if (outcome.kind === "archived") return OkResult(outcome.receipt);
      holdings = OkResult(outcome.holdings);
    }

    return ErrResult(
      new WorldError(
        "BUSY",
        `Citizen '${citizenId}' kept acquiring holdings while being archived; try again.`,
        { key: lockKeys.citizen(citizenId) },
      ),
    );
  }

  private async holdingsOf(citizenId: CitizenId): Promise<Result<Holdings, WorldError>> {
    const owned = await query(this.ctx, "businesses", { where: { ownerId: citizenId } });
    if (owned.isErr()) return ErrResult(owned.error);
    const occupied = await query(this.ctx, "properties", { where: { occupantId: citizenId } });
    if (occupied.isErr()) return ErrResult(occupied.error);
    return OkResult({
      businessIds: owned.unwrap().map((b) => b._id),
      propertyIds: occupied.unwrap().map((p) => p._id),
    });
  }

  /**
   * Archives under the citizen lock plus one lock per known holding.
   *
   * Every operation that hands a citizen a business or property also locks
   * `citizen:<id>`, so holdings read while that lock is held are final. When
   * they include something outside `expected`, nothing is written and the
   * caller retries with the wider key set.
   */
  private async archiveHolding(
    actor: Actor,
    citizenId: CitizenId,
    expected: Holdings,
  ): Promise<Result<ArchiveOutcome, WorldError>> {
    const keys = [
      lockKeys.citizen(citizenId),
      ...expected.businessIds.map(lockKeys.business),
      ...expected.propertyIds.map(lockKeys.property),
    ];

    return mutate(this.ctx, keys, async (batch): Promise<Result<ArchiveOutcome, WorldError>> => {
      const current = await requireActiveCitizen(this.ctx, citizenId);
      if (current.isErr()) return ErrResult(current.error);

      const locked = await this.holdingsOf(citizenId);
      if (locked.isErr()) return ErrResult(locked.error);
      const { businessIds, propertyIds } = locked.unwrap();
      const covered =
        businessIds.every((id) => expected.businessIds.includes(id)) &&
        propertyIds.every((id) => expected.propertyIds.includes(id));
      if (!covered) {
        return OkResult({
          kind: "retry",
          holdings: {
            businessIds: [...new Set([...expected.businessIds, ...businessIds])],
            propertyIds: [...new Set([...expected.propertyIds, ...propertyIds])],
          },
        });
      }

      const now = this.ctx.clock.now();
      batch.put("citizens", {
        ...current.unwrap(),
        status: "archived",
        archivedAt: now,
        updatedAt: now,
      });

      const releasedBusinesses: string[] = [];
      for (const id of businessIds) {
        const res = await load(this.ctx, "businesses", id);
        if (res.isErr()) return ErrResult(res.error);
        const business = res.unwrap();
        if (!business || business.ownerId !== citizenId) continue;
        batch.put("businesses", { ...business, ownerId: null, updatedAt: now });
        releasedBusinesses.push(id);
      }

      const releasedProperties: string[] = [];
      for (const id of propertyIds) {
        const res = await load(this.ctx, "properties", id);
        if (res.isErr()) return ErrResult(res.error);
        const property = res.unwrap();
        if (!property || property.occupantId !== citizenId) continue;
        batch.put("properties", {
          ...property,
          status: "vacant",
          occupantId: null,
          rentedUntil: null,
          updatedAt: now,
        });
        releasedProperties.push(id);
      }

      stageAudit(this.ctx, batch, {
        operation: "citizens.archive",
        actorId: actor.id,
        targetId: citizenId,
        metadata: { releasedBusinesses, releasedProperties },
      });

      return OkResult({
        kind: "archived",
        receipt: { citizenId, releasedBusinesses, releasedProperties },
      });
    });
  }
}
