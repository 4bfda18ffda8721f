/**
 * Business Registry.
 *
 * Purpose: founding businesses, ownership changes and revenue.
 * Invariants:
 * - Revenue never goes below zero; a withdrawal moves revenue to the owner's
 *   ledger in one commit.
 * - Only the owner (or an authority) acts on a business. An unowned business
 *   (its owner was archived) can only be reassigned by an authority.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { BusinessRecord } from "@/db/schemas";
import type { BusinessId, CitizenId } from "@/db/types";
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
import { isAuthority, type Actor } from "../policy";
import { validateAmount, validateLabel } from "../validation";
import { stageAudit } from "../audit/service";
import { stageCredit } from "../ledger/service";
import { isBusinessType, listBusinessTypes } from "./definitions";
import type { CreateBusinessInput, WithdrawalReceipt } from "./types";

const unknownBusiness = (businessId: BusinessId): WorldError =>
  new WorldError("UNKNOWN_BUSINESS", `No business with id '${businessId}'.`);

const notOwner = (businessId: BusinessId): WorldError =>
  new WorldError("NOT_OWNER", `You do not own business '${businessId}'.`);

const canManage = (actor: Actor, business: BusinessRecord): boolean =>
  isAuthority(actor) || (business.ownerId !== null && business.ownerId === actor.id);

export interface BusinessService {
  create(actor: Actor, input: CreateBusinessInput): Promise<Result<BusinessRecord, WorldError>>;
  get(businessId: BusinessId): Promise<Result<BusinessRecord, WorldError>>;
  /** Sorted by name; `ownerId` narrows to one owner's businesses. */
  list(ownerId?: CitizenId): Promise<Result<BusinessRecord[], WorldError>>;
  transferOwnership(
    actor: Actor,
    businessId: BusinessId,
    newOwnerId: CitizenId,
  ): Promise<Result<BusinessRecord, WorldError>>;
  depositRevenue(actor: Actor, businessId: BusinessId, amount: number): Promise<Result<BusinessRecord, WorldError>>;
  withdrawRevenue(
    actor: Actor,
    businessId: BusinessId,
    amount: number,
    toCitizenId: CitizenId,
  ): Promise<Result<WithdrawalReceipt, WorldError>>;
}

export class BusinessServiceImpl implements BusinessService {
  constructor(private readonly ctx: WorldContext) {}

  private async requireBusiness(businessId: BusinessId): Promise<Result<BusinessRecord, WorldError>> {
    const res = await load(this.ctx, "businesses", businessId);
    if (res.isErr()) return ErrResult(res.error);
    const business = res.unwrap();
    if (!business) return ErrResult(unknownBusiness(businessId));
    return OkResult(business);
  }

  async create(actor: Actor, input: CreateBusinessInput): Promise<Result<BusinessRecord, WorldError>> {
    const name = validateLabel(input.name, "name");
    if (name.isErr()) return ErrResult(name.error);
    const type = input.type.trim().toLowerCase();
    if (!isBusinessType(type)) {
      return ErrResult(
        new WorldError(
          "INVALID_VALUE",
          `Unknown business type '${input.type}'. Choose one of: ${listBusinessTypes().join(", ")}.`,
          { field: "type" },
        ),
      );
    }

    const now = this.ctx.clock.now();
    const businessId = generateId("biz", now);

    return mutate(
      this.ctx,
      [lockKeys.citizen(input.founderId), lockKeys.business(businessId)],
      async (batch): Promise<Result<BusinessRecord, WorldError>> => {
        const founder = await requireActiveCitizen(this.ctx, input.founderId);
        if (founder.isErr()) return ErrResult(founder.error);

        const business: BusinessRecord = {
          _id: businessId,
          name: name.unwrap(),
          type,
          ownerId: input.founderId,
          revenue: 0,
          createdAt: now,
          updatedAt: now,
        };
        batch.put("businesses", business);
        stageAudit(this.ctx, batch, {
          operation: "business.create",
          actorId: actor.id,
          targetId: businessId,
          metadata: { ownerId: input.founderId, type },
        });
        return OkResult(business);
      },
    );
  }

  async get(businessId: BusinessId): Promise<Result<BusinessRecord, WorldError>> {
    return this.requireBusiness(businessId);
  }

  async list(ownerId?: CitizenId): Promise<Result<BusinessRecord[], WorldError>> {
    return query(this.ctx, "businesses", {
      where: ownerId === undefined ? {} : { ownerId },
      sort: { field: "name", direction: "asc" },
    });
  }

  async transferOwnership(
    actor: Actor,
    businessId: BusinessId,
    newOwnerId: CitizenId,
  ): Promise<Result<BusinessRecord, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.business(businessId), lockKeys.citizen(newOwnerId)],
      async (batch): Promise<Result<BusinessRecord, WorldError>> => {
        const current = await this.requireBusiness(businessId);
        if (current.isErr()) return current;
        const business = current.unwrap();

        const newOwner = await requireActiveCitizen(this.ctx, newOwnerId);
        if (newOwner.isErr()) return ErrResult(newOwner.error);

        if (!canManage(actor, business)) return ErrResult(notOwner(businessId));
        if (business.ownerId === newOwnerId) {
          return ErrResult(
            new WorldError("INVALID_VALUE", `'${newOwnerId}' already owns this business.`, {
              field: "newOwnerId",
            }),
          );
        }

        const next: BusinessRecord = {
          ...business,
          ownerId: newOwnerId,
          updatedAt: this.ctx.clock.now(),
        };
        batch.put("businesses", next);
        stageAudit(this.ctx, batch, {
          operation: "business.transferOwnership",
          actorId: actor.id,
          targetId: businessId,
          metadata: { from: business.ownerId, to: newOwnerId },
        });
        return OkResult(next);
      },
    );
  }

  async depositRevenue(
    actor: Actor,
    businessId: BusinessId,
    amount: number,
  ): Promise<Result<BusinessRecord, WorldError>> {
    const valid = validateAmount(amount);
    if (valid.isErr()) return ErrResult(valid.error);

    return mutate(
      this.ctx,
      [lockKeys.business(businessId)],
      async (batch): Promise<Result<BusinessRecord, WorldError>> => {
        const current = await this.requireBusiness(businessId);
        if (current.isErr()) return current;
        const business = current.unwrap();
        if (!canManage(actor, business)) return ErrResult(notOwner(businessId));

        const revenue = business.revenue + amount;
        if (!Number.isSafeInteger(revenue)) {
          return ErrResult(new WorldError("INVALID_AMOUNT", "That deposit would overflow the revenue."));
        }

        const next: BusinessRecord = { ...business, revenue, updatedAt: this.ctx.clock.now() };
        batch.put("businesses", next);
        stageAudit(this.ctx, batch, {
          operation: "business.depositRevenue",
          actorId: actor.id,
          targetId: businessId,
          amount,
        });
        return OkResult(next);
      },
    );
  }

  async withdrawRevenue(
    actor: Actor,
    businessId: BusinessId,
    amount: number,
    toCitizenId: CitizenId,
  ): Promise<Result<WithdrawalReceipt, WorldError>> {
    const valid = validateAmount(amount);
    if (valid.isErr()) return ErrResult(valid.error);

    return mutate(
      this.ctx,
      [lockKeys.business(businessId), lockKeys.citizen(toCitizenId)],
      async (batch): Promise<Result<WithdrawalReceipt, WorldError>> => {
        const current = await this.requireBusiness(businessId);
        if (current.isErr()) return ErrResult(current.error);
        const business = current.unwrap();

        const recipient = await requireCitizen(this.ctx, toCitizenId);
        if (recipient.isErr()) return ErrResult(recipient.error);

        if (!canManage(actor, business) || business.ownerId !== toCitizenId) {
          return ErrResult(notOwner(businessId));
        }
        if (amount > business.revenue) {
          return ErrResult(
            new WorldError(
              "INSUFFICIENT_REVENUE",
              `Revenue ${business.revenue} does not cover ${amount}.`,
              { balance: business.revenue, required: amount },
            ),
          );
        }

        const credited = await stageCredit(this.ctx, batch, toCitizenId, amount);
        if (credited.isErr()) return ErrResult(credited.error);

        const revenue = business.revenue - amount;
        batch.put("businesses", { ...business, revenue, updatedAt: this.ctx.clock.now() });
        stageAudit(this.ctx, batch, {
          operation: "business.withdrawRevenue",
          actorId: actor.id,
          targetId: businessId,
          amount,
          metadata: { toCitizenId },
        });

        return OkResult({
          businessId,
          toCitizenId,
          amount,
          revenue,
          balance: credited.unwrap().balanceAfter,
        });
      },
    );
  }
}
