/**
 * Property Registry.
 *
 * Purpose: houses and vehicles that citizens buy or rent.
 * Invariants:
 * - A property has at most one occupant; it is `vacant` exactly when it has none.
 * - The price (or `rentPrice * days`) is debited in the same commit that
 *   records the new occupant.
 * - A rental whose expiry has passed counts as vacant for purchase and rent
 *   even before the sweeper clears it.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { PropertyRecord } from "@/db/schemas";
import type { CitizenId, PropertyId } from "@/db/types";
import { lockKeys } from "../concurrency";
import { load, mutate, query, requireActiveCitizen, type WorldContext } from "../context";
import { WorldError } from "../errors";
import { generateId } from "../ids";
import { isAuthority, type Actor } from "../policy";
import { validateLabel, validatePeriodDays, validatePrice } from "../validation";
import { stageAudit } from "../audit/service";
import { stageDebit } from "../ledger/service";
import type { CreatePropertyInput, PropertyFilter } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Actor id recorded for writes made by background jobs. */
export const SYSTEM_ACTOR_ID = "system";

const unknownProperty = (propertyId: PropertyId): WorldError =>
  new WorldError("UNKNOWN_PROPERTY", `No property with id '${propertyId}'.`);

export const isOccupied = (property: PropertyRecord, now: Date): boolean => {
  if (property.status === "vacant") return false;
  if (property.status === "rented" && property.rentedUntil) {
    return property.rentedUntil.getTime() > now.getTime();
  }
  return true;
};

const vacated = (property: PropertyRecord, now: Date): PropertyRecord => ({
  ...property,
  status: "vacant",
  occupantId: null,
  rentedUntil: null,
  updatedAt: now,
});

export interface PropertyService {
  create(actor: Actor, input: CreatePropertyInput): Promise<Result<PropertyRecord, WorldError>>;
  get(propertyId: PropertyId): Promise<Result<PropertyRecord, WorldError>>;
  list(filter?: PropertyFilter): Promise<Result<PropertyRecord[], WorldError>>;
  /** Distinct house districts, sorted. */
  districts(): Promise<Result<string[], WorldError>>;
  purchase(actor: Actor, propertyId: PropertyId, citizenId: CitizenId): Promise<Result<PropertyRecord, WorldError>>;
  rent(
    actor: Actor,
    propertyId: PropertyId,
    citizenId: CitizenId,
    periodDays: number,
  ): Promise<Result<PropertyRecord, WorldError>>;
  /** Clears the occupant; a vacant property is returned unchanged. */
  vacate(actor: Actor, propertyId: PropertyId): Promise<Result<PropertyRecord, WorldError>>;
  /** Vacates every rental whose expiry is at or before `now`; returns their ids. */
  sweepExpired(now?: Date): Promise<Result<string[], WorldError>>;
}

export class PropertyServiceImpl implements PropertyService {
  constructor(private readonly ctx: WorldContext) {}

  private async requireProperty(propertyId: PropertyId): Promise<Result<PropertyRecord, WorldError>> {
    const res = await load(this.ctx, "properties", propertyId);
    if (res.isErr()) return ErrResult(res.error);
    const property = res.unwrap();
    if (!property) return ErrResult(unknownProperty(propertyId));
    return OkResult(property);
  }

  async create(actor: Actor, input: CreatePropertyInput): Promise<Result<PropertyRecord, WorldError>> {
    const label = validateLabel(input.label);
    if (label.isErr()) return ErrResult(label.error);
    const price = validatePrice(input.price, "price");
    if (price.isErr()) return ErrResult(price.error);
    const rentPrice = validatePrice(input.rentPrice, "rentPrice");
    if (rentPrice.isErr()) return ErrResult(rentPrice.error);

    let district: string | null = null;
    if (input.district !== undefined && input.district !== null) {
      if (input.kind !== "house") {
        return ErrResult(
          new WorldError("INVALID_VALUE", "Only houses belong to a district.", { field: "district" }),
        );
      }
      const checked = validateLabel(input.district, "district");
      if (checked.isErr()) return ErrResult(checked.error);
      district = checked.unwrap();
    }

    const now = this.ctx.clock.now();
    const propertyId = generateId(input.kind === "house" ? "house" : "veh", now);

    return mutate(
      this.ctx,
      [lockKeys.property(propertyId)],
      async (batch): Promise<Result<PropertyRecord, WorldError>> => {
        const property: PropertyRecord = {
          _id: propertyId,
          kind: input.kind,
          label: label.unwrap(),
          district,
          price: price.unwrap(),
          rentPrice: rentPrice.unwrap(),
          status: "vacant",
          occupantId: null,
          rentedUntil: null,
          createdAt: now,
          updatedAt: now,
        };
        batch.put("properties", property);
        stageAudit(this.ctx, batch, {
          operation: "property.create",
          actorId: actor.id,
          targetId: propertyId,
          amount: property.price,
        });
        return OkResult(property);
      },
    );
  }

  async get(propertyId: PropertyId): Promise<Result<PropertyRecord, WorldError>> {
    return this.requireProperty(propertyId);
  }

  async list(filter: PropertyFilter = {}): Promise<Result<PropertyRecord[], WorldError>> {
    const where: Partial<PropertyRecord> = {};
    if (filter.kind) where.kind = filter.kind;
    if (filter.district) where.district = filter.district;
    if (filter.status) where.status = filter.status;
    if (filter.occupantId) where.occupantId = filter.occupantId;
    return query(this.ctx, "properties", { where, sort: { field: "label", direction: "asc" } });
  }

  async districts(): Promise<Result<string[], WorldError>> {
    const houses = await query(this.ctx, "properties", { where: { kind: "house" } });
    if (houses.isErr()) return ErrResult(houses.error);
    const names = new Set<string>();
    for (const house of houses.unwrap()) {
      if (house.district) names.add(house.district);
    }
    return OkResult([...names].sort());
  }

  async purchase(
    actor: Actor,
    propertyId: PropertyId,
    citizenId: CitizenId,
  ): Promise<Result<PropertyRecord, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.property(propertyId), lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<PropertyRecord, WorldError>> => {
        const current = await this.requireProperty(propertyId);
        if (current.isErr()) return current;
        const property = current.unwrap();
        const now = this.ctx.clock.now();

        if (isOccupied(property, now)) {
          return ErrResult(new WorldError("ALREADY_OCCUPIED", `'${property.label}' is not available.`));
        }
        const buyer = await requireActiveCitizen(this.ctx, citizenId);
        if (buyer.isErr()) return ErrResult(buyer.error);

        if (property.price > 0) {
          const paid = await stageDebit(this.ctx, batch, citizenId, property.price);
          if (paid.isErr()) return ErrResult(paid.error);
        }

        const next: PropertyRecord = {
          ...property,
          status: "owned",
          occupantId: citizenId,
          rentedUntil: null,
          updatedAt: now,
        };
        batch.put("properties", next);
        stageAudit(this.ctx, batch, {
          operation: "property.purchase",
          actorId: actor.id,
          targetId: propertyId,
          amount: property.price,
          metadata: { citizenId },
        });
        return OkResult(next);
      },
    );
  }

  async rent(
    actor: Actor,
    propertyId: PropertyId,
    citizenId: CitizenId,
    periodDays: number,
  ): Promise<Result<PropertyRecord, WorldError>> {
    const days = validatePeriodDays(periodDays, this.ctx.config.rentals.maxPeriodDays);
    if (days.isErr()) return ErrResult(days.error);

    return mutate(
      this.ctx,
      [lockKeys.property(propertyId), lockKeys.citizen(citizenId)],
      async (batch): Promise<Result<PropertyRecord, WorldError>> => {
        const current = await this.requireProperty(propertyId);
        if (current.isErr()) return current;
        const property = current.unwrap();
        const now = this.ctx.clock.now();

        if (isOccupied(property, now)) {
          return ErrResult(new WorldError("ALREADY_OCCUPIED", `'${property.label}' is not available.`));
        }
        const renter = await requireActiveCitizen(this.ctx, citizenId);
        if (renter.isErr()) return ErrResult(renter.error);

        const cost = property.rentPrice * days.unwrap();
        if (cost > 0) {
          const paid = await stageDebit(this.ctx, batch, citizenId, cost);
          if (paid.isErr()) return ErrResult(paid.error);
        }

        const next: PropertyRecord = {
          ...property,
          status: "rented",
          occupantId: citizenId,
          rentedUntil: new Date(now.getTime() + days.unwrap() * DAY_MS),
          updatedAt: now,
        };
        batch.put("properties", next);
        stageAudit(this.ctx, batch, {
          operation: "property.rent",
          actorId: actor.id,
          targetId: propertyId,
          amount: cost,
          metadata: { citizenId, periodDays: days.unwrap() },
        });
        return OkResult(next);
      },
    );
  }

  async vacate(actor: Actor, propertyId: PropertyId): Promise<Result<PropertyRecord, WorldError>> {
    return mutate(
      this.ctx,
      [lockKeys.property(propertyId)],
      async (batch): Promise<Result<PropertyRecord, WorldError>> => {
        const current = await this.requireProperty(propertyId);
        if (current.isErr()) return current;
        const property = current.unwrap();
        if (property.status === "vacant") return OkResult(property);

        if (!isAuthority(actor) && property.occupantId !== actor.id) {
          return ErrResult(
            new WorldError("NOT_OWNER", `You do not occupy '${property.label}'.`),
          );
        }

        const next = vacated(property, this.ctx.clock.now());
        batch.put("properties", next);
        stageAudit(this.ctx, batch, {
          operation: "property.vacate",
          actorId: actor.id,
          targetId: propertyId,
          metadata: { previousOccupant: property.occupantId, previousStatus: property.status },
        });
        return OkResult(next);
      },
    );
  }

  async sweepExpired(now: Date = this.ctx.clock.now()): Promise<Result<string[], WorldError>> {
    const rented = await query(this.ctx, "properties", { where: { status: "rented" } });
    if (rented.isErr()) return ErrResult(rented.error);

    const due = rented
      .unwrap()
      .filter((p) => p.rentedUntil !== null && p.rentedUntil.getTime() <= now.getTime());

    const cleared: string[] = [];
    for (const candidate of due) {
      const res = await mutate(
        this.ctx,
        [lockKeys.property(candidate._id)],
        async (batch): Promise<Result<boolean, WorldError>> => {
          const current = await load(this.ctx, "properties", candidate._id);
          if (current.isErr()) return ErrResult(current.error);
          const property = current.unwrap();
          // Renewed, bought or vacated since the scan.
          if (
            !property ||
            property.status !== "rented" ||
            !property.rentedUntil ||
            property.rentedUntil.getTime() > now.getTime()
          ) {
            return OkResult(false);
          }

          batch.put("properties", vacated(property, now));
          stageAudit(this.ctx, batch, {
            operation: "property.rentalExpired",
            actorId: SYSTEM_ACTOR_ID,
            targetId: property._id,
            metadata: { previousOccupant: property.occupantId },
          });
          return OkResult(true);
        },
      );

      if (res.isErr()) {
        // The next sweep retries it.
        this.ctx.log.warn(`[PropertyService] rental sweep skipped ${candidate._id}: ${res.error.code}`);
        continue;
      }
      if (res.unwrap()) cleared.push(candidate._id);
    }

    return OkResult(cleared);
  }
}
