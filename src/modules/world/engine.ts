/**
 * World Engine facade.
 *
 * Purpose: the single entrypoint adapters call. Every operation:
 * 1. authorizes the actor once against `OPERATION_POLICY`,
 * 2. dispatches to one module service,
 * 3. logs the outcome, and
 * 4. converts anything thrown below into `STORAGE_FAILURE`, so callers only
 *    ever see `Result` values.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type {
  AuditEntry,
  BusinessRecord,
  CitizenRecord,
  FineRecord,
  PropertyRecord,
  WantedRecord,
} from "@/db/schemas";
import type { BusinessId, CitizenId, FineId, PropertyId } from "@/db/types";
import type { WorldContext } from "./context";
import { isWorldError, storageFailure, type WorldError } from "./errors";
import { authorize, type Actor, type WorldOperation } from "./policy";
import { CitizenServiceImpl, type ArchiveReceipt, type RegisterCitizenInput } from "./citizens";
import { LedgerServiceImpl, type LedgerMovement, type TransferReceipt } from "./ledger";
import { EmploymentServiceImpl, type EarnReceipt, type JobDefinition } from "./employment";
import { BusinessServiceImpl, type CreateBusinessInput, type WithdrawalReceipt } from "./business";
import {
  PropertyServiceImpl,
  type CreatePropertyInput,
  type PropertyFilter,
  type RentalSweepTarget,
} from "./property";
import { LawServiceImpl, type FineListFilter, type WantedListFilter } from "./law";
import {
  ReportServiceImpl,
  type CitizenProfile,
  type CitizenSearchInput,
  type Page,
  type WorldStats,
} from "./reports";

export class WorldEngine implements RentalSweepTarget {
  readonly citizens: CitizenServiceImpl;
  readonly ledger: LedgerServiceImpl;
  readonly employment: EmploymentServiceImpl;
  readonly business: BusinessServiceImpl;
  readonly property: PropertyServiceImpl;
  readonly law: LawServiceImpl;
  readonly reports: ReportServiceImpl;

  constructor(readonly ctx: WorldContext) {
    this.citizens = new CitizenServiceImpl(ctx);
    this.ledger = new LedgerServiceImpl(ctx);
    this.employment = new EmploymentServiceImpl(ctx);
    this.business = new BusinessServiceImpl(ctx);
    this.property = new PropertyServiceImpl(ctx);
    this.law = new LawServiceImpl(ctx);
    this.reports = new ReportServiceImpl(ctx, this.law);
  }

  private async run<T>(
    actor: Actor,
    operation: WorldOperation,
    subjectId: string | undefined,
    fn: () => Promise<Result<T, WorldError>>,
  ): Promise<Result<T, WorldError>> {
    const allowed = authorize(actor, operation, subjectId);
    if (allowed.isErr()) {
      this.ctx.log.warn(`[world] ${operation} denied for ${actor.id}: ${allowed.error.message}`);
      return ErrResult(allowed.error);
    }

    try {
      const res = await fn();
      if (res.isErr()) {
        const { code, message } = res.error;
        if (code === "STORAGE_FAILURE") {
          this.ctx.log.error(`[world] ${operation} by ${actor.id} failed: ${message}`);
        } else {
          this.ctx.log.warn(`[world] ${operation} by ${actor.id} rejected: ${code}`);
        }
      } else {
        this.ctx.log.debug(`[world] ${operation} by ${actor.id} ok`);
      }
      return res;
    } catch (error) {
      this.ctx.log.error(`[world] ${operation} by ${actor.id} threw`, error);
      return ErrResult(isWorldError(error) ? error : storageFailure(error));
    }
  }

  // Citizens

  register(actor: Actor, input: RegisterCitizenInput): Promise<Result<CitizenRecord, WorldError>> {
    return this.run(actor, "citizens.register", input.citizenId, () =>
      this.citizens.register(actor, input),
    );
  }

  lookup(actor: Actor, citizenId: CitizenId): Promise<Result<CitizenRecord, WorldError>> {
    return this.run(actor, "citizens.lookup", citizenId, () => this.citizens.lookup(citizenId));
  }

  rename(actor: Actor, citizenId: CitizenId, displayName: string): Promise<Result<CitizenRecord, WorldError>> {
    return this.run(actor, "citizens.rename", citizenId, () =>
      this.citizens.rename(actor, citizenId, displayName),
    );
  }

  setAge(actor: Actor, citizenId: CitizenId, age: number): Promise<Result<CitizenRecord, WorldError>> {
    return this.run(actor, "citizens.setAge", citizenId, () =>
      this.citizens.setAge(actor, citizenId, age),
    );
  }

  archive(actor: Actor, citizenId: CitizenId): Promise<Result<ArchiveReceipt, WorldError>> {
    return this.run(actor, "citizens.archive", citizenId, () =>
      this.citizens.archive(actor, citizenId),
    );
  }

  // Ledger

  balance(actor: Actor, citizenId: CitizenId): Promise<Result<number, WorldError>> {
    return this.run(actor, "ledger.balance", citizenId, () => this.ledger.balance(citizenId));
  }

  credit(actor: Actor, citizenId: CitizenId, amount: number): Promise<Result<LedgerMovement, WorldError>> {
    return this.run(actor, "ledger.credit", citizenId, () =>
      this.ledger.credit(actor, citizenId, amount),
    );
  }

  debit(actor: Actor, citizenId: CitizenId, amount: number): Promise<Result<LedgerMovement, WorldError>> {
    return this.run(actor, "ledger.debit", citizenId, () =>
      this.ledger.debit(actor, citizenId, amount),
    );
  }

  transfer(
    actor: Actor,
    fromId: CitizenId,
    toId: CitizenId,
    amount: number,
  ): Promise<Result<TransferReceipt, WorldError>> {
    return this.run(actor, "ledger.transfer", fromId, () =>
      this.ledger.transfer(actor, fromId, toId, amount),
    );
  }

  // Employment

  listJobs(actor: Actor): Promise<Result<JobDefinition[], WorldError>> {
    return this.run(
      actor,
      "employment.listJobs",
      undefined,
      async (): Promise<Result<JobDefinition[], WorldError>> => OkResult(this.employment.listJobs()),
    );
  }

  assignJob(actor: Actor, citizenId: CitizenId, jobKind: string): Promise<Result<CitizenRecord, WorldError>> {
    return this.run(actor, "employment.assignJob", citizenId, () =>
      this.employment.assignJob(actor, citizenId, jobKind),
    );
  }

  earn(actor: Actor, citizenId: CitizenId): Promise<Result<EarnReceipt, WorldError>> {
    return this.run(actor, "employment.earn", citizenId, () => this.employment.earn(actor, citizenId));
  }

  // Businesses

  createBusiness(actor: Actor, input: CreateBusinessInput): Promise<Result<BusinessRecord, WorldError>> {
    return this.run(actor, "business.create", input.founderId, () =>
      this.business.create(actor, input),
    );
  }

  getBusiness(actor: Actor, businessId: BusinessId): Promise<Result<BusinessRecord, WorldError>> {
    return this.run(actor, "business.get", undefined, () => this.business.get(businessId));
  }

  listBusinesses(actor: Actor, ownerId?: CitizenId): Promise<Result<BusinessRecord[], WorldError>> {
    return this.run(actor, "business.list", undefined, () => this.business.list(ownerId));
  }

  transferBusiness(
    actor: Actor,
    businessId: BusinessId,
    newOwnerId: CitizenId,
  ): Promise<Result<BusinessRecord, WorldError>> {
    return this.run(actor, "business.transferOwnership", undefined, () =>
      this.business.transferOwnership(actor, businessId, newOwnerId),
    );
  }

  depositRevenue(
    actor: Actor,
    businessId: BusinessId,
    amount: number,
  ): Promise<Result<BusinessRecord, WorldError>> {
    return this.run(actor, "business.depositRevenue", undefined, () =>
      this.business.depositRevenue(actor, businessId, amount),
    );
  }

  withdrawRevenue(
    actor: Actor,
    businessId: BusinessId,
    amount: number,
    toCitizenId: CitizenId,
  ): Promise<Result<WithdrawalReceipt, WorldError>> {
    return this.run(actor, "business.withdrawRevenue", undefined, () =>
      this.business.withdrawRevenue(actor, businessId, amount, toCitizenId),
    );
  }

  // Properties

  createProperty(actor: Actor, input: CreatePropertyInput): Promise<Result<PropertyRecord, WorldError>> {
    return this.run(actor, "property.create", undefined, () => this.property.create(actor, input));
  }

  getProperty(actor: Actor, propertyId: PropertyId): Promise<Result<PropertyRecord, WorldError>> {
    return this.run(actor, "property.get", undefined, () => this.property.get(propertyId));
  }

  listProperties(actor: Actor, filter?: PropertyFilter): Promise<Result<PropertyRecord[], WorldError>> {
    return this.run(actor, "property.list", undefined, () => this.property.list(filter));
  }

  districts(actor: Actor): Promise<Result<string[], WorldError>> {
    return this.run(actor, "property.list", undefined, () => this.property.districts());
  }

  purchase(actor: Actor, propertyId: PropertyId, citizenId: CitizenId): Promise<Result<PropertyRecord, WorldError>> {
    return this.run(actor, "property.purchase", citizenId, () =>
      this.property.purchase(actor, propertyId, citizenId),
    );
  }

  rent(
    actor: Actor,
    propertyId: PropertyId,
    citizenId: CitizenId,
    periodDays: number,
  ): Promise<Result<PropertyRecord, WorldError>> {
    return this.run(actor, "property.rent", citizenId, () =>
      this.property.rent(actor, propertyId, citizenId, periodDays),
    );
  }

  vacate(actor: Actor, propertyId: PropertyId): Promise<Result<PropertyRecord, WorldError>> {
    return this.run(actor, "property.vacate", undefined, () => this.property.vacate(actor, propertyId));
  }

  /** Background entrypoint for `RentalSweeper`; runs as the system. */
  async sweepExpiredRentals(): Promise<Result<string[], WorldError>> {
    try {
      return await this.property.sweepExpired();
    } catch (error) {
      this.ctx.log.error("[world] rental sweep threw", error);
      return ErrResult(storageFailure(error));
    }
  }

  // Law enforcement

  issueWanted(actor: Actor, citizenId: CitizenId, reason: string): Promise<Result<WantedRecord, WorldError>> {
    return this.run(actor, "law.issueWanted", citizenId, () =>
      this.law.issueWanted(actor, citizenId, reason),
    );
  }

  clearWanted(actor: Actor, citizenId: CitizenId): Promise<Result<WantedRecord, WorldError>> {
    return this.run(actor, "law.clearWanted", citizenId, () => this.law.clearWanted(actor, citizenId));
  }

  issueFine(
    actor: Actor,
    citizenId: CitizenId,
    amount: number,
    reason: string,
  ): Promise<Result<FineRecord, WorldError>> {
    return this.run(actor, "law.issueFine", citizenId, () =>
      this.law.issueFine(actor, citizenId, amount, reason),
    );
  }

  payFine(actor: Actor, fineId: FineId, citizenId: CitizenId): Promise<Result<FineRecord, WorldError>> {
    return this.run(actor, "law.payFine", citizenId, () => this.law.payFine(actor, fineId, citizenId));
  }

  waiveFine(actor: Actor, fineId: FineId): Promise<Result<FineRecord, WorldError>> {
    return this.run(actor, "law.waiveFine", undefined, () => this.law.waiveFine(actor, fineId));
  }

  listFines(actor: Actor, citizenId: CitizenId, unpaidOnly = false): Promise<Result<FineRecord[], WorldError>> {
    return this.run(actor, "law.listFines", citizenId, () => this.law.listFines(citizenId, unpaidOnly));
  }

  wantedHistory(actor: Actor, citizenId: CitizenId): Promise<Result<WantedRecord[], WorldError>> {
    return this.run(actor, "law.wantedHistory", citizenId, () => this.law.wantedHistory(citizenId));
  }

  listWanted(actor: Actor, filter?: WantedListFilter): Promise<Result<WantedRecord[], WorldError>> {
    return this.run(actor, "law.listWanted", undefined, () => this.law.listWanted(filter));
  }

  listAllFines(actor: Actor, filter?: FineListFilter): Promise<Result<FineRecord[], WorldError>> {
    return this.run(actor, "law.listAllFines", undefined, () => this.law.listAllFines(filter));
  }

  // Reports

  stats(actor: Actor): Promise<Result<WorldStats, WorldError>> {
    return this.run(actor, "reports.stats", undefined, () => this.reports.stats());
  }

  profile(actor: Actor, citizenId: CitizenId): Promise<Result<CitizenProfile, WorldError>> {
    return this.run(actor, "reports.profile", citizenId, () => this.reports.profile(citizenId));
  }

  searchCitizens(actor: Actor, input?: CitizenSearchInput): Promise<Result<Page<CitizenRecord>, WorldError>> {
    return this.run(actor, "reports.searchCitizens", undefined, () =>
      this.reports.searchCitizens(input),
    );
  }

  auditTrail(actor: Actor, targetId: string, limit?: number): Promise<Result<AuditEntry[], WorldError>> {
    return this.run(actor, "reports.auditTrail", undefined, () =>
      this.reports.auditTrail(targetId, limit),
    );
  }
}
