/**
 * World Reports.
 *
 * Purpose: read-only views for dashboards and profile cards. Nothing here
 * takes locks; figures are a best-effort snapshot.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { AuditEntry, CitizenRecord } from "@/db/schemas";
import type { CitizenId } from "@/db/types";
import { countOf, load, query, requireCitizen, type WorldContext } from "../context";
import { WorldError } from "../errors";
import { auditTrail } from "../audit/service";
import { getJobDefinition } from "../employment/definitions";
import type { LawService } from "../law/service";
import type { CitizenProfile, CitizenSearchInput, Page, WorldStats } from "./types";

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 50;

export interface ReportService {
  stats(): Promise<Result<WorldStats, WorldError>>;
  profile(citizenId: CitizenId): Promise<Result<CitizenProfile, WorldError>>;
  searchCitizens(input?: CitizenSearchInput): Promise<Result<Page<CitizenRecord>, WorldError>>;
  auditTrail(targetId: string, limit?: number): Promise<Result<AuditEntry[], WorldError>>;
}

export class ReportServiceImpl implements ReportService {
  constructor(
    private readonly ctx: WorldContext,
    private readonly law: LawService,
  ) {}

  async stats(): Promise<Result<WorldStats, WorldError>> {
    const counts = await Promise.all([
      countOf(this.ctx, "citizens", { where: { status: "active" } }),
      countOf(this.ctx, "citizens", { where: { status: "archived" } }),
      countOf(this.ctx, "businesses"),
      countOf(this.ctx, "businesses", { where: { ownerId: null } }),
      countOf(this.ctx, "properties", { where: { status: "vacant" } }),
      countOf(this.ctx, "properties", { where: { status: "owned" } }),
      countOf(this.ctx, "properties", { where: { status: "rented" } }),
      countOf(this.ctx, "properties", { where: { kind: "house" } }),
      countOf(this.ctx, "properties", { where: { kind: "vehicle" } }),
      countOf(this.ctx, "wanted", { where: { status: "active" } }),
    ]);
    const values: number[] = [];
    for (const res of counts) {
      if (res.isErr()) return ErrResult(res.error);
      values.push(res.unwrap());
    }
    const [active, archived, businesses, unowned, vacant, owned, rented, houses, vehicles, wanted] =
      values;

    const fines = await query(this.ctx, "fines", { where: { status: "issued" } });
    if (fines.isErr()) return ErrResult(fines.error);
    const ledger = await query(this.ctx, "ledger");
    if (ledger.isErr()) return ErrResult(ledger.error);

    return OkResult({
      citizens: { active, archived },
      businesses: { owned: businesses - unowned, unowned },
      properties: { vacant, owned, rented, houses, vehicles },
      activeWanted: wanted,
      unpaidFines: {
        count: fines.unwrap().length,
        total: fines.unwrap().reduce((sum, fine) => sum + fine.amount, 0),
      },
      moneyInCirculation: ledger.unwrap().reduce((sum, entry) => sum + entry.balance, 0),
    });
  }

  async profile(citizenId: CitizenId): Promise<Result<CitizenProfile, WorldError>> {
    const citizenRes = await requireCitizen(this.ctx, citizenId);
    if (citizenRes.isErr()) return ErrResult(citizenRes.error);
    const citizen = citizenRes.unwrap();

    const [ledger, employment, businesses, properties, fines, wanted] = await Promise.all([
      load(this.ctx, "ledger", citizenId),
      load(this.ctx, "employment", citizenId),
      query(this.ctx, "businesses", {
        where: { ownerId: citizenId },
        sort: { field: "name", direction: "asc" },
      }),
      query(this.ctx, "properties", {
        where: { occupantId: citizenId },
        sort: { field: "label", direction: "asc" },
      }),
      this.law.listFines(citizenId, true),
      this.law.activeWanted(citizenId),
    ]);

    if (ledger.isErr()) return ErrResult(ledger.error);
    if (employment.isErr()) return ErrResult(employment.error);
    if (businesses.isErr()) return ErrResult(businesses.error);
    if (properties.isErr()) return ErrResult(properties.error);
    if (fines.isErr()) return ErrResult(fines.error);
    if (wanted.isErr()) return ErrResult(wanted.error);

    return OkResult({
      citizen,
      balance: ledger.unwrap()?.balance ?? 0,
      job: getJobDefinition(citizen.job),
      employment: employment.unwrap(),
      businesses: businesses.unwrap(),
      properties: properties.unwrap(),
      unpaidFines: fines.unwrap(),
      activeWanted: wanted.unwrap(),
    });
  }

  async searchCitizens(
    input: CitizenSearchInput = {},
  ): Promise<Result<Page<CitizenRecord>, WorldError>> {
    const page = input.page ?? 1;
    const pageSize = input.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(page) || page < 1) {
      return ErrResult(new WorldError("INVALID_VALUE", "Page must be 1 or greater.", { field: "page" }));
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      return ErrResult(
        new WorldError("INVALID_VALUE", `Page size must be between 1 and ${MAX_PAGE_SIZE}.`, {
          field: "pageSize",
        }),
      );
    }

    const needle = input.query?.trim() ?? "";
    const text = needle ? { fields: ["displayName", "_id"] as const, value: needle } : undefined;

    const total = await countOf(this.ctx, "citizens", { text });
    if (total.isErr()) return ErrResult(total.error);

    const items = await query(this.ctx, "citizens", {
      text,
      sort: { field: "displayName", direction: "asc" },
      skip: (page - 1) * pageSize,
      limit: pageSize,
    });
    if (items.isErr()) return ErrResult(items.error);

    return OkResult({
      items: items.unwrap(),
      page,
      pageSize,
      total: total.unwrap(),
      totalPages: Math.max(1, Math.ceil(total.unwrap() / pageSize)),
    });
  }

  async auditTrail(targetId: string, limit?: number): Promise<Result<AuditEntry[], WorldError>> {
    return auditTrail(this.ctx, targetId, limit);
  }
}
