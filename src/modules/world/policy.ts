/**
 * World Permission Policy.
 *
 * Purpose: single source of truth for "who can do what" in the world engine.
 * The facade calls `authorize` exactly once per operation; services never
 * repeat capability checks (ownership rules such as "only the owner withdraws"
 * are domain rules and stay in the services).
 *
 * Levels:
 * - `authority`: law enforcement and administrative operations.
 * - `self`: a citizen acting on their own record (authorities may act for anyone).
 * - `citizen`: any identified actor (reads, owner-checked business actions).
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { WorldError } from "./errors";

/** Capability flag supplied by the identity collaborator. */
export type Capability = "citizen" | "authority";

/** Authenticated caller of an engine operation. */
export interface Actor {
  readonly id: string;
  readonly capability: Capability;
}

export type PermissionLevel = "authority" | "self" | "citizen";

export const WORLD_OPERATIONS = [
  "citizens.register",
  "citizens.lookup",
  "citizens.rename",
  "citizens.setAge",
  "citizens.archive",
  "ledger.balance",
  "ledger.credit",
  "ledger.debit",
  "ledger.transfer",
  "employment.listJobs",
  "employment.assignJob",
  "employment.earn",
  "business.create",
  "business.get",
  "business.list",
  "business.transferOwnership",
  "business.depositRevenue",
  "business.withdrawRevenue",
  "property.create",
  "property.get",
  "property.list",
  "property.purchase",
  "property.rent",
  "property.vacate",
  "law.issueWanted",
  "law.clearWanted",
  "law.issueFine",
  "law.payFine",
  "law.waiveFine",
  "law.listFines",
  "law.wantedHistory",
  "law.listWanted",
  "law.listAllFines",
  "reports.stats",
  "reports.profile",
  "reports.searchCitizens",
  "reports.auditTrail",
] as const;

export type WorldOperation = (typeof WORLD_OPERATIONS)[number];

export const OPERATION_POLICY: Record<WorldOperation, PermissionLevel> = {
  "citizens.register": "self",
  "citizens.lookup": "citizen",
  "citizens.rename": "self",
  "citizens.setAge": "self",
  "citizens.archive": "authority",
  "ledger.balance": "citizen",
  "ledger.credit": "authority",
  "ledger.debit": "authority",
  "ledger.transfer": "self",
  "employment.listJobs": "citizen",
  "employment.assignJob": "self",
  "employment.earn": "self",
  "business.create": "self",
  "business.get": "citizen",
  "business.list": "citizen",
  "business.transferOwnership": "citizen",
  "business.depositRevenue": "citizen",
  "business.withdrawRevenue": "citizen",
  "property.create": "authority",
  "property.get": "citizen",
  "property.list": "citizen",
  "property.purchase": "self",
  "property.rent": "self",
  "property.vacate": "citizen",
  "law.issueWanted": "authority",
  "law.clearWanted": "authority",
  "law.issueFine": "authority",
  "law.payFine": "self",
  "law.waiveFine": "authority",
  "law.listFines": "citizen",
  "law.wantedHistory": "citizen",
  "law.listWanted": "authority",
  "law.listAllFines": "authority",
  "reports.stats": "citizen",
  "reports.profile": "citizen",
  "reports.searchCitizens": "citizen",
  "reports.auditTrail": "authority",
};

export const isAuthority = (actor: Actor): boolean => actor.capability === "authority";

/**
 * Checks the actor against the operation's level.
 *
 * @param subjectId Citizen the operation acts on; required for `self` operations.
 */
export function authorize(
  actor: Actor,
  operation: WorldOperation,
  subjectId?: string,
): Result<void, WorldError> {
  const level = OPERATION_POLICY[operation];
  if (isAuthority(actor)) return OkResult(undefined);

  switch (level) {
    case "authority":
      return ErrResult(
        new WorldError("UNAUTHORIZED", `Operation '${operation}' requires an authority.`),
      );
    case "self":
      if (subjectId !== undefined && subjectId === actor.id) return OkResult(undefined);
      return ErrResult(
        new WorldError(
          "UNAUTHORIZED",
          `Operation '${operation}' can only be performed on your own citizen.`,
        ),
      );
    case "citizen":
      return OkResult(undefined);
  }
}
