import type {
  BusinessRecord,
  CitizenRecord,
  EmploymentRecord,
  FineRecord,
  PropertyRecord,
  WantedRecord,
} from "@/db/schemas";
import type { JobDefinition } from "../employment/definitions";

/** World-wide dashboard figures. */
export interface WorldStats {
  readonly citizens: { readonly active: number; readonly archived: number };
  readonly businesses: { readonly owned: number; readonly unowned: number };
  readonly properties: {
    readonly vacant: number;
    readonly owned: number;
    readonly rented: number;
    readonly houses: number;
    readonly vehicles: number;
  };
  readonly activeWanted: number;
  readonly unpaidFines: { readonly count: number; readonly total: number };
  /** Sum of every ledger balance. */
  readonly moneyInCirculation: number;
}

export interface CitizenProfile {
  readonly citizen: CitizenRecord;
  readonly balance: number;
  /** `null` when the stored job is no longer in the catalog. */
  readonly job: JobDefinition | null;
  readonly employment: EmploymentRecord | null;
  readonly businesses: BusinessRecord[];
  readonly properties: PropertyRecord[];
  readonly unpaidFines: FineRecord[];
  readonly activeWanted: WantedRecord | null;
}

export interface CitizenSearchInput {
  readonly query?: string;
  /** 1-based. */
  readonly page?: number;
  readonly pageSize?: number;
}

export interface Page<T> {
  readonly items: T[];
  readonly page: number;
  readonly pageSize: number;
  readonly total: number;
  readonly totalPages: number;
}
