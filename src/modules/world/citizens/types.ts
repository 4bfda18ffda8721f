import type { CitizenId } from "@/db/types";

export interface RegisterCitizenInput {
  /** External account id; becomes the citizen id. */
  readonly citizenId: CitizenId;
  readonly displayName: string;
  readonly age: number;
}

/** What `archive` released along with the citizen. */
export interface ArchiveReceipt {
  readonly citizenId: CitizenId;
  readonly releasedBusinesses: string[];
  readonly releasedProperties: string[];
}
