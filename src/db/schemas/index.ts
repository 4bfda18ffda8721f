/**
 * Schema registry for the world collections.
 * Purpose: lets both store implementations validate every read by collection name.
 */
import type { z } from "zod";
import { AuditEntrySchema, type AuditEntry } from "./audit";
import { BusinessSchema, type BusinessRecord } from "./business";
import { CitizenSchema, type CitizenRecord } from "./citizen";
import { EmploymentRecordSchema, type EmploymentRecord } from "./employment";
import { FineSchema, WantedRecordSchema, type FineRecord, type WantedRecord } from "./law";
import { LedgerEntrySchema, type LedgerEntry } from "./ledger";
import { PropertySchema, type PropertyRecord } from "./property";

export * from "./audit";
export * from "./business";
export * from "./citizen";
export * from "./employment";
export * from "./law";
export * from "./ledger";
export * from "./property";

/** Document type stored in each world collection. */
export interface WorldDocuments {
  citizens: CitizenRecord;
  ledger: LedgerEntry;
  employment: EmploymentRecord;
  businesses: BusinessRecord;
  properties: PropertyRecord;
  wanted: WantedRecord;
  fines: FineRecord;
  audit: AuditEntry;
}

export type CollectionName = keyof WorldDocuments;

export type WorldSchemaRegistry = {
  [K in CollectionName]: z.ZodType<WorldDocuments[K], z.ZodTypeDef, unknown>;
};

export const worldSchemas: WorldSchemaRegistry = {
  citizens: CitizenSchema,
  ledger: LedgerEntrySchema,
  employment: EmploymentRecordSchema,
  businesses: BusinessSchema,
  properties: PropertySchema,
  wanted: WantedRecordSchema,
  fines: FineSchema,
  audit: AuditEntrySchema,
};

/** Physical collection names in Mongo. */
export const COLLECTION_NAMES: Record<CollectionName, string> = {
  citizens: "world_citizens",
  ledger: "world_ledger",
  employment: "world_employment",
  businesses: "world_businesses",
  properties: "world_properties",
  wanted: "world_wanted",
  fines: "world_fines",
  audit: "world_audit",
};
