/**
 * Zod schema for persisted citizen documents.
 * Purpose: single source of truth for the citizen shape; `_id` is the external
 * (Discord) account id, so uniqueness is enforced by the primary key.
 */
import { z } from "zod";

export const CitizenStatusSchema = z.enum(["active", "archived"]);

export const CitizenSchema = z.object({
  _id: z.string().min(1),
  displayName: z.string(),
  age: z.number().int(),
  job: z.string(),
  wanted: z.boolean(),
  status: CitizenStatusSchema,
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  archivedAt: z.coerce.date().nullable(),
});

export type CitizenStatus = z.infer<typeof CitizenStatusSchema>;
export type CitizenRecord = z.infer<typeof CitizenSchema>;
