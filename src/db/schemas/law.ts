/**
 * Zod schemas for law-enforcement records.
 * Purpose: wanted records (`active -> cleared`) and fines (`issued -> paid | waived`).
 */
import { z } from "zod";

export const WantedStatusSchema = z.enum(["active", "cleared"]);

export const WantedRecordSchema = z.object({
  _id: z.string().min(1),
  citizenId: z.string().min(1),
  reason: z.string(),
  issuedBy: z.string(),
  issuedAt: z.coerce.date(),
  status: WantedStatusSchema,
  clearedBy: z.string().nullable(),
  clearedAt: z.coerce.date().nullable(),
});

export const FineStatusSchema = z.enum(["issued", "paid", "waived"]);

export const FineSchema = z.object({
  _id: z.string().min(1),
  citizenId: z.string().min(1),
  amount: z.number().int().positive(),
  reason: z.string(),
  issuedBy: z.string(),
  issuedAt: z.coerce.date(),
  status: FineStatusSchema,
  resolvedBy: z.string().nullable(),
  resolvedAt: z.coerce.date().nullable(),
});

export type WantedStatus = z.infer<typeof WantedStatusSchema>;
export type WantedRecord = z.infer<typeof WantedRecordSchema>;
export type FineStatus = z.infer<typeof FineStatusSchema>;
export type FineRecord = z.infer<typeof FineSchema>;
