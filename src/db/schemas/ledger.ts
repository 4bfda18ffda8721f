/**
 * Zod schema for ledger entries (one per citizen, keyed by citizen id).
 * Invariant: `balance` is a non-negative safe integer; a stored document that
 * breaks it fails validation instead of being read back.
 */
import { z } from "zod";

export const LedgerEntrySchema = z.object({
  _id: z.string().min(1),
  balance: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  updatedAt: z.coerce.date(),
});

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;
