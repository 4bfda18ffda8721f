/**
 * Zod schema for world audit entries.
 * Every committed mutation writes one entry in the same batch as the change.
 */
import { z } from "zod";

export const AuditEntrySchema = z.object({
  _id: z.string().min(1),
  operation: z.string().min(1),
  actorId: z.string(),
  targetId: z.string(),
  timestamp: z.coerce.date(),
  amount: z.number().int().nullable(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;
