import { z } from "zod";

/** Per-citizen earn state; only `earn` writes it. */
export const EmploymentRecordSchema = z.object({
  _id: z.string().min(1),
  lastEarnAt: z.coerce.date().nullable(),
  lastJob: z.string().nullable(),
  earnCount: z.number().int().nonnegative().catch(0),
  lifetimeEarnings: z.number().int().nonnegative().catch(0),
});

export type EmploymentRecord = z.infer<typeof EmploymentRecordSchema>;
