import { z } from "zod";

export const BusinessSchema = z.object({
  _id: z.string().min(1),
  name: z.string().min(1),
  type: z.string().min(1),
  ownerId: z.string().nullable(),
  revenue: z.number().int().nonnegative(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type BusinessRecord = z.infer<typeof BusinessSchema>;
