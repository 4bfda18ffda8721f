/**
 * Zod schema for dwellings and vehicles.
 * Invariants (checked by `superRefine` so a hand-edited document cannot load):
 * - `vacant` <=> `occupantId === null`.
 * - `rentedUntil` is set exactly when the status is `rented`.
 */
import { z } from "zod";

export const PropertyKindSchema = z.enum(["house", "vehicle"]);
export const PropertyStatusSchema = z.enum(["vacant", "owned", "rented"]);

export const PropertySchema = z
  .object({
    _id: z.string().min(1),
    kind: PropertyKindSchema,
    label: z.string().min(1),
    district: z.string().nullable(),
    price: z.number().int().nonnegative(),
    rentPrice: z.number().int().nonnegative(),
    status: PropertyStatusSchema,
    occupantId: z.string().nullable(),
    rentedUntil: z.coerce.date().nullable(),
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date(),
  })
  .superRefine((value, ctx) => {
    if ((value.status === "vacant") !== (value.occupantId === null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "occupantId must be null exactly when the property is vacant",
        path: ["occupantId"],
      });
    }
    if ((value.status === "rented") !== (value.rentedUntil !== null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rentedUntil must be set exactly when the property is rented",
        path: ["rentedUntil"],
      });
    }
  });

export type PropertyKind = z.infer<typeof PropertyKindSchema>;
export type PropertyStatus = z.infer<typeof PropertyStatusSchema>;
export type PropertyRecord = z.infer<typeof PropertySchema>;
