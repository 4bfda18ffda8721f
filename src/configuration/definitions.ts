/**
 * Config schemas for the world engine.
 *
 * Role in system:
 * - Each section is paired with a Zod schema that applies defaults and coercions,
 *   so providers can hand over raw strings (env) or partial objects (JSON).
 *
 * Gotchas:
 * - Cross-field rules (e.g. `minAge <= maxAge`) live in `superRefine`; a provider
 *   value that breaks them makes `ConfigStore.get` fail loudly at startup.
 */
import { z } from "zod";
import { ConfigSection } from "./constants";

export { z };

export const CitizensConfigSchema = z
  .object({
    minAge: z.coerce.number().int().min(0).default(1),
    maxAge: z.coerce.number().int().positive().default(120),
    maxNameLength: z.coerce.number().int().positive().default(32),
  })
  .superRefine((value, ctx) => {
    if (value.minAge > value.maxAge) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "minAge must not exceed maxAge",
        path: ["minAge"],
      });
    }
  });

/** A lease must outlast this many lock waits. */
export const LEASE_TO_WAIT_RATIO = 2;

export const LocksConfigSchema = z
  .object({
    /** Bounded wait before an operation gives up with BUSY. */
    waitMs: z.coerce.number().int().positive().default(2_000),
    /** Lease length for store-backed locks; a crashed holder frees the key after this. */
    leaseMs: z.coerce.number().int().positive().default(10_000),
    retryMs: z.coerce.number().int().positive().default(25),
  })
  .superRefine((value, ctx) => {
    if (value.leaseMs < value.waitMs * LEASE_TO_WAIT_RATIO) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `leaseMs must be at least ${LEASE_TO_WAIT_RATIO}x waitMs`,
        path: ["leaseMs"],
      });
    }
  });

export const RentalsConfigSchema = z.object({
  sweepIntervalMs: z.coerce.number().int().positive().default(60_000),
  maxPeriodDays: z.coerce.number().int().positive().default(30),
});

export const StorageConfigSchema = z.object({
  backend: z.enum(["memory", "mongo"]).default("memory"),
  mongoUri: z.string().min(1).optional(),
  dbName: z.string().min(1).default("civic_world"),
});

/** Discord permission names an authority can be recognised by. */
export const AuthorityPermissionSchema = z.enum([
  "Administrator",
  "ManageGuild",
  "ManageRoles",
  "ManageChannels",
  "ManageMessages",
  "ModerateMembers",
  "KickMembers",
  "BanMembers",
]);

export const IdentityConfigSchema = z.object({
  /** Holding any of these turns a guild member into an authority. */
  authorityPermissions: z
    .array(AuthorityPermissionSchema)
    .nonempty()
    .default(["ManageGuild"]),
});

export const configSchemas = {
  [ConfigSection.Citizens]: CitizensConfigSchema,
  [ConfigSection.Locks]: LocksConfigSchema,
  [ConfigSection.Rentals]: RentalsConfigSchema,
  [ConfigSection.Storage]: StorageConfigSchema,
  [ConfigSection.Identity]: IdentityConfigSchema,
} as const;

export type ConfigOf<K extends ConfigSection> = z.output<(typeof configSchemas)[K]>;

export type CitizensConfig = ConfigOf<ConfigSection.Citizens>;
export type LocksConfig = ConfigOf<ConfigSection.Locks>;
export type RentalsConfig = ConfigOf<ConfigSection.Rentals>;
export type StorageConfig = ConfigOf<ConfigSection.Storage>;
export type IdentityConfig = ConfigOf<ConfigSection.Identity>;
export type AuthorityPermission = z.infer<typeof AuthorityPermissionSchema>;

/** Fully resolved configuration handed to the engine. */
export interface WorldConfig {
  readonly citizens: CitizensConfig;
  readonly locks: LocksConfig;
  readonly rentals: RentalsConfig;
  readonly storage: StorageConfig;
  readonly identity: IdentityConfig;
}
