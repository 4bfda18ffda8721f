/**
 * Configuration providers.
 * Purpose: hand raw, unvalidated section values to `ConfigStore` without exposing
 * where they come from (process env, a JSON file, or a fixed object in tests).
 */
import { readFileSync } from "node:fs";
import { ConfigSection } from "./constants";

export type RawSection = Record<string, unknown>;

export interface ConfigProvider {
  getSection(section: ConfigSection): RawSection;
}

type EnvMapping = {
  section: ConfigSection;
  key: string;
  list?: boolean;
};

/**
 * Mapping of environment variables to section keys.
 */
const ENV_PATHS: Record<string, EnvMapping> = {
  WORLD_MIN_AGE: { section: ConfigSection.Citizens, key: "minAge" },
  WORLD_MAX_AGE: { section: ConfigSection.Citizens, key: "maxAge" },
  WORLD_MAX_NAME_LENGTH: { section: ConfigSection.Citizens, key: "maxNameLength" },
  WORLD_LOCK_WAIT_MS: { section: ConfigSection.Locks, key: "waitMs" },
  WORLD_LOCK_LEASE_MS: { section: ConfigSection.Locks, key: "leaseMs" },
  WORLD_LOCK_RETRY_MS: { section: ConfigSection.Locks, key: "retryMs" },
  WORLD_RENTAL_SWEEP_MS: { section: ConfigSection.Rentals, key: "sweepIntervalMs" },
  WORLD_RENTAL_MAX_DAYS: { section: ConfigSection.Rentals, key: "maxPeriodDays" },
  WORLD_STORAGE_BACKEND: { section: ConfigSection.Storage, key: "backend" },
  MONGO_URI: { section: ConfigSection.Storage, key: "mongoUri" },
  DB_NAME: { section: ConfigSection.Storage, key: "dbName" },
  WORLD_AUTHORITY_PERMISSIONS: {
    section: ConfigSection.Identity,
    key: "authorityPermissions",
    list: true,
  },
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === "object" && !Array.isArray(value);

/**
 * Reads `WORLD_*` variables (and an optional `WORLD_CONFIG_FILE` JSON document
 * keyed by section). Env values win over the file.
 */
export class EnvConfigProvider implements ConfigProvider {
  private readonly file: Record<string, unknown>;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.file = this.readFile(env.WORLD_CONFIG_FILE);
  }

  private readFile(path: string | undefined): Record<string, unknown> {
    if (!path) return {};
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
    if (!isRecord(parsed)) {
      throw new Error(`WORLD_CONFIG_FILE '${path}' must contain a JSON object.`);
    }
    return parsed;
  }

  getSection(section: ConfigSection): RawSection {
    const fromFile = this.file[section];
    const raw: RawSection = isRecord(fromFile) ? { ...fromFile } : {};

    for (const [variable, mapping] of Object.entries(ENV_PATHS)) {
      if (mapping.section !== section) continue;
      const value = this.env[variable]?.trim();
      if (!value) continue;
      raw[mapping.key] = mapping.list
        ? value.split(",").map((entry) => entry.trim()).filter(Boolean)
        : value;
    }

    return raw;
  }
}

/** Fixed values, used by tests and embedding callers. */
export class StaticConfigProvider implements ConfigProvider {
  constructor(private readonly values: Partial<Record<ConfigSection, RawSection>> = {}) {}

  getSection(section: ConfigSection): RawSection {
    return { ...(this.values[section] ?? {}) };
  }
}
