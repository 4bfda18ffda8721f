import {
  ConfigSection,
  ConfigStore,
  StaticConfigProvider,
  type RawSection,
  type WorldConfig,
} from "@/configuration";
import {
  ManualClock,
  MemoryLockManager,
  MemoryWorldStore,
  createWorldEngine,
  type Actor,
  type WorldEngine,
} from "@/modules/world";

const readEnv = (key: string): string | undefined => {
  const raw = process.env[key];
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed.length ? trimmed : undefined;
};

export const getNamespace = (): string => readEnv("DB_TEST_NAMESPACE") ?? "ns";

/** Lower-cased substring a `suite test` name must contain to run; unset runs all. */
export const getFilter = (): string | undefined => readEnv("DB_TEST_FILTER")?.toLowerCase();

export const getTestTimeoutMs = (): number => {
  const parsed = Number(readEnv("DB_TEST_TIMEOUT_MS"));
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 5_000;
};

export type ConfigOverrides = Partial<Record<ConfigSection, RawSection>>;

/**
 * Resolved config for tests: in-memory backend and a short lock wait so
 * contention tests fail fast. `overrides` replace whole sections.
 */
export const testConfig = (overrides: ConfigOverrides = {}): WorldConfig =>
  new ConfigStore(
    new StaticConfigProvider({
      [ConfigSection.Storage]: { backend: "memory" },
      [ConfigSection.Locks]: { waitMs: 200 },
      ...overrides,
    }),
  ).resolve();

export type TestWorld = {
  engine: WorldEngine;
  store: MemoryWorldStore;
  locks: MemoryLockManager;
  clock: ManualClock;
  config: WorldConfig;
};

/** A fresh, isolated world; every test builds its own. */
export const createTestWorld = (overrides: ConfigOverrides = {}): TestWorld => {
  const config = testConfig(overrides);
  const store = new MemoryWorldStore();
  const locks = new MemoryLockManager();
  const clock = new ManualClock();
  const engine = createWorldEngine({ config, store, locks, clock });
  return { engine, store, locks, clock, config };
};

export const citizenActor = (id: string): Actor => ({ id, capability: "citizen" });

export const authorityActor = (id = "officer-1"): Actor => ({ id, capability: "authority" });
