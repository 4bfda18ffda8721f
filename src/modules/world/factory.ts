import type { Logger } from "seyfert/lib/common";
import { getLogger } from "@/utils/logger";
import { configureMongo } from "@/db/mongo";
import type { WorldConfig } from "@/configuration";
import { systemClock, type Clock } from "./clock";
import { MemoryLockManager, MongoLockManager, type LockManager } from "./concurrency";
import { MemoryWorldStore, MongoWorldStore, type WorldStore } from "./storage";
import { WorldEngine } from "./engine";

export interface WorldEngineOptions {
  readonly config: WorldConfig;
  /** Overrides the backend picked from `config.storage`. */
  readonly store?: WorldStore;
  readonly locks?: LockManager;
  readonly clock?: Clock;
  readonly log?: Logger;
}

/**
 * Builds an engine for the configured backend: `mongo` pairs the Mongo store
 * with lease-document locks, `memory` keeps both in process.
 */
export function createWorldEngine(options: WorldEngineOptions): WorldEngine {
  const { config } = options;
  const mongo = config.storage.backend === "mongo";
  if (mongo) {
    configureMongo({ uri: config.storage.mongoUri, dbName: config.storage.dbName });
  }

  return new WorldEngine({
    config,
    store: options.store ?? (mongo ? new MongoWorldStore() : new MemoryWorldStore()),
    locks: options.locks ?? (mongo ? new MongoLockManager(config.locks) : new MemoryLockManager()),
    clock: options.clock ?? systemClock,
    log: options.log ?? getLogger("world"),
  });
}
