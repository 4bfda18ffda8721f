/**
 * World Database Indexes.
 *
 * Purpose: indexes behind every query the engine runs against Mongo.
 * All functions are idempotent; `createIndex` is a no-op for an index that already exists.
 */
import type { IndexDirection } from "mongodb";
import { getDb } from "@/db/mongo";
import { getLogger } from "@/utils/logger";
import { COLLECTION_NAMES, type CollectionName } from "@/db/schemas";
import { LOCKS_COLLECTION } from "../concurrency";
import { WORLD_COLLECTIONS } from "./types";

const log = getLogger("store");

type IndexSpec = {
  keys: Record<string, IndexDirection>;
  options: { name: string; expireAfterSeconds?: number };
};

export const WORLD_INDEXES: Partial<Record<CollectionName, IndexSpec[]>> = {
  citizens: [
    { keys: { status: 1 }, options: { name: "status_idx" } },
    { keys: { displayName: 1 }, options: { name: "displayName_idx" } },
  ],
  businesses: [{ keys: { ownerId: 1, name: 1 }, options: { name: "owner_name_idx" } }],
  properties: [
    { keys: { status: 1, rentedUntil: 1 }, options: { name: "status_rentedUntil_idx" } },
    { keys: { kind: 1, district: 1 }, options: { name: "kind_district_idx" } },
    { keys: { occupantId: 1 }, options: { name: "occupant_idx" } },
  ],
  wanted: [{ keys: { citizenId: 1, status: 1 }, options: { name: "citizen_status_idx" } }],
  fines: [
    { keys: { citizenId: 1, status: 1 }, options: { name: "citizen_status_idx" } },
    { keys: { status: 1 }, options: { name: "status_idx" } },
  ],
  audit: [{ keys: { targetId: 1, timestamp: -1 }, options: { name: "target_time_idx" } }],
};

export async function ensureWorldIndexes(): Promise<void> {
  const db = await getDb();

  for (const name of WORLD_COLLECTIONS) {
    const col = db.collection(COLLECTION_NAMES[name]);
    for (const idx of WORLD_INDEXES[name] ?? []) {
      await col.createIndex(idx.keys, idx.options);
    }
  }

  // Lease documents are also dropped by Mongo once long expired.
  await db
    .collection(LOCKS_COLLECTION)
    .createIndex({ expiresAt: 1 }, { name: "expiresAt_ttl_idx", expireAfterSeconds: 3600 });

  log.info("[WorldDB] indexes ensured");
}
