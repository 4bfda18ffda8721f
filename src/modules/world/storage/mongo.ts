/**
 * `WorldStore` over MongoDB.
 *
 * Each world collection gets its own `MongoStore` (zod-validated reads); a
 * batch commits inside one multi-document transaction with majority write
 * concern, so the engine sees success only once the whole batch is durable.
 * Transactions need a replica set (a single-node one is enough).
 */
import type { ClientSession, Filter, Sort } from "mongodb";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { getLogger } from "@/utils/logger";
import { getMongoClient } from "@/db/mongo";
import { MongoStore } from "@/db/mongo-store";
import {
  COLLECTION_NAMES,
  worldSchemas,
  type CollectionName,
  type WorldDocuments,
} from "@/db/schemas";
import {
  WORLD_COLLECTIONS,
  type CountQuery,
  type FindQuery,
  type WorldStore,
  type WriteBatch,
} from "./types";

const log = getLogger("store");

type Stores = { [K in CollectionName]: MongoStore<WorldDocuments[K]> };

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export function toMongoFilter<T extends { _id: string }>(query: FindQuery<T>): Filter<T> {
  const filter: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(query.where ?? {})) {
    if (value !== undefined) filter[field] = value;
  }
  if (query.text && query.text.value.length > 0) {
    const pattern = { $regex: escapeRegex(query.text.value), $options: "i" };
    filter.$or = query.text.fields.map((field) => ({ [field]: pattern }));
  }
  return filter as Filter<T>;
}

export class MongoWorldStore implements WorldStore {
  readonly backend = "mongo";

  private readonly stores: Stores = {
    citizens: new MongoStore(COLLECTION_NAMES.citizens, worldSchemas.citizens),
    ledger: new MongoStore(COLLECTION_NAMES.ledger, worldSchemas.ledger),
    employment: new MongoStore(COLLECTION_NAMES.employment, worldSchemas.employment),
    businesses: new MongoStore(COLLECTION_NAMES.businesses, worldSchemas.businesses),
    properties: new MongoStore(COLLECTION_NAMES.properties, worldSchemas.properties),
    wanted: new MongoStore(COLLECTION_NAMES.wanted, worldSchemas.wanted),
    fines: new MongoStore(COLLECTION_NAMES.fines, worldSchemas.fines),
    audit: new MongoStore(COLLECTION_NAMES.audit, worldSchemas.audit),
  };

  private store<K extends CollectionName>(name: K): MongoStore<WorldDocuments[K]> {
    return this.stores[name];
  }

  async get<K extends CollectionName>(
    collection: K,
    id: string,
  ): Promise<Result<WorldDocuments[K] | null>> {
    return this.store(collection).get(id);
  }

  async find<K extends CollectionName>(
    collection: K,
    query: FindQuery<WorldDocuments[K]> = {},
  ): Promise<Result<WorldDocuments[K][]>> {
    const sort: Sort | undefined = query.sort
      ? { [query.sort.field]: query.sort.direction === "desc" ? -1 : 1, _id: 1 }
      : undefined;
    return this.store(collection).find(toMongoFilter(query), {
      sort,
      skip: query.skip,
      limit: query.limit,
    });
  }

  async count<K extends CollectionName>(
    collection: K,
    query: CountQuery<WorldDocuments[K]> = {},
  ): Promise<Result<number>> {
    return this.store(collection).count(toMongoFilter(query));
  }

  async commit(batch: WriteBatch): Promise<Result<void>> {
    if (batch.isEmpty) return OkResult(undefined);

    let session: ClientSession | null = null;
    try {
      const client = await getMongoClient();
      session = client.startSession();
      const active = session;
      await active.withTransaction(
        async () => {
          for (const name of WORLD_COLLECTIONS) {
            const written = await this.commitCollection(name, batch, active);
            // Throwing aborts the transaction; the error is reported below.
            if (written.isErr()) throw written.error;
          }
        },
        { writeConcern: { w: "majority" } },
      );
      return OkResult(undefined);
    } catch (error) {
      log.error("[MongoWorldStore] commit failed", error);
      return ErrResult(error instanceof Error ? error : new Error(String(error)));
    } finally {
      await session?.endSession();
    }
  }

  private async commitCollection<K extends CollectionName>(
    name: K,
    batch: WriteBatch,
    session: ClientSession,
  ): Promise<Result<void>> {
    const store = this.store(name);
    for (const doc of batch.docsOf(name)) {
      const res = await store.replace(doc, session);
      if (res.isErr()) return res;
    }
    return OkResult(undefined);
  }
}
