/**
 * In-process `WorldStore`.
 *
 * Used by tests and by `WORLD_STORAGE_BACKEND=memory`. Documents are cloned on
 * the way in and out so callers never share references with the store, and a
 * batch is validated completely before any of it is applied.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { worldSchemas, type CollectionName, type WorldDocuments } from "@/db/schemas";
import {
  WORLD_COLLECTIONS,
  type CountQuery,
  type FindQuery,
  type WorldStore,
  type WriteBatch,
} from "./types";

type Collections = { [K in CollectionName]: Map<string, WorldDocuments[K]> };

const fieldOf = (doc: object, field: string): unknown => Reflect.get(doc, field);

export const compareValues = (a: unknown, b: unknown): number => {
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (a === null || a === undefined) return b === null || b === undefined ? 0 : -1;
  if (b === null || b === undefined) return 1;
  return String(a).localeCompare(String(b));
};

export function matchesQuery<T extends { _id: string }>(doc: T, query: FindQuery<T>): boolean {
  if (query.where) {
    for (const [field, expected] of Object.entries(query.where)) {
      if (expected === undefined) continue;
      const actual = fieldOf(doc, field);
      if (actual instanceof Date && expected instanceof Date) {
        if (actual.getTime() !== expected.getTime()) return false;
      } else if (actual !== expected) {
        return false;
      }
    }
  }

  if (query.text && query.text.value.length > 0) {
    const needle = query.text.value.toLowerCase();
    const hit = query.text.fields.some((field) => {
      const value = fieldOf(doc, field);
      return typeof value === "string" && value.toLowerCase().includes(needle);
    });
    if (!hit) return false;
  }

  return true;
}

export class MemoryWorldStore implements WorldStore {
  readonly backend = "memory";

  private readonly data: Collections = {
    citizens: new Map(),
    ledger: new Map(),
    employment: new Map(),
    businesses: new Map(),
    properties: new Map(),
    wanted: new Map(),
    fines: new Map(),
    audit: new Map(),
  };

  /** Number of successful commits; tests use it to prove nothing was written. */
  commits = 0;

  private collection<K extends CollectionName>(name: K): Map<string, WorldDocuments[K]> {
    return this.data[name];
  }

  async get<K extends CollectionName>(
    collection: K,
    id: string,
  ): Promise<Result<WorldDocuments[K] | null>> {
    const doc = this.collection(collection).get(id);
    return OkResult(doc ? structuredClone(doc) : null);
  }

  async find<K extends CollectionName>(
    collection: K,
    query: FindQuery<WorldDocuments[K]> = {},
  ): Promise<Result<WorldDocuments[K][]>> {
    let docs = [...this.collection(collection).values()].filter((doc) =>
      matchesQuery(doc, query),
    );

    const sort = query.sort;
    if (sort) {
      const sign = sort.direction === "desc" ? -1 : 1;
      docs.sort(
        (a, b) =>
          sign * compareValues(fieldOf(a, sort.field), fieldOf(b, sort.field)) ||
          a._id.localeCompare(b._id),
      );
    }

    const skip = query.skip ?? 0;
    docs = docs.slice(skip, query.limit === undefined ? undefined : skip + query.limit);
    return OkResult(docs.map((doc) => structuredClone(doc)));
  }

  async count<K extends CollectionName>(
    collection: K,
    query: CountQuery<WorldDocuments[K]> = {},
  ): Promise<Result<number>> {
    let total = 0;
    for (const doc of this.collection(collection).values()) {
      if (matchesQuery(doc, query)) total += 1;
    }
    return OkResult(total);
  }

  async commit(batch: WriteBatch): Promise<Result<void>> {
    for (const name of WORLD_COLLECTIONS) {
      const invalid = this.validate(name, batch);
      if (invalid) return ErrResult(invalid);
    }
    for (const name of WORLD_COLLECTIONS) {
      this.apply(name, batch);
    }
    this.commits += 1;
    return OkResult(undefined);
  }

  private validate<K extends CollectionName>(name: K, batch: WriteBatch): Error | null {
    const schema = worldSchemas[name];
    for (const doc of batch.docsOf(name)) {
      const parsed = schema.safeParse(doc);
      if (!parsed.success) {
        return new Error(`Invalid document in '${name}': ${parsed.error.message}`);
      }
    }
    return null;
  }

  private apply<K extends CollectionName>(name: K, batch: WriteBatch): void {
    const target = this.collection(name);
    for (const doc of batch.docsOf(name)) {
      target.set(doc._id, structuredClone(doc));
    }
  }
}
