/**
 * Storage collaborator for the world engine.
 *
 * Purpose: the engine reads documents one at a time or through simple queries
 * and writes exclusively through `commit(batch)`, so every mutation is a single
 * all-or-nothing unit whatever the backend.
 */
import type { Result } from "@/utils/result";
import type { CollectionName, WorldDocuments } from "@/db/schemas";

export type SortDirection = "asc" | "desc";

export interface FindQuery<T> {
  /** Equality match on every listed field. */
  where?: Partial<T>;
  /** Case-insensitive substring match on any of `fields`. */
  text?: { fields: ReadonlyArray<keyof T & string>; value: string };
  sort?: { field: keyof T & string; direction: SortDirection };
  skip?: number;
  limit?: number;
}

export type CountQuery<T> = Pick<FindQuery<T>, "where" | "text">;

type StagedDocs = { [K in CollectionName]: Map<string, WorldDocuments[K]> };

/**
 * Writes staged by one mutation. A second put of the same document replaces
 * the first, and `peek` lets later steps of the same mutation read what an
 * earlier step staged.
 */
export class WriteBatch {
  private readonly docs: StagedDocs = {
    citizens: new Map(),
    ledger: new Map(),
    employment: new Map(),
    businesses: new Map(),
    properties: new Map(),
    wanted: new Map(),
    fines: new Map(),
    audit: new Map(),
  };
  private count = 0;

  put<K extends CollectionName>(collection: K, doc: WorldDocuments[K]): this {
    const docs: Map<string, WorldDocuments[K]> = this.docs[collection];
    if (!docs.has(doc._id)) this.count += 1;
    docs.set(doc._id, doc);
    return this;
  }

  peek<K extends CollectionName>(collection: K, id: string): WorldDocuments[K] | undefined {
    const docs: Map<string, WorldDocuments[K]> = this.docs[collection];
    return docs.get(id);
  }

  docsOf<K extends CollectionName>(collection: K): WorldDocuments[K][] {
    const docs: Map<string, WorldDocuments[K]> = this.docs[collection];
    return [...docs.values()];
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }
}

export interface WorldStore {
  readonly backend: "memory" | "mongo";

  /** `Ok(null)` when the document does not exist. */
  get<K extends CollectionName>(
    collection: K,
    id: string,
  ): Promise<Result<WorldDocuments[K] | null>>;

  find<K extends CollectionName>(
    collection: K,
    query?: FindQuery<WorldDocuments[K]>,
  ): Promise<Result<WorldDocuments[K][]>>;

  count<K extends CollectionName>(
    collection: K,
    query?: CountQuery<WorldDocuments[K]>,
  ): Promise<Result<number>>;

  /** Applies every staged write or none of them. */
  commit(batch: WriteBatch): Promise<Result<void>>;
}

/** The collections in the order stores write them. */
export const WORLD_COLLECTIONS: readonly CollectionName[] = [
  "citizens",
  "ledger",
  "employment",
  "businesses",
  "properties",
  "wanted",
  "fines",
  "audit",
];
