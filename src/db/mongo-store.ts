/**
 * Purpose: CRUD over one Mongo collection with Zod validation on every read.
 * Fit: base layer under `MongoWorldStore` and `MongoLockManager`; repositories
 * never talk to the driver directly.
 * Invariants: every document has `_id: string`; a document that fails its
 * schema is reported as an error (and logged), never handed to the engine.
 * Gotchas: writes take an optional `ClientSession` so they can join a
 * multi-document transaction opened by the caller.
 */
import type {
  ClientSession,
  Collection,
  Document,
  Filter,
  FindOptions,
} from "mongodb";
import type { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { getLogger } from "@/utils/logger";
import { getDb } from "./mongo";

const log = getLogger("store");

export class MongoStore<T extends Document & { _id: string }> {
  constructor(
    private readonly collectionName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  /**
   * Relies on `getDb` for the client singleton; not cached here.
   */
  public async collection(): Promise<Collection<T>> {
    return (await getDb()).collection<T>(this.collectionName);
  }

  private mapError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }

  private byId(id: string): Filter<T> {
    return { _id: id } as Filter<T>;
  }

  parse(doc: unknown): Result<T, Error> {
    const parsed = this.schema.safeParse(doc);
    if (parsed.success) return OkResult(parsed.data);

    log.error(`[MongoStore:${this.collectionName}] invalid document`, parsed.error.message);
    return ErrResult(
      new Error(`Invalid document in '${this.collectionName}': ${parsed.error.message}`),
    );
  }

  /** Reads by `_id`; `Ok(null)` when missing. */
  async get(id: string, session?: ClientSession): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne(this.byId(id), { session });
      if (!doc) return OkResult(null);
      return this.parse(doc);
    } catch (error) {
      return ErrResult(this.mapError(error));
    }
  }

  async find(filter: Filter<T>, options?: FindOptions): Promise<Result<T[]>> {
    try {
      const col = await this.collection();
      const docs = await col.find(filter, options).toArray();
      const parsed: T[] = [];
      for (const doc of docs) {
        const res = this.parse(doc);
        if (res.isErr()) return ErrResult(res.error);
        parsed.push(res.unwrap());
      }
      return OkResult(parsed);
    } catch (error) {
      return ErrResult(this.mapError(error));
    }
  }

  async count(filter: Filter<T>): Promise<Result<number>> {
    try {
      const col = await this.collection();
      return OkResult(await col.countDocuments(filter));
    } catch (error) {
      return ErrResult(this.mapError(error));
    }
  }

  /**
   * Replaces or inserts the whole document. The caller owns the final shape;
   * it is validated before it reaches the driver.
   */
  async replace(doc: T, session?: ClientSession): Promise<Result<void>> {
    const checked = this.parse(doc);
    if (checked.isErr()) return ErrResult(checked.error);
    try {
      const col = await this.collection();
      await col.replaceOne(this.byId(doc._id), checked.unwrap(), { upsert: true, session });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(this.mapError(error));
    }
  }
}
