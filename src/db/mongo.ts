/**
 * Mongo client singleton for the native driver.
 * Purpose: one entrypoint to obtain the client (`getMongoClient`, needed for
 * sessions/transactions), the database handle (`getDb`) and to close both.
 */
import { MongoClient, type Db } from "mongodb";

export interface MongoConnectionOptions {
  uri?: string;
  dbName?: string;
}

let client: MongoClient | null = null;
let connecting: Promise<MongoClient> | null = null;
let dbInstance: Db | null = null;
let options: MongoConnectionOptions = {};

/**
 * Overrides env-derived connection settings. Call before the first `getDb`.
 */
export function configureMongo(next: MongoConnectionOptions): void {
  options = { ...options, ...next };
}

const getUri = (): string => {
  const uri = options.uri ?? process.env.MONGO_URI;
  if (!uri) throw new Error("MongoDB URI not configured (MONGO_URI).");
  return uri;
};

const getDbName = (): string => options.dbName ?? process.env.DB_NAME ?? "civic_world";

export async function getMongoClient(): Promise<MongoClient> {
  if (client) return client;
  // Concurrent first callers share one in-flight connect instead of opening two pools.
  connecting ??= new MongoClient(getUri())
    .connect()
    .then((connected) => {
      client = connected;
      return connected;
    })
    .finally(() => {
      connecting = null;
    });
  return connecting;
}

export async function getDb(): Promise<Db> {
  if (dbInstance) return dbInstance;
  const connected = await getMongoClient();
  dbInstance = connected.db(getDbName());
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  dbInstance = null;
}
