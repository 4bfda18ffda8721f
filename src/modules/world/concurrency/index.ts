export * from "./types";
export { MemoryLockManager } from "./memory";
export { MongoLockManager, LOCKS_COLLECTION } from "./mongo";
export { withLocks, lockOrder } from "./with-locks";
