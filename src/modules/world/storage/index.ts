export * from "./types";
export { MemoryWorldStore } from "./memory";
export { MongoWorldStore } from "./mongo";
export { ensureWorldIndexes } from "./indexes";
