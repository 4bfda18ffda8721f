/**
 * World engine public API.
 * Prefer `import { getWorldEngine } from "@/modules/world"` over deep imports.
 */
export * from "./errors";
export * from "./clock";
export * from "./policy";
export * from "./validation";
export * from "./messages";
export type { WorldContext } from "./context";
export * from "./storage";
export * from "./concurrency";
export * from "./citizens";
export * from "./ledger";
export * from "./employment";
export * from "./business";
export * from "./property";
export * from "./law";
export * from "./reports";
export { WorldEngine } from "./engine";
export { createWorldEngine, type WorldEngineOptions } from "./factory";
export { getWorldEngine } from "./runtime";
