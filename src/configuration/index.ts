/**
 * Configuration entrypoint.
 *
 * Re-exports the public config API (sections, schemas, providers, store).
 * Prefer `import { configStore } from "@/configuration"` over deep imports.
 */
export * from "./constants";
export * from "./definitions";
export * from "./provider";
export * from "./store";
