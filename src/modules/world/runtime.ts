import { configStore } from "@/configuration";
import { createWorldEngine } from "./factory";
import type { WorldEngine } from "./engine";

let engine: WorldEngine | null = null;

/** Process-wide engine built from env configuration on first use. */
export function getWorldEngine(): WorldEngine {
  engine ??= createWorldEngine({ config: configStore.resolve() });
  return engine;
}
