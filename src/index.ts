/**
 * Bot entrypoint.
 *
 * Loads env configuration, prepares Mongo indexes when the world is stored
 * there, starts the rental sweeper and hands control to the seyfert client.
 * Business rules live in `@/modules/world`; this file only wires them up.
 */
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";
import { disconnectDb } from "@/db/mongo";
import { ensureWorldIndexes, getWorldEngine, RentalSweeper } from "@/modules/world";
import { getLogger } from "@/utils/logger";

const log = getLogger("bootstrap");

const client = new Client<true>();

async function bootstrap(): Promise<void> {
  log.info("Starting bot...");
  const engine = getWorldEngine();
  const { storage, rentals } = engine.ctx.config;

  if (storage.backend === "mongo") {
    await ensureWorldIndexes();
  }

  const sweeper = new RentalSweeper(engine, rentals.sweepIntervalMs);
  sweeper.start();

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    log.info(`Received ${signal}, shutting down...`);
    sweeper.stop();
    if (storage.backend === "mongo") {
      await disconnectDb();
    }
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, (received) => {
      shutdown(received).catch((error: unknown) => {
        log.error("Shutdown failed:", error);
        process.exit(1);
      });
    });
  }

  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

bootstrap().catch((error) => {
  log.fatal("Failed to start bot:", error);
  process.exitCode = 1;
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {}
}
