/**
 * Named loggers for the world engine, its stores and background jobs.
 *
 * Uses the same seyfert `Logger` the bot client exposes as `client.logger`, so
 * engine lines share format and level with the gateway output.
 */
import { Logger, LogLevels } from "seyfert/lib/common";

const LEVELS: Record<string, LogLevels> = {
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
};

const resolveLevel = (): LogLevels => {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  const level: LogLevels | undefined = raw ? LEVELS[raw] : undefined;
  return level ?? LogLevels.Info;
};

const loggers = new Map<string, Logger>();

/**
 * Returns the shared logger for an area (`world`, `store`, `locks`, ...).
 * Silent when `NODE_ENV=test` so suite output stays readable.
 */
export function getLogger(area: string): Logger {
  const existing = loggers.get(area);
  if (existing) return existing;

  const logger = new Logger({
    name: `[${area}]`,
    logLevel: resolveLevel(),
    active: process.env.NODE_ENV !== "test",
  });
  loggers.set(area, logger);
  return logger;
}
