import { ConfigSection } from "./constants";
import { configSchemas, type ConfigOf, type WorldConfig } from "./definitions";
import { EnvConfigProvider, type ConfigProvider } from "./provider";

/**
 * Parses provider sections through their Zod schemas.
 * Throws on invalid values; configuration is read once at startup.
 */
export class ConfigStore {
  constructor(private readonly provider: ConfigProvider) {}

  get<K extends ConfigSection>(section: K): ConfigOf<K> {
    const schema = configSchemas[section];
    const parsed = schema.safeParse(this.provider.getSection(section));
    if (!parsed.success) {
      throw new Error(`Invalid configuration for '${section}': ${parsed.error.message}`);
    }
    return parsed.data as ConfigOf<K>;
  }

  /** Resolves every section into the shape the engine consumes. */
  resolve(): WorldConfig {
    return {
      citizens: this.get(ConfigSection.Citizens),
      locks: this.get(ConfigSection.Locks),
      rentals: this.get(ConfigSection.Rentals),
      storage: this.get(ConfigSection.Storage),
      identity: this.get(ConfigSection.Identity),
    };
  }
}

// Global instance
export const configStore = new ConfigStore(new EnvConfigProvider());
