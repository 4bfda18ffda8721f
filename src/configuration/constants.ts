/**
 * Canonical keys for world configuration sections.
 *
 * Invariants:
 * - Keys are stable identifiers; env mappings and JSON overrides refer to them.
 * - Each key has a schema in `definitions.ts`.
 */
export enum ConfigSection {
  Citizens = "citizens",
  Locks = "locks",
  Rentals = "rentals",
  Storage = "storage",
  Identity = "identity",
}
