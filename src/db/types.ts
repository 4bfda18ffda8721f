// Typed aliases for frequently-used identifiers to make intent explicit.
export type CitizenId = string;
export type BusinessId = string;
export type PropertyId = string;
export type FineId = string;
