/**
 * World error taxonomy.
 *
 * Purpose: every engine operation fails with exactly one of these codes so the
 * adapters can map them to messages without parsing strings.
 */

/** Error codes returned by world operations. */
export type WorldErrorCode =
  | "UNKNOWN_CITIZEN"
  | "ALREADY_REGISTERED"
  | "CITIZEN_ARCHIVED"
  | "INVALID_VALUE"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_REVENUE"
  | "SAME_ACCOUNT"
  | "ON_COOLDOWN"
  | "UNKNOWN_JOB_KIND"
  | "UNKNOWN_BUSINESS"
  | "UNKNOWN_PROPERTY"
  | "UNKNOWN_FINE"
  | "NOT_OWNER"
  | "ALREADY_OCCUPIED"
  | "ALREADY_WANTED"
  | "NOT_WANTED"
  | "ALREADY_PAID"
  | "NOT_YOUR_FINE"
  | "UNAUTHORIZED"
  | "BUSY"
  | "STORAGE_FAILURE";

/** Extra data some failures carry (e.g. when a cooldown ends). */
export interface WorldErrorDetails {
  readonly cooldownEndsAt?: Date;
  readonly balance?: number;
  readonly required?: number;
  readonly key?: string;
  readonly field?: string;
}

export class WorldError extends Error {
  constructor(
    public readonly code: WorldErrorCode,
    message: string,
    public readonly details: WorldErrorDetails = {},
  ) {
    super(message);
    this.name = "WorldError";
  }
}

/** Wraps a storage or unexpected error so it travels as a `WorldError`. */
export function storageFailure(error: unknown): WorldError {
  const message = error instanceof Error ? error.message : String(error);
  return new WorldError("STORAGE_FAILURE", `Storage failure: ${message}`);
}

export const isWorldError = (value: unknown): value is WorldError =>
  value instanceof WorldError;
