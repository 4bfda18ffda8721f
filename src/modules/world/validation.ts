/**
 * Input validation for world operations.
 *
 * Purpose: reject malformed amounts, ages, names and periods at the service
 * boundary before any lock is taken.
 * Invariant: every helper returns the normalized value (trimmed strings) so
 * services persist exactly what was validated.
 */
import { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { CitizensConfig } from "@/configuration";
import { WorldError } from "./errors";

/** Upper bound for any single money movement. */
export const MAX_AMOUNT = 1_000_000_000_000;

export const MAX_LABEL_LENGTH = 64;
export const MAX_REASON_LENGTH = 200;

const AmountSchema = z.number().int().positive().max(MAX_AMOUNT);
const PriceSchema = z.number().int().nonnegative().max(MAX_AMOUNT);

export function validateAmount(amount: number): Result<number, WorldError> {
  if (!AmountSchema.safeParse(amount).success) {
    return ErrResult(
      new WorldError(
        "INVALID_AMOUNT",
        `Amount must be a whole number between 1 and ${MAX_AMOUNT}.`,
      ),
    );
  }
  return OkResult(amount);
}

export function validatePrice(price: number, field: string): Result<number, WorldError> {
  if (!PriceSchema.safeParse(price).success) {
    return ErrResult(
      new WorldError("INVALID_VALUE", `${field} must be a whole number between 0 and ${MAX_AMOUNT}.`, {
        field,
      }),
    );
  }
  return OkResult(price);
}

export function validateAge(age: number, config: CitizensConfig): Result<number, WorldError> {
  const schema = z.number().int().min(config.minAge).max(config.maxAge);
  if (!schema.safeParse(age).success) {
    return ErrResult(
      new WorldError(
        "INVALID_VALUE",
        `Age must be a whole number between ${config.minAge} and ${config.maxAge}.`,
        { field: "age" },
      ),
    );
  }
  return OkResult(age);
}

const boundedText = (
  raw: string,
  field: string,
  maxLength: number,
): Result<string, WorldError> => {
  const value = raw.trim();
  if (!value.length || value.length > maxLength) {
    return ErrResult(
      new WorldError(
        "INVALID_VALUE",
        `${field} must be between 1 and ${maxLength} characters.`,
        { field },
      ),
    );
  }
  return OkResult(value);
};

export const validateDisplayName = (
  name: string,
  config: CitizensConfig,
): Result<string, WorldError> => boundedText(name, "displayName", config.maxNameLength);

export const validateLabel = (label: string, field = "label"): Result<string, WorldError> =>
  boundedText(label, field, MAX_LABEL_LENGTH);

export const validateReason = (reason: string): Result<string, WorldError> =>
  boundedText(reason, "reason", MAX_REASON_LENGTH);

export function validatePeriodDays(days: number, maxDays: number): Result<number, WorldError> {
  if (!z.number().int().min(1).max(maxDays).safeParse(days).success) {
    return ErrResult(
      new WorldError("INVALID_VALUE", `Rental period must be between 1 and ${maxDays} days.`, {
        field: "periodDays",
      }),
    );
  }
  return OkResult(days);
}
