/**
 * User-facing text for engine results.
 * Purpose: keeps wording out of the commands; every `WorldErrorCode` maps to
 * one sentence, with details filled in where the error carries them.
 */
import type { WorldError, WorldErrorCode } from "./errors";

export const formatMoney = (amount: number): string => `$${amount.toLocaleString("en-US")}`;

/** Discord relative timestamp (`<t:1700000000:R>`). */
export const relativeTime = (date: Date): string => `<t:${Math.floor(date.getTime() / 1000)}:R>`;

const MESSAGES: Record<WorldErrorCode, string> = {
  UNKNOWN_CITIZEN: "That person is not a registered citizen.",
  ALREADY_REGISTERED: "You are already registered as a citizen.",
  CITIZEN_ARCHIVED: "That citizen has been archived.",
  INVALID_VALUE: "That value is not valid.",
  INVALID_AMOUNT: "The amount must be a positive whole number.",
  INSUFFICIENT_FUNDS: "Not enough money.",
  INSUFFICIENT_REVENUE: "The business does not have that much revenue.",
  SAME_ACCOUNT: "You cannot send money to yourself.",
  ON_COOLDOWN: "You are still on your break.",
  UNKNOWN_JOB_KIND: "That job does not exist.",
  UNKNOWN_BUSINESS: "That business does not exist.",
  UNKNOWN_PROPERTY: "That property does not exist.",
  UNKNOWN_FINE: "That fine does not exist.",
  NOT_OWNER: "You do not own that.",
  ALREADY_OCCUPIED: "That property is already taken.",
  ALREADY_WANTED: "That citizen is already wanted.",
  NOT_WANTED: "That citizen is not wanted.",
  ALREADY_PAID: "That fine has already been settled.",
  NOT_YOUR_FINE: "That fine was not issued to you.",
  UNAUTHORIZED: "You are not allowed to do that.",
  BUSY: "Someone else is using that right now. Try again in a moment.",
  STORAGE_FAILURE: "Something went wrong while saving. Nothing was changed.",
};

export function describeWorldError(error: WorldError): string {
  const base = MESSAGES[error.code];
  const { details } = error;

  switch (error.code) {
    case "ON_COOLDOWN":
      return details.cooldownEndsAt ? `${base} You can work again ${relativeTime(details.cooldownEndsAt)}.` : base;
    case "INSUFFICIENT_FUNDS":
    case "INSUFFICIENT_REVENUE":
      return details.balance !== undefined && details.required !== undefined
        ? `${base} Available: ${formatMoney(details.balance)}, needed: ${formatMoney(details.required)}.`
        : base;
    case "INVALID_VALUE":
      // Validation messages already name the field and the accepted range.
      return error.message;
    default:
      return base;
  }
}
