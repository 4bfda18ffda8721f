import {
  MAX_AMOUNT,
  validateAge,
  validateAmount,
  validateDisplayName,
  validateLabel,
  validatePeriodDays,
  validatePrice,
  validateReason,
} from "../../src/modules/world/validation";
import { assertEqual, assertErr, assertOk } from "../db-tests/_utils/assert";
import { ops, type Suite } from "../db-tests/_utils/runner";

const citizens = { minAge: 16, maxAge: 90, maxNameLength: 10 };

export const suite: Suite = {
  name: "World validation",
  tests: [
    {
      name: "amounts are positive whole numbers up to the cap",
      ops: [ops.other],
      async run() {
        assertEqual(assertOk(validateAmount(1)), 1, "one");
        assertEqual(assertOk(validateAmount(MAX_AMOUNT)), MAX_AMOUNT, "cap");
        for (const bad of [0, -1, 1.5, MAX_AMOUNT + 1, Number.POSITIVE_INFINITY]) {
          assertEqual(assertErr(validateAmount(bad)).code, "INVALID_AMOUNT", `${bad} rejected`);
        }
      },
    },
    {
      name: "prices may be zero",
      ops: [ops.other],
      async run() {
        assertEqual(assertOk(validatePrice(0, "price")), 0, "free");
        const error = assertErr(validatePrice(-3, "rentPrice"));
        assertEqual(error.code, "INVALID_VALUE", "code");
        assertEqual(error.details.field, "rentPrice", "field");
      },
    },
    {
      name: "age bounds are inclusive",
      ops: [ops.other],
      async run() {
        assertEqual(assertOk(validateAge(16, citizens)), 16, "min");
        assertEqual(assertOk(validateAge(90, citizens)), 90, "max");
        const error = assertErr(validateAge(15, citizens));
        assertEqual(error.message, "Age must be a whole number between 16 and 90.", "message");
      },
    },
    {
      name: "text is trimmed and bounded",
      ops: [ops.other],
      async run() {
        assertEqual(assertOk(validateDisplayName("  Ana  ", citizens)), "Ana", "trimmed");
        assertEqual(assertErr(validateDisplayName("Maximilian!", citizens)).details.field, "displayName", "too long");
        assertEqual(assertOk(validateLabel("x".repeat(64))).length, 64, "label max");
        assertEqual(assertErr(validateLabel("x".repeat(65), "district")).details.field, "district", "field name");
        assertEqual(assertErr(validateReason("")).message, "reason must be between 1 and 200 characters.", "empty");
      },
    },
    {
      name: "rental periods run from one day to the configured maximum",
      ops: [ops.other],
      async run() {
        assertEqual(assertOk(validatePeriodDays(1, 7)), 1, "one day");
        assertEqual(assertOk(validatePeriodDays(7, 7)), 7, "max");
        assertEqual(
          assertErr(validatePeriodDays(8, 7)).message,
          "Rental period must be between 1 and 7 days.",
          "over max",
        );
        assertEqual(assertErr(validatePeriodDays(1.5, 7)).details.field, "periodDays", "fraction");
      },
    },
  ],
};
