import { authorize, OPERATION_POLICY, WORLD_OPERATIONS } from "../../src/modules/world/policy";
import { assert, assertDeepEqual, assertEqual, assertErr } from "../db-tests/_utils/assert";
import { ops, type Suite } from "../db-tests/_utils/runner";

const citizen = { id: "citizen-1", capability: "citizen" } as const;
const authority = { id: "officer-1", capability: "authority" } as const;

export const suite: Suite = {
  name: "World policy",
  tests: [
    {
      name: "every operation has a level",
      ops: [ops.other],
      async run() {
        for (const operation of WORLD_OPERATIONS) {
          assert(OPERATION_POLICY[operation] !== undefined, `${operation} has a level`);
        }
        assertEqual(Object.keys(OPERATION_POLICY).length, WORLD_OPERATIONS.length, "no extra entries");
      },
    },
    {
      name: "authorities pass every check",
      ops: [ops.other],
      async run() {
        for (const operation of WORLD_OPERATIONS) {
          assert(authorize(authority, operation, "someone-else").isOk(), `${operation} allowed`);
        }
      },
    },
    {
      name: "authority-level operations reject citizens",
      ops: [ops.other],
      async run() {
        const authorityOnly = WORLD_OPERATIONS.filter((op) => OPERATION_POLICY[op] === "authority");
        assertDeepEqual(
          authorityOnly,
          [
            "citizens.archive",
            "ledger.credit",
            "ledger.debit",
            "property.create",
            "law.issueWanted",
            "law.clearWanted",
            "law.issueFine",
            "law.waiveFine",
            "law.listWanted",
            "law.listAllFines",
            "reports.auditTrail",
          ],
          "authority operations",
        );
        const error = assertErr(authorize(citizen, "law.issueFine", citizen.id));
        assertEqual(error.code, "UNAUTHORIZED", "code");
        assertEqual(error.message, "Operation 'law.issueFine' requires an authority.", "message");
      },
    },
    {
      name: "self operations need the actor as subject",
      ops: [ops.other],
      async run() {
        assert(authorize(citizen, "ledger.transfer", "citizen-1").isOk(), "own account");
        assertEqual(
          assertErr(authorize(citizen, "ledger.transfer", "citizen-2")).code,
          "UNAUTHORIZED",
          "other account",
        );
        assertEqual(
          assertErr(authorize(citizen, "employment.earn")).code,
          "UNAUTHORIZED",
          "missing subject",
        );
      },
    },
    {
      name: "citizen-level operations accept anyone identified",
      ops: [ops.other],
      async run() {
        assert(authorize(citizen, "reports.stats").isOk(), "stats");
        assert(authorize(citizen, "business.withdrawRevenue").isOk(), "ownership checked later");
        assert(authorize(citizen, "property.vacate").isOk(), "vacate");
      },
    },
  ],
};
