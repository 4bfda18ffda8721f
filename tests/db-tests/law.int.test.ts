/**
 * Law Enforcement Integration Tests.
 *
 * Tests:
 * - wanted lifecycle: issue, duplicate, clear, re-issue
 * - fines: issue, pay (ledger debit), double pay, wrong payer, waive
 * - listings newest first
 * - world-wide warrant and fine listings for authorities
 */
import {
  assertDeepEqual,
  assertEqual,
  assertErrCode,
  assertOk,
  authorityActor,
  citizenActor,
  createTestWorld,
  expectBalance,
  ops,
  registerCitizen,
  registerFunded,
  type Suite,
} from "./_utils";

export const suite: Suite = {
  name: "law enforcement",
  tests: [
    {
      name: "wanted can be issued once, cleared, and issued again",
      ops: [ops.create, ops.update, ops.list],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const suspect = factory.userId();
        await registerCitizen(world, suspect, "Dan");
        const officer = authorityActor();

        const first = assertOk(await world.engine.issueWanted(officer, suspect, "  Speeding  "));
        assertEqual(first.status, "active", "active record");
        assertEqual(first.reason, "Speeding", "reason trimmed");
        assertEqual(first.issuedBy, "officer-1", "issuer");
        const flagged = assertOk(await world.engine.lookup(officer, suspect));
        assertEqual(flagged.wanted, true, "citizen flag set");

        const dup = assertErrCode(await world.engine.issueWanted(officer, suspect, "Again"), "ALREADY_WANTED");
        assertEqual(dup.message, "'Dan' is already wanted.", "duplicate message");

        world.clock.advanceMinutes(10);
        const cleared = assertOk(await world.engine.clearWanted(officer, suspect));
        assertEqual(cleared._id, first._id, "the active record was cleared");
        assertEqual(cleared.status, "cleared", "cleared");
        assertEqual(cleared.clearedAt?.toISOString(), "2024-01-01T00:10:00.000Z", "cleared at");
        assertEqual(assertOk(await world.engine.lookup(officer, suspect)).wanted, false, "flag cleared");

        assertErrCode(await world.engine.clearWanted(officer, suspect), "NOT_WANTED");

        world.clock.advanceMinutes(10);
        const second = assertOk(await world.engine.issueWanted(officer, suspect, "Robbery"));
        assertEqual(second.status, "active", "new record active");

        const history = assertOk(await world.engine.wantedHistory(citizenActor(suspect), suspect));
        assertDeepEqual(
          history.map((w) => [w.reason, w.status]),
          [
            ["Robbery", "active"],
            ["Speeding", "cleared"],
          ],
          "newest first",
        );
      },
    },
    {
      name: "citizens cannot issue or clear wanted status",
      ops: [ops.create],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const alice = factory.userId();
        const bob = factory.userId();
        await registerCitizen(world, alice);
        await registerCitizen(world, bob);

        assertErrCode(await world.engine.issueWanted(citizenActor(alice), bob, "Rude"), "UNAUTHORIZED");
        assertErrCode(await world.engine.clearWanted(citizenActor(alice), alice), "UNAUTHORIZED");
        assertErrCode(await world.engine.issueWanted(authorityActor(), bob, " "), "INVALID_VALUE");
        assertErrCode(await world.engine.issueWanted(authorityActor(), "nobody", "Ghost"), "UNKNOWN_CITIZEN");
      },
    },
    {
      name: "paying a fine debits the ledger once; a second payment fails",
      ops: [ops.create, ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const driver = factory.userId();
        await registerFunded(world, driver, 100);

        const fine = assertOk(await world.engine.issueFine(authorityActor(), driver, 60, "Parking"));
        assertEqual(fine.status, "issued", "issued");
        assertEqual(fine._id.startsWith("fine_"), true, "fine id prefix");
        await expectBalance(world, driver, 100);

        const paid = assertOk(await world.engine.payFine(citizenActor(driver), fine._id, driver));
        assertEqual(paid.status, "paid", "paid");
        assertEqual(paid.resolvedBy, driver, "paid by the driver");
        await expectBalance(world, driver, 40);

        const again = assertErrCode(
          await world.engine.payFine(citizenActor(driver), fine._id, driver),
          "ALREADY_PAID",
        );
        assertEqual(again.message, `Fine '${fine._id}' is already paid.`, "message");
        await expectBalance(world, driver, 40);
      },
    },
    {
      name: "fines need the right payer and enough money",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const driver = factory.userId();
        const friend = factory.userId();
        await registerFunded(world, driver, 10);
        await registerFunded(world, friend, 500);
        const fine = assertOk(await world.engine.issueFine(authorityActor(), driver, 60, "Speeding"));

        assertErrCode(
          await world.engine.payFine(citizenActor(friend), fine._id, friend),
          "NOT_YOUR_FINE",
        );
        const short = assertErrCode(
          await world.engine.payFine(citizenActor(driver), fine._id, driver),
          "INSUFFICIENT_FUNDS",
        );
        assertEqual(short.details.required, 60, "fine amount required");
        assertErrCode(
          await world.engine.payFine(citizenActor(driver), "fine_missing", driver),
          "UNKNOWN_FINE",
        );

        const unpaid = assertOk(await world.engine.listFines(citizenActor(driver), driver, true));
        assertDeepEqual(unpaid.map((f) => f._id), [fine._id], "still unpaid");
        await expectBalance(world, friend, 500);
      },
    },
    {
      name: "waived fines are settled without payment",
      ops: [ops.update, ops.list],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const driver = factory.userId();
        await registerFunded(world, driver, 100);
        const officer = authorityActor();

        const old = assertOk(await world.engine.issueFine(officer, driver, 20, "Littering"));
        world.clock.advanceMinutes(5);
        const recent = assertOk(await world.engine.issueFine(officer, driver, 30, "Noise"));

        assertErrCode(await world.engine.waiveFine(citizenActor(driver), old._id), "UNAUTHORIZED");
        const waived = assertOk(await world.engine.waiveFine(officer, old._id));
        assertEqual(waived.status, "waived", "waived");
        assertErrCode(await world.engine.waiveFine(officer, old._id), "ALREADY_PAID");
        assertErrCode(await world.engine.payFine(citizenActor(driver), old._id, driver), "ALREADY_PAID");
        await expectBalance(world, driver, 100);

        const all = assertOk(await world.engine.listFines(citizenActor(driver), driver));
        assertDeepEqual(
          all.map((f) => [f.reason, f.status]),
          [
            ["Noise", "issued"],
            ["Littering", "waived"],
          ],
          "newest first",
        );
        const unpaid = assertOk(await world.engine.listFines(citizenActor(driver), driver, true));
        assertDeepEqual(unpaid.map((f) => f._id), [recent._id], "only the open fine");
      },
    },
    {
      name: "fine amounts are validated",
      ops: [ops.create],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const driver = factory.userId();
        await registerCitizen(world, driver);

        assertErrCode(await world.engine.issueFine(authorityActor(), driver, 0, "Nothing"), "INVALID_AMOUNT");
        assertErrCode(await world.engine.issueFine(authorityActor(), driver, 10, ""), "INVALID_VALUE");
        assertErrCode(await world.engine.issueFine(citizenActor(driver), driver, 10, "Self"), "UNAUTHORIZED");
        assertEqual(world.store.commits, 1, "only the registration committed");
      },
    },
    {
      name: "authorities list warrants and fines across every citizen",
      ops: [ops.list, ops.find],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const officer = authorityActor();
        const ana = factory.userId();
        const ben = factory.userId();
        await registerCitizen(world, ana);
        await registerFunded(world, ben, 50);

        world.clock.advanceMinutes(1);
        assertOk(await world.engine.issueWanted(officer, ana, "Theft"));
        world.clock.advanceMinutes(1);
        assertOk(await world.engine.issueWanted(officer, ben, "Arson"));
        world.clock.advanceMinutes(1);
        assertOk(await world.engine.clearWanted(officer, ana));

        const warrants = assertOk(await world.engine.listWanted(officer));
        assertDeepEqual(
          warrants.map((w) => [w.citizenId, w.reason, w.status]),
          [
            [ben, "Arson", "active"],
            [ana, "Theft", "cleared"],
          ],
          "all warrants, newest first",
        );
        const active = assertOk(await world.engine.listWanted(officer, { activeOnly: true }));
        assertDeepEqual(active.map((w) => w.citizenId), [ben], "only ben is wanted");

        world.clock.advanceMinutes(1);
        const parking = assertOk(await world.engine.issueFine(officer, ana, 10, "Parking"));
        world.clock.advanceMinutes(1);
        const speeding = assertOk(await world.engine.issueFine(officer, ben, 20, "Speeding"));
        assertOk(await world.engine.payFine(citizenActor(ben), speeding._id, ben));

        const fines = assertOk(await world.engine.listAllFines(officer));
        assertDeepEqual(
          fines.map((f) => [f._id, f.status]),
          [
            [speeding._id, "paid"],
            [parking._id, "issued"],
          ],
          "all fines, newest first",
        );
        const unpaid = assertOk(await world.engine.listAllFines(officer, { unpaidOnly: true }));
        assertDeepEqual(unpaid.map((f) => f._id), [parking._id], "open fines");
        const latest = assertOk(await world.engine.listAllFines(officer, { limit: 1 }));
        assertDeepEqual(latest.map((f) => f._id), [speeding._id], "limited");

        assertErrCode(await world.engine.listWanted(citizenActor(ana)), "UNAUTHORIZED");
        assertErrCode(await world.engine.listAllFines(citizenActor(ben), { unpaidOnly: true }), "UNAUTHORIZED");
      },
    },
  ],
};
