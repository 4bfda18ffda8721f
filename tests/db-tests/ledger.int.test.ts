/**
 * Ledger Integration Tests.
 *
 * Tests:
 * - authority credit / debit, no partial debits
 * - transfer conservation and failure modes
 * - amount validation happens before anything is read
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
  name: "ledger",
  tests: [
    {
      name: "credit and debit move the balance and are audited",
      ops: [ops.update, ops.read],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const id = factory.userId();
        await registerCitizen(world, id);
        const officer = authorityActor();
        world.clock.advanceMinutes(1);

        const credited = assertOk(await world.engine.credit(officer, id, 250));
        assertDeepEqual(
          credited,
          { citizenId: id, delta: 250, balanceBefore: 0, balanceAfter: 250 },
          "credit movement",
        );

        world.clock.advanceMinutes(1);
        const debited = assertOk(await world.engine.debit(officer, id, 100));
        assertDeepEqual(
          debited,
          { citizenId: id, delta: -100, balanceBefore: 250, balanceAfter: 150 },
          "debit movement",
        );
        await expectBalance(world, id, 150);

        const trail = assertOk(await world.engine.auditTrail(officer, id));
        assertDeepEqual(
          trail.map((entry) => [entry.operation, entry.amount, entry.actorId]),
          [
            ["ledger.debit", 100, "officer-1"],
            ["ledger.credit", 250, "officer-1"],
            ["citizens.register", null, id],
          ],
          "newest first",
        );
      },
    },
    {
      name: "debit beyond the balance fails and changes nothing",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const id = factory.userId();
        await registerFunded(world, id, 40);
        const commits = world.store.commits;

        const error = assertErrCode(
          await world.engine.debit(authorityActor(), id, 41),
          "INSUFFICIENT_FUNDS",
        );
        assertEqual(error.details.balance, 40, "balance in details");
        assertEqual(error.details.required, 41, "required in details");
        await expectBalance(world, id, 40);
        assertEqual(world.store.commits, commits, "no commit");
      },
    },
    {
      name: "credit and debit need an authority",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const id = factory.userId();
        await registerCitizen(world, id);

        const denied = assertErrCode(
          await world.engine.credit(citizenActor(id), id, 1_000),
          "UNAUTHORIZED",
        );
        assertEqual(denied.message, "Operation 'ledger.credit' requires an authority.", "message");
        assertErrCode(await world.engine.debit(citizenActor(id), id, 1), "UNAUTHORIZED");
        await expectBalance(world, id, 0);
      },
    },
    {
      name: "amounts must be positive whole numbers",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const id = factory.userId();
        await registerCitizen(world, id);
        const officer = authorityActor();

        for (const amount of [0, -5, 2.5, Number.NaN, 1_000_000_000_001]) {
          assertErrCode(await world.engine.credit(officer, id, amount), "INVALID_AMOUNT");
        }
        assertEqual(world.store.commits, 1, "only the registration committed");
      },
    },
    {
      name: "transfer moves money and conserves the total",
      ops: [ops.update, ops.read],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const alice = factory.userId();
        const bob = factory.userId();
        await registerFunded(world, alice, 300);
        await registerFunded(world, bob, 20);
        world.clock.advanceMinutes(1);

        const receipt = assertOk(await world.engine.transfer(citizenActor(alice), alice, bob, 120));
        assertDeepEqual(
          receipt,
          { fromId: alice, toId: bob, amount: 120, fromBalance: 180, toBalance: 140 },
          "receipt",
        );
        await expectBalance(world, alice, 180);
        await expectBalance(world, bob, 140);

        const stats = assertOk(await world.engine.stats(citizenActor(alice)));
        assertEqual(stats.moneyInCirculation, 320, "total unchanged");

        const [entry] = assertOk(await world.engine.auditTrail(authorityActor(), alice, 1));
        assertEqual(entry.operation, "ledger.transfer", "audited on the sender");
        assertDeepEqual(entry.metadata, { toId: bob }, "recipient recorded");
      },
    },
    {
      name: "transfer failures leave both balances untouched",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const alice = factory.userId();
        const bob = factory.userId();
        const ghost = factory.userId();
        await registerFunded(world, alice, 50);
        await registerCitizen(world, bob);
        const actor = citizenActor(alice);

        assertErrCode(await world.engine.transfer(actor, alice, alice, 10), "SAME_ACCOUNT");
        assertErrCode(await world.engine.transfer(actor, alice, bob, 51), "INSUFFICIENT_FUNDS");
        assertErrCode(await world.engine.transfer(actor, alice, ghost, 10), "UNKNOWN_CITIZEN");
        assertErrCode(await world.engine.transfer(actor, alice, bob, 0), "INVALID_AMOUNT");
        assertErrCode(
          await world.engine.transfer(citizenActor(bob), alice, bob, 10),
          "UNAUTHORIZED",
        );

        await expectBalance(world, alice, 50);
        await expectBalance(world, bob, 0);
      },
    },
    {
      name: "archived citizens neither send nor receive",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const alice = factory.userId();
        const bob = factory.userId();
        await registerFunded(world, alice, 50);
        await registerFunded(world, bob, 50);
        assertOk(await world.engine.archive(authorityActor(), bob));

        assertErrCode(
          await world.engine.transfer(citizenActor(alice), alice, bob, 10),
          "CITIZEN_ARCHIVED",
        );
        assertErrCode(await world.engine.credit(authorityActor(), bob, 10), "CITIZEN_ARCHIVED");
        await expectBalance(world, alice, 50);
        await expectBalance(world, bob, 50);
      },
    },
  ],
};
