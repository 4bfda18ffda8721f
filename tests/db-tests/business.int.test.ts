/**
 * Business Registry Integration Tests.
 *
 * Tests:
 * - founding (name/type validation, founder ownership)
 * - revenue deposit / withdrawal into the owner's ledger
 * - ownership rules and transfers
 * - listing by owner
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
  type Suite,
  type TestWorld,
} from "./_utils";

const found = async (world: TestWorld, ownerId: string, name: string, type = "shop") =>
  assertOk(
    await world.engine.createBusiness(citizenActor(ownerId), { name, type, founderId: ownerId }),
  );

export const suite: Suite = {
  name: "business registry",
  tests: [
    {
      name: "create stores a zero-revenue business owned by the founder",
      ops: [ops.create, ops.read],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const bob = factory.userId();
        await registerCitizen(world, bob, "Bob");

        const business = assertOk(
          await world.engine.createBusiness(citizenActor(bob), {
            name: "  Bob's Diner ",
            type: "Restaurant",
            founderId: bob,
          }),
        );
        assertEqual(business.name, "Bob's Diner", "name trimmed");
        assertEqual(business.type, "restaurant", "type lowercased");
        assertEqual(business.ownerId, bob, "founder owns it");
        assertEqual(business.revenue, 0, "no revenue yet");
        assertEqual(business._id.startsWith("biz_"), true, "prefixed id");

        const fetched = assertOk(await world.engine.getBusiness(citizenActor(bob), business._id));
        assertDeepEqual(fetched, business, "get returns the stored record");
      },
    },
    {
      name: "create rejects unknown types, bad names and unregistered founders",
      ops: [ops.create],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const bob = factory.userId();
        const ghost = factory.userId();
        await registerCitizen(world, bob);
        const actor = citizenActor(bob);

        const badType = assertErrCode(
          await world.engine.createBusiness(actor, { name: "Rocket Co", type: "spaceport", founderId: bob }),
          "INVALID_VALUE",
        );
        assertEqual(
          badType.message,
          "Unknown business type 'spaceport'. Choose one of: shop, restaurant, garage, club, office, farm.",
          "type message",
        );
        assertEqual(badType.details.field, "type", "type field");

        assertErrCode(
          await world.engine.createBusiness(actor, { name: " ", type: "shop", founderId: bob }),
          "INVALID_VALUE",
        );
        assertErrCode(
          await world.engine.createBusiness(authorityActor(), { name: "Shell", type: "shop", founderId: ghost }),
          "UNKNOWN_CITIZEN",
        );
        assertErrCode(
          await world.engine.createBusiness(citizenActor(ghost), { name: "Shell", type: "shop", founderId: bob }),
          "UNAUTHORIZED",
        );
      },
    },
    {
      name: "revenue withdrawal is capped at the revenue and credits the owner",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const bob = factory.userId();
        await registerCitizen(world, bob, "Bob");
        const business = await found(world, bob, "Bob's Shop");
        const actor = citizenActor(bob);

        const deposited = assertOk(await world.engine.depositRevenue(actor, business._id, 500));
        assertEqual(deposited.revenue, 500, "revenue after deposit");

        const short = assertErrCode(
          await world.engine.withdrawRevenue(actor, business._id, 600, bob),
          "INSUFFICIENT_REVENUE",
        );
        assertEqual(short.details.balance, 500, "available revenue");
        assertEqual(short.details.required, 600, "requested amount");
        await expectBalance(world, bob, 0);

        const receipt = assertOk(await world.engine.withdrawRevenue(actor, business._id, 500, bob));
        assertDeepEqual(
          receipt,
          { businessId: business._id, toCitizenId: bob, amount: 500, revenue: 0, balance: 500 },
          "receipt",
        );
        await expectBalance(world, bob, 500);
        const after = assertOk(await world.engine.getBusiness(actor, business._id));
        assertEqual(after.revenue, 0, "revenue drained");
      },
    },
    {
      name: "only the owner deposits or withdraws, and only to themselves",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const bob = factory.userId();
        const eve = factory.userId();
        await registerCitizen(world, bob);
        await registerCitizen(world, eve);
        const business = await found(world, bob, "Corner Shop");
        assertOk(await world.engine.depositRevenue(citizenActor(bob), business._id, 100));

        assertErrCode(await world.engine.depositRevenue(citizenActor(eve), business._id, 10), "NOT_OWNER");
        assertErrCode(
          await world.engine.withdrawRevenue(citizenActor(eve), business._id, 10, eve),
          "NOT_OWNER",
        );
        assertErrCode(
          await world.engine.withdrawRevenue(citizenActor(bob), business._id, 10, eve),
          "NOT_OWNER",
        );
        assertErrCode(
          await world.engine.withdrawRevenue(citizenActor(bob), "biz_missing", 10, bob),
          "UNKNOWN_BUSINESS",
        );

        const byAuthority = assertOk(
          await world.engine.withdrawRevenue(authorityActor(), business._id, 30, bob),
        );
        assertEqual(byAuthority.revenue, 70, "authority withdrew to the owner");
        await expectBalance(world, eve, 0);
        await expectBalance(world, bob, 30);
      },
    },
    {
      name: "ownership transfer hands the business and its revenue over",
      ops: [ops.update, ops.list],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const bob = factory.userId();
        const carol = factory.userId();
        await registerCitizen(world, bob);
        await registerCitizen(world, carol);
        const business = await found(world, bob, "Garage 51", "garage");
        assertOk(await world.engine.depositRevenue(citizenActor(bob), business._id, 80));

        assertErrCode(
          await world.engine.transferBusiness(citizenActor(carol), business._id, carol),
          "NOT_OWNER",
        );
        assertErrCode(
          await world.engine.transferBusiness(citizenActor(bob), business._id, bob),
          "INVALID_VALUE",
        );

        const moved = assertOk(await world.engine.transferBusiness(citizenActor(bob), business._id, carol));
        assertEqual(moved.ownerId, carol, "new owner");
        assertEqual(moved.revenue, 80, "revenue travels with the business");

        const bobs = assertOk(await world.engine.listBusinesses(citizenActor(bob), bob));
        assertEqual(bobs.length, 0, "bob owns nothing");
        assertOk(await world.engine.withdrawRevenue(citizenActor(carol), business._id, 80, carol));
        await expectBalance(world, carol, 80);
      },
    },
    {
      name: "list is sorted by name and filters by owner",
      ops: [ops.list],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const bob = factory.userId();
        const carol = factory.userId();
        await registerCitizen(world, bob);
        await registerCitizen(world, carol);
        await found(world, bob, "Zeta Farm", "farm");
        await found(world, carol, "Alpha Club", "club");
        await found(world, bob, "Mid Office", "office");

        const all = assertOk(await world.engine.listBusinesses(citizenActor(bob)));
        assertDeepEqual(
          all.map((b) => b.name),
          ["Alpha Club", "Mid Office", "Zeta Farm"],
          "all by name",
        );
        const bobs = assertOk(await world.engine.listBusinesses(citizenActor(bob), bob));
        assertDeepEqual(bobs.map((b) => b.name), ["Mid Office", "Zeta Farm"], "bob's by name");
      },
    },
  ],
};
