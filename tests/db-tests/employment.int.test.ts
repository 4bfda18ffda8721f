/**
 * Employment Integration Tests.
 *
 * Tests:
 * - job catalog and assignment (case-insensitive, unknown kinds)
 * - earn pays the job's payout once per cooldown
 * - the cooldown belongs to the current job and starts at the last earn
 * - earn state feeds the profile
 */
import {
  assertDeepEqual,
  assertEqual,
  assertErrCode,
  assertOk,
  citizenActor,
  createTestWorld,
  expectBalance,
  ops,
  registerCitizen,
  type Suite,
} from "./_utils";

export const suite: Suite = {
  name: "employment",
  tests: [
    {
      name: "job catalog lists every job with payout and cooldown",
      ops: [ops.list],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const jobs = assertOk(await world.engine.listJobs(citizenActor(factory.userId())));
        assertDeepEqual(
          jobs.map((job) => [job.kind, job.payout, job.cooldownMinutes]),
          [
            ["unemployed", 20, 60],
            ["taxi", 100, 30],
            ["police", 150, 20],
            ["medic", 140, 25],
            ["mechanic", 120, 30],
            ["delivery", 90, 15],
          ],
          "catalog",
        );
      },
    },
    {
      name: "assignJob normalizes the kind and rejects unknown jobs",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const id = factory.userId();
        await registerCitizen(world, id);

        const hired = assertOk(await world.engine.assignJob(citizenActor(id), id, "  TAXI "));
        assertEqual(hired.job, "taxi", "stored lowercase");

        const unknown = assertErrCode(
          await world.engine.assignJob(citizenActor(id), id, "astronaut"),
          "UNKNOWN_JOB_KIND",
        );
        assertEqual(unknown.message, "There is no job called 'astronaut'.", "message");

        const stored = assertOk(await world.engine.lookup(citizenActor(id), id));
        assertEqual(stored.job, "taxi", "unchanged after the failed switch");
      },
    },
    {
      name: "earn pays once, then ON_COOLDOWN until the cooldown ends",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const alice = factory.userId();
        await registerCitizen(world, alice, "Alice");
        assertOk(await world.engine.assignJob(citizenActor(alice), alice, "taxi"));

        const first = assertOk(await world.engine.earn(citizenActor(alice), alice));
        assertEqual(first.payout, 100, "taxi payout");
        assertEqual(first.balance, 100, "balance after the first shift");
        assertEqual(first.nextEarnAt.toISOString(), "2024-01-01T00:30:00.000Z", "next earn");

        const early = assertErrCode(await world.engine.earn(citizenActor(alice), alice), "ON_COOLDOWN");
        assertEqual(
          early.details.cooldownEndsAt?.toISOString(),
          "2024-01-01T00:30:00.000Z",
          "cooldown end in details",
        );
        await expectBalance(world, alice, 100);

        world.clock.advanceMinutes(29);
        assertErrCode(await world.engine.earn(citizenActor(alice), alice), "ON_COOLDOWN");

        world.clock.advanceMinutes(1);
        const second = assertOk(await world.engine.earn(citizenActor(alice), alice));
        assertEqual(second.balance, 200, "second payout");
      },
    },
    {
      name: "cooldown is the current job's, measured from the last earn",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const id = factory.userId();
        await registerCitizen(world, id);

        const welfare = assertOk(await world.engine.earn(citizenActor(id), id));
        assertEqual(welfare.payout, 20, "unemployed payout");

        assertOk(await world.engine.assignJob(citizenActor(id), id, "taxi"));
        world.clock.advanceMinutes(15);
        const waiting = assertErrCode(await world.engine.earn(citizenActor(id), id), "ON_COOLDOWN");
        assertEqual(
          waiting.details.cooldownEndsAt?.toISOString(),
          "2024-01-01T00:30:00.000Z",
          "taxi cooldown from the welfare earn",
        );

        assertOk(await world.engine.assignJob(citizenActor(id), id, "delivery"));
        const delivered = assertOk(await world.engine.earn(citizenActor(id), id));
        assertEqual(delivered.job, "delivery", "paid as the new job");
        assertEqual(delivered.balance, 110, "20 + 90");
      },
    },
    {
      name: "only the citizen themselves can work",
      ops: [ops.update],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const alice = factory.userId();
        const bob = factory.userId();
        await registerCitizen(world, alice);
        await registerCitizen(world, bob);

        assertErrCode(await world.engine.earn(citizenActor(bob), alice), "UNAUTHORIZED");
        assertErrCode(await world.engine.assignJob(citizenActor(bob), alice, "medic"), "UNAUTHORIZED");
        await expectBalance(world, alice, 0);
      },
    },
    {
      name: "profile shows the job and shift counters",
      ops: [ops.read],
      run: async ({ factory }) => {
        const world = createTestWorld();
        const id = factory.userId();
        await registerCitizen(world, id);
        assertOk(await world.engine.assignJob(citizenActor(id), id, "police"));
        assertOk(await world.engine.earn(citizenActor(id), id));
        world.clock.advanceMinutes(20);
        assertOk(await world.engine.earn(citizenActor(id), id));

        const profile = assertOk(await world.engine.profile(citizenActor(id), id));
        assertEqual(profile.job?.label, "Police Officer", "job label");
        assertEqual(profile.balance, 300, "two police shifts");
        assertEqual(profile.employment?.earnCount, 2, "earn count");
        assertEqual(profile.employment?.lifetimeEarnings, 300, "lifetime earnings");
        assertEqual(profile.employment?.lastEarnAt?.toISOString(), "2024-01-01T00:20:00.000Z", "last earn");
      },
    },
  ],
};
