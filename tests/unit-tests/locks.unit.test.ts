import { OkResult } from "../../src/utils/result";
import {
  lockOrder,
  MemoryLockManager,
  withLocks,
  type LockLease,
  type LockManager,
} from "../../src/modules/world/concurrency";
import type { WorldError } from "../../src/modules/world/errors";
import { ConfigSection, ConfigStore, StaticConfigProvider } from "../../src/configuration";
import { createWorldEngine, ManualClock, MemoryWorldStore } from "../../src/modules/world";
import type { Result } from "../../src/utils/result";
import { assert, assertDeepEqual, assertEqual, assertErr, assertOk } from "../db-tests/_utils/assert";
import { ops, type Suite } from "../db-tests/_utils/runner";

/** Records acquire/release order around a real manager. */
class RecordingLockManager implements LockManager {
  readonly events: string[] = [];
  private readonly inner = new MemoryLockManager();

  async acquire(key: string, waitMs: number): Promise<Result<LockLease, WorldError>> {
    const res = await this.inner.acquire(key, waitMs);
    if (res.isErr()) return res;
    this.events.push(`+${key}`);
    const lease = res.unwrap();
    return OkResult({
      key,
      renew: () => lease.renew(),
      release: async () => {
        this.events.push(`-${key}`);
        await lease.release();
      },
    });
  }
}

/** Leases for keys in `lapsed` report that they expired while held. */
class LapsingLockManager implements LockManager {
  readonly lapsed = new Set<string>();
  readonly inner = new MemoryLockManager();

  async acquire(key: string, waitMs: number): Promise<Result<LockLease, WorldError>> {
    const res = await this.inner.acquire(key, waitMs);
    if (res.isErr()) return res;
    const lease = res.unwrap();
    return OkResult({
      key,
      renew: async () => (this.lapsed.has(key) ? OkResult(false) : lease.renew()),
      release: () => lease.release(),
    });
  }
}

export const suite: Suite = {
  name: "World locks",
  tests: [
    {
      name: "lock order is sorted and deduplicated",
      ops: [ops.other],
      async run() {
        assertDeepEqual(
          lockOrder(["property:p1", "citizen:b", "citizen:a", "citizen:b"]),
          ["citizen:a", "citizen:b", "property:p1"],
          "order",
        );
      },
    },
    {
      name: "withLocks takes keys in order and releases in reverse",
      ops: [ops.other],
      async run() {
        const manager = new RecordingLockManager();
        const res = await withLocks(manager, ["citizen:z", "citizen:a"], 50, async () => {
          manager.events.push("work");
          return OkResult(42);
        });
        assertEqual(assertOk(res), 42, "work result");
        assertDeepEqual(
          manager.events,
          ["+citizen:a", "+citizen:z", "work", "-citizen:z", "-citizen:a"],
          "events",
        );
      },
    },
    {
      name: "waiters are served first in, first out",
      ops: [ops.other],
      async run() {
        const manager = new MemoryLockManager();
        const first = assertOk(await manager.acquire("citizen:a", 100));
        const order: string[] = [];

        const second = manager.acquire("citizen:a", 100).then(async (res) => {
          order.push("second");
          await assertOk(res).release();
        });
        const third = manager.acquire("citizen:a", 100).then(async (res) => {
          order.push("third");
          await assertOk(res).release();
        });

        await first.release();
        await Promise.all([second, third]);
        assertDeepEqual(order, ["second", "third"], "fifo");
        assertEqual(manager.isHeld("citizen:a"), false, "free at the end");
      },
    },
    {
      name: "a timed-out wait fails with BUSY and releases what it took",
      ops: [ops.other],
      async run() {
        const manager = new MemoryLockManager();
        const held = assertOk(await manager.acquire("citizen:b", 20));
        let ran = false;

        const res = await withLocks(manager, ["citizen:a", "citizen:b"], 20, async () => {
          ran = true;
          return OkResult(true);
        });
        const error = assertErr(res);
        assertEqual(error.code, "BUSY", "code");
        assertEqual(error.details.key, "citizen:b", "busy key");
        assertEqual(ran, false, "work skipped");
        assertEqual(manager.isHeld("citizen:a"), false, "first key released");

        await held.release();
        assert(!manager.isHeld("citizen:b"), "second key free");
      },
    },
    {
      name: "a lease that lapsed before the commit writes nothing",
      ops: [ops.create],
      async run() {
        const config = new ConfigStore(
          new StaticConfigProvider({ [ConfigSection.Locks]: { waitMs: 50 } }),
        ).resolve();
        const store = new MemoryWorldStore();
        const locks = new LapsingLockManager();
        const engine = createWorldEngine({ config, store, locks, clock: new ManualClock() });
        const actor = { id: "ana", capability: "citizen" } as const;
        const input = { citizenId: "ana", displayName: "Ana", age: 30 };

        locks.lapsed.add("citizen:ana");
        const error = assertErr(await engine.register(actor, input));
        assertEqual(error.code, "BUSY", "code");
        assertEqual(error.details.key, "citizen:ana", "lost key");
        assertEqual(store.commits, 0, "nothing committed");
        assertEqual(locks.inner.isHeld("citizen:ana"), false, "released after the failure");

        locks.lapsed.clear();
        assertEqual(assertOk(await engine.register(actor, input)).displayName, "Ana", "registered");
        assertEqual(store.commits, 1, "one commit");
      },
    },
    {
      name: "a released lease no longer renews",
      ops: [ops.other],
      async run() {
        const manager = new MemoryLockManager();
        const lease = assertOk(await manager.acquire("citizen:a", 10));
        assertEqual(assertOk(await lease.renew()), true, "held");
        await lease.release();
        assertEqual(assertOk(await lease.renew()), false, "released");
      },
    },
    {
      name: "releasing twice is harmless",
      ops: [ops.other],
      async run() {
        const manager = new MemoryLockManager();
        const lease = assertOk(await manager.acquire("fine:1", 10));
        await lease.release();
        const next = assertOk(await manager.acquire("fine:1", 10));
        await lease.release();
        assertEqual(manager.isHeld("fine:1"), true, "stale release does not free the new holder");
        await next.release();
      },
    },
  ],
};
