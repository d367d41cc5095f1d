import { afterEach, describe, test, expect, vi } from "vitest";
import { type DomainObjectRef, domainRef, refKey } from "./domain.js";
import { SyncUnavailableError } from "./errors.js";
import { RelationSyncEngine } from "./engine.js";
import type { Logger } from "./logger.js";
import { InMemoryRbacSource, type RbacSnapshot } from "./rbac-source.js";
import { type ReconcileTarget, Reconciler, type SyncOutcome } from "./reconciler.js";
import { InMemoryRelationStore } from "./relation-store.js";
import { RelationshipSet, parseRelationship } from "./tuples.js";

// ============================================================================
// Helpers
// ============================================================================

function createLogger(): Logger & { infos: string[]; errors: string[] } {
  const infos: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    errors,
    info: (m: string) => {
      infos.push(m);
    },
    warn: vi.fn(),
    error: (m: string) => {
      errors.push(m);
    },
  };
}

function setup(snapshot: RbacSnapshot) {
  const source = new InMemoryRbacSource(snapshot);
  const store = new InMemoryRelationStore();
  const engine = new RelationSyncEngine({
    source,
    store,
    executor: { retry: { maxAttempts: 1 }, sleep: async () => {} },
  });
  return { source, store, engine };
}

async function syncAll(engine: RelationSyncEngine, source: InMemoryRbacSource): Promise<void> {
  for (const ref of await source.listDomainObjects()) {
    await engine.onDomainObjectChanged(ref);
  }
}

function synced(ref: DomainObjectRef): SyncOutcome {
  return { ref, status: "synced", added: 0, removed: 0, drift: false };
}

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const scopedSnapshot: RbacSnapshot = {
  groups: [{ id: "g1", principals: ["alice"] }],
  roles: [
    {
      id: "r1",
      access: [
        {
          permission: "inventory:hosts:read",
          resourceDefinitions: [
            { attributeFilter: { key: "inventory.groups", operation: "equal", value: "grp-1" } },
          ],
        },
      ],
    },
  ],
  bindings: [{ id: "b1", roleId: "r1", groupIds: ["g1"], scope: { type: "workspace", id: "ws1" } }],
};

// ============================================================================
// Engine reconciliation
// ============================================================================

describe("RelationSyncEngine reconciliation", () => {
  test("a corrupted store converges to canonical in one pass", async () => {
    const { source, store, engine } = setup(scopedSnapshot);
    await syncAll(engine, source);
    const canonical = store.snapshot();
    const userGrant = canonical.filter((r) => r.relation === "user_grant");
    expect(userGrant.size).toBe(1);

    const outsider = parseRelationship("group:outsider#member@user:x");
    store.seed([
      ...canonical.difference(userGrant),
      parseRelationship("role:r1_bogus#inventory_hosts_read@user:*"),
      outsider,
    ]);

    const report = await engine.forceReconcile("all");

    expect(report.checked).toBe(3);
    expect(report.drifted).toBe(2);
    expect(report.repaired).toBe(2);
    expect(report.failed).toBe(0);
    expect(report.outcomes.filter((o) => o.drift).map((o) => refKey(o.ref)).sort()).toEqual([
      "role/r1",
      "role_binding/b1",
    ]);
    expect(store.snapshot().toStrings()).toEqual(
      canonical.union(new RelationshipSet([outsider])).toStrings(),
    );

    const again = await engine.forceReconcile("all");
    expect(again.drifted).toBe(0);
  });

  test("removes tuples of an object deleted without notification", async () => {
    const { source, store, engine } = setup({
      groups: [
        { id: "g1", principals: ["alice"] },
        { id: "g2", principals: ["bob"] },
      ],
    });
    await syncAll(engine, source);
    source.deleteGroup("g2");

    const report = await engine.forceReconcile("all");

    expect(report.checked).toBe(2);
    expect(report.repaired).toBe(1);
    const orphan = report.outcomes.find((o) => o.ref.id === "g2");
    expect(orphan).toEqual({ ref: domainRef("group", "g2"), status: "deleted", added: 0, removed: 1, drift: true });
    expect(store.snapshot().toStrings()).toEqual(["group:g1#member@user:alice"]);
    expect(await engine.getRecord(domainRef("group", "g2"))).toBeUndefined();
  });

  test("an unreadable store fails the object instead of throwing", async () => {
    const { source, store, engine } = setup({ groups: [{ id: "g1", principals: ["alice"] }] });
    await syncAll(engine, source);
    store.hooks.before = (call) => {
      if (call.op === "read") throw new Error("connection reset");
    };

    const report = await engine.forceReconcile(domainRef("group", "g1"));

    expect(report.checked).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.outcomes[0].error).toBeInstanceOf(SyncUnavailableError);
    expect(report.outcomes[0].error?.message).toBe(
      "Relationship store unavailable after 1 attempts: connection reset",
    );
    const record = await engine.getRecord(domainRef("group", "g1"));
    expect(record?.status).toBe("failed");
  });

  test("an unknown object with nothing in the store stays untracked", async () => {
    const { engine } = setup({});

    const report = await engine.forceReconcile(domainRef("workspace", "nowhere"));

    expect(report.outcomes).toEqual([
      { ref: domainRef("workspace", "nowhere"), status: "untracked", added: 0, removed: 0, drift: false },
    ]);
    expect(report.drifted).toBe(0);
  });
});

// ============================================================================
// Reconciler
// ============================================================================

describe("Reconciler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("overlapping passes join the running one", async () => {
    const gate = deferred();
    const target: ReconcileTarget = {
      trackedRefs: vi.fn(async () => {
        await gate.promise;
        return [domainRef("group", "a")];
      }),
      reconcile: vi.fn(async (ref: DomainObjectRef) => synced(ref)),
    };
    const reconciler = new Reconciler(target);

    const first = reconciler.runPass();
    const second = reconciler.runPass();

    expect(second).toBe(first);
    expect(reconciler.isRunning).toBe(true);
    gate.resolve();
    expect((await first).checked).toBe(1);
    expect(reconciler.isRunning).toBe(false);
    expect(target.trackedRefs).toHaveBeenCalledTimes(1);
  });

  test("a crashing object is counted as failed and logged", async () => {
    const logger = createLogger();
    const target: ReconcileTarget = {
      trackedRefs: async () => [domainRef("group", "a"), domainRef("group", "b")],
      reconcile: async (ref) => {
        if (ref.id === "a") throw new TypeError("boom");
        return synced(ref);
      },
    };

    const report = await new Reconciler(target, { logger }).runPass();

    expect(report.failed).toBe(1);
    expect(report.checked).toBe(2);
    expect(logger.errors).toEqual(["rbac-sync: reconcile of group/a crashed: TypeError: boom"]);
    expect(logger.infos).toEqual([
      "rbac-sync: reconcile pass checked 2 objects (drifted 0, repaired 0, failed 1)",
    ]);
  });

  test("limits objects reconciled in parallel", async () => {
    let active = 0;
    let peak = 0;
    const refs = ["a", "b", "c", "d", "e"].map((id) => domainRef("group", id));
    const target: ReconcileTarget = {
      trackedRefs: async () => refs,
      reconcile: async (ref) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active--;
        return synced(ref);
      },
    };

    const report = await new Reconciler(target, { concurrency: 2 }).runPass();

    expect(report.outcomes.map((o) => o.ref.id)).toEqual(["a", "b", "c", "d", "e"]);
    expect(peak).toBe(2);
  });

  test("runs on its interval until stopped", async () => {
    vi.useFakeTimers();
    const target: ReconcileTarget = {
      trackedRefs: vi.fn(async () => []),
      reconcile: vi.fn(async (ref: DomainObjectRef) => synced(ref)),
    };
    const reconciler = new Reconciler(target, { intervalMs: 1000 });

    reconciler.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(target.trackedRefs).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1000);
    expect(target.trackedRefs).toHaveBeenCalledTimes(2);

    reconciler.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(target.trackedRefs).toHaveBeenCalledTimes(2);
  });
});
