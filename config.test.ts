import { describe, test, expect, afterEach } from "vitest";
import { rbacSyncConfigSchema, repairLagBoundMs } from "./config.js";

describe("rbacSyncConfigSchema", () => {
  afterEach(() => {
    delete process.env.TEST_SPICEDB_TOKEN;
    delete process.env.TEST_SPICEDB_HOST;
  });

  test("parses valid full config", () => {
    const config = rbacSyncConfigSchema.parse({
      spicedb: {
        endpoint: "spicedb.internal:50051",
        token: "test-secret",
        insecure: false,
      },
      sync: {
        batchSize: 250,
        maxAttempts: 3,
        baseDelayMs: 50,
        maxDelayMs: 1000,
        callTimeoutMs: 0,
        translationAttempts: 2,
      },
      reconcile: {
        enabled: false,
        intervalMs: 60_000,
        concurrency: 8,
      },
    });

    expect(config.spicedb).toEqual({
      endpoint: "spicedb.internal:50051",
      token: "test-secret",
      insecure: false,
    });
    expect(config.sync).toEqual({
      batchSize: 250,
      maxAttempts: 3,
      baseDelayMs: 50,
      maxDelayMs: 1000,
      callTimeoutMs: 0,
      translationAttempts: 2,
    });
    expect(config.reconcile).toEqual({ enabled: false, intervalMs: 60_000, concurrency: 8 });
  });

  test("applies defaults for optional fields", () => {
    const config = rbacSyncConfigSchema.parse({
      spicedb: { token: "tok" },
    });

    expect(config.spicedb.endpoint).toBe("localhost:50051");
    expect(config.spicedb.insecure).toBe(true);
    expect(config.sync).toEqual({
      batchSize: 1000,
      maxAttempts: 5,
      baseDelayMs: 200,
      maxDelayMs: 5000,
      callTimeoutMs: 10_000,
      translationAttempts: 3,
    });
    expect(config.reconcile).toEqual({ enabled: true, intervalMs: 300_000, concurrency: 4 });
  });

  test("accepts empty config", () => {
    const config = rbacSyncConfigSchema.parse({});

    expect(config.spicedb.endpoint).toBe("localhost:50051");
    expect(config.spicedb.token).toBe("");
  });

  test("resolves env vars in token and endpoint", () => {
    process.env.TEST_SPICEDB_TOKEN = "test-secret";
    process.env.TEST_SPICEDB_HOST = "authz";

    const config = rbacSyncConfigSchema.parse({
      spicedb: { token: "${TEST_SPICEDB_TOKEN}", endpoint: "${TEST_SPICEDB_HOST}:50051" },
    });

    expect(config.spicedb.token).toBe("test-secret");
    expect(config.spicedb.endpoint).toBe("authz:50051");
  });

  test("throws on missing env var", () => {
    expect(() => {
      rbacSyncConfigSchema.parse({
        spicedb: { token: "${NONEXISTENT_VAR}" },
      });
    }).toThrow("Environment variable NONEXISTENT_VAR is not set");
  });

  test("throws on unknown top-level keys", () => {
    expect(() => {
      rbacSyncConfigSchema.parse({
        spicedb: { token: "tok" },
        bogusKey: true,
      });
    }).toThrow("unknown keys: bogusKey");
  });

  test("throws on unknown nested keys", () => {
    expect(() => rbacSyncConfigSchema.parse({ spicedb: { token: "tok", badField: 1 } })).toThrow(
      "spicedb config has unknown keys: badField",
    );
    expect(() => rbacSyncConfigSchema.parse({ sync: { retries: 3 } })).toThrow(
      "sync config has unknown keys: retries",
    );
    expect(() => rbacSyncConfigSchema.parse({ reconcile: { every: 10 } })).toThrow(
      "reconcile config has unknown keys: every",
    );
  });

  test("rejects invalid numeric settings", () => {
    expect(() => rbacSyncConfigSchema.parse({ sync: { batchSize: 0 } })).toThrow(
      "sync.batchSize must be an integer >= 1",
    );
    expect(() => rbacSyncConfigSchema.parse({ sync: { maxAttempts: 1.5 } })).toThrow(
      "sync.maxAttempts must be an integer >= 1",
    );
    expect(() => rbacSyncConfigSchema.parse({ reconcile: { concurrency: "4" } })).toThrow(
      "reconcile.concurrency must be an integer >= 1",
    );
  });

  test("rejects a max delay below the base delay", () => {
    expect(() =>
      rbacSyncConfigSchema.parse({ sync: { baseDelayMs: 500, maxDelayMs: 100 } }),
    ).toThrow("sync.maxDelayMs must not be below sync.baseDelayMs");
  });

  test("rejects non-object sections", () => {
    expect(() => rbacSyncConfigSchema.parse({ sync: [] })).toThrow("sync config must be an object");
  });

  test("throws on non-object input", () => {
    expect(() => rbacSyncConfigSchema.parse(null)).toThrow("config required");
    expect(() => rbacSyncConfigSchema.parse("string")).toThrow("config required");
    expect(() => rbacSyncConfigSchema.parse([])).toThrow("config required");
  });
});

describe("repairLagBoundMs", () => {
  test("one reconcile interval plus the retry budget", () => {
    // 300s interval, 5 timed-out attempts of 10s, backoff 200+400+800+1600ms.
    expect(repairLagBoundMs(rbacSyncConfigSchema.parse({}))).toBe(353_000);

    const cfg = rbacSyncConfigSchema.parse({
      sync: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 150, callTimeoutMs: 50 },
      reconcile: { intervalMs: 1000 },
    });
    expect(repairLagBoundMs(cfg)).toBe(1000 + 3 * 50 + 100 + 150);
  });

  test("unbounded without the reconciler or call timeouts", () => {
    expect(repairLagBoundMs(rbacSyncConfigSchema.parse({ reconcile: { enabled: false } }))).toBeNull();
    expect(repairLagBoundMs(rbacSyncConfigSchema.parse({ sync: { callTimeoutMs: 0 } }))).toBeNull();
  });
});
