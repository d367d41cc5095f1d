import { backoffDelay } from "./executor.js";

export type RbacSyncConfig = {
  spicedb: {
    endpoint: string;
    token: string;
    insecure: boolean;
  };
  sync: {
    batchSize: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    callTimeoutMs: number;
    translationAttempts: number;
  };
  reconcile: {
    enabled: boolean;
    intervalMs: number;
    concurrency: number;
  };
};

const DEFAULT_SPICEDB_ENDPOINT = "localhost:50051";

export const DEFAULT_SYNC: RbacSyncConfig["sync"] = {
  batchSize: 1000,
  maxAttempts: 5,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  callTimeoutMs: 10_000,
  translationAttempts: 3,
};

export const DEFAULT_RECONCILE: RbacSyncConfig["reconcile"] = {
  enabled: true,
  intervalMs: 300_000,
  concurrency: 4,
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function assertAllowedKeys(value: Record<string, unknown>, allowed: string[], label: string) {
  const unknown = Object.keys(value).filter((key) => !allowed.includes(key));
  if (unknown.length > 0) {
    throw new Error(`${label} has unknown keys: ${unknown.join(", ")}`);
  }
}

function section(cfg: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = cfg[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`${key} config must be an object`);
  }
  return value;
}

/** Integer at or above `min`, or the default when absent. */
function intOption(
  obj: Record<string, unknown>,
  key: string,
  fallback: number,
  label: string,
  min = 1,
): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new Error(`${label}.${key} must be an integer >= ${min}`);
  }
  return value;
}

export const rbacSyncConfigSchema = {
  parse(value: unknown): RbacSyncConfig {
    if (!isRecord(value)) {
      throw new Error("rbac-sync config required");
    }
    assertAllowedKeys(value, ["spicedb", "sync", "reconcile"], "rbac-sync config");

    // SpiceDB config
    const spicedb = section(value, "spicedb");
    if (spicedb.token !== undefined && typeof spicedb.token !== "string") {
      throw new Error("spicedb.token must be a string");
    }
    assertAllowedKeys(spicedb, ["endpoint", "token", "insecure"], "spicedb config");

    // Sync config
    const sync = section(value, "sync");
    assertAllowedKeys(sync, Object.keys(DEFAULT_SYNC), "sync config");
    const baseDelayMs = intOption(sync, "baseDelayMs", DEFAULT_SYNC.baseDelayMs, "sync", 0);
    const maxDelayMs = intOption(sync, "maxDelayMs", DEFAULT_SYNC.maxDelayMs, "sync", 0);
    if (maxDelayMs < baseDelayMs) {
      throw new Error("sync.maxDelayMs must not be below sync.baseDelayMs");
    }

    // Reconcile config
    const reconcile = section(value, "reconcile");
    assertAllowedKeys(reconcile, Object.keys(DEFAULT_RECONCILE), "reconcile config");

    return {
      spicedb: {
        endpoint:
          typeof spicedb.endpoint === "string"
            ? resolveEnvVars(spicedb.endpoint)
            : DEFAULT_SPICEDB_ENDPOINT,
        token: typeof spicedb.token === "string" ? resolveEnvVars(spicedb.token) : "",
        insecure: spicedb.insecure !== false,
      },
      sync: {
        batchSize: intOption(sync, "batchSize", DEFAULT_SYNC.batchSize, "sync"),
        maxAttempts: intOption(sync, "maxAttempts", DEFAULT_SYNC.maxAttempts, "sync"),
        baseDelayMs,
        maxDelayMs,
        callTimeoutMs: intOption(sync, "callTimeoutMs", DEFAULT_SYNC.callTimeoutMs, "sync", 0),
        translationAttempts: intOption(
          sync,
          "translationAttempts",
          DEFAULT_SYNC.translationAttempts,
          "sync",
        ),
      },
      reconcile: {
        enabled: reconcile.enabled !== false,
        intervalMs: intOption(reconcile, "intervalMs", DEFAULT_RECONCILE.intervalMs, "reconcile"),
        concurrency: intOption(
          reconcile,
          "concurrency",
          DEFAULT_RECONCILE.concurrency,
          "reconcile",
        ),
      },
    };
  },
};

/**
 * How long SpiceDB can lag RBAC after an event is lost or its sync fails,
 * while the reconciler is enabled: one reconcile interval, plus the retry
 * budget (every attempt timing out, with the backoff between attempts) of
 * the store call that repairs it. A pass over many objects adds the time
 * spent on the objects ahead of it. Null when nothing bounds the lag.
 */
export function repairLagBoundMs(cfg: RbacSyncConfig): number | null {
  const { maxAttempts, callTimeoutMs } = cfg.sync;
  if (!cfg.reconcile.enabled || callTimeoutMs === 0) return null;
  let budget = maxAttempts * callTimeoutMs;
  for (let attempt = 1; attempt < maxAttempts; attempt++) {
    budget += backoffDelay(cfg.sync, attempt);
  }
  return cfg.reconcile.intervalMs + budget;
}
