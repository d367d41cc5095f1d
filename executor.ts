/**
 * Sync Executor
 *
 * Applies a delta to the relationship store:
 * - additions are TOUCH writes, removals are delete-if-exists, so any batch
 *   can be re-issued safely;
 * - every addition batch is confirmed before the first removal batch goes
 *   out, so a replaced grant never leaves a window with no grant at all;
 * - transient failures are retried with capped exponential backoff, then
 *   surface as SyncUnavailableError;
 * - rejected batches are bisected down to the offending tuple, which
 *   surfaces as SyncRejectedError.
 *
 * Errors carry the confirmed progress so a caller can resume with only the
 * unconfirmed remainder.
 *
 * A call that outlives its timeout is retried, but the store may still apply
 * it. apply() does not settle until every such call has finished, so the
 * next delta for the same object cannot be overtaken by a stale write.
 */

import type { Delta } from "./differ.js";
import {
  StoreRejectedError,
  StoreUnavailableError,
  SyncRejectedError,
  SyncUnavailableError,
  type SyncProgress,
  describeCause,
} from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import type { RelationStore } from "./relation-store.js";
import type { Relationship } from "./tuples.js";

// ============================================================================
// Types
// ============================================================================

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type ExecutorOptions = {
  /** Max relationships per store request. */
  batchSize?: number;
  retry?: Partial<RetryPolicy>;
  /** Per store call; 0 disables. */
  callTimeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type Applied = {
  added: number;
  removed: number;
  batches: number;
};

type Operation = "write" | "delete";

type Attempt = {
  progress: SyncProgress;
  /** Calls that timed out but may still reach the store. */
  abandoned: Promise<void>[];
};

export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_RETRY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 200,
  maxDelayMs: 5000,
};
export const DEFAULT_CALL_TIMEOUT_MS = 10_000;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

// ============================================================================
// Executor
// ============================================================================

export class SyncExecutor {
  private readonly batchSize: number;
  private readonly retry: RetryPolicy;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly store: RelationStore,
    options: ExecutorOptions = {},
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async apply(delta: Delta): Promise<Applied> {
    const state: Attempt = { progress: { added: [], removed: [] }, abandoned: [] };
    let batches = 0;

    try {
      // Grants first, revokes only once every grant is confirmed.
      for (const batch of chunk(delta.add.toArray(), this.batchSize)) {
        await this.submit("write", batch, state);
        batches++;
      }
      for (const batch of chunk(delta.remove.toArray(), this.batchSize)) {
        await this.submit("delete", batch, state);
        batches++;
      }
    } finally {
      if (state.abandoned.length > 0) {
        this.logger.debug?.(
          `rbac-sync: waiting for ${state.abandoned.length} timed-out calls to settle`,
        );
        await Promise.all(state.abandoned);
      }
    }

    return { added: delta.add.size, removed: delta.remove.size, batches };
  }

  private async submit(op: Operation, batch: Relationship[], state: Attempt): Promise<void> {
    const { progress } = state;
    for (let attempt = 1; ; attempt++) {
      try {
        await this.call(op, batch, state.abandoned);
        (op === "write" ? progress.added : progress.removed).push(...batch);
        return;
      } catch (err) {
        if (err instanceof StoreRejectedError) {
          if (batch.length === 1) {
            throw new SyncRejectedError(batch[0], snapshot(progress), err);
          }
          // Narrow the rejection down to a single tuple.
          const mid = Math.ceil(batch.length / 2);
          await this.submit(op, batch.slice(0, mid), state);
          await this.submit(op, batch.slice(mid), state);
          return;
        }
        if (attempt >= this.retry.maxAttempts) {
          throw new SyncUnavailableError(attempt, snapshot(progress), err);
        }
        const delay = backoffDelay(this.retry, attempt);
        this.logger.warn(
          `rbac-sync: ${op} of ${batch.length} relationships failed (attempt ${attempt}/${this.retry.maxAttempts}), retrying in ${delay}ms: ${describeCause(err)}`,
        );
        await this.sleep(delay);
      }
    }
  }

  private async call(op: Operation, batch: Relationship[], abandoned: Promise<void>[]): Promise<void> {
    const pending =
      op === "write"
        ? this.store.writeRelationships(true, batch)
        : this.store.deleteRelationships(batch);

    if (this.callTimeoutMs <= 0) {
      await pending;
      return;
    }

    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const settled = pending.then(
      () => undefined,
      (err: unknown) => {
        if (!timedOut) throw err;
        // The call already counted as failed; re-issuing it is idempotent.
        this.logger.warn(`rbac-sync: ${op} failed after timing out: ${describeCause(err)}`);
      },
    );
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        abandoned.push(settled);
        reject(new StoreUnavailableError(`${op} timed out after ${this.callTimeoutMs}ms`));
      }, this.callTimeoutMs);
    });

    try {
      await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function snapshot(progress: SyncProgress): SyncProgress {
  return { added: [...progress.added], removed: [...progress.removed] };
}
