/**
 * Shared CLI command registration for rbac-sync.
 *
 * Used by the standalone CLI (bin/rbac-sync.ts); a host process embedding the
 * service can mount the same commands under its own program.
 */

import type { Command } from "commander";

import type { RbacSyncConfig } from "./config.js";
import { describeDelta } from "./differ.js";
import { type DomainObjectRef, DOMAIN_KINDS, domainRef, isDomainKind, refKey } from "./domain.js";
import type { RelationSyncEngine } from "./engine.js";
import type { RbacSource } from "./rbac-source.js";
import type { ReconcileReport, SyncOutcome } from "./reconciler.js";
import { type SpiceDbClient, loadBundledSchema } from "./spicedb.js";
import { translate } from "./translator.js";
import { formatRelationship, parseObjectReference, parseSubjectReference } from "./tuples.js";

// ============================================================================
// CLI Context
// ============================================================================

export type CliContext = {
  engine: RelationSyncEngine;
  source: RbacSource;
  spicedb: Pick<SpiceDbClient, "readSchema" | "writeSchema" | "checkPermission">;
  cfg: RbacSyncConfig;
};

export function parseDomainRef(kind: string, id: string): DomainObjectRef {
  if (!isDomainKind(kind)) {
    throw new Error(`Unknown domain object kind "${kind}" (expected one of: ${DOMAIN_KINDS.join(", ")})`);
  }
  return domainRef(kind, id);
}

export function formatOutcome(outcome: SyncOutcome): string {
  const line = `${refKey(outcome.ref)}: ${outcome.status} (+${outcome.added}/-${outcome.removed})`;
  return outcome.error ? `${line} ${outcome.error.message}` : line;
}

function printReport(report: ReconcileReport): void {
  console.log(
    `Checked ${report.checked} objects: ${report.drifted} drifted, ${report.repaired} repaired, ${report.failed} failed.`,
  );
  for (const outcome of report.outcomes) {
    if (outcome.drift || outcome.status === "failed") {
      console.log(`  ${formatOutcome(outcome)}`);
    }
  }
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerCommands(cmd: Command, ctx: CliContext): void {
  const { engine, source, spicedb, cfg } = ctx;

  cmd
    .command("status")
    .description("Check SpiceDB connectivity and schema")
    .action(async () => {
      try {
        const schema = await spicedb.readSchema();
        console.log(`SpiceDB: OK (${cfg.spicedb.endpoint})`);
        console.log(`Schema:  ${schema ? "present" : "missing (run schema-write)"}`);
      } catch (err) {
        console.log(`SpiceDB: UNREACHABLE (${cfg.spicedb.endpoint})`);
        console.log(`  ${err instanceof Error ? err.message : String(err)}`);
      }
    });

  cmd
    .command("schema-write")
    .description("Write/update SpiceDB authorization schema")
    .action(async () => {
      await spicedb.writeSchema(loadBundledSchema());
      console.log("SpiceDB schema written successfully.");
    });

  cmd
    .command("translate")
    .description("Print the canonical relationships for a domain object")
    .argument("<kind>", `Domain object kind (${DOMAIN_KINDS.join("|")})`)
    .argument("<id>", "Domain object ID")
    .action(async (kind: string, id: string) => {
      const ref = parseDomainRef(kind, id);
      const state = await source.load(ref);
      if (!state) {
        console.log(`No such ${ref.kind}: ${ref.id}`);
        return;
      }
      const tuples = translate(state);
      if (tuples.size === 0) {
        console.log(`${refKey(ref)} translates to no relationships.`);
        return;
      }
      for (const rel of tuples.toArray()) {
        console.log(formatRelationship(rel));
      }
    });

  cmd
    .command("sync")
    .description("Sync a domain object and its dependents to SpiceDB")
    .argument("<kind>", `Domain object kind (${DOMAIN_KINDS.join("|")})`)
    .argument("<id>", "Domain object ID")
    .action(async (kind: string, id: string) => {
      const outcomes = await engine.onDomainObjectChanged(parseDomainRef(kind, id));
      for (const outcome of outcomes) {
        console.log(formatOutcome(outcome));
      }
    });

  cmd
    .command("reconcile")
    .description("Repair drift for one domain object, or all of them")
    .argument("[kind]", `Domain object kind (${DOMAIN_KINDS.join("|")})`)
    .argument("[id]", "Domain object ID")
    .action(async (kind: string | undefined, id: string | undefined) => {
      if (kind !== undefined && id === undefined) {
        throw new Error("reconcile needs both <kind> and <id>, or neither");
      }
      const target = kind !== undefined && id !== undefined ? parseDomainRef(kind, id) : "all";
      printReport(await engine.forceReconcile(target));
    });

  cmd
    .command("drift")
    .description("Show drift between RBAC state and SpiceDB without repairing it")
    .argument("<kind>", `Domain object kind (${DOMAIN_KINDS.join("|")})`)
    .argument("<id>", "Domain object ID")
    .action(async (kind: string, id: string) => {
      const report = await engine.checkDrift(parseDomainRef(kind, id));
      const key = refKey(report.ref);
      if (report.delta.add.size === 0 && report.delta.remove.size === 0) {
        console.log(`No drift for ${key}.`);
        return;
      }
      console.log(`Drift for ${key} (${describeDelta(report.delta)}):`);
      for (const rel of report.delta.add.toArray()) {
        console.log(`  missing     ${formatRelationship(rel)}`);
      }
      for (const rel of report.delta.remove.toArray()) {
        console.log(`  unexpected  ${formatRelationship(rel)}`);
      }
    });

  cmd
    .command("record")
    .description("Show the sync record for a domain object")
    .argument("<kind>", `Domain object kind (${DOMAIN_KINDS.join("|")})`)
    .argument("<id>", "Domain object ID")
    .action(async (kind: string, id: string) => {
      const ref = parseDomainRef(kind, id);
      const record = await engine.getRecord(ref);
      if (!record) {
        console.log(`${refKey(ref)} is not tracked.`);
        return;
      }
      console.log(`${refKey(ref)}: ${record.status}`);
      console.log(`  relationships: ${record.lastAppliedSet.size}`);
      console.log(`  last synced:   ${record.lastSyncedAt ? record.lastSyncedAt.toISOString() : "never"}`);
      if (record.lastError) {
        console.log(`  last error:    ${record.lastError} (${record.failures} consecutive failures)`);
      }
    });

  cmd
    .command("check")
    .description("Check a permission in SpiceDB (fully consistent)")
    .argument("<resource>", "Resource, e.g. workspace:ws1")
    .argument("<permission>", "Permission or relation name")
    .argument("<subject>", "Subject, e.g. user:alice or group:eng#member")
    .action(async (resource: string, permission: string, subject: string) => {
      const res = parseObjectReference(resource);
      const sub = parseSubjectReference(subject);
      const allowed = await spicedb.checkPermission({
        resourceType: res.type,
        resourceId: res.id,
        permission,
        subjectType: sub.object.type,
        subjectId: sub.object.id,
        ...(sub.relation ? { subjectRelation: sub.relation } : {}),
        consistency: { mode: "full" },
      });
      console.log(allowed ? "ALLOWED" : "DENIED");
    });
}
