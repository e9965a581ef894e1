import {
  MigrationFailure,
  NotSupportedError,
  ValidationError,
  describeError,
  logger as defaultLogger,
  type Logger
} from "@harvest-hub/core";
import type Database from "better-sqlite3";

import type { StoreHandle } from "../store";
import { tableExists } from "./operations";
import type { MigrationRecord, MigrationRunResult, MigrationStatus, MigrationStep } from "./types";

const MIGRATIONS_TABLE = "schema_migrations";

export type MigrationLedgerOptions = {
  logger?: Logger;
  now?: () => Date;
};

export type RunPendingOptions = {
  dryRun?: boolean;
};

export function compareVersions(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}

function sortSteps(steps: readonly MigrationStep[], log: Logger): MigrationStep[] {
  const seen = new Set<string>();
  for (const step of steps) {
    if (seen.has(step.version)) {
      log.error("Duplicate migration version", { version: step.version, description: step.description });
      throw new ValidationError(`Duplicate migration version: ${step.version}`);
    }
    seen.add(step.version);
  }
  return [...steps].sort((a, b) => compareVersions(a.version, b.version));
}

type ForeignKeyViolation = {
  table: string;
  rowid: number | null;
  parent: string;
};

/**
 * Records which schema steps have run and applies the rest, one transaction per
 * step, stopping at the first failure so later steps never run on a partial schema.
 */
export class MigrationLedger {
  private readonly db: Database.Database;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(handle: StoreHandle, options: MigrationLedgerOptions = {}) {
    this.db = handle.db;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  ensureLedgerTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
        version VARCHAR(50) PRIMARY KEY,
        description TEXT,
        applied_at TEXT NOT NULL
      );
    `);
  }

  appliedVersions(): string[] {
    if (!this.db.open) {
      throw new Error("Migration ledger store handle is closed");
    }
    if (!tableExists(this.db, MIGRATIONS_TABLE)) {
      return [];
    }
    try {
      const rows = this.db
        .prepare(`SELECT version FROM ${MIGRATIONS_TABLE}`)
        .all() as Array<{ version: string }>;
      return rows.map((row) => row.version).sort(compareVersions);
    } catch (error) {
      this.log.warn("Migration ledger could not be read", { error: describeError(error) });
      return [];
    }
  }

  listRecords(): MigrationRecord[] {
    this.ensureLedgerTable();
    const rows = this.db
      .prepare(`SELECT version, description, applied_at FROM ${MIGRATIONS_TABLE}`)
      .all() as Array<{ version: string; description: string | null; applied_at: string }>;
    return rows
      .map((row) => ({ version: row.version, description: row.description, appliedAt: row.applied_at }))
      .sort((a, b) => compareVersions(a.version, b.version));
  }

  isApplied(version: string): boolean {
    return this.appliedVersions().includes(version);
  }

  record(version: string, description: string, appliedAt: Date = this.now()): void {
    this.ensureLedgerTable();
    this.db
      .prepare(
        `
          INSERT INTO ${MIGRATIONS_TABLE} (version, description, applied_at)
          VALUES (?, ?, ?)
          ON CONFLICT(version) DO UPDATE SET
            description = excluded.description,
            applied_at = excluded.applied_at
        `
      )
      .run(version, description, appliedAt.toISOString());
  }

  private assertForeignKeysIntact(): void {
    const violations = this.db.prepare("PRAGMA foreign_key_check").all() as ForeignKeyViolation[];
    if (violations.length > 0) {
      const first = violations[0];
      throw new Error(
        `Foreign key check failed: ${violations.length} violation(s), first in ${first.table} referencing ${first.parent}`
      );
    }
  }

  private applyStep(step: MigrationStep): void {
    const apply = this.db.transaction(() => {
      step.apply(this.db);
      if (step.disableForeignKeys) {
        this.assertForeignKeysIntact();
      }
      this.record(step.version, step.description);
    });

    if (!step.disableForeignKeys) {
      apply();
      return;
    }

    const enforced = this.db.pragma("foreign_keys", { simple: true }) === 1;
    this.db.pragma("foreign_keys = OFF");
    try {
      apply();
    } finally {
      if (enforced) {
        this.db.pragma("foreign_keys = ON");
      }
    }
  }

  runPending(steps: readonly MigrationStep[], options: RunPendingOptions = {}): MigrationRunResult {
    const ordered = sortSteps(steps, this.log);
    if (!options.dryRun) {
      this.ensureLedgerTable();
    }
    const applied = new Set(this.appliedVersions());
    const results = new Map<string, boolean>();

    for (const step of ordered) {
      if (applied.has(step.version)) {
        this.log.debug("Skipping applied migration", {
          version: step.version,
          description: step.description
        });
        results.set(step.version, true);
        continue;
      }

      if (options.dryRun) {
        this.log.info("Would apply migration", { version: step.version, description: step.description });
        results.set(step.version, true);
        continue;
      }

      this.log.info("Applying migration", { version: step.version, description: step.description });
      try {
        this.applyStep(step);
      } catch (error) {
        const failure = new MigrationFailure(step.version, { cause: error });
        this.log.error("Migration failed", { version: step.version, error: describeError(error) });
        results.set(step.version, false);
        return { results, failure };
      }
      this.log.info("Migration applied", { version: step.version });
      results.set(step.version, true);
    }

    return { results, failure: null };
  }

  /** Rolls back one applied step and forgets it, so the next run applies it again. */
  revert(step: MigrationStep): void {
    if (!this.isApplied(step.version)) {
      throw new ValidationError(`Migration ${step.version} is not applied`);
    }

    const revert = this.db.transaction(() => {
      step.revert(this.db);
      this.db.prepare(`DELETE FROM ${MIGRATIONS_TABLE} WHERE version = ?`).run(step.version);
    });

    try {
      revert();
    } catch (error) {
      if (error instanceof NotSupportedError) {
        this.log.warn("Migration revert not supported", {
          version: step.version,
          reason: error.message
        });
        throw error;
      }
      this.log.error("Migration revert failed", { version: step.version, error: describeError(error) });
      throw new MigrationFailure(step.version, { cause: error });
    }
    this.log.info("Migration reverted", { version: step.version });
  }

  getStatus(steps: readonly MigrationStep[]): MigrationStatus {
    const appliedVersions = this.appliedVersions();
    const applied = new Set(appliedVersions);
    return {
      appliedCount: appliedVersions.length,
      appliedVersions,
      pendingVersions: sortSteps(steps, this.log)
        .map((step) => step.version)
        .filter((version) => !applied.has(version))
    };
  }
}
