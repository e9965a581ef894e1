import { ValidationError, describeError, logger as defaultLogger, type Logger } from "@harvest-hub/core";

import {
  MigrationLedger,
  getAllMigrations,
  type MigrationRunResult,
  type MigrationStatus,
  type MigrationStep
} from "./migrations";
import {
  SchemaVerifier,
  type DatabaseInfo,
  type SchemaVerification
} from "./schema-verifier";
import { ensureCreated, resolveDefaultSchemaFile, type StoreHandle } from "./store";

export type DatabaseManagerOptions = {
  logger?: Logger;
  steps?: readonly MigrationStep[];
  schemaFile?: string;
  now?: () => Date;
};

export type InitializeOptions = {
  /** Reports what would run without creating tables or applying steps. */
  dryRun?: boolean;
};

export type InitializeResult = {
  dryRun: boolean;
  migrations: MigrationRunResult;
  verification: SchemaVerification;
};

export type DatabaseStatus = {
  database: DatabaseInfo;
  migrations: MigrationStatus;
  schema: SchemaVerification;
  rowCounts: Record<string, number>;
};

/** Operator-facing text report; one fact per line. */
export function formatStatusReport(status: DatabaseStatus): string {
  const { database, migrations, schema } = status;
  const lines = [
    `Database: ${database.path}`,
    `Exists: ${database.exists ? "yes" : "no"}`,
    `Size: ${database.sizeKb} KB`,
    `Tables: ${database.tables.length}`,
    `Migrations applied: ${migrations.appliedCount}${
      migrations.appliedVersions.length > 0 ? ` (${migrations.appliedVersions.join(", ")})` : ""
    }`,
    `Pending migrations: ${
      migrations.pendingVersions.length > 0 ? migrations.pendingVersions.join(", ") : "none"
    }`,
    `Schema: ${schema.valid ? "valid" : "invalid"}`
  ];
  for (const table of schema.missingTables) {
    lines.push(`  missing table: ${table}`);
  }
  for (const [table, columns] of Object.entries(schema.missingColumns)) {
    for (const column of columns) {
      lines.push(`  missing column: ${table}.${column}`);
    }
  }
  const counted = Object.entries(status.rowCounts);
  if (counted.length > 0) {
    lines.push("Row counts:");
    for (const [table, count] of counted) {
      lines.push(`  ${table}: ${count}`);
    }
  }
  return lines.join("\n");
}

/** Brings a store up to date: create missing tables, run pending steps, verify. */
export class DatabaseManager {
  private readonly handle: StoreHandle;
  private readonly log: Logger;
  private readonly steps: readonly MigrationStep[];
  private readonly schemaFile: string;
  private readonly ledger: MigrationLedger;
  private readonly verifier: SchemaVerifier;

  constructor(handle: StoreHandle, options: DatabaseManagerOptions = {}) {
    this.handle = handle;
    this.log = options.logger ?? defaultLogger;
    this.steps = options.steps ?? getAllMigrations();
    this.schemaFile = options.schemaFile ?? resolveDefaultSchemaFile();
    this.ledger = new MigrationLedger(handle, { logger: this.log, now: options.now });
    this.verifier = new SchemaVerifier(handle);
  }

  /** Throws the step's MigrationFailure after logging it; nothing after that step runs. */
  initialize(options: InitializeOptions = {}): InitializeResult {
    const dryRun = options.dryRun ?? false;
    if (!dryRun) {
      ensureCreated(this.handle, this.schemaFile, this.log);
    }

    const migrations = this.ledger.runPending(this.steps, { dryRun });
    if (migrations.failure) {
      this.log.error("Database initialization failed", {
        path: this.handle.path,
        version: migrations.failure.version,
        error: describeError(migrations.failure.cause)
      });
      throw migrations.failure;
    }

    const verification = this.verifier.verifySchema();
    if (!verification.valid) {
      this.log.warn("Schema verification failed", {
        path: this.handle.path,
        missingTables: verification.missingTables,
        missingColumns: verification.missingColumns
      });
    }

    this.log.info(dryRun ? "Database initialization dry run finished" : "Database initialized", {
      path: this.handle.path,
      migrations: Object.fromEntries(migrations.results),
      schemaValid: verification.valid
    });
    return { dryRun, migrations, verification };
  }

  getStatus(): DatabaseStatus {
    return {
      database: this.verifier.getDatabaseInfo(),
      migrations: this.ledger.getStatus(this.steps),
      schema: this.verifier.verifySchema(),
      rowCounts: this.verifier.getRowCounts()
    };
  }

  formatStatusReport(status: DatabaseStatus = this.getStatus()): string {
    return formatStatusReport(status);
  }

  revert(version: string): void {
    const step = this.steps.find((candidate) => candidate.version === version);
    if (!step) {
      throw new ValidationError(`Unknown migration version: ${version}`);
    }
    this.ledger.revert(step);
  }

  get migrationSteps(): readonly MigrationStep[] {
    return this.steps;
  }

  get migrationLedger(): MigrationLedger {
    return this.ledger;
  }

  get schemaVerifier(): SchemaVerifier {
    return this.verifier;
  }
}
