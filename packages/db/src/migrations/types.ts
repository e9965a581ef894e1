import type { MigrationFailure } from "@harvest-hub/core";
import type Database from "better-sqlite3";

export type MigrationStep = {
  /** Ordered, unique token such as "001". */
  version: string;
  description: string;
  /**
   * Table rebuilds drop and recreate parents of foreign keys. Such steps run with
   * foreign key enforcement off and must pass `PRAGMA foreign_key_check` before commit.
   */
  disableForeignKeys?: boolean;
  apply(db: Database.Database): void;
  /** Throws NotSupportedError when no safe rollback exists. */
  revert(db: Database.Database): void;
};

export type MigrationRecord = {
  version: string;
  description: string | null;
  appliedAt: string;
};

export type MigrationRunResult = {
  /** Outcome per attempted version, in run order. Versions after a failure are absent. */
  results: Map<string, boolean>;
  failure: MigrationFailure | null;
};

export type MigrationStatus = {
  appliedCount: number;
  appliedVersions: string[];
  pendingVersions: string[];
};
