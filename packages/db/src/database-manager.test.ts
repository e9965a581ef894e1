import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { MigrationFailure, ValidationError, createLogger, type LogEntry } from "@harvest-hub/core";
import { afterEach, describe, expect, it } from "vitest";

import { DatabaseManager, formatStatusReport, type DatabaseStatus } from "./database-manager";
import { TENANT_INDEX_NAMES, getAllMigrations, indexExists, tableExists } from "./migrations";
import { closeStore, openStore, type StoreHandle } from "./store";

const tempRoots: string[] = [];
const handles: StoreHandle[] = [];
const quiet = createLogger({ sink: () => undefined });

function openTempStore(): StoreHandle {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-manager-"));
  tempRoots.push(dir);
  const handle = openStore({ location: path.join(dir, "hub.db"), logger: quiet });
  handles.push(handle);
  return handle;
}

describe("formatStatusReport", () => {
  it("renders one fact per line", () => {
    const status: DatabaseStatus = {
      database: {
        path: "/srv/hub/hub.db",
        exists: true,
        sizeKb: 84.5,
        tables: ["customers", "orders", "schema_migrations"]
      },
      migrations: { appliedCount: 2, appliedVersions: ["001", "002"], pendingVersions: ["003"] },
      schema: {
        valid: false,
        missingTables: ["goals"],
        extraTables: [],
        missingColumns: { orders: ["notes", "updated_at"] }
      },
      rowCounts: { customers: 3, orders: 0 }
    };

    expect(formatStatusReport(status).split("\n")).toEqual([
      "Database: /srv/hub/hub.db",
      "Exists: yes",
      "Size: 84.5 KB",
      "Tables: 3",
      "Migrations applied: 2 (001, 002)",
      "Pending migrations: 003",
      "Schema: invalid",
      "  missing table: goals",
      "  missing column: orders.notes",
      "  missing column: orders.updated_at",
      "Row counts:",
      "  customers: 3",
      "  orders: 0"
    ]);
  });

  it("says none when nothing is pending", () => {
    const report = formatStatusReport({
      database: { path: "/srv/hub/hub.db", exists: false, sizeKb: 0, tables: [] },
      migrations: { appliedCount: 0, appliedVersions: [], pendingVersions: [] },
      schema: { valid: true, missingTables: [], extraTables: [], missingColumns: {} },
      rowCounts: {}
    });

    expect(report).toBe(
      [
        "Database: /srv/hub/hub.db",
        "Exists: no",
        "Size: 0 KB",
        "Tables: 0",
        "Migrations applied: 0",
        "Pending migrations: none",
        "Schema: valid"
      ].join("\n")
    );
  });
});

describe("DatabaseManager", () => {
  afterEach(() => {
    for (const handle of handles.splice(0)) {
      closeStore(handle);
    }
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("creates tables, applies every step and verifies the result", () => {
    const handle = openTempStore();
    const entries: LogEntry[] = [];
    const manager = new DatabaseManager(handle, {
      logger: createLogger({ sink: (entry) => entries.push(entry) })
    });

    const result = manager.initialize();

    expect(result.dryRun).toBe(false);
    expect([...result.migrations.results.entries()]).toEqual([
      ["001", true],
      ["002", true],
      ["003", true],
      ["004", true],
      ["005", true]
    ]);
    expect(result.verification.valid).toBe(true);
    for (const name of TENANT_INDEX_NAMES) {
      expect(indexExists(handle.db, name)).toBe(true);
    }
    expect(entries.at(-1)).toMatchObject({
      level: "info",
      message: "Database initialized",
      path: handle.path,
      migrations: { "001": true, "002": true, "003": true, "004": true, "005": true },
      schemaValid: true
    });
  });

  it("is idempotent", () => {
    const handle = openTempStore();
    const manager = new DatabaseManager(handle, { logger: quiet });

    manager.initialize();
    const second = manager.initialize();

    expect(second.verification.valid).toBe(true);
    expect(manager.getStatus().migrations).toEqual({
      appliedCount: 5,
      appliedVersions: ["001", "002", "003", "004", "005"],
      pendingVersions: []
    });
  });

  it("creates nothing on a dry run", () => {
    const handle = openTempStore();
    const manager = new DatabaseManager(handle, { logger: quiet });

    const result = manager.initialize({ dryRun: true });

    expect(result.dryRun).toBe(true);
    expect([...result.migrations.results.keys()]).toEqual(["001", "002", "003", "004", "005"]);
    expect(result.verification.valid).toBe(false);
    expect(result.verification.missingTables).toContain("customers");
    expect(tableExists(handle.db, "customers")).toBe(false);
    expect(tableExists(handle.db, "schema_migrations")).toBe(false);
  });

  it("throws the failing step and logs it", () => {
    const handle = openTempStore();
    const entries: LogEntry[] = [];
    const manager = new DatabaseManager(handle, {
      logger: createLogger({ sink: (entry) => entries.push(entry) }),
      steps: [
        ...getAllMigrations(),
        {
          version: "006",
          description: "broken",
          apply: () => {
            throw new Error("boom");
          },
          revert: () => undefined
        }
      ]
    });

    expect(() => manager.initialize()).toThrowError(MigrationFailure);
    expect(entries.find((entry) => entry.message === "Database initialization failed")).toMatchObject({
      level: "error",
      version: "006"
    });
    expect(manager.getStatus().migrations.pendingVersions).toEqual(["006"]);
  });

  it("reverts a known step and leaves it pending", () => {
    const handle = openTempStore();
    const manager = new DatabaseManager(handle, { logger: quiet });
    manager.initialize();

    manager.revert("003");

    expect(indexExists(handle.db, "idx_customers_business_id")).toBe(false);
    expect(manager.getStatus().migrations.pendingVersions).toEqual(["003"]);
  });

  it("rejects an unknown version", () => {
    const manager = new DatabaseManager(openTempStore(), { logger: quiet });

    expect(() => manager.revert("042")).toThrowError(
      new ValidationError("Unknown migration version: 042")
    );
  });

  it("reports status with row counts", () => {
    const handle = openTempStore();
    const manager = new DatabaseManager(handle, { logger: quiet });
    manager.initialize();

    const lines = manager.formatStatusReport().split("\n");

    expect(lines[0]).toBe(`Database: ${handle.path}`);
    expect(lines).toContain("Migrations applied: 5 (001, 002, 003, 004, 005)");
    expect(lines).toContain("Pending migrations: none");
    expect(lines).toContain("Schema: valid");
    expect(lines).toContain("  schema_migrations: 5");
  });
});
