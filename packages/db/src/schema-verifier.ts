import fs from "node:fs";

import type Database from "better-sqlite3";
import { getTableConfig, type SQLiteTable } from "drizzle-orm/sqlite-core";

import { assertIdentifier, listColumns, tableExists } from "./migrations/operations";
import { catalog } from "./schema";
import type { StoreHandle } from "./store";

export type ExpectedSchema = Map<string, string[]>;

export type ForeignKeyInfo = {
  column: string;
  referencesTable: string;
  referencesColumn: string;
  onDelete: string;
};

export type IndexInfo = {
  name: string;
  unique: boolean;
  columns: string[];
};

export type TableSchema = {
  table: string;
  columns: Array<{ name: string; type: string; notNull: boolean; defaultValue: string | null }>;
  primaryKey: string[];
  foreignKeys: ForeignKeyInfo[];
  indexes: IndexInfo[];
};

export type DatabaseInfo = {
  path: string;
  exists: boolean;
  sizeKb: number;
  tables: string[];
};

export type SchemaVerification = {
  valid: boolean;
  missingTables: string[];
  extraTables: string[];
  missingColumns: Record<string, string[]>;
};

/** Table name to column names, from the drizzle declarations. */
export function expectedSchemaFromCatalog(tables: readonly SQLiteTable[] = catalog): ExpectedSchema {
  const expected: ExpectedSchema = new Map();
  for (const table of tables) {
    const config = getTableConfig(table);
    expected.set(
      config.name,
      config.columns.map((column) => column.name)
    );
  }
  return expected;
}

type ForeignKeyRow = { table: string; from: string; to: string; on_delete: string };
type IndexListRow = { name: string; unique: number; origin: string };
type IndexColumnRow = { name: string | null };

/** Read-only inspection of the live store against the declared catalogue. */
export class SchemaVerifier {
  private readonly db: Database.Database;
  private readonly path: string;

  constructor(handle: StoreHandle) {
    this.db = handle.db;
    this.path = handle.path;
  }

  listTables(): string[] {
    const rows = this.db
      .prepare(
        `
          SELECT name
          FROM sqlite_master
          WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
          ORDER BY name
        `
      )
      .all() as Array<{ name: string }>;
    return rows.map((row) => row.name);
  }

  getDatabaseInfo(): DatabaseInfo {
    const exists = fs.existsSync(this.path);
    const sizeBytes = exists ? fs.statSync(this.path).size : 0;
    return {
      path: this.path,
      exists,
      sizeKb: Math.round((sizeBytes / 1024) * 100) / 100,
      tables: this.listTables()
    };
  }

  getTableSchema(table: string): TableSchema | null {
    if (!tableExists(this.db, table)) {
      return null;
    }
    const name = assertIdentifier(table);
    const columns = listColumns(this.db, name);
    const foreignKeys = this.db.prepare(`PRAGMA foreign_key_list(${name})`).all() as ForeignKeyRow[];
    const indexes = (this.db.prepare(`PRAGMA index_list(${name})`).all() as IndexListRow[]).map(
      (index) => ({
        name: index.name,
        unique: index.unique === 1,
        columns: (
          this.db.prepare(`PRAGMA index_info(${quoteIndexName(index.name)})`).all() as IndexColumnRow[]
        ).flatMap((column) => (column.name === null ? [] : [column.name]))
      })
    );

    return {
      table: name,
      columns: columns.map((column) => ({
        name: column.name,
        type: column.type,
        notNull: column.notnull === 1,
        defaultValue: column.dflt_value
      })),
      primaryKey: columns
        .filter((column) => column.pk > 0)
        .sort((a, b) => a.pk - b.pk)
        .map((column) => column.name),
      foreignKeys: foreignKeys.map((key) => ({
        column: key.from,
        referencesTable: key.table,
        referencesColumn: key.to,
        onDelete: key.on_delete
      })),
      indexes
    };
  }

  columnExists(table: string, column: string): boolean {
    return tableExists(this.db, table) && listColumns(this.db, table).some((info) => info.name === column);
  }

  getRowCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const table of this.listTables()) {
      const row = this.db
        .prepare(`SELECT COUNT(*) AS count FROM ${assertIdentifier(table)}`)
        .get() as { count: number };
      counts[table] = row.count;
    }
    return counts;
  }

  verifySchema(expected: ExpectedSchema = expectedSchemaFromCatalog()): SchemaVerification {
    const actualTables = this.listTables();
    const actual = new Set(actualTables);
    const missingTables = [...expected.keys()].filter((table) => !actual.has(table)).sort();
    const extraTables = actualTables.filter((table) => !expected.has(table));

    const missingColumns: Record<string, string[]> = {};
    for (const [table, columns] of expected) {
      if (!actual.has(table)) {
        continue;
      }
      const present = new Set(listColumns(this.db, table).map((column) => column.name));
      const missing = columns.filter((column) => !present.has(column));
      if (missing.length > 0) {
        missingColumns[table] = missing;
      }
    }

    return {
      valid: missingTables.length === 0 && Object.keys(missingColumns).length === 0,
      missingTables,
      extraTables,
      missingColumns
    };
  }
}

function quoteIndexName(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
