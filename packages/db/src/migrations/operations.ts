/**
 * Schema inspection and change primitives shared by migration steps.
 *
 * Each helper looks at the current schema first so a step can be re-run after a
 * partial manual fix without tripping over "duplicate column" style errors.
 */

import type Database from "better-sqlite3";

export type ColumnInfo = {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
};

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return name;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function tableExists(db: Database.Database, table: string): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

export function indexExists(db: Database.Database, indexName: string): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?")
    .get(indexName);
  return row !== undefined;
}

export function listColumns(db: Database.Database, table: string): ColumnInfo[] {
  return db.prepare(`PRAGMA table_info(${assertIdentifier(table)})`).all() as ColumnInfo[];
}

export function columnExists(db: Database.Database, table: string, column: string): boolean {
  return listColumns(db, table).some((info) => info.name === column);
}

export function isColumnNotNull(db: Database.Database, table: string, column: string): boolean {
  const info = listColumns(db, table).find((candidate) => candidate.name === column);
  return info !== undefined && info.notnull === 1;
}

/** Rows where `column` is NULL or the empty string. */
export function countBlankValues(db: Database.Database, table: string, column: string): number {
  const row = db
    .prepare(
      `
        SELECT COUNT(*) AS count
        FROM ${assertIdentifier(table)}
        WHERE ${assertIdentifier(column)} IS NULL OR ${column} = ''
      `
    )
    .get() as { count: number };
  return row.count;
}

/** Returns true when the column had to be added. */
export function addColumnIfMissing(
  db: Database.Database,
  table: string,
  column: string,
  definition: string
): boolean {
  if (columnExists(db, table, column)) {
    return false;
  }
  db.exec(
    `ALTER TABLE ${assertIdentifier(table)} ADD COLUMN ${assertIdentifier(column)} ${definition}`
  );
  return true;
}

/** Returns the number of rows updated. */
export function backfillBlankValues(
  db: Database.Database,
  table: string,
  column: string,
  value: string
): number {
  const result = db
    .prepare(
      `
        UPDATE ${assertIdentifier(table)}
        SET ${assertIdentifier(column)} = ?
        WHERE ${column} IS NULL OR ${column} = ''
      `
    )
    .run(value);
  return result.changes;
}

export type RebuildTableOptions = {
  /** SELECT expression per target column, used instead of copying the column as-is. */
  columnExpressions?: Record<string, string>;
  /** SELECT expression for target columns the old table does not have. */
  fillMissing?: Record<string, string>;
};

/**
 * Create-copy-drop-rename rebuild for constraint changes SQLite cannot ALTER.
 * Columns present in both shapes are copied; the caller supplies expressions
 * that repair values the new constraints would reject. Columns only the old
 * table has are appended to the new one with their declared type and copied too.
 */
export function rebuildTable(
  db: Database.Database,
  table: string,
  canonicalDefinition: string,
  options: RebuildTableOptions = {}
): void {
  const source = assertIdentifier(table);
  const target = `${source}__rebuild`;
  const createTarget = canonicalDefinition.replace(
    /^CREATE TABLE IF NOT EXISTS\s+[A-Za-z_][A-Za-z0-9_]*/i,
    `CREATE TABLE ${target}`
  );
  if (createTarget === canonicalDefinition) {
    throw new Error(`Definition for ${table} is not a CREATE TABLE IF NOT EXISTS statement`);
  }

  const legacyColumns = listColumns(db, source);
  const sourceColumns = new Set(legacyColumns.map((column) => column.name));
  db.exec(`DROP TABLE IF EXISTS ${target}`);
  db.exec(createTarget);

  const canonicalColumns = new Set(listColumns(db, target).map((column) => column.name));
  for (const column of legacyColumns) {
    if (!canonicalColumns.has(column.name)) {
      db.exec(
        `ALTER TABLE ${target} ADD COLUMN ${assertIdentifier(column.name)} ${column.type}`.trimEnd()
      );
    }
  }

  const targetColumns: string[] = [];
  const selectList: string[] = [];
  for (const { name } of listColumns(db, target)) {
    if (sourceColumns.has(name)) {
      targetColumns.push(name);
      selectList.push(options.columnExpressions?.[name] ?? name);
    } else if (options.fillMissing?.[name] !== undefined) {
      targetColumns.push(name);
      selectList.push(options.fillMissing[name]);
    }
  }

  db.exec(`
    INSERT INTO ${target} (${targetColumns.join(", ")})
    SELECT ${selectList.join(", ")}
    FROM ${source}
  `);
  db.exec(`DROP TABLE ${source}`);
  db.exec(`ALTER TABLE ${target} RENAME TO ${source}`);
}

type IndexListRow = { name: string; unique: number };

/** Column lists of every UNIQUE index or constraint on `table`. */
export function uniqueColumnSets(db: Database.Database, table: string): string[][] {
  const indexes = db.prepare(`PRAGMA index_list(${assertIdentifier(table)})`).all() as IndexListRow[];
  return indexes
    .filter((index) => index.unique === 1)
    .map((index) =>
      (
        db.prepare(`PRAGMA index_info(${quoteLiteral(index.name)})`).all() as Array<{
          name: string | null;
        }>
      ).flatMap((column) => (column.name === null ? [] : [column.name]))
    );
}
