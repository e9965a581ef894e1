import { NotSupportedError } from "@harvest-hub/core";
import type Database from "better-sqlite3";
import { z } from "zod";

import { loadTableDefinitions } from "../../store";
import { columnExists, tableExists } from "../operations";
import type { MigrationStep } from "../types";

/**
 * Older stores kept preferences, quality and payment history, temperature logs
 * and issues as JSON text on the parent row. This step copies each entry into
 * its child table. The JSON columns stay where they are; entries that do not
 * parse are left there untouched.
 */

const text = z.string().trim().min(1);
const optionalText = z.string().nullable().optional();

const preferencesSchema = z.record(z.string(), z.unknown());

const qualityEntrySchema = z.object({
  date: optionalText,
  product: text,
  quality_score: z.number().int(),
  notes: optionalText
});

const paymentEntrySchema = z.object({
  date: optionalText,
  amount: z.number().finite(),
  notes: optionalText
});

const temperatureEntrySchema = z.object({
  temperature: z.number().finite(),
  location: text,
  time_recorded: optionalText
});

const issueEntrySchema = z.object({
  description: text,
  severity: optionalText,
  status: optionalText,
  resolution: optionalText,
  reported_at: optionalText,
  resolved_at: optionalText
});

type LegacyRow = {
  id: number;
  legacy: string | null;
  fallback_at: string | null;
};

function readJson(value: string | null): unknown {
  if (value === null || value.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

function entriesOf<T>(value: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const parsed = readJson(value);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.flatMap((entry) => {
    const result = schema.safeParse(entry);
    return result.success ? [result.data] : [];
  });
}

function legacyRows(
  db: Database.Database,
  table: string,
  column: string,
  fallbackColumn: string
): LegacyRow[] {
  const fallback = columnExists(db, table, fallbackColumn) ? fallbackColumn : "NULL";
  return db
    .prepare(
      `SELECT id, ${column} AS legacy, ${fallback} AS fallback_at FROM ${table} WHERE ${column} IS NOT NULL`
    )
    .all() as LegacyRow[];
}

function hasLegacyColumn(db: Database.Database, table: string, column: string): boolean {
  return tableExists(db, table) && columnExists(db, table, column);
}

function ensureChildTable(db: Database.Database, definitions: Map<string, string>, table: string): void {
  const definition = definitions.get(table);
  if (!definition) {
    throw new Error(`No canonical definition for table ${table}`);
  }
  db.exec(definition);
}

function stampOf(...candidates: Array<string | null | undefined>): string {
  for (const candidate of candidates) {
    if (candidate) {
      return candidate;
    }
  }
  return new Date().toISOString();
}

function movePreferences(db: Database.Database): void {
  const insert = db.prepare(`
    INSERT OR IGNORE INTO customer_preferences (customer_id, preference_key, preference_value)
    VALUES (?, ?, ?)
  `);
  for (const row of legacyRows(db, "customers", "preferences", "created_at")) {
    const parsed = preferencesSchema.safeParse(readJson(row.legacy));
    if (!parsed.success) {
      continue;
    }
    for (const [key, value] of Object.entries(parsed.data)) {
      if (value === null || value === undefined) {
        continue;
      }
      insert.run(row.id, key, typeof value === "string" ? value : JSON.stringify(value));
    }
  }
}

function moveQualityRecords(db: Database.Database): void {
  const insert = db.prepare(`
    INSERT INTO farmer_quality_records (farmer_id, product, quality_score, notes, recorded_at)
    VALUES (?, ?, ?, ?, ?)
  `);
  for (const row of legacyRows(db, "farmers", "quality_records", "created_at")) {
    for (const entry of entriesOf(row.legacy, qualityEntrySchema)) {
      insert.run(row.id, entry.product, entry.quality_score, entry.notes ?? null, stampOf(entry.date, row.fallback_at));
    }
  }
}

/** Farmers that already have payment rows were paid through the table; their history duplicates it. */
function movePaymentHistory(db: Database.Database): void {
  const insert = db.prepare(`
    INSERT INTO farmer_payments (farmer_id, payment_date, amount, notes)
    VALUES (?, ?, ?, ?)
  `);
  const paymentCount = db.prepare("SELECT COUNT(*) AS count FROM farmer_payments WHERE farmer_id = ?");
  for (const row of legacyRows(db, "farmers", "payment_history", "created_at")) {
    const existing = paymentCount.get(row.id) as { count: number };
    if (existing.count > 0) {
      continue;
    }
    for (const entry of entriesOf(row.legacy, paymentEntrySchema)) {
      insert.run(row.id, stampOf(entry.date, row.fallback_at), entry.amount, entry.notes ?? null);
    }
  }
}

function moveTemperatureLogs(db: Database.Database): void {
  const insert = db.prepare(`
    INSERT INTO temperature_readings (daily_log_id, temperature, location, recorded_at)
    VALUES (?, ?, ?, ?)
  `);
  for (const row of legacyRows(db, "daily_logs", "temperature_logs", "log_date")) {
    for (const entry of entriesOf(row.legacy, temperatureEntrySchema)) {
      insert.run(row.id, entry.temperature, entry.location, stampOf(entry.time_recorded, row.fallback_at));
    }
  }
}

function moveIssues(db: Database.Database): void {
  const insert = db.prepare(`
    INSERT INTO operational_issues
      (daily_log_id, description, severity, status, resolution, reported_at, resolved_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  for (const row of legacyRows(db, "daily_logs", "issue_tracking", "log_date")) {
    for (const entry of entriesOf(row.legacy, issueEntrySchema)) {
      insert.run(
        row.id,
        entry.description,
        entry.severity ?? "Medium",
        entry.status === "Resolved" ? "Resolved" : "Open",
        entry.resolution ?? null,
        stampOf(entry.reported_at, row.fallback_at),
        entry.resolved_at ?? null
      );
    }
  }
}

const moves: ReadonlyArray<{
  table: string;
  column: string;
  child: string;
  move(db: Database.Database): void;
}> = [
  { table: "customers", column: "preferences", child: "customer_preferences", move: movePreferences },
  { table: "farmers", column: "quality_records", child: "farmer_quality_records", move: moveQualityRecords },
  { table: "farmers", column: "payment_history", child: "farmer_payments", move: movePaymentHistory },
  { table: "daily_logs", column: "temperature_logs", child: "temperature_readings", move: moveTemperatureLogs },
  { table: "daily_logs", column: "issue_tracking", child: "operational_issues", move: moveIssues }
];

export const LEGACY_JSON_COLUMNS = moves.map(({ table, column }) => `${table}.${column}`);

export const moveLegacyJsonColumnsMigration: MigrationStep = {
  version: "005",
  description: "Move legacy JSON columns into child tables",

  apply(db) {
    const definitions = loadTableDefinitions();
    for (const { table, column, child, move } of moves) {
      if (!hasLegacyColumn(db, table, column)) {
        continue;
      }
      ensureChildTable(db, definitions, child);
      move(db);
    }
  },

  revert() {
    throw new NotSupportedError(
      "Moved entries cannot be told apart from rows written later; the legacy JSON columns still hold the originals"
    );
  }
};
