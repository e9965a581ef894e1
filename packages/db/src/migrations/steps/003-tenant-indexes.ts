import { TENANT_TABLES } from "../../schema";
import { columnExists, tableExists } from "../operations";
import type { MigrationStep } from "../types";

type IndexSpec = {
  name: string;
  table: string;
  columns: string[];
};

const tenantIndexes: IndexSpec[] = [
  ...TENANT_TABLES.map((table) => ({
    name: `idx_${table}_business_id`,
    table,
    columns: ["business_id"]
  })),
  { name: "idx_customers_business_name", table: "customers", columns: ["business_id", "name"] },
  { name: "idx_farmers_business_name", table: "farmers", columns: ["business_id", "name"] }
];

export const tenantIndexesMigration: MigrationStep = {
  version: "003",
  description: "Index tenant lookups",

  apply(db) {
    for (const index of tenantIndexes) {
      if (!tableExists(db, index.table)) {
        continue;
      }
      if (!index.columns.every((column) => columnExists(db, index.table, column))) {
        throw new Error(`Cannot index ${index.table}: missing one of ${index.columns.join(", ")}`);
      }
      db.exec(
        `CREATE INDEX IF NOT EXISTS ${index.name} ON ${index.table} (${index.columns.join(", ")})`
      );
    }
  },

  revert(db) {
    for (const index of tenantIndexes) {
      db.exec(`DROP INDEX IF EXISTS ${index.name}`);
    }
  }
};

export const TENANT_INDEX_NAMES = tenantIndexes.map((index) => index.name);
