import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { createLogger } from "@harvest-hub/core";
import { afterEach, describe, expect, it } from "vitest";

import { SchemaVerifier, expectedSchemaFromCatalog } from "./schema-verifier";
import { closeStore, ensureCreated, openStore, type StoreHandle } from "./store";

const tempRoots: string[] = [];
const handles: StoreHandle[] = [];
const quiet = createLogger({ sink: () => undefined });

function openCreatedStore(): StoreHandle {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-verifier-"));
  tempRoots.push(dir);
  const handle = openStore({ location: path.join(dir, "hub.db"), logger: quiet });
  handles.push(handle);
  ensureCreated(handle, undefined, quiet);
  return handle;
}

describe("schema verifier", () => {
  afterEach(() => {
    for (const handle of handles.splice(0)) {
      closeStore(handle);
    }
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("derives the expected columns from the table catalogue", () => {
    const expected = expectedSchemaFromCatalog();

    expect(expected.size).toBe(20);
    expect(expected.get("schema_migrations")).toEqual(["version", "description", "applied_at"]);
    expect(expected.get("customer_preferences")).toEqual([
      "id",
      "customer_id",
      "preference_key",
      "preference_value"
    ]);
  });

  it("lists user tables only", () => {
    const verifier = new SchemaVerifier(openCreatedStore());

    const tables = verifier.listTables();

    expect(tables).toContain("customers");
    expect(tables).toContain("partnerships");
    expect(tables).not.toContain("sqlite_sequence");
    expect(tables).toEqual([...tables].sort());
  });

  it("reports the ledger table as missing before any migration ran", () => {
    const verifier = new SchemaVerifier(openCreatedStore());

    expect(verifier.verifySchema()).toEqual({
      valid: false,
      missingTables: ["schema_migrations"],
      extraTables: [],
      missingColumns: {}
    });
  });

  it("names missing tables, missing columns and extra tables", () => {
    const verifier = new SchemaVerifier(openCreatedStore());
    const expected = new Map([
      ["customers", ["id", "name", "loyalty_tier"]],
      ["ghosts", ["id"]],
      ["farmers", ["id"]]
    ]);

    const result = verifier.verifySchema(expected);

    expect(result.valid).toBe(false);
    expect(result.missingTables).toEqual(["ghosts"]);
    expect(result.missingColumns).toEqual({ customers: ["loyalty_tier"] });
    expect(result.extraTables).toContain("orders");
    expect(result.extraTables).not.toContain("customers");
  });

  it("describes columns, keys and indexes of a table", () => {
    const handle = openCreatedStore();
    handle.db.exec("CREATE INDEX idx_order_items_product ON order_items(product_name)");
    const verifier = new SchemaVerifier(handle);

    const schema = verifier.getTableSchema("order_items");

    expect(schema?.primaryKey).toEqual(["id"]);
    expect(schema?.columns.map((column) => column.name)).toEqual([
      "id",
      "order_id",
      "product_name",
      "quantity",
      "unit_price",
      "subtotal"
    ]);
    expect(schema?.columns.find((column) => column.name === "quantity")).toEqual({
      name: "quantity",
      type: "REAL",
      notNull: true,
      defaultValue: null
    });
    expect(schema?.foreignKeys).toEqual([
      { column: "order_id", referencesTable: "orders", referencesColumn: "id", onDelete: "CASCADE" }
    ]);
    expect(schema?.indexes).toEqual([
      { name: "idx_order_items_product", unique: false, columns: ["product_name"] }
    ]);
  });

  it("returns null for a table that does not exist", () => {
    const verifier = new SchemaVerifier(openCreatedStore());
    expect(verifier.getTableSchema("ghosts")).toBeNull();
    expect(verifier.columnExists("ghosts", "id")).toBe(false);
    expect(verifier.columnExists("customers", "business_id")).toBe(true);
    expect(verifier.columnExists("customers", "loyalty_tier")).toBe(false);
  });

  it("counts rows per table and reports file facts", () => {
    const handle = openCreatedStore();
    handle.db
      .prepare("INSERT INTO customers (business_id, name, created_at) VALUES (?, ?, ?)")
      .run("island_harvest", "Harbour Cafe", "2026-01-01T00:00:00.000Z");
    const verifier = new SchemaVerifier(handle);

    const counts = verifier.getRowCounts();
    const info = verifier.getDatabaseInfo();

    expect(counts.customers).toBe(1);
    expect(counts.orders).toBe(0);
    expect(info.path).toBe(handle.path);
    expect(info.exists).toBe(true);
    expect(info.tables).toEqual(verifier.listTables());
  });
});
