import { DEFAULT_BUSINESS_ID, NotSupportedError } from "@harvest-hub/core";

import { TENANT_TABLES } from "../../schema";
import { loadTableDefinitions } from "../../store";
import { columnExists, isColumnNotNull, quoteLiteral, rebuildTable, tableExists } from "../operations";
import type { MigrationStep } from "../types";
import { BUSINESS_ID_COLUMN } from "./001-add-business-id";

const ISO_NOW = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

export const businessIdNotNullMigration: MigrationStep = {
  version: "002",
  description: "Enforce NOT NULL on business_id",
  disableForeignKeys: true,

  apply(db) {
    const definitions = loadTableDefinitions();
    for (const table of TENANT_TABLES) {
      if (!tableExists(db, table) || !columnExists(db, table, BUSINESS_ID_COLUMN)) {
        continue;
      }
      if (isColumnNotNull(db, table, BUSINESS_ID_COLUMN)) {
        continue;
      }
      const definition = definitions.get(table);
      if (!definition) {
        throw new Error(`No canonical definition for table ${table}`);
      }
      rebuildTable(db, table, definition, {
        columnExpressions: {
          [BUSINESS_ID_COLUMN]: `COALESCE(NULLIF(${BUSINESS_ID_COLUMN}, ''), ${quoteLiteral(DEFAULT_BUSINESS_ID)})`,
          created_at: `COALESCE(created_at, ${ISO_NOW})`
        },
        fillMissing: { created_at: ISO_NOW }
      });
    }
  },

  revert() {
    throw new NotSupportedError(
      "Relaxing the business_id constraint needs a table rebuild that could lose rows"
    );
  }
};
