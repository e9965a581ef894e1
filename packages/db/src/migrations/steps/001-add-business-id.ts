import { DEFAULT_BUSINESS_ID, NotSupportedError } from "@harvest-hub/core";

import { TENANT_TABLES } from "../../schema";
import { addColumnIfMissing, backfillBlankValues, quoteLiteral, tableExists } from "../operations";
import type { MigrationStep } from "../types";

export const BUSINESS_ID_COLUMN = "business_id";

export const addBusinessIdMigration: MigrationStep = {
  version: "001",
  description: "Add business_id column to tenant-scoped tables",

  apply(db) {
    for (const table of TENANT_TABLES) {
      // Tables that do not exist yet are created with the column by the canonical schema.
      if (!tableExists(db, table)) {
        continue;
      }
      addColumnIfMissing(
        db,
        table,
        BUSINESS_ID_COLUMN,
        `VARCHAR(50) DEFAULT ${quoteLiteral(DEFAULT_BUSINESS_ID)}`
      );
      backfillBlankValues(db, table, BUSINESS_ID_COLUMN, DEFAULT_BUSINESS_ID);
    }
  },

  revert() {
    throw new NotSupportedError(
      "Removing business_id requires rebuilding every tenant table and would discard tenant assignments"
    );
  }
};
