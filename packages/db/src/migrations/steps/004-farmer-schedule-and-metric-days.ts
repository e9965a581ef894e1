import { NotSupportedError } from "@harvest-hub/core";

import { loadTableDefinitions } from "../../store";
import { addColumnIfMissing, rebuildTable, tableExists, uniqueColumnSets } from "../operations";
import type { MigrationStep } from "../types";

const ISO_NOW = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

function metricNamesAreUnique(columnSets: string[][]): boolean {
  return columnSets.some((columns) => columns.length === 1 && columns[0] === "name");
}

export const farmerScheduleAndMetricDaysMigration: MigrationStep = {
  version: "004",
  description: "Add farmer pickup schedules and one metric value per day",

  apply(db) {
    if (tableExists(db, "farmers")) {
      addColumnIfMissing(db, "farmers", "pickup_schedule", "TEXT");
    }

    // Stores created with a store-wide unique metric name can only hold one value per metric.
    if (tableExists(db, "performance_metrics") && metricNamesAreUnique(uniqueColumnSets(db, "performance_metrics"))) {
      const definition = loadTableDefinitions().get("performance_metrics");
      if (!definition) {
        throw new Error("No canonical definition for table performance_metrics");
      }
      rebuildTable(db, "performance_metrics", definition, {
        columnExpressions: { created_at: `COALESCE(created_at, ${ISO_NOW})` },
        fillMissing: { created_at: ISO_NOW }
      });
    }
  },

  revert() {
    throw new NotSupportedError(
      "Dropping pickup_schedule or restoring unique metric names needs a rebuild that could lose rows"
    );
  }
};
