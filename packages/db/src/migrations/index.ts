import { addBusinessIdMigration } from "./steps/001-add-business-id";
import { businessIdNotNullMigration } from "./steps/002-business-id-not-null";
import { tenantIndexesMigration } from "./steps/003-tenant-indexes";
import { farmerScheduleAndMetricDaysMigration } from "./steps/004-farmer-schedule-and-metric-days";
import { moveLegacyJsonColumnsMigration } from "./steps/005-move-legacy-json-columns";
import type { MigrationStep } from "./types";

export { MigrationLedger, compareVersions, type MigrationLedgerOptions, type RunPendingOptions } from "./ledger";
export type { MigrationRecord, MigrationRunResult, MigrationStatus, MigrationStep } from "./types";
export {
  addColumnIfMissing,
  backfillBlankValues,
  columnExists,
  countBlankValues,
  indexExists,
  isColumnNotNull,
  listColumns,
  rebuildTable,
  tableExists,
  uniqueColumnSets,
  type ColumnInfo
} from "./operations";
export { TENANT_INDEX_NAMES } from "./steps/003-tenant-indexes";
export { LEGACY_JSON_COLUMNS } from "./steps/005-move-legacy-json-columns";

/** Every registered step, in version order. */
export function getAllMigrations(): MigrationStep[] {
  return [
    addBusinessIdMigration,
    businessIdNotNullMigration,
    tenantIndexesMigration,
    farmerScheduleAndMetricDaysMigration,
    moveLegacyJsonColumnsMigration
  ];
}
