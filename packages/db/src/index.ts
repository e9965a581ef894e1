export {
  DB_FILE_NAME,
  FALLBACK_DB_PATH,
  closeStore,
  ensureCreated,
  loadTableDefinitions,
  openStore,
  resolveDatabaseLocation,
  resolveDefaultSchemaFile,
  withStore,
  type DatabaseLocation,
  type DatabaseLocationSource,
  type OpenStoreOptions,
  type ResolveLocationOptions,
  type StoreHandle
} from "./store";
export * from "./schema";
export * from "./migrations";
export {
  SchemaVerifier,
  expectedSchemaFromCatalog,
  type DatabaseInfo,
  type ExpectedSchema,
  type ForeignKeyInfo,
  type IndexInfo,
  type SchemaVerification,
  type TableSchema
} from "./schema-verifier";
export {
  DatabaseManager,
  formatStatusReport,
  type DatabaseManagerOptions,
  type DatabaseStatus,
  type InitializeOptions,
  type InitializeResult
} from "./database-manager";
export * from "./repository/entities";
export * from "./repository/aggregates";
export {
  ALL_TENANTS,
  TenantRepository,
  UNIT_OF_WORK,
  type ListOptions,
  type TenantRepositoryOptions,
  type TenantScope,
  type WhereFilter
} from "./repository/tenant-repository";
export * from "./repository/shared-entities";
export {
  SharedRepository,
  type SharedListOptions,
  type SharedRange,
  type SharedRepositoryOptions,
  type SharedWhere
} from "./repository/shared-repository";
export type { ServiceDependencies, SharedServiceDependencies } from "./services/context";
export * from "./services/customer-service";
export * from "./services/supplier-service";
export * from "./services/financial-service";
export * from "./services/operations-service";
export * from "./services/strategic-service";
export * from "./services/unified-financial-service";
export * from "./services/communication-service";
export * from "./services/document-service";
export { DEFAULT_MESSAGE_TEMPLATES } from "./services/default-templates";
