export {
  ConfigurationError,
  HarvestHubError,
  MigrationFailure,
  NotFoundError,
  NotSupportedError,
  RepositoryError,
  StoreBusyError,
  ValidationError,
  describeError,
  isBusyError,
  isConstraintError,
  toRepositoryError,
  type RepositoryOperation,
  type ValidationErrorDetails
} from "./errors";
export {
  createLogger,
  logger,
  type LogEntry,
  type LogFields,
  type LogLevel,
  type LogSink,
  type Logger,
  type LoggerOptions
} from "./logger";
export { DEFAULT_BUSY_TIMEOUT_MS, isTruthyFlag, loadConfig, type HarvestHubConfig } from "./config";
export {
  DEFAULT_BUSINESS_ID,
  getBusinessProfile,
  isKnownBusiness,
  listActiveBusinesses,
  type BusinessProfile,
  type BusinessType
} from "./tenants";
