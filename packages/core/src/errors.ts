export type RepositoryOperation = "create" | "get" | "list" | "update" | "delete";

export class HarvestHubError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HarvestHubError";
  }
}

export class ConfigurationError extends HarvestHubError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class NotFoundError extends HarvestHubError {
  readonly entityType: string;
  readonly id: number | string;

  constructor(entityType: string, id: number | string) {
    super(`${entityType} not found: ${id}`);
    this.name = "NotFoundError";
    this.entityType = entityType;
    this.id = id;
  }
}

export type ValidationErrorDetails = {
  entityType?: string;
  operation?: RepositoryOperation;
  issues?: string[];
  cause?: unknown;
};

export class ValidationError extends HarvestHubError {
  readonly entityType: string | undefined;
  readonly operation: RepositoryOperation | undefined;
  readonly issues: string[];

  constructor(message: string, details: ValidationErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = "ValidationError";
    this.entityType = details.entityType;
    this.operation = details.operation;
    this.issues = details.issues ?? [];
  }
}

export class RepositoryError extends HarvestHubError {
  readonly entityType: string;
  readonly operation: RepositoryOperation;

  constructor(
    operation: RepositoryOperation,
    entityType: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} ${entityType} failed: ${message}`, options);
    this.name = "RepositoryError";
    this.entityType = entityType;
    this.operation = operation;
  }
}

/** Lock contention that outlasted the busy timeout. Callers decide whether to retry. */
export class StoreBusyError extends RepositoryError {
  constructor(
    operation: RepositoryOperation,
    entityType: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(operation, entityType, message, options);
    this.name = "StoreBusyError";
  }
}

export class MigrationFailure extends HarvestHubError {
  readonly version: string;

  constructor(version: string, options?: { cause?: unknown }) {
    super(`Migration ${version} failed: ${describeError(options?.cause)}`, options);
    this.name = "MigrationFailure";
    this.version = version;
  }
}

export class NotSupportedError extends HarvestHubError {
  constructor(message: string) {
    super(message);
    this.name = "NotSupportedError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "unknown error";
}

function readDriverCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function isBusyError(error: unknown): boolean {
  const code = readDriverCode(error);
  return code !== null && (code.startsWith("SQLITE_BUSY") || code.startsWith("SQLITE_LOCKED"));
}

export function isConstraintError(error: unknown): boolean {
  const code = readDriverCode(error);
  return code !== null && code.startsWith("SQLITE_CONSTRAINT");
}

/**
 * Classifies a failure raised while a repository operation was running.
 * Errors that are already part of the taxonomy pass through unchanged.
 */
export function toRepositoryError(
  error: unknown,
  operation: RepositoryOperation,
  entityType: string
): HarvestHubError {
  if (error instanceof HarvestHubError) {
    return error;
  }
  const message = describeError(error);
  if (isBusyError(error)) {
    return new StoreBusyError(operation, entityType, message, { cause: error });
  }
  if (isConstraintError(error)) {
    return new ValidationError(`${operation} ${entityType} rejected: ${message}`, {
      entityType,
      operation,
      issues: [message],
      cause: error
    });
  }
  return new RepositoryError(operation, entityType, message, { cause: error });
}
