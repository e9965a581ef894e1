import {
  describeError,
  logger as defaultLogger,
  toRepositoryError,
  ValidationError,
  type Logger,
  type RepositoryOperation
} from "@harvest-hub/core";
import type { z } from "zod";

import { SharedRepository } from "../repository/shared-repository";
import type { TenantRepository } from "../repository/tenant-repository";
import type { StoreHandle } from "../store";

/** For services over the store-wide tables only. */
export type SharedServiceDependencies = {
  handle: StoreHandle;
  /** Built from the handle, logger and clock when omitted. */
  shared?: SharedRepository;
  logger?: Logger;
  now?: () => Date;
};

export type ServiceDependencies = SharedServiceDependencies & {
  repository: TenantRepository;
};

export type ResolvedSharedServiceDependencies = Required<SharedServiceDependencies>;

export type ResolvedServiceDependencies = Required<ServiceDependencies>;

export function resolveSharedDependencies(deps: SharedServiceDependencies): ResolvedSharedServiceDependencies {
  const logger = deps.logger ?? defaultLogger;
  const now = deps.now ?? (() => new Date());
  return {
    handle: deps.handle,
    shared: deps.shared ?? new SharedRepository(deps.handle, { logger, now }),
    logger,
    now
  };
}

export function resolveDependencies(deps: ServiceDependencies): ResolvedServiceDependencies {
  return { ...resolveSharedDependencies(deps), repository: deps.repository };
}

/** `YYYY-MM-DD` in UTC. */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD HH:MM` in UTC, the stamp used for appended notes. */
export function noteStamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

/** Appends one stamped line to a free-text column value. */
export function appendStampedLine(existing: string | null, text: string, at: Date): string {
  const line = `[${noteStamp(at)}] ${text}`;
  return existing ? `${existing}\n${line}` : line;
}

/** Child-table SQL gets the same error mapping and logging as repository calls. */
export function guardChild<T>(
  log: Logger,
  operation: RepositoryOperation,
  entityType: string,
  fn: () => T
): T {
  try {
    return fn();
  } catch (error) {
    const mapped = toRepositoryError(error, operation, entityType);
    const fields = { operation, entityType, error: describeError(error) };
    if (mapped instanceof ValidationError) {
      log.warn("Repository operation rejected", fields);
    } else {
      log.error("Repository operation failed", fields);
    }
    throw mapped;
  }
}

export function parseOrReject<T>(
  log: Logger,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  entityType: string,
  operation: RepositoryOperation
): T {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }
  const issues = parsed.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  log.warn("Repository input rejected", { operation, entityType, issues });
  throw new ValidationError(`Invalid ${entityType} input: ${issues.join("; ")}`, {
    entityType,
    operation,
    issues,
    cause: parsed.error
  });
}
