import { ValidationError } from "@harvest-hub/core";
import type { z } from "zod";

export type SqlValue = string | number | null;

/** Booleans become 0/1; lists and plain objects are stored as JSON text. */
export function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (Array.isArray(value)) {
    return JSON.stringify(value);
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return JSON.stringify(value);
  }
  throw new ValidationError(`Unsupported column value: ${String(value)}`);
}

export function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.join(".");
  return location ? `${location}: ${issue.message}` : issue.message;
}
