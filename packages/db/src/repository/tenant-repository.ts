import {
  HarvestHubError,
  RepositoryError,
  ValidationError,
  describeError,
  logger as defaultLogger,
  toRepositoryError,
  type Logger,
  type RepositoryOperation
} from "@harvest-hub/core";
import type Database from "better-sqlite3";
import type { z } from "zod";

import type { StoreHandle } from "../store";
import type {
  BaseField,
  EntityDefinition,
  EntityField,
  FieldValues,
  OrderTerm,
  TenantRecord
} from "./entities";
import { formatIssue, toSqlValue, type SqlValue } from "./sql-values";

/** Scope token for reads that deliberately span every business. */
export const ALL_TENANTS = Symbol("harvest-hub.all-tenants");

export type TenantScope = string | typeof ALL_TENANTS;

export type WhereFilter<TRecord extends TenantRecord> = Partial<Pick<TRecord, EntityField<TRecord>>>;

export type ListOptions<TRecord extends TenantRecord> = {
  where?: WhereFilter<TRecord>;
  orderBy?: readonly OrderTerm<TRecord>[];
};

export type TenantRepositoryOptions = {
  logger?: Logger;
  now?: () => Date;
};

/** Entity label for failures of a multi-call transaction, distinct from the `transaction` entity. */
export const UNIT_OF_WORK = "unit_of_work";

type ColumnSource = { columns: Readonly<Record<string, string>> };

const BASE_COLUMNS: ReadonlyArray<[BaseField, string]> = [
  ["id", "id"],
  ["businessId", "business_id"],
  ["createdAt", "created_at"],
  ["updatedAt", "updated_at"]
];

/**
 * Generic CRUD over tenant-scoped tables. Every write is stamped with its
 * business id, and every list is filtered by one unless the caller passes
 * `ALL_TENANTS`.
 */
export class TenantRepository {
  private readonly db: Database.Database;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly columnCache = new WeakMap<object, Map<string, string>>();

  constructor(handle: StoreHandle, options: TenantRepositoryOptions = {}) {
    this.db = handle.db;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  create<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    businessId: string,
    input: NoInfer<TCreate>
  ): TRecord {
    const { entityType } = definition;
    const tenant = this.requireBusinessId(businessId, "create", entityType);
    const values = this.parseInput(definition.createSchema, input, "create", entityType);

    return this.run("create", entityType, () => {
      const names = ["business_id", "created_at", "updated_at"];
      const params: SqlValue[] = [tenant, this.now().toISOString(), null];
      for (const [field, value] of Object.entries(values)) {
        if (value !== undefined) {
          names.push(this.column(definition, field));
          params.push(toSqlValue(value));
        }
      }

      return this.db
        .transaction(() => {
          this.assertUnique(definition, tenant, (field) => values[field], null, "create");
          const result = this.db
            .prepare(
              `INSERT INTO ${definition.table} (${names.join(", ")}) VALUES (${names
                .map(() => "?")
                .join(", ")})`
            )
            .run(...params);
          return this.requireRow(definition, Number(result.lastInsertRowid), "create");
        })
        .immediate();
    });
  }

  getById<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    id: number
  ): TRecord | null {
    return this.run("get", definition.entityType, () => {
      const row = this.db.prepare(`SELECT * FROM ${definition.table} WHERE id = ?`).get(id);
      return row === undefined ? null : definition.fromRow(row);
    });
  }

  findOne<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    scope: TenantScope,
    where: NoInfer<WhereFilter<TRecord>>
  ): TRecord | null {
    const [first] = this.select(definition, scope, { where }, 1);
    return first ?? null;
  }

  listByTenant<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    scope: TenantScope,
    options: NoInfer<ListOptions<TRecord>> = {}
  ): TRecord[] {
    return this.select(definition, scope, options, null);
  }

  /** Applies a partial change; null when no row has that id. */
  update<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    id: number,
    patch: NoInfer<TUpdate>
  ): TRecord | null {
    const { entityType, table } = definition;
    const values = this.parseInput(definition.updateSchema, patch, "update", entityType);

    return this.run("update", entityType, () =>
      this.db
        .transaction(() => {
          const row = this.db.prepare(`SELECT * FROM ${table} WHERE id = ?`).get(id);
          if (row === undefined) {
            return null;
          }
          const current = definition.fromRow(row);

          if (definition.naturalKey.some((field) => values[field] !== undefined)) {
            this.assertUnique(
              definition,
              current.businessId,
              (field) => (values[field] !== undefined ? values[field] : current[field]),
              current.id,
              "update"
            );
          }

          const assignments: string[] = [];
          const params: SqlValue[] = [];
          for (const [field, value] of Object.entries(values)) {
            if (value !== undefined) {
              assignments.push(`${this.column(definition, field)} = ?`);
              params.push(toSqlValue(value));
            }
          }
          assignments.push("updated_at = ?");
          params.push(this.nextTimestamp(current.updatedAt ?? current.createdAt));

          this.db.prepare(`UPDATE ${table} SET ${assignments.join(", ")} WHERE id = ?`).run(...params, id);
          return this.requireRow(definition, id, "update");
        })
        .immediate()
    );
  }

  delete<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    id: number
  ): boolean {
    return this.run("delete", definition.entityType, () => {
      const result = this.db.prepare(`DELETE FROM ${definition.table} WHERE id = ?`).run(id);
      return result.changes > 0;
    });
  }

  /** Runs `fn` in one write transaction; any throw rolls back every call made inside it. */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn).immediate();
    } catch (error) {
      if (error instanceof HarvestHubError) {
        throw error;
      }
      throw this.fail(error, "update", UNIT_OF_WORK);
    }
  }

  private select<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    scope: TenantScope,
    options: ListOptions<TRecord>,
    limit: number | null
  ): TRecord[] {
    const { entityType } = definition;
    const tenant = scope === ALL_TENANTS ? null : this.requireBusinessId(scope, "list", entityType);

    return this.run("list", entityType, () => {
      const clauses: string[] = [];
      const params: SqlValue[] = [];
      if (tenant !== null) {
        clauses.push("business_id = ?");
        params.push(tenant);
      }

      const filters: Array<[string, unknown]> = Object.entries(options.where ?? {});
      for (const [field, value] of filters) {
        if (value === undefined) {
          continue;
        }
        const column = this.column(definition, field);
        if (value === null) {
          clauses.push(`${column} IS NULL`);
        } else {
          clauses.push(`${column} = ?`);
          params.push(toSqlValue(value));
        }
      }

      const terms = (options.orderBy ?? definition.defaultOrder).map(
        (term) => `${this.column(definition, term.field)} ${term.direction === "desc" ? "DESC" : "ASC"}`
      );
      if (!terms.includes("id ASC") && !terms.includes("id DESC")) {
        terms.push("id ASC");
      }

      const sql = [
        `SELECT * FROM ${definition.table}`,
        clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "",
        `ORDER BY ${terms.join(", ")}`,
        limit === null ? "" : `LIMIT ${limit}`
      ]
        .filter((part) => part.length > 0)
        .join(" ");

      return this.db
        .prepare(sql)
        .all(...params)
        .map((row) => definition.fromRow(row));
    });
  }

  private columnsFor(definition: ColumnSource): Map<string, string> {
    const cached = this.columnCache.get(definition);
    if (cached) {
      return cached;
    }
    const columns = new Map<string, string>(BASE_COLUMNS);
    for (const [field, column] of Object.entries(definition.columns)) {
      columns.set(field, column);
    }
    this.columnCache.set(definition, columns);
    return columns;
  }

  private column(definition: ColumnSource & { entityType: string }, field: string): string {
    const column = this.columnsFor(definition).get(field);
    if (column === undefined) {
      throw new ValidationError(`Unknown ${definition.entityType} field: ${field}`, {
        entityType: definition.entityType
      });
    }
    return column;
  }

  private assertUnique<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    businessId: string,
    valueOf: (field: EntityField<TRecord>) => unknown,
    excludeId: number | null,
    operation: RepositoryOperation
  ): void {
    if (definition.naturalKey.length === 0) {
      return;
    }
    const clauses = ["business_id = ?"];
    const params: SqlValue[] = [businessId];
    const described: string[] = [];
    for (const field of definition.naturalKey) {
      const value = toSqlValue(valueOf(field));
      if (value === null) {
        return;
      }
      clauses.push(`${this.column(definition, field)} = ?`);
      params.push(value);
      described.push(`${field}=${value}`);
    }
    if (excludeId !== null) {
      clauses.push("id != ?");
      params.push(excludeId);
    }

    const existing = this.db
      .prepare(`SELECT id FROM ${definition.table} WHERE ${clauses.join(" AND ")} LIMIT 1`)
      .get(...params);
    if (existing !== undefined) {
      throw new ValidationError(
        `${definition.entityType} already exists in ${businessId}: ${described.join(", ")}`,
        { entityType: definition.entityType, operation, issues: described }
      );
    }
  }

  private requireRow<TRecord extends TenantRecord, TCreate, TUpdate>(
    definition: EntityDefinition<TRecord, TCreate, TUpdate>,
    id: number,
    operation: RepositoryOperation
  ): TRecord {
    const row = this.db.prepare(`SELECT * FROM ${definition.table} WHERE id = ?`).get(id);
    if (row === undefined) {
      throw new RepositoryError(operation, definition.entityType, `row ${id} vanished after write`);
    }
    return definition.fromRow(row);
  }

  private requireBusinessId(
    businessId: string,
    operation: RepositoryOperation,
    entityType: string
  ): string {
    const trimmed = businessId.trim();
    if (trimmed.length === 0) {
      const error = new ValidationError(`${entityType} requires a business id`, {
        entityType,
        operation,
        issues: ["businessId: must not be empty"]
      });
      this.log.warn("Repository input rejected", { operation, entityType, error: error.message });
      throw error;
    }
    return trimmed;
  }

  private parseInput<TInput>(
    schema: z.ZodType<FieldValues, z.ZodTypeDef, TInput>,
    input: TInput,
    operation: RepositoryOperation,
    entityType: string
  ): FieldValues {
    const parsed = schema.safeParse(input);
    if (parsed.success) {
      return parsed.data;
    }
    const issues = parsed.error.issues.map(formatIssue);
    this.log.warn("Repository input rejected", { operation, entityType, issues });
    throw new ValidationError(`Invalid ${entityType} input: ${issues.join("; ")}`, {
      entityType,
      operation,
      issues,
      cause: parsed.error
    });
  }

  /** Strictly later than `previous`, even when the clock has not advanced. */
  private nextTimestamp(previous: string): string {
    const now = this.now().getTime();
    const previousMs = Date.parse(previous);
    const next = Number.isNaN(previousMs) ? now : Math.max(now, previousMs + 1);
    return new Date(next).toISOString();
  }

  private run<T>(operation: RepositoryOperation, entityType: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw this.fail(error, operation, entityType);
    }
  }

  private fail(error: unknown, operation: RepositoryOperation, entityType: string): HarvestHubError {
    const mapped = toRepositoryError(error, operation, entityType);
    const fields = { operation, entityType, error: describeError(error) };
    if (mapped instanceof ValidationError) {
      this.log.warn("Repository operation rejected", fields);
    } else {
      this.log.error("Repository operation failed", fields);
    }
    return mapped;
  }
}
