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
import type { FieldValues } from "./entities";
import type {
  SharedBaseField,
  SharedEntityDefinition,
  SharedField,
  SharedOrderTerm,
  SharedRecord
} from "./shared-entities";
import { formatIssue, toSqlValue, type SqlValue } from "./sql-values";
import { UNIT_OF_WORK } from "./tenant-repository";

export type SharedWhere<TRecord extends SharedRecord> = Partial<Pick<TRecord, SharedField<TRecord>>>;

/** Bounds on one column: `from` and `through` are inclusive, `before` is exclusive. */
export type SharedRange<TRecord extends SharedRecord> = {
  field: SharedField<TRecord> | SharedBaseField;
  from?: string | number;
  before?: string | number;
  through?: string | number;
};

export type SharedListOptions<TRecord extends SharedRecord> = {
  where?: SharedWhere<TRecord>;
  ranges?: readonly SharedRange<TRecord>[];
  orderBy?: readonly SharedOrderTerm<TRecord>[];
};

export type SharedRepositoryOptions = {
  logger?: Logger;
  now?: () => Date;
};

type ColumnSource = { entityType: string; columns: Readonly<Record<string, string>> };

const BASE_COLUMNS: ReadonlyArray<[SharedBaseField, string]> = [
  ["id", "id"],
  ["createdAt", "created_at"],
  ["updatedAt", "updated_at"]
];

/**
 * CRUD over the tables every business shares (templates, meetings, tasks,
 * documents, metrics, partnerships). Uniqueness is left to the table
 * constraints; a violation surfaces as a ValidationError.
 */
export class SharedRepository {
  private readonly db: Database.Database;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly columnCache = new WeakMap<object, Map<string, string>>();

  constructor(handle: StoreHandle, options: SharedRepositoryOptions = {}) {
    this.db = handle.db;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  create<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
    input: NoInfer<TCreate>
  ): TRecord {
    const { entityType, table } = definition;
    const values = this.parseInput(definition.createSchema, input, "create", entityType);

    return this.run("create", entityType, () => {
      const names = ["created_at", "updated_at"];
      const params: SqlValue[] = [this.now().toISOString(), null];
      for (const [field, value] of Object.entries(values)) {
        if (value !== undefined) {
          names.push(this.column(definition, field));
          params.push(toSqlValue(value));
        }
      }

      const result = this.db
        .prepare(`INSERT INTO ${table} (${names.join(", ")}) VALUES (${names.map(() => "?").join(", ")})`)
        .run(...params);
      return this.requireRow(definition, Number(result.lastInsertRowid), "create");
    });
  }

  getById<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
    id: number
  ): TRecord | null {
    return this.run("get", definition.entityType, () => {
      const row = this.db.prepare(`SELECT * FROM ${definition.table} WHERE id = ?`).get(id);
      return row === undefined ? null : definition.fromRow(row);
    });
  }

  findOne<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
    options: NoInfer<SharedListOptions<TRecord>>
  ): TRecord | null {
    const [first] = this.select(definition, options, 1);
    return first ?? null;
  }

  list<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
    options: NoInfer<SharedListOptions<TRecord>> = {}
  ): TRecord[] {
    return this.select(definition, options, null);
  }

  /** Applies a partial change; null when no row has that id. */
  update<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
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

  delete<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
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

  private select<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
    options: SharedListOptions<TRecord>,
    limit: number | null
  ): TRecord[] {
    return this.run("list", definition.entityType, () => {
      const clauses: string[] = [];
      const params: SqlValue[] = [];

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

      for (const range of options.ranges ?? []) {
        const column = this.column(definition, range.field);
        const bounds: Array<[string, string | number | undefined]> = [
          [">=", range.from],
          ["<", range.before],
          ["<=", range.through]
        ];
        for (const [operator, bound] of bounds) {
          if (bound !== undefined) {
            clauses.push(`${column} ${operator} ?`);
            params.push(bound);
          }
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

  private column(definition: ColumnSource, field: string): string {
    let columns = this.columnCache.get(definition);
    if (!columns) {
      columns = new Map<string, string>([...BASE_COLUMNS, ...Object.entries(definition.columns)]);
      this.columnCache.set(definition, columns);
    }
    const column = columns.get(field);
    if (column === undefined) {
      throw new ValidationError(`Unknown ${definition.entityType} field: ${field}`, {
        entityType: definition.entityType
      });
    }
    return column;
  }

  private requireRow<TRecord extends SharedRecord, TCreate, TUpdate>(
    definition: SharedEntityDefinition<TRecord, TCreate, TUpdate>,
    id: number,
    operation: RepositoryOperation
  ): TRecord {
    const row = this.db.prepare(`SELECT * FROM ${definition.table} WHERE id = ?`).get(id);
    if (row === undefined) {
      throw new RepositoryError(operation, definition.entityType, `row ${id} vanished after write`);
    }
    return definition.fromRow(row);
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
