import fs from "node:fs";
import path from "node:path";

import {
  ConfigurationError,
  DEFAULT_BUSY_TIMEOUT_MS,
  describeError,
  logger as defaultLogger,
  type HarvestHubConfig,
  type Logger
} from "@harvest-hub/core";
import Database from "better-sqlite3";

export const DB_FILE_NAME = "island_harvest_hub.db";
export const FALLBACK_DB_PATH = "/mnt/data/island_harvest_hub.db";

const SQLITE_URL_PREFIX = "sqlite:///";

export type DatabaseLocationSource = "env_path" | "database_url" | "project_root" | "fallback";

export type DatabaseLocation = {
  path: string;
  source: DatabaseLocationSource;
};

export type ResolveLocationOptions = {
  projectRoot?: string;
  fallbackPath?: string;
};

export type StoreHandle = {
  db: Database.Database;
  path: string;
  created: boolean;
};

export type OpenStoreOptions = {
  location: string;
  busyTimeoutMs?: number;
  logger?: Logger;
};

function assertAbsolute(candidate: string, origin: string): string {
  if (!path.isAbsolute(candidate)) {
    throw new ConfigurationError(`${origin} must be an absolute path: ${candidate}`);
  }
  return candidate;
}

function parseDatabaseUrl(databaseUrl: string): string {
  if (!databaseUrl.startsWith(SQLITE_URL_PREFIX)) {
    throw new ConfigurationError(
      "DATABASE_URL must be a SQLite absolute path (sqlite:////absolute/path)"
    );
  }
  return assertAbsolute(databaseUrl.slice(SQLITE_URL_PREFIX.length), "DATABASE_URL");
}

/**
 * Picks the single store file for this process: the legacy connection string,
 * then the explicit path, then the project root, then the platform fallback.
 */
export function resolveDatabaseLocation(
  config: Partial<Pick<HarvestHubConfig, "databasePath" | "databaseUrl">>,
  options: ResolveLocationOptions = {}
): DatabaseLocation {
  // The legacy connection string overrides the explicit path when both are set.
  if (config.databaseUrl) {
    return { path: parseDatabaseUrl(config.databaseUrl), source: "database_url" };
  }

  if (config.databasePath) {
    return { path: path.resolve(config.databasePath), source: "env_path" };
  }

  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const projectPath = path.join(projectRoot, DB_FILE_NAME);
  if (fs.existsSync(projectPath) || fs.existsSync(projectRoot)) {
    return { path: projectPath, source: "project_root" };
  }

  return {
    path: assertAbsolute(options.fallbackPath ?? FALLBACK_DB_PATH, "Fallback database path"),
    source: "fallback"
  };
}

function applyOperationalPragmas(db: Database.Database, busyTimeoutMs: number): void {
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("synchronous = NORMAL");
  db.pragma(`busy_timeout = ${busyTimeoutMs}`);
  db.pragma("temp_store = MEMORY");
  db.pragma("cache_size = 10000");
}

export function openStore(options: OpenStoreOptions): StoreHandle {
  const log = options.logger ?? defaultLogger;
  const dbPath = assertAbsolute(options.location, "Database path");
  const busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;

  try {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  } catch (error) {
    log.error("Failed to create database directory", { path: dbPath, error });
    throw new ConfigurationError(`Cannot create database directory for ${dbPath}`, {
      cause: error
    });
  }

  const created = !fs.existsSync(dbPath);
  const db = new Database(dbPath, { timeout: busyTimeoutMs });
  try {
    applyOperationalPragmas(db, busyTimeoutMs);
  } catch (error) {
    db.close();
    log.error("Failed to configure database connection", { path: dbPath, error });
    throw error;
  }

  log.info("Database opened", { path: dbPath, created });
  return { db, path: dbPath, created };
}

export function closeStore(handle: StoreHandle): void {
  if (handle.db.open) {
    handle.db.close();
  }
}

/** Opens a store for the duration of `fn` and always closes it afterwards. */
export function withStore<T>(options: OpenStoreOptions, fn: (handle: StoreHandle) => T): T {
  const handle = openStore(options);
  try {
    return fn(handle);
  } finally {
    closeStore(handle);
  }
}

export function resolveDefaultSchemaFile(): string {
  return path.resolve(__dirname, "../sql/schema.sql");
}

function splitStatements(sql: string): string[] {
  return sql
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

const CREATE_TABLE_PATTERN = /^CREATE TABLE IF NOT EXISTS\s+([A-Za-z_][A-Za-z0-9_]*)/i;

/** Canonical CREATE TABLE statement per table name, in file order. */
export function loadTableDefinitions(
  schemaFile: string = resolveDefaultSchemaFile()
): Map<string, string> {
  const definitions = new Map<string, string>();
  for (const statement of splitStatements(fs.readFileSync(schemaFile, "utf8"))) {
    const match = CREATE_TABLE_PATTERN.exec(statement);
    if (match) {
      definitions.set(match[1], statement);
    }
  }
  return definitions;
}

/** Creates every missing entity table. Safe to call on an initialized store. */
export function ensureCreated(
  handle: StoreHandle,
  schemaFile: string = resolveDefaultSchemaFile(),
  log: Logger = defaultLogger
): void {
  const sql = fs.readFileSync(schemaFile, "utf8");
  try {
    handle.db.exec(sql);
  } catch (error) {
    log.error("Failed to create schema", { path: handle.path, error: describeError(error) });
    throw error;
  }
  log.info("Schema initialized", { path: handle.path });
}
