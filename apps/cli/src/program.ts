import path from "node:path";

import {
  HarvestHubError,
  createLogger,
  loadConfig,
  type LogSink,
  type Logger
} from "@harvest-hub/core";
import {
  DatabaseManager,
  resolveDatabaseLocation,
  withStore,
  type MigrationRunResult,
  type MigrationStep,
  type SchemaVerification
} from "@harvest-hub/db";
import { Command, CommanderError } from "commander";

export type CliContext = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Structured log lines; JSON on stderr when absent so stdout stays a plain report. */
  logSink?: LogSink;
};

type GlobalOptions = {
  db?: string;
};

type DryRunOptions = {
  dryRun?: boolean;
};

function defaultContext(): CliContext {
  return {
    env: process.env,
    cwd: process.cwd(),
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    }
  };
}

export function formatMigrationLines(
  steps: readonly MigrationStep[],
  pendingBefore: readonly string[],
  run: MigrationRunResult,
  dryRun: boolean
): string[] {
  const pending = new Set(pendingBefore);
  const lines: string[] = [];
  for (const [version, ok] of run.results) {
    const description = steps.find((step) => step.version === version)?.description ?? "";
    let outcome: string;
    if (!ok) {
      outcome = "failed";
    } else if (!pending.has(version)) {
      outcome = "already applied";
    } else {
      outcome = dryRun ? "would apply" : "applied";
    }
    lines.push(`${version} ${description}: ${outcome}`);
  }
  return lines;
}

export function formatVerificationLines(verification: SchemaVerification): string[] {
  const lines = [`Schema: ${verification.valid ? "valid" : "invalid"}`];
  for (const table of verification.missingTables) {
    lines.push(`  missing table: ${table}`);
  }
  for (const [table, columns] of Object.entries(verification.missingColumns)) {
    for (const column of columns) {
      lines.push(`  missing column: ${table}.${column}`);
    }
  }
  return lines;
}

/**
 * `harvest-db` operator commands. Each action opens the store, does its work and
 * closes it again; the returned exit code is reported through `setExitCode`.
 */
export function buildProgram(context: CliContext, setExitCode: (code: number) => void): Command {
  const print = (lines: readonly string[]) => {
    for (const line of lines) {
      context.stdout(`${line}\n`);
    }
  };

  function withManager(command: Command, fn: (manager: DatabaseManager, log: Logger) => number): void {
    const globals = command.optsWithGlobals<GlobalOptions>();
    try {
      const config = loadConfig(context.env);
      const log = createLogger({
        level: config.logLevel,
        silent: config.silent,
        sink:
          context.logSink ??
          ((entry) => {
            context.stderr(`${JSON.stringify(entry)}\n`);
          })
      });
      const location = resolveDatabaseLocation(
        globals.db
          ? { databasePath: path.resolve(context.cwd, globals.db) }
          : { databasePath: config.databasePath, databaseUrl: config.databaseUrl },
        { projectRoot: context.cwd }
      );
      const code = withStore(
        { location: location.path, busyTimeoutMs: config.busyTimeoutMs, logger: log },
        (handle) => fn(new DatabaseManager(handle, { logger: log }), log)
      );
      setExitCode(code);
    } catch (error) {
      if (error instanceof HarvestHubError) {
        context.stderr(`Error: ${error.message}\n`);
        setExitCode(1);
        return;
      }
      throw error;
    }
  }

  const program = new Command("harvest-db")
    .description("Create, migrate and inspect the Harvest Hub store")
    .option("--db <path>", "store file location (overrides IHH_DB_PATH and DATABASE_URL)")
    .exitOverride()
    .configureOutput({ writeOut: context.stdout, writeErr: context.stderr });

  program
    .command("init")
    .description("Create missing tables, apply pending migrations and verify the schema")
    .option("--dry-run", "report what would run without writing", false)
    .action((options: DryRunOptions, command: Command) => {
      withManager(command, (manager) => {
        const dryRun = options.dryRun === true;
        const steps = manager.migrationSteps;
        const pendingBefore = manager.migrationLedger.getStatus(steps).pendingVersions;
        const result = manager.initialize({ dryRun });
        print([`Database: ${manager.schemaVerifier.getDatabaseInfo().path}`]);
        print(formatMigrationLines(steps, pendingBefore, result.migrations, dryRun));
        print(formatVerificationLines(result.verification));
        return 0;
      });
    });

  program
    .command("status")
    .description("Print database, migration and schema status")
    .action((_options: unknown, command: Command) => {
      withManager(command, (manager) => {
        print([manager.formatStatusReport()]);
        return 0;
      });
    });

  program
    .command("verify")
    .description("Compare the live schema with the table catalogue")
    .action((_options: unknown, command: Command) => {
      withManager(command, (manager) => {
        const verification = manager.schemaVerifier.verifySchema();
        print(formatVerificationLines(verification));
        return verification.valid ? 0 : 1;
      });
    });

  program
    .command("migrate")
    .description("Apply pending migrations only")
    .option("--dry-run", "list pending migrations without applying them", false)
    .action((options: DryRunOptions, command: Command) => {
      withManager(command, (manager) => {
        const dryRun = options.dryRun === true;
        const steps = manager.migrationSteps;
        const pendingBefore = manager.migrationLedger.getStatus(steps).pendingVersions;
        const run = manager.migrationLedger.runPending(steps, { dryRun });
        print(formatMigrationLines(steps, pendingBefore, run, dryRun));
        if (run.failure) {
          context.stderr(`Error: ${run.failure.message}\n`);
          return 1;
        }
        return 0;
      });
    });

  program
    .command("revert")
    .description("Revert one applied migration")
    .argument("<version>", "migration version, e.g. 003")
    .action((version: string, _options: unknown, command: Command) => {
      withManager(command, (manager, log) => {
        manager.revert(version);
        log.info("Migration reverted from CLI", { version });
        print([`Reverted ${version}`]);
        return 0;
      });
    });

  return program;
}

/** Parses `argv` (arguments only, without node and script) and returns the exit code. */
export function runCli(argv: readonly string[], overrides: Partial<CliContext> = {}): number {
  const context: CliContext = { ...defaultContext(), ...overrides };
  let exitCode = 0;
  const program = buildProgram(context, (code) => {
    exitCode = code;
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
