import { z } from "zod";

import { ConfigurationError } from "./errors";
import type { LogLevel } from "./logger";

export const DEFAULT_BUSY_TIMEOUT_MS = 20_000;

export function isTruthyFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized !== "" && normalized !== "0" && normalized !== "false";
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  IHH_DB_PATH: optionalText,
  DATABASE_URL: optionalText,
  IHH_SILENT_INIT: z.string().optional().transform(isTruthyFlag),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  IHH_BUSY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_BUSY_TIMEOUT_MS)
});

export type HarvestHubConfig = {
  databasePath: string | undefined;
  databaseUrl: string | undefined;
  silent: boolean;
  logLevel: LogLevel;
  busyTimeoutMs: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvestHubConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigurationError(`Invalid environment configuration: ${fields}`, {
      cause: parsed.error
    });
  }

  return {
    databasePath: parsed.data.IHH_DB_PATH,
    databaseUrl: parsed.data.DATABASE_URL,
    silent: parsed.data.IHH_SILENT_INIT,
    logLevel: parsed.data.LOG_LEVEL,
    busyTimeoutMs: parsed.data.IHH_BUSY_TIMEOUT_MS
  };
}
