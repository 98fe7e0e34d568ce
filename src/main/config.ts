/**
 * Configuration
 *
 * Reads session settings from environment variables.
 */

import { z } from "zod";
import { ConfigurationError } from "../core/domain/errors/index.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const ConfigSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  SQL_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SQL_LOG_STATEMENTS: booleanFlag.default("false"),
});

export interface SqlConfig {
  connectionString: string;
  statementTimeoutMs?: number;
  logStatements: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): SqlConfig {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError([...new Set(keys)], detail);
  }

  const config: SqlConfig = {
    connectionString: parsed.data.DATABASE_URL,
    logStatements: parsed.data.SQL_LOG_STATEMENTS,
  };
  if (parsed.data.SQL_STATEMENT_TIMEOUT_MS !== undefined) {
    config.statementTimeoutMs = parsed.data.SQL_STATEMENT_TIMEOUT_MS;
  }
  return config;
}
