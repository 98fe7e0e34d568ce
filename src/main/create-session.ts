/**
 * Session Composition
 *
 * Wires the PostgreSQL driver, console logging and no-op telemetry into a
 * SqlSession unless the caller supplies their own.
 */

import { SqlSession } from "../core/commands/sql-session.js";
import type { DatabaseDriver } from "../core/ports/database-driver.port.js";
import type { Logger } from "../core/ports/logger.port.js";
import type { MetricRecorder, TracerPort } from "../core/ports/telemetry.port.js";
import { ConsoleLogger, consoleLogger } from "../adapters/logging/console-logger.js";
import { PgDriver } from "../adapters/persistence/pg-driver.js";
import { noopMetrics } from "../adapters/telemetry/metrics.js";
import { noopTracer } from "../adapters/telemetry/tracer.js";
import { loadConfig } from "./config.js";

export interface SessionOptions {
  driver?: DatabaseDriver;
  logger?: Logger;
  tracer?: TracerPort;
  metrics?: MetricRecorder;
  statementTimeoutMs?: number;
  /** Log each statement at debug level */
  logStatements?: boolean;
}

/**
 * @example
 * ```typescript
 * const sql = createSession(process.env.DATABASE_URL ?? "");
 * const names = await sql
 *   .text("SELECT name FROM users WHERE active = $1")
 *   .param("active", true)
 *   .query((row) => row.getString("name"));
 * ```
 */
export function createSession(
  connectionString: string,
  options: SessionOptions = {},
): SqlSession {
  const logger =
    options.logger ??
    (options.logStatements ? new ConsoleLogger("debug") : consoleLogger);

  return new SqlSession(connectionString, {
    driver: options.driver ?? new PgDriver({ logger }),
    logger,
    tracer: options.tracer ?? noopTracer,
    metrics: options.metrics ?? noopMetrics,
    statementTimeoutMs: options.statementTimeoutMs,
    logStatements: options.logStatements,
  });
}

/**
 * Build a session from DATABASE_URL, SQL_STATEMENT_TIMEOUT_MS and
 * SQL_LOG_STATEMENTS. Explicit options win over the environment.
 */
export function createSessionFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: SessionOptions = {},
): SqlSession {
  const config = loadConfig(env);

  return createSession(config.connectionString, {
    ...options,
    statementTimeoutMs: options.statementTimeoutMs ?? config.statementTimeoutMs,
    logStatements: options.logStatements ?? config.logStatements,
  });
}
