/**
 * SqlSession
 *
 * Holds a connection string and hands out command builders. Creating a
 * command does no I/O and validates nothing.
 */

import type { ConnectionOptions, DatabaseDriver } from "../ports/database-driver.port.js";
import type { Logger } from "../ports/logger.port.js";
import type { MetricRecorder, TracerPort } from "../ports/telemetry.port.js";
import { SqlCommand, type CommandContext } from "./sql-command.js";

export interface SqlSessionConfig {
  driver: DatabaseDriver;
  logger: Logger;
  tracer: TracerPort;
  metrics: MetricRecorder;
  statementTimeoutMs?: number;
  logStatements?: boolean;
}

export class SqlSession {
  private readonly context: CommandContext;

  constructor(
    readonly connectionString: string,
    config: SqlSessionConfig,
  ) {
    const connectionOptions: ConnectionOptions = {};
    if (config.statementTimeoutMs !== undefined) {
      connectionOptions.statementTimeoutMs = config.statementTimeoutMs;
    }

    this.context = {
      connectionString,
      driver: config.driver,
      connectionOptions,
      logger: config.logger,
      tracer: config.tracer,
      metrics: config.metrics,
      logStatements: config.logStatements ?? false,
    };
  }

  /**
   * Command that calls a stored procedure
   */
  procedure(name: string): SqlCommand {
    return new SqlCommand(this.context, name, "PROCEDURE");
  }

  /**
   * Command that runs a literal SQL statement
   */
  text(sql: string): SqlCommand {
    return new SqlCommand(this.context, sql, "TEXT");
  }
}
