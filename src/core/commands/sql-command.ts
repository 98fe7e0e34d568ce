/**
 * SqlCommand
 *
 * Fluent builder for one statement. Configuration calls accumulate
 * parameters; exactly one terminal call then opens a private connection,
 * runs the statement, consumes the results and releases everything.
 */

import type { DataRow } from "../domain/entities/data-row.js";
import { SqlParameter } from "../domain/entities/sql-parameter.js";
import {
  CommandAlreadyExecutedError,
  DuplicateKeyError,
} from "../domain/errors/index.js";
import type { CommandKind } from "../domain/value-objects/command-kind.js";
import type { DbType } from "../domain/value-objects/db-type.js";
import type { IsolationLevel } from "../domain/value-objects/isolation-level.js";
import type { ReaderBehavior } from "../domain/value-objects/reader-behavior.js";
import type {
  ConnectionOptions,
  DatabaseDriver,
  DriverCommand,
  DriverConnection,
  DriverCursor,
} from "../ports/database-driver.port.js";
import type { Logger } from "../ports/logger.port.js";
import type {
  CommandOperation,
  MetricRecorder,
  SpanLike,
  TracerPort,
} from "../ports/telemetry.port.js";

export type RowMapper<T> = (row: DataRow) => T;
export type RowHandler = (row: DataRow) => void;
export type MultiResultRowHandler = (row: DataRow, resultSetIndex: number) => void;

export interface CommandContext {
  connectionString: string;
  driver: DatabaseDriver;
  connectionOptions: ConnectionOptions;
  logger: Logger;
  tracer: TracerPort;
  metrics: MetricRecorder;
  /** Log every statement at debug level before it runs */
  logStatements: boolean;
}

export class SqlCommand {
  private readonly parameters: SqlParameter[] = [];
  private isTransactional = false;
  private isolationLevel?: IsolationLevel;
  private executed = false;

  constructor(
    private readonly context: CommandContext,
    readonly statement: string,
    readonly kind: CommandKind,
  ) {}

  /**
   * Append a parameter. A `null` or `undefined` value binds as DB_NULL.
   *
   * @example
   * ```typescript
   * await session
   *   .text("UPDATE users SET nickname = $1 WHERE id = $2")
   *   .param("nickname", null)
   *   .param("id", 42)
   *   .execute();
   * ```
   */
  param(parameter: SqlParameter): this;
  param(name: string, value: unknown): this;
  param(parameterOrName: SqlParameter | string, value?: unknown): this {
    this.parameters.push(
      typeof parameterOrName === "string"
        ? SqlParameter.input(parameterOrName, value)
        : parameterOrName,
    );
    return this;
  }

  /**
   * Append an output parameter and return its handle. The handle's value is
   * filled in once the terminal call completes.
   *
   * @example
   * ```typescript
   * const command = session.procedure("create_order").param("customer_id", 7);
   * const orderId = command.outParam("order_id", "bigint");
   * await command.execute();
   * console.log(orderId.value);
   * ```
   */
  outParam(name: string, dbType: DbType, size?: number): SqlParameter {
    const parameter = SqlParameter.output(name, dbType, size);
    this.parameters.push(parameter);
    return parameter;
  }

  params(collection: Iterable<SqlParameter>): this {
    for (const parameter of collection) {
      this.parameters.push(parameter);
    }
    return this;
  }

  /**
   * Run the terminal call inside a transaction: committed when the call
   * succeeds, rolled back when it fails.
   */
  transactional(isolationLevel?: IsolationLevel): this {
    this.isTransactional = true;
    this.isolationLevel = isolationLevel;
    return this;
  }

  async execute(): Promise<void> {
    await this.run("execute", async (command, span) => {
      span.setAttribute("db.rows_affected", await command.executeNonQuery());
    });
  }

  /**
   * Map the first row, or resolve `null` when the statement yields none.
   * Rows past the first are never read.
   */
  async queryOne<T extends {}>(map: RowMapper<T>): Promise<T | null> {
    return this.run("queryOne", (command, span) =>
      this.usingCursor(command, "SINGLE_ROW", async (cursor) => {
        const found = await cursor.read();
        span.setAttribute("db.rows_returned", found ? 1 : 0);
        return found ? map(cursor.current) : null;
      }),
    );
  }

  /**
   * Map every row of the first result set, preserving row order
   */
  async query<T>(map: RowMapper<T>): Promise<T[]> {
    const result: T[] = [];
    await this.readFirstResult("query", (row) => {
      result.push(map(row));
    });
    return result;
  }

  /**
   * Hand every row of the first result set to a side-effecting handler
   */
  async queryEach(handler: RowHandler): Promise<void> {
    await this.readFirstResult("queryEach", handler);
  }

  /**
   * Key the first result set by `readKey`. A key seen twice rejects with
   * DuplicateKeyError; Date keys count as seen by their timestamp.
   */
  async queryAsDictionary<TKey, TElement>(
    readKey: RowMapper<TKey>,
    readElement: RowMapper<TElement>,
  ): Promise<Map<TKey, TElement>> {
    const result = new Map<TKey, TElement>();
    const seenTimes = new Set<number>();
    await this.readFirstResult("queryAsDictionary", (row) => {
      const key = readKey(row);
      const seen =
        key instanceof Date ? seenTimes.has(key.getTime()) : result.has(key);
      if (seen) {
        throw new DuplicateKeyError(key);
      }
      if (key instanceof Date) {
        seenTimes.add(key.getTime());
      }
      result.set(key, readElement(row));
    });
    return result;
  }

  /**
   * Visit the rows of every result set. The index starts at 0 and moves on
   * at each result set boundary, empty result sets included.
   */
  async queryMultiple(handler: MultiResultRowHandler): Promise<void> {
    await this.run("queryMultiple", (command, span) =>
      this.usingCursor(command, "DEFAULT", async (cursor) => {
        let resultIndex = 0;
        let rows = 0;
        do {
          while (await cursor.read()) {
            handler(cursor.current, resultIndex);
            rows++;
          }
          resultIndex++;
        } while (await cursor.nextResult());
        span.setAttribute("db.rows_returned", rows);
        span.setAttribute("db.result_sets", resultIndex);
      }),
    );
  }

  private readFirstResult(
    operation: CommandOperation,
    handler: RowHandler,
  ): Promise<void> {
    return this.run(operation, (command, span) =>
      this.usingCursor(command, "SINGLE_RESULT", async (cursor) => {
        let rows = 0;
        while (await cursor.read()) {
          handler(cursor.current);
          rows++;
        }
        span.setAttribute("db.rows_returned", rows);
      }),
    );
  }

  private async usingCursor<T>(
    command: DriverCommand,
    behavior: ReaderBehavior,
    fn: (cursor: DriverCursor) => Promise<T>,
  ): Promise<T> {
    const cursor = await command.executeReader(behavior);
    try {
      return await fn(cursor);
    } finally {
      await cursor.close();
    }
  }

  private async run<T>(
    operation: CommandOperation,
    body: (command: DriverCommand, span: SpanLike) => Promise<T>,
  ): Promise<T> {
    if (this.executed) {
      throw new CommandAlreadyExecutedError(this.statement);
    }
    this.executed = true;

    const { logger, metrics, tracer } = this.context;
    const span = tracer.startSpan(`sql.${operation}`, {
      "db.system": "postgresql",
      "db.statement": this.statement,
      "db.command_kind": this.kind,
      "db.transactional": this.isTransactional,
    });
    const startedAt = Date.now();

    if (this.context.logStatements) {
      logger.debug(`[SqlCommand] ${operation} ${this.kind}: ${this.statement}`);
    }

    try {
      const result = await this.usingCommand(operation, (command) =>
        body(command, span),
      );
      metrics.recordCommand(this.kind, operation, Date.now() - startedAt);
      span.setStatus({ code: 0 });
      return result;
    } catch (error) {
      metrics.recordFailure(
        this.kind,
        operation,
        error instanceof Error ? error.name : typeof error,
      );
      span.setStatus({
        code: 1,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Connection and command are released on every exit path, command first.
   */
  private async usingCommand<T>(
    operation: CommandOperation,
    body: (command: DriverCommand) => Promise<T>,
  ): Promise<T> {
    const { driver, connectionString, connectionOptions } = this.context;
    const connection = driver.createConnection(
      connectionString,
      connectionOptions,
    );

    try {
      const command = connection.createCommand({
        statement: this.statement,
        kind: this.kind,
        parameters: [...this.parameters],
      });

      try {
        await connection.open();
        return this.isTransactional
          ? await this.usingTransaction(connection, operation, command, body)
          : await body(command);
      } finally {
        command.dispose();
      }
    } finally {
      await connection.close();
    }
  }

  /**
   * A failing rollback replaces the error that triggered it.
   */
  private async usingTransaction<T>(
    connection: DriverConnection,
    operation: CommandOperation,
    command: DriverCommand,
    body: (command: DriverCommand) => Promise<T>,
  ): Promise<T> {
    const transaction = await connection.beginTransaction(this.isolationLevel);

    try {
      const result = await body(command);
      await transaction.commit();
      return result;
    } catch (error) {
      this.context.logger.warn(
        `[SqlCommand] Rolling back transaction for ${this.kind} ${this.statement}:`,
        error instanceof Error ? error.message : error,
      );
      this.context.metrics.recordRollback(this.kind, operation);
      await transaction.rollback();
      throw error;
    }
  }
}
