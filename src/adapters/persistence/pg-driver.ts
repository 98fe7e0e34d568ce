/**
 * PostgreSQL Driver (Default)
 *
 * Implements DatabaseDriver on top of pg.Client. Every connection is a fresh
 * client that lives for one terminal call; nothing is pooled.
 */

import pg from "pg";
import type { Client, ClientConfig, QueryArrayResult } from "pg";
import type { SqlParameter } from "../../core/domain/entities/sql-parameter.js";
import {
  isValidIsolationLevel,
  type IsolationLevel,
} from "../../core/domain/value-objects/isolation-level.js";
import type { ReaderBehavior } from "../../core/domain/value-objects/reader-behavior.js";
import type {
  CommandDefinition,
  ConnectionOptions,
  DatabaseDriver,
  DriverCommand,
  DriverConnection,
  DriverCursor,
  DriverTransaction,
} from "../../core/ports/database-driver.port.js";
import type { Logger } from "../../core/ports/logger.port.js";
import { BufferedCursor, type ResultSet } from "./buffered-cursor.js";
import { renderStatement, type RenderedStatement } from "./statement-renderer.js";

type ArrayResult = QueryArrayResult<unknown[]>;

export type PgClientFactory = (config: ClientConfig) => Client;

export interface PgDriverOptions {
  logger: Logger;
  /** Defaults to `new pg.Client(config)` */
  createClient?: PgClientFactory;
}

export class PgDriver implements DatabaseDriver {
  private readonly createClient: PgClientFactory;

  constructor(private readonly options: PgDriverOptions) {
    this.createClient = options.createClient ?? ((config) => new pg.Client(config));
  }

  createConnection(
    connectionString: string,
    options: ConnectionOptions,
  ): DriverConnection {
    const config: ClientConfig = { connectionString };
    if (options.statementTimeoutMs !== undefined) {
      config.statement_timeout = options.statementTimeoutMs;
    }

    const client = this.createClient(config);
    // An unhandled 'error' event would crash the process
    client.on("error", (error) => {
      this.options.logger.error("[PgDriver] Client error:", error.message);
    });

    return new PgConnection(client);
  }
}

class PgConnection implements DriverConnection {
  constructor(private readonly client: Client) {}

  async open(): Promise<void> {
    await this.client.connect();
  }

  createCommand(definition: CommandDefinition): DriverCommand {
    return new PgCommand(this.client, definition);
  }

  async beginTransaction(isolationLevel?: IsolationLevel): Promise<DriverTransaction> {
    if (isolationLevel !== undefined && !isValidIsolationLevel(isolationLevel)) {
      throw new RangeError(`Unknown isolation level: ${String(isolationLevel)}`);
    }

    await this.client.query(
      isolationLevel ? `BEGIN ISOLATION LEVEL ${isolationLevel}` : "BEGIN",
    );
    return new PgTransaction(this.client);
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

class PgTransaction implements DriverTransaction {
  constructor(private readonly client: Client) {}

  async commit(): Promise<void> {
    await this.client.query("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.client.query("ROLLBACK");
  }
}

class PgCommand implements DriverCommand {
  private readonly rendered: RenderedStatement;
  private readonly outputs: SqlParameter[];
  private disposed = false;

  constructor(
    private readonly client: Client,
    definition: CommandDefinition,
  ) {
    this.rendered = renderStatement(definition);
    this.outputs = definition.parameters.filter((parameter) => parameter.isOutput);
  }

  async executeNonQuery(): Promise<number> {
    const results = await this.send();
    return results.reduce((total, result) => total + (result.rowCount ?? 0), 0);
  }

  async executeReader(behavior: ReaderBehavior): Promise<DriverCursor> {
    const results = await this.send();
    return new BufferedCursor(results.map(toResultSet), behavior);
  }

  dispose(): void {
    this.disposed = true;
  }

  private async send(): Promise<ArrayResult[]> {
    if (this.disposed) {
      throw new Error("Command has been disposed");
    }

    // Without values pg uses the simple protocol, which allows several
    // statements and answers with one result per statement
    const results = toResultList(
      await this.client.query<unknown[]>({
        text: this.rendered.text,
        values: this.rendered.values.length > 0 ? this.rendered.values : undefined,
        rowMode: "array",
      }),
    );

    this.assignOutputs(results[0]);
    return results;
  }

  /**
   * Output values come back as columns of the first row: the row a CALL
   * returns, or whatever a TEXT statement RETURNs.
   */
  private assignOutputs(result: ArrayResult | undefined): void {
    if (this.outputs.length === 0 || !result) {
      return;
    }

    const row = result.rows[0];
    if (!row) {
      return;
    }

    const columns = result.fields.map((field) => field.name.toLowerCase());
    for (const parameter of this.outputs) {
      const index = columns.indexOf(parameter.name.toLowerCase());
      if (index >= 0) {
        parameter.assign(row[index]);
      }
    }
  }
}

function toResultList(raw: ArrayResult | ArrayResult[]): ArrayResult[] {
  return Array.isArray(raw) ? raw : [raw];
}

function toResultSet(result: ArrayResult): ResultSet {
  return {
    columns: result.fields.map((field) => field.name),
    rows: result.rows,
  };
}
