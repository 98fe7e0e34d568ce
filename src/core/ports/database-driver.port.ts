/**
 * Database Driver Port
 *
 * The database client the command layer drives. Connections, statement
 * execution and cursors all live behind this port; nothing above it does
 * I/O of its own.
 */

import type { DataRow } from "../domain/entities/data-row.js";
import type { SqlParameter } from "../domain/entities/sql-parameter.js";
import type { CommandKind } from "../domain/value-objects/command-kind.js";
import type { IsolationLevel } from "../domain/value-objects/isolation-level.js";
import type { ReaderBehavior } from "../domain/value-objects/reader-behavior.js";

export interface ConnectionOptions {
  /** Server-side statement timeout in milliseconds */
  statementTimeoutMs?: number;
}

export interface CommandDefinition {
  statement: string;
  kind: CommandKind;
  /** Bound in this order */
  parameters: readonly SqlParameter[];
}

export interface DriverCursor {
  /**
   * Advance to the next row of the current result set.
   * Resolves false when the result set is exhausted.
   */
  read(): Promise<boolean>;

  /**
   * Row under the cursor; only valid after read() resolved true
   */
  readonly current: DataRow;

  /**
   * Move to the next result set. Resolves false when there is none.
   */
  nextResult(): Promise<boolean>;

  close(): Promise<void>;
}

export interface DriverCommand {
  /**
   * Run the statement and return the number of affected rows
   */
  executeNonQuery(): Promise<number>;

  executeReader(behavior: ReaderBehavior): Promise<DriverCursor>;

  dispose(): void;
}

export interface DriverTransaction {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface DriverConnection {
  open(): Promise<void>;

  createCommand(definition: CommandDefinition): DriverCommand;

  beginTransaction(isolationLevel?: IsolationLevel): Promise<DriverTransaction>;

  close(): Promise<void>;
}

export interface DatabaseDriver {
  /**
   * Create a new, unopened connection. Never pooled or shared.
   */
  createConnection(
    connectionString: string,
    options: ConnectionOptions,
  ): DriverConnection;
}
