/**
 * Buffered Cursor
 *
 * DriverCursor over result sets that are already in memory. Honours the
 * reader behavior: SINGLE_RESULT hides every result set after the first,
 * SINGLE_ROW also stops after the first row.
 */

import { DataRow } from "../../core/domain/entities/data-row.js";
import type { ReaderBehavior } from "../../core/domain/value-objects/reader-behavior.js";
import type { DriverCursor } from "../../core/ports/database-driver.port.js";

export interface ResultSet {
  columns: readonly string[];
  rows: readonly (readonly unknown[])[];
}

export class BufferedCursor implements DriverCursor {
  private resultIndex = 0;
  private rowIndex = -1;
  private row?: DataRow;
  private closed = false;

  constructor(
    private readonly resultSets: readonly ResultSet[],
    private readonly behavior: ReaderBehavior = "DEFAULT",
  ) {}

  async read(): Promise<boolean> {
    this.assertOpen();
    this.row = undefined;

    const resultSet = this.resultSets[this.resultIndex];
    if (!resultSet) {
      return false;
    }
    if (this.behavior === "SINGLE_ROW" && this.rowIndex >= 0) {
      return false;
    }

    const values = resultSet.rows[this.rowIndex + 1];
    if (values === undefined) {
      this.rowIndex = resultSet.rows.length;
      return false;
    }

    this.rowIndex++;
    this.row = new DataRow(resultSet.columns, values);
    return true;
  }

  get current(): DataRow {
    if (!this.row) {
      throw new Error("No current row. Call read() first.");
    }
    return this.row;
  }

  async nextResult(): Promise<boolean> {
    this.assertOpen();
    this.row = undefined;

    if (this.behavior !== "DEFAULT") {
      return false;
    }
    if (this.resultIndex + 1 >= this.resultSets.length) {
      this.resultIndex = this.resultSets.length;
      return false;
    }

    this.resultIndex++;
    this.rowIndex = -1;
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.row = undefined;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Cursor is closed");
    }
  }
}
