/**
 * DataRow Entity
 *
 * Positional/named accessor over a single result row. Handed to mapping
 * functions one row at a time; do not keep a reference past the callback.
 */

import {
  FieldNotFoundError,
  FieldTypeError,
} from "../errors/index.js";

export type FieldRef = string | number;

export class DataRow {
  constructor(
    private readonly columns: readonly string[],
    private readonly values: readonly unknown[],
  ) {}

  get fieldCount(): number {
    return this.columns.length;
  }

  getName(index: number): string {
    const name = this.columns[index];
    if (name === undefined) {
      throw new FieldNotFoundError(index);
    }
    return name;
  }

  /**
   * Index of the first column with the given name. An exact match wins;
   * otherwise the name is matched ignoring case.
   */
  getOrdinal(name: string): number {
    let index = this.columns.indexOf(name);
    if (index < 0) {
      const lowered = name.toLowerCase();
      index = this.columns.findIndex(
        (column) => column.toLowerCase() === lowered,
      );
    }
    if (index < 0) {
      throw new FieldNotFoundError(name);
    }
    return index;
  }

  /**
   * Raw field value; SQL NULL reads as `null`
   */
  get(field: FieldRef): unknown {
    const index = typeof field === "number" ? field : this.getOrdinal(field);
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      throw new FieldNotFoundError(field);
    }
    return this.values[index] ?? null;
  }

  isNull(field: FieldRef): boolean {
    return this.get(field) === null;
  }

  getString(field: FieldRef): string {
    const value = this.get(field);
    if (typeof value !== "string") {
      throw new FieldTypeError(field, "string", value);
    }
    return value;
  }

  /**
   * Numbers pass through; numeric strings (pg returns bigint and numeric
   * columns as text) are parsed.
   */
  getNumber(field: FieldRef): number {
    const value = this.get(field);
    if (typeof value === "number") {
      return value;
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (!Number.isNaN(parsed)) {
        return parsed;
      }
    }
    throw new FieldTypeError(field, "number", value);
  }

  getBigInt(field: FieldRef): bigint {
    const value = this.get(field);
    if (typeof value === "bigint") {
      return value;
    }
    if (typeof value === "number" && Number.isInteger(value)) {
      return BigInt(value);
    }
    if (typeof value === "string" && /^-?\d+$/.test(value)) {
      return BigInt(value);
    }
    throw new FieldTypeError(field, "bigint", value);
  }

  getBoolean(field: FieldRef): boolean {
    const value = this.get(field);
    if (typeof value !== "boolean") {
      throw new FieldTypeError(field, "boolean", value);
    }
    return value;
  }

  getDate(field: FieldRef): Date {
    const value = this.get(field);
    if (!(value instanceof Date)) {
      throw new FieldTypeError(field, "Date", value);
    }
    return value;
  }

  /**
   * Copy into a plain object keyed by column name. Later duplicates win.
   */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    this.columns.forEach((column, index) => {
      result[column] = this.values[index] ?? null;
    });
    return result;
  }
}
