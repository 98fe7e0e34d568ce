/**
 * SqlParameter Entity
 *
 * A named value bound to a command. Output parameters are assigned by the
 * driver once the statement has run.
 */

import type { DbType } from "../value-objects/db-type.js";
import {
  isOutputDirection,
  type ParameterDirection,
} from "../value-objects/parameter-direction.js";

/**
 * Explicit database NULL. Parameters never carry `null` or `undefined`.
 */
export const DB_NULL: unique symbol = Symbol.for("sql.DbNull");
export type DbNull = typeof DB_NULL;

export interface SqlParameterProps {
  name: string;
  value?: unknown;
  direction?: ParameterDirection;
  dbType?: DbType;
  size?: number;
}

export class SqlParameter {
  readonly name: string;
  readonly direction: ParameterDirection;
  readonly dbType?: DbType;
  readonly size?: number;
  private current: unknown;

  constructor(props: SqlParameterProps) {
    this.name = props.name;
    this.direction = props.direction ?? "INPUT";
    this.dbType = props.dbType;
    this.size = props.size;
    this.current = props.value ?? DB_NULL;
  }

  static input(name: string, value: unknown): SqlParameter {
    return new SqlParameter({ name, value });
  }

  static output(name: string, dbType: DbType, size?: number): SqlParameter {
    return new SqlParameter({ name, dbType, size, direction: "OUTPUT" });
  }

  get value(): unknown {
    return this.current;
  }

  /**
   * True once the parameter holds anything other than DB_NULL
   */
  get hasValue(): boolean {
    return this.current !== DB_NULL;
  }

  get isOutput(): boolean {
    return isOutputDirection(this.direction);
  }

  /**
   * Store the value the database produced for an output parameter
   */
  assign(value: unknown): void {
    this.current = value ?? DB_NULL;
  }
}

export function isDbNull(value: unknown): value is DbNull {
  return value === DB_NULL;
}
