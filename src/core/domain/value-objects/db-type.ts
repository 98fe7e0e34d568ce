/**
 * Database Type Value Object
 *
 * PostgreSQL type names an output parameter may declare.
 */

export type DbType =
  | "smallint"
  | "int"
  | "bigint"
  | "numeric"
  | "real"
  | "double precision"
  | "text"
  | "varchar"
  | "char"
  | "boolean"
  | "uuid"
  | "date"
  | "timestamp"
  | "timestamptz"
  | "json"
  | "jsonb"
  | "bytea";

const SIZED_TYPES: ReadonlySet<DbType> = new Set<DbType>([
  "varchar",
  "char",
  "numeric",
]);

/**
 * Render a type declaration, e.g. `varchar(40)`.
 * Size is ignored for types that take no length.
 */
export function formatDbType(type: DbType, size?: number): string {
  if (size === undefined || !SIZED_TYPES.has(type)) {
    return type;
  }
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Invalid size for ${type}: ${size}`);
  }
  return `${type}(${size})`;
}
