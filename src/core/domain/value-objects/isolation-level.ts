/**
 * Transaction Isolation Level Value Object
 */

export type IsolationLevel =
  | "READ UNCOMMITTED"
  | "READ COMMITTED"
  | "REPEATABLE READ"
  | "SERIALIZABLE";

export const IsolationLevelValues: readonly IsolationLevel[] = [
  "READ UNCOMMITTED",
  "READ COMMITTED",
  "REPEATABLE READ",
  "SERIALIZABLE",
];

export function isValidIsolationLevel(level: string): level is IsolationLevel {
  return IsolationLevelValues.includes(level as IsolationLevel);
}
