/**
 * Domain Errors
 *
 * Driver errors are never wrapped: callers receive them exactly as the
 * database client raised them.
 */

export class SqlApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SqlApiError";
  }
}

export class CommandAlreadyExecutedError extends SqlApiError {
  constructor(statement: string) {
    super(`Command has already been executed: ${statement}`);
    this.name = "CommandAlreadyExecutedError";
  }
}

export class DuplicateKeyError extends SqlApiError {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`An element with the same key already exists: ${String(key)}`);
    this.name = "DuplicateKeyError";
    this.key = key;
  }
}

export class FieldNotFoundError extends SqlApiError {
  constructor(field: string | number) {
    super(
      typeof field === "number"
        ? `Field index out of range: ${field}`
        : `Field not found: ${field}`,
    );
    this.name = "FieldNotFoundError";
  }
}

export class FieldTypeError extends SqlApiError {
  constructor(field: string | number, expected: string, actual: unknown) {
    super(
      `Field ${String(field)} is not a ${expected} (got ${actual === null ? "null" : typeof actual})`,
    );
    this.name = "FieldTypeError";
  }
}

export class InvalidIdentifierError extends SqlApiError {
  constructor(identifier: string) {
    super(`Invalid SQL identifier: ${identifier}`);
    this.name = "InvalidIdentifierError";
  }
}

export class ConfigurationError extends SqlApiError {
  readonly keys: string[];

  constructor(keys: string[], detail: string) {
    super(`Invalid configuration (${keys.join(", ")}): ${detail}`);
    this.name = "ConfigurationError";
    this.keys = keys;
  }
}
