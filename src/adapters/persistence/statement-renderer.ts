/**
 * Statement Rendering
 *
 * Turns a CommandDefinition into the text and positional values sent to
 * PostgreSQL.
 *
 * TEXT: the statement goes out verbatim. Input parameters bind as $1..$n in
 * insertion order; OUTPUT parameters are not bound and are read back from
 * the first row instead (e.g. `RETURNING id`).
 *
 * PROCEDURE: `CALL name(arg => $1, out_arg => NULL::type)`. Named notation,
 * so parameter names must match the procedure's argument names.
 */

import {
  isDbNull,
  type SqlParameter,
} from "../../core/domain/entities/sql-parameter.js";
import { InvalidIdentifierError } from "../../core/domain/errors/index.js";
import { formatDbType } from "../../core/domain/value-objects/db-type.js";
import { isInputDirection } from "../../core/domain/value-objects/parameter-direction.js";
import type { CommandDefinition } from "../../core/ports/database-driver.port.js";

export interface RenderedStatement {
  text: string;
  values: unknown[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;
const QUALIFIED_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)?$/;

export function renderStatement(definition: CommandDefinition): RenderedStatement {
  return definition.kind === "PROCEDURE"
    ? renderProcedureCall(definition.statement, definition.parameters)
    : renderText(definition.statement, definition.parameters);
}

function renderText(
  statement: string,
  parameters: readonly SqlParameter[],
): RenderedStatement {
  return {
    text: statement,
    values: parameters
      .filter((parameter) => isInputDirection(parameter.direction))
      .map((parameter) => toDriverValue(parameter.value)),
  };
}

function renderProcedureCall(
  name: string,
  parameters: readonly SqlParameter[],
): RenderedStatement {
  if (!QUALIFIED_IDENTIFIER.test(name)) {
    throw new InvalidIdentifierError(name);
  }

  const values: unknown[] = [];
  const args = parameters.map((parameter) => {
    if (!IDENTIFIER.test(parameter.name)) {
      throw new InvalidIdentifierError(parameter.name);
    }

    const cast = parameter.dbType
      ? `::${formatDbType(parameter.dbType, parameter.size)}`
      : "";

    if (!isInputDirection(parameter.direction)) {
      return `${parameter.name} => NULL${cast}`;
    }

    values.push(toDriverValue(parameter.value));
    return `${parameter.name} => $${values.length}${cast}`;
  });

  return { text: `CALL ${name}(${args.join(", ")})`, values };
}

/**
 * pg serializes most values itself; only the markers it does not know
 * need converting.
 */
export function toDriverValue(value: unknown): unknown {
  if (isDbNull(value)) {
    return null;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}
