import { describe, it, expect } from 'vitest';
import { renderStatement, toDriverValue } from '../../src/adapters/persistence/statement-renderer.js';
import { DB_NULL, SqlParameter } from '../../src/core/domain/entities/sql-parameter.js';
import { InvalidIdentifierError } from '../../src/core/domain/errors/index.js';

describe('renderStatement', () => {
  it('should send text verbatim with input values in order', () => {
    const rendered = renderStatement({
      statement: 'INSERT INTO notes (owner, body) VALUES ($1, $2) RETURNING id',
      kind: 'TEXT',
      parameters: [
        SqlParameter.input('owner', 3),
        SqlParameter.output('id', 'bigint'),
        SqlParameter.input('body', null),
      ],
    });

    expect(rendered).toEqual({
      text: 'INSERT INTO notes (owner, body) VALUES ($1, $2) RETURNING id',
      values: [3, null],
    });
  });

  it('should render a procedure call in named notation', () => {
    const rendered = renderStatement({
      statement: 'billing.create_invoice',
      kind: 'PROCEDURE',
      parameters: [
        SqlParameter.input('customer_id', 7),
        SqlParameter.input('note', undefined),
        SqlParameter.output('invoice_id', 'bigint'),
        SqlParameter.output('code', 'varchar', 12),
        SqlParameter.input('amount', 10n),
      ],
    });

    expect(rendered.text).toBe(
      'CALL billing.create_invoice(customer_id => $1, note => $2, invoice_id => NULL::bigint, code => NULL::varchar(12), amount => $3)',
    );
    expect(rendered.values).toEqual([7, null, '10']);
  });

  it('should bind INPUT_OUTPUT parameters with their declared type', () => {
    const rendered = renderStatement({
      statement: 'bump',
      kind: 'PROCEDURE',
      parameters: [new SqlParameter({ name: 'counter', value: 1, direction: 'INPUT_OUTPUT', dbType: 'int' })],
    });

    expect(rendered).toEqual({ text: 'CALL bump(counter => $1::int)', values: [1] });
  });

  it('should call a procedure without arguments', () => {
    expect(renderStatement({ statement: 'refresh_stats', kind: 'PROCEDURE', parameters: [] })).toEqual({
      text: 'CALL refresh_stats()',
      values: [],
    });
  });

  it('should reject names that are not identifiers', () => {
    expect(() =>
      renderStatement({ statement: 'x(); DROP TABLE users; --', kind: 'PROCEDURE', parameters: [] }),
    ).toThrow(InvalidIdentifierError);
    expect(() =>
      renderStatement({
        statement: 'create_user',
        kind: 'PROCEDURE',
        parameters: [SqlParameter.input('user name', 'ada')],
      }),
    ).toThrow('Invalid SQL identifier: user name');
  });
});

describe('toDriverValue', () => {
  it('should turn markers pg does not know into values it does', () => {
    expect(toDriverValue(DB_NULL)).toBeNull();
    expect(toDriverValue(12345678901234567890n)).toBe('12345678901234567890');
    const when = new Date('2024-01-01T00:00:00Z');
    expect(toDriverValue(when)).toBe(when);
  });
});
