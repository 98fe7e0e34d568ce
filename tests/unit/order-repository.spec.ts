import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OrderRepository } from '../../examples/order-repository.js';
import { SqlSession } from '../../src/core/commands/sql-session.js';
import { noopMetrics } from '../../src/adapters/telemetry/metrics.js';
import { noopTracer } from '../../src/adapters/telemetry/tracer.js';
import { createFakeDriver, type FakeDatabase } from '../support/fake-driver.js';

const COLUMNS = ['id', 'customer_id', 'status', 'total'];

describe('OrderRepository example', () => {
  let database: FakeDatabase;
  let repository: OrderRepository;

  beforeEach(() => {
    const fake = createFakeDriver();
    database = fake.database;
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    repository = new OrderRepository(
      new SqlSession('postgres://shop', { driver: fake.driver, logger, tracer: noopTracer, metrics: noopMetrics }),
    );
    database.seed('orders', [
      [1, 10, 'open', 25],
      [2, 10, 'shipped', 40],
      [3, 11, 'open', 15],
    ]);
  });

  it('should place an order through the procedure', async () => {
    database.define('place_order', ({ parameters, tables }) => {
      const orders = tables.get('orders') ?? [];
      const id = orders.length + 1;
      orders.push([id, parameters[0]?.value, 'open', parameters[1]?.value]);
      parameters.find((parameter) => parameter.name === 'order_id')?.assign(id);
    });

    expect(await repository.place(12, 99)).toBe(4);
    expect(database.rows('orders')[3]).toEqual([4, 12, 'open', 99]);
    expect(database.stats.commits).toBe(1);
  });

  it('should find a single order or nothing', async () => {
    database.define('SELECT id, customer_id, status, total FROM orders WHERE id = $1', ({ parameters, tables }) => [
      {
        columns: COLUMNS,
        rows: (tables.get('orders') ?? []).filter((row) => row[0] === parameters[0]?.value),
      },
    ]);

    expect(await repository.findById(2)).toEqual({ id: 2, customerId: 10, status: 'shipped', total: 40 });
    expect(await repository.findById(9)).toBeNull();
  });

  it('should build the dashboard from two result sets', async () => {
    database.define(
      `SELECT id, customer_id, status, total FROM orders WHERE status = 'open' ORDER BY id;
         SELECT count(*) AS n FROM orders WHERE status = 'shipped' AND shipped_at >= current_date`,
      ({ tables }) => {
        const orders = tables.get('orders') ?? [];
        return [
          { columns: COLUMNS, rows: orders.filter((row) => row[2] === 'open') },
          { columns: ['n'], rows: [[orders.filter((row) => row[2] === 'shipped').length]] },
        ];
      },
    );

    expect(await repository.dashboard()).toEqual({
      open: [
        { id: 1, customerId: 10, status: 'open', total: 25 },
        { id: 3, customerId: 11, status: 'open', total: 15 },
      ],
      shippedToday: 1,
    });
  });

  it('should total orders by status', async () => {
    database.define('SELECT status, sum(total) AS total FROM orders GROUP BY status', () => [
      { columns: ['status', 'total'], rows: [['open', '40'], ['shipped', '40']] },
    ]);

    const totals = await repository.totalsByStatus();

    expect(totals).toEqual(
      new Map([
        ['open', 40],
        ['shipped', 40],
      ]),
    );
  });
});
