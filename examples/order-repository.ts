/**
 * Order Repository Example
 *
 * A hand-written repository on top of SqlSession, showing each terminal
 * call in context:
 * - stored procedure with an output parameter
 * - single-row lookup that may miss
 * - list and dictionary queries
 * - a dashboard read spanning several result sets
 */

import type { SqlSession } from "../src/core/commands/sql-session.js";
import type { DataRow } from "../src/core/domain/entities/data-row.js";

export interface Order {
  id: number;
  customerId: number;
  status: string;
  total: number;
}

export interface Dashboard {
  open: Order[];
  shippedToday: number;
}

function toOrder(row: DataRow): Order {
  return {
    id: row.getNumber("id"),
    customerId: row.getNumber("customer_id"),
    status: row.getString("status"),
    total: row.getNumber("total"),
  };
}

export class OrderRepository {
  constructor(private readonly sql: SqlSession) {}

  /**
   * Calls `place_order(customer_id, total, OUT order_id)` and returns the
   * id the database generated.
   */
  async place(customerId: number, total: number): Promise<number> {
    const command = this.sql
      .procedure("place_order")
      .param("customer_id", customerId)
      .param("total", total)
      .transactional();
    const orderId = command.outParam("order_id", "int");

    await command.execute();

    if (typeof orderId.value !== "number") {
      throw new Error("place_order did not return an order id");
    }
    return orderId.value;
  }

  findById(id: number): Promise<Order | null> {
    return this.sql
      .text("SELECT id, customer_id, status, total FROM orders WHERE id = $1")
      .param("id", id)
      .queryOne(toOrder);
  }

  findByCustomer(customerId: number): Promise<Order[]> {
    return this.sql
      .text(
        "SELECT id, customer_id, status, total FROM orders WHERE customer_id = $1 ORDER BY id",
      )
      .param("customer_id", customerId)
      .query(toOrder);
  }

  totalsByStatus(): Promise<Map<string, number>> {
    return this.sql
      .text("SELECT status, sum(total) AS total FROM orders GROUP BY status")
      .queryAsDictionary(
        (row) => row.getString("status"),
        (row) => row.getNumber("total"),
      );
  }

  async dashboard(): Promise<Dashboard> {
    const dashboard: Dashboard = { open: [], shippedToday: 0 };

    await this.sql
      .text(
        `SELECT id, customer_id, status, total FROM orders WHERE status = 'open' ORDER BY id;
         SELECT count(*) AS n FROM orders WHERE status = 'shipped' AND shipped_at >= current_date`,
      )
      .queryMultiple((row, resultSet) => {
        if (resultSet === 0) {
          dashboard.open.push(toOrder(row));
        } else {
          dashboard.shippedToday = row.getNumber("n");
        }
      });

    return dashboard;
  }
}
