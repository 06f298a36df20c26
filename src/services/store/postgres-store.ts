// PostgreSQL SupportStore (pg connection pool)
// Table layout lives in sql/schema.sql

import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import type {
  Customer,
  CustomerFilter,
  CustomerUpdate,
  NewTicket,
  OpenTicketSummary,
  Priority,
  SupportStore,
  Ticket,
  TicketWithCustomer,
} from './types.js';

const { Pool } = pg;

interface CustomerRow {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  status: Customer['status'];
  created_at: Date;
  updated_at: Date;
}

interface TicketRow {
  id: number;
  customer_id: number;
  issue: string;
  status: Ticket['status'];
  priority: Priority;
  created_at: Date;
}

interface TicketWithCustomerRow extends TicketRow {
  customer_name: string;
}

interface OpenTicketRow extends CustomerRow {
  open_ticket_count: string; // COUNT() comes back as bigint text
}

const CUSTOMER_COLUMNS = 'id, name, email, phone, status, created_at, updated_at';
const TICKET_COLUMNS = 'id, customer_id, issue, status, priority, created_at';
const UPDATABLE_FIELDS: ReadonlyArray<keyof CustomerUpdate> = ['name', 'email', 'phone', 'status'];

function toCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    status: row.status,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

function toTicket(row: TicketRow): Ticket {
  return {
    id: row.id,
    customer_id: row.customer_id,
    issue: row.issue,
    status: row.status,
    priority: row.priority,
    created_at: row.created_at.toISOString(),
  };
}

export interface PostgresStoreOptions {
  connectionString: string;
  max?: number;
}

export class PostgresSupportStore implements SupportStore {
  readonly driver = 'postgres';
  private pool: PgPool;

  constructor(options: PostgresStoreOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      max: options.max ?? 5,
    });
  }

  async findCustomer(id: number): Promise<Customer | null> {
    const result = await this.pool.query<CustomerRow>(
      `SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE id = $1`,
      [id]
    );
    return result.rows[0] ? toCustomer(result.rows[0]) : null;
  }

  async listCustomers(filter: CustomerFilter): Promise<Customer[]> {
    const offset = filter.offset ?? 0;
    const result = filter.status
      ? await this.pool.query<CustomerRow>(
          `SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE status = $1 ORDER BY id LIMIT $2 OFFSET $3`,
          [filter.status, filter.limit, offset]
        )
      : await this.pool.query<CustomerRow>(
          `SELECT ${CUSTOMER_COLUMNS} FROM customers ORDER BY id LIMIT $1 OFFSET $2`,
          [filter.limit, offset]
        );
    return result.rows.map(toCustomer);
  }

  async updateCustomer(id: number, fields: CustomerUpdate): Promise<Customer | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const field of UPDATABLE_FIELDS) {
      const value = fields[field];
      if (value === undefined) continue;
      values.push(value);
      assignments.push(`${field} = $${values.length}`);
    }

    // A single UPDATE statement is atomic; updated_at always moves forward
    assignments.push(`updated_at = GREATEST(clock_timestamp(), updated_at + interval '1 millisecond')`);
    values.push(id);

    const result = await this.pool.query<CustomerRow>(
      `UPDATE customers SET ${assignments.join(', ')} WHERE id = $${values.length} RETURNING ${CUSTOMER_COLUMNS}`,
      values
    );
    return result.rows[0] ? toCustomer(result.rows[0]) : null;
  }

  async insertTicket(ticket: NewTicket): Promise<Ticket> {
    const result = await this.pool.query<TicketRow>(
      `INSERT INTO tickets (customer_id, issue, status, priority)
       VALUES ($1, $2, 'open', $3)
       RETURNING ${TICKET_COLUMNS}`,
      [ticket.customer_id, ticket.issue, ticket.priority]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO tickets returned no row');
    }
    return toTicket(row);
  }

  async listTicketsForCustomer(customerId: number): Promise<Ticket[]> {
    const result = await this.pool.query<TicketRow>(
      `SELECT ${TICKET_COLUMNS} FROM tickets WHERE customer_id = $1 ORDER BY created_at DESC, id DESC`,
      [customerId]
    );
    return result.rows.map(toTicket);
  }

  async listTicketsByPriority(priority: Priority, customerIds?: number[]): Promise<TicketWithCustomer[]> {
    if (customerIds && customerIds.length === 0) return [];

    const base = `SELECT t.id, t.customer_id, c.name AS customer_name,
                         t.issue, t.status, t.priority, t.created_at
                  FROM tickets t
                  JOIN customers c ON t.customer_id = c.id
                  WHERE t.priority = $1`;
    const result = customerIds
      ? await this.pool.query<TicketWithCustomerRow>(
          `${base} AND t.customer_id = ANY($2::int[]) ORDER BY t.created_at DESC, t.id DESC`,
          [priority, customerIds]
        )
      : await this.pool.query<TicketWithCustomerRow>(
          `${base} ORDER BY t.created_at DESC, t.id DESC`,
          [priority]
        );

    return result.rows.map(row => ({ ...toTicket(row), customer_name: row.customer_name }));
  }

  async listCustomersWithOpenTickets(): Promise<OpenTicketSummary[]> {
    const result = await this.pool.query<OpenTicketRow>(
      `SELECT c.id, c.name, c.email, c.phone, c.status, c.created_at, c.updated_at,
              COUNT(t.id) AS open_ticket_count
       FROM customers c
       JOIN tickets t ON c.id = t.customer_id
       WHERE t.status = 'open'
       GROUP BY c.id
       ORDER BY open_ticket_count DESC, c.id ASC`
    );
    return result.rows.map(row => ({
      customer: toCustomer(row),
      open_ticket_count: parseInt(row.open_ticket_count, 10),
    }));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
