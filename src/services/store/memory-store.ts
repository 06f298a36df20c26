// In-process SupportStore
// Used for local development (seeded from data/seed.json) and by the test suite

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

export interface MemoryStoreSeed {
  customers: Customer[];
  tickets: Ticket[];
}

export interface MemoryStoreOptions {
  now?: () => Date;
}

function newestFirst(a: Ticket, b: Ticket): number {
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1;
  return b.id - a.id;
}

export class MemorySupportStore implements SupportStore {
  readonly driver = 'memory';
  private customers = new Map<number, Customer>();
  private tickets = new Map<number, Ticket>();
  private nextTicketId = 1;
  private now: () => Date;

  constructor(seed: MemoryStoreSeed = { customers: [], tickets: [] }, options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());

    for (const customer of seed.customers) {
      this.customers.set(customer.id, { ...customer });
    }
    for (const ticket of seed.tickets) {
      if (!this.customers.has(ticket.customer_id)) {
        throw new Error(`Seed ticket ${ticket.id} references missing customer ${ticket.customer_id}`);
      }
      this.tickets.set(ticket.id, { ...ticket });
      this.nextTicketId = Math.max(this.nextTicketId, ticket.id + 1);
    }
  }

  async findCustomer(id: number): Promise<Customer | null> {
    const customer = this.customers.get(id);
    return customer ? { ...customer } : null;
  }

  async listCustomers(filter: CustomerFilter): Promise<Customer[]> {
    const offset = filter.offset ?? 0;
    return Array.from(this.customers.values())
      .filter(c => !filter.status || c.status === filter.status)
      .sort((a, b) => a.id - b.id)
      .slice(offset, offset + filter.limit)
      .map(c => ({ ...c }));
  }

  async updateCustomer(id: number, fields: CustomerUpdate): Promise<Customer | null> {
    const current = this.customers.get(id);
    if (!current) return null;

    const updated: Customer = {
      ...current,
      ...fields,
      updated_at: this.nextTimestamp(current.updated_at),
    };
    this.customers.set(id, updated);
    return { ...updated };
  }

  async insertTicket(input: NewTicket): Promise<Ticket> {
    if (!this.customers.has(input.customer_id)) {
      throw new Error(`FOREIGN KEY constraint failed: customer ${input.customer_id}`);
    }

    const ticket: Ticket = {
      id: this.nextTicketId++,
      customer_id: input.customer_id,
      issue: input.issue,
      status: 'open',
      priority: input.priority,
      created_at: this.now().toISOString(),
    };
    this.tickets.set(ticket.id, ticket);
    return { ...ticket };
  }

  async listTicketsForCustomer(customerId: number): Promise<Ticket[]> {
    return Array.from(this.tickets.values())
      .filter(t => t.customer_id === customerId)
      .sort(newestFirst)
      .map(t => ({ ...t }));
  }

  async listTicketsByPriority(priority: Priority, customerIds?: number[]): Promise<TicketWithCustomer[]> {
    const allowed = customerIds ? new Set(customerIds) : null;
    const rows: TicketWithCustomer[] = [];

    for (const ticket of this.tickets.values()) {
      if (ticket.priority !== priority) continue;
      if (allowed && !allowed.has(ticket.customer_id)) continue;
      const customer = this.customers.get(ticket.customer_id);
      if (!customer) continue;
      rows.push({ ...ticket, customer_name: customer.name });
    }

    return rows.sort(newestFirst);
  }

  async listCustomersWithOpenTickets(): Promise<OpenTicketSummary[]> {
    const counts = new Map<number, number>();
    for (const ticket of this.tickets.values()) {
      if (ticket.status !== 'open') continue;
      counts.set(ticket.customer_id, (counts.get(ticket.customer_id) ?? 0) + 1);
    }

    const summaries: OpenTicketSummary[] = [];
    for (const [customerId, count] of counts) {
      const customer = this.customers.get(customerId);
      if (customer) summaries.push({ customer: { ...customer }, open_ticket_count: count });
    }

    return summaries.sort(
      (a, b) => b.open_ticket_count - a.open_ticket_count || a.customer.id - b.customer.id
    );
  }

  async close(): Promise<void> {
    // nothing to release
  }

  // updated_at must move strictly forward even within the same millisecond
  private nextTimestamp(previous: string): string {
    const now = this.now().getTime();
    const floor = Date.parse(previous) + 1;
    return new Date(Number.isNaN(floor) ? now : Math.max(now, floor)).toISOString();
  }
}
