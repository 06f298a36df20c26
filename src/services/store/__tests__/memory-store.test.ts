import { describe, it, expect } from 'vitest';
import { MemorySupportStore } from '../memory-store.js';
import { parseSeed } from '../seed.js';
import type { Customer } from '../types.js';

const T0 = '2025-01-01T00:00:00.000Z';

function customer(id: number, status: Customer['status'] = 'active'): Customer {
  return {
    id,
    name: `Customer ${id}`,
    email: `c${id}@example.com`,
    phone: null,
    status,
    created_at: T0,
    updated_at: T0,
  };
}

describe('MemorySupportStore', () => {
  it('lists customers by id with status filter and limit', async () => {
    const store = new MemorySupportStore({
      customers: [customer(3, 'disabled'), customer(1), customer(2)],
      tickets: [],
    });

    const active = await store.listCustomers({ status: 'active', limit: 10 });
    expect(active.map(c => c.id)).toEqual([1, 2]);

    const firstTwo = await store.listCustomers({ limit: 2 });
    expect(firstTwo.map(c => c.id)).toEqual([1, 2]);
  });

  it('moves updated_at strictly forward even when the clock stands still', async () => {
    const frozen = new Date(T0);
    const store = new MemorySupportStore({ customers: [customer(1)], tickets: [] }, { now: () => frozen });

    const first = await store.updateCustomer(1, { name: 'Renamed' });
    const second = await store.updateCustomer(1, { phone: '+1-555-0199' });

    expect(first?.updated_at).toBe('2025-01-01T00:00:00.001Z');
    expect(second?.updated_at).toBe('2025-01-01T00:00:00.002Z');
    expect(second?.name).toBe('Renamed');
  });

  it('returns null when updating a missing customer', async () => {
    const store = new MemorySupportStore();
    expect(await store.updateCustomer(42, { name: 'Nobody' })).toBeNull();
  });

  it('rejects tickets for customers that do not exist', async () => {
    const store = new MemorySupportStore({ customers: [customer(1)], tickets: [] });
    await expect(store.insertTicket({ customer_id: 9, issue: 'x', priority: 'low' })).rejects.toThrow(
      'FOREIGN KEY constraint failed'
    );
  });

  it('assigns ticket ids after the highest seeded id', async () => {
    const store = new MemorySupportStore({
      customers: [customer(1)],
      tickets: [{ id: 7, customer_id: 1, issue: 'old', status: 'resolved', priority: 'low', created_at: T0 }],
    }, { now: () => new Date('2025-02-01T00:00:00.000Z') });

    const ticket = await store.insertTicket({ customer_id: 1, issue: 'new', priority: 'high' });
    expect(ticket).toEqual({
      id: 8,
      customer_id: 1,
      issue: 'new',
      status: 'open',
      priority: 'high',
      created_at: '2025-02-01T00:00:00.000Z',
    });

    const history = await store.listTicketsForCustomer(1);
    expect(history.map(t => t.id)).toEqual([8, 7]);
  });

  it('matches nothing for an empty customer id list', async () => {
    const store = new MemorySupportStore({
      customers: [customer(1)],
      tickets: [{ id: 1, customer_id: 1, issue: 'a', status: 'open', priority: 'high', created_at: T0 }],
    });

    expect(await store.listTicketsByPriority('high', [])).toEqual([]);
    expect((await store.listTicketsByPriority('high')).map(t => t.customer_name)).toEqual(['Customer 1']);
  });

  it('orders open ticket summaries by count then id', async () => {
    const store = new MemorySupportStore({
      customers: [customer(1), customer(2), customer(3)],
      tickets: [
        { id: 1, customer_id: 3, issue: 'a', status: 'open', priority: 'low', created_at: T0 },
        { id: 2, customer_id: 2, issue: 'b', status: 'open', priority: 'low', created_at: T0 },
        { id: 3, customer_id: 2, issue: 'c', status: 'open', priority: 'low', created_at: T0 },
        { id: 4, customer_id: 1, issue: 'd', status: 'open', priority: 'low', created_at: T0 },
        { id: 5, customer_id: 1, issue: 'e', status: 'resolved', priority: 'low', created_at: T0 },
      ],
    });

    const summaries = await store.listCustomersWithOpenTickets();
    expect(summaries.map(s => [s.customer.id, s.open_ticket_count])).toEqual([[2, 2], [1, 1], [3, 1]]);
  });

  it('returns copies that callers cannot use to mutate state', async () => {
    const store = new MemorySupportStore({ customers: [customer(1)], tickets: [] });
    const found = await store.findCustomer(1);
    if (found) found.name = 'Mutated';
    expect((await store.findCustomer(1))?.name).toBe('Customer 1');
  });

  it('refuses seed tickets that reference unknown customers', () => {
    expect(() => new MemorySupportStore({
      customers: [],
      tickets: [{ id: 1, customer_id: 5, issue: 'a', status: 'open', priority: 'low', created_at: T0 }],
    })).toThrow('Seed ticket 1 references missing customer 5');
  });
});

describe('parseSeed', () => {
  it('reports the first invalid field', () => {
    expect(() => parseSeed({ customers: [{ ...customer(1), status: 'archived' }] })).toThrow(
      /^Invalid seed data \(customers\.0\.status: /
    );
  });

  it('defaults tickets to an empty list', () => {
    expect(parseSeed({ customers: [customer(1)] }).tickets).toEqual([]);
  });
});
