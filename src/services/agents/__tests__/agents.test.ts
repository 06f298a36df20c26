import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode } from '../../../utils/errors.js';
import { classify } from '../../intent/index.js';
import { MemorySupportStore } from '../../store/memory-store.js';
import type { Customer, SupportStore } from '../../store/types.js';
import { createToolRegistry } from '../../tools/index.js';
import { seededStore } from '../../__tests__/fixtures.js';
import { RunContext } from '../context.js';
import { DataAgent } from '../data-agent.js';
import { SupportAgent } from '../support-agent.js';

function contextFor(query: string, customerId?: number): RunContext {
  const caller = customerId !== undefined ? { customer_id: customerId } : {};
  return new RunContext(query, classify(query, caller), caller);
}

describe('DataAgent', () => {
  let store: MemorySupportStore;
  let agent: DataAgent;

  beforeEach(async () => {
    store = await seededStore();
    agent = new DataAgent(createToolRegistry(store));
  });

  it('resolves a customer into the run context', async () => {
    const context = contextFor('Get customer information for ID 5');
    const result = await agent.handle(
      { agent: 'data', operation: 'get_customer', label: 'get_customer:5', args: { customerId: 5 } },
      context
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.text).toBe(
        [
          'Customer Information:',
          '  ID: 5',
          '  Name: Charlie Brown',
          '  Email: charlie.brown@email.com',
          '  Phone: +1-555-0105',
          '  Status: active',
        ].join('\n')
      );
    }
    expect(context.customer(5)?.name).toBe('Charlie Brown');
  });

  it('forwards registry errors unchanged', async () => {
    const result = await agent.handle(
      { agent: 'data', operation: 'get_customer', label: 'get_customer:999', args: { customerId: 999 } },
      contextFor('Get customer information for ID 999')
    );

    expect(result).toEqual({
      success: false,
      error: {
        code: ErrorCode.NOT_FOUND,
        message: 'Customer 999 not found',
        source: 'get_customer',
        details: { customer_id: 999 },
      },
    });
  });

  it('builds the open ticket report for one status', async () => {
    const result = await agent.handle(
      { agent: 'data', operation: 'open_ticket_report', label: 'open_ticket_report', args: { status: 'active' } },
      contextFor('Show me all active customers who have open tickets')
    );

    expect(result.success).toBe(true);
    if (result.success && result.payload.kind === 'open_ticket_report') {
      expect(result.payload.entries.map(e => [e.customer.id, e.open_ticket_count])).toEqual([
        [4, 2],
        [1, 1],
        [6, 1],
        [8, 1],
      ]);
      expect(result.text).toContain('Total: 4 customer(s)');
    }
  });

  it('scopes the priority report to customers of one status', async () => {
    const result = await agent.handle(
      {
        agent: 'data',
        operation: 'priority_ticket_report',
        label: 'priority_ticket_report',
        args: { priority: 'high', status: 'active' },
      },
      contextFor('Show high priority tickets for active customers')
    );

    expect(result.success).toBe(true);
    if (result.success && result.payload.kind === 'tickets') {
      // Ticket 4 belongs to a disabled customer
      expect(result.payload.tickets.map(t => t.id)).toEqual([8, 6, 1]);
    }
  });

  it('covers every customer when a status filter spans several pages', async () => {
    const customers: Customer[] = Array.from({ length: 1002 }, (_, i) => ({
      id: i + 1,
      name: `Customer ${i + 1}`,
      email: `customer${i + 1}@example.com`,
      phone: null,
      status: 'active',
      created_at: '2025-01-01T00:00:00.000Z',
      updated_at: '2025-01-01T00:00:00.000Z',
    }));
    const large = new MemorySupportStore({
      customers,
      tickets: [
        {
          id: 1,
          customer_id: 1002,
          issue: 'Late sync',
          status: 'open',
          priority: 'high',
          created_at: '2025-02-01T00:00:00.000Z',
        },
      ],
    });
    const largeAgent = new DataAgent(createToolRegistry(large));

    const report = await largeAgent.handle(
      { agent: 'data', operation: 'open_ticket_report', label: 'open_ticket_report', args: { status: 'active' } },
      contextFor('Show me all active customers who have open tickets')
    );
    expect(report.success).toBe(true);
    if (report.success && report.payload.kind === 'open_ticket_report') {
      expect(report.payload.entries.map(e => e.customer.id)).toEqual([1002]);
    }

    const priority = await largeAgent.handle(
      {
        agent: 'data',
        operation: 'priority_ticket_report',
        label: 'priority_ticket_report',
        args: { priority: 'high', status: 'active' },
      },
      contextFor('Show high priority tickets for active customers')
    );
    expect(priority.success).toBe(true);
    if (priority.success && priority.payload.kind === 'tickets') {
      expect(priority.payload.tickets.map(t => t.id)).toEqual([1]);
    }
  });

  it('turns a missed deadline into an upstream failure', async () => {
    const slowStore: SupportStore = {
      driver: 'slow',
      findCustomer: id => new Promise(resolve => setTimeout(() => resolve(store.findCustomer(id)), 200)),
      listCustomers: filter => store.listCustomers(filter),
      updateCustomer: (id, fields) => store.updateCustomer(id, fields),
      insertTicket: ticket => store.insertTicket(ticket),
      listTicketsForCustomer: id => store.listTicketsForCustomer(id),
      listTicketsByPriority: (priority, ids) => store.listTicketsByPriority(priority, ids),
      listCustomersWithOpenTickets: () => store.listCustomersWithOpenTickets(),
      close: () => store.close(),
    };
    const slowAgent = new DataAgent(createToolRegistry(slowStore));

    const result = await slowAgent.handle(
      { agent: 'data', operation: 'get_customer', label: 'get_customer:1', args: { customerId: 1 } },
      contextFor('Get customer information for ID 1'),
      { timeoutMs: 20 }
    );

    expect(result).toEqual({
      success: false,
      error: {
        code: ErrorCode.UPSTREAM_FAILURE,
        message: 'DataAgent.get_customer timed out after 20ms',
        source: 'get_customer:1',
        details: { timeoutMs: 20 },
      },
    });
  });
});

describe('SupportAgent', () => {
  let store: MemorySupportStore;
  let agent: SupportAgent;

  beforeEach(async () => {
    store = await seededStore();
    agent = new SupportAgent(createToolRegistry(store));
  });

  it('answers with the matching template and the customer name', async () => {
    const query = "I'm customer 1 and need help upgrading my account";
    const context = contextFor(query);
    const alice = await store.findCustomer(1);
    if (alice) context.addCustomer(alice);

    const result = await agent.handle(
      { agent: 'support', operation: 'provide_support', label: 'provide_support', args: { query, customerId: 1 } },
      context
    );

    expect(result).toEqual({
      success: true,
      payload: {
        kind: 'support',
        escalated: false,
        urgency: { level: 'medium', keyword: 'help', reason: 'Contains medium-urgency keyword: help' },
      },
      text: "Hello Alice Nguyen! I'd be happy to help you upgrade your account. Let me check your current status and available options.",
    });
  });

  it('forces high priority on tickets for urgent issues', async () => {
    const query = 'The checkout page is down for everyone, this is an emergency';
    const context = contextFor(query, 2);

    const result = await agent.handle(
      {
        agent: 'support',
        operation: 'create_ticket',
        label: 'create_ticket:2',
        args: { customerId: 2, issue: query, priority: 'low' },
      },
      context
    );

    expect(result.success).toBe(true);
    if (result.success && result.payload.kind === 'ticket') {
      expect(result.payload.escalated).toBe(true);
      expect(result.payload.ticket.priority).toBe('high');
      expect(result.text).toContain('ESCALATED TICKET - Priority Support');
      expect(result.text).toContain('Expected response time: Within 1 hour');
    }
    const history = await store.listTicketsForCustomer(2);
    expect(history[0]?.priority).toBe('high');
  });

  it('keeps the requested priority when the issue is not urgent', async () => {
    const query = 'Please create a ticket for customer 2: export keeps failing';
    const result = await agent.handle(
      {
        agent: 'support',
        operation: 'create_ticket',
        label: 'create_ticket:2',
        args: { customerId: 2, issue: query, priority: 'low' },
      },
      contextFor(query)
    );

    expect(result.success && result.payload.kind === 'ticket' && result.payload.ticket.priority).toBe('low');
  });

  it('assesses urgency once per run', async () => {
    const query = 'Something went wrong, I need help';
    const context = contextFor(query);
    context.setUrgency({ level: 'low', reason: 'Set earlier in the run' });

    const result = await agent.handle(
      { agent: 'support', operation: 'provide_support', label: 'provide_support', args: { query } },
      context
    );

    expect(result.success && result.payload.kind === 'support' && result.payload.urgency.reason).toBe(
      'Set earlier in the run'
    );
  });

  it('warns that a timed-out ticket may still be created', async () => {
    const slowStore: SupportStore = {
      driver: 'slow',
      findCustomer: id => store.findCustomer(id),
      listCustomers: filter => store.listCustomers(filter),
      updateCustomer: (id, fields) => store.updateCustomer(id, fields),
      insertTicket: ticket => new Promise(resolve => setTimeout(() => resolve(store.insertTicket(ticket)), 100)),
      listTicketsForCustomer: id => store.listTicketsForCustomer(id),
      listTicketsByPriority: (priority, ids) => store.listTicketsByPriority(priority, ids),
      listCustomersWithOpenTickets: () => store.listCustomersWithOpenTickets(),
      close: () => store.close(),
    };
    const slowAgent = new SupportAgent(createToolRegistry(slowStore));
    const query = 'Please create a ticket for customer 2: export keeps failing';

    const result = await slowAgent.handle(
      {
        agent: 'support',
        operation: 'create_ticket',
        label: 'create_ticket:2',
        args: { customerId: 2, issue: query, priority: 'medium' },
      },
      contextFor(query),
      { timeoutMs: 20 }
    );

    expect(result).toEqual({
      success: false,
      error: {
        code: ErrorCode.UPSTREAM_FAILURE,
        message: 'SupportAgent.create_ticket timed out after 20ms; the change may still be applied',
        source: 'create_ticket:2',
        details: { timeoutMs: 20 },
      },
    });

    await new Promise(resolve => setTimeout(resolve, 150));
    expect((await store.listTicketsForCustomer(2)).map(t => t.id)).toEqual([11, 3]);
  });
});
