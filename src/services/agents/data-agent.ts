// Data Agent
// Customer and ticket reads and writes, including composite reports that
// take more than one registry call

import { MAX_LIST_LIMIT } from '../tools/schemas.js';
import type { Customer, CustomerStatus, OpenTicketSummary, Priority, Ticket, TicketWithCustomer } from '../store/types.js';
import { SpecialistAgent } from './base-agent.js';
import type { RunContext } from './context.js';
import type { AgentCard, DataTask, TaskResult } from './types.js';

const LISTING_PREVIEW = 20;
const HISTORY_PREVIEW = 10;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatCustomer(customer: Customer): string {
  return [
    'Customer Information:',
    `  ID: ${customer.id}`,
    `  Name: ${customer.name}`,
    `  Email: ${customer.email ?? 'n/a'}`,
    `  Phone: ${customer.phone ?? 'n/a'}`,
    `  Status: ${customer.status}`,
  ].join('\n');
}

function formatCustomerList(customers: Customer[], status?: CustomerStatus): string {
  const heading = status ? `${capitalize(status)} customers` : 'Customers';
  if (customers.length === 0) return `${heading}: none found.`;

  const lines = customers
    .slice(0, LISTING_PREVIEW)
    .map(c => `  • ${c.name} (ID: ${c.id}) - ${c.email ?? 'no email'} [${c.status}]`);
  if (customers.length > LISTING_PREVIEW) {
    lines.push(`  …and ${customers.length - LISTING_PREVIEW} more`);
  }
  return `${heading} (${customers.length}):\n${lines.join('\n')}`;
}

function formatHistory(customerId: number, tickets: Ticket[]): string {
  if (tickets.length === 0) return `Ticket History for customer ${customerId}: no tickets on record.`;

  const lines = tickets
    .slice(0, HISTORY_PREVIEW)
    .map(t => `  • Ticket #${t.id}: ${t.issue} [${t.status}, ${t.priority}]`);
  if (tickets.length > HISTORY_PREVIEW) {
    lines.push(`  …and ${tickets.length - HISTORY_PREVIEW} more`);
  }
  return `Ticket History for customer ${customerId}:\n  Total Tickets: ${tickets.length}\n${lines.join('\n')}`;
}

function formatPriorityTickets(priority: Priority, tickets: TicketWithCustomer[], status?: CustomerStatus): string {
  const scope = status ? ` for ${status} customers` : '';
  const heading = `${capitalize(priority)}-priority tickets${scope}`;
  if (tickets.length === 0) return `${heading}: none found.`;

  const lines = tickets.map(t => `  • Ticket #${t.id} (${t.customer_name}, ID: ${t.customer_id}): ${t.issue} [${t.status}]`);
  return `${heading} (${tickets.length}):\n${lines.join('\n')}`;
}

function formatOpenTicketReport(entries: OpenTicketSummary[], status?: CustomerStatus): string {
  const heading = status ? `${capitalize(status)} Customers with Open Tickets` : 'Customers with Open Tickets';
  if (entries.length === 0) return `${heading}: none found.`;

  const lines = entries.map(
    e => `  • ${e.customer.name} (ID: ${e.customer.id})\n    Email: ${e.customer.email ?? 'n/a'}\n    Open Tickets: ${e.open_ticket_count}`
  );
  return `${heading}:\n\nTotal: ${entries.length} customer(s)\n\n${lines.join('\n')}`;
}

export class DataAgent extends SpecialistAgent<DataTask> {
  readonly kind = 'data';
  readonly card: AgentCard = {
    name: 'DataAgent',
    role: 'Data Specialist',
    description: 'Reads and updates customer records and ticket history through the tool registry.',
    operations: [
      'get_customer',
      'list_customers',
      'update_customer',
      'get_customer_history',
      'get_tickets_by_priority',
      'open_ticket_report',
      'priority_ticket_report',
    ],
  };

  protected async perform(task: DataTask, context: RunContext): Promise<TaskResult> {
    switch (task.operation) {
      case 'get_customer': {
        const customer = await this.call('get_customer', { customer_id: task.args.customerId });
        context.addCustomer(customer);
        return { success: true, payload: { kind: 'customer', customer }, text: formatCustomer(customer) };
      }

      case 'list_customers': {
        const { status, limit } = task.args;
        const customers = await this.call('list_customers', { status, limit });
        return {
          success: true,
          payload: { kind: 'customers', status, customers },
          text: formatCustomerList(customers, status),
        };
      }

      case 'update_customer': {
        const customer = await this.call('update_customer', {
          customer_id: task.args.customerId,
          data: task.args.fields,
        });
        context.addCustomer(customer);
        const changed = Object.keys(task.args.fields).join(', ');
        return {
          success: true,
          payload: { kind: 'customer', customer },
          text: `Updated ${changed} for ${customer.name} (ID: ${customer.id}).\n${formatCustomer(customer)}`,
        };
      }

      case 'get_customer_history': {
        const tickets = await this.call('get_customer_history', { customer_id: task.args.customerId });
        return {
          success: true,
          payload: { kind: 'history', customerId: task.args.customerId, tickets },
          text: formatHistory(task.args.customerId, tickets),
        };
      }

      case 'get_tickets_by_priority': {
        const { priority, customerIds } = task.args;
        const tickets = await this.call('get_tickets_by_priority', { priority, customer_ids: customerIds });
        return {
          success: true,
          payload: { kind: 'tickets', priority, tickets },
          text: formatPriorityTickets(priority, tickets),
        };
      }

      case 'open_ticket_report':
        return this.openTicketReport(task.args.status);

      case 'priority_ticket_report':
        return this.priorityTicketReport(task.args.priority, task.args.status, task.args.customerIds);
    }
  }

  /** Pages through list_customers so the filter sees every customer. */
  private async customerIdsWithStatus(status: CustomerStatus): Promise<Set<number>> {
    const ids = new Set<number>();
    let offset = 0;
    let page: Customer[];

    do {
      page = await this.call('list_customers', { status, limit: MAX_LIST_LIMIT, offset });
      for (const customer of page) ids.add(customer.id);
      offset += page.length;
    } while (page.length === MAX_LIST_LIMIT);

    return ids;
  }

  private async openTicketReport(status?: CustomerStatus): Promise<TaskResult> {
    let entries = await this.call('get_customers_with_open_tickets', {});

    if (status) {
      const allowed = await this.customerIdsWithStatus(status);
      entries = entries.filter(e => allowed.has(e.customer.id));
    }

    return {
      success: true,
      payload: { kind: 'open_ticket_report', status, entries },
      text: formatOpenTicketReport(entries, status),
    };
  }

  private async priorityTicketReport(
    priority: Priority,
    status?: CustomerStatus,
    customerIds?: number[]
  ): Promise<TaskResult> {
    let tickets = await this.call('get_tickets_by_priority', { priority, customer_ids: customerIds });

    // A status scope may exceed the customer_ids cap, so it filters the result instead
    if (!customerIds && status) {
      const allowed = await this.customerIdsWithStatus(status);
      tickets = tickets.filter(t => allowed.has(t.customer_id));
    }

    return {
      success: true,
      payload: { kind: 'tickets', priority, status, tickets },
      text: formatPriorityTickets(priority, tickets, status),
    };
  }
}
