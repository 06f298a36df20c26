// Ticket Tools
// Create tickets and query them by priority

import { PRIORITIES } from '../store/types.js';
import type { ToolDefinition } from './types.js';
import { CreateTicketArgsSchema, GetTicketsByPriorityArgsSchema } from './schemas.js';
import { requireCustomer } from './customer-tools.js';

export const createTicketTool: ToolDefinition<'create_ticket'> = {
  name: 'create_ticket',
  description: 'Open a new support ticket for an existing customer.',
  mutates: true,
  parameters: [
    { name: 'customer_id', type: 'number', description: 'Customer the ticket belongs to', required: true },
    { name: 'issue', type: 'string', description: 'Description of the issue', required: true },
    {
      name: 'priority',
      type: 'string',
      description: 'Ticket priority',
      required: false,
      enum: PRIORITIES,
      default: 'medium',
    },
  ],
  schema: CreateTicketArgsSchema,
  execute: async (args, store) => {
    // Ticket rows must reference an existing customer
    await requireCustomer(store, args.customer_id);
    return store.insertTicket({
      customer_id: args.customer_id,
      issue: args.issue,
      priority: args.priority,
    });
  },
};

export const getTicketsByPriorityTool: ToolDefinition<'get_tickets_by_priority'> = {
  name: 'get_tickets_by_priority',
  description: 'Get tickets of one priority, optionally restricted to a set of customers.',
  mutates: false,
  parameters: [
    { name: 'priority', type: 'string', description: 'Priority level', required: true, enum: PRIORITIES },
    {
      name: 'customer_ids',
      type: 'array',
      description: 'Restrict to these customer IDs',
      required: false,
    },
  ],
  schema: GetTicketsByPriorityArgsSchema,
  execute: async (args, store) => store.listTicketsByPriority(args.priority, args.customer_ids),
};
