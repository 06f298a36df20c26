// Customer Tools
// Read and update customer records in the backing store

import { AppError } from '../../utils/errors.js';
import { CUSTOMER_STATUSES } from '../store/types.js';
import type { SupportStore } from '../store/types.js';
import type { ToolDefinition } from './types.js';
import {
  DEFAULT_LIST_LIMIT,
  GetCustomerArgsSchema,
  GetCustomerHistoryArgsSchema,
  ListCustomersArgsSchema,
  NoArgsSchema,
  UpdateCustomerArgsSchema,
} from './schemas.js';

export async function requireCustomer(store: SupportStore, customerId: number) {
  const customer = await store.findCustomer(customerId);
  if (!customer) {
    throw AppError.notFound(`Customer ${customerId} not found`, { customer_id: customerId });
  }
  return customer;
}

export const getCustomerTool: ToolDefinition<'get_customer'> = {
  name: 'get_customer',
  description: 'Get customer information by ID.',
  mutates: false,
  parameters: [
    { name: 'customer_id', type: 'number', description: 'Customer ID to retrieve', required: true },
  ],
  schema: GetCustomerArgsSchema,
  execute: async (args, store) => requireCustomer(store, args.customer_id),
};

export const listCustomersTool: ToolDefinition<'list_customers'> = {
  name: 'list_customers',
  description: 'List customers ordered by ID, optionally filtered by status.',
  mutates: false,
  parameters: [
    {
      name: 'status',
      type: 'string',
      description: 'Only return customers with this status',
      required: false,
      enum: CUSTOMER_STATUSES,
    },
    {
      name: 'limit',
      type: 'number',
      description: 'Maximum number of customers to return',
      required: false,
      default: DEFAULT_LIST_LIMIT,
    },
    {
      name: 'offset',
      type: 'number',
      description: 'Number of customers to skip, for paging',
      required: false,
      default: 0,
    },
  ],
  schema: ListCustomersArgsSchema,
  execute: async (args, store) =>
    store.listCustomers({ status: args.status, limit: args.limit, offset: args.offset }),
};

export const updateCustomerTool: ToolDefinition<'update_customer'> = {
  name: 'update_customer',
  description: 'Update name, email, phone or status of a customer. Either every field is applied or none.',
  mutates: true,
  parameters: [
    { name: 'customer_id', type: 'number', description: 'Customer ID to update', required: true },
    {
      name: 'data',
      type: 'object',
      description: 'Fields to update: name, email, phone, status',
      required: true,
    },
  ],
  schema: UpdateCustomerArgsSchema,
  execute: async (args, store) => {
    await requireCustomer(store, args.customer_id);

    const updated = await store.updateCustomer(args.customer_id, args.data);
    if (!updated) {
      throw AppError.notFound(`Customer ${args.customer_id} not found`, { customer_id: args.customer_id });
    }
    return updated;
  },
};

export const getCustomerHistoryTool: ToolDefinition<'get_customer_history'> = {
  name: 'get_customer_history',
  description: 'Get all tickets for a customer, newest first.',
  mutates: false,
  parameters: [
    { name: 'customer_id', type: 'number', description: 'Customer ID to get history for', required: true },
  ],
  schema: GetCustomerHistoryArgsSchema,
  execute: async (args, store) => {
    await requireCustomer(store, args.customer_id);
    return store.listTicketsForCustomer(args.customer_id);
  },
};

export const getCustomersWithOpenTicketsTool: ToolDefinition<'get_customers_with_open_tickets'> = {
  name: 'get_customers_with_open_tickets',
  description: 'List customers that have open tickets, with their open ticket count.',
  mutates: false,
  parameters: [],
  schema: NoArgsSchema,
  execute: async (_args, store) => store.listCustomersWithOpenTickets(),
};
