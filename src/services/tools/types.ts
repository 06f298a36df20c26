// Tool system types and interfaces
// Every operation over the backing store is described by one ToolDefinition

import type { z } from 'zod';
import type { ErrorInfo } from '../../utils/errors.js';
import type {
  Customer,
  OpenTicketSummary,
  SupportStore,
  Ticket,
  TicketWithCustomer,
} from '../store/types.js';
import type {
  CreateTicketArgs,
  GetCustomerArgs,
  GetCustomerHistoryArgs,
  GetTicketsByPriorityArgs,
  ListCustomersArgs,
  NoArgs,
  UpdateCustomerArgs,
} from './schemas.js';

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: readonly string[];
  default?: string | number | boolean;
}

export interface ToolContracts {
  get_customer: { args: GetCustomerArgs; result: Customer };
  list_customers: { args: ListCustomersArgs; result: Customer[] };
  update_customer: { args: UpdateCustomerArgs; result: Customer };
  create_ticket: { args: CreateTicketArgs; result: Ticket };
  get_customer_history: { args: GetCustomerHistoryArgs; result: Ticket[] };
  get_tickets_by_priority: { args: GetTicketsByPriorityArgs; result: TicketWithCustomer[] };
  get_customers_with_open_tickets: { args: NoArgs; result: OpenTicketSummary[] };
}

export type ToolName = keyof ToolContracts;
export type ToolArgs<K extends ToolName> = ToolContracts[K]['args'];
export type ToolOutput<K extends ToolName> = ToolContracts[K]['result'];

export interface ToolDefinition<K extends ToolName> {
  name: K;
  description: string;
  /** Mutating tools are serialized by the registry. */
  mutates: boolean;
  parameters: ToolParameter[];
  schema: z.ZodType<ToolArgs<K>, z.ZodTypeDef, unknown>;
  /** Throws AppError for business failures; anything else is an upstream failure. */
  execute: (args: ToolArgs<K>, store: SupportStore) => Promise<ToolOutput<K>>;
}

export type ToolCatalog = { [K in ToolName]: ToolDefinition<K> };

export type ToolResult<T> =
  | { success: true; data: T; durationMs: number }
  | { success: false; error: ErrorInfo; durationMs: number };
