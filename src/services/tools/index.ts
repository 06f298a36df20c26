// Tool System Initialization
// Builds the registry over a backing store with every support operation registered

import type { Logger } from 'pino';
import type { SupportStore } from '../store/types.js';
import { ToolRegistry } from './registry.js';
import {
  getCustomerHistoryTool,
  getCustomerTool,
  getCustomersWithOpenTicketsTool,
  listCustomersTool,
  updateCustomerTool,
} from './customer-tools.js';
import { createTicketTool, getTicketsByPriorityTool } from './ticket-tools.js';
import type { ToolCatalog } from './types.js';

export { ToolRegistry } from './registry.js';
export type { ToolManifestEntry } from './registry.js';
export { MAX_LIST_LIMIT, DEFAULT_LIST_LIMIT } from './schemas.js';
export type {
  ToolArgs,
  ToolCatalog,
  ToolContracts,
  ToolDefinition,
  ToolName,
  ToolOutput,
  ToolParameter,
  ToolResult,
} from './types.js';

export const supportTools: ToolCatalog = {
  get_customer: getCustomerTool,
  list_customers: listCustomersTool,
  update_customer: updateCustomerTool,
  create_ticket: createTicketTool,
  get_customer_history: getCustomerHistoryTool,
  get_tickets_by_priority: getTicketsByPriorityTool,
  get_customers_with_open_tickets: getCustomersWithOpenTicketsTool,
};

export function createToolRegistry(store: SupportStore, logger?: Logger): ToolRegistry {
  const registry = new ToolRegistry(store, supportTools, logger);
  logger?.info(
    { driver: store.driver, tools: registry.getAll().map(t => t.name) },
    `Tool registry initialized with ${registry.getAll().length} tool(s)`
  );
  return registry;
}
