export { MemorySupportStore } from './memory-store.js';
export { PostgresSupportStore } from './postgres-store.js';
export { loadSeedFile, parseSeed, DEFAULT_SEED_FILE } from './seed.js';
export { CUSTOMER_STATUSES, TICKET_STATUSES, PRIORITIES } from './types.js';
export type { MemoryStoreSeed, MemoryStoreOptions } from './memory-store.js';
export type {
  Customer,
  CustomerFilter,
  CustomerStatus,
  CustomerUpdate,
  NewTicket,
  OpenTicketSummary,
  Priority,
  SupportStore,
  Ticket,
  TicketStatus,
  TicketWithCustomer,
} from './types.js';
