// Backing store contract
// The tool registry is the only caller; implementations own durability

export const CUSTOMER_STATUSES = ['active', 'disabled'] as const;
export const TICKET_STATUSES = ['open', 'in_progress', 'resolved'] as const;
export const PRIORITIES = ['low', 'medium', 'high'] as const;

export type CustomerStatus = (typeof CUSTOMER_STATUSES)[number];
export type TicketStatus = (typeof TICKET_STATUSES)[number];
export type Priority = (typeof PRIORITIES)[number];

export interface Customer {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  status: CustomerStatus;
  created_at: string; // ISO-8601
  updated_at: string; // ISO-8601
}

export interface Ticket {
  id: number;
  customer_id: number;
  issue: string;
  status: TicketStatus;
  priority: Priority;
  created_at: string; // ISO-8601
}

export interface TicketWithCustomer extends Ticket {
  customer_name: string;
}

export interface OpenTicketSummary {
  customer: Customer;
  open_ticket_count: number;
}

export interface CustomerUpdate {
  name?: string;
  email?: string;
  phone?: string;
  status?: CustomerStatus;
}

export interface CustomerFilter {
  status?: CustomerStatus;
  limit: number;
  offset?: number;
}

export interface NewTicket {
  customer_id: number;
  issue: string;
  priority: Priority;
}

export interface SupportStore {
  readonly driver: string;
  findCustomer(id: number): Promise<Customer | null>;
  /** Ordered by id ascending. */
  listCustomers(filter: CustomerFilter): Promise<Customer[]>;
  /** Applies every field or none; returns null when the customer is absent. */
  updateCustomer(id: number, fields: CustomerUpdate): Promise<Customer | null>;
  insertTicket(ticket: NewTicket): Promise<Ticket>;
  /** Newest first. */
  listTicketsForCustomer(customerId: number): Promise<Ticket[]>;
  /** Newest first. An empty customerIds list matches nothing. */
  listTicketsByPriority(priority: Priority, customerIds?: number[]): Promise<TicketWithCustomer[]>;
  /** Customers of any status with at least one open ticket, by count desc then id. */
  listCustomersWithOpenTickets(): Promise<OpenTicketSummary[]>;
  close(): Promise<void>;
}
