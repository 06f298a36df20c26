// Specialist agent types
// Tasks are created by the orchestrator; results never throw past an agent

import type { ErrorInfo } from '../../utils/errors.js';
import type { UrgencyAssessment } from '../intent/types.js';
import type {
  Customer,
  CustomerStatus,
  CustomerUpdate,
  OpenTicketSummary,
  Priority,
  Ticket,
  TicketWithCustomer,
} from '../store/types.js';

export type AgentKind = 'data' | 'support';

interface TaskShape<A extends AgentKind, O extends string, Args> {
  agent: A;
  operation: O;
  /** Stable name for the task's result slot, e.g. "update_email:4". */
  label: string;
  args: Args;
}

export type DataTask =
  | TaskShape<'data', 'get_customer', { customerId: number }>
  | TaskShape<'data', 'list_customers', { status?: CustomerStatus; limit?: number }>
  | TaskShape<'data', 'update_customer', { customerId: number; fields: CustomerUpdate }>
  | TaskShape<'data', 'get_customer_history', { customerId: number }>
  | TaskShape<'data', 'get_tickets_by_priority', { priority: Priority; customerIds?: number[] }>
  | TaskShape<'data', 'open_ticket_report', { status?: CustomerStatus }>
  | TaskShape<'data', 'priority_ticket_report', { priority: Priority; status?: CustomerStatus; customerIds?: number[] }>;

export type SupportTask =
  | TaskShape<'support', 'provide_support', { query: string; customerId?: number }>
  | TaskShape<'support', 'create_ticket', { customerId: number; issue: string; priority?: Priority }>;

export type Task = DataTask | SupportTask;
export type TaskOperation = Task['operation'];

export type TaskPayload =
  | { kind: 'customer'; customer: Customer }
  | { kind: 'customers'; status?: CustomerStatus; customers: Customer[] }
  | { kind: 'history'; customerId: number; tickets: Ticket[] }
  | { kind: 'tickets'; priority: Priority; status?: CustomerStatus; tickets: TicketWithCustomer[] }
  | { kind: 'open_ticket_report'; status?: CustomerStatus; entries: OpenTicketSummary[] }
  | { kind: 'ticket'; ticket: Ticket; escalated: boolean; urgency: UrgencyAssessment }
  | { kind: 'support'; escalated: boolean; urgency: UrgencyAssessment };

export type TaskResult =
  | { success: true; payload: TaskPayload; text: string }
  | { success: false; error: ErrorInfo };

/** Outcome of one dispatched task as reported to the caller. */
export interface TaskReport {
  label: string;
  agent: AgentKind;
  operation: TaskOperation;
  success: boolean;
  text?: string;
  error?: ErrorInfo;
}

export interface AgentCard {
  name: string;
  role: string;
  description: string;
  operations: readonly TaskOperation[];
}

export interface HandleOptions {
  /** Deadline for this call; a timeout becomes a failed TaskResult. */
  timeoutMs?: number;
}
