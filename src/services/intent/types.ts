// Intent classification types
// A query is classified once per run; the resulting Intent is frozen

import type { CustomerStatus, Priority } from '../store/types.js';

export const INTENT_KINDS = [
  'SimpleLookup',  // Direct dispatch to one agent
  'Negotiation',   // Data agent resolves the customer, then support agent answers
  'MultiStep',     // One composite data operation
  'Escalation',    // Negotiation + forced high-priority ticket
  'MultiIntent',   // Independent sub-tasks, writes before reads
  'Unknown',       // Default path
] as const;

export type IntentKind = (typeof INTENT_KINDS)[number];

export type IntentAction =
  | 'get_customer'
  | 'show_history'
  | 'update_email'
  | 'update_status'
  | 'create_ticket'
  | 'open_ticket_report'
  | 'priority_ticket_report'
  | 'customer_listing';

export type UrgencyLevel = 'low' | 'medium' | 'high';

export interface UrgencyAssessment {
  level: UrgencyLevel;
  keyword?: string;
  reason: string;
}

/** Caller-supplied context; a fixed set of optional fields. */
export interface QueryContext {
  customer_id?: number;
  priority?: Priority;
  email?: string;
}

export interface SubIntent {
  action: IntentAction;
  /** Clause id, else caller context, else first id in the query. Reports take only a clause id. */
  customerId?: number;
  email?: string;
  status?: CustomerStatus;
  priority?: Priority;
  clause: string;
}

export interface IntentSlots {
  /** Every positive integer identifier, in order of appearance. */
  customerIds: number[];
  priority?: Priority;
  email?: string;
  status?: CustomerStatus;
  urgency: UrgencyAssessment;
}

export interface IntentSignals {
  slots: IntentSlots;
  subIntents: SubIntent[];
  escalationPhrase?: string;
  supportKeyword?: string;
}

export interface Intent {
  kind: IntentKind;
  /** Name of the rule that produced this intent. */
  rule: string;
  /** Primary customer: first id in the query, else caller context. */
  customerId?: number;
  slots: IntentSlots;
  subIntents: SubIntent[];
}

export interface IntentRule {
  name: string;
  kind: IntentKind;
  description: string;
  when: (signals: IntentSignals, customerId: number | undefined) => boolean;
}
