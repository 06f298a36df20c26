// Stage A: Signal and slot detection
// Pure pattern matching over the query text, no store access

import type { CustomerStatus, Priority } from '../store/types.js';
import type { IntentAction, IntentSignals, IntentSlots, QueryContext, SubIntent } from './types.js';
import { assessUrgency, findEscalationPhrase } from './urgency.js';

const EMAIL_REGEX = /[a-z0-9._%+-]+@[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,}/gi;
// Digits that are not part of a longer number or a decimal
const IDENTIFIER_REGEX = /(?<![\d.])\d+(?!\d|\.\d)/g;
const PRIORITY_REGEX =
  /\b(low|medium|high)[\s-]*priority\b|\bpriority(?:\s*(?:level|of|is|to|as|=|:))*\s*(low|medium|high)\b/i;
const STATUS_REGEX = /\b(active|disabled|inactive|deactivated)\b/i;
const CLAUSE_SPLIT_REGEX = /(\s*(?:[,;]|\band then\b|\bthen\b|\band also\b|\balso\b|\band\b|\bplus\b)\s*)/i;
const SUPPORT_REGEX =
  /\b(help|support|upgrade|upgrading|downgrade|cancel|cancellation|issue|problem|question|trouble|refund|billing|charged?|broken|not working|assist(?:ance)?)\b/i;

const UPDATE_EMAIL_REGEX = /\b(?:update|change|set|replace|correct)\b.*\bemail\b|\bnew email\b/i;
const UPDATE_STATUS_REGEX =
  /\b(?:disable|deactivate|suspend|reactivate|activate)\b.*\b(?:account|customer|profile)\b|\b(?:update|change|set)\b.*\bstatus\b/i;
const CREATE_TICKET_REGEX =
  /\b(?:create|file|raise|submit|log)\b(?:\s+[\w-]+){0,3}?\s+ticket\b|\bopen\s+(?:a|an|another|new)\b(?:\s+[\w-]+){0,2}?\s+ticket\b/i;
const OPEN_TICKETS_REGEX = /\bopen\s+tickets?\b/i;
const TICKETS_REGEX = /\btickets\b/i;
const CUSTOMERS_PLURAL_REGEX = /\bcustomers\b/i;
const HISTORY_REGEX = /\b(?:show|get|list|view|see|display|pull up|check|fetch)\b.*\b(?:history|tickets)\b/i;
const CUSTOMER_INFO_REGEX =
  /\b(?:get|show|view|display|look up|lookup|find|fetch|pull up)\b.*\b(?:info(?:rmation)?|details|record|profile)\b|\bcustomer\s+(?:info(?:rmation)?|details|record|profile)\b/i;

export const REPORT_ACTIONS: ReadonlySet<IntentAction> = new Set<IntentAction>([
  'open_ticket_report',
  'priority_ticket_report',
  'customer_listing',
]);

export function extractIdentifiers(text: string): number[] {
  const withoutEmails = text.replace(EMAIL_REGEX, ' ');
  const ids: number[] = [];

  for (const match of withoutEmails.matchAll(IDENTIFIER_REGEX)) {
    const value = parseInt(match[0], 10);
    if (Number.isSafeInteger(value) && value > 0 && !ids.includes(value)) {
      ids.push(value);
    }
  }

  return ids;
}

export function extractEmail(text: string): string | undefined {
  const match = text.match(EMAIL_REGEX);
  return match?.[0]?.toLowerCase();
}

export function extractPriority(text: string): Priority | undefined {
  const match = PRIORITY_REGEX.exec(text);
  if (!match) return undefined;
  const level = (match[1] ?? match[2] ?? '').toLowerCase();
  return level === 'low' || level === 'medium' || level === 'high' ? level : undefined;
}

export function extractStatus(text: string): CustomerStatus | undefined {
  const match = STATUS_REGEX.exec(text);
  if (!match?.[1]) return undefined;
  return match[1].toLowerCase() === 'active' ? 'active' : 'disabled';
}

function statusForUpdate(clause: string): CustomerStatus | undefined {
  if (/\b(?:reactivate|activate)\b/i.test(clause)) return 'active';
  if (/\b(?:disable|deactivate|suspend)\b/i.test(clause)) return 'disabled';
  return extractStatus(clause);
}

/**
 * Splits on commas and conjunctions. A clause that names no action of its own
 * stays attached to the clause before it, so "active customers and their open
 * tickets" is read as one request.
 */
export function splitClauses(text: string): string[] {
  const parts = text.split(CLAUSE_SPLIT_REGEX);
  const clauses: string[] = [];
  let current = parts[0] ?? '';
  let separator = '';

  for (let i = 1; i < parts.length; i += 2) {
    separator += parts[i] ?? '';
    const next = parts[i + 1] ?? '';
    if (!next.trim()) continue;

    if (current.trim() && detectClauseActions(next).length === 0) {
      current += separator + next;
    } else {
      if (current.trim()) clauses.push(current.trim());
      current = next;
    }
    separator = '';
  }
  if (current.trim()) clauses.push(current.trim());

  return clauses;
}

function detectClauseActions(clause: string): IntentAction[] {
  const actions: IntentAction[] = [];

  // Mutations
  if (UPDATE_EMAIL_REGEX.test(clause)) actions.push('update_email');
  if (UPDATE_STATUS_REGEX.test(clause)) actions.push('update_status');
  if (CREATE_TICKET_REGEX.test(clause)) actions.push('create_ticket');

  // Cross-customer reports take the clause before single-customer reads
  if (extractPriority(clause) && TICKETS_REGEX.test(clause)) {
    actions.push('priority_ticket_report');
  } else if (CUSTOMERS_PLURAL_REGEX.test(clause) && OPEN_TICKETS_REGEX.test(clause)) {
    actions.push('open_ticket_report');
  } else if (CUSTOMERS_PLURAL_REGEX.test(clause)) {
    actions.push('customer_listing');
  } else if (!actions.includes('create_ticket')) {
    if (HISTORY_REGEX.test(clause)) actions.push('show_history');
    else if (CUSTOMER_INFO_REGEX.test(clause)) actions.push('get_customer');
  }

  return actions;
}

function detectSubIntents(query: string, slots: IntentSlots, context: QueryContext): SubIntent[] {
  const subIntents: SubIntent[] = [];

  for (const clause of splitClauses(query)) {
    const clauseIds = extractIdentifiers(clause);

    for (const action of detectClauseActions(clause)) {
      // Reports span customers; only an id written in the clause narrows them
      const customerId = REPORT_ACTIONS.has(action)
        ? clauseIds[0]
        : context.customer_id ?? clauseIds[0] ?? slots.customerIds[0];
      const duplicate = subIntents.some(s => s.action === action && s.customerId === customerId);
      if (duplicate) continue;

      const subIntent: SubIntent = { action, clause };
      if (customerId !== undefined) subIntent.customerId = customerId;

      if (action === 'update_email') {
        const email = extractEmail(clause) ?? slots.email;
        if (email) subIntent.email = email;
      }
      if (action === 'update_status') {
        const status = statusForUpdate(clause);
        if (status) subIntent.status = status;
      }
      if (REPORT_ACTIONS.has(action)) {
        const status = extractStatus(clause) ?? slots.status;
        if (status) subIntent.status = status;
      }
      if (action === 'priority_ticket_report' || action === 'create_ticket') {
        const priority = extractPriority(clause) ?? slots.priority;
        if (priority) subIntent.priority = priority;
      }

      subIntents.push(subIntent);
    }
  }

  return subIntents;
}

export function detectSignals(query: string, context: QueryContext = {}): IntentSignals {
  const slots: IntentSlots = {
    customerIds: extractIdentifiers(query),
    urgency: assessUrgency(query),
  };

  const priority = extractPriority(query) ?? context.priority;
  if (priority) slots.priority = priority;

  const email = extractEmail(query) ?? context.email?.toLowerCase();
  if (email) slots.email = email;

  const status = extractStatus(query);
  if (status) slots.status = status;

  const signals: IntentSignals = {
    slots,
    subIntents: detectSubIntents(query, slots, context),
  };

  const escalationPhrase = findEscalationPhrase(query);
  if (escalationPhrase) signals.escalationPhrase = escalationPhrase;

  const support = SUPPORT_REGEX.exec(query);
  if (support?.[1]) signals.supportKeyword = support[1].toLowerCase();

  return signals;
}
