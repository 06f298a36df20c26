// Coordination patterns, one handler per intent kind
// Handlers only sequence tasks; agents do the work and the orchestrator aggregates

import { AppError } from '../../utils/errors.js';
import type { ErrorInfo } from '../../utils/errors.js';
import type { Task, TaskPayload, TaskResult } from '../agents/types.js';
import { MUTATING_ACTIONS } from '../intent/rules.js';
import { INTENT_KINDS } from '../intent/types.js';
import type { Intent, IntentKind, SubIntent } from '../intent/types.js';
import { MAX_LIST_LIMIT } from '../tools/schemas.js';
import type { PatternHandler, PatternOutcome, PatternTable, RunScope } from './types.js';

export type PlannedTask = { task: Task } | { label: string; error: ErrorInfo };

export const UNKNOWN_GUIDANCE =
  'I can look up a customer, show ticket history, update contact details or account status, ' +
  'open support tickets, and report on customers with open or high-priority tickets. ' +
  'Please include a customer ID where one applies.';

function labelFor(sub: SubIntent): string {
  return sub.customerId !== undefined ? `${sub.action}:${sub.customerId}` : sub.action;
}

function missing(label: string, message: string): PlannedTask {
  return { label, error: AppError.validationError(message).toInfo(label) };
}

/** Maps one sub-intent onto the agent task that serves it. */
export function planSubIntent(sub: SubIntent): PlannedTask {
  const label = labelFor(sub);
  const customerId = sub.customerId;
  const noCustomer = missing(label, `A customer ID is required for ${sub.action}`);

  switch (sub.action) {
    case 'open_ticket_report':
      return { task: { agent: 'data', operation: 'open_ticket_report', label, args: { status: sub.status } } };

    case 'priority_ticket_report':
      return {
        task: {
          agent: 'data',
          operation: 'priority_ticket_report',
          label,
          args: {
            priority: sub.priority ?? 'high',
            status: sub.status,
            customerIds: customerId !== undefined ? [customerId] : undefined,
          },
        },
      };

    case 'customer_listing':
      return {
        task: { agent: 'data', operation: 'list_customers', label, args: { status: sub.status, limit: MAX_LIST_LIMIT } },
      };

    case 'get_customer':
      if (customerId === undefined) return noCustomer;
      return { task: { agent: 'data', operation: 'get_customer', label, args: { customerId } } };

    case 'show_history':
      if (customerId === undefined) return noCustomer;
      return { task: { agent: 'data', operation: 'get_customer_history', label, args: { customerId } } };

    case 'update_email':
      if (customerId === undefined) return noCustomer;
      if (!sub.email) return missing(label, 'No email address given for the update');
      return {
        task: { agent: 'data', operation: 'update_customer', label, args: { customerId, fields: { email: sub.email } } },
      };

    case 'update_status':
      if (customerId === undefined) return noCustomer;
      if (!sub.status) return missing(label, 'No account status given for the update');
      return {
        task: { agent: 'data', operation: 'update_customer', label, args: { customerId, fields: { status: sub.status } } },
      };

    case 'create_ticket':
      if (customerId === undefined) return noCustomer;
      return {
        task: {
          agent: 'support',
          operation: 'create_ticket',
          label,
          args: { customerId, issue: sub.clause, priority: sub.priority },
        },
      };
  }
}

/** Sub-intents in query order, with every mutation ahead of every read. */
export function decompose(intent: Intent): PlannedTask[] {
  const writes = intent.subIntents.filter(s => MUTATING_ACTIONS.has(s.action));
  const reads = intent.subIntents.filter(s => !MUTATING_ACTIONS.has(s.action));
  return [...writes, ...reads].map(planSubIntent);
}

function payloadEscalated(payload: TaskPayload): boolean {
  return payload.kind === 'ticket' || payload.kind === 'support' ? payload.escalated : false;
}

function resultEscalated(result: TaskResult): boolean {
  return result.success && payloadEscalated(result.payload);
}

function indent(text: string): string {
  return text
    .split('\n')
    .map(line => `  ${line}`)
    .join('\n');
}

async function singleTask(scope: RunScope): Promise<PatternOutcome> {
  const sub = scope.intent.subIntents[0];
  if (!sub) {
    return { text: '', errors: [AppError.validationError('No action found in the query').toInfo('classifier')] };
  }

  const planned = planSubIntent(sub);
  if (!('task' in planned)) return { text: '', errors: [planned.error] };

  const result = await scope.dispatch(planned.task);
  return { text: result.success ? result.text : '', escalated: resultEscalated(result) };
}

async function negotiate(scope: RunScope, escalate: boolean): Promise<PatternOutcome> {
  const { intent, context } = scope;
  const customerId = intent.customerId;
  const errors: ErrorInfo[] = [];
  let resolved = false;

  // Data agent first: the support answer depends on the customer record
  if (customerId === undefined) {
    errors.push(
      AppError.validationError('A customer ID is required to look up the account for this request').toInfo('get_customer')
    );
  } else {
    const lookup = await scope.dispatch({
      agent: 'data',
      operation: 'get_customer',
      label: `get_customer:${customerId}`,
      args: { customerId },
    });
    resolved = lookup.success;
  }

  const ticketIntent = intent.subIntents.find(s => s.action === 'create_ticket');
  const wantsTicket = escalate || ticketIntent !== undefined;

  const support: TaskResult = wantsTicket && resolved && customerId !== undefined
    ? await scope.dispatch({
        agent: 'support',
        operation: 'create_ticket',
        label: `create_ticket:${customerId}`,
        args: { customerId, issue: context.query, priority: ticketIntent?.priority ?? intent.slots.priority },
      })
    : await scope.dispatch({
        agent: 'support',
        operation: 'provide_support',
        label: 'provide_support',
        args: { query: context.query, customerId: resolved ? customerId : undefined },
      });

  return {
    text: support.success ? support.text : '',
    escalated: escalate || resultEscalated(support),
    errors,
  };
}

async function multiIntent(scope: RunScope): Promise<PatternOutcome> {
  const lines: string[] = [];
  const errors: ErrorInfo[] = [];
  let escalated = false;

  for (const planned of decompose(scope.intent)) {
    if (!('task' in planned)) {
      errors.push(planned.error);
      lines.push(`✗ ${planned.label}: ${planned.error.message}`);
      continue;
    }

    const result = await scope.dispatch(planned.task);
    escalated = escalated || resultEscalated(result);
    lines.push(
      result.success
        ? `✓ ${planned.task.label}:\n${indent(result.text)}`
        : `✗ ${planned.task.label}: ${result.error.message}`
    );
  }

  return { text: `Multi-Action Request Processed:\n\n${lines.join('\n\n')}`, escalated, errors };
}

async function unknown(scope: RunScope): Promise<PatternOutcome> {
  const result = await scope.dispatch({
    agent: 'support',
    operation: 'provide_support',
    label: 'provide_support',
    args: { query: scope.context.query },
  });

  const text = result.success ? `${result.text}\n\n${UNKNOWN_GUIDANCE}` : UNKNOWN_GUIDANCE;
  return { text, escalated: resultEscalated(result) };
}

export const DEFAULT_PATTERNS: PatternTable = {
  SimpleLookup: singleTask,
  Negotiation: scope => negotiate(scope, false),
  MultiStep: singleTask,
  Escalation: scope => negotiate(scope, true),
  MultiIntent: multiIntent,
  Unknown: unknown,
};

/** Every intent kind must have exactly one handler and no other keys are allowed. */
export function resolvePatternTable(raw: Readonly<Record<string, PatternHandler | undefined>>): PatternTable {
  const kinds: readonly string[] = INTENT_KINDS;
  const unknownKeys = Object.keys(raw).filter(key => !kinds.includes(key));
  if (unknownKeys.length > 0) {
    throw AppError.configuration(`Pattern table names unknown intent kind(s): ${unknownKeys.join(', ')}`);
  }

  const handler = (kind: IntentKind): PatternHandler => {
    const found = raw[kind];
    if (!found) throw AppError.configuration(`No coordination pattern registered for ${kind}`);
    return found;
  };

  return {
    SimpleLookup: handler('SimpleLookup'),
    Negotiation: handler('Negotiation'),
    MultiStep: handler('MultiStep'),
    Escalation: handler('Escalation'),
    MultiIntent: handler('MultiIntent'),
    Unknown: handler('Unknown'),
  };
}
