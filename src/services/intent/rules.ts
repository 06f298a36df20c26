// Stage B: Ordered rule table
// First matching rule wins; declaration order breaks ties

import type { IntentAction, IntentKind, IntentRule, IntentSignals } from './types.js';
import { REPORT_ACTIONS } from './signals.js';

const DIRECT_ACTIONS: ReadonlySet<IntentAction> = new Set<IntentAction>([
  'get_customer',
  'show_history',
  'update_email',
  'update_status',
]);

export const MUTATING_ACTIONS: ReadonlySet<IntentAction> = new Set<IntentAction>([
  'update_email',
  'update_status',
  'create_ticket',
]);

function singleAction(signals: IntentSignals): IntentAction | undefined {
  return signals.subIntents.length === 1 ? signals.subIntents[0]?.action : undefined;
}

export const INTENT_RULES: readonly IntentRule[] = [
  {
    name: 'urgent-escalation',
    kind: 'Escalation',
    description: 'Billing disputes, repeated charges and other urgent phrases',
    when: signals => signals.escalationPhrase !== undefined,
  },
  {
    name: 'multi-action',
    kind: 'MultiIntent',
    description: 'Two or more independent actions in one query',
    when: signals => signals.subIntents.length >= 2,
  },
  {
    name: 'customer-aggregate',
    kind: 'MultiStep',
    description: 'Listings and reports across customers',
    when: signals => {
      const action = singleAction(signals);
      return action !== undefined && REPORT_ACTIONS.has(action);
    },
  },
  {
    name: 'direct-dispatch',
    kind: 'SimpleLookup',
    description: 'One read or update against an identified customer',
    when: (signals, customerId) => {
      const action = singleAction(signals);
      return (
        action !== undefined &&
        DIRECT_ACTIONS.has(action) &&
        customerId !== undefined &&
        signals.supportKeyword === undefined
      );
    },
  },
  {
    name: 'support-request',
    kind: 'Negotiation',
    description: 'Support vocabulary or a ticket request that needs customer context',
    when: signals =>
      signals.supportKeyword !== undefined || signals.subIntents.some(s => s.action === 'create_ticket'),
  },
];

export interface RuleMatch {
  kind: IntentKind;
  rule: string;
}

export const UNKNOWN_MATCH: RuleMatch = { kind: 'Unknown', rule: 'no-match' };

export function applyRules(
  signals: IntentSignals,
  customerId: number | undefined,
  rules: readonly IntentRule[] = INTENT_RULES
): RuleMatch {
  for (const rule of rules) {
    if (rule.when(signals, customerId)) {
      return { kind: rule.kind, rule: rule.name };
    }
  }
  return UNKNOWN_MATCH;
}
