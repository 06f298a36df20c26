// Intent Classifier Entry Point
// Runs Stage A (signal detection) then Stage B (rule table)

import type { Intent, QueryContext } from './types.js';
import { detectSignals } from './signals.js';
import { applyRules } from './rules.js';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function classify(query: string, context: QueryContext = {}): Intent {
  // Stage A: Detect slots and per-clause actions
  const signals = detectSignals(query, context);

  // The caller's customer wins; numbers in the text may be order ids or amounts
  const customerId = context.customer_id ?? signals.slots.customerIds[0];

  // Stage B: First matching rule
  const match = applyRules(signals, customerId);

  const intent: Intent = {
    kind: match.kind,
    rule: match.rule,
    slots: signals.slots,
    subIntents: signals.subIntents,
  };
  if (customerId !== undefined) intent.customerId = customerId;

  return deepFreeze(intent);
}

export { INTENT_KINDS } from './types.js';
export { INTENT_RULES, MUTATING_ACTIONS, applyRules } from './rules.js';
export { detectSignals, extractEmail, extractIdentifiers, extractPriority, extractStatus, splitClauses } from './signals.js';
export { assessUrgency, findEscalationPhrase, HIGH_URGENCY_KEYWORDS } from './urgency.js';
export type {
  Intent,
  IntentAction,
  IntentKind,
  IntentRule,
  IntentSignals,
  IntentSlots,
  QueryContext,
  SubIntent,
  UrgencyAssessment,
  UrgencyLevel,
} from './types.js';
