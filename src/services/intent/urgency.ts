// Keyword-based urgency assessment
// One keyword set drives both the escalation rule and the support agent's ticket priority

import type { UrgencyAssessment } from './types.js';

/** Any of these marks a query high urgency and classifies it as an escalation. */
export const HIGH_URGENCY_KEYWORDS = [
  'charged twice',
  'double charged',
  'refund immediately',
  'billing dispute',
  'security breach',
  'emergency',
  'urgent',
  'critical',
  'immediately',
  'outage',
  'refund',
];

const MEDIUM_URGENCY_KEYWORDS = ['not working', 'broken', 'problem', 'issue', 'help'];

function phraseRegex(phrase: string): RegExp {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+');
  return new RegExp(`\\b${escaped}\\b`, 'i');
}

const HIGH_MATCHERS = HIGH_URGENCY_KEYWORDS.map(k => ({ keyword: k, regex: phraseRegex(k) }));
const MEDIUM_MATCHERS = MEDIUM_URGENCY_KEYWORDS.map(k => ({ keyword: k, regex: phraseRegex(k) }));

export function findEscalationPhrase(text: string): string | undefined {
  return HIGH_MATCHERS.find(m => m.regex.test(text))?.keyword;
}

export function assessUrgency(text: string): UrgencyAssessment {
  const high = HIGH_MATCHERS.find(m => m.regex.test(text));
  if (high) {
    return { level: 'high', keyword: high.keyword, reason: `Contains high-urgency keyword: ${high.keyword}` };
  }

  const medium = MEDIUM_MATCHERS.find(m => m.regex.test(text));
  if (medium) {
    return { level: 'medium', keyword: medium.keyword, reason: `Contains medium-urgency keyword: ${medium.keyword}` };
  }

  return { level: 'low', reason: 'General inquiry' };
}
