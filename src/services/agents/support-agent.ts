// Support Agent
// Customer-facing answers and ticket creation. Urgency is assessed once per
// run; a high assessment forces ticket priority to high.

import type { UrgencyAssessment } from '../intent/types.js';
import type { Customer, Priority } from '../store/types.js';
import { SpecialistAgent } from './base-agent.js';
import type { RunContext } from './context.js';
import type { AgentCard, SupportTask, TaskResult } from './types.js';

interface ResponseTemplate {
  match: RegExp;
  render: (name: string) => string;
}

const RESPONSE_TEMPLATES: ResponseTemplate[] = [
  {
    match: /upgrad/i,
    render: name =>
      `Hello ${name}! I'd be happy to help you upgrade your account. Let me check your current status and available options.`,
  },
  {
    match: /cancel/i,
    render: name =>
      `Hello ${name}, I understand you're considering cancellation. Before we proceed, I'd like to understand your concerns. What's prompting this decision?`,
  },
  {
    match: /refund|charge|billing/i,
    render: name =>
      `Hello ${name}, I apologize for any billing issues. I'll escalate this to our billing team immediately. Can you provide more details?`,
  },
  {
    match: /help|support/i,
    render: name => `Hello ${name}! I'm here to help with your inquiry. What can I assist you with today?`,
  },
];

function greeting(query: string, name: string): string {
  const template = RESPONSE_TEMPLATES.find(t => t.match.test(query));
  return template
    ? template.render(name)
    : `Hello ${name}! Thank you for reaching out. I'm reviewing your request and will provide assistance shortly.`;
}

export function escalationNotice(urgency: UrgencyAssessment, customer?: Customer, ticketId?: number): string {
  const heading = ticketId !== undefined ? 'ESCALATED TICKET' : 'ESCALATED REQUEST';
  const lines = [`${heading} - Priority Support`, ''];
  if (customer) {
    lines.push(`Customer: ${customer.name} (ID: ${customer.id})`);
    lines.push(`Contact: ${customer.email ?? 'n/a'}`);
  }
  if (ticketId !== undefined) {
    lines.push(`Ticket: #${ticketId}`);
    lines.push('Priority: high');
  }
  lines.push(`Urgency: ${urgency.level.toUpperCase()}`);
  lines.push(`Reason: ${urgency.reason}`);
  lines.push('');
  lines.push('This issue has been flagged for immediate attention.');
  lines.push('Expected response time: Within 1 hour');
  return lines.join('\n');
}

export class SupportAgent extends SpecialistAgent<SupportTask> {
  readonly kind = 'support';
  readonly card: AgentCard = {
    name: 'SupportAgent',
    role: 'Support Specialist',
    description: 'Answers support requests, assesses urgency and opens tickets, escalating urgent issues.',
    operations: ['provide_support', 'create_ticket'],
  };

  protected async perform(task: SupportTask, context: RunContext): Promise<TaskResult> {
    switch (task.operation) {
      case 'provide_support': {
        const customer = context.customer(task.args.customerId);
        const urgency = this.assessUrgency(context, customer);
        const escalated = urgency.level === 'high';

        const parts = [greeting(task.args.query, customer?.name ?? 'there')];
        if (customer?.status === 'disabled') {
          parts.push('I can see your account is currently disabled; reactivation can be arranged once we resolve this.');
        }
        if (escalated) parts.push(escalationNotice(urgency, customer));

        return {
          success: true,
          payload: { kind: 'support', escalated, urgency },
          text: parts.join('\n\n'),
        };
      }

      case 'create_ticket': {
        const customer = context.customer(task.args.customerId);
        const urgency = this.assessUrgency(context, customer);
        const escalated = urgency.level === 'high';
        const priority: Priority = escalated ? 'high' : task.args.priority ?? 'medium';

        const ticket = await this.call('create_ticket', {
          customer_id: task.args.customerId,
          issue: task.args.issue,
          priority,
        });

        const parts = [
          greeting(task.args.issue, customer?.name ?? 'there'),
          `I've opened ticket #${ticket.id} (priority: ${ticket.priority}) for this issue.`,
        ];
        if (escalated) parts.push(escalationNotice(urgency, customer, ticket.id));

        return {
          success: true,
          payload: { kind: 'ticket', ticket, escalated, urgency },
          text: parts.join('\n\n'),
        };
      }
    }
  }

  /** Query keywords first; an escalation intent or a disabled account can raise the level. */
  private assessUrgency(context: RunContext, customer?: Customer): UrgencyAssessment {
    if (context.urgency) return context.urgency;

    const { intent } = context;
    let assessment = intent.slots.urgency;

    if (intent.kind === 'Escalation' && assessment.level !== 'high') {
      assessment = { level: 'high', reason: 'Classified as an escalation request' };
    } else if (customer?.status === 'disabled' && assessment.level === 'low') {
      assessment = { level: 'medium', reason: 'Customer account is disabled' };
    }

    return context.setUrgency(assessment);
  }
}
