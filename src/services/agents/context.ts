// Per-run context shared by sequential steps
// Add-only: customers and results accumulate, urgency is set once

import type { Intent, QueryContext, UrgencyAssessment } from '../intent/types.js';
import type { Customer } from '../store/types.js';
import type { TaskReport } from './types.js';

export class RunContext {
  private customers = new Map<number, Customer>();
  private urgencyAssessment?: UrgencyAssessment;
  private reports: TaskReport[] = [];

  constructor(
    readonly query: string,
    readonly intent: Intent,
    readonly caller: Readonly<QueryContext> = {}
  ) {}

  /** Records a customer; a later record of the same id replaces the earlier one. */
  addCustomer(customer: Customer): void {
    this.customers.set(customer.id, { ...customer });
  }

  customer(id: number | undefined): Customer | undefined {
    return id === undefined ? undefined : this.customers.get(id);
  }

  get resolvedCustomers(): readonly Customer[] {
    return Array.from(this.customers.values());
  }

  get urgency(): UrgencyAssessment | undefined {
    return this.urgencyAssessment;
  }

  /** First assessment wins; returns the assessment in effect. */
  setUrgency(assessment: UrgencyAssessment): UrgencyAssessment {
    if (!this.urgencyAssessment) this.urgencyAssessment = assessment;
    return this.urgencyAssessment;
  }

  recordReport(report: TaskReport): void {
    this.reports.push(report);
  }

  get priorResults(): readonly TaskReport[] {
    return [...this.reports];
  }
}
