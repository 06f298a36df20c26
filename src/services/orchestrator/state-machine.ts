// Run lifecycle
// Received → Classified → Dispatching → Aggregating → Completed, or Failed from any non-terminal state

import { AppError } from '../../utils/errors.js';
import type { ActivityLog } from '../activity-log/activity-log.js';
import type { RunState } from './types.js';

const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  Received: ['Classified', 'Failed'],
  Classified: ['Dispatching', 'Failed'],
  Dispatching: ['Aggregating', 'Failed'],
  Aggregating: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

export function canTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class RunStateMachine {
  private current: RunState = 'Received';

  constructor(private log: ActivityLog) {}

  get state(): RunState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: RunState, detail?: string): void {
    if (!canTransition(this.current, to)) {
      throw AppError.configuration(`Illegal run transition ${this.current} → ${to}`);
    }
    this.log.append('orchestrator', `state:${this.current}->${to}`, to === 'Failed' ? 'error' : 'ok', detail);
    this.current = to;
  }
}
