import { describe, it, expect } from 'vitest';
import { ActivityLog } from '../../activity-log/activity-log.js';
import { RunStateMachine, canTransition } from '../state-machine.js';

describe('RunStateMachine', () => {
  it('walks the happy path and logs each transition', () => {
    const log = new ActivityLog();
    const machine = new RunStateMachine(log);

    machine.transition('Classified');
    machine.transition('Dispatching');
    machine.transition('Aggregating');
    machine.transition('Completed');

    expect(machine.state).toBe('Completed');
    expect(machine.isTerminal).toBe(true);
    expect(log.entries().map(e => e.action)).toEqual([
      'state:Received->Classified',
      'state:Classified->Dispatching',
      'state:Dispatching->Aggregating',
      'state:Aggregating->Completed',
    ]);
  });

  it('allows failure from any non-terminal state only', () => {
    expect(canTransition('Received', 'Failed')).toBe(true);
    expect(canTransition('Aggregating', 'Failed')).toBe(true);
    expect(canTransition('Completed', 'Failed')).toBe(false);
    expect(canTransition('Failed', 'Completed')).toBe(false);
  });

  it('refuses skipped states', () => {
    const machine = new RunStateMachine(new ActivityLog());
    expect(() => machine.transition('Dispatching')).toThrow('Illegal run transition Received → Dispatching');
    expect(machine.state).toBe('Received');
  });
});
