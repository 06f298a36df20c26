import { describe, it, expect } from 'vitest';
import { ActivityLog } from '../activity-log.js';

describe('ActivityLog', () => {
  it('numbers entries from 1 with the injected clock', () => {
    const log = new ActivityLog({ clock: () => new Date('2026-03-01T12:00:00.000Z') });

    log.append('orchestrator', 'receive');
    log.append('DataAgent', 'get_customer', 'error', 'get_customer:9: [not_found] Customer 9 not found');

    expect(log.entries()).toEqual([
      { sequence: 1, timestamp: '2026-03-01T12:00:00.000Z', actor: 'orchestrator', action: 'receive', outcome: 'ok' },
      {
        sequence: 2,
        timestamp: '2026-03-01T12:00:00.000Z',
        actor: 'DataAgent',
        action: 'get_customer',
        outcome: 'error',
        detail: 'get_customer:9: [not_found] Customer 9 not found',
      },
    ]);
    expect(log.size).toBe(2);
    expect(log.last?.sequence).toBe(2);
  });

  it('hands out frozen entries and detached lists', () => {
    const log = new ActivityLog();
    const entry = log.append('classifier', 'classify');

    expect(Object.isFrozen(entry)).toBe(true);

    const snapshot = log.entries();
    log.append('orchestrator', 'aggregate');
    expect(snapshot).toHaveLength(1);
    expect(log.entries()).toHaveLength(2);
  });
});
