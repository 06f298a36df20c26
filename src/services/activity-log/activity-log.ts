// Append-only record of every orchestration step in one run
// A fresh instance is created per run and passed explicitly

import type { Logger } from 'pino';

export type LogOutcome = 'ok' | 'error';

export interface LogEntry {
  readonly sequence: number;
  readonly timestamp: string;
  readonly actor: string;
  readonly action: string;
  readonly outcome: LogOutcome;
  readonly detail?: string;
}

export interface ActivityLogOptions {
  clock?: () => Date;
  /** Entries are mirrored here at debug level (error outcomes at warn). */
  logger?: Logger;
  runId?: string;
}

export class ActivityLog {
  private log: LogEntry[] = [];
  private clock: () => Date;
  private logger?: Logger;
  private runId?: string;

  constructor(options: ActivityLogOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
    this.runId = options.runId;
  }

  append(actor: string, action: string, outcome: LogOutcome = 'ok', detail?: string): LogEntry {
    const entry: LogEntry = Object.freeze({
      sequence: this.log.length + 1,
      timestamp: this.clock().toISOString(),
      actor,
      action,
      outcome,
      ...(detail !== undefined ? { detail } : {}),
    });
    this.log.push(entry);

    if (this.logger) {
      const fields = { runId: this.runId, sequence: entry.sequence, actor, action, outcome, detail };
      if (outcome === 'error') this.logger.warn(fields, `${actor} ${action}`);
      else this.logger.debug(fields, `${actor} ${action}`);
    }

    return entry;
  }

  entries(): readonly LogEntry[] {
    return [...this.log];
  }

  get size(): number {
    return this.log.length;
  }

  get last(): LogEntry | undefined {
    return this.log[this.log.length - 1];
  }
}
