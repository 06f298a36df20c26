// Orchestrator types

import type { ErrorInfo } from '../../utils/errors.js';
import type { ActivityLog, LogEntry } from '../activity-log/activity-log.js';
import type { RunContext } from '../agents/context.js';
import type { Task, TaskReport, TaskResult } from '../agents/types.js';
import type { Intent, IntentKind } from '../intent/types.js';

export type RunState = 'Received' | 'Classified' | 'Dispatching' | 'Aggregating' | 'Completed' | 'Failed';
export type TerminalState = Extract<RunState, 'Completed' | 'Failed'>;

export interface OrchestrationResponse {
  run_id: string;
  /** True only when no error was recorded. */
  success: boolean;
  text: string;
  pattern_used: IntentKind;
  escalated: boolean;
  state: TerminalState;
  results: TaskReport[];
  trace: readonly LogEntry[];
  errors: ErrorInfo[];
}

/** Everything a pattern handler may touch during one run. */
export interface RunScope {
  readonly intent: Intent;
  readonly context: RunContext;
  readonly log: ActivityLog;
  /** Hands one task to its agent; failures come back as results, never throws. */
  dispatch(task: Task): Promise<TaskResult>;
}

export interface PatternOutcome {
  text: string;
  escalated?: boolean;
  /** Errors raised by the pattern itself, beyond failed tasks. */
  errors?: ErrorInfo[];
}

export type PatternHandler = (scope: RunScope) => Promise<PatternOutcome>;
export type PatternTable = Readonly<Record<IntentKind, PatternHandler>>;

export interface OrchestratorOptions {
  /** Per-agent-call deadline. */
  taskTimeoutMs?: number;
  /** Replaces the built-in pattern table; checked at construction. */
  patterns?: Readonly<Record<string, PatternHandler | undefined>>;
  clock?: () => Date;
  idGenerator?: () => string;
}
