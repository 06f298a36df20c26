// Support Orchestrator
// Classifies a query, runs the matching coordination pattern and aggregates
// agent results into one response. Runs are processed one at a time.

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { AppError, errorMessage, fromZodError } from '../../utils/errors.js';
import type { ErrorInfo } from '../../utils/errors.js';
import { ActivityLog } from '../activity-log/activity-log.js';
import { RunContext } from '../agents/context.js';
import type { SpecialistAgents } from '../agents/index.js';
import type { AgentCard, HandleOptions, Task, TaskReport, TaskResult } from '../agents/types.js';
import { classify } from '../intent/index.js';
import type { Intent, IntentKind, QueryContext } from '../intent/types.js';
import { composeText } from './formatter.js';
import { DEFAULT_PATTERNS, resolvePatternTable } from './patterns.js';
import { QueryRequestSchema } from './schema.js';
import { RunStateMachine } from './state-machine.js';
import type { OrchestrationResponse, OrchestratorOptions, PatternTable, RunScope } from './types.js';

const ORCHESTRATOR_CARD: AgentCard = {
  name: 'Orchestrator',
  role: 'Router',
  description: 'Classifies each query and coordinates the specialist agents that answer it.',
  operations: [],
};

function preview(text: string, max: number = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

interface RunRecord {
  runId: string;
  log: ActivityLog;
  machine: RunStateMachine;
  intent?: Intent;
  context?: RunContext;
}

export class SupportOrchestrator {
  private queue: Promise<unknown> = Promise.resolve();
  private patterns: PatternTable;
  private taskOptions: HandleOptions;

  constructor(
    private agents: SpecialistAgents,
    private logger?: Logger,
    private options: OrchestratorOptions = {}
  ) {
    // Configuration errors surface here, before any query is accepted
    this.patterns = options.patterns ? resolvePatternTable(options.patterns) : DEFAULT_PATTERNS;
    this.taskOptions = { timeoutMs: options.taskTimeoutMs };
  }

  get cards(): AgentCard[] {
    return [ORCHESTRATOR_CARD, this.agents.data.card, this.agents.support.card];
  }

  /** Accepts unchecked input; invalid input yields a Failed response, never a rejection. */
  run(query: unknown, context?: unknown): Promise<OrchestrationResponse> {
    const next = this.queue.then(() => this.execute(query, context));
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async execute(rawQuery: unknown, rawContext: unknown): Promise<OrchestrationResponse> {
    const runId = this.options.idGenerator?.() ?? randomUUID();
    const log = new ActivityLog({ clock: this.options.clock, logger: this.logger, runId });
    const record: RunRecord = { runId, log, machine: new RunStateMachine(log) };

    const parsed = QueryRequestSchema.safeParse({ query: rawQuery, context: rawContext });
    if (!parsed.success) {
      const error = fromZodError(parsed.error, 'Invalid query').toInfo('query');
      log.append('orchestrator', 'receive', 'error', error.message);
      record.machine.transition('Failed', error.message);
      return this.respond(record, { text: '', escalated: false, errors: [error] });
    }

    const { query } = parsed.data;
    const callerContext: QueryContext = parsed.data.context ?? {};
    log.append('orchestrator', 'receive', 'ok', preview(query));

    try {
      return await this.process(record, query, callerContext);
    } catch (error) {
      const failure = error instanceof AppError
        ? error
        : AppError.upstreamFailure(`Run failed: ${errorMessage(error)}`);
      this.logger?.error({ runId, err: failure.message, code: failure.code }, 'Run aborted');

      if (!record.machine.isTerminal) record.machine.transition('Failed', failure.message);
      const taskErrors = this.taskErrors(record.context?.priorResults ?? []);
      return this.respond(record, { text: '', escalated: false, errors: [...taskErrors, failure.toInfo('orchestrator')] });
    }
  }

  private async process(record: RunRecord, query: string, callerContext: QueryContext): Promise<OrchestrationResponse> {
    const { log, machine } = record;

    const intent = classify(query, callerContext);
    record.intent = intent;
    log.append('classifier', 'classify', 'ok', `${intent.kind} via ${intent.rule}`);
    machine.transition('Classified', intent.kind);

    const context = new RunContext(query, intent, callerContext);
    record.context = context;

    machine.transition('Dispatching', `pattern:${intent.kind}`);
    const scope: RunScope = {
      intent,
      context,
      log,
      dispatch: task => this.dispatch(task, context, log),
    };
    const outcome = await this.patterns[intent.kind](scope);

    machine.transition('Aggregating');
    const reports = context.priorResults;
    const errors = [...(outcome.errors ?? []), ...this.taskErrors(reports)];
    const succeeded = reports.filter(r => r.success).length;
    const steps = reports.length + (outcome.errors?.length ?? 0);

    if (errors.length === 0) {
      log.append('orchestrator', 'aggregate', 'ok', `${succeeded} step(s) succeeded`);
    } else if (succeeded > 0) {
      const partial = AppError.partialFailure(`${errors.length} of ${steps} step(s) failed`, { succeeded, steps });
      log.append('orchestrator', 'aggregate', 'error', `${partial.code}: ${partial.message}`);
      this.logger?.warn({ runId: record.runId, ...partial.toInfo('orchestrator') }, 'Run partially failed');
    } else {
      log.append('orchestrator', 'aggregate', 'error', `all ${steps} step(s) failed`);
    }

    machine.transition(errors.length === 0 || succeeded > 0 ? 'Completed' : 'Failed');
    return this.respond(record, { text: outcome.text, escalated: outcome.escalated ?? false, errors });
  }

  private async dispatch(task: Task, context: RunContext, log: ActivityLog): Promise<TaskResult> {
    let agentName: string;
    let result: TaskResult;

    if (task.agent === 'data') {
      agentName = this.agents.data.card.name;
      result = await this.agents.data.handle(task, context, this.taskOptions);
    } else {
      agentName = this.agents.support.card.name;
      result = await this.agents.support.handle(task, context, this.taskOptions);
    }

    const report: TaskReport = {
      label: task.label,
      agent: task.agent,
      operation: task.operation,
      success: result.success,
    };
    if (result.success) {
      report.text = result.text;
      log.append(agentName, task.operation, 'ok', task.label);
    } else {
      report.error = result.error;
      log.append(agentName, task.operation, 'error', `${task.label}: [${result.error.code}] ${result.error.message}`);
    }
    context.recordReport(report);

    return result;
  }

  private taskErrors(reports: readonly TaskReport[]): ErrorInfo[] {
    return reports.flatMap(r => (r.error ? [r.error] : []));
  }

  private respond(
    record: RunRecord,
    outcome: { text: string; escalated: boolean; errors: ErrorInfo[] }
  ): OrchestrationResponse {
    const { machine } = record;
    const state = machine.state === 'Completed' ? 'Completed' : 'Failed';
    const patternUsed: IntentKind = record.intent?.kind ?? 'Unknown';

    const response: OrchestrationResponse = {
      run_id: record.runId,
      success: outcome.errors.length === 0 && state === 'Completed',
      text: composeText(outcome.text, outcome.errors),
      pattern_used: patternUsed,
      escalated: outcome.escalated,
      state,
      results: [...(record.context?.priorResults ?? [])],
      trace: record.log.entries(),
      errors: outcome.errors,
    };

    this.logger?.info(
      { runId: record.runId, pattern: patternUsed, state, success: response.success, errors: outcome.errors.length },
      'Run finished'
    );
    return response;
  }
}

export function createOrchestrator(
  agents: SpecialistAgents,
  logger?: Logger,
  options: OrchestratorOptions = {}
): SupportOrchestrator {
  return new SupportOrchestrator(agents, logger, options);
}
