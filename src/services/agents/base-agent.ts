// Specialist Agent base
// handle() never throws: every failure comes back as a failed TaskResult

import type { Logger } from 'pino';
import { AppError, errorMessage } from '../../utils/errors.js';
import type { ErrorInfo } from '../../utils/errors.js';
import { withDeadline } from '../../utils/deadline.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolName, ToolOutput } from '../tools/types.js';
import type { RunContext } from './context.js';
import type { AgentCard, AgentKind, HandleOptions, Task, TaskOperation, TaskResult } from './types.js';

const WRITE_OPERATIONS: ReadonlySet<TaskOperation> = new Set<TaskOperation>(['update_customer', 'create_ticket']);
const PENDING_WRITE_NOTE = 'the change may still be applied';

/** A registry failure, carried unchanged to the task result. */
export class ToolCallFailure extends Error {
  constructor(readonly info: ErrorInfo) {
    super(info.message);
    this.name = 'ToolCallFailure';
  }
}

export abstract class SpecialistAgent<T extends Task> {
  abstract readonly kind: AgentKind;
  abstract readonly card: AgentCard;

  constructor(
    protected registry: ToolRegistry,
    protected logger?: Logger
  ) {}

  async handle(task: T, context: RunContext, options: HandleOptions = {}): Promise<TaskResult> {
    const startTime = Date.now();

    try {
      const work = this.perform(task, context);
      const result = options.timeoutMs
        ? await withDeadline(work, options.timeoutMs, `${this.card.name}.${task.operation}`, {
            note: WRITE_OPERATIONS.has(task.operation) ? PENDING_WRITE_NOTE : undefined,
          })
        : await work;

      this.logger?.debug(
        { agent: this.card.name, operation: task.operation, success: result.success, durationMs: Date.now() - startTime },
        'Task handled'
      );
      return result;
    } catch (error) {
      if (error instanceof ToolCallFailure) {
        return { success: false, error: error.info };
      }

      const failure = error instanceof AppError
        ? error
        : AppError.upstreamFailure(`${this.card.name} failed on ${task.operation}: ${errorMessage(error)}`);
      this.logger?.warn({ agent: this.card.name, operation: task.operation, err: failure.message }, 'Task failed');
      return { success: false, error: failure.toInfo(task.label) };
    }
  }

  protected abstract perform(task: T, context: RunContext): Promise<TaskResult>;

  /** Invoke a registry operation; a failed call aborts the task with the registry's error. */
  protected async call<K extends ToolName>(name: K, args: unknown): Promise<ToolOutput<K>> {
    const result = await this.registry.invoke(name, args);
    if (!result.success) {
      throw new ToolCallFailure(result.error);
    }
    return result.data;
  }
}
