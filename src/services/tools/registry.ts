// Tool Registry - Validated operation boundary in front of the backing store
// Every call validates its arguments before the store is touched

import type { Logger } from 'pino';
import { AppError, errorMessage, fromZodError } from '../../utils/errors.js';
import type { SupportStore } from '../store/types.js';
import type { ToolCatalog, ToolDefinition, ToolName, ToolOutput, ToolParameter, ToolResult } from './types.js';

type AnyToolDefinition = ToolCatalog[ToolName];

export interface ToolManifestEntry {
  name: ToolName;
  description: string;
  mutates: boolean;
  parameters: {
    type: 'object';
    properties: Record<string, ToolParameterSchema>;
    required: string[];
  };
}

interface ToolParameterSchema {
  type: ToolParameter['type'];
  description: string;
  enum?: readonly string[];
  default?: string | number | boolean;
}

export class ToolRegistry {
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private store: SupportStore,
    private tools: ToolCatalog,
    private logger?: Logger
  ) {}

  get<K extends ToolName>(name: K): ToolDefinition<K> {
    return this.tools[name];
  }

  getAll(): AnyToolDefinition[] {
    return Object.values(this.tools);
  }

  has(name: string): name is ToolName {
    return Object.prototype.hasOwnProperty.call(this.tools, name);
  }

  async invoke<K extends ToolName>(name: K, rawArgs: unknown): Promise<ToolResult<ToolOutput<K>>> {
    const tool: ToolDefinition<K> = this.tools[name];
    return tool.mutates ? this.serialize(() => this.run(tool, rawArgs)) : this.run(tool, rawArgs);
  }

  /** Entry point for callers holding an unchecked tool name (HTTP, config). */
  async invokeByName(name: string, rawArgs: unknown): Promise<ToolResult<unknown>> {
    if (!this.has(name)) {
      return {
        success: false,
        error: AppError.validationError(`Unknown tool "${name}"`).toInfo(name),
        durationMs: 0,
      };
    }
    return this.invoke(name, rawArgs);
  }

  toManifest(): ToolManifestEntry[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      mutates: tool.mutates,
      parameters: {
        type: 'object',
        properties: this.parametersToSchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  private async run<K extends ToolName>(
    tool: ToolDefinition<K>,
    rawArgs: unknown
  ): Promise<ToolResult<ToolOutput<K>>> {
    const startTime = Date.now();

    const parsed = tool.schema.safeParse(rawArgs ?? {});
    if (!parsed.success) {
      const error = fromZodError(parsed.error, `Invalid arguments for ${tool.name}`).toInfo(tool.name);
      this.logger?.debug({ tool: tool.name, issues: parsed.error.issues }, 'Tool arguments rejected');
      return { success: false, error, durationMs: Date.now() - startTime };
    }

    try {
      const data = await tool.execute(parsed.data, this.store);
      this.logger?.debug({ tool: tool.name, durationMs: Date.now() - startTime }, 'Tool call succeeded');
      return { success: true, data, durationMs: Date.now() - startTime };
    } catch (error) {
      const failure = error instanceof AppError
        ? error
        : AppError.upstreamFailure(`${tool.name} failed: ${errorMessage(error)}`);
      this.logger?.warn({ tool: tool.name, code: failure.code, err: failure.message }, 'Tool call failed');
      return { success: false, error: failure.toInfo(tool.name), durationMs: Date.now() - startTime };
    }
  }

  // One write at a time against the store
  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const next = this.writeQueue.then(operation, operation);
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, ToolParameterSchema> {
    const schema: Record<string, ToolParameterSchema> = {};

    for (const param of params) {
      const paramSchema: ToolParameterSchema = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
