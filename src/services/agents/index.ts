// Specialist agents over a shared tool registry

import { componentLogger, type Logger } from '../../logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import { DataAgent } from './data-agent.js';
import { SupportAgent } from './support-agent.js';

export { SpecialistAgent, ToolCallFailure } from './base-agent.js';
export { RunContext } from './context.js';
export { DataAgent, formatCustomer } from './data-agent.js';
export { SupportAgent, escalationNotice } from './support-agent.js';
export type {
  AgentCard,
  AgentKind,
  DataTask,
  HandleOptions,
  SupportTask,
  Task,
  TaskOperation,
  TaskPayload,
  TaskReport,
  TaskResult,
} from './types.js';

export interface SpecialistAgents {
  data: DataAgent;
  support: SupportAgent;
}

export function createAgents(registry: ToolRegistry, logger?: Logger): SpecialistAgents {
  return {
    data: new DataAgent(registry, logger && componentLogger('DataAgent', logger)),
    support: new SupportAgent(registry, logger && componentLogger('SupportAgent', logger)),
  };
}
