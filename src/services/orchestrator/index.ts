// Orchestrator Module - Main exports

export { SupportOrchestrator, createOrchestrator } from './orchestrator.js';
export { DEFAULT_PATTERNS, UNKNOWN_GUIDANCE, decompose, planSubIntent, resolvePatternTable } from './patterns.js';
export type { PlannedTask } from './patterns.js';
export { RunStateMachine, canTransition } from './state-machine.js';
export { composeText } from './formatter.js';
export { QueryContextSchema, QueryRequestSchema, MAX_QUERY_LENGTH } from './schema.js';
export type { QueryRequest } from './schema.js';
export type {
  OrchestrationResponse,
  OrchestratorOptions,
  PatternHandler,
  PatternOutcome,
  PatternTable,
  RunScope,
  RunState,
  TerminalState,
} from './types.js';
