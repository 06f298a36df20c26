// Application assembly: store → tool registry → agents → orchestrator → HTTP routes
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { LOG_LEVEL, componentLogger, logger as rootLogger, prettyTransport, type Logger } from './logger.js';
import { agentRoutes } from './routes/agents.js';
import { queryRoutes } from './routes/query.js';
import { toolRoutes } from './routes/tools.js';
import { createAgents } from './services/agents/index.js';
import { createOrchestrator, type SupportOrchestrator } from './services/orchestrator/index.js';
import type { OrchestratorOptions } from './services/orchestrator/types.js';
import { RunHistory } from './services/run-history.js';
import type { SupportStore } from './services/store/types.js';
import { createToolRegistry, type ToolRegistry } from './services/tools/index.js';

export const API_VERSION = '1.0.0';

export interface AppOptions {
  store: SupportStore;
  logger?: Logger;
  orchestrator?: OrchestratorOptions;
  historyTtlMs?: number;
  corsOrigins?: string[];
}

export interface SupportApp {
  server: FastifyInstance;
  orchestrator: SupportOrchestrator;
  registry: ToolRegistry;
  history: RunHistory;
}

export async function buildApp(options: AppOptions): Promise<SupportApp> {
  const logger = options.logger ?? rootLogger;
  const { store } = options;

  const registry = createToolRegistry(store, componentLogger('tools', logger));
  const agents = createAgents(registry, logger);
  const orchestrator = createOrchestrator(agents, componentLogger('orchestrator', logger), {
    taskTimeoutMs: env.TASK_TIMEOUT_MS || undefined,
    ...options.orchestrator,
  });
  const history = new RunHistory({ ttlMs: options.historyTtlMs ?? env.RUN_HISTORY_TTL_MS });

  const server = Fastify({
    logger: {
      level: LOG_LEVEL,
      transport: prettyTransport(),
    },
  });

  await server.register(cors, {
    origin: options.corsOrigins ?? env.CORS_ORIGINS,
    credentials: true,
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      store: store.driver,
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(queryRoutes, { prefix: '/v1', orchestrator, history });
  await server.register(toolRoutes, { prefix: '/v1', registry });
  await server.register(agentRoutes, { prefix: '/v1', orchestrator });

  server.addHook('onClose', async () => {
    history.clear();
    await store.close();
  });

  return { server, orchestrator, registry, history };
}
