import type { FastifyInstance } from 'fastify';
import type { SupportOrchestrator } from '../services/orchestrator/orchestrator.js';

export interface AgentRouteOptions {
  orchestrator: SupportOrchestrator;
}

export async function agentRoutes(server: FastifyInstance, opts: AgentRouteOptions) {
  // Public: agent cards for clients and dashboards
  server.get('/agents', async () => {
    return { agents: opts.orchestrator.cards };
  });
}
