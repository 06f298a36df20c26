// Query routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { fromZodError, formatErrorResponse, AppError } from '../utils/errors.js';
import { QueryRequestSchema } from '../services/orchestrator/schema.js';
import type { SupportOrchestrator } from '../services/orchestrator/orchestrator.js';
import type { RunHistory } from '../services/run-history.js';

export interface QueryRouteOptions {
  orchestrator: SupportOrchestrator;
  history: RunHistory;
}

const RecentRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export async function queryRoutes(server: FastifyInstance, opts: QueryRouteOptions) {
  const { orchestrator, history } = opts;

  // POST /v1/query - Run one natural-language query through the orchestrator
  server.post('/query', async (request, reply) => {
    const parsed = QueryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = fromZodError(parsed.error, 'Invalid request body').toInfo();
      return reply.code(400).send({ success: false, ...formatErrorResponse(error) });
    }

    const response = await orchestrator.run(parsed.data.query, parsed.data.context);
    history.record(response);
    return response;
  });

  // GET /v1/runs - Recent runs, newest first
  server.get('/runs', async (request, reply) => {
    const parsed = RecentRunsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      const error = fromZodError(parsed.error, 'Invalid query string').toInfo();
      return reply.code(400).send({ success: false, ...formatErrorResponse(error) });
    }

    const runs = history.recent(parsed.data.limit).map(run => ({
      run_id: run.run_id,
      success: run.success,
      pattern_used: run.pattern_used,
      state: run.state,
      escalated: run.escalated,
    }));
    return { runs };
  });

  // GET /v1/runs/:id - Full response and activity trace of a recent run
  server.get<{ Params: { id: string } }>('/runs/:id', async (request, reply) => {
    const run = history.get(request.params.id);
    if (!run) {
      const error = AppError.notFound(`Run ${request.params.id} not found`).toInfo();
      return reply.code(404).send({ success: false, ...formatErrorResponse(error) });
    }
    return run;
  });
}
