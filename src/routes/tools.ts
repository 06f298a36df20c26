// Tool routes: direct access to the validated registry operations
import type { FastifyInstance } from 'fastify';
import { formatErrorResponse, statusForCode } from '../utils/errors.js';
import type { ToolRegistry } from '../services/tools/registry.js';

export interface ToolRouteOptions {
  registry: ToolRegistry;
}

export async function toolRoutes(server: FastifyInstance, opts: ToolRouteOptions) {
  const { registry } = opts;

  // GET /v1/tools - Manifest of every registered operation
  server.get('/tools', async () => {
    return { tools: registry.toManifest() };
  });

  // POST /v1/tools/:name - Invoke one operation with a JSON arguments body
  server.post<{ Params: { name: string } }>('/tools/:name', async (request, reply) => {
    const { name } = request.params;
    const result = await registry.invokeByName(name, request.body ?? {});

    if (!result.success) {
      const status = registry.has(name) ? statusForCode(result.error.code) : 404;
      return reply.code(status).send({ success: false, ...formatErrorResponse(result.error) });
    }

    return { success: true, data: result.data, durationMs: result.durationMs };
  });
}
