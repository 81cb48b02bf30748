import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { IntelService } from '@crosscheck/core/src/services/intel/types.js';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export const API_VERSION = '0.1.0';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Liveness and configured source count',
  security: [],
  responses: {
    200: {
      description: 'Service is up',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export function createHealthRoutes(service: IntelService): OpenAPIHono<AppEnv> {
  const health = createRouter();

  health.openapi(healthRoute, (c) => {
    const sources = service.sourceStatus();
    return c.json(
      {
        status: 'ok' as const,
        version: API_VERSION,
        sources: { total: sources.length, configured: sources.filter((s) => s.configured).length },
      },
      200,
    );
  });

  return health;
}
