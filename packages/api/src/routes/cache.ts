import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { IntelService } from '@crosscheck/core/src/services/intel/types.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { CacheClearQuerySchema } from '../schemas/requests.js';
import { CacheClearResponseSchema, CacheStatusResponseSchema } from '../schemas/responses.js';
import { toCacheStatusResponse } from '../serializers.js';

const log = createChildLogger('api:cache');

const statusRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Cache'],
  summary: 'Entry counts, sizes and ages for both cache tiers',
  responses: {
    200: {
      description: 'Cache status',
      content: {
        'application/json': {
          schema: CacheStatusResponseSchema,
        },
      },
    },
  },
});

const clearRoute = createRoute({
  method: 'delete',
  path: '/',
  tags: ['Cache'],
  summary: 'Invalidate cached entries, for one source or all',
  request: {
    query: CacheClearQuerySchema,
  },
  responses: {
    200: {
      description: 'Number of cache keys removed',
      content: {
        'application/json': {
          schema: CacheClearResponseSchema,
        },
      },
    },
  },
});

export function createCacheRoutes(service: IntelService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(statusRoute, async (c) => {
    const status = await service.cacheStatus();
    return c.json(toCacheStatusResponse(status), 200);
  });

  routes.openapi(clearRoute, async (c) => {
    const { source } = c.req.valid('query');
    const removed = await service.cacheClear(source);
    log.info({ source: source ?? '*', removed, subject: c.get('subject') }, 'Cache cleared');
    return c.json({ removed, source: source ?? null }, 200);
  });

  return routes;
}
