import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { IntelService } from '@crosscheck/core/src/services/intel/types.js';
import { createRouter, type AppEnv } from '../types.js';
import { SourceParamsSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  SourceHealthResponseSchema,
  SourceListResponseSchema,
  SourceStatusResponseSchema,
} from '../schemas/responses.js';
import { toSourceStatusResponse } from '../serializers.js';

const notFound = {
  description: 'Unknown source',
  content: {
    'application/json': {
      schema: ErrorResponseSchema,
    },
  },
};

const listRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Sources'],
  summary: 'Status of every registered source',
  responses: {
    200: {
      description: 'Source statuses',
      content: {
        'application/json': {
          schema: SourceListResponseSchema,
        },
      },
    },
  },
});

const getRoute = createRoute({
  method: 'get',
  path: '/{sourceId}',
  tags: ['Sources'],
  summary: 'Status of one source',
  request: {
    params: SourceParamsSchema,
  },
  responses: {
    200: {
      description: 'Source status',
      content: {
        'application/json': {
          schema: SourceStatusResponseSchema,
        },
      },
    },
    404: notFound,
  },
});

const healthCheckRoute = createRoute({
  method: 'post',
  path: '/{sourceId}/health',
  tags: ['Sources'],
  summary: 'Run a health check against one source',
  request: {
    params: SourceParamsSchema,
  },
  responses: {
    200: {
      description: 'Health check outcome',
      content: {
        'application/json': {
          schema: SourceHealthResponseSchema,
        },
      },
    },
    404: notFound,
  },
});

export function createSourceRoutes(service: IntelService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(listRoute, (c) => {
    return c.json({ sources: service.sourceStatus().map(toSourceStatusResponse) }, 200);
  });

  routes.openapi(getRoute, (c) => {
    const { sourceId } = c.req.valid('param');
    return c.json(toSourceStatusResponse(service.sourceStatus(sourceId)), 200);
  });

  routes.openapi(healthCheckRoute, async (c) => {
    const { sourceId } = c.req.valid('param');
    const [result] = await service.checkHealth(sourceId);
    const healthy = result?.healthy ?? false;
    const checkedAt = result?.checkedAt ?? new Date();
    return c.json({ sourceId, healthy, checkedAt: checkedAt.toISOString() }, 200);
  });

  return routes;
}
