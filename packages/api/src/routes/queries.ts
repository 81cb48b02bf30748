import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { IntelService } from '@crosscheck/core/src/services/intel/types.js';
import { createQueryParams } from '@crosscheck/schemas/src/query.schema.js';
import { createRouter, type AppEnv } from '../types.js';
import { QueryRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, QueryResponseSchema } from '../schemas/responses.js';
import { toQueryResponse } from '../serializers.js';

const errorContent = {
  'application/json': {
    schema: ErrorResponseSchema,
  },
};

const runQueryRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Queries'],
  summary: 'Aggregate and correlate one query across sources',
  request: {
    body: {
      content: {
        'application/json': {
          schema: QueryRequestSchema,
        },
      },
      required: true,
    },
  },
  responses: {
    200: {
      description: 'Correlated findings with confidence and source accounting',
      content: {
        'application/json': {
          schema: QueryResponseSchema,
        },
      },
    },
    400: { description: 'Invalid query', content: errorContent },
    422: { description: 'Named entity could not be resolved', content: errorContent },
    503: { description: 'No source is available for the query', content: errorContent },
  },
});

export function createQueryRoutes(service: IntelService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(runQueryRoute, async (c) => {
    const params = createQueryParams(c.req.valid('json'));
    const result = await service.aggregate(params);
    return c.json(toQueryResponse(result), 200);
  });

  return routes;
}
