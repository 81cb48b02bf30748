import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { IntelService } from '@crosscheck/core/src/services/intel/types.js';
import { createRouter, type AppEnv } from '../types.js';
import { ResolveEntityRequestSchema } from '../schemas/requests.js';
import { EntityMatchResponseSchema, ErrorResponseSchema } from '../schemas/responses.js';
import { toEntityMatchResponse } from '../serializers.js';

const resolveRoute = createRoute({
  method: 'post',
  path: '/resolve',
  tags: ['Entities'],
  summary: 'Resolve a name to a known entity',
  description: 'A failed match is still a 200; its tier is `failed` and it carries suggestions.',
  request: {
    body: {
      content: {
        'application/json': {
          schema: ResolveEntityRequestSchema,
        },
      },
      required: true,
    },
  },
  responses: {
    200: {
      description: 'Resolution outcome',
      content: {
        'application/json': {
          schema: EntityMatchResponseSchema,
        },
      },
    },
    400: {
      description: 'Invalid request',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createEntityRoutes(service: IntelService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(resolveRoute, async (c) => {
    const { name, altId } = c.req.valid('json');
    const match = await service.resolveEntity(name, altId);
    return c.json(toEntityMatchResponse(match), 200);
  });

  return routes;
}
