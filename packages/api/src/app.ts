import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { IntelService } from '@crosscheck/core/src/services/intel/types.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { API_VERSION, createHealthRoutes } from './routes/health.js';
import { createQueryRoutes } from './routes/queries.js';
import { createEntityRoutes } from './routes/entities.js';
import { createCacheRoutes } from './routes/cache.js';
import { createSourceRoutes } from './routes/sources.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly service: IntelService;
  /** HS256 secret; requests are not authenticated when absent. */
  readonly jwtSecret?: string;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  // Health, no auth required
  app.route('/health', createHealthRoutes(config.service));

  // OpenAPI document, no auth required
  app.get('/openapi.json', (c) => {
    const doc = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Crosscheck API',
        version: API_VERSION,
        description: 'Multi-source aggregation with corroboration and confidence scoring',
      },
      ...(config.jwtSecret ? { security: [{ Bearer: [] }] } : {}),
    });
    doc.components = {
      ...doc.components,
      securitySchemes: {
        Bearer: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
    };
    return c.json(doc);
  });

  if (config.jwtSecret) {
    app.use('*', createAuthMiddleware({ secret: config.jwtSecret }));
  } else {
    log.warn('No JWT secret configured, API requests are not authenticated');
  }

  app.route('/queries', createQueryRoutes(config.service));
  app.route('/entities', createEntityRoutes(config.service));
  app.route('/cache', createCacheRoutes(config.service));
  app.route('/sources', createSourceRoutes(config.service));

  return app;
}
