import { resolve } from 'node:path';
import { loadConfig } from '@crosscheck/schemas/src/config-loader.js';
import { createCrosscheckRuntime } from '@crosscheck/core/src/infrastructure/crosscheck-runtime.js';
import { createApp } from '../packages/api/src/app.js';
import { API_VERSION } from '../packages/api/src/routes/health.js';

async function main(): Promise<void> {
  const config = await loadConfig(resolve(process.cwd(), 'config'));
  const app = createApp({ service: createCrosscheckRuntime(config).service, jwtSecret: 'unused' });

  const doc = app.getOpenAPI31Document({
    openapi: '3.1.0',
    info: {
      title: 'Crosscheck API',
      version: API_VERSION,
      description: 'Multi-source aggregation with corroboration and confidence scoring',
    },
    servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
    security: [{ Bearer: [] }],
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

  process.stdout.write(JSON.stringify(doc, null, 2));
  process.stdout.write('\n');
}

main().catch((error: unknown) => {
  console.error('OpenAPI generation failed:', error);
  process.exit(1);
});
