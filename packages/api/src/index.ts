import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { loadConfig } from '@crosscheck/schemas/src/config-loader.js';
import { createCrosscheckRuntime } from '@crosscheck/core/src/infrastructure/crosscheck-runtime.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = resolve(process.env['CROSSCHECK_CONFIG_DIR'] ?? 'config');

  const config = await loadConfig(configDir);
  const { service } = createCrosscheckRuntime(config);
  const jwtSecret = process.env['CROSSCHECK_API_JWT_SECRET'];

  const app = createApp({ service, ...(jwtSecret ? { jwtSecret } : {}) });

  log.info({ port, configDir }, 'Starting Crosscheck API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Crosscheck API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
