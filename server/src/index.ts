import 'dotenv/config';

import { createApp } from './app';
import { connectRedisStore } from './cache/ttlCache';
import { loadConfig } from './config/env';
import { errorMessage, logError, logInfo } from './observability/logger';
import { buildServices } from './services/container';

async function main(): Promise<void> {
  const config = loadConfig();
  const redis = await connectRedisStore(config.redisUrl);
  const app = createApp(buildServices(config, { redis }));

  app.listen(config.port, () => {
    logInfo('api_server_started', {
      port: config.port,
      cacheBackend: redis ? 'redis' : 'memory',
      catalogTtlMs: config.catalog.cacheTtlMs
    });
  });
}

main().catch((err: unknown) => {
  logError('api_server_failed', { error: errorMessage(err) });
  process.exitCode = 1;
});
