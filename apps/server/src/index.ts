import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { initializeOtelMetrics, shutdownOtelMetrics } from './otel-metrics.js';

function main() {
  initializeOtelMetrics(config.metrics);

  const app = createApp(config);
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info('API server running', { port: info.port, url: `http://localhost:${info.port}` });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    shutdownOtelMetrics()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  logger.error('Fatal error in main', { error });
  process.exit(1);
}
