/**
 * answerkit Backend — Server Entry Point
 *
 * Starts the HTTP server. This is the main entry point for production.
 * For tests, use app.ts directly with supertest.
 */

import { loadConfig } from './config';
import { createApp } from './app';

function main(): void {
  const config = loadConfig();
  const { app, builds, logger } = createApp(config);

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.env }, 'answerkit backend listening');
  });

  // Graceful shutdown: let a running build finish first
  const shutdown = () => {
    logger.info('Shutting down...');
    server.close(() => {
      builds
        .settled()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
