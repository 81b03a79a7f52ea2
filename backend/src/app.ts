/**
 * answerkit Backend — Express Application Factory
 *
 * Creates and configures the Express app with all middleware and routes.
 * Separated from server.ts to enable testing with supertest.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createLogger } from '@answerkit/engine';
import type { Logger } from '@answerkit/engine';
import type { Config } from './config';
import { BuildTracker, mediaBuildRunner } from './builds';
import type { BuildRunner } from './builds';
import { buildRoutes } from './routes/builds';
import { healthRoutes } from './routes/health';

export interface AppContext {
  app: express.Application;
  builds: BuildTracker;
  logger: Logger;
}

export interface AppDependencies {
  /** Defaults to media preparation through the engine */
  runner?: BuildRunner;
  logger?: Logger;
}

export function createApp(config: Config, deps: AppDependencies = {}): AppContext {
  const logger = deps.logger ?? createLogger({ level: config.logLevel, name: 'answerkit-backend' });
  const builds = new BuildTracker(deps.runner ?? mediaBuildRunner(logger), logger);
  const app = express();

  // ─── Middleware ────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins }));
  app.use(express.json({ limit: '16kb' }));

  // ─── Routes ───────────────────────────────────────────────
  app.use('/api/health', healthRoutes(builds));
  app.use('/api/builds', buildRoutes(builds, config));

  // ─── 404 Handler ──────────────────────────────────────────
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ─── Error Handler ────────────────────────────────────────
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return { app, builds, logger };
}
