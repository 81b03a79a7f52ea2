/**
 * answerkit Backend — Health Route
 *
 * GET /api/health — Service health check
 */

import { Router, Request, Response } from 'express';
import type { BuildTracker } from '../builds';

export const VERSION = '0.1.0';

export function healthRoutes(builds: BuildTracker): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptime: process.uptime(),
      building: builds.isRunning(),
    });
  });

  return router;
}
