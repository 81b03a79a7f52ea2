/**
 * answerkit Backend — Build Routes
 *
 * POST   /api/builds          — Start a media preparation (one at a time)
 * GET    /api/builds/current  — Most recent build
 */

import { Router, Request, Response } from 'express';
import type { MediaLayout } from '@answerkit/engine';
import type { BuildTracker } from '../builds';
import type { Config } from '../config';
import { StartBuildSchema } from '../schemas';

export const BUILD_IN_PROGRESS = 'A build is already in progress';

type LayoutDefaults = Pick<Config, 'mediaRoot' | 'folderName' | 'runtimeRoot'>;

export function buildRoutes(builds: BuildTracker, defaults: LayoutDefaults): Router {
  const router = Router();

  // POST /api/builds
  router.post('/', (req: Request, res: Response) => {
    const parse = StartBuildSchema.safeParse(req.body ?? {});
    if (!parse.success) {
      res.status(400).json({ error: 'Validation failed', details: parse.error.flatten() });
      return;
    }

    const mediaRoot = parse.data.mediaRoot ?? defaults.mediaRoot;
    if (!mediaRoot) {
      res.status(400).json({ error: 'mediaRoot is required' });
      return;
    }

    const layout: MediaLayout = {
      mediaRoot,
      folderName: parse.data.folderName ?? defaults.folderName,
      runtimeRoot: parse.data.runtimeRoot ?? defaults.runtimeRoot,
    };

    const build = builds.start(layout);
    if (!build) {
      res.status(429).json({ error: BUILD_IN_PROGRESS });
      return;
    }

    res.status(202).json({ id: build.id, status: build.status });
  });

  // GET /api/builds/current
  router.get('/current', (_req: Request, res: Response) => {
    const build = builds.latest();
    if (!build) {
      res.status(404).json({ error: 'No build has been started' });
      return;
    }
    res.json({ build });
  });

  return router;
}
