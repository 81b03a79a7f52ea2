/**
 * answerkit Backend — Request Validation Schemas (Zod)
 *
 * All API input is validated before hitting route handlers.
 */

import { z } from 'zod';
import { FolderNameSchema } from '@answerkit/engine';

export const StartBuildSchema = z
  .object({
    folderName: FolderNameSchema.optional(),
    mediaRoot: z.string().min(1).optional(),
    runtimeRoot: z.string().min(1).optional(),
  })
  .strict();

export type StartBuildInput = z.infer<typeof StartBuildSchema>;
