/**
 * answerkit Backend — Build Tracker
 *
 * Runs one media preparation at a time. start() refuses while a build is
 * in flight; the gate opens again once that build settles, whether it
 * succeeded or failed.
 */

import { v4 as uuid } from 'uuid';
import { AnswerFileError, errorMessage, prepareAnswerFile } from '@answerkit/engine';
import type { Logger, MediaLayout } from '@answerkit/engine';

export type BuildStatus = 'running' | 'succeeded' | 'failed';

export interface BuildRecord {
  id: string;
  status: BuildStatus;
  startedAt: string;
  finishedAt?: string;
  /** Prepared answer file, once the build succeeded */
  outputPath?: string;
  error?: string;
}

export interface BuildOutcome {
  outputPath: string;
}

/** What a build does; rejects when the build fails */
export interface BuildRunner {
  run(layout: MediaLayout): Promise<BuildOutcome>;
}

/** The real runner: media preparation through the engine */
export function mediaBuildRunner(logger: Logger): BuildRunner {
  return {
    async run(layout: MediaLayout): Promise<BuildOutcome> {
      const result = prepareAnswerFile({ ...layout, logger });
      if (!result.ok) {
        throw new AnswerFileError(result.error.category, result.error.message, result.error.details);
      }
      return { outputPath: result.path };
    },
  };
}

export class BuildTracker {
  private current: BuildRecord | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly runner: BuildRunner,
    private readonly logger: Logger,
  ) {}

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  /** The most recent build, running or finished */
  latest(): BuildRecord | null {
    return this.current ? { ...this.current } : null;
  }

  /** Start a build, or return null when one is already running */
  start(layout: MediaLayout): BuildRecord | null {
    if (this.inFlight) return null;

    const record: BuildRecord = {
      id: uuid(),
      status: 'running',
      startedAt: new Date().toISOString(),
    };
    this.current = record;
    this.logger.info({ build: record.id, ...layout }, 'Build started');

    this.inFlight = Promise.resolve()
      .then(() => this.runner.run(layout))
      .then(
        (outcome) => {
          record.status = 'succeeded';
          record.finishedAt = new Date().toISOString();
          record.outputPath = outcome.outputPath;
          this.logger.info({ build: record.id, output: outcome.outputPath }, 'Build succeeded');
        },
        (err: unknown) => {
          record.status = 'failed';
          record.finishedAt = new Date().toISOString();
          record.error = errorMessage(err);
          this.logger.error({ build: record.id, error: record.error }, 'Build failed');
        },
      )
      .finally(() => {
        this.inFlight = null;
      });

    return { ...record };
  }

  /** Resolves once no build is running */
  async settled(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }
}
