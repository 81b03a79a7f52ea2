/**
 * answerkit Backend — Public API
 */

export { createApp } from './app';
export type { AppContext, AppDependencies } from './app';
export { loadConfig } from './config';
export type { Config } from './config';
export { BuildTracker, mediaBuildRunner } from './builds';
export type { BuildRecord, BuildRunner, BuildOutcome, BuildStatus } from './builds';
export { BUILD_IN_PROGRESS } from './routes/builds';
