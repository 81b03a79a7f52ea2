/**
 * answerkit Backend — Configuration
 *
 * Central configuration loaded from environment variables with sensible defaults.
 */

import type { LogLevel } from '@answerkit/engine';

export interface Config {
  /** Server port */
  port: number;
  /** Node environment */
  env: string;
  /** CORS allowed origins (comma-separated) */
  corsOrigins: string[];
  /** Log level */
  logLevel: LogLevel;
  /** Installation media root used when a request names none */
  mediaRoot?: string;
  /** Deployment folder name on the media */
  folderName: string;
  /** Runtime volume root that receives Temp\unattended.xml */
  runtimeRoot: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: parseInt(env.ANSWERKIT_PORT || '3200', 10),
    env: env.NODE_ENV || 'development',
    corsOrigins: (env.ANSWERKIT_CORS_ORIGINS || '*').split(',').map((s) => s.trim()),
    logLevel: parseLogLevel(env.ANSWERKIT_LOG_LEVEL),
    mediaRoot: env.ANSWERKIT_MEDIA_ROOT || undefined,
    folderName: env.ANSWERKIT_FOLDER || 'EDS',
    runtimeRoot: env.ANSWERKIT_RUNTIME_ROOT || 'X:\\',
  };
}
