/**
 * answerkit CLI — Configuration
 *
 * Central location for CLI paths and defaults. Values come from an
 * optional ~/.answerkit/config.yaml, overridden by environment variables,
 * overridden in turn by command-line flags.
 *
 *   ANSWERKIT_HOME           data directory (default ~/.answerkit)
 *   ANSWERKIT_MEDIA_ROOT     installation media root
 *   ANSWERKIT_FOLDER         deployment folder name (default EDS)
 *   ANSWERKIT_RUNTIME_ROOT   runtime volume root (default X:\)
 *   ANSWERKIT_LOG_LEVEL      engine log level (default silent)
 */

import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ANSWER_FILE_NAME, FolderNameSchema } from "@answerkit/engine";
import type { LogLevel } from "@answerkit/engine";

export const DEFAULT_FOLDER = "EDS";
export const DEFAULT_RUNTIME_ROOT = "X:\\";

/** Root data directory */
export function answerkitHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.ANSWERKIT_HOME || path.join(os.homedir(), ".answerkit");
}

/** Default config file location */
export function configFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(answerkitHome(env), "config.yaml");
}

const LogLevelSchema = z.enum(["silent", "debug", "info", "warn", "error"]);

const ConfigFileSchema = z
  .object({
    mediaRoot: z.string().min(1).optional(),
    folderName: FolderNameSchema.optional(),
    runtimeRoot: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export interface CliConfig {
  mediaRoot?: string;
  folderName: string;
  runtimeRoot: string;
  logLevel: LogLevel;
}

function readConfigFile(file: string): z.infer<typeof ConfigFileSchema> {
  if (!fs.existsSync(file)) return {};

  const raw: unknown = parseYaml(fs.readFileSync(file, "utf-8"));
  if (raw === null || raw === undefined) return {};

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${file}: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  file: string = configFilePath(env),
): CliConfig {
  const fromFile = readConfigFile(file);

  const logLevel = LogLevelSchema.safeParse(env.ANSWERKIT_LOG_LEVEL);
  return {
    mediaRoot: env.ANSWERKIT_MEDIA_ROOT || fromFile.mediaRoot,
    folderName: env.ANSWERKIT_FOLDER || fromFile.folderName || DEFAULT_FOLDER,
    runtimeRoot: env.ANSWERKIT_RUNTIME_ROOT || fromFile.runtimeRoot || DEFAULT_RUNTIME_ROOT,
    logLevel: logLevel.success ? logLevel.data : fromFile.logLevel ?? "silent",
  };
}

/** The prepared answer file on the runtime volume */
export function defaultAnswerFilePath(config: CliConfig): string {
  return path.join(config.runtimeRoot, "Temp", ANSWER_FILE_NAME);
}
