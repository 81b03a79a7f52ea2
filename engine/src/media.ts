/**
 * answerkit Engine — Media Preparation
 *
 * What the build orchestrator runs once per installer image: resolve the
 * fixed locations on the media, open the source answer file (or start a
 * new one), make sure device naming has a place to land, and inject the
 * bootstrap. The output goes to the runtime volume's Temp folder.
 *
 * Media layout:
 *   <media>/<folder>/Installer/unattended.xml                  source
 *   <media>/<folder>/Installer/Functions/CopySpecialize.ps1    embedded
 *   <runtime>/Temp/unattended.xml                              output
 */

import * as path from "path";
import type {
  AnswerFile,
  MediaLayout,
  MediaPaths,
  MutationResult,
  PrepareOptions,
  PreparedAnswerFile,
} from "./types";
import { createLogger } from "./utils/logger";
import { SHELL_SETUP, findOrCreateComponent } from "./answer-file/accessor";
import { injectBootstrap, secondStageScriptPath } from "./answer-file/bootstrap";
import { openAnswerFile } from "./answer-file/document";
import { AnswerFileError } from "./answer-file/errors";
import { commit } from "./answer-file/mutation";

export const ANSWER_FILE_NAME = "unattended.xml";
export const COPY_SCRIPT_NAME = "CopySpecialize.ps1";

export function resolveMediaPaths(layout: MediaLayout): MediaPaths {
  const installerDir = path.join(layout.mediaRoot, layout.folderName, "Installer");
  return {
    sourceAnswerFile: path.join(installerDir, ANSWER_FILE_NAME),
    copyScript: path.join(installerDir, "Functions", COPY_SCRIPT_NAME),
    outputAnswerFile: path.join(layout.runtimeRoot, "Temp", ANSWER_FILE_NAME),
    secondStageScript: secondStageScriptPath(layout.folderName),
  };
}

export function prepareAnswerFile(
  options: PrepareOptions,
): MutationResult<PreparedAnswerFile> {
  const logger = options.logger ?? createLogger();
  const paths = resolveMediaPaths(options);
  logger.info({ ...paths }, "Preparing answer file");

  let file: AnswerFile;
  try {
    file = openAnswerFile({
      sourcePath: paths.sourceAnswerFile,
      outputPath: paths.outputAnswerFile,
      logger,
    });
  } catch (err: unknown) {
    if (!(err instanceof AnswerFileError)) throw err;
    logger.error({ category: err.category, error: err.message }, "Could not open answer file");
    return { ok: false, error: err.toFailure() };
  }

  const injected = injectBootstrap(file, {
    extensionFolderName: options.folderName,
    copyScriptPath: paths.copyScript,
    installedAnswerFilePath: options.installedAnswerFilePath,
    secondStageScriptPath: paths.secondStageScript,
  });
  if (!injected.ok) return injected;

  // setDeviceName expects this component and never creates it
  const opened = file;
  return commit(opened, "prepareAnswerFile", () => {
    findOrCreateComponent(opened.document, "specialize", SHELL_SETUP);
    return { file: opened, paths, orders: injected.value };
  });
}
