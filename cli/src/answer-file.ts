/**
 * answerkit CLI — Answer File Access
 *
 * Commands edit one answer file in place: it is both the source and the
 * output of every mutation.
 */

import * as path from "path";
import { AnswerFileError, openAnswerFile } from "@answerkit/engine";
import type { AnswerFile, Logger } from "@answerkit/engine";
import { loadConfig, defaultAnswerFilePath } from "./config";
import { printDebug, printFailure } from "./output";

/** --file when given, otherwise the prepared file on the runtime volume */
export function resolveAnswerFilePath(file: string | undefined): string {
  return file ? path.resolve(file) : defaultAnswerFilePath(loadConfig());
}

/** Open `file` for editing; prints the failure and returns null on error */
export function openForEditing(file: string, logger: Logger): AnswerFile | null {
  printDebug(`Opening ${file}`);
  try {
    return openAnswerFile({ sourcePath: file, outputPath: file, logger });
  } catch (err: unknown) {
    if (!(err instanceof AnswerFileError)) throw err;
    printFailure(err.toFailure());
    return null;
  }
}
