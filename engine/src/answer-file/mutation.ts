/**
 * answerkit Engine — Mutation Boundary
 *
 * Every public mutation runs through commit(): apply the change, persist,
 * and turn an AnswerFileError into a failed MutationResult.
 *
 * Mutations edit file.document in place. Validation and structural checks
 * throw before anything changes; a SERIALIZATION_FAILURE leaves the change
 * in memory and the next successful commit writes it.
 */

import type { AnswerFile, MutationResult } from "../types";
import { AnswerFileError } from "./errors";
import { saveAnswerDocument } from "./writer";

export function commit<T>(
  file: AnswerFile,
  operation: string,
  mutate: () => T,
): MutationResult<T> {
  try {
    const value = mutate();
    saveAnswerDocument(file.document, file.outputPath, { newline: file.newline });
    file.logger.debug({ operation, path: file.outputPath }, "Answer file saved");
    return { ok: true, path: file.outputPath, value };
  } catch (err: unknown) {
    if (!(err instanceof AnswerFileError)) throw err;
    file.logger.error(
      { operation, category: err.category, error: err.message },
      `${operation} failed`,
    );
    return { ok: false, error: err.toFailure() };
  }
}

