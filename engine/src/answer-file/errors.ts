/**
 * answerkit Engine — Answer-File Errors
 *
 * Internal operations throw AnswerFileError; public mutations convert it
 * into a MutationResult failure. Any other thrown value is a bug and
 * propagates untouched.
 */

import type { AnswerFileErrorCategory, AnswerFileFailure } from "../types";

export class AnswerFileError extends Error {
  readonly category: AnswerFileErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    category: AnswerFileErrorCategory,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AnswerFileError";
    this.category = category;
    this.details = details;
  }

  toFailure(): AnswerFileFailure {
    return {
      category: this.category,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
