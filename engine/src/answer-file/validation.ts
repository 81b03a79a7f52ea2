/**
 * answerkit Engine — Input Validation (Zod)
 *
 * Values that end up as element names or inside injected command lines are
 * checked before any mutation.
 */

import { z } from "zod";
import { AnswerFileError } from "./errors";

/** XML element name, without a prefix; "xml…" names are reserved */
export const FieldNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, "must be a valid XML element name")
  .refine((name) => !/^xml/i.test(name), "names starting with 'xml' are reserved")
  .refine((name) => name !== "__proto__", "__proto__ is not a usable key");

export const UserInputSchema = z.record(FieldNameSchema, z.string());

/** ComputerName text; setup itself checks the name, "*" asks it to generate one */
export const DeviceNameSchema = z
  .string()
  .min(1, "must not be empty")
  .regex(/^[^\u0000-\u001F\u007F]+$/, "must not contain control characters");

export const UsernameSchema = z
  .string()
  .min(1, "must not be empty")
  .max(20, "must be at most 20 characters")
  .regex(/^[^"/\\[\]:;|=,+*?<>@]+$/, 'must not contain any of "/\\[]:;|=,+*?<>@')
  .refine((name) => name.trim() === name, "must not start or end with whitespace");

export const EncodedPasswordSchema = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, "must be base64");

/** Folder names are embedded in PowerShell command lines */
export const FolderNameSchema = z
  .string()
  .min(1, "must not be empty")
  .regex(/^[A-Za-z0-9._-]+$/, "may only contain letters, digits, '.', '_' and '-'");

/** Windows path that can sit inside a quoted PowerShell string */
export const WindowsPathSchema = z
  .string()
  .min(1, "must not be empty")
  .regex(/^[^'"\r\n]+$/, "must not contain quotes or line breaks");

/** Parse `value` or throw VALIDATION_ERROR naming `label` */
export function validate<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");
  throw new AnswerFileError("VALIDATION_ERROR", `Invalid ${label}: ${summary}`, { issues });
}
