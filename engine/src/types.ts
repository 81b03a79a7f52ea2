/**
 * answerkit Engine — Core Type Definitions
 *
 * Shared by every answer-file module, the CLI and the trigger service.
 * The answer-file vocabulary is fixed: two passes, two components, and
 * one extension subtree.
 */

import type { Logger } from "./utils/logger";

// ─── Answer-File Vocabulary ──────────────────────────────────────

export type PassName = "specialize" | "oobeSystem";

export type ComponentName =
  | "Microsoft-Windows-Shell-Setup"
  | "Microsoft-Windows-Deployment";

/** Which child element carries the command of an ordered list item */
export type CommandField = "Path" | "CommandLine";

export interface OrderedCommandInput {
  /** Item element name, e.g. RunSynchronousCommand */
  itemName: string;
  field: CommandField;
  command: string;
  description?: string;
}

export interface OrderedCommand {
  /** null when the Order text is missing or not an integer */
  order: number | null;
  command: string;
  description?: string;
}

export interface LocalAccountInfo {
  name: string;
  displayName?: string;
  group?: string;
  /** Value of Password/PlainText; the password itself is never returned */
  plainText: boolean;
}

export type UserInputFields = Record<string, string>;

// ─── Handle ──────────────────────────────────────────────────────

/**
 * An open answer file. Returned by openAnswerFile() and passed to every
 * mutation; each mutation persists to outputPath.
 */
export interface AnswerFile {
  readonly document: Document;
  readonly outputPath: string;
  /** Where the document was loaded from, if it existed */
  readonly sourcePath?: string;
  readonly logger: Logger;
  /** Line separator used by the writer */
  readonly newline: string;
}

export interface OpenAnswerFileOptions {
  sourcePath?: string;
  outputPath: string;
  logger?: Logger;
  newline?: string;
}

// ─── Errors & Results ────────────────────────────────────────────

export type AnswerFileErrorCategory =
  | "STRUCTURAL_NOT_FOUND"
  | "SOURCE_UNREADABLE"
  | "SERIALIZATION_FAILURE"
  | "PARSE_ERROR"
  | "VALIDATION_ERROR";

export interface AnswerFileFailure {
  category: AnswerFileErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

export type MutationResult<T = void> =
  | { ok: true; path: string; value: T }
  | { ok: false; error: AnswerFileFailure };

// ─── Bootstrap ───────────────────────────────────────────────────

export interface BootstrapOptions {
  /** Deployment folder name passed to the embedded script, e.g. "EDS" */
  extensionFolderName: string;
  /** Script file whose text is embedded as CopyScript */
  copyScriptPath: string;
  /** Where setup caches the answer file on the installed system */
  installedAnswerFilePath?: string;
  /** Second-stage script run at first logon */
  secondStageScriptPath?: string;
}

export interface BootstrapOrders {
  /** Order of the RunSynchronousCommand in specialize */
  specialize: number;
  /** Order of the SynchronousCommand in oobeSystem FirstLogonCommands */
  firstLogon: number;
}

// ─── Media Preparation ───────────────────────────────────────────

export interface MediaLayout {
  /** Root of the installation media (mounted ISO or USB) */
  mediaRoot: string;
  /** Deployment folder name on the media, e.g. "EDS" */
  folderName: string;
  /** Root of the running system's temporary volume, e.g. "X:\\" */
  runtimeRoot: string;
}

export interface MediaPaths {
  sourceAnswerFile: string;
  copyScript: string;
  outputAnswerFile: string;
  secondStageScript: string;
}

export interface PrepareOptions extends MediaLayout {
  logger?: Logger;
  installedAnswerFilePath?: string;
}

export interface PreparedAnswerFile {
  /** Open handle on the output file, for follow-up mutations */
  file: AnswerFile;
  paths: MediaPaths;
  orders: BootstrapOrders;
}

export interface InjectedCommands {
  specialize: OrderedCommand[];
  firstLogon: OrderedCommand[];
}
