/**
 * answerkit CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 */

import chalk from "chalk";
import ora from "ora";
import type { Ora } from "ora";
import Table from "cli-table3";
import { createLogger } from "@answerkit/engine";
import type { AnswerFileFailure, Logger, LogLevel } from "@answerkit/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

/**
 * Engine logger for a command run: debug with --debug, otherwise the
 * configured level (silent by default). Lines go to stderr.
 */
export function createCliLogger(level: LogLevel = "silent"): Logger {
  return createLogger({ level: _debugMode ? "debug" : level, name: "answerkit" });
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  warn: chalk.yellow,
  dim: chalk.gray,
  bold: chalk.bold,
  path: chalk.bold.white,
  key: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

export function printDryRun(msg: string): void {
  console.log(colors.warn("[DRY RUN] ") + msg);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

/**
 * Print an indented detail line (for sub-items under a heading).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Failures ───────────────────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  STRUCTURAL_NOT_FOUND: "Required answer-file section is missing",
  SOURCE_UNREADABLE: "Input file could not be read",
  SERIALIZATION_FAILURE: "Answer file could not be written",
  PARSE_ERROR: "Answer file is not well-formed XML",
  VALIDATION_ERROR: "Invalid value",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

/** Print a failed mutation and flag the process as failed */
export function printFailure(failure: AnswerFileFailure): void {
  printError(formatErrorCategory(failure.category));
  printError(`  ${failure.message}`);
  process.exitCode = 1;
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/** Default terminal width when process.stdout.columns is unavailable */
const DEFAULT_TERMINAL_WIDTH = 80;

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

export function getTerminalWidth(): number {
  return process.stdout.columns || DEFAULT_TERMINAL_WIDTH;
}

/**
 * Truncate a plain-text string to `max` visible characters, appending "..."
 * if it was shortened. Never returns a string longer than `max`.
 */
export function truncateText(s: string, max: number): string {
  if (max < 4) return s.slice(0, max);
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + "...";
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function printTable({ head, rows }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}
