/**
 * answerkit CLI — Show Command
 *
 * Prints what answerkit manages in an answer file: device name, bootstrap
 * commands, local accounts and user input. Passwords are never shown.
 *
 * Usage:
 *   answerkit show                 Show the prepared file
 *   answerkit show --file a.xml    Show a specific file
 *   answerkit show --json          Machine-readable output
 */

import * as fs from "fs";
import { Command } from "commander";
import {
  getCopyScript,
  getDeviceName,
  getUserInput,
  listInjectedCommands,
  listLocalAccounts,
} from "@answerkit/engine";
import type { AnswerFile, OrderedCommand } from "@answerkit/engine";
import { loadConfig } from "../config";
import { openForEditing, resolveAnswerFilePath } from "../answer-file";
import {
  colors,
  createCliLogger,
  getTerminalWidth,
  printDetail,
  printError,
  printHeader,
  printInfo,
  printTable,
  truncateText,
} from "../output";

/** Everything `show` reports, also the --json shape */
export function summarizeAnswerFile(file: AnswerFile) {
  const script = getCopyScript(file);
  return {
    path: file.outputPath,
    deviceName: getDeviceName(file) ?? null,
    commands: listInjectedCommands(file),
    accounts: listLocalAccounts(file),
    userInput: getUserInput(file),
    copyScriptLines: script === undefined ? 0 : script.split(/\r?\n/).length,
  };
}

function commandRows(pass: string, commands: OrderedCommand[], width: number): string[][] {
  return commands.map((c) => [
    pass,
    c.order === null ? colors.warn("?") : String(c.order),
    truncateText(c.command, width),
    c.description ?? "",
  ]);
}

export function registerShowCommand(program: Command): void {
  program
    .command("show")
    .description("Show the device name, commands, accounts and user input")
    .option("-f, --file <path>", "Answer file to read (default: the prepared file)")
    .option("--json", "Print JSON instead of tables", false)
    .action((opts: { file?: string; json: boolean }) => {
      const target = resolveAnswerFilePath(opts.file);
      if (!fs.existsSync(target)) {
        printError(`Answer file not found: ${target}`);
        process.exitCode = 1;
        return;
      }
      const file = openForEditing(target, createCliLogger(loadConfig().logLevel));
      if (!file) return;

      const summary = summarizeAnswerFile(file);
      if (opts.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      printHeader(colors.path(summary.path));
      printDetail("Device name", summary.deviceName ?? colors.dim("(not set)"));
      printDetail("Copy script", `${summary.copyScriptLines} line(s)`);

      const commandWidth = Math.max(20, getTerminalWidth() - 50);
      const rows = [
        ...commandRows("specialize", summary.commands.specialize, commandWidth),
        ...commandRows("oobeSystem", summary.commands.firstLogon, commandWidth),
      ];
      console.log();
      if (rows.length === 0) {
        printInfo("No ordered commands.");
      } else {
        printTable({ head: ["Pass", "Order", "Command", "Description"], rows });
      }

      if (summary.accounts.length === 0) {
        printInfo("No local accounts.");
      } else {
        printTable({
          head: ["Account", "Display name", "Group", "Password"],
          rows: summary.accounts.map((a) => [
            colors.bold(a.name),
            a.displayName ?? "",
            a.group ?? "",
            a.plainText ? colors.warn("plain text") : "encoded",
          ]),
        });
      }

      const input = Object.entries(summary.userInput);
      if (input.length === 0) {
        printInfo("No user input.");
      } else {
        printTable({
          head: ["Key", "Value"],
          rows: input.map(([key, value]) => [colors.key(key), value]),
        });
      }
    });
}
