/**
 * answerkit CLI — Device Name Command
 *
 * Usage:
 *   answerkit device-name LAB-01                 Set the computer name
 *   answerkit device-name LAB-01 --file a.xml    Edit a specific answer file
 */

import { Command } from "commander";
import { setDeviceName } from "@answerkit/engine";
import { loadConfig } from "../config";
import { openForEditing, resolveAnswerFilePath } from "../answer-file";
import { colors, createCliLogger, printFailure, printSuccess } from "../output";

export function registerDeviceNameCommand(program: Command): void {
  program
    .command("device-name <name>")
    .description("Set the computer name applied during specialize")
    .option("-f, --file <path>", "Answer file to edit (default: the prepared file)")
    .action((name: string, opts: { file?: string }) => {
      const target = resolveAnswerFilePath(opts.file);
      const file = openForEditing(target, createCliLogger(loadConfig().logLevel));
      if (!file) return;

      const result = setDeviceName(file, name);
      if (!result.ok) {
        printFailure(result.error);
        return;
      }
      printSuccess(`Device name set to ${colors.bold(name)} in ${colors.path(result.path)}`);
    });
}
