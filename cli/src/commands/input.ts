/**
 * answerkit CLI — Input Command
 *
 * Stores free-form values under the answer file's extension data, where the
 * copy script and second stage can read them. Denylisted keys (such as
 * localPassword) are dropped before anything is written.
 *
 * Usage:
 *   answerkit input site=Lab3 owner=IT        Store key=value pairs
 *   answerkit input --from values.yaml        Store a YAML map
 */

import * as fs from "fs";
import { Command } from "commander";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { USER_INPUT_DENYLIST, setUserInput } from "@answerkit/engine";
import type { UserInputFields } from "@answerkit/engine";
import { loadConfig } from "../config";
import { openForEditing, resolveAnswerFilePath } from "../answer-file";
import {
  colors,
  createCliLogger,
  printError,
  printFailure,
  printSuccess,
  printWarn,
} from "../output";

/** Parse `key=value` arguments; the value may itself contain "=" */
export function parsePairs(pairs: string[]): UserInputFields {
  const fields: UserInputFields = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Expected key=value, got "${pair}"`);
    }
    fields[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return fields;
}

const InputFileSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

/** Read a flat YAML map; scalar values are stored as text */
export function loadInputFile(file: string): UserInputFields {
  const raw: unknown = parseYaml(fs.readFileSync(file, "utf-8"));
  const parsed = InputFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new Error(`${file} must be a map of scalar values`);
  }
  return Object.fromEntries(
    Object.entries(parsed.data).map(([key, value]) => [key, String(value)]),
  );
}

export function registerInputCommand(program: Command): void {
  program
    .command("input [pairs...]")
    .description("Store user input values in the answer file")
    .option("--from <file>", "YAML file with values to store")
    .option("-f, --file <path>", "Answer file to edit (default: the prepared file)")
    .action((pairs: string[], opts: { from?: string; file?: string }) => {
      const fields: UserInputFields = {
        ...(opts.from ? loadInputFile(opts.from) : {}),
        ...parsePairs(pairs),
      };
      if (Object.keys(fields).length === 0) {
        printError("Nothing to store. Pass key=value pairs or --from <file>.");
        process.exitCode = 1;
        return;
      }

      const skipped = Object.keys(fields).filter((key) => USER_INPUT_DENYLIST.includes(key));

      const target = resolveAnswerFilePath(opts.file);
      const file = openForEditing(target, createCliLogger(loadConfig().logLevel));
      if (!file) return;

      const result = setUserInput(file, fields);
      if (!result.ok) {
        printFailure(result.error);
        return;
      }
      for (const key of skipped) {
        printWarn(`Skipped ${colors.key(key)}: it is never written to the answer file`);
      }
      printSuccess(`Stored ${result.value.length} value(s) in ${colors.path(result.path)}`);
    });
}
