/**
 * answerkit CLI — Account Command
 *
 * Adds a local administrator, or replaces the password of an existing
 * account with the same username. The password is stored in setup's
 * base64 form, never as plain text.
 *
 * Usage:
 *   answerkit account Tech --password <plain>
 *   answerkit account Tech --encoded <base64>
 */

import { Command } from "commander";
import { encodeAccountPassword, setLocalAccount } from "@answerkit/engine";
import { loadConfig } from "../config";
import { openForEditing, resolveAnswerFilePath } from "../answer-file";
import { colors, createCliLogger, printError, printFailure, printSuccess } from "../output";

interface AccountCommandOptions {
  password?: string;
  encoded?: string;
  file?: string;
}

export function registerAccountCommand(program: Command): void {
  program
    .command("account <username>")
    .description("Create or update a local administrator account")
    .option("-p, --password <plain>", "Password, encoded before it is written")
    .option("--encoded <base64>", "Password already in answer-file form")
    .option("-f, --file <path>", "Answer file to edit (default: the prepared file)")
    .action((username: string, opts: AccountCommandOptions) => {
      if ((opts.password === undefined) === (opts.encoded === undefined)) {
        printError("Give exactly one of --password or --encoded.");
        process.exitCode = 1;
        return;
      }
      const encoded = opts.encoded ?? encodeAccountPassword(opts.password ?? "");

      const target = resolveAnswerFilePath(opts.file);
      const file = openForEditing(target, createCliLogger(loadConfig().logLevel));
      if (!file) return;

      const result = setLocalAccount(file, username, encoded);
      if (!result.ok) {
        printFailure(result.error);
        return;
      }
      const verb = result.value === "created" ? "Created" : "Updated";
      printSuccess(`${verb} local account ${colors.bold(username)} in ${colors.path(result.path)}`);
    });
}
