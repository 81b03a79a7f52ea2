/**
 * answerkit CLI — Program
 *
 * Builds the commander program. Kept apart from the entry point so tests
 * can parse argument lists without spawning a process.
 */

import { Command } from "commander";
import { registerPrepareCommand } from "./commands/prepare";
import { registerDeviceNameCommand } from "./commands/device-name";
import { registerAccountCommand } from "./commands/account";
import { registerInputCommand } from "./commands/input";
import { registerShowCommand } from "./commands/show";
import { setDebugMode } from "./output";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("answerkit")
    .description("Prepare Windows setup answer files for unattended deployment")
    .version(VERSION)
    .option("--debug", "Log engine activity to stderr", false)
    .hook("preAction", (thisCommand) => {
      setDebugMode(thisCommand.opts().debug === true);
    });

  // ─── Media preparation ──────────────────────────────────────
  registerPrepareCommand(program);

  // ─── Editing the prepared file ──────────────────────────────
  registerDeviceNameCommand(program);
  registerAccountCommand(program);
  registerInputCommand(program);
  registerShowCommand(program);

  return program;
}
