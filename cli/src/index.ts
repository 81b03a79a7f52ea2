#!/usr/bin/env node

/**
 * answerkit CLI — Entry Point
 *
 * Media preparation:
 *   answerkit prepare --media <dir>      Inject the bootstrap into the answer file
 *
 * Editing the prepared file:
 *   answerkit device-name <name>         Set the computer name
 *   answerkit account <username>         Add or update a local administrator
 *   answerkit input key=value ...        Store user input values
 *   answerkit show                       Print what the file contains
 */

import { createProgram } from "./program";
import { printError } from "./output";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    printError(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
