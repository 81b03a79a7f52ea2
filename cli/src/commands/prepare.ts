/**
 * answerkit CLI — Prepare Command
 *
 * Runs media preparation: reads the answer file from the installation
 * media, embeds the copy script, injects the bootstrap commands and
 * writes the result to the runtime volume.
 *
 * Usage:
 *   answerkit prepare --media D:\            Prepare from media mounted at D:\
 *   answerkit prepare --folder Lab           Use a different deployment folder
 *   answerkit prepare --dry-run              Show the paths that would be used
 */

import { Command } from "commander";
import { prepareAnswerFile, resolveMediaPaths } from "@answerkit/engine";
import type { MediaLayout } from "@answerkit/engine";
import { loadConfig } from "../config";
import {
  colors,
  createCliLogger,
  createSpinner,
  printDetail,
  printDryRun,
  printError,
  printFailure,
  printSuccess,
  printWarn,
} from "../output";

interface PrepareCommandOptions {
  media?: string;
  folder?: string;
  runtime?: string;
  dryRun: boolean;
}

export function registerPrepareCommand(program: Command): void {
  program
    .command("prepare")
    .description("Prepare the installer answer file from the installation media")
    .option("--media <dir>", "Installation media root (default: ANSWERKIT_MEDIA_ROOT)")
    .option("--folder <name>", "Deployment folder name on the media")
    .option("--runtime <dir>", "Runtime volume root that receives Temp\\unattended.xml")
    .option("--dry-run", "Show the paths without writing anything", false)
    .action((opts: PrepareCommandOptions) => {
      const config = loadConfig();
      const mediaRoot = opts.media ?? config.mediaRoot;
      if (!mediaRoot) {
        printError("No installation media given.");
        printError(`  Pass ${colors.bold("--media <dir>")} or set ANSWERKIT_MEDIA_ROOT.`);
        process.exitCode = 1;
        return;
      }

      const layout: MediaLayout = {
        mediaRoot,
        folderName: opts.folder ?? config.folderName,
        runtimeRoot: opts.runtime ?? config.runtimeRoot,
      };
      const paths = resolveMediaPaths(layout);

      if (opts.dryRun) {
        printDryRun(`Would prepare ${colors.path(paths.outputAnswerFile)}`);
        printDetail("Source", paths.sourceAnswerFile);
        printDetail("Copy script", paths.copyScript);
        printDetail("Second stage", paths.secondStageScript);
        return;
      }

      const spinner = createSpinner("Preparing answer file...");
      spinner.start();
      const result = prepareAnswerFile({ ...layout, logger: createCliLogger(config.logLevel) });
      spinner.stop();

      if (!result.ok) {
        printFailure(result.error);
        return;
      }

      const { orders, file } = result.value;
      printSuccess(`Prepared ${colors.path(result.path)}`);
      printDetail("Source", file.sourcePath ?? colors.dim("(none, started from an empty file)"));
      printDetail("Specialize order", String(orders.specialize));
      printDetail("First logon order", String(orders.firstLogon));
      if (orders.specialize > 1 || orders.firstLogon > 1) {
        printWarn("The answer file already had commands; check for a second bootstrap.");
      }
    });
}
