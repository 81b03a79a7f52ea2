/**
 * answerkit Engine — Bootstrap Injector
 *
 * The installed system cannot reach the build host, so the copy script
 * travels inside the answer file. Two commands are injected:
 *
 *   specialize  RunSynchronousCommand  re-reads the cached answer file,
 *                                      pulls eds:CopyScript and runs it
 *                                      with the deployment folder name
 *   oobeSystem  SynchronousCommand     runs the second-stage script from
 *                                      C:\Windows\Setup\<folder>\
 *
 * Commands are always appended. Injecting twice yields two sets of
 * commands; a warning is logged when an identical command is already there.
 */

import * as fs from "fs";
import type {
  AnswerFile,
  BootstrapOptions,
  BootstrapOrders,
  InjectedCommands,
  MutationResult,
  OrderedCommandInput,
} from "../types";
import {
  DEPLOYMENT,
  SHELL_SETUP,
  findChild,
  findComponent,
  findOrCreateChild,
  findOrCreateComponent,
} from "./accessor";
import { AnswerFileError, errorMessage } from "./errors";
import { writeCopyScript } from "./extension-store";
import { commit } from "./mutation";
import { EXTENSION_ELEMENT, namespaceUri } from "./namespaces";
import { appendOrderedCommand, listOrderedCommands } from "./ordered-commands";
import { FolderNameSchema, WindowsPathSchema, validate } from "./validation";

/** Where setup caches the answer file on the installed system */
export const DEFAULT_INSTALLED_ANSWER_FILE = "C:\\Windows\\Panther\\unattend.xml";

const POWERSHELL = "powershell.exe -NoProfile -ExecutionPolicy Bypass";

export function secondStageScriptPath(folderName: string): string {
  return `C:\\Windows\\Setup\\${folderName}\\Specialize.ps1`;
}

/**
 * Command line that loads `answerFilePath`, selects eds:CopyScript through
 * a namespace manager, and invokes it as a script block with `folderName`.
 */
export function buildCopyScriptCommand(folderName: string, answerFilePath: string): string {
  const script = [
    `$x = [xml](Get-Content -LiteralPath '${answerFilePath}' -Raw)`,
    `$n = New-Object System.Xml.XmlNamespaceManager($x.NameTable)`,
    `$n.AddNamespace('eds', '${namespaceUri("eds")}')`,
    `$s = $x.SelectSingleNode('//eds:${EXTENSION_ELEMENT}/eds:CopyScript', $n).InnerText`,
    `& ([scriptblock]::Create($s)) '${folderName}'`,
  ].join("; ");
  return `${POWERSHELL} -Command "${script}"`;
}

export function buildSecondStageCommand(scriptPath: string): string {
  return `${POWERSHELL} -File "${scriptPath}"`;
}

/** Read the script to embed; unreadable or empty is fatal */
export function readCopyScript(scriptPath: string): string {
  let script: string;
  try {
    script = fs.readFileSync(scriptPath, "utf-8").replace(/^\uFEFF/, "");
  } catch (err: unknown) {
    throw new AnswerFileError(
      "SOURCE_UNREADABLE",
      `Could not read copy script ${scriptPath}: ${errorMessage(err)}`,
      { path: scriptPath },
    );
  }
  if (script.trim() === "") {
    throw new AnswerFileError("SOURCE_UNREADABLE", `Copy script ${scriptPath} is empty`, {
      path: scriptPath,
    });
  }
  return script;
}

function appendWithWarning(
  file: AnswerFile,
  listNode: Element,
  command: OrderedCommandInput,
): number {
  const duplicate = listOrderedCommands(listNode, command.itemName, command.field).some(
    (existing) => existing.command === command.command,
  );
  if (duplicate) {
    file.logger.warn(
      { item: command.itemName },
      "Bootstrap command already present; appending another copy",
    );
  }
  return appendOrderedCommand(listNode, command);
}

export function injectBootstrap(
  file: AnswerFile,
  options: BootstrapOptions,
): MutationResult<BootstrapOrders> {
  return commit(file, "injectBootstrap", () => {
    const folder = validate(FolderNameSchema, options.extensionFolderName, "deployment folder name");
    const answerFilePath = validate(
      WindowsPathSchema,
      options.installedAnswerFilePath ?? DEFAULT_INSTALLED_ANSWER_FILE,
      "installed answer file path",
    );
    const secondStage = validate(
      WindowsPathSchema,
      options.secondStageScriptPath ?? secondStageScriptPath(folder),
      "second-stage script path",
    );

    // Read before touching the document: no payload, no bootstrap
    const script = readCopyScript(options.copyScriptPath);

    const doc = file.document;
    writeCopyScript(doc, script);

    const deployment = findOrCreateComponent(doc, "specialize", DEPLOYMENT);
    const specialize = appendWithWarning(
      file,
      findOrCreateChild(deployment, "unattend", "RunSynchronous"),
      {
        itemName: "RunSynchronousCommand",
        field: "Path",
        command: buildCopyScriptCommand(folder, answerFilePath),
        description: `Run the ${folder} copy script embedded in the answer file`,
      },
    );

    const shellSetup = findOrCreateComponent(doc, "oobeSystem", SHELL_SETUP);
    const firstLogon = appendWithWarning(
      file,
      findOrCreateChild(shellSetup, "unattend", "FirstLogonCommands"),
      {
        itemName: "SynchronousCommand",
        field: "CommandLine",
        command: buildSecondStageCommand(secondStage),
        description: `Run the ${folder} second-stage script`,
      },
    );

    file.logger.info(
      { folder, specialize, firstLogon, scriptBytes: Buffer.byteLength(script) },
      "Injected bootstrap commands",
    );
    return { specialize, firstLogon };
  });
}

/** Commands currently in RunSynchronous (specialize) and FirstLogonCommands */
export function listInjectedCommands(file: AnswerFile): InjectedCommands {
  const deployment = findComponent(file.document, "specialize", DEPLOYMENT);
  const runSync = deployment ? findChild(deployment, "unattend", "RunSynchronous") : null;
  const shellSetup = findComponent(file.document, "oobeSystem", SHELL_SETUP);
  const firstLogon = shellSetup ? findChild(shellSetup, "unattend", "FirstLogonCommands") : null;

  return {
    specialize: runSync ? listOrderedCommands(runSync, "RunSynchronousCommand", "Path") : [],
    firstLogon: firstLogon
      ? listOrderedCommands(firstLogon, "SynchronousCommand", "CommandLine")
      : [],
  };
}
