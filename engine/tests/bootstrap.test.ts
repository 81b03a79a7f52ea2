/**
 * answerkit Engine — Bootstrap Injector Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { openAnswerFile } from "../src/answer-file/document";
import { findPass } from "../src/answer-file/accessor";
import {
  DEFAULT_INSTALLED_ANSWER_FILE,
  buildCopyScriptCommand,
  buildSecondStageCommand,
  injectBootstrap,
  listInjectedCommands,
  readCopyScript,
  secondStageScriptPath,
} from "../src/answer-file/bootstrap";
import { getCopyScript } from "../src/answer-file/extension-store";
import { AnswerFileError } from "../src/answer-file/errors";
import { createLogger } from "../src/utils/logger";
import type { AnswerFile } from "../src/types";

const TEST_DIR = path.join(os.tmpdir(), "answerkit-bootstrap-test");
const OUTPUT = path.join(TEST_DIR, "unattended.xml");
const SCRIPT = path.join(TEST_DIR, "CopySpecialize.ps1");
const SCRIPT_TEXT = "param($Folder)\r\nCopy-Item \"D:\\$Folder\" 'C:\\Windows\\Setup' -Recurse\r\n";

const COPY_COMMAND =
  "powershell.exe -NoProfile -ExecutionPolicy Bypass -Command \"" +
  "$x = [xml](Get-Content -LiteralPath 'C:\\Windows\\Panther\\unattend.xml' -Raw); " +
  "$n = New-Object System.Xml.XmlNamespaceManager($x.NameTable); " +
  "$n.AddNamespace('eds', 'urn:answerkit:eds'); " +
  "$s = $x.SelectSingleNode('//eds:EDS/eds:CopyScript', $n).InnerText; " +
  "& ([scriptblock]::Create($s)) 'EDS'\"";

const SECOND_STAGE_COMMAND =
  'powershell.exe -NoProfile -ExecutionPolicy Bypass -File "C:\\Windows\\Setup\\EDS\\Specialize.ps1"';

function open(sourcePath?: string): AnswerFile {
  return openAnswerFile({
    sourcePath,
    outputPath: OUTPUT,
    logger: createLogger({ level: "silent" }),
    newline: "\n",
  });
}

beforeEach(() => {
  fs.mkdirSync(TEST_DIR, { recursive: true });
  fs.writeFileSync(SCRIPT, SCRIPT_TEXT);
});

afterEach(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("command builders", () => {
  it("builds the copy-script command for the cached answer file", () => {
    expect(buildCopyScriptCommand("EDS", DEFAULT_INSTALLED_ANSWER_FILE)).toBe(COPY_COMMAND);
  });

  it("builds the second-stage command", () => {
    expect(buildSecondStageCommand(secondStageScriptPath("EDS"))).toBe(SECOND_STAGE_COMMAND);
  });
});

describe("readCopyScript", () => {
  it("strips a byte-order mark", () => {
    fs.writeFileSync(SCRIPT, "\uFEFFWrite-Host hi");
    expect(readCopyScript(SCRIPT)).toBe("Write-Host hi");
  });

  it("treats an empty script as unreadable", () => {
    fs.writeFileSync(SCRIPT, "  \r\n");
    expect(() => readCopyScript(SCRIPT)).toThrow(AnswerFileError);
  });
});

describe("injectBootstrap", () => {
  it("injects both commands at order 1 into a new document", () => {
    const file = open();
    const result = injectBootstrap(file, { extensionFolderName: "EDS", copyScriptPath: SCRIPT });

    expect(result).toEqual({ ok: true, path: OUTPUT, value: { specialize: 1, firstLogon: 1 } });
    expect(listInjectedCommands(file)).toEqual({
      specialize: [
        {
          order: 1,
          command: COPY_COMMAND,
          description: "Run the EDS copy script embedded in the answer file",
        },
      ],
      firstLogon: [
        {
          order: 1,
          command: SECOND_STAGE_COMMAND,
          description: "Run the EDS second-stage script",
        },
      ],
    });
    expect(getCopyScript(open(OUTPUT))).toBe(SCRIPT_TEXT);
  });

  it("places the commands in the Deployment and Shell-Setup components", () => {
    injectBootstrap(open(), { extensionFolderName: "EDS", copyScriptPath: SCRIPT });
    const written = fs.readFileSync(OUTPUT, "utf8");

    expect(written).toContain('<component name="Microsoft-Windows-Deployment"');
    expect(written).toContain('<RunSynchronousCommand wcm:action="add">');
    expect(written).toContain('<SynchronousCommand wcm:action="add">');
  });

  it("changes nothing when the copy script cannot be read", () => {
    const file = open();
    const result = injectBootstrap(file, {
      extensionFolderName: "EDS",
      copyScriptPath: path.join(TEST_DIR, "missing.ps1"),
    });

    expect(result).toMatchObject({ ok: false, error: { category: "SOURCE_UNREADABLE" } });
    expect(fs.existsSync(OUTPUT)).toBe(false);
    expect(findPass(file.document, "specialize")).toBeNull();
    expect(findPass(file.document, "oobeSystem")).toBeNull();
    expect(getCopyScript(file)).toBeUndefined();
  });

  it("appends a second set of commands and warns about the duplicates", () => {
    const file = open();
    const warn = vi.spyOn(file.logger, "warn");
    injectBootstrap(file, { extensionFolderName: "EDS", copyScriptPath: SCRIPT });
    expect(warn).not.toHaveBeenCalled();

    const result = injectBootstrap(file, { extensionFolderName: "EDS", copyScriptPath: SCRIPT });

    expect(result).toMatchObject({ ok: true, value: { specialize: 2, firstLogon: 2 } });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      { item: "RunSynchronousCommand" },
      "Bootstrap command already present; appending another copy",
    );
    expect(listInjectedCommands(file).specialize.map((c) => c.order)).toEqual([1, 2]);
  });

  it("continues after the highest existing order", () => {
    const source = path.join(TEST_DIR, "source.xml");
    const item = (order: number) =>
      `<RunSynchronousCommand><Order>${order}</Order><Path>cmd.exe /c exit</Path></RunSynchronousCommand>`;
    fs.writeFileSync(
      source,
      '<unattend xmlns="urn:schemas-microsoft-com:unattend"><settings pass="specialize">' +
        `<component name="Microsoft-Windows-Deployment"><RunSynchronous>${item(1)}${item(4)}` +
        "</RunSynchronous></component></settings></unattend>",
    );

    const result = injectBootstrap(open(source), {
      extensionFolderName: "EDS",
      copyScriptPath: SCRIPT,
    });
    expect(result).toMatchObject({ ok: true, value: { specialize: 5, firstLogon: 1 } });
  });

  it("uses the given installed answer-file and second-stage paths", () => {
    const file = open();
    injectBootstrap(file, {
      extensionFolderName: "Lab.Kit",
      copyScriptPath: SCRIPT,
      installedAnswerFilePath: "C:\\Windows\\System32\\Sysprep\\unattend.xml",
      secondStageScriptPath: "C:\\Deploy\\Stage2.ps1",
    });

    const [copy] = listInjectedCommands(file).specialize;
    const [stage] = listInjectedCommands(file).firstLogon;
    expect(copy.command).toContain("-LiteralPath 'C:\\Windows\\System32\\Sysprep\\unattend.xml'");
    expect(copy.command).toContain("& ([scriptblock]::Create($s)) 'Lab.Kit'\"");
    expect(stage.command).toBe(buildSecondStageCommand("C:\\Deploy\\Stage2.ps1"));
  });

  it.each(["", "EDS;calc", "E D S", "EDS'"])("rejects folder name %j", (folder) => {
    const result = injectBootstrap(open(), { extensionFolderName: folder, copyScriptPath: SCRIPT });
    expect(result).toMatchObject({ ok: false, error: { category: "VALIDATION_ERROR" } });
    expect(fs.existsSync(OUTPUT)).toBe(false);
  });

  it("rejects a path that would break out of the quoted command", () => {
    const result = injectBootstrap(open(), {
      extensionFolderName: "EDS",
      copyScriptPath: SCRIPT,
      installedAnswerFilePath: "C:\\it's.xml",
    });
    expect(result).toMatchObject({ ok: false, error: { category: "VALIDATION_ERROR" } });
  });
});

describe("listInjectedCommands", () => {
  it("is empty for a new document", () => {
    expect(listInjectedCommands(open())).toEqual({ specialize: [], firstLogon: [] });
  });
});
