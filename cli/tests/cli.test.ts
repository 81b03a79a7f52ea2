/**
 * answerkit CLI — Tests
 *
 * Configuration loading, key=value parsing, output helpers, and the
 * commands run end to end against a temp media tree.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import { encodeAccountPassword } from "@answerkit/engine";
import { createProgram } from "../src/program";
import { loadConfig, defaultAnswerFilePath } from "../src/config";
import { loadInputFile, parsePairs } from "../src/commands/input";
import { colors, formatErrorCategory, setDebugMode, truncateText } from "../src/output";

const TEST_DIR = path.join(os.tmpdir(), "answerkit-cli-test");
const MEDIA = path.join(TEST_DIR, "media");
const RUNTIME = path.join(TEST_DIR, "runtime");
const OUTPUT = path.join(RUNTIME, "Temp", "unattended.xml");

async function run(...args: string[]): Promise<void> {
  const program = createProgram();
  program.exitOverride(); // prevent process.exit in tests
  await program.parseAsync(["node", "answerkit", ...args]);
}

function logged(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => call.map(String).join(" "));
}

beforeEach(() => {
  fs.mkdirSync(path.join(MEDIA, "EDS", "Installer", "Functions"), { recursive: true });
  fs.writeFileSync(
    path.join(MEDIA, "EDS", "Installer", "Functions", "CopySpecialize.ps1"),
    "param($Folder)\r\n",
  );
  vi.stubEnv("ANSWERKIT_HOME", path.join(TEST_DIR, "home"));
  vi.stubEnv("ANSWERKIT_MEDIA_ROOT", "");
  vi.stubEnv("ANSWERKIT_FOLDER", "");
  vi.stubEnv("ANSWERKIT_RUNTIME_ROOT", "");
  vi.stubEnv("ANSWERKIT_LOG_LEVEL", "");
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  process.exitCode = undefined;
  setDebugMode(false);
});

// ─── Configuration ──────────────────────────────────────────

describe("loadConfig", () => {
  const configFile = path.join(TEST_DIR, "config.yaml");

  it("falls back to defaults", () => {
    expect(loadConfig({}, configFile)).toEqual({
      mediaRoot: undefined,
      folderName: "EDS",
      runtimeRoot: "X:\\",
      logLevel: "silent",
    });
  });

  it("reads the config file", () => {
    fs.writeFileSync(configFile, "mediaRoot: D:\\\nfolderName: Lab\nlogLevel: info\n");
    expect(loadConfig({}, configFile)).toMatchObject({
      mediaRoot: "D:\\",
      folderName: "Lab",
      logLevel: "info",
    });
  });

  it("lets environment variables override the file", () => {
    fs.writeFileSync(configFile, "folderName: Lab\nruntimeRoot: Y:\\\n");
    const config = loadConfig(
      { ANSWERKIT_FOLDER: "Field", ANSWERKIT_LOG_LEVEL: "warn" },
      configFile,
    );
    expect(config).toMatchObject({ folderName: "Field", runtimeRoot: "Y:\\", logLevel: "warn" });
  });

  it("ignores an unknown log level in the environment", () => {
    expect(loadConfig({ ANSWERKIT_LOG_LEVEL: "loud" }, configFile).logLevel).toBe("silent");
  });

  it("rejects unknown keys in the config file", () => {
    fs.writeFileSync(configFile, "mediaRot: D:\\\n");
    expect(() => loadConfig({}, configFile)).toThrow(/Invalid config file/);
  });

  it("rejects a folder name that cannot go into a command line", () => {
    fs.writeFileSync(configFile, "folderName: \"E D S\"\n");
    expect(() => loadConfig({}, configFile)).toThrow(/folderName/);
  });

  it("places the prepared file under the runtime Temp folder", () => {
    const config = loadConfig({ ANSWERKIT_RUNTIME_ROOT: RUNTIME }, configFile);
    expect(defaultAnswerFilePath(config)).toBe(OUTPUT);
  });
});

// ─── Input Parsing ──────────────────────────────────────────

describe("parsePairs", () => {
  it("splits on the first equals sign", () => {
    expect(parsePairs(["site=Lab 3", "url=a=b", "empty="])).toEqual({
      site: "Lab 3",
      url: "a=b",
      empty: "",
    });
  });

  it("rejects arguments without a key", () => {
    expect(() => parsePairs(["novalue"])).toThrow('Expected key=value, got "novalue"');
    expect(() => parsePairs(["=x"])).toThrow('Expected key=value, got "=x"');
  });
});

describe("loadInputFile", () => {
  it("stores scalar values as text", () => {
    const file = path.join(TEST_DIR, "values.yaml");
    fs.writeFileSync(file, "site: Lab3\nrack: 7\nactive: true\n");
    expect(loadInputFile(file)).toEqual({ site: "Lab3", rack: "7", active: "true" });
  });

  it("rejects nested values", () => {
    const file = path.join(TEST_DIR, "nested.yaml");
    fs.writeFileSync(file, "site:\n  name: Lab3\n");
    expect(() => loadInputFile(file)).toThrow("must be a map of scalar values");
  });
});

// ─── Output Helpers ─────────────────────────────────────────

describe("Output Formatting", () => {
  it("maps error categories to readable labels", () => {
    expect(formatErrorCategory("STRUCTURAL_NOT_FOUND")).toBe(
      "Required answer-file section is missing",
    );
    expect(formatErrorCategory("SOMETHING_ELSE")).toBe("SOMETHING_ELSE");
  });

  it("truncates long text with an ellipsis", () => {
    expect(truncateText("abcdefghij", 6)).toBe("abc...");
    expect(truncateText("abc", 6)).toBe("abc");
  });
});

// ─── Commands ───────────────────────────────────────────────

describe("prepare", () => {
  it("writes the prepared file to the runtime volume", async () => {
    await run("prepare", "--media", MEDIA, "--runtime", RUNTIME);

    expect(process.exitCode).toBeUndefined();
    const written = fs.readFileSync(OUTPUT, "utf8");
    expect(written).toContain("<eds:CopyScript>param($Folder)&#xD;\n</eds:CopyScript>");
    expect(written).toContain('<RunSynchronousCommand wcm:action="add">');
  });

  it("only prints the paths on a dry run", async () => {
    await run("prepare", "--media", MEDIA, "--runtime", RUNTIME, "--dry-run");

    expect(fs.existsSync(OUTPUT)).toBe(false);
    expect(logged().some((line) => line.includes(OUTPUT))).toBe(true);
  });

  it("fails without a media root", async () => {
    await run("prepare", "--runtime", RUNTIME);
    expect(process.exitCode).toBe(1);
  });

  it("fails when the copy script is missing", async () => {
    await run("prepare", "--media", MEDIA, "--folder", "Other", "--runtime", RUNTIME);
    expect(process.exitCode).toBe(1);
    expect(fs.existsSync(OUTPUT)).toBe(false);
  });
});

describe("editing a prepared file", () => {
  beforeEach(async () => {
    await run("prepare", "--media", MEDIA, "--runtime", RUNTIME);
  });

  it("sets the device name", async () => {
    await run("device-name", "LAB-01", "--file", OUTPUT);
    expect(fs.readFileSync(OUTPUT, "utf8")).toContain("<ComputerName>LAB-01</ComputerName>");
  });

  it("uses the prepared file when --file is omitted", async () => {
    vi.stubEnv("ANSWERKIT_RUNTIME_ROOT", RUNTIME);
    await run("device-name", "LAB-02");
    expect(fs.readFileSync(OUTPUT, "utf8")).toContain("<ComputerName>LAB-02</ComputerName>");
  });

  it("prints debug lines with --debug", async () => {
    await run("--debug", "device-name", "LAB-03", "--file", OUTPUT);
    expect(logged()).toContain(colors.muted(`  [debug] Opening ${OUTPUT}`));
  });

  it("rejects an invalid device name", async () => {
    await run("device-name", "LAB\t01", "--file", OUTPUT);
    expect(process.exitCode).toBe(1);
  });

  it("encodes the password of a new account", async () => {
    await run("account", "Tech", "--password", "test-secret", "--file", OUTPUT);

    const written = fs.readFileSync(OUTPUT, "utf8");
    expect(written).toContain(`<Value>${encodeAccountPassword("test-secret")}</Value>`);
    expect(written).not.toContain(">test-secret<");
  });

  it("requires exactly one password option", async () => {
    await run("account", "Tech", "--file", OUTPUT);
    expect(process.exitCode).toBe(1);
  });

  it("stores user input and skips localPassword", async () => {
    await run("input", "site=Lab3", "localPassword=test-secret", "--file", OUTPUT);

    const written = fs.readFileSync(OUTPUT, "utf8");
    expect(written).toContain("<eds:site>Lab3</eds:site>");
    expect(written).not.toContain("test-secret");
    expect(logged().some((line) => line.includes("Stored 1 value(s)"))).toBe(true);
  });

  it("prints a JSON summary", async () => {
    await run("device-name", "LAB-01", "--file", OUTPUT);
    await run("account", "Tech", "--encoded", "QQ==", "--file", OUTPUT);
    await run("input", "site=Lab3", "--file", OUTPUT);
    vi.mocked(console.log).mockClear();

    await run("show", "--json", "--file", OUTPUT);

    const summary: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
    expect(summary).toMatchObject({
      path: OUTPUT,
      deviceName: "LAB-01",
      accounts: [{ name: "Tech", displayName: "Tech", group: "Administrators", plainText: false }],
      userInput: { site: "Lab3" },
      copyScriptLines: 2,
    });
    expect(summary).toMatchObject({
      commands: { specialize: [{ order: 1 }], firstLogon: [{ order: 1 }] },
    });
  });
});

describe("show", () => {
  it("fails when the file does not exist", async () => {
    await run("show", "--file", path.join(TEST_DIR, "missing.xml"));
    expect(process.exitCode).toBe(1);
  });
});
