import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  error: vi.fn(),
  success: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  spinner: () => ({
    start: () => undefined,
    stop: () => undefined,
    message: () => undefined,
    error: () => undefined
  }),
  log: {
    info: () => undefined,
    warn: () => undefined,
    success: mocks.success,
    step: () => undefined,
    error: mocks.error
  }
}));

import { outputFormatFromArgv, runCli } from "../src/program.js";

const SCHEMA = '{\n  "type": "object"\n}\n';
const STALE_MESSAGE = "Schema is out of date. Run ./scripts/update-schema.sh";

function cli(...args: string[]): Promise<number> {
  return runCli(["node", "compass-codegen", ...args]);
}

describe("runCli", () => {
  const tempRoots: string[] = [];
  let stdoutChunks: string[] = [];
  let stderrChunks: string[] = [];

  async function makeRepo(baseline: string): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), "compass-codegen-run-"));
    tempRoots.push(dir);
    await writeFile(join(dir, "schema.json"), baseline);
    await writeFile(join(dir, "emit-schema.cjs"), `process.stdout.write(${JSON.stringify(SCHEMA)});\n`);
    return dir;
  }

  function schemaArgs(cwd: string): string[] {
    return ["--cwd", cwd, "--schema", "schema.json", "--emitter", `${process.execPath} emit-schema.cjs`];
  }

  function stderrText(): string {
    return stderrChunks.join("");
  }

  beforeEach(() => {
    stdoutChunks = [];
    stderrChunks = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdoutChunks.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      stderrChunks.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.clearAllMocks();
    while (tempRoots.length > 0) {
      const dir = tempRoots.pop();
      if (!dir) continue;
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("exits 0 for help and version", async () => {
    expect(await cli("--help")).toBe(0);
    expect(await cli("--version")).toBe(0);
    expect(stdoutChunks.join("")).toContain("Usage: compass-codegen");
    expect(stdoutChunks).toContain("0.1.0\n");
    expect(stderrChunks).toEqual([]);
  });

  it("exits 0 when the committed schema is up to date", async () => {
    const cwd = await makeRepo(SCHEMA);

    expect(await cli("schema", "check", ...schemaArgs(cwd))).toBe(0);
    expect(mocks.error).not.toHaveBeenCalled();
  });

  it("exits 1 when the schema is stale and reports it once on stdout", async () => {
    const cwd = await makeRepo("{}\n");

    expect(await cli("schema", "check", ...schemaArgs(cwd))).toBe(1);
    expect(mocks.error).toHaveBeenCalledTimes(1);
    expect(mocks.error).toHaveBeenCalledWith(STALE_MESSAGE);
    expect(stderrChunks).toEqual([]);
    expect(await readFile(join(cwd, "schema.json"), "utf8")).toBe("{}\n");
  });

  it("exits 0 after accepting a regenerated schema", async () => {
    const cwd = await makeRepo("{}\n");

    expect(await cli("schema", "update", ...schemaArgs(cwd))).toBe(0);
    expect(await readFile(join(cwd, "schema.json"), "utf8")).toBe(SCHEMA);
    expect(await cli("schema", "check", ...schemaArgs(cwd))).toBe(0);
  });

  it("exits 2 for an invalid model name and prints it to stderr", async () => {
    const cwd = await mkdtemp(join(tmpdir(), "compass-codegen-run-"));
    tempRoots.push(cwd);

    expect(await cli("traversal", "fancy", cwd)).toBe(2);
    expect(mocks.error).toHaveBeenCalledWith(
      'Invalid model name "fancy". Use PascalCase: start with an uppercase letter, then letters and digits only (e.g. EnergyCost).',
      { output: process.stderr }
    );
  });

  it("prints a JSON payload for --format json", async () => {
    const cwd = await mkdtemp(join(tmpdir(), "compass-codegen-run-"));
    tempRoots.push(cwd);

    expect(await cli("traversal", "Mod", cwd, "--format", "json")).toBe(2);
    expect(mocks.error).not.toHaveBeenCalled();
    expect(JSON.parse(stderrText())).toEqual({
      error: {
        code: "INVALID_NAME",
        type: "InvalidNameError",
        message:
          'Invalid model name "Mod": its module name "mod" is a reserved Rust keyword. Choose a more specific name (e.g. ModCost).',
        exitCode: 2,
        details: { name: "Mod", moduleName: "mod" }
      }
    });
  });

  it("replaces commander's usage message with the JSON payload", async () => {
    expect(await cli("traversal", "FancyRobot", "--format=json")).toBe(2);
    expect(stderrChunks).toHaveLength(1);
    expect(JSON.parse(stderrText())).toMatchObject({
      error: {
        code: "USER_INPUT",
        exitCode: 2,
        details: { commanderCode: "commander.missingArgument" }
      }
    });
  });

  it("exits 2 for an unsupported --format value", async () => {
    expect(await cli("schema", "check", "--format", "xml")).toBe(2);
    expect(stderrText()).toContain("argument 'xml' is invalid");
  });

  it("exits 0 after generating a module", async () => {
    const cwd = await mkdtemp(join(tmpdir(), "compass-codegen-run-"));
    tempRoots.push(cwd);

    expect(await cli("traversal", "FancyRobot", cwd, "--extensions", "typed-config-and-engine")).toBe(0);
    expect(await readFile(join(cwd, "fancy_robot", "engine.rs"), "utf8")).toContain("pub struct FancyRobotEngine {}");
  });
});

describe("outputFormatFromArgv", () => {
  it("reads both option spellings and defaults to text", () => {
    expect(outputFormatFromArgv(["node", "cli", "schema", "check", "--format", "json"])).toBe("json");
    expect(outputFormatFromArgv(["node", "cli", "traversal", "--format=JSON"])).toBe("json");
    expect(outputFormatFromArgv(["node", "cli", "traversal", "--format"])).toBe("text");
    expect(outputFormatFromArgv(["node", "cli"])).toBe("text");
  });
});
