/**
 * CLI option parsing and command tests.
 */

import { stripVTControlCharacters } from "node:util";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { CommanderError } from "commander";
import { executeCompare } from "../src/commands/compare/index.js";
import {
  createProgram,
  parsePort,
  resolveOptions,
  type CliOptions,
} from "../src/commands/program.js";
import { InvalidOptionError } from "../src/core/errors.js";
import { configureLogger, resetLogger } from "../src/core/logger.js";
import { createTestPair, type TestPair } from "./helpers/fs.js";

const DEFAULTS: CliOptions = {
  left: "left",
  right: "right",
  web: false,
  port: 3000,
  open: false,
  verbose: false,
  quiet: false,
  json: false,
  changedOnly: false,
  ignore: [],
  includeIgnored: false,
  strict: false,
};

async function parse(args: string[]): Promise<CliOptions> {
  let received: CliOptions | undefined;
  const program = createProgram({
    version: "0.0.0-test",
    action: async (options) => {
      received = options;
    },
  });
  program.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
  await program.parseAsync(args, { from: "user" });
  if (!received) throw new Error("action was not called");
  return received;
}

describe("parsePort", () => {
  it("should accept ports in range", () => {
    expect(parsePort("1")).toBe(1);
    expect(parsePort("8080")).toBe(8080);
    expect(parsePort("65535")).toBe(65535);
  });

  it("should reject ports out of range or malformed", () => {
    for (const value of ["0", "65536", "-1", "80.5", "abc", ""]) {
      expect(() => parsePort(value)).toThrow(InvalidOptionError);
    }
    expect(() => parsePort("0")).toThrow(
      "Invalid value for --port: expected an integer between 1 and 65535, got '0'"
    );
  });
});

describe("createProgram", () => {
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleError.mockRestore();
    resetLogger();
  });

  it("should apply defaults", async () => {
    expect(await parse(["-l", "left", "-r", "right"])).toEqual(DEFAULTS);
  });

  it("should read every option", async () => {
    const options = await parse([
      "--left",
      "left",
      "--right",
      "right",
      "--json",
      "-f",
      "src/a.ts",
      "--changed-only",
      "--include-ignored",
      "--strict",
      "-v",
      "-i",
      "*.log",
      "dist/",
    ]);

    expect(options).toEqual({
      ...DEFAULTS,
      json: true,
      file: "src/a.ts",
      changedOnly: true,
      includeIgnored: true,
      strict: true,
      verbose: true,
      ignore: ["*.log", "dist/"],
    });
  });

  it("should keep web options with --web", async () => {
    const options = await parse(["-l", "left", "-r", "right", "--web", "--port", "4000", "--open"]);

    expect(options).toEqual({ ...DEFAULTS, web: true, port: 4000, open: true });
  });

  it("should warn about and drop web options without --web", async () => {
    const options = await parse(["-l", "left", "-r", "right", "--port", "4000", "--open"]);

    expect(options.port).toBe(3000);
    expect(options.open).toBe(false);
    expect(consoleError.mock.calls.map((args) => stripVTControlCharacters(String(args[0])))).toEqual([
      "Warning: --open has no effect without --web",
      "Warning: --port has no effect without --web",
    ]);
  });

  it("should not warn with --quiet", async () => {
    await parse(["-l", "left", "-r", "right", "--open", "-q"]);

    expect(consoleError).not.toHaveBeenCalled();
  });

  it("should reject an invalid port", async () => {
    await expect(parse(["-l", "left", "-r", "right", "--port", "70000"])).rejects.toBeInstanceOf(
      InvalidOptionError
    );
  });

  it("should reject --file together with --web", async () => {
    await expect(parse(["-l", "left", "-r", "right", "--web", "-f", "a.txt"])).rejects.toThrow(
      "Invalid value for --file: cannot be combined with --web"
    );
  });

  it("should require both paths", async () => {
    const error = await parse(["-l", "left"]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CommanderError);
    expect(error instanceof CommanderError ? error.code : "").toBe(
      "commander.missingMandatoryOptionValue"
    );
  });
});

describe("resolveOptions", () => {
  it("should leave plain options untouched apart from web flags", () => {
    expect(resolveOptions(DEFAULTS, false)).toEqual(DEFAULTS);
  });

  it("should reject --json together with --web", () => {
    expect(() => resolveOptions({ ...DEFAULTS, web: true, json: true }, false)).toThrow(
      InvalidOptionError
    );
  });
});

describe("executeCompare", () => {
  let pair: TestPair;

  beforeEach(async () => {
    configureLogger({ quiet: true });
    pair = await createTestPair({ "a.txt": "hello\n" }, { "a.txt": "hello\nworld\n" });
  });

  afterEach(async () => {
    await pair.cleanup();
    resetLogger();
  });

  it("should print the tree as JSON", async () => {
    const { output } = await executeCompare({ left: pair.left.path, right: pair.right.path, json: true });
    const parsed = JSON.parse(output);

    expect(parsed.schemaVersion).toBe("1.0");
    expect(parsed.tree.root.children[0].status).toBe("modified");
  });

  it("should print one file's diff as JSON", async () => {
    const { output } = await executeCompare({
      left: pair.left.path,
      right: pair.right.path,
      json: true,
      file: "a.txt",
    });
    const parsed = JSON.parse(output);

    expect(parsed.fileDiff.stats).toEqual({ additions: 1, deletions: 0, unchanged: 1 });
  });

  it("should print the terminal report", async () => {
    const { output } = await executeCompare({ left: pair.left.path, right: pair.right.path });

    expect(stripVTControlCharacters(output)).toContain("└── ~ a.txt");
  });
});
