/**
 * Command-line definition. Kept apart from cli.ts so it can be built and
 * parsed in tests without running anything.
 */

import { Command } from "commander";
import { DiffyError, InvalidOptionError } from "../core/errors.js";
import { configureLogger, error as logError, getLoggerState, warn } from "../core/logger.js";
import { DEFAULT_PORT } from "../web/server.js";
import { executeCompare } from "./compare/index.js";
import { executeServe } from "./serve/index.js";

export type CliOptions = {
  left: string;
  right: string;
  web: boolean;
  port: number;
  open: boolean;
  verbose: boolean;
  quiet: boolean;
  json: boolean;
  file?: string;
  changedOnly: boolean;
  ignore: string[];
  includeIgnored: boolean;
  strict: boolean;
};

export type CliAction = (options: CliOptions) => Promise<void>;

export interface ProgramOptions {
  version?: string;
  action?: CliAction;
}

/**
 * Parse and validate --port.
 */
export function parsePort(value: string): number {
  const port = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidOptionError(
      "--port",
      `expected an integer between 1 and 65535, got '${value}'`
    );
  }
  return port;
}

/**
 * Resolve option combinations. Web-only flags given without --web are
 * dropped with a warning.
 */
export function resolveOptions(options: CliOptions, portFromCli: boolean): CliOptions {
  if (options.web) {
    if (options.file !== undefined) {
      throw new InvalidOptionError("--file", "cannot be combined with --web");
    }
    if (options.json) {
      throw new InvalidOptionError("--json", "cannot be combined with --web");
    }
    return options;
  }

  if (options.open) {
    warn("--open has no effect without --web");
  }
  if (portFromCli) {
    warn("--port has no effect without --web");
  }
  return { ...options, open: false, port: DEFAULT_PORT };
}

/**
 * Default action: run the comparison and print or serve the result.
 */
export async function runCli(options: CliOptions): Promise<void> {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  process.once("SIGINT", abort);

  const commandOptions = {
    left: options.left,
    right: options.right,
    json: options.json,
    file: options.file,
    changedOnly: options.changedOnly,
    ignore: options.ignore,
    includeIgnored: options.includeIgnored,
    strict: options.strict,
    signal: controller.signal,
  };

  if (!options.web) {
    try {
      const { output } = await executeCompare(commandOptions);
      console.log(output);
    } finally {
      process.off("SIGINT", abort);
    }
    return;
  }

  const server = await executeServe({
    ...commandOptions,
    port: options.port,
    open: options.open,
  }).finally(() => process.off("SIGINT", abort));

  process.once("SIGINT", () => {
    void server.close().then(() => process.exit(0), handleError);
  });
}

/**
 * Build the diffy command.
 */
export function createProgram(programOptions: ProgramOptions = {}): Command {
  const action = programOptions.action ?? runCli;
  const program = new Command();

  program
    .name("diffy")
    .description("Compare two files or directory trees side by side")
    .version(programOptions.version ?? "unknown")
    .requiredOption("-l, --left <path>", "Left path (file or directory)")
    .requiredOption("-r, --right <path>", "Right path (file or directory)")
    .option("--web", "Serve the comparison in a browser instead of printing it", false)
    .option("--port <n>", "Port for --web (1-65535)", parsePort, DEFAULT_PORT)
    .option("--open", "Open a browser when serving (requires --web)", false)
    .option("-v, --verbose", "Show debug logging", false)
    .option("-q, --quiet", "Suppress info and warnings", false)
    .option("--json", "Print the tree, or the --file diff, as JSON", false)
    .option("-f, --file <path>", "Print the side-by-side diff of one relative path")
    .option("--changed-only", "Hide unchanged entries in the tree report", false)
    .option("-i, --ignore <pattern...>", "Extra gitignore-style patterns to skip", [])
    .option("--include-ignored", "Do not apply .gitignore and exclude files", false)
    .option("--strict", "Hash every file instead of trusting size and mtime", false)
    .action(async () => {
      const raw = program.opts<CliOptions>();
      configureLogger({ quiet: raw.quiet, debug: raw.verbose });
      const options = resolveOptions(raw, program.getOptionValueSource("port") === "cli");
      await action(options);
    });

  return program;
}

/**
 * Handle errors and exit with appropriate code.
 */
export function handleError(error: unknown): never {
  if (error instanceof DiffyError) {
    logError(`Error: ${error.message}`);
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`);
    if (getLoggerState().debug && error.stack) {
      logError(error.stack);
    }
  } else {
    logError("An unexpected error occurred");
  }

  process.exit(1);
}
