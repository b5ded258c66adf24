/**
 * Diagnostics logger.
 *
 * All output goes to stderr so stdout stays clean for the report and for
 * --json output. --quiet silences everything except errors; --verbose
 * enables debug lines.
 */

import chalk from "chalk";

interface LoggerState {
  quiet: boolean;
  debug: boolean;
}

const state: LoggerState = {
  quiet: false,
  debug: false,
};

/**
 * Configure logger from CLI flags. quiet wins over debug.
 */
export function configureLogger(options: { quiet?: boolean; debug?: boolean }): void {
  if (options.quiet) {
    state.quiet = true;
    state.debug = false;
  } else {
    state.quiet = false;
    state.debug = options.debug ?? false;
  }
}

export function getLoggerState(): Readonly<LoggerState> {
  return { ...state };
}

/**
 * Reset logger to default state (for testing).
 */
export function resetLogger(): void {
  state.quiet = false;
  state.debug = false;
}

export function warn(message: string): void {
  if (!state.quiet) {
    console.error(chalk.yellow(`Warning: ${message}`));
  }
}

export function info(message: string): void {
  if (!state.quiet) {
    console.error(message);
  }
}

export function debug(message: string): void {
  if (!state.quiet && state.debug) {
    console.error(chalk.dim(`[debug] ${message}`));
  }
}

/**
 * Never suppressed, even with --quiet.
 */
export function error(message: string): void {
  console.error(chalk.red(message));
}

/**
 * Start a timer. The returned function logs `label` with the elapsed
 * milliseconds at debug level and returns the elapsed time.
 */
export function startTimer(label: string): () => number {
  const started = performance.now();
  return () => {
    const elapsed = Math.round(performance.now() - started);
    debug(`${label} in ${elapsed}ms`);
    return elapsed;
  };
}
