/**
 * Compare command - scans two paths and prints the tree report, the JSON
 * tree, or a single file's diff.
 */

import { compare, type CompareOptions, type ComparisonSession } from "../../compare/session.js";
import { renderFileDiff, renderReport } from "../../render/terminal.js";
import { renderFileDiffJson, renderTreeJson } from "../../render/json.js";

export interface CompareCommandOptions {
  left: string;
  right: string;
  json?: boolean;
  /** Relative path whose line diff is printed instead of the tree. */
  file?: string;
  changedOnly?: boolean;
  ignore?: string[];
  includeIgnored?: boolean;
  strict?: boolean;
  signal?: AbortSignal;
}

export interface CompareCommandResult {
  session: ComparisonSession;
  output: string;
}

/**
 * Map command options onto session options.
 */
export function toCompareOptions(options: CompareCommandOptions): CompareOptions {
  return {
    ignorePatterns: options.ignore ?? [],
    includeIgnored: options.includeIgnored ?? false,
    fingerprint: options.strict ? "always" : "auto",
    signal: options.signal,
  };
}

/**
 * Execute the compare command and return what should go to stdout.
 */
export async function executeCompare(
  options: CompareCommandOptions
): Promise<CompareCommandResult> {
  const session = await compare(options.left, options.right, toCompareOptions(options));

  if (options.file !== undefined) {
    const fileDiff = await session.getFileDiff(options.file);
    const output = options.json ? renderFileDiffJson(fileDiff) : renderFileDiff(fileDiff);
    return { session, output };
  }

  const output = options.json
    ? renderTreeJson(session.tree)
    : renderReport(session.tree, { changedOnly: options.changedOnly });
  return { session, output };
}
