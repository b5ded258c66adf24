/**
 * Gitignore-style ignore rules.
 *
 * Each line is compiled with the `ignore` package, which follows git's own
 * matching (braces and parentheses are literal). A rule set is an immutable value:
 * descending into a directory that has its own .gitignore produces a new
 * set, so concurrent scans never share mutable state.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import ignore from "ignore";
import { describeError } from "../core/errors.js";
import { warn } from "../core/logger.js";

export const GITIGNORE_FILE = ".gitignore";

/** Repository-local exclude file, relative to the root. */
export const EXCLUDE_FILE = join(".git", "info", "exclude");

export interface IgnoreRule {
  /** The pattern as written, after unescaping the leading "!" marker. */
  pattern: string;
  /** Relative directory the rule was declared in ("" for the root). */
  base: string;
  negated: boolean;
  directoryOnly: boolean;
  source: string;
  /** Outcome for a path relative to `base`; directories end in "/". */
  test: (path: string) => IgnoreOutcome;
}

/** Whether a rule ignored the path, re-included it, or did not match. */
export type IgnoreOutcome = "ignored" | "unignored" | "none";

/**
 * Parse one line of a gitignore file. Returns null for blank lines and
 * comments.
 */
export function parseIgnoreLine(
  rawLine: string,
  base: string = "",
  source: string = "options"
): IgnoreRule | null {
  let line = rawLine.replace(/\r$/, "");
  if (line.startsWith("#")) return null;

  // Trailing spaces are dropped unless escaped with a backslash
  while (line.endsWith(" ") && !line.endsWith("\\ ")) {
    line = line.slice(0, -1);
  }
  if (line === "") return null;
  const matcher = ignore({ ignorecase: false }).add(line);

  let negated = false;
  if (line.startsWith("!")) {
    negated = true;
    line = line.slice(1);
  }

  let directoryOnly = false;
  if (line.endsWith("/")) {
    directoryOnly = true;
    line = line.replace(/\/+$/, "");
  }
  if (line === "") return null;

  return {
    pattern: line,
    base,
    negated,
    directoryOnly,
    source,
    test: (path: string) => {
      const result = matcher.test(path);
      if (result.ignored) return "ignored";
      return result.unignored ? "unignored" : "none";
    },
  };
}

/**
 * Parse the content of a gitignore file.
 */
export function parseIgnoreFile(
  content: string,
  base: string = "",
  source: string = GITIGNORE_FILE
): IgnoreRule[] {
  const rules: IgnoreRule[] = [];
  for (const line of content.split("\n")) {
    const rule = parseIgnoreLine(line, base, source);
    if (rule) rules.push(rule);
  }
  return rules;
}

/**
 * Read and parse an ignore file. A missing file yields no rules; any other
 * read failure is reported and yields no rules.
 */
export async function loadIgnoreFile(
  absolutePath: string,
  base: string
): Promise<IgnoreRule[]> {
  try {
    const content = await readFile(absolutePath, "utf-8");
    return parseIgnoreFile(content, base, absolutePath);
  } catch (error) {
    if (isMissing(error)) return [];
    warn(`Could not read ignore file ${absolutePath}: ${describeError(error)}`);
    return [];
  }
}

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Ordered rule set. File rules come first (exclude file, then .gitignore
 * files from the root downward); override rules from explicit patterns are
 * evaluated last. The last matching rule decides.
 */
export class IgnoreRules {
  private constructor(
    private readonly fileRules: readonly IgnoreRule[],
    private readonly overrideRules: readonly IgnoreRule[]
  ) {}

  static empty(): IgnoreRules {
    return new IgnoreRules([], []);
  }

  /**
   * Build a rule set from explicit gitignore-style patterns, anchored at the
   * root.
   */
  static fromPatterns(patterns: readonly string[]): IgnoreRules {
    const overrides: IgnoreRule[] = [];
    for (const pattern of patterns) {
      const rule = parseIgnoreLine(pattern, "", "options");
      if (rule) overrides.push(rule);
    }
    return new IgnoreRules([], overrides);
  }

  get size(): number {
    return this.fileRules.length + this.overrideRules.length;
  }

  /**
   * Return a new set with `rules` appended after the existing file rules.
   */
  withFileRules(rules: readonly IgnoreRule[]): IgnoreRules {
    if (rules.length === 0) return this;
    return new IgnoreRules([...this.fileRules, ...rules], this.overrideRules);
  }

  isIgnored(relativePath: string, isDirectory: boolean): boolean {
    if (relativePath === "") return false;

    let ignored = false;
    for (const rule of [...this.fileRules, ...this.overrideRules]) {
      if (rule.directoryOnly && !isDirectory) continue;

      let subject = relativePath;
      if (rule.base !== "") {
        if (!relativePath.startsWith(`${rule.base}/`)) continue;
        subject = relativePath.slice(rule.base.length + 1);
      }

      const outcome = rule.test(isDirectory ? `${subject}/` : subject);
      if (outcome !== "none") {
        ignored = outcome === "ignored";
      }
    }
    return ignored;
  }
}
