/**
 * Comparison session: scans both roots, matches them, and serves per-file
 * line diffs on demand.
 */

import { NodeNotFoundError, ScanAbortedError } from "../core/errors.js";
import { info, startTimer } from "../core/logger.js";
import { normalizeRelativePath } from "../core/paths.js";
import type {
  DiffNode,
  DiffTree,
  FileDiff,
  FingerprintMode,
  ScanResult,
  Side,
} from "../core/types.js";
import { diffFilePair } from "../diff/file-diff.js";
import type { DiffOptions } from "../diff/line-diff.js";
import { IgnoreRules } from "../scan/ignore.js";
import { scanRoot, type ScanOptions } from "../scan/scanner.js";
import { matchTrees } from "../tree/matcher.js";
import { indexTree } from "../tree/query.js";

export interface CompareOptions {
  /** Extra gitignore-style patterns applied to both sides. */
  ignorePatterns?: string[];
  includeIgnored?: boolean;
  fingerprint?: FingerprintMode;
  concurrency?: number;
  signal?: AbortSignal;
  diff?: DiffOptions;
}

/**
 * Holds one read-only DiffTree. File diffs are computed the first time a
 * path is requested and kept for the session's lifetime.
 */
export class ComparisonSession {
  private readonly index: ReadonlyMap<string, DiffNode>;
  private readonly fileDiffs = new Map<string, Promise<FileDiff>>();

  constructor(
    readonly tree: DiffTree,
    private readonly diffOptions: DiffOptions = {}
  ) {
    this.index = indexTree(tree.root);
  }

  /**
   * Look up a node by relative path ("", ".", "a/b" or "./a/b").
   */
  getNode(relativePath: string): DiffNode | undefined {
    return this.index.get(normalizeRelativePath(relativePath));
  }

  /**
   * Line diff of one file pair, memoized per path. A failed computation is
   * not kept, so a later request tries again.
   */
  getFileDiff(relativePath: string): Promise<FileDiff> {
    const key = normalizeRelativePath(relativePath);
    const cached = this.fileDiffs.get(key);
    if (cached) return cached;

    const node = this.index.get(key);
    if (!node) {
      return Promise.reject(new NodeNotFoundError(key));
    }

    const pending = diffFilePair(
      node,
      { leftRoot: this.tree.leftRoot, rightRoot: this.tree.rightRoot },
      this.diffOptions
    );
    this.fileDiffs.set(key, pending);
    void pending.catch(() => {
      if (this.fileDiffs.get(key) === pending) this.fileDiffs.delete(key);
    });
    return pending;
  }

  get cachedDiffCount(): number {
    return this.fileDiffs.size;
  }

  clearCache(): void {
    this.fileDiffs.clear();
  }
}

/**
 * Compare two paths. Both scans run concurrently; matching starts only once
 * both have completed. Nothing partial is returned on failure or abort.
 */
export async function compare(
  leftPath: string,
  rightPath: string,
  options: CompareOptions = {}
): Promise<ComparisonSession> {
  const stopTimer = startTimer("Compared roots");
  const ignore = IgnoreRules.fromPatterns(options.ignorePatterns ?? []);
  const [left, right] = await scanBoth(
    leftPath,
    rightPath,
    {
      ignore,
      includeIgnored: options.includeIgnored,
      fingerprint: options.fingerprint,
      concurrency: options.concurrency,
    },
    options.signal
  );

  let tree: DiffTree;
  try {
    tree = await matchTrees(left, right, {
      fingerprint: options.fingerprint,
      concurrency: options.concurrency,
      signal: options.signal,
    });
  } catch (error) {
    if (options.signal?.aborted) {
      throw new ScanAbortedError(`${left.root} and ${right.root}`);
    }
    throw error;
  }

  const elapsed = stopTimer();
  const { summary } = tree;
  info(
    `Compared ${summary.totalFiles} files in ${(elapsed / 1000).toFixed(2)}s: ` +
      `${summary.added} added, ${summary.removed} removed, ` +
      `${summary.modified} modified, ${summary.conflicted} conflicted`
  );

  return new ComparisonSession(tree, options.diff);
}

/**
 * Run both scans under one controller: the first failure aborts the other
 * walk, and an abort of `signal` reaches both.
 */
async function scanBoth(
  leftPath: string,
  rightPath: string,
  scanOptions: ScanOptions,
  signal: AbortSignal | undefined
): Promise<[ScanResult, ScanResult]> {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  const scan = async (path: string, side: Side): Promise<ScanResult> => {
    try {
      return await scanRoot(path, { ...scanOptions, side, signal: controller.signal });
    } catch (error) {
      controller.abort();
      throw error;
    }
  };

  try {
    return await Promise.all([scan(leftPath, "left"), scan(rightPath, "right")]);
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }
}
