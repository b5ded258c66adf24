/**
 * Entry scanner: walks one root and produces a flat map of relative path to
 * FileSystemEntry.
 *
 * Symbolic links are always followed and take their target's kind. A broken
 * link, or a link back to a directory already on the current walk, becomes
 * an error entry. Per-entry failures never abort the scan; only a missing or
 * unreadable root does.
 */

import { access, constants, lstat, readdir, realpath, stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import { basename, join, resolve } from "node:path";
import { defaultConcurrency, limitConcurrency } from "../core/concurrency.js";
import {
  describeError,
  RootNotFoundError,
  RootUnreadableError,
  ScanAbortedError,
} from "../core/errors.js";
import { debug, startTimer } from "../core/logger.js";
import { baseName, joinRelative } from "../core/paths.js";
import type {
  EntryKind,
  FileSystemEntry,
  FingerprintMode,
  ScanResult,
  Side,
} from "../core/types.js";
import { fingerprintFile, withFingerprint } from "./fingerprint.js";
import {
  EXCLUDE_FILE,
  GITIGNORE_FILE,
  IgnoreRules,
  loadIgnoreFile,
} from "./ignore.js";

export interface ScanOptions {
  /** Explicit rules; evaluated after any .gitignore rules. */
  ignore?: IgnoreRules;
  /** Skip .gitignore/exclude files and do not skip .git. */
  includeIgnored?: boolean;
  fingerprint?: FingerprintMode;
  concurrency?: number;
  signal?: AbortSignal;
  /** Which side this root is, used in error messages. */
  side?: Side;
}

interface PendingDirectory {
  absolutePath: string;
  relativePath: string;
  name: string;
  stats: Stats;
  symlink: boolean;
  rules: IgnoreRules;
  /** Real paths of this directory and its ancestors. */
  ancestors: ReadonlySet<string>;
}

type ChildResult =
  | { type: "entry"; entry: FileSystemEntry }
  | { type: "directory"; pending: PendingDirectory }
  | { type: "ignored" };

const GIT_DIR = ".git";

/**
 * Scan a root path.
 */
export async function scanRoot(
  root: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const side = options.side ?? "left";
  const absoluteRoot = resolve(root);
  const scannedAt = new Date().toISOString();
  const stopTimer = startTimer(`Scanned ${side} root ${absoluteRoot}`);

  const rootStats = await statRoot(absoluteRoot, root, side);
  const rootIsLink = await isSymlink(absoluteRoot);
  const entries = new Map<string, FileSystemEntry>();

  try {
    if (rootStats.isDirectory()) {
      await walk(absoluteRoot, rootStats, rootIsLink, entries, options, root, side);
    } else {
      await assertReadable(absoluteRoot, root, side);
      entries.set(
        "",
        fileEntry("", basename(absoluteRoot), rootStats, rootIsLink)
      );
    }

    if (options.fingerprint === "always") {
      await fingerprintAll(entries, absoluteRoot, options);
    }
  } catch (error) {
    if (options.signal?.aborted) {
      throw new ScanAbortedError(absoluteRoot);
    }
    throw error;
  }

  stopTimer();
  debug(`${side}: ${entries.size} entries`);

  return {
    root: absoluteRoot,
    rootKind: rootStats.isDirectory() ? "directory" : "file",
    entries,
    scannedAt,
  };
}

async function statRoot(absoluteRoot: string, root: string, side: Side): Promise<Stats> {
  try {
    return await stat(absoluteRoot);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new RootNotFoundError(side, root);
    }
    throw new RootUnreadableError(side, root, describeError(error));
  }
}

async function assertReadable(absolutePath: string, root: string, side: Side): Promise<void> {
  try {
    await access(absolutePath, constants.R_OK);
  } catch (error) {
    throw new RootUnreadableError(side, root, describeError(error));
  }
}

/**
 * Breadth-first walk. Each level's directory listings and child stats go
 * through one bounded pool, so the number of open handles stays bounded no
 * matter how deep the tree is.
 */
async function walk(
  absoluteRoot: string,
  rootStats: Stats,
  rootIsLink: boolean,
  entries: Map<string, FileSystemEntry>,
  options: ScanOptions,
  root: string,
  side: Side
): Promise<void> {
  const limit = options.concurrency ?? defaultConcurrency();
  const signal = options.signal;
  const includeIgnored = options.includeIgnored ?? false;

  let rules = options.ignore ?? IgnoreRules.empty();
  if (!includeIgnored) {
    rules = rules.withFileRules(
      await loadIgnoreFile(join(absoluteRoot, EXCLUDE_FILE), "")
    );
  }

  let frontier: PendingDirectory[] = [
    {
      absolutePath: absoluteRoot,
      relativePath: "",
      name: basename(absoluteRoot),
      stats: rootStats,
      symlink: rootIsLink,
      rules,
      ancestors: new Set([await realRoot(absoluteRoot, root, side)]),
    },
  ];

  while (frontier.length > 0) {
    signal?.throwIfAborted();

    const listings = await limitConcurrency(
      frontier.map((directory) => () => listDirectory(directory, includeIgnored)),
      limit,
      signal
    );

    const childTasks: Array<() => Promise<ChildResult>> = [];
    for (const listing of listings) {
      const { directory } = listing;

      if (listing.error !== undefined) {
        if (directory.relativePath === "") {
          throw new RootUnreadableError(side, root, listing.error);
        }
        entries.set(
          directory.relativePath,
          errorEntry(directory.relativePath, "directory", directory.stats, listing.error)
        );
        continue;
      }

      entries.set(
        directory.relativePath,
        directoryEntry(directory.relativePath, directory.name, directory.stats, directory.symlink)
      );

      for (const name of listing.names) {
        if (!includeIgnored && name === GIT_DIR) continue;
        childTasks.push(() => inspectChild(listing.directory, listing.rules, name));
      }
    }

    const children = await limitConcurrency(childTasks, limit, signal);

    const next: PendingDirectory[] = [];
    for (const child of children) {
      if (child.type === "entry") {
        entries.set(child.entry.relativePath, child.entry);
      } else if (child.type === "directory") {
        next.push(child.pending);
      }
    }
    frontier = next;
  }
}

interface DirectoryListing {
  directory: PendingDirectory;
  names: string[];
  /** Rules in effect for this directory's children. */
  rules: IgnoreRules;
  error?: string;
}

async function listDirectory(
  directory: PendingDirectory,
  includeIgnored: boolean
): Promise<DirectoryListing> {
  let names: string[];
  try {
    names = await readdir(directory.absolutePath);
  } catch (error) {
    return { directory, names: [], rules: directory.rules, error: describeError(error) };
  }
  names.sort();

  let rules = directory.rules;
  if (!includeIgnored && names.includes(GITIGNORE_FILE)) {
    rules = rules.withFileRules(
      await loadIgnoreFile(
        join(directory.absolutePath, GITIGNORE_FILE),
        directory.relativePath
      )
    );
  }

  return { directory, names, rules };
}

async function inspectChild(
  parent: PendingDirectory,
  rules: IgnoreRules,
  name: string
): Promise<ChildResult> {
  const absolutePath = join(parent.absolutePath, name);
  const relativePath = joinRelative(parent.relativePath, name);

  let linkStats: Stats;
  try {
    linkStats = await lstat(absolutePath);
  } catch (error) {
    // Vanished between readdir and lstat
    if (rules.isIgnored(relativePath, false)) return { type: "ignored" };
    return { type: "entry", entry: errorEntry(relativePath, "file", null, describeError(error)) };
  }

  const symlink = linkStats.isSymbolicLink();
  let stats: Stats;
  try {
    stats = symlink ? await stat(absolutePath) : linkStats;
  } catch (error) {
    if (rules.isIgnored(relativePath, false)) return { type: "ignored" };
    return {
      type: "entry",
      entry: {
        ...errorEntry(relativePath, "file", linkStats, `broken symbolic link (${describeError(error)})`),
        symlink: true,
      },
    };
  }

  const isDirectory = stats.isDirectory();
  if (rules.isIgnored(relativePath, isDirectory)) {
    return { type: "ignored" };
  }

  if (!isDirectory) {
    try {
      await access(absolutePath, constants.R_OK);
    } catch (error) {
      return { type: "entry", entry: errorEntry(relativePath, "file", stats, describeError(error)) };
    }
    return { type: "entry", entry: fileEntry(relativePath, name, stats, symlink) };
  }

  let real: string;
  try {
    real = await realpath(absolutePath);
  } catch (error) {
    return { type: "entry", entry: errorEntry(relativePath, "directory", stats, describeError(error)) };
  }
  if (parent.ancestors.has(real)) {
    return {
      type: "entry",
      entry: errorEntry(relativePath, "directory", stats, `symbolic link cycle back to ${real}`),
    };
  }

  return {
    type: "directory",
    pending: {
      absolutePath,
      relativePath,
      name,
      stats,
      symlink,
      rules,
      ancestors: new Set([...parent.ancestors, real]),
    },
  };
}

async function fingerprintAll(
  entries: Map<string, FileSystemEntry>,
  absoluteRoot: string,
  options: ScanOptions
): Promise<void> {
  const files = [...entries.values()].filter(
    (entry) => entry.kind === "file" && entry.error === undefined
  );

  const fingerprinted = await limitConcurrency(
    files.map((entry) => async (): Promise<FileSystemEntry> => {
      try {
        const path = entry.relativePath === "" ? absoluteRoot : join(absoluteRoot, entry.relativePath);
        return withFingerprint(entry, await fingerprintFile(path));
      } catch (error) {
        return { ...entry, error: { code: "EntryUnreadable", message: describeError(error) } };
      }
    }),
    options.concurrency ?? defaultConcurrency(),
    options.signal
  );

  for (const entry of fingerprinted) {
    entries.set(entry.relativePath, entry);
  }
}

function fileEntry(
  relativePath: string,
  name: string,
  stats: Stats,
  symlink: boolean
): FileSystemEntry {
  const entry: FileSystemEntry = {
    relativePath,
    name,
    kind: "file",
    size: stats.size,
    modifiedTime: stats.mtimeMs,
  };
  if (symlink) entry.symlink = true;
  return entry;
}

function directoryEntry(
  relativePath: string,
  name: string,
  stats: Stats,
  symlink: boolean
): FileSystemEntry {
  const entry: FileSystemEntry = {
    relativePath,
    name,
    kind: "directory",
    size: 0,
    modifiedTime: stats.mtimeMs,
  };
  if (symlink) entry.symlink = true;
  return entry;
}

function errorEntry(
  relativePath: string,
  kind: EntryKind,
  stats: Stats | null,
  message: string
): FileSystemEntry {
  return {
    relativePath,
    name: baseName(relativePath),
    kind,
    size: kind === "file" && stats ? stats.size : 0,
    modifiedTime: stats ? stats.mtimeMs : 0,
    error: { code: "EntryUnreadable", message },
  };
}

async function realRoot(absoluteRoot: string, root: string, side: Side): Promise<string> {
  try {
    return await realpath(absoluteRoot);
  } catch (error) {
    throw new RootUnreadableError(side, root, describeError(error));
  }
}

async function isSymlink(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch {
    return false;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
