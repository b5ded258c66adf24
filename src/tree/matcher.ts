/**
 * Tree matcher: merges two scans into one DiffTree.
 *
 * Status rules per relative path:
 * - only left: removed; only right: added (content never inspected)
 * - both directories: unchanged, whatever their children hold
 * - kinds differ: conflicted
 * - both files: unchanged when contents are equal, otherwise modified when
 *   both sides are text or both binary, conflicted when one side is text and
 *   the other binary, or when a side cannot be read
 */

import { join } from "node:path";
import { defaultConcurrency, limitConcurrency } from "../core/concurrency.js";
import { describeError } from "../core/errors.js";
import { debug, startTimer } from "../core/logger.js";
import { compareNames, parentOf } from "../core/paths.js";
import type {
  ContentType,
  DiffNode,
  DiffStatus,
  DiffTree,
  FileSystemEntry,
  FingerprintMode,
  NodeError,
  ScanResult,
  Side,
} from "../core/types.js";
import { probeFile } from "../scan/content.js";
import { fingerprintFile, withFingerprint } from "../scan/fingerprint.js";
import { summarizeTree } from "./query.js";

export interface MatchOptions {
  /**
   * "auto": equal size and equal mtime count as equal content; hash only
   * same-size pairs whose mtimes differ. "always": never trust mtimes.
   */
  fingerprint?: FingerprintMode;
  concurrency?: number;
  signal?: AbortSignal;
}

export interface Classification {
  status: DiffStatus;
  left?: FileSystemEntry;
  right?: FileSystemEntry;
  contentType?: ContentType;
  error?: NodeError;
}

export interface FilePairContext {
  leftRoot: string;
  rightRoot: string;
  mode: FingerprintMode;
}

/**
 * Merge two scans. Waits for nothing itself: both scans must be complete.
 */
export async function matchTrees(
  left: ScanResult,
  right: ScanResult,
  options: MatchOptions = {}
): Promise<DiffTree> {
  const stopTimer = startTimer("Matched trees");
  const context: FilePairContext = {
    leftRoot: left.root,
    rightRoot: right.root,
    mode: options.fingerprint ?? "auto",
  };

  const paths = [...new Set([...left.entries.keys(), ...right.entries.keys()])];
  const classified = new Map<string, Classification>();
  const pending: Array<() => Promise<void>> = [];

  for (const path of paths) {
    const leftEntry = left.entries.get(path);
    const rightEntry = right.entries.get(path);

    if (leftEntry && rightEntry && leftEntry.kind === "file" && rightEntry.kind === "file") {
      pending.push(async () => {
        classified.set(path, await classifyFilePair(leftEntry, rightEntry, context));
      });
    } else {
      classified.set(path, classifyStructural(leftEntry, rightEntry));
    }
  }

  debug(`Comparing ${pending.length} file pairs present on both sides`);
  await limitConcurrency(
    pending,
    options.concurrency ?? defaultConcurrency(),
    options.signal
  );

  const root = buildTree(classified);
  stopTimer();

  return deepFreeze({
    root,
    leftRoot: left.root,
    rightRoot: right.root,
    leftScannedAt: left.scannedAt,
    rightScannedAt: right.scannedAt,
    summary: summarizeTree(root),
  });
}

/**
 * Classify everything except a file present on both sides.
 */
export function classifyStructural(
  left: FileSystemEntry | undefined,
  right: FileSystemEntry | undefined
): Classification {
  if (left && !right) return { status: "removed", left };
  if (right && !left) return { status: "added", right };
  if (!left || !right) {
    throw new Error("classifyStructural needs at least one entry");
  }

  if (left.kind !== right.kind) {
    return { status: "conflicted", left, right };
  }
  // An unreadable directory keeps its structural status; createNode attaches
  // the entry error
  return { status: "unchanged", left, right };
}

/**
 * Classify a file present on both sides, computing fingerprints and probing
 * content only as far as the decision needs.
 */
export async function classifyFilePair(
  left: FileSystemEntry,
  right: FileSystemEntry,
  context: FilePairContext
): Promise<Classification> {
  const unreadable = firstEntryError(left, right);
  if (unreadable) {
    return { status: "conflicted", left, right, error: unreadable };
  }

  if (left.size === right.size) {
    if (
      context.mode === "auto" &&
      left.fingerprint === undefined &&
      right.fingerprint === undefined &&
      left.modifiedTime === right.modifiedTime
    ) {
      return { status: "unchanged", left, right };
    }

    try {
      [left, right] = await Promise.all([
        onSide("left", () => ensureFingerprint(left, context.leftRoot)),
        onSide("right", () => ensureFingerprint(right, context.rightRoot)),
      ]);
    } catch (error) {
      return unreadablePair(left, right, error);
    }

    if (left.fingerprint === right.fingerprint) {
      return { status: "unchanged", left, right };
    }
  }

  let leftContent: "text" | "binary";
  let rightContent: "text" | "binary";
  try {
    [leftContent, rightContent] = await Promise.all([
      onSide("left", () => probeFile(absolutePath(context.leftRoot, left))),
      onSide("right", () => probeFile(absolutePath(context.rightRoot, right))),
    ]);
  } catch (error) {
    return unreadablePair(left, right, error);
  }

  if (leftContent === rightContent) {
    return { status: "modified", left, right, contentType: leftContent };
  }

  const binarySide: Side = leftContent === "binary" ? "left" : "right";
  return {
    status: "conflicted",
    left,
    right,
    contentType: "mixed",
    error: {
      code: "DecodeInconsistent",
      side: binarySide,
      message: `${binarySide} side is binary, the other side is text`,
    },
  };
}

function firstEntryError(
  left: FileSystemEntry,
  right: FileSystemEntry
): NodeError | undefined {
  if (left.error) {
    return { code: "EntryUnreadable", side: "left", message: left.error.message };
  }
  if (right.error) {
    return { code: "EntryUnreadable", side: "right", message: right.error.message };
  }
  return undefined;
}

function unreadablePair(
  left: FileSystemEntry,
  right: FileSystemEntry,
  error: unknown
): Classification {
  const nodeError: NodeError =
    error instanceof SideReadError
      ? { code: "EntryUnreadable", side: error.side, message: error.message }
      : { code: "EntryUnreadable", message: describeError(error) };
  return { status: "conflicted", left, right, error: nodeError };
}

class SideReadError extends Error {
  constructor(
    public readonly side: Side,
    reason: unknown
  ) {
    super(describeError(reason));
    this.name = "SideReadError";
  }
}

/**
 * Tag a read failure with the side it happened on.
 */
async function onSide<T>(side: Side, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    throw new SideReadError(side, error);
  }
}

async function ensureFingerprint(
  entry: FileSystemEntry,
  root: string
): Promise<FileSystemEntry> {
  if (entry.fingerprint !== undefined) return entry;
  return withFingerprint(entry, await fingerprintFile(absolutePath(root, entry)));
}

export function absolutePath(root: string, entry: FileSystemEntry): string {
  return entry.relativePath === "" ? root : join(root, entry.relativePath);
}

/**
 * Assemble classified paths into nodes. Every path's parent is itself a
 * classified path, since a scan records every directory it descends into.
 */
function buildTree(classified: Map<string, Classification>): DiffNode {
  const nodes = new Map<string, DiffNode>();
  for (const [path, classification] of classified) {
    nodes.set(path, createNode(path, classification));
  }

  for (const [path, node] of nodes) {
    const parentPath = parentOf(path);
    if (parentPath === null) continue;
    const parent = nodes.get(parentPath);
    if (!parent) {
      throw new Error(`Entry ${path} has no parent entry ${parentPath}`);
    }
    parent.children.push(node);
  }

  for (const node of nodes.values()) {
    node.children.sort((a, b) => compareNames(a.name, b.name));
  }

  const root = nodes.get("");
  if (!root) {
    throw new Error("Neither scan contains a root entry");
  }
  return root;
}

/**
 * Construct a node, enforcing the side/status invariant.
 */
export function createNode(relativePath: string, classification: Classification): DiffNode {
  const { status, left, right } = classification;
  const source = right ?? left;
  if (!source) {
    throw new Error(`Node ${relativePath} has neither a left nor a right entry`);
  }
  if ((status === "added") !== (left === undefined) || (status === "removed") !== (right === undefined)) {
    throw new Error(`Node ${relativePath} has status ${status} inconsistent with its entries`);
  }

  const kind = left && right && left.kind !== right.kind ? "mixed" : source.kind;
  const node: DiffNode = {
    relativePath,
    name: source.name,
    kind,
    status,
    children: [],
  };
  if (left) node.left = left;
  if (right) node.right = right;
  if (classification.contentType) node.contentType = classification.contentType;

  const error = classification.error ?? entryOnlyError(left, right);
  if (error) node.error = error;
  return node;
}

/**
 * Single-sided or structural nodes still surface an unreadable entry.
 */
function entryOnlyError(
  left: FileSystemEntry | undefined,
  right: FileSystemEntry | undefined
): NodeError | undefined {
  if (left?.error) return { code: "EntryUnreadable", side: "left", message: left.error.message };
  if (right?.error) return { code: "EntryUnreadable", side: "right", message: right.error.message };
  return undefined;
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
