/**
 * Line diff for one node of a DiffTree.
 *
 * Binary content is refused: callers get a BinaryContentError, never hunks.
 */

import { readFile } from "node:fs/promises";
import {
  BinaryContentError,
  describeError,
  EntryUnreadableError,
  FileTooLargeError,
  NotAFilePairError,
} from "../core/errors.js";
import { debug } from "../core/logger.js";
import type {
  DiffNode,
  FileDiff,
  FileSystemEntry,
  Side,
} from "../core/types.js";
import { decodeText } from "../scan/content.js";
import { absolutePath } from "../tree/matcher.js";
import { diffLines, type DiffOptions } from "./line-diff.js";

/** Largest side, in bytes, that is read into memory for a line diff. */
export const MAX_DIFF_FILE_SIZE = 256 * 1024 * 1024;

const TOO_LARGE_CODES = new Set(["ERR_FS_FILE_TOO_LARGE", "ERR_STRING_TOO_LONG"]);

export interface FilePairRoots {
  leftRoot: string;
  rightRoot: string;
}

/**
 * Compute the line diff of a file node. A side the node does not have is
 * treated as empty, so added files diff as pure inserts and removed files as
 * pure deletes.
 */
export async function diffFilePair(
  node: DiffNode,
  roots: FilePairRoots,
  options: DiffOptions = {}
): Promise<FileDiff> {
  if (node.kind !== "file") {
    throw new NotAFilePairError(node.relativePath);
  }

  const [leftText, rightText] = await Promise.all([
    readSideText(node.left, roots.leftRoot, "left", node.relativePath),
    readSideText(node.right, roots.rightRoot, "right", node.relativePath),
  ]);

  const diff = diffLines(leftText ?? "", rightText ?? "", options);
  debug(
    `Diffed ${node.relativePath || "root"}: ${diff.hunks.length} hunks, ` +
      `+${diff.stats.additions} -${diff.stats.deletions}`
  );

  return {
    relativePath: node.relativePath,
    status: node.status,
    left: leftText === null ? null : diff.left,
    right: rightText === null ? null : diff.right,
    hunks: diff.hunks,
    stats: diff.stats,
  };
}

/**
 * Read and decode one side. Returns null when the side has no entry.
 */
async function readSideText(
  entry: FileSystemEntry | undefined,
  root: string,
  side: Side,
  relativePath: string
): Promise<string | null> {
  if (!entry) return null;
  if (entry.error) {
    throw new EntryUnreadableError(relativePath, side, entry.error.message);
  }

  if (entry.size > MAX_DIFF_FILE_SIZE) {
    throw new FileTooLargeError(relativePath, side, entry.size, MAX_DIFF_FILE_SIZE);
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(absolutePath(root, entry));
  } catch (error) {
    // The file may have grown since the scan
    if (isTooLargeError(error)) {
      throw new FileTooLargeError(relativePath, side, entry.size, MAX_DIFF_FILE_SIZE);
    }
    throw new EntryUnreadableError(relativePath, side, describeError(error));
  }

  const text = decodeText(bytes);
  if (text === null) {
    throw new BinaryContentError(relativePath, side);
  }
  return text;
}

function isTooLargeError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    TOO_LARGE_CODES.has(error.code)
  );
}
