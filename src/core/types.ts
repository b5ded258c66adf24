/**
 * Core types for diffy comparisons.
 *
 * Everything here is plain data so a DiffTree or FileDiff can be handed to
 * JSON.stringify without any conversion step.
 */

// ============================================================================
// Scan Types
// ============================================================================

export type EntryKind = "file" | "directory";

export interface EntryError {
  code: "EntryUnreadable";
  message: string;
}

/**
 * One side's view of one path.
 */
export interface FileSystemEntry {
  /** Slash-separated path relative to the root. The root itself is "". */
  relativePath: string;
  name: string;
  kind: EntryKind;
  /** Bytes. Directories report 0. */
  size: number;
  /** Epoch milliseconds. */
  modifiedTime: number;
  /** Truncated SHA-256 of the content. Files only, once computed. */
  fingerprint?: string;
  /** Set when the path is a symbolic link that was followed. */
  symlink?: boolean;
  error?: EntryError;
}

export type FingerprintMode = "auto" | "always";

export interface ScanResult {
  /** Absolute root path. */
  root: string;
  rootKind: EntryKind;
  entries: ReadonlyMap<string, FileSystemEntry>;
  /** ISO timestamp of when the scan started. */
  scannedAt: string;
}

// ============================================================================
// Tree Types
// ============================================================================

export type DiffStatus =
  | "added"
  | "removed"
  | "modified"
  | "unchanged"
  | "conflicted";

export type NodeKind = EntryKind | "mixed";

export type ContentType = "text" | "binary" | "mixed";

export type Side = "left" | "right";

export interface NodeError {
  code: "EntryUnreadable" | "DecodeInconsistent";
  side?: Side;
  message: string;
}

export interface DiffNode {
  relativePath: string;
  name: string;
  kind: NodeKind;
  status: DiffStatus;
  left?: FileSystemEntry;
  right?: FileSystemEntry;
  /** Sorted by name. Empty for files. */
  children: DiffNode[];
  contentType?: ContentType;
  error?: NodeError;
}

export interface DiffSummary {
  totalFiles: number;
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
  conflicted: number;
  errors: number;
}

export interface DiffTree {
  root: DiffNode;
  leftRoot: string;
  rightRoot: string;
  leftScannedAt: string;
  rightScannedAt: string;
  summary: DiffSummary;
}

// ============================================================================
// Line Diff Types
// ============================================================================

export type HunkOperation = "equal" | "insert" | "delete" | "replace";

/** 1-indexed, inclusive on both ends. */
export interface LineRange {
  start: number;
  end: number;
}

export interface DiffHunk {
  operation: HunkOperation;
  /** null for insert. */
  leftRange: LineRange | null;
  /** null for delete. */
  rightRange: LineRange | null;
  leftLines: string[];
  rightLines: string[];
}

export interface TextSide {
  lineCount: number;
  endsWithNewline: boolean;
}

export interface DiffStats {
  additions: number;
  deletions: number;
  unchanged: number;
}

export interface FileDiff {
  relativePath: string;
  status: DiffStatus;
  /** null when the file does not exist on that side. */
  left: TextSide | null;
  right: TextSide | null;
  hunks: DiffHunk[];
  stats: DiffStats;
}
