/**
 * Terminal renderer: summary box, status tree and side-by-side file view.
 * No emojis - plain text with color highlighting.
 */

import chalk from "chalk";
import boxen from "boxen";
import Table from "cli-table3";
import type {
  DiffHunk,
  DiffNode,
  DiffStatus,
  DiffTree,
  FileDiff,
} from "../core/types.js";
import { hasChanges } from "../tree/query.js";

/**
 * Color scheme for terminal output.
 */
const colors = {
  // Node status
  added: chalk.green,
  removed: chalk.red,
  modified: chalk.yellow,
  unchanged: chalk.white,
  conflicted: chalk.magenta,

  // Line diff
  lineAdded: chalk.green,
  lineDeleted: chalk.red,
  lineNumber: chalk.dim,

  // UI elements
  header: chalk.magenta.bold,
  label: chalk.gray,
  muted: chalk.dim,
  error: chalk.red,
};

/**
 * One-character marker per status, shown before each tree entry.
 */
export const STATUS_ICONS: Record<DiffStatus, string> = {
  added: "+",
  removed: "-",
  modified: "~",
  unchanged: " ",
  conflicted: "!",
};

/**
 * Unicode box-drawing characters for table rendering.
 */
const TABLE_CHARS = {
  top: "─",
  "top-mid": "┬",
  "top-left": "┌",
  "top-right": "┐",
  bottom: "─",
  "bottom-mid": "┴",
  "bottom-left": "└",
  "bottom-right": "┘",
  left: "│",
  "left-mid": "├",
  mid: "─",
  "mid-mid": "┼",
  right: "│",
  "right-mid": "┤",
  middle: "│",
};

export interface TreeRenderOptions {
  /** Hide unchanged nodes whose subtree has no changes. */
  changedOnly?: boolean;
}

export interface FileDiffRenderOptions {
  /** Unchanged lines kept around each change; Infinity shows everything. */
  context?: number;
  /** Truncate each side's text to this many characters. */
  maxLineWidth?: number;
}

function statusColor(status: DiffStatus): (text: string) => string {
  return colors[status];
}

/**
 * Render the summary box.
 */
export function renderSummary(tree: DiffTree): string {
  const { summary } = tree;
  const lines = [
    `${colors.label("Left:")}  ${tree.leftRoot}`,
    `${colors.label("Right:")} ${tree.rightRoot}`,
    `${colors.label("Files:")} ${summary.totalFiles} ` +
      colors.muted(
        `(${colors.added(`+${summary.added}`)} ${colors.removed(`-${summary.removed}`)} ` +
          `${colors.modified(`~${summary.modified}`)} ${colors.conflicted(`!${summary.conflicted}`)})`
      ),
  ];
  if (summary.errors > 0) {
    lines.push(`${colors.label("Errors:")} ${colors.error(String(summary.errors))}`);
  }

  return boxen(lines.join("\n"), {
    title: "Summary",
    titleAlignment: "left",
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderColor: "cyan",
    borderStyle: "round",
  });
}

/**
 * Annotation appended to a tree line for errors and binary content.
 */
export function describeNodeNote(node: DiffNode): string | null {
  if (node.error?.code === "EntryUnreadable") {
    const side = node.error.side ? `${node.error.side} ` : "";
    return `[${side}unreadable: ${node.error.message}]`;
  }
  if (node.error?.code === "DecodeInconsistent") {
    return "[text vs binary]";
  }
  if (node.kind === "mixed") {
    return `[${node.left?.kind ?? "?"} vs ${node.right?.kind ?? "?"}]`;
  }
  if (node.contentType === "binary") {
    return "[binary]";
  }
  return null;
}

function formatNodeLine(node: DiffNode, label: string): string {
  const color = statusColor(node.status);
  const suffix = node.kind === "directory" ? "/" : "";
  const note = describeNodeNote(node);
  const text = color(`${STATUS_ICONS[node.status]} ${label}${suffix}`);
  return note ? `${text} ${colors.error(note)}` : text;
}

/**
 * Render the tree with box-drawing connectors, one node per line.
 */
export function renderTree(tree: DiffTree, options: TreeRenderOptions = {}): string {
  const lines: string[] = [formatNodeLine(tree.root, tree.root.name)];

  const visit = (node: DiffNode, prefix: string): void => {
    const children = options.changedOnly
      ? node.children.filter(hasChanges)
      : node.children;

    children.forEach((child, index) => {
      const last = index === children.length - 1;
      lines.push(`${colors.muted(prefix + (last ? "└── " : "├── "))}${formatNodeLine(child, child.name)}`);
      visit(child, prefix + (last ? "    " : "│   "));
    });
  };
  visit(tree.root, "");

  if (options.changedOnly && lines.length === 1 && !hasChanges(tree.root)) {
    lines.push(colors.muted("No differences."));
  }
  return lines.join("\n");
}

interface SideBySideRow {
  leftNumber: number | null;
  leftText: string | null;
  rightNumber: number | null;
  rightText: string | null;
  operation: DiffHunk["operation"];
}

/**
 * Pair up hunk lines row by row for side-by-side display.
 */
export function toSideBySideRows(hunk: DiffHunk): SideBySideRow[] {
  const rows: SideBySideRow[] = [];
  const count = Math.max(hunk.leftLines.length, hunk.rightLines.length);
  for (let i = 0; i < count; i++) {
    const leftText = hunk.leftLines[i];
    const rightText = hunk.rightLines[i];
    rows.push({
      leftNumber: leftText !== undefined && hunk.leftRange ? hunk.leftRange.start + i : null,
      leftText: leftText ?? null,
      rightNumber: rightText !== undefined && hunk.rightRange ? hunk.rightRange.start + i : null,
      rightText: rightText ?? null,
      operation: hunk.operation,
    });
  }
  return rows;
}

function truncate(text: string, width: number): string {
  if (text.length <= width) return text;
  return `${text.slice(0, Math.max(0, width - 1))}…`;
}

/**
 * Render a file diff as a side-by-side table. Long unchanged stretches are
 * folded down to `context` lines on each side of a change.
 */
export function renderFileDiff(diff: FileDiff, options: FileDiffRenderOptions = {}): string {
  const context = options.context ?? 3;
  const maxLineWidth = options.maxLineWidth ?? 60;

  const header = `${colors.header(diff.relativePath || "(root)")} ` +
    colors.muted(`${diff.status}, +${diff.stats.additions} -${diff.stats.deletions}`);

  if (diff.hunks.length === 0) {
    return `${header}\n${colors.muted("Both sides are empty.")}`;
  }

  const table = new Table({
    head: [
      colors.label("#"),
      colors.label(diff.left ? "Left" : "Left (absent)"),
      colors.label("#"),
      colors.label(diff.right ? "Right" : "Right (absent)"),
    ],
    style: {
      head: [],
      border: ["dim"],
    },
    chars: TABLE_CHARS,
  });

  const pushRow = (row: SideBySideRow): void => {
    const leftColor =
      row.operation === "equal" ? (text: string) => text : colors.lineDeleted;
    const rightColor =
      row.operation === "equal" ? (text: string) => text : colors.lineAdded;
    table.push([
      colors.lineNumber(row.leftNumber === null ? "" : String(row.leftNumber)),
      row.leftText === null ? "" : leftColor(truncate(row.leftText, maxLineWidth)),
      colors.lineNumber(row.rightNumber === null ? "" : String(row.rightNumber)),
      row.rightText === null ? "" : rightColor(truncate(row.rightText, maxLineWidth)),
    ]);
  };

  diff.hunks.forEach((hunk, index) => {
    const rows = toSideBySideRows(hunk);
    if (hunk.operation !== "equal") {
      rows.forEach(pushRow);
      return;
    }

    const keepBefore = index === 0 ? 0 : context;
    const keepAfter = index === diff.hunks.length - 1 ? 0 : context;
    if (rows.length <= keepBefore + keepAfter || diff.hunks.length === 1) {
      rows.forEach(pushRow);
      return;
    }

    rows.slice(0, keepBefore).forEach(pushRow);
    const folded = rows.length - keepBefore - keepAfter;
    table.push([
      { colSpan: 4, content: colors.muted(`⋯ ${folded} unchanged line${folded === 1 ? "" : "s"}`) },
    ]);
    rows.slice(rows.length - keepAfter).forEach(pushRow);
  });

  return `${header}\n${table.toString()}`;
}

/**
 * Full terminal report for a comparison.
 */
export function renderReport(tree: DiffTree, options: TreeRenderOptions = {}): string {
  let output = "\n";
  output += renderSummary(tree);
  output += "\n\n";
  output += renderTree(tree, options);
  output += "\n";
  return output;
}
