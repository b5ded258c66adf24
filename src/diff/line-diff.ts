/**
 * Line diff of two texts.
 */

import type { DiffHunk, DiffStats, TextSide } from "../core/types.js";
import { buildHunks, computeStats } from "./hunks.js";
import { internLines, splitLines } from "./lines.js";
import { computeEditScript, type EditScriptOptions } from "./myers.js";

export type DiffOptions = EditScriptOptions;

export interface LineDiff {
  left: TextSide;
  right: TextSide;
  hunks: DiffHunk[];
  stats: DiffStats;
}

/**
 * Align two texts line by line.
 *
 * Concatenating the hunks' left lines gives back the left text's lines, and
 * the same for the right; `reconstructText` restores the exact text.
 */
export function diffLines(
  leftText: string,
  rightText: string,
  options: DiffOptions = {}
): LineDiff {
  const left = splitLines(leftText);
  const right = splitLines(rightText);
  const tokens = internLines(left, right);

  const runs = computeEditScript(tokens.left, tokens.right, options);
  const hunks = buildHunks(runs, left.lines, right.lines);

  return {
    left: { lineCount: left.lines.length, endsWithNewline: left.endsWithNewline },
    right: { lineCount: right.lines.length, endsWithNewline: right.endsWithNewline },
    hunks,
    stats: computeStats(hunks),
  };
}
