/**
 * Hunk construction from edit runs, and the helpers that read hunks back.
 */

import type {
  DiffHunk,
  DiffStats,
  HunkOperation,
  LineRange,
  Side,
} from "../core/types.js";
import type { EditRun } from "./myers.js";

/**
 * Group runs into hunks. Each equal run is one hunk; the changed runs between
 * two equal runs become one insert, one delete, or, when both sides changed,
 * one replace.
 */
export function buildHunks(
  runs: readonly EditRun[],
  leftLines: readonly string[],
  rightLines: readonly string[]
): DiffHunk[] {
  const hunks: DiffHunk[] = [];
  let pending: { leftStart: number; leftEnd: number; rightStart: number; rightEnd: number } | null = null;

  const flush = (): void => {
    if (!pending) return;
    const leftCount = pending.leftEnd - pending.leftStart;
    const rightCount = pending.rightEnd - pending.rightStart;
    const operation: HunkOperation =
      leftCount > 0 && rightCount > 0 ? "replace" : leftCount > 0 ? "delete" : "insert";
    hunks.push(
      createHunk(
        operation,
        leftLines.slice(pending.leftStart, pending.leftEnd),
        pending.leftStart,
        rightLines.slice(pending.rightStart, pending.rightEnd),
        pending.rightStart
      )
    );
    pending = null;
  };

  for (const run of runs) {
    if (run.type === "equal") {
      flush();
      hunks.push(
        createHunk(
          "equal",
          leftLines.slice(run.leftStart, run.leftStart + run.leftCount),
          run.leftStart,
          rightLines.slice(run.rightStart, run.rightStart + run.rightCount),
          run.rightStart
        )
      );
      continue;
    }

    if (!pending) {
      pending = {
        leftStart: run.leftStart,
        leftEnd: run.leftStart,
        rightStart: run.rightStart,
        rightEnd: run.rightStart,
      };
    }
    pending.leftEnd += run.leftCount;
    pending.rightEnd += run.rightCount;
  }
  flush();

  return hunks;
}

/**
 * Build a hunk from 0-based starts. Ranges on the hunk are 1-based and
 * inclusive; a side with no lines gets a null range.
 */
export function createHunk(
  operation: HunkOperation,
  leftLines: string[],
  leftStart: number,
  rightLines: string[],
  rightStart: number
): DiffHunk {
  return {
    operation,
    leftRange: toRange(leftStart, leftLines.length),
    rightRange: toRange(rightStart, rightLines.length),
    leftLines,
    rightLines,
  };
}

function toRange(start: number, count: number): LineRange | null {
  if (count === 0) return null;
  return { start: start + 1, end: start + count };
}

export function computeStats(hunks: readonly DiffHunk[]): DiffStats {
  const stats: DiffStats = { additions: 0, deletions: 0, unchanged: 0 };
  for (const hunk of hunks) {
    if (hunk.operation === "equal") {
      stats.unchanged += hunk.leftLines.length;
    } else {
      stats.additions += hunk.rightLines.length;
      stats.deletions += hunk.leftLines.length;
    }
  }
  return stats;
}

/**
 * Concatenate one side's lines across all hunks.
 */
export function sideLines(hunks: readonly DiffHunk[], side: Side): string[] {
  return hunks.flatMap((hunk) => (side === "left" ? hunk.leftLines : hunk.rightLines));
}

/**
 * Rebuild one side's exact text from hunks.
 */
export function reconstructText(
  hunks: readonly DiffHunk[],
  side: Side,
  endsWithNewline: boolean
): string {
  const lines = sideLines(hunks, side);
  if (lines.length === 0) return "";
  return lines.join("\n") + (endsWithNewline ? "\n" : "");
}
