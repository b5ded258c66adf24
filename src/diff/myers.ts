/**
 * Myers' O(ND) shortest edit script over integer token sequences.
 *
 * Common prefix and suffix are trimmed before the search. The search keeps
 * one snapshot of the furthest-reaching frontier per edit distance, holding
 * only the diagonals that distance can reach, and backtracks through them.
 * Ties prefer deletions, so the same inputs always give the same script.
 */

export type EditType = "equal" | "insert" | "delete";

/**
 * A run of consecutive operations of one type. Indexes are 0-based; counts
 * are 0 on the side the operation does not touch.
 */
export interface EditRun {
  type: EditType;
  leftStart: number;
  leftCount: number;
  rightStart: number;
  rightCount: number;
}

export interface EditScriptOptions {
  /**
   * Edit distance above which the changed middle is emitted as one
   * delete-all plus insert-all block instead of a minimal script.
   */
  maxEditCost?: number;
}

export const DEFAULT_MAX_EDIT_COST = 4096;

interface Frontier {
  /** Furthest x on diagonals -d..d, indexed by k + d. */
  xs: Int32Array;
  d: number;
}

/**
 * Compute the edit script from `a` to `b` as merged runs.
 */
export function computeEditScript(
  a: ArrayLike<number>,
  b: ArrayLike<number>,
  options: EditScriptOptions = {}
): EditRun[] {
  const maxEditCost = options.maxEditCost ?? DEFAULT_MAX_EDIT_COST;
  const runs: EditRun[] = [];

  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  pushRun(runs, "equal", 0, 0, prefix);

  const leftEnd = a.length - suffix;
  const rightEnd = b.length - suffix;
  const middle = searchMiddle(a, prefix, leftEnd, b, prefix, rightEnd, maxEditCost);
  for (const run of middle) {
    appendRun(runs, run);
  }

  pushRun(runs, "equal", leftEnd, rightEnd, suffix);
  return runs;
}

/**
 * Myers search over a[aStart..aEnd) and b[bStart..bEnd).
 */
function searchMiddle(
  a: ArrayLike<number>,
  aStart: number,
  aEnd: number,
  b: ArrayLike<number>,
  bStart: number,
  bEnd: number,
  maxEditCost: number
): EditRun[] {
  const n = aEnd - aStart;
  const m = bEnd - bStart;

  if (n === 0 && m === 0) return [];
  if (n === 0) return [run("insert", aStart, 0, bStart, m)];
  if (m === 0) return [run("delete", aStart, n, bStart, 0)];

  const max = n + m;
  const offset = max + 1;
  const v = new Int32Array(2 * max + 3);
  const trace: Frontier[] = [];

  for (let d = 0; d <= max; d++) {
    if (d > maxEditCost) {
      return [run("delete", aStart, n, bStart, 0), run("insert", aEnd, 0, bStart, m)];
    }

    trace.push({ xs: v.slice(offset - d, offset + d + 1), d });

    for (let k = -d; k <= d; k += 2) {
      let x: number;
      if (k === -d || (k !== d && (v[offset + k - 1] ?? 0) < (v[offset + k + 1] ?? 0))) {
        x = v[offset + k + 1] ?? 0;
      } else {
        x = (v[offset + k - 1] ?? 0) + 1;
      }
      let y = x - k;
      while (x < n && y < m && a[aStart + x] === b[bStart + y]) {
        x++;
        y++;
      }
      v[offset + k] = x;

      if (x >= n && y >= m) {
        return backtrack(trace, n, m, aStart, bStart);
      }
    }
  }

  // Unreachable: d = n + m always reaches the corner
  return [run("delete", aStart, n, bStart, 0), run("insert", aEnd, 0, bStart, m)];
}

function backtrack(
  trace: Frontier[],
  n: number,
  m: number,
  aStart: number,
  bStart: number
): EditRun[] {
  const reversed: EditRun[] = [];
  let x = n;
  let y = m;

  for (let index = trace.length - 1; index >= 0; index--) {
    const frontier = trace[index];
    if (!frontier) continue;
    const { d, xs } = frontier;

    if (d === 0) {
      // Pure diagonal back to the origin
      prependRun(reversed, "equal", aStart, bStart, x);
      break;
    }

    const k = x - y;
    const at = (diagonal: number): number => xs[diagonal + d] ?? 0;
    const prevK = k === -d || (k !== d && at(k - 1) < at(k + 1)) ? k + 1 : k - 1;
    const prevX = at(prevK);
    const prevY = prevX - prevK;

    const snake = x - (prevK === k + 1 ? prevX : prevX + 1);
    prependRun(reversed, "equal", aStart + x - snake, bStart + y - snake, snake);

    if (prevK === k + 1) {
      prependRun(reversed, "insert", aStart + prevX, bStart + prevY, 1);
    } else {
      prependRun(reversed, "delete", aStart + prevX, bStart + prevY, 1);
    }

    x = prevX;
    y = prevY;
  }

  return reversed.reverse();
}

function run(
  type: EditType,
  leftStart: number,
  leftCount: number,
  rightStart: number,
  rightCount: number
): EditRun {
  return { type, leftStart, leftCount, rightStart, rightCount };
}

function pushRun(
  runs: EditRun[],
  type: EditType,
  leftStart: number,
  rightStart: number,
  count: number
): void {
  if (count <= 0) return;
  appendRun(runs, spanRun(type, leftStart, rightStart, count));
}

/**
 * Add a run to a reversed list, merging it with the previously added
 * (later in the file) run when both have the same type.
 */
function prependRun(
  reversed: EditRun[],
  type: EditType,
  leftStart: number,
  rightStart: number,
  count: number
): void {
  if (count <= 0) return;
  const next = spanRun(type, leftStart, rightStart, count);
  const last = reversed[reversed.length - 1];
  if (last && last.type === type) {
    last.leftStart = next.leftStart;
    last.rightStart = next.rightStart;
    last.leftCount += next.leftCount;
    last.rightCount += next.rightCount;
    return;
  }
  reversed.push(next);
}

function appendRun(runs: EditRun[], next: EditRun): void {
  if (next.leftCount === 0 && next.rightCount === 0) return;
  const last = runs[runs.length - 1];
  if (last && last.type === next.type) {
    last.leftCount += next.leftCount;
    last.rightCount += next.rightCount;
    return;
  }
  runs.push({ ...next });
}

function spanRun(
  type: EditType,
  leftStart: number,
  rightStart: number,
  count: number
): EditRun {
  return {
    type,
    leftStart,
    leftCount: type === "insert" ? 0 : count,
    rightStart,
    rightCount: type === "delete" ? 0 : count,
  };
}
