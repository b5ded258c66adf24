/**
 * Line splitting and token interning for the line diff.
 */

export interface SplitText {
  /** Lines without their "\n" terminator. A "\r" stays part of the line. */
  lines: string[];
  endsWithNewline: boolean;
}

/**
 * Split text on "\n". A final terminator does not produce an extra empty
 * line; "" has no lines at all.
 */
export function splitLines(text: string): SplitText {
  if (text === "") {
    return { lines: [], endsWithNewline: false };
  }

  const lines = text.split("\n");
  const endsWithNewline = text.endsWith("\n");
  if (endsWithNewline) lines.pop();
  return { lines, endsWithNewline };
}

/**
 * Map both sides' lines to integer ids so the alignment compares numbers.
 *
 * The last line of a side without a trailing newline gets a distinct id
 * from the same text with a terminator, so "a\n" against "a" is a change on
 * that line rather than a silent match.
 */
export function internLines(
  left: SplitText,
  right: SplitText
): { left: Int32Array; right: Int32Array } {
  const ids = new Map<string, number>();

  const encode = (side: SplitText): Int32Array => {
    const tokens = new Int32Array(side.lines.length);
    side.lines.forEach((line, index) => {
      const terminated = side.endsWithNewline || index < side.lines.length - 1;
      const key = terminated ? `${line}\n` : line;
      let id = ids.get(key);
      if (id === undefined) {
        id = ids.size;
        ids.set(key, id);
      }
      tokens[index] = id;
    });
    return tokens;
  };

  return { left: encode(left), right: encode(right) };
}
