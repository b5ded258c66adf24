/**
 * End-to-end comparison scenarios and session behavior.
 */

import { join } from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { compare, ComparisonSession } from "../src/compare/session.js";
import {
  BinaryContentError,
  FileTooLargeError,
  NodeNotFoundError,
  NotAFilePairError,
  RootNotFoundError,
  ScanAbortedError,
} from "../src/core/errors.js";
import { configureLogger, resetLogger } from "../src/core/logger.js";
import { MAX_DIFF_FILE_SIZE } from "../src/diff/file-diff.js";
import { reconstructText } from "../src/diff/hunks.js";
import { findNode, walkTree } from "../src/tree/query.js";
import { createTestPair, type FileMap, type TestPair } from "./helpers/fs.js";

beforeAll(() => {
  configureLogger({ quiet: true });
});

afterAll(() => {
  resetLogger();
});

describe("compare", () => {
  let pair: TestPair;

  async function comparePair(left: FileMap, right: FileMap): Promise<ComparisonSession> {
    pair = await createTestPair(left, right);
    return compare(pair.left.path, pair.right.path);
  }

  afterEach(async () => {
    await pair.cleanup();
  });

  it("should report an appended line as one insert hunk", async () => {
    const session = await comparePair({ "a.txt": "hello\n" }, { "a.txt": "hello\nworld\n" });

    expect(session.getNode("a.txt")?.status).toBe("modified");
    const diff = await session.getFileDiff("a.txt");

    expect(diff.status).toBe("modified");
    expect(diff.hunks).toEqual([
      {
        operation: "equal",
        leftRange: { start: 1, end: 1 },
        rightRange: { start: 1, end: 1 },
        leftLines: ["hello"],
        rightLines: ["hello"],
      },
      {
        operation: "insert",
        leftRange: null,
        rightRange: { start: 2, end: 2 },
        leftLines: [],
        rightLines: ["world"],
      },
    ]);
  });

  it("should split disjoint trees into removed and added", async () => {
    const session = await comparePair({ "l1.txt": "1\n", "l/2.txt": "2\n" }, { "r1.txt": "1\n" });
    const { summary } = session.tree;

    expect(summary).toEqual({
      totalFiles: 3,
      added: 1,
      removed: 2,
      modified: 0,
      unchanged: 0,
      conflicted: 0,
      errors: 0,
    });
    expect(findNode(session.tree, "l")?.status).toBe("removed");
  });

  it("should leave identical trees unchanged without computing any diff", async () => {
    const files = { "a.txt": "x\n", "b/c.txt": "y\n" };
    const session = await comparePair(files, files);

    for (const node of walkTree(session.tree.root)) {
      expect(node.status).toBe("unchanged");
    }
    expect(session.cachedDiffCount).toBe(0);
  });

  it("should give no hunks for two empty files", async () => {
    const session = await comparePair({ "empty.txt": "" }, { "empty.txt": "" });

    expect(session.getNode("empty.txt")?.status).toBe("unchanged");
    const diff = await session.getFileDiff("empty.txt");
    expect(diff.hunks).toEqual([]);
    expect(diff.left).toEqual({ lineCount: 0, endsWithNewline: false });
  });

  it("should give only inserts for an empty file against a non-empty one", async () => {
    const session = await comparePair({ "f.txt": "" }, { "f.txt": "a\nb\n" });

    expect(session.getNode("f.txt")?.status).toBe("modified");
    const diff = await session.getFileDiff("f.txt");
    expect(diff.hunks.map((hunk) => hunk.operation)).toEqual(["insert"]);
    expect(diff.stats).toEqual({ additions: 2, deletions: 0, unchanged: 0 });
  });

  it("should diff an added file as all inserts with an absent left side", async () => {
    const session = await comparePair({}, { "new.txt": "one\n" });

    const diff = await session.getFileDiff("new.txt");
    expect(diff.status).toBe("added");
    expect(diff.left).toBeNull();
    expect(diff.right).toEqual({ lineCount: 1, endsWithNewline: true });
    expect(diff.hunks.map((hunk) => hunk.operation)).toEqual(["insert"]);
  });

  it("should refuse to diff a binary file", async () => {
    const session = await comparePair({}, { "logo.bin": Uint8Array.from([0x00, 0x01, 0x02]) });

    expect(session.getNode("logo.bin")?.status).toBe("added");
    await expect(session.getFileDiff("logo.bin")).rejects.toBeInstanceOf(BinaryContentError);
    await expect(session.getFileDiff("logo.bin")).rejects.toThrow(
      "Cannot compute a line diff for logo.bin: right side is binary"
    );
  });

  it("should refuse to diff a file above the size limit", async () => {
    const head = "text line\n".repeat(1000);
    pair = await createTestPair({ "big.txt": head }, { "big.txt": head });
    await pair.right.grow("big.txt", MAX_DIFF_FILE_SIZE + 1);
    const session = await compare(pair.left.path, pair.right.path);

    expect(session.getNode("big.txt")?.status).toBe("modified");
    await expect(session.getFileDiff("big.txt")).rejects.toBeInstanceOf(FileTooLargeError);
    await expect(session.getFileDiff("big.txt")).rejects.toThrow(
      `Cannot compute a line diff for big.txt: right side is ${MAX_DIFF_FILE_SIZE + 1} bytes, ` +
        `the limit is ${MAX_DIFF_FILE_SIZE}`
    );
  }, 60_000);

  it("should reject unknown paths and directories", async () => {
    const session = await comparePair({ "dir/a.txt": "a\n" }, { "dir/a.txt": "a\n" });

    await expect(session.getFileDiff("missing.txt")).rejects.toBeInstanceOf(NodeNotFoundError);
    await expect(session.getFileDiff("missing.txt")).rejects.toThrow(
      "No entry at missing.txt in either tree"
    );
    await expect(session.getFileDiff("dir")).rejects.toBeInstanceOf(NotAFilePairError);
  });

  it("should reconstruct both files from the hunks", async () => {
    const left = "alpha\nbeta\ngamma\ndelta";
    const right = "alpha\nBETA\ngamma\ndelta\nepsilon\n";
    const session = await comparePair({ "g.txt": left }, { "g.txt": right });

    const diff = await session.getFileDiff("g.txt");
    expect(reconstructText(diff.hunks, "left", diff.left?.endsWithNewline ?? false)).toBe(left);
    expect(reconstructText(diff.hunks, "right", diff.right?.endsWithNewline ?? false)).toBe(right);
  });

  it("should apply explicit ignore patterns to both sides", async () => {
    pair = await createTestPair({ "a.log": "1\n", "a.txt": "x\n" }, { "b.log": "2\n", "a.txt": "x\n" });

    const session = await compare(pair.left.path, pair.right.path, { ignorePatterns: ["*.log"] });

    expect(session.tree.root.children.map((child) => child.name)).toEqual(["a.txt"]);
  });

  it("should give the same tree on repeated comparisons", async () => {
    const session = await comparePair({ "a.txt": "1\n", "b/c.txt": "2\n" }, { "a.txt": "1\n2\n" });
    const again = await compare(pair.left.path, pair.right.path);

    expect(again.tree.root).toEqual(session.tree.root);
    expect(again.tree.summary).toEqual(session.tree.summary);
  });

  it("should reject a missing root", async () => {
    pair = await createTestPair({}, {});

    await expect(compare(join(pair.left.path, "missing"), pair.right.path)).rejects.toBeInstanceOf(
      RootNotFoundError
    );
  });

  it("should reject with ScanAbortedError when aborted", async () => {
    pair = await createTestPair({ "a.txt": "a\n" }, { "a.txt": "b\n" });
    const controller = new AbortController();
    controller.abort();

    await expect(
      compare(pair.left.path, pair.right.path, { signal: controller.signal })
    ).rejects.toBeInstanceOf(ScanAbortedError);
  });
});

describe("ComparisonSession", () => {
  let pair: TestPair;
  let session: ComparisonSession;

  beforeAll(async () => {
    pair = await createTestPair(
      { "a.txt": "1\n", "bin.dat": Uint8Array.from([0x00]) },
      { "a.txt": "2\n", "bin.dat": Uint8Array.from([0x00, 0x00]) }
    );
    session = await compare(pair.left.path, pair.right.path);
  });

  afterAll(async () => {
    await pair.cleanup();
  });

  afterEach(() => {
    session.clearCache();
  });

  it("should return the same pending result for equivalent paths", () => {
    const first = session.getFileDiff("a.txt");
    const second = session.getFileDiff("./a.txt");

    expect(second).toBe(first);
    expect(session.cachedDiffCount).toBe(1);
  });

  it("should not keep failed computations", async () => {
    await expect(session.getFileDiff("bin.dat")).rejects.toBeInstanceOf(BinaryContentError);

    expect(session.cachedDiffCount).toBe(0);
  });

  it("should look nodes up by normalized path", () => {
    expect(session.getNode(".")?.relativePath).toBe("");
    expect(session.getNode("./a.txt")?.relativePath).toBe("a.txt");
    expect(session.getNode("nope")).toBeUndefined();
  });
});
