/**
 * JSON renderer tests.
 */

import { describe, expect, it } from "vitest";
import type { FileDiff } from "../src/core/types.js";
import { renderFileDiffJson, renderTreeJson, SCHEMA_VERSION } from "../src/render/json.js";
import { sampleTree } from "./helpers/tree.js";

describe("renderTreeJson", () => {
  it("should wrap the tree with a schema version", () => {
    const tree = sampleTree();
    const parsed: unknown = JSON.parse(renderTreeJson(tree));

    expect(parsed).toEqual({ schemaVersion: SCHEMA_VERSION, tree });
  });

  it("should keep the nested node shape", () => {
    const parsed = JSON.parse(renderTreeJson(sampleTree()));

    expect(parsed.tree.root.children[0]).toMatchObject({
      relativePath: "docs",
      kind: "directory",
      status: "removed",
    });
    expect(parsed.tree.root.children[0].right).toBeUndefined();
    expect(parsed.tree.summary.totalFiles).toBe(4);
  });

  it("should pretty-print by default and compact on request", () => {
    const tree = sampleTree();

    expect(renderTreeJson(tree)).toContain('\n  "schemaVersion": "1.0"');
    expect(renderTreeJson(tree, false).startsWith('{"schemaVersion":"1.0","tree":{')).toBe(true);
  });
});

describe("renderFileDiffJson", () => {
  it("should serialize null ranges and absent sides", () => {
    const fileDiff: FileDiff = {
      relativePath: "new.txt",
      status: "added",
      left: null,
      right: { lineCount: 1, endsWithNewline: true },
      hunks: [
        {
          operation: "insert",
          leftRange: null,
          rightRange: { start: 1, end: 1 },
          leftLines: [],
          rightLines: ["hello"],
        },
      ],
      stats: { additions: 1, deletions: 0, unchanged: 0 },
    };

    expect(renderFileDiffJson(fileDiff, false)).toBe(
      '{"schemaVersion":"1.0","fileDiff":{"relativePath":"new.txt","status":"added","left":null,' +
        '"right":{"lineCount":1,"endsWithNewline":true},"hunks":[{"operation":"insert",' +
        '"leftRange":null,"rightRange":{"start":1,"end":1},"leftLines":[],"rightLines":["hello"]}],' +
        '"stats":{"additions":1,"deletions":0,"unchanged":0}}}'
    );
  });
});
