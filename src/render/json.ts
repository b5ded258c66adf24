/**
 * JSON renderers.
 */

import type { DiffTree, FileDiff } from "../core/types.js";

export const SCHEMA_VERSION = "1.0";

export interface TreeOutput {
  schemaVersion: typeof SCHEMA_VERSION;
  tree: DiffTree;
}

export interface FileDiffOutput {
  schemaVersion: typeof SCHEMA_VERSION;
  fileDiff: FileDiff;
}

/**
 * Render a DiffTree as JSON output.
 */
export function renderTreeJson(tree: DiffTree, pretty: boolean = true): string {
  const output: TreeOutput = { schemaVersion: SCHEMA_VERSION, tree };
  return JSON.stringify(output, null, pretty ? 2 : undefined);
}

/**
 * Render one file's line diff as JSON output.
 */
export function renderFileDiffJson(fileDiff: FileDiff, pretty: boolean = true): string {
  const output: FileDiffOutput = { schemaVersion: SCHEMA_VERSION, fileDiff };
  return JSON.stringify(output, null, pretty ? 2 : undefined);
}
