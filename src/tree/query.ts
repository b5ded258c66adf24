/**
 * Read-only helpers over a built DiffTree.
 */

import { normalizeRelativePath } from "../core/paths.js";
import type { DiffNode, DiffStatus, DiffSummary, DiffTree } from "../core/types.js";

/**
 * Depth-first, pre-order traversal in child order.
 */
export function* walkTree(node: DiffNode): Generator<DiffNode> {
  yield node;
  for (const child of node.children) {
    yield* walkTree(child);
  }
}

/**
 * Find a node by relative path. Accepts "", ".", "./a/b" and backslashes.
 */
export function findNode(tree: DiffTree, relativePath: string): DiffNode | undefined {
  const target = normalizeRelativePath(relativePath);
  if (target === "") return tree.root;

  let current: DiffNode | undefined = tree.root;
  for (const segment of target.split("/")) {
    current = current.children.find((child) => child.name === segment);
    if (!current) return undefined;
  }
  return current;
}

/**
 * Index every node by relative path.
 */
export function indexTree(root: DiffNode): Map<string, DiffNode> {
  const index = new Map<string, DiffNode>();
  for (const node of walkTree(root)) {
    index.set(node.relativePath, node);
  }
  return index;
}

/**
 * Count non-directory nodes by status. Kind-mismatch nodes count as files.
 */
export function summarizeTree(root: DiffNode): DiffSummary {
  const summary: DiffSummary = {
    totalFiles: 0,
    added: 0,
    removed: 0,
    modified: 0,
    unchanged: 0,
    conflicted: 0,
    errors: 0,
  };

  for (const node of walkTree(root)) {
    if (node.error) summary.errors++;
    if (node.kind === "directory") continue;

    summary.totalFiles++;
    summary[node.status]++;
  }

  return summary;
}

/**
 * Nodes whose own status is not unchanged, or that carry an error.
 */
export function isChanged(node: DiffNode): boolean {
  return node.status !== "unchanged" || node.error !== undefined;
}

/**
 * Whether a node or anything below it has a change worth showing.
 */
export function hasChanges(node: DiffNode): boolean {
  if (isChanged(node)) return true;
  return node.children.some(hasChanges);
}

/**
 * Relative paths of all nodes with the given status, in traversal order.
 */
export function pathsWithStatus(root: DiffNode, status: DiffStatus): string[] {
  const paths: string[] = [];
  for (const node of walkTree(root)) {
    if (node.status === status) paths.push(node.relativePath);
  }
  return paths;
}
