/**
 * Tree traversal helpers.
 */

import type { AccessibilityNode } from "./base.js";
import { childPath, ROOT_PATH } from "./paths.js";

export interface VisitedNode {
  node: AccessibilityNode;
  path: string;
}

/**
 * Breadth-first walk from `root`, yielding each node with its path.
 * Children that cannot be retrieved are skipped along with their subtree.
 */
export function* walkBreadthFirst(root: AccessibilityNode): Generator<VisitedNode> {
  const queue: VisitedNode[] = [{ node: root, path: ROOT_PATH }];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];
    yield current;

    const { node, path } = current;
    for (let i = 0; i < node.childCount; i++) {
      const child = node.getChild(i);
      if (child) queue.push({ node: child, path: childPath(path, i) });
    }
  }
}

/**
 * Depth-first pre-order search: a node is tested before its children.
 */
export function findDepthFirst(
  node: AccessibilityNode | null,
  predicate: (node: AccessibilityNode) => boolean,
): AccessibilityNode | null {
  if (!node) return null;
  if (predicate(node)) return node;
  for (let i = 0; i < node.childCount; i++) {
    const found = findDepthFirst(node.getChild(i), predicate);
    if (found) return found;
  }
  return null;
}
