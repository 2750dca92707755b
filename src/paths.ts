/**
 * Node path addressing.
 *
 * A path is the list of child indices from the root, rendered as
 * `r/0/3/1`. The bare marker `r` addresses the root. Paths are only
 * meaningful against the tree they were read from; after the UI changes,
 * re-resolve by query instead.
 */

import type { AccessibilityNode } from "./base.js";

export const ROOT_PATH = "r";

export function formatPath(indices: readonly number[]): string {
  return indices.length === 0 ? ROOT_PATH : `${ROOT_PATH}/${indices.join("/")}`;
}

export function childPath(parentPath: string, index: number): string {
  return `${parentPath}/${index}`;
}

/**
 * Decode a path into child indices. Returns null if any segment is not a
 * non-negative integer.
 */
export function parsePath(path: string): number[] | null {
  let rest = path.trim();
  if (rest === ROOT_PATH) return [];
  if (rest.startsWith(`${ROOT_PATH}/`)) rest = rest.slice(ROOT_PATH.length + 1);

  const indices: number[] = [];
  for (const segment of rest.split("/")) {
    if (segment === "") continue;
    if (!/^\d+$/.test(segment)) return null;
    indices.push(Number.parseInt(segment, 10));
  }
  return indices;
}

export function resolvePath(root: AccessibilityNode, path: string): AccessibilityNode | null {
  const indices = parsePath(path);
  if (indices === null) return null;

  let current = root;
  for (const index of indices) {
    if (index >= current.childCount) return null;
    const child = current.getChild(index);
    if (!child) return null;
    current = child;
  }
  return current;
}
