/**
 * Resolution of the node that should receive text input or a paste.
 *
 * Order, first success wins:
 *
 *   1. the node that currently holds input focus, if it is editable
 *   2. with a query, the first node matching it:
 *        - editable: focus it, then click it (some IMEs only show on tap)
 *        - otherwise: click it or its nearest clickable ancestor, re-read
 *          the tree, then look for newly focused input, then for an
 *          editable descendant of the node now at the match's path
 *   3. the first editable node anywhere in the latest tree, depth-first
 */

import type { ActionDispatcher } from "./actions/handler.js";
import type { AccessibilityNode, TreeSnapshotSource } from "./base.js";
import type { Logger } from "./log.js";
import { silentLogger } from "./log.js";
import { resolvePath } from "./paths.js";
import { findFirstMatch, normalizeQuery } from "./search.js";
import { findDepthFirst } from "./walk.js";

function isEditable(node: AccessibilityNode): boolean {
  return node.getAttributes().editable;
}

/** The focused node, if it is editable. */
export function findFocusedEditable(root: AccessibilityNode | null): AccessibilityNode | null {
  const focused = findDepthFirst(root, (node) => node.getAttributes().focused);
  return focused && isEditable(focused) ? focused : null;
}

export function findFirstEditable(node: AccessibilityNode | null): AccessibilityNode | null {
  return findDepthFirst(node, isEditable);
}

/**
 * Click `node`, or failing that the closest ancestor that is clickable and
 * accepts the click. Returns false once the ancestors run out.
 */
export async function clickSelfOrAncestor(
  dispatcher: ActionDispatcher,
  node: AccessibilityNode,
): Promise<boolean> {
  let current: AccessibilityNode | null = node;
  while (current) {
    if (current.getAttributes().clickable && (await dispatcher.performAction(current, "click"))) {
      return true;
    }
    current = current.getParent();
  }
  return false;
}

export async function resolveEditableTarget(
  source: TreeSnapshotSource,
  dispatcher: ActionDispatcher,
  query?: string | null,
  log: Logger = silentLogger,
): Promise<AccessibilityNode | null> {
  const root = await source.getRoot();
  if (!root) return null;

  const focused = findFocusedEditable(root);
  if (focused) {
    log.debug("editable target: focused input");
    return focused;
  }

  let current = root;
  const normalized = normalizeQuery(query);
  if (normalized) {
    const match = findFirstMatch(root, normalized);
    if (match) {
      if (isEditable(match.node)) {
        await dispatcher.performAction(match.node, "focus");
        await dispatcher.performAction(match.node, "click");
        log.debug(`editable target: query match at ${match.path}`);
        return match.node;
      }

      await clickSelfOrAncestor(dispatcher, match.node);
      // The click may have opened or replaced the input; read the tree again.
      current = (await source.getRoot()) ?? root;
      const refocused = findFocusedEditable(current);
      if (refocused) {
        log.debug(`editable target: input focused after clicking ${match.path}`);
        return refocused;
      }

      const descendant = findFirstEditable(resolvePath(current, match.path));
      if (descendant) {
        log.debug(`editable target: editable descendant of ${match.path}`);
        return descendant;
      }
    }
  }

  const fallback = findFirstEditable(current);
  if (fallback) log.debug("editable target: first editable node");
  return fallback;
}
