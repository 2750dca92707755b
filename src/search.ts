/**
 * Lexical query matching over a live accessibility tree.
 *
 * Scoring is additive: each text field that contains the query adds its
 * weight, and a node that matched at all gains actionability bonuses.
 * Visible text weighs most, then description, hint and view id.
 */

import type { AccessibilityNode } from "./base.js";
import { dumpNode } from "./format.js";
import type { NodeAttributes, UiNodeDump } from "./types.js";
import { walkBreadthFirst } from "./walk.js";

// ---------------------------------------------------------------------------
// Weights
// ---------------------------------------------------------------------------

export const TEXT_WEIGHTS = {
  text: 100,
  description: 80,
  hint: 60,
  viewId: 40,
} as const;

export const ACTION_BONUSES = {
  editable: 15,
  clickable: 10,
  enabled: 5,
} as const;

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

/** Trim and lowercase a raw query. Returns null for a blank query. */
export function normalizeQuery(query: string | null | undefined): string | null {
  const normalized = (query ?? "").trim().toLowerCase();
  return normalized.length > 0 ? normalized : null;
}

function contains(value: string | null, normalizedQuery: string): boolean {
  if (value == null) return false;
  const trimmed = value.trim();
  if (trimmed.length === 0) return false;
  return trimmed.toLowerCase().includes(normalizedQuery);
}

export function scoreAttributes(attrs: NodeAttributes, normalizedQuery: string): number {
  let score = 0;
  for (const field of ["text", "description", "hint", "viewId"] as const) {
    if (contains(attrs[field], normalizedQuery)) score += TEXT_WEIGHTS[field];
  }
  if (score === 0) return 0;

  if (attrs.editable) score += ACTION_BONUSES.editable;
  if (attrs.clickable) score += ACTION_BONUSES.clickable;
  if (attrs.enabled) score += ACTION_BONUSES.enabled;
  return score;
}

/**
 * Score one node against a query that is already trimmed, lowercased and
 * non-empty. Zero means "no match".
 */
export function scoreNode(node: AccessibilityNode, normalizedQuery: string): number {
  return scoreAttributes(node.getAttributes(), normalizedQuery);
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

export interface ScoredCandidate {
  score: number;
  node: AccessibilityNode;
  path: string;
}

/**
 * Best-scoring node over the whole tree. Every node is visited, since a
 * deeper node may outscore a shallow one; on equal scores the node seen
 * first in breadth-first order is kept.
 */
export function findBestCandidate(
  root: AccessibilityNode | null,
  normalizedQuery: string,
): ScoredCandidate | null {
  if (!root) return null;

  let best: ScoredCandidate | null = null;
  for (const { node, path } of walkBreadthFirst(root)) {
    const score = scoreNode(node, normalizedQuery);
    if (score > 0 && (best === null || score > best.score)) {
      best = { score, node, path };
    }
  }
  return best;
}

export function findBest(root: AccessibilityNode | null, normalizedQuery: string): UiNodeDump | null {
  const best = findBestCandidate(root, normalizedQuery);
  return best ? dumpNode(best.node, best.path) : null;
}

/**
 * First node in breadth-first order that matches at all. Used where any
 * match will do, such as picking an input target.
 */
export function findFirstMatch(
  root: AccessibilityNode | null,
  normalizedQuery: string,
): ScoredCandidate | null {
  if (!root) return null;

  for (const { node, path } of walkBreadthFirst(root)) {
    const score = scoreNode(node, normalizedQuery);
    if (score > 0) return { score, node, path };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/** The first `maxNodes` nodes (at least one) in level order. */
export function snapshot(root: AccessibilityNode | null, maxNodes: number): UiNodeDump[] {
  if (!root) return [];

  const limit = Math.max(1, Math.floor(maxNodes));
  const nodes: UiNodeDump[] = [];
  for (const { node, path } of walkBreadthFirst(root)) {
    nodes.push(dumpNode(node, path));
    if (nodes.length >= limit) break;
  }
  return nodes;
}
