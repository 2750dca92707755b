/**
 * Capability interfaces the host platform implements.
 *
 * The core never owns nodes: it holds references only for the duration of
 * a single traversal or resolution pass, and re-fetches the root on every
 * operation.
 */

import type { ActionDispatcher } from "./actions/handler.js";
import type { LaunchTarget, NodeAttributes } from "./types.js";

/**
 * One element of a live accessibility tree.
 *
 * `getChild` may return null for a child that is hidden or has been
 * invalidated since the parent was read; traversals skip such children.
 */
export interface AccessibilityNode {
  readonly childCount: number;
  getChild(index: number): AccessibilityNode | null;
  getParent(): AccessibilityNode | null;
  getAttributes(): NodeAttributes;
}

/** Supplies the current root of the foreground UI tree, or null when unavailable. */
export interface TreeSnapshotSource {
  getRoot(): Promise<AccessibilityNode | null>;
}

/**
 * Everything the resolution and action layer needs from a connected
 * accessibility service.
 */
export interface AccessibilityService extends TreeSnapshotSource, ActionDispatcher {}

/**
 * Resolves and starts app activities. Independent of the accessibility
 * service: launching works while the service is disconnected.
 */
export interface AppLauncher {
  /** Return null when the package has no launchable activity. */
  resolveLaunchTarget(packageName: string, activity: string | null): Promise<LaunchTarget | null>;

  /** Throws when the platform refuses to start the activity. */
  startActivity(target: LaunchTarget): Promise<void>;
}
