/**
 * Platform action primitives consumed by the executor.
 */

import type { AccessibilityNode } from "../base.js";
import type { GestureStroke, NodeAction, NodeActionArgs } from "../types.js";

export interface GestureCallbacks {
  onCompleted(): void;
  onCancelled(): void;
}

/**
 * Interface for platform-specific action execution.
 *
 * Gestures are asynchronous at the platform boundary: `dispatchGesture`
 * only reports whether the gesture was accepted, and exactly one of the
 * callbacks fires later with the outcome.
 */
export interface ActionDispatcher {
  dispatchGesture(stroke: GestureStroke, callbacks: GestureCallbacks): boolean;

  performAction(
    node: AccessibilityNode,
    action: NodeAction,
    args?: NodeActionArgs,
  ): Promise<boolean>;

  /** Null when the platform clipboard is not reachable. */
  getClipboardSetter(): ((text: string) => Promise<boolean>) | null;
}
