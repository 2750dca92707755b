/**
 * Test fixtures: node builders and an in-process fake service that
 * records every action it receives.
 */

import type { GestureCallbacks } from "../src/actions/handler.js";
import type { AccessibilityNode, AccessibilityService, AppLauncher } from "../src/base.js";
import { StaticNode } from "../src/tree.js";
import type { GestureStroke, LaunchTarget, NodeAction, NodeActionArgs, NodeAttributes } from "../src/types.js";

// ---------------------------------------------------------------------------
// Node builders
// ---------------------------------------------------------------------------

export function makeNode(overrides: Partial<NodeAttributes> = {}, children: StaticNode[] = []): StaticNode {
  return StaticNode.create(overrides, children);
}

/** Node whose child at `hiddenIndex` cannot be retrieved. */
export class SparseNode extends StaticNode {
  private hiddenIndex: number;

  constructor(children: StaticNode[], hiddenIndex: number) {
    super(StaticNode.create().attributes);
    for (const child of children) this.appendChild(child);
    this.hiddenIndex = hiddenIndex;
  }

  override getChild(index: number): StaticNode | null {
    return index === this.hiddenIndex ? null : super.getChild(index);
  }
}

// ---------------------------------------------------------------------------
// Fake service
// ---------------------------------------------------------------------------

export type GestureOutcome = "completed" | "cancelled" | "rejected" | "pending";

export interface RecordedAction {
  node: AccessibilityNode;
  action: NodeAction;
  args?: NodeActionArgs;
}

export class FakeService implements AccessibilityService {
  /** Returned by getRoot; `roots`, when non-empty, is consumed first. */
  root: AccessibilityNode | null;
  roots: Array<AccessibilityNode | null> = [];
  rootCalls = 0;

  gestures: GestureStroke[] = [];
  gestureOutcome: GestureOutcome = "completed";
  pendingCallbacks: GestureCallbacks[] = [];

  actions: RecordedAction[] = [];
  /** Decides each action's outcome; accepts everything by default. */
  onAction: (node: AccessibilityNode, action: NodeAction, args?: NodeActionArgs) => boolean = () => true;

  clipboard: string | null = null;
  clipboardAvailable = true;

  constructor(root: AccessibilityNode | null = null) {
    this.root = root;
  }

  async getRoot(): Promise<AccessibilityNode | null> {
    this.rootCalls += 1;
    const next = this.roots.shift();
    return next !== undefined ? next : this.root;
  }

  dispatchGesture(stroke: GestureStroke, callbacks: GestureCallbacks): boolean {
    this.gestures.push(stroke);
    switch (this.gestureOutcome) {
      case "rejected":
        return false;
      case "pending":
        this.pendingCallbacks.push(callbacks);
        return true;
      case "completed":
        setTimeout(() => callbacks.onCompleted(), 0);
        return true;
      case "cancelled":
        setTimeout(() => callbacks.onCancelled(), 0);
        return true;
    }
  }

  async performAction(node: AccessibilityNode, action: NodeAction, args?: NodeActionArgs): Promise<boolean> {
    this.actions.push(args ? { node, action, args } : { node, action });
    return this.onAction(node, action, args);
  }

  getClipboardSetter(): ((text: string) => Promise<boolean>) | null {
    if (!this.clipboardAvailable) return null;
    return async (text) => {
      this.clipboard = text;
      return true;
    };
  }

  actionNames(): string[] {
    return this.actions.map((a) => a.action);
  }
}

// ---------------------------------------------------------------------------
// Fake launcher
// ---------------------------------------------------------------------------

export class FakeLauncher implements AppLauncher {
  installed = new Map<string, string>();
  started: LaunchTarget[] = [];
  startError: Error | null = null;

  async resolveLaunchTarget(packageName: string, activity: string | null): Promise<LaunchTarget | null> {
    const launcherActivity = this.installed.get(packageName);
    if (launcherActivity === undefined) return null;
    const cls = activity ?? launcherActivity;
    return { packageName, activity, component: `${packageName}/${cls}` };
  }

  async startActivity(target: LaunchTarget): Promise<void> {
    if (this.startError) throw this.startError;
    this.started.push(target);
  }
}

/** Fake monotonic clock whose sleep advances time instantly. */
export function fakeClock(start = 1000) {
  let now = start;
  return {
    now: () => now,
    sleep: async (ms: number) => {
      now += ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
  };
}
