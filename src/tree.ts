/**
 * In-memory accessibility node, used for parsed uiautomator dumps.
 */

import type { AccessibilityNode } from "./base.js";
import type { NodeAttributes } from "./types.js";

export function defaultAttributes(overrides: Partial<NodeAttributes> = {}): NodeAttributes {
  return {
    text: null,
    description: null,
    hint: null,
    viewId: null,
    bounds: { left: 0, top: 0, right: 0, bottom: 0 },
    clickable: false,
    editable: false,
    focusable: false,
    focused: false,
    enabled: true,
    ...overrides,
  };
}

export class StaticNode implements AccessibilityNode {
  readonly attributes: NodeAttributes;
  /** Widget class as the platform reports it, e.g. `android.widget.EditText`. */
  readonly className: string;
  private readonly children: StaticNode[] = [];
  private parent: StaticNode | null = null;

  constructor(attributes: NodeAttributes, className = "") {
    this.attributes = attributes;
    this.className = className;
  }

  static create(
    overrides: Partial<NodeAttributes> = {},
    children: StaticNode[] = [],
    className = "",
  ): StaticNode {
    const node = new StaticNode(defaultAttributes(overrides), className);
    for (const child of children) node.appendChild(child);
    return node;
  }

  appendChild(child: StaticNode): void {
    child.parent = this;
    this.children.push(child);
  }

  get childCount(): number {
    return this.children.length;
  }

  getChild(index: number): StaticNode | null {
    return this.children[index] ?? null;
  }

  getParent(): StaticNode | null {
    return this.parent;
  }

  getAttributes(): NodeAttributes {
    return this.attributes;
  }
}
