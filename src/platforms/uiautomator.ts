/**
 * Parser for `uiautomator dump` XML.
 *
 * A dump looks like:
 *
 *   <hierarchy rotation="0">
 *     <node index="0" text="" resource-id="" class="android.widget.FrameLayout"
 *           content-desc="" clickable="false" enabled="true" focusable="false"
 *           focused="false" bounds="[0,0][1080,2400]">
 *       <node ... />
 *     </node>
 *   </hierarchy>
 *
 * uiautomator does not report editability, so it is inferred from the
 * widget class.
 */

import { XMLParser } from "fast-xml-parser";

import { parseBounds } from "../format.js";
import { StaticNode } from "../tree.js";
import type { NodeAttributes, Rect } from "../types.js";

const EDITABLE_CLASS_RE = /(EditText|AutoCompleteTextView|SearchAutoComplete)$/;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseAttributeValue: false,
  isArray: (name) => name === "node",
});

type XmlElement = Record<string, unknown>;

function asElement(value: unknown): XmlElement | null {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

function childElements(element: XmlElement): XmlElement[] {
  const nodes = element.node;
  if (!Array.isArray(nodes)) return [];
  return nodes.map(asElement).filter((e): e is XmlElement => e !== null);
}

function attr(element: XmlElement, name: string): string | null {
  const value = element[`@_${name}`];
  if (typeof value !== "string" || value.length === 0) return null;
  return value;
}

function flag(element: XmlElement, name: string): boolean {
  return attr(element, name) === "true";
}

export function isEditableClass(className: string): boolean {
  return EDITABLE_CLASS_RE.test(className);
}

function toNode(element: XmlElement): StaticNode {
  const className = attr(element, "class") ?? "";
  const bounds = parseBounds(attr(element, "bounds") ?? "") ?? { left: 0, top: 0, right: 0, bottom: 0 };
  const attributes: NodeAttributes = {
    text: attr(element, "text"),
    description: attr(element, "content-desc"),
    hint: attr(element, "hint"),
    viewId: attr(element, "resource-id"),
    bounds,
    clickable: flag(element, "clickable"),
    editable: isEditableClass(className),
    focusable: flag(element, "focusable"),
    focused: flag(element, "focused"),
    enabled: flag(element, "enabled"),
  };

  const node = new StaticNode(attributes, className);
  for (const child of childElements(element)) {
    node.appendChild(toNode(child));
  }
  return node;
}

function unionBounds(nodes: StaticNode[]): Rect {
  const all = nodes.map((n) => n.attributes.bounds);
  return {
    left: Math.min(...all.map((b) => b.left)),
    top: Math.min(...all.map((b) => b.top)),
    right: Math.max(...all.map((b) => b.right)),
    bottom: Math.max(...all.map((b) => b.bottom)),
  };
}

/**
 * Parse a dump into a node tree. Returns null when the document has no
 * nodes. Dumps with several top-level windows get a synthetic container
 * root spanning all of them.
 */
export function parseUiAutomatorXml(xml: string): StaticNode | null {
  if (xml.trim().length === 0) return null;
  const document = asElement(parser.parse(xml));
  const hierarchy = document ? asElement(document.hierarchy) : null;
  if (!hierarchy) return null;

  const tops = childElements(hierarchy).map(toNode);
  if (tops.length === 0) return null;
  if (tops.length === 1) return tops[0];

  const root = StaticNode.create({ bounds: unionBounds(tops) });
  for (const top of tops) root.appendChild(top);
  return root;
}
