/**
 * Node dump projection and serializers: JSON fields for command
 * responses and a compact one-line text form for the CLI and MCP tools.
 */

import type { AccessibilityNode } from "./base.js";
import type { JsonObject, Rect, UiNodeDump } from "./types.js";

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** `[left,top][right,bottom]`, the notation uiautomator uses. */
export function formatBounds(bounds: Rect): string {
  return `[${bounds.left},${bounds.top}][${bounds.right},${bounds.bottom}]`;
}

const BOUNDS_RE = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

export function parseBounds(value: string): Rect | null {
  const match = value.trim().match(BOUNDS_RE);
  if (!match) return null;
  return {
    left: Number.parseInt(match[1], 10),
    top: Number.parseInt(match[2], 10),
    right: Number.parseInt(match[3], 10),
    bottom: Number.parseInt(match[4], 10),
  };
}

/** Integer center, rounded down like `Rect.centerX()` / `centerY()`. */
export function centerOf(bounds: Rect): { x: number; y: number } {
  return {
    x: (bounds.left + bounds.right) >> 1,
    y: (bounds.top + bounds.bottom) >> 1,
  };
}

// ---------------------------------------------------------------------------
// Dump
// ---------------------------------------------------------------------------

function nonBlank(value: string | null): string | null {
  return value != null && value.length > 0 ? value : null;
}

export function dumpNode(node: AccessibilityNode, path: string): UiNodeDump {
  const attrs = node.getAttributes();
  const center = centerOf(attrs.bounds);
  return Object.freeze({
    path,
    text: nonBlank(attrs.text),
    description: nonBlank(attrs.description),
    hint: nonBlank(attrs.hint),
    viewId: nonBlank(attrs.viewId),
    bounds: Object.freeze({ ...attrs.bounds }),
    centerX: center.x,
    centerY: center.y,
    clickable: attrs.clickable,
    editable: attrs.editable,
    focusable: attrs.focusable,
    focused: attrs.focused,
    enabled: attrs.enabled,
  });
}

// ---------------------------------------------------------------------------
// JSON projection
// ---------------------------------------------------------------------------

function putOptionalStrings(target: JsonObject, dump: UiNodeDump): void {
  if (dump.text) target.text = dump.text;
  if (dump.description) target.description = dump.description;
  if (dump.hint) target.hint = dump.hint;
  if (dump.viewId) target.viewId = dump.viewId;
}

/** Full node entry as it appears in `ui.snapshot` results. */
export function dumpToJson(dump: UiNodeDump): JsonObject {
  const out: JsonObject = { path: dump.path };
  putOptionalStrings(out, dump);
  out.bounds = formatBounds(dump.bounds);
  out.centerX = dump.centerX;
  out.centerY = dump.centerY;
  out.clickable = dump.clickable;
  out.editable = dump.editable;
  out.focusable = dump.focusable;
  out.focused = dump.focused;
  out.enabled = dump.enabled;
  return out;
}

/** Match fields for `ui.find`: no focusable/focused/enabled. */
export function matchToJson(dump: UiNodeDump): JsonObject {
  const out: JsonObject = { path: dump.path };
  putOptionalStrings(out, dump);
  out.bounds = formatBounds(dump.bounds);
  out.centerX = dump.centerX;
  out.centerY = dump.centerY;
  out.clickable = dump.clickable;
  out.editable = dump.editable;
  return out;
}

// ---------------------------------------------------------------------------
// Compact text
// ---------------------------------------------------------------------------

function quote(value: string, max: number): string {
  let truncated = value.length > max ? value.slice(0, max) + "..." : value;
  truncated = truncated.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, " ");
  return `"${truncated}"`;
}

const FLAG_NAMES = ["clickable", "editable", "focusable", "focused"] as const;

/**
 * One-line summary of a node:
 *
 *     [r/0/2] "Search" desc="Search button" @540,1800 {clickable,focusable}
 */
export function formatLine(dump: UiNodeDump): string {
  const parts = [`[${dump.path}]`];

  if (dump.text) parts.push(quote(dump.text, 80));
  if (dump.description) parts.push(`desc=${quote(dump.description, 60)}`);
  if (dump.hint) parts.push(`hint=${quote(dump.hint, 40)}`);
  if (dump.viewId) parts.push(`id=${dump.viewId}`);

  parts.push(`@${dump.centerX},${dump.centerY}`);

  const flags: string[] = FLAG_NAMES.filter((name) => dump[name]);
  if (!dump.enabled) flags.push("disabled");
  if (flags.length > 0) parts.push("{" + flags.join(",") + "}");

  return parts.join(" ");
}

export function serializeCompact(dumps: readonly UiNodeDump[]): string {
  const lines = [`# ${dumps.length} node${dumps.length !== 1 ? "s" : ""}`, ""];
  for (const dump of dumps) {
    lines.push(formatLine(dump));
  }
  return lines.join("\n") + "\n";
}
