/**
 * Core type definitions shared by the tree walker, the executor and the
 * command layer.
 */

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** Screen rectangle in device pixels, edges as Android reports them. */
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

// ---------------------------------------------------------------------------
// Node attributes
// ---------------------------------------------------------------------------

export interface NodeFlags {
  clickable: boolean;
  editable: boolean;
  focusable: boolean;
  focused: boolean;
  enabled: boolean;
}

/**
 * Read-only attribute view of one accessibility node. String fields are
 * `null` when the platform reports nothing.
 */
export interface NodeAttributes extends NodeFlags {
  text: string | null;
  description: string | null;
  hint: string | null;
  viewId: string | null;
  bounds: Rect;
}

// ---------------------------------------------------------------------------
// Node dump
// ---------------------------------------------------------------------------

/**
 * Immutable projection of a node at resolution time. Produced fresh for
 * every snapshot or find call; never reused across calls.
 */
export interface UiNodeDump extends NodeFlags {
  readonly path: string;
  readonly text: string | null;
  readonly description: string | null;
  readonly hint: string | null;
  readonly viewId: string | null;
  readonly bounds: Rect;
  readonly centerX: number;
  readonly centerY: number;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type NodeAction = "click" | "focus" | "setText" | "paste";

export interface NodeActionArgs {
  text?: string;
}

/** A single-point stroke held for `durationMs`. */
export interface GestureStroke {
  x: number;
  y: number;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// App launch
// ---------------------------------------------------------------------------

export interface LaunchTarget {
  packageName: string;
  /** Fully qualified activity class, or null to let the launcher intent decide. */
  activity: string | null;
  /** Component name as the platform prints it, e.g. `com.example/.MainActivity`. */
  component: string;
}

// ---------------------------------------------------------------------------
// Command responses
// ---------------------------------------------------------------------------

export type ErrorCode =
  | "INVALID_REQUEST"
  | "UNKNOWN_COMMAND"
  | "ACCESSIBILITY_DISABLED"
  | "APP_NOT_FOUND"
  | "APP_LAUNCH_FAILED"
  | "TAP_FAILED"
  | "TEXT_INPUT_FAILED"
  | "IME_PASTE_FAILED"
  | "UI_CLICK_FAILED"
  | "UI_NOT_FOUND"
  | "UI_WAIT_TIMEOUT";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface CommandSuccess {
  ok: true;
  payload: JsonObject;
}

export interface CommandFailure {
  ok: false;
  code: ErrorCode;
  message: string;
}

export type CommandResult = CommandSuccess | CommandFailure;

// ---------------------------------------------------------------------------
// Action result
// ---------------------------------------------------------------------------

export interface ActionResult {
  success: boolean;
  message: string;
  error?: string | null;
}
