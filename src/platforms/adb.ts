/**
 * Android Debug Bridge host: drives a connected device or emulator.
 *
 * Uses:
 *   - `uiautomator dump` for the UI tree (re-read on every getRoot call)
 *   - `input swipe` / `input tap` / `input text` / `input keyevent` for actions
 *   - `cmd package resolve-activity` and `am start` for app launch
 *
 * adb cannot move input focus without touching the screen, so `focus` only
 * reports whether the node is already focused; `click`, and text entry into
 * an unfocused field, tap the node's center.
 * There is no portable way to write the device clipboard over adb;
 * `getClipboardSetter` returns null.
 *
 * Requirements:
 *   - adb on PATH (or A11Y_BRIDGE_ADB)
 *   - USB debugging enabled and the device authorized
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

import type { GestureCallbacks } from "../actions/handler.js";
import type { AccessibilityNode, AccessibilityService, AppLauncher } from "../base.js";
import type { BridgeConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { centerOf } from "../format.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import type { GestureStroke, LaunchTarget, NodeAction, NodeActionArgs } from "../types.js";
import { parseUiAutomatorXml } from "./uiautomator.js";

const execFileAsync = promisify(execFile);

const REMOTE_DUMP_PATH = "/sdcard/a11y-bridge-dump.xml";
const LAUNCH_FLAGS = "0x10000000"; // FLAG_ACTIVITY_NEW_TASK

const KEYCODE_MOVE_END = "123";
const KEYCODE_DEL = "67";
const KEYCODE_PASTE = "279";

/** Quote for the device shell, which re-parses everything after `adb shell`. */
export function quoteForDeviceShell(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** `input text` reads `%s` as a space and cannot take literal whitespace. */
export function encodeInputText(value: string): string {
  return quoteForDeviceShell(value.replace(/%/g, "\\%").replace(/ /g, "%s"));
}

/** Pick the component from `resolve-activity --brief` output, or null. */
export function parseResolvedActivity(output: string): string | null {
  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const last = lines.at(-1);
  return last && /^[\w.]+\/[\w.$]+$/.test(last) ? last : null;
}

/** Runs adb with the given arguments and resolves with its trimmed stdout. */
export type AdbRunner = (args: string[]) => Promise<string>;

function execAdb(config: BridgeConfig): AdbRunner {
  return async (args) => {
    const { stdout } = await execFileAsync(config.adbPath, args, {
      timeout: config.adbTimeoutMs,
      maxBuffer: 16 * 1024 * 1024,
    });
    return stdout.trim();
  };
}

export class AdbDevice implements AccessibilityService, AppLauncher {
  private config: BridgeConfig;
  private log: Logger;
  private run: AdbRunner;

  constructor(config: BridgeConfig, log: Logger = silentLogger, runner?: AdbRunner) {
    this.config = config;
    this.log = log;
    this.run = runner ?? execAdb(config);
  }

  private adb(...args: string[]): Promise<string> {
    const serialArgs = this.config.serial ? ["-s", this.config.serial] : [];
    return this.run([...serialArgs, ...args]);
  }

  private shell(...args: string[]): Promise<string> {
    return this.adb("shell", ...args);
  }

  /** True when adb sees the device in the `device` state. */
  async isConnected(): Promise<boolean> {
    try {
      return (await this.adb("get-state")) === "device";
    } catch (err) {
      this.log.debug(`adb get-state failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Tree
  // -------------------------------------------------------------------------

  async getRoot(): Promise<AccessibilityNode | null> {
    try {
      // A failed dump can exit 0 and leave the previous file behind.
      await this.shell("rm", "-f", REMOTE_DUMP_PATH);
      const status = await this.shell("uiautomator", "dump", REMOTE_DUMP_PATH);
      if (status.includes("ERROR")) throw new Error(status);
      const xml = await this.adb("exec-out", "cat", REMOTE_DUMP_PATH);
      return parseUiAutomatorXml(xml);
    } catch (err) {
      // Locked screen, secure window or an idle-timeout in uiautomator.
      this.log.debug(`uiautomator dump unavailable: ${errorMessage(err)}`);
      return null;
    }
  }

  // -------------------------------------------------------------------------
  // Actions
  // -------------------------------------------------------------------------

  dispatchGesture(stroke: GestureStroke, callbacks: GestureCallbacks): boolean {
    const { x, y, durationMs } = stroke;
    if (![x, y, durationMs].every(Number.isFinite) || x < 0 || y < 0) return false;

    const px = String(Math.round(x));
    const py = String(Math.round(y));
    void this.shell("input", "swipe", px, py, px, py, String(Math.round(durationMs))).then(
      () => callbacks.onCompleted(),
      (err: unknown) => {
        this.log.warn(`gesture failed: ${errorMessage(err)}`);
        callbacks.onCancelled();
      },
    );
    return true;
  }

  async performAction(
    node: AccessibilityNode,
    action: NodeAction,
    args?: NodeActionArgs,
  ): Promise<boolean> {
    const attrs = node.getAttributes();
    switch (action) {
      case "focus":
        return attrs.focused;
      case "click":
        return this.tapCenter(node);
      case "setText": {
        const text = args?.text;
        if (text === undefined) return false;
        if (!attrs.focused && !(await this.tapCenter(node))) return false;
        const existing = attrs.text && attrs.text !== attrs.hint ? attrs.text.length : 0;
        if (existing > 0) {
          await this.shell("input", "keyevent", KEYCODE_MOVE_END, ...Array.from({ length: existing }, () => KEYCODE_DEL));
        }
        if (text.length > 0) await this.shell("input", "text", encodeInputText(text));
        return true;
      }
      case "paste":
        if (!attrs.focused && !(await this.tapCenter(node))) return false;
        await this.shell("input", "keyevent", KEYCODE_PASTE);
        return true;
    }
  }

  /** Key input goes to the focused view, so an unfocused target is tapped first. */
  private async tapCenter(node: AccessibilityNode): Promise<boolean> {
    const attrs = node.getAttributes();
    if (!attrs.enabled) return false;
    const { x, y } = centerOf(attrs.bounds);
    await this.shell("input", "tap", String(x), String(y));
    return true;
  }

  getClipboardSetter(): ((text: string) => Promise<boolean>) | null {
    return null;
  }

  // -------------------------------------------------------------------------
  // App launch
  // -------------------------------------------------------------------------

  async resolveLaunchTarget(packageName: string, activity: string | null): Promise<LaunchTarget | null> {
    if (activity) {
      const installed = await this.shell("pm", "path", packageName).catch((err: unknown) => {
        this.log.debug(`pm path ${packageName}: ${errorMessage(err)}`);
        return "";
      });
      if (!installed.startsWith("package:")) return null;
      return { packageName, activity, component: `${packageName}/${activity}` };
    }

    const output = await this.shell(
      "cmd", "package", "resolve-activity", "--brief",
      "-c", "android.intent.category.LAUNCHER", packageName,
    );
    const component = parseResolvedActivity(output);
    return component ? { packageName, activity: null, component } : null;
  }

  async startActivity(target: LaunchTarget): Promise<void> {
    const output = await this.shell("am", "start", "-f", LAUNCH_FLAGS, "-n", target.component);
    const error = output.split("\n").find((line) => line.startsWith("Error"));
    if (error) throw new Error(error.trim());
  }
}
