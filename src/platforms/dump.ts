/**
 * Read-only host backed by a saved `uiautomator dump` file.
 *
 * Useful for inspecting a captured screen offline: snapshot and find work
 * against the file, every action is rejected.
 */

import { readFile } from "node:fs/promises";

import type { GestureCallbacks } from "../actions/handler.js";
import type { AccessibilityNode, AccessibilityService } from "../base.js";
import type { GestureStroke } from "../types.js";
import { parseUiAutomatorXml } from "./uiautomator.js";

export class DumpReplay implements AccessibilityService {
  private root: AccessibilityNode | null;

  constructor(root: AccessibilityNode | null) {
    this.root = root;
  }

  static fromXml(xml: string): DumpReplay {
    return new DumpReplay(parseUiAutomatorXml(xml));
  }

  static async fromFile(filePath: string): Promise<DumpReplay> {
    return DumpReplay.fromXml(await readFile(filePath, "utf-8"));
  }

  async getRoot(): Promise<AccessibilityNode | null> {
    return this.root;
  }

  dispatchGesture(_stroke: GestureStroke, _callbacks: GestureCallbacks): boolean {
    return false;
  }

  async performAction(): Promise<boolean> {
    return false;
  }

  getClipboardSetter(): ((text: string) => Promise<boolean>) | null {
    return null;
  }
}
