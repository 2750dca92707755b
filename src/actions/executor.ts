/**
 * Action executor: composes node resolution with platform actions.
 *
 * Every method settles with an ActionResult; exceptions raised by the
 * platform are caught here and reported through `error`.
 */

import type { AccessibilityNode, AccessibilityService } from "../base.js";
import { clamp, TAP_DURATION } from "../config.js";
import { clickSelfOrAncestor, resolveEditableTarget } from "../editable.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import { resolvePath } from "../paths.js";
import { findFirstMatch, normalizeQuery } from "../search.js";
import type { ActionResult } from "../types.js";
import { awaitGesture } from "./gesture.js";

function failed(error: string): ActionResult {
  return { success: false, message: "", error };
}

export class ActionExecutor {
  private service: AccessibilityService;
  private log: Logger;

  constructor(service: AccessibilityService, log: Logger = silentLogger) {
    this.service = service;
    this.log = log;
  }

  private async guard(label: string, run: () => Promise<ActionResult>): Promise<ActionResult> {
    try {
      return await run();
    } catch (err) {
      const message = errorMessage(err);
      this.log.warn(`${label} failed: ${message}`);
      return failed(message);
    }
  }

  /** Tap at (x, y); the hold duration is clamped to the supported range. */
  async tap(x: number, y: number, durationMs: number, signal?: AbortSignal): Promise<ActionResult> {
    const duration = clamp(durationMs, TAP_DURATION.min, TAP_DURATION.max);
    return this.guard("tap", async () => {
      const completed = await awaitGesture(this.service, { x, y, durationMs: duration }, signal);
      if (!completed) return failed("gesture dispatch failed");
      return { success: true, message: `Tapped ${x},${y} for ${duration}ms` };
    });
  }

  async setText(text: string, targetQuery?: string | null): Promise<ActionResult> {
    return this.guard("setText", async () => {
      const node = await resolveEditableTarget(this.service, this.service, targetQuery, this.log);
      if (!node) return failed("no focused editable field");
      if (!(await this.service.performAction(node, "setText", { text }))) {
        return failed("set-text action rejected");
      }
      return { success: true, message: `Set ${text.length} characters` };
    });
  }

  /**
   * Put `text` on the clipboard and paste it into the editable target,
   * falling back to a plain set-text when the paste action is rejected.
   */
  async pasteText(text: string, targetQuery?: string | null): Promise<ActionResult> {
    return this.guard("paste", async () => {
      const setClipboard = this.service.getClipboardSetter();
      if (!setClipboard) return failed("clipboard unavailable");
      if (!(await setClipboard(text))) return failed("could not set clipboard");

      const node = await resolveEditableTarget(this.service, this.service, targetQuery, this.log);
      if (!node) return failed("no focused editable field");

      if (await this.service.performAction(node, "paste")) {
        return { success: true, message: `Pasted ${text.length} characters` };
      }
      this.log.debug("paste rejected, falling back to set-text");
      if (await this.service.performAction(node, "setText", { text })) {
        return { success: true, message: `Set ${text.length} characters` };
      }
      return failed("paste and set-text actions rejected");
    });
  }

  /**
   * Click a node addressed by `path`, or else the first node matching
   * `query`. A path that does not resolve is a failure; it does not fall
   * back to the query.
   */
  async click(path: string | null, query: string | null): Promise<ActionResult> {
    return this.guard("click", async () => {
      const root = await this.service.getRoot();
      if (!root) return failed("UI tree unavailable");

      let target: AccessibilityNode | null;
      if (path != null) {
        target = resolvePath(root, path);
        if (!target) return failed(`no node at path ${path}`);
      } else {
        const normalized = normalizeQuery(query);
        if (!normalized) return failed("path or query required");
        const match = findFirstMatch(root, normalized);
        if (!match) return failed(`no node matched '${normalized}'`);
        target = match.node;
      }

      if (!(await clickSelfOrAncestor(this.service, target))) {
        return failed("target not clickable");
      }
      return { success: true, message: "Clicked" };
    });
  }
}
