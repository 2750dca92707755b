/**
 * Service-level operations used by the command layer.
 *
 * Each call reads the service from the handle once and re-fetches the
 * tree root, so nothing carries over between calls. When no service is
 * connected, reads answer "no result" and actions fail.
 */

import { ActionExecutor } from "./actions/executor.js";
import type { AccessibilityService } from "./base.js";
import type { Logger } from "./log.js";
import { silentLogger } from "./log.js";
import { findBest, findFirstMatch, normalizeQuery, snapshot } from "./search.js";
import type { ServiceHandle } from "./service.js";
import type { ActionResult, UiNodeDump } from "./types.js";

const NOT_CONNECTED: ActionResult = {
  success: false,
  message: "",
  error: "accessibility service not connected",
};

export class AccessibilityBridge {
  private handle: ServiceHandle;
  private log: Logger;

  constructor(handle: ServiceHandle, log: Logger = silentLogger) {
    this.handle = handle;
    this.log = log;
  }

  isActive(): boolean {
    return this.handle.isActive();
  }

  ensureActive(): Promise<boolean> {
    return this.handle.ensureActive();
  }

  private executor(): ActionExecutor | null {
    const service = this.handle.current();
    return service ? new ActionExecutor(service, this.log) : null;
  }

  private service(): AccessibilityService | null {
    return this.handle.current();
  }

  async tap(x: number, y: number, durationMs: number, signal?: AbortSignal): Promise<ActionResult> {
    return (await this.executor()?.tap(x, y, durationMs, signal)) ?? NOT_CONNECTED;
  }

  async setText(text: string, targetQuery?: string | null): Promise<ActionResult> {
    return (await this.executor()?.setText(text, targetQuery)) ?? NOT_CONNECTED;
  }

  async pasteText(text: string, targetQuery?: string | null): Promise<ActionResult> {
    return (await this.executor()?.pasteText(text, targetQuery)) ?? NOT_CONNECTED;
  }

  async click(options: { path?: string | null; query?: string | null }): Promise<ActionResult> {
    return (await this.executor()?.click(options.path ?? null, options.query ?? null)) ?? NOT_CONNECTED;
  }

  /** Level-order dump of up to `maxNodes` nodes; empty when the tree is unavailable. */
  async snapshot(maxNodes: number): Promise<UiNodeDump[]> {
    const service = this.service();
    if (!service) return [];
    return snapshot(await service.getRoot(), maxNodes);
  }

  /** Best match for `query`, or null when nothing matches. */
  async findNode(query: string): Promise<UiNodeDump | null> {
    const normalized = normalizeQuery(query);
    const service = this.service();
    if (!normalized || !service) return null;
    return findBest(await service.getRoot(), normalized);
  }

  async exists(query: string): Promise<boolean> {
    const normalized = normalizeQuery(query);
    const service = this.service();
    if (!normalized || !service) return false;
    return findFirstMatch(await service.getRoot(), normalized) !== null;
  }
}
