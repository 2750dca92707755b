/**
 * Command handler: turns named commands with JSON parameters into bridge
 * calls and wraps the outcome as a CommandResult.
 *
 * Parameters are read leniently: a blank or non-object parameter string
 * counts as "no parameters", numbers may arrive as numeric strings, and a
 * value of the wrong type is treated as absent.
 */

import { setTimeout as sleepFor } from "node:timers/promises";
import { performance } from "node:perf_hooks";
import { z } from "zod";

import type { AppLauncher } from "./base.js";
import type { AccessibilityBridge } from "./bridge.js";
import { clamp, SNAPSHOT_MAX_NODES, TAP_DURATION, WAIT_POLL, WAIT_TIMEOUT } from "./config.js";
import { errorMessage, fail, ok } from "./errors.js";
import { dumpToJson, matchToJson } from "./format.js";
import type { Logger } from "./log.js";
import { silentLogger } from "./log.js";
import type { ActionResult, CommandResult, ErrorCode } from "./types.js";

// ---------------------------------------------------------------------------
// Parameter parsing
// ---------------------------------------------------------------------------

export type RawParams = string | Record<string, unknown> | null | undefined;

/** Parse a parameter payload into an object; anything unusable becomes `{}`. */
export function parseParams(raw: RawParams): Record<string, unknown> {
  if (raw == null) return {};
  if (typeof raw !== "string") return raw;

  const trimmed = raw.trim();
  if (trimmed.length === 0 || trimmed === "{}") return {};
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // malformed JSON reads as no parameters
  }
  return {};
}

const numberParam = z
  .preprocess(
    (v) => (typeof v === "string" && v.trim() !== "" ? Number(v.trim()) : v),
    z.number().finite(),
  )
  .optional()
  .catch(undefined);

const stringParam = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(String)
  .optional()
  .catch(undefined);

const booleanParam = z
  .preprocess((v) => (v === "true" ? true : v === "false" ? false : v), z.boolean())
  .optional()
  .catch(undefined);

/** Trimmed string, or undefined when blank. */
const trimmedParam = stringParam.transform((v) => {
  const trimmed = v?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : undefined;
});

export const PARAM_SCHEMAS = {
  "app.launch": z.object({ packageName: trimmedParam, activity: trimmedParam }),
  "screen.tap": z.object({ x: numberParam, y: numberParam, durationMs: numberParam }),
  "text.input": z.object({ text: stringParam, targetQuery: trimmedParam }),
  "ime.paste": z.object({ text: stringParam, targetQuery: trimmedParam }),
  "ui.snapshot": z.object({ maxNodes: numberParam }),
  "ui.find": z.object({ query: trimmedParam }),
  "ui.click": z.object({ path: trimmedParam, query: trimmedParam }),
  "ui.waitFor": z.object({
    query: trimmedParam,
    timeoutMs: numberParam,
    pollMs: numberParam,
    expectGone: booleanParam,
  }),
} as const;

export type CommandName = keyof typeof PARAM_SCHEMAS;

function readParams<T extends z.ZodTypeAny>(schema: T, raw: RawParams): z.infer<T> {
  return schema.parse(parseParams(raw));
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

export interface CommandContext {
  /** Aborts a pending gesture or wait. */
  signal?: AbortSignal;
}

export interface CommandHandlerOptions {
  bridge: AccessibilityBridge;
  /** Null when the host cannot launch apps. */
  launcher?: AppLauncher | null;
  log?: Logger;
  /** Monotonic milliseconds. */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
}

const SERVICE_DISABLED_MESSAGE = "enable the accessibility service on the device";

export class CommandHandler {
  private bridge: AccessibilityBridge;
  private launcher: AppLauncher | null;
  private log: Logger;
  private now: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: CommandHandlerOptions) {
    this.bridge = options.bridge;
    this.launcher = options.launcher ?? null;
    this.log = options.log ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
  }

  private async serviceDisabled(): Promise<CommandResult | null> {
    return (await this.bridge.ensureActive()) ? null : fail("ACCESSIBILITY_DISABLED", SERVICE_DISABLED_MESSAGE);
  }

  private actionFailed(code: ErrorCode, result: ActionResult, fallback: string): CommandResult {
    return fail(code, result.error || fallback);
  }

  async handleAppLaunch(raw: RawParams): Promise<CommandResult> {
    const { packageName, activity } = readParams(PARAM_SCHEMAS["app.launch"], raw);
    if (!packageName) return fail("INVALID_REQUEST", "packageName required");
    if (!this.launcher) return fail("APP_LAUNCH_FAILED", "app launch not supported by this host");

    try {
      const target = await this.launcher.resolveLaunchTarget(packageName, activity ?? null);
      if (!target) return fail("APP_NOT_FOUND", `no launchable activity for ${packageName}`);

      await this.launcher.startActivity(target);
      this.log.debug(`launched ${target.component}`);
      return ok({ packageName, ...(activity ? { activity } : {}) });
    } catch (err) {
      return fail("APP_LAUNCH_FAILED", errorMessage(err) || "failed to launch");
    }
  }

  async handleScreenTap(raw: RawParams, context: CommandContext = {}): Promise<CommandResult> {
    const params = readParams(PARAM_SCHEMAS["screen.tap"], raw);
    const { x, y } = params;
    if (x === undefined || y === undefined) return fail("INVALID_REQUEST", "x and y are required");

    const disabled = await this.serviceDisabled();
    if (disabled) return disabled;

    const durationMs = clamp(Math.trunc(params.durationMs ?? TAP_DURATION.default), TAP_DURATION.min, TAP_DURATION.max);
    const result = await this.bridge.tap(x, y, durationMs, context.signal);
    if (!result.success) return this.actionFailed("TAP_FAILED", result, "gesture dispatch failed");

    return ok({ x, y, durationMs });
  }

  async handleTextInput(raw: RawParams): Promise<CommandResult> {
    const { text, targetQuery } = readParams(PARAM_SCHEMAS["text.input"], raw);
    if (!text) return fail("INVALID_REQUEST", "text required");

    const disabled = await this.serviceDisabled();
    if (disabled) return disabled;

    const result = await this.bridge.setText(text, targetQuery);
    if (!result.success) {
      return this.actionFailed("TEXT_INPUT_FAILED", result, "no focused editable field or action failed");
    }

    return ok({ textLength: text.length, ...(targetQuery ? { targetQuery } : {}) });
  }

  async handleImePaste(raw: RawParams): Promise<CommandResult> {
    const { text, targetQuery } = readParams(PARAM_SCHEMAS["ime.paste"], raw);
    if (!text) return fail("INVALID_REQUEST", "text required");

    const disabled = await this.serviceDisabled();
    if (disabled) return disabled;

    const result = await this.bridge.pasteText(text, targetQuery);
    if (!result.success) {
      return this.actionFailed("IME_PASTE_FAILED", result, "failed to paste into focused field");
    }

    return ok({ textLength: text.length, ...(targetQuery ? { targetQuery } : {}) });
  }

  async handleUiSnapshot(raw: RawParams): Promise<CommandResult> {
    const { maxNodes } = readParams(PARAM_SCHEMAS["ui.snapshot"], raw);

    const disabled = await this.serviceDisabled();
    if (disabled) return disabled;

    const limit = Math.max(SNAPSHOT_MAX_NODES.min, Math.trunc(maxNodes ?? SNAPSHOT_MAX_NODES.default));
    const nodes = await this.bridge.snapshot(limit);
    return ok({ count: nodes.length, nodes: nodes.map(dumpToJson) });
  }

  async handleUiFind(raw: RawParams): Promise<CommandResult> {
    const { query } = readParams(PARAM_SCHEMAS["ui.find"], raw);
    if (!query) return fail("INVALID_REQUEST", "query required");

    const disabled = await this.serviceDisabled();
    if (disabled) return disabled;

    const found = await this.bridge.findNode(query);
    if (!found) return fail("UI_NOT_FOUND", "no node matched query");

    return ok({ query, ...matchToJson(found) });
  }

  async handleUiClick(raw: RawParams): Promise<CommandResult> {
    const { path, query } = readParams(PARAM_SCHEMAS["ui.click"], raw);
    if (!path && !query) return fail("INVALID_REQUEST", "path or query required");

    const disabled = await this.serviceDisabled();
    if (disabled) return disabled;

    const result = await this.bridge.click({ path, query });
    if (!result.success) {
      return this.actionFailed("UI_CLICK_FAILED", result, "target not found or not clickable");
    }

    return ok({ ...(path ? { path } : {}), ...(query ? { query } : {}) });
  }

  /**
   * Poll until `query` matches (or stops matching with `expectGone`), or
   * the timeout passes. Aborting the context ends the wait as a timeout.
   */
  async handleUiWaitFor(raw: RawParams, context: CommandContext = {}): Promise<CommandResult> {
    const params = readParams(PARAM_SCHEMAS["ui.waitFor"], raw);
    const { query } = params;
    const timeoutMs = clamp(Math.trunc(params.timeoutMs ?? WAIT_TIMEOUT.default), WAIT_TIMEOUT.min, WAIT_TIMEOUT.max);
    const pollMs = clamp(Math.trunc(params.pollMs ?? WAIT_POLL.default), WAIT_POLL.min, WAIT_POLL.max);
    const expectGone = params.expectGone ?? false;

    if (!query) return fail("INVALID_REQUEST", "query required");

    const disabled = await this.serviceDisabled();
    if (disabled) return disabled;

    const start = this.now();
    while (this.now() - start <= timeoutMs && !context.signal?.aborted) {
      const exists = await this.bridge.exists(query);
      if (exists !== expectGone) {
        return ok({ query, expectGone, elapsedMs: Math.round(this.now() - start) });
      }
      await this.sleep(pollMs, context.signal);
    }

    return fail("UI_WAIT_TIMEOUT", "condition not reached within timeout");
  }
}
