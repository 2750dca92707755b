/**
 * a11y-bridge: remote control for an Android device through its
 * accessibility tree.
 *
 * Quick start:
 *
 *   import { RemoteSession } from "a11y-bridge";
 *
 *   const session = await RemoteSession.connect();
 *   await session.run("ui.click", { query: "search" });
 *   await session.run("text.input", { text: "hello", targetQuery: "search" });
 *   const found = await session.run("ui.find", '{"query": "results"}');
 */

import type { AccessibilityService, AppLauncher } from "./base.js";
import { AccessibilityBridge } from "./bridge.js";
import type { CommandContext, CommandHandlerOptions, RawParams } from "./commands.js";
import { CommandHandler } from "./commands.js";
import type { BridgeConfig } from "./config.js";
import { loadConfig } from "./config.js";
import type { Logger } from "./log.js";
import { createLogger } from "./log.js";
import type { AdbRunner } from "./platforms/adb.js";
import { AdbDevice } from "./platforms/adb.js";
import { DumpReplay } from "./platforms/dump.js";
import { dispatchCommand } from "./router.js";
import { ServiceHandle } from "./service.js";
import type { CommandResult } from "./types.js";

// ---------------------------------------------------------------------------
// RemoteSession: service handle, bridge and command handler wired together
// ---------------------------------------------------------------------------

export class RemoteSession {
  readonly handle: ServiceHandle;
  readonly bridge: AccessibilityBridge;
  readonly handler: CommandHandler;

  private constructor(handle: ServiceHandle, options: Omit<CommandHandlerOptions, "bridge">) {
    this.handle = handle;
    this.bridge = new AccessibilityBridge(handle, options.log);
    this.handler = new CommandHandler({ ...options, bridge: this.bridge });
  }

  /**
   * Wire a session around an existing service. Pass null to start
   * disconnected and connect later through `handle`.
   */
  static withService(
    service: AccessibilityService | null,
    options: Omit<CommandHandlerOptions, "bridge"> = {},
  ): RemoteSession {
    const handle = new ServiceHandle();
    if (service) handle.connect(service);
    return new RemoteSession(handle, options);
  }

  /**
   * Connect to the device adb selects (or `config.serial`), or replay a
   * saved uiautomator dump when `dumpFile` is given. A device that is not
   * reachable leaves the session disconnected; each later command checks
   * for the device again and fails with ACCESSIBILITY_DISABLED while it is
   * still missing.
   */
  static async connect(options?: {
    config?: Partial<BridgeConfig>;
    dumpFile?: string;
    log?: Logger;
    /** Replaces the adb process runner. */
    runner?: AdbRunner;
  }): Promise<RemoteSession> {
    const config = loadConfig(process.env, options?.config);
    const log = options?.log ?? createLogger({ verbose: config.verbose });

    if (options?.dumpFile) {
      const replay = await DumpReplay.fromFile(options.dumpFile);
      return RemoteSession.withService(replay, { log });
    }

    const device = new AdbDevice(config, log, options?.runner);
    const launcher: AppLauncher = device;
    const session = RemoteSession.withService(null, { launcher, log });
    session.handle.setReconnect(async () => {
      if (!(await device.isConnected())) return null;
      log.debug("device reachable, connecting");
      return device;
    });
    if (await device.isConnected()) {
      session.handle.connect(device);
    } else {
      log.warn(`no device reachable through ${config.adbPath}${config.serial ? ` (serial ${config.serial})` : ""}`);
    }
    return session;
  }

  /** Run one named command. Never throws; failures come back as results. */
  async run(command: string, params?: RawParams, context?: CommandContext): Promise<CommandResult> {
    return dispatchCommand(this.handler, command, params, context);
  }
}

// ---------------------------------------------------------------------------
// Re-exports
// ---------------------------------------------------------------------------

export { AccessibilityBridge } from "./bridge.js";
export { CommandHandler, parseParams, PARAM_SCHEMAS } from "./commands.js";
export { COMMANDS, dispatchCommand, isCommandName } from "./router.js";
export { ServiceHandle } from "./service.js";
export { ActionExecutor } from "./actions/executor.js";
export { awaitGesture } from "./actions/gesture.js";
export { resolveEditableTarget, findFocusedEditable, findFirstEditable } from "./editable.js";
export { scoreNode, findBest, findFirstMatch, snapshot, normalizeQuery } from "./search.js";
export { resolvePath, parsePath, formatPath, ROOT_PATH } from "./paths.js";
export { dumpNode, dumpToJson, formatBounds, formatLine, serializeCompact } from "./format.js";
export { toResponse } from "./errors.js";
export { StaticNode } from "./tree.js";
export { AdbDevice } from "./platforms/adb.js";
export { DumpReplay } from "./platforms/dump.js";
export { parseUiAutomatorXml } from "./platforms/uiautomator.js";
export { loadConfig } from "./config.js";
export { createLogger } from "./log.js";

// Type re-exports
export type {
  ActionResult,
  CommandResult,
  CommandSuccess,
  CommandFailure,
  ErrorCode,
  GestureStroke,
  LaunchTarget,
  NodeAction,
  NodeAttributes,
  NodeFlags,
  Rect,
  UiNodeDump,
} from "./types.js";

export type { AccessibilityNode, AccessibilityService, AppLauncher, TreeSnapshotSource } from "./base.js";
export type { ActionDispatcher, GestureCallbacks } from "./actions/handler.js";
export type { CommandContext, CommandName, RawParams } from "./commands.js";
export type { BridgeConfig } from "./config.js";
export type { Logger } from "./log.js";
export type { AdbRunner } from "./platforms/adb.js";
export type { ReconnectHook } from "./service.js";
