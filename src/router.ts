/**
 * Command name dispatch.
 */

import type { CommandContext, CommandHandler, CommandName, RawParams } from "./commands.js";
import { PARAM_SCHEMAS } from "./commands.js";
import { errorMessage, fail } from "./errors.js";
import type { CommandResult, ErrorCode } from "./types.js";

export const COMMANDS: ReadonlySet<string> = new Set(Object.keys(PARAM_SCHEMAS));

/** Code reported when a host error escapes a command. */
const FAILURE_CODES = {
  "app.launch": "APP_LAUNCH_FAILED",
  "screen.tap": "TAP_FAILED",
  "text.input": "TEXT_INPUT_FAILED",
  "ime.paste": "IME_PASTE_FAILED",
  "ui.snapshot": "UI_NOT_FOUND",
  "ui.find": "UI_NOT_FOUND",
  "ui.click": "UI_CLICK_FAILED",
  "ui.waitFor": "UI_WAIT_TIMEOUT",
} as const satisfies Record<CommandName, ErrorCode>;

export function isCommandName(name: string): name is CommandName {
  return COMMANDS.has(name);
}

export async function dispatchCommand(
  handler: CommandHandler,
  command: string,
  params: RawParams,
  context: CommandContext = {},
): Promise<CommandResult> {
  if (!isCommandName(command)) {
    return fail(
      "UNKNOWN_COMMAND",
      `unknown command '${command}'. Valid: ${[...COMMANDS].sort().join(", ")}`,
    );
  }

  try {
    switch (command) {
      case "app.launch":
        return await handler.handleAppLaunch(params);
      case "screen.tap":
        return await handler.handleScreenTap(params, context);
      case "text.input":
        return await handler.handleTextInput(params);
      case "ime.paste":
        return await handler.handleImePaste(params);
      case "ui.snapshot":
        return await handler.handleUiSnapshot(params);
      case "ui.find":
        return await handler.handleUiFind(params);
      case "ui.click":
        return await handler.handleUiClick(params);
      case "ui.waitFor":
        return await handler.handleUiWaitFor(params, context);
    }
  } catch (err) {
    // Reads (snapshot, find, wait) let host errors through.
    return fail(FAILURE_CODES[command], errorMessage(err));
  }
}
