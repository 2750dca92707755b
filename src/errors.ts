/**
 * Command result constructors. Errors never cross the command boundary as
 * exceptions; every failure becomes a `{code, message}` result whose
 * message starts with the code.
 */

import type { CommandFailure, CommandResult, CommandSuccess, ErrorCode, JsonObject } from "./types.js";

export function ok(fields: JsonObject = {}): CommandSuccess {
  return { ok: true, payload: { ok: true, ...fields } };
}

export function fail(code: ErrorCode, detail: string): CommandFailure {
  return { ok: false, code, message: `${code}: ${detail}` };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** JSON body for a result: the payload on success, `{ok: false, error}` otherwise. */
export function toResponse(result: CommandResult): JsonObject {
  if (result.ok) return result.payload;
  return { ok: false, error: { code: result.code, message: result.message } };
}
