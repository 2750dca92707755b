/**
 * Promise wrapper for callback-style gesture dispatch.
 */

import type { GestureStroke } from "../types.js";
import type { ActionDispatcher } from "./handler.js";

/**
 * Dispatch `stroke` and settle once with the outcome: true when the
 * platform reports completion, false on cancellation, on rejected
 * dispatch, or when `signal` aborts first. Later callbacks are ignored.
 *
 * No timeout is applied; a platform that never calls back leaves the
 * promise pending unless the caller aborts.
 */
export function awaitGesture(
  dispatcher: ActionDispatcher,
  stroke: GestureStroke,
  signal?: AbortSignal,
): Promise<boolean> {
  return new Promise<boolean>((resolve, reject) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    let settled = false;
    const settle = (value: boolean) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      resolve(value);
    };
    const onAbort = () => settle(false);
    signal?.addEventListener("abort", onAbort, { once: true });

    let dispatched: boolean;
    try {
      dispatched = dispatcher.dispatchGesture(stroke, {
        onCompleted: () => settle(true),
        onCancelled: () => settle(false),
      });
    } catch (err) {
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      reject(err);
      return;
    }

    if (!dispatched) settle(false);
  });
}
