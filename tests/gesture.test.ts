/**
 * Tests for the single-shot gesture promise.
 */

import { describe, it, expect } from "vitest";
import { awaitGesture } from "../src/actions/gesture.js";
import { FakeService } from "./helpers.js";

const STROKE = { x: 540, y: 1800, durationMs: 60 };

describe("awaitGesture", () => {
  it("resolves true when the gesture completes", async () => {
    const service = new FakeService();
    expect(await awaitGesture(service, STROKE)).toBe(true);
    expect(service.gestures).toEqual([STROKE]);
  });

  it("resolves false when the gesture is cancelled", async () => {
    const service = new FakeService();
    service.gestureOutcome = "cancelled";
    expect(await awaitGesture(service, STROKE)).toBe(false);
  });

  it("resolves false when dispatch is rejected", async () => {
    const service = new FakeService();
    service.gestureOutcome = "rejected";
    expect(await awaitGesture(service, STROKE)).toBe(false);
  });

  it("settles once, ignoring later callbacks", async () => {
    const service = new FakeService();
    service.gestureOutcome = "pending";
    const pending = awaitGesture(service, STROKE);

    const [callbacks] = service.pendingCallbacks;
    callbacks.onCompleted();
    callbacks.onCancelled();
    callbacks.onCompleted();

    expect(await pending).toBe(true);
  });

  it("resolves false when aborted while pending", async () => {
    const service = new FakeService();
    service.gestureOutcome = "pending";
    const controller = new AbortController();
    const pending = awaitGesture(service, STROKE, controller.signal);

    controller.abort();
    service.pendingCallbacks[0].onCompleted();

    expect(await pending).toBe(false);
  });

  it("does not dispatch when already aborted", async () => {
    const service = new FakeService();
    const controller = new AbortController();
    controller.abort();

    expect(await awaitGesture(service, STROKE, controller.signal)).toBe(false);
    expect(service.gestures).toEqual([]);
  });

  it("rejects when dispatch throws", async () => {
    const service = new FakeService();
    service.dispatchGesture = () => {
      throw new Error("input service gone");
    };
    await expect(awaitGesture(service, STROKE)).rejects.toThrow("input service gone");
  });
});
