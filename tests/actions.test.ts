/**
 * Tests for action execution against a fake service.
 */

import { describe, it, expect } from "vitest";
import { ActionExecutor } from "../src/actions/executor.js";
import type { Logger } from "../src/log.js";
import { silentLogger } from "../src/log.js";
import { FakeService, makeNode } from "./helpers.js";

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    ...silentLogger,
    warnings,
    warn: (message) => {
      warnings.push(message);
    },
  };
}

// ---------------------------------------------------------------------------
// tap
// ---------------------------------------------------------------------------

describe("ActionExecutor.tap", () => {
  it("dispatches a stroke and reports success", async () => {
    const service = new FakeService();
    const result = await new ActionExecutor(service).tap(540, 1800, 60);
    expect(result).toEqual({ success: true, message: "Tapped 540,1800 for 60ms" });
    expect(service.gestures).toEqual([{ x: 540, y: 1800, durationMs: 60 }]);
  });

  it("clamps the hold duration", async () => {
    const service = new FakeService();
    const executor = new ActionExecutor(service);
    await executor.tap(1, 2, 5000);
    await executor.tap(1, 2, 5);
    expect(service.gestures.map((g) => g.durationMs)).toEqual([1000, 40]);
  });

  it("fails when the gesture does not complete", async () => {
    const service = new FakeService();
    service.gestureOutcome = "cancelled";
    const result = await new ActionExecutor(service).tap(10, 10, 60);
    expect(result).toEqual({ success: false, message: "", error: "gesture dispatch failed" });
  });

  it("reports a platform exception as the error and logs it", async () => {
    const service = new FakeService();
    service.dispatchGesture = () => {
      throw new Error("input service gone");
    };
    const log = recordingLogger();
    const result = await new ActionExecutor(service, log).tap(10, 10, 60);
    expect(result).toEqual({ success: false, message: "", error: "input service gone" });
    expect(log.warnings).toEqual(["tap failed: input service gone"]);
  });
});

// ---------------------------------------------------------------------------
// setText
// ---------------------------------------------------------------------------

describe("ActionExecutor.setText", () => {
  it("sets text on the focused field", async () => {
    const field = makeNode({ editable: true, focused: true });
    const service = new FakeService(makeNode({}, [field]));

    const result = await new ActionExecutor(service).setText("hello");
    expect(result).toEqual({ success: true, message: "Set 5 characters" });
    expect(service.actions).toEqual([{ node: field, action: "setText", args: { text: "hello" } }]);
  });

  it("fails without an editable field", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ text: "OK" })]));
    const result = await new ActionExecutor(service).setText("hello");
    expect(result.error).toBe("no focused editable field");
  });

  it("fails when the field rejects the text", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ editable: true })]));
    service.onAction = () => false;
    const result = await new ActionExecutor(service).setText("hello");
    expect(result.error).toBe("set-text action rejected");
  });
});

// ---------------------------------------------------------------------------
// pasteText
// ---------------------------------------------------------------------------

describe("ActionExecutor.pasteText", () => {
  it("puts the text on the clipboard and pastes", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ editable: true, focused: true })]));
    const result = await new ActionExecutor(service).pasteText("hello");
    expect(result).toEqual({ success: true, message: "Pasted 5 characters" });
    expect(service.clipboard).toBe("hello");
    expect(service.actionNames()).toEqual(["paste"]);
  });

  it("falls back to set-text when the paste is rejected", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ editable: true, focused: true })]));
    service.onAction = (_node, action) => action !== "paste";
    const result = await new ActionExecutor(service).pasteText("hello");
    expect(result).toEqual({ success: true, message: "Set 5 characters" });
    expect(service.actionNames()).toEqual(["paste", "setText"]);
  });

  it("fails when both paste and set-text are rejected", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ editable: true, focused: true })]));
    service.onAction = () => false;
    const result = await new ActionExecutor(service).pasteText("hello");
    expect(result.error).toBe("paste and set-text actions rejected");
  });

  it("fails before touching the tree when there is no clipboard", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ editable: true, focused: true })]));
    service.clipboardAvailable = false;
    const result = await new ActionExecutor(service).pasteText("hello");
    expect(result.error).toBe("clipboard unavailable");
    expect(service.rootCalls).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// click
// ---------------------------------------------------------------------------

describe("ActionExecutor.click", () => {
  it("clicks the node at a path", async () => {
    const button = makeNode({ text: "OK", clickable: true });
    const service = new FakeService(makeNode({}, [button]));
    const result = await new ActionExecutor(service).click("r/0", null);
    expect(result).toEqual({ success: true, message: "Clicked" });
    expect(service.actions).toEqual([{ node: button, action: "click" }]);
  });

  it("does not fall back to the query when the path is stale", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ text: "OK", clickable: true })]));
    const result = await new ActionExecutor(service).click("r/9", "ok");
    expect(result.error).toBe("no node at path r/9");
    expect(service.actions).toEqual([]);
  });

  it("clicks the clickable ancestor of a query match", async () => {
    const label = makeNode({ text: "Settings" });
    const row = makeNode({ clickable: true }, [label]);
    const service = new FakeService(makeNode({}, [row]));
    await new ActionExecutor(service).click(null, "  SETTINGS ");
    expect(service.actions).toEqual([{ node: row, action: "click" }]);
  });

  it("reports an unmatched query", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ text: "OK" })]));
    const result = await new ActionExecutor(service).click(null, "Zzz");
    expect(result.error).toBe("no node matched 'zzz'");
  });

  it("fails when nothing on the way up is clickable", async () => {
    const service = new FakeService(makeNode({}, [makeNode({ text: "OK" })]));
    const result = await new ActionExecutor(service).click(null, "ok");
    expect(result.error).toBe("target not clickable");
  });

  it("fails without a tree", async () => {
    const result = await new ActionExecutor(new FakeService(null)).click("r", null);
    expect(result.error).toBe("UI tree unavailable");
  });
});
