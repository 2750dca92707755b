/**
 * Tests for query scoring, best-match selection and level-order snapshots.
 */

import { describe, it, expect } from "vitest";
import {
  findBest,
  findFirstMatch,
  normalizeQuery,
  scoreAttributes,
  scoreNode,
  snapshot,
} from "../src/search.js";
import { defaultAttributes } from "../src/tree.js";
import { makeNode, SparseNode } from "./helpers.js";

// ---------------------------------------------------------------------------
// normalizeQuery
// ---------------------------------------------------------------------------

describe("normalizeQuery", () => {
  it("trims and lowercases", () => {
    expect(normalizeQuery("  Search Box ")).toBe("search box");
  });

  it("returns null for blank input", () => {
    expect(normalizeQuery("   ")).toBeNull();
    expect(normalizeQuery("")).toBeNull();
    expect(normalizeQuery(null)).toBeNull();
    expect(normalizeQuery(undefined)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

describe("scoreAttributes", () => {
  it("weights a text match at 100 plus the enabled bonus", () => {
    expect(scoreAttributes(defaultAttributes({ text: "Open Search" }), "search")).toBe(105);
  });

  it("weights a description match at 80", () => {
    expect(scoreAttributes(defaultAttributes({ description: "search button" }), "search")).toBe(85);
  });

  it("weights hint at 60 and view id at 40", () => {
    expect(scoreAttributes(defaultAttributes({ hint: "Search notes" }), "search")).toBe(65);
    expect(scoreAttributes(defaultAttributes({ viewId: "com.example:id/search" }), "search")).toBe(45);
  });

  it("adds every matching field and every bonus", () => {
    const attrs = defaultAttributes({
      text: "search",
      description: "search",
      hint: "search",
      viewId: "com.example:id/search",
      editable: true,
      clickable: true,
    });
    expect(scoreAttributes(attrs, "search")).toBe(310);
  });

  it("matches case-insensitively on trimmed values", () => {
    expect(scoreAttributes(defaultAttributes({ text: "  SEARCH  " }), "search")).toBe(105);
  });

  it("is zero without a text match, whatever the flags", () => {
    const attrs = defaultAttributes({ text: "Cancel", clickable: true, editable: true });
    expect(scoreAttributes(attrs, "search")).toBe(0);
  });

  it("ignores blank fields", () => {
    expect(scoreAttributes(defaultAttributes({ text: "   " }), "a")).toBe(0);
  });

  it("gives a disabled node no enabled bonus", () => {
    expect(scoreAttributes(defaultAttributes({ text: "Search", enabled: false }), "search")).toBe(100);
  });
});

describe("scoreNode", () => {
  it("reads the node's attributes", () => {
    expect(scoreNode(makeNode({ text: "Search", clickable: true }), "search")).toBe(115);
  });
});

// ---------------------------------------------------------------------------
// findBest
// ---------------------------------------------------------------------------

describe("findBest", () => {
  it("prefers the text match over a description match", () => {
    const root = makeNode({}, [
      makeNode({ description: "search button" }),
      makeNode({ text: "search" }),
    ]);
    const found = findBest(root, "search");
    expect(found?.path).toBe("r/1");
    expect(found?.text).toBe("search");
  });

  it("keeps the first node in level order on equal scores", () => {
    const root = makeNode({}, [makeNode({ text: "go" }), makeNode({ text: "go" })]);
    expect(findBest(root, "go")?.path).toBe("r/0");
  });

  it("prefers a shallower node on a tie even if a deeper one comes first depth-first", () => {
    const root = makeNode({}, [
      makeNode({}, [makeNode({ text: "ok" })]),
      makeNode({ text: "ok" }),
    ]);
    expect(findBest(root, "ok")?.path).toBe("r/1");
  });

  it("visits deeper nodes that outscore shallow ones", () => {
    const root = makeNode({}, [
      makeNode({ description: "login" }),
      makeNode({}, [makeNode({ text: "Login", clickable: true })]),
    ]);
    expect(findBest(root, "login")?.path).toBe("r/1/0");
  });

  it("is deterministic for an unchanged tree", () => {
    const root = makeNode({}, [makeNode({ hint: "name" }), makeNode({ text: "name" })]);
    expect(findBest(root, "name")).toEqual(findBest(root, "name"));
  });

  it("returns null when nothing matches", () => {
    const root = makeNode({}, [makeNode({ text: "OK" })]);
    expect(findBest(root, "cancel")).toBeNull();
  });

  it("returns null without a root", () => {
    expect(findBest(null, "search")).toBeNull();
  });

  it("skips children that cannot be retrieved", () => {
    const root = new SparseNode([makeNode({ text: "visible" }), makeNode({ text: "search" })], 1);
    expect(findBest(root, "search")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// findFirstMatch
// ---------------------------------------------------------------------------

describe("findFirstMatch", () => {
  it("returns the first match in level order, not the best", () => {
    const root = makeNode({}, [
      makeNode({ description: "search" }),
      makeNode({ text: "search" }),
    ]);
    const match = findFirstMatch(root, "search");
    expect(match?.path).toBe("r/0");
    expect(match?.score).toBe(85);
  });

  it("returns null when nothing matches", () => {
    expect(findFirstMatch(makeNode({ text: "OK" }), "cancel")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// snapshot
// ---------------------------------------------------------------------------

describe("snapshot", () => {
  const tree = () =>
    makeNode({ text: "root" }, [
      makeNode({ text: "a" }, [makeNode({ text: "a1" })]),
      makeNode({ text: "b" }, [makeNode({ text: "b1" })]),
    ]);

  it("walks level by level", () => {
    const paths = snapshot(tree(), 10).map((n) => n.path);
    expect(paths).toEqual(["r", "r/0", "r/1", "r/0/0", "r/1/0"]);
  });

  it("stops at maxNodes", () => {
    const nodes = snapshot(tree(), 3);
    expect(nodes.map((n) => n.text)).toEqual(["root", "a", "b"]);
  });

  it("always returns at least the root", () => {
    expect(snapshot(tree(), 0).map((n) => n.path)).toEqual(["r"]);
    expect(snapshot(tree(), -5).map((n) => n.path)).toEqual(["r"]);
  });

  it("is empty without a root", () => {
    expect(snapshot(null, 10)).toEqual([]);
  });

  it("leaves out children that cannot be retrieved", () => {
    const root = new SparseNode([makeNode({ text: "a" }), makeNode({ text: "b" })], 0);
    expect(snapshot(root, 10).map((n) => n.path)).toEqual(["r", "r/1"]);
  });
});
