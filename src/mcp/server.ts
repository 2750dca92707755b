/**
 * MCP server: exposes every bridge command as a tool for AI agents.
 *
 * Tool results carry the same JSON body the CLI prints: the success
 * payload, or `{ok: false, error: {code, message}}` with `isError` set.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { toResponse } from "../errors.js";
import type { RemoteSession } from "../index.js";
import type { CommandResult } from "../types.js";

/** Tool result carrying the command's JSON response as text. */
export function textResult(result: CommandResult) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(toResponse(result)) }],
    isError: !result.ok,
  };
}

export function createServer(session: RemoteSession): McpServer {
  const server = new McpServer({
    name: "a11y-bridge",
    version: "0.1.0",
  });

  // -------------------------------------------------------------------------
  // Apps and raw input
  // -------------------------------------------------------------------------

  server.tool(
    "app_launch",
    `Launch an installed Android app by package name.

Without 'activity' the package's launcher activity is started.`,
    {
      packageName: z.string().describe("Package name, e.g. 'com.android.settings'"),
      activity: z.string().optional().describe("Fully qualified activity class to start instead"),
    },
    async (args) => textResult(await session.run("app.launch", args)),
  );

  server.tool(
    "screen_tap",
    `Tap the screen at device pixel coordinates.

durationMs is the press length (default 60, clamped to 40..1000).`,
    {
      x: z.number().describe("X coordinate in device pixels"),
      y: z.number().describe("Y coordinate in device pixels"),
      durationMs: z.number().optional().describe("Press duration in milliseconds"),
    },
    async (args, extra) => textResult(await session.run("screen.tap", args, { signal: extra.signal })),
  );

  server.tool(
    "text_input",
    `Replace the text of an input field.

Targets the focused field. With 'targetQuery', the first element matching
the query is focused or tapped first to find the field.`,
    {
      text: z.string().describe("Text to enter"),
      targetQuery: z.string().optional().describe("Text, description, hint or id of the target field"),
    },
    async (args) => textResult(await session.run("text.input", args)),
  );

  server.tool(
    "ime_paste",
    `Paste text into an input field through the clipboard.

Falls back to replacing the field text when the paste is rejected.`,
    {
      text: z.string().describe("Text to paste"),
      targetQuery: z.string().optional().describe("Text, description, hint or id of the target field"),
    },
    async (args) => textResult(await session.run("ime.paste", args)),
  );

  // -------------------------------------------------------------------------
  // UI tree
  // -------------------------------------------------------------------------

  server.tool(
    "ui_snapshot",
    `List UI elements of the foreground app in breadth-first order.

Each node has a 'path' (e.g. 'r/0/2') usable with ui_click. Paths are only
valid until the screen changes; take a new snapshot after acting.`,
    {
      maxNodes: z.number().int().optional().describe("Maximum nodes to return (default 300)"),
    },
    async (args) => textResult(await session.run("ui.snapshot", args)),
  );

  server.tool(
    "ui_find",
    `Find the element that best matches a text query.

Matches text, content description, hint and resource id (case-insensitive
substring). Visible text outranks description, hint and id.`,
    {
      query: z.string().describe("Text to look for"),
    },
    async (args) => textResult(await session.run("ui.find", args)),
  );

  server.tool(
    "ui_click",
    `Click an element by snapshot path or by text query.

When the element itself is not clickable, its nearest clickable ancestor
is clicked.`,
    {
      path: z.string().optional().describe("Node path from ui_snapshot, e.g. 'r/0/2'"),
      query: z.string().optional().describe("Text to look for when no path is given"),
    },
    async (args) => textResult(await session.run("ui.click", args)),
  );

  server.tool(
    "ui_wait_for",
    `Wait until an element matching the query appears, or disappears with expectGone.

timeoutMs defaults to 3000 (100..15000); pollMs to 150 (50..1000).`,
    {
      query: z.string().describe("Text to look for"),
      timeoutMs: z.number().optional(),
      pollMs: z.number().optional(),
      expectGone: z.boolean().optional().describe("Wait for the element to disappear instead"),
    },
    async (args, extra) => textResult(await session.run("ui.waitFor", args, { signal: extra.signal })),
  );

  return server;
}
