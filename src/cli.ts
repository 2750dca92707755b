#!/usr/bin/env node
/**
 * CLI: run one command against a device and print the JSON response.
 */

import { parseArgs } from "node:util";

import { toResponse } from "./errors.js";
import { serializeCompact } from "./format.js";
import { RemoteSession } from "./index.js";
import { createLogger } from "./log.js";
import { COMMANDS } from "./router.js";
import { snapshot } from "./search.js";

const HELP = `a11y-bridge: remote control for an Android device

Usage:
  a11y-bridge <command> [params-json]
  a11y-bridge --tree [--dump <file.xml>]

Commands:
  ${[...COMMANDS].sort().join("\n  ")}

Options:
  --serial <serial>   Target device (default: $ANDROID_SERIAL, or the only device)
  --adb <path>        adb executable (default: $A11Y_BRIDGE_ADB or "adb")
  --dump <file.xml>   Read the UI tree from a saved uiautomator dump instead of a device
  --tree              Print the current tree as compact text
  --pretty            Indent JSON output
  --list              List command names
  --verbose           Print diagnostics to stderr
  -h, --help          Show this help message

Example:
  a11y-bridge ui.find '{"query": "search"}'`;

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    options: {
      serial: { type: "string" },
      adb: { type: "string" },
      dump: { type: "string" },
      tree: { type: "boolean", default: false },
      pretty: { type: "boolean", default: false },
      list: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }
  if (values.list) {
    console.log([...COMMANDS].sort().join("\n"));
    return 0;
  }

  const log = createLogger({ verbose: values.verbose });
  const session = await RemoteSession.connect({
    config: {
      ...(values.serial ? { serial: values.serial } : {}),
      ...(values.adb ? { adbPath: values.adb } : {}),
      ...(values.verbose ? { verbose: true } : {}),
    },
    dumpFile: values.dump,
    log,
  });

  if (values.tree) {
    const service = session.handle.current();
    if (!service) {
      console.error("Error: no device connected");
      return 1;
    }
    console.log(serializeCompact(snapshot(await service.getRoot(), Number.MAX_SAFE_INTEGER)));
    return 0;
  }

  const [command, params] = positionals;
  if (!command) {
    console.error(HELP);
    return 1;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const result = await session.run(command, params, { signal: controller.signal });
  console.log(JSON.stringify(toResponse(result), null, values.pretty ? 2 : undefined));
  return result.ok ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
