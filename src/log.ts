/**
 * Leveled logging to stderr. Stdout carries command output and the MCP
 * stdio transport, so nothing here may write to it.
 */

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(options?: { verbose?: boolean; prefix?: string }): Logger {
  const prefix = options?.prefix ?? "a11y-bridge";
  const verbose = options?.verbose ?? false;
  return {
    debug(message) {
      if (verbose) console.error(`[${prefix}] ${message}`);
    },
    warn(message) {
      console.error(`[${prefix}] warning: ${message}`);
    },
    error(message) {
      console.error(`[${prefix}] error: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
};
