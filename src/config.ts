/**
 * Defaults, clamp ranges and environment configuration.
 */

// ---------------------------------------------------------------------------
// Command defaults and limits
// ---------------------------------------------------------------------------

export const TAP_DURATION = { min: 40, max: 1000, default: 60 } as const;
export const WAIT_TIMEOUT = { min: 100, max: 15_000, default: 3000 } as const;
export const WAIT_POLL = { min: 50, max: 1000, default: 150 } as const;
export const SNAPSHOT_MAX_NODES = { min: 1, default: 300 } as const;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export interface BridgeConfig {
  /** adb executable. */
  adbPath: string;
  /** Device serial passed as `adb -s`; null targets the only attached device. */
  serial: string | null;
  /** Per-invocation timeout for adb commands. */
  adbTimeoutMs: number;
  verbose: boolean;
}

function envFlag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<BridgeConfig> = {},
): BridgeConfig {
  const timeout = Number.parseInt(env.A11Y_BRIDGE_ADB_TIMEOUT_MS ?? "", 10);
  return {
    adbPath: env.A11Y_BRIDGE_ADB || "adb",
    serial: env.ANDROID_SERIAL || null,
    adbTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : 10_000,
    verbose: envFlag(env.A11Y_BRIDGE_VERBOSE),
    ...overrides,
  };
}
