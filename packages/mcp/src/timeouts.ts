/**
 * Process-wide default timeouts for tool-server connections
 *
 * Connections read these by value when an operation starts, so a later change
 * never affects an operation already in flight. Tests should snapshot with
 * `getTimeoutDefaults()` and restore with `setTimeoutDefaults()` or
 * `resetTimeoutDefaults()`.
 */

export type TimeoutConfig = {
  /** Handshake bound, in ms */
  connect: number;
  /** Bound for each listTools / callTool request, in ms */
  execute: number;
  /** Overall bound for streamed responses on url transports, in ms */
  read: number;
};

export const DEFAULT_TIMEOUTS: Readonly<TimeoutConfig> = Object.freeze({
  connect: 10_000,
  execute: 60_000,
  read: 120_000,
});

let current: TimeoutConfig = { ...DEFAULT_TIMEOUTS };

export function getTimeoutDefaults(): TimeoutConfig {
  return { ...current };
}

export function setTimeoutDefaults(overrides: Partial<TimeoutConfig>): TimeoutConfig {
  const next = { ...current };
  for (const key of ["connect", "execute", "read"] as const) {
    const value = overrides[key];
    if (value === undefined) {
      continue;
    }
    if (!Number.isFinite(value) || value <= 0) {
      throw new RangeError(`Timeout '${key}' must be a positive number of ms, got ${value}`);
    }
    next[key] = value;
  }
  current = next;
  return getTimeoutDefaults();
}

export function resetTimeoutDefaults(): void {
  current = { ...DEFAULT_TIMEOUTS };
}

/**
 * Per-connection overrides win over the defaults current at call time
 */
export function resolveTimeouts(overrides: Partial<TimeoutConfig> = {}): TimeoutConfig {
  const defaults = getTimeoutDefaults();
  return {
    connect: overrides.connect ?? defaults.connect,
    execute: overrides.execute ?? defaults.execute,
    read: overrides.read ?? defaults.read,
  };
}
