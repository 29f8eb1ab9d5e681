/**
 * SDK Configuration Constants
 *
 * Fixed, inspectable defaults for liveness and teardown timings. Every value
 * here can be overridden per configuration through `ConnectionTimings`.
 */

/** Interval between automatic pings while the connection is open (ms) */
export const DEFAULT_PING_INTERVAL_MS = 30_000

/** First reconnect delay, and the delay backoff returns to after a successful open (ms) */
export const DEFAULT_MIN_RECONNECT_DELAY_MS = 1_000

/** Upper bound for the reconnect delay (ms) */
export const DEFAULT_MAX_RECONNECT_DELAY_MS = 30_000

/** Multiplier for exponential backoff */
export const DEFAULT_RECONNECT_MULTIPLIER = 2

/**
 * Budget for a graceful close handshake.
 * When the peer never acknowledges the close frame, the socket is terminated.
 */
export const DEFAULT_CLOSE_TIMEOUT_MS = 2_000

/** Upper bound for the opening handshake of a single connect attempt (ms) */
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000

/** Queue capacity of a buffered traffic consumer before the oldest entries are dropped */
export const DEFAULT_CONSUMER_CAPACITY = 1_000

/** Lowest reconnect delay accepted from overrides (ms) */
export const RECONNECT_DELAY_FLOOR_MS = 100

/** Lowest ping interval accepted from overrides (ms) */
export const PING_INTERVAL_FLOOR_MS = 100

/**
 * Timing knobs for one connection session.
 *
 * @category Connection
 */
export interface ConnectionTimings {
  pingIntervalMs: number
  minReconnectDelayMs: number
  maxReconnectDelayMs: number
  reconnectMultiplier: number
  closeTimeoutMs: number
  handshakeTimeoutMs: number
}

/**
 * Everything the state machine needs to know about a session, captured when
 * `connect()` runs.
 *
 * @category Connection
 */
export interface SessionSettings extends ConnectionTimings {
  autoPing: boolean
  autoReconnect: boolean
}

export const DEFAULT_TIMINGS: Readonly<ConnectionTimings> = Object.freeze({
  pingIntervalMs: DEFAULT_PING_INTERVAL_MS,
  minReconnectDelayMs: DEFAULT_MIN_RECONNECT_DELAY_MS,
  maxReconnectDelayMs: DEFAULT_MAX_RECONNECT_DELAY_MS,
  reconnectMultiplier: DEFAULT_RECONNECT_MULTIPLIER,
  closeTimeoutMs: DEFAULT_CLOSE_TIMEOUT_MS,
  handshakeTimeoutMs: DEFAULT_HANDSHAKE_TIMEOUT_MS,
})

function pick(value: number | undefined, fallback: number, floor: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback
  return Math.max(value, floor)
}

/**
 * Merge overrides onto the defaults and clamp them into a usable range.
 *
 * Backoff never goes below {@link RECONNECT_DELAY_FLOOR_MS}, the maximum delay
 * never drops below the minimum, and the multiplier never shrinks delays.
 */
export function resolveSessionSettings(
  overrides: Partial<SessionSettings> = {}
): SessionSettings {
  const minReconnectDelayMs = pick(
    overrides.minReconnectDelayMs,
    DEFAULT_TIMINGS.minReconnectDelayMs,
    RECONNECT_DELAY_FLOOR_MS
  )
  return {
    autoPing: overrides.autoPing ?? false,
    autoReconnect: overrides.autoReconnect ?? false,
    pingIntervalMs: pick(overrides.pingIntervalMs, DEFAULT_TIMINGS.pingIntervalMs, PING_INTERVAL_FLOOR_MS),
    minReconnectDelayMs,
    maxReconnectDelayMs: pick(
      overrides.maxReconnectDelayMs,
      Math.max(DEFAULT_TIMINGS.maxReconnectDelayMs, minReconnectDelayMs),
      minReconnectDelayMs
    ),
    reconnectMultiplier: pick(overrides.reconnectMultiplier, DEFAULT_TIMINGS.reconnectMultiplier, 1),
    closeTimeoutMs: pick(overrides.closeTimeoutMs, DEFAULT_TIMINGS.closeTimeoutMs, 0),
    handshakeTimeoutMs: pick(overrides.handshakeTimeoutMs, DEFAULT_TIMINGS.handshakeTimeoutMs, 0),
  }
}
