/**
 * Error categories raised by the SDK.
 *
 * - invalid-state:   Command issued in a state that does not accept it
 * - already-active:  Connect issued while a connection is connecting or open
 * - transport-error: Open, send or read failure reported by the transport
 * - invalid-name:    Empty variable, context or configuration name
 */
export type ProbeErrorCode = 'invalid-state' | 'already-active' | 'transport-error' | 'invalid-name'

/**
 * Structured SDK error.
 *
 * Local conditions (`invalid-state`, `already-active`) are returned to the
 * caller inside a {@link CommandResult}; they never change connection state.
 */
export class ProbeError extends Error {
  readonly code: ProbeErrorCode

  constructor(code: ProbeErrorCode, message?: string) {
    super(message ?? formatProbeErrorCode(code))
    this.name = 'ProbeError'
    this.code = code
  }
}

/**
 * Outcome of a connection command.
 *
 * @example
 * ```typescript
 * const result = client.send('{"op":"subscribe"}')
 * if (!result.ok) {
 *   console.warn(formatProbeError(result.error))
 * }
 * ```
 */
export type CommandResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: ProbeError }

export function succeed<T>(value: T): CommandResult<T> {
  return { ok: true, value }
}

export function fail<T = never>(code: ProbeErrorCode, message?: string): CommandResult<T> {
  return { ok: false, error: new ProbeError(code, message) }
}

/**
 * Convert a kebab-case code to sentence case: 'invalid-state' → 'Invalid state'
 */
function formatProbeErrorCode(code: ProbeErrorCode): string {
  const words = code.split('-')
  words[0] = words[0].charAt(0).toUpperCase() + words[0].slice(1)
  return words.join(' ')
}

/**
 * Format a ProbeError into a human-readable string, prefixed by its category
 * when the message carries extra detail.
 */
export function formatProbeError(error: ProbeError): string {
  const category = formatProbeErrorCode(error.code)
  if (error.message === category) return category
  return `${category}: ${error.message}`
}

/**
 * Normalize anything thrown or rejected into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  if (typeof value === 'string') return new Error(value)
  return new Error(String(value))
}

/**
 * Extract a message from anything thrown or rejected.
 */
export function errorMessage(value: unknown): string {
  return toError(value).message
}
