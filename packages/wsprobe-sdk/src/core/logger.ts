/**
 * SDK diagnostic logger.
 *
 * Logs to `console.info/warn/error` with a `[WsProbe]` prefix so host
 * applications can route or filter SDK diagnostics separately from their
 * own output.
 *
 * **Privacy**: Never pass frame payloads or header values to these
 * functions. Endpoint URLs, state names and close codes are acceptable.
 *
 * @module Core/Logger
 */

const PREFIX = '[WsProbe]'

export function logInfo(message: string): void {
  console.info(PREFIX, message)
}

export function logWarn(message: string): void {
  console.warn(PREFIX, message)
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}
