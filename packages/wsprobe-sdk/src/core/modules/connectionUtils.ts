/**
 * Shared utility functions for connection management.
 *
 * Pure functions kept apart from Connection.ts and the transport adapter so
 * they can be tested on their own.
 */
import type { Header } from '../types'
import { toError } from '../../utils/probeError'

/**
 * Flatten ordered headers into the record form the handshake request takes.
 * When a name repeats, the later value wins but keeps the earlier position.
 */
export function toHeaderRecord(headers: readonly Header[]): Record<string, string> {
  const record: Record<string, string> = {}
  for (const { name, value } of headers) {
    record[name] = value
  }
  return record
}

/**
 * Ping payload: the send time in ms since epoch, so the echoing pong can be timed.
 */
export function createPingPayload(now: number = Date.now()): string {
  return String(now)
}

/**
 * Round-trip time for a pong echoing one of our ping payloads.
 *
 * @returns Milliseconds, or undefined when the payload is not a ping timestamp
 */
export function measureRoundTrip(pongPayload: string, now: number = Date.now()): number | undefined {
  if (!/^\d+$/.test(pongPayload)) return undefined
  const sentAt = Number(pongPayload)
  if (!Number.isSafeInteger(sentAt) || sentAt > now) return undefined
  return now - sentAt
}

/**
 * Run a promise-returning call, turning a synchronous throw into a rejection.
 * Transport implementations are external code; this keeps a misbehaving one
 * from throwing inside a state machine action.
 */
export function callAsync<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return fn()
  } catch (err) {
    return Promise.reject(toError(err))
  }
}
