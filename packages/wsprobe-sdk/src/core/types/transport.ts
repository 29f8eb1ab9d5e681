/**
 * Transport collaborator contract.
 *
 * The transport owns the WebSocket wire protocol. The SDK only asks it to open
 * a socket, push frames, and close; everything it observes arrives through the
 * listener passed to `open()`.
 *
 * @packageDocumentation
 * @module Types/Transport
 */

import type { Header } from './connection'
import type { MessagePayload } from './message'

/**
 * @category Transport
 */
export interface TransportOpenRequest {
  url: string
  headers: Header[]
  sslVerify: boolean
  /** Upper bound for the opening handshake (ms) */
  handshakeTimeoutMs: number
}

/**
 * Events reported by an open transport.
 *
 * @category Transport
 */
export type TransportEvent =
  | { type: 'frame'; payload: MessagePayload }
  | { type: 'pong'; payload: string }
  | { type: 'closed'; code: number; reason: string }
  | { type: 'error'; error: Error }

/** @category Transport */
export type TransportListener = (event: TransportEvent) => void

/**
 * An open socket.
 *
 * @category Transport
 */
export interface TransportHandle {
  /** Send a text or binary frame. Rejects when the frame cannot be written. */
  send(payload: MessagePayload): Promise<void>
  /** Send a protocol ping carrying `payload`. */
  ping(payload: string): Promise<void>
  /** Start the closing handshake. Completion is reported as a `closed` event. */
  close(): void
  /** Destroy the socket immediately. */
  terminate(): void
}

/**
 * @category Transport
 */
export interface Transport {
  /**
   * Open a socket. Resolves once the handshake completes, rejects if it fails
   * or if `signal` aborts first. Events are delivered to `listener` only after
   * the returned promise resolves.
   */
  open(request: TransportOpenRequest, listener: TransportListener, signal?: AbortSignal): Promise<TransportHandle>
}
