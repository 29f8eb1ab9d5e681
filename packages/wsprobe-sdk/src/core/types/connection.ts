/**
 * Connection type definitions.
 *
 * @packageDocumentation
 * @module Types/Connection
 */

import type { ConnectionTimings } from '../config'

/**
 * Lifecycle state of the connection.
 *
 * @remarks
 * State transitions:
 * - `idle` → `connecting` → `open` (connect succeeds)
 * - `connecting` → `failed` (open fails)
 * - `open` → `closing` → `closed` (user disconnect)
 * - `open` → `failed` → `connecting` (unexpected close with auto-reconnect)
 * - `connecting` → `closed` (user disconnect cancels the attempt)
 * - `closed` / `failed` → `idle` (explicit reset)
 *
 * `closed` and `failed` are resting states: `connect()` leaves them.
 *
 * @category Connection
 */
export type ConnectionState = 'idle' | 'connecting' | 'open' | 'closing' | 'closed' | 'failed'

/**
 * One handshake header. Headers are kept as an ordered list.
 *
 * @category Connection
 */
export interface Header {
  name: string
  value: string
}

/**
 * Connection configuration supplied by the host application.
 *
 * The Connection module snapshots it when `connect()` runs, so edits made
 * while a session is live take effect on the next `connect()`.
 *
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   url: 'wss://$host/stream',
 *   headers: [{ name: 'Authorization', value: 'Bearer test-token' }],
 *   sslVerify: true,
 *   autoPing: true,
 *   autoReconnect: true,
 *   useTemplateForURL: true,
 *   useTemplateForData: false,
 *   activeContext: 'staging',
 * }
 * ```
 *
 * @category Connection
 */
export interface ConnectionConfig {
  /** Endpoint URL, possibly containing `$name` / `${name}` placeholders */
  url: string
  /** Handshake headers, in order */
  headers: Header[]
  /** Verify the server certificate for `wss://` endpoints */
  sslVerify: boolean
  /** Send a ping at a fixed interval while open */
  autoPing: boolean
  /** Reconnect with backoff after a transport failure */
  autoReconnect: boolean
  /** Render the URL as a template before each open attempt */
  useTemplateForURL: boolean
  /** Render outgoing text frames as templates */
  useTemplateForData: boolean
  /** Variable context layered over the global scope, or null for globals only */
  activeContext: string | null
  /** Per-configuration timing overrides */
  timings?: Partial<ConnectionTimings>
}
