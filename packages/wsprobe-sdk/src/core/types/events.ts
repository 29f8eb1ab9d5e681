/**
 * Client event types.
 *
 * Events use object payloads so fields can be added without breaking
 * subscribers.
 *
 * @packageDocumentation
 * @module Types/Events
 */

import type { ConnectionState } from './connection'

export interface ProbeEvents {
  /** Connection state changed */
  'connection:state': {
    state: ConnectionState
    previous: ConnectionState
  }

  /** Transport opened */
  'connection:open': {
    url: string
  }

  /** Connection closed after a user disconnect */
  'connection:closed': {
    code?: number
    reason?: string
  }

  /** Open, send or read failure */
  'connection:error': {
    error: string
  }

  /** Reconnect scheduled */
  'connection:reconnecting': {
    attempt: number
    delayMs: number
  }
}

export type ProbeEventHandler<K extends keyof ProbeEvents> = (payload: ProbeEvents[K]) => void
