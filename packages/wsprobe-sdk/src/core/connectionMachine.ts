/**
 * XState connection state machine.
 *
 * Manages the lifecycle of one WebSocket session with explicit, auditable
 * state transitions. The actor's mailbox serializes every command, transport
 * event and timer firing, so at most one transition is ever in progress.
 *
 * ## State Diagram
 *
 * ```
 * ┌──────┐ CONNECT ┌────────────┐ TRANSPORT_OPENED ┌───────────────────┐
 * │ idle │────────►│ connecting │─────────────────►│       open        │
 * └──────┘         └──┬──────┬──┘                  │ pinging | quiet   │
 *    ▲                │      │ ▲                   └──┬─────────────┬──┘
 *    │     DISCONNECT │      │ │ RECONNECT_          │ DISCONNECT  │ TRANSPORT_FAILED
 *    │                │      │ │ TIMER_FIRED         ▼             │ TRANSPORT_CLOSED_
 *    │                │      │ │               ┌──────────┐        │ UNEXPECTEDLY
 *    │                │      │ │               │ closing  │        │
 *    │                │      │ │               └────┬─────┘        │
 *    │                │      ▼ │   TRANSPORT_CLOSED │ / timeout    │
 *    │                │   ┌────┴──────────────┐     │              │
 *    │                │   │      failed       │◄────┼──────────────┘
 *    │                │   │ waiting | resting │     │
 *    │                │   └─────────┬─────────┘     │
 *    │                ▼  DISCONNECT ▼               ▼
 *    │   RESET   ┌─────────────────────────────────────┐
 *    └───────────│               closed                 │
 *                └─────────────────────────────────────┘
 * ```
 *
 * CONNECT leaves `closed` and `failed`; RESET returns either to `idle`.
 *
 * ## Key Invariants
 *
 * 1. `open.pinging` is entered iff auto-ping is enabled; its delayed self
 *    re-entry is the ping timer
 * 2. `failed.waiting` is entered iff auto-reconnect is enabled; its delayed
 *    transition is the reconnect timer
 * 3. Leaving a state cancels its delayed transitions, so no timer fires
 *    against a stale state
 * 4. Backoff grows per consecutive failure, is capped at `maxReconnectDelayMs`,
 *    and resets on every successful open and every user CONNECT
 * 5. `closing` always ends in `closed`, at the latest after `closeTimeoutMs`
 *
 * The machine performs no I/O. Transport actions are declared here as no-ops
 * and implemented by the Connection module through `provide()`.
 *
 * @module Core/ConnectionMachine
 */
import { setup, assign, raise, type ActorRefFrom, type SnapshotFrom } from 'xstate'
import type { ConnectionState, MessagePayload } from './types'
import { resolveSessionSettings, type SessionSettings } from './config'

// ============================================================================
// Types
// ============================================================================

/**
 * A frame received from the transport.
 */
export type InboundFrame =
  | { kind: 'text' | 'binary'; payload: MessagePayload }
  | { kind: 'pong'; payload: string }

/**
 * Commands and transport events accepted by the connection machine.
 */
export type ConnectionMachineEvent =
  | { type: 'CONNECT'; settings: SessionSettings }
  | { type: 'DISCONNECT' }
  | { type: 'SEND'; payload: MessagePayload }
  | { type: 'PING' }
  | { type: 'RESET' }
  | { type: 'INBOUND_FRAME'; frame: InboundFrame }
  | { type: 'TRANSPORT_OPENED' }
  | { type: 'TRANSPORT_FAILED'; error: string }
  | { type: 'TRANSPORT_CLOSED'; code?: number; reason?: string }
  | { type: 'TRANSPORT_CLOSED_UNEXPECTEDLY'; code?: number; reason?: string }
  | { type: 'RECONNECT_TIMER_FIRED' }

/**
 * Context (extended state) for the connection machine.
 */
export interface ConnectionMachineContext {
  /** Settings captured by the last CONNECT */
  settings: SessionSettings
  /** Consecutive failures since the last successful open (0 when not reconnecting) */
  reconnectAttempt: number
  /** Delay before the pending reconnect (ms), 0 when none is pending */
  nextRetryDelayMs: number
  /** Absolute timestamp (ms since epoch) when the reconnect timer fires, null when not waiting */
  reconnectTargetTime: number | null
  /** Last error message, null when no error */
  lastError: string | null
}

// ============================================================================
// Helpers (pure functions)
// ============================================================================

/**
 * Compute the capped exponential backoff delay for a given attempt number.
 *
 * @param attempt - 1-based attempt number
 * @returns Delay in milliseconds, within [minReconnectDelayMs, maxReconnectDelayMs]
 */
export function computeBackoffDelay(
  attempt: number,
  settings: Pick<SessionSettings, 'minReconnectDelayMs' | 'maxReconnectDelayMs' | 'reconnectMultiplier'>
): number {
  const raw = settings.minReconnectDelayMs * Math.pow(settings.reconnectMultiplier, Math.max(attempt, 1) - 1)
  return Math.min(Math.max(raw, settings.minReconnectDelayMs), settings.maxReconnectDelayMs)
}

function describeClose(code: number | undefined): string {
  return code === undefined ? 'Closed by remote side' : `Closed by remote side with code ${code}`
}

// ============================================================================
// Machine Definition
// ============================================================================

export const connectionMachine = setup({
  types: {
    context: {} as ConnectionMachineContext,
    events: {} as ConnectionMachineEvent,
  },
  actions: {
    // Transport side effects, implemented by the Connection module
    openTransport: () => {},
    closeTransport: () => {},
    releaseTransport: () => {},
    forceClose: () => {},
    transmit: () => {},
    transmitPing: () => {},
    deliverInbound: () => {},

    applySettings: assign(({ event }) => {
      if (event.type === 'CONNECT') {
        return { settings: event.settings }
      }
      return {}
    }),

    // Reset all reconnection-related context to defaults
    resetReconnectState: assign({
      reconnectAttempt: 0,
      nextRetryDelayMs: 0,
      reconnectTargetTime: null,
    }),

    // Count the failure and compute the delay for the reconnect timer.
    // Sets reconnectTargetTime as an absolute timestamp for UI countdown.
    incrementAttempt: assign(({ context }) => {
      const attempt = context.reconnectAttempt + 1
      const delay = computeBackoffDelay(attempt, context.settings)
      return {
        reconnectAttempt: attempt,
        nextRetryDelayMs: delay,
        reconnectTargetTime: Date.now() + delay,
      }
    }),

    // Store error message from event
    setError: assign(({ event }) => {
      if (event.type === 'TRANSPORT_FAILED') {
        return { lastError: event.error }
      }
      if (event.type === 'TRANSPORT_CLOSED_UNEXPECTEDLY') {
        return { lastError: describeClose(event.code) }
      }
      return {}
    }),

    clearTargetTime: assign({
      reconnectTargetTime: null,
    }),

    clearError: assign({
      lastError: null,
    }),

    raisePing: raise({ type: 'PING' }),
    raiseReconnect: raise({ type: 'RECONNECT_TIMER_FIRED' }),
  },
  guards: {
    autoPingEnabled: ({ context }) => context.settings.autoPing,
    autoReconnectEnabled: ({ context }) => context.settings.autoReconnect,
  },
  delays: {
    pingInterval: ({ context }) => context.settings.pingIntervalMs,
    reconnectDelay: ({ context }) => context.nextRetryDelayMs,
    closeTimeout: ({ context }) => context.settings.closeTimeoutMs,
  },
}).createMachine({
  id: 'connection',
  context: {
    settings: resolveSessionSettings(),
    reconnectAttempt: 0,
    nextRetryDelayMs: 0,
    reconnectTargetTime: null,
    lastError: null,
  },
  initial: 'idle',
  states: {
    /**
     * No connection has been attempted since creation or the last RESET.
     */
    idle: {
      on: {
        CONNECT: {
          target: 'connecting',
          actions: ['applySettings', 'resetReconnectState', 'clearError'],
        },
      },
    },

    /**
     * Transport open in flight. A user DISCONNECT cancels it outright.
     */
    connecting: {
      entry: 'openTransport',
      on: {
        TRANSPORT_OPENED: [
          {
            guard: 'autoPingEnabled',
            target: 'open.pinging',
            actions: ['resetReconnectState', 'clearError'],
          },
          {
            target: 'open.quiet',
            actions: ['resetReconnectState', 'clearError'],
          },
        ],
        TRANSPORT_FAILED: [
          { guard: 'autoReconnectEnabled', target: 'failed.waiting', actions: 'setError' },
          { target: 'failed.resting', actions: 'setError' },
        ],
        TRANSPORT_CLOSED_UNEXPECTEDLY: [
          { guard: 'autoReconnectEnabled', target: 'failed.waiting', actions: 'setError' },
          { target: 'failed.resting', actions: 'setError' },
        ],
        DISCONNECT: {
          target: 'closed',
        },
      },
    },

    /**
     * Transport is open. SEND, PING and inbound frames never leave this state.
     */
    open: {
      initial: 'quiet',
      on: {
        SEND: { actions: 'transmit' },
        PING: { actions: 'transmitPing' },
        INBOUND_FRAME: { actions: 'deliverInbound' },
        DISCONNECT: {
          target: 'closing',
        },
        TRANSPORT_FAILED: [
          { guard: 'autoReconnectEnabled', target: 'failed.waiting', actions: 'setError' },
          { target: 'failed.resting', actions: 'setError' },
        ],
        TRANSPORT_CLOSED_UNEXPECTEDLY: [
          { guard: 'autoReconnectEnabled', target: 'failed.waiting', actions: 'setError' },
          { target: 'failed.resting', actions: 'setError' },
        ],
      },
      states: {
        /** Auto-ping on: each interval raises PING and restarts the timer */
        pinging: {
          after: {
            pingInterval: {
              target: 'pinging',
              reenter: true,
              actions: 'raisePing',
            },
          },
        },
        /** Auto-ping off: pings only on request */
        quiet: {},
      },
    },

    /**
     * Close handshake requested. Bounded by closeTimeout.
     */
    closing: {
      entry: 'closeTransport',
      after: {
        closeTimeout: {
          target: 'closed',
          actions: 'forceClose',
        },
      },
      on: {
        INBOUND_FRAME: { actions: 'deliverInbound' },
        TRANSPORT_CLOSED: { target: 'closed' },
        TRANSPORT_CLOSED_UNEXPECTEDLY: { target: 'closed' },
        TRANSPORT_FAILED: { target: 'closed' },
      },
    },

    /**
     * Clean shutdown after a user DISCONNECT. Resting state.
     */
    closed: {
      entry: ['releaseTransport', 'resetReconnectState'],
      on: {
        CONNECT: {
          target: 'connecting',
          actions: ['applySettings', 'resetReconnectState', 'clearError'],
        },
        RESET: {
          target: 'idle',
          actions: 'clearError',
        },
      },
    },

    /**
     * Transport failure. Resting state; `waiting` schedules the next attempt.
     */
    failed: {
      initial: 'resting',
      entry: 'releaseTransport',
      on: {
        CONNECT: {
          target: 'connecting',
          actions: ['applySettings', 'resetReconnectState', 'clearError'],
        },
        DISCONNECT: {
          target: 'closed',
        },
        RESET: {
          target: 'idle',
          actions: ['resetReconnectState', 'clearError'],
        },
      },
      states: {
        waiting: {
          entry: 'incrementAttempt',
          after: {
            reconnectDelay: {
              actions: 'raiseReconnect',
            },
          },
          on: {
            RECONNECT_TIMER_FIRED: {
              target: '#connection.connecting',
              actions: 'clearTargetTime',
            },
          },
        },
        resting: {},
      },
    },
  },
})

// ============================================================================
// Actor Type
// ============================================================================

/**
 * Type for a running connection machine actor.
 */
export type ConnectionActor = ActorRefFrom<typeof connectionMachine>

export type ConnectionSnapshot = SnapshotFrom<typeof connectionMachine>

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Map a machine snapshot onto the flat {@link ConnectionState}.
 */
export function getConnectionState(snapshot: ConnectionSnapshot): ConnectionState {
  if (snapshot.matches('connecting')) return 'connecting'
  if (snapshot.matches('open')) return 'open'
  if (snapshot.matches('closing')) return 'closing'
  if (snapshot.matches('closed')) return 'closed'
  if (snapshot.matches('failed')) return 'failed'
  return 'idle'
}

/**
 * Check whether a reconnect timer is pending.
 */
export function isAwaitingReconnect(snapshot: ConnectionSnapshot): boolean {
  return snapshot.matches({ failed: 'waiting' })
}

/**
 * Extract reconnection info from machine context for UI display.
 *
 * @returns Reconnect attempt number and target time for countdown
 */
export function getReconnectInfoFromContext(context: ConnectionMachineContext): {
  attempt: number
  reconnectTargetTime: number | null
} {
  return {
    attempt: context.reconnectAttempt,
    reconnectTargetTime: context.reconnectTargetTime,
  }
}
