import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { ConnectionState } from '../core/types'

/**
 * Observable connection status, mirrored from the connection state machine.
 *
 * UI layers read this store instead of the machine itself. The Connection
 * module is the only writer.
 *
 * @example Direct store access (framework-agnostic)
 * ```ts
 * const unsubscribe = client.connectionStatus.subscribe(
 *   (state) => state.state,
 *   (state) => console.log('Connection state:', state)
 * )
 *
 * const { state, reconnectAttempt } = client.connectionStatus.getState()
 * ```
 *
 * @category Stores
 */
export interface ConnectionStatusState {
  state: ConnectionState
  /** URL of the current or last attempt, after template rendering */
  url: string | null
  error: string | null
  reconnectAttempt: number
  reconnectTargetTime: number | null

  setState: (state: ConnectionState) => void
  setUrl: (url: string | null) => void
  setError: (error: string | null) => void
  setReconnectState: (attempt: number, reconnectTargetTime: number | null) => void
  reset: () => void
}

const initialState: Pick<
  ConnectionStatusState,
  'state' | 'url' | 'error' | 'reconnectAttempt' | 'reconnectTargetTime'
> = {
  state: 'idle',
  url: null,
  error: null,
  reconnectAttempt: 0,
  reconnectTargetTime: null,
}

export function createConnectionStore() {
  return createStore<ConnectionStatusState>()(
    subscribeWithSelector((set) => ({
      ...initialState,

      setState: (state) => set({ state }),
      setUrl: (url) => set({ url }),
      setError: (error) => set({ error }),
      setReconnectState: (attempt, reconnectTargetTime) => set({ reconnectAttempt: attempt, reconnectTargetTime }),

      reset: () => set({ ...initialState }),
    }))
  )
}

export type ConnectionStore = ReturnType<typeof createConnectionStore>
