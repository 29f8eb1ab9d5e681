import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createConnectionStore, type ConnectionStore } from './connectionStore'

describe('connectionStore', () => {
  let connectionStore: ConnectionStore

  beforeEach(() => {
    connectionStore = createConnectionStore()
  })

  describe('initial state', () => {
    it('should be idle initially', () => {
      const state = connectionStore.getState()
      expect(state.state).toBe('idle')
      expect(state.url).toBeNull()
      expect(state.error).toBeNull()
      expect(state.reconnectAttempt).toBe(0)
      expect(state.reconnectTargetTime).toBeNull()
    })
  })

  describe('setState', () => {
    it('should update the state', () => {
      connectionStore.getState().setState('connecting')
      expect(connectionStore.getState().state).toBe('connecting')

      connectionStore.getState().setState('failed')
      expect(connectionStore.getState().state).toBe('failed')
    })

    it('should notify selector subscribers only on change', () => {
      const listener = vi.fn()
      connectionStore.subscribe((state) => state.state, listener)

      connectionStore.getState().setState('connecting')
      connectionStore.getState().setError(null)
      connectionStore.getState().setState('connecting')

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith('connecting', 'idle')
    })
  })

  describe('setReconnectState', () => {
    it('should update attempt and target time together', () => {
      connectionStore.getState().setReconnectState(3, 1_700_000_000_000)
      expect(connectionStore.getState().reconnectAttempt).toBe(3)
      expect(connectionStore.getState().reconnectTargetTime).toBe(1_700_000_000_000)
    })
  })

  describe('reset', () => {
    it('should reset all state to initial values', () => {
      connectionStore.getState().setState('open')
      connectionStore.getState().setUrl('ws://probe.test')
      connectionStore.getState().setError('boom')
      connectionStore.getState().setReconnectState(2, 123)

      connectionStore.getState().reset()

      const state = connectionStore.getState()
      expect(state.state).toBe('idle')
      expect(state.url).toBeNull()
      expect(state.error).toBeNull()
      expect(state.reconnectAttempt).toBe(0)
      expect(state.reconnectTargetTime).toBeNull()
    })
  })
})
