/**
 * Shared test utilities for connection tests
 */
import { vi, type Mock } from 'vitest'
import type {
  ConnectionConfig,
  MessagePayload,
  Transport,
  TransportEvent,
  TransportHandle,
  TransportListener,
  TransportOpenRequest,
} from './types'

export interface MockHandle extends TransportHandle {
  send: Mock<(payload: MessagePayload) => Promise<void>>
  ping: Mock<(payload: string) => Promise<void>>
  close: Mock<() => void>
  terminate: Mock<() => void>
}

/**
 * One call to `Transport.open()`. The test decides when (and whether) the
 * handshake completes.
 */
export interface MockAttempt {
  request: TransportOpenRequest
  signal: AbortSignal | undefined
  handle: MockHandle
  /** Deliver a transport event through the listener this attempt registered */
  emit: (event: TransportEvent) => void
  /** Complete the handshake with `handle` */
  resolve: () => void
  reject: (error: Error) => void
}

export interface MockTransport extends Transport {
  attempts: MockAttempt[]
  /** The most recent attempt; throws when there is none */
  latest: () => MockAttempt
}

export const createMockHandle = (): MockHandle => ({
  send: vi.fn((_payload: MessagePayload) => Promise.resolve()),
  ping: vi.fn((_payload: string) => Promise.resolve()),
  close: vi.fn(),
  terminate: vi.fn(),
})

/**
 * Create a transport whose open attempts stay pending until resolved by the test.
 */
export const createMockTransport = (): MockTransport => {
  const attempts: MockAttempt[] = []

  return {
    attempts,
    latest: () => {
      const attempt = attempts[attempts.length - 1]
      if (!attempt) throw new Error('No open attempt recorded')
      return attempt
    },
    open: (request: TransportOpenRequest, listener: TransportListener, signal?: AbortSignal) =>
      new Promise<TransportHandle>((resolve, reject) => {
        const handle = createMockHandle()
        attempts.push({
          request,
          signal,
          handle,
          emit: (event) => listener(event),
          resolve: () => resolve(handle),
          reject,
        })
      }),
  }
}

/**
 * Create a connection configuration with overrides.
 */
export const createTestConfig = (overrides: Partial<ConnectionConfig> = {}): ConnectionConfig => ({
  url: 'ws://probe.test/socket',
  headers: [],
  sslVerify: true,
  autoPing: false,
  autoReconnect: false,
  useTemplateForURL: false,
  useTemplateForData: false,
  activeContext: null,
  ...overrides,
})

/**
 * Let pending promise callbacks run.
 */
export const flushPromises = async (): Promise<void> => {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve()
  }
}
