import { createActor, waitFor, type Actor } from 'xstate'
import type {
  ConnectionConfig,
  ConnectionState,
  MessagePayload,
  ProbeEvents,
  Transport,
  TransportEvent,
  TransportHandle,
} from '../types'
import { resolveSessionSettings, type ConnectionTimings, type SessionSettings } from '../config'
import { logInfo, logWarn, logError } from '../logger'
import {
  connectionMachine,
  getConnectionState,
  getReconnectInfoFromContext,
  isAwaitingReconnect,
  type ConnectionMachineEvent,
  type ConnectionSnapshot,
  type InboundFrame,
} from '../connectionMachine'
import { callAsync, createPingPayload, measureRoundTrip } from './connectionUtils'
import type { TrafficChannel } from '../trafficChannel'
import type { TemplateResolver } from '../template'
import type { ConnectionStore } from '../../stores/connectionStore'
import { errorMessage, fail, succeed, type CommandResult } from '../../utils/probeError'

function disposedFailure(): CommandResult<never> {
  return fail('invalid-state', 'Connection has been disposed')
}

export interface ConnectionDependencies {
  transport: Transport
  channel: TrafficChannel
  templates: TemplateResolver
  status: ConnectionStore
  /** Returns the configuration a `connect()` call should snapshot */
  getConfiguration: () => ConnectionConfig
  emit: <K extends keyof ProbeEvents>(event: K, payload: ProbeEvents[K]) => void
  /** Client-wide timing defaults; a configuration's own `timings` win */
  timings?: Partial<ConnectionTimings>
}

/**
 * Connection lifecycle driver.
 *
 * The state machine in `connectionMachine.ts` owns every transition and timer.
 * This module provides the side-effecting actions the machine names (opening
 * and releasing the transport, writing frames, publishing traffic) and turns
 * transport callbacks into machine events.
 *
 * Each open attempt gets an id. Callbacks from the transport carry the id of
 * the attempt that registered them, and anything arriving for an attempt that
 * is no longer current is discarded. A handle that resolves after its attempt
 * was abandoned is terminated on arrival.
 *
 * Commands return a {@link CommandResult}; they never throw for a state
 * mismatch.
 */
export class Connection {
  private readonly actor: Actor<typeof connectionMachine>
  private session: ConnectionConfig | null = null
  private handle: TransportHandle | null = null
  private abortController: AbortController | null = null
  private attemptId = 0
  private currentUrl = ''
  private closeInfo: ProbeEvents['connection:closed'] = {}
  private previousState: ConnectionState = 'idle'
  private previousAttempt = 0
  private disposed = false

  constructor(private readonly deps: ConnectionDependencies) {
    this.actor = createActor(
      connectionMachine.provide({
        actions: {
          openTransport: ({ context }) => this.openTransport(context.settings),
          closeTransport: () => this.closeTransport(),
          releaseTransport: () => this.releaseTransport(),
          forceClose: ({ context }) => {
            logWarn(`Close handshake timed out after ${context.settings.closeTimeoutMs}ms, terminating`)
          },
          transmit: ({ event }) => {
            if (event.type === 'SEND') this.transmit(event.payload)
          },
          transmitPing: () => this.transmitPing(),
          deliverInbound: ({ event }) => {
            if (event.type === 'INBOUND_FRAME') this.deliverInbound(event.frame)
          },
        },
      })
    )

    this.actor.subscribe({
      next: (snapshot) => this.syncSnapshot(snapshot),
      error: (err) => logError(`Connection machine stopped: ${errorMessage(err)}`),
    })
    this.actor.start()
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  get state(): ConnectionState {
    return this.disposed ? 'idle' : getConnectionState(this.actor.getSnapshot())
  }

  /** URL of the current or most recent open attempt, after rendering */
  get url(): string {
    return this.currentUrl
  }

  getSnapshot(): ConnectionSnapshot {
    return this.actor.getSnapshot()
  }

  // ============================================================================
  // Commands
  // ============================================================================

  /**
   * Start connecting with a snapshot of the active configuration.
   *
   * The snapshot covers the URL, headers, toggles and template context; edits
   * made afterwards apply to the next `connect()`. The URL template is
   * re-rendered on every attempt, reconnects included.
   */
  connect(): CommandResult {
    if (this.disposed) return disposedFailure()
    const snapshot = this.actor.getSnapshot()
    const state = getConnectionState(snapshot)
    if (state === 'connecting' || state === 'open') {
      return fail('already-active', `Connection is already ${state}`)
    }

    const config = structuredClone(this.deps.getConfiguration())
    const settings = resolveSessionSettings({
      ...this.deps.timings,
      ...config.timings,
      autoPing: config.autoPing,
      autoReconnect: config.autoReconnect,
    })
    const event: ConnectionMachineEvent = { type: 'CONNECT', settings }
    if (!snapshot.can(event)) {
      return fail('invalid-state', `Cannot connect while ${state}`)
    }

    this.session = config
    this.actor.send(event)
    return succeed(undefined)
  }

  /**
   * Send a frame. Text is rendered through the template resolver when the
   * session has data templating on; binary frames are sent untouched.
   *
   * @returns The payload as written to the wire
   */
  send(payload: MessagePayload): CommandResult<MessagePayload> {
    if (this.disposed) return disposedFailure()
    const snapshot = this.actor.getSnapshot()
    const session = this.session
    if (!session || !snapshot.can({ type: 'SEND', payload })) {
      return fail('invalid-state', `Cannot send while ${getConnectionState(snapshot)}`)
    }

    // Copy binary frames off the caller's buffer
    const rendered =
      typeof payload !== 'string'
        ? payload.slice()
        : session.useTemplateForData
          ? this.deps.templates.render(payload, session.activeContext)
          : payload
    this.actor.send({ type: 'SEND', payload: rendered })
    return succeed(rendered)
  }

  /** Send a single ping frame, independent of the liveness schedule. */
  ping(): CommandResult {
    if (this.disposed) return disposedFailure()
    const snapshot = this.actor.getSnapshot()
    if (!snapshot.can({ type: 'PING' })) {
      return fail('invalid-state', `Cannot ping while ${getConnectionState(snapshot)}`)
    }
    this.actor.send({ type: 'PING' })
    return succeed(undefined)
  }

  /**
   * Close the connection and cancel any pending reconnect.
   *
   * From `open` this waits for the close handshake, which the machine bounds
   * with `closeTimeoutMs`. Calling it while already closing joins the wait.
   */
  async disconnect(): Promise<CommandResult> {
    if (this.disposed) return disposedFailure()
    const snapshot = this.actor.getSnapshot()
    const state = getConnectionState(snapshot)
    if (state !== 'closing') {
      if (!snapshot.can({ type: 'DISCONNECT' })) {
        return fail('invalid-state', `Cannot disconnect while ${state}`)
      }
      logInfo('Disconnect requested')
      this.actor.send({ type: 'DISCONNECT' })
    }

    try {
      await waitFor(this.actor, (s) => !s.matches('closing'))
    } catch (err) {
      return fail('invalid-state', `Disconnect interrupted: ${errorMessage(err)}`)
    }
    return succeed(undefined)
  }

  /** Return a closed or failed connection to `idle`, clearing its error. */
  reset(): CommandResult {
    if (this.disposed) return disposedFailure()
    const snapshot = this.actor.getSnapshot()
    if (!snapshot.can({ type: 'RESET' })) {
      return fail('invalid-state', `Cannot reset while ${getConnectionState(snapshot)}`)
    }
    this.actor.send({ type: 'RESET' })
    this.session = null
    return succeed(undefined)
  }

  /**
   * Drop the transport without a close handshake and stop the machine.
   * The connection reads as `idle` afterwards and rejects every command.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.releaseTransport()
    this.actor.stop()
    this.session = null
    this.previousState = 'idle'
    this.deps.status.getState().reset()
  }

  // ============================================================================
  // Machine Actions
  // ============================================================================

  private openTransport(settings: SessionSettings): void {
    const session = this.session
    if (!session) {
      logError('Open requested without a configuration snapshot')
      return
    }

    const attempt = ++this.attemptId
    const controller = new AbortController()
    this.abortController = controller

    const url = session.useTemplateForURL
      ? this.deps.templates.render(session.url, session.activeContext)
      : session.url
    this.currentUrl = url
    this.closeInfo = {}
    this.deps.status.getState().setUrl(url)
    logInfo(`Connecting to ${url}`)

    const request = {
      url,
      headers: session.headers,
      sslVerify: session.sslVerify,
      handshakeTimeoutMs: settings.handshakeTimeoutMs,
    }
    const listener = (event: TransportEvent) => this.handleTransportEvent(attempt, event)

    void callAsync(() => this.deps.transport.open(request, listener, controller.signal)).then(
      (handle) => {
        if (attempt !== this.attemptId) {
          // Abandoned while the handshake was in flight
          this.terminateHandle(handle)
          return
        }
        this.abortController = null
        this.handle = handle
        this.actor.send({ type: 'TRANSPORT_OPENED' })
      },
      (err: unknown) => {
        if (attempt !== this.attemptId) return
        this.abortController = null
        this.actor.send({ type: 'TRANSPORT_FAILED', error: errorMessage(err) })
      }
    )
  }

  private closeTransport(): void {
    const handle = this.handle
    if (!handle) return
    try {
      handle.close()
    } catch (err) {
      logWarn(`Close request failed: ${errorMessage(err)}`)
    }
  }

  /**
   * Invalidate the current attempt and drop whatever it holds. Runs on entry
   * to `closed` and `failed`, so a late callback can never reach the machine.
   */
  private releaseTransport(): void {
    this.attemptId++
    this.abortController?.abort()
    this.abortController = null
    const handle = this.handle
    this.handle = null
    if (handle) this.terminateHandle(handle)
  }

  private terminateHandle(handle: TransportHandle): void {
    try {
      handle.terminate()
    } catch (err) {
      logWarn(`Terminate failed: ${errorMessage(err)}`)
    }
  }

  private transmit(payload: MessagePayload): void {
    const handle = this.handle
    if (!handle) return
    const attempt = this.attemptId
    this.deps.channel.emit({
      direction: 'outbound',
      kind: typeof payload === 'string' ? 'text' : 'binary',
      payload,
    })
    void callAsync(() => handle.send(payload)).catch((err: unknown) => this.writeFailed(attempt, err))
  }

  private transmitPing(): void {
    const handle = this.handle
    if (!handle) return
    const attempt = this.attemptId
    const payload = createPingPayload()
    this.deps.channel.emit({ direction: 'outbound', kind: 'ping', payload })
    void callAsync(() => handle.ping(payload)).catch((err: unknown) => this.writeFailed(attempt, err))
  }

  private writeFailed(attempt: number, err: unknown): void {
    if (attempt !== this.attemptId) return
    this.actor.send({ type: 'TRANSPORT_FAILED', error: errorMessage(err) })
  }

  private deliverInbound(frame: InboundFrame): void {
    if (frame.kind === 'pong') {
      this.deps.channel.emit({
        direction: 'inbound',
        kind: 'pong',
        payload: frame.payload,
        rttMs: measureRoundTrip(frame.payload),
      })
      return
    }
    this.deps.channel.emit({ direction: 'inbound', kind: frame.kind, payload: frame.payload })
  }

  // ============================================================================
  // Transport Callbacks
  // ============================================================================

  private handleTransportEvent(attempt: number, event: TransportEvent): void {
    if (attempt !== this.attemptId) return

    switch (event.type) {
      case 'frame':
        this.actor.send({
          type: 'INBOUND_FRAME',
          frame: {
            kind: typeof event.payload === 'string' ? 'text' : 'binary',
            payload: event.payload,
          },
        })
        break
      case 'pong':
        this.actor.send({ type: 'INBOUND_FRAME', frame: { kind: 'pong', payload: event.payload } })
        break
      case 'closed':
        if (this.actor.getSnapshot().matches('closing')) {
          this.closeInfo = { code: event.code, reason: event.reason }
          this.actor.send({ type: 'TRANSPORT_CLOSED', code: event.code, reason: event.reason })
        } else {
          this.actor.send({ type: 'TRANSPORT_CLOSED_UNEXPECTEDLY', code: event.code, reason: event.reason })
        }
        break
      case 'error':
        this.actor.send({ type: 'TRANSPORT_FAILED', error: event.error.message })
        break
    }
  }

  // ============================================================================
  // Store Sync & Notifications
  // ============================================================================

  private syncSnapshot(snapshot: ConnectionSnapshot): void {
    const state = getConnectionState(snapshot)
    const previous = this.previousState
    const { attempt, reconnectTargetTime } = getReconnectInfoFromContext(snapshot.context)

    const status = this.deps.status.getState()
    status.setState(state)
    status.setReconnectState(attempt, reconnectTargetTime)
    status.setError(snapshot.context.lastError)

    if (state !== previous) {
      this.previousState = state
      this.deps.emit('connection:state', { state, previous })

      if (state === 'open') {
        logInfo(`Connected to ${this.currentUrl}`)
        this.deps.emit('connection:open', { url: this.currentUrl })
      } else if (state === 'failed') {
        const error = snapshot.context.lastError ?? 'Connection failed'
        logWarn(`Connection failed: ${error}`)
        this.deps.emit('connection:error', { error })
      } else if (state === 'closed') {
        logInfo('Disconnected')
        this.deps.emit('connection:closed', this.closeInfo)
      }
    }

    // One notification per scheduled retry
    if (isAwaitingReconnect(snapshot) && attempt !== this.previousAttempt) {
      const delayMs = snapshot.context.nextRetryDelayMs
      logInfo(`Reconnecting (attempt ${attempt}, delay ${Math.round(delayMs / 1000)}s)`)
      this.deps.emit('connection:reconnecting', { attempt, delayMs })
    }
    this.previousAttempt = attempt
  }
}
