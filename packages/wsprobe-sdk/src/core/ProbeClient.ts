import type {
  ConnectionConfig,
  ConnectionState,
  MessagePayload,
  ProbeEventHandler,
  ProbeEvents,
  Transport,
} from './types'
import type { ConnectionTimings } from './config'
import { logError } from './logger'
import { Connection } from './modules/Connection'
import { TrafficChannel, type MessageListener } from './trafficChannel'
import { createTemplateResolver, type TemplateResolver } from './template'
import { WebSocketTransport } from './transport/WebSocketTransport'
import { createVariableStore, type VariableStore } from '../stores/variableStore'
import {
  createConfigurationStore,
  selectActiveConfiguration,
  type ConfigurationStore,
} from '../stores/configurationStore'
import { createConnectionStore, type ConnectionStore } from '../stores/connectionStore'
import { errorMessage, type CommandResult } from '../utils/probeError'

/**
 * Options for {@link ProbeClient}. Every collaborator can be injected; the
 * ones left out are created fresh for the client.
 */
export interface ProbeClientConfig {
  variables?: VariableStore
  configurations?: ConfigurationStore
  connection?: ConnectionStore
  channel?: TrafficChannel
  /** Defaults to a `ws`-backed {@link WebSocketTransport} */
  transport?: Transport
  /** Timing defaults applied beneath each configuration's own `timings` */
  timings?: Partial<ConnectionTimings>
}

type HandlerMap<E extends keyof ProbeEvents = keyof ProbeEvents> = {
  [P in E]?: Set<ProbeEventHandler<P>>
}

/**
 * Headless WebSocket probing client.
 *
 * Owns the variable, configuration and connection stores, the traffic
 * channel and one {@link Connection}. A UI or CLI drives it through the
 * commands below and observes it through the stores, `on()` and
 * `onMessage()`.
 *
 * @example
 * ```typescript
 * const client = new ProbeClient()
 * client.variables.getState().setContext('staging', 'host', 'staging.example.com')
 * client.configurations.getState().updateConfiguration({
 *   url: 'wss://$host/socket',
 *   useTemplateForURL: true,
 *   activeContext: 'staging',
 * })
 *
 * client.onMessage((message) => console.log(message.direction, message.payload))
 * client.on('connection:open', ({ url }) => {
 *   client.send('{"op":"hello"}')
 * })
 * client.connect()
 * ```
 *
 * @category Core
 */
export class ProbeClient {
  readonly variables: VariableStore
  readonly configurations: ConfigurationStore
  readonly connectionStatus: ConnectionStore
  readonly channel: TrafficChannel
  readonly templates: TemplateResolver
  private readonly connection: Connection
  private handlers: HandlerMap = {}

  constructor(config: ProbeClientConfig = {}) {
    this.variables = config.variables ?? createVariableStore()
    this.configurations = config.configurations ?? createConfigurationStore()
    this.connectionStatus = config.connection ?? createConnectionStore()
    this.channel = config.channel ?? new TrafficChannel()
    this.templates = createTemplateResolver(this.variables)

    this.connection = new Connection({
      transport: config.transport ?? new WebSocketTransport(),
      channel: this.channel,
      templates: this.templates,
      status: this.connectionStatus,
      getConfiguration: () => selectActiveConfiguration(this.configurations.getState()),
      emit: (event, payload) => this.emit(event, payload),
      timings: config.timings,
    })
  }

  get state(): ConnectionState {
    return this.connection.state
  }

  // ============================================================================
  // Commands
  // ============================================================================

  /** Connect using the selected configuration. */
  connect(): CommandResult {
    return this.connection.connect()
  }

  /**
   * Send a text or binary frame on the open connection.
   *
   * @returns The payload as sent, after template rendering
   */
  send(payload: MessagePayload): CommandResult<MessagePayload> {
    return this.connection.send(payload)
  }

  ping(): CommandResult {
    return this.connection.ping()
  }

  disconnect(): Promise<CommandResult> {
    return this.connection.disconnect()
  }

  reset(): CommandResult {
    return this.connection.reset()
  }

  /**
   * Render a template against the variable store, using the selected
   * configuration's context unless one is given.
   */
  render(template: string, contextName?: string | null): string {
    const context =
      contextName === undefined
        ? selectActiveConfiguration(this.configurations.getState()).activeContext
        : contextName
    return this.templates.render(template, context)
  }

  /** The configuration `connect()` would use right now. */
  getActiveConfiguration(): ConnectionConfig {
    return selectActiveConfiguration(this.configurations.getState())
  }

  // ============================================================================
  // Events
  // ============================================================================

  /**
   * Subscribe to a lifecycle event.
   *
   * @returns Unsubscribe function
   *
   * @example
   * ```typescript
   * client.on('connection:reconnecting', ({ attempt, delayMs }) => {
   *   console.log(`retry #${attempt} in ${delayMs}ms`)
   * })
   * ```
   */
  on<K extends keyof ProbeEvents>(event: K, handler: ProbeEventHandler<K>): () => void {
    const map: HandlerMap<K> = this.handlers
    const handlers: Set<ProbeEventHandler<K>> = map[event] ?? new Set()
    handlers.add(handler)
    map[event] = handlers
    return () => {
      this.handlers[event]?.delete(handler)
    }
  }

  /**
   * Subscribe to every frame crossing the connection, in order.
   *
   * Listeners run synchronously; wrap slow ones in a `BufferedConsumer`.
   *
   * @returns Unsubscribe function
   */
  onMessage(listener: MessageListener): () => void {
    return this.channel.subscribe(listener)
  }

  /**
   * Drop the connection without a close handshake and release all handlers.
   * The client cannot be reconnected afterwards.
   */
  destroy(): void {
    this.connection.dispose()
    this.handlers = {}
  }

  private emit<K extends keyof ProbeEvents>(event: K, payload: ProbeEvents[K]): void {
    this.handlers[event]?.forEach((handler) => {
      try {
        handler(payload)
      } catch (err) {
        logError(`Handler for ${event} failed: ${errorMessage(err)}`)
      }
    })
  }
}
