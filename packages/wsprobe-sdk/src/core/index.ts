// Client facade
export { ProbeClient } from './ProbeClient'
export type { ProbeClientConfig } from './ProbeClient'

// Connection lifecycle
export { Connection } from './modules/Connection'
export type { ConnectionDependencies } from './modules/Connection'
export {
  connectionMachine,
  computeBackoffDelay,
  getConnectionState,
  isAwaitingReconnect,
  getReconnectInfoFromContext,
} from './connectionMachine'
export type {
  ConnectionActor,
  ConnectionSnapshot,
  ConnectionMachineContext,
  ConnectionMachineEvent,
  InboundFrame,
} from './connectionMachine'

// Transport
export { WebSocketTransport, decodeRawData } from './transport/WebSocketTransport'
export type { SocketFactory, SocketLike } from './transport/WebSocketTransport'

// Traffic
export { TrafficChannel, BufferedConsumer } from './trafficChannel'
export type { MessageListener, BufferedConsumerOptions } from './trafficChannel'

// Templates
export { renderTemplate, collectPlaceholders, createTemplateResolver } from './template'
export type { TemplateResolver, VariableLookup } from './template'

// Configuration defaults
export {
  DEFAULT_TIMINGS,
  DEFAULT_CONSUMER_CAPACITY,
  resolveSessionSettings,
} from './config'

// Errors
export { ProbeError, formatProbeError } from '../utils/probeError'
export type { ProbeErrorCode, CommandResult } from '../utils/probeError'

// Types
export type {
  ConnectionState,
  ConnectionConfig,
  Header,
  Message,
  MessageDirection,
  MessageDraft,
  MessageKind,
  MessagePayload,
  Transport,
  TransportEvent,
  TransportHandle,
  TransportListener,
  TransportOpenRequest,
  ProbeEvents,
  ProbeEventHandler,
  ConnectionTimings,
  SessionSettings,
} from './types'
