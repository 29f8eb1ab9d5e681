/**
 * Core type definitions for the WsProbe SDK.
 *
 * @packageDocumentation
 * @module Types
 */

export type { ConnectionState, ConnectionConfig, Header } from './connection'
export type { Message, MessageDirection, MessageDraft, MessageKind, MessagePayload } from './message'
export type {
  Transport,
  TransportEvent,
  TransportHandle,
  TransportListener,
  TransportOpenRequest,
} from './transport'
export type { ProbeEvents, ProbeEventHandler } from './events'
export type { ConnectionTimings, SessionSettings } from '../config'
