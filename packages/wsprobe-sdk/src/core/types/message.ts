/**
 * Traffic message definitions.
 *
 * @packageDocumentation
 * @module Types/Message
 */

/**
 * @category Messages
 */
export type MessageDirection = 'outbound' | 'inbound'

/**
 * Frame category.
 *
 * - `text`: UTF-8 text frame
 * - `binary`: binary frame
 * - `ping`: protocol ping (payload is the send time in ms since epoch)
 * - `pong`: protocol pong echoing a ping payload
 *
 * @category Messages
 */
export type MessageKind = 'text' | 'binary' | 'ping' | 'pong'

/** @category Messages */
export type MessagePayload = string | Uint8Array

/**
 * A frame that crossed the connection boundary. Frozen once created.
 *
 * @category Messages
 */
export interface Message {
  /** Sequence number, unique per channel */
  readonly id: number
  readonly direction: MessageDirection
  readonly kind: MessageKind
  readonly payload: MessagePayload
  readonly timestamp: Date
  /** Round-trip time in ms, present on pongs that echo one of our pings */
  readonly rttMs?: number
}

/**
 * Fields supplied when emitting a message; the channel fills in the rest.
 *
 * @category Messages
 */
export type MessageDraft = Pick<Message, 'direction' | 'kind' | 'payload' | 'rttMs'>
