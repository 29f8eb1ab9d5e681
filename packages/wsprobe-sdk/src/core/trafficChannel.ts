/**
 * Notification point for every frame crossing the connection boundary.
 *
 * `emit()` is called exactly once per frame, in the order frames cross:
 * inbound in arrival order, outbound in `send()`/`ping()` call order.
 * Subscribers run synchronously inside `emit()` and must not block; a consumer
 * that needs to do async work wraps itself in a {@link BufferedConsumer}.
 *
 * @module Core/TrafficChannel
 */
import type { Message, MessageDraft } from './types'
import { DEFAULT_CONSUMER_CAPACITY } from './config'
import { logError, logWarn } from './logger'
import { errorMessage } from '../utils/probeError'

export type MessageListener = (message: Message) => void

export class TrafficChannel {
  private listeners = new Set<MessageListener>()
  private nextId = 1

  /**
   * Create the message for a frame and hand it to every subscriber.
   * Binary payloads are copied, so the message never shares a buffer with
   * its producer. A throwing subscriber is logged and skipped.
   */
  emit(draft: MessageDraft): Message {
    const message: Message = Object.freeze({
      id: this.nextId++,
      direction: draft.direction,
      kind: draft.kind,
      payload: typeof draft.payload === 'string' ? draft.payload : draft.payload.slice(),
      timestamp: new Date(),
      ...(draft.rttMs !== undefined ? { rttMs: draft.rttMs } : {}),
    })

    for (const listener of this.listeners) {
      try {
        listener(message)
      } catch (err) {
        logError(`Traffic listener failed on message #${message.id}: ${errorMessage(err)}`)
      }
    }
    return message
  }

  /**
   * @returns A function to unsubscribe
   */
  subscribe(listener: MessageListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  get listenerCount(): number {
    return this.listeners.size
  }
}

export interface BufferedConsumerOptions {
  /** Queue length before the oldest queued message is dropped */
  capacity?: number
}

/**
 * Bounded, non-blocking hand-off from the channel to an async consumer.
 *
 * Messages are queued and passed to `handler` one at a time, in order. When
 * the queue is full the OLDEST queued message is dropped, so a slow consumer
 * loses history rather than stalling the transport's read loop. One warning
 * is logged per overflow burst; `dropped` counts every loss.
 *
 * @example
 * ```typescript
 * const consumer = new BufferedConsumer(async (message) => {
 *   await appendToLogFile(message)
 * }, { capacity: 500 })
 * client.onMessage(consumer.listener)
 * ```
 */
export class BufferedConsumer {
  readonly capacity: number
  private queue: Message[] = []
  private draining: Promise<void> | null = null
  private droppedCount = 0
  private overflowing = false

  constructor(
    private readonly handler: (message: Message) => Promise<void>,
    options: BufferedConsumerOptions = {}
  ) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CONSUMER_CAPACITY)
  }

  /** Pass this to `TrafficChannel.subscribe()` */
  readonly listener: MessageListener = (message) => {
    if (this.queue.length >= this.capacity) {
      this.queue.shift()
      this.droppedCount++
      if (!this.overflowing) {
        this.overflowing = true
        logWarn(`Traffic consumer is falling behind, dropping oldest messages (capacity ${this.capacity})`)
      }
    }
    this.queue.push(message)
    if (!this.draining) {
      this.draining = this.drain()
    }
  }

  get pending(): number {
    return this.queue.length
  }

  get dropped(): number {
    return this.droppedCount
  }

  /**
   * Resolves once every queued message has been handled.
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining
    }
  }

  private async drain(): Promise<void> {
    // Let the emitter finish its synchronous work before consuming
    await Promise.resolve()
    let message = this.queue.shift()
    while (message) {
      try {
        await this.handler(message)
      } catch (err) {
        logError(`Traffic consumer failed on message #${message.id}: ${errorMessage(err)}`)
      }
      message = this.queue.shift()
    }
    this.overflowing = false
    this.draining = null
  }
}
