import { describe, it, expect, vi } from 'vitest'
import { TrafficChannel, BufferedConsumer } from './trafficChannel'
import type { Message } from './types'

const textDraft = (payload: string) => ({ direction: 'inbound' as const, kind: 'text' as const, payload })

describe('TrafficChannel', () => {
  it('should number messages from 1 in emit order', () => {
    const channel = new TrafficChannel()
    const seen: number[] = []
    channel.subscribe((message) => seen.push(message.id))

    channel.emit(textDraft('a'))
    channel.emit(textDraft('b'))
    channel.emit(textDraft('c'))

    expect(seen).toEqual([1, 2, 3])
  })

  it('should deliver the same frozen message to every subscriber', () => {
    const channel = new TrafficChannel()
    const first = vi.fn()
    const second = vi.fn()
    channel.subscribe(first)
    channel.subscribe(second)

    const message = channel.emit({ direction: 'outbound', kind: 'binary', payload: new Uint8Array([1, 2]) })

    expect(first).toHaveBeenCalledWith(message)
    expect(second).toHaveBeenCalledWith(message)
    expect(Object.isFrozen(message)).toBe(true)
    expect(message.timestamp).toBeInstanceOf(Date)
  })

  it('should copy binary payloads so the producer cannot rewrite them', () => {
    const channel = new TrafficChannel()
    const buffer = new Uint8Array([1, 2, 3])

    const message = channel.emit({ direction: 'outbound', kind: 'binary', payload: buffer })
    buffer[0] = 99

    expect(message.payload).toEqual(new Uint8Array([1, 2, 3]))
  })

  it('should include rttMs only when given', () => {
    const channel = new TrafficChannel()
    const pong = channel.emit({ direction: 'inbound', kind: 'pong', payload: '1', rttMs: 12 })
    const text = channel.emit(textDraft('x'))

    expect(pong.rttMs).toBe(12)
    expect('rttMs' in text).toBe(false)
  })

  it('should keep delivering when a subscriber throws', () => {
    const channel = new TrafficChannel()
    const after = vi.fn()
    channel.subscribe(() => {
      throw new Error('listener broke')
    })
    channel.subscribe(after)

    channel.emit(textDraft('a'))

    expect(after).toHaveBeenCalledTimes(1)
    expect(console.error).toHaveBeenCalledWith(
      '[WsProbe]',
      'Traffic listener failed on message #1: listener broke'
    )
  })

  it('should stop delivering after unsubscribe', () => {
    const channel = new TrafficChannel()
    const listener = vi.fn()
    const unsubscribe = channel.subscribe(listener)
    expect(channel.listenerCount).toBe(1)

    unsubscribe()
    channel.emit(textDraft('a'))

    expect(listener).not.toHaveBeenCalled()
    expect(channel.listenerCount).toBe(0)
  })
})

describe('BufferedConsumer', () => {
  it('should hand messages to the handler in order, one at a time', async () => {
    const channel = new TrafficChannel()
    const handled: string[] = []
    let active = 0
    let maxActive = 0
    const consumer = new BufferedConsumer(async (message) => {
      active++
      maxActive = Math.max(maxActive, active)
      await Promise.resolve()
      handled.push(String(message.payload))
      active--
    })
    channel.subscribe(consumer.listener)

    channel.emit(textDraft('a'))
    channel.emit(textDraft('b'))
    channel.emit(textDraft('c'))
    await consumer.idle()

    expect(handled).toEqual(['a', 'b', 'c'])
    expect(maxActive).toBe(1)
    expect(consumer.pending).toBe(0)
  })

  it('should not run the handler inside emit', () => {
    const channel = new TrafficChannel()
    const handler = vi.fn(async () => {})
    const consumer = new BufferedConsumer(handler)
    channel.subscribe(consumer.listener)

    channel.emit(textDraft('a'))

    expect(handler).not.toHaveBeenCalled()
    expect(consumer.pending).toBe(1)
  })

  it('should drop the oldest queued messages when full', async () => {
    const channel = new TrafficChannel()
    const handled: Message[] = []
    const consumer = new BufferedConsumer(async (message) => {
      handled.push(message)
    }, { capacity: 2 })
    channel.subscribe(consumer.listener)

    channel.emit(textDraft('a'))
    channel.emit(textDraft('b'))
    channel.emit(textDraft('c'))
    channel.emit(textDraft('d'))
    await consumer.idle()

    expect(handled.map((m) => m.payload)).toEqual(['c', 'd'])
    expect(consumer.dropped).toBe(2)
  })

  it('should warn once per overflow burst', async () => {
    const channel = new TrafficChannel()
    const consumer = new BufferedConsumer(async () => {}, { capacity: 1 })
    channel.subscribe(consumer.listener)

    channel.emit(textDraft('a'))
    channel.emit(textDraft('b'))
    channel.emit(textDraft('c'))
    await consumer.idle()

    expect(console.warn).toHaveBeenCalledTimes(1)
    expect(console.warn).toHaveBeenCalledWith(
      '[WsProbe]',
      'Traffic consumer is falling behind, dropping oldest messages (capacity 1)'
    )
  })

  it('should keep consuming after a handler failure', async () => {
    const channel = new TrafficChannel()
    const handled: string[] = []
    const consumer = new BufferedConsumer(async (message) => {
      if (message.payload === 'bad') throw new Error('handler broke')
      handled.push(String(message.payload))
    })
    channel.subscribe(consumer.listener)

    channel.emit(textDraft('bad'))
    channel.emit(textDraft('good'))
    await consumer.idle()

    expect(handled).toEqual(['good'])
    expect(console.error).toHaveBeenCalledWith(
      '[WsProbe]',
      'Traffic consumer failed on message #1: handler broke'
    )
  })

  it('should never use a capacity below 1', () => {
    expect(new BufferedConsumer(async () => {}, { capacity: 0 }).capacity).toBe(1)
  })
})
