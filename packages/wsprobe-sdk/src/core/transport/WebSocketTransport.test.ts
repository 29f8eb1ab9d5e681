import { describe, it, expect, vi } from 'vitest'
import { EventEmitter } from 'node:events'
import { WebSocketTransport, decodeRawData, type SocketLike } from './WebSocketTransport'
import type { MessagePayload, TransportEvent, TransportOpenRequest } from '../types'
import { ProbeError } from '../../utils/probeError'

class FakeSocket extends EventEmitter implements SocketLike {
  send = vi.fn((_data: MessagePayload, cb: (err?: Error) => void) => cb())
  ping = vi.fn((_data: string, _mask: boolean | undefined, cb: (err?: Error) => void) => cb())
  close = vi.fn()
  terminate = vi.fn()
}

const request: TransportOpenRequest = {
  url: 'ws://probe.test/socket',
  headers: [],
  sslVerify: true,
  handshakeTimeoutMs: 10_000,
}

function setup() {
  const socket = new FakeSocket()
  const factory = vi.fn(() => socket)
  const transport = new WebSocketTransport(factory)
  const events: TransportEvent[] = []
  const listener = (event: TransportEvent) => {
    events.push(event)
  }
  return { socket, factory, transport, events, listener }
}

describe('WebSocketTransport', () => {
  describe('open', () => {
    it('should pass headers, certificate checking and the handshake timeout to ws', () => {
      const { factory, transport, listener } = setup()

      void transport.open(
        {
          url: 'wss://probe.test/socket',
          headers: [
            { name: 'Authorization', value: 'Bearer test-secret' },
            { name: 'X-Env', value: 'one' },
            { name: 'X-Env', value: 'two' },
          ],
          sslVerify: false,
          handshakeTimeoutMs: 5_000,
        },
        listener
      )

      expect(factory).toHaveBeenCalledWith('wss://probe.test/socket', {
        headers: { Authorization: 'Bearer test-secret', 'X-Env': 'two' },
        rejectUnauthorized: false,
        handshakeTimeout: 5_000,
      })
    })

    it('should resolve with a handle once the socket opens', async () => {
      const { socket, transport, listener } = setup()
      const opening = transport.open(request, listener)

      socket.emit('open')
      const handle = await opening

      await handle.send('hello')
      expect(socket.send).toHaveBeenCalledWith('hello', expect.any(Function))
    })

    it('should reject with the handshake error', async () => {
      const { socket, transport, listener } = setup()
      const opening = transport.open(request, listener)

      socket.emit('error', new Error('Unexpected server response: 401'))

      await expect(opening).rejects.toThrow('Unexpected server response: 401')
    })

    it('should reject when the socket closes during the handshake', async () => {
      const { socket, transport, listener } = setup()
      const opening = transport.open(request, listener)

      socket.emit('close', 1006, Buffer.from(''))

      await expect(opening).rejects.toThrow('Connection closed during handshake with code 1006')
    })

    it('should reject when the factory throws', async () => {
      const transport = new WebSocketTransport(() => {
        throw new SyntaxError('Invalid URL: nope')
      })

      await expect(transport.open(request, () => {})).rejects.toThrow('Invalid URL: nope')
    })

    it('should settle only once', async () => {
      const { socket, transport, listener } = setup()
      const opening = transport.open(request, listener)

      socket.emit('error', new Error('first'))
      socket.emit('close', 1006, Buffer.from(''))

      await expect(opening).rejects.toThrow('first')
    })
  })

  describe('cancellation', () => {
    it('should terminate the socket and reject when aborted mid-handshake', async () => {
      const { socket, transport, listener } = setup()
      const controller = new AbortController()
      const opening = transport.open(request, listener, controller.signal)

      controller.abort()

      await expect(opening).rejects.toBeInstanceOf(ProbeError)
      await expect(opening).rejects.toThrow('Connection attempt cancelled')
      expect(socket.terminate).toHaveBeenCalledTimes(1)
    })

    it('should not create a socket for an already aborted signal', async () => {
      const { factory, transport, listener } = setup()
      const controller = new AbortController()
      controller.abort()

      await expect(transport.open(request, listener, controller.signal)).rejects.toThrow(
        'Connection attempt cancelled'
      )
      expect(factory).not.toHaveBeenCalled()
    })

    it('should ignore an abort after the socket opened', async () => {
      const { socket, transport, listener } = setup()
      const controller = new AbortController()
      const opening = transport.open(request, listener, controller.signal)

      socket.emit('open')
      await opening
      controller.abort()

      expect(socket.terminate).not.toHaveBeenCalled()
    })
  })

  describe('after open', () => {
    async function openSocket() {
      const ctx = setup()
      const opening = ctx.transport.open(request, ctx.listener)
      ctx.socket.emit('open')
      const handle = await opening
      return { ...ctx, handle }
    }

    it('should forward text and binary frames', async () => {
      const { socket, events } = await openSocket()

      socket.emit('message', Buffer.from('hello'), false)
      socket.emit('message', Buffer.from([1, 2, 3]), true)

      expect(events).toEqual([
        { type: 'frame', payload: 'hello' },
        { type: 'frame', payload: new Uint8Array([1, 2, 3]) },
      ])
    })

    it('should forward pongs as text', async () => {
      const { socket, events } = await openSocket()

      socket.emit('pong', Buffer.from('1700000000000'))

      expect(events).toEqual([{ type: 'pong', payload: '1700000000000' }])
    })

    it('should forward the close code and reason', async () => {
      const { socket, events } = await openSocket()

      socket.emit('close', 1001, Buffer.from('going away'))

      expect(events).toEqual([{ type: 'closed', code: 1001, reason: 'going away' }])
    })

    it('should forward socket errors', async () => {
      const { socket, events } = await openSocket()
      const error = new Error('read ECONNRESET')

      socket.emit('error', error)

      expect(events).toEqual([{ type: 'error', error }])
    })

    it('should reject a failed write', async () => {
      const { socket, handle } = await openSocket()
      socket.send.mockImplementationOnce((_data, cb) => cb(new Error('write EPIPE')))

      await expect(handle.send('lost')).rejects.toThrow('write EPIPE')
    })

    it('should send pings with the given payload', async () => {
      const { socket, handle } = await openSocket()

      await handle.ping('1700000000000')

      expect(socket.ping).toHaveBeenCalledWith('1700000000000', undefined, expect.any(Function))
    })

    it('should close with a normal closure code', async () => {
      const { socket, handle } = await openSocket()

      handle.close()
      handle.terminate()

      expect(socket.close).toHaveBeenCalledWith(1000)
      expect(socket.terminate).toHaveBeenCalledTimes(1)
    })
  })

  it('should ignore frames that arrive before the socket opens', () => {
    const { socket, transport, events, listener } = setup()
    void transport.open(request, listener)

    socket.emit('message', Buffer.from('early'), false)

    expect(events).toEqual([])
  })
})

describe('decodeRawData', () => {
  it('should join fragmented buffers', () => {
    expect(decodeRawData([Buffer.from('hel'), Buffer.from('lo')], false)).toBe('hello')
  })

  it('should decode an ArrayBuffer', () => {
    const buffer = new ArrayBuffer(2)
    new Uint8Array(buffer).set([0x68, 0x69])
    expect(decodeRawData(buffer, false)).toBe('hi')
    expect(decodeRawData(buffer, true)).toEqual(new Uint8Array([0x68, 0x69]))
  })
})
