import WebSocket, { type ClientOptions, type RawData } from 'ws'
import type {
  MessagePayload,
  Transport,
  TransportHandle,
  TransportListener,
  TransportOpenRequest,
} from '../types'
import { toHeaderRecord } from '../modules/connectionUtils'
import { ProbeError, toError } from '../../utils/probeError'

/**
 * The part of a `ws` socket the transport relies on.
 *
 * @internal
 */
export interface SocketLike {
  send(data: MessagePayload, cb: (err?: Error) => void): void
  ping(data: string, mask: boolean | undefined, cb: (err?: Error) => void): void
  close(code?: number): void
  terminate(): void
  on(event: 'open', listener: () => void): unknown
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown
  on(event: 'pong', listener: (data: Buffer) => void): unknown
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown
  on(event: 'error', listener: (error: Error) => void): unknown
}

export type SocketFactory = (url: string, options: ClientOptions) => SocketLike

const NORMAL_CLOSURE = 1000

const defaultSocketFactory: SocketFactory = (url, options) => new WebSocket(url, options)

/**
 * Convert a `ws` message into a frame payload.
 */
export function decodeRawData(data: RawData, isBinary: boolean): MessagePayload {
  const buffer = Array.isArray(data)
    ? Buffer.concat(data)
    : Buffer.isBuffer(data)
      ? data
      : Buffer.from(data)
  return isBinary ? new Uint8Array(buffer) : buffer.toString('utf8')
}

class WebSocketHandle implements TransportHandle {
  constructor(private readonly socket: SocketLike) {}

  send(payload: MessagePayload): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(payload, (err) => (err ? reject(err) : resolve()))
    })
  }

  ping(payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.ping(payload, undefined, (err) => (err ? reject(err) : resolve()))
    })
  }

  close(): void {
    this.socket.close(NORMAL_CLOSURE)
  }

  terminate(): void {
    this.socket.terminate()
  }
}

/**
 * Transport backed by the `ws` package.
 *
 * Handshake headers come from the request in order (a repeated name keeps its
 * last value), `sslVerify` maps to `rejectUnauthorized`, and the handshake is
 * bounded by `handshakeTimeoutMs`.
 *
 * @example
 * ```typescript
 * const client = new ProbeClient({ transport: new WebSocketTransport() })
 * ```
 *
 * @category Transport
 */
export class WebSocketTransport implements Transport {
  constructor(private readonly createSocket: SocketFactory = defaultSocketFactory) {}

  open(request: TransportOpenRequest, listener: TransportListener, signal?: AbortSignal): Promise<TransportHandle> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ProbeError('transport-error', 'Connection attempt cancelled'))
        return
      }

      let socket: SocketLike
      try {
        socket = this.createSocket(request.url, {
          headers: toHeaderRecord(request.headers),
          rejectUnauthorized: request.sslVerify,
          handshakeTimeout: request.handshakeTimeoutMs,
        })
      } catch (err) {
        // ws throws synchronously on malformed URLs
        reject(toError(err))
        return
      }

      let opened = false
      let settled = false

      const settle = (outcome: () => void) => {
        if (settled) return
        settled = true
        signal?.removeEventListener('abort', onAbort)
        outcome()
      }

      const onAbort = () => {
        settle(() => {
          socket.terminate()
          reject(new ProbeError('transport-error', 'Connection attempt cancelled'))
        })
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      socket.on('open', () => {
        settle(() => {
          opened = true
          resolve(new WebSocketHandle(socket))
        })
      })

      socket.on('message', (data, isBinary) => {
        if (opened) listener({ type: 'frame', payload: decodeRawData(data, isBinary) })
      })

      socket.on('pong', (data) => {
        if (opened) listener({ type: 'pong', payload: data.toString('utf8') })
      })

      socket.on('error', (error) => {
        if (opened) {
          listener({ type: 'error', error })
        } else {
          settle(() => reject(error))
        }
      })

      socket.on('close', (code, reason) => {
        if (opened) {
          listener({ type: 'closed', code, reason: reason.toString('utf8') })
        } else {
          settle(() => reject(new ProbeError('transport-error', `Connection closed during handshake with code ${code}`)))
        }
      })
    })
  }
}
