/**
 * # wsprobe SDK
 *
 * A headless WebSocket probing client: configurable connections with
 * templated URLs and payloads, a ping schedule, automatic reconnection and
 * an ordered feed of every frame sent and received.
 *
 * ## Bundle Structure
 *
 * - **`@wsprobe/sdk`** - Everything below
 * - **`@wsprobe/sdk/core`** - Client, connection machine, transport, types
 * - **`@wsprobe/sdk/stores`** - Direct zustand store access
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ProbeClient } from '@wsprobe/sdk'
 *
 * const client = new ProbeClient()
 * client.configurations.getState().updateConfiguration({ url: 'wss://echo.example.com' })
 * client.onMessage((message) => console.log(message.kind, message.payload))
 * client.connect()
 * ```
 *
 * @packageDocumentation
 */

export * from './core'
export * from './stores'
