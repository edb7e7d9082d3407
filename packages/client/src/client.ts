/**
 * The streaming client: typed event subscriptions multiplexed over a single,
 * self-healing connection.
 *
 * ## Usage
 *
 * ```typescript
 * import * as Effect from "effect/Effect"
 * import * as Layer from "effect/Layer"
 * import * as Stream from "effect/Stream"
 * import { Client } from "@chainstream/client"
 *
 * const program = Effect.gen(function*() {
 *   const client = yield* Client.StreamClient
 *
 *   yield* client.stream({ kind: "price", filter: ["0x..."], fromBlock: 19_000_000 }).pipe(
 *     Stream.runForEach((price) => Effect.log(`${price.blockNumber}: ${price.price}`))
 *   )
 * })
 *
 * const AppLayer = Client.layerWebSocket.pipe(
 *   Layer.provide(Client.layerConfig({ url: "wss://example.com/websocket" }))
 * )
 *
 * Effect.runPromise(program.pipe(Effect.provide(AppLayer)))
 * ```
 *
 * ## Recovery
 *
 * When the connection breaks the client reconnects with exponential backoff
 * and re-subscribes every open subscription from the block following the last
 * event it delivered, so no block is delivered twice. Subscribers only see the
 * failure once `maxReconnectAttempts` consecutive attempts have failed, as a
 * `ReconnectExhaustedError`.
 *
 * ## Backpressure
 *
 * Every subscription buffers at most `bufferCapacity` undelivered events. What
 * happens when a subscriber falls behind is governed by the
 * `BackpressurePolicy`; the default, `"suspend"`, pauses the subscription on
 * the server and replays it from where it left off once the subscriber has
 * caught up.
 *
 * @module
 */
export {
  authorization,
  type BackoffOptions,
  type BackpressurePolicy,
  ClientConfig,
  type ClientOptions,
  type ClientOptionsInput,
  type Credentials,
  defaults,
  layerConfig,
  layerConfigFromEnv,
  make as makeConfig
} from "./client/config.ts"

export {
  BackpressureError,
  OrderingViolationError,
  ReconnectExhaustedError,
  SessionClosedError,
  SubscriptionError,
  type SubscriptionStreamError
} from "./client/errors.ts"

export type { SubscriptionHandle } from "./client/handle.ts"

export { backoffDelay } from "./client/recovery.ts"

export { layer, layerWebSocket, StreamClient, type StreamClientService } from "./client/service.ts"
