import * as Context from "effect/Context"
import * as Deferred from "effect/Deferred"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Fiber from "effect/Fiber"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import type * as Scope from "effect/Scope"
import * as Stream from "effect/Stream"
import * as SubscriptionRef from "effect/SubscriptionRef"
import type { EntityKind } from "../core/domain.ts"
import { type EventOf, isEventOf } from "../core/events.ts"
import type { ValidationError } from "../filter/errors.ts"
import { makeRequest, type SubscribeParams } from "../filter/request.ts"
import { layerWebSocket as layerTransportWebSocket } from "../session/node.ts"
import { type SessionEvent, type SessionStatus, transition } from "../session/state.ts"
import { Transport } from "../session/transport.ts"
import { ClientConfig } from "./config.ts"
import type { SessionClosedError, SubscriptionStreamError } from "./errors.ts"
import { type SubscriptionHandle, toStream } from "./handle.ts"
import { type Entry, makeMultiplexer } from "./multiplexer.ts"
import { runDriver } from "./recovery.ts"

// =============================================================================
// Stream Client Service
// =============================================================================

/**
 * A service which streams decoded on-chain events over a single, shared
 * connection.
 */
export interface StreamClientService {
  /**
   * Subscribes to the events of one entity kind.
   *
   * Fails with a `ValidationError` before anything is sent if the parameters
   * are malformed, and with a `SessionClosedError` once the client has been
   * closed. The subscription is cancelled when the scope is closed.
   */
  readonly subscribe: <K extends EntityKind>(
    params: SubscribeParams<K>
  ) => Effect.Effect<SubscriptionHandle<EventOf<K>>, ValidationError | SessionClosedError, Scope.Scope>

  /**
   * Streams the events of one entity kind. The subscription is cancelled when
   * the consumer stops pulling.
   */
  readonly stream: <K extends EntityKind>(
    params: SubscribeParams<K>
  ) => Stream.Stream<EventOf<K>, ValidationError | SessionClosedError | SubscriptionStreamError>

  /**
   * The current status of the underlying transport session.
   */
  readonly status: Effect.Effect<SessionStatus>

  /**
   * The status of the transport session and all of its subsequent changes.
   */
  readonly statusChanges: Stream.Stream<SessionStatus>

  /**
   * Ends every subscription after its buffered events, closes the
   * connection and refuses further subscriptions. Closing the scope in which
   * the service was built closes it as well.
   */
  readonly close: Effect.Effect<void>
}

export class StreamClient extends Context.Tag("ChainStream/StreamClient")<
  StreamClient,
  StreamClientService
>() {}

const make = Effect.gen(function*() {
  const config = yield* ClientConfig
  const transport = yield* Transport

  const status = yield* SubscriptionRef.make<SessionStatus>("Disconnected")
  const multiplexer = yield* makeMultiplexer(config)

  const advance = (event: SessionEvent): Effect.Effect<SessionStatus> =>
    SubscriptionRef.modifyEffect(status, (current) =>
      Either.match(transition(current, event), {
        onLeft: (error) => Effect.as(Effect.logDebug(error.message), [current, current] as const),
        onRight: (next) =>
          Effect.as(
            Effect.logDebug("Session status changed").pipe(
              Effect.annotateLogs({ from: current, to: next, event })
            ),
            [next, next] as const
          )
      }))

  const driver = yield* runDriver({ advance, config, multiplexer, transport }).pipe(
    Effect.forkScoped
  )

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  const toHandle = <K extends EntityKind>(entry: Entry, kind: K): SubscriptionHandle<EventOf<K>> => {
    const onTake = Effect.suspend(() => entry.mode === "suspended" ? multiplexer.resume(entry.key) : Effect.void)
    return {
      key: entry.key,
      request: entry.request,
      events: toStream(entry.channel, onTake).pipe(Stream.filter(isEventOf(kind))),
      acknowledged: Deferred.await(entry.channel.acknowledged),
      cursor: Effect.sync(() => Option.fromNullable(entry.cursor)),
      unsubscribe: multiplexer.unsubscribe(entry.key)
    }
  }

  const subscribe = <K extends EntityKind>(
    params: SubscribeParams<K>
  ): Effect.Effect<SubscriptionHandle<EventOf<K>>, ValidationError | SessionClosedError, Scope.Scope> =>
    Effect.gen(function*() {
      const request = yield* makeRequest(params)
      const entry = yield* Effect.acquireRelease(
        multiplexer.register(request),
        (entry) => multiplexer.unsubscribe(entry.key)
      )
      return toHandle(entry, params.kind)
    })

  const stream = <K extends EntityKind>(
    params: SubscribeParams<K>
  ): Stream.Stream<EventOf<K>, ValidationError | SessionClosedError | SubscriptionStreamError> =>
    Stream.unwrapScoped(Effect.map(subscribe(params), (handle) => handle.events))

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  const close = yield* Effect.once(Effect.gen(function*() {
    yield* advance("Close")
    yield* multiplexer.shutdown()
    yield* Fiber.interrupt(driver)
    if ((yield* SubscriptionRef.get(status)) === "Draining") {
      yield* advance("Drained")
    }
    yield* Effect.logInfo("Client closed")
  }))

  yield* Effect.addFinalizer(() => close)

  return {
    subscribe,
    stream,
    status: SubscriptionRef.get(status),
    statusChanges: status.changes,
    close
  } satisfies StreamClientService
})

/**
 * A layer which provides a `StreamClient` on top of the given `Transport`.
 *
 * The connection is established in the background as soon as the layer is
 * built and closed when the layer's scope is closed.
 */
export const layer: Layer.Layer<StreamClient, never, ClientConfig | Transport> = Layer.scoped(StreamClient, make)

/**
 * A layer which provides a `StreamClient` connected through a WebSocket.
 */
export const layerWebSocket: Layer.Layer<StreamClient, never, ClientConfig> = layer.pipe(
  Layer.provide(layerTransportWebSocket)
)
