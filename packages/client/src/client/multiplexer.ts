/**
 * Multiplexer - maps many logical subscriptions onto one connection.
 *
 * Owns the session state (the current connection, the registered
 * subscriptions and the routes from wire identifiers to subscriptions). Every
 * operation runs while holding a single permit, so frames dispatched by the
 * read loop, rebuilds performed by the recovery loop and concurrent
 * subscribe / unsubscribe calls never interleave.
 *
 * @module
 * @internal
 */
import * as Deferred from "effect/Deferred"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as Queue from "effect/Queue"
import { type EventPosition, EventPositionOrder, SubscriptionId } from "../core/domain.ts"
import { isEventOf, positionOf } from "../core/events.ts"
import { replayFrom, resumeFrom, type SubscriptionRequest } from "../filter/request.ts"
import type { Connection } from "../session/transport.ts"
import { decodeEvent, decodeFrame, encodeRequest, encodeUnsubscribe } from "../wire/codec.ts"
import { DecodeError } from "../wire/errors.ts"
import type { WireFrame } from "../wire/frames.ts"
import type { ClientOptions } from "./config.ts"
import {
  BackpressureError,
  OrderingViolationError,
  SessionClosedError,
  SubscriptionError,
  type SubscriptionStreamError
} from "./errors.ts"
import { type Channel, makeChannel, terminate } from "./handle.ts"

// =============================================================================
// Types
// =============================================================================

/**
 * - `live`: subscribed, or waiting for a connection to subscribe on
 * - `suspended`: unsubscribed on the server because the buffer is full
 * - `replay`: waiting to re-subscribe from the cursor after a suspension
 */
type Mode = "live" | "suspended" | "replay"

/**
 * A registered subscription.
 */
export interface Entry {
  readonly key: number
  readonly request: SubscriptionRequest
  readonly channel: Channel
  /** The identifier on the current connection, if subscribed */
  wireId: SubscriptionId | undefined
  /** The position of the last buffered event */
  cursor: EventPosition | undefined
  /** Replayed events at or before this position have been delivered already */
  skipThrough: EventPosition | undefined
  mode: Mode
}

/**
 * Session state. Only touched while holding the lock.
 */
interface StateContainer {
  connection: Connection | undefined
  readonly entries: Map<number, Entry>
  readonly routes: Map<number, Entry>
  nextId: number
  nextKey: number
  closed: boolean
}

export interface Multiplexer {
  /** Registers a subscription, sending it right away when connected */
  readonly register: (request: SubscriptionRequest) => Effect.Effect<Entry, SessionClosedError>

  /** Removes a subscription and notifies the server, best-effort */
  readonly unsubscribe: (key: number) => Effect.Effect<void>

  /** Re-subscribes a suspended subscription once its buffer has drained */
  readonly resume: (key: number) => Effect.Effect<void>

  /** Decodes a frame and routes it to its subscription */
  readonly dispatch: (frame: Uint8Array) => Effect.Effect<void, DecodeError>

  /** Adopts a freshly established connection and re-sends every subscription */
  readonly attach: (connection: Connection) => Effect.Effect<void>

  /** Forgets the current connection and the routes established on it */
  readonly detach: Effect.Effect<void>

  /**
   * Closes the session state. Every subscription receives the given signal
   * after its buffered events and later registrations are refused.
   */
  readonly shutdown: (error?: SubscriptionStreamError) => Effect.Effect<void>
}

// =============================================================================
// Factory
// =============================================================================

export const makeMultiplexer = Effect.fnUntraced(
  function*(options: Pick<ClientOptions, "bufferCapacity" | "backpressure">): Effect.fn.Return<Multiplexer> {
    const { backpressure, bufferCapacity } = options

    const lock = yield* Effect.makeSemaphore(1)
    const locked = lock.withPermits(1)

    const state: StateContainer = {
      connection: undefined,
      entries: new Map(),
      routes: new Map(),
      nextId: 1,
      nextKey: 1,
      closed: false
    }

    const isBefore = Order.lessThan(EventPositionOrder)
    const isAtOrBefore = Order.lessThanOrEqualTo(EventPositionOrder)

    // =========================================================================
    // Helpers
    // =========================================================================

    const allocateId = (): SubscriptionId => {
      let id = state.nextId
      while (state.routes.has(id)) {
        id = (id + 1) >>> 0
      }
      state.nextId = (id + 1) >>> 0
      return SubscriptionId.make(id)
    }

    const send = (entry: Entry, frame: Uint8Array): Effect.Effect<void> => {
      const connection = state.connection
      if (connection === undefined) {
        return Effect.void
      }
      // A failed send means the connection is breaking. The read loop observes
      // the failure and the rebuild re-sends every subscription.
      return connection.send(frame).pipe(
        Effect.catchAll((error) =>
          Effect.logWarning("Failed to send a request").pipe(
            Effect.annotateLogs({ subscription: entry.key, reason: error.reason })
          )
        )
      )
    }

    const unroute = (entry: Entry): Option.Option<SubscriptionId> => {
      const wireId = entry.wireId
      if (wireId === undefined) {
        return Option.none()
      }
      state.routes.delete(wireId)
      entry.wireId = undefined
      return Option.some(wireId)
    }

    const sendUnsubscribe = (entry: Entry, wireId: Option.Option<SubscriptionId>): Effect.Effect<void> =>
      Option.match(wireId, {
        onNone: () => Effect.void,
        onSome: (id) => send(entry, encodeUnsubscribe(id))
      })

    const finish = (entry: Entry): Effect.Effect<void> => {
      state.entries.delete(entry.key)
      unroute(entry)
      return terminate(entry.channel, { _tag: "End" })
    }

    const fail = (entry: Entry, error: SubscriptionStreamError, notify: boolean): Effect.Effect<void> =>
      Effect.gen(function*() {
        state.entries.delete(entry.key)
        const wireId = unroute(entry)
        if (notify) {
          yield* sendUnsubscribe(entry, wireId)
        }
        yield* Effect.logDebug("Subscription failed").pipe(
          Effect.annotateLogs({ subscription: entry.key, error: error._tag })
        )
        yield* terminate(entry.channel, { _tag: "Failure", error })
      })

    /**
     * Sends the subscription on the current connection, starting from the
     * point where delivery left off.
     */
    const activate = (entry: Entry): Effect.Effect<void> =>
      Effect.suspend(() => {
        if (state.connection === undefined || entry.mode === "suspended") {
          return Effect.void
        }

        // A replay which has not yet caught up with the cursor starts over from
        // the cursor's block, since that block may be only partially delivered.
        let request: SubscriptionRequest
        if (entry.mode === "replay" || entry.skipThrough !== undefined) {
          request = replayFrom(entry.request, entry.cursor)
          entry.skipThrough = entry.cursor
          entry.mode = "live"
        } else {
          const resumed = resumeFrom(entry.request, entry.cursor)
          if (Option.isNone(resumed)) {
            return Effect.logDebug("Subscription exhausted its block range").pipe(
              Effect.annotateLogs("subscription", entry.key),
              Effect.zipRight(finish(entry))
            )
          }
          request = resumed.value
        }

        const id = allocateId()
        entry.wireId = id
        state.routes.set(id, entry)

        return send(entry, encodeRequest(request, id)).pipe(
          Effect.zipRight(Effect.logDebug("Subscribed")),
          Effect.annotateLogs({
            subscription: entry.key,
            subscriptionId: id,
            fromBlock: request.fromBlock ?? "genesis"
          })
        )
      })

    const suspend = (entry: Entry): Effect.Effect<void> =>
      Effect.gen(function*() {
        entry.mode = "suspended"
        yield* sendUnsubscribe(entry, unroute(entry))
        yield* Effect.logDebug("Suspended a subscription whose buffer is full").pipe(
          Effect.annotateLogs("subscription", entry.key)
        )
      })

    // =========================================================================
    // Dispatch
    // =========================================================================

    const deliver = Effect.fnUntraced(function*(entry: Entry, payload: Uint8Array): Effect.fn.Return<void, DecodeError> {
      const event = yield* decodeEvent(payload)
      if (!isEventOf(entry.request.kind)(event)) {
        return yield* new DecodeError({
          reason: `unexpected ${event._tag} record for a ${entry.request.kind} subscription`,
          offset: 0
        })
      }

      const position = positionOf(event)
      if (entry.skipThrough !== undefined) {
        if (isAtOrBefore(position, entry.skipThrough)) {
          return
        }
        entry.skipThrough = undefined
      }

      if (entry.cursor !== undefined && isBefore(position, entry.cursor)) {
        return yield* fail(entry, new OrderingViolationError({ previous: entry.cursor, received: position }), true)
      }

      const size = yield* Queue.size(entry.channel.buffer)
      if (size >= bufferCapacity) {
        switch (backpressure) {
          case "fail": {
            return yield* fail(entry, new BackpressureError({ capacity: bufferCapacity }), true)
          }
          case "suspend": {
            return yield* suspend(entry)
          }
          case "drop-oldest": {
            yield* Queue.poll(entry.channel.buffer)
            break
          }
        }
      }

      yield* Queue.offer(entry.channel.buffer, { _tag: "Event", event })
      entry.cursor = position
    })

    const route = (frame: WireFrame): Effect.Effect<void, DecodeError> =>
      Effect.gen(function*() {
        const entry = state.routes.get(frame.subscriptionId)
        if (entry === undefined) {
          // The subscription may have been torn down locally a moment ago.
          return yield* Effect.logDebug("Dropping a frame for an unknown subscription").pipe(
            Effect.annotateLogs({ subscriptionId: frame.subscriptionId, frame: frame._tag })
          )
        }

        switch (frame._tag) {
          case "Ack": {
            yield* Deferred.succeed(entry.channel.acknowledged, undefined)
            return
          }
          case "Event": {
            return yield* deliver(entry, frame.payload)
          }
          case "Error": {
            const error = new SubscriptionError({
              subscriptionId: frame.subscriptionId,
              code: frame.code,
              message: frame.message
            })
            return yield* fail(entry, error, false)
          }
          case "End": {
            return yield* finish(entry)
          }
        }
      })

    const dispatch = (bytes: Uint8Array): Effect.Effect<void, DecodeError> =>
      Effect.gen(function*() {
        const frame = yield* decodeFrame(bytes)
        yield* locked(route(frame))
      })

    // =========================================================================
    // Subscriptions
    // =========================================================================

    const register = (request: SubscriptionRequest): Effect.Effect<Entry, SessionClosedError> =>
      locked(Effect.gen(function*() {
        if (state.closed) {
          return yield* new SessionClosedError()
        }
        const channel = yield* makeChannel
        const entry: Entry = {
          key: state.nextKey++,
          request,
          channel,
          wireId: undefined,
          cursor: undefined,
          skipThrough: undefined,
          mode: "live"
        }
        state.entries.set(entry.key, entry)
        yield* activate(entry)
        return entry
      }))

    const unsubscribe = (key: number): Effect.Effect<void> =>
      locked(Effect.gen(function*() {
        const entry = state.entries.get(key)
        if (entry === undefined) {
          return
        }
        state.entries.delete(key)
        yield* sendUnsubscribe(entry, unroute(entry))
        yield* terminate(entry.channel, { _tag: "End" }, true)
        yield* Effect.logDebug("Unsubscribed").pipe(Effect.annotateLogs("subscription", key))
      }))

    const resume = (key: number): Effect.Effect<void> =>
      locked(Effect.gen(function*() {
        const entry = state.entries.get(key)
        if (entry === undefined || entry.mode !== "suspended") {
          return
        }
        const size = yield* Queue.size(entry.channel.buffer)
        if (size > bufferCapacity / 2) {
          return
        }
        entry.mode = "replay"
        yield* activate(entry)
      }))

    // =========================================================================
    // Connection lifecycle
    // =========================================================================

    const attach = (connection: Connection): Effect.Effect<void> =>
      locked(Effect.gen(function*() {
        state.connection = connection
        for (const entry of Array.from(state.entries.values())) {
          yield* activate(entry)
        }
      }))

    const detach: Effect.Effect<void> = locked(Effect.sync(() => {
      state.connection = undefined
      state.routes.clear()
      for (const entry of state.entries.values()) {
        entry.wireId = undefined
      }
    }))

    const shutdown = (error?: SubscriptionStreamError): Effect.Effect<void> =>
      locked(Effect.gen(function*() {
        state.closed = true
        const entries = Array.from(state.entries.values())
        state.entries.clear()
        state.routes.clear()
        for (const entry of entries) {
          entry.wireId = undefined
          yield* terminate(entry.channel, error === undefined ? { _tag: "End" } : { _tag: "Failure", error })
        }
      }))

    return {
      register,
      unsubscribe,
      resume,
      dispatch,
      attach,
      detach,
      shutdown
    }
  }
)
