/**
 * This module contains the caller-facing handle of a subscription and the
 * channel which carries decoded events to it.
 *
 * @module
 */
import * as Deferred from "effect/Deferred"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Queue from "effect/Queue"
import * as Stream from "effect/Stream"
import type { EventPosition } from "../core/domain.ts"
import type { DecodedEvent } from "../core/events.ts"
import type { SubscriptionRequest } from "../filter/request.ts"
import type { SubscriptionStreamError } from "./errors.ts"

// =============================================================================
// Handle
// =============================================================================

/**
 * A single logical subscription.
 *
 * The handle stays subscribed until the scope it was created in is closed,
 * `unsubscribe` is called, the server ends the subscription or a terminal
 * error is delivered. The connection it shares with other subscriptions is
 * unaffected by any of these.
 */
export interface SubscriptionHandle<A extends DecodedEvent = DecodedEvent> {
  /**
   * A locally unique identifier of the handle. Unlike the identifier used on
   * the wire it does not change when the subscription is re-established.
   */
  readonly key: number

  readonly request: SubscriptionRequest

  /**
   * The events of the subscription, in chain order.
   *
   * Completes when the subscription ends and fails with the error which
   * terminated it. Can only be consumed once.
   */
  readonly events: Stream.Stream<A, SubscriptionStreamError>

  /**
   * Completes once the server has accepted the subscription.
   */
  readonly acknowledged: Effect.Effect<void, SubscriptionStreamError>

  /**
   * The position of the last event delivered to the subscription.
   */
  readonly cursor: Effect.Effect<Option.Option<EventPosition>>

  /**
   * Stops delivery and asks the server to stop sending events. Events which
   * have not been consumed yet are discarded.
   */
  readonly unsubscribe: Effect.Effect<void>
}

// =============================================================================
// Channel
// =============================================================================

/**
 * An item carried by a channel. Termination travels through the same queue as
 * the events, so buffered events are always delivered before it.
 *
 * @internal
 */
export type Signal =
  | { readonly _tag: "Event"; readonly event: DecodedEvent }
  | { readonly _tag: "End" }
  | { readonly _tag: "Failure"; readonly error: SubscriptionStreamError }

/**
 * The delivery endpoint of a subscription.
 *
 * The queue itself is unbounded: the multiplexer enforces the capacity of the
 * subscription according to the backpressure policy before offering an
 * event, which leaves room for the terminal signal.
 *
 * @internal
 */
export interface Channel {
  readonly buffer: Queue.Queue<Signal>
  readonly acknowledged: Deferred.Deferred<void, SubscriptionStreamError>
}

/**
 * @internal
 */
export const makeChannel: Effect.Effect<Channel> = Effect.gen(function*() {
  const buffer = yield* Queue.unbounded<Signal>()
  const acknowledged = yield* Deferred.make<void, SubscriptionStreamError>()
  return { buffer, acknowledged }
})

/**
 * Builds the event stream read by the caller. `onTake` runs after every event
 * taken from the buffer.
 *
 * @internal
 */
export const toStream = (
  channel: Channel,
  onTake: Effect.Effect<void>
): Stream.Stream<DecodedEvent, SubscriptionStreamError> =>
  Stream.repeatEffectOption(
    Effect.flatMap(
      Queue.take(channel.buffer),
      (signal): Effect.Effect<DecodedEvent, Option.Option<SubscriptionStreamError>> => {
        switch (signal._tag) {
          case "Event": {
            return Effect.as(onTake, signal.event)
          }
          case "End": {
            return Effect.fail(Option.none())
          }
          case "Failure": {
            return Effect.fail(Option.some(signal.error))
          }
        }
      }
    )
  )

/**
 * Delivers the terminal signal of a channel. Events which are still buffered
 * are delivered first unless `discard` is set.
 *
 * @internal
 */
export const terminate = (
  channel: Channel,
  signal: Exclude<Signal, { readonly _tag: "Event" }>,
  discard = false
): Effect.Effect<void> =>
  Effect.gen(function*() {
    if (discard) {
      yield* Queue.takeAll(channel.buffer)
    }
    yield* Queue.offer(channel.buffer, signal)
    if (signal._tag === "Failure") {
      yield* Deferred.fail(channel.acknowledged, signal.error)
    } else {
      yield* Deferred.succeed(channel.acknowledged, undefined)
    }
  })
