import * as Schema from "effect/Schema"
import { EventPosition } from "../core/domain.ts"
import { TransportError } from "../session/errors.ts"
import type { DecodeError } from "../wire/errors.ts"

// =============================================================================
// Errors
// =============================================================================

/**
 * Represents an error reported by the server for a single subscription, for
 * example an entity kind the server does not serve.
 *
 * Terminal to the affected subscription only.
 */
export class SubscriptionError extends Schema.TaggedError<SubscriptionError>(
  "ChainStream/Client/SubscriptionError"
)("SubscriptionError", {
  /**
   * The wire identifier the subscription had when the error was reported.
   */
  subscriptionId: Schema.Number,
  code: Schema.Number,
  message: Schema.String
}) {}

/**
 * Represents a subscription whose buffer overflowed under the `"fail"`
 * backpressure policy.
 */
export class BackpressureError extends Schema.TaggedError<BackpressureError>(
  "ChainStream/Client/BackpressureError"
)("BackpressureError", {
  capacity: Schema.Number
}) {
  override get message(): string {
    return `Subscription buffer of ${this.capacity} events overflowed`
  }
}

/**
 * Represents an event delivered by the server out of chain order.
 */
export class OrderingViolationError extends Schema.TaggedError<OrderingViolationError>(
  "ChainStream/Client/OrderingViolationError"
)("OrderingViolationError", {
  previous: EventPosition,
  received: EventPosition
}) {
  override get message(): string {
    const format = (position: EventPosition) =>
      `${position.blockNumber}:${position.transactionIndex}:${position.logIndex}`
    return `Received an event at ${format(this.received)} after an event at ${format(this.previous)}`
  }
}

/**
 * Represents the failure of the client to reconnect within the configured
 * number of attempts. Delivered to every open subscription.
 */
export class ReconnectExhaustedError extends Schema.TaggedError<ReconnectExhaustedError>(
  "ChainStream/Client/ReconnectExhaustedError"
)("ReconnectExhaustedError", {
  attempts: Schema.Number,
  /**
   * The failure of the last attempt.
   */
  cause: TransportError
}) {
  override get message(): string {
    return `Gave up reconnecting after ${this.attempts} attempts: ${this.cause.reason}`
  }
}

/**
 * Represents an attempt to subscribe through a client which has been closed.
 */
export class SessionClosedError extends Schema.TaggedError<SessionClosedError>(
  "ChainStream/Client/SessionClosedError"
)("SessionClosedError", {}) {
  override get message(): string {
    return "The client has been closed"
  }
}

/**
 * Union type representing every error which terminates the event stream of a
 * subscription.
 */
export type SubscriptionStreamError =
  | SubscriptionError
  | BackpressureError
  | OrderingViolationError
  | ReconnectExhaustedError
  | DecodeError
