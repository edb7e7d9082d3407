import * as Schema from "effect/Schema"

// =============================================================================
// Errors
// =============================================================================

/**
 * Represents an I/O failure of the underlying connection: a refused or timed
 * out handshake, a read or write error, an unanswered liveness probe or an
 * unexpected termination of the inbound frame stream.
 *
 * Transport errors are recovered by reconnecting and are only surfaced to
 * subscribers once the reconnection budget is exhausted.
 */
export class TransportError extends Schema.TaggedError<TransportError>(
  "ChainStream/Session/TransportError"
)("TransportError", {
  reason: Schema.String,
  /**
   * The underlying cause of the failure, if any.
   */
  cause: Schema.optional(Schema.Defect)
}) {
  override get message(): string {
    return `Transport failure: ${this.reason}`
  }
}

/**
 * Represents an attempt to move the session between two states which are not
 * connected by a transition.
 */
export class InvalidTransitionError extends Schema.TaggedError<InvalidTransitionError>(
  "ChainStream/Session/InvalidTransitionError"
)("InvalidTransitionError", {
  from: Schema.String,
  event: Schema.String
}) {
  override get message(): string {
    return `Invalid session transition: ${this.event} is not allowed while ${this.from}`
  }
}
