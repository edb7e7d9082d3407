import * as Schema from "effect/Schema"

// =============================================================================
// Errors
// =============================================================================

/**
 * Represents a historical request which failed before a body could be read,
 * including responses with a non-success status.
 */
export class HistoricalRequestError extends Schema.TaggedError<HistoricalRequestError>(
  "ChainStream/Historical/HistoricalRequestError"
)("HistoricalRequestError", {
  path: Schema.String,
  /**
   * The response status, if a response was received.
   */
  status: Schema.optional(Schema.Number),
  cause: Schema.Defect
}) {
  override get message(): string {
    return this.status === undefined
      ? `Request to ${this.path} failed`
      : `Request to ${this.path} failed with status ${this.status}`
  }
}

/**
 * Represents a historical response body which could not be decoded.
 */
export class HistoricalDecodeError extends Schema.TaggedError<HistoricalDecodeError>(
  "ChainStream/Historical/HistoricalDecodeError"
)("HistoricalDecodeError", {
  path: Schema.String,
  /**
   * The 1-based line of the body at which decoding failed.
   */
  line: Schema.Number,
  reason: Schema.String
}) {
  override get message(): string {
    return `Failed to decode line ${this.line} of ${this.path}: ${this.reason}`
  }
}
