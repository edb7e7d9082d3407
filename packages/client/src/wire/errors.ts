import * as Schema from "effect/Schema"

/**
 * Represents an error that occurs when an inbound frame or record cannot be
 * decoded.
 *
 * Decode errors indicate that the client and the server disagree about the
 * wire format. Framing may be desynchronized afterwards, so a decode error is
 * fatal to the session.
 */
export class DecodeError extends Schema.TaggedError<DecodeError>(
  "ChainStream/Wire/DecodeError"
)("DecodeError", {
  /**
   * A description of what could not be decoded.
   */
  reason: Schema.String,
  /**
   * The byte offset within the frame or record at which decoding failed.
   */
  offset: Schema.Number
}) {
  override get message(): string {
    return `Failed to decode frame at offset ${this.offset}: ${this.reason}`
  }
}
