/**
 * This module contains the errors raised while validating subscription
 * requests. Validation errors are local: a request which fails validation is
 * never sent to the server.
 *
 * @module
 */
import * as Schema from "effect/Schema"

/**
 * Represents an error that occurs when the from-block of a request is greater
 * than its to-block.
 */
export class InvalidBlockRangeError extends Schema.TaggedError<InvalidBlockRangeError>(
  "ChainStream/Filter/InvalidBlockRangeError"
)("InvalidBlockRangeError", {
  fromBlock: Schema.Number,
  toBlock: Schema.Number
}) {
  override get message(): string {
    return `Invalid block range: from-block ${this.fromBlock} is greater than to-block ${this.toBlock}`
  }
}

/**
 * Represents an error that occurs when a block bound is not a non-negative
 * safe integer.
 */
export class InvalidBlockNumberError extends Schema.TaggedError<InvalidBlockNumberError>(
  "ChainStream/Filter/InvalidBlockNumberError"
)("InvalidBlockNumberError", {
  /**
   * The name of the offending bound (`fromBlock` or `toBlock`).
   */
  field: Schema.String,
  value: Schema.Number
}) {
  override get message(): string {
    return `Invalid ${this.field}: ${this.value} is not a non-negative safe integer`
  }
}

/**
 * Represents an error that occurs when a filter entry is not a valid address.
 */
export class InvalidAddressError extends Schema.TaggedError<InvalidAddressError>(
  "ChainStream/Filter/InvalidAddressError"
)("InvalidAddressError", {
  value: Schema.String
}) {
  override get message(): string {
    return `Invalid filter address: ${this.value}`
  }
}

/**
 * Represents an error that occurs when a filter has more entries than fit
 * into a single request frame.
 */
export class FilterTooLargeError extends Schema.TaggedError<FilterTooLargeError>(
  "ChainStream/Filter/FilterTooLargeError"
)("FilterTooLargeError", {
  size: Schema.Number,
  maximum: Schema.Number
}) {
  override get message(): string {
    return `Filter has ${this.size} entries, the maximum is ${this.maximum}`
  }
}

/**
 * Union type representing all possible validation errors.
 */
export type ValidationError =
  | InvalidBlockRangeError
  | InvalidBlockNumberError
  | InvalidAddressError
  | FilterTooLargeError
