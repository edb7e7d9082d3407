/**
 * Subscription requests and the rules which govern them.
 *
 * @module
 */
export {
  makeRequest,
  MAX_FILTER_SIZE,
  replayFrom,
  resumeFrom,
  type SubscribeParams,
  SubscriptionRequest,
  validate
} from "./filter/request.ts"

export {
  FilterTooLargeError,
  InvalidAddressError,
  InvalidBlockNumberError,
  InvalidBlockRangeError,
  type ValidationError
} from "./filter/errors.ts"
