/**
 * This module contains the subscription request model together with its
 * validation and resumption rules.
 *
 * An empty filter means "every entity of the requested kind" for all kinds.
 * A non-empty filter is the exact set of pair addresses to deliver: the pair
 * which emitted the event for `price` and `reserves`, the created pair for
 * `pair-created`.
 *
 * @module
 */
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import { Address, BlockNumber, EntityKind, type EventPosition, normalizeAddress } from "../core/domain.ts"
import {
  FilterTooLargeError,
  InvalidAddressError,
  InvalidBlockNumberError,
  InvalidBlockRangeError,
  type ValidationError
} from "./errors.ts"

/**
 * The maximum number of addresses in a filter. Chosen so that an encoded
 * request always fits into a single frame.
 */
export const MAX_FILTER_SIZE = 4096

/**
 * The parameters of a subscription as sent to the server.
 */
export const SubscriptionRequest = Schema.Struct({
  kind: EntityKind,
  /**
   * The addresses to deliver events for. Empty means no filtering.
   */
  filter: Schema.Array(Address),
  /**
   * The first block to deliver (inclusive). Absent means genesis.
   */
  fromBlock: Schema.optional(BlockNumber),
  /**
   * The last block to deliver (inclusive). Absent means the subscription
   * follows the chain head.
   */
  toBlock: Schema.optional(BlockNumber)
}).annotations({
  identifier: "SubscriptionRequest",
  description: "The parameters of a subscription"
})
export type SubscriptionRequest = typeof SubscriptionRequest.Type

/**
 * Caller supplied subscription parameters, prior to validation.
 */
export interface SubscribeParams<K extends EntityKind = EntityKind> {
  readonly kind: K
  readonly filter?: Iterable<string> | undefined
  readonly fromBlock?: number | undefined
  readonly toBlock?: number | undefined
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validates a subscription request.
 *
 * Rules:
 * - Block bounds must be non-negative safe integers
 * - When both bounds are present, `fromBlock <= toBlock`
 * - The filter holds at most `MAX_FILTER_SIZE` addresses
 */
export const validate = Effect.fnUntraced(
  function*(request: SubscriptionRequest): Effect.fn.Return<void, ValidationError> {
    yield* checkBlockNumber("fromBlock", request.fromBlock)
    yield* checkBlockNumber("toBlock", request.toBlock)

    if (request.fromBlock !== undefined && request.toBlock !== undefined && request.fromBlock > request.toBlock) {
      return yield* new InvalidBlockRangeError({
        fromBlock: request.fromBlock,
        toBlock: request.toBlock
      })
    }

    if (request.filter.length > MAX_FILTER_SIZE) {
      return yield* new FilterTooLargeError({
        size: request.filter.length,
        maximum: MAX_FILTER_SIZE
      })
    }
  }
)

/**
 * Builds a validated subscription request from caller supplied parameters.
 *
 * Filter addresses are normalized to lowercase and de-duplicated, keeping the
 * order in which they were first seen.
 */
export const makeRequest = Effect.fnUntraced(
  function*(params: SubscribeParams): Effect.fn.Return<SubscriptionRequest, ValidationError> {
    const fromBlock = yield* checkBlockNumber("fromBlock", params.fromBlock)
    const toBlock = yield* checkBlockNumber("toBlock", params.toBlock)

    const filter = new Set<Address>()
    for (const value of params.filter ?? []) {
      const address = normalizeAddress(value)
      if (address === undefined) {
        return yield* new InvalidAddressError({ value })
      }
      filter.add(address)
    }

    const request: SubscriptionRequest = {
      kind: params.kind,
      filter: Array.from(filter),
      fromBlock,
      toBlock
    }

    yield* validate(request)

    return request
  }
)

const checkBlockNumber = (
  field: "fromBlock" | "toBlock",
  value: number | undefined
): Effect.Effect<BlockNumber | undefined, InvalidBlockNumberError> => {
  if (value === undefined) {
    return Effect.succeed(undefined)
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    return Effect.fail(new InvalidBlockNumberError({ field, value }))
  }
  return Effect.succeed(BlockNumber.make(value))
}

// =============================================================================
// Resumption
// =============================================================================

/**
 * Computes the request to send when recovering a subscription whose last
 * delivered event is at `cursor`.
 *
 * Delivery resumes at the block following the cursor, so no delivered block
 * is delivered twice. Returns `None` when that block lies beyond the
 * request's to-block, in which case the subscription is exhausted.
 */
export const resumeFrom = (
  request: SubscriptionRequest,
  cursor: EventPosition | undefined
): Option.Option<SubscriptionRequest> => {
  if (cursor === undefined) {
    return Option.some(request)
  }
  const next = cursor.blockNumber + 1
  if (request.toBlock !== undefined && next > request.toBlock) {
    return Option.none()
  }
  return Option.some({ ...request, fromBlock: BlockNumber.make(next) })
}

/**
 * Computes the request to send when a suspended subscription resumes.
 *
 * Delivery restarts at the block of the cursor, which may have been delivered
 * only partially. The caller must skip every event positioned at or before
 * the cursor.
 */
export const replayFrom = (
  request: SubscriptionRequest,
  cursor: EventPosition | undefined
): SubscriptionRequest => cursor === undefined ? request : { ...request, fromBlock: cursor.blockNumber }
