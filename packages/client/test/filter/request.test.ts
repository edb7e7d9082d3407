/**
 * Tests for subscription request validation and resumption.
 *
 * @module
 */
import { BlockNumber } from "@chainstream/client/core"
import {
  makeRequest,
  MAX_FILTER_SIZE,
  replayFrom,
  resumeFrom,
  type SubscriptionRequest,
  validate
} from "@chainstream/client/filter"
import { PAIR_A, PAIR_B } from "@chainstream/client/test/harness/Fixtures"
import { describe, expect, it } from "@effect/vitest"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

// =============================================================================
// Test Helpers
// =============================================================================

const makeAddress = (index: number): string => `0x${index.toString(16).padStart(40, "0")}`

const position = (block: number, transactionIndex = 0, logIndex = 0) => ({
  blockNumber: BlockNumber.make(block),
  transactionIndex,
  logIndex
})

const bounded: SubscriptionRequest = {
  kind: "price",
  filter: [PAIR_A],
  fromBlock: BlockNumber.make(100),
  toBlock: BlockNumber.make(200)
}

// =============================================================================
// makeRequest
// =============================================================================

describe("makeRequest", () => {
  it.effect("normalizes and de-duplicates the filter", () =>
    Effect.gen(function*() {
      const request = yield* makeRequest({
        kind: "price",
        filter: [PAIR_B.toUpperCase().replace("0X", "0x"), PAIR_A, ` ${PAIR_B} `]
      })

      expect(request).toEqual({
        kind: "price",
        filter: [PAIR_B, PAIR_A],
        fromBlock: undefined,
        toBlock: undefined
      })
    }))

  it.effect("accepts an empty filter and a single block range", () =>
    Effect.gen(function*() {
      const request = yield* makeRequest({ kind: "reserves", fromBlock: 5, toBlock: 5 })

      expect(request.filter).toEqual([])
      expect(request.fromBlock).toBe(5)
      expect(request.toBlock).toBe(5)
    }))

  it.effect("rejects an inverted block range", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(makeRequest({ kind: "price", fromBlock: 200, toBlock: 100 }))

      expect(error._tag).toBe("InvalidBlockRangeError")
      expect(error.message).toBe("Invalid block range: from-block 200 is greater than to-block 100")
    }))

  it.effect("rejects a negative block number", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(makeRequest({ kind: "price", fromBlock: -1 }))

      expect(error._tag).toBe("InvalidBlockNumberError")
      expect(error.message).toBe("Invalid fromBlock: -1 is not a non-negative safe integer")
    }))

  it.effect("rejects a fractional block number", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(makeRequest({ kind: "price", toBlock: 1.5 }))

      expect(error.message).toBe("Invalid toBlock: 1.5 is not a non-negative safe integer")
    }))

  it.effect("rejects a malformed address", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(makeRequest({ kind: "pair-created", filter: [PAIR_A, "0x1234"] }))

      expect(error._tag).toBe("InvalidAddressError")
      expect(error.message).toBe("Invalid filter address: 0x1234")
    }))

  it.effect("accepts a filter of the maximum size", () =>
    Effect.gen(function*() {
      const filter = Array.from({ length: MAX_FILTER_SIZE }, (_, index) => makeAddress(index + 1))

      const request = yield* makeRequest({ kind: "price", filter })

      expect(request.filter.length).toBe(MAX_FILTER_SIZE)
    }))

  it.effect("rejects a filter larger than the maximum", () =>
    Effect.gen(function*() {
      const filter = Array.from({ length: MAX_FILTER_SIZE + 1 }, (_, index) => makeAddress(index + 1))

      const error = yield* Effect.flip(makeRequest({ kind: "price", filter }))

      expect(error._tag).toBe("FilterTooLargeError")
      expect(error.message).toBe("Filter has 4097 entries, the maximum is 4096")
    }))
})

describe("validate", () => {
  it.effect("rejects an inverted range built by hand", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(validate({ ...bounded, fromBlock: BlockNumber.make(300) }))

      expect(error._tag).toBe("InvalidBlockRangeError")
    }))
})

// =============================================================================
// Resumption
// =============================================================================

describe("resumeFrom", () => {
  it("keeps the request when nothing has been delivered", () => {
    expect(Option.getOrThrow(resumeFrom(bounded, undefined))).toBe(bounded)
  })

  it("resumes at the block following the cursor", () => {
    expect(Option.getOrThrow(resumeFrom(bounded, position(150, 3, 7)))).toEqual({ ...bounded, fromBlock: 151 })
  })

  it("resumes at the to-block when the cursor is just before it", () => {
    expect(Option.getOrThrow(resumeFrom(bounded, position(199)))).toEqual({ ...bounded, fromBlock: 200 })
  })

  it("is exhausted once the cursor reaches the to-block", () => {
    expect(Option.isNone(resumeFrom(bounded, position(200)))).toBe(true)
  })

  it("never exhausts a request following the chain head", () => {
    const open: SubscriptionRequest = { kind: "reserves", filter: [] }

    expect(Option.getOrThrow(resumeFrom(open, position(1_000_000)))).toEqual({ ...open, fromBlock: 1_000_001 })
  })
})

describe("replayFrom", () => {
  it("restarts at the block of the cursor", () => {
    expect(replayFrom(bounded, position(150, 3, 7))).toEqual({ ...bounded, fromBlock: 150 })
  })

  it("keeps the request when nothing has been delivered", () => {
    expect(replayFrom(bounded, undefined)).toBe(bounded)
  })
})
