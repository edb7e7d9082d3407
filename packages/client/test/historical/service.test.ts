/**
 * Tests for the historical client against a fake HTTP client.
 *
 * @module
 */
import { layerConfig } from "@chainstream/client/client"
import { HistoricalClient, layer as historicalLayer, parseLine } from "@chainstream/client/historical"
import {
  FACTORY,
  PAIR_A,
  pairCreated,
  price,
  RECEIVER,
  reserves,
  SENDER,
  TOKEN_0,
  TOKEN_1
} from "@chainstream/client/test/harness/Fixtures"
import * as HttpClient from "@effect/platform/HttpClient"
import * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import { describe, expect, it } from "@effect/vitest"
import * as Chunk from "effect/Chunk"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Stream from "effect/Stream"

// =============================================================================
// Test Helpers
// =============================================================================

interface Route {
  readonly status?: number
  readonly body: string
}

interface Recorded {
  readonly url: string
  readonly authorization: string | undefined
}

/**
 * Builds the client on top of an HTTP client which answers from a fixed
 * table of paths and records every request.
 */
const makeTestLayer = (routes: Record<string, Route>, recorded: Array<Recorded> = []) =>
  historicalLayer.pipe(
    Layer.provide(Layer.succeed(
      HttpClient.HttpClient,
      HttpClient.make((request, url) =>
        Effect.sync(() => {
          recorded.push({ url: url.toString(), authorization: request.headers["authorization"] })
          const route = routes[url.pathname] ?? { status: 404, body: "not found" }
          return HttpClientResponse.fromWeb(request, new Response(route.body, { status: route.status ?? 200 }))
        })
      )
    )),
    Layer.provide(layerConfig({
      url: "ws://localhost/stream",
      historicalUrl: "http://history.test/",
      credentials: { username: "test-user", password: "test-secret" }
    }))
  )

const HASH_UPPER = `0x${"AB".repeat(32)}`
const PAIR_HEX = PAIR_A.slice(2)

const EVENT_HEADER = "block_number,transaction_index,log_index,timestamp,transaction_hash"

const PRICES_CSV = [
  `${EVENT_HEADER},pair,sender,receiver,price,volume0,volume1,fixed0,fixed1,decimals0,decimals1,side`,
  `100,0,1,1700001200,${HASH_UPPER},${PAIR_A},${SENDER},${RECEIVER},1850.25,2.5,4625.625,2500000000000000000,4625625000,18,6,true`,
  "",
  `101,0,,1700001212,${HASH_UPPER},${PAIR_A},${SENDER},${RECEIVER},1850.25,2.5,4625.625,2500000000000000000,4625625000,18,6,false`,
  ""
].join("\r\n")

const RESERVES_HEADER =
  `${EVENT_HEADER},pair,event,reserve0,reserve1,amount0,amount1,lp_amount,protocol_fee`

const RESERVES_ROW = [
  "12,1,3,1700000144",
  HASH_UPPER,
  PAIR_A,
  "Swap",
  "1267650600228229401496703205383",
  "123456789",
  "1606938044258990275541962092341162602522202993782792835301377",
  "0",
  "5",
  ""
].join(",")

const PAIR_CSV = [
  `${EVENT_HEADER},factory,pair,token0,token1,pair_index`,
  `10000835,0,0,1820010020,${HASH_UPPER},${FACTORY},${PAIR_A},${TOKEN_0},${TOKEN_1},42`
].join("\n")

// =============================================================================
// CSV Lines
// =============================================================================

describe("parseLine", () => {
  it("splits quoted and empty cells", () => {
    expect(Either.getOrThrow(parseLine("a,\"b,c\",,\"say \"\"hi\"\"\"\r"))).toEqual(["a", "b,c", "", "say \"hi\""])
  })

  it("rejects an unterminated quote", () => {
    expect(Either.getOrThrow(Either.flip(parseLine("a,\"b")))).toBe("unterminated quoted cell")
  })
})

// =============================================================================
// Historical Client
// =============================================================================

describe("HistoricalClient", () => {
  it.effect("streams the prices of a pair within a block range", () => {
    const recorded: Array<Recorded> = []
    return Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const prices = yield* historical.prices(PAIR_A.toUpperCase().replace("0X", "0x"), {
        fromBlock: 100,
        toBlock: 200
      }).pipe(Stream.runCollect)

      expect(Chunk.toReadonlyArray(prices)).toEqual([
        price({ block: 100, log: 1 }),
        { ...price({ block: 101 }), side: "Sell" }
      ])
      expect(recorded).toEqual([{
        url: `http://history.test/api/eth/prices/${PAIR_HEX}/100/200`,
        authorization: `Basic ${Buffer.from("test-user:test-secret").toString("base64")}`
      }])
    }).pipe(Effect.provide(makeTestLayer({ [`/api/eth/prices/${PAIR_HEX}/100/200`]: { body: PRICES_CSV } }, recorded)))
  })

  it.effect("streams reserves following the chain head", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const updates = yield* historical.reserves(PAIR_A, { fromBlock: 12 }).pipe(Stream.runCollect)

      expect(Chunk.toReadonlyArray(updates)).toEqual([reserves({ block: 12, tx: 1, log: 3 })])
    }).pipe(Effect.provide(makeTestLayer({
      [`/api/eth/reserves/${PAIR_HEX}/12`]: { body: `${RESERVES_HEADER}\n${RESERVES_ROW}\n` }
    }))))

  it.effect("takes the pair of a reserves row from the path when the column is left out", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const updates = yield* historical.reserves(PAIR_A, { fromBlock: 12, toBlock: 12 }).pipe(Stream.runCollect)

      expect(Chunk.toReadonlyArray(updates)).toEqual([reserves({ block: 12, tx: 1, log: 3 })])
    }).pipe(Effect.provide(makeTestLayer({
      [`/api/eth/reserves/${PAIR_HEX}/12/12`]: {
        body: [
          RESERVES_HEADER.replace(",pair,", ","),
          RESERVES_ROW.replace(`,${PAIR_A},`, ",")
        ].join("\n")
      }
    }))))

  it.effect("fetches the creation of a pair", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const created = yield* historical.pairCreated(PAIR_A)

      expect(Option.getOrThrow(created)).toEqual(pairCreated({ block: 10_000_835 }))
    }).pipe(Effect.provide(makeTestLayer({ [`/api/eth/pair/${PAIR_HEX}`]: { body: PAIR_CSV } }))))

  it.effect("returns nothing for a pair without a creation record", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const created = yield* historical.pairCreated(PAIR_A, { fromBlock: 1, toBlock: 2 })

      expect(Option.isNone(created)).toBe(true)
    }).pipe(Effect.provide(makeTestLayer({
      [`/api/eth/pair/${PAIR_HEX}/1/2`]: { body: `${EVENT_HEADER},factory,pair,token0,token1,pair_index\n` }
    }))))

  it.effect("fetches the chain height", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      expect(yield* historical.height).toBe(19_000_000)
    }).pipe(Effect.provide(makeTestLayer({ "/api/eth/height": { body: "19000000" } }))))

  it.effect("rejects an invalid range without sending a request", () => {
    const recorded: Array<Recorded> = []
    return Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const error = yield* Effect.flip(Stream.runDrain(historical.prices(PAIR_A, { fromBlock: 200, toBlock: 100 })))

      expect(error._tag).toBe("InvalidBlockRangeError")
      expect(recorded).toEqual([])
    }).pipe(Effect.provide(makeTestLayer({}, recorded)))
  })

  it.effect("reports the status of a failed request", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const error = yield* Effect.flip(Stream.runDrain(historical.reserves(PAIR_A, { fromBlock: 1 })))

      expect(error._tag).toBe("HistoricalRequestError")
      expect(error.message).toBe(`Request to /api/eth/reserves/${PAIR_HEX}/1 failed with status 500`)
    }).pipe(Effect.provide(makeTestLayer({
      [`/api/eth/reserves/${PAIR_HEX}/1`]: { status: 500, body: "internal error" }
    }))))

  it.effect("reports the line of a row with the wrong number of cells", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const error = yield* Effect.flip(Stream.runDrain(historical.reserves(PAIR_A, { fromBlock: 12 })))

      expect(error.message).toBe(
        `Failed to decode line 3 of /api/eth/reserves/${PAIR_HEX}/12: expected 13 cells, found 3`
      )
    }).pipe(Effect.provide(makeTestLayer({
      [`/api/eth/reserves/${PAIR_HEX}/12`]: { body: `${RESERVES_HEADER}\n${RESERVES_ROW}\n12,1,3\n` }
    }))))

  it.effect("reports the line of a row with an invalid cell", () =>
    Effect.gen(function*() {
      const historical = yield* HistoricalClient

      const error = yield* Effect.flip(Stream.runDrain(historical.reserves(PAIR_A, { fromBlock: 12 })))

      expect(error._tag).toBe("HistoricalDecodeError")
      if (error._tag === "HistoricalDecodeError") {
        expect(error.line).toBe(2)
        expect(error.path).toBe(`/api/eth/reserves/${PAIR_HEX}/12`)
      }
    }).pipe(Effect.provide(makeTestLayer({
      [`/api/eth/reserves/${PAIR_HEX}/12`]: { body: `${RESERVES_HEADER}\n${RESERVES_ROW.replace("Swap", "Skim")}\n` }
    }))))
})
