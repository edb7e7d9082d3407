import * as HttpClient from "@effect/platform/HttpClient"
import type * as HttpClientError from "@effect/platform/HttpClientError"
import * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Stream from "effect/Stream"
import { BlockNumber, type EntityKind } from "../core/domain.ts"
import { PairCreated, Price, Reserves } from "../core/events.ts"
import type { ValidationError } from "../filter/errors.ts"
import { makeRequest } from "../filter/request.ts"
import { authorization, ClientConfig } from "../client/config.ts"
import { decodeRows, PairCreatedRow, PriceRow, ReservesRow } from "./csv.ts"
import { HistoricalDecodeError, HistoricalRequestError } from "./errors.ts"

// =============================================================================
// Historical Client Service
// =============================================================================

/**
 * A bounded, or head following, range of blocks.
 */
export interface BlockRange {
  /**
   * The first block of the range (inclusive).
   */
  readonly fromBlock: number
  /**
   * The last block of the range (inclusive). Absent means the response
   * follows the chain head.
   */
  readonly toBlock?: number | undefined
}

/**
 * Represents the possible errors of a historical request.
 */
export type HistoricalError = HistoricalRequestError | HistoricalDecodeError | ValidationError

/**
 * A service which fetches the events of a single pair over plain HTTP. Meant
 * for backfilling before, or alongside, a live subscription.
 */
export interface HistoricalClientService {
  /**
   * Streams the price quotes of a pair within a block range.
   */
  readonly prices: (pair: string, range: BlockRange) => Stream.Stream<Price, HistoricalError>

  /**
   * Streams the reserves updates of a pair within a block range.
   */
  readonly reserves: (pair: string, range: BlockRange) => Stream.Stream<Reserves, HistoricalError>

  /**
   * Fetches the creation of a pair, optionally restricted to a block range.
   */
  readonly pairCreated: (
    pair: string,
    range?: BlockRange
  ) => Effect.Effect<Option.Option<PairCreated>, HistoricalError>

  /**
   * Fetches the number of the latest block known to the server.
   */
  readonly height: Effect.Effect<BlockNumber, HistoricalRequestError | HistoricalDecodeError>
}

export class HistoricalClient extends Context.Tag("ChainStream/HistoricalClient")<
  HistoricalClient,
  HistoricalClientService
>() {}

const make = Effect.gen(function*() {
  const config = yield* ClientConfig
  const baseUrl = config.historicalUrl.replace(/\/+$/, "")

  const httpClient = (yield* HttpClient.HttpClient).pipe(
    HttpClient.mapRequest((request) => {
      const prefixed = HttpClientRequest.prependUrl(request, baseUrl)
      return Option.match(config.credentials, {
        onNone: () => prefixed,
        onSome: (credentials) => HttpClientRequest.setHeader(prefixed, "Authorization", authorization(credentials))
      })
    }),
    HttpClient.filterStatusOk
  )

  const requestError = (path: string) => (error: HttpClientError.HttpClientError) =>
    new HistoricalRequestError({
      path,
      status: error._tag === "ResponseError" ? error.response.status : undefined,
      cause: error
    })

  /**
   * Validates the pair and the block range and formats them as path
   * segments.
   */
  const segments = (kind: EntityKind, pair: string, range: BlockRange | undefined) =>
    Effect.map(
      makeRequest({ kind, filter: [pair], fromBlock: range?.fromBlock, toBlock: range?.toBlock }),
      (request) => {
        const parts = request.filter.map((address) => address.slice(2))
        if (request.fromBlock !== undefined) {
          parts.push(String(request.fromBlock))
          if (request.toBlock !== undefined) {
            parts.push(String(request.toBlock))
          }
        }
        return { pair: request.filter[0], suffix: parts.join("/") }
      }
    )

  const lines = (path: string): Stream.Stream<string, HistoricalRequestError> =>
    HttpClientResponse.stream(httpClient.get(path)).pipe(
      Stream.mapError(requestError(path)),
      Stream.decodeText(),
      Stream.splitLines
    )

  const prices = (pair: string, range: BlockRange): Stream.Stream<Price, HistoricalError> =>
    Stream.unwrap(Effect.map(segments("price", pair, range), ({ suffix }) => {
      const path = `/api/eth/prices/${suffix}`
      return lines(path).pipe(decodeRows(PriceRow, (row) => Price.make(row), path))
    }))

  const reserves = (pair: string, range: BlockRange): Stream.Stream<Reserves, HistoricalError> =>
    Stream.unwrap(Effect.map(segments("reserves", pair, range), (target) => {
      const path = `/api/eth/reserves/${target.suffix}`
      // The pair column may be left out since the path names the pair
      return lines(path).pipe(
        decodeRows(ReservesRow, (row) => Reserves.make({ ...row, pair: row.pair ?? target.pair }), path)
      )
    }))

  const pairCreated = Effect.fnUntraced(
    function*(pair: string, range?: BlockRange): Effect.fn.Return<Option.Option<PairCreated>, HistoricalError> {
      const { suffix } = yield* segments("pair-created", pair, range)
      const path = `/api/eth/pair/${suffix}`
      return yield* lines(path).pipe(
        decodeRows(PairCreatedRow, (row) => PairCreated.make(row), path),
        Stream.runHead
      )
    }
  )

  const heightPath = "/api/eth/height"
  const height = httpClient.get(heightPath).pipe(
    Effect.mapError(requestError(heightPath)),
    Effect.flatMap((response) =>
      HttpClientResponse.schemaBodyJson(BlockNumber)(response).pipe(
        Effect.mapError((error) =>
          new HistoricalDecodeError({
            path: heightPath,
            line: 1,
            reason: error._tag === "ParseError" ? error.message : "failed to read the response body"
          })
        )
      )
    )
  )

  return {
    prices,
    reserves,
    pairCreated,
    height
  } satisfies HistoricalClientService
})

/**
 * A layer which provides a `HistoricalClient` on top of the given
 * `HttpClient`, configured from the `ClientConfig`.
 */
export const layer: Layer.Layer<HistoricalClient, never, HttpClient.HttpClient | ClientConfig> = Layer.effect(
  HistoricalClient,
  make
)
