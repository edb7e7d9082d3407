/**
 * A request / response client for the historical API of the streaming
 * service. Responses are CSV bodies which are decoded lazily into the same
 * typed records delivered by live subscriptions.
 *
 * @example
 * ```typescript
 * import * as Effect from "effect/Effect"
 * import * as Layer from "effect/Layer"
 * import * as Stream from "effect/Stream"
 * import * as FetchHttpClient from "@effect/platform/FetchHttpClient"
 * import { Client, Historical } from "@chainstream/client"
 *
 * const program = Effect.gen(function*() {
 *   const historical = yield* Historical.HistoricalClient
 *   const head = yield* historical.height
 *
 *   yield* historical.prices("0x...", { fromBlock: head - 100, toBlock: head }).pipe(
 *     Stream.runForEach((price) => Effect.log(`${price.blockNumber}: ${price.price}`))
 *   )
 * })
 *
 * const AppLayer = Historical.layer.pipe(
 *   Layer.provide(FetchHttpClient.layer),
 *   Layer.provide(Client.layerConfigFromEnv)
 * )
 *
 * Effect.runPromise(program.pipe(Effect.provide(AppLayer)))
 * ```
 *
 * @module
 */
export {
  type BlockRange,
  HistoricalClient,
  type HistoricalClientService,
  type HistoricalError,
  layer
} from "./historical/service.ts"

export { HistoricalDecodeError, HistoricalRequestError } from "./historical/errors.ts"

export { PairCreatedRow, parseLine, PriceRow, ReservesRow } from "./historical/csv.ts"
