/**
 * Recovery - the loop which keeps a connection open on behalf of the
 * multiplexer.
 *
 * The loop connects, hands the connection to the multiplexer, which re-sends
 * every open subscription from the point where its delivery left off, and
 * feeds the inbound frames to the multiplexer until the connection breaks.
 * It then waits according to the backoff policy and starts over. The retry
 * counter resets once a connection delivers a frame or stays open for a
 * liveness interval.
 *
 * @module
 * @internal
 */
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Random from "effect/Random"
import * as Stream from "effect/Stream"
import { TransportError } from "../session/errors.ts"
import type { SessionEvent, SessionStatus } from "../session/state.ts"
import type { TransportService } from "../session/transport.ts"
import type { DecodeError } from "../wire/errors.ts"
import type { BackoffOptions, ClientOptions } from "./config.ts"
import { ReconnectExhaustedError } from "./errors.ts"
import type { Multiplexer } from "./multiplexer.ts"

// =============================================================================
// Backoff
// =============================================================================

/**
 * Computes the delay before reconnection attempt `retry + 1`:
 * `min(base * 2^retry, max)`.
 *
 * With jitter enabled the delay is scaled by `0.5 + sample / 2`, where
 * `sample` is uniformly distributed in `[0, 1)`.
 */
export const backoffDelay = (options: BackoffOptions, retry: number, sample = 1): Duration.Duration => {
  const exponential = Duration.times(options.base, 2 ** Math.min(retry, 30))
  const capped = Duration.min(exponential, options.max)
  return options.jitter ? Duration.times(capped, 0.5 + sample / 2) : capped
}

const nextDelay = (options: BackoffOptions, retry: number): Effect.Effect<Duration.Duration> =>
  options.jitter
    ? Effect.map(Random.next, (sample) => backoffDelay(options, retry, sample))
    : Effect.succeed(backoffDelay(options, retry))

// =============================================================================
// Driver
// =============================================================================

export interface DriverOptions {
  readonly multiplexer: Multiplexer
  readonly transport: TransportService
  readonly config: Pick<ClientOptions, "backoff" | "handshakeTimeout" | "livenessInterval" | "maxReconnectAttempts">
  /**
   * Applies a session event and returns the resulting status.
   */
  readonly advance: (event: SessionEvent) => Effect.Effect<SessionStatus>
}

/**
 * Runs the connection loop until the session is closed, the reconnection
 * budget is exhausted or a frame cannot be decoded.
 */
export const runDriver = (options: DriverOptions): Effect.Effect<void> => {
  const { advance, config, multiplexer, transport } = options

  /**
   * Serves a single connection. Never succeeds: a connection either breaks
   * or is interrupted.
   *
   * `onHealthy` runs for every inbound frame and once the connection has
   * stayed open for a liveness interval.
   */
  const serve = (
    onConnected: Effect.Effect<boolean>,
    onHealthy: Effect.Effect<void>
  ): Effect.Effect<void, TransportError | DecodeError> =>
    Effect.gen(function*() {
      const connection = yield* transport.connect.pipe(
        Effect.timeoutFail({
          duration: config.handshakeTimeout,
          onTimeout: () =>
            new TransportError({ reason: `handshake timed out after ${Duration.format(config.handshakeTimeout)}` })
        })
      )
      if (!(yield* onConnected)) {
        return
      }
      yield* multiplexer.attach(connection)
      yield* Effect.sleep(config.livenessInterval).pipe(Effect.zipRight(onHealthy), Effect.forkScoped)
      yield* connection.frames.pipe(
        Stream.tap(() => onHealthy),
        Stream.runForEach(multiplexer.dispatch)
      )
      return yield* new TransportError({ reason: "connection closed by the server" })
    }).pipe(
      Effect.scoped,
      Effect.ensuring(multiplexer.detach)
    )

  return Effect.gen(function*() {
    let retries = 0

    while (true) {
      if ((yield* advance("Open")) !== "Connecting") {
        return
      }

      let connected = false
      const onConnected = Effect.gen(function*() {
        if ((yield* advance("HandshakeSucceeded")) !== "Connected") {
          return false
        }
        connected = true
        yield* Effect.logInfo("Connection established")
        return true
      })

      // A completed handshake alone does not restore the budget
      const onHealthy = Effect.sync(() => {
        retries = 0
      })

      const result = yield* Effect.either(serve(onConnected, onHealthy))
      if (result._tag === "Right") {
        return
      }

      const error = result.left
      if (error._tag === "DecodeError") {
        yield* Effect.logError("Closing the session after a frame could not be decoded").pipe(
          Effect.annotateLogs({ reason: error.reason, offset: error.offset })
        )
        yield* multiplexer.shutdown(error)
        yield* advance("Fatal")
        return
      }

      const status = yield* advance(connected ? "ConnectionLost" : "HandshakeFailed")
      if (status !== "Disconnected") {
        return
      }

      if (config.maxReconnectAttempts > 0 && retries >= config.maxReconnectAttempts) {
        yield* Effect.logError("Giving up reconnecting").pipe(
          Effect.annotateLogs({ attempts: retries, reason: error.reason })
        )
        yield* multiplexer.shutdown(new ReconnectExhaustedError({ attempts: retries, cause: error }))
        yield* advance("Fatal")
        return
      }

      const delay = yield* nextDelay(config.backoff, retries)
      retries += 1
      yield* Effect.logWarning("Connection failed, reconnecting").pipe(
        Effect.annotateLogs({ attempt: retries, delay: Duration.format(delay), reason: error.reason })
      )
      yield* Effect.sleep(delay)
    }
  })
}
