/**
 * A `Transport` for Node.js built on the `ws` WebSocket library.
 *
 * Each frame travels as one binary WebSocket message. Pings sent by the
 * server are answered by `ws` itself. In the other direction the connection
 * sends a ping every `livenessInterval` and fails with a `TransportError` if
 * nothing is heard back within `livenessTimeout`.
 *
 * @module
 */
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Queue from "effect/Queue"
import type * as Scope from "effect/Scope"
import * as Stream from "effect/Stream"
import WebSocket from "ws"
import { authorization, ClientConfig, type ClientOptions } from "../client/config.ts"
import { DecodeError } from "../wire/errors.ts"
import { LENGTH_PREFIX_SIZE, MAX_FRAME_SIZE } from "../wire/frames.ts"
import { TransportError } from "./errors.ts"
import { type Connection, Transport, type TransportService } from "./transport.ts"

type Inbound =
  | { readonly _tag: "Open" }
  | { readonly _tag: "Frame"; readonly bytes: Uint8Array }
  | { readonly _tag: "Failure"; readonly error: TransportError | DecodeError }
  | { readonly _tag: "Closed"; readonly code: number }

const toBytes = (data: WebSocket.RawData): Uint8Array => {
  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data)
  }
  return data
}

/**
 * The largest message accepted from the server. Longer messages are rejected
 * by `ws` before they are buffered.
 */
const MAX_MESSAGE_SIZE = LENGTH_PREFIX_SIZE + MAX_FRAME_SIZE

const toFailure = (cause: Error): TransportError | DecodeError =>
  "code" in cause && cause.code === "WS_ERR_UNSUPPORTED_MESSAGE_LENGTH"
    ? new DecodeError({ reason: `message exceeds the maximum of ${MAX_MESSAGE_SIZE} bytes`, offset: 0 })
    : new TransportError({ reason: cause.message, cause })

const fromInbound = (item: Inbound): Effect.Effect<Option.Option<Uint8Array>, TransportError | DecodeError> => {
  switch (item._tag) {
    case "Frame": {
      return Effect.succeed(Option.some(item.bytes))
    }
    case "Failure": {
      return Effect.fail(item.error)
    }
    case "Open":
    case "Closed": {
      return Effect.succeed(Option.none())
    }
  }
}

/**
 * The options of the WebSocket transport.
 */
export type WebSocketOptions = Pick<
  ClientOptions,
  "url" | "handshakeTimeout" | "livenessInterval" | "livenessTimeout" | "credentials"
>

/**
 * Creates a WebSocket transport with the given options.
 */
export const makeWebSocket = (options: WebSocketOptions): TransportService => {
  const headers: Record<string, string> = Option.match(options.credentials, {
    onNone: () => ({}),
    onSome: (credentials) => ({ Authorization: authorization(credentials) })
  })

  const connect: Effect.Effect<Connection, TransportError, Scope.Scope> = Effect.gen(function*() {
    const inbound = yield* Queue.unbounded<Inbound>()
    yield* Effect.addFinalizer(() => Queue.shutdown(inbound))

    // Any traffic from the server counts as an answer to a liveness probe.
    let heard = true

    const socket = yield* Effect.acquireRelease(
      Effect.try({
        try: () => {
          const socket = new WebSocket(options.url, {
            headers,
            handshakeTimeout: Duration.toMillis(options.handshakeTimeout),
            maxPayload: MAX_MESSAGE_SIZE
          })
          socket.on("open", () => Queue.unsafeOffer(inbound, { _tag: "Open" }))
          socket.on("message", (data, isBinary) => {
            heard = true
            Queue.unsafeOffer(
              inbound,
              isBinary
                ? { _tag: "Frame", bytes: toBytes(data) }
                : {
                  _tag: "Failure",
                  error: new DecodeError({ reason: "unexpected text message", offset: 0 })
                }
            )
          })
          socket.on("ping", () => {
            heard = true
          })
          socket.on("pong", () => {
            heard = true
          })
          socket.on("error", (cause) => Queue.unsafeOffer(inbound, { _tag: "Failure", error: toFailure(cause) }))
          socket.on("close", (code) => Queue.unsafeOffer(inbound, { _tag: "Closed", code }))
          return socket
        },
        catch: (cause) => new TransportError({ reason: `invalid url ${options.url}`, cause })
      }),
      (socket) =>
        Effect.sync(() => {
          switch (socket.readyState) {
            case WebSocket.CONNECTING: {
              socket.terminate()
              break
            }
            case WebSocket.OPEN: {
              socket.close(1000)
              break
            }
          }
        })
    )

    const handshake = yield* Queue.take(inbound)
    switch (handshake._tag) {
      case "Open": {
        break
      }
      case "Failure": {
        return yield* new TransportError({ reason: "handshake failed", cause: handshake.error })
      }
      default: {
        return yield* new TransportError({ reason: "connection closed during the handshake" })
      }
    }

    yield* Effect.logDebug("Connected").pipe(Effect.annotateLogs("url", options.url))

    const probe = Effect.gen(function*() {
      yield* Effect.sleep(options.livenessInterval)
      heard = false
      yield* Effect.try({
        try: () => socket.ping(),
        catch: (cause) => new TransportError({ reason: "failed to send a liveness probe", cause })
      })
      yield* Effect.sleep(options.livenessTimeout)
      if (!heard) {
        return yield* new TransportError({
          reason: `no answer to a liveness probe within ${Duration.format(options.livenessTimeout)}`
        })
      }
    })

    yield* Effect.forever(probe).pipe(
      Effect.catchAll((error) => Queue.offer(inbound, { _tag: "Failure", error })),
      Effect.forkScoped
    )

    const send = (frame: Uint8Array): Effect.Effect<void, TransportError> =>
      Effect.async<void, TransportError>((resume) => {
        if (socket.readyState !== WebSocket.OPEN) {
          resume(Effect.fail(new TransportError({ reason: "connection is not open" })))
          return
        }
        socket.send(frame, { binary: true }, (cause) => {
          resume(
            cause instanceof Error
              ? Effect.fail(new TransportError({ reason: "failed to send a frame", cause }))
              : Effect.void
          )
        })
      })

    const frames = Stream.fromQueue(inbound).pipe(
      Stream.takeWhile((item) => item._tag !== "Closed"),
      Stream.mapEffect(fromInbound),
      Stream.filterMap((bytes) => bytes)
    )

    return { send, frames } satisfies Connection
  })

  return { connect }
}

/**
 * A layer which provides a WebSocket `Transport` configured from the
 * `ClientConfig`.
 */
export const layerWebSocket: Layer.Layer<Transport, never, ClientConfig> = Layer.effect(
  Transport,
  Effect.map(ClientConfig, makeWebSocket)
)
