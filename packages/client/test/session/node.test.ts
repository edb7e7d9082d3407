/**
 * Tests for the WebSocket transport against a loopback server.
 *
 * @module
 */
import { SubscriptionId } from "@chainstream/client/core"
import { makeWebSocket, type WebSocketOptions } from "@chainstream/client/session"
import { encodeUnsubscribe } from "@chainstream/client/wire"
import { endFrame } from "@chainstream/client/test/harness/FrameEncoder"
import { describe, expect, it } from "@effect/vitest"
import * as Chunk from "effect/Chunk"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Queue from "effect/Queue"
import * as Redacted from "effect/Redacted"
import * as Stream from "effect/Stream"
import { bytesToHex } from "viem"
import * as Net from "node:net"
import type WebSocket from "ws"
import { WebSocketServer } from "ws"

// =============================================================================
// Test Helpers
// =============================================================================

interface Peer {
  readonly socket: WebSocket
  readonly authorization: string | undefined
  readonly inbox: Queue.Queue<Uint8Array>
}

const toBytes = (data: WebSocket.RawData): Uint8Array =>
  Array.isArray(data) ? Buffer.concat(data) : data instanceof ArrayBuffer ? new Uint8Array(data) : data

/**
 * Starts a loopback server and queues every connection it accepts.
 */
const makeServer = (options: Pick<WebSocket.ServerOptions, "autoPong" | "verifyClient"> = {}) =>
  Effect.gen(function*() {
    const peers = yield* Queue.unbounded<Peer>()
    const server = yield* Effect.acquireRelease(
      Effect.async<WebSocketServer>((resume) => {
        const server = new WebSocketServer({ host: "127.0.0.1", port: 0, ...options })
        server.once("listening", () => resume(Effect.succeed(server)))
      }),
      (server) =>
        Effect.async<void>((resume) => {
          for (const client of server.clients) {
            client.terminate()
          }
          server.close(() => resume(Effect.void))
        })
    )

    server.on("connection", (socket, request) => {
      const inbox = Effect.runSync(Queue.unbounded<Uint8Array>())
      socket.on("message", (data) => Queue.unsafeOffer(inbox, toBytes(data)))
      Queue.unsafeOffer(peers, { socket, authorization: request.headers.authorization, inbox })
    })

    const address = server.address()
    const url = typeof address === "string" ? address : `ws://127.0.0.1:${address.port}`
    return { url, accept: Queue.take(peers) }
  })

const makeOptions = (url: string, overrides: Partial<WebSocketOptions> = {}): WebSocketOptions => ({
  url,
  handshakeTimeout: Duration.seconds(5),
  livenessInterval: Duration.seconds(30),
  livenessTimeout: Duration.seconds(10),
  credentials: Option.none(),
  ...overrides
})

// =============================================================================
// Tests
// =============================================================================

describe("WebSocket transport", () => {
  it.scopedLive("exchanges binary frames and authenticates the handshake", () =>
    Effect.gen(function*() {
      const server = yield* makeServer()
      const transport = makeWebSocket(makeOptions(server.url, {
        credentials: Option.some({ username: "test-user", password: Redacted.make("test-secret") })
      }))

      const connection = yield* transport.connect
      const peer = yield* server.accept
      expect(peer.authorization).toBe(`Basic ${Buffer.from("test-user:test-secret").toString("base64")}`)

      yield* connection.send(encodeUnsubscribe(SubscriptionId.make(7)))
      expect(bytesToHex(yield* Queue.take(peer.inbox))).toBe("0x050000000207000000")

      peer.socket.send(endFrame(7))
      const frames = yield* connection.frames.pipe(Stream.take(1), Stream.runCollect)
      expect(Chunk.toReadonlyArray(frames).map((bytes) => bytesToHex(bytes))).toEqual(["0x050000000407000000"])
    }))

  it.scopedLive("omits the authorization header without credentials", () =>
    Effect.gen(function*() {
      const server = yield* makeServer()
      yield* makeWebSocket(makeOptions(server.url)).connect

      const peer = yield* server.accept
      expect(peer.authorization).toBeUndefined()
    }))

  it.scopedLive("fails the frames on a text message", () =>
    Effect.gen(function*() {
      const server = yield* makeServer()
      const connection = yield* makeWebSocket(makeOptions(server.url)).connect
      const peer = yield* server.accept

      peer.socket.send("hello")
      const error = yield* Effect.flip(Stream.runDrain(connection.frames))

      expect(error._tag).toBe("DecodeError")
      expect(error.message).toBe("Failed to decode frame at offset 0: unexpected text message")
    }))

  it.scopedLive("rejects a message larger than the maximum frame", () =>
    Effect.gen(function*() {
      const server = yield* makeServer()
      const connection = yield* makeWebSocket(makeOptions(server.url)).connect
      const peer = yield* server.accept

      peer.socket.send(new Uint8Array(4 + 1_048_576 + 1))
      const error = yield* Effect.flip(Stream.runDrain(connection.frames))

      expect(error._tag).toBe("DecodeError")
      expect(error.message).toBe("Failed to decode frame at offset 0: message exceeds the maximum of 1048580 bytes")
    }))

  it.scopedLive("answers the server's pings", () =>
    Effect.gen(function*() {
      const server = yield* makeServer()
      yield* makeWebSocket(makeOptions(server.url)).connect
      const peer = yield* server.accept

      const pong = yield* Effect.async<Buffer>((resume) => {
        peer.socket.once("pong", (data) => resume(Effect.succeed(data)))
        peer.socket.ping("keep-alive")
      })

      expect(pong.toString("utf8")).toBe("keep-alive")
    }))

  it.scopedLive("ends the frames when the server closes the connection", () =>
    Effect.gen(function*() {
      const server = yield* makeServer()
      const connection = yield* makeWebSocket(makeOptions(server.url)).connect
      const peer = yield* server.accept

      peer.socket.close(1000)
      const frames = yield* Stream.runCollect(connection.frames)
      expect(Chunk.size(frames)).toBe(0)

      const error = yield* Effect.flip(connection.send(encodeUnsubscribe(SubscriptionId.make(1))))
      expect(error.reason).toBe("connection is not open")
    }))

  it.scopedLive("fails the handshake when the server rejects the upgrade", () =>
    Effect.gen(function*() {
      const server = yield* makeServer({ verifyClient: () => false })

      const error = yield* Effect.flip(Effect.scoped(makeWebSocket(makeOptions(server.url)).connect))

      expect(error._tag).toBe("TransportError")
      expect(error.reason).toBe("handshake failed")
    }))

  it.scopedLive("fails the handshake when the server never answers", () =>
    Effect.gen(function*() {
      const port = yield* Effect.acquireRelease(
        Effect.async<{ readonly server: Net.Server; readonly port: number }>((resume) => {
          const server = Net.createServer((socket) => {
            // Accept the connection but never answer the upgrade
            socket.on("error", () => socket.destroy())
            socket.setTimeout(1_000, () => socket.destroy())
          })
          server.listen(0, "127.0.0.1", () => {
            const address = server.address()
            resume(Effect.succeed({ server, port: address !== null && typeof address === "object" ? address.port : 0 }))
          })
        }),
        ({ server }) =>
          Effect.async<void>((resume) => {
            server.close(() => resume(Effect.void))
          })
      ).pipe(Effect.map(({ port }) => port))

      const error = yield* Effect.flip(Effect.scoped(makeWebSocket(makeOptions(`ws://127.0.0.1:${port}`, {
        handshakeTimeout: Duration.millis(50)
      })).connect))

      expect(error.reason).toBe("handshake failed")
    }))

  it.scopedLive("fails the frames when a liveness probe goes unanswered", () =>
    Effect.gen(function*() {
      const server = yield* makeServer({ autoPong: false })
      const connection = yield* makeWebSocket(makeOptions(server.url, {
        livenessInterval: Duration.millis(50),
        livenessTimeout: Duration.millis(50)
      })).connect
      yield* server.accept

      const error = yield* Effect.flip(Stream.runDrain(connection.frames))

      expect(error._tag).toBe("TransportError")
      expect(error.message).toBe("Transport failure: no answer to a liveness probe within 50ms")
    }))
})
