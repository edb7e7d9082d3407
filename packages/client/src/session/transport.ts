import * as Context from "effect/Context"
import type * as Effect from "effect/Effect"
import type * as Scope from "effect/Scope"
import type * as Stream from "effect/Stream"
import type { DecodeError } from "../wire/errors.ts"
import type { TransportError } from "./errors.ts"

// =============================================================================
// Transport
// =============================================================================

/**
 * A single physical duplex connection to the streaming service.
 */
export interface Connection {
  /**
   * Sends a complete, length-prefixed frame.
   */
  readonly send: (frame: Uint8Array) => Effect.Effect<void, TransportError>

  /**
   * The complete, length-prefixed frames received from the server, in
   * arrival order.
   *
   * The stream ends when the connection is closed by the peer and fails when
   * the connection breaks or the peer violates the framing of the transport.
   * It can only be consumed once.
   */
  readonly frames: Stream.Stream<Uint8Array, TransportError | DecodeError>
}

export interface TransportService {
  /**
   * Opens a new connection. The connection is closed when the scope is
   * closed.
   */
  readonly connect: Effect.Effect<Connection, TransportError, Scope.Scope>
}

/**
 * A service which abstracts the transport carrying frames between the client
 * and the streaming service.
 *
 * Decoupling the client from the transport allows the recovery logic to be
 * exercised against an in-memory transport.
 */
export class Transport extends Context.Tag("ChainStream/Session/Transport")<
  Transport,
  TransportService
>() {}
