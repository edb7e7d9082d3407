/**
 * This module contains the state machine of a transport session.
 *
 * ```text
 * Disconnected --Open--> Connecting --HandshakeSucceeded--> Connected
 *      ^                     |                                 |   |
 *      +---HandshakeFailed---+                                 |   |
 *      +---------------------ConnectionLost--------------------+   |
 *                                                                  Close
 *                                                                  v
 *                               Closed <--Drained-- Draining <-----+
 * ```
 *
 * `Close` moves a session which is not connected straight to `Closed` and
 * `Fatal` closes a session from any state. `Closed` is terminal.
 *
 * @module
 */
import * as Either from "effect/Either"
import * as Schema from "effect/Schema"
import { InvalidTransitionError } from "./errors.ts"

/**
 * The states of a transport session.
 */
export const SessionStatus = Schema.Literal("Disconnected", "Connecting", "Connected", "Draining", "Closed")
export type SessionStatus = typeof SessionStatus.Type

/**
 * The events which drive a transport session between states.
 */
export const SessionEvent = Schema.Literal(
  "Open",
  "HandshakeSucceeded",
  "HandshakeFailed",
  "ConnectionLost",
  "Close",
  "Drained",
  "Fatal"
)
export type SessionEvent = typeof SessionEvent.Type

const transitions: Record<SessionStatus, Partial<Record<SessionEvent, SessionStatus>>> = {
  Disconnected: {
    Open: "Connecting",
    Close: "Closed",
    Fatal: "Closed"
  },
  Connecting: {
    HandshakeSucceeded: "Connected",
    HandshakeFailed: "Disconnected",
    Close: "Closed",
    Fatal: "Closed"
  },
  Connected: {
    ConnectionLost: "Disconnected",
    Close: "Draining",
    Fatal: "Closed"
  },
  Draining: {
    ConnectionLost: "Draining",
    Drained: "Closed",
    Fatal: "Closed"
  },
  Closed: {}
}

/**
 * Computes the state which follows `status` when `event` occurs.
 */
export const transition = (
  status: SessionStatus,
  event: SessionEvent
): Either.Either<SessionStatus, InvalidTransitionError> => {
  const next = transitions[status][event]
  return next === undefined
    ? Either.left(new InvalidTransitionError({ from: status, event }))
    : Either.right(next)
}

/**
 * Returns `true` once the session can no longer leave its current state.
 */
export const isTerminal = (status: SessionStatus): boolean => status === "Closed"
