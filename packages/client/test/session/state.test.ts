/**
 * Tests for the transport session state machine.
 *
 * @module
 */
import { isTerminal, SessionEvent, SessionStatus, transition } from "@chainstream/client/session"
import { describe, expect, it } from "@effect/vitest"
import * as Either from "effect/Either"

// =============================================================================
// Test Helpers
// =============================================================================

const run = (events: ReadonlyArray<SessionEvent>): SessionStatus =>
  events.reduce<SessionStatus>((status, event) => Either.getOrThrow(transition(status, event)), "Disconnected")

// =============================================================================
// Transitions
// =============================================================================

describe("transition", () => {
  it("follows a connection through its lifecycle", () => {
    expect(run(["Open"])).toBe("Connecting")
    expect(run(["Open", "HandshakeSucceeded"])).toBe("Connected")
    expect(run(["Open", "HandshakeSucceeded", "Close"])).toBe("Draining")
    expect(run(["Open", "HandshakeSucceeded", "Close", "Drained"])).toBe("Closed")
  })

  it("returns to disconnected when a connection fails", () => {
    expect(run(["Open", "HandshakeFailed"])).toBe("Disconnected")
    expect(run(["Open", "HandshakeSucceeded", "ConnectionLost"])).toBe("Disconnected")
    expect(run(["Open", "HandshakeSucceeded", "ConnectionLost", "Open", "HandshakeSucceeded"])).toBe("Connected")
  })

  it("closes a session which is not connected right away", () => {
    expect(run(["Close"])).toBe("Closed")
    expect(run(["Open", "Close"])).toBe("Closed")
  })

  it("stays draining when the connection is lost", () => {
    expect(run(["Open", "HandshakeSucceeded", "Close", "ConnectionLost"])).toBe("Draining")
  })

  it("closes the session on a fatal error from every open state", () => {
    for (const status of ["Disconnected", "Connecting", "Connected", "Draining"] as const) {
      expect(Either.getOrThrow(transition(status, "Fatal"))).toBe("Closed")
    }
  })

  it("rejects events which are not allowed", () => {
    const error = Either.getOrThrow(Either.flip(transition("Disconnected", "HandshakeSucceeded")))

    expect(error._tag).toBe("InvalidTransitionError")
    expect(error.message).toBe(
      "Invalid session transition: HandshakeSucceeded is not allowed while Disconnected"
    )
    expect(Either.isLeft(transition("Connected", "Open"))).toBe(true)
    expect(Either.isLeft(transition("Draining", "Close"))).toBe(true)
  })

  it("never leaves the closed state", () => {
    for (const event of SessionEvent.literals) {
      expect(Either.isLeft(transition("Closed", event))).toBe(true)
    }
  })
})

describe("isTerminal", () => {
  it("is only true for the closed state", () => {
    expect(SessionStatus.literals.filter(isTerminal)).toEqual(["Closed"])
  })
})
