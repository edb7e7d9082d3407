/**
 * The transport session: the physical connection to the streaming service
 * and the state machine which governs it.
 *
 * @module
 */
export { InvalidTransitionError, TransportError } from "./session/errors.ts"

export { layerWebSocket, makeWebSocket, type WebSocketOptions } from "./session/node.ts"

export { isTerminal, SessionEvent, SessionStatus, transition } from "./session/state.ts"

export { type Connection, Transport, type TransportService } from "./session/transport.ts"
