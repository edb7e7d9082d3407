/**
 * Core domain models: addresses, block numbers, event positions and the typed
 * records delivered to subscribers.
 */
export * as Core from "./core.ts"

/**
 * The binary wire format spoken with the streaming service.
 */
export * as Wire from "./wire.ts"

/**
 * Subscription requests and their validation rules.
 */
export * as Filter from "./filter.ts"

/**
 * The transport session and its WebSocket implementation.
 */
export * as Session from "./session.ts"

/**
 * The streaming client.
 */
export * as Client from "./client.ts"

/**
 * The historical HTTP client.
 */
export * as Historical from "./historical.ts"
