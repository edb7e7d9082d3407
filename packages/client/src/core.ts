/**
 * Core domain models of the client: addresses, block numbers, subscription
 * identifiers, event positions and the typed records delivered to
 * subscribers.
 *
 * @module
 */
export * from "./core/domain.ts"

export * from "./core/events.ts"
