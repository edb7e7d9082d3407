/**
 * This module contains the frames exchanged with the streaming service and
 * the compatibility constants of the wire format.
 *
 * Every frame is a little-endian `u32` body length followed by the body. The
 * body starts with a one byte tag and the `u32` subscription id it belongs to.
 *
 * @module
 */
import * as Schema from "effect/Schema"
import { type EntityKind, SubscriptionId } from "../core/domain.ts"

// =============================================================================
// Constants
// =============================================================================

/**
 * The maximum size, in bytes, of a frame body (excluding the length prefix).
 *
 * This is a compatibility constant: the server never emits larger frames and
 * the client rejects them before reading the body.
 */
export const MAX_FRAME_SIZE = 1_048_576

/**
 * The size of the length prefix preceding every frame body.
 */
export const LENGTH_PREFIX_SIZE = 4

/**
 * Tags of the requests sent by the client.
 */
export const RequestTag = {
  Subscribe: 0x01,
  Unsubscribe: 0x02
} as const

/**
 * Tags of the frames sent by the server.
 */
export const FrameTag = {
  Ack: 0x01,
  Event: 0x02,
  Error: 0x03,
  End: 0x04
} as const

/**
 * The wire code of each entity kind.
 */
export const EntityKindCode = {
  "price": 0x01,
  "pair-created": 0x02,
  "reserves": 0x03
} as const satisfies Record<EntityKind, number>

// =============================================================================
// Frames
// =============================================================================

/**
 * The server accepted a subscription request.
 */
export const AckFrame = Schema.TaggedStruct("Ack", {
  subscriptionId: SubscriptionId
}).annotations({ identifier: "WireFrame.Ack" })
export type AckFrame = typeof AckFrame.Type

/**
 * A single encoded record belonging to a subscription.
 */
export const EventFrame = Schema.TaggedStruct("Event", {
  subscriptionId: SubscriptionId,
  /**
   * The encoded record. Decoded lazily by the multiplexer.
   */
  payload: Schema.Uint8ArrayFromSelf
}).annotations({ identifier: "WireFrame.Event" })
export type EventFrame = typeof EventFrame.Type

/**
 * The server terminated a subscription because of an error.
 */
export const ErrorFrame = Schema.TaggedStruct("Error", {
  subscriptionId: SubscriptionId,
  code: Schema.Number,
  message: Schema.String
}).annotations({ identifier: "WireFrame.Error" })
export type ErrorFrame = typeof ErrorFrame.Type

/**
 * The server delivered every record of a subscription.
 */
export const EndFrame = Schema.TaggedStruct("End", {
  subscriptionId: SubscriptionId
}).annotations({ identifier: "WireFrame.End" })
export type EndFrame = typeof EndFrame.Type

/**
 * The smallest decodable unit received from the transport.
 */
export const WireFrame = Schema.Union(AckFrame, EventFrame, ErrorFrame, EndFrame)
export type WireFrame = typeof WireFrame.Type

// =============================================================================
// Constructors
// =============================================================================

export const ack = (subscriptionId: SubscriptionId): WireFrame => ({
  _tag: "Ack",
  subscriptionId
})

export const event = (subscriptionId: SubscriptionId, payload: Uint8Array): WireFrame => ({
  _tag: "Event",
  subscriptionId,
  payload
})

export const error = (subscriptionId: SubscriptionId, code: number, message: string): WireFrame => ({
  _tag: "Error",
  subscriptionId,
  code,
  message
})

export const end = (subscriptionId: SubscriptionId): WireFrame => ({
  _tag: "End",
  subscriptionId
})
