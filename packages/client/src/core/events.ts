/**
 * This module contains the typed records delivered to subscribers.
 *
 * Every record carries its position within the chain (block number,
 * transaction index, log index) along with the block timestamp and the hash
 * of the transaction which emitted it.
 *
 * @module
 */
import * as Schema from "effect/Schema"
import {
  Address,
  BlockNumber,
  type EntityKind,
  type EventPosition,
  TransactionHash,
  Uint32,
  Uint8
} from "./domain.ts"

const EventFields = {
  /**
   * The number of the block which contains the event.
   */
  blockNumber: BlockNumber,
  /**
   * The index of the emitting transaction within its block.
   */
  transactionIndex: Uint32,
  /**
   * The index of the log within its block.
   */
  logIndex: Uint32,
  /**
   * The block timestamp, in seconds since the unix epoch.
   */
  timestamp: Schema.Int,
  /**
   * The hash of the emitting transaction.
   */
  transactionHash: TransactionHash
}

/**
 * The direction of a swap relative to the first token of the pair.
 */
export const Side = Schema.Literal("Buy", "Sell")
export type Side = typeof Side.Type

/**
 * A price quote derived from a swap on a constant product pair.
 */
export const Price = Schema.TaggedStruct("Price", {
  ...EventFields,
  pair: Address,
  sender: Address,
  receiver: Address,
  price: Schema.Number,
  volume0: Schema.Number,
  volume1: Schema.Number,
  /**
   * The raw amount of the first token, in its smallest unit.
   */
  fixed0: Schema.BigIntFromSelf,
  /**
   * The raw amount of the second token, in its smallest unit.
   */
  fixed1: Schema.BigIntFromSelf,
  decimals0: Uint8,
  decimals1: Uint8,
  side: Side
}).annotations({
  identifier: "Price",
  description: "A price quote derived from a swap"
})
export type Price = typeof Price.Type

/**
 * The creation of a new pair by a factory contract.
 */
export const PairCreated = Schema.TaggedStruct("PairCreated", {
  ...EventFields,
  factory: Address,
  pair: Address,
  token0: Address,
  token1: Address,
  pairIndex: Schema.BigIntFromSelf
}).annotations({
  identifier: "PairCreated",
  description: "A pair created by a factory contract"
})
export type PairCreated = typeof PairCreated.Type

/**
 * The pair event which caused a reserves update.
 */
export const ReservesEventType = Schema.Literal("Mint", "Burn", "Swap", "Sync")
export type ReservesEventType = typeof ReservesEventType.Type

/**
 * The reserves of a pair after a mint, burn, swap or sync.
 */
export const Reserves = Schema.TaggedStruct("Reserves", {
  ...EventFields,
  pair: Address,
  type: ReservesEventType,
  reserve0: Schema.BigIntFromSelf,
  reserve1: Schema.BigIntFromSelf,
  amount0: Schema.BigIntFromSelf,
  amount1: Schema.BigIntFromSelf,
  lpAmount: Schema.BigIntFromSelf,
  protocolFee: Schema.optional(Schema.BigIntFromSelf)
}).annotations({
  identifier: "Reserves",
  description: "The reserves of a pair after a pair event"
})
export type Reserves = typeof Reserves.Type

export const DecodedEvent = Schema.Union(Price, PairCreated, Reserves)
export type DecodedEvent = typeof DecodedEvent.Type

/**
 * The record tag delivered for each entity kind.
 */
export const eventTags = {
  "price": "Price",
  "pair-created": "PairCreated",
  "reserves": "Reserves"
} as const satisfies Record<EntityKind, DecodedEvent["_tag"]>

/**
 * The record type delivered for a given entity kind.
 */
export type EventOf<K extends EntityKind> = Extract<DecodedEvent, { readonly _tag: (typeof eventTags)[K] }>

/**
 * Returns a refinement which narrows a decoded event to the record type of the
 * given entity kind.
 */
export const isEventOf = <K extends EntityKind>(kind: K) => (event: DecodedEvent): event is EventOf<K> =>
  event._tag === eventTags[kind]

/**
 * Extracts the chain position of a decoded event.
 */
export const positionOf = (event: DecodedEvent): EventPosition => ({
  blockNumber: event.blockNumber,
  transactionIndex: event.transactionIndex,
  logIndex: event.logIndex
})
