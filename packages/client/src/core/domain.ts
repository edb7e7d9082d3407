import * as Order from "effect/Order"
import * as Schema from "effect/Schema"
import { isAddress } from "viem"

/**
 * A branded type representing an account, pool or token address in its
 * canonical form: `0x` followed by 40 lowercase hexadecimal characters.
 */
export const Address = Schema.TemplateLiteral("0x", Schema.String).pipe(
  Schema.pattern(/^0x[0-9a-f]{40}$/),
  Schema.filter((value) => isAddress(value, { strict: false })),
  Schema.brand("ChainStream/Models/Address")
).annotations({ identifier: "Address" })
export type Address = typeof Address.Type

/**
 * A branded type representing the hash of a transaction.
 */
export const TransactionHash = Schema.TemplateLiteral("0x", Schema.String).pipe(
  Schema.pattern(/^0x[0-9a-f]{64}$/),
  Schema.brand("ChainStream/Models/TransactionHash")
).annotations({ identifier: "TransactionHash" })
export type TransactionHash = typeof TransactionHash.Type

/**
 * Represents a block number.
 */
export const BlockNumber = Schema.NonNegativeInt.pipe(
  Schema.brand("ChainStream/Models/BlockNumber")
).annotations({
  identifier: "BlockNumber",
  description: "A block number"
})
export type BlockNumber = typeof BlockNumber.Type

/**
 * An unsigned 32-bit integer.
 */
export const Uint32 = Schema.Int.pipe(Schema.between(0, 0xffff_ffff))

/**
 * An unsigned 8-bit integer.
 */
export const Uint8 = Schema.Int.pipe(Schema.between(0, 0xff))

/**
 * The locally generated identifier of a subscription on the wire.
 *
 * Identifiers are unique for the lifetime of a client's session state.
 */
export const SubscriptionId = Uint32.pipe(
  Schema.brand("ChainStream/Models/SubscriptionId")
).annotations({ identifier: "SubscriptionId" })
export type SubscriptionId = typeof SubscriptionId.Type

/**
 * The category of event a subscription delivers.
 */
export const EntityKind = Schema.Literal("price", "pair-created", "reserves").annotations({
  identifier: "EntityKind",
  description: "The category of event being subscribed to"
})
export type EntityKind = typeof EntityKind.Type

/**
 * The position of an event within the chain. Positions are ordered by block
 * number, then transaction index, then log index.
 */
export const EventPosition = Schema.Struct({
  blockNumber: BlockNumber,
  transactionIndex: Uint32,
  logIndex: Uint32
}).annotations({
  identifier: "EventPosition",
  description: "The position of an event within the chain"
})
export type EventPosition = typeof EventPosition.Type

export const EventPositionOrder: Order.Order<EventPosition> = Order.struct({
  blockNumber: Order.number,
  transactionIndex: Order.number,
  logIndex: Order.number
})

/**
 * Returns the canonical form of an address, or `undefined` if the value is
 * not a valid address. Mixed-case input is accepted without checksum
 * verification.
 */
export const normalizeAddress = (value: string): Address | undefined => {
  const lowered = value.trim().toLowerCase()
  if (!isAddress(lowered, { strict: false })) {
    return undefined
  }
  return Address.make(lowered)
}
