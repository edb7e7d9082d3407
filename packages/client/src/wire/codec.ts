/**
 * This module contains the encoder for client requests and the decoders for
 * server frames and event records.
 *
 * Decoding is stateless. Every declared length is checked against
 * `MAX_FRAME_SIZE` and against the bytes actually remaining before anything
 * sized by it is read or allocated.
 *
 * @module
 */
import * as Either from "effect/Either"
import { bytesToHex, hexToBytes } from "viem"
import { Address, BlockNumber, SubscriptionId, TransactionHash } from "../core/domain.ts"
import type { DecodedEvent, ReservesEventType, Side } from "../core/events.ts"
import type { SubscriptionRequest } from "../filter/request.ts"
import { ByteReader, ByteWriter } from "./bytes.ts"
import { DecodeError } from "./errors.ts"
import {
  EntityKindCode,
  FrameTag,
  LENGTH_PREFIX_SIZE,
  MAX_FRAME_SIZE,
  RequestTag,
  type WireFrame
} from "./frames.ts"
import * as Frames from "./frames.ts"

const ADDRESS_SIZE = 20
const HASH_SIZE = 32

// =============================================================================
// Requests
// =============================================================================

/**
 * Encodes a subscription request as a complete, length-prefixed frame.
 */
export const encodeRequest = (request: SubscriptionRequest, subscriptionId: SubscriptionId): Uint8Array => {
  const bodyLength = 1 + 4 + 1 + 4 + request.filter.length * ADDRESS_SIZE +
    1 + (request.fromBlock === undefined ? 0 : 8) +
    1 + (request.toBlock === undefined ? 0 : 8)

  const writer = new ByteWriter(LENGTH_PREFIX_SIZE + bodyLength)
    .writeUint32(bodyLength)
    .writeUint8(RequestTag.Subscribe)
    .writeUint32(subscriptionId)
    .writeUint8(EntityKindCode[request.kind])
    .writeUint32(request.filter.length)

  for (const address of request.filter) {
    writer.writeBytes(hexToBytes(address))
  }

  writeOptionalBlock(writer, request.fromBlock)
  writeOptionalBlock(writer, request.toBlock)

  return writer.bytes
}

/**
 * Encodes a request asking the server to stop sending frames for the given
 * subscription.
 */
export const encodeUnsubscribe = (subscriptionId: SubscriptionId): Uint8Array =>
  new ByteWriter(LENGTH_PREFIX_SIZE + 5)
    .writeUint32(5)
    .writeUint8(RequestTag.Unsubscribe)
    .writeUint32(subscriptionId)
    .bytes

const writeOptionalBlock = (writer: ByteWriter, block: BlockNumber | undefined): void => {
  if (block === undefined) {
    writer.writeUint8(0)
  } else {
    writer.writeUint8(1).writeUint64(block)
  }
}

// =============================================================================
// Frames
// =============================================================================

/**
 * Decodes a complete, length-prefixed frame received from the server.
 */
export const decodeFrame = (bytes: Uint8Array): Either.Either<WireFrame, DecodeError> =>
  Either.gen(function*() {
    const reader = new ByteReader(bytes)
    const bodyLength = yield* reader.readUint32("frame length")
    if (bodyLength > MAX_FRAME_SIZE) {
      return yield* Either.left(
        new DecodeError({
          reason: `frame length ${bodyLength} exceeds the maximum of ${MAX_FRAME_SIZE}`,
          offset: 0
        })
      )
    }
    if (bodyLength !== reader.remaining) {
      return yield* Either.left(
        new DecodeError({
          reason: `frame length ${bodyLength} does not match the ${reader.remaining} bytes received`,
          offset: 0
        })
      )
    }
    const frame = yield* decodeBody(reader)
    yield* reader.expectEnd("frame")
    return frame
  })

const decodeBody = (reader: ByteReader): Either.Either<WireFrame, DecodeError> =>
  Either.gen(function*() {
    const tagOffset = reader.offset
    const tag = yield* reader.readUint8("frame tag")
    const subscriptionId = SubscriptionId.make(yield* reader.readUint32("subscription id"))

    switch (tag) {
      case FrameTag.Ack: {
        return Frames.ack(subscriptionId)
      }
      case FrameTag.Event: {
        const lengthOffset = reader.offset
        const recordLength = yield* reader.readUint32("record length")
        if (recordLength !== reader.remaining) {
          return yield* Either.left(
            new DecodeError({
              reason: `record length ${recordLength} does not match the ${reader.remaining} remaining bytes`,
              offset: lengthOffset
            })
          )
        }
        const payload = yield* reader.readBytes(recordLength, "record")
        return Frames.event(subscriptionId, payload)
      }
      case FrameTag.Error: {
        const code = yield* reader.readUint16("error code")
        const lengthOffset = reader.offset
        const messageLength = yield* reader.readUint32("error message length")
        if (messageLength > reader.remaining) {
          return yield* Either.left(
            new DecodeError({
              reason: `error message length ${messageLength} exceeds the ${reader.remaining} remaining bytes`,
              offset: lengthOffset
            })
          )
        }
        const messageOffset = reader.offset
        const messageBytes = yield* reader.readBytes(messageLength, "error message")
        const message = yield* decodeUtf8(messageBytes, messageOffset)
        return Frames.error(subscriptionId, code, message)
      }
      case FrameTag.End: {
        return Frames.end(subscriptionId)
      }
      default: {
        return yield* Either.left(new DecodeError({ reason: `invalid frame tag ${tag}`, offset: tagOffset }))
      }
    }
  })

const utf8 = new TextDecoder("utf-8", { fatal: true })

const decodeUtf8 = (bytes: Uint8Array, offset: number): Either.Either<string, DecodeError> =>
  Either.try({
    try: () => utf8.decode(bytes),
    catch: () => new DecodeError({ reason: "error message is not valid utf-8", offset })
  })

// =============================================================================
// Records
// =============================================================================

const sides: ReadonlyArray<Side> = ["Sell", "Buy"]
const reservesEventTypes: ReadonlyArray<ReservesEventType> = ["Mint", "Burn", "Swap", "Sync"]

/**
 * Decodes the record carried by an event frame.
 */
export const decodeEvent = (payload: Uint8Array): Either.Either<DecodedEvent, DecodeError> =>
  Either.gen(function*() {
    const reader = new ByteReader(payload)
    const kindOffset = reader.offset
    const kind = yield* reader.readUint8("record kind")
    const header = {
      blockNumber: BlockNumber.make(yield* reader.readUint64("block number")),
      transactionIndex: yield* reader.readUint32("transaction index"),
      logIndex: yield* reader.readUint32("log index"),
      timestamp: yield* reader.readInt64("timestamp"),
      transactionHash: TransactionHash.make(bytesToHex(yield* reader.readBytes(HASH_SIZE, "transaction hash")))
    }

    let event: DecodedEvent
    switch (kind) {
      case EntityKindCode.price: {
        event = {
          _tag: "Price",
          ...header,
          pair: yield* readAddress(reader, "pair"),
          sender: yield* readAddress(reader, "sender"),
          receiver: yield* readAddress(reader, "receiver"),
          price: yield* reader.readFloat64("price"),
          volume0: yield* reader.readFloat64("volume0"),
          volume1: yield* reader.readFloat64("volume1"),
          fixed0: yield* reader.readUint256("fixed0"),
          fixed1: yield* reader.readUint256("fixed1"),
          decimals0: yield* reader.readUint8("decimals0"),
          decimals1: yield* reader.readUint8("decimals1"),
          side: yield* readEnum(reader, "side", sides)
        }
        break
      }
      case EntityKindCode["pair-created"]: {
        event = {
          _tag: "PairCreated",
          ...header,
          factory: yield* readAddress(reader, "factory"),
          pair: yield* readAddress(reader, "pair"),
          token0: yield* readAddress(reader, "token0"),
          token1: yield* readAddress(reader, "token1"),
          pairIndex: yield* reader.readUint256("pair index")
        }
        break
      }
      case EntityKindCode.reserves: {
        const pair = yield* readAddress(reader, "pair")
        const type = yield* readEnum(reader, "reserves event type", reservesEventTypes)
        const reserve0 = yield* reader.readUint128("reserve0")
        const reserve1 = yield* reader.readUint128("reserve1")
        const amount0 = yield* reader.readUint256("amount0")
        const amount1 = yield* reader.readUint256("amount1")
        const lpAmount = yield* reader.readUint256("lp amount")
        const hasProtocolFee = yield* reader.readFlag("protocol fee")
        event = {
          _tag: "Reserves",
          ...header,
          pair,
          type,
          reserve0,
          reserve1,
          amount0,
          amount1,
          lpAmount,
          ...(hasProtocolFee ? { protocolFee: yield* reader.readUint256("protocol fee") } : {})
        }
        break
      }
      default: {
        return yield* Either.left(new DecodeError({ reason: `invalid record kind ${kind}`, offset: kindOffset }))
      }
    }

    yield* reader.expectEnd("record")
    return event
  })

const readAddress = (reader: ByteReader, field: string): Either.Either<Address, DecodeError> =>
  Either.map(reader.readBytes(ADDRESS_SIZE, field), (bytes) => Address.make(bytesToHex(bytes)))

const readEnum = <A>(
  reader: ByteReader,
  field: string,
  values: ReadonlyArray<A>
): Either.Either<A, DecodeError> => {
  const offset = reader.offset
  return Either.flatMap(reader.readUint8(field), (code): Either.Either<A, DecodeError> => {
    const value = values[code]
    return value === undefined
      ? Either.left(new DecodeError({ reason: `invalid ${field} ${code}`, offset }))
      : Either.right(value)
  })
}
