/**
 * Decoding of the CSV bodies returned by the historical API.
 *
 * Bodies start with a header row naming the columns in `snake_case`. Empty
 * cells stand for absent optional values.
 *
 * @module
 * @internal
 */
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { identity } from "effect/Function"
import * as Option from "effect/Option"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import * as Stream from "effect/Stream"
import { isHex } from "viem"
import { Address, BlockNumber, normalizeAddress, TransactionHash, Uint32, Uint8 } from "../core/domain.ts"
import { ReservesEventType, Side } from "../core/events.ts"
import { HistoricalDecodeError } from "./errors.ts"

// =============================================================================
// Lines
// =============================================================================

/**
 * Splits a CSV line into its cells. Cells may be quoted, in which case a
 * doubled quote stands for a literal one.
 */
export const parseLine = (line: string): Either.Either<ReadonlyArray<string>, string> => {
  const cells: Array<string> = []
  let cell = ""
  let quoted = false
  let index = 0

  while (index < line.length) {
    const char = line[index]
    if (quoted) {
      if (char === "\"") {
        if (line[index + 1] === "\"") {
          cell += "\""
          index += 2
          continue
        }
        quoted = false
      } else {
        cell += char
      }
    } else if (char === "\"" && cell.length === 0) {
      quoted = true
    } else if (char === ",") {
      cells.push(cell)
      cell = ""
    } else if (char !== "\r") {
      cell += char
    }
    index += 1
  }

  if (quoted) {
    return Either.left("unterminated quoted cell")
  }
  cells.push(cell)
  return Either.right(cells)
}

// =============================================================================
// Cells
// =============================================================================

const AddressFromString = Schema.transformOrFail(Schema.String, Address, {
  strict: true,
  decode: (value, _, ast) => {
    const address = normalizeAddress(value)
    return address === undefined
      ? ParseResult.fail(new ParseResult.Type(ast, value, `Invalid address: ${value}`))
      : ParseResult.succeed(address)
  },
  encode: ParseResult.succeed
})

const HashFromString = Schema.transformOrFail(Schema.String, TransactionHash, {
  strict: true,
  decode: (value, _, ast) => {
    const lowered = value.toLowerCase()
    return isHex(lowered, { strict: false })
      ? ParseResult.succeed(lowered)
      : ParseResult.fail(new ParseResult.Type(ast, value, `Invalid transaction hash: ${value}`))
  },
  encode: ParseResult.succeed
})

const SideFromString = Schema.transform(Schema.Literal("true", "false"), Side, {
  strict: true,
  decode: (value) => value === "true" ? "Buy" : "Sell",
  encode: (side) => side === "Buy" ? "true" : "false"
})

const BlockNumberFromString = Schema.compose(Schema.NumberFromString, BlockNumber)
const Uint32FromString = Schema.compose(Schema.NumberFromString, Uint32)
const Uint8FromString = Schema.compose(Schema.NumberFromString, Uint8)
const IntFromString = Schema.compose(Schema.NumberFromString, Schema.Int)

const column = <A, I, R>(schema: Schema.Schema<A, I, R>, name: string) =>
  Schema.propertySignature(schema).pipe(Schema.fromKey(name))

const EventColumns = {
  blockNumber: column(BlockNumberFromString, "block_number"),
  transactionIndex: column(Uint32FromString, "transaction_index"),
  logIndex: Schema.optionalWith(Uint32FromString, { default: () => 0 }).pipe(Schema.fromKey("log_index")),
  timestamp: IntFromString,
  transactionHash: column(HashFromString, "transaction_hash")
}

// =============================================================================
// Rows
// =============================================================================

export const PriceRow = Schema.Struct({
  ...EventColumns,
  pair: AddressFromString,
  sender: AddressFromString,
  receiver: AddressFromString,
  price: Schema.NumberFromString,
  volume0: Schema.NumberFromString,
  volume1: Schema.NumberFromString,
  fixed0: Schema.BigInt,
  fixed1: Schema.BigInt,
  decimals0: Uint8FromString,
  decimals1: Uint8FromString,
  side: SideFromString
})

export const PairCreatedRow = Schema.Struct({
  ...EventColumns,
  factory: AddressFromString,
  pair: AddressFromString,
  token0: AddressFromString,
  token1: AddressFromString,
  pairIndex: column(Schema.BigInt, "pair_index")
})

export const ReservesRow = Schema.Struct({
  ...EventColumns,
  pair: Schema.optional(AddressFromString),
  type: column(ReservesEventType, "event"),
  reserve0: Schema.BigInt,
  reserve1: Schema.BigInt,
  amount0: Schema.BigInt,
  amount1: Schema.BigInt,
  lpAmount: column(Schema.BigInt, "lp_amount"),
  protocolFee: Schema.optional(Schema.BigInt).pipe(Schema.fromKey("protocol_fee"))
})

/**
 * Decodes the lines of a CSV body into rows and builds a value from each.
 * The first non-empty line is the header.
 */
export const decodeRows = <Row, I, A>(schema: Schema.Schema<Row, I>, build: (row: Row) => A, path: string) => {
  const decode = Schema.decodeUnknown(schema)

  const step = (
    header: Option.Option<ReadonlyArray<string>>,
    [line, index]: readonly [string, number]
  ): Effect.Effect<readonly [Option.Option<ReadonlyArray<string>>, Option.Option<A>], HistoricalDecodeError> =>
    Effect.gen(function*() {
      const fail = (reason: string) => new HistoricalDecodeError({ path, line: index + 1, reason })

      const cells = yield* Either.mapLeft(parseLine(line), fail)
      if (Option.isNone(header)) {
        return [Option.some(cells), Option.none()] as const
      }

      const names = header.value
      if (cells.length !== names.length) {
        return yield* fail(`expected ${names.length} cells, found ${cells.length}`)
      }

      const row: Record<string, string> = {}
      names.forEach((name, position) => {
        const cell = cells[position]
        if (cell !== undefined && cell.length > 0) {
          row[name] = cell
        }
      })

      const value = yield* decode(row).pipe(Effect.mapError((error) => fail(error.message)))
      return [header, Option.some(build(value))] as const
    })

  return <E, R>(lines: Stream.Stream<string, E, R>): Stream.Stream<A, E | HistoricalDecodeError, R> =>
    lines.pipe(
      Stream.zipWithIndex,
      Stream.filter(([line]) => line.trim().length > 0),
      Stream.mapAccumEffect(Option.none<ReadonlyArray<string>>(), step),
      Stream.filterMap(identity)
    )
}
