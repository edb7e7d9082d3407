/**
 * Bounds-checked little-endian readers and writers for the wire format.
 *
 * @module
 * @internal
 */
import * as Either from "effect/Either"
import { DecodeError } from "./errors.ts"

const TWO_POW_64 = 1n << 64n

/**
 * A cursor over a byte array. Every read checks the remaining length before
 * touching the underlying buffer and fails with a `DecodeError` pointing at
 * the offset of the field which could not be read.
 *
 * @internal
 */
export class ByteReader {
  private readonly view: DataView
  private readonly bytes: Uint8Array
  private position = 0

  constructor(bytes: Uint8Array) {
    this.bytes = bytes
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get offset(): number {
    return this.position
  }

  get remaining(): number {
    return this.bytes.byteLength - this.position
  }

  /**
   * Reserves `size` bytes, returning the offset at which they start.
   */
  private take(size: number, field: string): Either.Either<number, DecodeError> {
    if (size > this.remaining) {
      return Either.left(
        new DecodeError({
          reason: `truncated ${field}: needed ${size} bytes, ${this.remaining} remaining`,
          offset: this.position
        })
      )
    }
    const start = this.position
    this.position += size
    return Either.right(start)
  }

  readUint8(field: string): Either.Either<number, DecodeError> {
    return Either.map(this.take(1, field), (offset) => this.view.getUint8(offset))
  }

  readUint16(field: string): Either.Either<number, DecodeError> {
    return Either.map(this.take(2, field), (offset) => this.view.getUint16(offset, true))
  }

  readUint32(field: string): Either.Either<number, DecodeError> {
    return Either.map(this.take(4, field), (offset) => this.view.getUint32(offset, true))
  }

  readFloat64(field: string): Either.Either<number, DecodeError> {
    return Either.map(this.take(8, field), (offset) => this.view.getFloat64(offset, true))
  }

  /**
   * Reads an unsigned 64-bit integer which must fit into a safe integer.
   */
  readUint64(field: string): Either.Either<number, DecodeError> {
    const start = this.position
    return Either.flatMap(this.take(8, field), (offset): Either.Either<number, DecodeError> => {
      const value = this.view.getBigUint64(offset, true)
      return value > BigInt(Number.MAX_SAFE_INTEGER)
        ? Either.left(new DecodeError({ reason: `${field} ${value} exceeds the safe integer range`, offset: start }))
        : Either.right(Number(value))
    })
  }

  /**
   * Reads a signed 64-bit integer which must fit into a safe integer.
   */
  readInt64(field: string): Either.Either<number, DecodeError> {
    const start = this.position
    return Either.flatMap(this.take(8, field), (offset): Either.Either<number, DecodeError> => {
      const value = this.view.getBigInt64(offset, true)
      return value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)
        ? Either.left(new DecodeError({ reason: `${field} ${value} exceeds the safe integer range`, offset: start }))
        : Either.right(Number(value))
    })
  }

  /**
   * Reads an unsigned little-endian integer of `words` 64-bit words.
   */
  private readWideUint(words: number, field: string): Either.Either<bigint, DecodeError> {
    return Either.map(this.take(words * 8, field), (offset) => {
      let value = 0n
      for (let word = words - 1; word >= 0; word--) {
        value = value * TWO_POW_64 + this.view.getBigUint64(offset + word * 8, true)
      }
      return value
    })
  }

  readUint128(field: string): Either.Either<bigint, DecodeError> {
    return this.readWideUint(2, field)
  }

  readUint256(field: string): Either.Either<bigint, DecodeError> {
    return this.readWideUint(4, field)
  }

  /**
   * Returns a view over the next `size` bytes without copying them.
   */
  readBytes(size: number, field: string): Either.Either<Uint8Array, DecodeError> {
    return Either.map(this.take(size, field), (offset) => this.bytes.subarray(offset, offset + size))
  }

  /**
   * Reads a presence flag, which must be either `0` or `1`.
   */
  readFlag(field: string): Either.Either<boolean, DecodeError> {
    const start = this.position
    return Either.flatMap(this.readUint8(field), (flag): Either.Either<boolean, DecodeError> =>
      flag === 0 || flag === 1
        ? Either.right(flag === 1)
        : Either.left(new DecodeError({ reason: `invalid presence flag ${flag} for ${field}`, offset: start })))
  }

  /**
   * Succeeds only when every byte has been consumed.
   */
  expectEnd(context: string): Either.Either<void, DecodeError> {
    return this.remaining === 0
      ? Either.right(undefined)
      : Either.left(
        new DecodeError({
          reason: `${this.remaining} trailing bytes after ${context}`,
          offset: this.position
        })
      )
  }
}

/**
 * A fixed-capacity writer. The caller computes the exact encoded size up
 * front, so writes never need to grow the buffer.
 *
 * @internal
 */
export class ByteWriter {
  readonly bytes: Uint8Array
  private readonly view: DataView
  private position = 0

  constructor(size: number) {
    this.bytes = new Uint8Array(size)
    this.view = new DataView(this.bytes.buffer)
  }

  writeUint8(value: number): this {
    this.view.setUint8(this.position, value)
    this.position += 1
    return this
  }

  writeUint32(value: number): this {
    this.view.setUint32(this.position, value, true)
    this.position += 4
    return this
  }

  writeUint64(value: number): this {
    this.view.setBigUint64(this.position, BigInt(value), true)
    this.position += 8
    return this
  }

  writeBytes(value: Uint8Array): this {
    this.bytes.set(value, this.position)
    this.position += value.byteLength
    return this
  }
}
