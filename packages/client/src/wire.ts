/**
 * The binary wire format spoken with the streaming service.
 *
 * Requests are encoded into complete, length-prefixed frames ready to be sent
 * over the transport. Frames received from the server are decoded into
 * `WireFrame` values; the records carried by event frames are decoded
 * separately into typed events.
 *
 * @example
 * ```typescript
 * import * as Either from "effect/Either"
 * import { Wire } from "@chainstream/client"
 *
 * const frame = Wire.decodeFrame(bytes)
 * if (Either.isRight(frame) && frame.right._tag === "Event") {
 *   const event = Wire.decodeEvent(frame.right.payload)
 * }
 * ```
 *
 * @module
 */
export { decodeEvent, decodeFrame, encodeRequest, encodeUnsubscribe } from "./wire/codec.ts"

export { DecodeError } from "./wire/errors.ts"

export {
  AckFrame,
  EndFrame,
  EntityKindCode,
  ErrorFrame,
  EventFrame,
  FrameTag,
  LENGTH_PREFIX_SIZE,
  MAX_FRAME_SIZE,
  RequestTag,
  WireFrame
} from "./wire/frames.ts"
