import * as Either from "effect/Either"

import type { CborDecodeError, CborDecodeReason } from "./errors.js"
import { cborDecodeError } from "./errors.js"
import type { MapEntry, Value } from "./value.js"
import {
  arrayValue,
  boolValue,
  byteStringValue,
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  floatValue,
  integerValue,
  mapValue,
  nullValue,
  simpleValue,
  tagValue,
  textStringValue
} from "./value.js"

// CHANGE: decode exactly one CBOR data item into the value model
// WHY: byte-exact reading of heads, indefinite containers and tags with typed failures
// QUOTE(RFC 8949): "The initial byte of each encoded data item contains both ... the major type ... and additional information"
// REF: req-cbor-decode-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8949.html#section-3
// FORMAT THEOREM: ∀b: decode(b) = Right(v) → b is one well-formed item with no trailing bytes
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: container nesting never exceeds maxDepth
// COMPLEXITY: O(n) where n = input length

export interface DecodeOptions {
  readonly maxDepth?: number
}

type Decoded<A> = Either.Either<A, CborDecodeError>

interface Cursor {
  readonly bytes: Uint8Array
  readonly view: DataView
  readonly maxDepth: number
  offset: number
}

interface Head {
  readonly start: number
  readonly major: number
  readonly info: number
}

// Argument of a head; "indefinite" for additional info 31.
type Argument = bigint | "indefinite"

const BREAK = 0xff

const fail = <A>(reason: CborDecodeReason, offset: number, message: string): Decoded<A> =>
  Either.left(cborDecodeError(reason, offset, message))

const eof = <A>(cursor: Cursor): Decoded<A> =>
  fail("UnexpectedEof", cursor.bytes.length, "unexpected end of input")

const remaining = (cursor: Cursor): number => cursor.bytes.length - cursor.offset

const ensureAvailable = (cursor: Cursor, needed: bigint): Decoded<number> =>
  needed > BigInt(remaining(cursor)) ? eof(cursor) : Either.right(Number(needed))

const readHead = (cursor: Cursor): Decoded<Head> => {
  if (remaining(cursor) < 1) {
    return eof(cursor)
  }
  const start = cursor.offset
  const initial = cursor.view.getUint8(start)
  cursor.offset += 1
  return Either.right({ start, major: initial >> 5, info: initial & 0x1f })
}

const readArgument = (cursor: Cursor, head: Head): Decoded<Argument> => {
  if (head.info < 24) {
    return Either.right(BigInt(head.info))
  }
  if (head.info === 31) {
    return Either.right("indefinite")
  }
  if (head.info > 27) {
    return fail("InvalidAdditionalInfo", head.start, `reserved additional info ${head.info}`)
  }
  const width = 1 << (head.info - 24)
  if (remaining(cursor) < width) {
    return eof(cursor)
  }
  const at = cursor.offset
  cursor.offset += width
  switch (width) {
    case 1:
      return Either.right(BigInt(cursor.view.getUint8(at)))
    case 2:
      return Either.right(BigInt(cursor.view.getUint16(at)))
    case 4:
      return Either.right(BigInt(cursor.view.getUint32(at)))
    default:
      return Either.right(cursor.view.getBigUint64(at))
  }
}

const readDefiniteArgument = (cursor: Cursor, head: Head): Decoded<bigint> => {
  const argument = readArgument(cursor, head)
  if (Either.isLeft(argument)) {
    return Either.left(argument.left)
  }
  if (argument.right === "indefinite") {
    return fail(
      "InvalidAdditionalInfo",
      head.start,
      `indefinite length is not allowed for major type ${head.major}`
    )
  }
  return Either.right(argument.right)
}

const readBytes = (cursor: Cursor, length: bigint): Decoded<Uint8Array> => {
  const size = ensureAvailable(cursor, length)
  if (Either.isLeft(size)) {
    return Either.left(size.left)
  }
  const chunk = cursor.bytes.slice(cursor.offset, cursor.offset + size.right)
  cursor.offset += size.right
  return Either.right(chunk)
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const decodeUtf8 = (bytes: Uint8Array, offset: number): Decoded<string> =>
  Either.try({
    try: () => utf8.decode(bytes),
    catch: () => cborDecodeError("InvalidTextString", offset, "text string is not valid UTF-8")
  })

const atBreak = (cursor: Cursor): Decoded<boolean> => {
  if (remaining(cursor) < 1) {
    return eof(cursor)
  }
  if (cursor.view.getUint8(cursor.offset) === BREAK) {
    cursor.offset += 1
    return Either.right(true)
  }
  return Either.right(false)
}

const concatChunks = (chunks: ReadonlyArray<Uint8Array>): Uint8Array => {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0)
  const result = new Uint8Array(total)
  let position = 0
  for (const chunk of chunks) {
    result.set(chunk, position)
    position += chunk.length
  }
  return result
}

// Reads the definite-length chunks of an indefinite string up to the break byte.
const readChunks = (
  cursor: Cursor,
  major: number,
  onChunk: (chunk: Uint8Array, offset: number) => Decoded<void>
): Decoded<void> => {
  for (;;) {
    const done = atBreak(cursor)
    if (Either.isLeft(done)) {
      return Either.left(done.left)
    }
    if (done.right) {
      return Either.right(undefined)
    }
    const head = readHead(cursor)
    if (Either.isLeft(head)) {
      return Either.left(head.left)
    }
    if (head.right.major !== major || head.right.info === 31) {
      return fail(
        "MalformedIndefiniteString",
        head.right.start,
        `indefinite string chunk must be a definite-length item of major type ${major}`
      )
    }
    const length = readDefiniteArgument(cursor, head.right)
    if (Either.isLeft(length)) {
      return Either.left(length.left)
    }
    const dataOffset = cursor.offset
    const chunk = readBytes(cursor, length.right)
    if (Either.isLeft(chunk)) {
      return Either.left(chunk.left)
    }
    const accepted = onChunk(chunk.right, dataOffset)
    if (Either.isLeft(accepted)) {
      return Either.left(accepted.left)
    }
  }
}

const decodeByteString = (cursor: Cursor, head: Head): Decoded<Value> => {
  const argument = readArgument(cursor, head)
  if (Either.isLeft(argument)) {
    return Either.left(argument.left)
  }
  if (argument.right !== "indefinite") {
    return Either.map(readBytes(cursor, argument.right), byteStringValue)
  }
  const chunks: Array<Uint8Array> = []
  const read = readChunks(cursor, head.major, (chunk) => {
    chunks.push(chunk)
    return Either.right(undefined)
  })
  return Either.map(read, () => byteStringValue(concatChunks(chunks)))
}

const decodeTextString = (cursor: Cursor, head: Head): Decoded<Value> => {
  const argument = readArgument(cursor, head)
  if (Either.isLeft(argument)) {
    return Either.left(argument.left)
  }
  if (argument.right !== "indefinite") {
    const dataOffset = cursor.offset
    const bytes = readBytes(cursor, argument.right)
    if (Either.isLeft(bytes)) {
      return Either.left(bytes.left)
    }
    return Either.map(decodeUtf8(bytes.right, dataOffset), textStringValue)
  }
  const parts: Array<string> = []
  const read = readChunks(cursor, head.major, (chunk, offset) =>
    Either.map(decodeUtf8(chunk, offset), (text) => {
      parts.push(text)
    }))
  return Either.map(read, () => textStringValue(parts.join("")))
}

const enterContainer = (cursor: Cursor, head: Head, depth: number): Decoded<number> =>
  depth >= cursor.maxDepth
    ? fail("DepthExceeded", head.start, `nesting depth exceeds ${cursor.maxDepth}`)
    : Either.right(depth + 1)

const decodeArray = (cursor: Cursor, head: Head, depth: number): Decoded<Value> => {
  const inner = enterContainer(cursor, head, depth)
  if (Either.isLeft(inner)) {
    return Either.left(inner.left)
  }
  const argument = readArgument(cursor, head)
  if (Either.isLeft(argument)) {
    return Either.left(argument.left)
  }
  const items: Array<Value> = []
  if (argument.right === "indefinite") {
    for (;;) {
      const done = atBreak(cursor)
      if (Either.isLeft(done)) {
        return Either.left(done.left)
      }
      if (done.right) {
        return Either.right(arrayValue(items))
      }
      const item = decodeItem(cursor, inner.right)
      if (Either.isLeft(item)) {
        return item
      }
      items.push(item.right)
    }
  }
  // every item takes at least one byte
  const count = ensureAvailable(cursor, argument.right)
  if (Either.isLeft(count)) {
    return Either.left(count.left)
  }
  for (let index = 0; index < count.right; index++) {
    const item = decodeItem(cursor, inner.right)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right)
  }
  return Either.right(arrayValue(items))
}

const decodeEntry = (cursor: Cursor, depth: number): Decoded<MapEntry> => {
  const key = decodeItem(cursor, depth)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  const value = decodeItem(cursor, depth)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  return Either.right([key.right, value.right])
}

const decodeMap = (cursor: Cursor, head: Head, depth: number): Decoded<Value> => {
  const inner = enterContainer(cursor, head, depth)
  if (Either.isLeft(inner)) {
    return Either.left(inner.left)
  }
  const argument = readArgument(cursor, head)
  if (Either.isLeft(argument)) {
    return Either.left(argument.left)
  }
  const entries: Array<MapEntry> = []
  if (argument.right === "indefinite") {
    for (;;) {
      const done = atBreak(cursor)
      if (Either.isLeft(done)) {
        return Either.left(done.left)
      }
      if (done.right) {
        return Either.right(mapValue(entries))
      }
      const entry = decodeEntry(cursor, inner.right)
      if (Either.isLeft(entry)) {
        return Either.left(entry.left)
      }
      entries.push(entry.right)
    }
  }
  const count = ensureAvailable(cursor, argument.right * 2n)
  if (Either.isLeft(count)) {
    return Either.left(count.left)
  }
  for (let index = 0; index < count.right / 2; index++) {
    const entry = decodeEntry(cursor, inner.right)
    if (Either.isLeft(entry)) {
      return Either.left(entry.left)
    }
    entries.push(entry.right)
  }
  return Either.right(mapValue(entries))
}

const decodeTag = (cursor: Cursor, head: Head, depth: number): Decoded<Value> => {
  const inner = enterContainer(cursor, head, depth)
  if (Either.isLeft(inner)) {
    return Either.left(inner.left)
  }
  const tag = readDefiniteArgument(cursor, head)
  if (Either.isLeft(tag)) {
    return Either.left(tag.left)
  }
  return Either.map(decodeItem(cursor, inner.right), (value) => tagValue(tag.right, value))
}

// IEEE 754 binary16 widened to a double
const decodeHalf = (half: number): number => {
  const exponent = (half & 0x7c00) >> 10
  const fraction = half & 0x03ff
  const sign = half & 0x8000 ? -1 : 1
  if (exponent === 0) {
    return sign * 2 ** -14 * (fraction / 1024)
  }
  if (exponent === 0x1f) {
    return fraction === 0 ? sign * Infinity : NaN
  }
  return sign * 2 ** (exponent - 15) * (1 + fraction / 1024)
}

const readFloat = (cursor: Cursor, width: 2 | 4 | 8): Decoded<Value> => {
  if (remaining(cursor) < width) {
    return eof(cursor)
  }
  const at = cursor.offset
  cursor.offset += width
  if (width === 2) {
    return Either.right(floatValue(decodeHalf(cursor.view.getUint16(at))))
  }
  if (width === 4) {
    return Either.right(floatValue(cursor.view.getFloat32(at)))
  }
  return Either.right(floatValue(cursor.view.getFloat64(at)))
}

const decodeSimpleOrFloat = (cursor: Cursor, head: Head): Decoded<Value> => {
  switch (head.info) {
    case 20:
      return Either.right(boolValue(false))
    case 21:
      return Either.right(boolValue(true))
    case 22:
      return Either.right(nullValue)
    case 24: {
      if (remaining(cursor) < 1) {
        return eof(cursor)
      }
      const code = cursor.view.getUint8(cursor.offset)
      cursor.offset += 1
      if (code < 32) {
        return fail("InvalidAdditionalInfo", head.start, `simple value ${code} must use the one-byte form`)
      }
      return Either.right(simpleValue(code))
    }
    case 25:
      return readFloat(cursor, 2)
    case 26:
      return readFloat(cursor, 4)
    case 27:
      return readFloat(cursor, 8)
    case 28:
    case 29:
    case 30:
      return fail("InvalidAdditionalInfo", head.start, `reserved additional info ${head.info}`)
    case 31:
      return fail("UnexpectedBreak", head.start, "break outside an indefinite-length item")
    default:
      return Either.right(simpleValue(head.info))
  }
}

const decodeItem = (cursor: Cursor, depth: number): Decoded<Value> => {
  const head = readHead(cursor)
  if (Either.isLeft(head)) {
    return Either.left(head.left)
  }
  switch (head.right.major) {
    case 0:
      return Either.map(readDefiniteArgument(cursor, head.right), integerValue)
    case 1:
      return Either.map(readDefiniteArgument(cursor, head.right), (magnitude) => integerValue(-1n - magnitude))
    case 2:
      return decodeByteString(cursor, head.right)
    case 3:
      return decodeTextString(cursor, head.right)
    case 4:
      return decodeArray(cursor, head.right, depth)
    case 5:
      return decodeMap(cursor, head.right, depth)
    case 6:
      return decodeTag(cursor, head.right, depth)
    default:
      return decodeSimpleOrFloat(cursor, head.right)
  }
}

/**
 * Decode a single CBOR data item.
 *
 * @param bytes - Complete CBOR input.
 * @param options - maxDepth bounds nested arrays, maps and tags.
 * @returns Either with the decoded Value or a CborDecodeError carrying the byte offset.
 *
 * @pure true
 * @invariant bytes after the first item yield TrailingData
 * @complexity O(n)
 */
export const decodeCbor = (bytes: Uint8Array, options: DecodeOptions = {}): Decoded<Value> => {
  const cursor: Cursor = {
    bytes,
    view: new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength),
    maxDepth: Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT),
    offset: 0
  }
  const value = decodeItem(cursor, 0)
  if (Either.isLeft(value)) {
    return value
  }
  if (cursor.offset < bytes.length) {
    return fail(
      "TrailingData",
      cursor.offset,
      `${bytes.length - cursor.offset} byte(s) after the first data item`
    )
  }
  return value
}
