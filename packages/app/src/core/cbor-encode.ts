import * as Either from "effect/Either"

import type { CborEncodeError } from "./errors.js"
import { cborEncodeError } from "./errors.js"
import type { MapEntry, Value } from "./value.js"

// CHANGE: encode the value model as definite-length CBOR
// WHY: shortest integer heads, float64 for every float, map pairs in stored order
// QUOTE(RFC 8949): "The value 24 ... means the argument's value is held in the following 1 byte"
// REF: req-cbor-encode-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8949.html#section-3
// FORMAT THEOREM: ∀v definite: decode(encode(v)) = v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no indefinite-length item is ever produced
// COMPLEXITY: O(n) where n = encoded size

type Sink = Array<number>
type Encoded = Either.Either<void, CborEncodeError>

const MAX_ARGUMENT = 0xffff_ffff_ffff_ffffn

const ok: Encoded = Either.right(undefined)

const pushBigEndian = (sink: Sink, argument: bigint, width: number): void => {
  for (let shift = BigInt((width - 1) * 8); shift >= 0n; shift -= 8n) {
    sink.push(Number((argument >> shift) & 0xffn))
  }
}

const pushBytes = (sink: Sink, bytes: Uint8Array): void => {
  for (const byte of bytes) {
    sink.push(byte)
  }
}

const writeHead = (sink: Sink, major: number, argument: bigint): void => {
  const type = major << 5
  if (argument < 24n) {
    sink.push(type | Number(argument))
  } else if (argument <= 0xffn) {
    sink.push(type | 24, Number(argument))
  } else if (argument <= 0xffffn) {
    sink.push(type | 25)
    pushBigEndian(sink, argument, 2)
  } else if (argument <= 0xffff_ffffn) {
    sink.push(type | 26)
    pushBigEndian(sink, argument, 4)
  } else {
    sink.push(type | 27)
    pushBigEndian(sink, argument, 8)
  }
}

const writeInteger = (sink: Sink, value: bigint): Encoded => {
  const major = value < 0n ? 1 : 0
  const magnitude = value < 0n ? -1n - value : value
  if (magnitude > MAX_ARGUMENT) {
    return Either.left(cborEncodeError(`integer ${value} is outside the CBOR integer range`))
  }
  writeHead(sink, major, magnitude)
  return ok
}

const writeFloat = (sink: Sink, value: number): Encoded => {
  const view = new DataView(new ArrayBuffer(8))
  view.setFloat64(0, value)
  sink.push(0xfb)
  for (let index = 0; index < 8; index++) {
    sink.push(view.getUint8(index))
  }
  return ok
}

const utf8 = new TextEncoder()

const writeText = (sink: Sink, value: string): Encoded => {
  const bytes = utf8.encode(value)
  writeHead(sink, 3, BigInt(bytes.length))
  pushBytes(sink, bytes)
  return ok
}

const writeByteString = (sink: Sink, bytes: Uint8Array): Encoded => {
  writeHead(sink, 2, BigInt(bytes.length))
  pushBytes(sink, bytes)
  return ok
}

const writeItems = (sink: Sink, items: ReadonlyArray<Value>): Encoded => {
  writeHead(sink, 4, BigInt(items.length))
  for (const item of items) {
    const written = writeValue(sink, item)
    if (Either.isLeft(written)) {
      return written
    }
  }
  return ok
}

const writeEntries = (sink: Sink, entries: ReadonlyArray<MapEntry>): Encoded => {
  writeHead(sink, 5, BigInt(entries.length))
  for (const [key, value] of entries) {
    const writtenKey = writeValue(sink, key)
    if (Either.isLeft(writtenKey)) {
      return writtenKey
    }
    const writtenValue = writeValue(sink, value)
    if (Either.isLeft(writtenValue)) {
      return writtenValue
    }
  }
  return ok
}

const writeTag = (sink: Sink, tag: bigint, value: Value): Encoded => {
  if (tag < 0n || tag > MAX_ARGUMENT) {
    return Either.left(cborEncodeError(`tag number ${tag} is outside 0..2^64-1`))
  }
  writeHead(sink, 6, tag)
  return writeValue(sink, value)
}

const writeSimple = (sink: Sink, code: number): Encoded => {
  if (!Number.isInteger(code) || code < 0 || code > 255 || (code >= 24 && code < 32)) {
    return Either.left(cborEncodeError(`simple value ${code} cannot be encoded`))
  }
  if (code < 24) {
    sink.push(0xe0 | code)
  } else {
    sink.push(0xf8, code)
  }
  return ok
}

// Plain switch: this recursion runs once per nesting level.
const writeValue = (sink: Sink, value: Value): Encoded => {
  switch (value._tag) {
    case "Null":
      sink.push(0xf6)
      return ok
    case "Bool":
      sink.push(value.value ? 0xf5 : 0xf4)
      return ok
    case "Integer":
      return writeInteger(sink, value.value)
    case "Float":
      return writeFloat(sink, value.value)
    case "ByteString":
      return writeByteString(sink, value.bytes)
    case "TextString":
      return writeText(sink, value.value)
    case "Array":
      return writeItems(sink, value.items)
    case "Map":
      return writeEntries(sink, value.entries)
    case "Tag":
      return writeTag(sink, value.tag, value.value)
    case "Simple":
      return writeSimple(sink, value.code)
  }
}

/**
 * Encode a Value as a single definite-length CBOR data item.
 *
 * @param value - Value to encode.
 * @returns Either with the encoded bytes or CborEncodeError for values outside CBOR's range.
 *
 * @pure true
 * @invariant integer heads use the shortest width; floats are always 9 bytes
 * @complexity O(n)
 */
export const encodeCbor = (value: Value): Either.Either<Uint8Array, CborEncodeError> => {
  const sink: Sink = []
  return Either.map(writeValue(sink, value), () => Uint8Array.from(sink))
}
