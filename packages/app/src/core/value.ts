// CHANGE: define the shared value model for CBOR and JSON payloads
// WHY: both codecs read and write one closed union instead of untyped JS values
// QUOTE(RFC 8949): "CBOR data items are ... integers, strings, arrays, maps, tags, simple values"
// REF: req-value-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8949.html#section-3.1
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Null,Bool,Integer,Float,ByteString,TextString,Array,Map,Tag,Simple}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Map entries keep insertion order; Integer and Float never merge
// COMPLEXITY: O(1)/O(n) for valueEquals

export type Value =
  | NullValue
  | BoolValue
  | IntegerValue
  | FloatValue
  | ByteStringValue
  | TextStringValue
  | ArrayValue
  | MapValue
  | TagValue
  | SimpleValue

export interface NullValue {
  readonly _tag: "Null"
}

export interface BoolValue {
  readonly _tag: "Bool"
  readonly value: boolean
}

export interface IntegerValue {
  readonly _tag: "Integer"
  readonly value: bigint
}

export interface FloatValue {
  readonly _tag: "Float"
  readonly value: number
}

export interface ByteStringValue {
  readonly _tag: "ByteString"
  readonly bytes: Uint8Array
}

export interface TextStringValue {
  readonly _tag: "TextString"
  readonly value: string
}

export interface ArrayValue {
  readonly _tag: "Array"
  readonly items: ReadonlyArray<Value>
}

export type MapEntry = readonly [Value, Value]

export interface MapValue {
  readonly _tag: "Map"
  readonly entries: ReadonlyArray<MapEntry>
}

export interface TagValue {
  readonly _tag: "Tag"
  readonly tag: bigint
  readonly value: Value
}

export interface SimpleValue {
  readonly _tag: "Simple"
  readonly code: number
}

/** Nesting limit shared by the CBOR decoder and the JSON parser. */
export const DEFAULT_MAX_DEPTH = 256

/** Largest accepted nesting limit; every recursive pass over a Value stays within the call stack below it. */
export const MAX_DEPTH_LIMIT = 512

/** Simple value 23, the only CBOR scalar without a dedicated variant. */
export const UNDEFINED_SIMPLE_CODE = 23

export const nullValue: NullValue = { _tag: "Null" }

export const boolValue = (value: boolean): BoolValue => ({ _tag: "Bool", value })

export const integerValue = (value: bigint | number): IntegerValue => ({
  _tag: "Integer",
  value: typeof value === "bigint" ? value : BigInt(value)
})

export const floatValue = (value: number): FloatValue => ({ _tag: "Float", value })

export const byteStringValue = (bytes: Uint8Array): ByteStringValue => ({ _tag: "ByteString", bytes })

export const textStringValue = (value: string): TextStringValue => ({ _tag: "TextString", value })

export const arrayValue = (items: ReadonlyArray<Value>): ArrayValue => ({ _tag: "Array", items })

export const mapValue = (entries: ReadonlyArray<MapEntry>): MapValue => ({ _tag: "Map", entries })

export const tagValue = (tag: bigint | number, value: Value): TagValue => ({
  _tag: "Tag",
  tag: typeof tag === "bigint" ? tag : BigInt(tag),
  value
})

export const simpleValue = (code: number): SimpleValue => ({ _tag: "Simple", code })

const floatEquals = (left: number, right: number): boolean =>
  Number.isNaN(left) ? Number.isNaN(right) : Object.is(left, right)

const bytesEqual = (left: Uint8Array, right: Uint8Array): boolean => {
  if (left.length !== right.length) {
    return false
  }
  for (let index = 0; index < left.length; index++) {
    if (left[index] !== right[index]) {
      return false
    }
  }
  return true
}

const itemsEqual = (left: ReadonlyArray<Value>, right: ReadonlyArray<Value>): boolean =>
  left.length === right.length && left.every((item, index) => {
    const other = right[index]
    return other !== undefined && valueEquals(item, other)
  })

const entriesEqual = (left: ReadonlyArray<MapEntry>, right: ReadonlyArray<MapEntry>): boolean =>
  left.length === right.length && left.every(([key, value], index) => {
    const other = right[index]
    return other !== undefined && valueEquals(key, other[0]) && valueEquals(value, other[1])
  })

/**
 * Structural equality over the value model.
 *
 * @pure true
 * @invariant Integer(1) ≠ Float(1); map entries compare positionally
 * @complexity O(n) where n = number of nodes
 */
export const valueEquals = (left: Value, right: Value): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Bool":
      return right._tag === "Bool" && left.value === right.value
    case "Integer":
      return right._tag === "Integer" && left.value === right.value
    case "Float":
      return right._tag === "Float" && floatEquals(left.value, right.value)
    case "ByteString":
      return right._tag === "ByteString" && bytesEqual(left.bytes, right.bytes)
    case "TextString":
      return right._tag === "TextString" && left.value === right.value
    case "Array":
      return right._tag === "Array" && itemsEqual(left.items, right.items)
    case "Map":
      return right._tag === "Map" && entriesEqual(left.entries, right.entries)
    case "Tag":
      return right._tag === "Tag" && left.tag === right.tag && valueEquals(left.value, right.value)
    case "Simple":
      return right._tag === "Simple" && left.code === right.code
  }
}
