import { Match } from "effect"
import * as Either from "effect/Either"

import { encodeBase64 } from "./base64.js"
import type { JsonPrintError } from "./errors.js"
import { jsonPrintError } from "./errors.js"
import type { MapEntry, Value } from "./value.js"
import { UNDEFINED_SIMPLE_CODE } from "./value.js"

// CHANGE: print the value model as single-line JSON text
// WHY: project CBOR-only variants (byte strings, tags, simple values, non-text keys) onto JSON explicitly
// REF: req-json-print-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v from parseJson: parse(print(v)) = v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output contains no newline; map entries keep stored order
// COMPLEXITY: O(n)

/**
 * How byte strings appear in JSON.
 *
 * - `base64`: unpadded standard-alphabet base64 inside a JSON string
 * - `array`: JSON array of byte values
 * - `reject`: fail with UnsupportedValue
 */
export type BytePolicy = "base64" | "array" | "reject"

export interface PrintOptions {
  readonly bytes?: BytePolicy
  /** Drop the space after ':' between a key and its value. */
  readonly compact?: boolean
}

interface Printer {
  readonly out: Array<string>
  readonly bytes: BytePolicy
  readonly colon: string
}

type Printed = Either.Either<void, JsonPrintError>

const ok: Printed = Either.right(undefined)

const ESCAPES: Readonly<Record<number, string>> = {
  0x08: "\\b",
  0x09: "\\t",
  0x0a: "\\n",
  0x0c: "\\f",
  0x0d: "\\r",
  0x22: "\\\"",
  0x5c: "\\\\"
}

/**
 * Quote a string as a JSON string literal.
 *
 * @pure true
 * @complexity O(n)
 */
export const quoteJsonString = (value: string): string => {
  let result = "\""
  let runStart = 0
  for (let index = 0; index < value.length; index++) {
    const unit = value.charCodeAt(index)
    if (unit < 0x20 || unit === 0x22 || unit === 0x5c) {
      result += value.slice(runStart, index) + (ESCAPES[unit] ?? `\\u${unit.toString(16).padStart(4, "0")}`)
      runStart = index + 1
    }
  }
  return result + value.slice(runStart) + "\""
}

/**
 * Shortest round-trip decimal form of a float that still reads back as a float.
 *
 * @pure true
 * @invariant integral values keep a fractional part ("42.0"); non-finite values print null
 * @complexity O(1)
 */
export const formatFloat = (value: number): string => {
  if (!Number.isFinite(value)) {
    return "null"
  }
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  const text = String(value)
  if (text.includes("e")) {
    return text.replace("e+", "e")
  }
  return text.includes(".") ? text : `${text}.0`
}

/**
 * Map-key policy: text keys print as they are, integer keys as their decimal
 * form, tagged keys by their inner value. Every other key is rejected.
 *
 * @pure true
 * @complexity O(1)
 */
export const projectMapKey = (key: Value): Either.Either<string, JsonPrintError> => {
  switch (key._tag) {
    case "TextString":
      return Either.right(key.value)
    case "Integer":
      return Either.right(key.value.toString())
    case "Tag":
      return projectMapKey(key.value)
    default:
      return Either.left(jsonPrintError("NonStringMapKey", `map key of type ${key._tag} has no JSON form`))
  }
}

const printBytes = (printer: Printer, bytes: Uint8Array): Printed =>
  Match.value(printer.bytes).pipe(
    Match.when("base64", () => {
      printer.out.push(quoteJsonString(encodeBase64(bytes)))
      return ok
    }),
    Match.when("array", () => {
      printer.out.push(`[${bytes.join(",")}]`)
      return ok
    }),
    Match.when("reject", (): Printed =>
      Either.left(jsonPrintError("UnsupportedValue", "byte strings have no JSON form"))
    ),
    Match.exhaustive
  )

const printItems = (printer: Printer, items: ReadonlyArray<Value>): Printed => {
  printer.out.push("[")
  for (const [index, item] of items.entries()) {
    if (index > 0) {
      printer.out.push(",")
    }
    const printed = printValue(printer, item)
    if (Either.isLeft(printed)) {
      return printed
    }
  }
  printer.out.push("]")
  return ok
}

const printEntries = (printer: Printer, entries: ReadonlyArray<MapEntry>): Printed => {
  printer.out.push("{")
  for (const [index, [key, value]] of entries.entries()) {
    const name = projectMapKey(key)
    if (Either.isLeft(name)) {
      return Either.left(name.left)
    }
    printer.out.push(index > 0 ? "," : "", quoteJsonString(name.right), printer.colon)
    const printed = printValue(printer, value)
    if (Either.isLeft(printed)) {
      return printed
    }
  }
  printer.out.push("}")
  return ok
}

const printSimple = (printer: Printer, code: number): Printed => {
  if (code !== UNDEFINED_SIMPLE_CODE) {
    return Either.left(jsonPrintError("UnsupportedValue", `simple value ${code} has no JSON form`))
  }
  printer.out.push("null")
  return ok
}

const emit = (printer: Printer, text: string): Printed => {
  printer.out.push(text)
  return ok
}

// Plain switch: this recursion runs once per nesting level.
const printValue = (printer: Printer, value: Value): Printed => {
  switch (value._tag) {
    case "Null":
      return emit(printer, "null")
    case "Bool":
      return emit(printer, value.value ? "true" : "false")
    case "Integer":
      return emit(printer, value.value.toString())
    case "Float":
      return emit(printer, formatFloat(value.value))
    case "ByteString":
      return printBytes(printer, value.bytes)
    case "TextString":
      return emit(printer, quoteJsonString(value.value))
    case "Array":
      return printItems(printer, value.items)
    case "Map":
      return printEntries(printer, value.entries)
    case "Tag":
      return printValue(printer, value.value)
    case "Simple":
      return printSimple(printer, value.code)
  }
}

/**
 * Print a Value as JSON on a single line.
 *
 * @param value - Value to print.
 * @param options - Byte-string policy and separator style.
 * @returns Either with JSON text or a JsonPrintError.
 *
 * @pure true
 * @invariant ':' is followed by one space unless compact; ',' never is
 * @complexity O(n)
 */
export const printJson = (value: Value, options: PrintOptions = {}): Either.Either<string, JsonPrintError> => {
  const printer: Printer = {
    out: [],
    bytes: options.bytes ?? "base64",
    colon: options.compact === true ? ":" : ": "
  }
  return Either.map(printValue(printer, value), () => printer.out.join(""))
}
