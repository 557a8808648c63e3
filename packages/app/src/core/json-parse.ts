import * as Either from "effect/Either"

import type { JsonParseError, JsonParseReason } from "./errors.js"
import { jsonParseError } from "./errors.js"
import type { MapEntry, Value } from "./value.js"
import {
  arrayValue,
  boolValue,
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  floatValue,
  integerValue,
  mapValue,
  nullValue,
  textStringValue
} from "./value.js"

// CHANGE: parse JSON text into the value model without JSON.parse
// WHY: JSON.parse loses integer precision, the integer/float split and duplicate keys
// QUOTE(RFC 8259): "The names within an object SHOULD be unique."
// REF: req-json-parse-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259.html
// FORMAT THEOREM: ∀t: parse(t) = Right(v) → t is exactly one JSON value plus whitespace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object members keep written order, duplicates included
// COMPLEXITY: O(n) where n = text length

export interface ParseOptions {
  readonly maxDepth?: number
}

type Parsed<A> = Either.Either<A, JsonParseError>

interface Scanner {
  readonly text: string
  readonly maxDepth: number
  index: number
}

const locate = (
  text: string,
  offset: number
): { readonly offset: number; readonly line: number; readonly column: number } => {
  let line = 1
  let column = 1
  for (let index = 0; index < offset && index < text.length; index++) {
    if (text.charCodeAt(index) === 0x0a) {
      line += 1
      column = 1
    } else {
      column += 1
    }
  }
  return { offset, line, column }
}

const fail = <A>(scanner: Scanner, reason: JsonParseReason, offset: number, message: string): Parsed<A> =>
  Either.left(jsonParseError(reason, locate(scanner.text, offset), message))

const describe = (scanner: Scanner): string =>
  scanner.index >= scanner.text.length ? "end of input" : `'${scanner.text.charAt(scanner.index)}'`

const unexpected = <A>(scanner: Scanner, expected: string): Parsed<A> =>
  fail(scanner, "SyntaxError", scanner.index, `expected ${expected} but found ${describe(scanner)}`)

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\n" || char === "\r"

const skipWhitespace = (scanner: Scanner): void => {
  while (scanner.index < scanner.text.length && isWhitespace(scanner.text.charAt(scanner.index))) {
    scanner.index += 1
  }
}

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const skipDigits = (scanner: Scanner): number => {
  const start = scanner.index
  while (isDigit(scanner.text.charAt(scanner.index))) {
    scanner.index += 1
  }
  return scanner.index - start
}

const parseNumber = (scanner: Scanner): Parsed<Value> => {
  const start = scanner.index
  let isFloat = false
  if (scanner.text.charAt(scanner.index) === "-") {
    scanner.index += 1
  }
  if (scanner.text.charAt(scanner.index) === "0") {
    scanner.index += 1
    if (isDigit(scanner.text.charAt(scanner.index))) {
      return fail(scanner, "SyntaxError", scanner.index, "leading zeros are not allowed")
    }
  } else if (skipDigits(scanner) === 0) {
    return unexpected(scanner, "a digit")
  }
  if (scanner.text.charAt(scanner.index) === ".") {
    isFloat = true
    scanner.index += 1
    if (skipDigits(scanner) === 0) {
      return unexpected(scanner, "a digit after '.'")
    }
  }
  const exponent = scanner.text.charAt(scanner.index)
  if (exponent === "e" || exponent === "E") {
    isFloat = true
    scanner.index += 1
    const sign = scanner.text.charAt(scanner.index)
    if (sign === "+" || sign === "-") {
      scanner.index += 1
    }
    if (skipDigits(scanner) === 0) {
      return unexpected(scanner, "a digit in the exponent")
    }
  }
  const literal = scanner.text.slice(start, scanner.index)
  // -0 has no integer form
  if (literal === "-0") {
    return Either.right(floatValue(-0))
  }
  if (!isFloat) {
    return Either.right(integerValue(BigInt(literal)))
  }
  const value = Number(literal)
  if (!Number.isFinite(value)) {
    return fail(scanner, "SyntaxError", start, `number out of range: ${literal}`)
  }
  return Either.right(floatValue(value))
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const HEX = /^[0-9a-fA-F]{4}$/

const readHex4 = (scanner: Scanner, escapeStart: number): Parsed<number> => {
  const digits = scanner.text.slice(scanner.index, scanner.index + 4)
  if (!HEX.test(digits)) {
    return fail(scanner, "InvalidEscape", escapeStart, "\\u must be followed by four hex digits")
  }
  scanner.index += 4
  return Either.right(Number.parseInt(digits, 16))
}

const isHighSurrogate = (unit: number): boolean => unit >= 0xd800 && unit <= 0xdbff
const isLowSurrogate = (unit: number): boolean => unit >= 0xdc00 && unit <= 0xdfff

// Scanner sits just after "\u".
const readUnicodeEscape = (scanner: Scanner, escapeStart: number): Parsed<string> => {
  const first = readHex4(scanner, escapeStart)
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  if (isLowSurrogate(first.right)) {
    return fail(scanner, "InvalidEscape", escapeStart, "unpaired low surrogate")
  }
  if (!isHighSurrogate(first.right)) {
    return Either.right(String.fromCharCode(first.right))
  }
  const pairStart = scanner.index
  if (scanner.text.slice(pairStart, pairStart + 2) !== "\\u") {
    return fail(scanner, "InvalidEscape", escapeStart, "unpaired high surrogate")
  }
  scanner.index += 2
  const second = readHex4(scanner, pairStart)
  if (Either.isLeft(second)) {
    return Either.left(second.left)
  }
  if (!isLowSurrogate(second.right)) {
    return fail(scanner, "InvalidEscape", escapeStart, "unpaired high surrogate")
  }
  return Either.right(String.fromCharCode(first.right, second.right))
}

const readEscape = (scanner: Scanner): Parsed<string> => {
  const escapeStart = scanner.index
  scanner.index += 1
  if (scanner.index >= scanner.text.length) {
    return fail(scanner, "SyntaxError", scanner.index, "unterminated string")
  }
  const code = scanner.text.charAt(scanner.index)
  scanner.index += 1
  if (code === "u") {
    return readUnicodeEscape(scanner, escapeStart)
  }
  const simple = SIMPLE_ESCAPES[code]
  if (simple === undefined) {
    return fail(scanner, "InvalidEscape", escapeStart, `invalid escape '\\${code}'`)
  }
  return Either.right(simple)
}

// Scanner sits on the opening quote.
const parseString = (scanner: Scanner): Parsed<string> => {
  const start = scanner.index
  scanner.index += 1
  let result = ""
  let runStart = scanner.index
  for (;;) {
    if (scanner.index >= scanner.text.length) {
      return fail(scanner, "SyntaxError", start, "unterminated string")
    }
    const unit = scanner.text.charCodeAt(scanner.index)
    if (unit === 0x22) {
      result += scanner.text.slice(runStart, scanner.index)
      scanner.index += 1
      return Either.right(result)
    }
    if (unit < 0x20) {
      return fail(scanner, "SyntaxError", scanner.index, "control character in string")
    }
    if (unit === 0x5c) {
      result += scanner.text.slice(runStart, scanner.index)
      const escaped = readEscape(scanner)
      if (Either.isLeft(escaped)) {
        return escaped
      }
      result += escaped.right
      runStart = scanner.index
    } else {
      scanner.index += 1
    }
  }
}

const parseLiteral = (scanner: Scanner, word: string, value: Value): Parsed<Value> => {
  if (scanner.text.startsWith(word, scanner.index)) {
    scanner.index += word.length
    return Either.right(value)
  }
  return fail(scanner, "SyntaxError", scanner.index, `unexpected token ${describe(scanner)}`)
}

const enterContainer = (scanner: Scanner, depth: number): Parsed<number> =>
  depth >= scanner.maxDepth
    ? fail(scanner, "DepthExceeded", scanner.index, `nesting depth exceeds ${scanner.maxDepth}`)
    : Either.right(depth + 1)

// Consumes "," or the closing bracket after an element; true when the container ended.
const readSeparator = (scanner: Scanner, close: string): Parsed<boolean> => {
  skipWhitespace(scanner)
  const char = scanner.text.charAt(scanner.index)
  if (char === ",") {
    scanner.index += 1
    return Either.right(false)
  }
  if (char === close) {
    scanner.index += 1
    return Either.right(true)
  }
  return unexpected(scanner, `',' or '${close}'`)
}

const parseArray = (scanner: Scanner, depth: number): Parsed<Value> => {
  const inner = enterContainer(scanner, depth)
  if (Either.isLeft(inner)) {
    return Either.left(inner.left)
  }
  scanner.index += 1
  const items: Array<Value> = []
  skipWhitespace(scanner)
  if (scanner.text.charAt(scanner.index) === "]") {
    scanner.index += 1
    return Either.right(arrayValue(items))
  }
  for (;;) {
    const item = parseValue(scanner, inner.right)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right)
    const closed = readSeparator(scanner, "]")
    if (Either.isLeft(closed)) {
      return Either.left(closed.left)
    }
    if (closed.right) {
      return Either.right(arrayValue(items))
    }
  }
}

const parseMember = (scanner: Scanner, depth: number): Parsed<MapEntry> => {
  skipWhitespace(scanner)
  if (scanner.text.charAt(scanner.index) !== "\"") {
    return unexpected(scanner, "a string key")
  }
  const key = parseString(scanner)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  skipWhitespace(scanner)
  if (scanner.text.charAt(scanner.index) !== ":") {
    return unexpected(scanner, "':'")
  }
  scanner.index += 1
  const value = parseValue(scanner, depth)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  return Either.right([textStringValue(key.right), value.right])
}

const parseObject = (scanner: Scanner, depth: number): Parsed<Value> => {
  const inner = enterContainer(scanner, depth)
  if (Either.isLeft(inner)) {
    return Either.left(inner.left)
  }
  scanner.index += 1
  const entries: Array<MapEntry> = []
  skipWhitespace(scanner)
  if (scanner.text.charAt(scanner.index) === "}") {
    scanner.index += 1
    return Either.right(mapValue(entries))
  }
  for (;;) {
    const member = parseMember(scanner, inner.right)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    entries.push(member.right)
    const closed = readSeparator(scanner, "}")
    if (Either.isLeft(closed)) {
      return Either.left(closed.left)
    }
    if (closed.right) {
      return Either.right(mapValue(entries))
    }
  }
}

const parseValue = (scanner: Scanner, depth: number): Parsed<Value> => {
  skipWhitespace(scanner)
  const char = scanner.text.charAt(scanner.index)
  switch (char) {
    case "{":
      return parseObject(scanner, depth)
    case "[":
      return parseArray(scanner, depth)
    case "\"":
      return Either.map(parseString(scanner), textStringValue)
    case "t":
      return parseLiteral(scanner, "true", boolValue(true))
    case "f":
      return parseLiteral(scanner, "false", boolValue(false))
    case "n":
      return parseLiteral(scanner, "null", nullValue)
    default:
      return char === "-" || isDigit(char) ? parseNumber(scanner) : unexpected(scanner, "a JSON value")
  }
}

/**
 * Parse exactly one JSON value.
 *
 * @param text - JSON text, optionally surrounded by whitespace.
 * @param options - maxDepth bounds nested arrays and objects.
 * @returns Either with the Value or a JsonParseError carrying offset, line and column.
 *
 * @pure true
 * @invariant numbers without '.', 'e' or 'E' become Integer
 * @complexity O(n)
 */
export const parseJson = (text: string, options: ParseOptions = {}): Parsed<Value> => {
  const scanner: Scanner = {
    text,
    maxDepth: Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT),
    index: 0
  }
  const value = parseValue(scanner, 0)
  if (Either.isLeft(value)) {
    return value
  }
  skipWhitespace(scanner)
  if (scanner.index < text.length) {
    return fail(scanner, "TrailingData", scanner.index, `unexpected ${describe(scanner)} after the JSON value`)
  }
  return value
}
