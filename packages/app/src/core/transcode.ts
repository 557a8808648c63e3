import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { Base64Alphabet } from "./base64.js"
import { decodeBase64, encodeBase64 } from "./base64.js"
import { decodeCbor } from "./cbor-decode.js"
import { encodeCbor } from "./cbor-encode.js"
import type { TranscodeError } from "./errors.js"
import { jsonParseError } from "./errors.js"
import { parseJson } from "./json-parse.js"
import type { BytePolicy } from "./json-print.js"
import { printJson } from "./json-print.js"
import type { Value } from "./value.js"

// CHANGE: orchestrate decode-then-print and parse-then-encode over whole buffers
// WHY: keep the pipeline pure so the shell only moves bytes in and out
// REF: req-transcode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x: transcode(x) = Right(y) → y is the complete output; Left → nothing is written
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: base64 is applied only to the CBOR side; decode without --base64 falls back to raw CBOR
// COMPLEXITY: O(n)

export type TranscodeMode = "decode" | "encode"

export interface TranscodeSettings {
  readonly mode: TranscodeMode
  readonly base64: boolean
  readonly base64Alphabet: Base64Alphabet
  readonly maxDepth: number
  readonly bytes: BytePolicy
  readonly compact: boolean
}

type Transcoded<A> = Either.Either<A, TranscodeError>

const utf8Encoder = new TextEncoder()
const lenientUtf8 = new TextDecoder()
const strictUtf8 = new TextDecoder("utf-8", { fatal: true })

const decodeBase64Cbor = (input: Uint8Array, settings: TranscodeSettings): Transcoded<Value> =>
  Either.flatMap(
    decodeBase64(lenientUtf8.decode(input)),
    (bytes) => decodeCbor(bytes, { maxDepth: settings.maxDepth })
  )

// Without --base64 the input is tried as base64 text first; raw CBOR is the fallback and its error is the one reported.
const readCborInput = (input: Uint8Array, settings: TranscodeSettings): Transcoded<Value> => {
  const viaBase64 = decodeBase64Cbor(input, settings)
  if (settings.base64 || Either.isRight(viaBase64)) {
    return viaBase64
  }
  return decodeCbor(input, { maxDepth: settings.maxDepth })
}

const readJsonInput = (input: Uint8Array): Transcoded<string> =>
  Either.try({
    try: () => strictUtf8.decode(input),
    catch: () => jsonParseError("SyntaxError", { offset: 0, line: 1, column: 1 }, "input is not valid UTF-8")
  })

/**
 * CBOR, or base64 text carrying CBOR, to JSON text without the trailing newline.
 *
 * @pure true
 * @complexity O(n)
 */
export const cborToJson = (input: Uint8Array, settings: TranscodeSettings): Transcoded<string> =>
  pipe(
    readCborInput(input, settings),
    Either.flatMap((value) => printJson(value, { bytes: settings.bytes, compact: settings.compact }))
  )

/**
 * JSON text to CBOR bytes, or to their base64 text when requested.
 *
 * @pure true
 * @complexity O(n)
 */
export const jsonToCbor = (input: Uint8Array, settings: TranscodeSettings): Transcoded<Uint8Array> =>
  pipe(
    readJsonInput(input),
    Either.flatMap((text) => parseJson(text, { maxDepth: settings.maxDepth })),
    Either.flatMap(encodeCbor),
    Either.map((bytes) =>
      settings.base64 ? utf8Encoder.encode(encodeBase64(bytes, settings.base64Alphabet)) : bytes
    )
  )

/**
 * Run one transcoding in the selected direction.
 *
 * @param input - Entire standard input.
 * @param settings - Resolved mode, base64 routing and codec options.
 * @returns Either with the entire output or the first error.
 *
 * @pure true
 * @invariant decode output ends with exactly one newline; encode output has none
 * @complexity O(n)
 */
export const transcode = (input: Uint8Array, settings: TranscodeSettings): Transcoded<Uint8Array> =>
  settings.mode === "encode"
    ? jsonToCbor(input, settings)
    : Either.map(cborToJson(input, settings), (json) => utf8Encoder.encode(`${json}\n`))
