import * as Either from "effect/Either"
import * as Encoding from "effect/Encoding"

import type { Base64Error } from "./errors.js"
import { base64Error } from "./errors.js"

// CHANGE: wrap effect/Encoding as the base64 transport for CBOR bytes
// WHY: the CLI accepts whatever base64 flavour a user pastes and always emits unpadded text
// QUOTE(RFC 4648): "base 64 encoding with URL and filename safe alphabet"
// REF: req-base64-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc4648.html#section-5
// FORMAT THEOREM: ∀b: decode(encode(b, a)) = Right(b) for a ∈ {standard, url}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: encoded output never carries '=' padding
// COMPLEXITY: O(n)

export type Base64Alphabet = "standard" | "url"

const ALPHABET_CHAR = /^[A-Za-z0-9+/_-]$/

const stripPadding = (text: string): string => text.replace(/=+$/, "")

/**
 * Encode bytes as unpadded base64.
 *
 * @pure true
 * @complexity O(n)
 */
export const encodeBase64 = (bytes: Uint8Array, alphabet: Base64Alphabet = "standard"): string =>
  stripPadding(alphabet === "url" ? Encoding.encodeBase64Url(bytes) : Encoding.encodeBase64(bytes))

/**
 * Decode base64 text in either alphabet, with or without padding.
 *
 * Surrounding whitespace is ignored.
 *
 * @param text - Base64 text.
 * @returns Either with the bytes or a Base64Error whose offset points into the input text.
 *
 * @pure true
 * @invariant '=' is accepted only as trailing padding of a multiple-of-4 text
 * @complexity O(n)
 */
export const decodeBase64 = (text: string): Either.Either<Uint8Array, Base64Error> => {
  const leading = text.length - text.trimStart().length
  const trimmed = text.trim()
  const paddingStart = trimmed.search(/=*$/)
  for (let index = 0; index < paddingStart; index++) {
    const char = trimmed.charAt(index)
    if (!ALPHABET_CHAR.test(char)) {
      return Either.left(
        base64Error("InvalidCharacter", leading + index, `invalid base64 character '${char}'`)
      )
    }
  }
  const body = trimmed.slice(0, paddingStart)
  const padding = trimmed.length - paddingStart
  if (body.length % 4 === 1 || padding > 2 || (padding > 0 && trimmed.length % 4 !== 0)) {
    return Either.left(
      base64Error("InvalidLength", leading + trimmed.length, `invalid base64 length ${trimmed.length}`)
    )
  }
  const normalized = body.replaceAll("-", "+").replaceAll("_", "/")
  const padded = normalized.padEnd(Math.ceil(normalized.length / 4) * 4, "=")
  return Either.mapLeft(
    Encoding.decodeBase64(padded),
    (error) => base64Error("InvalidCharacter", leading, error.message)
  )
}
