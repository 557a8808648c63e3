import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeCbor } from "../../src/core/cbor-decode.js"
import { encodeCbor } from "../../src/core/cbor-encode.js"
import { parseJson } from "../../src/core/json-parse.js"
import { printJson } from "../../src/core/json-print.js"
import { MAX_DEPTH_LIMIT, valueEquals } from "../../src/core/value.js"
import { bytesOf, leftOf, rightOf } from "./test-helpers.js"

// `levels` single-element arrays around the integer 1
const nestedArrays = (levels: number): Uint8Array => {
  const bytes = new Uint8Array(levels + 1).fill(0x81)
  bytes[levels] = 0x01
  return bytes
}

describe("nesting at the depth ceiling", () => {
  it.effect("decodes, prints, encodes and parses a value at the maximum depth", () =>
    Effect.sync(() => {
      const input = nestedArrays(MAX_DEPTH_LIMIT)
      const value = rightOf(decodeCbor(input, { maxDepth: MAX_DEPTH_LIMIT }))
      expect(value).toBeDefined()
      if (value !== undefined) {
        const printed = rightOf(printJson(value))
        expect(printed).toBe(`${"[".repeat(MAX_DEPTH_LIMIT)}1${"]".repeat(MAX_DEPTH_LIMIT)}`)
        expect(bytesOf(encodeCbor(value))).toEqual(Array.from(input))
        const reparsed = rightOf(parseJson(printed ?? "", { maxDepth: MAX_DEPTH_LIMIT }))
        expect(reparsed !== undefined && valueEquals(reparsed, value)).toBe(true)
      }
    }))

  it.effect("rejects one level more", () =>
    Effect.sync(() => {
      expect(leftOf(decodeCbor(nestedArrays(MAX_DEPTH_LIMIT + 1), { maxDepth: MAX_DEPTH_LIMIT }))).toMatchObject({
        reason: "DepthExceeded",
        offset: 512
      })
    }))

  it.effect("clamps a larger requested limit to the ceiling", () =>
    Effect.sync(() => {
      expect(leftOf(decodeCbor(nestedArrays(200000), { maxDepth: 1000000 }))).toEqual({
        _tag: "CborDecodeError",
        reason: "DepthExceeded",
        offset: 512,
        message: "nesting depth exceeds 512"
      })
      expect(leftOf(parseJson("[".repeat(200000), { maxDepth: 1000000 }))).toMatchObject({
        reason: "DepthExceeded",
        offset: 512,
        message: "nesting depth exceeds 512"
      })
    }))
})
