import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeCbor } from "../../src/core/cbor-decode.js"
import { encodeCbor } from "../../src/core/cbor-encode.js"
import { parseJson } from "../../src/core/json-parse.js"
import type { Value } from "../../src/core/value.js"
import {
  arrayValue,
  boolValue,
  byteStringValue,
  floatValue,
  integerValue,
  mapValue,
  nullValue,
  simpleValue,
  tagValue,
  textStringValue,
  valueEquals
} from "../../src/core/value.js"
import { bytesOf, leftOf, rightOf } from "./test-helpers.js"

describe("encodeCbor", () => {
  it.effect("uses the shortest head for unsigned integers", () =>
    Effect.sync(() => {
      expect(bytesOf(encodeCbor(integerValue(23)))).toEqual([0x17])
      expect(bytesOf(encodeCbor(integerValue(24)))).toEqual([0x18, 0x18])
      expect(bytesOf(encodeCbor(integerValue(256)))).toEqual([0x19, 0x01, 0x00])
      expect(bytesOf(encodeCbor(integerValue(65536)))).toEqual([0x1a, 0x00, 0x01, 0x00, 0x00])
      expect(bytesOf(encodeCbor(integerValue(4294967296)))).toEqual([
        0x1b, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00
      ])
    }))

  it.effect("encodes negative integers with major type 1", () =>
    Effect.sync(() => {
      expect(bytesOf(encodeCbor(integerValue(-1)))).toEqual([0x20])
      expect(bytesOf(encodeCbor(integerValue(-24)))).toEqual([0x37])
      expect(bytesOf(encodeCbor(integerValue(-25)))).toEqual([0x38, 0x18])
      expect(bytesOf(encodeCbor(integerValue(-500)))).toEqual([0x39, 0x01, 0xf3])
    }))

  it.effect("accepts the full 64-bit magnitude range and nothing beyond", () =>
    Effect.sync(() => {
      expect(bytesOf(encodeCbor(integerValue(18446744073709551615n)))).toEqual([
        0x1b, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff
      ])
      expect(bytesOf(encodeCbor(integerValue(-18446744073709551616n)))).toEqual([
        0x3b, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff
      ])
      expect(leftOf(encodeCbor(integerValue(18446744073709551616n)))).toMatchObject({
        _tag: "CborEncodeError",
        reason: "UnsupportedValue"
      })
      expect(leftOf(encodeCbor(integerValue(-18446744073709551617n)))).toMatchObject({
        reason: "UnsupportedValue"
      })
    }))

  it.effect("writes floats as 64-bit doubles", () =>
    Effect.sync(() => {
      expect(bytesOf(encodeCbor(floatValue(42)))).toEqual([0xfb, 0x40, 0x45, 0, 0, 0, 0, 0, 0])
      expect(bytesOf(encodeCbor(floatValue(1.1)))).toEqual([
        0xfb, 0x3f, 0xf1, 0x99, 0x99, 0x99, 0x99, 0x99, 0x9a
      ])
    }))

  it.effect("writes map entries in stored order", () =>
    Effect.sync(() => {
      const map = mapValue([
        [textStringValue("b"), integerValue(1)],
        [textStringValue("a"), integerValue(2)]
      ])
      expect(bytesOf(encodeCbor(map))).toEqual([0xa2, 0x61, 0x62, 0x01, 0x61, 0x61, 0x02])
    }))

  it.effect("encodes duplicate JSON keys as repeated pairs", () =>
    Effect.sync(() => {
      const parsed = parseJson(`{"a":1,"a":2}`)
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(bytesOf(encodeCbor(parsed.right))).toEqual([0xa2, 0x61, 0x61, 0x01, 0x61, 0x61, 0x02])
      }
    }))

  it.effect("encodes text as UTF-8 with a byte-length head", () =>
    Effect.sync(() => {
      expect(bytesOf(encodeCbor(textStringValue("ü")))).toEqual([0x62, 0xc3, 0xbc])
      const long = bytesOf(encodeCbor(textStringValue("a".repeat(24))))
      expect(long?.slice(0, 2)).toEqual([0x78, 0x18])
      expect(long?.length).toBe(26)
    }))

  it.effect("encodes byte strings, tags, simple values and literals", () =>
    Effect.sync(() => {
      expect(bytesOf(encodeCbor(byteStringValue(Uint8Array.from([1, 2]))))).toEqual([0x42, 1, 2])
      expect(bytesOf(encodeCbor(tagValue(1, integerValue(0))))).toEqual([0xc1, 0x00])
      expect(bytesOf(encodeCbor(simpleValue(16)))).toEqual([0xf0])
      expect(bytesOf(encodeCbor(simpleValue(255)))).toEqual([0xf8, 0xff])
      expect(bytesOf(encodeCbor(nullValue))).toEqual([0xf6])
      expect(bytesOf(encodeCbor(boolValue(true)))).toEqual([0xf5])
      expect(bytesOf(encodeCbor(boolValue(false)))).toEqual([0xf4])
    }))

  it.effect("rejects simple values that have no encoding", () =>
    Effect.sync(() => {
      expect(leftOf(encodeCbor(simpleValue(28)))).toMatchObject({ reason: "UnsupportedValue" })
      expect(leftOf(encodeCbor(arrayValue([simpleValue(256)])))).toMatchObject({ reason: "UnsupportedValue" })
    }))

  it.effect("decodes back to the value it encoded", () =>
    Effect.sync(() => {
      const values: ReadonlyArray<Value> = [
        mapValue([
          [textStringValue("list"), arrayValue([integerValue(-7), floatValue(0.5), nullValue])],
          [integerValue(3), byteStringValue(Uint8Array.from([0, 255]))]
        ]),
        tagValue(32, textStringValue("https://example.test/")),
        floatValue(Number.NaN),
        floatValue(-0)
      ]
      for (const value of values) {
        const encoded = rightOf(encodeCbor(value))
        expect(encoded).toBeDefined()
        if (encoded !== undefined) {
          const decoded = rightOf(decodeCbor(encoded))
          expect(decoded !== undefined && valueEquals(decoded, value)).toBe(true)
        }
      }
    }))
})
