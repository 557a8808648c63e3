import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parseJson } from "../../src/core/json-parse.js"
import { formatFloat, printJson, quoteJsonString } from "../../src/core/json-print.js"
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
import { leftOf, rightOf } from "./test-helpers.js"

const keyValue = mapValue([[textStringValue("key"), textStringValue("value")]])

describe("printJson", () => {
  it.effect("puts one space after the colon unless compact", () =>
    Effect.sync(() => {
      expect(rightOf(printJson(keyValue))).toBe(`{"key": "value"}`)
      expect(rightOf(printJson(keyValue, { compact: true }))).toBe(`{"key":"value"}`)
    }))

  it.effect("never spaces array elements", () =>
    Effect.sync(() => {
      const array = arrayValue([integerValue(1), floatValue(2.5), boolValue(true), nullValue])
      expect(rightOf(printJson(array))).toBe("[1,2.5,true,null]")
    }))

  it.effect("keeps map entries in stored order", () =>
    Effect.sync(() => {
      const map = mapValue([
        [textStringValue("z"), integerValue(1)],
        [textStringValue("a"), mapValue([])],
        [textStringValue("m"), arrayValue([])]
      ])
      expect(rightOf(printJson(map))).toBe(`{"z": 1,"a": {},"m": []}`)
    }))

  it.effect("prints integers beyond the double range exactly", () =>
    Effect.sync(() => {
      expect(rightOf(printJson(integerValue(18446744073709551615n)))).toBe("18446744073709551615")
      expect(rightOf(printJson(integerValue(-18446744073709551616n)))).toBe("-18446744073709551616")
    }))

  it.effect("projects byte strings by policy", () =>
    Effect.sync(() => {
      const bytes = byteStringValue(Uint8Array.from([1, 2, 3]))
      expect(rightOf(printJson(bytes))).toBe(`"AQID"`)
      expect(rightOf(printJson(bytes, { bytes: "array" }))).toBe("[1,2,3]")
      expect(leftOf(printJson(bytes, { bytes: "reject" }))).toEqual({
        _tag: "JsonPrintError",
        reason: "UnsupportedValue",
        message: "byte strings have no JSON form"
      })
    }))

  it.effect("projects non-text map keys", () =>
    Effect.sync(() => {
      expect(rightOf(printJson(mapValue([[integerValue(-1), textStringValue("x")]])))).toBe(`{"-1": "x"}`)
      expect(rightOf(printJson(mapValue([[tagValue(5, textStringValue("k")), nullValue]])))).toBe(
        `{"k": null}`
      )
      expect(leftOf(printJson(mapValue([[boolValue(true), nullValue]])))).toMatchObject({
        reason: "NonStringMapKey",
        message: "map key of type Bool has no JSON form"
      })
    }))

  it.effect("unwraps tags and maps undefined to null", () =>
    Effect.sync(() => {
      expect(rightOf(printJson(tagValue(1, integerValue(5))))).toBe("5")
      expect(rightOf(printJson(simpleValue(23)))).toBe("null")
      expect(leftOf(printJson(arrayValue([simpleValue(16)])))).toMatchObject({
        reason: "UnsupportedValue",
        message: "simple value 16 has no JSON form"
      })
    }))
})

describe("printJson then parseJson", () => {
  it.effect("returns an equal value for every JSON-representable value", () =>
    Effect.sync(() => {
      const value = mapValue([
        [
          textStringValue("a"),
          arrayValue([
            integerValue(1),
            floatValue(2.5),
            floatValue(42),
            floatValue(-0),
            floatValue(1e21),
            boolValue(false),
            nullValue
          ])
        ],
        [textStringValue("q\"\n\u0001é😀"), integerValue(-18446744073709551616n)],
        [textStringValue("a"), mapValue([])]
      ])
      for (const compact of [false, true]) {
        const printed = rightOf(printJson(value, { compact }))
        expect(printed).toBeDefined()
        if (printed !== undefined) {
          const parsed = rightOf(parseJson(printed))
          expect(parsed !== undefined && valueEquals(parsed, value)).toBe(true)
        }
      }
    }))
})

describe("formatFloat", () => {
  it.effect("keeps a fractional part on integral values", () =>
    Effect.sync(() => {
      expect(formatFloat(42)).toBe("42.0")
      expect(formatFloat(100)).toBe("100.0")
      expect(formatFloat(-0)).toBe("-0.0")
      expect(formatFloat(0.1)).toBe("0.1")
    }))

  it.effect("uses exponent form without a plus sign", () =>
    Effect.sync(() => {
      expect(formatFloat(1e21)).toBe("1e21")
      expect(formatFloat(1.5e-7)).toBe("1.5e-7")
    }))

  it.effect("prints non-finite values as null", () =>
    Effect.sync(() => {
      expect(formatFloat(Number.NaN)).toBe("null")
      expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe("null")
    }))
})

describe("quoteJsonString", () => {
  it.effect("escapes quotes, backslashes and control characters", () =>
    Effect.sync(() => {
      expect(quoteJsonString("a\"b\\c\n\u0001/é")).toBe(`"a\\"b\\\\c\\n\\u0001/é"`)
      expect(quoteJsonString("\u001f\t")).toBe(`"\\u001f\\t"`)
    }))
})
