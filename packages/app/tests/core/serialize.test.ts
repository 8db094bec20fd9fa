import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { equals } from "../../src/core/compare.js"
import { parse } from "../../src/core/parse.js"
import { appendJson, escapeString, serialize } from "../../src/core/serialize.js"
import {
  array,
  bool,
  emptyArray,
  emptyObject,
  fromRecord,
  integer,
  nullValue,
  number,
  object,
  string
} from "../../src/core/value.js"

describe("serialize scalars", () => {
  it.effect("renders literals and numbers", () =>
    Effect.sync(() => {
      expect(serialize(nullValue)).toBe("null")
      expect(serialize(bool(true))).toBe("true")
      expect(serialize(bool(false))).toBe("false")
      expect(serialize(integer(-42))).toBe("-42")
      expect(serialize(integer(-(2n ** 63n)))).toBe("-9223372036854775808")
      expect(serialize(number(1.5))).toBe("1.5")
      expect(serialize(number(42))).toBe("42")
      expect(serialize(number(1e21))).toBe("1e+21")
    }))

  it.effect("writes non-finite doubles as null", () =>
    Effect.sync(() => {
      expect(serialize(number(Number.POSITIVE_INFINITY))).toBe("null")
      expect(serialize(number(Number.NaN))).toBe("null")
    }))
})

describe("serialize strings", () => {
  it.effect("escapes quotes, backslashes and control characters", () =>
    Effect.sync(() => {
      expect(serialize(string("a\"b\\c\b\f\n\r\t\u0001\u001f"))).toBe(
        String.raw`"a\"b\\c\b\f\n\r\t\u0001\u001f"`
      )
      expect(escapeString("x")).toBe(`"x"`)
      expect(escapeString("a/b")).toBe(`"a/b"`)
    }))

  it.effect("escapes the line and paragraph separators", () =>
    Effect.sync(() => {
      expect(serialize(string("a\u2028b\u2029"))).toBe(String.raw`"a\u2028b\u2029"`)
    }))

  it.effect("leaves other non-ASCII text as is", () =>
    Effect.sync(() => {
      expect(serialize(string("\u00e9\u{1F4A9}"))).toBe(`"\u00e9\u{1F4A9}"`)
    }))
})

describe("serialize containers", () => {
  it.effect("separates items with a comma and a space", () =>
    Effect.sync(() => {
      expect(serialize(array([integer(1), string("a"), nullValue]))).toBe(`[1, "a", null]`)
      expect(serialize(emptyArray)).toBe("[]")
      expect(serialize(emptyObject)).toBe("{}")
    }))

  it.effect("writes object keys in sorted order", () =>
    Effect.sync(() => {
      const value = object([["b", integer(1)], ["a", array([bool(true)])]])
      expect(serialize(value)).toBe(`{"a": [true], "b": 1}`)
    }))

  it.effect("escapes object keys", () =>
    Effect.sync(() => {
      expect(serialize(fromRecord({ "q\"k": nullValue }))).toBe(String.raw`{"q\"k": null}`)
    }))

  it.effect("appends to an existing buffer", () =>
    Effect.sync(() => {
      const out = ["prefix:"]
      appendJson(array([integer(1)]), out)
      expect(out.join("")).toBe("prefix:[1]")
    }))
})

describe("round trip", () => {
  it.effect("parses its own output back to an equal value", () =>
    Effect.sync(() => {
      const value = fromRecord({
        list: array([integer(1), number(2.5), string("line\u2028break"), nullValue]),
        nested: fromRecord({ flag: bool(false), empty: emptyObject }),
        wide: integer(2n ** 62n)
      })
      const reparsed = parse(serialize(value))
      expect(Either.isRight(reparsed)).toBe(true)
      expect(Either.isRight(reparsed) && equals(reparsed.right, value)).toBe(true)
    }))

  it.effect("normalises parsed text and reparses it to an equal value", () =>
    Effect.sync(() => {
      const text = String.raw`{"z": [1, 2.5e0, "t\u00e9\n\ud83d\udca9"], "a": {"y": null, "b": true}, "m": "\u2028"}`
      const first = Either.getOrThrow(parse(text))
      const rendered = serialize(first)
      expect(rendered).toBe(`{"a": {"b": true, "y": null}, "m": "\\u2028", "z": [1, 2.5, "t\u00e9\\n\u{1F4A9}"]}`)
      const second = Either.getOrThrow(parse(rendered))
      expect(equals(second, first)).toBe(true)
      expect(serialize(second)).toBe(rendered)
    }))

  it.effect("reads a whole-valued double back as an equal Integer", () =>
    Effect.sync(() => {
      const reparsed = Either.getOrThrow(parse(serialize(number(2))))
      expect(reparsed._tag).toBe("Integer")
      expect(equals(reparsed, number(2))).toBe(true)
    }))
})
