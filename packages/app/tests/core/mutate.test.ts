import { describe, expect, it } from "@effect/vitest"
import { Effect, pipe } from "effect"
import * as Either from "effect/Either"

import { get } from "../../src/core/access.js"
import { append, ensureArray, ensureObject, removeKey, setKey } from "../../src/core/mutate.js"
import { serialize } from "../../src/core/serialize.js"
import { array, bool, emptyObject, fromRecord, integer, nullValue, string } from "../../src/core/value.js"

describe("setKey", () => {
  it.effect("vivifies Null into an object", () =>
    Effect.sync(() => {
      const result = setKey(nullValue, "a", integer(1))
      expect(Either.map(result, serialize)).toEqual(Either.right(`{"a": 1}`))
    }))

  it.effect("overwrites an existing key without touching the input", () =>
    Effect.sync(() => {
      const original = fromRecord({ a: integer(1), b: integer(2) })
      const updated = setKey(original, "a", string("x"))
      expect(Either.map(updated, serialize)).toEqual(Either.right(`{"a": "x", "b": 2}`))
      expect(serialize(original)).toBe(`{"a": 1, "b": 2}`)
    }))

  it.effect("rejects scalars and arrays", () =>
    Effect.sync(() => {
      const result = setKey(integer(1), "a", nullValue)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.expected).toBe("Object")
        expect(result.left.actual).toBe("Integer")
        expect(result.left.message).toBe("cannot use Integer value as an Object")
      }
      expect(Either.isLeft(setKey(array([]), "a", nullValue))).toBe(true)
    }))
})

describe("removeKey", () => {
  it.effect("drops the field and ignores absent keys", () =>
    Effect.sync(() => {
      const original = fromRecord({ a: integer(1), b: integer(2) })
      expect(Either.map(removeKey(original, "a"), serialize)).toEqual(Either.right(`{"b": 2}`))
      expect(Either.map(removeKey(original, "z"), serialize)).toEqual(Either.right(`{"a": 1, "b": 2}`))
      expect(Either.map(removeKey(nullValue, "a"), serialize)).toEqual(Either.right("{}"))
    }))
})

describe("append", () => {
  it.effect("vivifies Null into an array", () =>
    Effect.sync(() => {
      expect(Either.map(append(nullValue, integer(1)), serialize)).toEqual(Either.right("[1]"))
    }))

  it.effect("returns a new array and keeps the input", () =>
    Effect.sync(() => {
      const original = array([integer(1)])
      expect(Either.map(append(original, integer(2)), serialize)).toEqual(Either.right("[1, 2]"))
      expect(serialize(original)).toBe("[1]")
    }))

  it.effect("rejects other variants", () =>
    Effect.sync(() => {
      const result = append(string("s"), integer(1))
      expect(Either.isLeft(result) && result.left.message).toBe("cannot use String value as an Array")
      expect(Either.isLeft(append(emptyObject, integer(1)))).toBe(true)
    }))
})

describe("ensure", () => {
  it.effect("promotes Null and keeps matching containers", () =>
    Effect.sync(() => {
      expect(Either.map(ensureObject(nullValue), serialize)).toEqual(Either.right("{}"))
      expect(Either.map(ensureArray(nullValue), serialize)).toEqual(Either.right("[]"))
      const list = array([bool(true)])
      expect(Either.isRight(ensureArray(list)) && Either.getOrThrow(ensureArray(list)) === list).toBe(true)
      expect(Either.isLeft(ensureArray(bool(false)))).toBe(true)
      expect(Either.isLeft(ensureObject(string("")))).toBe(true)
    }))

  it.effect("builds nested structure step by step", () =>
    Effect.sync(() => {
      const base = fromRecord({
        key1: string("value1"),
        key2: bool(false),
        key3: array([integer(1), integer(2), integer(3)])
      })
      const result = pipe(
        setKey(base, "key1", array([integer(1), integer(2), integer(3)])),
        Either.flatMap((target) =>
          Either.flatMap(append(get(target, "key5"), integer(1)), (list) => setKey(target, "key5", list))
        )
      )
      expect(Either.map(result, serialize)).toEqual(
        Either.right(`{"key1": [1, 2, 3], "key2": false, "key3": [1, 2, 3], "key5": [1]}`)
      )
    }))
})
