import * as Predicate from "effect/Predicate"

import type { JsonValue } from "./value.js"
import { array, bool, integer, isJsonValue, nullValue, number, object, string } from "./value.js"

// CHANGE: build values from native containers and from types that opt in to conversion
// WHY: callers hand over Maps, Sets, arrays and records without writing the tree by hand
// QUOTE(TZ): n/a
// REF: req-convert-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ JsonInput: fromNative(x) ∈ JsonValue
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only values with the ToJsonValue capability run user code
// COMPLEXITY: O(n) in the size of the input, plus O(k log k) per object

export const ToJsonValue: unique symbol = Symbol.for("json-tree/ToJsonValue")

/** Capability implemented by aggregate types that know their JSON form. */
export interface JsonConvertible {
  readonly [ToJsonValue]: () => JsonValue
}

export type JsonInput =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonValue
  | JsonConvertible
  | ReadonlyArray<JsonInput>
  | ReadonlySet<JsonInput>
  | ReadonlyMap<string, JsonInput>
  | { readonly [key: string]: JsonInput }

const isConvertible = (input: JsonInput): input is JsonConvertible => Predicate.hasProperty(input, ToJsonValue)

const isInputArray = (input: JsonInput): input is ReadonlyArray<JsonInput> => Array.isArray(input)

const isInputSet = (input: JsonInput): input is ReadonlySet<JsonInput> => input instanceof Set

const isInputMap = (input: JsonInput): input is ReadonlyMap<string, JsonInput> => input instanceof Map

const convertEntries = (
  entries: Iterable<readonly [string, JsonInput]>
): Array<readonly [string, JsonValue]> => {
  const result: Array<readonly [string, JsonValue]> = []
  for (const [key, entry] of entries) {
    result.push([key, fromNative(entry)])
  }
  return result
}

/**
 * Convert a native value into a JsonValue.
 *
 * Safe integers become Integer; every other number becomes Number. Use
 * `integer` or `number` directly where the tag matters.
 *
 * @param input - Primitive, container, existing value, or JsonConvertible.
 * @returns The converted tree.
 *
 * @pure true (unless a JsonConvertible implementation is not)
 * @invariant Sets and arrays keep iteration order; object keys end up sorted
 * @complexity O(n)
 */
export const fromNative = (input: JsonInput): JsonValue => {
  if (input === null) {
    return nullValue
  }
  if (typeof input === "boolean") {
    return bool(input)
  }
  if (typeof input === "string") {
    return string(input)
  }
  if (typeof input === "bigint") {
    return integer(input)
  }
  if (typeof input === "number") {
    return Number.isSafeInteger(input) ? integer(input) : number(input)
  }
  if (isJsonValue(input)) {
    return input
  }
  if (isConvertible(input)) {
    return input[ToJsonValue]()
  }
  if (isInputArray(input)) {
    return array(input.map(fromNative))
  }
  if (isInputSet(input)) {
    return array(Array.from(input, fromNative))
  }
  if (isInputMap(input)) {
    return object(convertEntries(input))
  }
  return object(convertEntries(Object.entries(input)))
}
