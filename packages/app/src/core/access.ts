import * as Option from "effect/Option"
import * as SortedMap from "effect/SortedMap"

import type { JsonArray, JsonObject, JsonValue } from "./value.js"
import { emptyArray, emptyObject, nullValue } from "./value.js"

// CHANGE: add side-effect-free accessors with neutral defaults
// WHY: let callers read deep paths without checking every tag on the way
// QUOTE(TZ): n/a
// REF: req-access-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,k: get(v,k) = Option.getOrElse(lookup(v,k), nullValue)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: accessors never fail and never allocate containers
// COMPLEXITY: O(1) except get/lookup: O(log n)

export const numberValue = (value: JsonValue): number => {
  if (value._tag === "Integer") {
    return Number(value.value)
  }
  if (value._tag === "Number") {
    return value.value
  }
  return 0
}

export const intValue = (value: JsonValue): bigint => {
  if (value._tag === "Integer") {
    return value.value
  }
  if (value._tag === "Number" && Number.isFinite(value.value)) {
    return BigInt(Math.trunc(value.value))
  }
  return 0n
}

export const boolValue = (value: JsonValue): boolean => value._tag === "Bool" ? value.value : false

export const stringValue = (value: JsonValue): string => value._tag === "String" ? value.value : ""

export const arrayValue = (value: JsonValue): ReadonlyArray<JsonValue> =>
  value._tag === "Array" ? value.items : emptyArray.items

export const objectValue = (value: JsonValue): SortedMap.SortedMap<string, JsonValue> =>
  value._tag === "Object" ? value.fields : emptyObject.fields

export const asArray = (value: JsonValue): Option.Option<JsonArray> =>
  value._tag === "Array" ? Option.some(value) : Option.none()

export const asObject = (value: JsonValue): Option.Option<JsonObject> =>
  value._tag === "Object" ? Option.some(value) : Option.none()

/** Number of array items; 0 for every other variant. */
export const size = (value: JsonValue): number => value._tag === "Array" ? value.items.length : 0

/**
 * Look up an array item, distinguishing "absent" from "present null".
 *
 * @pure true
 * @invariant Some only when value is an Array and 0 ≤ index < length
 * @complexity O(1)
 */
export const lookupIndex = (value: JsonValue, index: number): Option.Option<JsonValue> => {
  if (value._tag !== "Array" || !Number.isInteger(index) || index < 0) {
    return Option.none()
  }
  return Option.fromNullable(value.items[index])
}

/**
 * Look up an object field, distinguishing "absent" from "present null".
 *
 * @pure true
 * @invariant Some only when value is an Object holding key
 * @complexity O(log n)
 */
export const lookup = (value: JsonValue, key: string): Option.Option<JsonValue> =>
  value._tag === "Object" ? SortedMap.get(value.fields, key) : Option.none()

/** Array item at index, or the shared Null when there is none. */
export const at = (value: JsonValue, index: number): JsonValue =>
  Option.getOrElse(lookupIndex(value, index), () => nullValue)

/** Object field for key, or the shared Null when there is none. */
export const get = (value: JsonValue, key: string): JsonValue =>
  Option.getOrElse(lookup(value, key), () => nullValue)
