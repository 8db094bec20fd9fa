import * as Either from "effect/Either"
import * as SortedMap from "effect/SortedMap"

import type { MutationError } from "./errors.js"
import { mutationError } from "./errors.js"
import type { JsonArray, JsonObject, JsonValue } from "./value.js"
import { array, emptyArray, emptyObject, fromFields } from "./value.js"

// CHANGE: replace implicit vivification with explicit get-or-create operations
// WHY: writes through a Null promote it to a container; any other variant is rejected
// QUOTE(TZ): n/a
// REF: req-mutate-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,k,c: setKey(v,k,c) = Right(o) → get(o,k) = c
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the input value is never modified; a Left carries no new value
// COMPLEXITY: setKey O(log n), append O(n)

/**
 * Return the value as an Object, promoting Null to an empty Object.
 *
 * @pure true
 * @invariant Right only for Null or Object input
 * @complexity O(1)
 */
export const ensureObject = (value: JsonValue): Either.Either<JsonObject, MutationError> => {
  if (value._tag === "Object") {
    return Either.right(value)
  }
  if (value._tag === "Null") {
    return Either.right(emptyObject)
  }
  return Either.left(mutationError("Object", value._tag))
}

export const ensureArray = (value: JsonValue): Either.Either<JsonArray, MutationError> => {
  if (value._tag === "Array") {
    return Either.right(value)
  }
  if (value._tag === "Null") {
    return Either.right(emptyArray)
  }
  return Either.left(mutationError("Array", value._tag))
}

/**
 * Insert or overwrite a field. Null is vivified into a one-field Object.
 *
 * @param value - Null or Object to write into.
 * @param key - Field name; an existing field is replaced.
 * @param child - Field value.
 * @returns The updated Object, or a MutationError for any other variant.
 *
 * @pure true
 * @invariant keys of the result stay unique and sorted
 * @complexity O(log n)
 */
export const setKey = (
  value: JsonValue,
  key: string,
  child: JsonValue
): Either.Either<JsonObject, MutationError> =>
  Either.map(ensureObject(value), (target) => fromFields(SortedMap.set(target.fields, key, child)))

export const removeKey = (
  value: JsonValue,
  key: string
): Either.Either<JsonObject, MutationError> =>
  Either.map(ensureObject(value), (target) => fromFields(SortedMap.remove(target.fields, key)))

/**
 * Append an item. Null is vivified into a one-item Array.
 *
 * @pure true
 * @invariant Left when value is neither Null nor Array
 * @complexity O(n)
 */
export const append = (
  value: JsonValue,
  child: JsonValue
): Either.Either<JsonArray, MutationError> =>
  Either.map(ensureArray(value), (target) => array([...target.items, child]))
