import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { lookup } from "./access.js"
import type { ShapeError } from "./errors.js"
import { shapeError } from "./errors.js"
import { serialize } from "./serialize.js"
import type { JsonObject, JsonTag, JsonValue } from "./value.js"

// CHANGE: add one-level field/type validation for objects
// WHY: callers check the fields they read before reading them
// QUOTE(TZ): n/a
// REF: req-shape-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,s: hasShape(v,s) = Right(o) → ∀(k,t) ∈ s: lookup(o,k) = Some(c) ∧ c._tag = t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: tags compare exactly; Integer never satisfies Number and vice versa
// COMPLEXITY: O(k log n + |v|) where k = fields in the shape

/**
 * Expected tag per field name. Integer and Number are different tags: a field
 * written as `1` parses as Integer and `1.0` as Number.
 */
export type Shape = Readonly<Record<string, JsonTag>>

/**
 * Check that value is an Object whose direct fields have the expected tags.
 *
 * @param value - Value to check.
 * @param shape - Field name to expected tag.
 * @returns The Object on success, or the first mismatch.
 *
 * @pure true
 * @invariant fields are checked in the shape's own key order
 * @complexity O(k log n)
 */
export const hasShape = (value: JsonValue, shape: Shape): Either.Either<JsonObject, ShapeError> => {
  if (value._tag !== "Object") {
    return Either.left(
      shapeError("NotAnObject", undefined, "Object", value._tag, `expected JSON object, got ${serialize(value)}`)
    )
  }
  for (const [field, expected] of Object.entries(shape)) {
    const child = lookup(value, field)
    if (Option.isNone(child)) {
      return Either.left(
        shapeError("MissingField", field, expected, undefined, `missing field ${field} in ${serialize(value)}`)
      )
    }
    const actual = child.value._tag
    if (actual !== expected) {
      return Either.left(
        shapeError(
          "TypeMismatch",
          field,
          expected,
          actual,
          `bad type for ${field} in ${serialize(value)}: expected ${expected}, got ${actual}`
        )
      )
    }
  }
  return Either.right(value)
}
