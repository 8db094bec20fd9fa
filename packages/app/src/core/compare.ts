import * as Equivalence from "effect/Equivalence"
import * as Order from "effect/Order"

import type { JsonValue } from "./value.js"
import { compareCodePoints } from "./value.js"

// CHANGE: define structural equality and a total order over values
// WHY: Integer and Number must compare by magnitude, everything else by tag then payload
// QUOTE(TZ): n/a
// REF: req-compare-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: equals(a,b) ⇔ compare(a,b) = 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: numeric values form a single class ranked between Null and Bool
// COMPLEXITY: O(n) in the size of the smaller tree

type Ordering = -1 | 0 | 1

type NumericPayload = bigint | number

const rank = (value: JsonValue): number => {
  switch (value._tag) {
    case "Null": {
      return 0
    }
    case "Integer":
    case "Number": {
      return 1
    }
    case "Bool": {
      return 3
    }
    case "String": {
      return 4
    }
    case "Array": {
      return 5
    }
    case "Object": {
      return 6
    }
  }
}

const sign = (left: number, right: number): Ordering => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

const signBigint = (left: bigint, right: bigint): Ordering => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

// Exact comparison of a 64-bit integer against a double.
const compareBigintToNumber = (left: bigint, right: number): Ordering => {
  if (Number.isNaN(right)) {
    return 1
  }
  if (!Number.isFinite(right)) {
    return right > 0 ? -1 : 1
  }
  const floor = Math.floor(right)
  const byFloor = signBigint(left, BigInt(floor))
  if (byFloor !== 0) {
    return byFloor
  }
  return floor === right ? 0 : -1
}

const compareNumbers = (left: number, right: number): Ordering => {
  const leftNaN = Number.isNaN(left)
  const rightNaN = Number.isNaN(right)
  if (leftNaN || rightNaN) {
    if (leftNaN && rightNaN) {
      return 0
    }
    return leftNaN ? -1 : 1
  }
  return sign(left, right)
}

const compareNumeric = (left: NumericPayload, right: NumericPayload): Ordering => {
  if (typeof left === "bigint") {
    if (typeof right === "bigint") {
      return signBigint(left, right)
    }
    return compareBigintToNumber(left, right)
  }
  if (typeof right === "bigint") {
    const flipped = compareBigintToNumber(right, left)
    return flipped === 0 ? 0 : flipped === 1 ? -1 : 1
  }
  return compareNumbers(left, right)
}

const compareArrays = (left: ReadonlyArray<JsonValue>, right: ReadonlyArray<JsonValue>): Ordering => {
  const length = Math.min(left.length, right.length)
  for (let index = 0; index < length; index++) {
    const l = left[index]
    const r = right[index]
    if (l !== undefined && r !== undefined) {
      const result = compare(l, r)
      if (result !== 0) {
        return result
      }
    }
  }
  return sign(left.length, right.length)
}

const compareEntries = (
  left: Iterable<readonly [string, JsonValue]>,
  right: Iterable<readonly [string, JsonValue]>
): Ordering => {
  const leftEntries = left[Symbol.iterator]()
  const rightEntries = right[Symbol.iterator]()
  while (true) {
    const l = leftEntries.next()
    const r = rightEntries.next()
    if (l.done === true || r.done === true) {
      if (l.done === true && r.done === true) {
        return 0
      }
      return l.done === true ? -1 : 1
    }
    const [leftKey, leftValue] = l.value
    const [rightKey, rightValue] = r.value
    const byKey = compareCodePoints(leftKey, rightKey)
    if (byKey !== 0) {
      return byKey
    }
    const byValue = compare(leftValue, rightValue)
    if (byValue !== 0) {
      return byValue
    }
  }
}

/**
 * Total order over values.
 *
 * @returns -1, 0 or 1
 *
 * @pure true
 * @invariant Null < numeric < Bool < String < Array < Object
 * @complexity O(n)
 */
export const compare = (left: JsonValue, right: JsonValue): Ordering => {
  if (left === right) {
    return 0
  }
  const byRank = sign(rank(left), rank(right))
  if (byRank !== 0) {
    return byRank
  }
  switch (left._tag) {
    case "Null": {
      return 0
    }
    case "Integer":
    case "Number": {
      return right._tag === "Integer" || right._tag === "Number" ? compareNumeric(left.value, right.value) : 0
    }
    case "Bool": {
      return right._tag === "Bool" ? sign(Number(left.value), Number(right.value)) : 0
    }
    case "String": {
      return right._tag === "String" ? compareCodePoints(left.value, right.value) : 0
    }
    case "Array": {
      return right._tag === "Array" ? compareArrays(left.items, right.items) : 0
    }
    case "Object": {
      return right._tag === "Object" ? compareEntries(left.fields, right.fields) : 0
    }
  }
}

export const equals = (left: JsonValue, right: JsonValue): boolean => compare(left, right) === 0

export const JsonOrder: Order.Order<JsonValue> = Order.make(compare)

export const JsonEquivalence: Equivalence.Equivalence<JsonValue> = Equivalence.make(equals)
