import * as Order from "effect/Order"
import * as Predicate from "effect/Predicate"
import * as SortedMap from "effect/SortedMap"

// CHANGE: introduce the tagged JSON value domain type
// WHY: keep integer/double distinction and sorted object keys visible in the type
// QUOTE(TZ): n/a
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag determines the payload field exactly
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Object fields iterate in ascending code point order of their keys
// COMPLEXITY: O(1) per constructor except object: O(n log n)

export const TypeId: unique symbol = Symbol.for("json-tree/JsonValue")

export type TypeId = typeof TypeId

interface Node<Tag extends string> {
  readonly [TypeId]: TypeId
  readonly _tag: Tag
}

export interface JsonNull extends Node<"Null"> {}

export interface JsonInteger extends Node<"Integer"> {
  readonly value: bigint
}

export interface JsonNumber extends Node<"Number"> {
  readonly value: number
}

export interface JsonBool extends Node<"Bool"> {
  readonly value: boolean
}

export interface JsonString extends Node<"String"> {
  readonly value: string
}

export interface JsonArray extends Node<"Array"> {
  readonly items: ReadonlyArray<JsonValue>
}

export interface JsonObject extends Node<"Object"> {
  readonly fields: SortedMap.SortedMap<string, JsonValue>
}

export type JsonValue =
  | JsonNull
  | JsonInteger
  | JsonNumber
  | JsonBool
  | JsonString
  | JsonArray
  | JsonObject

export type JsonTag = JsonValue["_tag"]

export type JsonNumeric = JsonInteger | JsonNumber

/** Tags in declaration order. */
export const jsonTags = [
  "Null",
  "Integer",
  "Number",
  "Bool",
  "String",
  "Array",
  "Object"
] as const satisfies ReadonlyArray<JsonTag>

const INT64_BITS = 64

/**
 * Compare two strings by Unicode code point, which matches the byte order of
 * their UTF-8 encodings. Lone surrogates compare by their code unit value.
 */
export const compareCodePoints = (left: string, right: string): -1 | 0 | 1 => {
  if (left === right) {
    return 0
  }
  const leftPoints = left[Symbol.iterator]()
  const rightPoints = right[Symbol.iterator]()
  while (true) {
    const l = leftPoints.next()
    const r = rightPoints.next()
    if (l.done === true || r.done === true) {
      if (l.done === true && r.done === true) {
        return 0
      }
      return l.done === true ? -1 : 1
    }
    const lc = l.value.codePointAt(0) ?? 0
    const rc = r.value.codePointAt(0) ?? 0
    if (lc !== rc) {
      return lc < rc ? -1 : 1
    }
  }
}

/** Key order of every object field map. */
export const keyOrder: Order.Order<string> = Order.make(compareCodePoints)

const emptyFields: SortedMap.SortedMap<string, JsonValue> = SortedMap.empty(keyOrder)

/** Shared Null; accessors return it for absent positions and keys. */
export const nullValue: JsonNull = { [TypeId]: TypeId, _tag: "Null" }

const trueValue: JsonBool = { [TypeId]: TypeId, _tag: "Bool", value: true }
const falseValue: JsonBool = { [TypeId]: TypeId, _tag: "Bool", value: false }

export const bool = (value: boolean): JsonBool => value ? trueValue : falseValue

/**
 * Build an Integer. Numbers are truncated toward zero and wrapped to 64 bits;
 * non-finite numbers become 0.
 */
export const integer = (value: bigint | number): JsonInteger => {
  const big = typeof value === "bigint"
    ? value
    : Number.isFinite(value)
    ? BigInt(Math.trunc(value))
    : 0n
  return { [TypeId]: TypeId, _tag: "Integer", value: BigInt.asIntN(INT64_BITS, big) }
}

export const number = (value: number): JsonNumber => ({ [TypeId]: TypeId, _tag: "Number", value })

export const string = (value: string): JsonString => ({ [TypeId]: TypeId, _tag: "String", value })

/** Build an Array from a copy of items; later changes to the source do not leak in. */
export const array = (items: Iterable<JsonValue>): JsonArray => ({
  [TypeId]: TypeId,
  _tag: "Array",
  items: Array.from(items)
})

export const fromFields = (fields: SortedMap.SortedMap<string, JsonValue>): JsonObject => ({
  [TypeId]: TypeId,
  _tag: "Object",
  fields
})

export const emptyObject: JsonObject = fromFields(emptyFields)

export const emptyArray: JsonArray = array([])

/**
 * Build an Object from key/value pairs. A repeated key keeps its last value.
 *
 * @pure true
 * @invariant keys of the result are unique and sorted
 * @complexity O(n log n)
 */
export const object = (entries: Iterable<readonly [string, JsonValue]>): JsonObject => {
  let fields = emptyFields
  for (const [key, value] of entries) {
    fields = SortedMap.set(fields, key, value)
  }
  return fromFields(fields)
}

export const fromRecord = (record: Readonly<Record<string, JsonValue>>): JsonObject =>
  object(Object.entries(record))

export const isJsonValue = (input: unknown): input is JsonValue => Predicate.hasProperty(input, TypeId)

export const isNull = (value: JsonValue): value is JsonNull => value._tag === "Null"

export const isNumeric = (value: JsonValue): value is JsonNumeric =>
  value._tag === "Integer" || value._tag === "Number"

export const isBool = (value: JsonValue): value is JsonBool => value._tag === "Bool"

export const isString = (value: JsonValue): value is JsonString => value._tag === "String"

export const isArray = (value: JsonValue): value is JsonArray => value._tag === "Array"

export const isObject = (value: JsonValue): value is JsonObject => value._tag === "Object"

/**
 * Deep copy. Values are immutable, so sharing is always safe; this exists for
 * callers that need a tree with no container or string nodes in common with
 * the source. Null and booleans stay shared singletons.
 */
export const clone = (value: JsonValue): JsonValue => {
  switch (value._tag) {
    case "Null": {
      return nullValue
    }
    case "Integer": {
      return integer(value.value)
    }
    case "Number": {
      return number(value.value)
    }
    case "Bool": {
      return bool(value.value)
    }
    case "String": {
      return string(value.value)
    }
    case "Array": {
      return array(value.items.map(clone))
    }
    case "Object": {
      const entries: Array<readonly [string, JsonValue]> = []
      for (const [key, child] of value.fields) {
        entries.push([key, clone(child)])
      }
      return object(entries)
    }
  }
}
