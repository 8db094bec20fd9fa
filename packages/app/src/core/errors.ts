import type { CliError } from "./cli.js"
import type { JsonTag } from "./value.js"

// CHANGE: unify error algebra for parsing, validation, mutation and the CLI
// WHY: provide typed failures that callers match on instead of catching exceptions
// QUOTE(TZ): n/a
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; every error carries a non-empty message
// COMPLEXITY: O(1)/O(1)

export type ParseErrorReason =
  | "UnexpectedEnd"
  | "InvalidEscape"
  | "UnescapedControl"
  | "InvalidNumber"
  | "NestingTooDeep"
  | "ExpectedToken"
  | "TrailingGarbage"

export type ParseError = {
  readonly _tag: "ParseError"
  readonly reason: ParseErrorReason
  readonly message: string
  readonly position: number
}

export type ShapeErrorReason = "NotAnObject" | "MissingField" | "TypeMismatch"

export type ShapeError = {
  readonly _tag: "ShapeError"
  readonly reason: ShapeErrorReason
  readonly field: string | undefined
  readonly expected: JsonTag
  readonly actual: JsonTag | undefined
  readonly message: string
}

export type MutationError = {
  readonly _tag: "MutationError"
  readonly expected: "Object" | "Array"
  readonly actual: JsonTag
  readonly message: string
}

export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError = CliError | FileError

export const parseError = (
  reason: ParseErrorReason,
  message: string,
  position: number
): ParseError => ({
  _tag: "ParseError",
  reason,
  message,
  position
})

export const shapeError = (
  reason: ShapeErrorReason,
  field: string | undefined,
  expected: JsonTag,
  actual: JsonTag | undefined,
  message: string
): ShapeError => ({
  _tag: "ShapeError",
  reason,
  field,
  expected,
  actual,
  message
})

export const mutationError = (expected: "Object" | "Array", actual: JsonTag): MutationError => ({
  _tag: "MutationError",
  expected,
  actual,
  message: `cannot use ${actual} value as ${expected === "Object" ? "an Object" : "an Array"}`
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})
