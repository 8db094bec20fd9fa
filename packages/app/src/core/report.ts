import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliCommand } from "./cli.js"
import type { ResolvedConfig } from "./config.js"
import type { ParseError, ShapeError } from "./errors.js"
import { parse, parseMultiple } from "./parse.js"
import { serialize } from "./serialize.js"
import type { Shape } from "./shape.js"
import { hasShape } from "./shape.js"
import type { JsonValue } from "./value.js"

// CHANGE: evaluate a document against the resolved config and render the result lines
// WHY: keep the CLI outcome pure so the shell only reads input and writes output
// QUOTE(TZ): n/a
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o: exitCode(o) = 0 ⇔ o._tag = "Parsed"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: at most one Failed line per outcome, always last
// COMPLEXITY: O(n)

export type Outcome =
  | { readonly _tag: "Parsed"; readonly values: ReadonlyArray<JsonValue> }
  | { readonly _tag: "ParseFailed"; readonly values: ReadonlyArray<JsonValue>; readonly error: ParseError }
  | { readonly _tag: "ShapeFailed"; readonly values: ReadonlyArray<JsonValue>; readonly error: ShapeError }

type EvaluateConfig = Pick<ResolvedConfig, "multi" | "shape" | "parseOptions">

const checkShapes = (
  values: ReadonlyArray<JsonValue>,
  shape: Shape | undefined
): Option.Option<ShapeError> => {
  if (shape === undefined) {
    return Option.none()
  }
  for (const value of values) {
    const checked = hasShape(value, shape)
    if (Either.isLeft(checked)) {
      return Option.some(checked.left)
    }
  }
  return Option.none()
}

const withShapeCheck = (values: ReadonlyArray<JsonValue>, shape: Shape | undefined): Outcome =>
  Option.match(checkShapes(values, shape), {
    onNone: (): Outcome => ({ _tag: "Parsed", values }),
    onSome: (error): Outcome => ({ _tag: "ShapeFailed", values, error })
  })

/**
 * Parse the input text and validate every document against the shape, if any.
 *
 * @param text - Raw input.
 * @param config - Multi-document mode, shape and parse options.
 * @returns Outcome with the documents that parsed successfully.
 *
 * @pure true
 * @invariant ParseFailed.values excludes the placeholder for the failing document
 * @complexity O(n)
 */
export const evaluate = (text: string, config: EvaluateConfig): Outcome => {
  if (config.multi) {
    const result = parseMultiple(text, config.parseOptions)
    return Option.match(result.error, {
      onNone: () => withShapeCheck(result.values, config.shape),
      onSome: (error): Outcome => ({ _tag: "ParseFailed", values: result.values.slice(0, -1), error })
    })
  }
  return Either.match(parse(text, config.parseOptions), {
    onLeft: (error): Outcome => ({ _tag: "ParseFailed", values: [], error }),
    onRight: (value) => withShapeCheck([value], config.shape)
  })
}

const failedLine = (message: string): string => `Failed: ${message}`

/**
 * Render outcome lines: `Result: <text>` per document for format, then the failure.
 *
 * @pure true
 * @invariant check never emits Result lines
 * @complexity O(n)
 */
export const renderOutcome = (outcome: Outcome, command: CliCommand): ReadonlyArray<string> => {
  const results = command === "format" ? outcome.values.map((value) => `Result: ${serialize(value)}`) : []
  return Match.value(outcome).pipe(
    Match.tag("Parsed", () => results),
    Match.tag("ParseFailed", (failed) => [...results, failedLine(failed.error.message)]),
    Match.tag("ShapeFailed", (failed) => [...results, failedLine(failed.error.message)]),
    Match.exhaustive
  )
}

export const exitCodeOf = (outcome: Outcome): number =>
  Match.value(outcome).pipe(
    Match.tag("Parsed", () => 0),
    Match.tag("ParseFailed", () => 1),
    Match.tag("ShapeFailed", () => 2),
    Match.exhaustive
  )
