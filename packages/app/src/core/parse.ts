import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as SortedMap from "effect/SortedMap"

import type { ParseError, ParseErrorReason } from "./errors.js"
import { parseError } from "./errors.js"
import type { JsonValue } from "./value.js"
import { array, bool, emptyObject, fromFields, integer, nullValue, number, string } from "./value.js"

// CHANGE: parse JSON text into JsonValue trees with a recursive-descent parser
// WHY: keep the integer/double distinction and report the first failure with its position
// QUOTE(TZ): n/a
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → s is one JSON document; Left(e) → e is the first error
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: container nesting never exceeds maxDepth
// COMPLEXITY: O(n) plus O(k log k) per object with k keys

export interface ParseOptions {
  readonly maxDepth?: number
}

export interface MultiParseResult {
  readonly values: ReadonlyArray<JsonValue>
  readonly error: Option.Option<ParseError>
}

export const DEFAULT_MAX_DEPTH = 200

/** Largest accepted nesting limit; larger requests are lowered to it. Keeps recursion within the call stack. */
export const MAX_DEPTH_CEILING = 2000

// int64 holds every 18-digit decimal
const MAX_INTEGER_DIGITS = 18

interface Step<A> {
  readonly value: A
  readonly index: number
}

type ParseStep<A> = Either.Either<Step<A>, ParseError>

const step = <A>(value: A, index: number): ParseStep<A> => Either.right({ value, index })

const fail = <A>(reason: ParseErrorReason, message: string, position: number): ParseStep<A> =>
  Either.left(parseError(reason, message, position))

const isWhitespace = (char: string): boolean => char === " " || char === "\r" || char === "\n" || char === "\t"

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const isHexQuad = (value: string): boolean => /^[0-9a-fA-F]{4}$/u.test(value)

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

/** Printable form of a character for error messages. */
const describe = (char: string): string => {
  if (char.length === 0) {
    return "end of input"
  }
  const code = char.charCodeAt(0)
  return code >= 0x20 && code < 0x7f ? `'${char}' (${code})` : `(${code})`
}

const skipWhitespace = (text: string, index: number): number => {
  let cursor = index
  while (cursor < text.length && isWhitespace(text.charAt(cursor))) {
    cursor++
  }
  return cursor
}

// Next non-whitespace character; the step index points just past it.
const nextToken = (text: string, index: number): ParseStep<string> => {
  const cursor = skipWhitespace(text, index)
  if (cursor >= text.length) {
    return fail("UnexpectedEnd", "unexpected end of input", cursor)
  }
  return step(text.charAt(cursor), cursor + 1)
}

const expectLiteral = (
  text: string,
  start: number,
  literal: string,
  value: JsonValue
): ParseStep<JsonValue> => {
  if (text.startsWith(literal, start)) {
    return step(value, start + literal.length)
  }
  return fail(
    "ExpectedToken",
    `expected ${literal}, got ${text.slice(start, start + literal.length)}`,
    start
  )
}

const readDigits = (text: string, index: number): number => {
  let cursor = index
  while (isDigit(text.charAt(cursor))) {
    cursor++
  }
  return cursor
}

/**
 * Parse a number starting at '-' or a digit.
 *
 * @invariant Integer only when there is no fraction, no exponent and ≤ 18 digits
 */
const parseNumber = (text: string, start: number): ParseStep<JsonValue> => {
  let cursor = start
  if (text.charAt(cursor) === "-") {
    cursor++
  }
  const digitsStart = cursor
  const lead = text.charAt(cursor)
  if (lead === "0") {
    cursor++
    if (isDigit(text.charAt(cursor))) {
      return fail("InvalidNumber", "leading 0s not permitted in numbers", cursor)
    }
  } else if (lead >= "1" && lead <= "9") {
    cursor = readDigits(text, cursor + 1)
  } else {
    return fail("InvalidNumber", `invalid ${describe(lead)} in number`, cursor)
  }

  const afterInteger = text.charAt(cursor)
  const isPlainInteger = afterInteger !== "." && afterInteger !== "e" && afterInteger !== "E"
  if (isPlainInteger && cursor - digitsStart <= MAX_INTEGER_DIGITS) {
    return step(integer(BigInt(text.slice(start, cursor))), cursor)
  }

  if (text.charAt(cursor) === ".") {
    cursor++
    if (!isDigit(text.charAt(cursor))) {
      return fail("InvalidNumber", "at least one digit required in fractional part", cursor)
    }
    cursor = readDigits(text, cursor)
  }

  if (text.charAt(cursor) === "e" || text.charAt(cursor) === "E") {
    cursor++
    if (text.charAt(cursor) === "+" || text.charAt(cursor) === "-") {
      cursor++
    }
    if (!isDigit(text.charAt(cursor))) {
      return fail("InvalidNumber", "at least one digit required in exponent", cursor)
    }
    cursor = readDigits(text, cursor)
  }

  return step(number(Number(text.slice(start, cursor))), cursor)
}

const simpleEscapes: Readonly<Record<string, string>> = {
  "b": "\b",
  "f": "\f",
  "n": "\n",
  "r": "\r",
  "t": "\t",
  "\"": "\"",
  "\\": "\\",
  "/": "/"
}

// Code unit of the \uXXXX escape at index (pointing at the backslash), if well-formed.
const peekUnicodeEscape = (text: string, index: number): number | undefined => {
  if (text.charAt(index) !== "\\" || text.charAt(index + 1) !== "u") {
    return undefined
  }
  const quad = text.slice(index + 2, index + 6)
  return isHexQuad(quad) ? Number.parseInt(quad, 16) : undefined
}

/**
 * Parse the body of a string literal; index points just past the opening quote.
 *
 * An escaped high surrogate followed by an escaped low surrogate becomes one
 * code point. Unpaired surrogate escapes are kept as lone code units.
 */
const parseString = (text: string, index: number): ParseStep<string> => {
  let out = ""
  let chunkStart = index
  let cursor = index
  while (true) {
    if (cursor >= text.length) {
      return fail("UnexpectedEnd", "unexpected end of input in string", cursor)
    }
    const char = text.charAt(cursor)
    if (char === "\"") {
      return step(out + text.slice(chunkStart, cursor), cursor + 1)
    }
    const code = char.charCodeAt(0)
    if (code < 0x20) {
      return fail("UnescapedControl", `unescaped ${describe(char)} in string`, cursor)
    }
    if (char !== "\\") {
      cursor++
      continue
    }

    out += text.slice(chunkStart, cursor)
    const escape = text.charAt(cursor + 1)
    if (escape.length === 0) {
      return fail("UnexpectedEnd", "unexpected end of input in string", cursor + 1)
    }
    if (escape === "u") {
      const unit = peekUnicodeEscape(text, cursor)
      if (unit === undefined) {
        return fail("InvalidEscape", `bad \\u escape: ${text.slice(cursor + 2, cursor + 6)}`, cursor)
      }
      const trail = isHighSurrogate(unit) ? peekUnicodeEscape(text, cursor + 6) : undefined
      if (trail !== undefined && isLowSurrogate(trail)) {
        out += String.fromCodePoint(((unit - 0xd800) << 10 | (trail - 0xdc00)) + 0x10000)
        cursor += 12
      } else {
        out += String.fromCharCode(unit)
        cursor += 6
      }
      chunkStart = cursor
      continue
    }
    const replacement = simpleEscapes[escape]
    if (replacement === undefined) {
      return fail("InvalidEscape", `invalid escape character ${describe(escape)}`, cursor + 1)
    }
    out += replacement
    cursor += 2
    chunkStart = cursor
  }
}

const enterContainer = (depth: number, maxDepth: number, position: number): Either.Either<number, ParseError> =>
  depth + 1 > maxDepth
    ? Either.left(parseError("NestingTooDeep", "exceeded maximum nesting depth", position))
    : Either.right(depth + 1)

const parseObject = (
  text: string,
  index: number,
  depth: number,
  maxDepth: number
): ParseStep<JsonValue> => {
  let fields = emptyObject.fields
  const first = nextToken(text, index)
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  if (first.right.value === "}") {
    return step(emptyObject, first.right.index)
  }
  let token = first.right
  while (true) {
    if (token.value !== "\"") {
      return fail("ExpectedToken", `expected '"' in object, got ${describe(token.value)}`, token.index - 1)
    }
    const key = parseString(text, token.index)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const colon = nextToken(text, key.right.index)
    if (Either.isLeft(colon)) {
      return Either.left(colon.left)
    }
    if (colon.right.value !== ":") {
      return fail("ExpectedToken", `expected ':' in object, got ${describe(colon.right.value)}`, colon.right.index - 1)
    }
    const member = parseValue(text, colon.right.index, depth, maxDepth)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    fields = SortedMap.set(fields, key.right.value, member.right.value)
    const separator = nextToken(text, member.right.index)
    if (Either.isLeft(separator)) {
      return Either.left(separator.left)
    }
    if (separator.right.value === "}") {
      return step(fromFields(fields), separator.right.index)
    }
    if (separator.right.value !== ",") {
      return fail(
        "ExpectedToken",
        `expected ',' in object, got ${describe(separator.right.value)}`,
        separator.right.index - 1
      )
    }
    const following = nextToken(text, separator.right.index)
    if (Either.isLeft(following)) {
      return Either.left(following.left)
    }
    token = following.right
  }
}

const parseArray = (
  text: string,
  index: number,
  depth: number,
  maxDepth: number
): ParseStep<JsonValue> => {
  const items: Array<JsonValue> = []
  const first = nextToken(text, index)
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  if (first.right.value === "]") {
    return step(array(items), first.right.index)
  }
  let cursor = first.right.index - 1
  while (true) {
    const item = parseValue(text, cursor, depth, maxDepth)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right.value)
    const separator = nextToken(text, item.right.index)
    if (Either.isLeft(separator)) {
      return Either.left(separator.left)
    }
    if (separator.right.value === "]") {
      return step(array(items), separator.right.index)
    }
    if (separator.right.value !== ",") {
      return fail(
        "ExpectedToken",
        `expected ',' in list, got ${describe(separator.right.value)}`,
        separator.right.index - 1
      )
    }
    cursor = separator.right.index
  }
}

const parseValue = (
  text: string,
  index: number,
  depth: number,
  maxDepth: number
): ParseStep<JsonValue> => {
  const token = nextToken(text, index)
  if (Either.isLeft(token)) {
    return Either.left(token.left)
  }
  const char = token.right.value
  const start = token.right.index - 1
  if (char === "-" || isDigit(char)) {
    return parseNumber(text, start)
  }
  if (char === "t") {
    return expectLiteral(text, start, "true", bool(true))
  }
  if (char === "f") {
    return expectLiteral(text, start, "false", bool(false))
  }
  if (char === "n") {
    return expectLiteral(text, start, "null", nullValue)
  }
  if (char === "\"") {
    return Either.map(parseString(text, token.right.index), (parsed) => ({
      value: string(parsed.value),
      index: parsed.index
    }))
  }
  if (char === "{" || char === "[") {
    const nested = enterContainer(depth, maxDepth, start)
    if (Either.isLeft(nested)) {
      return Either.left(nested.left)
    }
    return char === "{"
      ? parseObject(text, token.right.index, nested.right, maxDepth)
      : parseArray(text, token.right.index, nested.right, maxDepth)
  }
  return fail("ExpectedToken", `expected value, got ${describe(char)}`, start)
}

const resolveMaxDepth = (options: ParseOptions | undefined): number =>
  Math.min(options?.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_CEILING)

/**
 * Parse one JSON document.
 *
 * @param text - Complete document; surrounding whitespace is allowed.
 * @param options - Optional nesting limit (default 200, at most MAX_DEPTH_CEILING).
 * @returns Either with the parsed value or the first ParseError.
 *
 * @pure true
 * @invariant Right only when nothing but whitespace follows the value
 * @complexity O(n)
 */
export const parse = (
  text: string,
  options?: ParseOptions
): Either.Either<JsonValue, ParseError> => {
  const parsed = parseValue(text, 0, 0, resolveMaxDepth(options))
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const end = skipWhitespace(text, parsed.right.index)
  if (end !== text.length) {
    return Either.left(
      parseError("TrailingGarbage", `unexpected trailing ${describe(text.charAt(end))}`, end)
    )
  }
  return Either.right(parsed.right.value)
}

/** Parse one document, yielding Null when it is malformed. */
export const parseOrNull = (text: string, options?: ParseOptions): JsonValue =>
  Either.getOrElse(parse(text, options), () => nullValue)

/**
 * Parse whitespace-separated or directly concatenated documents.
 *
 * @param text - Zero or more documents.
 * @returns Every value read; on failure the failing document adds a Null
 * and the error is reported.
 *
 * @pure true
 * @invariant error is None ⇔ the whole input was consumed
 * @complexity O(n)
 */
export const parseMultiple = (text: string, options?: ParseOptions): MultiParseResult => {
  const maxDepth = resolveMaxDepth(options)
  const values: Array<JsonValue> = []
  let cursor = skipWhitespace(text, 0)
  while (cursor < text.length) {
    const parsed = parseValue(text, cursor, 0, maxDepth)
    if (Either.isLeft(parsed)) {
      values.push(nullValue)
      return { values, error: Option.some(parsed.left) }
    }
    values.push(parsed.right.value)
    cursor = skipWhitespace(text, parsed.right.index)
  }
  return { values, error: Option.none() }
}
