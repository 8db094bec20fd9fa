import * as S from "@effect/schema/Schema"
import { Match } from "effect"
import * as Either from "effect/Either"

import { MAX_DEPTH_CEILING } from "./parse.js"
import { JsonTagSchema } from "./schema.js"
import type { Shape } from "./shape.js"
import type { JsonTag } from "./value.js"

// CHANGE: implement deterministic CLI parsing for json-tree
// WHY: argv becomes CliArgs without touching process state
// QUOTE(TZ): n/a
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parseCliArgs(argv) = Right(a) → a.command ∈ {format, check}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n + s) for n arguments and a shape list of length s

export type CliCommand = "format" | "check"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly multi: boolean
  readonly shape: Shape | undefined
  readonly maxDepth: number | undefined
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const decodeTag = S.decodeUnknownEither(JsonTagSchema)

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

/**
 * Parse a positive integer depth limit.
 *
 * @pure true
 * @invariant Right(n) → 1 ≤ n ≤ MAX_DEPTH_CEILING
 */
export const parseDepth = (value: string): Either.Either<number, CliError> => {
  const parsed = /^\d+$/u.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    return Either.left(cliError(`Invalid depth: ${value}`))
  }
  if (parsed > MAX_DEPTH_CEILING) {
    return Either.left(cliError(`Depth ${value} exceeds the maximum of ${MAX_DEPTH_CEILING}`))
  }
  return Either.right(parsed)
}

const parseShapeEntry = (entry: string): Either.Either<readonly [string, JsonTag], CliError> => {
  const separator = entry.lastIndexOf(":")
  if (separator <= 0) {
    return Either.left(cliError(`Invalid shape entry: ${entry} (expected name:Tag)`))
  }
  const name = entry.slice(0, separator)
  const tag = entry.slice(separator + 1)
  return Either.match(decodeTag(tag), {
    onLeft: () => Either.left(cliError(`Unknown tag in shape entry ${entry}: ${tag}`)),
    onRight: (decoded) => Either.right([name, decoded] as const)
  })
}

/**
 * Parse a shape list such as `id:Integer,name:String`.
 *
 * @pure true
 * @invariant later entries for the same name win
 * @complexity O(n)
 */
export const parseShape = (value: string): Either.Either<Shape, CliError> => {
  const entries = splitList(value)
  if (entries.length === 0) {
    return Either.left(cliError("Empty --shape"))
  }
  const fields: Array<readonly [string, JsonTag]> = []
  for (const entry of entries) {
    const parsed = parseShapeEntry(entry)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    fields.push(parsed.right)
  }
  // fromEntries defines own properties, so names like __proto__ stay fields
  return Either.right(Object.fromEntries(fields))
}

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: "-",
  multi: false,
  shape: undefined,
  maxDepth: undefined,
  verbose: false
})

// A flag consumes its own token and, for value flags written as `--name value`, the next one.
type FlagStep = { readonly args: CliArgs; readonly rest: ReadonlyArray<string> }

type FlagHandler = (
  args: CliArgs,
  inline: string | undefined,
  rest: ReadonlyArray<string>
) => Either.Either<FlagStep, CliError>

const switchFlag = (name: string, update: (args: CliArgs) => CliArgs): FlagHandler => (args, inline, rest) =>
  inline === undefined
    ? Either.right({ args: update(args), rest })
    : Either.left(cliError(`Flag --${name} takes no value`))

const valueFlag = (
  name: string,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): FlagHandler =>
(args, inline, rest) => {
  if (inline !== undefined) {
    return Either.map(update(args, inline), (next) => ({ args: next, rest }))
  }
  const [value, ...remaining] = rest
  return value === undefined || isFlag(value)
    ? Either.left(cliError(`Missing value for --${name}`))
    : Either.map(update(args, value), (next) => ({ args: next, rest: remaining }))
}

const flagHandlers: Readonly<Record<string, FlagHandler>> = {
  multi: switchFlag("multi", (args) => ({ ...args, multi: true })),
  verbose: switchFlag("verbose", (args) => ({ ...args, verbose: true })),
  input: valueFlag("input", (args, input) => Either.right({ ...args, input })),
  shape: valueFlag("shape", (args, value) => Either.map(parseShape(value), (shape) => ({ ...args, shape }))),
  "max-depth": valueFlag(
    "max-depth",
    (args, value) => Either.map(parseDepth(value), (maxDepth) => ({ ...args, maxDepth }))
  )
}

const handlerFor = (token: string): Either.Either<readonly [FlagHandler, string | undefined], CliError> => {
  if (!token.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${token}`))
  }
  const body = token.slice(2)
  const equals = body.indexOf("=")
  const name = equals < 0 ? body : body.slice(0, equals)
  const inline = equals < 0 ? undefined : body.slice(equals + 1)
  const handler = Object.hasOwn(flagHandlers, name) ? flagHandlers[name] : undefined
  return handler === undefined
    ? Either.left(cliError(`Unknown flag: --${name}`))
    : Either.right([handler, inline] as const)
}

const applyFlags = (args: CliArgs, tokens: ReadonlyArray<string>): Either.Either<CliArgs, CliError> => {
  const [token, ...rest] = tokens
  if (token === undefined) {
    return Either.right(args)
  }
  if (!isFlag(token)) {
    return Either.left(cliError(`Unexpected positional argument: ${token}`))
  }
  return Either.flatMap(
    Either.flatMap(handlerFor(token), ([handler, inline]) => handler(args, inline, rest)),
    (next) => applyFlags(next.args, next.rest)
  )
}

/**
 * Parse `process.argv` into CliArgs. The first argument after the script is
 * the command when it is not a flag; `format` is assumed otherwise.
 *
 * @pure true
 * @invariant the first failing argument decides the CliError
 * @complexity O(n)
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): Either.Either<CliArgs, CliError> => {
  const [first, ...rest] = argv.slice(2)
  if (first === undefined || isFlag(first)) {
    return applyFlags(defaultArgs("format"), argv.slice(2))
  }
  return Either.flatMap(parseCommand(first), (command) => applyFlags(defaultArgs(command), rest))
}
