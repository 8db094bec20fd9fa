import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel } from "effect"
import type * as Either from "effect/Either"

import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { readEnvConfig, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import type { Outcome } from "../core/report.js"
import { evaluate, exitCodeOf, renderOutcome } from "../core/report.js"
import { readInput } from "../shell/input.js"

// CHANGE: read one input, evaluate it and print the rendered outcome
// WHY: the core decides lines and exit codes; this layer only sequences IO
// QUOTE(TZ): n/a
// REF: req-program-json-tree
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: runCli(argv) = Right(r) → r.exitCode = exitCodeOf(r.outcome)
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: stdout is written at most once per run
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly outcome: Outcome
  readonly lines: ReadonlyArray<string>
  readonly exitCode: number
}

export interface RunOptions {
  readonly env?: Readonly<Record<string, string | undefined>>
  readonly silent?: boolean
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitLines = (lines: ReadonlyArray<string>, silent: boolean): Effect.Effect<void> =>
  silent || lines.length === 0 ? Effect.void : writeStdout(lines.join("\n"))

const runWithConfig = (
  config: ResolvedConfig,
  silent: boolean
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    yield* _(Effect.logDebug(`reading ${config.input === "-" ? "stdin" : config.input}`))
    const text = yield* _(readInput(config.input))
    yield* _(Effect.logDebug(`read ${text.length} characters, maxDepth=${config.parseOptions.maxDepth}`))
    const outcome = evaluate(text, config)
    yield* _(Effect.logDebug(`outcome ${outcome._tag} with ${outcome.values.length} document(s)`))
    const lines = renderOutcome(outcome, config.command)
    yield* _(emitLines(lines, silent))
    return { outcome, lines, exitCode: exitCodeOf(outcome) }
  })

/**
 * Parse argv, resolve settings against the environment, then format or check
 * the input document(s).
 *
 * @param argv - Full process argv; the first two entries are skipped.
 * @param options - Environment override and output suppression, mainly for tests.
 *
 * @pure false
 * @effect FileSystem, stdin, stdout
 * @invariant usage and IO problems fail the effect; document problems only set exitCode
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  options: RunOptions = {}
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const env = options.env ?? process.env
    const config = yield* _(fromEither(resolveConfig(cli, readEnvConfig(env))))
    const level = config.verbose ? LogLevel.Debug : LogLevel.Info
    return yield* _(
      runWithConfig(config, options.silent ?? false).pipe(Logger.withMinimumLogLevel(level))
    )
  })
