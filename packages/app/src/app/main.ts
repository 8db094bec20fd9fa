#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Console, Effect, Match } from "effect"

import type { AppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: run the CLI on the Node runtime and map failures to exit codes
// WHY: usage and IO errors end the process with a message instead of a defect trace
// QUOTE(TZ): n/a
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: exitCode ∈ {0, 1, 2, 64, 66}
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError is reported on stderr exactly once
// COMPLEXITY: O(1)

const USAGE = "usage: json-tree [format|check] [--input <path|->] [--multi] [--shape name:Tag,...] " +
  "[--max-depth <n>] [--verbose]"

const setExitCode = (code: number): Effect.Effect<void> =>
  Effect.sync(() => {
    process.exitCode = code
  })

const reportError = (error: AppError): Effect.Effect<void> =>
  Match.value(error).pipe(
    Match.tag("CliError", (failure) =>
      Console.error(`${failure.message}\n${USAGE}`).pipe(Effect.zipRight(setExitCode(64)))),
    Match.tag("FileError", (failure) => Console.error(failure.message).pipe(Effect.zipRight(setExitCode(66)))),
    Match.exhaustive
  )

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) => result.exitCode === 0 ? Effect.void : setExitCode(result.exitCode)),
  Effect.catchAll(reportError)
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
