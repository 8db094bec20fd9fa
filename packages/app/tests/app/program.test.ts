import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { runCli } from "../../src/app/program.js"
import { MAX_DEPTH_ENV } from "../../src/core/config.js"
import { provideNodeContext, withWorkspace } from "./test-helpers.js"

const cli = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-tree", ...args]

describe("runCli", () => {
  it.effect("formats a document read from a file", () =>
    withWorkspace(({ writeDocument }) =>
      Effect.gen(function*(_) {
        const input = yield* _(writeDocument("doc.json", `{"b": [1, 2.5, "x"], "a": null}\n`))
        const result = yield* _(runCli(cli("--input", input), { silent: true, env: {} }))

        expect(result.exitCode).toBe(0)
        expect(result.lines).toEqual([`Result: {"a": null, "b": [1, 2.5, "x"]}`])
      })
    ).pipe(provideNodeContext))

  it.effect("formats every document in multi mode", () =>
    withWorkspace(({ writeDocument }) =>
      Effect.gen(function*(_) {
        const input = yield* _(writeDocument("stream.json", "1 [true]\n{}"))
        const result = yield* _(runCli(cli("format", "--multi", "--input", input), { silent: true, env: {} }))

        expect(result.exitCode).toBe(0)
        expect(result.lines).toEqual(["Result: 1", "Result: [true]", "Result: {}"])
      })
    ).pipe(provideNodeContext))

  it.effect("exits with 2 when a document misses a field", () =>
    withWorkspace(({ writeDocument }) =>
      Effect.gen(function*(_) {
        const input = yield* _(writeDocument("user.json", `{"id": 7}`))
        const argv = cli("check", "--input", input, "--shape", "id:Integer,name:String")
        const result = yield* _(runCli(argv, { silent: true, env: {} }))

        expect(result.exitCode).toBe(2)
        expect(result.lines).toEqual([`Failed: missing field name in {"id": 7}`])
      })
    ).pipe(provideNodeContext))

  it.effect("takes the depth limit from the environment", () =>
    withWorkspace(({ writeDocument }) =>
      Effect.gen(function*(_) {
        const input = yield* _(writeDocument("deep.json", "[[1]]"))
        const result = yield* _(runCli(cli("--input", input), { silent: true, env: { [MAX_DEPTH_ENV]: "1" } }))

        expect(result.exitCode).toBe(1)
        expect(result.lines).toEqual(["Failed: exceeded maximum nesting depth"])
      })
    ).pipe(provideNodeContext))

  it.effect("lets the depth flag override the environment", () =>
    withWorkspace(({ writeDocument }) =>
      Effect.gen(function*(_) {
        const input = yield* _(writeDocument("deep.json", "[[1]]"))
        const argv = cli("--input", input, "--max-depth", "2")
        const result = yield* _(runCli(argv, { silent: true, env: { [MAX_DEPTH_ENV]: "1" } }))

        expect(result.exitCode).toBe(0)
      })
    ).pipe(provideNodeContext))

  it.effect("fails with a FileError for a missing input", () =>
    withWorkspace(({ resolve }) =>
      Effect.gen(function*(_) {
        const missing = resolve("absent.json")
        const result = yield* _(Effect.either(runCli(cli("--input", missing), { silent: true, env: {} })))

        expect(result).toEqual(Either.left({ _tag: "FileError", message: `Input file not found: ${missing}` }))
      })
    ).pipe(provideNodeContext))

  it.effect("fails with a CliError for bad arguments", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(runCli(cli("--bogus"), { silent: true, env: {} })))

      expect(result).toEqual(Either.left({ _tag: "CliError", message: "Unknown flag: --bogus" }))
    }).pipe(provideNodeContext))
})
