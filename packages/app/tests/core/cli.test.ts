import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { parseCliArgs, parseDepth, parseShape } from "../../src/core/cli.js"
import { hasShape } from "../../src/core/shape.js"
import { emptyObject } from "../../src/core/value.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-tree", ...args]

const parsed = (...args: ReadonlyArray<string>): CliArgs => Either.getOrThrow(parseCliArgs(argv(...args)))

const failure = (...args: ReadonlyArray<string>): string =>
  Either.match(parseCliArgs(argv(...args)), {
    onLeft: (error) => error.message,
    onRight: () => "no error"
  })

describe("parseCliArgs", () => {
  it.effect("defaults to formatting stdin", () =>
    Effect.sync(() => {
      expect(parsed()).toEqual({
        command: "format",
        input: "-",
        multi: false,
        shape: undefined,
        maxDepth: undefined,
        verbose: false
      })
    }))

  it.effect("reads the command and flags", () =>
    Effect.sync(() => {
      const args = parsed("check", "--input", "doc.json", "--multi", "--verbose")
      expect(args.command).toBe("check")
      expect(args.input).toBe("doc.json")
      expect(args.multi).toBe(true)
      expect(args.verbose).toBe(true)
    }))

  it.effect("accepts inline values and a dash for stdin", () =>
    Effect.sync(() => {
      expect(parsed("--shape=id:Integer,name:String").shape).toEqual({ id: "Integer", name: "String" })
      expect(parsed("--max-depth=16").maxDepth).toBe(16)
      expect(parsed("--input", "-").input).toBe("-")
    }))

  it.effect("rejects unknown commands, flags and positionals", () =>
    Effect.sync(() => {
      expect(failure("lint")).toBe("Unknown command: lint")
      expect(failure("--bogus")).toBe("Unknown flag: --bogus")
      expect(failure("--toString")).toBe("Unknown flag: --toString")
      expect(failure("-x")).toBe("Unknown flag: -x")
      expect(failure("format", "extra")).toBe("Unexpected positional argument: extra")
    }))

  it.effect("requires values for value flags", () =>
    Effect.sync(() => {
      expect(failure("--input")).toBe("Missing value for --input")
      expect(failure("--shape", "--multi")).toBe("Missing value for --shape")
      expect(failure("--multi=yes")).toBe("Flag --multi takes no value")
    }))

  it.effect("rejects bad depth and shape values", () =>
    Effect.sync(() => {
      expect(failure("--max-depth", "0")).toBe("Invalid depth: 0")
      expect(failure("--max-depth", "1000000")).toBe("Depth 1000000 exceeds the maximum of 2000")
      expect(failure("--shape", "id:Float")).toBe("Unknown tag in shape entry id:Float: Float")
      expect(failure("--shape", "id")).toBe("Invalid shape entry: id (expected name:Tag)")
    }))
})

describe("parseDepth", () => {
  it.effect("accepts positive integers only", () =>
    Effect.sync(() => {
      expect(parseDepth("200")).toEqual(Either.right(200))
      expect(parseDepth("2000")).toEqual(Either.right(2000))
      expect(Either.isLeft(parseDepth("2001"))).toBe(true)
      expect(Either.isLeft(parseDepth("-1"))).toBe(true)
      expect(Either.isLeft(parseDepth("1.5"))).toBe(true)
      expect(Either.isLeft(parseDepth(""))).toBe(true)
    }))
})

describe("parseShape", () => {
  it.effect("lets a later entry win and splits on the last colon", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseShape("a:Integer, a:Number"))).toEqual({ a: "Number" })
      expect(Either.getOrThrow(parseShape("ns:key:Bool"))).toEqual({ "ns:key": "Bool" })
    }))

  it.effect("keeps names that collide with Object.prototype as fields", () =>
    Effect.sync(() => {
      const shape = Either.getOrThrow(parseShape("__proto__:Integer"))
      expect(Object.keys(shape)).toEqual(["__proto__"])
      const checked = hasShape(emptyObject, shape)
      expect(Either.isLeft(checked) && checked.left.reason).toBe("MissingField")
    }))

  it.effect("rejects an empty list", () =>
    Effect.sync(() => {
      expect(Either.isLeft(parseShape(" , "))).toBe(true)
    }))
})
