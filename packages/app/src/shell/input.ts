import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read the input document from a file or from stdin
// WHY: isolate IO from the pure evaluate/render core
// QUOTE(TZ): n/a
// REF: req-input-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p ≠ "-": readInput(p) = contents(p)
// PURITY: SHELL
// EFFECT: Effect<string, AppError, FileSystem>
// INVARIANT: "-" always means stdin
// COMPLEXITY: O(n)

export const STDIN_PATH = "-"

export const readStdin: Effect.Effect<string, AppError> = Effect.tryPromise({
  try: async () => {
    const chunks: Array<Buffer> = []
    for await (const chunk of process.stdin) {
      const data: unknown = chunk
      chunks.push(Buffer.isBuffer(data) ? data : Buffer.from(String(data)))
    }
    return Buffer.concat(chunks).toString("utf8")
  },
  catch: (error) => fileError(String(error))
})

const readFile = (path: string): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      return yield* _(Effect.fail(fileError(`Input file not found: ${path}`)))
    }
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

export const readInput = (path: string): Effect.Effect<string, AppError, FileSystemService> =>
  path === STDIN_PATH ? readStdin : readFile(path)
