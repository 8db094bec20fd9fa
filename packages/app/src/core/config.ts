import * as Either from "effect/Either"

import type { CliArgs, CliError } from "./cli.js"
import { parseDepth } from "./cli.js"
import { DEFAULT_MAX_DEPTH } from "./parse.js"
import type { ParseOptions } from "./parse.js"
import type { Shape } from "./shape.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override the environment and defaults deterministically
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, env).k = cli.k ?? env.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth ≥ 1
// COMPLEXITY: O(1)

export const MAX_DEPTH_ENV = "JSON_TREE_MAX_DEPTH"

export interface EnvConfig {
  readonly maxDepth?: string
}

export interface ResolvedConfig {
  readonly command: CliArgs["command"]
  readonly input: string
  readonly multi: boolean
  readonly shape: Shape | undefined
  readonly verbose: boolean
  readonly parseOptions: Required<ParseOptions>
}

const resolveMaxDepth = (cli: CliArgs, env: EnvConfig): Either.Either<number, CliError> => {
  if (cli.maxDepth !== undefined) {
    return Either.right(cli.maxDepth)
  }
  if (env.maxDepth !== undefined && env.maxDepth.trim().length > 0) {
    return parseDepth(env.maxDepth.trim())
  }
  return Either.right(DEFAULT_MAX_DEPTH)
}

/**
 * Read the settings this tool understands from an environment map.
 *
 * @pure true
 */
export const readEnvConfig = (env: Readonly<Record<string, string | undefined>>): EnvConfig => {
  const maxDepth = env[MAX_DEPTH_ENV]
  return maxDepth === undefined ? {} : { maxDepth }
}

/**
 * Resolve the effective config from CLI flags, environment, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param env - Settings read from the environment.
 * @returns Resolved configuration, or a CliError for a malformed environment value.
 *
 * @pure true
 * @invariant parseOptions.maxDepth ≥ 1
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  env: EnvConfig
): Either.Either<ResolvedConfig, CliError> =>
  Either.map(resolveMaxDepth(cli, env), (maxDepth) => ({
    command: cli.command,
    input: cli.input,
    multi: cli.multi,
    shape: cli.shape,
    verbose: cli.verbose,
    parseOptions: { maxDepth }
  }))
