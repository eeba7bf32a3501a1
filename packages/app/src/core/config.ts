import * as Either from "effect/Either"

import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Priority: CLI flags > config file > defaults"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth is a positive integer or +Infinity
// COMPLEXITY: O(1)/O(1)

export const digestAlgorithms = ["sha256", "sha384", "sha512"] as const

export type DigestAlgorithm = typeof digestAlgorithms[number]

export interface FileConfig {
  readonly maxDepth?: number
  readonly algorithm?: DigestAlgorithm
}

export interface ResolvedConfig {
  readonly maxDepth: number
  readonly algorithm: DigestAlgorithm
}

export const defaultConfigPath = "./.canonical-json.json"

const isDigestAlgorithm = (value: string): value is DigestAlgorithm =>
  digestAlgorithms.some((algorithm) => algorithm === value)

export const parseDigestAlgorithm = (value: string): Either.Either<DigestAlgorithm, string> =>
  isDigestAlgorithm(value)
    ? Either.right(value)
    : Either.left(`${value} (expected one of ${digestAlgorithms.join(", ")})`)

export const parseMaxDepth = (value: string): Either.Either<number, string> =>
  /^[1-9][0-9]*$/u.test(value) && Number.isSafeInteger(Number(value))
    ? Either.right(Number(value))
    : Either.left(`${value} (expected a positive integer)`)

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .canonical-json.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant an absent maxDepth means unbounded nesting
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? Number.POSITIVE_INFINITY,
  algorithm: cli.algorithm ?? fileConfig?.algorithm ?? "sha256"
})
