import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for canonicalization and the CLI around it
// WHY: provide typed failures for fail-fast serialization and exit codes
// QUOTE(TZ): "the first error encountered anywhere in the tree aborts the entire operation"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type NonFiniteNumber = {
  readonly _tag: "NonFiniteNumber"
  readonly path: string
  readonly value: number
}
export type InvalidSurrogate = {
  readonly _tag: "InvalidSurrogate"
  readonly path: string
  readonly index: number
  readonly codeUnit: number
}
export type NestingTooDeep = {
  readonly _tag: "NestingTooDeep"
  readonly path: string
  readonly depth: number
  readonly maxDepth: number
}
export type CyclicValue = { readonly _tag: "CyclicValue"; readonly path: string }
export type NumberOutOfRange = {
  readonly _tag: "NumberOutOfRange"
  readonly path: string
  readonly value: number
}

export type SerializeError = NonFiniteNumber | InvalidSurrogate | NestingTooDeep | CyclicValue

export type ParseError = { readonly _tag: "ParseError"; readonly source: string; readonly error: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }

export type AppError =
  | SerializeError
  | NumberOutOfRange
  | CliError
  | ParseError
  | FileError
  | ConfigError

export const nonFiniteNumber = (value: number, path = "$"): NonFiniteNumber => ({
  _tag: "NonFiniteNumber",
  path,
  value
})

export const invalidSurrogate = (index: number, codeUnit: number, path = "$"): InvalidSurrogate => ({
  _tag: "InvalidSurrogate",
  path,
  index,
  codeUnit
})

export const nestingTooDeep = (path: string, depth: number, maxDepth: number): NestingTooDeep => ({
  _tag: "NestingTooDeep",
  path,
  depth,
  maxDepth
})

export const cyclicValue = (path: string): CyclicValue => ({
  _tag: "CyclicValue",
  path
})

export const numberOutOfRange = (value: number, path = "$"): NumberOutOfRange => ({
  _tag: "NumberOutOfRange",
  path,
  value
})

export const parseError = (source: string, error: string): ParseError => ({
  _tag: "ParseError",
  source,
  error
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

/**
 * Re-anchor an error raised by a leaf formatter at the path of the value it came from.
 *
 * @pure true
 * @complexity O(1)
 */
export const atPath = <E extends SerializeError>(error: E, path: string): E => ({ ...error, path })

const hex4 = (codeUnit: number): string => codeUnit.toString(16).padStart(4, "0")

/**
 * Render an AppError as a single human-readable line for stderr.
 *
 * @param error - Any failure raised by the core or the shell.
 * @returns Message without trailing newline.
 *
 * @pure true
 * @invariant every tag has exactly one rendering
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tagsExhaustive({
      NonFiniteNumber: (value) => `Non-finite number ${String(value.value)} at ${value.path}`,
      InvalidSurrogate: (value) =>
        `Unpaired surrogate \\u${hex4(value.codeUnit)} at index ${value.index} in string at ${value.path}`,
      NestingTooDeep: (value) =>
        `Nesting depth ${value.depth} exceeds maximum ${value.maxDepth} at ${value.path}`,
      CyclicValue: (value) => `Cyclic reference at ${value.path}`,
      NumberOutOfRange: (value) => `Number out of range at ${value.path}`,
      CliError: (value) => value.message,
      ParseError: (value) => `Invalid JSON in ${value.source}: ${value.error}`,
      FileError: (value) => value.message,
      ConfigError: (value) => `Invalid config: ${value.message}`
    })
  )
