import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, readsStdin, usage } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { ensureDoubleDomain } from "../core/number-domain.js"
import { serialize } from "../core/serialize.js"
import { loadConfigFile } from "../shell/config-file.js"
import { digestCanonical } from "../shell/digest.js"
import type { InputText } from "../shell/json-input.js"
import { parseJsonText, readInputFile, readInputStdin, readProcessStdin } from "../shell/json-input.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "writes the resulting canonical text to standard output with no trailing newline"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0, 2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output is complete before anything is written
// COMPLEXITY: O(n log n)

export interface ProgramResult {
  readonly output: string
  readonly diagnostics: ReadonlyArray<string>
  readonly exitCode: number
}

export const NOT_CANONICAL_EXIT_CODE = 2

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const succeed = (output: string): ProgramResult => ({ output, diagnostics: [], exitCode: 0 })

const readInput = (
  cli: CliArgs,
  readStdin: Effect.Effect<string, AppError>
): Effect.Effect<InputText, AppError, FileSystemService> =>
  cli.input === undefined || readsStdin(cli) ? readInputStdin(readStdin) : readInputFile(cli.input)

const canonicalizeInput = (
  input: InputText,
  config: ResolvedConfig
): Effect.Effect<string, AppError> =>
  Effect.gen(function*(_) {
    const parsed = yield* _(parseJsonText(input))
    yield* _(Effect.logDebug(`parsed ${input.source}`))
    const json = yield* _(fromEither(ensureDoubleDomain(parsed)))
    const canonical = yield* _(fromEither(serialize(json, { maxDepth: config.maxDepth })))
    yield* _(Effect.logDebug(`canonical form is ${canonical.length} characters`))
    return canonical
  })

const checkCanonical = (input: InputText, canonical: string): ProgramResult =>
  input.text === canonical
    ? succeed("")
    : { output: "", diagnostics: [`${input.source}: input is not canonical`], exitCode: NOT_CANONICAL_EXIT_CODE }

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig,
  input: InputText
): Effect.Effect<ProgramResult, AppError> =>
  Effect.map(canonicalizeInput(input, config), (canonical) =>
    Match.value(cli.command).pipe(
      Match.when("print", () => succeed(canonical)),
      Match.when("check", () => checkCanonical(input, canonical)),
      Match.when("digest", () => succeed(`${digestCanonical(canonical, config.algorithm)}\n`)),
      Match.exhaustive
    ))

const runParsed = (
  cli: CliArgs,
  readStdin: Effect.Effect<string, AppError>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (cli.help) {
      return succeed(`${usage}\n`)
    }
    const fileConfig = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const input = yield* _(readInput(cli, readStdin))
    yield* _(Effect.logDebug(`read ${input.text.length} characters from ${input.source}`))
    return yield* _(executeCommand(cli, config, input))
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param readStdin - Source of standard input; defaults to process.stdin.
 * @returns ProgramResult with the text to write and the exit code.
 *
 * @pure false
 * @effect FileSystem, stdin, Logger
 * @invariant nothing is written by this function; the caller emits ProgramResult
 * @complexity O(n log n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  readStdin: Effect.Effect<string, AppError> = readProcessStdin
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const level = cli.verbose ? LogLevel.Debug : LogLevel.Info
    return yield* _(runParsed(cli, readStdin).pipe(Logger.withMinimumLogLevel(level)))
  })
