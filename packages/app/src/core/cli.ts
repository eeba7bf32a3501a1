import { Match } from "effect"
import * as Either from "effect/Either"

import type { DigestAlgorithm } from "./config.js"
import { parseDigestAlgorithm, parseMaxDepth } from "./config.js"

// CHANGE: implement deterministic CLI parsing for canonical-json
// WHY: the command and the serializer limits are decided before any I/O
// QUOTE(TZ): "reads JSON text from a file path argument or standard input"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "print" | "check" | "digest"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly maxDepth: number | undefined
  readonly algorithm: DigestAlgorithm | undefined
  readonly verbose: boolean
  readonly help: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const usage = [
  "Usage: canonical-json [print|check|digest] [file|-] [options]",
  "",
  "Commands:",
  "  print    write the canonical form of the input to stdout (default)",
  "  check    exit 0 when the input is already canonical, 2 otherwise",
  "  digest   write the hex digest of the canonical form",
  "",
  "Options:",
  "  --config <path>      config file (default ./.canonical-json.json)",
  "  --max-depth <n>      fail when containers nest deeper than n",
  "  --algorithm <name>   digest algorithm: sha256, sha384 or sha512",
  "  --verbose            log each step to stderr",
  "  --help               show this message"
].join("\n")

const STDIN_MARKER = "-"

const isFlag = (value: string): boolean => value.startsWith("-") && value !== STDIN_MARKER

const parseCommand = (value: string): CliCommand | undefined =>
  Match.value(value).pipe(
    Match.when("print", (): CliCommand => "print"),
    Match.when("check", (): CliCommand => "check"),
    Match.when("digest", (): CliCommand => "digest"),
    Match.orElse(() => undefined)
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: undefined,
  configPath: undefined,
  configPathExplicit: false,
  maxDepth: undefined,
  algorithm: undefined,
  verbose: false,
  help: false
})

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, string>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw): Either.Either<ParsedFlag, CliError> =>
    Either.match(decode(raw), {
      onLeft: (message) => Either.left(cliError(`Invalid --${flagName} value: ${message}`)),
      onRight: (value) =>
        Either.right({
          next: update(current, value),
          consumed: inlineValue === undefined ? 2 : 1
        })
    }))

const switchFlag = (
  flagName: string,
  inlineValue: string | undefined,
  next: CliArgs
): Either.Either<ParsedFlag, CliError> =>
  inlineValue === undefined
    ? Either.right({ next, consumed: 1 })
    : Either.left(cliError(`Flag --${flagName} does not take a value`))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  verbose: (current, inlineValue) => switchFlag("verbose", inlineValue, { ...current, verbose: true }),
  help: (current, inlineValue) => switchFlag("help", inlineValue, { ...current, help: true }),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (value) => Either.right(value), (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, parseMaxDepth, (args, value) => ({
      ...args,
      maxDepth: value
    })),
  algorithm: (current, inlineValue, nextValue) =>
    parseValueFlag("algorithm", current, inlineValue, nextValue, parseDigestAlgorithm, (args, value) => ({
      ...args,
      algorithm: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parsePositional = (value: string, current: CliArgs): Either.Either<CliArgs, CliError> =>
  current.input === undefined
    ? Either.right({ ...current, input: value })
    : Either.left(cliError(`Unexpected positional argument: ${value}`))

const parseRest = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (isFlag(current)) {
      const parsed = parseFlag(current, rawArgs[index + 1], args)
      if (Either.isLeft(parsed)) {
        return Either.left(parsed.left)
      }
      args = parsed.right.next
      index += parsed.right.consumed
    } else {
      const positional = parsePositional(current, args)
      if (Either.isLeft(positional)) {
        return Either.left(positional.left)
      }
      args = positional.right
      index += 1
    }
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to print; a leading non-command word is the input path
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  const command = first === undefined ? undefined : parseCommand(first)
  return command === undefined
    ? parseRest(rawArgs, 0, defaultArgs("print"))
    : parseRest(rawArgs, 1, defaultArgs(command))
}

/**
 * Whether the parsed input refers to standard input.
 *
 * @pure true
 * @complexity O(1)
 */
export const readsStdin = (cli: CliArgs): boolean => cli.input === undefined || cli.input === STDIN_MARKER
