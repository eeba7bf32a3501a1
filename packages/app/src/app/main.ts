#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Console, Effect, Logger } from "effect"

import type { AppError } from "../core/errors.js"
import { fileError, renderAppError } from "../core/errors.js"
import type { ProgramResult } from "./program.js"
import { runCli } from "./program.js"

// CHANGE: run the canonical-json CLI under the Node runtime
// WHY: stdout must carry only the result; errors and logs go to stderr
// QUOTE(TZ): "Exit code 0 on success; nonzero on parse error or serialize error, with a human-readable message on standard error"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult, or 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: stdout receives either the complete result or nothing
// COMPLEXITY: O(1)

const FAILURE_EXIT_CODE = 1

const writeStdout = (payload: string): Effect.Effect<void, AppError> =>
  Effect.async<void, AppError>((resume) => {
    process.stdout.write(payload, (error) => {
      resume(error ? Effect.fail(fileError(`Cannot write stdout: ${String(error)}`)) : Effect.void)
    })
  })

const emitResult = (result: ProgramResult): Effect.Effect<number, AppError> =>
  Effect.gen(function*(_) {
    if (result.output.length > 0) {
      yield* _(writeStdout(result.output))
    }
    yield* _(Effect.forEach(result.diagnostics, (line) => Console.error(line), { discard: true }))
    return result.exitCode
  })

const stderrLogger = Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger))

const main = Effect.gen(function*(_) {
  const exitCode = yield* _(
    runCli(process.argv).pipe(
      Effect.flatMap(emitResult),
      Effect.catchAll((error) => Effect.as(Console.error(renderAppError(error)), FAILURE_EXIT_CODE))
    )
  )
  if (exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = exitCode
      })
    )
  }
})

NodeRuntime.runMain(main.pipe(Effect.provide(NodeContext.layer), Effect.provide(stderrLogger)))
