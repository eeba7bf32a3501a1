import { NodeStream } from "@effect/platform-node"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { AppError } from "../core/errors.js"
import { fileError, parseError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { isJsonValue } from "../core/json.js"

// CHANGE: read JSON text from a file or stdin and hand it to the schema parser
// WHY: parsing is an external collaborator; the core only ever sees a Json tree
// QUOTE(TZ): "reads JSON text from a file path argument or standard input, hands it to the external parser"
// REF: req-input-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parse(t) = Right(v) → v ∈ Json
// PURITY: SHELL
// EFFECT: Effect<InputText, AppError, FileSystem>
// INVARIANT: the parsed tree is narrowed to Json in place, without a copy
// COMPLEXITY: O(n)

export interface InputText {
  readonly source: string
  readonly text: string
}

// Objects come back as JSON.parse built them, so an own "__proto__" member survives.
const JsonTextSchema = Schema.parseJson()

export const parseJsonText = (input: InputText): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonTextSchema)(input.text),
    Effect.mapError((error) => parseError(input.source, TreeFormatter.formatErrorSync(error))),
    Effect.filterOrFail(isJsonValue, () => parseError(input.source, "Expected a JSON value"))
  )

/**
 * Collect all of process.stdin as UTF-8 text.
 *
 * @pure false
 * @effect reads process.stdin until end
 * @complexity O(n)
 */
export const readProcessStdin: Effect.Effect<string, AppError> = NodeStream.toString(() => process.stdin, {
  onFailure: (error) => fileError(`Cannot read stdin: ${String(error)}`)
})

export const readInputFile = (
  path: string
): Effect.Effect<InputText, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const text = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return { source: path, text }
  })

export const readInputStdin = (
  readStdin: Effect.Effect<string, AppError>
): Effect.Effect<InputText, AppError> =>
  Effect.map(readStdin, (text) => ({ source: "<stdin>", text }))
