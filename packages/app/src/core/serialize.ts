import * as Either from "effect/Either"

import type { SerializeError } from "./errors.js"
import { atPath, cyclicValue, nestingTooDeep } from "./errors.js"
import type { Json, JsonArray, JsonObject } from "./json.js"
import { indexPath, isJsonArray, memberPath } from "./json.js"
import type { JsonEntry } from "./keys.js"
import { orderEntries } from "./keys.js"
import { canonicalizeNumber } from "./number.js"
import { escapeString } from "./string.js"

// CHANGE: emit canonical JSON with an explicit work stack instead of recursion
// WHY: nesting depth must not be limited by the call stack, and cycles must fail instead of looping
// QUOTE(TZ): "restructuring the Emitter as an explicit work-stack traversal ... eliminating reliance on call-stack depth"
// REF: req-emitter-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: serialize(v) = Right(s) → s ∈ L(canonical grammar) ∧ s contains no whitespace token
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Left(e) is returned without any partial output
// COMPLEXITY: O(n log n) where n = total node count (key sorting dominates)

export interface SerializeOptions {
  readonly maxDepth?: number
}

interface ArrayFrame {
  readonly _tag: "ArrayFrame"
  readonly source: JsonArray
  index: number
}

interface ObjectFrame {
  readonly _tag: "ObjectFrame"
  readonly source: JsonObject
  readonly entries: ReadonlyArray<JsonEntry>
  index: number
}

type Frame = ArrayFrame | ObjectFrame

const done: Either.Either<void> = Either.right(undefined)

interface Walk {
  readonly out: Array<string>
  readonly stack: Array<Frame>
  readonly open: Set<object>
  readonly maxDepth: number
}

// Every open frame has already advanced past the child being emitted, so the
// stack spells out the path of that child; it is only rendered on failure.
const currentPath = (walk: Walk): string =>
  walk.stack.reduce((path, frame) => {
    const position = frame.index - 1
    if (frame._tag === "ArrayFrame") {
      return indexPath(path, position)
    }
    const entry = frame.entries[position]
    return entry === undefined ? path : memberPath(path, entry[0])
  }, "$")

const openContainer = (
  walk: Walk,
  value: JsonArray | JsonObject
): Either.Either<void, SerializeError> => {
  if (walk.open.has(value)) {
    return Either.left(cyclicValue(currentPath(walk)))
  }
  const depth = walk.stack.length + 1
  if (depth > walk.maxDepth) {
    return Either.left(nestingTooDeep(currentPath(walk), depth, walk.maxDepth))
  }
  walk.open.add(value)
  if (isJsonArray(value)) {
    walk.out.push("[")
    walk.stack.push({ _tag: "ArrayFrame", source: value, index: 0 })
  } else {
    walk.out.push("{")
    walk.stack.push({ _tag: "ObjectFrame", source: value, entries: orderEntries(value), index: 0 })
  }
  return done
}

const emitValue = (walk: Walk, value: Json): Either.Either<void, SerializeError> => {
  if (value === null) {
    walk.out.push("null")
    return done
  }
  switch (typeof value) {
    case "boolean": {
      walk.out.push(value ? "true" : "false")
      return done
    }
    case "number": {
      return Either.match(canonicalizeNumber(value), {
        onLeft: (error) => Either.left(atPath(error, currentPath(walk))),
        onRight: (text) => {
          walk.out.push(text)
          return done
        }
      })
    }
    case "string": {
      return Either.match(escapeString(value), {
        onLeft: (error) => Either.left(atPath(error, currentPath(walk))),
        onRight: (text) => {
          walk.out.push(text)
          return done
        }
      })
    }
    default: {
      return openContainer(walk, value)
    }
  }
}

const closeFrame = (walk: Walk, frame: Frame): void => {
  walk.out.push(frame._tag === "ArrayFrame" ? "]" : "}")
  walk.stack.pop()
  walk.open.delete(frame.source)
}

const stepArray = (walk: Walk, frame: ArrayFrame): Either.Either<void, SerializeError> => {
  const index = frame.index
  if (index >= frame.source.length) {
    closeFrame(walk, frame)
    return done
  }
  frame.index = index + 1
  if (index > 0) {
    walk.out.push(",")
  }
  return emitValue(walk, frame.source[index] ?? null)
}

const stepObject = (walk: Walk, frame: ObjectFrame): Either.Either<void, SerializeError> => {
  const index = frame.index
  const entry = frame.entries[index]
  if (entry === undefined) {
    closeFrame(walk, frame)
    return done
  }
  frame.index = index + 1
  const [key, item] = entry
  const escapedKey = escapeString(key)
  if (Either.isLeft(escapedKey)) {
    return Either.left(atPath(escapedKey.left, currentPath(walk)))
  }
  if (index > 0) {
    walk.out.push(",")
  }
  walk.out.push(escapedKey.right, ":")
  return emitValue(walk, item)
}

/**
 * Serialize a JSON value tree to canonical JSON text.
 *
 * @param value - Root of a read-only JSON tree.
 * @param options - Optional nesting bound; the root container has depth 1.
 * @returns Canonical text, or the first SerializeError met in document order.
 *
 * @pure true
 * @invariant identical inputs (modulo key insertion order) yield identical text
 * @complexity O(n log n)
 */
export const serialize = (
  value: Json,
  options: SerializeOptions = {}
): Either.Either<string, SerializeError> => {
  const walk: Walk = {
    out: [],
    stack: [],
    open: new Set(),
    maxDepth: options.maxDepth ?? Number.POSITIVE_INFINITY
  }
  const root = emitValue(walk, value)
  if (Either.isLeft(root)) {
    return Either.left(root.left)
  }
  let frame = walk.stack.at(-1)
  while (frame !== undefined) {
    const step = frame._tag === "ArrayFrame" ? stepArray(walk, frame) : stepObject(walk, frame)
    if (Either.isLeft(step)) {
      return Either.left(step.left)
    }
    frame = walk.stack.at(-1)
  }
  return Either.right(walk.out.join(""))
}
