import * as Either from "effect/Either"

import type { NumberOutOfRange } from "./errors.js"
import { numberOutOfRange } from "./errors.js"
import type { Json } from "./json.js"
import { indexPath, isJsonArray, isJsonObject, memberPath } from "./json.js"

// CHANGE: reject parsed trees whose number literals overflowed the double domain
// WHY: a parser maps literals such as 1e400 to ±Infinity; that is a range error, not a NaN input
// QUOTE(TZ): "an externally-supplied arbitrary-precision number literal that does not fit in the double domain"
// REF: req-number-domain-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: ensureDoubleDomain(v) = Right(v) ↔ ∀x ∈ numbers(v): isFinite(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first offending number in member iteration order is reported
// COMPLEXITY: O(n) where n = node count

interface Pending {
  readonly value: Json
  readonly path: string
}

/**
 * Check that every number in a freshly parsed tree is a finite double.
 *
 * @param value - Tree produced by a JSON parser (acyclic by construction).
 * @returns The same tree, or NumberOutOfRange with the offending path.
 *
 * @pure true
 * @complexity O(n)
 */
export const ensureDoubleDomain = (value: Json): Either.Either<Json, NumberOutOfRange> => {
  const pending: Array<Pending> = [{ value, path: "$" }]
  let next = pending.pop()
  while (next !== undefined) {
    const current = next.value
    if (typeof current === "number" && !Number.isFinite(current)) {
      return Either.left(numberOutOfRange(current, next.path))
    }
    if (isJsonArray(current)) {
      for (let index = current.length - 1; index >= 0; index--) {
        pending.push({ value: current[index] ?? null, path: indexPath(next.path, index) })
      }
    } else if (isJsonObject(current)) {
      const entries = Object.entries(current)
      for (let index = entries.length - 1; index >= 0; index--) {
        const entry = entries[index]
        if (entry !== undefined) {
          pending.push({ value: entry[1], path: memberPath(next.path, entry[0]) })
        }
      }
    }
    next = pending.pop()
  }
  return Either.right(value)
}
