import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { Json } from "../../src/core/json.js"
import { ensureDoubleDomain } from "../../src/core/number-domain.js"

describe("ensureDoubleDomain", () => {
  it.effect("returns the same tree when every number is finite", () =>
    Effect.sync(() => {
      const tree: Json = { a: [1, 2.5, -0], b: { c: 1e308 } }
      const result = ensureDoubleDomain(tree)
      expect(Either.isRight(result)).toBe(true)
      if (Either.isRight(result)) {
        expect(result.right).toBe(tree)
      }
    }))

  it.effect("reports literals that overflowed to infinity", () =>
    Effect.sync(() => {
      const parsed: Json = JSON.parse("{\"ok\":1,\"big\":[0,-1e400]}")
      expect(ensureDoubleDomain(parsed)).toEqual(
        Either.left({ _tag: "NumberOutOfRange", path: "$.big[1]", value: Number.NEGATIVE_INFINITY })
      )
    }))

  it.effect("reports the first offending number in member order", () =>
    Effect.sync(() => {
      const result = ensureDoubleDomain([{ x: Number.POSITIVE_INFINITY }, Number.NEGATIVE_INFINITY])
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.path).toBe("$[0].x")
      }
    }))

  it.effect("uses bracket notation for keys that are not identifiers", () =>
    Effect.sync(() => {
      const result = ensureDoubleDomain({ "a b": Number.POSITIVE_INFINITY })
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.path).toBe("$[\"a b\"]")
      }
    }))
})
