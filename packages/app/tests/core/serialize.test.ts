import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { SerializeError } from "../../src/core/errors.js"
import type { Json } from "../../src/core/json.js"
import type { SerializeOptions } from "../../src/core/serialize.js"
import { serialize } from "../../src/core/serialize.js"

const canonical = (value: Json, options?: SerializeOptions): string => {
  const result = serialize(value, options)
  if (Either.isLeft(result)) {
    throw new Error(`unexpected ${result.left._tag} at ${result.left.path}`)
  }
  return result.right
}

const failure = (value: Json, options?: SerializeOptions): SerializeError => {
  const result = serialize(value, options)
  if (Either.isRight(result)) {
    throw new Error(`expected a failure, got ${result.right}`)
  }
  return result.left
}

const sample: Json = {
  name: "widget",
  tags: ["b", "a"],
  size: { width: 1.5, height: 2e-7, depth: 1e21 },
  active: true,
  parent: null,
  "label ü": "naïve"
}

describe("serialize", () => {
  it.effect("renders scalars", () =>
    Effect.sync(() => {
      expect(canonical(null)).toBe("null")
      expect(canonical(true)).toBe("true")
      expect(canonical(false)).toBe("false")
      expect(canonical(1e21)).toBe("1e+21")
      expect(canonical(-0)).toBe("0")
      expect(canonical("we ❤ json")).toBe("\"we \\u2764 json\"")
    }))

  it.effect("sorts object members and keeps array order", () =>
    Effect.sync(() => {
      expect(canonical({ a: "a", id: "1", b: "b" })).toBe("{\"a\":\"a\",\"b\":\"b\",\"id\":\"1\"}")
      expect(canonical(["one", "two", "three"])).toBe("[\"one\",\"two\",\"three\"]")
    }))

  it.effect("renders empty containers", () =>
    Effect.sync(() => {
      expect(canonical([])).toBe("[]")
      expect(canonical({})).toBe("{}")
      expect(canonical([[], {}, [{}]])).toBe("[[],{},[{}]]")
    }))

  it.effect("renders nested structures without whitespace", () =>
    Effect.sync(() => {
      expect(canonical(sample)).toBe(
        "{\"active\":true,\"label \\u00fc\":\"na\\u00efve\",\"name\":\"widget\",\"parent\":null," +
          "\"size\":{\"depth\":1e+21,\"height\":2e-7,\"width\":1.5},\"tags\":[\"b\",\"a\"]}"
      )
    }))

  it.effect("is deterministic under key insertion order", () =>
    Effect.sync(() => {
      const first = { x: 1, y: { b: [1, 2], a: "z" } }
      const second = { y: { a: "z", b: [1, 2] }, x: 1 }
      expect(canonical(first)).toBe(canonical(second))
    }))

  it.effect("is idempotent over its own output", () =>
    Effect.sync(() => {
      const once = canonical(sample)
      const reparsed: Json = JSON.parse(once)
      expect(canonical(reparsed)).toBe(once)
    }))

  it.effect("round-trips through JSON.parse", () =>
    Effect.sync(() => {
      const value = { n: [0.1, -3, 5e-324, 1.7976931348623157e308], s: "😀\u0000\"", o: { k: false } }
      expect(JSON.parse(canonical(value))).toEqual(value)
    }))

  it.effect("serializes shared acyclic sub-trees at every occurrence", () =>
    Effect.sync(() => {
      const shared = { x: 1 }
      expect(canonical([shared, { y: shared }])).toBe("[{\"x\":1},{\"y\":{\"x\":1}}]")
    }))

  it.effect("handles nesting far deeper than the call stack", () =>
    Effect.sync(() => {
      const depth = 100_000
      let value: Json = 0
      for (let level = 0; level < depth; level++) {
        value = level % 2 === 0 ? [value] : { k: value }
      }
      const text = canonical(value)
      expect(text.length).toBe(depth * 2 + 1 + (depth / 2) * 4)
      expect(text.startsWith("{\"k\":[{\"k\":[")).toBe(true)
      expect(text.includes("[{\"k\":[0]}]")).toBe(true)
      expect(text.endsWith("]}]}")).toBe(true)
    }))
})

describe("serialize failures", () => {
  it.effect("reports non-finite numbers with their path", () =>
    Effect.sync(() => {
      const error = failure({ a: [1, Number.NaN] })
      expect(error._tag).toBe("NonFiniteNumber")
      expect(error.path).toBe("$.a[1]")
      expect(failure(Number.NaN)).toEqual({ _tag: "NonFiniteNumber", path: "$", value: Number.NaN })
    }))

  it.effect("reports lone surrogates in values and keys", () =>
    Effect.sync(() => {
      expect(failure(["ok", "x\ud800"])).toEqual({
        _tag: "InvalidSurrogate",
        path: "$[1]",
        index: 1,
        codeUnit: 0xd800
      })
      expect(failure({ "\udc00": 1 })).toEqual({
        _tag: "InvalidSurrogate",
        path: "$[\"\\udc00\"]",
        index: 0,
        codeUnit: 0xdc00
      })
    }))

  it.effect("fails on the first error in canonical order", () =>
    Effect.sync(() => {
      const error = failure({ z: Number.POSITIVE_INFINITY, a: "\ud800" })
      expect(error._tag).toBe("InvalidSurrogate")
      expect(error.path).toBe("$.a")
    }))

  it.effect("enforces maxDepth on containers only", () =>
    Effect.sync(() => {
      expect(canonical(7, { maxDepth: 1 })).toBe("7")
      expect(canonical([[1]], { maxDepth: 2 })).toBe("[[1]]")
      expect(failure([[1]], { maxDepth: 1 })).toEqual({
        _tag: "NestingTooDeep",
        path: "$[0]",
        depth: 2,
        maxDepth: 1
      })
    }))

  it.effect("detects cycles instead of looping", () =>
    Effect.sync(() => {
      const loop: Array<Json> = [1]
      const holder: Record<string, Json> = { list: loop }
      loop.push(holder)
      expect(failure(holder)).toEqual({ _tag: "CyclicValue", path: "$.list[1]" })
    }))
})
