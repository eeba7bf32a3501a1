import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { JsonObject } from "../../src/core/json.js"
import { compareKeys, orderEntries } from "../../src/core/keys.js"

const orderedKeys = (value: JsonObject): ReadonlyArray<string> => orderEntries(value).map(([key]) => key)

describe("orderEntries", () => {
  it.effect("sorts keys ascending", () =>
    Effect.sync(() => {
      expect(orderEntries({ a: "a", id: "1", b: "b" })).toEqual([
        ["a", "a"],
        ["b", "b"],
        ["id", "1"]
      ])
    }))

  it.effect("puts a strict prefix before its extensions", () =>
    Effect.sync(() => {
      expect(orderedKeys({ abc: 1, a: 2, ab: 3 })).toEqual(["a", "ab", "abc"])
    }))

  it.effect("orders by code unit, so uppercase precedes lowercase", () =>
    Effect.sync(() => {
      expect(orderedKeys({ b: 1, B: 2, a: 3, _: 4 })).toEqual(["B", "_", "a", "b"])
    }))

  it.effect("compares integer-like keys as strings", () =>
    Effect.sync(() => {
      expect(orderedKeys({ a: 1, 9: 2, 10: 3 })).toEqual(["10", "9", "a"])
    }))

  it.effect("leaves the input object untouched", () =>
    Effect.sync(() => {
      const input = { z: 1, y: 2 }
      orderEntries(input)
      expect(Object.keys(input)).toEqual(["z", "y"])
    }))
})

describe("compareKeys", () => {
  it.effect("uses UTF-16 code units rather than code points", () =>
    Effect.sync(() => {
      // U+1F600 is 😀, which sorts below U+FB01 by code unit but above it by code point
      expect(compareKeys("\u{1F600}", "ﬁ")).toBeLessThan(0)
      expect(orderedKeys({ "ﬁ": 1, "\u{1F600}": 2 })).toEqual(["\u{1F600}", "ﬁ"])
    }))

  it.effect("returns zero only for identical keys", () =>
    Effect.sync(() => {
      expect(compareKeys("same", "same")).toBe(0)
      expect(compareKeys("b", "a")).toBe(1)
      expect(compareKeys("a", "b")).toBe(-1)
    }))
})
