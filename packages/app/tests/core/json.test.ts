import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { indexPath, isJsonValue, memberPath } from "../../src/core/json.js"

describe("isJsonValue", () => {
  it.effect("accepts trees produced by JSON.parse", () =>
    Effect.sync(() => {
      expect(isJsonValue(JSON.parse("{\"a\":[1,\"x\",null,true,{}]}"))).toBe(true)
      expect(isJsonValue(null)).toBe(true)
    }))

  it.effect("rejects values JSON cannot hold", () =>
    Effect.sync(() => {
      expect(isJsonValue(undefined)).toBe(false)
      expect(isJsonValue([1, undefined])).toBe(false)
      expect(isJsonValue({ a: { b: () => 1 } })).toBe(false)
      expect(isJsonValue({ n: 1n })).toBe(false)
    }))

  it.effect("keeps an own __proto__ member visible", () =>
    Effect.sync(() => {
      const parsed: unknown = JSON.parse("{\"__proto__\":{\"x\":1},\"a\":2}")
      expect(isJsonValue(parsed)).toBe(true)
      if (isJsonValue(parsed) && typeof parsed === "object" && parsed !== null) {
        expect(Object.keys(parsed)).toEqual(["__proto__", "a"])
      }
    }))

  it.effect("walks nesting deeper than the call stack", () =>
    Effect.sync(() => {
      const depth = 100_000
      const parsed: unknown = JSON.parse("[".repeat(depth) + "]".repeat(depth))
      expect(isJsonValue(parsed)).toBe(true)
    }))
})

describe("json paths", () => {
  it.effect("uses dot notation for identifiers and brackets otherwise", () =>
    Effect.sync(() => {
      expect(memberPath("$", "name")).toBe("$.name")
      expect(memberPath("$", "__proto__")).toBe("$.__proto__")
      expect(memberPath("$", "a-b")).toBe("$[\"a-b\"]")
      expect(indexPath("$.list", 3)).toBe("$.list[3]")
    }))
})
