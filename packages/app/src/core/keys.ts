import type { Json, JsonObject } from "./json.js"

// CHANGE: order object members by UTF-16 code units
// WHY: insertion order is insignificant, so output must not depend on it
// QUOTE(TZ): "Comparison is performed over the keys' Unicode code-unit sequence (UTF-16 code unit order)"
// REF: req-keys-1
// SOURCE: n/a
// FORMAT THEOREM: ∀i < j: compareKeys(keys[i], keys[j]) < 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a strict prefix sorts before every extension of it
// COMPLEXITY: O(n log n)

export type JsonEntry = readonly [key: string, value: Json]

/**
 * Compare two keys by UTF-16 code units; the relational operators on strings
 * already implement this order.
 *
 * @pure true
 * @complexity O(min(|left|, |right|))
 */
export const compareKeys = (left: string, right: string): number => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

/**
 * List an object's own members in canonical order.
 *
 * @param value - Object with unique keys.
 * @returns New array of [key, value] pairs; the input is not touched.
 *
 * @pure true
 * @invariant result keys are strictly increasing
 * @complexity O(n log n)
 */
export const orderEntries = (value: JsonObject): ReadonlyArray<JsonEntry> =>
  Object.entries(value).toSorted(([left], [right]) => compareKeys(left, right))
