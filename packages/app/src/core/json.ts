// CHANGE: introduce the abstract JSON value model consumed by the canonicalizer
// WHY: any tree-producing library that yields this shape can feed serialize
// QUOTE(TZ): "designed against an abstract Value interface ... an adapter boundary, not an inheritance relationship"
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: x ∈ Null ∪ Boolean ∪ Number ∪ String ∪ Array(Json) ∪ Object(String → Json)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | JsonArray
  | JsonObject

export type JsonArray = ReadonlyArray<Json>

export type JsonObject = { readonly [key: string]: Json }

export const isJsonArray = (value: Json): value is JsonArray => Array.isArray(value)

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/u

/**
 * Extend a `$`-rooted JSON path with an array index.
 *
 * @pure true
 * @complexity O(n) where n = path length
 */
export const indexPath = (path: string, index: number): string => `${path}[${index}]`

/**
 * Extend a `$`-rooted JSON path with an object member name.
 *
 * @pure true
 * @invariant identifier keys use dot notation, all others a quoted bracket
 * @complexity O(n) where n = path length + key length
 */
export const memberPath = (path: string, key: string): string =>
  IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`

const isJsonLeaf = (value: unknown): boolean =>
  value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "string"

/**
 * Narrow a parser result to Json without rebuilding it, so own members such as
 * `__proto__` survive and nesting depth is bounded by memory only.
 *
 * @pure true
 * @invariant the value is inspected in place, never copied
 * @complexity O(n) where n = node count
 */
export const isJsonValue = (value: unknown): value is Json => {
  const pending: Array<unknown> = [value]
  const seen = new Set<object>()
  while (pending.length > 0) {
    const current = pending.pop()
    if (isJsonLeaf(current)) {
      continue
    }
    if (typeof current !== "object" || current === null) {
      return false
    }
    // shared and cyclic containers are checked once; serialize reports cycles
    if (seen.has(current)) {
      continue
    }
    seen.add(current)
    const children: ReadonlyArray<unknown> = Array.isArray(current) ? current : Object.values(current)
    for (const child of children) {
      pending.push(child)
    }
  }
  return true
}
