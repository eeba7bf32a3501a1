import * as Either from "effect/Either"

import type { InvalidSurrogate } from "./errors.js"
import { invalidSurrogate } from "./errors.js"

// CHANGE: render strings as quoted, fully escaped ASCII-only JSON literals
// WHY: raw non-ASCII bytes and optional escapes would let equal strings serialize differently
// QUOTE(TZ): "Any code point at or above U+007F (non-ASCII) → escaped, never emitted as a raw byte"
// REF: req-string-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s without lone surrogates: JSON.parse(escape(s)) = s ∧ escape(s) ⊆ [\x20-\x7e]*
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every \u escape has exactly four lowercase hex digits
// COMPLEXITY: O(n) where n = UTF-16 length

const SHORT_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x22, "\\\""],
  [0x5c, "\\\\"],
  [0x08, "\\b"],
  [0x0c, "\\f"],
  [0x0a, "\\n"],
  [0x0d, "\\r"],
  [0x09, "\\t"]
])

const isHighSurrogate = (codeUnit: number): boolean => codeUnit >= 0xd800 && codeUnit <= 0xdbff

const isLowSurrogate = (codeUnit: number): boolean => codeUnit >= 0xdc00 && codeUnit <= 0xdfff

const isPassThrough = (codeUnit: number): boolean => codeUnit >= 0x20 && codeUnit < 0x7f

const unicodeEscape = (codeUnit: number): string => `\\u${codeUnit.toString(16).padStart(4, "0")}`

/**
 * Escape a string into its canonical quoted form.
 *
 * Supplementary-plane characters are already stored as surrogate pairs in
 * JavaScript strings, so emitting each code unit of a valid pair yields the
 * standard UTF-16 pair escape.
 *
 * @param value - String to escape.
 * @returns Quoted literal, or InvalidSurrogate at the first unpaired surrogate.
 *
 * @pure true
 * @invariant output starts and ends with a double quote
 * @complexity O(n)
 */
export const escapeString = (value: string): Either.Either<string, InvalidSurrogate> => {
  let out = "\""
  let index = 0
  while (index < value.length) {
    const codeUnit = value.charCodeAt(index)
    const short = SHORT_ESCAPES.get(codeUnit)
    if (short !== undefined) {
      out += short
      index += 1
    } else if (isPassThrough(codeUnit)) {
      out += value.charAt(index)
      index += 1
    } else if (isHighSurrogate(codeUnit)) {
      const next = value.charCodeAt(index + 1)
      if (!isLowSurrogate(next)) {
        return Either.left(invalidSurrogate(index, codeUnit))
      }
      out += unicodeEscape(codeUnit) + unicodeEscape(next)
      index += 2
    } else if (isLowSurrogate(codeUnit)) {
      return Either.left(invalidSurrogate(index, codeUnit))
    } else {
      out += unicodeEscape(codeUnit)
      index += 1
    }
  }
  return Either.right(out + "\"")
}
