import * as Either from "effect/Either"

import type { NonFiniteNumber } from "./errors.js"
import { nonFiniteNumber } from "./errors.js"

// CHANGE: render finite doubles as their canonical shortest round-trip decimal text
// WHY: producers that spell the same number differently must converge on one byte sequence
// QUOTE(TZ): "the shortest decimal representation that round-trips to the original floating-point value"
// REF: req-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Finite: Number(canonicalize(x)) = x ∧ canonicalize(x) = Number::toString(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output never contains a leading "+", a "-0" or an uppercase "E"
// COMPLEXITY: O(k) where k = significant digit count (k ≤ 17)

/**
 * Shortest decimal expansion of a positive finite double: value = 0.digits × 10^exponent.
 */
export interface ShortestDecimal {
  readonly digits: string
  readonly exponent: number
}

const MAX_PLAIN_EXPONENT = 21
const MIN_FIXED_EXPONENT = -6

/**
 * Compute the shortest digit string d1…dk (d1 ≠ 0, no trailing zeros) and the
 * exponent n such that 0.d1…dk × 10^n reads back as exactly `magnitude`.
 *
 * The digit search is delegated to `toExponential()` without a precision
 * argument, which selects the shortest round-tripping significand.
 *
 * @param magnitude - Positive, finite, non-zero double.
 *
 * @pure true
 * @invariant digits.length ∈ [1, 17]
 * @complexity O(1)
 */
export const shortestDecimal = (magnitude: number): ShortestDecimal => {
  const [significand = "0", exponentText = "0"] = magnitude.toExponential().split("e")
  return {
    digits: significand.replace(".", ""),
    exponent: Number(exponentText) + 1
  }
}

const exponentSuffix = (exponent: number): string => {
  const shifted = exponent - 1
  return shifted < 0 ? `e-${-shifted}` : `e+${shifted}`
}

/**
 * Lay out a shortest decimal expansion using the Number::toString notation rules.
 *
 * @pure true
 * @invariant plain notation for -6 < n ≤ 21, exponential otherwise
 * @complexity O(k + |n|) bounded by the 21-digit plain range
 */
export const formatDecimal = ({ digits, exponent }: ShortestDecimal): string => {
  const k = digits.length
  if (k <= exponent && exponent <= MAX_PLAIN_EXPONENT) {
    return digits + "0".repeat(exponent - k)
  }
  if (0 < exponent && exponent <= MAX_PLAIN_EXPONENT) {
    return `${digits.slice(0, exponent)}.${digits.slice(exponent)}`
  }
  if (MIN_FIXED_EXPONENT < exponent && exponent <= 0) {
    return `0.${"0".repeat(-exponent)}${digits}`
  }
  const head = digits.slice(0, 1)
  const tail = digits.slice(1)
  return (tail.length === 0 ? head : `${head}.${tail}`) + exponentSuffix(exponent)
}

/**
 * Canonicalize a single JSON number.
 *
 * @param value - IEEE-754 double.
 * @returns Canonical text, or NonFiniteNumber for NaN and ±Infinity.
 *
 * @pure true
 * @invariant -0 and 0 both render as "0"
 * @complexity O(1)
 */
export const canonicalizeNumber = (value: number): Either.Either<string, NonFiniteNumber> => {
  if (!Number.isFinite(value)) {
    return Either.left(nonFiniteNumber(value))
  }
  if (value === 0) {
    return Either.right("0")
  }
  const text = formatDecimal(shortestDecimal(Math.abs(value)))
  return Either.right(value < 0 ? `-${text}` : text)
}
