export type {
  AppError,
  CyclicValue,
  InvalidSurrogate,
  NestingTooDeep,
  NonFiniteNumber,
  NumberOutOfRange,
  SerializeError
} from "./core/errors.js"
export {
  cyclicValue,
  invalidSurrogate,
  nestingTooDeep,
  nonFiniteNumber,
  numberOutOfRange,
  renderAppError
} from "./core/errors.js"
export type { Json, JsonArray, JsonObject } from "./core/json.js"
export { isJsonArray, isJsonObject, isJsonValue } from "./core/json.js"
export type { JsonEntry } from "./core/keys.js"
export { compareKeys, orderEntries } from "./core/keys.js"
export { ensureDoubleDomain } from "./core/number-domain.js"
export type { ShortestDecimal } from "./core/number.js"
export { canonicalizeNumber, formatDecimal, shortestDecimal } from "./core/number.js"
export type { SerializeOptions } from "./core/serialize.js"
export { serialize } from "./core/serialize.js"
export { escapeString } from "./core/string.js"
