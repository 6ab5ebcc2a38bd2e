export type { Pos, Span } from './span.js';
export {
  type CodePoint,
  ASCII_MAX,
  SCALAR_MAX,
  isAscii,
  isScalar,
  codePointsOf,
  textToString,
} from './code-point.js';
export { type FailureKind, ValueError } from './error.js';
export { Value, INTEGER_MIN, INTEGER_MAX, isInt32 } from './value.js';
export { type Kind, KINDS, isKind, kindOf } from './kind.js';
export { valueEquals } from './equal.js';
export { formatInteger, formatFloat } from './format.js';
export { prettyValue } from './pretty.js';
