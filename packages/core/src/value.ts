import { handsum, type Handsum } from 'handsum';
import { type CodePoint, codePointsOf, isAscii, isScalar } from './code-point.js';
import { ValueError } from './error.js';

export const INTEGER_MIN = -2_147_483_648;
export const INTEGER_MAX = 2_147_483_647;

interface TValue {
  Integer(value: number): Value;
  Character(code: CodePoint): Value;
  Text(chars: readonly CodePoint[]): Value;
  Float(value: number): Value;
  Undefined(): Value;
}

interface IValue {}

export type Value = Handsum<TValue, IValue>;

const ValueCtor = handsum<TValue, IValue>({});

// Undefined has no payload, so every Undefined is this one instance.
const UNDEFINED: Value = ValueCtor.Undefined();

export function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= INTEGER_MIN && n <= INTEGER_MAX;
}

function integer(value: number): Value {
  if (!isInt32(value)) {
    throw new ValueError('RangeError', `${value} is not a 32-bit integer`);
  }
  return ValueCtor.Integer(value === 0 ? 0 : value);
}

function character(code: CodePoint): Value {
  if (!isAscii(code)) {
    throw new ValueError('EncodingError', `code point ${code} is outside the ASCII range`);
  }
  return ValueCtor.Character(code);
}

function text(chars: readonly CodePoint[]): Value {
  const bad = chars.find((cp) => !isScalar(cp));
  if (bad !== undefined) {
    throw new ValueError('EncodingError', `${bad} is not a Unicode scalar value`);
  }
  return ValueCtor.Text(Object.freeze([...chars]));
}

/**
 * Constructors for runtime values. Each one validates its primitive input and
 * throws {@link ValueError} when it lies outside the kind's domain.
 */
export const Value = {
  Integer: integer,
  Character: character,
  Text: text,
  Float: (value: number): Value => ValueCtor.Float(value),
  Undefined: (): Value => UNDEFINED,

  /** Text from a host string. */
  text: (s: string): Value => text(codePointsOf(s)),
  /** Character from a host string holding exactly one scalar. */
  char: (s: string): Value => {
    const chars = codePointsOf(s);
    const [first] = chars;
    if (chars.length !== 1 || first === undefined) {
      throw new ValueError('ArityError', `expected one character, got ${chars.length}`);
    }
    return character(first);
  },
};
