import {
  type CodePoint,
  type FailureKind,
  type Kind,
  INTEGER_MAX,
  INTEGER_MIN,
  Value,
  formatFloat,
  formatInteger,
  isAscii,
  isInt32,
  kindOf,
  textToString,
} from '@luma/core';
import { isFloatLiteral, isIntegerLiteral } from '@luma/syntax';
import { CastError } from './error.js';

export type CastResult = { ok: true; value: Value } | { ok: false; error: CastError };

function ok(value: Value): CastResult {
  return { ok: true, value };
}

function fail(kind: FailureKind, from: Kind, to: Kind, detail: string): CastResult {
  return { ok: false, error: new CastError(kind, from, to, detail) };
}

function codePointName(cp: CodePoint): string {
  return `U+${cp.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Converts `value` to the `target` kind. Never throws: every conversion that
 * cannot be made exactly comes back as a {@link CastError}.
 */
export function cast(value: Value, target: Kind): CastResult {
  if (target === 'Undefined') return ok(Value.Undefined());
  if (kindOf(value) === target) return ok(value);
  return value.match({
    Integer: (n) => castInteger(n, target),
    Character: (cp) => castCharacter(cp, target),
    Text: (chars) => castText(chars, target),
    Float: (x) => castFloat(x, target),
    Undefined: () => fail('UndefinedConversionError', 'Undefined', target, 'Undefined holds no value'),
  });
}

function castInteger(n: number, target: Kind): CastResult {
  switch (target) {
    case 'Integer':
      return ok(Value.Integer(n));
    case 'Float':
      return ok(Value.Float(n));
    case 'Text':
      return ok(Value.text(formatInteger(n)));
    case 'Character':
      if (!isAscii(n)) {
        return fail('RangeError', 'Integer', 'Character', `${n} is outside the ASCII range 0-127`);
      }
      return ok(Value.Character(n));
    case 'Undefined':
      return ok(Value.Undefined());
  }
}

function castCharacter(cp: CodePoint, target: Kind): CastResult {
  switch (target) {
    case 'Integer':
      return ok(Value.Integer(cp));
    case 'Float':
      return ok(Value.Float(cp));
    case 'Text':
      return ok(Value.Text([cp]));
    case 'Character':
      return ok(Value.Character(cp));
    case 'Undefined':
      return ok(Value.Undefined());
  }
}

// Exact integral value or nothing; floats are never rounded or truncated.
function exactInteger(x: number, to: Kind): number | CastError {
  if (Number.isNaN(x)) {
    return new CastError('PrecisionError', 'Float', to, 'NaN has no integral value');
  }
  if (x < INTEGER_MIN || x > INTEGER_MAX) {
    return new CastError('RangeError', 'Float', to, `${formatFloat(x)} is outside the Integer range`);
  }
  if (!Number.isInteger(x)) {
    return new CastError('PrecisionError', 'Float', to, `${formatFloat(x)} has a fractional part`);
  }
  return x === 0 ? 0 : x;
}

function castFloat(x: number, target: Kind): CastResult {
  switch (target) {
    case 'Integer': {
      const n = exactInteger(x, target);
      return n instanceof CastError ? { ok: false, error: n } : ok(Value.Integer(n));
    }
    case 'Character': {
      const n = exactInteger(x, target);
      if (n instanceof CastError) return { ok: false, error: n };
      if (!isAscii(n)) {
        return fail('RangeError', 'Float', 'Character', `${formatFloat(x)} is outside the ASCII range 0-127`);
      }
      return ok(Value.Character(n));
    }
    case 'Float':
      return ok(Value.Float(x));
    case 'Text':
      return ok(Value.text(formatFloat(x)));
    case 'Undefined':
      return ok(Value.Undefined());
  }
}

function castText(chars: readonly CodePoint[], target: Kind): CastResult {
  switch (target) {
    case 'Text':
      return ok(Value.Text(chars));
    case 'Character': {
      const [cp] = chars;
      if (chars.length !== 1 || cp === undefined) {
        return fail('ArityError', 'Text', 'Character', `expected 1 character, got ${chars.length}`);
      }
      if (!isAscii(cp)) {
        return fail('EncodingError', 'Text', 'Character', `${codePointName(cp)} is outside the ASCII range`);
      }
      return ok(Value.Character(cp));
    }
    case 'Integer': {
      const s = textToString(chars);
      if (!isIntegerLiteral(s)) {
        return fail('ParseError', 'Text', 'Integer', `${JSON.stringify(s)} is not an Integer literal`);
      }
      const n = Number(s);
      if (!isInt32(n)) {
        return fail('RangeError', 'Text', 'Integer', `${s} is outside the Integer range`);
      }
      return ok(Value.Integer(n));
    }
    case 'Float': {
      const s = textToString(chars);
      if (!isFloatLiteral(s)) {
        return fail('ParseError', 'Text', 'Float', `${JSON.stringify(s)} is not a Float literal`);
      }
      const x = Number(s);
      if (!Number.isFinite(x)) {
        return fail('RangeError', 'Text', 'Float', `${s} is outside the Float range`);
      }
      return ok(Value.Float(x));
    }
    case 'Undefined':
      return ok(Value.Undefined());
  }
}
