import { type Pos, Value } from '@luma/core';
import { LiteralError, type LiteralOptions, scanLiteral } from '@luma/syntax';
import { type CastResult, cast } from './cast.js';

export type EvaluatorOptions = LiteralOptions;

export type EvalResult = { ok: true; value: Value } | { ok: false; error: LiteralError };

/**
 * Turns literal source into a value. Numbers and characters go through
 * {@link cast} from their Text form, so they obey the same range and encoding
 * rules as a cast written in a program.
 */
export function evaluate(source: string, options: EvaluatorOptions = {}): EvalResult {
  const scanned = scanLiteral(source, options);
  if (!scanned.ok) return scanned;

  const { span, literal } = scanned.literal;
  switch (literal.tag) {
    case 'Undefined':
      return { ok: true, value: Value.Undefined() };
    case 'Text':
      return { ok: true, value: Value.Text(literal.chars) };
    case 'Integer':
      return fromCast(cast(Value.text(literal.raw), 'Integer'), span.start);
    case 'Float':
      return fromCast(cast(Value.text(literal.raw), 'Float'), span.start);
    case 'Character':
      return fromCast(cast(Value.Text([literal.code]), 'Character'), span.start);
  }
}

function fromCast(result: CastResult, pos: Pos): EvalResult {
  if (result.ok) return result;
  const { error } = result;
  return { ok: false, error: new LiteralError(error.kind, pos, error.detail, { cause: error }) };
}
