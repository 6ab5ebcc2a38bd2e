import { LiteralError } from './error.js';
import { LiteralLexer, type LiteralOptions } from './lexer.js';
import type { LocatedLiteral } from './literal.js';

export { LiteralLexer, DEFAULT_UNDEFINED_MARKER, type LiteralOptions } from './lexer.js';
export { LiteralError } from './error.js';
export { Literal, type LocatedLiteral } from './literal.js';
export { isIntegerLiteral, isFloatLiteral, isNumericShaped } from './number.js';

export type ScanResult =
  | { ok: true; literal: LocatedLiteral }
  | { ok: false; error: LiteralError };

export function scanLiteral(source: string, options: LiteralOptions = {}): ScanResult {
  const lexer = new LiteralLexer(source, options);
  try {
    return { ok: true, literal: lexer.scan() };
  } catch (e) {
    if (e instanceof LiteralError) return { ok: false, error: e };
    throw e;
  }
}
