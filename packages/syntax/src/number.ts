const INTEGER_LITERAL = /^-?[0-9]+$/;
const FLOAT_LITERAL = /^-?[0-9]+\.[0-9]+$/;
// Anything made of digits and dots (with at least one digit) is meant as a
// number, so it must be well-formed rather than falling back to Text.
const NUMERIC_SHAPE = /^-?[0-9.]*[0-9][0-9.]*$/;

export function isIntegerLiteral(s: string): boolean {
  return INTEGER_LITERAL.test(s);
}

export function isFloatLiteral(s: string): boolean {
  return FLOAT_LITERAL.test(s);
}

export function isNumericShaped(s: string): boolean {
  return NUMERIC_SHAPE.test(s);
}
