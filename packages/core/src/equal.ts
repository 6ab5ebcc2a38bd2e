import type { CodePoint } from './code-point.js';
import type { Value } from './value.js';

function floatEquals(x: number, y: number): boolean {
  return x === y || (Number.isNaN(x) && Number.isNaN(y));
}

function charsEqual(xs: readonly CodePoint[], ys: readonly CodePoint[]): boolean {
  return xs.length === ys.length && xs.every((cp, i) => cp === ys[i]);
}

/** Same kind and equal payload. NaN floats are equal to each other. */
export function valueEquals(a: Value, b: Value): boolean {
  return a.match({
    Integer: (x) =>
      b.match({
        Integer: (y) => x === y,
        Character: () => false,
        Text: () => false,
        Float: () => false,
        Undefined: () => false,
      }),
    Character: (x) =>
      b.match({
        Character: (y) => x === y,
        Integer: () => false,
        Text: () => false,
        Float: () => false,
        Undefined: () => false,
      }),
    Text: (xs) =>
      b.match({
        Text: (ys) => charsEqual(xs, ys),
        Integer: () => false,
        Character: () => false,
        Float: () => false,
        Undefined: () => false,
      }),
    Float: (x) =>
      b.match({
        Float: (y) => floatEquals(x, y),
        Integer: () => false,
        Character: () => false,
        Text: () => false,
        Undefined: () => false,
      }),
    Undefined: () =>
      b.match({
        Undefined: () => true,
        Integer: () => false,
        Character: () => false,
        Text: () => false,
        Float: () => false,
      }),
  });
}
