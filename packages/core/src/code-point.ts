/** A Unicode scalar value. */
export type CodePoint = number;

export const ASCII_MAX = 0x7f;
export const SCALAR_MAX = 0x10ffff;

export function isAscii(cp: CodePoint): boolean {
  return Number.isInteger(cp) && cp >= 0 && cp <= ASCII_MAX;
}

/** Excludes surrogate halves, which never stand on their own. */
export function isScalar(cp: CodePoint): boolean {
  return Number.isInteger(cp) && cp >= 0 && cp <= SCALAR_MAX && (cp < 0xd800 || cp > 0xdfff);
}

export function codePointsOf(s: string): CodePoint[] {
  const out: CodePoint[] = [];
  for (const ch of s) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined) out.push(cp);
  }
  return out;
}

export function textToString(chars: readonly CodePoint[]): string {
  return chars.map((cp) => String.fromCodePoint(cp)).join('');
}
