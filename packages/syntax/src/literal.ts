import type { CodePoint, Span } from '@luma/core';

export type Literal =
  | { tag: 'Integer'; raw: string }
  | { tag: 'Float'; raw: string }
  | { tag: 'Character'; code: CodePoint }
  | { tag: 'Text'; chars: readonly CodePoint[]; quoted: boolean }
  | { tag: 'Undefined' };

export const Literal = {
  Integer: (raw: string): Literal => ({ tag: 'Integer', raw }),
  Float: (raw: string): Literal => ({ tag: 'Float', raw }),
  Character: (code: CodePoint): Literal => ({ tag: 'Character', code }),
  Text: (chars: readonly CodePoint[], quoted: boolean): Literal => ({ tag: 'Text', chars, quoted }),
  Undefined: (): Literal => ({ tag: 'Undefined' }),
};

export interface LocatedLiteral {
  span: Span;
  literal: Literal;
}
