import { type CodePoint, type Pos, type Span, isScalar } from '@luma/core';
import { LiteralError } from './error.js';
import { Literal, type LocatedLiteral } from './literal.js';
import { isFloatLiteral, isIntegerLiteral, isNumericShaped } from './number.js';

export const DEFAULT_UNDEFINED_MARKER = 'undefined';

export interface LiteralOptions {
  /** Bare token that evaluates to Undefined; `null` disables it. Defaults to `undefined`. */
  undefinedMarker?: string | null;
}

const ESCAPES: Record<string, CodePoint> = {
  '\\': 0x5c,
  "'": 0x27,
  '"': 0x22,
  n: 0x0a,
  t: 0x09,
  r: 0x0d,
  '0': 0x00,
};

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

/**
 * Reads one literal out of `source`. Surrounding whitespace is ignored, and
 * positions refer to the untrimmed source.
 */
export class LiteralLexer {
  private offset = 0;
  private line = 1;
  private col = 1;
  private readonly end: number;
  private readonly undefinedMarker: string | null;

  constructor(
    private source: string,
    options: LiteralOptions = {},
  ) {
    let end = source.length;
    while (end > 0 && isWhitespace(source.charAt(end - 1))) end--;
    this.end = end;
    this.undefinedMarker =
      options.undefinedMarker === undefined ? DEFAULT_UNDEFINED_MARKER : options.undefinedMarker;
  }

  private pos(): Pos {
    return { offset: this.offset, line: this.line, col: this.col };
  }

  private atEnd(): boolean {
    return this.offset >= this.end;
  }

  private peek(): string | undefined {
    return this.atEnd() ? undefined : this.source.charAt(this.offset);
  }

  private advance(): CodePoint {
    const at = this.pos();
    const cp = this.source.codePointAt(this.offset) ?? 0;
    if (!isScalar(cp)) {
      throw new LiteralError('EncodingError', at, 'unpaired surrogate in source');
    }
    this.offset += cp > 0xffff ? 2 : 1;
    if (cp === 0x0a) {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return cp;
  }

  private skipWhitespace(): void {
    for (let ch = this.peek(); ch !== undefined && isWhitespace(ch); ch = this.peek()) {
      this.advance();
    }
  }

  private skipToEnd(): void {
    while (!this.atEnd()) this.advance();
  }

  private located(start: Pos, literal: Literal): LocatedLiteral {
    const span: Span = { start, end: this.pos() };
    return { span, literal };
  }

  scan(): LocatedLiteral {
    this.skipWhitespace();
    const start = this.pos();
    const body = this.source.slice(this.offset, this.end);

    if (this.undefinedMarker !== null && body === this.undefinedMarker) {
      this.skipToEnd();
      return this.located(start, Literal.Undefined());
    }

    switch (this.peek()) {
      case "'":
        return this.readCharacter(start);
      case '"':
        return this.readQuotedText(start);
    }

    if (isNumericShaped(body)) {
      return this.readNumber(start, body);
    }

    const chars: CodePoint[] = [];
    while (!this.atEnd()) chars.push(this.advance());
    return this.located(start, Literal.Text(chars, false));
  }

  private readNumber(start: Pos, body: string): LocatedLiteral {
    let literal: Literal;
    if (isIntegerLiteral(body)) {
      literal = Literal.Integer(body);
    } else if (isFloatLiteral(body)) {
      literal = Literal.Float(body);
    } else {
      throw new LiteralError('ParseError', start, `malformed numeric literal '${body}'`);
    }
    this.skipToEnd();
    return this.located(start, literal);
  }

  private readCharacter(start: Pos): LocatedLiteral {
    this.advance(); // '
    if (this.atEnd()) {
      throw new LiteralError('ParseError', this.pos(), 'unterminated character literal');
    }
    if (this.peek() === "'") {
      throw new LiteralError('ParseError', start, 'empty character literal');
    }
    const code = this.readElement();
    if (this.atEnd()) {
      throw new LiteralError('ParseError', this.pos(), 'unterminated character literal');
    }
    if (this.peek() !== "'") {
      throw new LiteralError('ParseError', start, 'character literal must hold exactly one character');
    }
    this.advance(); // '
    this.expectEnd('character literal');
    return this.located(start, Literal.Character(code));
  }

  private readQuotedText(start: Pos): LocatedLiteral {
    this.advance(); // "
    const chars: CodePoint[] = [];
    for (;;) {
      if (this.atEnd()) {
        throw new LiteralError('ParseError', this.pos(), 'unterminated text literal');
      }
      if (this.peek() === '"') break;
      chars.push(this.readElement());
    }
    this.advance(); // "
    this.expectEnd('text literal');
    return this.located(start, Literal.Text(chars, true));
  }

  /** One code point inside quotes, with escapes applied. */
  private readElement(): CodePoint {
    if (this.peek() !== '\\') return this.advance();
    const at = this.pos();
    this.advance(); // \
    const ch = this.peek();
    if (ch === undefined) {
      throw new LiteralError('ParseError', this.pos(), 'unterminated escape sequence');
    }
    const code = ESCAPES[ch];
    if (code === undefined) {
      throw new LiteralError('ParseError', at, `unknown escape sequence '\\${ch}'`);
    }
    this.advance();
    return code;
  }

  private expectEnd(what: string): void {
    if (!this.atEnd()) {
      throw new LiteralError('ParseError', this.pos(), `unexpected text after ${what}`);
    }
  }
}
