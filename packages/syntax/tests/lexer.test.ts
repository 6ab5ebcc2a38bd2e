import { describe, expect, it } from 'vitest';
import { scanLiteral } from '../src/index.js';
import { Literal } from '../src/literal.js';
import { isFloatLiteral, isIntegerLiteral, isNumericShaped } from '../src/number.js';

describe('scanLiteral', () => {
  it('spans the literal without surrounding whitespace', () => {
    const result = scanLiteral('  42 ');
    expect(result).toEqual({
      ok: true,
      literal: {
        span: {
          start: { offset: 2, line: 1, col: 3 },
          end: { offset: 4, line: 1, col: 5 },
        },
        literal: Literal.Integer('42'),
      },
    });
  });

  it('tracks lines', () => {
    const result = scanLiteral('\n\n  7');
    expect(result.ok && result.literal.span.start).toEqual({ offset: 4, line: 3, col: 3 });
  });

  it('applies escapes in quoted text', () => {
    const result = scanLiteral('"a\\tb"');
    expect(result.ok && result.literal.literal).toEqual(Literal.Text([0x61, 0x09, 0x62], true));
  });

  it('counts astral characters as one column', () => {
    const result = scanLiteral('😀x');
    expect(result.ok && result.literal).toEqual({
      span: {
        start: { offset: 0, line: 1, col: 1 },
        end: { offset: 3, line: 1, col: 3 },
      },
      literal: Literal.Text([0x1f600, 0x78], false),
    });
  });

  it('rejects unpaired surrogates', () => {
    const result = scanLiteral('ab\uD800');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('EncodingError');
    expect(result.error.message).toBe('Literal error at 1:3: unpaired surrogate in source');
  });

  it('recognises the undefined marker', () => {
    expect(scanLiteral('undefined')).toMatchObject({ ok: true, literal: { literal: Literal.Undefined() } });
    expect(scanLiteral('nil', { undefinedMarker: 'nil' })).toMatchObject({
      ok: true,
      literal: { literal: Literal.Undefined() },
    });
  });

  it('reads the marker as text once disabled', () => {
    const result = scanLiteral('undefined', { undefinedMarker: null });
    expect(result.ok && result.literal.literal.tag).toBe('Text');
  });

  it('classifies numbers by surface form', () => {
    expect(scanLiteral('-12')).toMatchObject({ ok: true, literal: { literal: Literal.Integer('-12') } });
    expect(scanLiteral('1.50')).toMatchObject({ ok: true, literal: { literal: Literal.Float('1.50') } });
  });
});

describe('numeric grammar', () => {
  it('separates Integer and Float literals', () => {
    expect(isIntegerLiteral('-0012')).toBe(true);
    expect(isIntegerLiteral('1.0')).toBe(false);
    expect(isFloatLiteral('-1.0')).toBe(true);
    expect(isFloatLiteral('1')).toBe(false);
    expect(isFloatLiteral('1.2.3')).toBe(false);
  });

  it('recognises number-shaped tokens', () => {
    expect(isNumericShaped('1.2.3')).toBe(true);
    expect(isNumericShaped('-.5')).toBe(true);
    expect(isNumericShaped('-')).toBe(false);
    expect(isNumericShaped('...')).toBe(false);
    expect(isNumericShaped('12a')).toBe(false);
  });
});
