import { type CodePoint, textToString } from './code-point.js';
import { formatFloat, formatInteger } from './format.js';
import type { Value } from './value.js';

export function prettyValue(value: Value): string {
  return value.match({
    Integer: (n) => `Integer(${formatInteger(n)})`,
    Character: (cp) => `Character('${prettyChar(cp)}')`,
    Text: (chars) => `Text(${JSON.stringify(textToString(chars))})`,
    Float: (n) => `Float(${formatFloat(n)})`,
    Undefined: () => 'Undefined',
  });
}

function prettyChar(cp: CodePoint): string {
  switch (cp) {
    case 0x00:
      return '\\0';
    case 0x09:
      return '\\t';
    case 0x0a:
      return '\\n';
    case 0x0d:
      return '\\r';
    case 0x27:
      return "\\'";
    case 0x5c:
      return '\\\\';
  }
  if (cp < 0x20 || cp === 0x7f) {
    return `\\x${cp.toString(16).padStart(2, '0')}`;
  }
  return String.fromCodePoint(cp);
}
