import type { Value } from './value.js';

export type Kind = 'Integer' | 'Character' | 'Text' | 'Float' | 'Undefined';

export const KINDS: readonly Kind[] = ['Integer', 'Character', 'Text', 'Float', 'Undefined'];

export function isKind(name: string): name is Kind {
  return KINDS.some((kind) => kind === name);
}

export function kindOf(value: Value): Kind {
  return value.match({
    Integer: (): Kind => 'Integer',
    Character: (): Kind => 'Character',
    Text: (): Kind => 'Text',
    Float: (): Kind => 'Float',
    Undefined: (): Kind => 'Undefined',
  });
}
