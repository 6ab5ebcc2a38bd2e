import { type Kind, Value, isKind, kindOf, textToString } from '@luma/core';

/** The kind of `value`, as a Text value a program can store and compare. */
export function getType(value: Value): Value {
  return Value.text(kindOf(value));
}

const SHORT_NAMES = new Map<string, Kind>([
  ['int', 'Integer'],
  ['char', 'Character'],
  ['str', 'Text'],
  ['float', 'Float'],
  ['undefined', 'Undefined'],
]);

/** Resolves a type notation such as `Integer` or `int`. Names are case-sensitive. */
export function kindFromName(name: string): Kind | undefined {
  if (isKind(name)) return name;
  return SHORT_NAMES.get(name);
}

export function kindFromValue(value: Value): Kind | undefined {
  return value.match({
    Text: (chars) => kindFromName(textToString(chars)),
    Integer: () => undefined,
    Character: () => undefined,
    Float: () => undefined,
    Undefined: () => undefined,
  });
}
