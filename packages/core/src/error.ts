export type FailureKind =
  | 'RangeError'
  | 'PrecisionError'
  | 'ParseError'
  | 'ArityError'
  | 'EncodingError'
  | 'UndefinedConversionError';

export class ValueError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
  ) {
    super(`Invalid value: ${message}`);
    this.name = 'ValueError';
  }
}
