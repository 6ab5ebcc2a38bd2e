import type { FailureKind, Pos } from '@luma/core';

export class LiteralError extends Error {
  constructor(
    public readonly kind: FailureKind,
    public readonly pos: Pos,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Literal error at ${pos.line}:${pos.col}: ${message}`, options);
    this.name = 'LiteralError';
  }
}
