import type { FailureKind, Kind } from '@luma/core';

export class CastError extends Error {
  constructor(
    public readonly kind: FailureKind,
    public readonly from: Kind,
    public readonly to: Kind,
    public readonly detail: string,
  ) {
    super(`Cannot cast ${from} to ${to}: ${detail}`);
    this.name = 'CastError';
  }
}
