export type TakeoffErrorCode = 'INVALID_CONFIG' | 'INVALID_REFERENCE' | 'DOCUMENT_UNAVAILABLE';

export class TakeoffError extends Error {
  constructor(
    public readonly code: TakeoffErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'TakeoffError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
