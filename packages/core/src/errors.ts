export type ConversionErrorCode =
  | 'READ_FAILED'
  | 'UNKNOWN_FORMAT'
  | 'WRITE_FAILED'
  | 'INVALID_CONFIG';

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'ConversionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
