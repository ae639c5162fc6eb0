export type SpectralErrorKind = 'EmptyInput' | 'NonFiniteValue' | 'InvalidRange' | 'FrequencyOutOfBounds';

export class SpectralError extends Error {
  readonly kind: SpectralErrorKind;

  constructor(kind: SpectralErrorKind, message: string) {
    super(message);
    this.name = 'SpectralError';
    this.kind = kind;
  }
}

export type Result<T, E = SpectralError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = (kind: SpectralErrorKind, message: string): Result<never> => ({
  ok: false,
  error: new SpectralError(kind, message)
});

/** Where construction and query failures are reported; the host decides how to surface them. */
export type ErrorSink = (error: SpectralError) => void;

export const consoleErrorSink: ErrorSink = (error) => {
  console.error(`[${error.kind}] ${error.message}`);
};
