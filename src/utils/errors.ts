/**
 * Error kinds raised by passphrase generation.
 *
 * The CLI maps `code` onto its exit status; library callers can branch on
 * `instanceof` instead.
 */

export const ErrorCode = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_REQUEST: 'INVALID_REQUEST',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PhraseError extends Error {
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The word list (or the choice of one) cannot support generation. */
export class ConfigurationError extends PhraseError {
  constructor(message: string) {
    super(ErrorCode.CONFIGURATION_ERROR, message);
  }
}

/** The caller asked for something contradictory or out of range. */
export class InvalidRequestError extends PhraseError {
  constructor(message: string) {
    super(ErrorCode.INVALID_REQUEST, message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
