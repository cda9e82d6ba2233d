// src/utils/errors.ts

export type ErrorKind = 'configuration' | 'upstream' | 'info' | 'invalid_input' | 'cancelled';

export abstract class PhishyCheckError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PhishyCheckError {
  readonly kind = 'configuration' as const;
}

export class UpstreamApiError extends PhishyCheckError {
  readonly kind = 'upstream' as const;

  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

export class InvalidInputError extends PhishyCheckError {
  readonly kind = 'invalid_input' as const;
}

export class CheckCancelledError extends PhishyCheckError {
  readonly kind = 'cancelled' as const;

  constructor(message: string = 'Check cancelled by client') {
    super(message);
  }
}

/**
 * Conditions where the check could not run but nothing went wrong:
 * the token is too new, too old, or not on a bonding curve.
 */
export abstract class InfoError extends PhishyCheckError {
  readonly kind = 'info' as const;
}

export class NoTransferDataError extends InfoError {
  constructor(message: string = 'No transfers found for this token yet. It may be too new - try again in a few minutes.') {
    super(message);
  }
}

export class TokenTooOldError extends InfoError {}

export class BondingCurveNotFoundError extends InfoError {}

export function isInfoError(error: unknown): error is InfoError {
  return error instanceof InfoError;
}

export function httpStatusFor(error: unknown): number {
  if (!(error instanceof PhishyCheckError)) return 500;

  switch (error.kind) {
    case 'info':
      return 200;
    case 'invalid_input':
      return 400;
    case 'upstream':
      return 502;
    case 'cancelled':
      return 499;
    case 'configuration':
      return 500;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error occurred';
}
