export const ErrorCodes = {
  NotRegistered: 'NOT_REGISTERED',
  SubmissionsDisabled: 'SUBMISSIONS_DISABLED',
  SubmissionNotFound: 'SUBMISSION_NOT_FOUND',
  ChallengeNotFound: 'CHALLENGE_NOT_FOUND',
  EmptyInput: 'EMPTY_INPUT',
  ExternalTransportError: 'EXTERNAL_TRANSPORT_ERROR',
  StoreError: 'STORE_ERROR',
  InvalidConfig: 'INVALID_CONFIG'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const userFacingCodes: ReadonlySet<ErrorCode> = new Set([
  ErrorCodes.NotRegistered,
  ErrorCodes.SubmissionsDisabled,
  ErrorCodes.SubmissionNotFound,
  ErrorCodes.ChallengeNotFound,
  ErrorCodes.EmptyInput
]);

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DomainError';
  }
}

export class ExternalTransportError extends DomainError {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCodes.ExternalTransportError, options);
    this.name = 'ExternalTransportError';
  }
}

export class StoreError extends DomainError {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCodes.StoreError, options);
    this.name = 'StoreError';
  }
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}

export function isUserFacingError(value: unknown): value is DomainError {
  return isDomainError(value) && userFacingCodes.has(value.code);
}
