/**
 * Error taxonomy for mutating access-control operations.
 *
 * Permission denials during evaluation are results, not errors; these are
 * raised only when a mutation or lifecycle operation is rejected.
 *
 * @module access/errors
 */

export const ACCESS_ERROR_CODES = {
  AUTHENTICATION_MISSING: 'ACCESS_AUTHENTICATION_MISSING',
  ACCOUNT_DISABLED: 'ACCESS_ACCOUNT_DISABLED',
  INSUFFICIENT_PERMISSION: 'ACCESS_INSUFFICIENT_PERMISSION',
  NOT_FOUND: 'ACCESS_NOT_FOUND',
  CONFLICT: 'ACCESS_CONFLICT',
  SELF_MODIFICATION_FORBIDDEN: 'ACCESS_SELF_MODIFICATION_FORBIDDEN',
  DURATION_EXCEEDED: 'ACCESS_DURATION_EXCEEDED',
  INVALID_INPUT: 'ACCESS_INVALID_INPUT',
} as const;

export type AccessErrorCode = (typeof ACCESS_ERROR_CODES)[keyof typeof ACCESS_ERROR_CODES];

export class AccessControlError extends Error {
  constructor(
    public readonly code: AccessErrorCode,
    message: string,
    public readonly details: Record<string, string> = {},
  ) {
    super(message);
    this.name = 'AccessControlError';
  }
}

export function isAccessControlError(err: unknown): err is AccessControlError {
  return err instanceof AccessControlError;
}
