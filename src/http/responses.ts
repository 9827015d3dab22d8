/**
 * API response formatters for a consistent JSON structure.
 *
 * - Success bodies carry `success: true` plus the payload
 * - Error bodies carry `success: false`, `{ code, message, fields? }` and a
 *   request correlation id
 *
 * @module http/responses
 */

import { v4 as uuidv4 } from 'uuid';

import { ACCESS_ERROR_CODES, type AccessControlError } from '../access/errors.js';
import type { Permission, PermissionResult } from '../access/types.js';

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string[]>;
  };
  requestId: string;
}

/** Code for failures that are not access control errors. */
export const INTERNAL_ERROR_CODE = 'INTERNAL_ERROR';

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

/** Maps access error codes to HTTP statuses. */
const ERROR_STATUS_MAP: Record<string, number> = {
  [ACCESS_ERROR_CODES.INVALID_INPUT]: 400,
  [ACCESS_ERROR_CODES.AUTHENTICATION_MISSING]: 401,
  [ACCESS_ERROR_CODES.ACCOUNT_DISABLED]: 403,
  [ACCESS_ERROR_CODES.INSUFFICIENT_PERMISSION]: 403,
  [ACCESS_ERROR_CODES.SELF_MODIFICATION_FORBIDDEN]: 403,
  [ACCESS_ERROR_CODES.NOT_FOUND]: 404,
  [ACCESS_ERROR_CODES.CONFLICT]: 409,
  [ACCESS_ERROR_CODES.DURATION_EXCEEDED]: 422,
  [INTERNAL_ERROR_CODE]: 500,
};

const DEFAULT_ERROR_STATUS = 500;

/**
 * Look up the HTTP status for an error code.
 *
 * @param code - An `ACCESS_*` code or `INTERNAL_ERROR`
 * @returns The mapped status, or 500 for codes not in the map
 */
export function getHttpStatusForError(code: string): number {
  return ERROR_STATUS_MAP[code] ?? DEFAULT_ERROR_STATUS;
}

// ─── Correlation ID ──────────────────────────────────────────────────────────

/**
 * Generate a request correlation ID (UUID v4). It is echoed in the
 * `x-request-id` header and in every error body.
 */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Error Formatters ────────────────────────────────────────────────────────

/**
 * Build an error body.
 *
 * @param code - Machine-readable error code
 * @param message - Human-readable message
 * @param requestId - Correlation ID; a new one is generated when omitted
 * @param fields - Per-field validation messages; dropped when empty
 * @returns A structured ErrorResponse
 */
export function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
  fields?: Record<string, string[]>,
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: { code, message },
    requestId: requestId ?? generateRequestId(),
  };

  if (fields && Object.keys(fields).length > 0) {
    response.error.fields = fields;
  }

  return response;
}

/**
 * Format an access control error. Its code and message are kept, and an
 * `ACCESS_INVALID_INPUT` error also exposes its per-field details.
 *
 * @param err - The error thrown by a service or request parser
 * @param requestId - Correlation ID of the failing request
 * @returns A structured ErrorResponse
 */
export function formatAccessError(err: AccessControlError, requestId?: string): ErrorResponse {
  const fields =
    err.code === ACCESS_ERROR_CODES.INVALID_INPUT
      ? Object.fromEntries(Object.entries(err.details).map(([key, value]) => [key, [value]]))
      : undefined;
  return formatErrorResponse(err.code, err.message, requestId, fields);
}

/**
 * Format an unexpected failure. The body carries a generic message only, and
 * the cause goes to the server log.
 *
 * @param requestId - Correlation ID of the failing request
 * @returns A structured ErrorResponse with code `INTERNAL_ERROR`
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    INTERNAL_ERROR_CODE,
    'An unexpected error occurred. Please try again later.',
    requestId,
  );
}

// ─── Success Payloads ────────────────────────────────────────────────────────

export interface PermissionResultBody {
  permission: Permission;
  granted: boolean;
  reason: string;
  grantedBy: string[];
  evaluatedAt: string;
  context: {
    userId: string;
    targetEntityId?: string;
    targetEntityType?: string;
    data: Record<string, string | number | boolean>;
    createdAt: string;
  };
}

/**
 * Convert an evaluation result to its JSON body, rendering every date
 * (including date values in the context data) as an ISO 8601 string.
 *
 * @param result - The result returned by the evaluation service
 * @returns A JSON-safe PermissionResultBody
 */
export function serializePermissionResult(result: PermissionResult): PermissionResultBody {
  const data: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(result.context.data)) {
    data[key] = value instanceof Date ? value.toISOString() : value;
  }

  const context: PermissionResultBody['context'] = {
    userId: result.context.userId,
    data,
    createdAt: result.context.createdAt.toISOString(),
  };
  if (result.context.targetEntityId !== undefined) {
    context.targetEntityId = result.context.targetEntityId;
  }
  if (result.context.targetEntityType !== undefined) {
    context.targetEntityType = result.context.targetEntityType;
  }

  return {
    permission: result.permission,
    granted: result.granted,
    reason: result.reason,
    grantedBy: [...result.grantedBy],
    evaluatedAt: result.evaluatedAt.toISOString(),
    context,
  };
}
