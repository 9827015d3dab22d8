/**
 * Request body and path parameter parsing for the access routes.
 *
 * Every parser either returns typed input or throws an
 * `ACCESS_INVALID_INPUT` error whose details name the failing fields.
 *
 * @module http/requestParsers
 */

import { ACCESS_ERROR_CODES, AccessControlError } from '../access/errors.js';
import { isPermission } from '../access/permissionCatalog.js';
import { isRole } from '../access/types.js';
import type {
  AssignRoleOptions,
  Permission,
  PermissionContextOptions,
  Role,
} from '../access/types.js';

type FieldErrors = Record<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(errors: FieldErrors): never {
  throw new AccessControlError(
    ACCESS_ERROR_CODES.INVALID_INPUT,
    `Invalid request: ${Object.keys(errors).join(', ')}`,
    errors,
  );
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) fail({ body: 'must be a JSON object' });
  return body;
}

function optionalString(
  source: Record<string, unknown>,
  field: string,
  errors: FieldErrors,
): string | undefined {
  const value = source[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    errors[field] = 'must be a string';
    return undefined;
  }
  return value;
}

function readPermission(
  value: unknown,
  field: string,
  errors: FieldErrors,
): Permission | undefined {
  if (isPermission(value)) return value;
  errors[field] = 'must be a known permission';
  return undefined;
}

function readRole(value: unknown, field: string, errors: FieldErrors): Role | undefined {
  if (isRole(value)) return value;
  errors[field] = 'must be a known role';
  return undefined;
}

function readUserId(value: unknown, errors: FieldErrors): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value;
  errors['userId'] = 'must be a non-empty string';
  return undefined;
}

function readContextOptions(
  body: Record<string, unknown>,
  errors: FieldErrors,
): PermissionContextOptions {
  const options: PermissionContextOptions = {};
  const targetEntityId = optionalString(body, 'targetEntityId', errors);
  const targetEntityType = optionalString(body, 'targetEntityType', errors);
  if (targetEntityId !== undefined) options.targetEntityId = targetEntityId;
  if (targetEntityType !== undefined) options.targetEntityType = targetEntityType;

  const data = body['data'];
  if (data !== undefined) {
    if (isRecord(data)) {
      options.data = data;
    } else {
      errors['data'] = 'must be a key/value object';
    }
  }
  return options;
}

// ─── Route Inputs ────────────────────────────────────────────────────────────

export interface EvaluateInput {
  permission: Permission;
  context: PermissionContextOptions;
}

export function parseEvaluateBody(raw: unknown): EvaluateInput {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const permission = readPermission(body['permission'], 'permission', errors);
  const context = readContextOptions(body, errors);
  if (!permission) fail(errors);
  if (Object.keys(errors).length > 0) fail(errors);
  return { permission, context };
}

export interface EvaluateManyInput {
  permissions: Permission[];
  context: PermissionContextOptions;
}

export function parseEvaluateManyBody(raw: unknown): EvaluateManyInput {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const list = body['permissions'];
  const permissions: Permission[] = [];

  if (!Array.isArray(list) || list.length === 0) {
    errors['permissions'] = 'must be a non-empty array of permissions';
  } else {
    for (const [index, value] of list.entries()) {
      const permission = readPermission(value, `permissions[${index}]`, errors);
      if (permission) permissions.push(permission);
    }
  }

  const context = readContextOptions(body, errors);
  if (Object.keys(errors).length > 0) fail(errors);
  return { permissions, context };
}

export function parsePermissionBody(raw: unknown): Permission {
  const errors: FieldErrors = {};
  const permission = readPermission(requireBody(raw)['permission'], 'permission', errors);
  if (!permission) fail(errors);
  return permission;
}

export function parseRoleParam(raw: unknown): Role {
  const errors: FieldErrors = {};
  const role = readRole(raw, 'role', errors);
  if (!role) fail(errors);
  return role;
}

export function parsePermissionParam(raw: unknown): Permission {
  const errors: FieldErrors = {};
  const permission = readPermission(raw, 'permission', errors);
  if (!permission) fail(errors);
  return permission;
}

export interface AssignmentInput {
  role: Role;
  userId: string;
  options: AssignRoleOptions;
}

export function parseAssignmentBody(raw: unknown): AssignmentInput {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const role = readRole(body['role'], 'role', errors);
  const userId = readUserId(body['userId'], errors);
  const options: AssignRoleOptions = {};

  const reason = optionalString(body, 'reason', errors);
  if (reason !== undefined) options.reason = reason;

  const expiresAt = optionalString(body, 'expiresAt', errors);
  if (expiresAt !== undefined) {
    const parsed = new Date(expiresAt);
    if (Number.isNaN(parsed.getTime())) {
      errors['expiresAt'] = 'must be an ISO-8601 timestamp';
    } else {
      options.expiresAt = parsed;
    }
  }

  if (!role || !userId || Object.keys(errors).length > 0) fail(errors);
  return { role, userId, options };
}

export interface RevocationInput {
  role: Role;
  userId: string;
  reason: string;
}

export function parseRevocationBody(raw: unknown): RevocationInput {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const role = readRole(body['role'], 'role', errors);
  const userId = readUserId(body['userId'], errors);
  const reason = optionalString(body, 'reason', errors) ?? '';
  if (!role || !userId || Object.keys(errors).length > 0) fail(errors);
  return { role, userId, reason };
}

export interface ElevationInput {
  role: Role;
  durationMs: number;
  reason: string;
}

export function parseElevationBody(raw: unknown): ElevationInput {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const role = readRole(body['role'], 'role', errors);

  const durationMs = body['durationMs'];
  if (typeof durationMs !== 'number') errors['durationMs'] = 'must be a number';

  const reason = body['reason'];
  if (typeof reason !== 'string' || reason.trim() === '') {
    errors['reason'] = 'must be a non-empty string';
  }

  if (
    !role ||
    typeof durationMs !== 'number' ||
    typeof reason !== 'string' ||
    Object.keys(errors).length > 0
  ) {
    fail(errors);
  }
  return { role, durationMs, reason };
}

export interface ReviewInput {
  approve: boolean;
  notes: string;
}

export function parseReviewBody(raw: unknown): ReviewInput {
  const body = requireBody(raw);
  const errors: FieldErrors = {};
  const approve = body['approve'];
  if (typeof approve !== 'boolean') errors['approve'] = 'must be a boolean';
  const notes = optionalString(body, 'notes', errors) ?? '';
  if (typeof approve !== 'boolean' || Object.keys(errors).length > 0) fail(errors);
  return { approve, notes };
}
