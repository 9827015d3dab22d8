/**
 * Permission context construction.
 *
 * Context data is a typed key/value store: values are limited to strings,
 * finite numbers, booleans and valid dates, and are checked on insertion.
 *
 * @module access/permissionContext
 */

import { ACCESS_ERROR_CODES, AccessControlError } from './errors.js';
import type {
  ContextData,
  ContextValue,
  PermissionContext,
  PermissionContextOptions,
} from './types.js';

export function isContextValue(value: unknown): value is ContextValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (value instanceof Date) return !Number.isNaN(value.getTime());
  return false;
}

/**
 * Validate untyped input into context data.
 * @throws AccessControlError with `ACCESS_INVALID_INPUT` naming the offending keys.
 */
export function parseContextData(input: unknown): ContextData {
  if (input === undefined || input === null) return Object.freeze({});
  if (typeof input !== 'object' || Array.isArray(input) || input instanceof Date) {
    throw new AccessControlError(
      ACCESS_ERROR_CODES.INVALID_INPUT,
      'Context data must be a key/value object',
    );
  }

  const data: Record<string, ContextValue> = {};
  const invalidKeys: string[] = [];
  for (const [key, value] of Object.entries(input)) {
    if (isContextValue(value)) {
      data[key] = value;
    } else {
      invalidKeys.push(key);
    }
  }

  if (invalidKeys.length > 0) {
    throw new AccessControlError(
      ACCESS_ERROR_CODES.INVALID_INPUT,
      `Unsupported context value for: ${invalidKeys.join(', ')}`,
      { keys: invalidKeys.join(',') },
    );
  }
  return Object.freeze(data);
}

export function createPermissionContext(
  userId: string,
  options: PermissionContextOptions = {},
  createdAt: Date = new Date(),
): PermissionContext {
  const context: PermissionContext = {
    userId,
    data: parseContextData(options.data),
    createdAt,
  };
  if (options.targetEntityId !== undefined) context.targetEntityId = options.targetEntityId;
  if (options.targetEntityType !== undefined) context.targetEntityType = options.targetEntityType;
  return context;
}
