/**
 * Reads the initial user directory from a JSON file: an array of
 * `{ id, name, roles?, isActive? }` objects.
 *
 * @module identity/directoryUsersFile
 */

import fs from 'node:fs';

import { isRole } from '../access/types.js';
import type { DirectoryUserInput } from './userDirectory.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseUser(raw: unknown, index: number): DirectoryUserInput {
  const where = `users[${index}]`;
  if (!isRecord(raw)) throw new Error(`${where} must be an object`);

  const { id, name, roles, isActive } = raw;
  if (typeof id !== 'string' || id.trim() === '') {
    throw new Error(`${where}.id must be a non-empty string`);
  }
  if (typeof name !== 'string') throw new Error(`${where}.name must be a string`);
  if (isActive !== undefined && typeof isActive !== 'boolean') {
    throw new Error(`${where}.isActive must be a boolean`);
  }

  const user: DirectoryUserInput = { id, name };
  if (isActive !== undefined) user.isActive = isActive;
  if (roles !== undefined) {
    if (!Array.isArray(roles)) throw new Error(`${where}.roles must be an array`);
    user.roles = roles.map((role: unknown, i) => {
      if (!isRole(role)) throw new Error(`${where}.roles[${i}] is not a known role`);
      return role;
    });
  }
  return user;
}

/** Validate already-parsed JSON. */
export function parseDirectoryUsers(json: unknown): DirectoryUserInput[] {
  if (!Array.isArray(json)) throw new Error('User directory file must contain a JSON array');
  const users = json.map((raw: unknown, index) => parseUser(raw, index));

  const seen = new Set<string>();
  for (const user of users) {
    if (seen.has(user.id)) throw new Error(`Duplicate user id: ${user.id}`);
    seen.add(user.id);
  }
  return users;
}

/**
 * @throws Error when the file is missing, is not JSON or fails validation.
 */
export function loadDirectoryUsers(filePath: string): DirectoryUserInput[] {
  const text = fs.readFileSync(filePath, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new Error(`User directory file ${filePath} is not valid JSON`, { cause: err });
  }
  return parseDirectoryUsers(json);
}
