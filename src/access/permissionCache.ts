/**
 * In-memory cache of permission evaluation results.
 *
 * Entries are grouped per user and expire lazily: a result older than the
 * TTL (measured from its `evaluatedAt`), or read after the expiry of a role
 * it was computed from, is treated as a miss and dropped on read. Any role
 * or permission mutation drops the whole cache.
 *
 * @module access/permissionCache
 */

import type { Permission, PermissionResult } from './types.js';

export interface PermissionCacheConfig {
  /** Time-to-live for cached results in milliseconds. Defaults to 5 minutes. */
  ttlMs?: number;
}

export interface PermissionCacheStats {
  hits: number;
  misses: number;
  invalidations: number;
}

export const DEFAULT_PERMISSION_CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

interface CacheEntry {
  result: PermissionResult;
  /** Last instant (ms) the roles behind the result are still valid. */
  rolesValidThrough?: number;
}

export class PermissionCache {
  readonly ttlMs: number;
  /** userId → permission → result */
  private readonly users = new Map<string, Map<Permission, CacheEntry>>();
  private hits = 0;
  private misses = 0;
  private invalidations = 0;

  constructor(config: PermissionCacheConfig = {}) {
    this.ttlMs = config.ttlMs ?? DEFAULT_PERMISSION_CACHE_TTL_MS;
  }

  /**
   * Cached result for the user and permission, or `undefined` when absent,
   * older than the TTL, or past the expiry of a role it relied on.
   */
  get(
    userId: string,
    permission: Permission,
    now: number = Date.now(),
  ): PermissionResult | undefined {
    const entries = this.users.get(userId);
    const entry = entries?.get(permission);
    if (!entries || !entry) {
      this.misses++;
      return undefined;
    }
    const rolesLapsed = entry.rolesValidThrough !== undefined && now > entry.rolesValidThrough;
    if (rolesLapsed || now - entry.result.evaluatedAt.getTime() >= this.ttlMs) {
      entries.delete(permission);
      if (entries.size === 0) this.users.delete(userId);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.result;
  }

  /**
   * Store a result. `rolesExpireAt` bounds its lifetime below the TTL when
   * the result was computed from a time-bounded role.
   */
  put(userId: string, result: PermissionResult, rolesExpireAt?: Date): void {
    let entries = this.users.get(userId);
    if (!entries) {
      entries = new Map();
      this.users.set(userId, entries);
    }
    const entry: CacheEntry = { result };
    if (rolesExpireAt) entry.rolesValidThrough = rolesExpireAt.getTime();
    entries.set(result.permission, entry);
  }

  /** Drop every cached result for one user. */
  invalidateUser(userId: string): void {
    if (this.users.delete(userId)) this.invalidations++;
  }

  /** Drop everything. Used on any role or permission mutation. */
  invalidateAll(): void {
    this.users.clear();
    this.invalidations++;
  }

  /** Number of cached results, stale ones included until they are read. */
  get size(): number {
    let total = 0;
    for (const entries of this.users.values()) total += entries.size;
    return total;
  }

  stats(): PermissionCacheStats {
    return { hits: this.hits, misses: this.misses, invalidations: this.invalidations };
  }
}
