/**
 * Fast-check arbitraries for property-based testing.
 *
 * Reusable generators for access-control values: catalog permissions,
 * roles, arbitrary (possibly cyclic) role graphs and clock times.
 *
 * @module test/arbitraries
 */

import fc from 'fast-check';

import { ALL_PERMISSIONS } from '../access/permissionCatalog.js';
import { ROLES } from '../access/types.js';
import type { Permission, Role, RoleDefinition } from '../access/types.js';

// ─── Catalog Arbitraries ─────────────────────────────────────────────────────

export const permissionArb: fc.Arbitrary<Permission> = fc.constantFrom(...ALL_PERMISSIONS);

export const roleArb: fc.Arbitrary<Role> = fc.constantFrom(...ROLES);

// ─── Role Graph Arbitraries ──────────────────────────────────────────────────

const roleShapeArb = fc.record({
  permissions: fc.subarray([...ALL_PERMISSIONS], { maxLength: 12 }),
  inheritedRoles: fc.subarray([...ROLES], { maxLength: 3 }),
  level: fc.integer({ min: 0, max: 5 }),
});

/**
 * One definition per role with random permissions and random inheritance
 * edges. Cycles and self-inheritance are allowed.
 */
export const roleDefinitionsArb: fc.Arbitrary<RoleDefinition[]> = fc
  .array(roleShapeArb, { minLength: ROLES.length, maxLength: ROLES.length })
  .map((shapes) =>
    ROLES.map((role, index) => {
      const shape = shapes[index] ?? { permissions: [], inheritedRoles: [], level: 0 };
      return {
        role,
        permissions: shape.permissions,
        conditionalRules: [],
        inheritedRoles: shape.inheritedRoles,
        level: shape.level,
      };
    }),
  );

// ─── Clock Arbitraries ───────────────────────────────────────────────────────

/** Minutes since midnight, 0–1439. */
export const minuteOfDayArb: fc.Arbitrary<number> = fc.integer({ min: 0, max: 24 * 60 - 1 });

/** "HH:mm" for a minute of the day. */
export function formatClockTime(minutes: number): string {
  const hh = String(Math.floor(minutes / 60)).padStart(2, '0');
  const mm = String(minutes % 60).padStart(2, '0');
  return `${hh}:${mm}`;
}
