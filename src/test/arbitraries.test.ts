/**
 * Smoke tests for the fast-check arbitraries.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { isPermission } from '../access/permissionCatalog.js';
import { ROLES } from '../access/types.js';
import {
  formatClockTime,
  minuteOfDayArb,
  permissionArb,
  roleDefinitionsArb,
} from './arbitraries.js';

describe('test arbitraries', () => {
  it('permissionArb generates catalog permissions', () => {
    fc.assert(
      fc.property(permissionArb, (permission) => {
        expect(isPermission(permission)).toBe(true);
      }),
      { numRuns: 50 },
    );
  });

  it('roleDefinitionsArb generates exactly one definition per role', () => {
    fc.assert(
      fc.property(roleDefinitionsArb, (definitions) => {
        expect(definitions.map((d) => d.role)).toEqual([...ROLES]);
      }),
      { numRuns: 50 },
    );
  });

  it('minuteOfDayArb stays within one day', () => {
    fc.assert(
      fc.property(minuteOfDayArb, (minutes) => {
        expect(minutes).toBeGreaterThanOrEqual(0);
        expect(minutes).toBeLessThan(1440);
      }),
      { numRuns: 50 },
    );
  });

  it('formatClockTime pads hours and minutes', () => {
    expect(formatClockTime(0)).toBe('00:00');
    expect(formatClockTime(6 * 60 + 5)).toBe('06:05');
    expect(formatClockTime(1439)).toBe('23:59');
  });
});
