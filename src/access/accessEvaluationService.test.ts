import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AccessEvaluationService,
  REASON_ACCOUNT_DISABLED,
  REASON_NOT_AUTHENTICATED,
  REASON_NO_PERMISSION,
} from './accessEvaluationService.js';
import { createConditionalRule } from './conditionalPermissions.js';
import { ACCESS_ERROR_CODES } from './errors.js';
import { createPermissionContext } from './permissionContext.js';
import { createDefaultRoleDefinitions } from './roleHierarchy.js';
import type { AuthenticatedUser, IdentityProvider } from './types.js';
import {
  captureAccessError,
  createCapturingLogger,
  createTestEngine,
  flushPromises,
  rejectingAuditSink,
  throwingAuditSink,
  type TestEngine,
} from '../test/accessFixtures.js';

function fixedIdentity(user: AuthenticatedUser | null): IdentityProvider {
  return { currentUser: async () => user };
}

const SELLER: AuthenticatedUser = {
  id: 'seller-1',
  name: 'Test Seller',
  isActive: true,
  roles: ['salesperson'],
};

describe('AccessEvaluationService', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createTestEngine();
  });

  const actingAs = <T>(userId: string | null, fn: () => T): T => engine.identity.runAs(userId, fn);

  // ─── evaluate ──────────────────────────────────────────────────────────────

  describe('evaluate', () => {
    it('denies an unauthenticated caller without caching', async () => {
      const result = await actingAs(null, () => engine.evaluation.evaluate('view_batch'));

      expect(result.granted).toBe(false);
      expect(result.reason).toBe(REASON_NOT_AUTHENTICATED);
      expect(result.grantedBy).toEqual([]);
      expect(result.context.userId).toBe('');
      expect(engine.cache.size).toBe(0);
    });

    it('denies a disabled account regardless of its roles', async () => {
      const result = await actingAs('disabled-1', () => engine.evaluation.evaluate('view_batch'));

      expect(result.granted).toBe(false);
      expect(result.reason).toBe(REASON_ACCOUNT_DISABLED);
      expect(engine.cache.size).toBe(0);
    });

    it('grants through the role closure and names the source', async () => {
      const result = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));

      expect(result.granted).toBe(true);
      expect(result.grantedBy).toEqual(['role:salesperson']);
      expect(result.reason).toBe('Permission granted via: role:salesperson');
    });

    it('grants inherited permissions under the held role', async () => {
      const result = await actingAs('manager-1', () =>
        engine.evaluation.evaluate('maintain_machine'),
      );

      expect(result.granted).toBe(true);
      expect(result.grantedBy).toEqual(['role:workshop_manager']);
    });

    it('denies a permission outside every closure', async () => {
      const result = await actingAs('seller-1', () => engine.evaluation.evaluate('delete_batch'));

      expect(result.granted).toBe(false);
      expect(result.reason).toBe(REASON_NO_PERMISSION);
      expect(result.grantedBy).toEqual([]);
    });

    it('denies a user with no roles', async () => {
      const result = await actingAs('guest-1', () => engine.evaluation.evaluate('view_customer'));
      expect(result.reason).toBe(REASON_NO_PERMISSION);
    });

    it('lists every granting role in held-role order', async () => {
      engine = createTestEngine({
        users: [{ id: 'multi-1', name: 'Multi', roles: ['salesperson', 'warehouse_keeper'] }],
      });
      const result = await actingAs('multi-1', () => engine.evaluation.evaluate('view_inventory'));

      expect(result.grantedBy).toEqual(['role:salesperson', 'role:warehouse_keeper']);
      expect(result.reason).toBe(
        'Permission granted via: role:salesperson, role:warehouse_keeper',
      );
    });

    it('uses the supplied context', async () => {
      const context = createPermissionContext('seller-1', { targetEntityId: 'customer-9' });
      const result = await actingAs('seller-1', () =>
        engine.evaluation.evaluate('view_customer', context),
      );
      expect(result.context).toBe(context);
    });
  });

  // ─── conditional rules ─────────────────────────────────────────────────────

  describe('conditional rules', () => {
    beforeEach(() => {
      engine.hierarchy.addConditionalRule(
        'salesperson',
        createConditionalRule({ permission: 'view_batch', conditions: { warehouse: 'north' } }),
      );
    });

    it('grants when the context matches', async () => {
      const context = createPermissionContext('seller-1', { data: { warehouse: 'north' } });
      const result = await actingAs('seller-1', () =>
        engine.evaluation.evaluate('view_batch', context),
      );

      expect(result.granted).toBe(true);
      expect(result.grantedBy).toEqual(['conditional:salesperson']);
      expect(result.reason).toBe('Permission granted via: conditional:salesperson');
    });

    it('denies when the context does not match', async () => {
      const context = createPermissionContext('seller-1', { data: { warehouse: 'south' } });
      const result = await actingAs('seller-1', () =>
        engine.evaluation.evaluate('view_batch', context),
      );

      expect(result.granted).toBe(false);
    });

    it('adds one source per matching rule', async () => {
      engine.hierarchy.addConditionalRule(
        'salesperson',
        createConditionalRule({ permission: 'view_batch', priority: 1 }),
      );
      const context = createPermissionContext('seller-1', { data: { warehouse: 'north' } });
      const result = await actingAs('seller-1', () =>
        engine.evaluation.evaluate('view_batch', context),
      );

      expect(result.grantedBy).toEqual(['conditional:salesperson', 'conditional:salesperson']);
    });

    it('lists the role source before the conditional one', async () => {
      engine.hierarchy.addConditionalRule(
        'salesperson',
        createConditionalRule({ permission: 'view_customer' }),
      );
      const result = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));

      expect(result.grantedBy).toEqual(['role:salesperson', 'conditional:salesperson']);
    });

    it('applies weekday constraints in the configured time zone', async () => {
      engine = createTestEngine({ config: { timeZone: 'Asia/Shanghai' } });
      engine.hierarchy.addConditionalRule(
        'salesperson',
        createConditionalRule({ permission: 'view_batch', timeConstraint: { daysOfWeek: [1] } }),
      );
      // Saturday 20:00 UTC is Sunday 04:00 in Shanghai.
      const context = createPermissionContext('seller-1', {}, new Date('2024-06-15T20:00:00Z'));
      const result = await actingAs('seller-1', () =>
        engine.evaluation.evaluate('view_batch', context),
      );

      expect(result.granted).toBe(true);
    });
  });

  // ─── caching ───────────────────────────────────────────────────────────────

  describe('caching', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('returns the cached result on repeat evaluation', async () => {
      const first = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      const second = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));

      expect(second).toBe(first);
      expect(engine.cache.stats().hits).toBe(1);
    });

    it('audits cache hits as well', async () => {
      await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));

      const checks = await engine.audit.query({ event: 'permission_check' });
      expect(checks).toHaveLength(2);
    });

    it('recomputes once the TTL has passed', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-12T08:00:00Z'));
      engine = createTestEngine({ config: { cacheTtlMs: 1000 } });

      const first = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      vi.setSystemTime(new Date('2024-06-12T08:00:00.999Z'));
      const cached = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      vi.setSystemTime(new Date('2024-06-12T08:00:01Z'));
      const fresh = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));

      expect(cached).toBe(first);
      expect(fresh).not.toBe(first);
      expect(fresh.evaluatedAt).toEqual(new Date('2024-06-12T08:00:01Z'));
    });

    it('stops serving a cached grant once the account is disabled', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-12T08:00:00Z'));
      engine = createTestEngine();

      const before = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      engine.directory.setActive('seller-1', false);
      vi.setSystemTime(new Date('2024-06-12T08:01:00Z'));
      const after = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));

      expect(before.granted).toBe(true);
      expect(after.granted).toBe(false);
      expect(after.reason).toBe(REASON_ACCOUNT_DISABLED);
      expect(after.grantedBy).toEqual([]);
    });

    it('grants again as soon as the account is re-enabled', async () => {
      engine.directory.setActive('seller-1', false);
      await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      engine.directory.setActive('seller-1', true);

      const result = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));

      expect(result.granted).toBe(true);
      expect(result.grantedBy).toEqual(['role:salesperson']);
    });

    it('keeps cached results per user', async () => {
      await actingAs('seller-1', () => engine.evaluation.evaluate('view_inventory'));
      const keeper = await actingAs('keeper-1', () => engine.evaluation.evaluate('view_inventory'));

      expect(keeper.grantedBy).toEqual(['role:warehouse_keeper']);
      expect(engine.cache.size).toBe(2);
    });
  });

  // ─── evaluateMany ──────────────────────────────────────────────────────────

  describe('evaluateMany', () => {
    it('evaluates every permission independently', async () => {
      const results = await actingAs('seller-1', () =>
        engine.evaluation.evaluateMany(['delete_batch', 'view_customer', 'view_inventory']),
      );

      expect([...results.keys()]).toEqual(['delete_batch', 'view_customer', 'view_inventory']);
      expect([...results.values()].map((r) => r.granted)).toEqual([false, true, true]);
    });

    it('returns an empty map for no permissions', async () => {
      const results = await actingAs('seller-1', () => engine.evaluation.evaluateMany([]));
      expect(results.size).toBe(0);
    });
  });

  // ─── queries ───────────────────────────────────────────────────────────────

  describe('queries', () => {
    it('lists the current user permissions sorted by label', async () => {
      const permissions = await actingAs('seller-1', () =>
        engine.evaluation.getCurrentUserPermissions(),
      );
      expect(permissions).toEqual([
        'create_customer',
        'edit_customer',
        'manage_customer_orders',
        'view_customer',
        'view_inventory',
      ]);
    });

    it('groups the current user permissions by category', async () => {
      const grouped = await actingAs('seller-1', () =>
        engine.evaluation.getPermissionsByCategory(),
      );
      expect(grouped).toEqual({
        customer_management: [
          'create_customer',
          'edit_customer',
          'manage_customer_orders',
          'view_customer',
        ],
        inventory_management: ['view_inventory'],
      });
    });

    it('returns nothing for an anonymous caller', async () => {
      expect(await actingAs(null, () => engine.evaluation.getCurrentUserPermissions())).toEqual([]);
      const roles = await actingAs(null, () => engine.evaluation.getCurrentUserRoleHierarchy());
      expect(roles).toEqual([]);
    });

    it('lists held and inherited roles by level', async () => {
      const roles = await actingAs('manager-1', () =>
        engine.evaluation.getCurrentUserRoleHierarchy(),
      );
      expect(roles).toEqual([
        'workshop_technician',
        'eva_granulation_technician',
        'workshop_manager',
      ]);
    });

    it('stamps a context with the current user', async () => {
      const context = await actingAs('seller-1', () =>
        engine.evaluation.createContext({ targetEntityId: 'customer-9', data: { region: 'east' } }),
      );

      expect(context.userId).toBe('seller-1');
      expect(context.targetEntityId).toBe('customer-9');
      expect(context.data).toEqual({ region: 'east' });
    });

    it('rejects unsupported context data', async () => {
      const error = await captureAccessError(
        actingAs('seller-1', () => engine.evaluation.createContext({ data: { nested: { a: 1 } } })),
      );
      expect(error.code).toBe(ACCESS_ERROR_CODES.INVALID_INPUT);
    });
  });

  // ─── requirePermission ─────────────────────────────────────────────────────

  describe('requirePermission', () => {
    it('returns the acting user when granted', async () => {
      const user = await actingAs('admin-1', () =>
        engine.evaluation.requirePermission('assign_role', 'assign roles'),
      );
      expect(user.id).toBe('admin-1');
    });

    it('rejects an anonymous caller', async () => {
      const error = await captureAccessError(
        actingAs(null, () => engine.evaluation.requirePermission('assign_role', 'assign roles')),
      );
      expect(error.code).toBe(ACCESS_ERROR_CODES.AUTHENTICATION_MISSING);
      expect(error.message).toBe('Authentication is required to assign roles');
    });

    it('rejects a disabled account', async () => {
      const error = await captureAccessError(
        actingAs('disabled-1', () =>
          engine.evaluation.requirePermission('assign_role', 'assign roles'),
        ),
      );
      expect(error.code).toBe(ACCESS_ERROR_CODES.ACCOUNT_DISABLED);
      expect(error.message).toBe('Account disabled-1 is disabled');
    });

    it('rejects a caller without the permission', async () => {
      const error = await captureAccessError(
        actingAs('seller-1', () =>
          engine.evaluation.requirePermission('assign_role', 'assign roles'),
        ),
      );
      expect(error.code).toBe(ACCESS_ERROR_CODES.INSUFFICIENT_PERMISSION);
      expect(error.message).toBe('Permission assign_role is required to assign roles');
      expect(error.details).toEqual({ permission: 'assign_role' });
    });
  });

  // ─── role definition mutations ─────────────────────────────────────────────

  describe('grantPermissionToRole', () => {
    it('grants immediately, dropping cached denials', async () => {
      const before = await actingAs('seller-1', () => engine.evaluation.evaluate('delete_batch'));
      expect(before.granted).toBe(false);

      await actingAs('admin-1', () =>
        engine.evaluation.grantPermissionToRole('delete_batch', 'salesperson'),
      );

      const after = await actingAs('seller-1', () => engine.evaluation.evaluate('delete_batch'));
      expect(after.granted).toBe(true);
      expect(after.grantedBy).toEqual(['role:salesperson']);
    });

    it('audits the grant with the caller name', async () => {
      await actingAs('admin-1', () =>
        engine.evaluation.grantPermissionToRole('delete_batch', 'salesperson'),
      );

      const [entry] = await engine.audit.query({ event: 'permission_granted' });
      expect(entry?.userId).toBe('admin-1');
      expect(entry?.details).toEqual({
        permission: 'delete_batch',
        target_role: 'salesperson',
        granted_by: 'Test Admin',
      });
    });

    it('treats an existing permission as a no-op', async () => {
      const invalidationsBefore = engine.cache.stats().invalidations;
      await actingAs('admin-1', () =>
        engine.evaluation.grantPermissionToRole('view_customer', 'salesperson'),
      );

      expect(engine.cache.stats().invalidations).toBe(invalidationsBefore);
      expect(await engine.audit.query({ event: 'permission_granted' })).toEqual([]);
    });

    it('requires manage_permissions', async () => {
      const error = await captureAccessError(
        actingAs('manager-1', () =>
          engine.evaluation.grantPermissionToRole('delete_batch', 'salesperson'),
        ),
      );
      expect(error.code).toBe(ACCESS_ERROR_CODES.INSUFFICIENT_PERMISSION);
      expect(error.message).toBe('Permission manage_permissions is required to grant permissions');
      expect(engine.hierarchy.resolvePermissions('salesperson').has('delete_batch')).toBe(false);
    });

    it('rejects a role that is not defined', async () => {
      engine = createTestEngine({
        roleDefinitions: createDefaultRoleDefinitions().filter((d) => d.role !== 'salesperson'),
      });
      const error = await captureAccessError(
        actingAs('admin-1', () =>
          engine.evaluation.grantPermissionToRole('delete_batch', 'salesperson'),
        ),
      );
      expect(error.code).toBe(ACCESS_ERROR_CODES.NOT_FOUND);
      expect(error.message).toBe('Role not defined: salesperson');
    });
  });

  describe('revokePermissionFromRole', () => {
    it('revokes immediately and audits', async () => {
      await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      await actingAs('admin-1', () =>
        engine.evaluation.revokePermissionFromRole('view_customer', 'salesperson'),
      );

      const after = await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer'));
      expect(after.granted).toBe(false);

      const [entry] = await engine.audit.query({ event: 'permission_revoked' });
      expect(entry?.details).toEqual({
        permission: 'view_customer',
        target_role: 'salesperson',
        revoked_by: 'Test Admin',
      });
    });

    it('does nothing for a permission the role only inherits', async () => {
      const invalidationsBefore = engine.cache.stats().invalidations;
      await actingAs('admin-1', () =>
        engine.evaluation.revokePermissionFromRole('maintain_machine', 'workshop_manager'),
      );

      expect(engine.hierarchy.resolvePermissions('workshop_manager').has('maintain_machine')).toBe(
        true,
      );
      expect(await engine.audit.query({ event: 'permission_revoked' })).toEqual([]);
      expect(engine.cache.stats().invalidations).toBe(invalidationsBefore);
    });

    it('serializes with concurrent grants', async () => {
      await actingAs('admin-1', () =>
        Promise.all([
          engine.evaluation.grantPermissionToRole('delete_batch', 'salesperson'),
          engine.evaluation.revokePermissionFromRole('delete_batch', 'salesperson'),
        ]),
      );

      expect(engine.hierarchy.getDefinition('salesperson')?.permissions).not.toContain(
        'delete_batch',
      );
      const events = (await engine.audit.query())
        .map((entry) => entry.event)
        .filter((event) => event !== 'permission_check');
      expect(events).toEqual(['permission_granted', 'permission_revoked']);
    });
  });

  describe('addConditionalRule', () => {
    it('adds the rule and audits its conditions', async () => {
      const rule = createConditionalRule({
        permission: 'view_batch',
        conditions: { warehouse: 'north' },
        priority: 3,
      });
      await actingAs('admin-1', () => engine.evaluation.addConditionalRule('salesperson', rule));

      expect(engine.hierarchy.getConditionalRules('salesperson')).toEqual([rule]);
      const [entry] = await engine.audit.query({ event: 'conditional_rule_added' });
      expect(entry?.details).toEqual({
        permission: 'view_batch',
        target_role: 'salesperson',
        conditions: '{"warehouse":"north"}',
        priority: '3',
        added_by: 'Test Admin',
      });
    });

    it('drops cached results', async () => {
      await actingAs('seller-1', () => engine.evaluation.evaluate('view_batch'));
      await actingAs('admin-1', () =>
        engine.evaluation.addConditionalRule(
          'salesperson',
          createConditionalRule({ permission: 'view_batch' }),
        ),
      );

      const result = await actingAs('seller-1', () => engine.evaluation.evaluate('view_batch'));
      expect(result.grantedBy).toEqual(['conditional:salesperson']);
    });
  });

  // ─── audit delivery ────────────────────────────────────────────────────────

  describe('audit delivery', () => {
    it('records permission checks with the target entity', async () => {
      const context = createPermissionContext('seller-1', { targetEntityId: 'customer-9' });
      await actingAs('seller-1', () => engine.evaluation.evaluate('view_customer', context));
      await actingAs(null, () => engine.evaluation.evaluate('view_customer'));

      const checks = await engine.audit.query({ event: 'permission_check' });
      expect(checks.map((entry) => [entry.userId, entry.details])).toEqual([
        [
          'seller-1',
          {
            permission: 'view_customer',
            granted: 'true',
            reason: 'Permission granted via: role:salesperson',
            target_entity: 'customer-9',
          },
        ],
        [
          '',
          {
            permission: 'view_customer',
            granted: 'false',
            reason: REASON_NOT_AUTHENTICATED,
            target_entity: 'none',
          },
        ],
      ]);
    });

    it('keeps the decision when the sink rejects', async () => {
      const { logger, entries } = createCapturingLogger();
      const service = new AccessEvaluationService({
        identity: fixedIdentity(SELLER),
        auditSink: rejectingAuditSink,
        logger,
      });

      const result = await service.evaluate('view_customer');
      await flushPromises();

      expect(result.granted).toBe(true);
      expect(service.auditFailureCount).toBe(1);
      const warning = entries.find((entry) => entry.level === 'warn');
      expect(warning?.message).toBe('Audit sink rejected security event');
      expect(warning?.component).toBe('access-evaluation');
      expect(warning?.metadata).toEqual({
        event: 'permission_check',
        error: 'audit store unavailable',
      });
    });

    it('keeps the decision when the sink throws', async () => {
      const service = new AccessEvaluationService({
        identity: fixedIdentity(SELLER),
        auditSink: throwingAuditSink,
      });

      const result = await service.evaluate('view_customer');

      expect(result.granted).toBe(true);
      expect(service.auditFailureCount).toBe(1);
    });
  });
});
