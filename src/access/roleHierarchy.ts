/**
 * Role Hierarchy
 *
 * Holds the mutable role definitions as an arena keyed by role, with the
 * inheritance edges as an adjacency list. Resolution walks the graph
 * iteratively with a visited set, so cyclic or self-referential inheritance
 * stops descending instead of recursing forever.
 *
 * @module access/roleHierarchy
 */

import { ALL_PERMISSIONS } from './permissionCatalog.js';
import type { ConditionalPermissionRule, Permission, Role, RoleDefinition } from './types.js';

interface RoleNode {
  role: Role;
  permissions: Permission[];
  conditionalRules: ConditionalPermissionRule[];
  level: number;
}

function copyDefinition(node: RoleNode, inheritedRoles: readonly Role[]): RoleDefinition {
  return {
    role: node.role,
    permissions: [...node.permissions],
    conditionalRules: node.conditionalRules.map((rule) => ({
      ...rule,
      conditions: { ...rule.conditions },
    })),
    inheritedRoles: [...inheritedRoles],
    level: node.level,
  };
}

export class RoleHierarchy {
  /** role → node */
  private readonly nodes = new Map<Role, RoleNode>();
  /** role → directly inherited roles */
  private readonly edges = new Map<Role, Role[]>();

  constructor(definitions: readonly RoleDefinition[] = createDefaultRoleDefinitions()) {
    for (const definition of definitions) {
      this.define(definition);
    }
  }

  /**
   * Register or replace a role definition.
   */
  define(definition: RoleDefinition): void {
    this.nodes.set(definition.role, {
      role: definition.role,
      permissions: [...new Set(definition.permissions)],
      conditionalRules: sortByPriority(definition.conditionalRules),
      level: definition.level,
    });
    this.edges.set(definition.role, [...definition.inheritedRoles]);
  }

  has(role: Role): boolean {
    return this.nodes.has(role);
  }

  getDefinition(role: Role): RoleDefinition | undefined {
    const node = this.nodes.get(role);
    return node ? copyDefinition(node, this.edges.get(role) ?? []) : undefined;
  }

  listDefinitions(): RoleDefinition[] {
    return [...this.nodes.values()].map((node) =>
      copyDefinition(node, this.edges.get(node.role) ?? []),
    );
  }

  getLevel(role: Role): number {
    return this.nodes.get(role)?.level ?? 0;
  }

  /** Conditional rules owned directly by `role`, highest priority first. */
  getConditionalRules(role: Role): readonly ConditionalPermissionRule[] {
    return this.nodes.get(role)?.conditionalRules ?? [];
  }

  /**
   * Every role reachable from `role` by inheritance edges, including itself,
   * in discovery order. Unknown roles contribute nothing beyond themselves.
   */
  private reachable(role: Role): Role[] {
    const visited = new Set<Role>();
    const order: Role[] = [];
    const stack: Role[] = [role];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      order.push(current);

      const parents = this.edges.get(current) ?? [];
      // Push in reverse so the first listed parent is visited first.
      for (let i = parents.length - 1; i >= 0; i--) {
        const parent = parents[i];
        if (parent !== undefined && !visited.has(parent)) stack.push(parent);
      }
    }

    return order;
  }

  /**
   * Transitive permission closure: own permissions plus those of every
   * inherited role. An unknown role yields an empty set.
   */
  resolvePermissions(role: Role): Set<Permission> {
    const closure = new Set<Permission>();
    if (!this.nodes.has(role)) return closure;

    for (const reached of this.reachable(role)) {
      const node = this.nodes.get(reached);
      if (!node) continue;
      for (const permission of node.permissions) closure.add(permission);
    }
    return closure;
  }

  /**
   * Self plus all transitively inherited roles, ascending by level.
   * Roles sharing a level keep their discovery order.
   */
  hierarchyPath(role: Role): Role[] {
    return this.reachable(role)
      .map((reached, index) => ({ reached, index, level: this.getLevel(reached) }))
      .sort((a, b) => a.level - b.level || a.index - b.index)
      .map((entry) => entry.reached);
  }

  // ─── Mutations ─────────────────────────────────────────────────────────────

  /**
   * Add a base permission. Returns false when the role is unknown or
   * already owns the permission.
   */
  addPermission(role: Role, permission: Permission): boolean {
    const node = this.nodes.get(role);
    if (!node || node.permissions.includes(permission)) return false;
    node.permissions.push(permission);
    return true;
  }

  /**
   * Remove a base permission. Returns false when the role is unknown or
   * does not own the permission directly.
   */
  removePermission(role: Role, permission: Permission): boolean {
    const node = this.nodes.get(role);
    if (!node) return false;
    const index = node.permissions.indexOf(permission);
    if (index === -1) return false;
    node.permissions.splice(index, 1);
    return true;
  }

  addConditionalRule(role: Role, rule: ConditionalPermissionRule): boolean {
    const node = this.nodes.get(role);
    if (!node) return false;
    node.conditionalRules = sortByPriority([...node.conditionalRules, rule]);
    return true;
  }
}

function sortByPriority(rules: readonly ConditionalPermissionRule[]): ConditionalPermissionRule[] {
  return rules
    .map((rule, index) => ({ rule: { ...rule, conditions: { ...rule.conditions } }, index }))
    .sort((a, b) => b.rule.priority - a.rule.priority || a.index - b.index)
    .map((entry) => entry.rule);
}

/**
 * The standard production-floor hierarchy.
 */
export function createDefaultRoleDefinitions(): RoleDefinition[] {
  return [
    {
      role: 'salesperson',
      permissions: [
        'view_customer',
        'create_customer',
        'edit_customer',
        'manage_customer_orders',
        'view_inventory',
      ],
      conditionalRules: [],
      inheritedRoles: [],
      level: 1,
    },
    {
      role: 'warehouse_keeper',
      permissions: [
        'manage_inventory',
        'view_inventory',
        'update_stock',
        'manage_suppliers',
        'view_batch',
      ],
      conditionalRules: [],
      inheritedRoles: [],
      level: 1,
    },
    {
      role: 'workshop_technician',
      permissions: [
        'view_machine',
        'operate_machine',
        'maintain_machine',
        'view_batch',
        'view_production_config',
      ],
      conditionalRules: [],
      inheritedRoles: [],
      level: 2,
    },
    {
      role: 'eva_granulation_technician',
      permissions: [
        'view_machine',
        'operate_machine',
        'view_inventory',
        'update_stock',
        'quality_control',
      ],
      conditionalRules: [],
      inheritedRoles: [],
      level: 2,
    },
    {
      role: 'workshop_manager',
      permissions: [
        'create_batch',
        'edit_batch',
        'view_batch',
        'approve_batch',
        'complete_batch',
        'create_machine',
        'edit_machine',
        'view_machine',
        'operate_machine',
        'reset_machine',
        'create_production_config',
        'edit_production_config',
        'view_production_config',
        'schedule_production',
        'monitor_production',
        'quality_control',
      ],
      conditionalRules: [],
      inheritedRoles: ['workshop_technician', 'eva_granulation_technician'],
      level: 3,
    },
    {
      role: 'administrator',
      permissions: [...ALL_PERMISSIONS],
      conditionalRules: [],
      inheritedRoles: ['workshop_manager', 'warehouse_keeper', 'salesperson'],
      level: 4,
    },
    {
      role: 'unauthorized',
      permissions: [],
      conditionalRules: [],
      inheritedRoles: [],
      level: 0,
    },
  ];
}
