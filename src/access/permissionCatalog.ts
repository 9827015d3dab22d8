/**
 * Permission Catalog
 *
 * The closed set of fine-grained permissions, grouped by category.
 * Nothing here changes at runtime.
 *
 * @module access/permissionCatalog
 */

const CATALOG = {
  batch_management: [
    'create_batch',
    'edit_batch',
    'delete_batch',
    'view_batch',
    'approve_batch',
    'complete_batch',
  ],
  machine_management: [
    'create_machine',
    'edit_machine',
    'delete_machine',
    'view_machine',
    'operate_machine',
    'maintain_machine',
    'reset_machine',
  ],
  user_management: [
    'create_user',
    'edit_user',
    'delete_user',
    'view_user',
    'assign_role',
    'manage_permissions',
  ],
  system_administration: [
    'view_system_health',
    'configure_system',
    'generate_reports',
    'access_analytics',
    'manage_notifications',
    'view_audit_logs',
    'export_data',
    'import_data',
    'backup_data',
    'restore_data',
    'manage_system_settings',
    'view_system_configuration',
    'approve_configuration_changes',
    'manage_system_security',
    'perform_security_scan',
    'manage_deployments',
    'execute_deployments',
    'execute_rollbacks',
    'monitor_system_health',
    'execute_recovery_actions',
  ],
  production_management: [
    'create_production_config',
    'edit_production_config',
    'view_production_config',
    'schedule_production',
    'monitor_production',
    'quality_control',
  ],
  inventory_management: ['manage_inventory', 'view_inventory', 'update_stock', 'manage_suppliers'],
  customer_management: [
    'create_customer',
    'edit_customer',
    'delete_customer',
    'view_customer',
    'manage_customer_orders',
  ],
} as const;

export type PermissionCategory = keyof typeof CATALOG;

export type Permission = (typeof CATALOG)[PermissionCategory][number];

export const PERMISSION_CATEGORIES: readonly PermissionCategory[] = [
  'batch_management',
  'machine_management',
  'user_management',
  'system_administration',
  'production_management',
  'inventory_management',
  'customer_management',
];

export function getCategoryPermissions(category: PermissionCategory): readonly Permission[] {
  return CATALOG[category];
}

export const ALL_PERMISSIONS: readonly Permission[] = PERMISSION_CATEGORIES.flatMap(
  (category): readonly Permission[] => getCategoryPermissions(category),
);

const CATEGORY_BY_PERMISSION = new Map<string, PermissionCategory>(
  PERMISSION_CATEGORIES.flatMap((category) =>
    getCategoryPermissions(category).map(
      (permission): [string, PermissionCategory] => [permission, category],
    ),
  ),
);

/** Narrow an arbitrary value to a catalog permission. */
export function isPermission(value: unknown): value is Permission {
  return typeof value === 'string' && CATEGORY_BY_PERMISSION.has(value);
}

export function isPermissionCategory(value: unknown): value is PermissionCategory {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CATALOG, value);
}

export function getPermissionCategory(permission: Permission): PermissionCategory {
  const category = CATEGORY_BY_PERMISSION.get(permission);
  if (!category) {
    throw new Error(`Permission not in catalog: ${permission}`);
  }
  return category;
}

function humanize(id: string): string {
  const words = id.replace(/_/g, ' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Human-readable label, e.g. `view_machine` → "View machine".
 */
export function getPermissionLabel(permission: Permission): string {
  return humanize(permission);
}

export function getCategoryLabel(category: PermissionCategory): string {
  return humanize(category);
}

/** Sort by display label, the order permission lists are shown in. */
export function sortPermissionsByLabel(permissions: Iterable<Permission>): Permission[] {
  return [...permissions].sort((a, b) => {
    const left = getPermissionLabel(a);
    const right = getPermissionLabel(b);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });
}

/** Group permissions by their category, preserving input order within each group. */
export function groupPermissionsByCategory(
  permissions: Iterable<Permission>,
): Partial<Record<PermissionCategory, Permission[]>> {
  const grouped: Partial<Record<PermissionCategory, Permission[]>> = {};
  for (const permission of permissions) {
    const category = getPermissionCategory(permission);
    const bucket = grouped[category];
    if (bucket) {
      bucket.push(permission);
    } else {
      grouped[category] = [permission];
    }
  }
  return grouped;
}
