/**
 * Permission vocabulary consumed by the billing core.
 *
 * The core never decides who may do what; it asks a PermissionChecker.
 * The role matrix below is the default checker used when no external
 * authorization service is wired in.
 */

export const PERMISSIONS = [
  'create_invoice',
  'edit_invoice',
  'delete_invoice',
  'create_payment',
  'verify_payment',
  'refund_payment',
  'create_print_job',
  'manage_production',
  'manage_pricing',
] as const;

export type Permission = typeof PERMISSIONS[number];

export type Actor = {
  userId: string;
  companyId: string;
  role: string;
};

export interface PermissionChecker {
  can(actor: Actor, permission: Permission): boolean | Promise<boolean>;
}

export const ROLE_PERMISSIONS: Record<string, readonly Permission[]> = {
  super_admin: PERMISSIONS,
  company_admin: PERMISSIONS,
  branch_manager: [
    'create_invoice',
    'edit_invoice',
    'create_payment',
    'verify_payment',
    'create_print_job',
    'manage_production',
  ],
  cashier: ['create_invoice', 'create_payment'],
  production_staff: ['manage_production'],
};

export function normalizeRole(role: string): string {
  return role.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function createRolePermissionChecker(
  matrix: Record<string, readonly Permission[]> = ROLE_PERMISSIONS,
): PermissionChecker {
  return {
    can(actor, permission) {
      const role = normalizeRole(actor.role);
      if (!Object.hasOwn(matrix, role)) return false;
      return matrix[role].includes(permission);
    },
  };
}
