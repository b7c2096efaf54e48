import { createRolePermissionChecker, normalizeRole, PERMISSIONS } from '../permissions';

const actor = (role: string) => ({ userId: 'u-1', companyId: 'co-1', role });

describe('normalizeRole', () => {
  test('accepts display names and slugs alike', () => {
    expect(normalizeRole('Company Admin')).toBe('company_admin');
    expect(normalizeRole(' branch-manager ')).toBe('branch_manager');
    expect(normalizeRole('cashier')).toBe('cashier');
  });
});

describe('createRolePermissionChecker', () => {
  const checker = createRolePermissionChecker();

  test('admins hold every permission', () => {
    for (const permission of PERMISSIONS) {
      expect(checker.can(actor('Company Admin'), permission)).toBe(true);
    }
  });

  test('cashiers record payments but do not verify them', () => {
    expect(checker.can(actor('Cashier'), 'create_payment')).toBe(true);
    expect(checker.can(actor('Cashier'), 'verify_payment')).toBe(false);
  });

  test('branch managers verify but do not refund', () => {
    expect(checker.can(actor('Branch Manager'), 'verify_payment')).toBe(true);
    expect(checker.can(actor('Branch Manager'), 'refund_payment')).toBe(false);
  });

  test('unknown roles hold nothing', () => {
    expect(checker.can(actor('Guest'), 'create_invoice')).toBe(false);
    expect(checker.can(actor('constructor'), 'create_invoice')).toBe(false);
  });

  test('takes a custom matrix', () => {
    const custom = createRolePermissionChecker({ auditor: ['verify_payment'] });
    expect(custom.can(actor('Auditor'), 'verify_payment')).toBe(true);
    expect(custom.can(actor('Company Admin'), 'verify_payment')).toBe(false);
  });
});
