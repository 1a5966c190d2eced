/**
 * Default user groups created for every FPO, with the permissions each
 * group holds on the `fpo` resource.
 */

export interface RoleGroup {
  name: string;
  description: string;
  permissions: string[];
}

export const CEO_ROLE = 'CEO';

export const DEFAULT_ROLE_GROUPS: readonly RoleGroup[] = [
  {
    name: 'directors',
    description: 'Board of directors',
    permissions: ['manage', 'read', 'write', 'approve'],
  },
  {
    name: 'shareholders',
    description: 'Member farmers holding shares',
    permissions: ['read', 'vote'],
  },
  {
    name: 'store_staff',
    description: 'Input store staff',
    permissions: ['read', 'write', 'inventory'],
  },
  {
    name: 'store_managers',
    description: 'Input store managers',
    permissions: ['read', 'write', 'manage', 'inventory', 'reports'],
  },
];
