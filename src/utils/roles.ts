import type { UserRole } from '../features/users/types';

export type RoleCapability =
  | 'view_own_attendance'
  | 'view_branch_attendance'
  | 'view_all_branches';

const ROLE_RANKS: Record<UserRole, number> = {
  staff: 1,
  manager: 2,
  admin: 3,
};

const CAPABILITY_RANKS: Record<RoleCapability, number> = {
  view_own_attendance: 1,
  view_branch_attendance: 2,
  view_all_branches: 3,
};

const isUserRole = (role: string): role is UserRole => Object.hasOwn(ROLE_RANKS, role);

export const rankOfRole = (role: string | null | undefined): number => {
  if (!role || !isUserRole(role)) {
    return 0;
  }
  return ROLE_RANKS[role];
};

export const hasCapability = (
  role: string | null | undefined,
  capability: RoleCapability,
): boolean => {
  const requiredRank = CAPABILITY_RANKS[capability] ?? Number.POSITIVE_INFINITY;
  return rankOfRole(role) >= requiredRank;
};

export const isManagerRole = (role: string | null | undefined): boolean => rankOfRole(role) >= 2;

export const isAdminRole = (role: string | null | undefined): boolean => role === 'admin';
