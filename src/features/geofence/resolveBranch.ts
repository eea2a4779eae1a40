import { branchNotAssigned, branchNotFound, withStorageErrors } from '../../lib/errors';
import type { Branch, BranchDirectory } from '../branches/types';
import type { UserProfile } from '../users/types';

export const resolveBranch = async (
  profile: Pick<UserProfile, 'branchId'>,
  branches: BranchDirectory,
): Promise<Branch> => {
  const branchId = profile.branchId?.trim();
  if (!branchId) {
    throw branchNotAssigned();
  }

  const branch = await withStorageErrors(() => branches.getBranch(branchId));
  if (!branch) {
    throw branchNotFound(branchId);
  }
  return branch;
};
