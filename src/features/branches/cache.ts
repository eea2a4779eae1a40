import type { Branch, BranchDirectory } from './types';

export interface BranchCache extends BranchDirectory {
  /** Drops one branch, or every branch when called without an id. */
  invalidate(branchId?: string): void;
  size(): number;
}

/**
 * Branch lookups keyed by id. Entries live until invalidated; misses are not cached
 * so a branch created after the first lookup is picked up on the next one.
 */
export const createBranchCache = (directory: BranchDirectory): BranchCache => {
  const entries = new Map<string, Promise<Branch | null>>();

  const getBranch = (branchId: string): Promise<Branch | null> => {
    const cached = entries.get(branchId);
    if (cached) {
      return cached;
    }

    const lookup = directory.getBranch(branchId).then(
      (branch) => {
        if (!branch && entries.get(branchId) === lookup) {
          entries.delete(branchId);
        }
        return branch;
      },
      (error: unknown) => {
        if (entries.get(branchId) === lookup) {
          entries.delete(branchId);
        }
        throw error;
      },
    );
    entries.set(branchId, lookup);
    return lookup;
  };

  return {
    getBranch,
    invalidate: (branchId) => {
      if (branchId === undefined) {
        entries.clear();
        return;
      }
      entries.delete(branchId);
    },
    size: () => entries.size,
  };
};
