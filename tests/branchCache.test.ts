import { describe, expect, it } from '@jest/globals';

import { createBranchCache } from '../src/features/branches/cache';
import type { Branch, BranchDirectory } from '../src/features/branches/types';

import { MG_ROAD, WHITEFIELD, createFakeBranches } from './support/fakes';

describe('createBranchCache', () => {
  it('serves repeated lookups from memory', async () => {
    const directory = createFakeBranches([MG_ROAD]);
    const cache = createBranchCache(directory);

    await expect(cache.getBranch(MG_ROAD.id)).resolves.toEqual(MG_ROAD);
    await expect(cache.getBranch(MG_ROAD.id)).resolves.toEqual(MG_ROAD);

    expect(directory.lookups).toEqual([MG_ROAD.id]);
    expect(cache.size()).toBe(1);
  });

  it('shares one read between concurrent lookups', async () => {
    const directory = createFakeBranches([MG_ROAD]);
    const cache = createBranchCache(directory);

    await Promise.all([cache.getBranch(MG_ROAD.id), cache.getBranch(MG_ROAD.id)]);

    expect(directory.lookups).toEqual([MG_ROAD.id]);
  });

  it('does not remember a missing branch', async () => {
    const directory = createFakeBranches([]);
    const cache = createBranchCache(directory);

    await expect(cache.getBranch('blr-new')).resolves.toBeNull();
    await expect(cache.getBranch('blr-new')).resolves.toBeNull();

    expect(directory.lookups).toEqual(['blr-new', 'blr-new']);
    expect(cache.size()).toBe(0);
  });

  it('does not remember a failed read', async () => {
    let calls = 0;
    const flaky: BranchDirectory = {
      getBranch: async (): Promise<Branch | null> => {
        calls += 1;
        if (calls === 1) {
          throw new Error('unavailable');
        }
        return WHITEFIELD;
      },
    };
    const cache = createBranchCache(flaky);

    await expect(cache.getBranch(WHITEFIELD.id)).rejects.toThrow('unavailable');
    await expect(cache.getBranch(WHITEFIELD.id)).resolves.toEqual(WHITEFIELD);
    expect(calls).toBe(2);
  });

  it('drops a single branch or all of them', async () => {
    const directory = createFakeBranches([MG_ROAD, WHITEFIELD]);
    const cache = createBranchCache(directory);
    await cache.getBranch(MG_ROAD.id);
    await cache.getBranch(WHITEFIELD.id);

    cache.invalidate(MG_ROAD.id);
    expect(cache.size()).toBe(1);

    cache.invalidate();
    expect(cache.size()).toBe(0);

    await cache.getBranch(WHITEFIELD.id);
    expect(directory.lookups).toEqual([MG_ROAD.id, WHITEFIELD.id, WHITEFIELD.id]);
  });
});
