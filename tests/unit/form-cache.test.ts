import { describe, it, expect, vi } from 'vitest';
import { FormCache } from '../../src/content/form-cache.js';
import type { DrawCommand } from '../../src/types.js';

describe('FormCache', () => {
  it('expands a form once per scope and name', () => {
    const cache = new FormCache();
    const expand = vi.fn((): DrawCommand[] => [{ op: 'PushState' }, { op: 'PopState' }]);

    const first = cache.getOrExpand('r1', 'Fm0', expand);
    const second = cache.getOrExpand('r1', 'Fm0', expand);

    expect(expand).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(cache.expansions).toBe(1);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('keeps equal names in different scopes apart', () => {
    const cache = new FormCache();
    cache.getOrExpand('r1', 'Fm0', () => [{ op: 'PushState' }]);
    cache.getOrExpand('r2', 'Fm0', () => [{ op: 'PopState' }]);

    expect(cache.size).toBe(2);
    expect(cache.get('r2', 'Fm0')).toEqual([{ op: 'PopState' }]);
    expect(cache.get('r3', 'Fm0')).toBeUndefined();
  });

  it('forgets everything on clear', () => {
    const cache = new FormCache();
    cache.getOrExpand('r1', 'Fm0', () => []);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('r1', 'Fm0')).toBeUndefined();
  });
});
