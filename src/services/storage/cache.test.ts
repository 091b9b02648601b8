// Cache tests

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ListCache, filterKey } from './cache.js';
import { makeADR, makePRD } from '../../testing/fixtures.js';

describe('filterKey', () => {
  it('should ignore property order, unset filters and tag order', () => {
    expect(filterKey({ type: 'adr', status: 'proposed' })).toBe(filterKey({ status: 'proposed', type: 'adr' }));
    expect(filterKey({ type: undefined })).toBe('*');
    expect(filterKey({ tags: ['b', 'a'] })).toBe('tags=a,b');
  });

  it('should render dates as ISO strings', () => {
    expect(filterKey({ dateFrom: new Date('2025-03-01T00:00:00.000Z'), owner: 'jane' }))
      .toBe('dateFrom=2025-03-01T00:00:00.000Z&owner=jane');
  });
});

describe('ListCache', () => {
  let cache: ListCache;
  const adr = makeADR();

  beforeEach(() => {
    cache = new ListCache();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return null for empty cache', () => {
    expect(cache.get()).toBeNull();
  });

  it('should keep results per filter', () => {
    cache.set([adr], { type: 'adr' });

    expect(cache.get({ type: 'adr' })).toEqual([adr]);
    expect(cache.get()).toBeNull();
  });

  it('should hand out copies so callers cannot reorder the cached list', () => {
    cache.set([adr, makePRD()]);
    cache.get()?.pop();

    expect(cache.get()).toHaveLength(2);
  });

  it('should drop every entry on invalidate', () => {
    cache.set([adr]);
    cache.set([adr], { type: 'adr' });
    cache.invalidate();

    expect(cache.get()).toBeNull();
    expect(cache.get({ type: 'adr' })).toBeNull();
  });

  it('should expire entries after the TTL', () => {
    vi.useFakeTimers();
    cache = new ListCache(50);
    cache.set([adr]);

    vi.advanceTimersByTime(49);
    expect(cache.get()).toEqual([adr]);
    vi.advanceTimersByTime(1);
    expect(cache.get()).toBeNull();
  });

  it('should store nothing with a TTL of zero', () => {
    cache = new ListCache(0);
    cache.set([adr]);

    expect(cache.get()).toBeNull();
  });
});
