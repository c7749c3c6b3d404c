import { describe, it, expect } from 'vitest';
import { LruCache } from '../../../../src/core/triggers/LruCache.js';

describe('LruCache', () => {
  it('evicts the least recently used key', () => {
    const cache = new LruCache<number>({ maxSize: 2 });

    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.set('c', 3);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
  });

  it('overwrites without evicting', () => {
    const cache = new LruCache<string>({ maxSize: 2 });
    cache.set('a', 'x');
    cache.set('b', 'y');
    cache.set('a', 'z');
    expect(cache.get('a')).toBe('z');
    expect(cache.get('b')).toBe('y');
  });

  it('rejects a non-positive size', () => {
    expect(() => new LruCache({ maxSize: 0 })).toThrow('LruCache maxSize must be a positive integer, got 0');
  });
});
