import { describe, it, expect } from 'vitest';
import { resolveItemRef } from '../state/lookup.js';

const items = [
  { id: '3f2a9c10-aaaa-4000-8000-000000000001', title: 'City Bookstore' },
  { id: '3f2a0000-bbbb-4000-8000-000000000002', title: 'Main Street Café' },
  { id: '9c0ffee0-cccc-4000-8000-000000000003', title: 'Riverside Park' },
];

describe('resolveItemRef', () => {
  it('resolves 1-based positions', () => {
    expect(resolveItemRef(items, '1')?.title).toBe('City Bookstore');
    expect(resolveItemRef(items, ' 3 ')?.title).toBe('Riverside Park');
  });

  it('returns undefined for out-of-range positions', () => {
    expect(resolveItemRef(items, '0')).toBeUndefined();
    expect(resolveItemRef(items, '4')).toBeUndefined();
  });

  it('resolves a unique id prefix, ignoring case', () => {
    expect(resolveItemRef(items, '9C0F')?.title).toBe('Riverside Park');
    expect(resolveItemRef(items, '3f2a9c')?.title).toBe('City Bookstore');
  });

  it('rejects ambiguous or too-short prefixes', () => {
    expect(resolveItemRef(items, '3f2a')).toBeUndefined();
    expect(resolveItemRef(items, '3f2')).toBeUndefined();
    expect(resolveItemRef(items, 'abc')).toBeUndefined();
  });
});
