import { describe, it, expect } from 'vitest';
import { createHuntItem, DEFAULT_SEED, sameItem, seedItems } from '../state/seed.js';

describe('createHuntItem', () => {
  it('fills in defaults', () => {
    const item = createHuntItem({ title: 'Tech Hub', hint: 'Cowork space on 2nd floor.' });
    expect(item.found).toBe(false);
    expect(item.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.keys(item).sort()).toEqual(['found', 'hint', 'id', 'title']);
  });

  it('keeps a given id', () => {
    expect(createHuntItem({ id: 'fixed-id', title: 'T', hint: 'H' }).id).toBe('fixed-id');
  });
});

describe('sameItem', () => {
  it('compares by id only', () => {
    const a = createHuntItem({ id: 'one', title: 'A', hint: 'a' });
    expect(sameItem(a, { ...a, title: 'Renamed', found: true })).toBe(true);
    expect(sameItem(a, createHuntItem({ id: 'two', title: 'A', hint: 'a' }))).toBe(false);
  });
});

describe('seedItems', () => {
  it('creates the ten default locations with unique ids', () => {
    const items = seedItems();
    expect(items).toHaveLength(10);
    expect(items[0].title).toBe('City Bookstore');
    expect(items[9].title).toBe('Train Station');
    expect(items.map(i => i.title)).toEqual(DEFAULT_SEED.map(s => s.title));
    expect(new Set(items.map(i => i.id)).size).toBe(10);
    expect(items.every(i => !i.found)).toBe(true);
  });
});
