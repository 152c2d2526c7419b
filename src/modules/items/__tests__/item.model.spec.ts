import { describe, expect, it } from 'vitest';
import type { Item } from '../../../common/types.js';
import { applyItemPatch, createItem, toItemPatch } from '../item.model.js';
import { nextItemId } from '../item.repository.js';

const created: Item = {
  id: 4,
  name: 'Lamp',
  description: 'Desk lamp',
  price: 30,
  created_at: '2026-05-10T12:00:00.000Z',
  updated_at: '2026-05-10T12:00:00.000Z',
};

describe('createItem', () => {
  it('stamps both timestamps with the same instant', () => {
    const item = createItem({ name: 'Lamp', price: 30 }, 1, new Date('2026-05-10T12:00:00.000Z'));

    expect(item).toEqual({
      id: 1,
      name: 'Lamp',
      description: null,
      price: 30,
      created_at: '2026-05-10T12:00:00.000Z',
      updated_at: '2026-05-10T12:00:00.000Z',
    });
  });
});

describe('toItemPatch', () => {
  it('marks omitted fields as unset and keeps explicit nulls', () => {
    expect(toItemPatch({ description: null })).toEqual({
      name: { set: false },
      description: { set: true, value: null },
      price: { set: false },
    });
  });
});

describe('applyItemPatch', () => {
  const later = new Date('2026-05-11T08:30:00.000Z');

  it('leaves unset fields untouched', () => {
    const patched = applyItemPatch(created, toItemPatch({ price: 45 }), later);

    expect(patched).toEqual({ ...created, price: 45, updated_at: '2026-05-11T08:30:00.000Z' });
  });

  it('does not modify the original record', () => {
    applyItemPatch(created, toItemPatch({ name: 'Floor lamp' }), later);

    expect(created.name).toBe('Lamp');
  });

  it('uses the current time when created_at cannot be parsed', () => {
    const patched = applyItemPatch({ ...created, created_at: 'yesterday' }, toItemPatch({}), later);

    expect(patched.updated_at).toBe('2026-05-11T08:30:00.000Z');
  });
});

describe('nextItemId', () => {
  it('starts at 1 for an empty collection', () => {
    expect(nextItemId([])).toBe(1);
  });

  it('returns one more than the largest id regardless of order', () => {
    expect(nextItemId([{ ...created, id: 9 }, { ...created, id: 2 }])).toBe(10);
  });

  it('refuses to go past the largest safe integer', () => {
    expect(nextItemId([{ ...created, id: Number.MAX_SAFE_INTEGER - 1 }])).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => nextItemId([{ ...created, id: Number.MAX_SAFE_INTEGER }])).toThrow(
      'Cannot allocate an item id above 9007199254740991',
    );
  });
});
