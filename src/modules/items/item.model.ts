import type { FieldChange, Item, ItemPatch } from '../../common/types.js';
import type { CreateItemInput, UpdateItemInput } from './item.schema.js';

export function createItem(input: CreateItemInput, id: number, now = new Date()): Item {
  const timestamp = now.toISOString();
  return {
    id,
    name: input.name,
    description: input.description ?? null,
    price: input.price,
    created_at: timestamp,
    updated_at: timestamp,
  };
}

function fieldChange<T>(value: T | undefined): FieldChange<T> {
  return value === undefined ? { set: false } : { set: true, value };
}

export function toItemPatch(input: UpdateItemInput): ItemPatch {
  return {
    name: fieldChange(input.name),
    description: fieldChange(input.description),
    price: fieldChange(input.price),
  };
}

// A clock that went backwards must not produce updated_at < created_at.
function updateTimestamp(createdAt: string, now: Date): string {
  const created = Date.parse(createdAt);
  if (Number.isNaN(created) || now.getTime() >= created) {
    return now.toISOString();
  }
  return createdAt;
}

export function applyItemPatch(item: Item, patch: ItemPatch, now = new Date()): Item {
  return {
    ...item,
    name: patch.name.set ? patch.name.value : item.name,
    description: patch.description.set ? patch.description.value : item.description,
    price: patch.price.set ? patch.price.value : item.price,
    updated_at: updateTimestamp(item.created_at, now),
  };
}
