import type { Item } from '../../common/types.js';

/**
 * Whole-collection persistence for items. Every operation reads the full
 * collection and writes it back in full; there is no per-record access.
 */
export interface ItemRepository {
  load(): Promise<Item[]>;
  save(items: Item[]): Promise<void>;
}

export function nextItemId(items: readonly Item[]): number {
  let max = 0;
  for (const item of items) {
    if (item.id > max) max = item.id;
  }
  if (max >= Number.MAX_SAFE_INTEGER) {
    throw new Error(`Cannot allocate an item id above ${Number.MAX_SAFE_INTEGER}`);
  }
  return max + 1;
}

export { createInMemoryItemRepository } from './item.repository.memory.js';
export { createFileItemRepository, type FileItemRepositoryOptions } from './item.repository.file.js';
