import type { ItemRepository } from './item.repository.js';
import type { Item } from '../../common/types.js';

export function createInMemoryItemRepository(seed: Item[] = []): ItemRepository {
  let snapshot = seed.map(item => ({ ...item }));
  return {
    async load() {
      return snapshot.map(item => ({ ...item }));
    },
    async save(items) {
      snapshot = items.map(item => ({ ...item }));
    },
  };
}
