import type { FastifyBaseLogger } from 'fastify';
import type { PersistenceConfig } from '../config/index.js';
import {
  createFileItemRepository,
  createInMemoryItemRepository,
  type ItemRepository,
} from '../modules/items/item.repository.js';

export function createItemRepositoryFromConfig(
  config: PersistenceConfig,
  logger?: Pick<FastifyBaseLogger, 'warn'>,
): ItemRepository {
  switch (config.provider) {
    case 'memory':
      return createInMemoryItemRepository();
    case 'file':
    default:
      return createFileItemRepository({ filePath: config.dataFile, logger });
  }
}
