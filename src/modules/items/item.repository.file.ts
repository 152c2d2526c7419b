import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { v4 as uuid } from 'uuid';
import type { Item } from '../../common/types.js';
import type { ItemRepository } from './item.repository.js';
import { itemCollectionSchema } from './item.schema.js';

export interface FileItemRepositoryOptions {
  filePath: string;
  logger?: Pick<FastifyBaseLogger, 'warn'>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores the collection as a JSON array in a single file. A missing, unreadable
 * or malformed file loads as an empty collection. Saves go through a temp file
 * and a rename so readers see either the old document or the new one.
 */
export function createFileItemRepository(options: FileItemRepositoryOptions): ItemRepository {
  const { filePath, logger } = options;

  async function readDocument(): Promise<string | undefined> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger?.warn({ err: error, filePath }, 'Unable to read item data file; treating collection as empty');
      }
      return undefined;
    }
  }

  return {
    async load(): Promise<Item[]> {
      const raw = await readDocument();
      if (raw === undefined) {
        return [];
      }
      let document: unknown;
      try {
        document = JSON.parse(raw);
      } catch (error) {
        logger?.warn({ err: error, filePath }, 'Item data file is not valid JSON; treating collection as empty');
        return [];
      }
      const parsed = itemCollectionSchema.safeParse(document);
      if (!parsed.success) {
        logger?.warn(
          { filePath, issues: parsed.error.issues.length },
          'Item data file does not contain a valid item collection; treating collection as empty',
        );
        return [];
      }
      return parsed.data;
    },

    async save(items) {
      const directory = path.dirname(filePath);
      const tempPath = path.join(directory, `.${path.basename(filePath)}.${uuid()}.tmp`);
      await mkdir(directory, { recursive: true });
      try {
        await writeFile(tempPath, JSON.stringify(items, null, 2), 'utf-8');
        await rename(tempPath, filePath);
      } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
      }
    },
  };
}
