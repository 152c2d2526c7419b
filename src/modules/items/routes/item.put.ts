import type { FastifyInstance } from 'fastify';
import type { Item } from '../../../common/types.js';
import type { SerialQueue } from '../../../common/serial-queue.js';
import { notFound, passThroughValidator, validationError } from '../../../common/fastify-schema.js';
import { toJsonSchema } from '../../../common/zod-json-schema.js';
import { applyItemPatch, toItemPatch } from '../item.model.js';
import type { ItemRepository } from '../item.repository.js';
import { itemIdParamsSchema, updateItemSchema } from '../item.schema.js';

const updateItemBodySchema = toJsonSchema(updateItemSchema, 'UpdateItemRequest');
const itemIdParamsJsonSchema = toJsonSchema(itemIdParamsSchema);

export function registerItemPutRoute(app: FastifyInstance, repository: ItemRepository, queue: SerialQueue) {
  app.put('/:id', {
    schema: {
      tags: ['Items'],
      summary: 'Update an item; only the supplied fields change',
      params: itemIdParamsJsonSchema,
      body: updateItemBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const params = itemIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return validationError(params.error, reply);
    }
    const parsed = updateItemSchema.safeParse(req.body);
    if (!parsed.success) {
      return validationError(parsed.error, reply);
    }
    const { id } = params.data;
    const patch = toItemPatch(parsed.data);
    const updated = await queue.run(async (): Promise<Item | undefined> => {
      const items = await repository.load();
      const index = items.findIndex(item => item.id === id);
      if (index === -1) {
        return undefined;
      }
      const next = applyItemPatch(items[index], patch);
      items[index] = next;
      await repository.save(items);
      return next;
    });
    if (!updated) {
      return notFound(`Item with ID ${id} not found`, reply);
    }
    req.log.info({ itemId: id }, 'Item updated');
    return updated;
  });
}
