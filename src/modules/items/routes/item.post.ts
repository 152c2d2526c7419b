import type { FastifyInstance } from 'fastify';
import type { SerialQueue } from '../../../common/serial-queue.js';
import { passThroughValidator, validationError } from '../../../common/fastify-schema.js';
import { toJsonSchema } from '../../../common/zod-json-schema.js';
import { createItem } from '../item.model.js';
import { nextItemId, type ItemRepository } from '../item.repository.js';
import { createItemSchema } from '../item.schema.js';

const createItemBodySchema = toJsonSchema(createItemSchema, 'CreateItemRequest');

export function registerItemPostRoute(app: FastifyInstance, repository: ItemRepository, queue: SerialQueue) {
  app.post('/', {
    schema: {
      tags: ['Items'],
      summary: 'Create an item',
      body: createItemBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const parsed = createItemSchema.safeParse(req.body);
    if (!parsed.success) {
      return validationError(parsed.error, reply);
    }
    const item = await queue.run(async () => {
      const items = await repository.load();
      const created = createItem(parsed.data, nextItemId(items));
      items.push(created);
      await repository.save(items);
      return created;
    });
    req.log.info({ itemId: item.id }, 'Item created');
    reply.code(201);
    return item;
  });
}
