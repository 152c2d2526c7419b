import type { FastifyInstance } from 'fastify';
import { createSerialQueue } from '../../common/serial-queue.js';
import { notFound, passThroughValidator, validationError } from '../../common/fastify-schema.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import type { ItemRepository } from './item.repository.js';
import { itemIdParamsSchema } from './item.schema.js';
import { registerItemPostRoute } from './routes/item.post.js';
import { registerItemPutRoute } from './routes/item.put.js';

export interface ItemRoutesOptions {
  repository: ItemRepository;
}

const itemIdParamsJsonSchema = toJsonSchema(itemIdParamsSchema);

export async function itemRoutes(app: FastifyInstance, options: ItemRoutesOptions) {
  const { repository } = options;
  // Writes are serialized; reads rely on saves replacing the file atomically.
  const queue = createSerialQueue();

  registerItemPostRoute(app, repository, queue);
  registerItemPutRoute(app, repository, queue);

  app.get('/', {
    schema: { tags: ['Items'], summary: 'List all items' },
  }, async () => repository.load());

  app.get('/:id', {
    schema: { tags: ['Items'], summary: 'Get an item by id', params: itemIdParamsJsonSchema },
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const params = itemIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return validationError(params.error, reply);
    }
    const items = await repository.load();
    const item = items.find(candidate => candidate.id === params.data.id);
    if (!item) {
      return notFound(`Item with ID ${params.data.id} not found`, reply);
    }
    return item;
  });

  app.delete('/:id', {
    schema: { tags: ['Items'], summary: 'Delete an item by id', params: itemIdParamsJsonSchema },
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const params = itemIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return validationError(params.error, reply);
    }
    const { id } = params.data;
    const removed = await queue.run(async () => {
      const items = await repository.load();
      const index = items.findIndex(item => item.id === id);
      if (index === -1) {
        return false;
      }
      items.splice(index, 1);
      await repository.save(items);
      return true;
    });
    if (!removed) {
      return notFound(`Item with ID ${id} not found`, reply);
    }
    req.log.info({ itemId: id }, 'Item deleted');
    return reply.code(204).send();
  });

  app.delete('/', {
    schema: { tags: ['Items'], summary: 'Delete all items' },
  }, async (req, reply) => {
    await queue.run(() => repository.save([]));
    req.log.info('All items deleted');
    return reply.code(204).send();
  });
}
