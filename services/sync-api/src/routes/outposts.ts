import type { FastifyPluginAsync } from 'fastify';
import type { SyncContext } from '@outpost/shared/src/context';
import type { InventoryCategory } from '@outpost/shared/src/types/inventory.types';
import { listOutpostsSchema, outpostInventorySchema } from '../schemas/sync.schemas';
import { replyWithError } from './reply-error';

export type OutpostRoutesOptions = {
     context: Pick<SyncContext, 'registry' | 'fleet'>;
};

export const registerOutpostRoutes: FastifyPluginAsync<OutpostRoutesOptions> = async (app, { context }) => {
     app.get('/', { schema: listOutpostsSchema }, async () => {
          return { outposts: await context.fleet.getCombinedStatus() };
     });

     app.get<{
          Params: { name: string };
          Querystring: { category?: InventoryCategory; minQuantity?: number; limit?: number };
     }>('/:name/inventory', { schema: outpostInventorySchema }, async (request, reply) => {
          const { name } = request.params;
          try {
               const items = await context.registry.get(name).listInventory({
                    category: request.query.category,
                    minQuantity: request.query.minQuantity,
                    limit: request.query.limit,
               });
               return { outpost: name, items };
          } catch (error) {
               return replyWithError(request, reply, error, 'Failed to list outpost inventory');
          }
     });
};
