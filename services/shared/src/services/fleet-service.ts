import type { OutpostRegistry } from '../clients/outpost-registry';
import type { InventoryFilter, InventoryItem, NodeHealth, NodeStatus } from '../types/inventory.types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface OutpostStatusReport {
     name: string;
     reachable: boolean;
     health?: NodeHealth;
     status?: NodeStatus;
     error?: string;
}

export interface OutpostInventoryReport {
     name: string;
     items: InventoryItem[];
     error?: string;
}

export interface FleetInventory {
     outposts: OutpostInventoryReport[];
     totalItems: number;
     totalQuantity: number;
}

/** Read-only views across every configured outpost. Node failures are reported, never thrown. */
export class FleetService {
     constructor(private readonly registry: OutpostRegistry) {}

     async getCombinedStatus(): Promise<OutpostStatusReport[]> {
          const names = this.registry.names();
          const results = await Promise.allSettled(
               names.map(async (name) => {
                    const client = this.registry.get(name);
                    const [health, status] = await Promise.all([client.healthCheck(), client.getStatus()]);
                    return { health, status };
               })
          );

          return results.map((result, index) => {
               const name = names[index];
               if (result.status === 'fulfilled') {
                    return { name, reachable: true, ...result.value };
               }
               logger.warn({ node: name, err: result.reason }, 'Outpost status check failed');
               return { name, reachable: false, error: errorMessage(result.reason) };
          });
     }

     async getInventoryAcrossOutposts(filter?: InventoryFilter): Promise<FleetInventory> {
          const names = this.registry.names();
          const results = await Promise.allSettled(
               names.map((name) => this.registry.get(name).listInventory(filter))
          );

          const outposts = results.map((result, index): OutpostInventoryReport => {
               const name = names[index];
               if (result.status === 'fulfilled') {
                    return { name, items: result.value };
               }
               logger.warn({ node: name, err: result.reason }, 'Outpost inventory listing failed');
               return { name, items: [], error: errorMessage(result.reason) };
          });

          const items = outposts.flatMap((outpost) => outpost.items);
          return {
               outposts,
               totalItems: items.length,
               totalQuantity: items.reduce((sum, item) => sum + item.quantity, 0),
          };
     }
}
