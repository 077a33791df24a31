import { toItemInput } from '../clients/envelope';
import type {
     InventoryCategory,
     InventoryItem,
     InventoryItemInput,
     InventoryItemPatch,
} from '../types/inventory.types';
import type { MergeStrategy } from '../types/sync.types';

export type MergeAction =
     | { type: 'create'; input: InventoryItemInput }
     | {
            type: 'update';
            itemId: string;
            patch: InventoryItemPatch;
            previousQuantity: number;
            nextQuantity: number;
       }
     | { type: 'skip'; itemId: string }
     | { type: 'reject'; reason: string };

/** Cross-node identity: item ids are node-local, (name, category) is not. */
export function itemKey(item: { name: string; category: InventoryCategory }): string {
     return `${item.category}\u0000${item.name.trim()}`;
}

export function indexByKey(items: Iterable<InventoryItem>): Map<string, InventoryItem> {
     const index = new Map<string, InventoryItem>();
     for (const item of items) {
          const key = itemKey(item);
          if (!index.has(key)) {
               index.set(key, item);
          }
     }
     return index;
}

/**
 * Decides what one envelope item does to the target, given the matching
 * target item (if any). For `replace` the target has already been emptied;
 * a match only survives when its delete failed, and it is then overwritten.
 */
export function planItem(
     strategy: MergeStrategy,
     incoming: Readonly<InventoryItem>,
     existing: InventoryItem | undefined
): MergeAction {
     if (!existing) {
          return { type: 'create', input: toItemInput(incoming) };
     }

     switch (strategy) {
          case 'add':
               return { type: 'skip', itemId: existing.itemId };

          case 'merge': {
               const nextQuantity = existing.quantity + incoming.quantity;
               if (nextQuantity < 0 || !Number.isSafeInteger(nextQuantity)) {
                    return {
                         type: 'reject',
                         reason: `merged quantity ${nextQuantity} for "${incoming.name}" is out of range`,
                    };
               }
               return {
                    type: 'update',
                    itemId: existing.itemId,
                    patch: { quantity: nextQuantity },
                    previousQuantity: existing.quantity,
                    nextQuantity,
               };
          }

          case 'replace':
               return {
                    type: 'update',
                    itemId: existing.itemId,
                    patch: toItemInput(incoming),
                    previousQuantity: existing.quantity,
                    nextQuantity: incoming.quantity,
               };
     }
}
