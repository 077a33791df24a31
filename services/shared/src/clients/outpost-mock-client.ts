import type {
     ExportEnvelope,
     InventoryFilter,
     InventoryItem,
     InventoryItemInput,
     InventoryItemPatch,
     NodeHealth,
     NodeStatus,
     Principal,
} from '../types/inventory.types';
import type { MergeStrategy, SyncItemError, SyncStatistics } from '../types/sync.types';
import { AuthenticationError, NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { indexByKey, itemKey, planItem } from '../services/merge-planner';
import { SYNC_FORMAT_VERSION } from './envelope';
import type { OutpostClient } from './outpost-client';

export type MockOperation =
     | 'list'
     | 'get'
     | 'create'
     | 'update'
     | 'delete'
     | 'export'
     | 'import'
     | 'capabilities'
     | 'health';

interface MockFault {
     operation: MockOperation;
     itemName?: string;
     error: Error;
     remaining: number;
}

export interface MockCall {
     operation: MockOperation;
     itemName?: string;
}

export interface OutpostMockClientOptions {
     nodeName: string;
     items?: InventoryItemInput[];
     /** username -> password accepted by login */
     users?: Record<string, string>;
     requireAuth?: boolean;
     bulkImport?: boolean;
     latencyMs?: number;
     username?: string;
     password?: string;
     now?: () => Date;
}

/**
 * In-process outpost node with the same contract as the HTTP client. Used in
 * development (OUTPOST_CLIENT_TYPE=mock) and as the target of tests.
 */
export class OutpostMockClient implements OutpostClient {
     readonly nodeName: string;
     readonly calls: MockCall[] = [];

     private inventory = new Map<string, InventoryItem>();
     private nextId = 1;
     private readonly users: Record<string, string>;
     private readonly requireAuth: boolean;
     private readonly bulkImport: boolean;
     private readonly latencyMs: number;
     private readonly now: () => Date;
     private authenticatedAs: string | undefined;
     private credentials: { username: string; password: string } | undefined;
     private faults: MockFault[] = [];

     constructor(options: OutpostMockClientOptions) {
          this.nodeName = options.nodeName;
          this.users = options.users ?? {};
          this.requireAuth = options.requireAuth ?? false;
          this.bulkImport = options.bulkImport ?? false;
          this.latencyMs = options.latencyMs ?? 0;
          this.now = options.now ?? (() => new Date());
          if (options.username && options.password) {
               this.credentials = { username: options.username, password: options.password };
          }
          for (const item of options.items ?? []) {
               this.insert(item);
          }
     }

     /** Makes the next `times` calls of `operation` (optionally for one item name) throw `error`. */
     failOperation(
          operation: MockOperation,
          error: Error,
          options: { itemName?: string; times?: number } = {}
     ): void {
          this.faults.push({
               operation,
               itemName: options.itemName,
               error,
               remaining: options.times ?? 1,
          });
     }

     snapshot(): InventoryItem[] {
          return [...this.inventory.values()].map((item) => ({ ...item }));
     }

     callCount(operation: MockOperation): number {
          return this.calls.filter((call) => call.operation === operation).length;
     }

     async login(username: string, password: string): Promise<boolean> {
          if (this.users[username] !== undefined && this.users[username] === password) {
               this.authenticatedAs = username;
               this.credentials = { username, password };
               return true;
          }
          this.authenticatedAs = undefined;
          return false;
     }

     logout(): void {
          this.authenticatedAs = undefined;
          this.credentials = undefined;
     }

     async listInventory(filter?: InventoryFilter): Promise<InventoryItem[]> {
          await this.enter('list');
          let items = [...this.inventory.values()];
          if (filter?.category) {
               items = items.filter((item) => item.category === filter.category);
          }
          const minQuantity = filter?.minQuantity;
          if (minQuantity !== undefined) {
               items = items.filter((item) => item.quantity >= minQuantity);
          }
          if (filter?.limit !== undefined) {
               items = items.slice(0, filter.limit);
          }
          return items.map((item) => ({ ...item }));
     }

     async getInventoryItem(itemId: string): Promise<InventoryItem> {
          await this.enter('get');
          return { ...this.require(itemId) };
     }

     async createInventoryItem(item: InventoryItemInput): Promise<InventoryItem> {
          await this.enter('create', item.name);
          return { ...this.insert(item) };
     }

     async updateInventoryItem(itemId: string, patch: InventoryItemPatch): Promise<InventoryItem> {
          const existing = this.require(itemId);
          await this.enter('update', existing.name);
          const updated: InventoryItem = {
               ...existing,
               ...patch,
               itemId,
               lastUpdated: this.now().toISOString(),
          };
          this.validate(updated);
          this.inventory.set(itemId, updated);
          return { ...updated };
     }

     async deleteInventoryItem(itemId: string): Promise<void> {
          const existing = this.require(itemId);
          await this.enter('delete', existing.name);
          this.inventory.delete(itemId);
     }

     async exportInventory(): Promise<ExportEnvelope> {
          await this.enter('export');
          const items = [...this.inventory.values()].map((item) => Object.freeze({ ...item }));
          return Object.freeze({
               sourceNode: this.nodeName,
               exportedAt: this.now(),
               formatVersion: SYNC_FORMAT_VERSION,
               items: Object.freeze(items),
               ...(this.authenticatedAs ? { exportedBy: this.authenticatedAs } : {}),
          });
     }

     async importInventory(envelope: ExportEnvelope, strategy: MergeStrategy): Promise<SyncStatistics> {
          if (!this.bulkImport) {
               throw new NotFoundError(`${this.nodeName} has no bulk import endpoint`, '/sync/import-inventory');
          }
          await this.enter('import');
          const startedAt = this.now();
          let itemsAdded = 0;
          let itemsUpdated = 0;
          let itemsSkipped = 0;
          let itemsDeleted = 0;
          const errors: SyncItemError[] = [];

          if (strategy === 'replace') {
               itemsDeleted = this.inventory.size;
               this.inventory.clear();
          }
          const index = indexByKey(this.inventory.values());

          for (const incoming of envelope.items) {
               const action = planItem(strategy, incoming, index.get(itemKey(incoming)));
               switch (action.type) {
                    case 'create': {
                         const created = this.insert(action.input);
                         if (strategy !== 'replace') {
                              index.set(itemKey(created), created);
                         }
                         itemsAdded++;
                         break;
                    }
                    case 'update': {
                         const existing = this.require(action.itemId);
                         const updated = { ...existing, ...action.patch, lastUpdated: this.now().toISOString() };
                         this.inventory.set(action.itemId, updated);
                         index.set(itemKey(updated), updated);
                         itemsUpdated++;
                         break;
                    }
                    case 'skip':
                         itemsSkipped++;
                         break;
                    case 'reject':
                         errors.push({
                              itemName: incoming.name,
                              category: incoming.category,
                              operation: 'import',
                              kind: 'validation',
                              message: action.reason,
                         });
                         break;
               }
          }

          return Object.freeze({
               itemsAdded,
               itemsUpdated,
               itemsSkipped,
               itemsFailed: errors.length,
               itemsDeleted,
               strategyUsed: strategy,
               startedAt,
               completedAt: this.now(),
               errors: Object.freeze(errors),
          });
     }

     async supportsBulkImport(): Promise<boolean> {
          await this.enter('capabilities');
          return this.bulkImport;
     }

     async healthCheck(): Promise<NodeHealth> {
          await this.enter('health', undefined, false);
          return { status: 'healthy', node: this.nodeName };
     }

     async getStatus(): Promise<NodeStatus> {
          await this.enter('health', undefined, false);
          return {
               outpost_name: this.nodeName,
               inventory_count: this.inventory.size,
               timestamp: this.now().toISOString(),
          };
     }

     async whoAmI(): Promise<Principal> {
          await this.enter('health');
          if (!this.authenticatedAs) {
               throw new AuthenticationError(`${this.nodeName}: not authenticated`, 401);
          }
          return { username: this.authenticatedAs, fort: this.nodeName };
     }

     private async enter(operation: MockOperation, itemName?: string, isProtected = true): Promise<void> {
          this.calls.push({ operation, itemName });
          if (this.latencyMs > 0) {
               await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
          }

          if (isProtected && this.requireAuth && !this.authenticatedAs) {
               // mirrors the HTTP client's one transparent login
               const cached = this.credentials;
               if (!cached || !(await this.login(cached.username, cached.password))) {
                    throw new AuthenticationError(`${this.nodeName}: authentication required`, 401);
               }
          }

          const fault = this.faults.find(
               (candidate) =>
                    candidate.operation === operation &&
                    candidate.remaining > 0 &&
                    (candidate.itemName === undefined || candidate.itemName === itemName)
          );
          if (fault) {
               fault.remaining--;
               logger.debug({ node: this.nodeName, operation, itemName }, 'Mock outpost injected fault');
               throw fault.error;
          }
     }

     private require(itemId: string): InventoryItem {
          const item = this.inventory.get(itemId);
          if (!item) {
               throw new NotFoundError(`Inventory item ${itemId} not found on ${this.nodeName}`, itemId);
          }
          return item;
     }

     private validate(item: InventoryItemInput): void {
          if (item.name.trim() === '') {
               throw new ValidationError('name must not be empty', 'name');
          }
          if (!Number.isInteger(item.quantity) || item.quantity < 0) {
               throw new ValidationError('quantity must be an integer >= 0', 'quantity');
          }
          if (!(item.value >= 0)) {
               throw new ValidationError('value must be >= 0', 'value');
          }
     }

     private insert(input: InventoryItemInput): InventoryItem {
          this.validate(input);
          const item: InventoryItem = {
               ...input,
               itemId: String(this.nextId++),
               lastUpdated: this.now().toISOString(),
          };
          this.inventory.set(item.itemId, item);
          return item;
     }
}
