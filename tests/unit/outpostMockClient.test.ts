import { OutpostMockClient } from '@outpost/shared/src/clients/outpost-mock-client';
import { AuthenticationError, NotFoundError, TransientError, ValidationError } from '@outpost/shared/src/utils/errors';

describe('OutpostMockClient', () => {
     const now = () => new Date('2024-05-01T12:00:00.000Z');
     let client: OutpostMockClient;

     beforeEach(() => {
          client = new OutpostMockClient({
               nodeName: 'fort-north',
               now,
               items: [
                    { name: 'Salted Fish', category: 'food', quantity: 150, unit: 'barrels', value: 2.5 },
                    { name: 'Axe', category: 'tools', quantity: 4, unit: 'pieces', value: 12 },
                    { name: 'Flour', category: 'food', quantity: 20, unit: 'sacks', value: 3 },
               ],
          });
     });

     describe('inventory', () => {
          it('should assign sequential ids and timestamps', async () => {
               const created = await client.createInventoryItem({
                    name: 'Rope',
                    category: 'supplies',
                    quantity: 10,
                    unit: 'coils',
                    value: 1,
               });
               expect(created).toEqual({
                    itemId: '4',
                    name: 'Rope',
                    category: 'supplies',
                    quantity: 10,
                    unit: 'coils',
                    value: 1,
                    lastUpdated: '2024-05-01T12:00:00.000Z',
               });
          });

          it('should filter listings', async () => {
               const food = await client.listInventory({ category: 'food', minQuantity: 50 });
               expect(food.map((item) => item.name)).toEqual(['Salted Fish']);
               expect(await client.listInventory({ limit: 2 })).toHaveLength(2);
          });

          it('should return copies, not its own records', async () => {
               const [first] = await client.listInventory();
               first.quantity = 0;
               expect((await client.getInventoryItem('1')).quantity).toBe(150);
          });

          it.each([
               [{ name: ' ', quantity: 1, value: 1 }, 'name'],
               [{ name: 'Rope', quantity: -1, value: 1 }, 'quantity'],
               [{ name: 'Rope', quantity: 1.5, value: 1 }, 'quantity'],
               [{ name: 'Rope', quantity: 1, value: -2 }, 'value'],
          ])('should reject invalid items (%#)', async (fields, field) => {
               await expect(
                    client.createInventoryItem({ category: 'supplies', unit: 'coils', ...fields })
               ).rejects.toMatchObject({ field });
          });

          it('should throw NotFoundError for unknown ids', async () => {
               await expect(client.getInventoryItem('99')).rejects.toBeInstanceOf(NotFoundError);
               await expect(client.updateInventoryItem('99', { quantity: 1 })).rejects.toBeInstanceOf(NotFoundError);
               await expect(client.deleteInventoryItem('99')).rejects.toBeInstanceOf(NotFoundError);
               expect(client.callCount('update')).toBe(0);
          });

          it('should validate updates', async () => {
               await expect(client.updateInventoryItem('2', { quantity: -4 })).rejects.toBeInstanceOf(ValidationError);
               await expect(client.updateInventoryItem('2', { quantity: 6 })).resolves.toMatchObject({
                    itemId: '2',
                    quantity: 6,
               });
          });
     });

     describe('fault injection', () => {
          it('should fail the named item the given number of times', async () => {
               client.failOperation('delete', new TransientError('fort-north timed out'), { itemName: 'Axe', times: 2 });

               await client.deleteInventoryItem('1');
               await expect(client.deleteInventoryItem('2')).rejects.toBeInstanceOf(TransientError);
               await expect(client.deleteInventoryItem('2')).rejects.toBeInstanceOf(TransientError);
               await client.deleteInventoryItem('2');

               expect(client.snapshot().map((item) => item.name)).toEqual(['Flour']);
               expect(client.callCount('delete')).toBe(4);
          });
     });

     describe('authentication', () => {
          it('should require a login when configured to', async () => {
               const guarded = new OutpostMockClient({
                    nodeName: 'fort-south',
                    requireAuth: true,
                    users: { trader: 'test-secret' },
               });

               await expect(guarded.listInventory()).rejects.toBeInstanceOf(AuthenticationError);
               await expect(guarded.healthCheck()).resolves.toEqual({ status: 'healthy', node: 'fort-south' });
               await expect(guarded.login('trader', 'wrong-password')).resolves.toBe(false);
               await expect(guarded.login('trader', 'test-secret')).resolves.toBe(true);
               await expect(guarded.listInventory()).resolves.toEqual([]);
               await expect(guarded.whoAmI()).resolves.toEqual({ username: 'trader', fort: 'fort-south' });
          });

          it('should log in on demand with cached credentials', async () => {
               const guarded = new OutpostMockClient({
                    nodeName: 'fort-south',
                    requireAuth: true,
                    users: { trader: 'test-secret' },
                    username: 'trader',
                    password: 'test-secret',
               });

               await expect(guarded.listInventory()).resolves.toEqual([]);

               guarded.logout();
               await expect(guarded.listInventory()).rejects.toBeInstanceOf(AuthenticationError);
          });
     });

     describe('sync', () => {
          it('should export a frozen envelope', async () => {
               await client.login('nobody', 'test-secret');
               const envelope = await client.exportInventory();

               expect(envelope.sourceNode).toBe('fort-north');
               expect(envelope.exportedAt).toEqual(now());
               expect(envelope.exportedBy).toBeUndefined();
               expect(envelope.items).toHaveLength(3);
               expect(Object.isFrozen(envelope.items[0])).toBe(true);
          });

          it('should not offer bulk import unless enabled', async () => {
               const envelope = await client.exportInventory();
               await expect(client.supportsBulkImport()).resolves.toBe(false);
               await expect(client.importInventory(envelope, 'add')).rejects.toBeInstanceOf(NotFoundError);
          });

          it('should apply a bulk replace in one call', async () => {
               const target = new OutpostMockClient({
                    nodeName: 'fort-south',
                    bulkImport: true,
                    now,
                    items: [{ name: 'Rope', category: 'supplies', quantity: 10, unit: 'coils', value: 1 }],
               });

               const statistics = await target.importInventory(await client.exportInventory(), 'replace');

               expect(statistics).toMatchObject({ itemsAdded: 3, itemsDeleted: 1, itemsFailed: 0 });
               expect(target.snapshot().map((item) => item.name)).toEqual(['Salted Fish', 'Axe', 'Flour']);
          });
     });
});
