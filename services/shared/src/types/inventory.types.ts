// Type definitions for outpost inventory

export const INVENTORY_CATEGORIES = [
     'food',
     'tools',
     'supplies',
     'furs',
     'trade_goods',
     'provisions',
] as const;

export type InventoryCategory = (typeof INVENTORY_CATEGORIES)[number];

export interface InventoryItem {
     itemId: string;
     name: string;
     category: InventoryCategory;
     quantity: number;
     unit: string;
     value: number;
     description?: string;
     lastUpdated?: string;
}

export type InventoryItemInput = Omit<InventoryItem, 'itemId' | 'lastUpdated'>;

export type InventoryItemPatch = Partial<InventoryItemInput>;

export interface InventoryFilter {
     category?: InventoryCategory;
     minQuantity?: number;
     limit?: number;
}

/**
 * Snapshot of one node's inventory as produced by an export. Items keep the
 * source node's identities, which mean nothing on any other node.
 */
export interface ExportEnvelope {
     readonly sourceNode: string;
     readonly exportedAt: Date;
     readonly exportedBy?: string;
     readonly formatVersion: string;
     readonly items: ReadonlyArray<Readonly<InventoryItem>>;
}

// Node metadata
export interface NodeHealth {
     status: string;
     [key: string]: unknown;
}

export interface NodeStatus {
     [key: string]: unknown;
}

export interface Principal {
     username: string;
     role?: string;
     fort?: string;
}

export interface OutpostNodeConfig {
     name: string;
     baseUrl: string;
     username?: string;
     password?: string;
}
