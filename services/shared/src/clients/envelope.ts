import { z } from 'zod';
import {
     ExportEnvelope,
     INVENTORY_CATEGORIES,
     InventoryItem,
     InventoryItemInput,
     InventoryItemPatch,
     NodeHealth,
     Principal,
} from '../types/inventory.types';
import { MergeStrategy, SyncStatistics } from '../types/sync.types';
import { FatalError, ValidationError } from '../utils/errors';

export const SYNC_FORMAT_VERSION = '1.0';

// Wire schemas (snake_case, as the nodes speak)

const itemIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const wireItemFields = {
     name: z.string().trim().min(1),
     category: z.enum(INVENTORY_CATEGORIES),
     quantity: z.number().int().nonnegative(),
     unit: z.string(),
     value: z.number().nonnegative(),
     description: z.string().nullish(),
     last_updated: z.string().nullish(),
};

export const wireInventoryItemSchema = z.object({
     item_id: itemIdSchema,
     ...wireItemFields,
});

const wireEnvelopeItemSchema = z.object({
     item_id: itemIdSchema.optional(),
     ...wireItemFields,
});

const wireEnvelopeSchema = z.object({
     source: z.string().min(1).optional(),
     source_fort: z.string().min(1).optional(),
     exported_at: z.string().optional(),
     export_timestamp: z.string().optional(),
     exported_by: z.string().nullish(),
     items: z.array(z.unknown()).optional(),
     inventory: z.array(z.unknown()).optional(),
     sync_format_version: z.string().optional(),
});

const wireStatisticsSchema = z.object({
     statistics: z.object({
          items_added: z.number().int().nonnegative().default(0),
          items_updated: z.number().int().nonnegative().default(0),
          items_skipped: z.number().int().nonnegative().default(0),
          items_failed: z.number().int().nonnegative().default(0),
          items_deleted: z.number().int().nonnegative().default(0),
          errors: z.array(z.union([z.string(), z.object({ message: z.string() }).passthrough()])).default([]),
     }),
});

export const loginResponseSchema = z.object({
     access_token: z.string().min(1),
     token_type: z.string().optional(),
     expires_in: z.number().positive(),
});

export const syncCapabilitiesSchema = z.object({
     supported_operations: z.array(z.string()).default([]),
     version: z.string().optional(),
     last_sync: z.string().nullish(),
});

const healthSchema = z.object({ status: z.string() }).passthrough();

const principalSchema = z.object({
     username: z.string(),
     role: z.string().optional(),
     fort: z.string().optional(),
});

function issuePath(error: z.ZodError, prefix?: string): string | undefined {
     const issue = error.issues[0];
     if (!issue) {
          return prefix;
     }
     const path = issue.path.reduce<string>((acc, segment) => {
          if (typeof segment === 'number') {
               return `${acc}[${segment}]`;
          }
          return acc ? `${acc}.${segment}` : segment;
     }, prefix ?? '');
     return path || undefined;
}

function validationFailure(what: string, error: z.ZodError, prefix?: string): ValidationError {
     const field = issuePath(error, prefix);
     const detail = error.issues[0]?.message ?? 'invalid value';
     return new ValidationError(field ? `${what}: ${field} ${detail}` : `${what}: ${detail}`, field);
}

function toInventoryItem(wire: z.infer<typeof wireEnvelopeItemSchema>, fallbackId: string): InventoryItem {
     const item: InventoryItem = {
          itemId: wire.item_id ?? fallbackId,
          name: wire.name,
          category: wire.category,
          quantity: wire.quantity,
          unit: wire.unit,
          value: wire.value,
     };
     if (wire.description) {
          item.description = wire.description;
     }
     if (wire.last_updated) {
          item.lastUpdated = wire.last_updated;
     }
     return item;
}

export function parseInventoryItem(raw: unknown): InventoryItem {
     const parsed = wireInventoryItemSchema.safeParse(raw);
     if (!parsed.success) {
          throw validationFailure('Malformed inventory item', parsed.error);
     }
     return toInventoryItem(parsed.data, parsed.data.item_id);
}

export function parseInventoryList(raw: unknown): InventoryItem[] {
     // Some nodes wrap the listing as { items: [...] }
     const list =
          typeof raw === 'object' && raw !== null && !Array.isArray(raw) && 'items' in raw
               ? raw.items
               : raw;
     if (!Array.isArray(list)) {
          throw new ValidationError('Inventory listing is not an array', 'items');
     }
     return list.map((entry, index) => {
          const parsed = wireInventoryItemSchema.safeParse(entry);
          if (!parsed.success) {
               throw validationFailure('Malformed inventory listing', parsed.error, `items[${index}]`);
          }
          return toInventoryItem(parsed.data, parsed.data.item_id);
     });
}

function parseTimestamp(value: string, field: string): Date {
     const date = new Date(value);
     if (Number.isNaN(date.getTime())) {
          throw new ValidationError(`Envelope field ${field} is not a valid timestamp`, field);
     }
     return date;
}

/**
 * Validates an export payload and returns a frozen envelope. Accepts both the
 * current field names and the older `source_fort`/`export_timestamp`/`inventory`
 * layout.
 */
export function parseExportEnvelope(raw: unknown): ExportEnvelope {
     if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
          throw new FatalError('Export envelope is not a JSON object');
     }

     const parsed = wireEnvelopeSchema.safeParse(raw);
     if (!parsed.success) {
          throw validationFailure('Malformed export envelope', parsed.error);
     }
     const wire = parsed.data;

     const sourceNode = wire.source ?? wire.source_fort;
     if (!sourceNode) {
          throw new ValidationError('Export envelope has no source node', 'source');
     }
     const exportedAtRaw = wire.exported_at ?? wire.export_timestamp;
     if (!exportedAtRaw) {
          throw new ValidationError('Export envelope has no export timestamp', 'exported_at');
     }
     const rawItems = wire.items ?? wire.inventory;
     if (!rawItems) {
          throw new ValidationError('Export envelope has no items', 'items');
     }

     const items = rawItems.map((entry, index) => {
          const item = wireEnvelopeItemSchema.safeParse(entry);
          if (!item.success) {
               throw validationFailure('Malformed export envelope', item.error, `items[${index}]`);
          }
          return Object.freeze(toInventoryItem(item.data, `${sourceNode}:${index}`));
     });

     const envelope: ExportEnvelope = {
          sourceNode,
          exportedAt: parseTimestamp(exportedAtRaw, 'exported_at'),
          formatVersion: wire.sync_format_version ?? SYNC_FORMAT_VERSION,
          items: Object.freeze(items),
          ...(wire.exported_by ? { exportedBy: wire.exported_by } : {}),
     };
     return Object.freeze(envelope);
}

export function toItemInput(item: Readonly<InventoryItem>): InventoryItemInput {
     const input: InventoryItemInput = {
          name: item.name,
          category: item.category,
          quantity: item.quantity,
          unit: item.unit,
          value: item.value,
     };
     if (item.description !== undefined) {
          input.description = item.description;
     }
     return input;
}

export function serializeItemInput(input: InventoryItemInput | InventoryItemPatch): Record<string, unknown> {
     const body: Record<string, unknown> = {};
     for (const key of ['name', 'category', 'quantity', 'unit', 'value', 'description'] as const) {
          if (input[key] !== undefined) {
               body[key] = input[key];
          }
     }
     return body;
}

export function serializeEnvelope(envelope: ExportEnvelope): Record<string, unknown> {
     return {
          source: envelope.sourceNode,
          exported_at: envelope.exportedAt.toISOString(),
          ...(envelope.exportedBy ? { exported_by: envelope.exportedBy } : {}),
          sync_format_version: envelope.formatVersion,
          items: envelope.items.map((item) => ({
               item_id: item.itemId,
               ...serializeItemInput(toItemInput(item)),
               ...(item.lastUpdated ? { last_updated: item.lastUpdated } : {}),
          })),
     };
}

export function serializeImportRequest(
     envelope: ExportEnvelope,
     strategy: MergeStrategy
): Record<string, unknown> {
     return { ...serializeEnvelope(envelope), merge_strategy: strategy };
}

/** Reads the statistics a node returns from a bulk import. */
export function parseImportStatistics(
     raw: unknown,
     strategy: MergeStrategy,
     startedAt: Date,
     completedAt: Date
): SyncStatistics {
     const parsed = wireStatisticsSchema.safeParse(raw);
     if (!parsed.success) {
          throw validationFailure('Malformed import response', parsed.error);
     }
     const stats = parsed.data.statistics;
     return Object.freeze({
          itemsAdded: stats.items_added,
          itemsUpdated: stats.items_updated,
          itemsSkipped: stats.items_skipped,
          // some nodes list errors without counting them
          itemsFailed: Math.max(stats.items_failed, stats.errors.length),
          itemsDeleted: stats.items_deleted,
          strategyUsed: strategy,
          startedAt,
          completedAt,
          errors: Object.freeze(
               stats.errors.map((entry) =>
                    Object.freeze({
                         operation: 'import' as const,
                         kind: 'unknown' as const,
                         message: typeof entry === 'string' ? entry : entry.message,
                    })
               )
          ),
     });
}

export function parseLoginResponse(raw: unknown): z.infer<typeof loginResponseSchema> {
     const parsed = loginResponseSchema.safeParse(raw);
     if (!parsed.success) {
          throw validationFailure('Malformed login response', parsed.error);
     }
     return parsed.data;
}

export function parseSyncCapabilities(raw: unknown): string[] {
     const parsed = syncCapabilitiesSchema.safeParse(raw);
     if (!parsed.success) {
          throw validationFailure('Malformed sync status', parsed.error);
     }
     return parsed.data.supported_operations;
}

export function parseHealth(raw: unknown): NodeHealth {
     const parsed = healthSchema.safeParse(raw);
     if (!parsed.success) {
          throw validationFailure('Malformed health response', parsed.error);
     }
     return parsed.data;
}

export function parsePrincipal(raw: unknown): Principal {
     const parsed = principalSchema.safeParse(raw);
     if (!parsed.success) {
          throw validationFailure('Malformed user response', parsed.error);
     }
     return parsed.data;
}
