import { INVENTORY_CATEGORIES } from '@outpost/shared/src/types/inventory.types';
import { MERGE_STRATEGIES, SYNC_OUTCOMES } from '@outpost/shared/src/types/sync.types';

const errorResponse = {
     type: 'object',
     properties: {
          error: { type: 'string', example: 'NOT_FOUND' },
          message: { type: 'string' },
     },
} as const;

const syncBody = {
     type: 'object',
     required: ['source', 'target', 'strategy'],
     properties: {
          source: { type: 'string', minLength: 1, description: 'Outpost to export from', example: 'fort-north' },
          target: { type: 'string', minLength: 1, description: 'Outpost to import into', example: 'fort-south' },
          strategy: {
               type: 'string',
               enum: [...MERGE_STRATEGIES],
               description: 'add skips existing items, merge adds quantities, replace wipes the target first',
          },
          reason: { type: 'string', description: 'Why the sync was requested' },
     },
} as const;

// Nested statistics and node payloads are serialized as-is
const openObject = { type: 'object', additionalProperties: true } as const;

export const queueSyncSchema = {
     tags: ['sync'],
     summary: 'Queue a sync',
     description: 'Publish a SyncRequested command for the sync worker',
     body: syncBody,
     response: {
          202: {
               description: 'Sync request accepted and queued',
               type: 'object',
               properties: {
                    requestId: { type: 'string' },
                    status: { type: 'string', example: 'queued' },
                    message: { type: 'string', example: 'Sync request queued successfully' },
               },
          },
          400: errorResponse,
          404: errorResponse,
          500: errorResponse,
     },
};

export const runSyncSchema = {
     tags: ['sync'],
     summary: 'Run a sync now',
     description: 'Export from the source and import into the target within the request',
     body: syncBody,
     response: {
          200: openObject,
          401: openObject,
          422: openObject,
          499: openObject,
          500: openObject,
          502: openObject,
          400: errorResponse,
          404: errorResponse,
     },
};

export const syncHistorySchema = {
     tags: ['sync'],
     summary: 'List sync runs',
     description: 'Audit log entries, newest first',
     querystring: {
          type: 'object',
          properties: {
               source: { type: 'string' },
               target: { type: 'string' },
               outcome: { type: 'string', enum: [...SYNC_OUTCOMES] },
               limit: { type: 'integer', minimum: 1, maximum: 500, default: 50 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    entries: { type: 'array', items: openObject },
               },
          },
     },
};

export const syncRunByRequestSchema = {
     tags: ['sync'],
     summary: 'Get a sync run',
     description: 'Look up the audit entry recorded for a request id',
     params: {
          type: 'object',
          required: ['requestId'],
          properties: {
               requestId: { type: 'string' },
          },
     },
     response: {
          200: openObject,
          404: errorResponse,
     },
};

export const syncSummarySchema = {
     tags: ['sync'],
     summary: 'Summarize sync runs',
     response: {
          200: openObject,
     },
};

export const listOutpostsSchema = {
     tags: ['outposts'],
     summary: 'List configured outposts',
     description: 'Health and status of every configured outpost; unreachable ones are reported, not failed',
     response: {
          200: {
               type: 'object',
               properties: {
                    outposts: { type: 'array', items: openObject },
               },
          },
     },
};

export const outpostInventorySchema = {
     tags: ['outposts'],
     summary: 'List one outpost inventory',
     params: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string' },
          },
     },
     querystring: {
          type: 'object',
          properties: {
               category: { type: 'string', enum: [...INVENTORY_CATEGORIES] },
               minQuantity: { type: 'integer', minimum: 0 },
               limit: { type: 'integer', minimum: 1 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    outpost: { type: 'string' },
                    items: { type: 'array', items: openObject },
               },
          },
          401: errorResponse,
          404: errorResponse,
          502: errorResponse,
     },
};
