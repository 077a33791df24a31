import { randomUUID } from 'crypto';
import type { FastifyPluginAsync } from 'fastify';
import type { SyncContext } from '@outpost/shared/src/context';
import type { SyncRequestedCommand } from '@outpost/shared/src/messaging/client';
import { NotFoundError } from '@outpost/shared/src/utils/errors';
import type { MergeStrategy, SyncOutcome } from '@outpost/shared/src/types/sync.types';
import {
     queueSyncSchema,
     runSyncSchema,
     syncHistorySchema,
     syncRunByRequestSchema,
     syncSummarySchema,
} from '../schemas/sync.schemas';
import { replyWithError } from './reply-error';

export type SyncRoutesOptions = {
     context: Pick<SyncContext, 'syncService' | 'auditLog'>;
     publish: (command: SyncRequestedCommand) => Promise<void>;
};

type SyncBody = {
     source: string;
     target: string;
     strategy: MergeStrategy;
     reason?: string;
};

const OUTCOME_STATUS: Record<SyncOutcome, number> = {
     success: 200,
     partial_success: 200,
     auth_failure: 401,
     unreachable_source: 502,
     unreachable_target: 502,
     malformed_envelope: 422,
     cancelled: 499,
     failed: 500,
};

export function outcomeStatusCode(outcome: SyncOutcome): number {
     return OUTCOME_STATUS[outcome];
}

export const registerSyncRoutes: FastifyPluginAsync<SyncRoutesOptions> = async (app, { context, publish }) => {
     // Queue a sync for the worker
     app.post<{ Body: SyncBody }>('/', { schema: queueSyncSchema }, async (request, reply) => {
          const { source, target, strategy, reason } = request.body;
          try {
               context.syncService.validatePair(source, target);

               const requestId = randomUUID();
               await publish({
                    type: 'SyncRequested',
                    requestId,
                    source,
                    target,
                    strategy,
                    ...(reason ? { reason } : {}),
                    requestedAt: new Date().toISOString(),
               });

               request.log.info({ requestId, source, target, strategy }, 'Sync queued');
               return reply.code(202).send({
                    requestId,
                    status: 'queued',
                    message: 'Sync request queued successfully',
               });
          } catch (error) {
               return replyWithError(request, reply, error, 'Failed to queue sync request');
          }
     });

     // Run a sync within the request
     app.post<{ Body: SyncBody }>('/run', { schema: runSyncSchema }, async (request, reply) => {
          const { source, target, strategy } = request.body;
          try {
               const result = await context.syncService.runSync({
                    source,
                    target,
                    strategy,
                    requestId: String(request.id),
               });
               return reply.code(outcomeStatusCode(result.outcome)).send(result);
          } catch (error) {
               return replyWithError(request, reply, error, 'Sync run failed');
          }
     });

     app.get<{
          Querystring: { source?: string; target?: string; outcome?: SyncOutcome; limit?: number };
     }>('/history', { schema: syncHistorySchema }, async (request) => {
          const entries = await context.auditLog.list({
               sourceNode: request.query.source,
               targetNode: request.query.target,
               outcome: request.query.outcome,
               limit: request.query.limit,
          });
          return { entries };
     });

     app.get<{ Params: { requestId: string } }>(
          '/history/:requestId',
          { schema: syncRunByRequestSchema },
          async (request, reply) => {
               try {
                    const entry = await context.auditLog.findByRequestId(request.params.requestId);
                    if (!entry) {
                         throw new NotFoundError(`Sync request ${request.params.requestId} not found`);
                    }
                    return entry;
               } catch (error) {
                    return replyWithError(request, reply, error, 'Failed to read sync history');
               }
          }
     );

     app.get('/summary', { schema: syncSummarySchema }, async () => {
          return context.auditLog.summarize();
     });
};
