import type { Logger } from 'pino';
import { parseSyncRequestedCommand } from '@outpost/shared/src/messaging/client';
import type { SyncService } from '@outpost/shared/src/services/sync-service';
import type { SyncResult } from '@outpost/shared/src/types/sync.types';
import { createChildLogger } from '@outpost/shared/src/utils/logger';

/**
 * Runs one SyncRequested command. A finished run, failed or not, resolves;
 * a malformed command or an unknown outpost throws so the message is
 * dead-lettered.
 */
export class SyncCommandHandler {
     constructor(
          private readonly syncService: SyncService,
          private readonly log: Logger = createChildLogger({ component: 'sync-worker' })
     ) {}

     async handle(content: Buffer, signal?: AbortSignal): Promise<SyncResult> {
          const command = parseSyncRequestedCommand(content);
          const { requestId, source, target, strategy } = command;
          this.log.info({ requestId, source, target, strategy, reason: command.reason }, 'Processing sync command');

          const result = await this.syncService.runSync({ source, target, strategy, requestId, signal });

          this.log.info(
               {
                    requestId,
                    state: result.state,
                    outcome: result.outcome,
                    itemsFailed: result.statistics.itemsFailed,
               },
               'Sync command finished'
          );
          return result;
     }
}
