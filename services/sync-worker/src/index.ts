import { loadConfigFromEnvFile } from '@outpost/shared/src/config/env';
import { createSyncContext } from '@outpost/shared/src/context';
import { closePool } from '@outpost/shared/src/db/client';
import { closeConnection, getChannel } from '@outpost/shared/src/messaging/client';
import { logger } from '@outpost/shared/src/utils/logger';
import { SyncCommandHandler } from './sync-command-handler';
import { SyncWorker } from './sync-worker';

async function main() {
     const config = loadConfigFromEnvFile();
     const context = createSyncContext(config);
     const worker = new SyncWorker({
          prefetch: config.amqp.prefetch,
          openChannel: () => getChannel(config.amqp.url),
          handler: new SyncCommandHandler(context.syncService),
     });

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await worker.stop();
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await worker.start();
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in sync worker');
     process.exit(1);
});
