import { loadConfigFromEnvFile } from '@outpost/shared/src/config/env';
import { createSyncContext } from '@outpost/shared/src/context';
import { checkConnection, closePool } from '@outpost/shared/src/db/client';
import { closeConnection, getChannel, publishSyncRequested } from '@outpost/shared/src/messaging/client';
import { logger } from '@outpost/shared/src/utils/logger';
import { buildApp, ReadinessCheck } from './app';

async function main() {
     const config = loadConfigFromEnvFile();
     const context = createSyncContext(config);

     const failedLogins = await context.registry.loginAll();
     if (failedLogins.length > 0) {
          logger.warn({ nodes: failedLogins }, 'Some outposts rejected login; calls will retry on demand');
     }

     const readinessChecks: Record<string, ReadinessCheck> = {
          broker: async () => {
               await getChannel(config.amqp.url);
               return true;
          },
     };
     const pool = context.pool;
     if (pool) {
          readinessChecks.database = () => checkConnection(pool);
     }

     const app = await buildApp({
          context,
          readinessChecks,
          logger: true,
          publish: async (command) => {
               publishSyncRequested(await getChannel(config.amqp.url), command);
          },
     });

     const { port, host } = config.syncApi;
     try {
          await app.listen({ port, host });
          logger.info(`Sync API listening on ${host}:${port}`);
          logger.info(`OpenAPI docs available at http://${host}:${port}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in sync API');
     process.exit(1);
});
