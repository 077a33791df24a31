import type { Channel, ConsumeMessage } from 'amqplib';
import { SYNC_QUEUE } from '@outpost/shared/src/messaging/client';
import { logger } from '@outpost/shared/src/utils/logger';

export interface SyncCommandProcessor {
     handle(content: Buffer, signal?: AbortSignal): Promise<unknown>;
}

export interface SyncWorkerOptions {
     prefetch: number;
     openChannel: () => Promise<Channel>;
     handler: SyncCommandProcessor;
}

export class SyncWorker {
     private readonly shutdownController = new AbortController();
     private readonly inflight = new Set<Promise<void>>();
     private channel: Channel | undefined;
     private consumerTag: string | undefined;

     constructor(private readonly options: SyncWorkerOptions) {}

     async start(): Promise<void> {
          const prefetch = this.options.prefetch;
          logger.info({ prefetch }, 'Starting sync worker');

          const channel = await this.options.openChannel();
          await channel.prefetch(prefetch);

          const { consumerTag } = await channel.consume(SYNC_QUEUE, (msg) => {
               if (!msg) return;
               this.track(channel, msg);
          });
          this.channel = channel;
          this.consumerTag = consumerTag;

          logger.info('Sync worker started');
     }

     /**
      * Stops consuming and aborts in-flight runs; resolves once each of them
      * has been acked or nacked, so the channel can be closed afterwards.
      */
     async stop(): Promise<void> {
          this.shutdownController.abort();
          if (this.channel && this.consumerTag) {
               try {
                    await this.channel.cancel(this.consumerTag);
               } catch (error) {
                    logger.warn({ err: error }, 'Failed to cancel sync consumer');
               }
          }
          await Promise.allSettled([...this.inflight]);
     }

     private track(channel: Channel, msg: ConsumeMessage): void {
          const run = this.process(channel, msg).finally(() => {
               this.inflight.delete(run);
          });
          this.inflight.add(run);
     }

     private async process(channel: Channel, msg: ConsumeMessage): Promise<void> {
          try {
               await this.options.handler.handle(msg.content, this.shutdownController.signal);
               channel.ack(msg);
          } catch (error) {
               logger.error({ err: error }, 'Failed to process sync command');
               try {
                    channel.nack(msg, false, false); // Send to DLQ
               } catch (nackError) {
                    logger.error({ err: nackError }, 'Failed to nack sync command');
               }
          }
     }
}
