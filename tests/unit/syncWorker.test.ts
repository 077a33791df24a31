import type { Channel, ConsumeMessage } from 'amqplib';
import { SyncWorker, type SyncCommandProcessor } from '../../services/sync-worker/src/sync-worker';

class FakeChannel {
     closed = false;
     deliver: ((msg: ConsumeMessage | null) => void) | undefined;
     readonly events: string[] = [];

     prefetch = jest.fn(async () => undefined);
     consume = jest.fn(async (_queue: string, onMessage: (msg: ConsumeMessage | null) => void) => {
          this.deliver = onMessage;
          return { consumerTag: 'ctag-1' };
     });
     cancel = jest.fn(async () => {
          this.events.push('cancel');
          return { consumerTag: 'ctag-1' };
     });
     ack = jest.fn(() => {
          this.ensureOpen();
          this.events.push('ack');
     });
     nack = jest.fn(() => {
          this.ensureOpen();
          this.events.push('nack');
     });

     close(): void {
          this.closed = true;
          this.events.push('close');
     }

     private ensureOpen(): void {
          if (this.closed) {
               throw new Error('Channel closed');
          }
     }
}

function message(requestId: string): ConsumeMessage {
     return { content: Buffer.from(JSON.stringify({ requestId })), fields: {}, properties: {} } as unknown as ConsumeMessage;
}

/** A run that only finishes once the worker aborts it, as a cancelled sync does. */
const runUntilAborted: SyncCommandProcessor = {
     handle: (_content, signal) =>
          new Promise((resolve) => {
               signal?.addEventListener('abort', () => resolve(undefined), { once: true });
          }),
};

describe('SyncWorker', () => {
     let channel: FakeChannel;

     beforeEach(() => {
          channel = new FakeChannel();
     });

     function worker(handler: SyncCommandProcessor): SyncWorker {
          return new SyncWorker({
               prefetch: 5,
               openChannel: async () => channel as unknown as Channel,
               handler,
          });
     }

     it('should consume the sync queue with the configured prefetch', async () => {
          await worker(runUntilAborted).start();

          expect(channel.prefetch).toHaveBeenCalledWith(5);
          expect(channel.consume).toHaveBeenCalledWith('outpost.sync', expect.any(Function));
     });

     it('should ack in-flight runs before stop resolves', async () => {
          const subject = worker(runUntilAborted);
          await subject.start();
          const first = message('req-1');
          const second = message('req-2');
          channel.deliver?.(first);
          channel.deliver?.(second);

          await subject.stop();
          channel.close();

          expect(channel.events).toEqual(['cancel', 'ack', 'ack', 'close']);
          expect(channel.ack).toHaveBeenCalledWith(first);
          expect(channel.ack).toHaveBeenCalledWith(second);
          expect(channel.nack).not.toHaveBeenCalled();
     });

     it('should send a failed command to the dead-letter queue', async () => {
          const subject = worker({ handle: async () => Promise.reject(new Error('Malformed sync command')) });
          await subject.start();
          const msg = message('req-3');
          channel.deliver?.(msg);

          await subject.stop();

          expect(channel.nack).toHaveBeenCalledWith(msg, false, false);
          expect(channel.ack).not.toHaveBeenCalled();
     });

     it('should settle even when the channel can no longer ack or nack', async () => {
          const subject = worker(runUntilAborted);
          await subject.start();
          channel.deliver?.(message('req-4'));
          channel.close();

          await expect(subject.stop()).resolves.toBeUndefined();
          expect(channel.ack).toHaveBeenCalledTimes(1);
          expect(channel.nack).toHaveBeenCalledTimes(1);
     });
});
