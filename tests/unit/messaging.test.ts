import {
     OUTPOST_COMMANDS_EXCHANGE,
     parseSyncRequestedCommand,
     publishSyncRequested,
     SYNC_REQUESTED_ROUTING_KEY,
     type SyncRequestedCommand,
} from '@outpost/shared/src/messaging/client';
import { ValidationError } from '@outpost/shared/src/utils/errors';

const command: SyncRequestedCommand = {
     type: 'SyncRequested',
     requestId: 'req-1',
     source: 'fort-north',
     target: 'fort-south',
     strategy: 'merge',
     requestedAt: '2024-05-01T12:00:00.000Z',
};

describe('Sync command messaging', () => {
     describe('parseSyncRequestedCommand', () => {
          it('should parse a valid command', () => {
               expect(parseSyncRequestedCommand(Buffer.from(JSON.stringify(command)))).toEqual(command);
          });

          it('should reject content that is not JSON', () => {
               expect(() => parseSyncRequestedCommand(Buffer.from('not json'))).toThrow(ValidationError);
          });

          it('should name the invalid field', () => {
               let caught: unknown;
               try {
                    parseSyncRequestedCommand(Buffer.from(JSON.stringify({ ...command, strategy: 'overwrite' })));
               } catch (error) {
                    caught = error;
               }
               expect(caught).toBeInstanceOf(ValidationError);
               expect(caught).toMatchObject({ field: 'strategy' });
          });
     });

     describe('publishSyncRequested', () => {
          it('should publish a persistent JSON message keyed by request id', () => {
               const publish = jest.fn().mockReturnValue(true);

               publishSyncRequested({ publish }, command);

               expect(publish).toHaveBeenCalledTimes(1);
               const [exchange, routingKey, content, options] = publish.mock.calls[0];
               expect(exchange).toBe(OUTPOST_COMMANDS_EXCHANGE);
               expect(routingKey).toBe(SYNC_REQUESTED_ROUTING_KEY);
               expect(JSON.parse(content.toString())).toEqual(command);
               expect(options).toMatchObject({
                    persistent: true,
                    contentType: 'application/json',
                    messageId: 'req-1',
               });
          });

          it('should refuse to publish an invalid command', () => {
               const publish = jest.fn();
               expect(() => publishSyncRequested({ publish }, { ...command, source: '' })).toThrow();
               expect(publish).not.toHaveBeenCalled();
          });
     });
});
