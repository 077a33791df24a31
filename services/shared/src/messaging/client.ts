import * as amqplib from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import { z } from 'zod';
import { MERGE_STRATEGIES } from '../types/sync.types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const OUTPOST_COMMANDS_EXCHANGE = 'outpost.commands';
export const OUTPOST_DLX = 'dlx.outpost';
export const SYNC_QUEUE = 'outpost.sync';
export const SYNC_DLQ = 'dlq.outpost.sync';
export const SYNC_REQUESTED_ROUTING_KEY = 'sync.requested';

export const syncRequestedCommandSchema = z.object({
     type: z.literal('SyncRequested'),
     requestId: z.string().min(1),
     source: z.string().min(1),
     target: z.string().min(1),
     strategy: z.enum(MERGE_STRATEGIES),
     reason: z.string().optional(),
     requestedAt: z.string(),
});

export type SyncRequestedCommand = z.infer<typeof syncRequestedCommandSchema>;

export function parseSyncRequestedCommand(content: Buffer): SyncRequestedCommand {
     let payload: unknown;
     try {
          payload = JSON.parse(content.toString());
     } catch (error) {
          throw new ValidationError(`Command is not valid JSON: ${String(error)}`);
     }
     const parsed = syncRequestedCommandSchema.safeParse(payload);
     if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const field = issue?.path.join('.') || undefined;
          throw new ValidationError(`Malformed sync command: ${field ?? ''} ${issue?.message ?? ''}`.trim(), field);
     }
     return parsed.data;
}

async function connect(url: string): Promise<AmqpConnection> {
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, will reconnect on next use');
          connection = null;
          channel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

async function assertTopology(ch: Channel): Promise<void> {
     await ch.assertExchange(OUTPOST_COMMANDS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(OUTPOST_DLX, 'topic', { durable: true });

     await ch.assertQueue(SYNC_QUEUE, {
          durable: true,
          deadLetterExchange: OUTPOST_DLX,
          deadLetterRoutingKey: SYNC_DLQ,
     });
     await ch.assertQueue(SYNC_DLQ, { durable: true });

     await ch.bindQueue(SYNC_QUEUE, OUTPOST_COMMANDS_EXCHANGE, SYNC_REQUESTED_ROUTING_KEY);
     await ch.bindQueue(SYNC_DLQ, OUTPOST_DLX, SYNC_DLQ);
}

export async function getChannel(url: string = process.env.AMQP_URL || 'amqp://localhost:5672'): Promise<Channel> {
     if (channel) return channel;

     const conn = connection ?? (await connect(url));
     connection = conn;

     const ch = await conn.createChannel();
     await assertTopology(ch);
     channel = ch;

     logger.info('RabbitMQ channel created and configured');
     return ch;
}

export function publishSyncRequested(ch: Pick<Channel, 'publish'>, command: SyncRequestedCommand): void {
     const content = Buffer.from(JSON.stringify(syncRequestedCommandSchema.parse(command)));
     const accepted = ch.publish(OUTPOST_COMMANDS_EXCHANGE, SYNC_REQUESTED_ROUTING_KEY, content, {
          persistent: true,
          contentType: 'application/json',
          messageId: command.requestId,
          timestamp: Date.now(),
     });
     if (!accepted) {
          logger.warn({ requestId: command.requestId }, 'RabbitMQ write buffer full, command queued locally');
     }
}

export async function closeConnection(): Promise<void> {
     const ch = channel;
     const conn = connection;
     channel = null;
     connection = null;
     if (ch) {
          await ch.close();
     }
     if (conn) {
          await conn.close();
     }
     logger.info('RabbitMQ connection closed');
}

export type { Channel, ConsumeMessage };
