import { randomUUID } from 'crypto';
import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import type { SyncContext } from '@outpost/shared/src/context';
import type { SyncRequestedCommand } from '@outpost/shared/src/messaging/client';
import { errorMessage } from '@outpost/shared/src/utils/errors';
import { registerOutpostRoutes } from './routes/outposts';
import { registerSyncRoutes } from './routes/sync';

export type ReadinessCheck = () => Promise<boolean>;

export interface BuildAppOptions {
     context: SyncContext;
     publish: (command: SyncRequestedCommand) => Promise<void>;
     /** Named dependency checks for /health/ready. */
     readinessChecks?: Record<string, ReadinessCheck>;
     logger?: boolean;
     docs?: boolean;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? false,
          requestIdHeader: 'x-correlation-id',
          genReqId: () => randomUUID(),
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     if (options.docs ?? true) {
          await app.register(swagger, {
               openapi: {
                    info: {
                         title: 'Outpost Sync API',
                         description: 'Control-plane API for outpost inventory synchronization',
                         version: '1.0.0',
                    },
                    servers: [{ url: `http://localhost:${options.context.config.syncApi.port}`, description: 'Development' }],
                    tags: [
                         { name: 'sync', description: 'Sync runs between outposts' },
                         { name: 'outposts', description: 'Configured outposts' },
                         { name: 'health', description: 'Health and readiness checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: { type: 'object', additionalProperties: { type: 'string' } },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   dependencies: { type: 'object', additionalProperties: { type: 'string' } },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (request, reply) => {
               const dependencies: Record<string, string> = {};
               const failed: string[] = [];

               for (const [name, check] of Object.entries(options.readinessChecks ?? {})) {
                    try {
                         const ok = await check();
                         dependencies[name] = ok ? 'ok' : 'unavailable';
                         if (!ok) failed.push(name);
                    } catch (error) {
                         request.log.warn({ err: error, dependency: name }, 'Readiness check threw');
                         dependencies[name] = errorMessage(error);
                         failed.push(name);
                    }
               }

               if (failed.length > 0) {
                    return reply.code(503).send({
                         status: 'not_ready',
                         dependencies,
                         error: `Unavailable: ${failed.join(', ')}`,
                    });
               }
               return { status: 'ready', dependencies };
          }
     );

     await app.register(registerOutpostRoutes, { prefix: '/outposts', context: options.context });
     await app.register(registerSyncRoutes, {
          prefix: '/sync',
          context: options.context,
          publish: options.publish,
     });

     return app;
}
