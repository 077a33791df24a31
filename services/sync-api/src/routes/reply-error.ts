import type { FastifyReply, FastifyRequest } from 'fastify';
import { OutpostError, TransientError } from '@outpost/shared/src/utils/errors';

/** Maps OutpostError to `{error, message}` with its status; anything else is a 500. */
export function replyWithError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     fallbackMessage: string
) {
     if (error instanceof TransientError) {
          // the outpost is unreachable, not this service
          return reply.code(502).send({ error: error.code, message: error.message });
     }
     if (error instanceof OutpostError) {
          return reply.code(error.statusCode).send({ error: error.code, message: error.message });
     }
     request.log.error({ err: error }, fallbackMessage);
     return reply.code(500).send({ error: 'INTERNAL_ERROR', message: fallbackMessage });
}
