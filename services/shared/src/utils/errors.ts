// Error taxonomy for node calls and sync runs

export type ErrorCategory =
     | 'transient'
     | 'authentication'
     | 'not_found'
     | 'validation'
     | 'conflict'
     | 'fatal'
     | 'cancelled';

export class OutpostError extends Error {
     /** Number of attempts the executor made before giving up. */
     attempts = 1;

     constructor(
          message: string,
          public readonly code: string,
          public readonly category: ErrorCategory,
          public readonly statusCode: number = 500
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class TransientError extends OutpostError {
     constructor(
          message: string,
          attempts: number = 1,
          public readonly upstreamStatus?: number
     ) {
          super(message, 'TRANSIENT_FAILURE', 'transient', 503);
          this.attempts = attempts;
     }
}

export class AuthenticationError extends OutpostError {
     constructor(
          message: string,
          public readonly upstreamStatus?: number
     ) {
          super(message, 'AUTHENTICATION_FAILED', 'authentication', 401);
     }
}

export class NotFoundError extends OutpostError {
     constructor(
          message: string,
          public readonly resource?: string
     ) {
          super(message, 'NOT_FOUND', 'not_found', 404);
     }
}

export class ValidationError extends OutpostError {
     constructor(
          message: string,
          public readonly field?: string
     ) {
          super(message, 'VALIDATION_FAILED', 'validation', 400);
     }
}

export class ConflictError extends OutpostError {
     constructor(
          message: string,
          public readonly upstreamStatus?: number
     ) {
          super(message, 'CONFLICT', 'conflict', 409);
     }
}

export class FatalError extends OutpostError {
     constructor(message: string) {
          super(message, 'FATAL', 'fatal', 500);
     }
}

export class SyncCancelledError extends OutpostError {
     constructor(message: string = 'Sync operation was cancelled') {
          super(message, 'SYNC_CANCELLED', 'cancelled', 499);
     }
}

export function errorMessage(error: unknown): string {
     return error instanceof Error ? error.message : 'Unknown error';
}
