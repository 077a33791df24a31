import {
     AuthenticationError,
     ConflictError,
     NotFoundError,
     OutpostError,
     SyncCancelledError,
     TransientError,
     ValidationError,
} from '../utils/errors';

/** What went wrong on a single attempt, before any retry decision. */
export type AttemptFailure =
     | { type: 'http'; status: number; body: string }
     | { type: 'network'; error: unknown }
     | { type: 'timeout'; timeoutMs: number }
     | { type: 'malformed'; message: string }
     | { type: 'aborted' };

export type RetryableReason = 'connection' | 'dns' | 'timeout' | 'server_error' | 'rate_limited';

export type TerminalReason =
     | 'authentication'
     | 'not_found'
     | 'conflict'
     | 'client_error'
     | 'malformed'
     | 'aborted';

export type FailureClassification =
     | { kind: 'retryable'; reason: RetryableReason }
     | { kind: 'terminal'; reason: TerminalReason };

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const TIMEOUT_ERROR_CODES = new Set([
     'ETIMEDOUT',
     'UND_ERR_CONNECT_TIMEOUT',
     'UND_ERR_HEADERS_TIMEOUT',
     'UND_ERR_BODY_TIMEOUT',
]);

export function extractErrorCode(error: unknown): string | undefined {
     if (typeof error !== 'object' || error === null) {
          return undefined;
     }
     if ('code' in error && typeof error.code === 'string') {
          return error.code;
     }
     // fetch wraps socket errors: TypeError('fetch failed', { cause })
     if ('cause' in error) {
          return extractErrorCode(error.cause);
     }
     return undefined;
}

export function classifyHttpStatus(status: number): FailureClassification {
     if (status >= 500) {
          return { kind: 'retryable', reason: 'server_error' };
     }
     if (status === 429) {
          return { kind: 'retryable', reason: 'rate_limited' };
     }
     if (status === 401 || status === 403) {
          return { kind: 'terminal', reason: 'authentication' };
     }
     if (status === 404) {
          return { kind: 'terminal', reason: 'not_found' };
     }
     if (status === 409) {
          return { kind: 'terminal', reason: 'conflict' };
     }
     return { kind: 'terminal', reason: 'client_error' };
}

export function classifyFailure(failure: AttemptFailure): FailureClassification {
     switch (failure.type) {
          case 'http':
               return classifyHttpStatus(failure.status);
          case 'timeout':
               return { kind: 'retryable', reason: 'timeout' };
          case 'malformed':
               return { kind: 'terminal', reason: 'malformed' };
          case 'aborted':
               return { kind: 'terminal', reason: 'aborted' };
          case 'network': {
               const code = extractErrorCode(failure.error);
               if (code && DNS_ERROR_CODES.has(code)) {
                    return { kind: 'retryable', reason: 'dns' };
               }
               if (code && TIMEOUT_ERROR_CODES.has(code)) {
                    return { kind: 'retryable', reason: 'timeout' };
               }
               return { kind: 'retryable', reason: 'connection' };
          }
     }
}

function describeHttpBody(body: string): string {
     try {
          const parsed: unknown = JSON.parse(body);
          if (typeof parsed === 'object' && parsed !== null) {
               if ('detail' in parsed && typeof parsed.detail === 'string') {
                    return parsed.detail;
               }
               if ('message' in parsed && typeof parsed.message === 'string') {
                    return parsed.message;
               }
          }
     } catch {
          return body.slice(0, 200);
     }
     return body.slice(0, 200);
}

function describeFailure(failure: AttemptFailure): string {
     switch (failure.type) {
          case 'http': {
               const detail = describeHttpBody(failure.body);
               return detail ? `HTTP ${failure.status}: ${detail}` : `HTTP ${failure.status}`;
          }
          case 'network': {
               const code = extractErrorCode(failure.error);
               const message = failure.error instanceof Error ? failure.error.message : 'network error';
               return code ? `${message} (${code})` : message;
          }
          case 'timeout':
               return `no response within ${failure.timeoutMs}ms`;
          case 'malformed':
               return failure.message;
          case 'aborted':
               return 'request aborted';
     }
}

export interface FailureContext {
     method: string;
     url: string;
     attempts: number;
}

function buildError(
     classification: FailureClassification,
     target: string,
     description: string,
     context: FailureContext,
     status: number | undefined
): OutpostError {
     if (classification.kind === 'retryable') {
          return new TransientError(
               `${target} failed after ${context.attempts} attempt(s): ${description}`,
               context.attempts,
               status
          );
     }
     switch (classification.reason) {
          case 'authentication':
               return new AuthenticationError(`${target} was rejected: ${description}`, status);
          case 'not_found':
               return new NotFoundError(`${target} not found: ${description}`, context.url);
          case 'conflict':
               return new ConflictError(`${target} conflicted: ${description}`, status);
          case 'aborted':
               return new SyncCancelledError(`${target} was cancelled`);
          case 'client_error':
          case 'malformed':
               return new ValidationError(`${target} was invalid: ${description}`);
     }
}

/** Converts a classified attempt failure into the error surfaced to callers. */
export function failureToError(
     failure: AttemptFailure,
     classification: FailureClassification,
     context: FailureContext
): OutpostError {
     const status = failure.type === 'http' ? failure.status : undefined;
     const error = buildError(
          classification,
          `${context.method} ${context.url}`,
          describeFailure(failure),
          context,
          status
     );
     error.attempts = context.attempts;
     return error;
}
