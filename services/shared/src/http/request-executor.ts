import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger';
import {
     AttemptFailure,
     classifyFailure,
     failureToError,
} from './failure-classifier';
import {
     computeBackoffDelay,
     DEFAULT_RETRY_POLICY,
     RetryPolicy,
     sleep as defaultSleep,
     Sleep,
     validateRetryPolicy,
} from './retry-policy';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number | undefined>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ExecutorRequest {
     method: HttpMethod;
     url: string;
     body?: unknown;
     headers?: Record<string, string>;
     query?: QueryParams;
     policy?: RetryPolicy;
     /**
      * Whether repeating the call is harmless. Defaults to true for every
      * method except POST; non-idempotent calls are never retried.
      */
     idempotent?: boolean;
     signal?: AbortSignal;
}

export interface ExecutorResponse {
     status: number;
     data: unknown;
     attempts: number;
}

export interface RequestExecutorOptions {
     timeoutMs?: number;
     defaultPolicy?: RetryPolicy;
     fetchImpl?: FetchLike;
     sleep?: Sleep;
     random?: () => number;
     logger?: Logger;
}

type AttemptOutcome =
     | { ok: true; status: number; data: unknown }
     | { ok: false; failure: AttemptFailure };

export const DEFAULT_TIMEOUT_MS = 10_000;

export function buildUrl(url: string, query?: QueryParams): string {
     if (!query) {
          return url;
     }
     const params = new URLSearchParams();
     for (const [key, value] of Object.entries(query)) {
          if (value !== undefined) {
               params.append(key, String(value));
          }
     }
     const search = params.toString();
     if (!search) {
          return url;
     }
     return url.includes('?') ? `${url}&${search}` : `${url}?${search}`;
}

function parseBody(text: string, status: number): AttemptOutcome {
     if (text.trim() === '') {
          return { ok: true, status, data: null };
     }
     try {
          const data: unknown = JSON.parse(text);
          return { ok: true, status, data };
     } catch (error) {
          return {
               ok: false,
               failure: {
                    type: 'malformed',
                    message: `response body is not valid JSON (${error instanceof Error ? error.message : 'parse error'})`,
               },
          };
     }
}

/**
 * Executes one logical HTTP request: a fixed timeout per attempt, and retries
 * with exponential backoff for failures classified as retryable.
 */
export class RequestExecutor {
     private readonly timeoutMs: number;
     private readonly defaultPolicy: RetryPolicy;
     private readonly fetchImpl: FetchLike;
     private readonly sleep: Sleep;
     private readonly random: () => number;
     private readonly log: Logger;

     constructor(options: RequestExecutorOptions = {}) {
          this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
          this.defaultPolicy = validateRetryPolicy({ ...(options.defaultPolicy ?? DEFAULT_RETRY_POLICY) });
          this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
          this.sleep = options.sleep ?? defaultSleep;
          this.random = options.random ?? Math.random;
          this.log = options.logger ?? createChildLogger({ component: 'request-executor' });
     }

     get policy(): Readonly<RetryPolicy> {
          return this.defaultPolicy;
     }

     async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
          const policy = this.resolvePolicy(request);
          const url = buildUrl(request.url, request.query);
          const maxAttempts = policy.maxRetries + 1;

          for (let attemptIndex = 0; ; attemptIndex++) {
               const attempts = attemptIndex + 1;
               const outcome = await this.attempt(request, url);

               if (outcome.ok) {
                    if (attempts > 1) {
                         this.log.info({ method: request.method, url, attempts }, 'Request succeeded after retry');
                    }
                    return { status: outcome.status, data: outcome.data, attempts };
               }

               const classification = classifyFailure(outcome.failure);
               if (classification.kind === 'terminal' || attempts >= maxAttempts) {
                    const error = failureToError(outcome.failure, classification, {
                         method: request.method,
                         url,
                         attempts,
                    });
                    this.log.warn(
                         { method: request.method, url, attempts, reason: classification.reason },
                         'Request failed'
                    );
                    throw error;
               }

               const delayMs = computeBackoffDelay(policy, attemptIndex, this.random);
               this.log.warn(
                    {
                         method: request.method,
                         url,
                         attempt: attempts,
                         maxAttempts,
                         reason: classification.reason,
                         delayMs,
                    },
                    'Retryable request failure, backing off'
               );
               await this.sleep(delayMs, request.signal);
          }
     }

     private resolvePolicy(request: ExecutorRequest): RetryPolicy {
          const policy = request.policy ? validateRetryPolicy(request.policy) : this.defaultPolicy;
          const idempotent = request.idempotent ?? request.method !== 'POST';
          if (!idempotent) {
               return { ...policy, maxRetries: 0 };
          }
          return policy;
     }

     private async attempt(request: ExecutorRequest, url: string): Promise<AttemptOutcome> {
          if (request.signal?.aborted) {
               return { ok: false, failure: { type: 'aborted' } };
          }

          const controller = new AbortController();
          const state = { timedOut: false };
          const timer = setTimeout(() => {
               state.timedOut = true;
               controller.abort();
          }, this.timeoutMs);
          const onAbort = () => controller.abort();
          request.signal?.addEventListener('abort', onAbort, { once: true });

          const headers: Record<string, string> = {
               Accept: 'application/json',
               ...request.headers,
          };
          let body: string | undefined;
          if (request.body !== undefined) {
               headers['Content-Type'] = 'application/json';
               body = JSON.stringify(request.body);
          }

          try {
               const response = await this.fetchImpl(url, {
                    method: request.method,
                    headers,
                    body,
                    signal: controller.signal,
               });
               const text = await response.text();

               if (!response.ok) {
                    return { ok: false, failure: { type: 'http', status: response.status, body: text } };
               }
               return parseBody(text, response.status);
          } catch (error) {
               if (state.timedOut) {
                    return { ok: false, failure: { type: 'timeout', timeoutMs: this.timeoutMs } };
               }
               if (request.signal?.aborted) {
                    return { ok: false, failure: { type: 'aborted' } };
               }
               return { ok: false, failure: { type: 'network', error } };
          } finally {
               clearTimeout(timer);
               request.signal?.removeEventListener('abort', onAbort);
          }
     }
}
