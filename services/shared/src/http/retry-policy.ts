import { SyncCancelledError, ValidationError } from '../utils/errors';

export interface RetryPolicy {
     maxRetries: number;
     backoffBaseMs: number;
     backoffFactor: number;
     /** Fraction of the computed delay added as random jitter. Off unless set. */
     jitterRatio?: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
     maxRetries: 3,
     backoffBaseMs: 1000,
     backoffFactor: 2,
});

export const NO_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
     maxRetries: 0,
     backoffBaseMs: 1000,
     backoffFactor: 1,
});

export function validateRetryPolicy(policy: RetryPolicy): RetryPolicy {
     if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
          throw new ValidationError('maxRetries must be an integer >= 0', 'maxRetries');
     }
     if (!(policy.backoffBaseMs > 0)) {
          throw new ValidationError('backoffBaseMs must be > 0', 'backoffBaseMs');
     }
     if (!(policy.backoffFactor >= 1)) {
          throw new ValidationError('backoffFactor must be >= 1', 'backoffFactor');
     }
     if (policy.jitterRatio !== undefined && !(policy.jitterRatio >= 0)) {
          throw new ValidationError('jitterRatio must be >= 0', 'jitterRatio');
     }
     return policy;
}

/**
 * Delay before the retry that follows attempt `attemptIndex` (0-based).
 * Depends only on the policy and the index.
 */
export function computeBackoffDelay(
     policy: RetryPolicy,
     attemptIndex: number,
     random: () => number = Math.random
): number {
     const delay = policy.backoffBaseMs * Math.pow(policy.backoffFactor, attemptIndex);
     if (!policy.jitterRatio) {
          return delay;
     }
     return delay + delay * policy.jitterRatio * random();
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
     new Promise<void>((resolve, reject) => {
          if (signal?.aborted) {
               reject(new SyncCancelledError('Cancelled during retry backoff'));
               return;
          }

          let timer: NodeJS.Timeout | undefined;
          const onAbort = () => {
               clearTimeout(timer);
               reject(new SyncCancelledError('Cancelled during retry backoff'));
          };

          timer = setTimeout(() => {
               signal?.removeEventListener('abort', onAbort);
               resolve();
          }, ms);
          signal?.addEventListener('abort', onAbort, { once: true });
     });
