import {
     computeBackoffDelay,
     DEFAULT_RETRY_POLICY,
     sleep,
     validateRetryPolicy,
} from '@outpost/shared/src/http/retry-policy';
import { SyncCancelledError, ValidationError } from '@outpost/shared/src/utils/errors';

describe('Retry policy', () => {
     describe('computeBackoffDelay', () => {
          it('should grow exponentially from the base', () => {
               const policy = { maxRetries: 3, backoffBaseMs: 1000, backoffFactor: 2 };
               expect([0, 1, 2].map((index) => computeBackoffDelay(policy, index))).toEqual([1000, 2000, 4000]);
          });

          it('should add no jitter unless configured', () => {
               const random = jest.fn(() => 0.5);
               expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 1, random)).toBe(2000);
               expect(random).not.toHaveBeenCalled();
          });

          it('should add up to jitterRatio of the delay', () => {
               const policy = { maxRetries: 3, backoffBaseMs: 1000, backoffFactor: 2, jitterRatio: 0.5 };
               expect(computeBackoffDelay(policy, 1, () => 0.5)).toBe(2500);
          });
     });

     describe('validateRetryPolicy', () => {
          it('should reject invalid fields by name', () => {
               expect(() => validateRetryPolicy({ maxRetries: -1, backoffBaseMs: 1000, backoffFactor: 2 })).toThrow(
                    ValidationError
               );
               let caught: unknown;
               try {
                    validateRetryPolicy({ maxRetries: 1, backoffBaseMs: 1000, backoffFactor: 0.5 });
               } catch (error) {
                    caught = error;
               }
               expect(caught).toBeInstanceOf(ValidationError);
               expect(caught).toMatchObject({ field: 'backoffFactor' });
          });

          it('should accept the default policy', () => {
               expect(validateRetryPolicy({ ...DEFAULT_RETRY_POLICY })).toEqual({
                    maxRetries: 3,
                    backoffBaseMs: 1000,
                    backoffFactor: 2,
               });
          });
     });

     describe('sleep', () => {
          afterEach(() => {
               jest.useRealTimers();
          });

          it('should resolve after the delay', async () => {
               jest.useFakeTimers();
               const done = jest.fn();
               const pending = sleep(1000).then(done);
               jest.advanceTimersByTime(999);
               await Promise.resolve();
               expect(done).not.toHaveBeenCalled();
               jest.advanceTimersByTime(1);
               await pending;
               expect(done).toHaveBeenCalled();
          });

          it('should reject with SyncCancelledError when aborted mid-sleep', async () => {
               jest.useFakeTimers();
               const controller = new AbortController();
               const pending = sleep(60_000, controller.signal);
               controller.abort();
               await expect(pending).rejects.toThrow(SyncCancelledError);
          });

          it('should reject immediately when already aborted', async () => {
               const controller = new AbortController();
               controller.abort();
               await expect(sleep(60_000, controller.signal)).rejects.toThrow('Cancelled during retry backoff');
          });
     });
});
