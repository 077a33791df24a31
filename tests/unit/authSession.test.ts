import { AuthSession } from '@outpost/shared/src/auth/auth-session';
import { RequestExecutor } from '@outpost/shared/src/http/request-executor';
import { TransientError } from '@outpost/shared/src/utils/errors';
import { FakeOutpostNode } from '../helpers/fakeOutpostNode';

describe('AuthSession', () => {
     const baseUrl = 'http://fort-north.local';
     let node: FakeOutpostNode;
     let clock: number;
     let session: AuthSession;

     beforeEach(() => {
          node = new FakeOutpostNode('fort-north', baseUrl, { trader: 'test-secret' });
          clock = Date.parse('2024-05-01T12:00:00.000Z');
          session = new AuthSession({
               nodeName: 'fort-north',
               loginUrl: `${baseUrl}/auth/login`,
               executor: new RequestExecutor({ fetchImpl: node.fetch, sleep: async () => undefined }),
               now: () => clock,
          });
     });

     describe('authenticate', () => {
          it('should store a token with its expiry on success', async () => {
               await expect(session.authenticate('trader', 'test-secret')).resolves.toBe(true);

               const token = session.currentToken();
               expect(token?.value).toBe('fort-north-token-1');
               expect(token?.principal).toBe('trader');
               expect(token?.expiresAt.toISOString()).toBe('2024-05-01T13:00:00.000Z');
               expect(session.authorizationHeader()).toEqual({ Authorization: 'Bearer fort-north-token-1' });
          });

          it('should return false after exactly one attempt for bad credentials', async () => {
               await expect(session.authenticate('trader', 'wrong-password')).resolves.toBe(false);

               expect(node.requestsTo('POST', '/auth/login')).toHaveLength(1);
               expect(session.currentToken()).toBeUndefined();
               expect(session.hasCredentials()).toBe(false);
               expect(session.authorizationHeader()).toEqual({});
          });

          it('should retry a login that fails in transport', async () => {
               node.failNext('POST', '/auth/login', 503, { detail: 'starting' });

               await expect(session.authenticate('trader', 'test-secret')).resolves.toBe(true);
               expect(node.requestsTo('POST', '/auth/login')).toHaveLength(2);
          });

          it('should throw when the node stays unreachable', async () => {
               node.dropNext('POST', '/auth/login', 'ECONNREFUSED', 4);

               await expect(session.authenticate('trader', 'test-secret')).rejects.toBeInstanceOf(TransientError);
               expect(session.currentToken()).toBeUndefined();
          });
     });

     describe('expiry', () => {
          it('should drop the token lazily once it expires', async () => {
               await session.authenticate('trader', 'test-secret');

               clock += 3599_000;
               expect(session.currentToken()).toBeDefined();
               clock += 1000;
               expect(session.currentToken()).toBeUndefined();
               expect(session.principal).toBe('trader');
          });

          it('should honour the expiry skew', async () => {
               const skewed = new AuthSession({
                    nodeName: 'fort-north',
                    loginUrl: `${baseUrl}/auth/login`,
                    executor: new RequestExecutor({ fetchImpl: node.fetch }),
                    now: () => clock,
                    expirySkewMs: 60_000,
               });
               await skewed.authenticate('trader', 'test-secret');

               clock += 3540_000;
               expect(skewed.currentToken()).toBeUndefined();
          });
     });

     describe('reauthenticate', () => {
          it('should return false without cached credentials', async () => {
               await expect(session.reauthenticate()).resolves.toBe(false);
               expect(node.requests).toHaveLength(0);
          });

          it('should share one in-flight login between concurrent callers', async () => {
               session.useCredentials('trader', 'test-secret');

               const results = await Promise.all([
                    session.reauthenticate(),
                    session.reauthenticate(),
                    session.reauthenticate(),
               ]);

               expect(results).toEqual([true, true, true]);
               expect(node.requestsTo('POST', '/auth/login')).toHaveLength(1);
               expect(session.currentToken()?.value).toBe('fort-north-token-1');
          });

          it('should log in again after the in-flight login settles', async () => {
               session.useCredentials('trader', 'test-secret');
               await session.reauthenticate();
               await session.reauthenticate();

               expect(node.requestsTo('POST', '/auth/login')).toHaveLength(2);
               expect(session.currentToken()?.value).toBe('fort-north-token-2');
          });
     });

     describe('invalidate and clear', () => {
          it('should keep credentials on invalidate and forget them on clear', async () => {
               await session.authenticate('trader', 'test-secret');

               session.invalidate();
               expect(session.currentToken()).toBeUndefined();
               expect(session.hasCredentials()).toBe(true);

               session.clear();
               expect(session.hasCredentials()).toBe(false);
               expect(session.principal).toBeUndefined();
          });
     });
});
