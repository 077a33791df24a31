import type { Logger } from 'pino';
import { parseLoginResponse } from '../clients/envelope';
import { RequestExecutor } from '../http/request-executor';
import { AuthenticationError, SyncCancelledError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

export interface AuthToken {
     readonly value: string;
     readonly issuedAt: Date;
     readonly expiresAt: Date;
     readonly principal: string;
}

export interface AuthSessionOptions {
     nodeName: string;
     loginUrl: string;
     executor: RequestExecutor;
     now?: () => number;
     /** Treat tokens as expired this many ms before their real expiry. */
     expirySkewMs?: number;
     logger?: Logger;
}

interface Credentials {
     username: string;
     password: string;
}

interface InflightLogin {
     promise: Promise<boolean>;
     controller: AbortController;
     /** Callers still waiting; the login is aborted once every one of them has given up. */
     waiters: number;
}

/**
 * Holds zero or one bearer token for a single node. Expiry is checked lazily
 * on read; there is no background refresh.
 */
export class AuthSession {
     readonly nodeName: string;
     private readonly loginUrl: string;
     private readonly executor: RequestExecutor;
     private readonly now: () => number;
     private readonly expirySkewMs: number;
     private readonly log: Logger;

     private token: AuthToken | undefined;
     private credentials: Credentials | undefined;
     private inflightLogin: InflightLogin | undefined;

     constructor(options: AuthSessionOptions) {
          this.nodeName = options.nodeName;
          this.loginUrl = options.loginUrl;
          this.executor = options.executor;
          this.now = options.now ?? Date.now;
          this.expirySkewMs = options.expirySkewMs ?? 0;
          this.log = options.logger ?? createChildLogger({ component: 'auth-session', node: options.nodeName });
     }

     /**
      * Logs in and stores the token. Returns false when the node rejects the
      * credentials; transport failures that outlast the retry budget throw.
      */
     async authenticate(username: string, password: string, signal?: AbortSignal): Promise<boolean> {
          const authenticated = await this.login({ username, password }, signal);
          if (authenticated) {
               this.credentials = { username, password };
          }
          return authenticated;
     }

     /** Caches credentials so the first protected call can log in on demand. */
     useCredentials(username: string, password: string): void {
          this.credentials = { username, password };
     }

     hasCredentials(): boolean {
          return this.credentials !== undefined;
     }

     /**
      * One login with the cached credentials. Concurrent callers share the
      * same in-flight login; a caller's signal only cancels that caller's wait.
      */
     async reauthenticate(signal?: AbortSignal): Promise<boolean> {
          const credentials = this.credentials;
          if (!credentials) {
               return false;
          }
          if (signal?.aborted) {
               throw new SyncCancelledError('Cancelled before re-authentication');
          }
          let inflight = this.inflightLogin;
          if (!inflight) {
               this.log.info('Re-authenticating');
               const controller = new AbortController();
               const started: InflightLogin = {
                    controller,
                    waiters: 0,
                    promise: this.login(credentials, controller.signal).finally(() => {
                         if (this.inflightLogin === started) {
                              this.inflightLogin = undefined;
                         }
                    }),
               };
               this.inflightLogin = started;
               inflight = started;
          }
          return this.waitForLogin(inflight, signal);
     }

     currentToken(): AuthToken | undefined {
          if (!this.token) {
               return undefined;
          }
          if (this.now() >= this.token.expiresAt.getTime() - this.expirySkewMs) {
               this.log.debug({ expiresAt: this.token.expiresAt }, 'Token expired');
               this.token = undefined;
               return undefined;
          }
          return this.token;
     }

     get principal(): string | undefined {
          return this.currentToken()?.principal ?? this.credentials?.username;
     }

     authorizationHeader(): Record<string, string> {
          const token = this.currentToken();
          return token ? { Authorization: `Bearer ${token.value}` } : {};
     }

     /** Drops the token but keeps credentials, e.g. after the node rejected it. */
     invalidate(): void {
          this.token = undefined;
     }

     /** Logout: forgets the token and the cached credentials. */
     clear(): void {
          this.token = undefined;
          this.credentials = undefined;
     }

     private waitForLogin(inflight: InflightLogin, signal?: AbortSignal): Promise<boolean> {
          inflight.waiters++;
          if (!signal) {
               return inflight.promise;
          }
          return new Promise<boolean>((resolve, reject) => {
               const onAbort = () => {
                    inflight.waiters--;
                    if (inflight.waiters === 0) {
                         if (this.inflightLogin === inflight) {
                              this.inflightLogin = undefined;
                         }
                         inflight.controller.abort();
                    }
                    reject(new SyncCancelledError('Cancelled while re-authenticating'));
               };
               signal.addEventListener('abort', onAbort, { once: true });
               inflight.promise.then(
                    (authenticated) => {
                         signal.removeEventListener('abort', onAbort);
                         resolve(authenticated);
                    },
                    (error: unknown) => {
                         signal.removeEventListener('abort', onAbort);
                         reject(error);
                    }
               );
          });
     }

     private async login(credentials: Credentials, signal?: AbortSignal): Promise<boolean> {
          try {
               const response = await this.executor.execute({
                    method: 'POST',
                    url: this.loginUrl,
                    body: { username: credentials.username, password: credentials.password },
                    // no inventory side effects; 401/403 are terminal regardless
                    idempotent: true,
                    signal,
               });
               const login = parseLoginResponse(response.data);
               const issuedAt = this.now();

               this.token = Object.freeze({
                    value: login.access_token,
                    issuedAt: new Date(issuedAt),
                    expiresAt: new Date(issuedAt + login.expires_in * 1000),
                    principal: credentials.username,
               });
               this.log.info(
                    { principal: credentials.username, expiresAt: this.token.expiresAt },
                    'Authenticated'
               );
               return true;
          } catch (error) {
               this.token = undefined;
               if (error instanceof AuthenticationError) {
                    this.log.warn({ principal: credentials.username }, 'Credentials rejected');
                    return false;
               }
               throw error;
          }
     }
}
