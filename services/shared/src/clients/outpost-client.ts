import type { Logger } from 'pino';
import { AuthSession } from '../auth/auth-session';
import { ExecutorRequest, HttpMethod, QueryParams, RequestExecutor } from '../http/request-executor';
import type { RetryPolicy } from '../http/retry-policy';
import type {
     ExportEnvelope,
     InventoryFilter,
     InventoryItem,
     InventoryItemInput,
     InventoryItemPatch,
     NodeHealth,
     NodeStatus,
     Principal,
} from '../types/inventory.types';
import type { MergeStrategy, SyncStatistics } from '../types/sync.types';
import { AuthenticationError, NotFoundError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import {
     parseExportEnvelope,
     parseHealth,
     parseImportStatistics,
     parseInventoryItem,
     parseInventoryList,
     parsePrincipal,
     parseSyncCapabilities,
     serializeImportRequest,
     serializeItemInput,
} from './envelope';

export interface CallOptions {
     /** Aborts the call, including any retry backoff in progress. */
     signal?: AbortSignal;
}

export interface OutpostClient {
     readonly nodeName: string;
     login(username: string, password: string): Promise<boolean>;
     logout(): void;
     listInventory(filter?: InventoryFilter, options?: CallOptions): Promise<InventoryItem[]>;
     getInventoryItem(itemId: string, options?: CallOptions): Promise<InventoryItem>;
     createInventoryItem(item: InventoryItemInput, options?: CallOptions): Promise<InventoryItem>;
     updateInventoryItem(
          itemId: string,
          patch: InventoryItemPatch,
          options?: CallOptions
     ): Promise<InventoryItem>;
     deleteInventoryItem(itemId: string, options?: CallOptions): Promise<void>;
     exportInventory(options?: CallOptions): Promise<ExportEnvelope>;
     /** Single remote bulk import; only valid when supportsBulkImport() is true. */
     importInventory(
          envelope: ExportEnvelope,
          strategy: MergeStrategy,
          options?: CallOptions
     ): Promise<SyncStatistics>;
     supportsBulkImport(options?: CallOptions): Promise<boolean>;
     healthCheck(): Promise<NodeHealth>;
     getStatus(): Promise<NodeStatus>;
     whoAmI(): Promise<Principal>;
}

export const BULK_IMPORT_OPERATIONS = ['import-inventory', 'import_inventory', 'import'];

export interface OutpostHttpClientOptions {
     nodeName: string;
     baseUrl: string;
     executor?: RequestExecutor;
     session?: AuthSession;
     username?: string;
     password?: string;
     retryPolicy?: RetryPolicy;
     now?: () => Date;
     logger?: Logger;
}

interface NodeCall {
     method: HttpMethod;
     path: string;
     body?: unknown;
     query?: QueryParams;
     idempotent?: boolean;
     /** Unprotected endpoints never trigger a login. Defaults to protected. */
     protected?: boolean;
     signal?: AbortSignal;
}

export class OutpostHttpClient implements OutpostClient {
     readonly nodeName: string;
     readonly session: AuthSession;
     private readonly baseUrl: string;
     private readonly executor: RequestExecutor;
     private readonly retryPolicy?: RetryPolicy;
     private readonly now: () => Date;
     private readonly log: Logger;
     private bulkImportSupported: boolean | undefined;

     constructor(options: OutpostHttpClientOptions) {
          this.nodeName = options.nodeName;
          this.baseUrl = options.baseUrl.replace(/\/+$/, '');
          this.executor = options.executor ?? new RequestExecutor();
          this.retryPolicy = options.retryPolicy;
          this.now = options.now ?? (() => new Date());
          this.log = options.logger ?? createChildLogger({ component: 'outpost-client', node: options.nodeName });
          this.session =
               options.session ??
               new AuthSession({
                    nodeName: options.nodeName,
                    loginUrl: `${this.baseUrl}/auth/login`,
                    executor: this.executor,
               });

          if (options.username && options.password) {
               this.session.useCredentials(options.username, options.password);
          }
     }

     async login(username: string, password: string): Promise<boolean> {
          return this.session.authenticate(username, password);
     }

     logout(): void {
          this.session.clear();
          this.log.info('Logged out');
     }

     async listInventory(filter?: InventoryFilter, options?: CallOptions): Promise<InventoryItem[]> {
          const data = await this.call({
               method: 'GET',
               path: '/inventory',
               signal: options?.signal,
               query: {
                    category: filter?.category,
                    min_quantity: filter?.minQuantity,
                    limit: filter?.limit,
               },
          });
          return parseInventoryList(data);
     }

     async getInventoryItem(itemId: string, options?: CallOptions): Promise<InventoryItem> {
          const data = await this.call({
               method: 'GET',
               path: `/inventory/${encodeURIComponent(itemId)}`,
               signal: options?.signal,
          });
          return parseInventoryItem(data);
     }

     async createInventoryItem(item: InventoryItemInput, options?: CallOptions): Promise<InventoryItem> {
          this.log.debug({ name: item.name, category: item.category }, 'Creating inventory item');
          const data = await this.call({
               method: 'POST',
               path: '/inventory',
               body: serializeItemInput(item),
               idempotent: false,
               signal: options?.signal,
          });
          return parseInventoryItem(data);
     }

     async updateInventoryItem(
          itemId: string,
          patch: InventoryItemPatch,
          options?: CallOptions
     ): Promise<InventoryItem> {
          const path = `/inventory/${encodeURIComponent(itemId)}`;
          const data = await this.call({
               method: 'PUT',
               path,
               body: serializeItemInput(patch),
               signal: options?.signal,
          });
          if (data === null) {
               return this.getInventoryItem(itemId, options);
          }
          return parseInventoryItem(data);
     }

     async deleteInventoryItem(itemId: string, options?: CallOptions): Promise<void> {
          await this.call({
               method: 'DELETE',
               path: `/inventory/${encodeURIComponent(itemId)}`,
               signal: options?.signal,
          });
     }

     async exportInventory(options?: CallOptions): Promise<ExportEnvelope> {
          const data = await this.call({
               method: 'POST',
               path: '/sync/export-inventory',
               // read-only on the node
               idempotent: true,
               signal: options?.signal,
          });
          const parsed = parseExportEnvelope(data);
          const principal = this.session.principal;
          const envelope =
               parsed.exportedBy || !principal ? parsed : Object.freeze({ ...parsed, exportedBy: principal });
          this.log.info(
               { itemCount: envelope.items.length, exportedAt: envelope.exportedAt },
               'Exported inventory'
          );
          return envelope;
     }

     async importInventory(
          envelope: ExportEnvelope,
          strategy: MergeStrategy,
          options?: CallOptions
     ): Promise<SyncStatistics> {
          const startedAt = this.now();
          const data = await this.call({
               method: 'POST',
               path: '/sync/import-inventory',
               body: serializeImportRequest(envelope, strategy),
               idempotent: false,
               signal: options?.signal,
          });
          return parseImportStatistics(data, strategy, startedAt, this.now());
     }

     async supportsBulkImport(options?: CallOptions): Promise<boolean> {
          if (this.bulkImportSupported !== undefined) {
               return this.bulkImportSupported;
          }
          try {
               const data = await this.call({ method: 'GET', path: '/sync/status', signal: options?.signal });
               const operations = parseSyncCapabilities(data);
               this.bulkImportSupported = operations.some((operation) =>
                    BULK_IMPORT_OPERATIONS.includes(operation)
               );
          } catch (error) {
               if (!(error instanceof NotFoundError)) {
                    throw error;
               }
               this.bulkImportSupported = false;
          }
          this.log.debug({ bulkImport: this.bulkImportSupported }, 'Resolved sync capabilities');
          return this.bulkImportSupported;
     }

     async healthCheck(): Promise<NodeHealth> {
          return parseHealth(await this.call({ method: 'GET', path: '/health', protected: false }));
     }

     async getStatus(): Promise<NodeStatus> {
          const data = await this.call({ method: 'GET', path: '/status', protected: false });
          return typeof data === 'object' && data !== null && !Array.isArray(data) ? { ...data } : {};
     }

     async whoAmI(): Promise<Principal> {
          return parsePrincipal(await this.call({ method: 'GET', path: '/auth/me' }));
     }

     /**
      * Issues a call with the session's bearer token. A missing/expired token
      * or a 401/403 answer triggers at most one re-authentication per call.
      */
     private async call(call: NodeCall): Promise<unknown> {
          const isProtected = call.protected ?? true;
          let reauthenticated = false;

          if (isProtected && !this.session.currentToken() && this.session.hasCredentials()) {
               reauthenticated = true;
               await this.reauthenticateOrFail(call);
          }

          try {
               return await this.send(call, isProtected);
          } catch (error) {
               if (
                    !isProtected ||
                    reauthenticated ||
                    !(error instanceof AuthenticationError) ||
                    !this.session.hasCredentials()
               ) {
                    throw error;
               }
               this.log.info({ path: call.path }, 'Token rejected, re-authenticating once');
               this.session.invalidate();
               await this.reauthenticateOrFail(call);
               return this.send(call, isProtected);
          }
     }

     private async reauthenticateOrFail(call: NodeCall): Promise<void> {
          const ok = await this.session.reauthenticate(call.signal);
          if (!ok) {
               throw new AuthenticationError(
                    `${call.method} ${call.path} on ${this.nodeName}: re-authentication failed`
               );
          }
     }

     private async send(call: NodeCall, isProtected: boolean): Promise<unknown> {
          const request: ExecutorRequest = {
               method: call.method,
               url: `${this.baseUrl}${call.path}`,
               body: call.body,
               query: call.query,
               idempotent: call.idempotent,
               policy: this.retryPolicy,
               signal: call.signal,
               headers: isProtected ? this.session.authorizationHeader() : {},
          };
          const response = await this.executor.execute(request);
          return response.data;
     }
}
