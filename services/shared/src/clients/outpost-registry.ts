import type { AppConfig } from '../config/env';
import { RequestExecutor } from '../http/request-executor';
import type { FetchLike } from '../http/request-executor';
import type { RetryPolicy, Sleep } from '../http/retry-policy';
import type { OutpostNodeConfig } from '../types/inventory.types';
import { AuthenticationError, NotFoundError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { OutpostHttpClient, type OutpostClient } from './outpost-client';
import { OutpostMockClient } from './outpost-mock-client';

export type OutpostClientType = 'mock' | 'http';

export interface CreateOutpostClientOptions {
     clientType?: OutpostClientType;
     timeoutMs?: number;
     retryPolicy?: RetryPolicy;
     fetchImpl?: FetchLike;
     sleep?: Sleep;
}

/**
 * Builds a client for one node. `mock` nodes start empty and accept the
 * node's configured credentials.
 */
export function createOutpostClient(
     node: OutpostNodeConfig,
     options: CreateOutpostClientOptions = {}
): OutpostClient {
     const clientType = options.clientType ?? 'mock';

     if (clientType === 'http') {
          const executor = new RequestExecutor({
               timeoutMs: options.timeoutMs,
               defaultPolicy: options.retryPolicy,
               fetchImpl: options.fetchImpl,
               sleep: options.sleep,
               logger: createChildLogger({ component: 'request-executor', node: node.name }),
          });
          return new OutpostHttpClient({
               nodeName: node.name,
               baseUrl: node.baseUrl,
               executor,
               username: node.username,
               password: node.password,
          });
     }

     const hasCredentials = node.username !== undefined && node.password !== undefined;
     return new OutpostMockClient({
          nodeName: node.name,
          requireAuth: hasCredentials,
          users: node.username && node.password ? { [node.username]: node.password } : {},
          username: node.username,
          password: node.password,
     });
}

/** One client, and so one auth session, per configured node. */
export class OutpostRegistry {
     private readonly clients = new Map<string, OutpostClient>();
     private readonly nodes = new Map<string, OutpostNodeConfig>();
     private readonly log = createChildLogger({ component: 'outpost-registry' });

     constructor(
          nodes: OutpostNodeConfig[],
          private readonly factory: (node: OutpostNodeConfig) => OutpostClient = (node) =>
               createOutpostClient(node)
     ) {
          for (const node of nodes) {
               this.nodes.set(node.name, node);
          }
     }

     static fromConfig(config: AppConfig, options: Omit<CreateOutpostClientOptions, 'clientType'> = {}): OutpostRegistry {
          return new OutpostRegistry(config.nodes, (node) =>
               createOutpostClient(node, {
                    clientType: config.clientType,
                    timeoutMs: config.http.timeoutMs,
                    retryPolicy: config.http.retryPolicy,
                    ...options,
               })
          );
     }

     names(): string[] {
          return [...this.nodes.keys()];
     }

     has(name: string): boolean {
          return this.nodes.has(name);
     }

     get(name: string): OutpostClient {
          const cached = this.clients.get(name);
          if (cached) {
               return cached;
          }
          const node = this.nodes.get(name);
          if (!node) {
               throw new NotFoundError(`Unknown outpost node: ${name}`, name);
          }
          const client = this.factory(node);
          this.clients.set(name, client);
          return client;
     }

     /** Logs in with the node's configured credentials. */
     async login(name: string): Promise<void> {
          const node = this.nodes.get(name);
          if (!node) {
               throw new NotFoundError(`Unknown outpost node: ${name}`, name);
          }
          if (!node.username || !node.password) {
               throw new AuthenticationError(`No credentials configured for ${name}`);
          }
          const ok = await this.get(name).login(node.username, node.password);
          if (!ok) {
               throw new AuthenticationError(`${name} rejected the configured credentials`);
          }
          this.log.info({ node: name }, 'Logged in to outpost');
     }

     /** Logs in to every node with credentials; returns the names that failed. */
     async loginAll(): Promise<string[]> {
          const withCredentials = this.names().filter((name) => {
               const node = this.nodes.get(name);
               return node?.username !== undefined && node.password !== undefined;
          });
          const results = await Promise.allSettled(withCredentials.map((name) => this.login(name)));
          const failed: string[] = [];
          results.forEach((result, index) => {
               if (result.status === 'rejected') {
                    const name = withCredentials[index];
                    this.log.warn({ node: name, err: result.reason }, 'Outpost login failed');
                    failed.push(name);
               }
          });
          return failed;
     }
}
