import type { FetchLike } from '@outpost/shared/src/http/request-executor';

/**
 * In-process stand-in for an outpost node's REST surface, served through the
 * executor's injectable fetch. Nothing leaves the test process.
 */

export interface RecordedRequest {
     method: string;
     path: string;
     authorization?: string;
     body?: unknown;
}

interface WireItem {
     item_id: string;
     name: string;
     category: string;
     quantity: number;
     unit: string;
     value: number;
     description?: string;
     last_updated: string;
}

interface ScriptedFailure {
     method: string;
     path: string;
     status?: number;
     body?: unknown;
     networkCode?: string;
     times: number;
}

export function fakeResponse(status: number, body?: unknown): Response {
     const text = body === undefined ? '' : typeof body === 'string' ? body : JSON.stringify(body);
     return {
          ok: status >= 200 && status < 300,
          status,
          text: async () => text,
     } as unknown as Response;
}

export function networkError(code: string): Error {
     return Object.assign(new TypeError('fetch failed'), {
          cause: Object.assign(new Error(`connect ${code}`), { code }),
     });
}

export class FakeOutpostNode {
     readonly requests: RecordedRequest[] = [];
     bulkImport = false;
     tokenTtlSeconds = 3600;
     exportedBy: string | undefined;

     private items = new Map<string, WireItem>();
     private nextId = 1;
     private tokens = new Set<string>();
     private tokenCounter = 0;
     private failures: ScriptedFailure[] = [];

     constructor(
          readonly name: string,
          readonly baseUrl: string,
          private readonly users: Record<string, string> = {}
     ) {}

     readonly fetch: FetchLike = async (url, init) => {
          const parsed = new URL(url);
          const method = init.method ?? 'GET';
          const path = parsed.pathname;
          const headers = init.headers;
          const authorization =
               headers && typeof headers === 'object' && !Array.isArray(headers)
                    ? (Reflect.get(headers, 'Authorization') as string | undefined)
                    : undefined;
          const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
          this.requests.push({ method, path, authorization, body });

          const failure = this.failures.find((f) => f.method === method && f.path === path && f.times > 0);
          if (failure) {
               failure.times--;
               if (failure.networkCode) {
                    throw networkError(failure.networkCode);
               }
               return fakeResponse(failure.status ?? 500, failure.body);
          }
          return this.route(method, path, parsed.searchParams, authorization, body);
     };

     seed(items: Array<Omit<WireItem, 'item_id' | 'last_updated'>>): void {
          for (const item of items) {
               this.insert(item);
          }
     }

     inventory(): WireItem[] {
          return [...this.items.values()];
     }

     failNext(method: string, path: string, status: number, body?: unknown, times = 1): void {
          this.failures.push({ method, path, status, body, times });
     }

     dropNext(method: string, path: string, networkCode: string, times = 1): void {
          this.failures.push({ method, path, networkCode, times });
     }

     /** Simulates the node forgetting issued tokens, e.g. after a restart. */
     revokeTokens(): void {
          this.tokens.clear();
     }

     requestsTo(method: string, path: string): RecordedRequest[] {
          return this.requests.filter((r) => r.method === method && r.path === path);
     }

     private route(
          method: string,
          path: string,
          query: URLSearchParams,
          authorization: string | undefined,
          body: unknown
     ): Response {
          if (method === 'POST' && path === '/auth/login') {
               return this.login(body);
          }
          if (method === 'GET' && path === '/health') {
               return fakeResponse(200, { status: 'healthy', outpost: this.name });
          }
          if (method === 'GET' && path === '/status') {
               return fakeResponse(200, { outpost_name: this.name, inventory_count: this.items.size });
          }

          const token = authorization?.replace(/^Bearer /, '');
          if (!token || !this.tokens.has(token)) {
               return fakeResponse(401, { detail: 'Could not validate credentials' });
          }

          if (method === 'GET' && path === '/auth/me') {
               return fakeResponse(200, { username: Object.keys(this.users)[0], role: 'trader', fort: this.name });
          }
          if (method === 'GET' && path === '/sync/status') {
               return fakeResponse(200, {
                    supported_operations: this.bulkImport
                         ? ['export-inventory', 'import-inventory']
                         : ['export-inventory'],
                    version: '1.0',
               });
          }
          if (method === 'POST' && path === '/sync/export-inventory') {
               return fakeResponse(200, {
                    source: this.name,
                    exported_at: '2024-05-01T12:00:00.000Z',
                    ...(this.exportedBy ? { exported_by: this.exportedBy } : {}),
                    items: this.inventory(),
               });
          }
          if (method === 'POST' && path === '/sync/import-inventory' && this.bulkImport) {
               return fakeResponse(200, { statistics: { items_added: 1, items_updated: 0, items_skipped: 0 } });
          }
          if (path === '/inventory') {
               if (method === 'GET') {
                    let items = this.inventory();
                    const category = query.get('category');
                    if (category) items = items.filter((item) => item.category === category);
                    return fakeResponse(200, items);
               }
               if (method === 'POST') {
                    return fakeResponse(201, this.insert(body));
               }
          }
          const match = /^\/inventory\/([^/]+)$/.exec(path);
          if (match) {
               const id = decodeURIComponent(match[1]);
               const existing = this.items.get(id);
               if (!existing) {
                    return fakeResponse(404, { detail: 'Item not found' });
               }
               if (method === 'GET') {
                    return fakeResponse(200, existing);
               }
               if (method === 'PUT') {
                    const updated = { ...existing, ...(typeof body === 'object' && body !== null ? body : {}) };
                    this.items.set(id, updated);
                    return fakeResponse(200, updated);
               }
               if (method === 'DELETE') {
                    this.items.delete(id);
                    return fakeResponse(204);
               }
          }
          return fakeResponse(404, { detail: 'Not Found' });
     }

     private login(body: unknown): Response {
          const credentials = body as { username?: string; password?: string };
          if (!credentials.username || this.users[credentials.username] !== credentials.password) {
               return fakeResponse(401, { detail: 'Incorrect username or password' });
          }
          const token = `${this.name}-token-${++this.tokenCounter}`;
          this.tokens.add(token);
          return fakeResponse(200, {
               access_token: token,
               token_type: 'bearer',
               expires_in: this.tokenTtlSeconds,
          });
     }

     private insert(body: unknown): WireItem {
          const item = {
               ...(body as Omit<WireItem, 'item_id' | 'last_updated'>),
               item_id: String(this.nextId++),
               last_updated: '2024-05-01T12:00:00.000Z',
          };
          this.items.set(item.item_id, item);
          return item;
     }
}
