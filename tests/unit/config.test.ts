import { loadConfig } from '@outpost/shared/src/config/env';
import { ValidationError } from '@outpost/shared/src/utils/errors';

function configError(env: NodeJS.ProcessEnv): unknown {
     try {
          loadConfig(env);
     } catch (error) {
          return error;
     }
     return undefined;
}

describe('Config', () => {
     it('should apply defaults to an empty environment', () => {
          const config = loadConfig({});

          expect(config).toEqual({
               nodeEnv: 'development',
               logLevel: 'info',
               serviceName: 'outpost-sync',
               clientType: 'mock',
               nodes: [],
               http: {
                    timeoutMs: 10_000,
                    retryPolicy: { maxRetries: 3, backoffBaseMs: 1000, backoffFactor: 2 },
               },
               auditLogDriver: 'memory',
               database: { poolMin: 2, poolMax: 10, idleTimeoutMs: 10_000, connectionTimeoutMs: 5000 },
               amqp: { url: 'amqp://localhost:5672', prefetch: 5 },
               syncApi: { port: 3100, host: '0.0.0.0' },
          });
     });

     it('should coerce numeric variables and include jitter only when set', () => {
          const config = loadConfig({
               HTTP_TIMEOUT_MS: '2500',
               HTTP_MAX_RETRIES: '5',
               HTTP_BACKOFF_BASE_MS: '200',
               HTTP_BACKOFF_FACTOR: '1.5',
               HTTP_BACKOFF_JITTER: '0.25',
          });

          expect(config.http).toEqual({
               timeoutMs: 2500,
               retryPolicy: { maxRetries: 5, backoffBaseMs: 200, backoffFactor: 1.5, jitterRatio: 0.25 },
          });
     });

     it('should parse nodes with shared and per-node credentials', () => {
          const config = loadConfig({
               OUTPOST_NODES: 'fort-north=http://north.local:8001, fort-south=http://south.local:8002',
               OUTPOST_USERNAME: 'trader',
               OUTPOST_PASSWORD: 'test-secret',
               OUTPOST_FORT_SOUTH_PASSWORD: 'south-secret',
          });

          expect(config.nodes).toEqual([
               { name: 'fort-north', baseUrl: 'http://north.local:8001', username: 'trader', password: 'test-secret' },
               { name: 'fort-south', baseUrl: 'http://south.local:8002', username: 'trader', password: 'south-secret' },
          ]);
     });

     it('should leave credentials out when none are configured', () => {
          const config = loadConfig({ OUTPOST_NODES: 'fort-east=http://east.local' });
          expect(config.nodes).toEqual([{ name: 'fort-east', baseUrl: 'http://east.local' }]);
     });

     it.each([
          ['fort-north', 'must look like name=url'],
          ['fort-north=not a url', 'has an invalid url'],
          ['fort-north=http://a.local,fort-north=http://b.local', 'lists "fort-north" twice'],
     ])('should reject OUTPOST_NODES=%s', (nodes, message) => {
          const error = configError({ OUTPOST_NODES: nodes });
          expect(error).toBeInstanceOf(ValidationError);
          expect(error).toMatchObject({ field: 'OUTPOST_NODES' });
          expect(String(error)).toContain(message);
     });

     it('should name the variable that failed validation', () => {
          const error = configError({ HTTP_MAX_RETRIES: 'lots' });
          expect(error).toBeInstanceOf(ValidationError);
          expect(error).toMatchObject({ field: 'HTTP_MAX_RETRIES' });
          expect(String(error)).toContain('Invalid configuration: HTTP_MAX_RETRIES');
     });

     it('should reject an unknown client type', () => {
          expect(configError({ OUTPOST_CLIENT_TYPE: 'grpc' })).toMatchObject({ field: 'OUTPOST_CLIENT_TYPE' });
     });

     it('should require DATABASE_URL for the postgres audit log', () => {
          expect(configError({ AUDIT_LOG_DRIVER: 'postgres' })).toMatchObject({ field: 'DATABASE_URL' });

          const config = loadConfig({ AUDIT_LOG_DRIVER: 'postgres', DATABASE_URL: 'postgres://localhost/outpost' });
          expect(config.database.url).toBe('postgres://localhost/outpost');
     });

     it('should reject a pool minimum above the maximum', () => {
          expect(configError({ DB_POOL_MIN: '5', DB_POOL_MAX: '2' })).toMatchObject({ field: 'DB_POOL_MIN' });
     });
});
