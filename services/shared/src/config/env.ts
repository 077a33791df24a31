import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { RetryPolicy } from '../http/retry-policy';
import type { OutpostNodeConfig } from '../types/inventory.types';
import { ValidationError } from '../utils/errors';

const intFromEnv = (fallback: number, min = 0) =>
     z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
     NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
     LOG_LEVEL: z.string().default('info'),
     SERVICE_NAME: z.string().default('outpost-sync'),

     OUTPOST_CLIENT_TYPE: z.enum(['mock', 'http']).default('mock'),
     OUTPOST_NODES: z.string().default(''),
     OUTPOST_USERNAME: z.string().optional(),
     OUTPOST_PASSWORD: z.string().optional(),

     HTTP_TIMEOUT_MS: intFromEnv(10_000, 1),
     HTTP_MAX_RETRIES: intFromEnv(3),
     HTTP_BACKOFF_BASE_MS: intFromEnv(1000, 1),
     HTTP_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
     HTTP_BACKOFF_JITTER: z.coerce.number().min(0).max(1).default(0),

     AUDIT_LOG_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
     DATABASE_URL: z.string().optional(),
     DB_POOL_MIN: intFromEnv(2),
     DB_POOL_MAX: intFromEnv(10, 1),
     DB_IDLE_TIMEOUT_MS: intFromEnv(10_000),
     DB_CONNECTION_TIMEOUT_MS: intFromEnv(5000),

     AMQP_URL: z.string().default('amqp://localhost:5672'),
     AMQP_PREFETCH: intFromEnv(5, 1),

     SYNC_API_PORT: intFromEnv(3100, 1),
     SYNC_API_HOST: z.string().default('0.0.0.0'),
});

type Env = z.infer<typeof envSchema>;

export interface AppConfig {
     nodeEnv: Env['NODE_ENV'];
     logLevel: string;
     serviceName: string;
     clientType: Env['OUTPOST_CLIENT_TYPE'];
     nodes: OutpostNodeConfig[];
     http: {
          timeoutMs: number;
          retryPolicy: RetryPolicy;
     };
     auditLogDriver: Env['AUDIT_LOG_DRIVER'];
     database: {
          url?: string;
          poolMin: number;
          poolMax: number;
          idleTimeoutMs: number;
          connectionTimeoutMs: number;
     };
     amqp: {
          url: string;
          prefetch: number;
     };
     syncApi: {
          port: number;
          host: string;
     };
}

function credentialVariable(nodeName: string, field: 'USERNAME' | 'PASSWORD'): string {
     return `OUTPOST_${nodeName.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}_${field}`;
}

/** Parses `name=url,name=url`. */
export function parseNodeList(raw: string, env: NodeJS.ProcessEnv, defaults: Env): OutpostNodeConfig[] {
     const nodes: OutpostNodeConfig[] = [];
     const seen = new Set<string>();

     for (const entry of raw.split(',').map((part) => part.trim()).filter(Boolean)) {
          const separator = entry.indexOf('=');
          const name = separator > 0 ? entry.slice(0, separator).trim() : '';
          const baseUrl = separator > 0 ? entry.slice(separator + 1).trim() : '';
          if (!name || !baseUrl) {
               throw new ValidationError(`OUTPOST_NODES entry "${entry}" must look like name=url`, 'OUTPOST_NODES');
          }
          if (!z.string().url().safeParse(baseUrl).success) {
               throw new ValidationError(`OUTPOST_NODES entry "${name}" has an invalid url`, 'OUTPOST_NODES');
          }
          if (seen.has(name)) {
               throw new ValidationError(`OUTPOST_NODES lists "${name}" twice`, 'OUTPOST_NODES');
          }
          seen.add(name);

          const username = env[credentialVariable(name, 'USERNAME')] ?? defaults.OUTPOST_USERNAME;
          const password = env[credentialVariable(name, 'PASSWORD')] ?? defaults.OUTPOST_PASSWORD;
          nodes.push({
               name,
               baseUrl,
               ...(username ? { username } : {}),
               ...(password ? { password } : {}),
          });
     }
     return nodes;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
     const parsed = envSchema.safeParse(env);
     if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const variable = issue ? String(issue.path[0]) : 'environment';
          throw new ValidationError(
               `Invalid configuration: ${variable} ${issue?.message ?? 'is invalid'}`,
               variable
          );
     }
     const values = parsed.data;

     if (values.AUDIT_LOG_DRIVER === 'postgres' && !values.DATABASE_URL) {
          throw new ValidationError('DATABASE_URL is required when AUDIT_LOG_DRIVER=postgres', 'DATABASE_URL');
     }
     if (values.DB_POOL_MIN > values.DB_POOL_MAX) {
          throw new ValidationError('DB_POOL_MIN must not exceed DB_POOL_MAX', 'DB_POOL_MIN');
     }

     return {
          nodeEnv: values.NODE_ENV,
          logLevel: values.LOG_LEVEL,
          serviceName: values.SERVICE_NAME,
          clientType: values.OUTPOST_CLIENT_TYPE,
          nodes: parseNodeList(values.OUTPOST_NODES, env, values),
          http: {
               timeoutMs: values.HTTP_TIMEOUT_MS,
               retryPolicy: {
                    maxRetries: values.HTTP_MAX_RETRIES,
                    backoffBaseMs: values.HTTP_BACKOFF_BASE_MS,
                    backoffFactor: values.HTTP_BACKOFF_FACTOR,
                    ...(values.HTTP_BACKOFF_JITTER > 0 ? { jitterRatio: values.HTTP_BACKOFF_JITTER } : {}),
               },
          },
          auditLogDriver: values.AUDIT_LOG_DRIVER,
          database: {
               ...(values.DATABASE_URL ? { url: values.DATABASE_URL } : {}),
               poolMin: values.DB_POOL_MIN,
               poolMax: values.DB_POOL_MAX,
               idleTimeoutMs: values.DB_IDLE_TIMEOUT_MS,
               connectionTimeoutMs: values.DB_CONNECTION_TIMEOUT_MS,
          },
          amqp: {
               url: values.AMQP_URL,
               prefetch: values.AMQP_PREFETCH,
          },
          syncApi: {
               port: values.SYNC_API_PORT,
               host: values.SYNC_API_HOST,
          },
     };
}

/** Loads `.env` (if present) into process.env, then validates it. */
export function loadConfigFromEnvFile(): AppConfig {
     dotenv.config();
     return loadConfig(process.env);
}
