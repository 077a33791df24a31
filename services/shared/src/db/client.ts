import { Pool, PoolConfig } from 'pg';
import type { AppConfig } from '../config/env';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

export function buildPoolConfig(database: AppConfig['database'], nodeEnv: AppConfig['nodeEnv']): PoolConfig {
     return {
          connectionString: database.url,
          // In test mode, use minimal connections and short timeouts
          min: nodeEnv === 'test' ? 0 : database.poolMin,
          max: nodeEnv === 'test' ? 2 : database.poolMax,
          idleTimeoutMillis: nodeEnv === 'test' ? 100 : database.idleTimeoutMs,
          connectionTimeoutMillis: database.connectionTimeoutMs,
     };
}

/** The process-wide pool, created on first use. */
export function getPool(config: AppConfig): Pool {
     if (pool) return pool;

     pool = new Pool(buildPoolConfig(config.database, config.nodeEnv));
     pool.on('error', (err) => {
          logger.error({ err }, 'Unexpected PostgreSQL pool error');
     });
     return pool;
}

// Connection health check
export async function checkConnection(db: Pool): Promise<boolean> {
     try {
          const client = await db.connect();
          try {
               await client.query('SELECT 1');
          } finally {
               client.release();
          }
          return true;
     } catch (error) {
          logger.error({ err: error }, 'Database connection check failed');
          return false;
     }
}

export async function closePool(): Promise<void> {
     if (!pool) return;
     const closing = pool;
     pool = null;
     await closing.end();
     logger.info('Database pool closed');
}
