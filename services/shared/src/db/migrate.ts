import { promises as fs } from 'fs';
import { join } from 'path';
import type { Pool } from 'pg';
import { loadConfigFromEnvFile } from '../config/env';
import { closePool, getPool } from './client';
import { logger } from '../utils/logger';

export const MIGRATIONS_DIR = join(__dirname, 'migrations');

/** Runs every .sql file in name order. Returns the files executed. */
export async function runMigrations(
     db: Pick<Pool, 'query'>,
     migrationsDir: string = MIGRATIONS_DIR
): Promise<string[]> {
     const files = await fs.readdir(migrationsDir);
     const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

     logger.info({ count: sqlFiles.length }, 'Running database migrations');

     for (const file of sqlFiles) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');
          logger.info({ file }, 'Executing migration');
          await db.query(sql);
     }

     logger.info('All migrations completed successfully');
     return sqlFiles;
}

// Run if executed directly
if (require.main === module) {
     const config = loadConfigFromEnvFile();
     runMigrations(getPool(config))
          .catch((err: unknown) => {
               logger.error({ err }, 'Migration failed');
               process.exitCode = 1;
          })
          .finally(() => closePool());
}
