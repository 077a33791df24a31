import type { Pool } from 'pg';
import { OutpostRegistry, type CreateOutpostClientOptions } from './clients/outpost-registry';
import type { AppConfig } from './config/env';
import { getPool } from './db/client';
import { FleetService } from './services/fleet-service';
import { InMemorySyncAuditLog, PgSyncAuditLog, type SyncAuditLog } from './services/sync-audit-log';
import { SyncOrchestrator } from './services/sync-orchestrator';
import { SyncService } from './services/sync-service';

export interface SyncContext {
     config: AppConfig;
     registry: OutpostRegistry;
     auditLog: SyncAuditLog;
     orchestrator: SyncOrchestrator;
     syncService: SyncService;
     fleet: FleetService;
     /** Present when the audit log is stored in PostgreSQL. */
     pool?: Pool;
}

export interface SyncContextOverrides {
     registry?: OutpostRegistry;
     auditLog?: SyncAuditLog;
     clientOptions?: Omit<CreateOutpostClientOptions, 'clientType'>;
}

/** Wires the shared components for one process from its configuration. */
export function createSyncContext(config: AppConfig, overrides: SyncContextOverrides = {}): SyncContext {
     const registry = overrides.registry ?? OutpostRegistry.fromConfig(config, overrides.clientOptions);

     let pool: Pool | undefined;
     let auditLog = overrides.auditLog;
     if (!auditLog) {
          if (config.auditLogDriver === 'postgres') {
               pool = getPool(config);
               auditLog = new PgSyncAuditLog(pool);
          } else {
               auditLog = new InMemorySyncAuditLog();
          }
     }

     const orchestrator = new SyncOrchestrator({ auditLog });
     return {
          config,
          registry,
          auditLog,
          orchestrator,
          syncService: new SyncService(registry, orchestrator),
          fleet: new FleetService(registry),
          ...(pool ? { pool } : {}),
     };
}
