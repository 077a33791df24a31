import { randomUUID } from 'crypto';
import type { Pool } from 'pg';
import { z } from 'zod';
import { INVENTORY_CATEGORIES } from '../types/inventory.types';
import {
     MERGE_STRATEGIES,
     SYNC_OUTCOMES,
     type NewSyncAuditEntry,
     type SyncAuditEntry,
     type SyncAuditQuery,
     type SyncAuditSummary,
     type SyncStatistics,
} from '../types/sync.types';
import { logger } from '../utils/logger';

export interface SyncAuditLog {
     append(entry: NewSyncAuditEntry): Promise<SyncAuditEntry>;
     /** Newest first. */
     list(query?: SyncAuditQuery): Promise<SyncAuditEntry[]>;
     findByRequestId(requestId: string): Promise<SyncAuditEntry | undefined>;
     summarize(): Promise<SyncAuditSummary>;
}

export const DEFAULT_AUDIT_LIST_LIMIT = 50;

function freezeEntry(entry: SyncAuditEntry): SyncAuditEntry {
     return Object.freeze({
          ...entry,
          statistics: Object.freeze({
               ...entry.statistics,
               errors: Object.freeze(entry.statistics.errors.map((error) => Object.freeze({ ...error }))),
          }),
     });
}

function emptySummary(): SyncAuditSummary {
     return {
          totalRuns: 0,
          itemsAdded: 0,
          itemsUpdated: 0,
          itemsSkipped: 0,
          itemsFailed: 0,
          byOutcome: {},
     };
}

export class InMemorySyncAuditLog implements SyncAuditLog {
     private entries: SyncAuditEntry[] = [];

     constructor(
          private readonly maxEntries: number = 1000,
          private readonly now: () => Date = () => new Date()
     ) {}

     async append(entry: NewSyncAuditEntry): Promise<SyncAuditEntry> {
          const stored = freezeEntry({ ...entry, id: randomUUID(), recordedAt: this.now() });
          this.entries.push(stored);
          if (this.entries.length > this.maxEntries) {
               this.entries = this.entries.slice(this.entries.length - this.maxEntries);
          }
          return stored;
     }

     async list(query: SyncAuditQuery = {}): Promise<SyncAuditEntry[]> {
          return this.entries
               .filter(
                    (entry) =>
                         (!query.sourceNode || entry.sourceNode === query.sourceNode) &&
                         (!query.targetNode || entry.targetNode === query.targetNode) &&
                         (!query.outcome || entry.outcome === query.outcome)
               )
               .reverse()
               .slice(0, query.limit ?? DEFAULT_AUDIT_LIST_LIMIT);
     }

     async findByRequestId(requestId: string): Promise<SyncAuditEntry | undefined> {
          for (let i = this.entries.length - 1; i >= 0; i--) {
               if (this.entries[i].requestId === requestId) {
                    return this.entries[i];
               }
          }
          return undefined;
     }

     async summarize(): Promise<SyncAuditSummary> {
          const summary = emptySummary();
          for (const entry of this.entries) {
               summary.totalRuns++;
               summary.itemsAdded += entry.statistics.itemsAdded;
               summary.itemsUpdated += entry.statistics.itemsUpdated;
               summary.itemsSkipped += entry.statistics.itemsSkipped;
               summary.itemsFailed += entry.statistics.itemsFailed;
               summary.byOutcome[entry.outcome] = (summary.byOutcome[entry.outcome] ?? 0) + 1;
               summary.lastRecordedAt = entry.recordedAt;
          }
          return summary;
     }
}

// Rows as stored in sync_audit_log

type AuditRow = {
     id: string;
     request_id: string | null;
     source_node: string;
     target_node: string;
     strategy: string;
     outcome: string;
     statistics: unknown;
     error: string | null;
     recorded_at: Date;
};

const storedStatisticsSchema = z.object({
     itemsAdded: z.number(),
     itemsUpdated: z.number(),
     itemsSkipped: z.number(),
     itemsFailed: z.number(),
     itemsDeleted: z.number().default(0),
     strategyUsed: z.enum(MERGE_STRATEGIES),
     startedAt: z.coerce.date(),
     completedAt: z.coerce.date(),
     errors: z
          .array(
               z.object({
                    itemName: z.string().optional(),
                    category: z.enum(INVENTORY_CATEGORIES).optional(),
                    operation: z.enum(['create', 'update', 'delete', 'merge', 'import']),
                    kind: z.enum([
                         'transient',
                         'authentication',
                         'not_found',
                         'validation',
                         'conflict',
                         'fatal',
                         'cancelled',
                         'unknown',
                    ]),
                    message: z.string(),
               })
          )
          .default([]),
});

function rowToEntry(row: AuditRow): SyncAuditEntry {
     const statistics: SyncStatistics = storedStatisticsSchema.parse(row.statistics);
     return freezeEntry({
          id: row.id,
          ...(row.request_id ? { requestId: row.request_id } : {}),
          sourceNode: row.source_node,
          targetNode: row.target_node,
          strategy: z.enum(MERGE_STRATEGIES).parse(row.strategy),
          outcome: z.enum(SYNC_OUTCOMES).parse(row.outcome),
          statistics,
          ...(row.error ? { error: row.error } : {}),
          recordedAt: row.recorded_at,
     });
}

/** INSERT-only audit log in the `sync_audit_log` table. */
export class PgSyncAuditLog implements SyncAuditLog {
     constructor(private readonly db: Pick<Pool, 'query'>) {}

     async append(entry: NewSyncAuditEntry): Promise<SyncAuditEntry> {
          const { rows } = await this.db.query<AuditRow>(
               `
      INSERT INTO sync_audit_log (
        request_id,
        source_node,
        target_node,
        strategy,
        outcome,
        statistics,
        error
      ) VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7)
      RETURNING *
    `,
               [
                    entry.requestId ?? null,
                    entry.sourceNode,
                    entry.targetNode,
                    entry.strategy,
                    entry.outcome,
                    JSON.stringify(entry.statistics),
                    entry.error ?? null,
               ]
          );
          const row = rows[0];
          if (!row) {
               throw new Error('sync_audit_log insert returned no row');
          }
          logger.debug({ id: row.id, outcome: entry.outcome }, 'Sync audit entry recorded');
          return rowToEntry(row);
     }

     async list(query: SyncAuditQuery = {}): Promise<SyncAuditEntry[]> {
          const conditions: string[] = [];
          const params: Array<string | number> = [];

          if (query.sourceNode) {
               params.push(query.sourceNode);
               conditions.push(`source_node = $${params.length}`);
          }
          if (query.targetNode) {
               params.push(query.targetNode);
               conditions.push(`target_node = $${params.length}`);
          }
          if (query.outcome) {
               params.push(query.outcome);
               conditions.push(`outcome = $${params.length}`);
          }
          params.push(query.limit ?? DEFAULT_AUDIT_LIST_LIMIT);

          const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
          const { rows } = await this.db.query<AuditRow>(
               `SELECT * FROM sync_audit_log ${where} ORDER BY recorded_at DESC LIMIT $${params.length}`,
               params
          );
          return rows.map(rowToEntry);
     }

     async findByRequestId(requestId: string): Promise<SyncAuditEntry | undefined> {
          const { rows } = await this.db.query<AuditRow>(
               `SELECT * FROM sync_audit_log WHERE request_id = $1 ORDER BY recorded_at DESC LIMIT 1`,
               [requestId]
          );
          const row = rows[0];
          return row ? rowToEntry(row) : undefined;
     }

     async summarize(): Promise<SyncAuditSummary> {
          const { rows } = await this.db.query<{
               outcome: string;
               runs: string;
               items_added: string | null;
               items_updated: string | null;
               items_skipped: string | null;
               items_failed: string | null;
               last_recorded_at: Date | null;
          }>(
               `
      SELECT
        outcome,
        COUNT(*) AS runs,
        SUM((statistics->>'itemsAdded')::int) AS items_added,
        SUM((statistics->>'itemsUpdated')::int) AS items_updated,
        SUM((statistics->>'itemsSkipped')::int) AS items_skipped,
        SUM((statistics->>'itemsFailed')::int) AS items_failed,
        MAX(recorded_at) AS last_recorded_at
      FROM sync_audit_log
      GROUP BY outcome
    `
          );

          const summary = emptySummary();
          for (const row of rows) {
               const outcome = z.enum(SYNC_OUTCOMES).parse(row.outcome);
               const runs = Number(row.runs);
               summary.totalRuns += runs;
               summary.itemsAdded += Number(row.items_added ?? 0);
               summary.itemsUpdated += Number(row.items_updated ?? 0);
               summary.itemsSkipped += Number(row.items_skipped ?? 0);
               summary.itemsFailed += Number(row.items_failed ?? 0);
               summary.byOutcome[outcome] = runs;
               if (row.last_recorded_at && (!summary.lastRecordedAt || row.last_recorded_at > summary.lastRecordedAt)) {
                    summary.lastRecordedAt = row.last_recorded_at;
               }
          }
          return summary;
     }
}
