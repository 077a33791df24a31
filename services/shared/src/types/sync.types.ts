import type { ErrorCategory } from '../utils/errors';
import type { InventoryCategory } from './inventory.types';

export const MERGE_STRATEGIES = ['add', 'merge', 'replace'] as const;

export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export type SyncState = 'idle' | 'exporting' | 'importing' | 'completed' | 'failed';

export const SYNC_OUTCOMES = [
     'success',
     'partial_success',
     'auth_failure',
     'unreachable_source',
     'unreachable_target',
     'malformed_envelope',
     'cancelled',
     'failed',
] as const;

export type SyncOutcome = (typeof SYNC_OUTCOMES)[number];

export type SyncImportMode = 'bulk' | 'per_item';

export type SyncItemOperation = 'create' | 'update' | 'delete' | 'merge' | 'import';

export interface SyncItemError {
     /** Absent when a node reports a bulk-import failure without naming the item. */
     itemName?: string;
     category?: InventoryCategory;
     operation: SyncItemOperation;
     kind: ErrorCategory | 'unknown';
     message: string;
}

export interface SyncStatistics {
     readonly itemsAdded: number;
     readonly itemsUpdated: number;
     readonly itemsSkipped: number;
     readonly itemsFailed: number;
     readonly itemsDeleted: number;
     readonly strategyUsed: MergeStrategy;
     readonly startedAt: Date;
     readonly completedAt: Date;
     readonly errors: ReadonlyArray<Readonly<SyncItemError>>;
}

export interface SyncResult {
     readonly state: Extract<SyncState, 'completed' | 'failed'>;
     readonly outcome: SyncOutcome;
     readonly sourceNode: string;
     readonly targetNode: string;
     readonly mode?: SyncImportMode;
     readonly statistics: SyncStatistics;
     readonly error?: string;
     readonly requestId?: string;
}

// Audit log
export interface SyncAuditEntry {
     readonly id: string;
     readonly requestId?: string;
     readonly sourceNode: string;
     readonly targetNode: string;
     readonly strategy: MergeStrategy;
     readonly outcome: SyncOutcome;
     readonly statistics: SyncStatistics;
     readonly error?: string;
     readonly recordedAt: Date;
}

export type NewSyncAuditEntry = Omit<SyncAuditEntry, 'id' | 'recordedAt'>;

export interface SyncAuditQuery {
     sourceNode?: string;
     targetNode?: string;
     outcome?: SyncOutcome;
     limit?: number;
}

export interface SyncAuditSummary {
     totalRuns: number;
     itemsAdded: number;
     itemsUpdated: number;
     itemsSkipped: number;
     itemsFailed: number;
     byOutcome: Partial<Record<SyncOutcome, number>>;
     lastRecordedAt?: Date;
}
